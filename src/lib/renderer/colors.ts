/**
 * Color utilities for rendering.
 */

import { defaultLogger, type Logger } from '../core/logger.js';

/**
 * xterm-256 palette index of each base color name used by game content.
 */
export const COLORS: Readonly<Record<string, number>> = Object.freeze({
  black: 16,
  white: 15,
  red: 1,
  green: 2,
  blue: 4,
  cyan: 6,
  magenta: 5,
  yellow: 11,
  light_gray: 7,
  dark_gray: 8,
  brown: 3,
  light_red: 9,
  light_green: 10,
  light_blue: 12,
  light_cyan: 14,
  pink: 13,
});

const ALIASES: Readonly<Record<string, string>> = Object.freeze({
  gray: 'light_gray',
  grey: 'light_gray',
  light_grey: 'light_gray',
  dark_grey: 'dark_gray',
});

/**
 * Foreground and background palette indices.
 */
export interface ColorPair {
  readonly fg: number;
  readonly bg: number;
}

const COLOR_NAME = /^(?:([chi])_)?((?:light_|dark_)?[a-z]+)(?:_([a-z]+))?$/i;

function lookup(name: string, logger: Logger): number | undefined {
  const key = name.toLowerCase();
  const alias: string | undefined = ALIASES[key];
  const index: number | undefined = COLORS[alias ?? key];
  if (index === undefined) {
    logger.error(`color '${name}' is not defined`);
  }
  return index;
}

/**
 * Translate a game color name into a palette pair.
 *
 * Names look like `c_light_red`, `red_white` (red on white), `i_green`
 * (inverted: black on green) or `h_yellow` (highlighted: yellow on blue).
 *
 * @returns The pair, or undefined for `unset` and for names that cannot be read
 */
export function translateColor(name: string, logger: Logger = defaultLogger): ColorPair | undefined {
  const match = COLOR_NAME.exec(name);
  if (!match) {
    logger.error(`failed to translate color '${name}'`);
    return undefined;
  }

  const [, prefix, fgName, bgName] = match;
  if (fgName.toLowerCase() === 'unset') {
    logger.debug('c_unset, returning undefined');
    return undefined;
  }

  const base = lookup(fgName, logger);
  if (base === undefined) {
    return undefined;
  }

  switch (prefix?.toLowerCase()) {
    case 'i':
      return { fg: COLORS.black, bg: base };
    case 'h':
      return { fg: base, bg: COLORS.blue };
    default: {
      if (bgName === undefined) {
        return { fg: base, bg: COLORS.black };
      }
      const bg = lookup(bgName, logger);
      return bg === undefined ? undefined : { fg: base, bg };
    }
  }
}
