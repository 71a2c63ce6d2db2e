/**
 * Resolve raw overmap types to terrain definitions and oriented glyphs.
 */

import { hasFlag, stringField, type Definition } from '../core/types.js';
import { pointerGlyph, rotationDistance, splitCompassSuffix, type Compass } from '../core/direction.js';
import { defaultLogger, type Logger } from '../core/logger.js';
import type { DefinitionStore } from '../content/definition-store.js';
import { isLineGlyph, rotateGlyph, splitLinearSuffix } from './linework.js';
import type { OvermapTile, RawCell, ResolvedCell, ResolvedTile } from './overmap-tile.js';

export const OVERMAP_TERRAIN = 'overmap_terrain';

/** Flag marking terrain that connects like roads */
export const LINEAR_FLAG = 'LINEAR';

/** Default glyph of buildings that face a direction */
export const POINTER_GLYPH = '^';

/**
 * Reasons symbol resolution can fail as a whole.
 */
export type SymbolFailureReason = 'MISSING_CATEGORY';

export interface SymbolFailure {
  readonly reason: SymbolFailureReason;
  readonly details: string;
}

export function isSymbolFailure(value: unknown): value is SymbolFailure {
  return typeof value === 'object' && value !== null && 'reason' in value && 'details' in value;
}

export interface SymbolResolution {
  readonly tile: ResolvedTile;
  /** Cells whose type matched no definition */
  readonly unmatched: number;
}

/**
 * Resolve a single raw cell.
 */
export function resolveCell(cell: RawCell, store: DefinitionStore, logger: Logger = defaultLogger): ResolvedCell {
  const { omType } = cell;

  // Linear terrain takes its glyph straight from the suffix
  const linear = splitLinearSuffix(omType);
  if (linear.entry) {
    const terrain = store.get(OVERMAP_TERRAIN, linear.base);
    if (terrain === undefined) {
      logger.debug(`no matching ${OVERMAP_TERRAIN} for ${linear.base}`);
    } else if (hasFlag(terrain, LINEAR_FLAG)) {
      return { ...cell, terrain, glyph: linear.entry.glyph };
    }
  }

  const { base, dir } = splitCompassSuffix(omType);
  const terrain = store.get(OVERMAP_TERRAIN, base);
  if (terrain === undefined) {
    logger.warn(`failed to get ${OVERMAP_TERRAIN} for ${base}`);
    return { ...cell, terrain: undefined, glyph: undefined };
  }

  return { ...cell, terrain, glyph: orientedGlyph(terrain, dir, omType, logger) };
}

function orientedGlyph(
  terrain: Definition,
  dir: Compass | undefined,
  omType: string,
  logger: Logger
): string | undefined {
  const sym = stringField(terrain, 'sym');
  if (sym === undefined) {
    return undefined;
  }

  if (sym === POINTER_GLYPH) {
    if (dir === undefined) {
      logger.warn(`no compass direction for ${omType}`);
      return undefined;
    }
    return pointerGlyph(dir);
  }

  // Line glyphs are stored facing north; turn them to the stored direction
  if (isLineGlyph(sym)) {
    return rotateGlyph(sym, dir === undefined ? 0 : rotationDistance(dir));
  }

  return undefined;
}

/**
 * Resolve every cell of a tile against the `overmap_terrain` definitions.
 *
 * @returns The resolved tile, or a SymbolFailure if no terrain was loaded
 */
export function resolveSymbols(
  tile: OvermapTile,
  store: DefinitionStore,
  logger: Logger = defaultLogger
): SymbolResolution | SymbolFailure {
  if (!store.hasCategory(OVERMAP_TERRAIN)) {
    logger.error(`${OVERMAP_TERRAIN} not loaded`);
    return { reason: 'MISSING_CATEGORY', details: `${OVERMAP_TERRAIN} not loaded` };
  }
  logger.debug(`${OVERMAP_TERRAIN} definitions: ${store.size(OVERMAP_TERRAIN)}`);

  let unmatched = 0;
  const resolved = tile.map(cell => {
    const result = resolveCell(cell, store, logger);
    if (result.terrain === undefined) {
      unmatched++;
    }
    return result;
  });

  return { tile: resolved, unmatched };
}
