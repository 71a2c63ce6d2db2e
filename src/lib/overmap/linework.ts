/**
 * Line-drawing glyphs for linear terrain (roads, rivers, subways, ...).
 *
 * Each glyph carries a 4-bit connectivity mask: bit 3 north, bit 2 east,
 * bit 1 south, bit 0 west. Rotating a mask left by one quarter-turns the
 * glyph counter-clockwise (north becomes west).
 */

export interface LineGlyph {
  readonly suffix: string;
  readonly glyph: string;
  readonly name: string;
  readonly mask: number;
}

export const NORTH_BIT = 0b1000;
export const EAST_BIT = 0b0100;
export const SOUTH_BIT = 0b0010;
export const WEST_BIT = 0b0001;

const line = (suffix: string, glyph: string, name: string, mask: number): LineGlyph =>
  Object.freeze({ suffix, glyph, name, mask });

/**
 * Linear type suffixes, in lookup order. Several suffixes share a glyph;
 * the first entry for a mask is the canonical one.
 */
export const LINE_GLYPHS: ReadonlyArray<LineGlyph> = Object.freeze([
  line('end_south', '│', 'VLINE', NORTH_BIT | SOUTH_BIT),
  line('end_north', '│', 'VLINE', NORTH_BIT | SOUTH_BIT),
  line('ns', '│', 'VLINE', NORTH_BIT | SOUTH_BIT),
  line('end_west', '─', 'HLINE', EAST_BIT | WEST_BIT),
  line('end_east', '─', 'HLINE', EAST_BIT | WEST_BIT),
  line('ew', '─', 'HLINE', EAST_BIT | WEST_BIT),
  line('ne', '└', 'LLCORNER', NORTH_BIT | EAST_BIT),
  line('es', '┌', 'ULCORNER', EAST_BIT | SOUTH_BIT),
  line('sw', '┐', 'URCORNER', SOUTH_BIT | WEST_BIT),
  line('wn', '┘', 'LRCORNER', WEST_BIT | NORTH_BIT),
  line('nes', '├', 'LTEE', NORTH_BIT | EAST_BIT | SOUTH_BIT),
  line('new', '┴', 'BTEE', NORTH_BIT | EAST_BIT | WEST_BIT),
  line('nsw', '┤', 'RTEE', NORTH_BIT | SOUTH_BIT | WEST_BIT),
  line('esw', '┬', 'TTEE', EAST_BIT | SOUTH_BIT | WEST_BIT),
  line('isolated', '┼', 'PLUS', NORTH_BIT | EAST_BIT | SOUTH_BIT | WEST_BIT),
  line('nesw', '┼', 'PLUS', NORTH_BIT | EAST_BIT | SOUTH_BIT | WEST_BIT),
]);

const BY_SUFFIX = new Map(LINE_GLYPHS.map((entry): [string, LineGlyph] => [entry.suffix, entry]));

const MASK_BY_GLYPH = new Map<string, number>();
for (const entry of LINE_GLYPHS) {
  if (!MASK_BY_GLYPH.has(entry.glyph)) {
    MASK_BY_GLYPH.set(entry.glyph, entry.mask);
  }
}

const LINEAR_SUFFIX = new RegExp(`_(${[...BY_SUFFIX.keys()].join('|')})$`);

/**
 * Split `road_nesw` into `{ base: 'road', entry: <nesw> }`. Types without a
 * linear suffix come back unchanged with no entry.
 */
export function splitLinearSuffix(omType: string): { base: string; entry: LineGlyph | undefined } {
  const match = LINEAR_SUFFIX.exec(omType);
  if (!match) {
    return { base: omType, entry: undefined };
  }
  return { base: omType.slice(0, match.index), entry: BY_SUFFIX.get(match[1]) };
}

/**
 * Whether a glyph is one of the line-drawing glyphs.
 */
export function isLineGlyph(glyph: string): boolean {
  return MASK_BY_GLYPH.has(glyph);
}

/**
 * Connectivity mask of a line-drawing glyph.
 */
export function maskForGlyph(glyph: string): number | undefined {
  return MASK_BY_GLYPH.get(glyph);
}

/**
 * First line-drawing glyph with the given connectivity mask.
 */
export function glyphForMask(mask: number): string | undefined {
  return LINE_GLYPHS.find(entry => entry.mask === mask)?.glyph;
}

/**
 * Circular left rotation of a 4-bit mask. Bits shifted past bit 3 wrap
 * around to bit 0.
 */
export function rotateMask(mask: number, distance: number): number {
  const d = ((distance % 4) + 4) % 4;
  const shifted = (mask & 0b1111) << d;
  return (shifted & 0b1111) | ((shifted & 0b11110000) >> 4);
}

/**
 * Rotate a line-drawing glyph by `distance` quarter turns.
 *
 * @returns The rotated glyph, or undefined if `glyph` is not a line glyph
 */
export function rotateGlyph(glyph: string, distance: number): string | undefined {
  const mask = maskForGlyph(glyph);
  if (mask === undefined) {
    return undefined;
  }
  return glyphForMask(rotateMask(mask, distance));
}
