/**
 * Compass directions as they appear in overmap type suffixes.
 */
export enum Compass {
  North = 'north',
  South = 'south',
  East = 'east',
  West = 'west',
}

/**
 * Quarter turns counter-clockwise from north.
 */
export function rotationDistance(dir: Compass): number {
  switch (dir) {
    case Compass.North:
      return 0;
    case Compass.West:
      return 1;
    case Compass.South:
      return 2;
    case Compass.East:
      return 3;
  }
}

/**
 * Pointer glyph for buildings facing the given direction.
 */
export function pointerGlyph(dir: Compass): string {
  switch (dir) {
    case Compass.North:
      return '^';
    case Compass.South:
      return 'v';
    case Compass.East:
      return '>';
    case Compass.West:
      return '<';
  }
}

const COMPASS_SUFFIX = /_(north|south|east|west)$/;

/**
 * Split `house_north` into `{ base: 'house', dir: Compass.North }`.
 * Types without a compass suffix come back unchanged with no direction.
 */
export function splitCompassSuffix(omType: string): { base: string; dir: Compass | undefined } {
  const match = COMPASS_SUFFIX.exec(omType);
  if (!match) {
    return { base: omType, dir: undefined };
  }
  return { base: omType.slice(0, match.index), dir: toCompass(match[1]) };
}

function toCompass(word: string): Compass | undefined {
  switch (word) {
    case 'north':
      return Compass.North;
    case 'south':
      return Compass.South;
    case 'east':
      return Compass.East;
    case 'west':
      return Compass.West;
    default:
      return undefined;
  }
}
