/**
 * Project one level of a resolved tile into a render-ready grid.
 */

import { displayName, stringField } from '../core/types.js';
import { defaultLogger, type Logger } from '../core/logger.js';
import type { ResolvedTile } from '../overmap/overmap-tile.js';

/**
 * One projected position: glyph, color name, display name and definition id.
 */
export type GridEntry = readonly [
  glyph: string,
  color: string | null,
  name: string | null,
  id: string | null,
];

export type RenderGrid = ReadonlyArray<ReadonlyArray<GridEntry>>;

/** Position the save holds no data for */
export const UNEXPLORED: GridEntry = Object.freeze(['#', 'gray', 'Unexplored', null] as const);

/** Position whose type matched no definition */
export const UNKNOWN: GridEntry = Object.freeze(['!', 'gray', 'Unknown', null] as const);

/** Glyph for a matched definition that has none of its own */
export const MISSING_GLYPH = '?';

/**
 * Build a `[row][col]` grid covering the whole tile at level `z`.
 */
export function projectLevel(tile: ResolvedTile, z = 0, logger: Logger = defaultLogger): RenderGrid {
  const rows: GridEntry[][] = [];

  for (let y = 0; y < tile.size; y++) {
    const row: GridEntry[] = [];
    for (let x = 0; x < tile.size; x++) {
      const cell = tile.getCell(x, y, z);
      if (cell === undefined) {
        row.push(UNEXPLORED);
        continue;
      }

      const terrain = cell.terrain;
      if (terrain === undefined) {
        logger.warn(`missing overmap_terrain data at <${x},${y}> (omtype=${cell.omType})`);
        row.push(UNKNOWN);
        continue;
      }

      let glyph = cell.glyph ?? stringField(terrain, 'sym');
      if (glyph === undefined || glyph.length === 0) {
        logger.warn(`missing symbol for <${x},${y}> (omtype=${cell.omType})`);
        glyph = MISSING_GLYPH;
      }

      row.push(
        Object.freeze([
          glyph,
          stringField(terrain, 'color') ?? null,
          displayName(terrain) ?? null,
          terrain.id ?? null,
        ] as const)
      );
    }
    rows.push(row);
  }

  return rows;
}
