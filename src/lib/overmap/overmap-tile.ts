/**
 * Cell data for a single overmap tile.
 */

import { TilePosition } from '../core/position.js';
import type { Definition } from '../core/types.js';

/** Lowest vertical level stored in a tile */
export const Z_MIN = -10;
/** Highest vertical level stored in a tile */
export const Z_MAX = 10;
export const LEVEL_COUNT = Z_MAX - Z_MIN + 1;

/**
 * One decoded position and the raw overmap type stored there,
 * e.g. `road_ns` or `house_04_north`.
 */
export interface RawCell {
  readonly position: TilePosition;
  readonly omType: string;
}

/**
 * A raw cell with the definition it resolved to.
 *
 * @property terrain - Shared reference into the DefinitionStore, undefined if no match
 * @property glyph - Oriented glyph that overrides the definition's `sym`
 */
export interface ResolvedCell extends RawCell {
  readonly terrain: Definition | undefined;
  readonly glyph: string | undefined;
}

/**
 * Cells of one tile, stored per level by linear index.
 */
export class OvermapTile<C extends RawCell = RawCell> {
  constructor(
    public readonly size: number,
    private readonly levels: ReadonlyMap<number, ReadonlyMap<number, C>>
  ) {}

  /**
   * Convert a linear index to (x, y).
   *
   * @throws Error if the index is outside the tile
   */
  indexToXy(index: number): [number, number] {
    if (!Number.isInteger(index) || index < 0 || index >= this.size * this.size) {
      throw new Error(`Index ${index} is outside a ${this.size}x${this.size} tile`);
    }
    return [index % this.size, Math.floor(index / this.size)];
  }

  /**
   * Convert (x, y) to a linear index.
   *
   * @throws Error if the position is outside the tile
   */
  xyToIndex(x: number, y: number): number {
    if (!this.contains(x, y)) {
      throw new Error(`Position (${x}, ${y}) is outside a ${this.size}x${this.size} tile`);
    }
    return y * this.size + x;
  }

  contains(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < this.size && y >= 0 && y < this.size;
  }

  /**
   * Get the cell at (x, y, z).
   *
   * @returns The cell, or undefined if the position holds no data
   */
  getCell(x: number, y: number, z = 0): C | undefined {
    if (!this.contains(x, y)) {
      return undefined;
    }
    return this.levels.get(z)?.get(this.xyToIndex(x, y));
  }

  /**
   * Vertical levels that hold at least one cell.
   */
  levelsPresent(): number[] {
    return Array.from(this.levels.entries())
      .filter(([, cells]) => cells.size > 0)
      .map(([z]) => z);
  }

  /**
   * All cells, level by level from the lowest up, each level in index order.
   */
  *cells(): IterableIterator<C> {
    for (const z of Array.from(this.levels.keys()).sort((a, b) => a - b)) {
      const level = this.levels.get(z);
      if (level) {
        yield* level.values();
      }
    }
  }

  /**
   * Build a new tile with every cell mapped through `fn`.
   */
  map<D extends RawCell>(fn: (cell: C) => D): OvermapTile<D> {
    const levels = new Map<number, Map<number, D>>();
    for (const [z, cells] of this.levels) {
      const mapped = new Map<number, D>();
      for (const [index, cell] of cells) {
        mapped.set(index, fn(cell));
      }
      levels.set(z, mapped);
    }
    return new OvermapTile(this.size, levels);
  }
}

export type ResolvedTile = OvermapTile<ResolvedCell>;
