/**
 * Expand run-length encoded overmap layers into cells.
 */

import { TilePosition } from '../core/position.js';
import { OMT_SIZE } from '../core/config.js';
import { defaultLogger, type Logger } from '../core/logger.js';
import { LEVEL_COUNT, OvermapTile, Z_MIN, type RawCell } from './overmap-tile.js';
import type { Layer } from './tile-file.js';

export interface DecodeOptions {
  /** Side length of the tile (defaults to OMT_SIZE) */
  size?: number;
  logger?: Logger;
}

/**
 * Decode the `layers` of a tile file. Layer 0 is level Z_MIN and each
 * following layer is one level higher. Within a layer, runs fill cells in
 * row-major order starting at index 0.
 *
 * Runs that extend past the end of a layer are cut off with a warning;
 * layers beyond the last level are ignored.
 */
export function decodeLayers(
  layers: ReadonlyArray<Layer>,
  options: DecodeOptions = {}
): OvermapTile {
  const size = options.size ?? OMT_SIZE;
  const logger = options.logger ?? defaultLogger;
  const cellCount = size * size;
  const levels = new Map<number, Map<number, RawCell>>();

  if (layers.length > LEVEL_COUNT) {
    logger.warn(`tile has ${layers.length} layers, only the first ${LEVEL_COUNT} are used`);
  }

  for (let layerIdx = 0; layerIdx < Math.min(layers.length, LEVEL_COUNT); layerIdx++) {
    const z = Z_MIN + layerIdx;
    const cells = new Map<number, RawCell>();
    let index = 0;

    for (const [omType, length] of layers[layerIdx]) {
      const end = Math.min(index + length, cellCount);
      if (index + length > cellCount) {
        logger.warn(`level ${z}: run '${omType}' x${length} overflows the ${cellCount}-cell layer`);
      }
      for (; index < end; index++) {
        const position = new TilePosition(index % size, Math.floor(index / size), z);
        cells.set(index, Object.freeze({ position, omType }));
      }
    }

    if (index < cellCount) {
      logger.debug(`level ${z}: runs cover ${index} of ${cellCount} cells`);
    }
    levels.set(z, cells);
  }

  return new OvermapTile(size, levels);
}
