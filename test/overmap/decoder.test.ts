/**
 * Tests for run-length layer decoding.
 */

import { describe, it, expect } from 'vitest';
import { decodeLayers } from '../../src/lib/overmap/decoder.js';
import { LEVEL_COUNT, Z_MAX, Z_MIN } from '../../src/lib/overmap/overmap-tile.js';
import type { Layer } from '../../src/lib/overmap/tile-file.js';
import { messagesAt, recordingLogger } from '../helpers.js';

function flatLayers(surface: Layer, size: number): Layer[] {
  return Array.from({ length: LEVEL_COUNT }, (_, i): Layer =>
    Z_MIN + i === 0 ? surface : [['empty_rock', size * size]]
  );
}

describe('TestDecodeLayers', () => {
  it('test_runs_fill_row_major_without_gaps', () => {
    const { logger } = recordingLogger();
    const surface: Layer = [
      ['field', 2],
      ['road_ew', 3],
      ['forest', 4],
    ];
    const tile = decodeLayers(flatLayers(surface, 3), { size: 3, logger });

    const types: Array<Array<string | undefined>> = [];
    for (let y = 0; y < 3; y++) {
      const row: Array<string | undefined> = [];
      for (let x = 0; x < 3; x++) {
        row.push(tile.getCell(x, y, 0)?.omType);
      }
      types.push(row);
    }
    expect(types).toEqual([
      ['field', 'field', 'road_ew'],
      ['road_ew', 'road_ew', 'forest'],
      ['forest', 'forest', 'forest'],
    ]);
  });

  it('test_cell_positions_match_coordinates', () => {
    const { logger } = recordingLogger();
    const tile = decodeLayers(flatLayers([['field', 16]], 4), { size: 4, logger });

    const cell = tile.getCell(3, 2, 0);
    expect(cell?.position.toKey()).toBe('3,2,0');
    expect(tile.xyToIndex(3, 2)).toBe(11);
    expect(tile.indexToXy(11)).toEqual([3, 2]);
  });

  it('test_every_level_decoded', () => {
    const { logger } = recordingLogger();
    const tile = decodeLayers(flatLayers([['field', 4]], 2), { size: 2, logger });

    expect(tile.levelsPresent()).toHaveLength(LEVEL_COUNT);
    expect(tile.getCell(0, 0, Z_MIN)?.omType).toBe('empty_rock');
    expect(tile.getCell(1, 1, Z_MAX)?.omType).toBe('empty_rock');
    expect(tile.getCell(1, 1, 0)?.omType).toBe('field');
    expect(Array.from(tile.cells())).toHaveLength(LEVEL_COUNT * 4);
  });

  it('test_short_layer_leaves_cells_empty', () => {
    const { logger } = recordingLogger();
    const tile = decodeLayers([[['field', 3]]], { size: 2, logger });

    expect(tile.getCell(0, 1, Z_MIN)?.omType).toBe('field');
    expect(tile.getCell(1, 1, Z_MIN)).toBeUndefined();
    expect(tile.getCell(0, 0, 0)).toBeUndefined();
  });

  it('test_overflowing_run_is_truncated', () => {
    const { logger, entries } = recordingLogger();
    const tile = decodeLayers([[['field', 3], ['lake', 5]]], { size: 2, logger });

    expect(tile.getCell(1, 1, Z_MIN)?.omType).toBe('lake');
    expect(Array.from(tile.cells())).toHaveLength(4);
    expect(messagesAt(entries, 'warn')).toEqual(["level -10: run 'lake' x5 overflows the 4-cell layer"]);
  });

  it('test_zero_length_runs_are_skipped', () => {
    const { logger } = recordingLogger();
    const tile = decodeLayers([[['field', 0], ['lake', 4]]], { size: 2, logger });

    expect(tile.getCell(0, 0, Z_MIN)?.omType).toBe('lake');
  });

  it('test_out_of_range_coordinates', () => {
    const { logger } = recordingLogger();
    const tile = decodeLayers([[['field', 4]]], { size: 2, logger });

    expect(tile.getCell(2, 0, Z_MIN)).toBeUndefined();
    expect(tile.getCell(-1, 0, Z_MIN)).toBeUndefined();
  });

  it('test_index_helpers_reject_positions_outside_the_tile', () => {
    const { logger } = recordingLogger();
    const tile = decodeLayers([[['field', 4]]], { size: 2, logger });

    expect(() => tile.xyToIndex(2, 0)).toThrow('Position (2, 0) is outside a 2x2 tile');
    expect(() => tile.indexToXy(4)).toThrow('Index 4 is outside a 2x2 tile');
    expect(tile.contains(1, 1)).toBe(true);
  });
});
