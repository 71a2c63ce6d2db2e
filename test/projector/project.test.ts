/**
 * Tests for projecting a resolved level into a render grid.
 */

import { describe, it, expect } from 'vitest';
import { DefinitionStore } from '../../src/lib/content/definition-store.js';
import { decodeLayers } from '../../src/lib/overmap/decoder.js';
import { isSymbolFailure, resolveSymbols } from '../../src/lib/overmap/symbols.js';
import type { ResolvedTile } from '../../src/lib/overmap/overmap-tile.js';
import type { Layer } from '../../src/lib/overmap/tile-file.js';
import { MISSING_GLYPH, UNEXPLORED, UNKNOWN, projectLevel } from '../../src/lib/projector/project.js';
import { messagesAt, recordingLogger, terrain } from '../helpers.js';

/**
 * Decode `surface` as level 0 of a tile, below which every level is empty,
 * and resolve it.
 */
function surfaceTile(surface: Layer, size: number): ResolvedTile {
  const { logger } = recordingLogger();
  const store = new DefinitionStore({ logger });
  store.insert(terrain({ id: 'field', sym: '.', color: 'brown', name: { str: 'field' } }));
  store.insert(terrain({ id: 'house', sym: '^', color: 'light_green', name: 'house' }));
  store.insert(terrain({ id: 'nosym', color: 'red', name: 'nothing' }));
  store.insert(terrain({ id: 'blank', sym: '', color: 'red' }));
  store.insert(terrain({ id: 'plain', sym: 'x' }));

  const layers: Layer[] = [];
  for (let i = 0; i < 10; i++) {
    layers.push([]);
  }
  layers.push(surface);

  const result = resolveSymbols(decodeLayers(layers, { size, logger }), store, logger);
  if (isSymbolFailure(result)) {
    throw new Error(result.details);
  }
  return result.tile;
}

describe('TestProjectLevel', () => {
  it('test_grid_covers_every_position', () => {
    const tile = surfaceTile(
      [
        ['field', 1],
        ['house_south', 1],
        ['crater', 1],
        ['nosym', 1],
      ],
      3
    );
    const { logger } = recordingLogger();

    const grid = projectLevel(tile, 0, logger);

    expect(grid).toEqual([
      [['.', 'brown', 'field', 'field'], ['v', 'light_green', 'house', 'house'], UNKNOWN],
      [['?', 'red', 'nothing', 'nosym'], UNEXPLORED, UNEXPLORED],
      [UNEXPLORED, UNEXPLORED, UNEXPLORED],
    ]);
  });

  it('test_problem_cells_are_logged', () => {
    const tile = surfaceTile(
      [
        ['crater', 1],
        ['blank', 1],
        ['nosym', 1],
        ['field', 1],
      ],
      2
    );
    const { logger, entries } = recordingLogger();

    projectLevel(tile, 0, logger);

    expect(messagesAt(entries, 'warn')).toEqual([
      'missing overmap_terrain data at <0,0> (omtype=crater)',
      'missing symbol for <1,0> (omtype=blank)',
      'missing symbol for <0,1> (omtype=nosym)',
    ]);
  });

  it('test_missing_glyph_keeps_definition_details', () => {
    const tile = surfaceTile(
      [
        ['nosym', 1],
        ['blank', 1],
      ],
      2
    );
    const { logger } = recordingLogger();

    const grid = projectLevel(tile, 0, logger);

    expect(grid[0]).toEqual([
      [MISSING_GLYPH, 'red', 'nothing', 'nosym'],
      [MISSING_GLYPH, 'red', null, 'blank'],
    ]);
  });

  it('test_missing_color_and_name_are_null', () => {
    const tile = surfaceTile([['plain', 1]], 1);
    const { logger } = recordingLogger();

    expect(projectLevel(tile, 0, logger)).toEqual([[['x', null, null, 'plain']]]);
  });

  it('test_level_without_data_is_unexplored', () => {
    const tile = surfaceTile([['field', 4]], 2);
    const { logger, entries } = recordingLogger();

    expect(projectLevel(tile, 5, logger)).toEqual([
      [UNEXPLORED, UNEXPLORED],
      [UNEXPLORED, UNEXPLORED],
    ]);
    expect(entries).toEqual([]);
  });

  it('test_placeholders', () => {
    expect(UNEXPLORED).toEqual(['#', 'gray', 'Unexplored', null]);
    expect(UNKNOWN).toEqual(['!', 'gray', 'Unknown', null]);
    expect(MISSING_GLYPH).toBe('?');
  });
});
