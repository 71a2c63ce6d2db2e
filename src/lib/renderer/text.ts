/**
 * Plain text output of a projected grid.
 */

import type { RenderGrid } from '../projector/project.js';

/**
 * Join the glyphs of each row, one line per row.
 */
export function renderText(grid: RenderGrid): string {
  return grid.map(row => row.map(([glyph]) => glyph).join('')).join('\n');
}
