/**
 * Overmap tiles: file reading, layer decoding and symbol resolution.
 */

export { OvermapTile, Z_MIN, Z_MAX, LEVEL_COUNT } from './overmap-tile.js';
export type { RawCell, ResolvedCell, ResolvedTile } from './overmap-tile.js';
export { decodeLayers } from './decoder.js';
export type { DecodeOptions } from './decoder.js';
export { parseTileFile, readTileFile, stripCommentLine, TileFileError, TileFileSchema } from './tile-file.js';
export type { Layer, LayerRun, TileFile } from './tile-file.js';
export {
  LINE_GLYPHS,
  glyphForMask,
  isLineGlyph,
  maskForGlyph,
  rotateGlyph,
  rotateMask,
  splitLinearSuffix,
} from './linework.js';
export type { LineGlyph } from './linework.js';
export {
  resolveCell,
  resolveSymbols,
  isSymbolFailure,
  OVERMAP_TERRAIN,
  LINEAR_FLAG,
  POINTER_GLYPH,
} from './symbols.js';
export type { SymbolFailure, SymbolFailureReason, SymbolResolution } from './symbols.js';
