/**
 * Resolve overmap tiles against game content into glyph grids.
 */

export * from './lib/core/types.js';
export { Compass, pointerGlyph, rotationDistance, splitCompassSuffix } from './lib/core/direction.js';
export { TilePosition } from './lib/core/position.js';
export { createConfig, DEFAULT_CONFIG, MAX_CHAIN_DEPTH, OMT_SIZE } from './lib/core/config.js';
export type { MapperConfig } from './lib/core/config.js';
export { combineLoggers, createConsoleLogger, createFileLogger, defaultLogger, isLogLevel } from './lib/core/logger.js';
export type { FileLoggerOptions, Logger, LogLevel } from './lib/core/logger.js';
export * from './lib/content/index.js';
export * from './lib/overmap/index.js';
export * from './lib/projector/index.js';
export { translateColor, COLORS } from './lib/renderer/colors.js';
export type { ColorPair } from './lib/renderer/colors.js';
export { renderText } from './lib/renderer/text.js';
export { GameData, contentRoot } from './lib/game-data.js';
