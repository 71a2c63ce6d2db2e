/**
 * Settings shared by the loader, resolver and decoder.
 */

import type { LogLevel } from './logger.js';

/**
 * Side length of an overmap tile, in map cells.
 */
export const OMT_SIZE = 180;

/**
 * Maximum number of `copy-from` hops followed from a definition.
 */
export const MAX_CHAIN_DEPTH = 16;

export interface MapperConfig {
  /** Category directories under the content root, loaded in order */
  readonly categoryDirs: ReadonlyArray<string>;
  /** Categories stored as plain lists (no ids, no inheritance) */
  readonly sequentialCategories: ReadonlyArray<string>;
  readonly maxChainDepth: number;
  readonly tileSize: number;
  readonly logLevel: LogLevel;
}

export const DEFAULT_CONFIG: MapperConfig = Object.freeze({
  categoryDirs: Object.freeze(['mapgen', 'overmap']),
  sequentialCategories: Object.freeze(['mapgen', 'monstergroup', 'snippet']),
  maxChainDepth: MAX_CHAIN_DEPTH,
  tileSize: OMT_SIZE,
  logLevel: 'info',
});

/**
 * Create a MapperConfig, filling anything not given from the defaults.
 */
export function createConfig(overrides: Partial<MapperConfig> = {}): MapperConfig {
  const config = { ...DEFAULT_CONFIG, ...overrides };

  if (!Number.isInteger(config.maxChainDepth) || config.maxChainDepth < 0) {
    throw new Error(`maxChainDepth must be a non-negative integer, got ${config.maxChainDepth}`);
  }
  if (!Number.isInteger(config.tileSize) || config.tileSize < 1) {
    throw new Error(`tileSize must be a positive integer, got ${config.tileSize}`);
  }

  return Object.freeze(config);
}
