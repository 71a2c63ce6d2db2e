/**
 * Loads and holds the game content an overmap needs.
 */

import { basename, join, resolve } from 'node:path';
import { homedir } from 'node:os';
import type { CategoryStore } from './core/types.js';
import { createConfig, type MapperConfig } from './core/config.js';
import { createConsoleLogger, type Logger } from './core/logger.js';
import { DefinitionStore } from './content/definition-store.js';
import { loadContentDirectory, mergeReports, type LoadReport } from './content/loader.js';
import { resolveDependencies, type ResolveReport } from './content/resolver.js';

/**
 * Locate the content root inside a game directory. A path already ending in
 * `json` is used as is; anything else is taken as the game's base directory.
 */
export function contentRoot(gamePath: string): string {
  const expanded = gamePath.startsWith('~') ? join(homedir(), gamePath.slice(1)) : gamePath;
  const absolute = resolve(expanded);
  return basename(absolute) === 'json' ? absolute : join(absolute, 'data', 'json');
}

export class GameData {
  private constructor(
    public readonly root: string,
    public readonly store: DefinitionStore,
    public readonly loadReport: LoadReport,
    public readonly resolveReport: ResolveReport
  ) {}

  /**
   * Load every configured category directory below the content root, then
   * resolve inheritance.
   */
  static load(gamePath: string, config: MapperConfig = createConfig(), logger?: Logger): GameData {
    const log = logger ?? createConsoleLogger(config.logLevel);
    const root = contentRoot(gamePath);
    const store = new DefinitionStore({ sequentialCategories: config.sequentialCategories, logger: log });

    let loadReport: LoadReport = { total: 0, failed: 0 };
    for (const dir of config.categoryDirs) {
      loadReport = mergeReports(loadReport, loadContentDirectory(store, join(root, dir), dir, log));
    }
    if (loadReport.failed > 0) {
      log.warn(`${loadReport.failed} of ${loadReport.total} content files failed to load`);
    }

    const resolveReport = resolveDependencies(store, { maxChainDepth: config.maxChainDepth, logger: log });
    return new GameData(root, store, loadReport, resolveReport);
  }

  /**
   * Get all definitions of one type, e.g. `overmap_terrain`.
   *
   * @returns The category, or undefined if no file defined anything of that type
   */
  getCategory(name: string): CategoryStore | undefined {
    return this.store.getCategory(name);
  }
}
