/**
 * Load content definitions from JSON files on disk.
 */

import { readdirSync, readFileSync, type Dirent } from 'node:fs';
import { join } from 'node:path';
import JSON5 from 'json5';
import { createDefinition, isJsonObject, type JsonObject } from '../core/types.js';
import { defaultLogger, type Logger } from '../core/logger.js';
import type { DefinitionStore } from './definition-store.js';

export interface LoadReport {
  readonly total: number;
  readonly failed: number;
}

export function mergeReports(a: LoadReport, b: LoadReport): LoadReport {
  return { total: a.total + b.total, failed: a.failed + b.failed };
}

/**
 * Parse one content file into the store.
 *
 * A file holds either a single object or an array of objects. Each object is
 * filed under its `type`; objects without one go under `fallbackCategory`.
 *
 * @returns true if the file was parsed, false if it had to be skipped
 */
export function loadContentFile(
  store: DefinitionStore,
  path: string,
  fallbackCategory: string,
  logger: Logger = defaultLogger
): boolean {
  logger.debug(`parsing ${path}`);

  let parsed: unknown;
  try {
    parsed = JSON5.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    logger.error(`failed to load ${path}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }

  if (!Array.isArray(parsed) && !isJsonObject(parsed)) {
    logger.error(`failed to load ${path}: expected an object or an array of objects`);
    return false;
  }
  const objects: unknown[] = Array.isArray(parsed) ? parsed : [parsed];

  for (const [index, obj] of objects.entries()) {
    if (!isJsonObject(obj)) {
      logger.warn(`${path}: entry ${index} is not an object, skipping`);
      continue;
    }
    insertObject(store, obj, path, fallbackCategory, logger);
  }

  return true;
}

/**
 * Recursively load every `.json` file below `dir`. Files in a directory are
 * loaded before its subdirectories, both in name order.
 */
export function loadContentDirectory(
  store: DefinitionStore,
  dir: string,
  category: string,
  logger: Logger = defaultLogger
): LoadReport {
  logger.debug(`loading ${category} [${dir}]`);

  let total = 0;
  let failed = 0;

  const walk = (current: string) => {
    let entries: Dirent[];
    try {
      entries = readdirSync(current, { withFileTypes: true });
    } catch (error) {
      logger.error(`cannot read directory ${current}: ${error instanceof Error ? error.message : String(error)}`);
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const files = entries.filter(e => e.isFile() && e.name.endsWith('.json'));
    const subdirs = entries.filter(e => e.isDirectory());
    logger.debug(`enter: ${current} (${files.length} files, ${subdirs.length} subdirs)`);

    for (const file of files) {
      total++;
      if (!loadContentFile(store, join(current, file.name), category, logger)) {
        failed++;
      }
    }
    for (const sub of subdirs) {
      walk(join(current, sub.name));
    }
  };

  walk(dir);
  logger.debug(`finished loading ${total} JSON files (${failed} failed)`);
  return { total, failed };
}

function insertObject(
  store: DefinitionStore,
  obj: JsonObject,
  path: string,
  fallbackCategory: string,
  logger: Logger
): void {
  let category = obj['type'];
  if (typeof category !== 'string' || category.length === 0) {
    logger.warn(`'type' not defined in ${path}, filing under ${fallbackCategory}`);
    category = fallbackCategory;
  }

  if (store.kindOf(category) === 'sequential') {
    store.insert(createDefinition(category, undefined, path, obj));
    return;
  }

  // Several terrains may share one record through a list of ids
  const ids = idsOf(obj);
  if (ids.length === 0) {
    store.insert(createDefinition(category, undefined, path, obj));
    return;
  }
  for (const id of ids) {
    store.insert(createDefinition(category, id, path, { ...obj }));
  }
}

function idsOf(obj: JsonObject): string[] {
  const id = obj['id'];
  if (typeof id === 'string' && id.length > 0) {
    return [id];
  }
  if (Array.isArray(id)) {
    return id.filter((v): v is string => typeof v === 'string' && v.length > 0);
  }
  const abstractId = obj['abstract'];
  if (typeof abstractId === 'string' && abstractId.length > 0) {
    return [abstractId];
  }
  return [];
}
