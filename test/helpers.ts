/**
 * Shared test utilities.
 */

import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { Logger, LogLevel } from '../src/lib/core/logger.js';
import { createDefinition, type Definition, type JsonObject } from '../src/lib/core/types.js';

export interface LogEntry {
  readonly level: Exclude<LogLevel, 'silent'>;
  readonly message: string;
}

/**
 * A logger that keeps every message instead of printing it.
 */
export function recordingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger: Logger = {
    debug: message => entries.push({ level: 'debug', message }),
    info: message => entries.push({ level: 'info', message }),
    warn: message => entries.push({ level: 'warn', message }),
    error: message => entries.push({ level: 'error', message }),
  };
  return { logger, entries };
}

export function messagesAt(entries: LogEntry[], level: LogEntry['level']): string[] {
  return entries.filter(e => e.level === level).map(e => e.message);
}

/**
 * Build a definition from its fields, taking the id from `id` or a string
 * `abstract`. Records of sequential categories get no id.
 */
export function terrain(fields: JsonObject, category = 'overmap_terrain'): Definition {
  const idField = fields['id'] ?? fields['abstract'];
  const id = category !== 'mapgen' && typeof idField === 'string' ? idField : undefined;
  return createDefinition(category, id, 'test.json', fields);
}

/**
 * Create a temporary directory tree. Keys are relative paths, values file contents.
 *
 * @returns The root directory and a cleanup function
 */
export function makeTree(files: Record<string, string>): { root: string; cleanup: () => void } {
  const root = mkdtempSync(join(tmpdir(), 'overmap-glyphs-'));
  for (const [relative, contents] of Object.entries(files)) {
    const path = join(root, relative);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, contents);
  }
  return { root, cleanup: () => rmSync(root, { recursive: true, force: true }) };
}
