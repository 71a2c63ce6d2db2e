/**
 * In-memory store of content definitions, grouped by category.
 */

import {
  type CategoryKind,
  type CategoryStore,
  type Definition,
  type IndexedCategory,
  isIndexed,
} from '../core/types.js';
import { DEFAULT_CONFIG } from '../core/config.js';
import { defaultLogger, type Logger } from '../core/logger.js';

export interface DefinitionStoreOptions {
  /** Categories kept as plain lists instead of being indexed by id */
  sequentialCategories?: Iterable<string>;
  logger?: Logger;
}

/**
 * Holds every loaded definition. Each instance owns its own storage; the
 * storage shape of a category is fixed from `sequentialCategories` when the
 * category is first created.
 */
export class DefinitionStore {
  private readonly data = new Map<string, CategoryStore>();
  private readonly sequential: ReadonlySet<string>;
  private readonly logger: Logger;

  constructor(options: DefinitionStoreOptions = {}) {
    this.sequential = new Set(options.sequentialCategories ?? DEFAULT_CONFIG.sequentialCategories);
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Storage shape used for a category name.
   */
  kindOf(category: string): CategoryKind {
    return this.sequential.has(category) ? 'sequential' : 'indexed';
  }

  /**
   * Add a definition. Indexed categories replace an existing entry with the
   * same id and warn about it; definitions without an id are not stored.
   *
   * @returns false if the definition could not be stored
   */
  insert(def: Definition): boolean {
    const category = this.ensureCategory(def.category);

    if (!isIndexed(category)) {
      category.entries.push(def);
      return true;
    }

    if (def.id === undefined) {
      this.logger.warn(`${def.source}: expected 'id' field for type ${def.category}, but none defined`);
      return false;
    }

    if (category.entries.has(def.id)) {
      this.logger.warn(
        `${def.source}: type=${def.category} id=${def.id} already exists, but redefining!`
      );
    }
    category.entries.set(def.id, def);
    return true;
  }

  /**
   * Replace the stored entry for a definition's id. Used by the resolver to
   * write back flattened records.
   */
  replace(def: Definition): void {
    const category = this.data.get(def.category);
    if (!category || !isIndexed(category) || def.id === undefined) {
      throw new Error(`Cannot replace ${def.category}/${String(def.id)}: not an indexed entry`);
    }
    category.entries.set(def.id, def);
  }

  /**
   * Look up a definition by category and id.
   *
   * @returns The definition, or undefined if not found
   */
  get(category: string, id: string): Definition | undefined {
    const entry = this.data.get(category);
    if (!entry || !isIndexed(entry)) {
      return undefined;
    }
    return entry.entries.get(id);
  }

  hasCategory(category: string): boolean {
    return this.data.has(category);
  }

  /**
   * Get all definitions of a category.
   *
   * @returns The category storage, or undefined if nothing of that type was loaded
   */
  getCategory(category: string): CategoryStore | undefined {
    return this.data.get(category);
  }

  /**
   * Names of all loaded categories, in the order they were first seen.
   */
  categories(): string[] {
    return Array.from(this.data.keys());
  }

  /**
   * Indexed categories only, in the order they were first seen.
   */
  indexedCategories(): IndexedCategory[] {
    return Array.from(this.data.values()).filter(isIndexed);
  }

  /**
   * Number of definitions stored in a category (0 if it was never loaded).
   */
  size(category: string): number {
    const entry = this.data.get(category);
    if (!entry) {
      return 0;
    }
    return isIndexed(entry) ? entry.entries.size : entry.entries.length;
  }

  private ensureCategory(name: string): CategoryStore {
    let category = this.data.get(name);
    if (!category) {
      category =
        this.kindOf(name) === 'sequential'
          ? { kind: 'sequential', name, entries: [] }
          : { kind: 'indexed', name, entries: new Map() };
      this.data.set(name, category);
    }
    return category;
  }
}
