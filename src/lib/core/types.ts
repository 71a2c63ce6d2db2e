/**
 * Core data structures for game content definitions.
 */

// =============================================================================
// JSON Values
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Definitions
// =============================================================================

/**
 * One content record, e.g. an `overmap_terrain` entry.
 *
 * @property category - The record's `type` field
 * @property id - Index key within an indexed category, undefined in sequential ones
 * @property source - Path of the file the record was loaded from
 * @property fields - The record itself, flattened once inheritance is resolved
 */
export interface Definition {
  readonly category: string;
  readonly id: string | undefined;
  readonly source: string;
  readonly fields: Readonly<JsonObject>;
}

/**
 * Field names that point at a parent definition. The game writes `copy-from`;
 * `copy_from` is accepted as well.
 */
export const COPY_FROM_KEYS = ['copy-from', 'copy_from'] as const;

/**
 * Create a frozen Definition.
 */
export function createDefinition(
  category: string,
  id: string | undefined,
  source: string,
  fields: JsonObject
): Definition {
  return Object.freeze({ category, id, source, fields: Object.freeze(fields) });
}

/**
 * The id of the parent a definition copies from, if any.
 */
export function copyFromOf(def: Definition): string | undefined {
  for (const key of COPY_FROM_KEYS) {
    const value = def.fields[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

/**
 * Whether a definition is a template. Any `abstract` value other than
 * `false` or `null` counts.
 */
export function isAbstract(def: Definition): boolean {
  const value = def.fields['abstract'];
  return value !== undefined && value !== null && value !== false;
}

/**
 * Read a string field, or undefined when it is absent or not a string.
 */
export function stringField(def: Definition, key: string): string | undefined {
  const value = def.fields[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Check for a flag in the definition's `flags` list.
 */
export function hasFlag(def: Definition, flag: string): boolean {
  const flags = def.fields['flags'];
  return Array.isArray(flags) && flags.includes(flag);
}

/**
 * Display name of a definition. Names are either plain strings or
 * translation objects of the form `{ "str": "..." }`.
 */
export function displayName(def: Definition): string | undefined {
  const name = def.fields['name'];
  if (typeof name === 'string') {
    return name;
  }
  if (isJsonObject(name) && typeof name['str'] === 'string') {
    return name['str'];
  }
  return undefined;
}

// =============================================================================
// Category Storage
// =============================================================================

/**
 * Definitions keyed by id. Later inserts under the same id replace earlier ones.
 */
export interface IndexedCategory {
  readonly kind: 'indexed';
  readonly name: string;
  readonly entries: Map<string, Definition>;
}

/**
 * Definitions kept in load order, without ids or inheritance.
 */
export interface SequentialCategory {
  readonly kind: 'sequential';
  readonly name: string;
  readonly entries: Definition[];
}

/**
 * Union type for both storage shapes.
 */
export type CategoryStore = IndexedCategory | SequentialCategory;

export type CategoryKind = CategoryStore['kind'];

export function isIndexed(category: CategoryStore): category is IndexedCategory {
  return category.kind === 'indexed';
}

export function isSequential(category: CategoryStore): category is SequentialCategory {
  return category.kind === 'sequential';
}
