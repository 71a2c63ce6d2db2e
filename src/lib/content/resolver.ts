/**
 * Flatten `copy-from` inheritance chains in a DefinitionStore.
 */

import {
  copyFromOf,
  createDefinition,
  isAbstract,
  type Definition,
  type IndexedCategory,
  type JsonObject,
} from '../core/types.js';
import { MAX_CHAIN_DEPTH } from '../core/config.js';
import { defaultLogger, type Logger } from '../core/logger.js';
import type { DefinitionStore } from './definition-store.js';

/**
 * Reasons a chain could not be followed to its root.
 */
export type DependencyIssueReason = 'MISSING_PARENT' | 'CYCLE' | 'DEPTH_LIMIT';

export interface DependencyIssue {
  readonly reason: DependencyIssueReason;
  readonly category: string;
  readonly id: string;
  readonly details: string;
}

export interface ResolveReport {
  /** Number of definitions replaced by a flattened record */
  readonly resolved: number;
  readonly issues: ReadonlyArray<DependencyIssue>;
}

export interface ResolveOptions {
  maxChainDepth?: number;
  logger?: Logger;
}

/**
 * Result of walking a definition's ancestors.
 *
 * @property ancestors - Nearest parent first
 * @property issue - Why the walk stopped early, if it did
 */
export interface AncestorChain {
  readonly ancestors: ReadonlyArray<Definition>;
  readonly issue?: DependencyIssue;
}

/**
 * Collect the ancestors of `def`, nearest first, following at most
 * `maxDepth` hops.
 */
export function collectAncestors(
  category: IndexedCategory,
  def: Definition,
  maxDepth: number = MAX_CHAIN_DEPTH
): AncestorChain {
  const id = def.id ?? '';
  const ancestors: Definition[] = [];
  const seen = new Set<string>([id]);
  const issue = (reason: DependencyIssueReason, details: string): AncestorChain => ({
    ancestors,
    issue: { reason, category: category.name, id, details },
  });

  let current = def;
  let parentId = copyFromOf(current);

  while (parentId !== undefined) {
    if (ancestors.length >= maxDepth) {
      return issue('DEPTH_LIMIT', `chain truncated after ${maxDepth} ancestors at '${parentId}'`);
    }
    if (seen.has(parentId)) {
      return issue('CYCLE', `'${current.id}' copies from '${parentId}', which is already in the chain`);
    }
    const parent = category.entries.get(parentId);
    if (!parent) {
      return issue('MISSING_PARENT', `${current.id}: missing copy-from dependency '${parentId}'`);
    }

    ancestors.push(parent);
    seen.add(parentId);
    current = parent;
    parentId = copyFromOf(current);
  }

  return { ancestors };
}

/**
 * Merge a definition over its ancestors. The furthest ancestor is applied
 * first, so each field takes the value closest to `def`. The `abstract`
 * marker is never inherited.
 */
export function mergeChain(def: Definition, ancestors: ReadonlyArray<Definition>): Definition {
  const fields: JsonObject = {};
  for (let i = ancestors.length - 1; i >= 0; i--) {
    Object.assign(fields, ancestors[i].fields);
  }
  delete fields['abstract'];
  Object.assign(fields, def.fields);
  return createDefinition(def.category, def.id, def.source, fields);
}

/**
 * Resolve inheritance across every indexed category.
 *
 * Pass 1 flattens abstract definitions, pass 2 the rest, so a concrete
 * definition always inherits from an already flattened template.
 */
export function resolveDependencies(
  store: DefinitionStore,
  options: ResolveOptions = {}
): ResolveReport {
  const logger = options.logger ?? defaultLogger;
  const maxDepth = options.maxChainDepth ?? MAX_CHAIN_DEPTH;
  const issues: DependencyIssue[] = [];
  let resolved = 0;

  for (const pass of [1, 2] as const) {
    logger.debug(`resolving dependencies in gamedata: pass ${pass}`);

    for (const category of store.indexedCategories()) {
      for (const def of category.entries.values()) {
        if (isAbstract(def) !== (pass === 1) || copyFromOf(def) === undefined) {
          continue;
        }

        const chain = collectAncestors(category, def, maxDepth);
        if (chain.issue) {
          issues.push(chain.issue);
          if (chain.issue.reason === 'DEPTH_LIMIT') {
            logger.debug(`${category.name}/${chain.issue.id}: ${chain.issue.details}`);
          } else {
            logger.error(`${category.name}/${chain.issue.id}: ${chain.issue.details}`);
          }
        }
        if (chain.ancestors.length === 0) {
          continue;
        }

        logger.debug(
          `resolve deps: ${def.id}->${chain.ancestors.map(a => a.id).join('->')}`
        );
        store.replace(mergeChain(def, chain.ancestors));
        resolved++;
      }
    }
  }

  return { resolved, issues };
}

