/**
 * Content database: definition storage, loading and inheritance resolution.
 */

export { DefinitionStore } from './definition-store.js';
export type { DefinitionStoreOptions } from './definition-store.js';
export { loadContentFile, loadContentDirectory, mergeReports } from './loader.js';
export type { LoadReport } from './loader.js';
export { resolveDependencies, collectAncestors, mergeChain } from './resolver.js';
export type {
  AncestorChain,
  DependencyIssue,
  DependencyIssueReason,
  ResolveOptions,
  ResolveReport,
} from './resolver.js';
