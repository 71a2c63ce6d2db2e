export { projectLevel, UNEXPLORED, UNKNOWN, MISSING_GLYPH } from './project.js';
export type { GridEntry, RenderGrid } from './project.js';
