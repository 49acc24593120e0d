export { DEFAULT_MAX_NESTING_DEPTH, resolveParseOptions } from './options.js';
export type { ParseOptions, ResolvedParseOptions } from './options.js';
