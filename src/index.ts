/**
 * markdown-blocks
 *
 * Block-structure parser for CommonMark documents
 *
 * ## Recommended API (use these):
 * - parse - Markdown text to a tree of block nodes
 * - MarkdownDocumentParser - Parse a file and summarize sections, code blocks and block counts
 * - visitNodes, collectText - Walk and query the tree
 *
 * ## Errors:
 * - NestingTooDeepError, InvalidOptionError (both extend MarkdownBlocksError)
 */

// =============================================================================
// PUBLIC API - Recommended for external use
// =============================================================================

export { parse } from './parse.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './node/index.js';
export * from './document/index.js';

// =============================================================================
// INTERNAL API - Building blocks of the parser, exported for extensions
// =============================================================================

/**
 * @internal Line classifiers
 */
export * from './classifiers/index.js';

/**
 * @internal Block dispatcher and recursive reparse
 */
export { BlockDispatcher, START_RULES } from './dispatcher/index.js';
export type { ParsedBlock, LineSpan, StartRule, Opening } from './dispatcher/index.js';
export { chooseReparsePolicy, splitChunks } from './extractor/index.js';
export type { ReparsePolicy, LineChunk } from './extractor/index.js';
export { isTightList } from './tightness/index.js';
export type { ItemGaps } from './tightness/index.js';
export { splitLines, toBlockLines } from './utils/line-utils.js';
export type { BlockLine } from './utils/line-utils.js';
