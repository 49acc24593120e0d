/**
 * Block parser entry point
 *
 * @since 2026-10-06
 */

import { resolveParseOptions } from './config/index.js';
import type { ParseOptions } from './config/index.js';
import { BlockDispatcher } from './dispatcher/index.js';
import { createDocument } from './node/index.js';
import type { DocumentNode } from './node/index.js';
import { splitLines, toBlockLines } from './utils/line-utils.js';

/**
 * Parse markdown source into a tree of block nodes.
 *
 * Every input has a parse; leaf text is left for an inline parser.
 *
 * @throws InvalidOptionError when an option is out of range
 * @throws NestingTooDeepError when containers nest deeper than `maxNestingDepth`
 */
export function parse(text: string, options: ParseOptions = {}): DocumentNode {
  const dispatcher = new BlockDispatcher(resolveParseOptions(options));
  const blocks = dispatcher.parseBlocks(toBlockLines(splitLines(text)), 0);
  return createDocument(blocks.map((block) => block.node));
}
