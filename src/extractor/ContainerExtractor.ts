/**
 * Container Extractor
 *
 * Turns a closed blockquote or list context into its node by feeding the
 * collected lines back through the dispatcher one nesting level down.
 *
 * List items pick a reparse policy. An item with any text-only line is
 * split into chunks at blank runs that are followed by unindented plain
 * text, and each chunk is parsed on its own; any other item is parsed as
 * one joined sequence. A cut is made only where a joined parse would also
 * have closed every open block, so both policies build the same children.
 *
 * @since 2026-10-06
 */

import { classifyFenceStart, markerChar } from '../classifiers/index.js';
import type { BlockquoteContext, ItemLine, LineSpan, ListContext, ListItemDraft, ParsedBlock } from '../dispatcher/types.js';
import { createBlockquote, createList, createListItem } from '../node/index.js';
import type { BlockquoteNode, ListNode } from '../node/index.js';
import { isTightList } from '../tightness/index.js';
import { indentWidth, isBlank } from '../utils/line-utils.js';
import type { BlockLine } from '../utils/line-utils.js';

/**
 * The dispatcher entry point the extractor recurses through
 */
export interface BlockReparser {
  parseBlocks(lines: readonly BlockLine[], depth: number): ParsedBlock[];
}

export type ReparsePolicy = 'joined' | 'chunked';

/** Half-open range of item lines parsed together */
export interface LineChunk {
  start: number;
  end: number;
}

export interface ReparsedItem {
  blocks: ParsedBlock[];
  policy: ReparsePolicy;
  /** A blank line separates two of the item's child blocks */
  hasBlankGap: boolean;
}

export function extractBlockquote(
  context: BlockquoteContext,
  depth: number,
  reparser: BlockReparser
): BlockquoteNode {
  const blocks = reparser.parseBlocks(context.lines, depth + 1);
  return createBlockquote(blocks.map((block) => block.node));
}

export function chooseReparsePolicy(lines: readonly ItemLine[]): ReparsePolicy {
  return lines.some((line) => line.textOnly) ? 'chunked' : 'joined';
}

/**
 * Split item lines after blank runs that are followed by unindented plain
 * text. No cut is made once a line that could open a fence has been seen,
 * since the fence may still be open.
 */
export function splitChunks(lines: readonly ItemLine[]): LineChunk[] {
  const chunks: LineChunk[] = [];
  let start = 0;
  let fenceSeen = false;

  lines.forEach((line, i) => {
    const previous = lines[i - 1];
    const cut =
      i > start &&
      !fenceSeen &&
      previous !== undefined &&
      isBlank(previous.text) &&
      line.textOnly &&
      !isBlank(line.text) &&
      indentWidth(line.text) === 0;

    if (cut) {
      chunks.push({ start, end: i });
      start = i;
    }
    if (classifyFenceStart(line.text, line.column).matched) {
      fenceSeen = true;
    }
  });

  chunks.push({ start, end: lines.length });
  return chunks;
}

function shiftSpan(span: LineSpan, offset: number): LineSpan {
  return { start: span.start + offset, end: span.end + offset };
}

function hasBlankGap(blocks: readonly ParsedBlock[]): boolean {
  return blocks.some((block, i) => i > 0 && block.span.start > blocks[i - 1].span.end + 1);
}

export function reparseListItem(
  item: ListItemDraft,
  depth: number,
  reparser: BlockReparser
): ReparsedItem {
  const policy = chooseReparsePolicy(item.lines);
  const blocks: ParsedBlock[] = [];

  if (policy === 'joined') {
    blocks.push(...reparser.parseBlocks(item.lines, depth + 1));
  } else {
    for (const chunk of splitChunks(item.lines)) {
      const parsed = reparser.parseBlocks(item.lines.slice(chunk.start, chunk.end), depth + 1);
      for (const block of parsed) {
        blocks.push({ node: block.node, span: shiftSpan(block.span, chunk.start) });
      }
    }
  }

  return { blocks, policy, hasBlankGap: hasBlankGap(blocks) };
}

export function extractList(context: ListContext, depth: number, reparser: BlockReparser): ListNode {
  const drafts = [...context.items, context.current];
  const reparsed = drafts.map((draft) => reparseListItem(draft, depth, reparser));

  const tight = isTightList(
    drafts.map((draft, i) => ({
      blankBefore: draft.blankBefore,
      hasBlankGap: reparsed[i].hasBlankGap,
    }))
  );

  const { marker } = context;
  return createList({
    ordered: marker.kind === 'ordered',
    start: marker.kind === 'ordered' ? marker.start : undefined,
    marker: markerChar(marker),
    tight,
    items: reparsed.map((item) => createListItem(item.blocks.map((block) => block.node))),
  });
}
