/**
 * Node constructors
 *
 * Nodes are assembled bottom-up; once a builder returns, nothing mutates
 * the node again.
 *
 * @since 2026-10-02
 */

import type {
  BlockNode,
  BlockquoteNode,
  DocumentNode,
  FencedCodeBlockNode,
  HeadingLevel,
  HeadingNode,
  IndentedCodeBlockNode,
  ListItemNode,
  ListMarkerChar,
  ListNode,
  ParagraphNode,
  TextNode,
  ThematicBreakNode,
} from './types.js';

export function createText(value: string): TextNode {
  return { type: 'text', value };
}

export function createDocument(children: readonly BlockNode[]): DocumentNode {
  return { type: 'document', children };
}

export function createParagraph(text: string): ParagraphNode {
  return { type: 'paragraph', children: [createText(text)] };
}

/**
 * Create a heading; empty content yields no Text child
 */
export function createHeading(level: HeadingLevel, text: string): HeadingNode {
  return {
    type: 'heading',
    level,
    children: text.length > 0 ? [createText(text)] : [],
  };
}

export function createBlockquote(children: readonly BlockNode[]): BlockquoteNode {
  return { type: 'blockquote', children };
}

export function createList(options: {
  ordered: boolean;
  start?: number;
  marker: ListMarkerChar;
  tight: boolean;
  items: readonly ListItemNode[];
}): ListNode {
  return {
    type: 'list',
    ordered: options.ordered,
    start: options.ordered ? options.start : undefined,
    marker: options.marker,
    tight: options.tight,
    items: options.items,
  };
}

export function createListItem(children: readonly BlockNode[]): ListItemNode {
  return { type: 'list_item', children };
}

export function createFencedCodeBlock(info: string | undefined, content: string): FencedCodeBlockNode {
  return { type: 'code_block_fenced', info, content };
}

export function createIndentedCodeBlock(content: string): IndentedCodeBlockNode {
  return { type: 'code_block_indented', content };
}

export function createThematicBreak(): ThematicBreakNode {
  return { type: 'thematic_break' };
}
