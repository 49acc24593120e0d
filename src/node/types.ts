/**
 * Types for the block tree
 *
 * The parser output is an immutable forest rooted at one DocumentNode.
 * Children are always in source order. Leaf blocks carry raw inline
 * Markdown in Text nodes; inline parsing happens elsewhere.
 *
 * @since 2026-10-02
 */

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

/** Bullet character for bullet lists, delimiter for ordered lists */
export type ListMarkerChar = '-' | '+' | '*' | '.' | ')';

/**
 * Raw inline source, exactly as it appeared after block-level stripping
 */
export interface TextNode {
  readonly type: 'text';
  readonly value: string;
}

/**
 * Root of every parse result
 */
export interface DocumentNode {
  readonly type: 'document';
  readonly children: readonly BlockNode[];
}

export interface ParagraphNode {
  readonly type: 'paragraph';
  readonly children: readonly TextNode[];
}

/**
 * ATX (`## Title`) or setext (underlined) heading
 */
export interface HeadingNode {
  readonly type: 'heading';

  /** Heading level (1-6) */
  readonly level: HeadingLevel;

  /** Empty when the heading has no content */
  readonly children: readonly TextNode[];
}

export interface BlockquoteNode {
  readonly type: 'blockquote';
  readonly children: readonly BlockNode[];
}

/**
 * Bullet or ordered list
 */
export interface ListNode {
  readonly type: 'list';

  /** Ordered (`1.`, `1)`) or bullet (`-`, `+`, `*`) */
  readonly ordered: boolean;

  /** Number of the first item; undefined for bullet lists */
  readonly start: number | undefined;

  /** Bullet character or ordered delimiter shared by every item */
  readonly marker: ListMarkerChar;

  /**
   * Tight lists render item paragraphs without wrapping paragraph elements;
   * the Paragraph nodes stay in the tree either way.
   */
  readonly tight: boolean;

  readonly items: readonly ListItemNode[];
}

export interface ListItemNode {
  readonly type: 'list_item';
  readonly children: readonly BlockNode[];
}

/**
 * Code block delimited by backtick or tilde fences
 */
export interface FencedCodeBlockNode {
  readonly type: 'code_block_fenced';

  /** Trimmed info string; undefined when the opening fence has none */
  readonly info: string | undefined;

  /** Lines with the opening fence's indentation removed, joined by \n */
  readonly content: string;
}

/**
 * Code block made of lines indented four or more columns
 */
export interface IndentedCodeBlockNode {
  readonly type: 'code_block_indented';

  /** Lines with four columns removed, joined by \n */
  readonly content: string;
}

export interface ThematicBreakNode {
  readonly type: 'thematic_break';
}

/**
 * Any node that can appear as a child of a document, blockquote or list item
 */
export type BlockNode =
  | ParagraphNode
  | HeadingNode
  | BlockquoteNode
  | ListNode
  | FencedCodeBlockNode
  | IndentedCodeBlockNode
  | ThematicBreakNode;

export type MarkdownNode = DocumentNode | BlockNode | ListItemNode | TextNode;

export type BlockNodeType = BlockNode['type'];

export type MarkdownNodeType = MarkdownNode['type'];
