/**
 * Types for the block dispatcher
 *
 * A ParsingContext is the single container open at one level of the scan.
 * Nested containers never extend it into a stack: their lines are collected
 * here and reparsed one level down when the container closes.
 *
 * @since 2026-10-04
 */

import type { FenceHeader, ListMarker } from '../classifiers/types.js';
import type { BlockNode } from '../node/types.js';
import type { BlockLine } from '../utils/line-utils.js';

/** Inclusive range of line indices within the sequence being scanned */
export interface LineSpan {
  start: number;
  end: number;
}

export interface TopContext {
  kind: 'top';
}

export interface ParagraphContext {
  kind: 'paragraph';
  /** Lines with leading whitespace removed */
  lines: string[];
  span: LineSpan;
}

export interface BlockquoteContext {
  kind: 'blockquote';
  /** Lines with the `>` marker stripped; lazy lines as they arrived */
  lines: BlockLine[];
  /** The last line taken was lazy, so the innermost paragraph is still open */
  lazyParagraphOpen: boolean;
  span: LineSpan;
}

/**
 * A list item content line.
 *
 * `textOnly` marks plain paragraph text: a line whose content, once the
 * item's indentation is gone, does not start any block of its own.
 */
export interface ItemLine extends BlockLine {
  textOnly: boolean;
}

export interface ListItemDraft {
  lines: ItemLine[];
  /** A blank line separated this item from the previous one */
  blankBefore: boolean;
}

export interface ListContext {
  kind: 'list';
  /** Marker of the first item; later items must share its kind */
  marker: ListMarker;
  items: ListItemDraft[];
  current: ListItemDraft;
  /** Continuation threshold of the current item */
  contentIndent: number;
  /** Blank lines seen but not yet committed to the current item */
  pendingBlanks: number;
  /** The last line taken was lazy, so the current item's innermost paragraph is still open */
  lazyParagraphOpen: boolean;
  span: LineSpan;
}

export interface FencedCodeContext {
  kind: 'fenced_code';
  fence: FenceHeader;
  lines: string[];
  span: LineSpan;
}

export interface IndentedCodeContext {
  kind: 'indented_code';
  lines: string[];
  /**
   * Blank lines seen but not yet committed, each already stripped of four
   * columns so that wider whitespace-only lines keep their remainder
   */
  pendingBlanks: string[];
  span: LineSpan;
}

export type ParsingContext =
  | TopContext
  | ParagraphContext
  | BlockquoteContext
  | ListContext
  | FencedCodeContext
  | IndentedCodeContext;

export type ContainerContext = BlockquoteContext | ListContext;

/**
 * A block whose scan is over. Leaves are already nodes; containers still
 * need their collected lines reparsed.
 */
export type ClosedBlock =
  | { kind: 'leaf'; node: BlockNode; span: LineSpan }
  | { kind: 'container'; context: ContainerContext };

/**
 * A finished node and the lines it came from
 */
export interface ParsedBlock {
  node: BlockNode;
  span: LineSpan;
}

export const TOP: TopContext = { kind: 'top' };
