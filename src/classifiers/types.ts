/**
 * Types for line classifiers
 *
 * Every classifier answers one question about a single line: does this
 * line start (or close) a given block kind? The answer is either a parsed
 * header or a named reason the kind does not apply. Reasons only steer
 * dispatcher priority; they never surface as errors.
 *
 * Classifiers take the source column the line starts at. Indentation and
 * tab stops are measured from there.
 *
 * @since 2026-10-02
 */

import type { HeadingLevel } from '../node/types.js';

export type LineMatch<H, R extends string> =
  | { readonly matched: true; readonly header: H }
  | { readonly matched: false; readonly reason: R };

export function applies<H>(header: H): { readonly matched: true; readonly header: H } {
  return { matched: true, header };
}

export function rejects<R extends string>(reason: R): { readonly matched: false; readonly reason: R } {
  return { matched: false, reason };
}

/** Shared reason: four or more columns of indentation make an indented code line */
export type CodeIndentReason = 'CodeIndent';

// =============================================================================
// Thematic break
// =============================================================================

export type ThematicBreakChar = '-' | '_' | '*';

export interface ThematicBreakHeader {
  marker: ThematicBreakChar;
}

export type ThematicBreakReason =
  | CodeIndentReason
  | 'Empty'
  | 'WrongMarkerChar'
  | 'MixedChars'
  | 'TooFewMarkers';

// =============================================================================
// ATX heading
// =============================================================================

export interface AtxHeadingHeader {
  level: HeadingLevel;
  /** Heading text with surrounding whitespace and closing sequence removed */
  content: string;
}

export type AtxHeadingReason = CodeIndentReason | 'NoHashes' | 'TooManyHashes' | 'MissingSpace';

// =============================================================================
// Setext underline
// =============================================================================

export interface SetextUnderlineHeader {
  /** `=` underlines give level 1, `-` underlines level 2 */
  level: 1 | 2;
}

export type SetextUnderlineReason = CodeIndentReason | 'Empty' | 'NotUnderlineChar' | 'MixedChars';

// =============================================================================
// Fenced code
// =============================================================================

export type FenceChar = '`' | '~';

export interface FenceHeader {
  fenceChar: FenceChar;
  fenceLength: number;
  /** Columns of indentation before the opening fence (0-3) */
  indent: number;
  info: string | undefined;
}

export type FenceStartReason = CodeIndentReason | 'NoFence' | 'BacktickInInfo';

export type FenceCloseReason = CodeIndentReason | 'WrongFenceChar' | 'TooShort' | 'TrailingText';

// =============================================================================
// Indented code
// =============================================================================

export interface IndentedCodeHeader {
  /** The line with exactly four columns removed */
  content: string;
}

export type IndentedCodeReason = 'Empty' | 'InsufficientIndent';

// =============================================================================
// Blockquote
// =============================================================================

export interface BlockquoteHeader {
  /** The line after the `>` marker and one optional following space */
  content: string;
  /** Columns from the start of the line to where `content` begins */
  contentOffset: number;
}

export type BlockquoteReason = CodeIndentReason | 'NoMarker';

// =============================================================================
// List marker
// =============================================================================

export type ListMarker =
  | { kind: 'bullet'; char: '-' | '+' | '*' }
  | { kind: 'ordered'; start: number; delimiter: '.' | ')' };

export interface ListItemHeader {
  marker: ListMarker;
  /** Columns of indentation before the marker (0-3) */
  indent: number;
  /**
   * Columns a continuation line needs to belong to this item; also where
   * the first line's content begins
   */
  contentIndent: number;
  /** Text after the marker and its following spaces */
  content: string;
  /** Marker with nothing after it */
  empty: boolean;
}

export type ListMarkerReason = CodeIndentReason | 'NotListMarker' | 'MissingSpace' | 'OrdinalTooLong';
