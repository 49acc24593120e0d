/**
 * Which lines may interrupt an open paragraph
 *
 * Paragraph continuation, lazy continuation and the list item "text-only"
 * tag all rest on the same question: would this line start a block of its
 * own, or is it more paragraph text?
 */

import { classifyAtxHeading } from './atx-heading.js';
import { classifyBlockquote } from './blockquote.js';
import { classifyFenceStart } from './fenced-code.js';
import { classifyIndentedCode } from './indented-code.js';
import { classifyListMarker } from './list-marker.js';
import { classifyThematicBreak } from './thematic-break.js';
import { isBlank } from '../utils/line-utils.js';

/**
 * True when `line` closes an open paragraph and starts a block of its own.
 *
 * Setext underlines are not included: they convert the paragraph rather
 * than interrupt it. Indented code never interrupts. A list item interrupts
 * only when it has content and, if ordered, starts at 1.
 */
export function interruptsParagraph(line: string, column = 0): boolean {
  if (classifyFenceStart(line, column).matched) return true;
  if (classifyThematicBreak(line, column).matched) return true;
  if (classifyAtxHeading(line, column).matched) return true;
  if (classifyBlockquote(line, column).matched) return true;

  const item = classifyListMarker(line, column);
  if (!item.matched || item.header.empty) return false;
  return item.header.marker.kind === 'bullet' || item.header.marker.start === 1;
}

/**
 * True when `line` may not continue a paragraph lazily from inside a
 * container. Any list item counts here, empty or not; indented code still
 * does not.
 */
export function breaksLazyContinuation(line: string, column = 0): boolean {
  return interruptsParagraph(line, column) || classifyListMarker(line, column).matched;
}

/**
 * True when `text` would open something other than a paragraph at the
 * start of a block sequence
 */
export function startsBlock(text: string, column = 0): boolean {
  if (isBlank(text)) return false;
  return (
    classifyFenceStart(text, column).matched ||
    classifyThematicBreak(text, column).matched ||
    classifyBlockquote(text, column).matched ||
    classifyAtxHeading(text, column).matched ||
    classifyListMarker(text, column).matched ||
    classifyIndentedCode(text, column).matched
  );
}
