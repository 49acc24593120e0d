/**
 * List item marker: a bullet (`-`, `+`, `*`) or a 1-9 digit ordinal
 * followed by `.` or `)`, then whitespace or the end of the line.
 *
 * The content indent is the marker's column plus its width plus the
 * whitespace after it, with that whitespace counted as at most four
 * columns. A marker alone on its line gets one column of padding.
 */

import { CODE_INDENT, indentWidth, isBlank, splitIndent, stripColumns } from '../utils/line-utils.js';
import { applies, rejects } from './types.js';
import type { LineMatch, ListItemHeader, ListMarker, ListMarkerReason } from './types.js';

const MAX_ORDINAL_DIGITS = 9;
const MAX_MARKER_PADDING = 4;

/**
 * Read the marker at the start of `text`, without looking at what follows it
 */
function readMarker(text: string): { marker: ListMarker; width: number } | ListMarkerReason {
  const first = text[0];
  if (first === '-' || first === '+' || first === '*') {
    return { marker: { kind: 'bullet', char: first }, width: 1 };
  }

  const digits = /^[0-9]+/.exec(text);
  if (!digits) return 'NotListMarker';
  if (digits[0].length > MAX_ORDINAL_DIGITS) return 'OrdinalTooLong';

  const delimiter = text[digits[0].length];
  if (delimiter !== '.' && delimiter !== ')') return 'NotListMarker';

  return {
    marker: { kind: 'ordered', start: Number.parseInt(digits[0], 10), delimiter },
    width: digits[0].length + 1,
  };
}

export function classifyListMarker(line: string, column = 0): LineMatch<ListItemHeader, ListMarkerReason> {
  const { indent, rest } = splitIndent(line, column);
  if (indent >= CODE_INDENT) return rejects('CodeIndent');

  const read = readMarker(rest);
  if (typeof read === 'string') return rejects(read);

  const { marker, width } = read;
  const afterMarker = rest.slice(width);
  const markerEnd = indent + width;

  if (isBlank(afterMarker)) {
    return applies({
      marker,
      indent,
      contentIndent: markerEnd + 1,
      content: '',
      empty: true,
    });
  }

  const padding = indentWidth(afterMarker, column + markerEnd);
  if (padding === 0) return rejects('MissingSpace');

  const consumed = Math.min(padding, MAX_MARKER_PADDING);
  return applies({
    marker,
    indent,
    contentIndent: markerEnd + consumed,
    content: stripColumns(afterMarker, consumed, column + markerEnd),
    empty: false,
  });
}

/**
 * Same list kind: same bullet character, or same ordered delimiter
 */
export function isSameListKind(a: ListMarker, b: ListMarker): boolean {
  if (a.kind === 'bullet' && b.kind === 'bullet') return a.char === b.char;
  if (a.kind === 'ordered' && b.kind === 'ordered') return a.delimiter === b.delimiter;
  return false;
}

/**
 * Bullet character or ordered delimiter
 */
export function markerChar(marker: ListMarker): '-' | '+' | '*' | '.' | ')' {
  return marker.kind === 'bullet' ? marker.char : marker.delimiter;
}
