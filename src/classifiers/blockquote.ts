/**
 * Blockquote marker: `>` indented at most three columns, optionally
 * followed by one space (or one column of a tab).
 *
 * A tab after the marker is measured from the marker's real column, so the
 * spaces it leaves behind depend on where the line starts.
 */

import { CODE_INDENT, splitIndent, stripColumns } from '../utils/line-utils.js';
import { applies, rejects } from './types.js';
import type { BlockquoteHeader, BlockquoteReason, LineMatch } from './types.js';

export function classifyBlockquote(line: string, column = 0): LineMatch<BlockquoteHeader, BlockquoteReason> {
  const { indent, rest } = splitIndent(line, column);
  if (indent >= CODE_INDENT) return rejects('CodeIndent');
  if (rest[0] !== '>') return rejects('NoMarker');

  const afterMarker = rest.slice(1);
  const markerEnd = indent + 1;
  const padded = afterMarker[0] === ' ' || afterMarker[0] === '\t';

  return applies({
    content: stripColumns(afterMarker, 1, column + markerEnd),
    contentOffset: padded ? markerEnd + 1 : markerEnd,
  });
}
