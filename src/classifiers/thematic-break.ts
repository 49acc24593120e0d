/**
 * Thematic break: three or more `-`, `_` or `*`, optionally separated by
 * spaces or tabs, indented at most three columns.
 */

import { CODE_INDENT, isBlank, splitIndent } from '../utils/line-utils.js';
import { applies, rejects } from './types.js';
import type { LineMatch, ThematicBreakChar, ThematicBreakHeader, ThematicBreakReason } from './types.js';

const MARKER_CHARS: readonly string[] = ['-', '_', '*'];

function isThematicBreakChar(ch: string): ch is ThematicBreakChar {
  return MARKER_CHARS.includes(ch);
}

export function classifyThematicBreak(
  line: string,
  column = 0
): LineMatch<ThematicBreakHeader, ThematicBreakReason> {
  if (isBlank(line)) return rejects('Empty');

  const { indent, rest } = splitIndent(line, column);
  if (indent >= CODE_INDENT) return rejects('CodeIndent');

  const marker = rest[0];
  if (!isThematicBreakChar(marker)) return rejects('WrongMarkerChar');

  let count = 0;
  for (const ch of rest) {
    if (ch === marker) {
      count++;
    } else if (ch !== ' ' && ch !== '\t') {
      return rejects('MixedChars');
    }
  }

  return count >= 3 ? applies({ marker }) : rejects('TooFewMarkers');
}
