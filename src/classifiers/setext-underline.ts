/**
 * Setext underline: a run of `=` (level 1) or `-` (level 2) with optional
 * trailing whitespace. Only meaningful directly below an open paragraph;
 * the paragraph evaluator decides that.
 */

import { CODE_INDENT, isBlank, splitIndent } from '../utils/line-utils.js';
import { applies, rejects } from './types.js';
import type { LineMatch, SetextUnderlineHeader, SetextUnderlineReason } from './types.js';

export function classifySetextUnderline(
  line: string,
  column = 0
): LineMatch<SetextUnderlineHeader, SetextUnderlineReason> {
  if (isBlank(line)) return rejects('Empty');

  const { indent, rest } = splitIndent(line, column);
  if (indent >= CODE_INDENT) return rejects('CodeIndent');

  const underline = rest.trimEnd();
  const first = underline[0];
  if (first !== '=' && first !== '-') return rejects('NotUnderlineChar');

  for (const ch of underline) {
    if (ch !== first) return rejects('MixedChars');
  }

  return applies({ level: first === '=' ? 1 : 2 });
}
