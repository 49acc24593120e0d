/**
 * Fenced code block fences
 *
 * An opening fence is three or more backticks or tildes indented at most
 * three columns. The rest of the line, trimmed, is the info string; a
 * backtick fence's info string may not contain a backtick.
 *
 * A closing fence uses the same character, is at least as long as the
 * opening fence, is indented at most three columns and has nothing but
 * whitespace after it.
 */

import { CODE_INDENT, countLeading, isBlank, splitIndent } from '../utils/line-utils.js';
import { applies, rejects } from './types.js';
import type {
  FenceChar,
  FenceCloseReason,
  FenceHeader,
  FenceStartReason,
  LineMatch,
} from './types.js';

const MIN_FENCE_LENGTH = 3;

function leadingFence(text: string): { fenceChar: FenceChar; length: number } | null {
  const first = text[0];
  if (first !== '`' && first !== '~') return null;
  return { fenceChar: first, length: countLeading(text, first) };
}

export function classifyFenceStart(line: string, column = 0): LineMatch<FenceHeader, FenceStartReason> {
  const { indent, rest } = splitIndent(line, column);
  if (indent >= CODE_INDENT) return rejects('CodeIndent');

  const fence = leadingFence(rest);
  if (!fence || fence.length < MIN_FENCE_LENGTH) return rejects('NoFence');

  const info = rest.slice(fence.length).trim();
  if (fence.fenceChar === '`' && info.includes('`')) return rejects('BacktickInInfo');

  return applies({
    fenceChar: fence.fenceChar,
    fenceLength: fence.length,
    indent,
    info: info.length > 0 ? info : undefined,
  });
}

export function classifyFenceClose(
  line: string,
  opening: FenceHeader,
  column = 0
): LineMatch<{ fenceLength: number }, FenceCloseReason> {
  const { indent, rest } = splitIndent(line, column);
  if (indent >= CODE_INDENT) return rejects('CodeIndent');

  const fence = leadingFence(rest);
  if (!fence || fence.fenceChar !== opening.fenceChar) return rejects('WrongFenceChar');
  if (fence.length < opening.fenceLength) return rejects('TooShort');
  if (!isBlank(rest.slice(fence.length))) return rejects('TrailingText');

  return applies({ fenceLength: fence.length });
}
