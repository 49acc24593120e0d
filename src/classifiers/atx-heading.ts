/**
 * ATX heading: 1-6 `#` followed by a space, a tab or the end of the line.
 */

import type { HeadingLevel } from '../node/types.js';
import { CODE_INDENT, countLeading, splitIndent } from '../utils/line-utils.js';
import { applies, rejects } from './types.js';
import type { AtxHeadingHeader, AtxHeadingReason, LineMatch } from './types.js';

const LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];

/**
 * Strip an optional closing sequence of `#`.
 *
 * The run only counts as a closing sequence when it is the whole text or
 * is preceded by a space or tab.
 *
 * @example
 * stripClosingSequence('foo ##')  // 'foo'
 * stripClosingSequence('foo#')    // 'foo#'
 * stripClosingSequence('###')     // ''
 */
export function stripClosingSequence(text: string): string {
  const withoutHashes = text.replace(/#+$/, '');
  if (withoutHashes.length === text.length) return text;
  if (withoutHashes.length === 0) return '';
  if (/[ \t]$/.test(withoutHashes)) return withoutHashes.trimEnd();
  return text;
}

export function classifyAtxHeading(line: string, column = 0): LineMatch<AtxHeadingHeader, AtxHeadingReason> {
  const { indent, rest } = splitIndent(line, column);
  if (indent >= CODE_INDENT) return rejects('CodeIndent');

  const hashes = countLeading(rest, '#');
  if (hashes === 0) return rejects('NoHashes');

  const level = LEVELS.find((candidate) => candidate === hashes);
  if (level === undefined) return rejects('TooManyHashes');

  const after = rest.slice(hashes);
  if (after.length > 0 && after[0] !== ' ' && after[0] !== '\t') {
    return rejects('MissingSpace');
  }

  return applies({ level, content: stripClosingSequence(after.trim()) });
}
