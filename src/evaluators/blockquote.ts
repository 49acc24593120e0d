/**
 * Blockquote evaluator
 *
 * @since 2026-10-04
 */

import { classifyBlockquote, breaksLazyContinuation } from '../classifiers/index.js';
import type { BlockquoteHeader } from '../classifiers/index.js';
import type { BlockquoteContext, ClosedBlock } from '../dispatcher/types.js';
import { isBlank } from '../utils/line-utils.js';
import type { BlockLine } from '../utils/line-utils.js';
import { CONTINUE, close } from './types.js';
import type { EvaluationEnv, Verdict } from './types.js';

export function openBlockquote(header: BlockquoteHeader, index: number, column: number): BlockquoteContext {
  return {
    kind: 'blockquote',
    lines: [{ text: header.content, lazy: false, column: column + header.contentOffset }],
    lazyParagraphOpen: false,
    span: { start: index, end: index },
  };
}

/**
 * Marker lines continue the quote. Unmarked non-blank lines continue it
 * lazily while the quote's innermost open block is a paragraph and the line
 * starts no block of its own.
 */
export function evaluateBlockquote(
  context: BlockquoteContext,
  line: BlockLine,
  index: number,
  env: EvaluationEnv
): Verdict {
  const marker = classifyBlockquote(line.text, line.column);
  if (marker.matched) {
    context.lines.push({
      text: marker.header.content,
      lazy: false,
      column: line.column + marker.header.contentOffset,
    });
    context.lazyParagraphOpen = false;
    context.span.end = index;
    return CONTINUE;
  }

  if (isBlank(line.text)) {
    return close(closeBlockquote(context), false);
  }

  if (
    line.lazy ||
    (!breaksLazyContinuation(line.text, line.column) &&
      (context.lazyParagraphOpen || env.endsInParagraph(context.lines)))
  ) {
    context.lines.push({ text: line.text, lazy: true, column: line.column });
    context.lazyParagraphOpen = true;
    context.span.end = index;
    return CONTINUE;
  }

  return close(closeBlockquote(context), true);
}

export function closeBlockquote(context: BlockquoteContext): ClosedBlock {
  return { kind: 'container', context };
}
