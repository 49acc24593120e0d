/**
 * Indented code evaluator
 *
 * @since 2026-10-04
 */

import { classifyIndentedCode } from '../classifiers/index.js';
import type { ClosedBlock, IndentedCodeContext } from '../dispatcher/types.js';
import { createIndentedCodeBlock } from '../node/index.js';
import { CODE_INDENT, isBlank, stripColumns, trimBlankLines } from '../utils/line-utils.js';
import type { BlockLine } from '../utils/line-utils.js';
import { CONTINUE, DEFER_BLANK, close } from './types.js';
import type { Verdict } from './types.js';

export function openIndentedCode(content: string, index: number): IndentedCodeContext {
  return {
    kind: 'indented_code',
    lines: [content],
    pendingBlanks: [],
    span: { start: index, end: index },
  };
}

/**
 * Lines indented four or more columns continue the block. Blank lines are
 * held back until a following code line proves the block goes on.
 */
export function evaluateIndentedCode(context: IndentedCodeContext, line: BlockLine, index: number): Verdict {
  const code = classifyIndentedCode(line.text, line.column);
  if (code.matched) {
    context.lines.push(...context.pendingBlanks, code.header.content);
    context.pendingBlanks = [];
    context.span.end = index;
    return CONTINUE;
  }

  if (isBlank(line.text)) {
    context.pendingBlanks.push(stripColumns(line.text, CODE_INDENT, line.column));
    return DEFER_BLANK;
  }

  return close(closeIndentedCode(context), true);
}

/**
 * Pending blank lines are dropped, then whitespace-only lines at either end
 */
export function closeIndentedCode(context: IndentedCodeContext): ClosedBlock {
  return {
    kind: 'leaf',
    node: createIndentedCodeBlock(trimBlankLines(context.lines).join('\n')),
    span: context.span,
  };
}
