/**
 * Fenced code evaluator
 *
 * Everything up to a matching closing fence is content. Without one the
 * block runs to the end of input.
 *
 * @since 2026-10-04
 */

import { classifyFenceClose } from '../classifiers/index.js';
import type { FenceHeader } from '../classifiers/index.js';
import type { ClosedBlock, FencedCodeContext } from '../dispatcher/types.js';
import { createFencedCodeBlock } from '../node/index.js';
import { stripColumns } from '../utils/line-utils.js';
import type { BlockLine } from '../utils/line-utils.js';
import { CONTINUE, close } from './types.js';
import type { Verdict } from './types.js';

export function openFencedCode(fence: FenceHeader, index: number): FencedCodeContext {
  return {
    kind: 'fenced_code',
    fence,
    lines: [],
    span: { start: index, end: index },
  };
}

export function evaluateFencedCode(context: FencedCodeContext, line: BlockLine, index: number): Verdict {
  context.span.end = index;

  if (classifyFenceClose(line.text, context.fence, line.column).matched) {
    return close(closeFencedCode(context), false);
  }

  // Content loses at most as much indentation as the opening fence had
  context.lines.push(stripColumns(line.text, context.fence.indent, line.column));
  return CONTINUE;
}

export function closeFencedCode(context: FencedCodeContext): ClosedBlock {
  return {
    kind: 'leaf',
    node: createFencedCodeBlock(context.fence.info, context.lines.join('\n')),
    span: context.span,
  };
}
