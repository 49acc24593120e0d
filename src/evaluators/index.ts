/**
 * Continuation evaluators, one per open context kind
 */

export { CONTINUE, DEFER_BLANK, close } from './types.js';
export type { Verdict, EvaluationEnv } from './types.js';

export { openParagraph, evaluateParagraph, closeParagraph } from './paragraph.js';
export { openBlockquote, evaluateBlockquote, closeBlockquote } from './blockquote.js';
export { openList, evaluateList, closeList } from './list.js';
export { openFencedCode, evaluateFencedCode, closeFencedCode } from './fenced-code.js';
export { openIndentedCode, evaluateIndentedCode, closeIndentedCode } from './indented-code.js';
