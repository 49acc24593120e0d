/**
 * Types for continuation evaluators
 *
 * An evaluator looks at the next line for one open context and decides
 * whether the line continues it, is a blank line to hold back, or closes
 * it. A closing verdict says whether the line still has to be processed
 * from the top.
 *
 * @since 2026-10-04
 */

import type { ClosedBlock } from '../dispatcher/types.js';
import type { BlockLine } from '../utils/line-utils.js';

export type Verdict =
  | { readonly outcome: 'continue' }
  | { readonly outcome: 'defer_blank' }
  | { readonly outcome: 'close'; readonly block: ClosedBlock; readonly reprocess: boolean };

export const CONTINUE: Verdict = { outcome: 'continue' };

export const DEFER_BLANK: Verdict = { outcome: 'defer_blank' };

export function close(block: ClosedBlock, reprocess: boolean): Verdict {
  return { outcome: 'close', block, reprocess };
}

/**
 * What evaluators may ask of the dispatcher
 */
export interface EvaluationEnv {
  /**
   * Whether `lines`, scanned as a block sequence one level down, leave a
   * paragraph open at the innermost level. Drives lazy continuation.
   */
  endsInParagraph(lines: readonly BlockLine[]): boolean;
}
