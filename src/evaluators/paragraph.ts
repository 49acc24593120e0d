/**
 * Paragraph evaluator
 *
 * A paragraph runs until a blank line or a line that interrupts it. A setext
 * underline turns the lines collected so far into a heading.
 *
 * @since 2026-10-04
 */

import { classifySetextUnderline, interruptsParagraph } from '../classifiers/index.js';
import type { ClosedBlock, ParagraphContext } from '../dispatcher/types.js';
import { createHeading, createParagraph } from '../node/index.js';
import { isBlank } from '../utils/line-utils.js';
import type { BlockLine } from '../utils/line-utils.js';
import { CONTINUE, close } from './types.js';
import type { Verdict } from './types.js';

export function openParagraph(line: BlockLine, index: number): ParagraphContext {
  return {
    kind: 'paragraph',
    lines: [line.text.trimStart()],
    span: { start: index, end: index },
  };
}

export function evaluateParagraph(context: ParagraphContext, line: BlockLine, index: number): Verdict {
  if (isBlank(line.text)) {
    return close(closeParagraph(context), false);
  }

  // Lazy lines were accepted as text by an enclosing container
  if (!line.lazy) {
    const underline = classifySetextUnderline(line.text, line.column);
    if (underline.matched) {
      return close(
        {
          kind: 'leaf',
          node: createHeading(underline.header.level, paragraphText(context)),
          span: { start: context.span.start, end: index },
        },
        false
      );
    }

    if (interruptsParagraph(line.text, line.column)) {
      return close(closeParagraph(context), true);
    }
  }

  context.lines.push(line.text.trimStart());
  context.span.end = index;
  return CONTINUE;
}

export function closeParagraph(context: ParagraphContext): ClosedBlock {
  return {
    kind: 'leaf',
    node: createParagraph(paragraphText(context)),
    span: context.span,
  };
}

function paragraphText(context: ParagraphContext): string {
  return context.lines.join('\n').trimEnd();
}
