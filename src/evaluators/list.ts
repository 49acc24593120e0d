/**
 * List evaluator
 *
 * Tracks one list: the finished items, the lines of the current item and
 * the blank lines not yet committed to it. Blank lines alone never end a
 * list; a line that fits neither the current item nor a new one does.
 *
 * @since 2026-10-05
 */

import {
  classifyListMarker,
  classifyThematicBreak,
  breaksLazyContinuation,
  isSameListKind,
  startsBlock,
} from '../classifiers/index.js';
import type { ListItemHeader } from '../classifiers/index.js';
import type { ClosedBlock, ItemLine, ListContext, ListItemDraft } from '../dispatcher/types.js';
import { indentWidth, isBlank, stripColumns } from '../utils/line-utils.js';
import type { BlockLine } from '../utils/line-utils.js';
import { CONTINUE, DEFER_BLANK, close } from './types.js';
import type { EvaluationEnv, Verdict } from './types.js';

function startItem(header: ListItemHeader, column: number, blankBefore: boolean): ListItemDraft {
  return {
    lines: [{ text: header.content, lazy: false, column: column + header.contentIndent, textOnly: false }],
    blankBefore,
  };
}

export function openList(header: ListItemHeader, index: number, column: number): ListContext {
  return {
    kind: 'list',
    marker: header.marker,
    items: [],
    current: startItem(header, column, false),
    contentIndent: header.contentIndent,
    pendingBlanks: 0,
    lazyParagraphOpen: false,
    span: { start: index, end: index },
  };
}

/**
 * An item that opened with an empty marker line and has no content yet
 * cannot pick up content after a blank line
 */
function acceptsIndentedLine(context: ListContext): boolean {
  if (context.pendingBlanks === 0) return true;
  return context.current.lines.some((line) => !isBlank(line.text));
}

function commit(context: ListContext, line: ItemLine, index: number): Verdict {
  for (let i = 0; i < context.pendingBlanks; i++) {
    context.current.lines.push({ text: '', lazy: false, column: line.column, textOnly: false });
  }
  context.pendingBlanks = 0;
  context.current.lines.push(line);
  context.lazyParagraphOpen = line.lazy;
  context.span.end = index;
  return CONTINUE;
}

function commitLazy(context: ListContext, line: BlockLine, index: number): Verdict {
  return commit(context, { text: line.text, lazy: true, column: line.column, textOnly: true }, index);
}

export function evaluateList(
  context: ListContext,
  line: BlockLine,
  index: number,
  env: EvaluationEnv
): Verdict {
  if (isBlank(line.text)) {
    context.pendingBlanks++;
    context.lazyParagraphOpen = false;
    return DEFER_BLANK;
  }

  if (line.lazy) {
    return commitLazy(context, line, index);
  }

  if (indentWidth(line.text, line.column) >= context.contentIndent && acceptsIndentedLine(context)) {
    const text = stripColumns(line.text, context.contentIndent, line.column);
    const column = line.column + context.contentIndent;
    return commit(context, { text, lazy: false, column, textOnly: !startsBlock(text, column) }, index);
  }

  // `* * *` is a thematic break even inside a `*` list
  if (classifyThematicBreak(line.text, line.column).matched) {
    return close(closeList(context), true);
  }

  const item = classifyListMarker(line.text, line.column);
  if (item.matched && isSameListKind(context.marker, item.header.marker)) {
    context.items.push(context.current);
    context.current = startItem(item.header, line.column, context.pendingBlanks > 0);
    context.contentIndent = item.header.contentIndent;
    context.pendingBlanks = 0;
    context.lazyParagraphOpen = false;
    context.span.end = index;
    return CONTINUE;
  }

  if (
    context.pendingBlanks === 0 &&
    !breaksLazyContinuation(line.text, line.column) &&
    (context.lazyParagraphOpen || env.endsInParagraph(context.current.lines))
  ) {
    return commitLazy(context, line, index);
  }

  return close(closeList(context), true);
}

/**
 * Blank lines still pending when the list closes belong to no item
 */
export function closeList(context: ListContext): ClosedBlock {
  context.pendingBlanks = 0;
  return { kind: 'container', context };
}
