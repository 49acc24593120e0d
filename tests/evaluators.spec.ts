/**
 * Tests for continuation evaluators
 */
import { describe, it, expect, vi } from 'vitest';
import { classifyBlockquote, classifyFenceStart, classifyListMarker } from '../src/classifiers/index.js';
import type { BlockquoteHeader, FenceHeader, ListItemHeader } from '../src/classifiers/index.js';
import {
  closeIndentedCode,
  closeList,
  closeParagraph,
  evaluateBlockquote,
  evaluateFencedCode,
  evaluateIndentedCode,
  evaluateList,
  evaluateParagraph,
  openBlockquote,
  openFencedCode,
  openIndentedCode,
  openList,
  openParagraph,
} from '../src/evaluators/index.js';
import type { EvaluationEnv } from '../src/evaluators/index.js';
import { createHeading, createParagraph } from '../src/node/index.js';
import type { BlockLine } from '../src/utils/line-utils.js';

function line(text: string, lazy = false, column = 0): BlockLine {
  return { text, lazy, column };
}

function envAnswering(answer: boolean): EvaluationEnv {
  return { endsInParagraph: vi.fn(() => answer) };
}

function quoteHeader(text: string): BlockquoteHeader {
  const marker = classifyBlockquote(text);
  if (!marker.matched) throw new Error(`not a blockquote: ${text}`);
  return marker.header;
}

function listHeader(text: string): ListItemHeader {
  const item = classifyListMarker(text);
  if (!item.matched) throw new Error(`not a list item: ${text}`);
  return item.header;
}

function fenceHeader(text: string): FenceHeader {
  const fence = classifyFenceStart(text);
  if (!fence.matched) throw new Error(`not a fence: ${text}`);
  return fence.header;
}

describe('paragraph evaluator', () => {
  it('should collect lines without their leading whitespace', () => {
    const context = openParagraph(line('  foo'), 0);
    expect(evaluateParagraph(context, line('   bar'), 1)).toEqual({ outcome: 'continue' });
    expect(context.lines).toEqual(['foo', 'bar']);
    expect(context.span).toEqual({ start: 0, end: 1 });
  });

  it('should close on a blank line without reprocessing it', () => {
    const context = openParagraph(line('foo'), 0);
    evaluateParagraph(context, line('bar'), 1);
    expect(evaluateParagraph(context, line(''), 2)).toEqual({
      outcome: 'close',
      block: { kind: 'leaf', node: createParagraph('foo\nbar'), span: { start: 0, end: 1 } },
      reprocess: false,
    });
  });

  it('should turn into a heading on a setext underline', () => {
    const context = openParagraph(line('Foo'), 3);
    expect(evaluateParagraph(context, line('==='), 4)).toEqual({
      outcome: 'close',
      block: { kind: 'leaf', node: createHeading(1, 'Foo'), span: { start: 3, end: 4 } },
      reprocess: false,
    });
  });

  it('should treat a lazy underline as text', () => {
    const context = openParagraph(line('Foo'), 0);
    expect(evaluateParagraph(context, line('===', true), 1)).toEqual({ outcome: 'continue' });
    expect(context.lines).toEqual(['Foo', '===']);
  });

  it('should close and reprocess an interrupting line', () => {
    const context = openParagraph(line('foo'), 0);
    const verdict = evaluateParagraph(context, line('# h'), 1);
    expect(verdict).toEqual({
      outcome: 'close',
      block: { kind: 'leaf', node: createParagraph('foo'), span: { start: 0, end: 0 } },
      reprocess: true,
    });
  });

  it('should keep indented lines as paragraph text', () => {
    const context = openParagraph(line('foo'), 0);
    expect(evaluateParagraph(context, line('    bar'), 1)).toEqual({ outcome: 'continue' });
    expect(context.lines).toEqual(['foo', 'bar']);
  });

  it('should trim trailing whitespace of the last line only', () => {
    const context = openParagraph(line('a  '), 0);
    evaluateParagraph(context, line('b  '), 1);
    expect(closeParagraph(context)).toEqual({
      kind: 'leaf',
      node: createParagraph('a  \nb'),
      span: { start: 0, end: 1 },
    });
  });
});

describe('blockquote evaluator', () => {
  it('should strip markers from continuing lines', () => {
    const context = openBlockquote(quoteHeader('> foo'), 0, 0);
    expect(evaluateBlockquote(context, line('> bar'), 1, envAnswering(false))).toEqual({ outcome: 'continue' });
    expect(context.lines).toEqual([line('foo', false, 2), line('bar', false, 2)]);
    expect(context.span).toEqual({ start: 0, end: 1 });
  });

  it('should accept lazy lines while a paragraph is open inside', () => {
    const context = openBlockquote(quoteHeader('> foo'), 0, 0);
    expect(evaluateBlockquote(context, line('bar'), 1, envAnswering(true))).toEqual({ outcome: 'continue' });
    expect(context.lines).toEqual([line('foo', false, 2), line('bar', true)]);
  });

  it('should not ask about the paragraph again after a lazy line', () => {
    const env = envAnswering(true);
    const context = openBlockquote(quoteHeader('> foo'), 0, 0);
    evaluateBlockquote(context, line('bar'), 1, env);
    expect(evaluateBlockquote(context, line('baz'), 2, env)).toEqual({ outcome: 'continue' });
    expect(env.endsInParagraph).toHaveBeenCalledTimes(1);

    evaluateBlockquote(context, line('> qux'), 3, env);
    evaluateBlockquote(context, line('quux'), 4, env);
    expect(env.endsInParagraph).toHaveBeenCalledTimes(2);
  });

  it('should record the column where content starts after the marker', () => {
    const context = openBlockquote(quoteHeader('>\t\tfoo'), 0, 0);
    evaluateBlockquote(context, line('  >bar'), 1, envAnswering(false));
    expect(context.lines).toEqual([line('  \tfoo', false, 2), line('bar', false, 3)]);
  });

  it('should close and reprocess an unmarked line when no paragraph is open', () => {
    const context = openBlockquote(quoteHeader('> ```'), 0, 0);
    const verdict = evaluateBlockquote(context, line('bar'), 1, envAnswering(false));
    expect(verdict).toEqual({ outcome: 'close', block: { kind: 'container', context }, reprocess: true });
  });

  it('should close on a blank line', () => {
    const context = openBlockquote(quoteHeader('> foo'), 0, 0);
    const verdict = evaluateBlockquote(context, line(''), 1, envAnswering(true));
    expect(verdict).toEqual({ outcome: 'close', block: { kind: 'container', context }, reprocess: false });
  });

  it('should not ask about the paragraph when the line starts a block', () => {
    const env = envAnswering(true);
    const context = openBlockquote(quoteHeader('> foo'), 0, 0);
    const verdict = evaluateBlockquote(context, line('# h'), 1, env);
    expect(verdict).toEqual({ outcome: 'close', block: { kind: 'container', context }, reprocess: true });
    expect(env.endsInParagraph).not.toHaveBeenCalled();
  });
});

describe('list evaluator', () => {
  it('should defer blank lines and flush them on continuation', () => {
    const context = openList(listHeader('- a'), 0, 0);
    expect(evaluateList(context, line(''), 1, envAnswering(false))).toEqual({ outcome: 'defer_blank' });
    expect(context.pendingBlanks).toBe(1);

    expect(evaluateList(context, line('  b'), 2, envAnswering(false))).toEqual({ outcome: 'continue' });
    expect(context.pendingBlanks).toBe(0);
    expect(context.current.lines).toEqual([
      { text: 'a', lazy: false, column: 2, textOnly: false },
      { text: '', lazy: false, column: 2, textOnly: false },
      { text: 'b', lazy: false, column: 2, textOnly: true },
    ]);
    expect(context.span).toEqual({ start: 0, end: 2 });
  });

  it('should tag indented lines that start a block as not text-only', () => {
    const context = openList(listHeader('- a'), 0, 0);
    evaluateList(context, line('  - b'), 1, envAnswering(false));
    expect(context.current.lines[1]).toEqual({ text: '- b', lazy: false, column: 2, textOnly: false });
  });

  it('should start a new item on a marker of the same kind', () => {
    const context = openList(listHeader('- a'), 0, 0);
    evaluateList(context, line(''), 1, envAnswering(false));
    expect(evaluateList(context, line('- b'), 2, envAnswering(false))).toEqual({ outcome: 'continue' });
    expect(context.items).toEqual([{ lines: [{ text: 'a', lazy: false, column: 2, textOnly: false }], blankBefore: false }]);
    expect(context.current).toEqual({ lines: [{ text: 'b', lazy: false, column: 2, textOnly: false }], blankBefore: true });
    expect(context.pendingBlanks).toBe(0);
  });

  it('should adopt the content indent of the new item', () => {
    const context = openList(listHeader('1. a'), 0, 0);
    evaluateList(context, line('10. b'), 1, envAnswering(false));
    expect(context.contentIndent).toBe(4);
  });

  it('should close on a marker of another kind', () => {
    const context = openList(listHeader('- a'), 0, 0);
    const verdict = evaluateList(context, line('+ b'), 1, envAnswering(true));
    expect(verdict).toEqual({ outcome: 'close', block: { kind: 'container', context }, reprocess: true });
  });

  it('should close on a thematic break made of the bullet character', () => {
    const context = openList(listHeader('* a'), 0, 0);
    const verdict = evaluateList(context, line('* * *'), 1, envAnswering(true));
    expect(verdict).toEqual({ outcome: 'close', block: { kind: 'container', context }, reprocess: true });
  });

  it('should take lazy lines only without pending blanks', () => {
    const context = openList(listHeader('- a'), 0, 0);
    expect(evaluateList(context, line('b'), 1, envAnswering(true))).toEqual({ outcome: 'continue' });
    expect(context.current.lines[1]).toEqual({ text: 'b', lazy: true, column: 0, textOnly: true });

    evaluateList(context, line(''), 2, envAnswering(true));
    const verdict = evaluateList(context, line('c'), 3, envAnswering(true));
    expect(verdict.outcome).toBe('close');
  });

  it('should not ask about the paragraph again after a lazy line', () => {
    const env = envAnswering(true);
    const context = openList(listHeader('- a'), 0, 0);
    evaluateList(context, line('b'), 1, env);
    expect(evaluateList(context, line('c'), 2, env)).toEqual({ outcome: 'continue' });
    expect(env.endsInParagraph).toHaveBeenCalledTimes(1);

    evaluateList(context, line('- d'), 3, env);
    evaluateList(context, line('e'), 4, env);
    expect(env.endsInParagraph).toHaveBeenCalledTimes(2);
  });

  it('should forget an open lazy paragraph at a blank line', () => {
    const context = openList(listHeader('- a'), 0, 0);
    evaluateList(context, line('b'), 1, envAnswering(true));
    expect(context.lazyParagraphOpen).toBe(true);
    evaluateList(context, line(''), 2, envAnswering(true));
    expect(context.lazyParagraphOpen).toBe(false);
    expect(evaluateList(context, line('c'), 3, envAnswering(true)).outcome).toBe('close');
  });

  it('should strip item indentation through a tab from the source column', () => {
    const context = openList(listHeader('- foo'), 0, 0);
    evaluateList(context, line(''), 1, envAnswering(false));
    evaluateList(context, line('\t\tbar'), 2, envAnswering(false));
    expect(context.current.lines[2]).toEqual({ text: '  \tbar', lazy: false, column: 2, textOnly: false });
  });

  it('should not give an empty item content after a blank line', () => {
    const context = openList(listHeader('-'), 0, 0);
    evaluateList(context, line(''), 1, envAnswering(false));
    const verdict = evaluateList(context, line('  foo'), 2, envAnswering(false));
    expect(verdict).toEqual({ outcome: 'close', block: { kind: 'container', context }, reprocess: true });
  });

  it('should discard pending blanks on close', () => {
    const context = openList(listHeader('- a'), 0, 0);
    evaluateList(context, line(''), 1, envAnswering(false));
    closeList(context);
    expect(context.pendingBlanks).toBe(0);
    expect(context.current.lines).toHaveLength(1);
  });
});

describe('fenced code evaluator', () => {
  it('should run until a matching closing fence', () => {
    const context = openFencedCode(fenceHeader('```js'), 0);
    expect(evaluateFencedCode(context, line('a'), 1)).toEqual({ outcome: 'continue' });
    expect(evaluateFencedCode(context, line('~~~'), 2)).toEqual({ outcome: 'continue' });
    expect(evaluateFencedCode(context, line('```'), 3)).toEqual({
      outcome: 'close',
      block: {
        kind: 'leaf',
        node: { type: 'code_block_fenced', info: 'js', content: 'a\n~~~' },
        span: { start: 0, end: 3 },
      },
      reprocess: false,
    });
  });

  it('should remove at most the opening fence indentation', () => {
    const context = openFencedCode(fenceHeader('  ```'), 0);
    evaluateFencedCode(context, line('    x'), 1);
    evaluateFencedCode(context, line(' y'), 2);
    expect(context.lines).toEqual(['  x', 'y']);
  });
});

describe('indented code evaluator', () => {
  it('should keep interior blank lines and close on shallow text', () => {
    const context = openIndentedCode('a', 0);
    expect(evaluateIndentedCode(context, line(''), 1)).toEqual({ outcome: 'defer_blank' });
    expect(evaluateIndentedCode(context, line('    b'), 2)).toEqual({ outcome: 'continue' });
    expect(evaluateIndentedCode(context, line(' x'), 3)).toEqual({
      outcome: 'close',
      block: {
        kind: 'leaf',
        node: { type: 'code_block_indented', content: 'a\n\nb' },
        span: { start: 0, end: 2 },
      },
      reprocess: true,
    });
  });

  it('should keep the remainder of wide whitespace-only lines', () => {
    const context = openIndentedCode('chunk1', 0);
    evaluateIndentedCode(context, line('      '), 1);
    evaluateIndentedCode(context, line('      chunk2'), 2);
    expect(context.lines).toEqual(['chunk1', '  ', '  chunk2']);
  });

  it('should drop blank lines still pending at close', () => {
    const context = openIndentedCode('a', 0);
    evaluateIndentedCode(context, line(''), 1);
    expect(closeIndentedCode(context)).toEqual({
      kind: 'leaf',
      node: { type: 'code_block_indented', content: 'a' },
      span: { start: 0, end: 0 },
    });
  });
});
