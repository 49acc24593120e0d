/**
 * Tests for list item reparse policies and list tightness
 */
import { describe, it, expect } from 'vitest';
import { resolveParseOptions } from '../src/config/index.js';
import { BlockDispatcher } from '../src/dispatcher/index.js';
import type { ItemLine } from '../src/dispatcher/index.js';
import { chooseReparsePolicy, reparseListItem, splitChunks } from '../src/extractor/index.js';
import { createParagraph } from '../src/node/index.js';
import { parse } from '../src/parse.js';
import { isTightList } from '../src/tightness/index.js';

function item(text: string, textOnly = false): ItemLine {
  return { text, lazy: false, column: 0, textOnly };
}

describe('reparse policy', () => {
  it('should parse items without text-only lines as one sequence', () => {
    expect(chooseReparsePolicy([item('a'), item('- b')])).toBe('joined');
  });

  it('should chunk items with any text-only line', () => {
    expect(chooseReparsePolicy([item('a'), item(''), item('b', true)])).toBe('chunked');
  });

  it('should cut before unindented text after a blank run', () => {
    expect(splitChunks([item('a'), item(''), item('b', true)])).toEqual([
      { start: 0, end: 2 },
      { start: 2, end: 3 },
    ]);
  });

  it('should not cut before indented text', () => {
    expect(splitChunks([item('- a'), item(''), item('  b', true)])).toEqual([{ start: 0, end: 3 }]);
  });

  it('should not cut once a fence may be open', () => {
    expect(splitChunks([item('```'), item(''), item('b', true)])).toEqual([{ start: 0, end: 3 }]);
  });

  it('should offset chunk spans and report blank gaps', () => {
    const dispatcher = new BlockDispatcher(resolveParseOptions());
    const reparsed = reparseListItem(
      { lines: [item('a'), item(''), item('b', true)], blankBefore: false },
      0,
      dispatcher
    );

    expect(reparsed.policy).toBe('chunked');
    expect(reparsed.blocks).toEqual([
      { node: createParagraph('a'), span: { start: 0, end: 0 } },
      { node: createParagraph('b'), span: { start: 2, end: 2 } },
    ]);
    expect(reparsed.hasBlankGap).toBe(true);
  });
});

describe('isTightList', () => {
  it('should treat an empty list as tight', () => {
    expect(isTightList([])).toBe(true);
  });

  it('should ignore a blank line before the first item', () => {
    expect(isTightList([{ blankBefore: true, hasBlankGap: false }])).toBe(true);
  });

  it('should be loose when a blank line separates items', () => {
    expect(
      isTightList([
        { blankBefore: false, hasBlankGap: false },
        { blankBefore: true, hasBlankGap: false },
      ])
    ).toBe(false);
  });

  it('should be loose when an item has a blank gap between its blocks', () => {
    expect(isTightList([{ blankBefore: false, hasBlankGap: true }])).toBe(false);
  });
});

describe('list tightness in documents', () => {
  function tightness(source: string): boolean[] {
    const tight: boolean[] = [];
    for (const block of parse(source).children) {
      if (block.type === 'list') tight.push(block.tight);
    }
    return tight;
  }

  it('should keep a list tight when an item ends in a nested list', () => {
    const doc = parse('- a\n  - b\n- c');
    const list = doc.children[0];
    expect(list.type === 'list' && list.tight).toBe(true);
    expect(list.type === 'list' && list.items.length).toBe(2);
  });

  it('should mark lists loose from blank lines between items', () => {
    expect(tightness('- a\n- b\n\n- c')).toEqual([false]);
    expect(tightness('- a\n- b\n- c')).toEqual([true]);
  });

  it('should not count trailing blank lines', () => {
    expect(tightness('- a\n- b\n\n\nfoo')).toEqual([true]);
  });

  it('should mark a list loose from a blank line before a later item', () => {
    expect(tightness('- a\n  - b\n\n- c')).toEqual([false]);
  });
});
