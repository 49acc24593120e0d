/**
 * Line utilities shared by classifiers, evaluators and the dispatcher
 *
 * Indentation is measured in columns: a space is one column, a tab advances
 * to the next multiple of TAB_STOP.
 *
 * @since 2026-10-02
 */

export const TAB_STOP = 4;

/** Indentation at or beyond this width starts an indented code line */
export const CODE_INDENT = 4;

/**
 * A line as seen by the dispatcher.
 *
 * `lazy` marks a line that an enclosing container accepted only as lazy
 * paragraph continuation; it must keep continuing that paragraph when the
 * container content is reparsed.
 */
export interface BlockLine {
  text: string;
  lazy: boolean;
  /** Source column `text` starts at once container prefixes are gone; tabs expand from here */
  column: number;
}

/**
 * Split source text into lines.
 * Accepts \n, \r\n and \r; a single trailing line ending adds no empty line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Wrap raw strings as non-lazy block lines
 */
export function toBlockLines(lines: readonly string[]): BlockLine[] {
  return lines.map((text) => ({ text, lazy: false, column: 0 }));
}

/**
 * True when the line holds only spaces and tabs
 */
export function isBlank(text: string): boolean {
  return /^[ \t]*$/.test(text);
}

/**
 * Width in columns of the leading whitespace, starting at `startColumn`
 */
export function indentWidth(text: string, startColumn = 0): number {
  let column = startColumn;
  for (const ch of text) {
    if (ch === ' ') {
      column++;
    } else if (ch === '\t') {
      column += TAB_STOP - (column % TAB_STOP);
    } else {
      break;
    }
  }
  return column - startColumn;
}

/**
 * Remove up to `columns` columns of leading whitespace.
 *
 * A tab that is only partly consumed leaves its remaining columns behind as
 * spaces. Stops early at the first non-whitespace character.
 *
 * @example
 * stripColumns('      code', 4)   // '  code'
 * stripColumns('\tfoo', 2)        // '  foo'
 * stripColumns('  x', 4)          // 'x'
 */
export function stripColumns(text: string, columns: number, startColumn = 0): string {
  const target = startColumn + columns;
  let column = startColumn;
  let i = 0;

  while (i < text.length && column < target) {
    const ch = text[i];
    if (ch === ' ') {
      column++;
      i++;
    } else if (ch === '\t') {
      const next = column + TAB_STOP - (column % TAB_STOP);
      if (next > target) {
        return ' '.repeat(next - target) + text.slice(i + 1);
      }
      column = next;
      i++;
    } else {
      break;
    }
  }

  return text.slice(i);
}

/**
 * Split a line into its leading whitespace width and the text after it
 */
export function splitIndent(text: string, startColumn = 0): { indent: number; rest: string } {
  const match = /^[ \t]*/.exec(text);
  const leading = match ? match[0] : '';
  return { indent: indentWidth(leading, startColumn), rest: text.slice(leading.length) };
}

/**
 * Count how many times `ch` repeats at the start of `text`
 */
export function countLeading(text: string, ch: string): number {
  let count = 0;
  while (count < text.length && text[count] === ch) {
    count++;
  }
  return count;
}

/**
 * Drop whitespace-only lines from both ends, keeping interior ones
 */
export function trimBlankLines(lines: readonly string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && isBlank(lines[start])) start++;
  while (end > start && isBlank(lines[end - 1])) end--;
  return lines.slice(start, end);
}
