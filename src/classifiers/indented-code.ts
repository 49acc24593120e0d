/**
 * Indented code line: four or more columns of indentation.
 * Whether such a line may open a block (it cannot interrupt a paragraph)
 * is the dispatcher's call.
 */

import { CODE_INDENT, indentWidth, isBlank, stripColumns } from '../utils/line-utils.js';
import { applies, rejects } from './types.js';
import type { IndentedCodeHeader, IndentedCodeReason, LineMatch } from './types.js';

export function classifyIndentedCode(
  line: string,
  column = 0
): LineMatch<IndentedCodeHeader, IndentedCodeReason> {
  if (isBlank(line)) return rejects('Empty');
  if (indentWidth(line, column) < CODE_INDENT) return rejects('InsufficientIndent');
  return applies({ content: stripColumns(line, CODE_INDENT, column) });
}
