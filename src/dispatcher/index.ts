export { BlockDispatcher, START_RULES } from './BlockDispatcher.js';
export type { OpenContext, Opening, StartRule } from './BlockDispatcher.js';
export { TOP } from './types.js';
export type {
  LineSpan,
  ParsingContext,
  TopContext,
  ParagraphContext,
  BlockquoteContext,
  ItemLine,
  ListItemDraft,
  ListContext,
  FencedCodeContext,
  IndentedCodeContext,
  ContainerContext,
  ClosedBlock,
  ParsedBlock,
} from './types.js';
