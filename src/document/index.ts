export { MarkdownDocumentParser, generateSlug } from './MarkdownDocumentParser.js';
export type {
  MarkdownSection,
  MarkdownCodeBlock,
  MarkdownDocumentInfo,
  MarkdownParseResult,
  DocumentParseOptions,
} from './types.js';
