export { MarkdownBlocksError, NestingTooDeepError, InvalidOptionError } from './ParserErrors.js';
