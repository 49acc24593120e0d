export {
  extractBlockquote,
  extractList,
  reparseListItem,
  chooseReparsePolicy,
  splitChunks,
} from './ContainerExtractor.js';
export type { BlockReparser, ReparsePolicy, LineChunk, ReparsedItem } from './ContainerExtractor.js';
