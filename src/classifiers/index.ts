/**
 * Line classifiers
 *
 * One pure check per block kind. Each returns a parsed header or the named
 * reason the kind does not apply.
 */

export { applies, rejects } from './types.js';
export type {
  LineMatch,
  CodeIndentReason,
  ThematicBreakChar,
  ThematicBreakHeader,
  ThematicBreakReason,
  AtxHeadingHeader,
  AtxHeadingReason,
  SetextUnderlineHeader,
  SetextUnderlineReason,
  FenceChar,
  FenceHeader,
  FenceStartReason,
  FenceCloseReason,
  IndentedCodeHeader,
  IndentedCodeReason,
  BlockquoteHeader,
  BlockquoteReason,
  ListMarker,
  ListItemHeader,
  ListMarkerReason,
} from './types.js';

export { classifyThematicBreak } from './thematic-break.js';
export { classifyAtxHeading, stripClosingSequence } from './atx-heading.js';
export { classifySetextUnderline } from './setext-underline.js';
export { classifyFenceStart, classifyFenceClose } from './fenced-code.js';
export { classifyIndentedCode } from './indented-code.js';
export { classifyBlockquote } from './blockquote.js';
export { classifyListMarker, isSameListKind, markerChar } from './list-marker.js';
export { interruptsParagraph, breaksLazyContinuation, startsBlock } from './interruption.js';
