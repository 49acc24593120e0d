/**
 * Block Dispatcher
 *
 * Scans a sequence of lines with one open context at a time. Each line goes
 * to the open context's evaluator; when that context closes, or when none
 * is open, the start rules run in fixed order to open the next one.
 * Containers are closed with their raw lines and handed to the extractor,
 * which recurses back into this dispatcher one nesting level down.
 *
 * @since 2026-10-05
 */

import {
  classifyAtxHeading,
  classifyBlockquote,
  classifyFenceStart,
  classifyIndentedCode,
  classifyListMarker,
  classifyThematicBreak,
} from '../classifiers/index.js';
import type { ResolvedParseOptions } from '../config/index.js';
import { NestingTooDeepError } from '../errors/index.js';
import {
  closeBlockquote,
  closeFencedCode,
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
} from '../evaluators/index.js';
import type { EvaluationEnv, Verdict } from '../evaluators/index.js';
import { extractBlockquote, extractList } from '../extractor/index.js';
import type { BlockReparser } from '../extractor/index.js';
import { createHeading, createThematicBreak } from '../node/index.js';
import { isBlank } from '../utils/line-utils.js';
import type { BlockLine } from '../utils/line-utils.js';
import { TOP } from './types.js';
import type { ClosedBlock, ParsedBlock, ParsingContext, TopContext } from './types.js';

export type OpenContext = Exclude<ParsingContext, TopContext>;

/**
 * What a start rule does with the line it accepts: open a context that
 * takes further lines, or emit a one-line block straight away
 */
export type Opening =
  | { kind: 'open'; context: OpenContext }
  | { kind: 'emit'; block: ClosedBlock };

export interface StartRule {
  name: string;
  tryStart(line: BlockLine, index: number): Opening | null;
}

/**
 * Start rules in priority order. Setext underlines are absent: they only
 * apply to an open paragraph, inside its evaluator. A paragraph opens when
 * no rule accepts the line.
 */
export const START_RULES: readonly StartRule[] = [
  {
    name: 'fenced_code',
    tryStart(line, index) {
      const fence = classifyFenceStart(line.text, line.column);
      return fence.matched ? { kind: 'open', context: openFencedCode(fence.header, index) } : null;
    },
  },
  {
    name: 'thematic_break',
    tryStart(line, index) {
      if (!classifyThematicBreak(line.text, line.column).matched) return null;
      return {
        kind: 'emit',
        block: { kind: 'leaf', node: createThematicBreak(), span: { start: index, end: index } },
      };
    },
  },
  {
    name: 'blockquote',
    tryStart(line, index) {
      const marker = classifyBlockquote(line.text, line.column);
      return marker.matched ? { kind: 'open', context: openBlockquote(marker.header, index, line.column) } : null;
    },
  },
  {
    name: 'atx_heading',
    tryStart(line, index) {
      const heading = classifyAtxHeading(line.text, line.column);
      if (!heading.matched) return null;
      return {
        kind: 'emit',
        block: {
          kind: 'leaf',
          node: createHeading(heading.header.level, heading.header.content),
          span: { start: index, end: index },
        },
      };
    },
  },
  {
    name: 'list',
    tryStart(line, index) {
      const item = classifyListMarker(line.text, line.column);
      return item.matched ? { kind: 'open', context: openList(item.header, index, line.column) } : null;
    },
  },
  {
    name: 'indented_code',
    tryStart(line, index) {
      const code = classifyIndentedCode(line.text, line.column);
      return code.matched ? { kind: 'open', context: openIndentedCode(code.header.content, index) } : null;
    },
  },
];

function evaluate(context: OpenContext, line: BlockLine, index: number, env: EvaluationEnv): Verdict {
  switch (context.kind) {
    case 'paragraph':
      return evaluateParagraph(context, line, index);
    case 'blockquote':
      return evaluateBlockquote(context, line, index, env);
    case 'list':
      return evaluateList(context, line, index, env);
    case 'fenced_code':
      return evaluateFencedCode(context, line, index);
    case 'indented_code':
      return evaluateIndentedCode(context, line, index);
  }
}

/**
 * Close whatever is still open at the end of input
 */
function finish(context: OpenContext): ClosedBlock {
  switch (context.kind) {
    case 'paragraph':
      return closeParagraph(context);
    case 'blockquote':
      return closeBlockquote(context);
    case 'list':
      return closeList(context);
    case 'fenced_code':
      return closeFencedCode(context);
    case 'indented_code':
      return closeIndentedCode(context);
  }
}

type BlockSink = (block: ClosedBlock) => void;

/**
 * Block Dispatcher
 */
export class BlockDispatcher implements BlockReparser {
  constructor(private readonly options: ResolvedParseOptions) {}

  /**
   * Parse a line sequence into blocks
   * @param depth Container nesting level of these lines; the document is 0
   * @throws NestingTooDeepError
   */
  parseBlocks(lines: readonly BlockLine[], depth: number): ParsedBlock[] {
    const blocks: ParsedBlock[] = [];
    const sink: BlockSink = (block) => {
      blocks.push(this.materialize(block, depth));
    };

    const last = this.scan(lines, depth, sink);
    if (last.kind !== 'top') {
      sink(finish(last));
    }
    return blocks;
  }

  /**
   * Whether scanning `lines` leaves a paragraph open at the innermost
   * container level. Builds no nodes.
   */
  endsInParagraph(lines: readonly BlockLine[], depth: number): boolean {
    const last = this.scan(lines, depth, () => undefined);
    switch (last.kind) {
      case 'paragraph':
        return true;
      case 'blockquote':
        return this.endsInParagraph(last.lines, depth + 1);
      case 'list':
        return last.pendingBlanks === 0 && this.endsInParagraph(last.current.lines, depth + 1);
      default:
        return false;
    }
  }

  private scan(lines: readonly BlockLine[], depth: number, sink: BlockSink): ParsingContext {
    if (depth > this.options.maxNestingDepth) {
      throw new NestingTooDeepError(depth, this.options.maxNestingDepth);
    }

    const env: EvaluationEnv = {
      endsInParagraph: (inner) => this.endsInParagraph(inner, depth + 1),
    };

    let context: ParsingContext = TOP;
    for (const [index, line] of lines.entries()) {
      context = this.step(context, line, index, env, sink);
    }
    return context;
  }

  private step(
    context: ParsingContext,
    line: BlockLine,
    index: number,
    env: EvaluationEnv,
    sink: BlockSink
  ): ParsingContext {
    if (context.kind === 'top') {
      return this.open(line, index, sink);
    }

    const verdict = evaluate(context, line, index, env);
    if (verdict.outcome !== 'close') {
      return context;
    }

    sink(verdict.block);
    return verdict.reprocess ? this.open(line, index, sink) : TOP;
  }

  private open(line: BlockLine, index: number, sink: BlockSink): ParsingContext {
    if (isBlank(line.text)) {
      return TOP;
    }

    if (!line.lazy) {
      for (const rule of START_RULES) {
        const opening = rule.tryStart(line, index);
        if (opening === null) continue;
        if (opening.kind === 'open') return opening.context;
        sink(opening.block);
        return TOP;
      }
    }

    return openParagraph(line, index);
  }

  private materialize(block: ClosedBlock, depth: number): ParsedBlock {
    if (block.kind === 'leaf') {
      return { node: block.node, span: block.span };
    }

    const { context } = block;
    const node =
      context.kind === 'blockquote'
        ? extractBlockquote(context, depth, this)
        : extractList(context, depth, this);
    return { node, span: context.span };
  }
}
