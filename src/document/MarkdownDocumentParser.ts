/**
 * Markdown Document Parser
 *
 * Parses a markdown file into its block tree and summarizes it:
 * title, heading sections, code blocks and block counts.
 *
 * @since 2026-10-07
 */

import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { parse } from '../parse.js';
import { collectText, visitNodes } from '../node/index.js';
import type { BlockNodeType, DocumentNode, HeadingNode } from '../node/index.js';
import type {
  DocumentParseOptions,
  MarkdownCodeBlock,
  MarkdownDocumentInfo,
  MarkdownParseResult,
  MarkdownSection,
} from './types.js';

/**
 * Generate a URL slug from heading text
 */
export function generateSlug(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\w\s-]/g, '') // Remove special chars
    .replace(/\s+/g, '-') // Spaces to hyphens
    .replace(/-+/g, '-') // Collapse multiple hyphens
    .replace(/^-|-$/g, ''); // Trim hyphens
}

/**
 * Markdown Document Parser
 */
export class MarkdownDocumentParser {
  /**
   * Parse a Markdown file
   */
  parseFile(filePath: string, content: string, options: DocumentParseOptions = {}): MarkdownParseResult {
    const opts = {
      extractSections: options.extractSections ?? true,
      extractCodeBlocks: options.extractCodeBlocks ?? true,
    };

    let tree: DocumentNode;
    try {
      tree = parse(content, { maxNestingDepth: options.maxNestingDepth });
    } catch (error) {
      console.error(`❌ Failed to parse ${filePath}:`, error);
      throw error;
    }

    const headings = this.collectHeadings(tree);

    const document: MarkdownDocumentInfo = {
      uuid: uuidv4(),
      file: filePath,
      hash: createHash('sha256').update(content).digest('hex').slice(0, 16),
      linesOfCode: content.split('\n').length,
      title: this.extractTitle(headings),
      sections: opts.extractSections ? this.extractSections(headings) : [],
      codeBlocks: opts.extractCodeBlocks ? this.extractCodeBlocks(tree) : [],
      blockCounts: this.countBlocks(tree),
    };

    return { document, tree };
  }

  /**
   * Parse content into its block tree only
   */
  parse(content: string, options: DocumentParseOptions = {}): DocumentNode {
    return parse(content, { maxNestingDepth: options.maxNestingDepth });
  }

  private collectHeadings(tree: DocumentNode): Array<{ level: number; title: string }> {
    const headings: Array<{ level: number; title: string }> = [];
    visitNodes(tree, (node) => {
      if (node.type === 'heading') {
        headings.push({ level: node.level, title: headingText(node) });
      }
    });
    return headings;
  }

  /**
   * Extract sections based on headings
   */
  private extractSections(headings: Array<{ level: number; title: string }>): MarkdownSection[] {
    const sections: MarkdownSection[] = [];
    const stack: Array<{ level: number; title: string }> = [];

    for (const h of headings) {
      // Determine parent
      while (stack.length > 0 && stack[stack.length - 1].level >= h.level) {
        stack.pop();
      }
      const parent = stack.length > 0 ? stack[stack.length - 1] : undefined;

      sections.push({
        uuid: uuidv4(),
        title: h.title,
        level: h.level,
        slug: generateSlug(h.title),
        parentTitle: parent?.title,
      });

      stack.push(h);
    }

    return sections;
  }

  private extractCodeBlocks(tree: DocumentNode): MarkdownCodeBlock[] {
    const blocks: MarkdownCodeBlock[] = [];
    visitNodes(tree, (node) => {
      if (node.type === 'code_block_fenced') {
        blocks.push({
          language: node.info?.split(/\s+/)[0],
          content: node.content,
          fenced: true,
          lineCount: countLines(node.content),
        });
      } else if (node.type === 'code_block_indented') {
        blocks.push({
          content: node.content,
          fenced: false,
          lineCount: countLines(node.content),
        });
      }
    });
    return blocks;
  }

  /**
   * Extract document title
   */
  private extractTitle(headings: Array<{ level: number; title: string }>): string | undefined {
    const h1 = headings.find((h) => h.level === 1);
    return (h1 ?? headings.at(0))?.title;
  }

  private countBlocks(tree: DocumentNode): Partial<Record<BlockNodeType, number>> {
    const counts: Partial<Record<BlockNodeType, number>> = {};
    visitNodes(tree, (node) => {
      if (node.type === 'document' || node.type === 'list_item' || node.type === 'text') return;
      counts[node.type] = (counts[node.type] ?? 0) + 1;
    });
    return counts;
  }
}

function headingText(node: HeadingNode): string {
  return collectText(node).trim();
}

function countLines(content: string): number {
  return content.length === 0 ? 0 : content.split('\n').length;
}
