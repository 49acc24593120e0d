/**
 * Types for the document parser
 *
 * Summarizes a parsed markdown file for indexing:
 * - Sections (by headings)
 * - Code blocks
 * - Block counts
 *
 * @since 2026-10-07
 */

import type { ParseOptions } from '../config/index.js';
import type { BlockNodeType, DocumentNode } from '../node/index.js';

/**
 * Markdown section (one per heading)
 */
export interface MarkdownSection {
  /** Unique identifier */
  uuid: string;

  /** Section title (heading text) */
  title: string;

  /** Heading level (1-6) */
  level: number;

  /** Anchor slug for linking */
  slug: string;

  /** Title of the nearest preceding heading with a lower level */
  parentTitle?: string;
}

/**
 * Markdown code block
 */
export interface MarkdownCodeBlock {
  /** First word of the info string */
  language?: string;

  /** Code content */
  content: string;

  /** Fenced (```) or indented */
  fenced: boolean;

  lineCount: number;
}

/**
 * Document info
 */
export interface MarkdownDocumentInfo {
  /** Unique identifier */
  uuid: string;

  /** File path */
  file: string;

  /** Content hash */
  hash: string;

  /** Number of lines */
  linesOfCode: number;

  /** Document title (first h1, else first heading) */
  title?: string;

  sections: MarkdownSection[];

  codeBlocks: MarkdownCodeBlock[];

  /** Number of nodes of each block type */
  blockCounts: Partial<Record<BlockNodeType, number>>;
}

/**
 * Parse result
 */
export interface MarkdownParseResult {
  /** Document info */
  document: MarkdownDocumentInfo;

  /** Block tree */
  tree: DocumentNode;
}

/**
 * Parse options
 */
export interface DocumentParseOptions extends ParseOptions {
  /** Extract sections */
  extractSections?: boolean;

  /** Extract code blocks */
  extractCodeBlocks?: boolean;
}
