/**
 * Parse options
 *
 * @since 2026-10-04
 */

import { InvalidOptionError } from '../errors/index.js';

export const DEFAULT_MAX_NESTING_DEPTH = 100;

export interface ParseOptions {
  /**
   * Deepest container nesting accepted before parsing fails.
   * The document's own blocks sit at depth 0; each blockquote or list
   * level adds one. Must be a positive integer.
   * @default 100
   */
  maxNestingDepth?: number;
}

export type ResolvedParseOptions = Required<ParseOptions>;

/**
 * Fill in defaults and validate
 * @throws InvalidOptionError
 */
export function resolveParseOptions(options: ParseOptions = {}): ResolvedParseOptions {
  const maxNestingDepth = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;

  if (!Number.isInteger(maxNestingDepth) || maxNestingDepth < 1) {
    throw new InvalidOptionError('maxNestingDepth', maxNestingDepth);
  }

  return { maxNestingDepth };
}
