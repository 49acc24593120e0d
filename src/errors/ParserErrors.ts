/**
 * Errors raised by the parser
 *
 * Malformed markdown is never an error: every input has a parse. These
 * cover the two ways a call can still fail, a bad option and input nested
 * deeper than the configured ceiling.
 *
 * @since 2026-10-04
 */

/**
 * Base class for every error the parser throws
 */
export class MarkdownBlocksError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Container nesting went past `maxNestingDepth`
 */
export class NestingTooDeepError extends MarkdownBlocksError {
  constructor(
    public readonly depth: number,
    public readonly limit: number
  ) {
    super(`Container nesting depth ${depth} exceeds the limit of ${limit}`);
  }
}

/**
 * An option was given a value outside its accepted range
 */
export class InvalidOptionError extends MarkdownBlocksError {
  constructor(
    public readonly option: string,
    public readonly value: unknown
  ) {
    super(`Invalid value for option "${option}": ${String(value)}`);
  }
}
