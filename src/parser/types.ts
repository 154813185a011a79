/**
 * Parser option types.
 *
 * @packageDocumentation
 */

/**
 * What to do with a `/*` that has no closing `*\/`.
 *
 * - `truncate`: drop everything from the marker to the end of input
 * - `error`: raise a FormatError at the line of the marker
 */
export type UnterminatedCommentPolicy = 'truncate' | 'error';

/**
 * Options for comment stripping.
 */
export interface CommentOptions {
  /**
   * Ignore `//` and `/*` that appear inside a quoted run on the same line.
   * @defaultValue false
   */
  quoteAwareComments: boolean;

  /** @defaultValue 'truncate' */
  unterminatedComment: UnterminatedCommentPolicy;
}

/**
 * Options for literal parsing.
 */
export interface LiteralOptions {
  /**
   * Reject a literal that opens a quote or `[` without closing it, instead of
   * reading it as plain text.
   * @defaultValue false
   */
  strictLiterals: boolean;
}

/**
 * Full set of parser options.
 */
export interface ParserOptions extends CommentOptions, LiteralOptions {
  /**
   * Reject a section header that skips a depth level (e.g. `^^^` directly
   * under a `^` section) instead of nesting it under the deepest open section.
   * @defaultValue false
   */
  strictDepth: boolean;
}

/**
 * Default parser options: the permissive behavior.
 */
export const DEFAULT_PARSER_OPTIONS: ParserOptions = {
  strictDepth: false,
  strictLiterals: false,
  quoteAwareComments: false,
  unterminatedComment: 'truncate',
};

/**
 * A cleaned line with the source line it starts on.
 */
export interface SourceLine {
  /** 1-based line number in the original input. */
  readonly lineNumber: number;
  /** Line text with comments removed (not trimmed). */
  readonly text: string;
}
