/**
 * Default configuration values for yini.toml.
 *
 * @packageDocumentation
 */

import { DEFAULT_PARSER_OPTIONS } from '../parser/types.js';
import { DEFAULT_WRITER_OPTIONS } from '../writer/writer.js';
import type { LoggingSettings, ParserSettings, WriterSettings, YiniConfig } from './types.js';

/**
 * Default parser settings: the permissive behavior.
 */
export const DEFAULT_PARSER_SETTINGS: Readonly<ParserSettings> = {
  strict_depth: DEFAULT_PARSER_OPTIONS.strictDepth,
  strict_literals: DEFAULT_PARSER_OPTIONS.strictLiterals,
  quote_aware_comments: DEFAULT_PARSER_OPTIONS.quoteAwareComments,
  unterminated_comment: DEFAULT_PARSER_OPTIONS.unterminatedComment,
};

export const DEFAULT_WRITER_SETTINGS: Readonly<WriterSettings> = {
  indent_width: DEFAULT_WRITER_OPTIONS.indentWidth,
  quote: DEFAULT_WRITER_OPTIONS.quote,
};

export const DEFAULT_LOGGING_SETTINGS: Readonly<LoggingSettings> = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Readonly<YiniConfig> = {
  parser: DEFAULT_PARSER_SETTINGS,
  writer: DEFAULT_WRITER_SETTINGS,
  logging: DEFAULT_LOGGING_SETTINGS,
};

/** Accepted values of `parser.unterminated_comment`. */
export const UNTERMINATED_COMMENT_POLICIES = ['truncate', 'error'] as const;

/** Accepted values of `writer.quote`. */
export const QUOTE_STYLES = ['single', 'double'] as const;

/** Inclusive bounds of `writer.indent_width`. */
export const INDENT_WIDTH_RANGE = { min: 1, max: 16 } as const;
