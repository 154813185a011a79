/**
 * Type definitions for yini.toml configuration.
 *
 * @packageDocumentation
 */

import type { UnterminatedCommentPolicy } from '../parser/types.js';
import type { QuoteStyle } from '../writer/writer.js';

/**
 * Parser settings from the `[parser]` table.
 */
export interface ParserSettings {
  /** Reject a section header that skips a depth level. */
  strict_depth: boolean;
  /** Reject unterminated quoted and array literals. */
  strict_literals: boolean;
  /** Ignore comment markers inside quoted runs. */
  quote_aware_comments: boolean;
  /** What to do with a block comment that is never closed. */
  unterminated_comment: UnterminatedCommentPolicy;
}

/**
 * Writer settings from the `[writer]` table.
 */
export interface WriterSettings {
  /** Spaces per nesting level, 1 to 16. */
  indent_width: number;
  quote: QuoteStyle;
}

/**
 * Logging settings from the `[logging]` table.
 */
export interface LoggingSettings {
  /** Emit debug-level entries, including parser tracing. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from yini.toml.
 */
export interface YiniConfig {
  parser: ParserSettings;
  writer: WriterSettings;
  logging: LoggingSettings;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialYiniConfig {
  parser?: Partial<ParserSettings>;
  writer?: Partial<WriterSettings>;
  logging?: Partial<LoggingSettings>;
}
