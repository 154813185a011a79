/**
 * TOML configuration parser for yini.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import type { ParserOptions } from '../parser/types.js';
import type { WriterOptions } from '../writer/writer.js';
import {
  DEFAULT_CONFIG,
  DEFAULT_LOGGING_SETTINGS,
  DEFAULT_PARSER_SETTINGS,
  DEFAULT_WRITER_SETTINGS,
  QUOTE_STYLES,
  UNTERMINATED_COMMENT_POLICIES,
} from './defaults.js';
import type { LoggingSettings, ParserSettings, WriterSettings, YiniConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads an optional table, rejecting non-table values.
 *
 * @param value - Raw TOML value.
 * @param fieldPath - Path to the table for error messages.
 * @throws ConfigParseError if the value is present but not a table.
 */
function readTable(value: unknown, fieldPath: string): Table | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected table, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated number.
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is one of a fixed set of strings.
 *
 * @param value - Value to validate.
 * @param choices - Accepted values.
 * @param fieldPath - Path to the field for error messages.
 * @returns The matching choice.
 * @throws ConfigParseError if value is not a string or not one of the choices.
 */
function validateChoice<T extends string>(
  value: unknown,
  choices: readonly T[],
  fieldPath: string
): T {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected one of ${choices.join(', ')}, got '${value}'`
    );
  }
  return match;
}

/**
 * Parses parser settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the parser table.
 * @returns Validated parser settings merged with defaults.
 */
function parseParserSettings(raw: Table | undefined): ParserSettings {
  const result: ParserSettings = { ...DEFAULT_PARSER_SETTINGS };
  if (raw === undefined) {
    return result;
  }

  if ('strict_depth' in raw) {
    result.strict_depth = validateBoolean(raw.strict_depth, 'parser.strict_depth');
  }
  if ('strict_literals' in raw) {
    result.strict_literals = validateBoolean(raw.strict_literals, 'parser.strict_literals');
  }
  if ('quote_aware_comments' in raw) {
    result.quote_aware_comments = validateBoolean(
      raw.quote_aware_comments,
      'parser.quote_aware_comments'
    );
  }
  if ('unterminated_comment' in raw) {
    result.unterminated_comment = validateChoice(
      raw.unterminated_comment,
      UNTERMINATED_COMMENT_POLICIES,
      'parser.unterminated_comment'
    );
  }

  return result;
}

/**
 * Parses writer settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the writer table.
 * @returns Validated writer settings merged with defaults.
 */
function parseWriterSettings(raw: Table | undefined): WriterSettings {
  const result: WriterSettings = { ...DEFAULT_WRITER_SETTINGS };
  if (raw === undefined) {
    return result;
  }

  if ('indent_width' in raw) {
    result.indent_width = validateNumber(raw.indent_width, 'writer.indent_width');
  }
  if ('quote' in raw) {
    result.quote = validateChoice(raw.quote, QUOTE_STYLES, 'writer.quote');
  }

  return result;
}

function parseLoggingSettings(raw: Table | undefined): LoggingSettings {
  const result: LoggingSettings = { ...DEFAULT_LOGGING_SETTINGS };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Parses a TOML string into a validated YiniConfig object.
 *
 * Unknown tables and keys are ignored. Range checks are left to
 * `validateConfig`.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [parser]
 * strict_depth = true
 *
 * [writer]
 * indent_width = 2
 * `);
 * console.log(config.parser.strict_depth); // true
 * console.log(config.writer.quote);        // "single"
 * ```
 */
export function parseConfig(tomlContent: string): YiniConfig {
  let parsed: Table;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    parser: parseParserSettings(readTable(parsed.parser, 'parser')),
    writer: parseWriterSettings(readTable(parsed.writer, 'writer')),
    logging: parseLoggingSettings(readTable(parsed.logging, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 *
 * @example
 * ```typescript
 * const config = getDefaultConfig();
 * console.log(config.writer.indent_width); // 4
 * ```
 */
export function getDefaultConfig(): YiniConfig {
  return {
    parser: { ...DEFAULT_CONFIG.parser },
    writer: { ...DEFAULT_CONFIG.writer },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}

/**
 * Maps parser settings to the parser's option object.
 */
export function toParserOptions(config: YiniConfig): ParserOptions {
  return {
    strictDepth: config.parser.strict_depth,
    strictLiterals: config.parser.strict_literals,
    quoteAwareComments: config.parser.quote_aware_comments,
    unterminatedComment: config.parser.unterminated_comment,
  };
}

/**
 * Maps writer settings to the writer's option object.
 */
export function toWriterOptions(config: YiniConfig): WriterOptions {
  return {
    indentWidth: config.writer.indent_width,
    quote: config.writer.quote,
  };
}
