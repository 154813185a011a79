/**
 * Error suggestion system for the yini CLI.
 *
 * Provides contextual suggestions based on error types to help users
 * resolve issues quickly.
 *
 * @packageDocumentation
 */

import { ConfigParseError } from '../config/parser.js';
import { EnvCoercionError } from '../config/env.js';
import { ConfigValidationError } from '../config/validator.js';
import { NotFoundError, TypeCoercionError } from '../document/errors.js';
import { FileError } from '../io/file.js';
import { FormatError } from '../parser/errors.js';
import { PathValidationError } from '../utils/safe-fs.js';
import type { DisplayOptions } from './types.js';

/**
 * Error types the CLI distinguishes.
 */
export type ErrorType =
  | 'format_error'
  | 'type_error'
  | 'not_found'
  | 'file_error'
  | 'config_error'
  | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Error context with details needed for generating suggestions.
 */
export interface ErrorContext {
  /** Type of error that occurred. */
  errorType: ErrorType;
  /** Additional error details (optional). */
  details?: {
    /** File the error relates to. */
    filePath?: string;
    /** 1-based line number for format errors. */
    lineNumber?: number;
    /** Offending line for format errors. */
    line?: string;
  };
}

/**
 * Error suggestion mappings.
 */
const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  format_error: [
    {
      text: 'Check the reported line for a missing "=" or an empty key',
    },
    {
      text: 'Give every section header a name after its ^ markers',
    },
    {
      text: 'Close any quote, array or block comment opened on that line',
    },
    {
      text: 'Re-check the file after editing',
      action: 'yini check <file>',
    },
  ],

  type_error: [
    {
      text: 'Check that the value in the file has the type the caller expects',
    },
    {
      text: 'Quote a value to have it read as text',
      action: "port = '8080'",
    },
  ],

  not_found: [
    {
      text: 'Check the spelling of the key and section names',
    },
    {
      text: 'Separate section names and the key with dots',
      action: 'yini get <file> server.connection.port',
    },
    {
      text: 'List everything the document contains',
      action: 'yini json <file>',
    },
  ],

  file_error: [
    {
      text: 'Check that the file exists and the path is correct',
    },
    {
      text: 'Check read and write permissions',
      action: 'ls -l <file>',
    },
  ],

  config_error: [
    {
      text: 'Check yini.toml for syntax errors and value types',
    },
    {
      text: 'Check YINI_* environment variables',
      action: 'env | grep YINI_',
    },
    {
      text: 'writer.indent_width takes 1 to 16; writer.quote takes single or double',
    },
  ],

  unknown: [
    {
      text: 'Run again with debug output',
      action: 'yini <command> --verbose',
    },
    {
      text: 'Show usage information',
      action: 'yini help',
    },
  ],
};

/**
 * Classifies an error by its class.
 *
 * @param error - The thrown value.
 * @returns The error type and any details the error carries.
 */
export function classifyError(error: unknown): ErrorContext {
  if (error instanceof FormatError) {
    return {
      errorType: 'format_error',
      details: { lineNumber: error.lineNumber, line: error.line },
    };
  }
  if (error instanceof TypeCoercionError) {
    return { errorType: 'type_error' };
  }
  if (error instanceof NotFoundError) {
    return { errorType: 'not_found' };
  }
  if (error instanceof FileError) {
    return { errorType: 'file_error', details: { filePath: error.filePath } };
  }
  if (error instanceof PathValidationError) {
    return { errorType: 'file_error', details: { filePath: error.invalidPath } };
  }
  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  ) {
    return { errorType: 'config_error' };
  }
  return { errorType: 'unknown' };
}

/**
 * Gets suggestions for a given error type.
 */
export function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

/**
 * Formats a suggestion for display.
 *
 * @param suggestion - The suggestion to format.
 * @param index - The suggestion index (1-based).
 * @param options - Display options.
 * @returns Formatted suggestion string.
 */
function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText =
    suggestion.action !== undefined ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats error message with contextual suggestions.
 *
 * @param errorMessage - The error message.
 * @param context - Error type and details.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 *
 * @example
 * ```typescript
 * formatErrorWithSuggestions('Key not found: port', { errorType: 'not_found' }, { colors: false });
 * // "Error: Key not found: port\n\nSuggestions:\n  1. Check the spelling ..."
 * ```
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  context: ErrorContext,
  options: DisplayOptions = { colors: true }
): string {
  const suggestions = getSuggestions(context.errorType);

  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';
  const yellowCode = options.colors ? '\x1b[33m' : '';

  let result = `${redCode}Error:${resetCode} ${errorMessage}`;

  if (context.details?.filePath !== undefined) {
    result += `\n  ${yellowCode}File:${resetCode} ${context.details.filePath}`;
  }

  if (context.details?.lineNumber !== undefined) {
    result += `\n  ${yellowCode}Line ${String(context.details.lineNumber)}:${resetCode} ${context.details.line ?? ''}`;
  }

  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  suggestions.forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}

/**
 * Displays an error with suggestions on stderr.
 *
 * @param error - The thrown value.
 * @param options - Display options.
 */
export function displayError(error: unknown, options: DisplayOptions): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(formatErrorWithSuggestions(message, classifyError(error), options));
}
