/**
 * Comment removal for YINI text.
 *
 * Block comments (`/* ... *\/`) are removed from the whole input first,
 * newlines inside them included, so text after a closing marker continues
 * the line the comment opened on. Line comments (`//` to end of line) are
 * removed from each resulting line afterwards. Every cleaned line keeps the
 * number of the source line its content starts on.
 *
 * @packageDocumentation
 */

import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { FormatError } from './errors.js';
import { DEFAULT_PARSER_OPTIONS, type CommentOptions, type SourceLine } from './types.js';

const BLOCK_OPEN = '/*';
const BLOCK_CLOSE = '*/';
const LINE_COMMENT = '//';

function isQuote(char: string): boolean {
  return char === "'" || char === '"';
}

function isWhitespace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\r' || char === '\n';
}

function sourceLineAt(text: string, index: number): string {
  const start = text.lastIndexOf('\n', index - 1) + 1;
  const end = text.indexOf('\n', index);
  return text.slice(start, end === -1 ? undefined : end).trim();
}

function countNewlines(text: string, start: number, end: number): number {
  let count = 0;
  for (let i = start; i < end; i++) {
    if (text.charAt(i) === '\n') {
      count++;
    }
  }
  return count;
}

/**
 * Finds the first line-comment marker, or -1.
 *
 * @param line - A single line.
 * @param quoteAware - Skip markers inside quoted runs.
 */
function findLineComment(line: string, quoteAware: boolean): number {
  if (!quoteAware) {
    return line.indexOf(LINE_COMMENT);
  }
  let quote: string | null = null;
  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);
    if (quote !== null) {
      if (char === quote) {
        quote = null;
      }
    } else if (isQuote(char)) {
      quote = char;
    } else if (line.startsWith(LINE_COMMENT, i)) {
      return i;
    }
  }
  return -1;
}

/**
 * Removes block comments and splits the result into lines.
 */
function stripBlockComments(
  text: string,
  options: CommentOptions,
  log: Logger
): { lines: string[]; origins: number[] } {
  const lines: string[] = [];
  const origins: number[] = [];
  let current = '';
  let sourceLine = 1;
  let contentOrigin: number | undefined;
  let quote: string | null = null;
  let inLineComment = false;

  const endLine = (): void => {
    lines.push(current);
    origins.push(contentOrigin ?? sourceLine);
    current = '';
    contentOrigin = undefined;
  };

  let i = 0;
  while (i < text.length) {
    if (options.quoteAwareComments && quote === null && text.startsWith(LINE_COMMENT, i)) {
      inLineComment = true;
    }
    if (quote === null && !inLineComment && text.startsWith(BLOCK_OPEN, i)) {
      const close = text.indexOf(BLOCK_CLOSE, i + BLOCK_OPEN.length);
      if (close === -1) {
        if (options.unterminatedComment === 'error') {
          throw new FormatError('Unterminated block comment', sourceLine, sourceLineAt(text, i));
        }
        log.debug('unterminated_block_comment', { line: sourceLine });
        break;
      }
      const end = close + BLOCK_CLOSE.length;
      sourceLine += countNewlines(text, i, end);
      i = end;
      continue;
    }

    const char = text.charAt(i);
    i++;

    if (char === '\n') {
      endLine();
      sourceLine++;
      quote = null;
      inLineComment = false;
      continue;
    }

    current += char;
    if (contentOrigin === undefined && !isWhitespace(char)) {
      contentOrigin = sourceLine;
    }
    if (options.quoteAwareComments && !inLineComment) {
      if (quote === null && isQuote(char)) {
        quote = char;
      } else if (char === quote) {
        quote = null;
      }
    }
  }
  endLine();

  return { lines, origins };
}

/**
 * Removes all comments and returns the cleaned lines with their source line
 * numbers. Lines are not trimmed and blank lines are kept.
 *
 * @param text - Raw YINI text.
 * @param options - Comment handling options.
 * @param log - Logger for debug tracing.
 * @throws FormatError for an unterminated block comment under the `error` policy.
 *
 * @example
 * ```typescript
 * preprocess('k = 1 // note\n/* a\nb *\/ m = 2');
 * // [{ lineNumber: 1, text: 'k = 1 ' }, { lineNumber: 3, text: ' m = 2' }]
 * ```
 */
export function preprocess(
  text: string,
  options: Partial<CommentOptions> = {},
  log: Logger = defaultLogger
): SourceLine[] {
  const resolved: CommentOptions = {
    quoteAwareComments: options.quoteAwareComments ?? DEFAULT_PARSER_OPTIONS.quoteAwareComments,
    unterminatedComment: options.unterminatedComment ?? DEFAULT_PARSER_OPTIONS.unterminatedComment,
  };
  const { lines, origins } = stripBlockComments(text, resolved, log);

  return lines.map((line, index) => {
    const commentAt = findLineComment(line, resolved.quoteAwareComments);
    return {
      lineNumber: origins[index] ?? index + 1,
      text: commentAt === -1 ? line : line.slice(0, commentAt),
    };
  });
}

/**
 * Removes block and line comments, returning plain text.
 *
 * @example
 * ```typescript
 * stripComments("a = 1 // one\nb = 2"); // "a = 1 \nb = 2"
 * ```
 */
export function stripComments(text: string, options: Partial<CommentOptions> = {}): string {
  return preprocess(text, options)
    .map((line) => line.text)
    .join('\n');
}
