/**
 * Value literal parsing.
 *
 * Resolution order, first match wins:
 * 1. `'...'` or `"..."` → text, quotes removed, no escapes
 * 2. `[...]` → array, elements split on top-level commas and parsed recursively
 * 3. `true/yes/on`, `false/no/off` (any case) → boolean
 * 4. contains `.` → real, otherwise integer, when the whole literal is numeric
 * 5. anything else → the literal itself as text
 *
 * @packageDocumentation
 */

import {
  Value,
  matchBooleanKeyword,
  parseIntegerLiteral,
  parseRealLiteral,
} from '../document/value.js';
import { FormatError } from './errors.js';
import { DEFAULT_PARSER_OPTIONS, type LiteralOptions } from './types.js';

/**
 * Where a literal came from, for error reporting.
 */
export interface LiteralLocation {
  readonly lineNumber: number;
  readonly line: string;
}

function isQuote(char: string): boolean {
  return char === "'" || char === '"';
}

function isQuoted(text: string): boolean {
  const first = text.charAt(0);
  return text.length >= 2 && isQuote(first) && text.charAt(text.length - 1) === first;
}

/**
 * Splits array content on commas that are outside nested brackets and quotes.
 * Segments are returned untrimmed; blank segments are kept.
 *
 * @example
 * ```typescript
 * splitTopLevel("1, [2, 3], 'a, b'"); // ['1', ' [2, 3]', " 'a, b'"]
 * ```
 */
export function splitTopLevel(content: string): string[] {
  const segments: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let start = 0;

  for (let i = 0; i < content.length; i++) {
    const char = content.charAt(i);
    if (quote !== null) {
      if (char === quote) {
        quote = null;
      }
    } else if (isQuote(char)) {
      quote = char;
    } else if (char === '[') {
      depth++;
    } else if (char === ']') {
      depth = Math.max(0, depth - 1);
    } else if (char === ',' && depth === 0) {
      segments.push(content.slice(start, i));
      start = i + 1;
    }
  }
  segments.push(content.slice(start));

  return segments;
}

function parseArray(content: string, options: LiteralOptions, location: LiteralLocation): Value {
  const elements: Value[] = [];
  for (const segment of splitTopLevel(content)) {
    const item = segment.trim();
    if (item.length > 0) {
      elements.push(parseWith(item, options, location));
    }
  }
  return Value.array(elements);
}

function checkTerminated(text: string, location: LiteralLocation): void {
  const first = text.charAt(0);
  if (isQuote(first) && !isQuoted(text)) {
    throw new FormatError('Unterminated quoted literal', location.lineNumber, location.line);
  }
  if (first === '[' && !text.endsWith(']')) {
    throw new FormatError('Unterminated array literal', location.lineNumber, location.line);
  }
}

function parseWith(text: string, options: LiteralOptions, location: LiteralLocation): Value {
  if (isQuoted(text)) {
    return Value.text(text.slice(1, -1));
  }

  if (text.startsWith('[') && text.endsWith(']')) {
    return parseArray(text.slice(1, -1), options, location);
  }

  if (options.strictLiterals) {
    checkTerminated(text, location);
  }

  const keyword = matchBooleanKeyword(text);
  if (keyword !== undefined) {
    return Value.boolean(keyword);
  }

  if (text.includes('.')) {
    const real = parseRealLiteral(text);
    if (real !== undefined) {
      return Value.real(real);
    }
  } else {
    const integer = parseIntegerLiteral(text);
    if (integer !== undefined) {
      return Value.integer(integer);
    }
  }

  return Value.text(text);
}

/**
 * Parses a single literal into a Value.
 *
 * @param text - The literal; surrounding whitespace is ignored.
 * @param options - Literal options; `strictLiterals` rejects unterminated quotes and arrays.
 * @param location - Source position reported by a FormatError; defaults to
 * line 1 with the literal itself as the line text.
 * @throws FormatError in strict mode for an unterminated quote or array.
 *
 * @example
 * ```typescript
 * parseLiteral("'8080'").kind;       // 'text'
 * parseLiteral('8080').kind;         // 'integer'
 * parseLiteral('30.5').kind;         // 'real'
 * parseLiteral('Off').asBoolean();   // false
 * parseLiteral("[1, 'two', true]").asArray().length; // 3
 * parseLiteral('localhost').kind;    // 'text'
 * ```
 */
export function parseLiteral(
  text: string,
  options: Partial<LiteralOptions> = {},
  location?: LiteralLocation
): Value {
  const trimmed = text.trim();
  const resolved: LiteralOptions = {
    strictLiterals: options.strictLiterals ?? DEFAULT_PARSER_OPTIONS.strictLiterals,
  };
  return parseWith(trimmed, resolved, location ?? { lineNumber: 1, line: trimmed });
}
