/**
 * Line-oriented YINI parser.
 *
 * Each non-blank cleaned line is either a section header (a run of `^`
 * followed by a name, the run length giving the depth) or a `key = literal`
 * assignment that targets the innermost open section.
 *
 * @packageDocumentation
 */

import { Section } from '../document/section.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { FormatError } from './errors.js';
import { parseLiteral } from './literal.js';
import { preprocess } from './preprocessor.js';
import { DEFAULT_PARSER_OPTIONS, type ParserOptions } from './types.js';

/** Character whose leading run marks a section header. */
export const NESTING_MARKER = '^';

/**
 * An open section on the depth stack.
 */
interface OpenSection {
  readonly name: string;
  /** Depth as written in the header (length of the marker run). */
  readonly depth: number;
}

/**
 * Counts the leading run of nesting markers.
 */
export function countMarkers(line: string): number {
  let count = 0;
  while (line.charAt(count) === NESTING_MARKER) {
    count++;
  }
  return count;
}

/**
 * Fills unset options from the defaults.
 */
export function resolveParserOptions(options: Partial<ParserOptions> = {}): ParserOptions {
  return {
    strictDepth: options.strictDepth ?? DEFAULT_PARSER_OPTIONS.strictDepth,
    strictLiterals: options.strictLiterals ?? DEFAULT_PARSER_OPTIONS.strictLiterals,
    quoteAwareComments: options.quoteAwareComments ?? DEFAULT_PARSER_OPTIONS.quoteAwareComments,
    unterminatedComment: options.unterminatedComment ?? DEFAULT_PARSER_OPTIONS.unterminatedComment,
  };
}

/**
 * Parses YINI text into an existing section, adding to whatever it already
 * holds. Assignments overwrite earlier values for the same key.
 *
 * The target is left partially populated if an error is thrown; callers that
 * need all-or-nothing behavior clear it on failure (as `YiniDocument` does).
 *
 * @param root - Section that receives top-level properties and sections.
 * @param text - Raw YINI text.
 * @param options - Parser options.
 * @param log - Logger for debug tracing.
 * @throws FormatError on the first malformed line.
 */
export function parseInto(
  root: Section,
  text: string,
  options: Partial<ParserOptions> = {},
  log: Logger = defaultLogger
): void {
  const resolved = resolveParserOptions(options);
  const stack: OpenSection[] = [];
  let assignments = 0;

  for (const { lineNumber, text: raw } of preprocess(text, resolved, log)) {
    const line = raw.trim();
    if (line.length === 0) {
      continue;
    }

    const depth = countMarkers(line);

    if (depth > 0) {
      const name = line.slice(depth).trim();
      if (name.length === 0) {
        throw new FormatError('Empty section name', lineNumber, line);
      }

      const parentDepth = stack[stack.length - 1]?.depth ?? 0;
      if (depth > parentDepth + 1) {
        if (resolved.strictDepth) {
          throw new FormatError(
            `Section depth ${String(depth)} skips a level`,
            lineNumber,
            line
          );
        }
        log.debug('depth_skipped', { name, depth, parentDepth, line: lineNumber });
      }

      while (stack.length > 0 && (stack[stack.length - 1]?.depth ?? 0) >= depth) {
        stack.pop();
      }
      stack.push({ name, depth });
      openSection(root, stack);
      log.debug('section_opened', { name, depth, line: lineNumber });
      continue;
    }

    const equalsAt = line.indexOf('=');
    if (equalsAt === -1) {
      throw new FormatError('Invalid line format', lineNumber, line);
    }

    const key = line.slice(0, equalsAt).trim();
    if (key.length === 0) {
      throw new FormatError('Empty key', lineNumber, line);
    }

    const value = parseLiteral(line.slice(equalsAt + 1), resolved, { lineNumber, line });
    openSection(root, stack).set(key, value);
    assignments++;
  }

  log.debug('parse_completed', { assignments, openSections: stack.length });
}

/**
 * Walks the open-section path from the root, creating sections as needed.
 */
function openSection(root: Section, stack: readonly OpenSection[]): Section {
  let current = root;
  for (const open of stack) {
    current = current.section(open.name);
  }
  return current;
}

/**
 * Parses YINI text into a new root section.
 *
 * @example
 * ```typescript
 * const root = parse("^ server\nport = 8080");
 * root.getSection('server').get('port').asInteger(); // 8080
 * ```
 */
export function parse(
  text: string,
  options: Partial<ParserOptions> = {},
  log: Logger = defaultLogger
): Section {
  const root = new Section();
  parseInto(root, text, options, log);
  return root;
}
