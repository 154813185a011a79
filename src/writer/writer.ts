/**
 * Canonical YINI writer.
 *
 * The writer is a pure function of the section tree: sections are emitted
 * depth-first in insertion order, each header indented one level per depth
 * and marked with `depth` copies of `^`, with its properties one level
 * deeper. Comments and original formatting are not reproduced.
 *
 * @packageDocumentation
 */

import type { Section } from '../document/section.js';
import { formatReal, type Value } from '../document/value.js';
import { NESTING_MARKER } from '../parser/line-parser.js';

/**
 * Quote character used for text values.
 */
export type QuoteStyle = 'single' | 'double';

/**
 * Writer options.
 */
export interface WriterOptions {
  /**
   * Spaces per nesting level.
   * @defaultValue 4
   */
  indentWidth: number;

  /** @defaultValue 'single' */
  quote: QuoteStyle;
}

export const DEFAULT_WRITER_OPTIONS: WriterOptions = {
  indentWidth: 4,
  quote: 'single',
};

/**
 * Renders a value as a literal.
 *
 * Text is wrapped in the configured quote without escaping, so text that
 * contains that quote does not read back unchanged.
 *
 * @example
 * ```typescript
 * renderLiteral(Value.from(['a', 1, 2.5, true])); // "['a', 1, 2.5, true]"
 * renderLiteral(Value.real(30));                  // "30.0"
 * ```
 */
export function renderLiteral(value: Value, quote: QuoteStyle = DEFAULT_WRITER_OPTIONS.quote): string {
  const data = value.data;
  switch (data.kind) {
    case 'text': {
      const mark = quote === 'double' ? '"' : "'";
      return `${mark}${data.value}${mark}`;
    }
    case 'integer':
      return String(data.value);
    case 'real':
      return formatReal(data.value);
    case 'boolean':
      return data.value ? 'true' : 'false';
    case 'array':
      return `[${data.value.map((element) => renderLiteral(element, quote)).join(', ')}]`;
    default: {
      const exhaustiveCheck: never = data;
      return exhaustiveCheck;
    }
  }
}

function writeSection(
  lines: string[],
  section: Section,
  depth: number,
  options: WriterOptions
): void {
  const indent = ' '.repeat(options.indentWidth * depth);
  for (const [key, value] of section.properties()) {
    lines.push(`${indent}${key} = ${renderLiteral(value, options.quote)}`);
  }

  for (const [name, child] of section.sections()) {
    if (lines.length > 0) {
      lines.push('');
    }
    lines.push(`${indent}${NESTING_MARKER.repeat(depth + 1)} ${name}`);
    writeSection(lines, child, depth + 1, options);
  }
}

/**
 * Serializes a section tree to YINI text. Every line, including the last,
 * ends with a newline; an empty tree yields an empty string.
 *
 * @example
 * ```typescript
 * const root = new Section();
 * root.set('name', 'demo');
 * root.section('server').set('port', 8080);
 * serialize(root);
 * // "name = 'demo'\n\n^ server\n    port = 8080\n"
 * ```
 */
export function serialize(section: Section, options: Partial<WriterOptions> = {}): string {
  const resolved: WriterOptions = {
    indentWidth: options.indentWidth ?? DEFAULT_WRITER_OPTIONS.indentWidth,
    quote: options.quote ?? DEFAULT_WRITER_OPTIONS.quote,
  };
  const lines: string[] = [];
  writeSection(lines, section, 0, resolved);
  return lines.map((line) => `${line}\n`).join('');
}
