/**
 * YiniDocument: an owned section tree with parse and serialize.
 *
 * @packageDocumentation
 */

import { parseInto, resolveParserOptions } from '../parser/line-parser.js';
import type { ParserOptions } from '../parser/types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { serialize, type WriterOptions } from '../writer/writer.js';
import { Section } from './section.js';
import type { Value, ValueInput } from './value.js';

/**
 * Options for a YiniDocument.
 */
export interface YiniDocumentOptions {
  /** Parser options applied to every `parse` and `merge`. */
  parser?: Partial<ParserOptions>;
  /** Writer options applied by `serialize`. */
  writer?: Partial<WriterOptions>;
  /** Logger for parser tracing. */
  logger?: Logger;
}

/**
 * A YINI document: one root section that lives as long as the document.
 *
 * `parse` replaces the whole tree; `merge` adds a second source on top of the
 * current tree. A failed parse or merge leaves the tree empty, never half
 * populated.
 *
 * @example
 * ```typescript
 * const doc = new YiniDocument();
 * doc.parse("host = 'localhost'\n^ server\nport = 8080");
 *
 * doc.get('host').asText();                          // "localhost"
 * doc.section('server').get('port').asInteger();     // 8080
 *
 * doc.section('server').set('timeout', 30.5);
 * doc.serialize();
 * // "host = 'localhost'\n\n^ server\n    port = 8080\n    timeout = 30.5\n"
 * ```
 */
export class YiniDocument {
  /** The root section. Cleared and refilled by `parse`, never replaced. */
  public readonly root = new Section();

  private readonly parserOptions: ParserOptions;
  private readonly writerOptions: Partial<WriterOptions>;
  private readonly logger: Logger;

  /**
   * Creates an empty document.
   *
   * @param options - Parser, writer and logging options.
   */
  constructor(options: YiniDocumentOptions = {}) {
    this.parserOptions = resolveParserOptions(options.parser);
    this.writerOptions = { ...options.writer };
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Replaces the tree with the contents of `text`.
   *
   * @returns This document for chaining.
   * @throws FormatError on the first malformed line; the tree is then empty.
   */
  parse(text: string): this {
    this.root.clear();
    return this.merge(text);
  }

  /**
   * Parses `text` into the existing tree. Later values overwrite earlier
   * ones; sections with the same path are combined.
   *
   * @returns This document for chaining.
   * @throws FormatError on the first malformed line; the tree is then empty.
   */
  merge(text: string): this {
    try {
      parseInto(this.root, text, this.parserOptions, this.logger);
    } catch (error) {
      this.root.clear();
      throw error;
    }
    return this;
  }

  /**
   * Serializes the tree with the document's writer options.
   */
  serialize(): string {
    return serialize(this.root, this.writerOptions);
  }

  /** Strict lookup of a top-level property. */
  get(key: string): Value {
    return this.root.get(key);
  }

  tryGet(key: string): Value | undefined {
    return this.root.tryGet(key);
  }

  set(key: string, value: ValueInput): this {
    this.root.set(key, value);
    return this;
  }

  has(key: string): boolean {
    return this.root.hasProperty(key);
  }

  /** Get-or-create a top-level section. */
  section(name: string): Section {
    return this.root.section(name);
  }

  /**
   * Looks up a value by dotted path, e.g. `server.connection.port`: every
   * segment but the last names a section, the last names a property.
   *
   * @returns The value, or undefined when any part of the path is missing.
   */
  lookup(path: string): Value | undefined {
    const segments = path.split('.');
    const key = segments.pop();
    if (key === undefined) {
      return undefined;
    }
    return this.root.resolve(segments)?.tryGet(key);
  }
}
