/**
 * Section tree for YINI documents.
 *
 * A section owns its properties (key → {@link Value}) and its child sections
 * (name → Section). Children are never shared between parents, so the tree
 * cannot contain cycles. Both maps keep insertion order, which is the order
 * the writer emits them in.
 *
 * @packageDocumentation
 */

import { TypedMap } from '../utils/typed-map.js';
import { NotFoundError } from './errors.js';
import { Value, type JsonValue, type ValueInput } from './value.js';

/**
 * Plain-object form of a section returned by {@link Section.toJSON}.
 */
export interface SectionJson {
  [key: string]: JsonValue | SectionJson;
}

function requireName(name: string, what: string): void {
  if (name.length === 0) {
    throw new RangeError(`${what} must be a non-empty string`);
  }
}

function defineEntry(target: SectionJson, key: string, value: JsonValue | SectionJson): void {
  // defineProperty keeps a key such as "__proto__" an own data property
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * A node in the document tree.
 *
 * `section(name)` creates missing children on access; `trySection`,
 * `resolve` and `tryGet` never modify the tree.
 *
 * @example
 * ```typescript
 * const root = new Section();
 * root.section('server').section('connection').set('port', 8080);
 *
 * root.resolve(['server', 'connection'])?.get('port').asInteger(); // 8080
 * root.trySection('client');                                      // undefined
 * root.getSection('client');                                      // throws NotFoundError
 * ```
 */
export class Section {
  private readonly values = new TypedMap<string, Value>();
  private readonly children = new TypedMap<string, Section>();

  /**
   * Stores a property, replacing any existing value for the key.
   *
   * @param key - Non-empty property key.
   * @param value - A Value or plain input converted with {@link Value.from}.
   * @returns This section for chaining.
   * @throws RangeError if the key is empty.
   */
  set(key: string, value: ValueInput): this {
    requireName(key, 'Property key');
    this.values.set(key, Value.from(value));
    return this;
  }

  /**
   * Strict property lookup.
   *
   * @throws NotFoundError if the key does not exist.
   */
  get(key: string): Value {
    const value = this.values.get(key);
    if (value === undefined) {
      throw new NotFoundError('property', key);
    }
    return value;
  }

  /**
   * Property lookup that returns undefined for a missing key.
   */
  tryGet(key: string): Value | undefined {
    return this.values.get(key);
  }

  hasProperty(key: string): boolean {
    return this.values.has(key);
  }

  /**
   * Removes a property.
   *
   * @returns Whether the key existed.
   */
  deleteProperty(key: string): boolean {
    return this.values.delete(key);
  }

  /**
   * Returns the named child, creating an empty one if it does not exist.
   *
   * @throws RangeError if the name is empty.
   */
  section(name: string): Section {
    requireName(name, 'Section name');
    return this.children.getOrCreate(name, () => new Section());
  }

  /**
   * Strict child lookup.
   *
   * @throws NotFoundError if the section does not exist.
   */
  getSection(name: string): Section {
    const child = this.children.get(name);
    if (child === undefined) {
      throw new NotFoundError('section', name);
    }
    return child;
  }

  trySection(name: string): Section | undefined {
    return this.children.get(name);
  }

  hasSection(name: string): boolean {
    return this.children.has(name);
  }

  /**
   * Detaches a child section together with its subtree.
   *
   * @returns Whether the section existed.
   */
  removeSection(name: string): boolean {
    return this.children.delete(name);
  }

  /**
   * Follows a path of child names without creating anything.
   *
   * @param path - Child names from this section downward; empty means this section.
   * @returns The addressed section, or undefined if any step is missing.
   */
  resolve(path: readonly string[]): Section | undefined {
    let current: Section | undefined = this;
    for (const name of path) {
      current = current.trySection(name);
      if (current === undefined) {
        return undefined;
      }
    }
    return current;
  }

  /**
   * Iterates properties in insertion order.
   */
  properties(): IterableIterator<[string, Value]> {
    return this.values.entries();
  }

  /**
   * Iterates child sections in insertion order.
   */
  sections(): IterableIterator<[string, Section]> {
    return this.children.entries();
  }

  get propertyCount(): number {
    return this.values.size;
  }

  get sectionCount(): number {
    return this.children.size;
  }

  isEmpty(): boolean {
    return this.values.size === 0 && this.children.size === 0;
  }

  /**
   * Drops every property and child section.
   */
  clear(): void {
    this.values.clear();
    this.children.clear();
  }

  /**
   * Structural equality. Order of properties and children is not compared.
   */
  equals(other: Section): boolean {
    if (this.values.size !== other.values.size || this.children.size !== other.children.size) {
      return false;
    }
    for (const [key, value] of this.values) {
      const counterpart = other.values.get(key);
      if (counterpart === undefined || !value.equals(counterpart)) {
        return false;
      }
    }
    for (const [name, child] of this.children) {
      const counterpart = other.children.get(name);
      if (counterpart === undefined || !child.equals(counterpart)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Returns a plain object with properties first, then child sections.
   * A child section replaces a property of the same name.
   */
  toJSON(): SectionJson {
    const result: SectionJson = {};
    for (const [key, value] of this.values) {
      defineEntry(result, key, value.toJSON());
    }
    for (const [name, child] of this.children) {
      defineEntry(result, name, child.toJSON());
    }
    return result;
  }
}
