/**
 * Type-safe Map wrapper used for section storage.
 *
 * Section keys and names come straight from user-authored files, so they are
 * kept in a Map rather than on a plain object: a key such as `__proto__` or
 * `constructor` is stored like any other string and can never reach the
 * object prototype.
 *
 * @packageDocumentation
 */

/**
 * Insertion-ordered map with enforced key and value types.
 *
 * @example
 * ```ts
 * const map = new TypedMap<string, number>();
 * map.set('a', 1);
 * map.getOrCreate('b', () => 2); // 2, now stored
 * map.get('c');                  // undefined
 * ```
 *
 * @template K - The type of keys in the map.
 * @template V - The type of values in the map.
 */
export class TypedMap<K, V> {
  private readonly map = new Map<K, V>();

  /**
   * Returns the value for a key, or undefined if it is absent.
   */
  get(key: K): V | undefined {
    return this.map.get(key);
  }

  /**
   * Returns the value for a key, inserting the result of `create` first when
   * the key is absent.
   *
   * @param key - The key to look up.
   * @param create - Factory for the value stored on a miss.
   * @returns The existing or newly stored value.
   */
  getOrCreate(key: K, create: () => V): V {
    const existing = this.map.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const created = create();
    this.map.set(key, created);
    return created;
  }

  /**
   * Sets a value for a key. An existing key keeps its position.
   *
   * @returns The TypedMap instance for method chaining.
   */
  set(key: K, value: V): this {
    this.map.set(key, value);
    return this;
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  /**
   * Removes the entry with the specified key.
   *
   * @returns True if the key existed and was removed.
   */
  delete(key: K): boolean {
    return this.map.delete(key);
  }

  entries(): IterableIterator<[K, V]> {
    return this.map.entries();
  }

  get size(): number {
    return this.map.size;
  }

  clear(): void {
    this.map.clear();
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.map[Symbol.iterator]();
  }
}
