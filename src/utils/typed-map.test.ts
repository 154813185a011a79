import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { TypedMap } from './typed-map.js';

describe('TypedMap', () => {
  describe('constructor', () => {
    it('should create an empty TypedMap', () => {
      const map = new TypedMap<string, number>();
      expect(map.size).toBe(0);
    });
  });

  describe('getOrCreate', () => {
    it('should store and return the created value on a miss', () => {
      const map = new TypedMap<string, number[]>();
      const created = map.getOrCreate('list', () => [1]);
      expect(created).toEqual([1]);
      expect(map.get('list')).toBe(created);
    });

    it('should return the existing value without calling the factory', () => {
      const map = new TypedMap<string, number>().set('a', 1);
      let calls = 0;
      const value = map.getOrCreate('a', () => {
        calls++;
        return 99;
      });
      expect(value).toBe(1);
      expect(calls).toBe(0);
    });
  });

  describe('set', () => {
    it('should keep the original position when overwriting a key', () => {
      const map = new TypedMap<string, number>();
      map.set('a', 1).set('b', 2).set('a', 3);
      expect([...map.entries()]).toEqual([
        ['a', 3],
        ['b', 2],
      ]);
    });
  });

  describe('prototype keys', () => {
    it('should store __proto__ and constructor as ordinary keys', () => {
      const map = new TypedMap<string, string>();
      map.set('__proto__', 'p').set('constructor', 'c');
      expect(map.get('__proto__')).toBe('p');
      expect(map.get('constructor')).toBe('c');
      expect(map.size).toBe(2);
    });
  });

  describe('delete and clear', () => {
    it('should report whether a key was removed', () => {
      const map = new TypedMap<string, number>().set('a', 1);
      expect(map.delete('a')).toBe(true);
      expect(map.delete('a')).toBe(false);
    });

    it('should remove all entries on clear', () => {
      const map = new TypedMap<string, number>().set('a', 1).set('b', 2);
      map.clear();
      expect(map.size).toBe(0);
      expect(map.has('a')).toBe(false);
    });
  });

  describe('iteration', () => {
    it('should iterate entries in insertion order', () => {
      const map = new TypedMap<string, number>().set('z', 26).set('a', 1);
      expect([...map.entries()]).toEqual([...map]);
      expect([...map]).toEqual([
        ['z', 26],
        ['a', 1],
      ]);
    });
  });

  describe('property-based tests', () => {
    it('size should equal the number of distinct keys set', () => {
      fc.assert(
        fc.property(fc.array(fc.string()), (keys) => {
          const map = new TypedMap<string, boolean>();
          for (const key of keys) {
            map.set(key, true);
          }
          return map.size === new Set(keys).size;
        }),
        { numRuns: 100 }
      );
    });
  });
});
