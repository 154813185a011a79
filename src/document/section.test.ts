import { describe, expect, it } from 'vitest';
import { NotFoundError, TypeCoercionError } from './errors.js';
import { Section } from './section.js';
import { Value } from './value.js';

describe('Section', () => {
  describe('properties', () => {
    it('should store plain input as typed values', () => {
      const section = new Section();
      section.set('port', 8080).set('ratio', 0.5).set('name', 'demo');

      expect(section.get('port').kind).toBe('integer');
      expect(section.get('ratio').kind).toBe('real');
      expect(section.get('name').asText()).toBe('demo');
      expect(section.propertyCount).toBe(3);
    });

    it('should overwrite an existing key in place', () => {
      const section = new Section();
      section.set('a', 1).set('b', 2).set('a', 3);

      expect([...section.properties()].map(([key, value]) => [key, value.asInteger()])).toEqual([
        ['a', 3],
        ['b', 2],
      ]);
    });

    it('should reject an empty key', () => {
      expect(() => new Section().set('', 1)).toThrow('Property key must be a non-empty string');
    });

    it('should raise NotFoundError for a missing key, never TypeCoercionError', () => {
      const section = new Section();
      section.set('present', 'x');

      expect(section.hasProperty('missing')).toBe(false);
      expect(section.tryGet('missing')).toBeUndefined();
      expect(() => section.get('missing')).toThrow(NotFoundError);
      expect(() => section.get('missing')).not.toThrow(TypeCoercionError);
      expect(() => section.get('missing')).toThrow('Key not found: missing');
    });

    it('should delete a property', () => {
      const section = new Section();
      section.set('a', true);

      expect(section.deleteProperty('a')).toBe(true);
      expect(section.deleteProperty('a')).toBe(false);
      expect(section.isEmpty()).toBe(true);
    });
  });

  describe('child sections', () => {
    it('should create a child on first access and return it afterwards', () => {
      const root = new Section();
      const first = root.section('server');
      const second = root.section('server');

      expect(first).toBe(second);
      expect(root.sectionCount).toBe(1);
    });

    it('should not create children on read-only lookups', () => {
      const root = new Section();

      expect(root.trySection('server')).toBeUndefined();
      expect(root.hasSection('server')).toBe(false);
      expect(root.resolve(['server', 'connection'])).toBeUndefined();
      expect(root.sectionCount).toBe(0);
    });

    it('should raise NotFoundError for a missing section', () => {
      const root = new Section();

      expect(() => root.getSection('client')).toThrow('Section not found: client');
      try {
        root.getSection('client');
      } catch (error) {
        expect(error).toMatchObject({ name: 'NotFoundError', kind: 'section', key: 'client' });
      }
    });

    it('should reject an empty section name', () => {
      expect(() => new Section().section('')).toThrow('Section name must be a non-empty string');
    });

    it('should resolve nested paths', () => {
      const root = new Section();
      root.section('a').section('b').set('x', 1);

      expect(root.resolve([])).toBe(root);
      expect(root.resolve(['a', 'b'])?.get('x').asInteger()).toBe(1);
    });

    it('should remove a child with its subtree', () => {
      const root = new Section();
      root.section('a').section('b');

      expect(root.removeSection('a')).toBe(true);
      expect(root.removeSection('a')).toBe(false);
      expect(root.isEmpty()).toBe(true);
    });
  });

  describe('clear', () => {
    it('should drop properties and children', () => {
      const root = new Section();
      root.set('k', 1).section('s').set('x', 2);
      root.clear();

      expect(root.isEmpty()).toBe(true);
      expect(root.propertyCount).toBe(0);
      expect(root.sectionCount).toBe(0);
    });
  });

  describe('equals', () => {
    it('should ignore insertion order', () => {
      const a = new Section();
      a.set('x', 1).set('y', 'two');
      a.section('s').set('z', true);
      a.section('t');

      const b = new Section();
      b.section('t');
      b.section('s').set('z', true);
      b.set('y', 'two').set('x', 1);

      expect(a.equals(b)).toBe(true);
    });

    it('should compare value variants', () => {
      const a = new Section().set('x', Value.integer(1));
      const b = new Section().set('x', Value.real(1));

      expect(a.equals(b)).toBe(false);
    });

    it('should compare nested sections', () => {
      const a = new Section();
      a.section('s').set('z', 1);
      const b = new Section();
      b.section('s').set('z', 2);

      expect(a.equals(b)).toBe(false);
    });
  });

  describe('toJSON', () => {
    it('should produce properties then sections', () => {
      const root = new Section();
      root.set('name', 'demo').set('tags', ['a', 1]);
      root.section('server').set('port', 8080);

      expect(root.toJSON()).toEqual({
        name: 'demo',
        tags: ['a', 1],
        server: { port: 8080 },
      });
      expect(Object.keys(root.toJSON())).toEqual(['name', 'tags', 'server']);
    });

    it('should let a section replace a property of the same name', () => {
      const root = new Section();
      root.set('db', 'sqlite');
      root.section('db').set('path', 'data.db');

      expect(root.toJSON()).toEqual({ db: { path: 'data.db' } });
    });

    it('should keep __proto__ as an own property', () => {
      const root = new Section();
      root.set('__proto__', 'value');
      const json = root.toJSON();

      expect(Object.keys(json)).toEqual(['__proto__']);
      expect(Object.getPrototypeOf(json)).toBe(Object.prototype);
    });
  });
});
