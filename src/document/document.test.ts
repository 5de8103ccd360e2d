import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  describeValue,
  getOwn,
  isDocumentNode,
  isMapping,
  isScalar,
  isSequence,
  nodeKind,
  setOwn,
} from './document.js';
import type { DocumentMapping } from './types.js';

describe('document helpers', () => {
  describe('isScalar', () => {
    it('accepts strings, numbers, booleans and null', () => {
      expect(isScalar('a')).toBe(true);
      expect(isScalar(1.5)).toBe(true);
      expect(isScalar(false)).toBe(true);
      expect(isScalar(null)).toBe(true);
    });

    it('rejects undefined, containers and other values', () => {
      expect(isScalar(undefined)).toBe(false);
      expect(isScalar([])).toBe(false);
      expect(isScalar({})).toBe(false);
      expect(isScalar(BigInt(1))).toBe(false);
    });
  });

  describe('isMapping', () => {
    it('accepts plain and null-prototype objects', () => {
      expect(isMapping({ a: 1 })).toBe(true);
      expect(isMapping(Object.create(null))).toBe(true);
    });

    it('rejects arrays, class instances and dates', () => {
      class Point {
        x = 1;
      }
      expect(isMapping([])).toBe(false);
      expect(isMapping(new Point())).toBe(false);
      expect(isMapping(new Date(0))).toBe(false);
      expect(isMapping(null)).toBe(false);
    });
  });

  describe('isSequence', () => {
    it('accepts arrays only', () => {
      expect(isSequence([1, 'a'])).toBe(true);
      expect(isSequence({ length: 0 })).toBe(false);
    });
  });

  describe('isDocumentNode', () => {
    it('checks nested values', () => {
      expect(isDocumentNode({ a: [1, { b: null }], c: 'x' })).toBe(true);
      expect(isDocumentNode({ a: [1, { b: undefined }] })).toBe(false);
      expect(isDocumentNode([() => 1])).toBe(false);
      expect(isDocumentNode({ when: new Date(0) })).toBe(false);
    });

    it('accepts any JSON value (property-based)', () => {
      fc.assert(
        fc.property(fc.jsonValue(), (value) => {
          expect(isDocumentNode(value)).toBe(true);
        })
      );
    });
  });

  describe('nodeKind', () => {
    it('names every kind', () => {
      expect(nodeKind(null)).toBe('null');
      expect(nodeKind('a')).toBe('string');
      expect(nodeKind(3)).toBe('number');
      expect(nodeKind(true)).toBe('boolean');
      expect(nodeKind([])).toBe('sequence');
      expect(nodeKind({})).toBe('mapping');
    });
  });

  describe('describeValue', () => {
    it('uses node kinds for document values', () => {
      expect(describeValue([1])).toBe('sequence');
      expect(describeValue({ a: 1 })).toBe('mapping');
    });

    it('names other values by type or class', () => {
      class Endpoint {}
      expect(describeValue(undefined)).toBe('undefined');
      expect(describeValue(new Endpoint())).toBe('Endpoint');
      expect(describeValue(new Date(0))).toBe('Date');
      expect(describeValue(() => 1)).toBe('function');
      expect(describeValue(BigInt(2))).toBe('bigint');
    });
  });

  describe('getOwn and setOwn', () => {
    it('ignores inherited keys', () => {
      const mapping: DocumentMapping = { port: 5432 };

      expect(getOwn(mapping, 'port')).toBe(5432);
      expect(getOwn(mapping, 'constructor')).toBeUndefined();
      expect(getOwn(mapping, 'toString')).toBeUndefined();
    });

    it('stores __proto__ as an ordinary key', () => {
      const mapping: DocumentMapping = {};

      setOwn(mapping, '__proto__', 'value');

      expect(Object.keys(mapping)).toEqual(['__proto__']);
      expect(getOwn(mapping, '__proto__')).toBe('value');
      expect(Object.getPrototypeOf(mapping)).toBe(Object.prototype);
    });

    it('keeps insertion order', () => {
      const mapping: DocumentMapping = {};
      setOwn(mapping, 'b', 1);
      setOwn(mapping, 'a', 2);
      setOwn(mapping, 'b', 3);

      expect(Object.entries(mapping)).toEqual([
        ['b', 3],
        ['a', 2],
      ]);
    });
  });
});
