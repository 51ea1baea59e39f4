/**
 * Type classification of parsed JSON values
 */

import { describe, it, expect } from 'vitest';
import { classify, isComposite, isPlainObject } from '../../src/lib/classifier/index.js';

describe('classify', () => {
  it('should classify JSON scalars', () => {
    expect(classify(null)).toBe('null');
    expect(classify(true)).toBe('boolean');
    expect(classify(false)).toBe('boolean');
    expect(classify('hello')).toBe('string');
    expect(classify('')).toBe('string');
  });

  it('should depend on the shape of a number, not its value', () => {
    expect(classify(0)).toBe('integer');
    expect(classify(42)).toBe('integer');
    expect(classify(-7)).toBe('integer');
    expect(classify(4.2)).toBe('float');
    expect(classify(-0.5)).toBe('float');
  });

  it('should classify composites', () => {
    expect(classify([])).toBe('array');
    expect(classify([1, 'a'])).toBe('array');
    expect(classify({})).toBe('object');
    expect(classify({ nested: { deep: true } })).toBe('object');
    expect(classify(Object.create(null))).toBe('object');
  });

  it('should fall back to the runtime type name for non-JSON values', () => {
    expect(classify(undefined)).toBe('undefined');
    expect(classify(10n)).toBe('bigint');
    expect(classify(new Date(0))).toBe('Date');
    expect(classify(new Map())).toBe('Map');
  });
});

describe('isPlainObject', () => {
  it('should accept only plain objects', () => {
    expect(isPlainObject({ a: 1 })).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject(new Date(0))).toBe(false);
    expect(isPlainObject('x')).toBe(false);
  });
});

describe('isComposite', () => {
  it('should treat only objects and arrays as composite', () => {
    expect(isComposite('object')).toBe(true);
    expect(isComposite('array')).toBe(true);
    expect(isComposite('string')).toBe(false);
    expect(isComposite('Date')).toBe(false);
  });
});
