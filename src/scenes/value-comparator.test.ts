/**
 * Tests for tolerant value and color comparison.
 */

import { describe, it, expect } from 'vitest';
import { attributeEqual, colorsEqual, valuesEqual } from './value-comparator.ts';

describe('valuesEqual', () => {
  it('treats every value as equal to itself', () => {
    const values = ['on', 42, 0.5, true, null, [1, 2, 3], { a: 1, b: [2, 3] }];
    for (const value of values) {
      expect(valuesEqual(value, value, 0)).toBe(true);
    }
  });

  it('matches numbers within the tolerance, inclusive', () => {
    expect(valuesEqual(5, 8, 3)).toBe(true);
    expect(valuesEqual(8, 5, 3)).toBe(true);
    expect(valuesEqual(5, 8.001, 3)).toBe(false);
  });

  it('compares strings exactly', () => {
    expect(valuesEqual('on', 'on', 5)).toBe(true);
    expect(valuesEqual('on', 'off', 5)).toBe(false);
    expect(valuesEqual('5', 5, 5)).toBe(false);
  });

  it('checks mappings one way', () => {
    expect(valuesEqual({ a: 1 }, { a: 1, b: 2 }, 0)).toBe(true);
    expect(valuesEqual({ a: 1, b: 2 }, { a: 1 }, 0)).toBe(false);
    expect(valuesEqual({ a: 10 }, { a: 12 }, 2)).toBe(true);
  });

  it('compares sequences over the shorter length', () => {
    expect(valuesEqual([1, 2, 3], [1, 2], 0)).toBe(true);
    expect(valuesEqual([1], [1, 9, 9], 0)).toBe(true);
    expect(valuesEqual([1, 2], [1, 3], 0)).toBe(false);
    expect(valuesEqual([], [4, 5], 0)).toBe(true);
  });

  it('treats mismatched containers as unequal', () => {
    expect(valuesEqual([1], { a: 1 }, 0)).toBe(false);
    expect(valuesEqual({ a: 1 }, 'a', 0)).toBe(false);
    expect(valuesEqual(null, 0, 0)).toBe(false);
    expect(valuesEqual(null, [], 0)).toBe(false);
  });

  it('treats undefined as equal only to undefined', () => {
    expect(valuesEqual(undefined, undefined, 0)).toBe(true);
    expect(valuesEqual(undefined, null, 0)).toBe(false);
    expect(valuesEqual(undefined, 0, 0)).toBe(false);
  });
});

describe('colorsEqual', () => {
  it('matches identical xy colors at zero tolerance', () => {
    expect(colorsEqual([0.5, 0.5], [0.5, 0.5], 0, true)).toBe(true);
  });

  it('scales xy deltas before the tolerance check', () => {
    expect(colorsEqual([0, 0], [0.02, 0], 3, true)).toBe(true);
    expect(colorsEqual([0, 0], [0.05, 0], 3, true)).toBe(false);
  });

  it('does not scale other encodings', () => {
    expect(colorsEqual([255, 0, 0], [252, 3, 0], 3, false)).toBe(true);
    expect(colorsEqual([255, 0, 0], [251, 0, 0], 3, false)).toBe(false);
  });

  it('handles absent colors', () => {
    expect(colorsEqual(null, undefined, 0, false)).toBe(true);
    expect(colorsEqual(null, [1, 2], 0, false)).toBe(false);
    expect(colorsEqual([1, 2], undefined, 0, false)).toBe(false);
  });

  it('treats non-numeric components and non-sequences as unequal', () => {
    expect(colorsEqual(['a', 0], ['a', 0], 5, false)).toBe(false);
    expect(colorsEqual('red', 'red', 5, false)).toBe(false);
  });
});

describe('attributeEqual', () => {
  it('routes xy_color through the scaled comparison', () => {
    expect(attributeEqual('xy_color', [0.3, 0.3], [0.32, 0.3], 3)).toBe(true);
    expect(attributeEqual('xy_color', [0.3, 0.3], [0.35, 0.3], 3)).toBe(false);
  });

  it('routes other color attributes without scaling', () => {
    expect(attributeEqual('hs_color', [30, 50], [32, 50], 3)).toBe(true);
    expect(attributeEqual('rgb_color', [0.3, 0.3], [0.35, 0.3], 3)).toBe(true);
  });

  it('uses plain value comparison for everything else', () => {
    expect(attributeEqual('brightness', 100, 102, 3)).toBe(true);
    expect(attributeEqual('effect', 'rainbow', 'none', 3)).toBe(false);
  });
});
