/**
 * Tolerant equality over Home Assistant state and attribute values.
 *
 * Numbers match within an absolute tolerance, sequences match over their
 * common prefix, mappings match when the left side is contained in the right.
 * None of these functions throw: any unexpected shape compares as unequal.
 */

import type { AttributeValue } from './types.ts';

type Mapping = { [key: string]: AttributeValue };

/** Scale applied to xy color deltas so they share the tolerance of 0-255 / 0-360 encodings. */
export const XY_COLOR_SCALE = 100;

function isMapping(value: AttributeValue | undefined): value is Mapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAbsent(value: AttributeValue | undefined): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Compare two values with the given numeric tolerance.
 *
 * Mappings are compared one way: every key of `a` must be present and equal
 * in `b`, keys only in `b` are ignored. Sequences are compared over the
 * shorter length, so trailing extra elements on either side are ignored.
 */
export function valuesEqual(
  a: AttributeValue | undefined,
  b: AttributeValue | undefined,
  tolerance: number,
): boolean {
  if (isMapping(a) && isMapping(b)) {
    return mappingsEqual(a, b, tolerance);
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    return sequencesEqual(a, b, tolerance);
  }

  if (typeof a === 'number' && typeof b === 'number') {
    return Math.abs(a - b) <= tolerance;
  }

  if (typeof a === 'object' || typeof b === 'object') {
    // A container against anything else, or null against a container.
    return a === null && b === null;
  }

  return a === b;
}

function mappingsEqual(a: Mapping, b: Mapping, tolerance: number): boolean {
  for (const [key, value] of Object.entries(a)) {
    if (!Object.hasOwn(b, key)) return false;
    if (!valuesEqual(value, b[key], tolerance)) return false;
  }
  return true;
}

function sequencesEqual(a: AttributeValue[], b: AttributeValue[], tolerance: number): boolean {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (!valuesEqual(a[i], b[i], tolerance)) return false;
  }
  return true;
}

/**
 * Compare two color tuples component by component.
 *
 * xy components live roughly in -1..1, so their deltas are multiplied by
 * {@link XY_COLOR_SCALE} before the tolerance check.
 */
export function colorsEqual(
  a: AttributeValue | undefined,
  b: AttributeValue | undefined,
  tolerance: number,
  isXy: boolean,
): boolean {
  if (isAbsent(a) && isAbsent(b)) return true;
  if (isAbsent(a) || isAbsent(b)) return false;
  if (!Array.isArray(a) || !Array.isArray(b)) return false;

  const factor = isXy ? XY_COLOR_SCALE : 1;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i];
    const right = b[i];
    if (typeof left !== 'number' || typeof right !== 'number') return false;
    if (Math.abs(left - right) * factor > tolerance) return false;
  }
  return true;
}

/**
 * Compare one named attribute, routing `*_color` attributes to
 * {@link colorsEqual} and everything else to {@link valuesEqual}.
 */
export function attributeEqual(
  name: string,
  a: AttributeValue | undefined,
  b: AttributeValue | undefined,
  tolerance: number,
): boolean {
  if (name.endsWith('_color')) {
    return colorsEqual(a, b, tolerance, name === 'xy_color');
  }
  return valuesEqual(a, b, tolerance);
}
