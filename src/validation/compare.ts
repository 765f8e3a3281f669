/**
 * Value comparison
 *
 * Works on values from any vm realm: arrays are recognised with
 * Array.isArray and objects are compared by their own data properties.
 */

import { complexParts, ownDataValue, type ComplexParts } from '../core/values.js';

/** Real or complex number as parts; null for anything else */
export function numericParts(value: unknown): ComplexParts | null {
  if (typeof value === 'number') return { re: value, im: 0 };
  return complexParts(value);
}

function sameNumber(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

function ownDataKeys(target: object): string[] | null {
  const keys = Object.keys(target);
  for (const key of keys) {
    const descriptor = Object.getOwnPropertyDescriptor(target, key);
    if (!descriptor || !('value' in descriptor)) return null;
  }
  return keys.sort();
}

/**
 * Structural equality. NaN equals NaN, a real number equals a complex
 * number with zero imaginary part, and functions compare by identity.
 */
export function valuesEqual(actual: unknown, expected: unknown, seen: Map<object, object> = new Map()): boolean {
  const actualNumber = numericParts(actual);
  const expectedNumber = numericParts(expected);
  if (actualNumber || expectedNumber) {
    return (
      !!actualNumber &&
      !!expectedNumber &&
      sameNumber(actualNumber.re, expectedNumber.re) &&
      sameNumber(actualNumber.im, expectedNumber.im)
    );
  }

  if (actual === expected) return true;
  if (typeof actual !== 'object' || typeof expected !== 'object' || actual === null || expected === null) {
    return false;
  }

  const a: object = actual;
  const e: object = expected;
  if (seen.get(a) === e) return true;
  seen.set(a, e);

  if (Array.isArray(a) || Array.isArray(e)) {
    if (!Array.isArray(a) || !Array.isArray(e) || a.length !== e.length) return false;
    const expectedItems: unknown[] = e;
    return a.every((item: unknown, i: number) => valuesEqual(item, expectedItems[i], seen));
  }

  const actualKeys = ownDataKeys(a);
  const expectedKeys = ownDataKeys(e);
  if (!actualKeys || !expectedKeys || actualKeys.length !== expectedKeys.length) return false;
  return actualKeys.every(
    (key, i) => key === expectedKeys[i] && valuesEqual(ownDataValue(a, key), ownDataValue(e, key), seen)
  );
}

export type ToleranceCheck = 'within' | 'outside' | 'non-numeric';

/**
 * Inclusive tolerance check. Complex values pass when the real and
 * imaginary differences are each within tolerance.
 */
export function compareWithTolerance(actual: unknown, expected: unknown, tolerance: number): ToleranceCheck {
  const a = numericParts(actual);
  const e = numericParts(expected);
  if (!a || !e) return 'non-numeric';
  return Math.abs(a.re - e.re) <= tolerance && Math.abs(a.im - e.im) <= tolerance ? 'within' : 'outside';
}

const FLOAT_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const SPECIAL_FLOATS: Record<string, number> = {
  inf: Infinity,
  '+inf': Infinity,
  '-inf': -Infinity,
  infinity: Infinity,
  '+infinity': Infinity,
  '-infinity': -Infinity,
  nan: NaN,
};

/** Parse a number the way a printed token reads; null when it is not one */
export function parseNumber(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (typeof value !== 'string') return null;

  const text = value.trim();
  if (FLOAT_TEXT.test(text)) return Number(text);
  const special = text.toLowerCase();
  return Object.prototype.hasOwnProperty.call(SPECIAL_FLOATS, special) ? SPECIAL_FLOATS[special] ?? null : null;
}
