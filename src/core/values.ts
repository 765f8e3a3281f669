/**
 * Notebook Grader - Value helpers
 *
 * Values produced by student code live in another vm realm, so nothing here
 * relies on instanceof or prototype identity. Only own data properties are
 * read: accessors are never invoked from the host.
 */

import { inspect } from 'node:util';

export interface ComplexParts {
  re: number;
  im: number;
}

/** Value of an own data property, or undefined for accessors and missing keys */
export function ownDataValue(target: object, key: string): unknown {
  const descriptor = Object.getOwnPropertyDescriptor(target, key);
  return descriptor && 'value' in descriptor ? descriptor.value : undefined;
}

/** Data property found along the prototype chain (used for Error.name) */
export function inheritedDataValue(target: object, key: string): unknown {
  let current: object | null = target;
  while (current !== null) {
    const descriptor = Object.getOwnPropertyDescriptor(current, key);
    if (descriptor) return 'value' in descriptor ? descriptor.value : undefined;
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

/**
 * Real and imaginary parts of a complex-like value.
 *
 * Accepts sandbox Complex instances ({ re, im }) and test-definition
 * literals ({ real, imag }).
 */
export function complexParts(value: unknown): ComplexParts | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;

  const re = ownDataValue(value, 're');
  const im = ownDataValue(value, 'im');
  if (typeof re === 'number' && typeof im === 'number') return { re, im };

  const real = ownDataValue(value, 'real');
  const imag = ownDataValue(value, 'imag');
  if (typeof real === 'number' && typeof imag === 'number') return { re: real, im: imag };

  return null;
}

export function formatComplex({ re, im }: ComplexParts): string {
  const sign = im < 0 || Object.is(im, -0) ? '-' : '+';
  return `(${re}${sign}${Math.abs(im)}j)`;
}

/** Human-readable rendering for diagnostics */
export function describeValue(value: unknown): string {
  const complex = complexParts(value);
  if (complex) return formatComplex(complex);
  if (typeof value === 'string') return `'${value}'`;
  return inspect(value, { depth: 4, breakLength: Infinity, getters: false, customInspect: false });
}
