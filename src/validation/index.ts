/**
 * Validation Module
 *
 * Pass/fail decisions for variable and output tests.
 */

export type { FailureCode, TestOutcome } from './types.js';
export type { ToleranceCheck } from './compare.js';
export type { FormatPattern } from './format.js';

export { validate, notRun, normalizeWhitespace, outputUnderTest } from './validator.js';
export { valuesEqual, compareWithTolerance, numericParts, parseNumber } from './compare.js';
export { compileFormat, matchFormat } from './format.js';
