/**
 * Test Validator
 *
 * Decides pass/fail for one test case against one execution result.
 * Never throws: every verdict, including a missing variable, is an outcome.
 */

import { describeValue } from '../core/values.js';
import type { OutputTestCase, TestCase, VariableTestCase } from '../definition/types.js';
import type { ExecutionResult } from '../sandbox/types.js';
import { compareWithTolerance, parseNumber, valuesEqual } from './compare.js';
import { compileFormat, matchFormat } from './format.js';
import type { FailureCode, TestOutcome } from './types.js';

type Verdict = Pick<TestOutcome, 'passed' | 'actual' | 'diagnostic' | 'failure'>;

/** Trim and collapse every whitespace run to one space */
export function normalizeWhitespace(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

/** Printed lines joined by newlines, or the raw transcript when nothing was printed */
export function outputUnderTest(result: ExecutionResult): string {
  return result.output.length > 0 ? result.output.join('\n') : result.transcript;
}

function outputLines(result: ExecutionResult): string[] {
  if (result.output.length > 0) return result.output;
  if (result.transcript === '') return [];
  return result.transcript.replace(/\n$/, '').split('\n');
}

function caseHint(caseSensitive: boolean): string {
  return caseSensitive ? '(case-sensitive)' : '(case-insensitive)';
}

function sameText(actual: string, expected: string, caseSensitive: boolean): boolean {
  const a = normalizeWhitespace(actual);
  const e = normalizeWhitespace(expected);
  return caseSensitive ? a === e : a.toLowerCase() === e.toLowerCase();
}

function fail(failure: FailureCode, diagnostic: string, actual: unknown): Verdict {
  return { passed: false, failure, diagnostic, actual };
}

// ============================================================================
// EXECUTION FAILURES
// ============================================================================

function executionFailure(result: ExecutionResult): Verdict | null {
  switch (result.status) {
    case 'SUCCESS':
      return null;
    case 'SAFETY_VIOLATION':
      return fail(
        'SAFETY_VIOLATION',
        result.violation ? `${result.violation.reason} (line ${result.violation.line})` : 'Code was refused',
        undefined
      );
    case 'TIMEOUT':
      return fail('TIMEOUT', 'Execution timed out', undefined);
    case 'RUNTIME_ERROR': {
      const error = result.error ?? { name: 'Error', message: 'unknown error' };
      return fail('RUNTIME_ERROR', `${error.name}: ${error.message}`, undefined);
    }
  }
}

// ============================================================================
// VARIABLE TESTS
// ============================================================================

function validateVariables(testCase: VariableTestCase, result: ExecutionResult): Verdict {
  const actual: Record<string, unknown> = {};
  const matched: string[] = [];

  for (const [name, expected] of Object.entries(testCase.expected)) {
    if (!Object.prototype.hasOwnProperty.call(result.namespace, name)) {
      return fail('MISSING_VARIABLE', `test for ${name}: variable ${name} is not defined`, actual);
    }
    const value = result.namespace[name];
    actual[name] = value;

    const tolerance = testCase.tolerance;
    if (tolerance !== undefined) {
      const check = compareWithTolerance(value, expected, tolerance);
      if (check === 'non-numeric') {
        return fail(
          'MISMATCH',
          `test for ${name} expected ${describeValue(expected)}, got ${describeValue(value)} (non-numeric, cannot use tol)`,
          actual
        );
      }
      if (check === 'outside') {
        return fail(
          'MISMATCH',
          `test for ${name} expected ${describeValue(expected)} (tol=${tolerance}), got ${describeValue(value)}`,
          actual
        );
      }
    } else if (!valuesEqual(value, expected)) {
      return fail('MISMATCH', `test for ${name} expected ${describeValue(expected)}, got ${describeValue(value)}`, actual);
    }

    matched.push(`${name}=${describeValue(value)}`);
  }

  return { passed: true, actual, diagnostic: `matched ${matched.join(', ')}` };
}

// ============================================================================
// OUTPUT TESTS
// ============================================================================

function compareToken(
  name: string,
  expected: unknown,
  token: string,
  tolerance: number | undefined,
  caseSensitive: boolean
): string | null {
  const expectedNumber = parseNumber(expected);
  const actualNumber = parseNumber(token);

  if (expectedNumber !== null && actualNumber !== null) {
    if (tolerance !== undefined) {
      return Math.abs(actualNumber - expectedNumber) <= tolerance
        ? null
        : `${name}: expected ${expectedNumber} (tol=${tolerance}), got ${actualNumber}`;
    }
    const same = actualNumber === expectedNumber || (Number.isNaN(actualNumber) && Number.isNaN(expectedNumber));
    return same ? null : `${name}: expected ${expectedNumber}, got ${actualNumber}`;
  }

  const expectedText = String(expected);
  const same = caseSensitive ? token === expectedText : token.toLowerCase() === expectedText.toLowerCase();
  return same ? null : `${name}: expected '${expectedText}', got '${token}'`;
}

function validateFormat(testCase: OutputTestCase, format: string, text: string): Verdict {
  const normalized = normalizeWhitespace(text);
  const tokens = matchFormat(compileFormat(format, testCase.caseSensitive), normalized);
  if (!tokens) {
    return fail(
      'MISMATCH',
      `Output did not match expected format ${caseHint(testCase.caseSensitive)}: ${format}; got ${normalized}`,
      text
    );
  }

  const expected = testCase.expected;
  if (typeof expected === 'object' && !Array.isArray(expected)) {
    for (const [name, value] of Object.entries(expected)) {
      const token = tokens[name];
      if (token === undefined) {
        return fail('MISMATCH', `Variable ${name} not found in output.`, tokens);
      }
      const mismatch = compareToken(name, value, token, testCase.tolerance, testCase.caseSensitive);
      if (mismatch) return fail('MISMATCH', mismatch, tokens);
    }
  }

  const wanted = typeof expected === 'object' && !Array.isArray(expected) ? expected : {};
  const expectedTokens = Object.entries(wanted).map(([name, value]) => `${name}=${describeValue(value)}`);
  const gotTokens = Object.entries(tokens).map(([name, token]) => `${name}=${token}`);
  return {
    passed: true,
    actual: tokens,
    diagnostic: `output matched format ${format}: expected ${expectedTokens.join(', ')}, got ${gotTokens.join(', ')}`,
  };
}

function validateLines(testCase: OutputTestCase, expected: string[], result: ExecutionResult): Verdict {
  const lines = outputLines(result);
  const count = Math.max(lines.length, expected.length);

  for (let i = 0; i < count; i++) {
    const want = expected[i];
    const got = lines[i];
    if (want === undefined) {
      return fail('MISMATCH', `unexpected output line ${i + 1}: ${got ?? ''}`, lines);
    }
    if (got === undefined) {
      return fail('MISMATCH', `missing output line ${i + 1}: expected ${want}`, lines);
    }
    if (!sameText(got, want, testCase.caseSensitive)) {
      return fail(
        'MISMATCH',
        `test for output line ${i + 1} expected ${want}, got ${got} ${caseHint(testCase.caseSensitive)}`,
        lines
      );
    }
  }

  return {
    passed: true,
    actual: lines,
    diagnostic: `output lines matched: expected ${JSON.stringify(expected)}, got ${JSON.stringify(lines)}`,
  };
}

function validateOutput(testCase: OutputTestCase, result: ExecutionResult): Verdict {
  const text = outputUnderTest(result);

  if (testCase.format !== undefined) {
    return validateFormat(testCase, testCase.format, text);
  }

  const expected = testCase.expected;
  if (Array.isArray(expected)) {
    return validateLines(testCase, expected, result);
  }
  if (typeof expected === 'string') {
    return sameText(text, expected, testCase.caseSensitive)
      ? { passed: true, actual: text, diagnostic: `output matched: expected ${expected}, got ${normalizeWhitespace(text)}` }
      : fail(
          'MISMATCH',
          `test for output expected ${expected}, got ${normalizeWhitespace(text)} ${caseHint(testCase.caseSensitive)}`,
          text
        );
  }
  return fail('MISMATCH', 'Output test expects tokens but has no format', text);
}

// ============================================================================
// ENTRY POINT
// ============================================================================

/**
 * Validate one test case against one execution result
 */
export function validate(testCase: TestCase, result: ExecutionResult, testIndex = 1): TestOutcome {
  const verdict =
    executionFailure(result) ??
    (testCase.kind === 'variable' ? validateVariables(testCase, result) : validateOutput(testCase, result));
  return { testIndex, testCase, ...verdict };
}

/**
 * Outcome for a test that was never run
 */
export function notRun(testCase: TestCase, testIndex: number, reason: string): TestOutcome {
  return { testIndex, testCase, passed: false, actual: undefined, diagnostic: reason, failure: 'NOT_RUN' };
}
