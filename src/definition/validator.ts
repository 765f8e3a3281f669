/**
 * Test Definition Validator
 *
 * Validates test-definition files and maps them to engine types.
 * Problems in a definition that fails validation are never graded.
 */

import type { Namespace, StdinScript } from '../core/types.js';
import type { ProblemSpec, TestCase, TestDefinition } from './types.js';
import { DEFINITION_DEFAULTS } from './types.js';

/** Validation error */
export interface ValidationError {
  path: string;
  message: string;
}

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function readPrefix(value: unknown, path: string, errors: ValidationError[]): string[] | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'string') return [value];
  if (isStringList(value)) return value;
  errors.push({ path, message: 'Must be a string or an array of strings' });
  return undefined;
}

function readStdin(value: unknown, path: string, errors: ValidationError[]): StdinScript | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value) || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  errors.push({ path, message: 'Must be an array, string, number or boolean' });
  return undefined;
}

function readTest(value: unknown, path: string, errors: ValidationError[]): TestCase | undefined {
  if (!isRecord(value)) {
    errors.push({ path, message: 'Required object' });
    return undefined;
  }
  const before = errors.length;

  let variables: Namespace | undefined;
  if (value.variables !== undefined) {
    if (isRecord(value.variables)) {
      variables = value.variables;
    } else {
      errors.push({ path: `${path}.variables`, message: 'Must be an object' });
    }
  }

  let tolerance: number | undefined;
  if (value.tol !== undefined) {
    if (typeof value.tol === 'number' && Number.isFinite(value.tol) && value.tol >= 0) {
      tolerance = value.tol;
    } else {
      errors.push({ path: `${path}.tol`, message: 'Must be a non-negative number' });
    }
  }

  let caseSensitive: boolean = DEFINITION_DEFAULTS.caseSensitive;
  if (value.case_sensitive !== undefined) {
    if (typeof value.case_sensitive === 'boolean') {
      caseSensitive = value.case_sensitive;
    } else {
      errors.push({ path: `${path}.case_sensitive`, message: 'Must be a boolean' });
    }
  }

  const stdin = readStdin(value.input_overload, `${path}.input_overload`, errors);
  const prefixCode = readPrefix(value.prefix_code, `${path}.prefix_code`, errors);
  const base = { variables, tolerance, caseSensitive, stdin, prefixCode };

  const expected = value.expected;
  if (value.type === 'variable') {
    if (!isRecord(expected) || Object.keys(expected).length === 0) {
      errors.push({ path: `${path}.expected`, message: 'Variable tests need a non-empty object of expected values' });
      return undefined;
    }
    return errors.length === before ? { kind: 'variable', expected, ...base } : undefined;
  }

  if (value.type === 'output') {
    if (value.format !== undefined) {
      if (typeof value.format !== 'string') {
        errors.push({ path: `${path}.format`, message: 'Must be a string' });
        return undefined;
      }
      if (expected !== undefined && !isRecord(expected)) {
        errors.push({ path: `${path}.expected`, message: 'Format tests need an object of expected tokens' });
        return undefined;
      }
      return errors.length === before
        ? { kind: 'output', expected: expected ?? {}, format: value.format, ...base }
        : undefined;
    }
    if (typeof expected !== 'string' && !isStringList(expected)) {
      errors.push({ path: `${path}.expected`, message: 'Output tests need a string or an array of strings' });
      return undefined;
    }
    return errors.length === before ? { kind: 'output', expected, ...base } : undefined;
  }

  errors.push({ path: `${path}.type`, message: 'Must be variable or output' });
  return undefined;
}

function readProblem(value: unknown, path: string, errors: ValidationError[]): ProblemSpec | undefined {
  if (!isRecord(value)) {
    errors.push({ path, message: 'Required object' });
    return undefined;
  }
  const before = errors.length;

  if (!isNonNegativeInteger(value.next_code_cell)) {
    errors.push({ path: `${path}.next_code_cell`, message: 'Required non-negative integer' });
  }

  let points: number = DEFINITION_DEFAULTS.points;
  if (value.pts !== undefined) {
    if (typeof value.pts === 'number' && Number.isFinite(value.pts) && value.pts >= 0) {
      points = value.pts;
    } else {
      errors.push({ path: `${path}.pts`, message: 'Must be a non-negative number' });
    }
  }

  let lineOffset: number = DEFINITION_DEFAULTS.lineOffset;
  if (value.line_offset !== undefined) {
    if (isNonNegativeInteger(value.line_offset)) {
      lineOffset = value.line_offset;
    } else {
      errors.push({ path: `${path}.line_offset`, message: 'Must be a non-negative integer' });
    }
  }

  const prefixCode = readPrefix(value.prefix_code, `${path}.prefix_code`, errors);

  const tests: TestCase[] = [];
  if (!Array.isArray(value.tests)) {
    errors.push({ path: `${path}.tests`, message: 'Required array' });
  } else {
    value.tests.forEach((raw: unknown, i: number) => {
      const test = readTest(raw, `${path}.tests[${i}]`, errors);
      if (test) tests.push(test);
    });
  }

  if (errors.length > before || !isNonNegativeInteger(value.next_code_cell)) return undefined;
  return { cellOffset: value.next_code_cell, points, lineOffset, prefixCode, tests };
}

function readDefinition(value: unknown, errors: ValidationError[]): TestDefinition | undefined {
  if (!isRecord(value)) {
    errors.push({ path: '', message: 'Test definition must be an object' });
    return undefined;
  }

  let title: string | undefined;
  if (value.title !== undefined) {
    if (typeof value.title === 'string') {
      title = value.title;
    } else {
      errors.push({ path: 'title', message: 'Must be a string' });
    }
  }

  if (!Array.isArray(value.problems)) {
    errors.push({ path: 'problems', message: 'Required array' });
    return undefined;
  }

  const problems: ProblemSpec[] = [];
  let cellIndex = 0;
  value.problems.forEach((raw: unknown, i: number) => {
    const problem = readProblem(raw, `problems[${i}]`, errors);
    if (!problem) return;
    cellIndex += problem.cellOffset;
    if (cellIndex < 1) {
      errors.push({ path: `problems[${i}].next_code_cell`, message: 'Must reach code cell 1 or later' });
      return;
    }
    problems.push(problem);
  });

  return errors.length === 0 ? { title, problems } : undefined;
}

/**
 * Validate test-definition structure
 */
export function validateTestDefinition(definition: unknown): ValidationResult {
  const errors: ValidationError[] = [];
  readDefinition(definition, errors);
  return { valid: errors.length === 0, errors };
}

/**
 * Load and validate a test definition from a JSON string
 */
export function loadTestDefinition(jsonString: string): {
  definition?: TestDefinition;
  validation: ValidationResult;
} {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonString);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return {
      validation: {
        valid: false,
        errors: [{ path: '', message: `Invalid JSON: ${message}` }],
      },
    };
  }

  const errors: ValidationError[] = [];
  const definition = readDefinition(parsed, errors);
  const validation = { valid: errors.length === 0, errors };
  return definition ? { definition, validation } : { validation };
}
