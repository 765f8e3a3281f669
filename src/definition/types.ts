/**
 * Test Definition Types
 *
 * Problems and test cases for one assignment.
 * The JSON file uses snake_case keys; the engine works on the camelCase types.
 */

import type { Namespace, StdinScript } from '../core/types.js';

// ============================================================================
// ENGINE TYPES
// ============================================================================

export type TestKind = 'variable' | 'output';

interface TestCaseBase {
  /** Bindings placed in the namespace before the student code runs */
  variables?: Namespace;
  /** Inclusive absolute tolerance for numeric comparisons */
  tolerance?: number;
  /** Output comparisons ignore case unless set */
  caseSensitive: boolean;
  /** Scripted answers for input()/prompt() */
  stdin?: StdinScript;
  /** Lines run before the student code, after the problem prefix */
  prefixCode?: string[];
}

/** Checks bindings left in the namespace */
export interface VariableTestCase extends TestCaseBase {
  kind: 'variable';
  /** Name to expected value; complex values as { real, imag } */
  expected: Record<string, unknown>;
}

/** Checks printed output */
export interface OutputTestCase extends TestCaseBase {
  kind: 'output';
  /**
   * Whole output, one string per line, or (with format) the tokens
   * the format placeholders must capture
   */
  expected: string | string[] | Record<string, unknown>;
  /** Pattern with {name} placeholders */
  format?: string;
}

export type TestCase = VariableTestCase | OutputTestCase;

/** One graded problem */
export interface ProblemSpec {
  /** Code cells to advance from the previous problem's cell */
  cellOffset: number;
  points: number;
  /** Leading non-blank lines that belong to the instructor, not the student */
  lineOffset: number;
  prefixCode?: string[];
  tests: TestCase[];
}

export interface TestDefinition {
  title?: string;
  problems: ProblemSpec[];
}

// ============================================================================
// FILE FORMAT
// ============================================================================

export interface RawTestCase {
  type: TestKind;
  expected: unknown;
  variables?: Record<string, unknown>;
  tol?: number;
  case_sensitive?: boolean;
  format?: string;
  input_overload?: StdinScript;
  prefix_code?: string | string[];
}

export interface RawProblem {
  next_code_cell: number;
  pts?: number;
  line_offset?: number;
  prefix_code?: string | string[];
  tests: RawTestCase[];
}

export interface RawTestDefinition {
  title?: string;
  problems: RawProblem[];
}

/** Default values for optional fields */
export const DEFINITION_DEFAULTS = {
  points: 1,
  lineOffset: 0,
  caseSensitive: false,
} as const;
