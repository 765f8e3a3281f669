/**
 * Validation Types
 */

import type { TestCase } from '../definition/types.js';

/** Why a test did not pass */
export type FailureCode =
  | 'MISMATCH'
  | 'MISSING_VARIABLE'
  | 'SAFETY_VIOLATION'
  | 'TIMEOUT'
  | 'RUNTIME_ERROR'
  | 'NOT_RUN';

/** Verdict for one test case */
export interface TestOutcome {
  /** 1-based position within the problem */
  testIndex: number;
  testCase: TestCase;
  passed: boolean;
  /** Values or text the verdict was based on */
  actual: unknown;
  /** Human-readable explanation, present on pass as well */
  diagnostic: string;
  failure?: FailureCode;
}
