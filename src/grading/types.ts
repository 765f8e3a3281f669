/**
 * Grading Types
 */

import type { CellLanguage } from '../sandbox/types.js';
import type { TestOutcome } from '../validation/types.js';

// ============================================================================
// NOTEBOOK
// ============================================================================

export type CellType = 'code' | 'markdown' | 'raw';

export interface NotebookCell {
  cellType: CellType;
  source: string;
}

export interface Notebook {
  language: CellLanguage;
  cells: NotebookCell[];
}

// ============================================================================
// RESULTS
// ============================================================================

/** Lifecycle of one problem for one student */
export type ProblemState =
  | 'PENDING'
  | 'SAFETY_CHECKED'
  | 'EXECUTED'
  | 'VALIDATED'
  | 'SCORED'
  | 'FAILED';

/** Why a problem ended in FAILED */
export type ProblemFailure = 'SAFETY_VIOLATION' | 'TIMEOUT' | 'RUNTIME_ERROR' | 'UNREADABLE_CELL';

export interface ProblemScore {
  /** 1-based */
  problemIndex: number;
  /** 1-based index over non-empty code cells */
  cellIndex: number;
  state: 'SCORED' | 'FAILED';
  failure?: ProblemFailure;
  points: number;
  earnedPoints: number;
  passedCount: number;
  totalCount: number;
  outcomes: TestOutcome[];
  /** Feedback line per test that did not pass */
  failureLines: string[];
  safetyViolations: number;
  timeoutViolations: number;
}

export interface GradingException {
  kind: ProblemFailure;
  /** 1-based; absent when the whole notebook was rejected */
  problemIndex?: number;
  detail: string;
}

export interface StudentResult {
  studentId: string;
  problems: ProblemScore[];
  total: number;
  maxTotal: number;
  exceptions: GradingException[];
  /** Set when the notebook could not be graded as a whole */
  unreadable?: string;
}
