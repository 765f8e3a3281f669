/**
 * Notebook Grader - Core Types
 *
 * Shared value types for the grading engine.
 */

// ============================================================================
// VALUES
// ============================================================================

/** Variable bindings visible to a running code fragment */
export type Namespace = Record<string, unknown>;

/** Complex number as written in test definitions */
export interface ComplexLiteral {
  real: number;
  imag: number;
}

/** Scripted answers for input()/prompt(): a queue, or one value for every call */
export type StdinScript = readonly unknown[] | string | number | boolean;

// ============================================================================
// LOG TYPES
// ============================================================================

export interface LogEntry {
  ts: string;
  /** Student being graded (null for session-level entries) */
  student: string | null;
  /** 1-based problem index, when the entry concerns one problem */
  problem?: number;
  step: string;
  details?: Record<string, unknown>;
}
