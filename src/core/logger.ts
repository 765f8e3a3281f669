/**
 * Notebook Grader - Logger
 *
 * JSON line logging for structured output.
 * Format: { ts, student, problem?, step, details? }
 */

import type { LogEntry } from './types.js';

let verbose = false;

export function setVerbose(v: boolean): void {
  verbose = v;
}

export function isVerbose(): boolean {
  return verbose;
}

export function log(entry: Omit<LogEntry, 'ts'>): void {
  const fullEntry: LogEntry = {
    ts: new Date().toISOString(),
    ...entry,
  };
  console.log(JSON.stringify(fullEntry));
}

export function logVerbose(entry: Omit<LogEntry, 'ts'>): void {
  if (!verbose) return;
  log(entry);
}

export function logError(
  student: string | null,
  error: unknown,
  context?: string,
  problem?: number
): void {
  log({
    student,
    problem,
    step: 'error',
    details: {
      context,
      message: error instanceof Error ? error.message : String(error),
    },
  });
}

export function logStart(student: string, problemCount: number): void {
  log({
    student,
    step: 'grade_start',
    details: { problemCount },
  });
}

export function logProblem(
  student: string,
  problem: number,
  state: string,
  passed: number,
  total: number,
  earned: number
): void {
  logVerbose({
    student,
    problem,
    step: 'problem_scored',
    details: { state, passed, total, earned },
  });
}

export function logViolation(
  student: string,
  problem: number,
  category: string,
  construct: string
): void {
  log({
    student,
    problem,
    step: 'safety_violation',
    details: { category, construct },
  });
}

export function logTimeout(
  student: string,
  problem: number,
  test: number,
  timeoutSeconds: number
): void {
  log({
    student,
    problem,
    step: 'timeout',
    details: { test, timeoutSeconds },
  });
}

export function logUnreadable(student: string, reason: string): void {
  log({
    student,
    step: 'unreadable',
    details: { reason },
  });
}

export function logStudentDone(
  student: string,
  total: number,
  maxTotal: number,
  exceptions: number
): void {
  log({
    student,
    step: 'grade_complete',
    details: { total, maxTotal, exceptions },
  });
}
