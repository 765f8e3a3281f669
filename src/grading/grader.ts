/**
 * Notebook Grader
 *
 * Grades one student's notebook against a list of problems.
 *
 * Invariants:
 * - Students never share a namespace; each gradeNotebook call starts empty
 * - Every test runs in a fresh namespace and a fresh I/O scope
 * - A failed problem earns 0 and never stops later problems
 * - Problems run in notebook order; each test replays the cells of earlier
 *   problems first, so it sees their bindings without sharing their objects
 */

import { describeValue } from '../core/values.js';
import { logError, logProblem, logStart, logStudentDone, logTimeout, logUnreadable, logVerbose, logViolation } from '../core/logger.js';
import type { ProblemSpec, TestCase } from '../definition/types.js';
import type { BoundedExecutor } from '../sandbox/executor.js';
import type { CellLanguage, ExecutionResult, ExecutionStep } from '../sandbox/types.js';
import type { TestOutcome } from '../validation/types.js';
import { notRun, validate } from '../validation/validator.js';
import { countCodeCells, locateCodeCell, prepareCode, splitCell } from './notebook.js';
import type {
  GradingException,
  Notebook,
  ProblemFailure,
  ProblemScore,
  ProblemState,
  StudentResult,
} from './types.js';

export interface GraderOptions {
  executor: BoundedExecutor;
  /** Limit for each test run, replayed cells included, in seconds */
  timeoutSeconds: number;
  /** Reject notebooks whose code-cell count differs from the definition */
  strictCellCount: boolean;
}

const TRANSITIONS: Record<ProblemState, ProblemState[]> = {
  PENDING: ['SAFETY_CHECKED', 'FAILED'],
  SAFETY_CHECKED: ['EXECUTED', 'SCORED', 'FAILED'],
  EXECUTED: ['VALIDATED', 'FAILED'],
  VALIDATED: ['EXECUTED', 'SCORED'],
  SCORED: [],
  FAILED: [],
};

function advance(from: ProblemState, to: ProblemState): ProblemState {
  if (!TRANSITIONS[from].includes(to)) {
    throw new Error(`Illegal problem transition ${from} -> ${to}`);
  }
  return to;
}

/** Sum of problem points */
export function maxScore(problems: ProblemSpec[]): number {
  return problems.reduce((sum, problem) => sum + problem.points, 0);
}

/**
 * How a test's inputs read in feedback: `x=1, stdin ["3","4"]`
 */
export function describeInputs(testCase: TestCase): string {
  const parts = Object.entries(testCase.variables ?? {}).map(([name, value]) => `${name}=${describeValue(value)}`);
  if (testCase.stdin !== undefined) parts.push(`stdin ${JSON.stringify(testCase.stdin)}`);
  return parts.join(', ');
}

function failureLine(outcome: TestOutcome, result: ExecutionResult | null): string {
  const inputs = describeInputs(outcome.testCase);
  const n = outcome.testIndex;
  switch (outcome.failure) {
    case 'SAFETY_VIOLATION':
      return `Test ${n} blocked on input (${inputs}): ${outcome.diagnostic}`;
    case 'TIMEOUT':
      return `Test ${n} timeout on input (${inputs})`;
    case 'RUNTIME_ERROR': {
      const error = result?.error ?? { name: 'Error', message: outcome.diagnostic };
      return `Test ${n} error (${error.name}) on input (${inputs}): ${error.message}`;
    }
    case 'NOT_RUN':
      return `Test ${n} not run: ${outcome.diagnostic}`;
    default:
      return `Test ${n} failed on input (${inputs}): ${outcome.diagnostic}`;
  }
}

function failureOf(result: ExecutionResult): ProblemFailure | null {
  return result.status === 'SUCCESS' ? null : result.status;
}

export class NotebookGrader {
  private executor: BoundedExecutor;
  private timeoutSeconds: number;
  private strictCellCount: boolean;

  constructor(options: GraderOptions) {
    this.executor = options.executor;
    this.timeoutSeconds = options.timeoutSeconds;
    this.strictCellCount = options.strictCellCount;
  }

  /**
   * Grade every problem for one student. Never throws for anything the
   * student's code does.
   */
  async gradeNotebook(studentId: string, notebook: Notebook, problems: ProblemSpec[]): Promise<StudentResult> {
    logStart(studentId, problems.length);

    const exceptions: GradingException[] = [];
    const scores: ProblemScore[] = [];
    let unreadable = this.checkCellCount(notebook, problems);
    if (unreadable) {
      exceptions.push({ kind: 'UNREADABLE_CELL', detail: unreadable });
      logUnreadable(studentId, unreadable);
    }

    let history: ExecutionStep[] = [];
    let cellIndex = 0;
    for (const [i, problem] of problems.entries()) {
      const problemIndex = i + 1;
      cellIndex += problem.cellOffset;

      if (unreadable) {
        scores.push(this.unreadableScore(problem, problemIndex, cellIndex, unreadable));
        continue;
      }

      const cell = locateCodeCell(notebook, cellIndex);
      if (!cell) {
        unreadable = `Code cell number ${cellIndex} not found.`;
        exceptions.push({ kind: 'UNREADABLE_CELL', problemIndex, detail: unreadable });
        logUnreadable(studentId, unreadable);
        scores.push(this.unreadableScore(problem, problemIndex, cellIndex, unreadable));
        continue;
      }

      const graded = await this.gradeProblem(studentId, problem, problemIndex, cellIndex, cell.source, notebook.language, history);
      scores.push(graded.score);
      exceptions.push(...graded.exceptions);
      history = graded.history;
      logProblem(studentId, problemIndex, graded.score.state, graded.score.passedCount, graded.score.totalCount, graded.score.earnedPoints);
    }

    const total = scores.reduce((sum, score) => sum + score.earnedPoints, 0);
    const result: StudentResult = {
      studentId,
      problems: scores,
      total,
      maxTotal: maxScore(problems),
      exceptions,
      ...(unreadable ? { unreadable } : {}),
    };
    logStudentDone(studentId, total, result.maxTotal, exceptions.length);
    return result;
  }

  /** Cell-count mismatch message, or null when the notebook has the expected shape */
  private checkCellCount(notebook: Notebook, problems: ProblemSpec[]): string | null {
    if (!this.strictCellCount) return null;

    const expected = problems.reduce((sum, problem) => sum + problem.cellOffset, 0);
    const counts = countCodeCells(notebook);
    if (counts.all === expected || counts.nonEmpty === expected) return null;
    return `Cell count mismatch: Expected ${expected} code cells, but found ${counts.all}`;
  }

  private unreadableScore(problem: ProblemSpec, problemIndex: number, cellIndex: number, reason: string): ProblemScore {
    const outcomes = problem.tests.map((test, i) => notRun(test, i + 1, reason));
    return {
      problemIndex,
      cellIndex,
      state: 'FAILED',
      failure: 'UNREADABLE_CELL',
      points: problem.points,
      earnedPoints: 0,
      passedCount: 0,
      totalCount: problem.tests.length,
      outcomes,
      failureLines: [reason],
      safetyViolations: 0,
      timeoutViolations: 0,
    };
  }

  private async gradeProblem(
    studentId: string,
    problem: ProblemSpec,
    problemIndex: number,
    cellIndex: number,
    source: string,
    language: CellLanguage,
    history: ExecutionStep[]
  ): Promise<{ score: ProblemScore; exceptions: GradingException[]; history: ExecutionStep[] }> {
    const { setup, student } = splitCell(source, problem.lineOffset);
    const exceptions: GradingException[] = [];
    const outcomes: TestOutcome[] = [];
    const failureLines: string[] = [];
    let safetyViolations = 0;
    let timeoutViolations = 0;
    let failure: ProblemFailure | undefined;
    let nextHistory = history;
    let state: ProblemState = 'PENDING';

    const problemPrefix = problem.prefixCode ?? [];

    // The cell as a whole is checked once; per-test prefixes are checked again by execute()
    const verdict = this.executor.check([...problemPrefix, setup, student].join('\n'));
    if (verdict.violation) {
      state = advance(state, 'FAILED');
      failure = 'SAFETY_VIOLATION';
      safetyViolations = 1;
      const { category, construct, reason, line } = verdict.violation;
      exceptions.push({ kind: 'SAFETY_VIOLATION', problemIndex, detail: `${reason} (line ${line})` });
      logViolation(studentId, problemIndex, category, construct);
      problem.tests.forEach((test, i) => {
        const outcome: TestOutcome =
          i === 0
            ? { testIndex: 1, testCase: test, passed: false, actual: undefined, diagnostic: reason, failure: 'SAFETY_VIOLATION' }
            : notRun(test, i + 1, 'problem failed earlier');
        outcomes.push(outcome);
        failureLines.push(failureLine(outcome, null));
      });
    } else {
      state = advance(state, 'SAFETY_CHECKED');
      // earlier cells, then the instructor lines of this one
      const steps: ExecutionStep[] = setup === '' ? history : [...history, { code: setup }];

      for (const [i, test] of problem.tests.entries()) {
        const testIndex = i + 1;
        if (state === 'FAILED') {
          const skipped = notRun(test, testIndex, 'problem failed earlier');
          outcomes.push(skipped);
          failureLines.push(failureLine(skipped, null));
          continue;
        }

        const code = prepareCode(student, problem.prefixCode, test);
        const result = await this.executor.execute(code, test.variables ?? {}, this.timeoutSeconds, {
          language,
          stdin: test.stdin,
          preamble: steps,
        });
        state = advance(state, 'EXECUTED');
        const outcome = validate(test, result, testIndex);
        outcomes.push(outcome);
        if (!outcome.passed) failureLines.push(failureLine(outcome, result));

        const executionFailure = failureOf(result);
        if (executionFailure) {
          state = advance(state, 'FAILED');
          failure = executionFailure;
          const detail = `Test ${testIndex}: ${outcome.diagnostic}`;
          exceptions.push({ kind: executionFailure, problemIndex, detail });
          if (executionFailure === 'TIMEOUT') {
            timeoutViolations++;
            logTimeout(studentId, problemIndex, testIndex, this.timeoutSeconds);
          } else if (executionFailure === 'SAFETY_VIOLATION') {
            safetyViolations++;
            logViolation(studentId, problemIndex, result.violation?.category ?? 'unknown', result.violation?.construct ?? '');
          } else {
            logError(studentId, outcome.diagnostic, `test ${testIndex}`, problemIndex);
          }
          continue;
        }

        state = advance(state, 'VALIDATED');
        nextHistory = [...steps, { code, bindings: test.variables, stdin: test.stdin }];
        logVerbose({
          student: studentId,
          problem: problemIndex,
          step: 'test_validated',
          details: { test: testIndex, passed: outcome.passed, diagnostic: outcome.diagnostic },
        });
      }

      // no tests at all goes straight from SAFETY_CHECKED to SCORED
      if (state === 'VALIDATED' || state === 'SAFETY_CHECKED') state = advance(state, 'SCORED');
    }

    const passedCount = outcomes.filter((outcome) => outcome.passed).length;
    const totalCount = problem.tests.length;
    const scored = state === 'SCORED';
    const earnedPoints = scored && totalCount > 0 ? (problem.points * passedCount) / totalCount : 0;

    return {
      score: {
        problemIndex,
        cellIndex,
        state: scored ? 'SCORED' : 'FAILED',
        ...(failure ? { failure } : {}),
        points: problem.points,
        earnedPoints,
        passedCount,
        totalCount,
        outcomes,
        failureLines,
        safetyViolations,
        timeoutViolations,
      },
      exceptions,
      history: nextHistory,
    };
  }
}

/**
 * Create a grader
 */
export function createNotebookGrader(options: GraderOptions): NotebookGrader {
  return new NotebookGrader(options);
}
