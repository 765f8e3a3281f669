/**
 * Notebook Grader Tests
 *
 * Tests for:
 * 1. Scoring and partial credit
 * 2. Failed problems (timeout, runtime error, safety violation)
 * 3. Isolation between students
 * 4. Cell lookup, line offsets and replayed cells
 * 5. Unreadable notebooks
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { ProblemSpec, TestCase } from '../definition/types.js';
import { createExecutor } from '../sandbox/executor.js';
import { createNotebookGrader, describeInputs, maxScore } from './grader.js';
import type { Notebook } from './types.js';

function notebook(...sources: string[]): Notebook {
  return { language: 'javascript', cells: sources.map((source) => ({ cellType: 'code', source })) };
}

function problem(tests: TestCase[], overrides: Partial<ProblemSpec> = {}): ProblemSpec {
  return { cellOffset: 1, points: 1, lineOffset: 0, tests, ...overrides };
}

function expectVars(expected: Record<string, unknown>, variables?: Record<string, unknown>): TestCase {
  return { kind: 'variable', expected, variables, caseSensitive: false };
}

function grader(options: { strictCellCount?: boolean; timeoutSeconds?: number } = {}) {
  return createNotebookGrader({
    executor: createExecutor(),
    timeoutSeconds: options.timeoutSeconds ?? 1,
    strictCellCount: options.strictCellCount ?? false,
  });
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Scoring', () => {
  it('should award full points when every test passes', async () => {
    const problems = [
      problem([expectVars({ y: 6 }, { x: 3 }), expectVars({ y: 10 }, { x: 5 })], { points: 2 }),
    ];
    const result = await grader().gradeNotebook('s1', notebook('const y = x * 2;'), problems);

    expect(result.problems[0]?.state).toBe('SCORED');
    expect(result.problems[0]?.earnedPoints).toBe(2);
    expect(result.total).toBe(2);
    expect(result.maxTotal).toBe(2);
    expect(result.exceptions).toEqual([]);
  });

  it('should give partial credit and describe the failing input', async () => {
    const problems = [
      problem([expectVars({ y: 6 }, { x: 3 }), expectVars({ y: 10 }, { x: 5 })], { points: 2 }),
    ];
    const result = await grader().gradeNotebook('s1', notebook('const y = x === 3 ? 6 : 0;'), problems);
    const score = result.problems[0];

    expect(score?.passedCount).toBe(1);
    expect(score?.earnedPoints).toBe(1);
    expect(score?.failureLines).toEqual(['Test 2 failed on input (x=5): test for y expected 10, got 0']);
  });

  it('should feed scripted input and compare printed output', async () => {
    const cell = "const a = Number(input('a? '));\nconst b = Number(input('b? '));\nprint(a + b);";
    const problems = [
      problem([
        { kind: 'output', expected: '7', stdin: ['3', '4'], caseSensitive: false },
        { kind: 'output', expected: '3', variables: { a: 1, b: 2 }, caseSensitive: false },
      ]),
    ];
    const result = await grader().gradeNotebook('s1', notebook(cell), problems);

    expect(result.problems[0]?.passedCount).toBe(2);
  });

  it('should match formatted output', async () => {
    const problems = [
      problem([{ kind: 'output', format: 'Result: {r}', expected: { r: 8 }, variables: { x: 4 }, caseSensitive: false }]),
    ];
    const result = await grader().gradeNotebook('s1', notebook("print('Result: ' + (x * 2));"), problems);

    expect(result.total).toBe(1);
  });

  it('should run TypeScript notebooks', async () => {
    const nb: Notebook = { language: 'typescript', cells: [{ cellType: 'code', source: 'const n: number = 21 * 2;' }] };
    const result = await grader().gradeNotebook('s1', nb, [problem([expectVars({ n: 42 })])]);

    expect(result.total).toBe(1);
  });
});

describe('Failed problems', () => {
  it('should fail a timed-out problem and carry on with the next one', async () => {
    const problems = [
      problem([expectVars({ z: 1 }), expectVars({ z: 1 })]),
      problem([expectVars({ z: 1 })]),
    ];
    const result = await grader({ timeoutSeconds: 0.2 }).gradeNotebook(
      's1',
      notebook('while (true) {}', 'const z = 1;'),
      problems
    );
    const [first, second] = result.problems;

    expect(first?.state).toBe('FAILED');
    expect(first?.failure).toBe('TIMEOUT');
    expect(first?.earnedPoints).toBe(0);
    expect(first?.timeoutViolations).toBe(1);
    expect(first?.outcomes.map((o) => o.failure)).toEqual(['TIMEOUT', 'NOT_RUN']);
    expect(first?.failureLines).toEqual(['Test 1 timeout on input ()', 'Test 2 not run: problem failed earlier']);
    expect(second?.state).toBe('SCORED');
    expect(result.total).toBe(1);
    expect(result.exceptions).toEqual([{ kind: 'TIMEOUT', problemIndex: 1, detail: 'Test 1: Execution timed out' }]);
    expect(vi.mocked(console.log).mock.calls.some(([line]) => String(line).includes('"step":"timeout"'))).toBe(true);
  });

  it('should report a runtime error with its type', async () => {
    const problems = [problem([expectVars({ y: 1 }, { x: 1 })])];
    const result = await grader().gradeNotebook('s1', notebook("throw new TypeError('nope');"), problems);

    expect(result.problems[0]?.failure).toBe('RUNTIME_ERROR');
    expect(result.problems[0]?.failureLines).toEqual(['Test 1 error (TypeError) on input (x=1): nope']);
    expect(result.exceptions[0]?.kind).toBe('RUNTIME_ERROR');
  });

  it('should never execute a cell that fails the safety check', async () => {
    const problems = [problem([expectVars({ data: 1 }), expectVars({ data: 1 })])];
    const result = await grader().gradeNotebook(
      's1',
      notebook("const data = require('fs').readFileSync('x');"),
      problems
    );
    const score = result.problems[0];

    expect(score?.failure).toBe('SAFETY_VIOLATION');
    expect(score?.safetyViolations).toBe(1);
    expect(score?.outcomes.map((o) => o.failure)).toEqual(['SAFETY_VIOLATION', 'NOT_RUN']);
    expect(score?.failureLines[0]).toBe('Test 1 blocked on input (): Module "fs" is not allowed (filesystem)');
    expect(result.exceptions).toEqual([
      { kind: 'SAFETY_VIOLATION', problemIndex: 1, detail: 'Module "fs" is not allowed (filesystem) (line 1)' },
    ]);
  });
});

describe('Isolation', () => {
  it('should not leak bindings between students', async () => {
    const g = grader();
    await g.gradeNotebook('a', notebook('var leak = 1;\nconst y = 1;'), [problem([expectVars({ y: 1 })])]);
    const result = await g.gradeNotebook('b', notebook('const y = typeof leak;'), [
      problem([expectVars({ y: 'undefined' })]),
    ]);

    expect(result.total).toBe(1);
  });

  it('should carry bindings forward to later problems of the same student', async () => {
    const problems = [problem([expectVars({ base: 10 })]), problem([expectVars({ total: 15 })])];
    const result = await grader().gradeNotebook('s1', notebook('const base = 10;', 'const total = base + 5;'), problems);

    expect(result.total).toBe(2);
  });

  it('should give every test its own copy of objects built by earlier cells', async () => {
    const problems = [
      problem([expectVars({ ready: true })]),
      problem([expectVars({ c: 1 }), expectVars({ c: 1 })]),
    ];
    const result = await grader().gradeNotebook(
      's1',
      notebook('const m = new Map();\nconst ready = m.size === 0;', "m.set('c', (m.get('c') ?? 0) + 1);\nconst c = m.get('c');"),
      problems
    );

    expect(result.problems[1]?.outcomes.map((o) => o.diagnostic)).toEqual(['matched c=1', 'matched c=1']);
    expect(result.total).toBe(2);
  });

  it('should let functions from earlier cells print and read input in later tests', async () => {
    const problems = [
      problem([expectVars({ loaded: true })]),
      problem([{ kind: 'output', expected: '5', caseSensitive: false }]),
      problem([{ kind: 'variable', expected: { n: 5 }, stdin: ['4'], caseSensitive: false }]),
    ];
    const result = await grader().gradeNotebook(
      's1',
      notebook(
        "function show(v) { print(v); }\nfunction ask() { return input('n? '); }\nconst loaded = true;",
        'show(5);',
        'const n = Number(ask()) + 1;'
      ),
      problems
    );

    expect(result.problems.map((p) => p.passedCount)).toEqual([1, 1, 1]);
    expect(result.total).toBe(3);
  });

  it('should carry implicit globals to later problems', async () => {
    const problems = [problem([expectVars({ g: 9.8 })]), problem([expectVars({ w: 19.6 })])];
    const result = await grader().gradeNotebook('s1', notebook('g = 9.8;', 'const w = 2 * g;'), problems);

    expect(result.problems[1]?.failureLines).toEqual([]);
    expect(result.total).toBe(2);
  });

  it('should not carry the test variables of earlier problems', async () => {
    const problems = [problem([expectVars({ y: 6 }, { x: 3 })]), problem([expectVars({ seen: 'undefined', y: 6 })])];
    const result = await grader().gradeNotebook('s1', notebook('const y = x * 2;', 'const seen = typeof x;'), problems);

    expect(result.total).toBe(2);
  });
});

describe('Cells', () => {
  it('should bind the instructor lines first and let test variables override them', async () => {
    const cell = 'let rate = 2;\n\nconst out = rate * 3;';
    const problems = [problem([expectVars({ out: 6 }), expectVars({ out: 15 }, { rate: 5 })], { lineOffset: 1 })];
    const result = await grader().gradeNotebook('s1', notebook(cell), problems);

    expect(result.problems[0]?.passedCount).toBe(2);
  });

  it('should count only non-empty code cells', async () => {
    const nb: Notebook = {
      language: 'javascript',
      cells: [
        { cellType: 'markdown', source: '# Problem 1' },
        { cellType: 'code', source: '   ' },
        { cellType: 'code', source: 'const first = 1;' },
        { cellType: 'code', source: 'const second = 2;' },
      ],
    };
    const problems = [problem([expectVars({ first: 1 })]), problem([expectVars({ second: 2 })])];
    const result = await grader().gradeNotebook('s1', nb, problems);

    expect(result.problems.map((p) => p.cellIndex)).toEqual([1, 2]);
    expect(result.total).toBe(2);
  });

  it('should stop at a missing cell and fail the remaining problems', async () => {
    const problems = [
      problem([expectVars({ a: 1 })]),
      problem([expectVars({ b: 1 })], { cellOffset: 2 }),
      problem([expectVars({ c: 1 })]),
    ];
    const result = await grader().gradeNotebook('s1', notebook('const a = 1;', 'const b = 1;'), problems);

    expect(result.problems.map((p) => p.state)).toEqual(['SCORED', 'FAILED', 'FAILED']);
    expect(result.problems.map((p) => p.failure)).toEqual([undefined, 'UNREADABLE_CELL', 'UNREADABLE_CELL']);
    expect(result.unreadable).toBe('Code cell number 3 not found.');
    expect(result.exceptions).toEqual([
      { kind: 'UNREADABLE_CELL', problemIndex: 2, detail: 'Code cell number 3 not found.' },
    ]);
    expect(result.total).toBe(1);
    expect(result.maxTotal).toBe(3);
  });

  it('should reject a notebook with the wrong number of code cells', async () => {
    const problems = [problem([expectVars({ a: 1 })]), problem([expectVars({ b: 1 })])];
    const result = await grader({ strictCellCount: true }).gradeNotebook(
      's1',
      notebook('const a = 1;', 'const b = 1;', 'const c = 1;'),
      problems
    );

    expect(result.unreadable).toBe('Cell count mismatch: Expected 2 code cells, but found 3');
    expect(result.exceptions).toEqual([
      { kind: 'UNREADABLE_CELL', detail: 'Cell count mismatch: Expected 2 code cells, but found 3' },
    ]);
    expect(result.total).toBe(0);
  });

  it('should accept a trailing empty code cell', async () => {
    const problems = [problem([expectVars({ a: 1 })]), problem([expectVars({ b: 1 })])];
    const result = await grader({ strictCellCount: true }).gradeNotebook(
      's1',
      notebook('const a = 1;', 'const b = 1;', ''),
      problems
    );

    expect(result.unreadable).toBeUndefined();
    expect(result.total).toBe(2);
  });
});

describe('Helpers', () => {
  it('should sum problem points', () => {
    expect(maxScore([problem([], { points: 2 }), problem([]), problem([], { points: 0.5 })])).toBe(3.5);
  });

  it('should describe test inputs', () => {
    const test: TestCase = {
      kind: 'output',
      expected: 'x',
      variables: { x: 1, name: 'Ada' },
      stdin: ['3', '4'],
      caseSensitive: false,
    };
    expect(describeInputs(test)).toBe(`x=1, name='Ada', stdin ["3","4"]`);
  });

  it('should score a problem without tests as zero', async () => {
    const result = await grader().gradeNotebook('s1', notebook('const a = 1;'), [problem([])]);

    expect(result.problems[0]?.state).toBe('SCORED');
    expect(result.problems[0]?.earnedPoints).toBe(0);
  });
});
