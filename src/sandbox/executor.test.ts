/**
 * Sandbox Executor Tests
 *
 * Security-critical tests for:
 * 1. Timeout enforcement
 * 2. Safety gate before execution
 * 3. Namespace isolation
 * 4. Error containment
 */

import { describe, it, expect } from 'vitest';
import { complexParts } from '../core/values.js';
import { createExecutor } from './executor.js';
import { isolate } from './io.js';
import type { CodeInterpreter, InterpretResult } from './types.js';

const executor = createExecutor();

describe('Bindings', () => {
  it('should capture var, let, const and function bindings', async () => {
    const result = await executor.run(
      'var a = 1;\nlet b = a + 1;\nconst c = b * 3;\nfunction double(n) { return n * 2; }',
      {},
      1
    );

    expect(result.status).toBe('SUCCESS');
    expect(result.namespace.a).toBe(1);
    expect(result.namespace.b).toBe(2);
    expect(result.namespace.c).toBe(6);
    expect(typeof result.namespace.double).toBe('function');
  });

  it('should not report prelude helpers as bindings', async () => {
    const result = await executor.run('const x = 1;', {}, 1);
    const names = Object.keys(result.namespace);

    expect(names).toContain('x');
    expect(names).not.toContain('print');
    expect(names).not.toContain('console');
    expect(names).not.toContain('input');
  });

  it('should leave the caller namespace untouched', async () => {
    const namespaceIn = { x: 1, list: [1, 2] };
    const result = await executor.run('x = 5;\nlist.push(3);', namespaceIn, 1);

    expect(result.status).toBe('SUCCESS');
    expect(namespaceIn).toEqual({ x: 1, list: [1, 2] });
    expect(result.namespace.x).toBe(5);
    expect(JSON.stringify(result.namespace.list)).toBe('[1,2,3]');
  });

  it('should turn complex literals into in-context complex numbers', async () => {
    const result = await executor.run(
      'const size = z.abs();\nconst rotated = complex(1, 2).mul(complex(0, 1));',
      { z: { real: 3, imag: 4 } },
      1
    );

    expect(result.status).toBe('SUCCESS');
    expect(result.namespace.size).toBe(5);
    expect(complexParts(result.namespace.rotated)).toEqual({ re: -2, im: 1 });
  });

  it('should copy maps, sets, dates and typed arrays instead of sharing them', async () => {
    const m = new Map<string, number>([['a', 1]]);
    const s = new Set([1]);
    const d = new Date(0);
    const t = new Float64Array([1.5]);
    const nested = { counts: new Map([['n', 2n]]) };
    const result = await executor.run(
      "m.set('k', 2);\ns.add(2);\nd.setTime(5);\nt[0] = 9;\nnested.counts.set('n', 3n);\n" +
        "const summary = [m.size, s.size, d.getTime(), t[0], m instanceof Map, t instanceof Float64Array, nested.counts.get('n')].join(',');",
      { m, s, d, t, nested },
      1
    );

    expect(result.status).toBe('SUCCESS');
    expect(result.namespace.summary).toBe('2,2,5,9,true,true,3');
    expect([...m.entries()]).toEqual([['a', 1]]);
    expect([...s]).toEqual([1]);
    expect(d.getTime()).toBe(0);
    expect(t[0]).toBe(1.5);
    expect(nested.counts.get('n')).toBe(2n);
  });

  it('should refuse a function binding instead of sharing it', async () => {
    const result = await executor.run('const y = f();', { f: () => 1 }, 1);

    expect(result.status).toBe('RUNTIME_ERROR');
    expect(result.error).toEqual({
      name: 'DataCloneError',
      message: 'Binding "f" cannot be copied into the sandbox: f is a function',
    });
  });

  it('should refuse a class instance nested in a binding', async () => {
    class Point {
      constructor(public x: number) {}
    }
    const result = await executor.run('const y = 1;', { shapes: { origin: new Point(0) } }, 1);

    expect(result.status).toBe('RUNTIME_ERROR');
    expect(result.error?.message).toBe('Binding "shapes" cannot be copied into the sandbox: shapes.origin is not plain data');
  });

  it('should not carry state between runs', async () => {
    await executor.run('var leftover = 42;', {}, 1);
    const result = await executor.run('const seen = typeof leftover;', {}, 1);
    expect(result.namespace.seen).toBe('undefined');
  });

  it('should run TypeScript cells', async () => {
    const result = await executor.run('const n: number = 4;\nprint(n * 2);', {}, 1, { language: 'typescript' });

    expect(result.status).toBe('SUCCESS');
    expect(result.output).toEqual(['8']);
    expect(result.namespace.n).toBe(4);
  });
});

describe('Preamble steps', () => {
  it('should carry bindings from earlier steps and discard their output', async () => {
    const result = await executor.run('const total = base + n;', { n: 1 }, 1, {
      preamble: [{ code: "var base = 10;\nprint('hidden');" }, { code: 'base = base * 2;' }],
    });

    expect(result.status).toBe('SUCCESS');
    expect(result.namespace.total).toBe(21);
    expect(result.output).toEqual([]);
  });

  it('should carry implicit globals', async () => {
    const result = await executor.run('const w = 2 * g;', {}, 1, { preamble: [{ code: 'g = 9.8;' }] });

    expect(result.namespace.w).toBe(19.6);
  });

  it('should drop step bindings the step left untouched', async () => {
    const result = await executor.run('const seen = typeof x;', {}, 1, {
      preamble: [{ code: 'const doubled = x * 2;', bindings: { x: 4 } }],
    });

    expect(result.namespace.doubled).toBe(8);
    expect(result.namespace.seen).toBe('undefined');
  });

  it('should send I/O of functions from earlier steps to the current scope', async () => {
    const result = await executor.run('show(5);\nconst answer = ask();', {}, 1, {
      stdin: ['yes'],
      preamble: [{ code: "function show(v) { print(v); }\nfunction ask() { return input('? '); }", stdin: ['no'] }],
    });

    expect(result.status).toBe('SUCCESS');
    expect(result.output).toEqual(['5']);
    expect(result.prompts).toEqual(['? ']);
    expect(result.namespace.answer).toBe('yes');
  });

  it('should rebuild objects from earlier steps on every run', async () => {
    const preamble = [{ code: 'const m = new Map();' }];
    const code = "m.set('c', (m.get('c') ?? 0) + 1);\nconst c = m.get('c');";
    const first = await executor.run(code, {}, 1, { preamble });
    const second = await executor.run(code, {}, 1, { preamble });

    expect(first.namespace.c).toBe(1);
    expect(second.namespace.c).toBe(1);
  });

  it('should share one deadline between the preamble and the code', async () => {
    const result = await executor.run('while (true) {}', {}, 0.5, {
      preamble: [{ code: 'const t0 = Date.now();\nwhile (Date.now() - t0 < 400) {}' }],
    });

    expect(result.status).toBe('TIMEOUT');
    expect(result.durationMs).toBeLessThan(800);
  });

  it('should report a preamble step that throws', async () => {
    const result = await executor.run('const y = 1;', {}, 1, { preamble: [{ code: "throw new RangeError('early');" }] });

    expect(result.status).toBe('RUNTIME_ERROR');
    expect(result.error).toEqual({ name: 'RangeError', message: 'early' });
  });

  it('should refuse a run whose preamble fails the safety check', async () => {
    const result = await executor.execute('const y = 1;', {}, 1, { preamble: [{ code: "require('fs');" }] });

    expect(result.status).toBe('SAFETY_VIOLATION');
    expect(result.violation?.category).toBe('filesystem');
  });
});

describe('I/O', () => {
  it('should capture printed lines and scripted input', async () => {
    const result = await executor.run(
      "const a = input('a? ');\nconst b = prompt('b? ');\nprint(Number(a) + Number(b));",
      {},
      1,
      { stdin: ['3', '4'] }
    );

    expect(result.status).toBe('SUCCESS');
    expect(result.output).toEqual(['7']);
    expect(result.prompts).toEqual(['a? ', 'b? ']);
    expect(result.transcript).toBe('a? b? 7\n');
  });

  it('should route console.error to the error lines', async () => {
    const result = await executor.run("console.log('out');\nconsole.error('err');", {}, 1);

    expect(result.output).toEqual(['out']);
    expect(result.errorOutput).toEqual(['err']);
  });

  it('should write into a caller-owned scope without closing it', async () => {
    const io = isolate();
    await executor.run("print('into caller scope');", {}, 1, { io });

    expect(io.isClosed).toBe(false);
    expect(io.snapshot().output).toEqual(['into caller scope']);
  });
});

describe('Timeout enforcement', () => {
  it('should stop an infinite loop', async () => {
    const result = await executor.run('while (true) {}', {}, 0.2);

    expect(result.status).toBe('TIMEOUT');
    expect(result.namespace).toEqual({});
    expect(result.durationMs).toBeLessThan(2000);
  });

  it('should keep output printed before the timeout', async () => {
    const result = await executor.run("print('started');\nwhile (true) {}", {}, 0.2);

    expect(result.status).toBe('TIMEOUT');
    expect(result.output).toEqual(['started']);
  });
});

describe('Error containment', () => {
  it('should report a thrown error by name and message', async () => {
    const result = await executor.run("var before = 1;\nthrow new RangeError('bad value');", {}, 1);

    expect(result.status).toBe('RUNTIME_ERROR');
    expect(result.error).toEqual({ name: 'RangeError', message: 'bad value' });
    expect(result.namespace.before).toBe(1);
  });

  it('should report a syntax error', async () => {
    const result = await executor.run('const = 3;', {}, 1);

    expect(result.status).toBe('RUNTIME_ERROR');
    expect(result.error?.name).toBe('SyntaxError');
  });

  it('should refuse code generation from strings', async () => {
    const result = await executor.run("const f = new Function('return 1');", {}, 1);

    expect(result.status).toBe('RUNTIME_ERROR');
    expect(result.error?.name).toBe('EvalError');
  });

  it('should serve only allowed modules through require', async () => {
    const allowed = await executor.run("const path = require('path');\nprint(path.posix.join('a', 'b'));", {}, 1);
    expect(allowed.output).toEqual(['a/b']);

    const denied = await executor.run("require('fs');", {}, 1);
    expect(denied.status).toBe('RUNTIME_ERROR');
    expect(denied.error?.message).toBe('Module "fs" is not available');
  });

  it('should turn an interpreter failure into a runtime error', async () => {
    const broken: CodeInterpreter = {
      capabilities: { enforcesTimeout: false },
      interpret: async (): Promise<InterpretResult> => {
        throw new TypeError('interpreter crashed');
      },
    };
    const withBroken = createExecutor({ interpreter: broken });

    expect(withBroken.capabilities.enforcesTimeout).toBe(false);
    const result = await withBroken.run('1', {}, 1);
    expect(result.status).toBe('RUNTIME_ERROR');
    expect(result.error).toEqual({ name: 'TypeError', message: 'interpreter crashed' });
  });
});

describe('Safety gate', () => {
  it('should never run refused code', async () => {
    const result = await executor.execute("print('ran');\nrequire('fs');", {}, 1);

    expect(result.status).toBe('SAFETY_VIOLATION');
    expect(result.output).toEqual([]);
    expect(result.violation?.category).toBe('filesystem');
    expect(result.violation?.line).toBe(2);
  });

  it('should run allowed code', async () => {
    const result = await executor.execute('const total = 2 + 3;', {}, 1);

    expect(result.status).toBe('SUCCESS');
    expect(result.namespace.total).toBe(5);
  });

  it('should give the same result for the same code and namespace', async () => {
    const code = 'const squares = values.map((v) => v * v);\nprint(squares.join(","));';
    const first = await executor.execute(code, { values: [1, 2, 3] }, 1);
    const second = await executor.execute(code, { values: [1, 2, 3] }, 1);

    expect(second.status).toBe(first.status);
    expect(second.output).toEqual(first.output);
    expect(JSON.stringify(second.namespace)).toBe(JSON.stringify(first.namespace));
    expect(first.output).toEqual(['1,4,9']);
  });
});
