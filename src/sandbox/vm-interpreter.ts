/**
 * VM Interpreter
 *
 * Runs cells in a fresh node:vm context per step.
 *
 * Security invariants:
 * - No string code generation (eval, Function) inside the context
 * - No host function reachable from student code; helpers are created in-context
 * - Timeout covers evaluation and the microtasks it queues
 * - Bindings are copied in; the caller's namespace is never touched
 * - One deadline covers every step of a run
 */

import vm from 'node:vm';
import { createRequire } from 'node:module';
import ts from 'typescript';
import type { Namespace } from '../core/types.js';
import { inheritedDataValue } from '../core/values.js';
import { DEFAULT_SAFETY_POLICY } from '../safety/policy.js';
import { collectTopLevelNames, parseFragment, usesModuleSyntax } from '../safety/syntax.js';
import { prepareBinding } from './transport.js';
import type {
  CellLanguage,
  CodeInterpreter,
  ExecutionError,
  InterpretOptions,
  InterpretResult,
  InterpreterCapabilities,
  IOBridge,
} from './types.js';

/** Settings shared by every step of one interpretation */
interface StepSettings {
  bridge: IOBridge;
  language: CellLanguage;
  /** performance.now() value at which the whole run is out of time */
  deadline: number;
  /** Drop bindings the step received and left untouched */
  transient: boolean;
}

/** Globals installed by the prelude; never reported as student bindings */
export const PRELUDE_NAMES: ReadonlySet<string> = new Set([
  'print',
  'console',
  'input',
  'prompt',
  'Complex',
  'complex',
  'require',
  'module',
  'exports',
]);

const PRELUDE = `(function (write, read, hostRequire) {
  'use strict';
  const define = (name, value) => {
    Object.defineProperty(globalThis, name, { value, writable: true, configurable: true, enumerable: false });
  };

  class Complex {
    constructor(re, im) {
      this.re = re === undefined ? 0 : Number(re);
      this.im = im === undefined ? 0 : Number(im);
    }
    static from(value) {
      return value instanceof Complex ? value : new Complex(value, 0);
    }
    add(other) {
      const o = Complex.from(other);
      return new Complex(this.re + o.re, this.im + o.im);
    }
    sub(other) {
      const o = Complex.from(other);
      return new Complex(this.re - o.re, this.im - o.im);
    }
    mul(other) {
      const o = Complex.from(other);
      return new Complex(this.re * o.re - this.im * o.im, this.re * o.im + this.im * o.re);
    }
    div(other) {
      const o = Complex.from(other);
      const d = o.re * o.re + o.im * o.im;
      return new Complex((this.re * o.re + this.im * o.im) / d, (this.im * o.re - this.re * o.im) / d);
    }
    abs() {
      return Math.hypot(this.re, this.im);
    }
    conj() {
      return new Complex(this.re, -this.im);
    }
    toString() {
      const sign = this.im < 0 || Object.is(this.im, -0) ? '-' : '+';
      return '(' + this.re + sign + Math.abs(this.im) + 'j)';
    }
  }

  const print = (...args) => { write('stdout', args); };
  const warn = (...args) => { write('stderr', args); };
  const input = (message) => read(message);

  const loaded = Object.create(null);
  const require = (name) => {
    const id = String(name);
    if (!(id in loaded)) {
      const exported = hostRequire(id);
      if (exported === undefined) throw new Error('Module "' + id + '" is not available');
      loaded[id] = exported;
    }
    return loaded[id];
  };
  const module = { exports: {} };

  define('print', print);
  define('console', Object.freeze({ log: print, info: print, debug: print, warn, error: warn }));
  define('input', input);
  define('prompt', input);
  define('Complex', Complex);
  define('complex', (re, im) => new Complex(re, im));
  define('require', require);
  define('module', module);
  define('exports', module.exports);

  const typed = {
    Int8Array, Uint8Array, Uint8ClampedArray, Int16Array, Uint16Array, Int32Array,
    Uint32Array, Float32Array, Float64Array, BigInt64Array, BigUint64Array,
  };
  const revive = (json) => JSON.parse(json, (key, value) => {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) return value;
    const keys = Object.keys(value);
    if (keys.length !== 1) return value;
    const data = value[keys[0]];
    switch (keys[0]) {
      case '__complex__': return new Complex(data[0], data[1]);
      case '__number__': return Number(data);
      case '__bigint__': return BigInt(data);
      case '__undefined__': return undefined;
      case '__date__': return new Date(data);
      case '__map__': return new Map(data);
      case '__set__': return new Set(data);
      case '__typed__': return typed[data[0]].from(data[1]);
      default: return value;
    }
  });
  return { revive };
})`;

/** In-context side of the prelude */
interface PreludeExports {
  revive: (json: string) => unknown;
}

type PreludeInstaller = (
  write: IOBridge['write'],
  read: IOBridge['read'],
  hostRequire: (id: string) => unknown
) => PreludeExports;

function isPreludeInstaller(value: unknown): value is PreludeInstaller {
  return typeof value === 'function';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isTimeoutError(error: unknown): boolean {
  return isRecord(error) && inheritedDataValue(error, 'code') === 'ERR_SCRIPT_EXECUTION_TIMEOUT';
}

/**
 * Name and message of anything thrown, read without invoking accessors
 */
export function describeError(error: unknown): ExecutionError {
  if (isRecord(error)) {
    const name = inheritedDataValue(error, 'name');
    const message = inheritedDataValue(error, 'message');
    return {
      name: typeof name === 'string' ? name : 'Error',
      message: typeof message === 'string' ? message : '[non-error object thrown]',
    };
  }
  return { name: 'Error', message: String(error) };
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/** Source that reads back every student binding from inside the context */
function captureSource(lexicalNames: string[]): string {
  const hidden = JSON.stringify([...PRELUDE_NAMES]);
  const reads = lexicalNames
    .filter((name) => IDENTIFIER.test(name))
    .map((name) => `  try { __captured__[${JSON.stringify(name)}] = ${name}; } catch (_) {}`)
    .join('\n');
  return `(() => {
  const __captured__ = {};
  const __hidden__ = ${hidden};
  const __copy__ = (source) => {
    for (const key of Object.keys(source)) {
      if (__hidden__.includes(key)) continue;
      const descriptor = Object.getOwnPropertyDescriptor(source, key);
      if (descriptor && 'value' in descriptor) __captured__[key] = descriptor.value;
    }
  };
  __copy__(globalThis);
  const __module__ = Object.getOwnPropertyDescriptor(globalThis, 'module');
  if (__module__ && __module__.value && typeof __module__.value.exports === 'object' && __module__.value.exports) {
    __copy__(__module__.value.exports);
  }
${reads}
  return __captured__;
})()`;
}

export interface VmInterpreterOptions {
  /** Modules the sandboxed require() may load */
  allowedModules?: string[];
}

export class VmInterpreter implements CodeInterpreter {
  readonly capabilities: InterpreterCapabilities = { enforcesTimeout: true };
  private allowedModules: string[];
  private nodeRequire = createRequire(import.meta.url);

  constructor(options: VmInterpreterOptions = {}) {
    this.allowedModules = options.allowedModules ?? DEFAULT_SAFETY_POLICY.allowedModules;
  }

  private hostRequire = (id: string): unknown => {
    const name = id.startsWith('node:') ? id.slice('node:'.length) : id;
    if (!this.allowedModules.includes(name)) return undefined;
    return this.nodeRequire(name);
  };

  /**
   * Turn the cell into script source, transpiling when it is TypeScript
   * or uses import/export
   */
  private compile(code: string, language: InterpretOptions['language']): { source: string; lexicalNames: string[] } {
    const sourceFile = parseFragment(code);
    const lexicalNames = collectTopLevelNames(sourceFile);

    if (language === 'javascript' && !usesModuleSyntax(sourceFile)) {
      return { source: code, lexicalNames };
    }

    const transpiled = ts.transpileModule(code, {
      compilerOptions: {
        module: ts.ModuleKind.CommonJS,
        target: ts.ScriptTarget.ES2020,
        esModuleInterop: true,
      },
    });
    return { source: transpiled.outputText, lexicalNames };
  }

  /**
   * Run the preamble steps, then the code, each in a fresh context.
   *
   * Bindings left by a step are passed on to the next; they are objects of
   * this run only. Every context writes through one bridge that points at
   * the I/O scope of whichever step is running, so a function defined by an
   * earlier step prints into the current scope.
   */
  async interpret(code: string, bindings: Namespace, options: InterpretOptions): Promise<InterpretResult> {
    const deadline = performance.now() + options.timeoutMs;
    let active: IOBridge | null = null;
    const bridge: IOBridge = {
      write: (stream, args) => {
        active?.write(stream, args);
      },
      read: (prompt) => (active ? active.read(prompt) : ''),
    };
    const settings = { bridge, language: options.language, deadline };

    try {
      let carried: Namespace = {};
      for (const step of options.preamble ?? []) {
        active = step.io;
        const outcome = this.runStep(step.code, carried, step.bindings, { ...settings, transient: true });
        if (outcome.kind !== 'completed') return outcome;
        carried = outcome.namespace;
      }

      active = options.io;
      return this.runStep(code, carried, bindings, { ...settings, transient: false });
    } finally {
      active = null;
    }
  }

  private runStep(code: string, carried: Namespace, bindings: Namespace, settings: StepSettings): InterpretResult {
    if (performance.now() >= settings.deadline) return { kind: 'timed-out' };

    const context = vm.createContext(
      {},
      {
        name: 'notebook-cell',
        codeGeneration: { strings: false, wasm: false },
        microtaskMode: 'afterEvaluate',
      }
    );

    const installer: unknown = vm.runInContext(PRELUDE, context);
    if (!isPreludeInstaller(installer)) {
      throw new Error('Sandbox prelude did not evaluate to a function');
    }
    const prelude = installer(
      (stream, args) => settings.bridge.write(stream, args),
      (prompt) => settings.bridge.read(prompt),
      this.hostRequire
    );

    for (const [name, value] of Object.entries(carried)) {
      context[name] = value;
    }

    const installed = new Map<string, unknown>();
    for (const [name, value] of Object.entries(bindings)) {
      if (PRELUDE_NAMES.has(name)) continue;
      const prepared = prepareBinding(name, value);
      if (prepared.kind === 'uncopyable') {
        return { kind: 'threw', error: { name: 'DataCloneError', message: prepared.reason }, namespace: {} };
      }
      const copy = prepared.kind === 'json' ? prelude.revive(prepared.json) : prepared.value;
      context[name] = copy;
      installed.set(name, copy);
    }

    let thrown: ExecutionError | null = null;
    let lexicalNames: string[] = [];
    try {
      const compiled = this.compile(code, settings.language);
      lexicalNames = compiled.lexicalNames;
      const script = new vm.Script(compiled.source, { filename: 'cell.js' });
      const remaining = settings.deadline - performance.now();
      script.runInContext(context, { timeout: Math.max(1, Math.round(remaining)) });
    } catch (error) {
      if (isTimeoutError(error)) return { kind: 'timed-out' };
      thrown = describeError(error);
    }

    let namespace: Namespace = {};
    try {
      const remaining = Math.max(10, Math.round(settings.deadline - performance.now()));
      const captured: unknown = vm.runInContext(captureSource(lexicalNames), context, { timeout: remaining });
      if (isRecord(captured)) namespace = { ...captured };
    } catch (error) {
      // the run itself already failed; its error is the one worth reporting
      if (!thrown) {
        if (isTimeoutError(error)) return { kind: 'timed-out' };
        thrown = describeError(error);
      }
    }

    if (settings.transient) {
      namespace = Object.fromEntries(
        Object.entries(namespace).filter(([name, value]) => !installed.has(name) || !Object.is(installed.get(name), value))
      );
    }

    return thrown ? { kind: 'threw', error: thrown, namespace } : { kind: 'completed', namespace };
  }
}
