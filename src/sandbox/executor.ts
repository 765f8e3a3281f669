/**
 * Sandbox Executor
 *
 * Runs a code fragment against a namespace with a wall-clock limit.
 *
 * Security invariants:
 * - execute() never runs code the safety checker refuses
 * - Each run gets a fresh interpreter context and a fresh I/O scope
 * - The caller's namespace is never mutated
 * - Student errors become results; they never propagate
 */

import type { Namespace, StdinScript } from '../core/types.js';
import { checkSafety } from '../safety/checker.js';
import { DEFAULT_SAFETY_POLICY } from '../safety/policy.js';
import type { SafetyPolicy, SafetyVerdict } from '../safety/types.js';
import { isolate, withIsolation, type IOHandle } from './io.js';
import { VmInterpreter, describeError } from './vm-interpreter.js';
import type {
  CellLanguage,
  CodeInterpreter,
  ExecutionResult,
  ExecutionStep,
  InterpretResult,
  InterpreterCapabilities,
} from './types.js';

export interface ExecutorOptions {
  /** Defaults to a VmInterpreter serving the policy's allowed modules */
  interpreter?: CodeInterpreter;
  policy?: SafetyPolicy;
  /** Language assumed when a run does not name one */
  language?: CellLanguage;
}

export interface RunOptions {
  /** Existing I/O scope; the caller stays responsible for closing it */
  io?: IOHandle;
  /** Scripted input for a scope opened by the executor */
  stdin?: StdinScript;
  language?: CellLanguage;
  /** Steps run first, in order, inside the same time limit */
  preamble?: ExecutionStep[];
}

export class BoundedExecutor {
  private interpreter: CodeInterpreter;
  private policy: SafetyPolicy;
  private language: CellLanguage;

  constructor(options: ExecutorOptions = {}) {
    this.policy = options.policy ?? DEFAULT_SAFETY_POLICY;
    this.interpreter =
      options.interpreter ?? new VmInterpreter({ allowedModules: this.policy.allowedModules });
    this.language = options.language ?? 'javascript';
  }

  get capabilities(): InterpreterCapabilities {
    return this.interpreter.capabilities;
  }

  /** Safety verdict under this executor's policy */
  check(code: string): SafetyVerdict {
    return checkSafety(code, this.policy);
  }

  /**
   * Run code without the safety gate.
   *
   * Resolves with TIMEOUT when the preamble and the code together exceed
   * timeoutSeconds, and with RUNTIME_ERROR when either throws.
   */
  async run(
    code: string,
    namespaceIn: Namespace,
    timeoutSeconds: number,
    options: RunOptions = {}
  ): Promise<ExecutionResult> {
    if (options.io) {
      return this.runIn(options.io, code, namespaceIn, timeoutSeconds, options);
    }
    return withIsolation(options.stdin, (scope) => this.runIn(scope, code, namespaceIn, timeoutSeconds, options));
  }

  /**
   * Safety-check the preamble steps and the code, then run. Refused code
   * resolves with SAFETY_VIOLATION and is never handed to the interpreter.
   */
  async execute(
    code: string,
    namespaceIn: Namespace,
    timeoutSeconds: number,
    options: RunOptions = {}
  ): Promise<ExecutionResult> {
    const fragments = [...(options.preamble ?? []).map((step) => step.code), code];
    for (const fragment of fragments) {
      const verdict = this.check(fragment);
      if (verdict.allowed) continue;
      return {
        status: 'SAFETY_VIOLATION',
        namespace: {},
        output: [],
        errorOutput: [],
        prompts: [],
        transcript: '',
        violation: verdict.violation,
        durationMs: 0,
      };
    }
    return this.run(code, namespaceIn, timeoutSeconds, options);
  }

  private async runIn(
    io: IOHandle,
    code: string,
    namespaceIn: Namespace,
    timeoutSeconds: number,
    options: RunOptions
  ): Promise<ExecutionResult> {
    const timeoutMs = Math.max(1, timeoutSeconds * 1000);
    const bindings: Namespace = { ...namespaceIn };
    const stepScopes = (options.preamble ?? []).map((step) => ({ step, io: isolate(step.stdin) }));
    const startedAt = performance.now();

    let interpreted: InterpretResult;
    try {
      interpreted = await this.interpreter.interpret(code, bindings, {
        timeoutMs,
        language: options.language ?? this.language,
        io,
        preamble: stepScopes.map(({ step, io: stepIO }) => ({ code: step.code, bindings: step.bindings ?? {}, io: stepIO })),
      });
    } catch (error) {
      interpreted = { kind: 'threw', error: describeError(error), namespace: {} };
    } finally {
      for (const scope of stepScopes) scope.io.close();
    }

    const durationMs = performance.now() - startedAt;
    const captured = io.snapshot();

    switch (interpreted.kind) {
      case 'completed':
        return { status: 'SUCCESS', namespace: interpreted.namespace, ...captured, durationMs };
      case 'threw':
        return {
          status: 'RUNTIME_ERROR',
          namespace: interpreted.namespace,
          ...captured,
          error: interpreted.error,
          durationMs,
        };
      case 'timed-out':
        return { status: 'TIMEOUT', namespace: {}, ...captured, durationMs };
    }
  }
}

/**
 * Create an executor
 */
export function createExecutor(options: ExecutorOptions = {}): BoundedExecutor {
  return new BoundedExecutor(options);
}
