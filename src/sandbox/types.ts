/**
 * Sandbox Types
 *
 * Types for isolated execution of notebook cells.
 * Student code sees only the bindings and I/O helpers the executor installs.
 */

import type { Namespace, StdinScript } from '../core/types.js';
import type { SafetyViolation } from '../safety/types.js';

/** Source language of a cell */
export type CellLanguage = 'javascript' | 'typescript';

/** Outcome of one execution */
export type ExecutionStatus =
  | 'SUCCESS'
  | 'SAFETY_VIOLATION'
  | 'TIMEOUT'
  | 'RUNTIME_ERROR';

/** Error raised by student code */
export interface ExecutionError {
  /** Error class name, e.g. TypeError */
  name: string;
  message: string;
}

/** Result of running one code fragment */
export interface ExecutionResult {
  status: ExecutionStatus;
  /** Bindings after the run (empty on timeout or safety violation) */
  namespace: Namespace;
  /** Printed lines, in program order */
  output: string[];
  /** Lines written to console.warn / console.error */
  errorOutput: string[];
  /** Prompts passed to input()/prompt() */
  prompts: string[];
  /** Everything written, prompts included, as one text */
  transcript: string;
  /** Runtime error detail */
  error?: ExecutionError;
  /** Safety violation detail */
  violation?: SafetyViolation;
  /** Wall-clock duration measured by the host */
  durationMs: number;
}

/** Output stream a helper writes to */
export type OutputStream = 'stdout' | 'stderr';

/**
 * Host side of an I/O scope
 *
 * Handed to the interpreter; student code reaches it only through
 * in-context wrappers.
 */
export interface IOBridge {
  write(stream: OutputStream, args: unknown[]): void;
  read(prompt: unknown): string;
}

/** Snapshot of what an I/O scope captured */
export interface CapturedIO {
  output: string[];
  errorOutput: string[];
  prompts: string[];
  transcript: string;
}

/**
 * Code run ahead of the main fragment in the same run, such as the cells
 * of earlier problems. Its bindings carry forward; its output is discarded.
 */
export interface ExecutionStep {
  code: string;
  /** Visible while this step runs; dropped afterwards unless the step reassigns them */
  bindings?: Namespace;
  stdin?: StdinScript;
}

/** A preamble step as the interpreter receives it */
export interface InterpretStep {
  code: string;
  bindings: Namespace;
  io: IOBridge;
}

/** Options for one interpretation */
export interface InterpretOptions {
  /** Wall-clock limit in milliseconds, shared by the preamble and the code */
  timeoutMs: number;
  language: CellLanguage;
  io: IOBridge;
  preamble?: InterpretStep[];
}

/** What an interpreter reports back to the executor */
export type InterpretResult =
  | { kind: 'completed'; namespace: Namespace }
  | { kind: 'threw'; error: ExecutionError; namespace: Namespace }
  | { kind: 'timed-out' };

/** Feature flags of an interpreter */
export interface InterpreterCapabilities {
  /**
   * Whether runs are cut off at the timeout.
   * When false, TIMEOUT is never reported and a hang must be handled by the operator.
   */
  enforcesTimeout: boolean;
}

/**
 * Runs a code fragment against a mapping of bindings.
 *
 * Implementations must not mutate `bindings` and must not let state
 * survive between calls. Host values are copied in, never shared.
 */
export interface CodeInterpreter {
  readonly capabilities: InterpreterCapabilities;
  interpret(code: string, bindings: Namespace, options: InterpretOptions): Promise<InterpretResult>;
}
