/**
 * Sandbox Module
 *
 * Bounded execution of notebook cells with private I/O.
 */

export type {
  CellLanguage,
  ExecutionStatus,
  ExecutionError,
  ExecutionResult,
  OutputStream,
  IOBridge,
  CapturedIO,
  ExecutionStep,
  InterpretStep,
  InterpretOptions,
  InterpretResult,
  InterpreterCapabilities,
  CodeInterpreter,
} from './types.js';

export type { ExecutorOptions, RunOptions } from './executor.js';
export type { PreparedBinding } from './transport.js';

export { IOHandle, isolate, withIsolation } from './io.js';
export { VmInterpreter, PRELUDE_NAMES, describeError } from './vm-interpreter.js';
export { BoundedExecutor, createExecutor } from './executor.js';
export { prepareBinding } from './transport.js';
