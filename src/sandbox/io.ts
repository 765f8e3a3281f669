/**
 * I/O Isolation
 *
 * One scope per execution: a private output buffer and a private input queue.
 * Nothing process-wide is redirected, so scopes cannot see each other's data.
 */

import { formatWithOptions } from 'node:util';
import type { StdinScript } from '../core/types.js';
import type { CapturedIO, IOBridge, OutputStream } from './types.js';

export class IOHandle implements IOBridge {
  private stdin: StdinScript | undefined;
  private nextInput = 0;
  private closed = false;
  private output: string[] = [];
  private errorOutput: string[] = [];
  private prompts: string[] = [];
  private transcript = '';

  constructor(stdin?: StdinScript) {
    this.stdin = stdin;
  }

  write(stream: OutputStream, args: unknown[]): void {
    if (this.closed) return;

    const text = formatWithOptions({ colors: false }, ...args);
    const lines = text.split('\n');
    if (stream === 'stdout') {
      this.output.push(...lines);
      this.transcript += `${text}\n`;
    } else {
      this.errorOutput.push(...lines);
    }
  }

  read(prompt: unknown): string {
    if (this.closed) return '';

    const promptText = prompt === undefined || prompt === null ? '' : String(prompt);
    this.prompts.push(promptText);
    this.transcript += promptText;

    const stdin = this.stdin;
    if (stdin === undefined) return '';
    if (typeof stdin === 'object') {
      const value: unknown = stdin[this.nextInput];
      this.nextInput++;
      return value === undefined ? '' : String(value);
    }
    return String(stdin);
  }

  /** Stop accepting writes and reads; later calls are dropped */
  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Copy of what has been captured so far */
  snapshot(): CapturedIO {
    return {
      output: [...this.output],
      errorOutput: [...this.errorOutput],
      prompts: [...this.prompts],
      transcript: this.transcript,
    };
  }
}

/**
 * Open an I/O scope. The caller must close it; prefer withIsolation.
 */
export function isolate(stdin?: StdinScript): IOHandle {
  return new IOHandle(stdin);
}

/**
 * Run fn inside an I/O scope that is closed on every exit path,
 * including when fn throws.
 */
export async function withIsolation<T>(
  stdin: StdinScript | undefined,
  fn: (io: IOHandle) => T | Promise<T>
): Promise<T> {
  const io = isolate(stdin);
  try {
    return await fn(io);
  } finally {
    io.close();
  }
}
