/**
 * Default safety policy
 *
 * Catches the common ways a notebook cell reaches outside the sandbox.
 * Pattern matching only: obfuscated code can get past it.
 */

import type { SafetyPolicy, ViolationCategory } from './types.js';

const DENIED_MODULES: Record<string, ViolationCategory> = {
  fs: 'filesystem',
  'fs/promises': 'filesystem',
  child_process: 'process',
  cluster: 'process',
  worker_threads: 'process',
  process: 'process',
  os: 'process',
  v8: 'process',
  async_hooks: 'process',
  perf_hooks: 'process',
  readline: 'process',
  repl: 'process',
  net: 'network',
  http: 'network',
  https: 'network',
  http2: 'network',
  dgram: 'network',
  dns: 'network',
  tls: 'network',
  vm: 'introspection',
  inspector: 'introspection',
  module: 'introspection',
};

const DENIED_GLOBALS: Record<string, ViolationCategory> = {
  process: 'process',
  Deno: 'process',
  Bun: 'process',
  __dirname: 'filesystem',
  __filename: 'filesystem',
  fetch: 'network',
  XMLHttpRequest: 'network',
  WebSocket: 'network',
  EventSource: 'network',
  navigator: 'network',
  eval: 'introspection',
  Function: 'introspection',
  globalThis: 'introspection',
  global: 'introspection',
  Reflect: 'introspection',
  Proxy: 'introspection',
  WebAssembly: 'introspection',
};

export const DEFAULT_SAFETY_POLICY: SafetyPolicy = {
  deniedModules: DENIED_MODULES,
  allowedModules: ['assert', 'util', 'events', 'path', 'url', 'querystring', 'string_decoder'],
  deniedGlobals: DENIED_GLOBALS,
  deniedProperties: [
    'constructor',
    '__proto__',
    'caller',
    'callee',
    'getPrototypeOf',
    'setPrototypeOf',
    '__defineGetter__',
    '__defineSetter__',
    '__lookupGetter__',
    '__lookupSetter__',
  ],
  denyDynamicImport: true,
  denyWith: true,
  shellCommands: [
    'pip', 'conda', 'apt', 'npm', 'npx', 'yarn', 'node', 'python', 'python3',
    'sh', 'bash', 'ls', 'cat', 'rm', 'cp', 'mv', 'mkdir', 'touch', 'chmod',
    'curl', 'wget', 'git', 'cd', 'echo',
  ],
};

/** Policy with some fields replaced; record fields are merged over the defaults */
export function extendPolicy(overrides: Partial<SafetyPolicy>): SafetyPolicy {
  return {
    ...DEFAULT_SAFETY_POLICY,
    ...overrides,
    deniedModules: { ...DEFAULT_SAFETY_POLICY.deniedModules, ...overrides.deniedModules },
    deniedGlobals: { ...DEFAULT_SAFETY_POLICY.deniedGlobals, ...overrides.deniedGlobals },
  };
}
