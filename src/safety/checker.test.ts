/**
 * Safety Checker Tests
 */

import { describe, it, expect } from 'vitest';
import { checkModule, checkSafety } from './checker.js';
import { DEFAULT_SAFETY_POLICY, extendPolicy } from './policy.js';

describe('Allowed code', () => {
  it.each([
    ['arithmetic', 'const x = 1 + 2;\nprint(x);'],
    ['allowed require', "const util = require('util');"],
    ['allowed import', "import { join } from 'path';"],
    ['denied names inside strings', "const s = 'eval and fetch are just words';"],
    ['denied names as property keys', 'const o = { eval: 1 };\nprint(o.eval);'],
    ['names the student declares', "const fetch = (u) => u;\nfetch('a');"],
    ['negation at line start', "let done = false;\n!done && print('x');"],
    ['Object.prototype method names', 'const t = toString();'],
  ])('should allow %s', (_label, code) => {
    expect(checkSafety(code)).toEqual({ allowed: true });
  });
});

describe('Module access', () => {
  it('should refuse a static import of fs', () => {
    expect(checkSafety("import fs from 'fs';")).toEqual({
      allowed: false,
      violation: {
        category: 'filesystem',
        construct: "import 'fs'",
        line: 1,
        reason: 'Module "fs" is not allowed (filesystem)',
      },
    });
  });

  it('should refuse require of a node: prefixed process module', () => {
    const verdict = checkSafety("const x = 1;\nconst cp = require('node:child_process');");

    expect(verdict.allowed).toBe(false);
    expect(verdict.violation?.category).toBe('process');
    expect(verdict.violation?.construct).toBe("require('node:child_process')");
    expect(verdict.violation?.line).toBe(2);
  });

  it('should refuse modules missing from the allow list', () => {
    expect(checkModule('lodash', DEFAULT_SAFETY_POLICY)).toEqual({
      category: 'dynamic-import',
      reason: 'Module "lodash" is not on the allow list',
    });
    expect(checkModule('node:path', DEFAULT_SAFETY_POLICY)).toBeNull();
  });

  it('should refuse require with a computed name', () => {
    const verdict = checkSafety("const name = 'f' + 's';\nrequire(name);");
    expect(verdict.violation?.construct).toBe('require(...)');
    expect(verdict.violation?.category).toBe('dynamic-import');
  });

  it('should refuse dynamic import()', () => {
    const verdict = checkSafety("import('os').then(() => {});");
    expect(verdict.violation?.category).toBe('dynamic-import');
    expect(verdict.violation?.construct).toBe('import()');
  });
});

describe('Globals and introspection', () => {
  it('should refuse network globals', () => {
    const verdict = checkSafety("fetch('http://localhost');");
    expect(verdict.violation).toEqual({
      category: 'network',
      construct: 'fetch',
      line: 1,
      reason: 'Use of fetch is not allowed (network)',
    });
  });

  it('should refuse eval', () => {
    expect(checkSafety("eval('1');").violation?.reason).toBe('Use of eval is not allowed (introspection)');
  });

  it('should refuse globalThis', () => {
    expect(checkSafety('globalThis.x = 1;').violation?.construct).toBe('globalThis');
  });

  it('should refuse .constructor access', () => {
    const verdict = checkSafety('const f = (() => {}).constructor;');
    expect(verdict.violation?.construct).toBe('.constructor');
    expect(verdict.violation?.reason).toBe('Access to .constructor is not allowed');
  });

  it('should refuse bracket access to __proto__', () => {
    const verdict = checkSafety("const o = {};\nconst p = o['__proto__'];");
    expect(verdict.violation?.construct).toBe("['__proto__']");
    expect(verdict.violation?.line).toBe(2);
  });

  it('should refuse destructuring a denied property', () => {
    expect(checkSafety('const { constructor } = {};').violation?.construct).toBe('constructor');
  });

  it('should refuse with statements', () => {
    expect(checkSafety('with (Math) { max(1, 2); }').violation?.construct).toBe('with');
  });
});

describe('Shell escapes', () => {
  it('should refuse a bang command', () => {
    expect(checkSafety('const a = 1;\n!pip install numpy').violation).toEqual({
      category: 'shell-escape',
      construct: '!pip install numpy',
      line: 2,
      reason: 'Shell command "pip" is not allowed',
    });
  });

  it('should refuse notebook magics', () => {
    const verdict = checkSafety('%timeit f()');
    expect(verdict.violation?.construct).toBe('%timeit');
    expect(verdict.violation?.reason).toBe('Notebook magic %timeit is not allowed');
  });
});

describe('Verdicts', () => {
  it('should report the first violation in source order', () => {
    const verdict = checkSafety("eval('x');\nrequire('fs');");
    expect(verdict.violation?.construct).toBe('eval');
    expect(verdict.violation?.line).toBe(1);
  });

  it('should give the same verdict every time', () => {
    const code = "const a = 1;\nfetch('x');";
    expect(checkSafety(code)).toEqual(checkSafety(code));
  });

  it('should honour an extended policy', () => {
    const policy = extendPolicy({ deniedGlobals: { Math: 'introspection' } });

    expect(checkSafety('Math.max(1, 2);', policy).violation?.construct).toBe('Math');
    expect(checkSafety('Math.max(1, 2);').allowed).toBe(true);
    expect(checkSafety("fetch('x');", policy).violation?.category).toBe('network');
  });
});
