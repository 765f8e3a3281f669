/**
 * Logger Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { log, logProblem, logViolation, setVerbose } from './logger.js';

describe('logger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    setVerbose(false);
    vi.restoreAllMocks();
  });

  function lastEntry(): unknown {
    const calls = vi.mocked(console.log).mock.calls;
    return JSON.parse(String(calls[calls.length - 1]?.[0]));
  }

  it('writes one JSON line per entry', () => {
    log({ student: null, step: 'runner_start' });

    expect(console.log).toHaveBeenCalledTimes(1);
    expect(lastEntry()).toMatchObject({ student: null, step: 'runner_start' });
  });

  it('writes safety violations with their category', () => {
    logViolation('alice', 2, 'network', 'fetch');

    expect(lastEntry()).toMatchObject({
      student: 'alice',
      problem: 2,
      step: 'safety_violation',
      details: { category: 'network', construct: 'fetch' },
    });
  });

  it('only writes problem scores when verbose', () => {
    logProblem('alice', 1, 'SCORED', 2, 2, 1);
    expect(console.log).not.toHaveBeenCalled();

    setVerbose(true);
    logProblem('alice', 1, 'SCORED', 2, 2, 1);
    expect(lastEntry()).toMatchObject({
      step: 'problem_scored',
      details: { state: 'SCORED', passed: 2, total: 2, earned: 1 },
    });
  });
});
