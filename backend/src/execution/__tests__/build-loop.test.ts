/**
 * BuildLoop Unit Tests
 *
 * State transitions, feedback threading, service failure handling,
 * sandbox ceilings and deadline cancellation.
 */

import { describe, it, expect } from 'vitest';
import { BuildLoop, IllegalTransitionError, TERMINAL_STATES, canTransition } from '../build-loop';
import type { LoopState, LoopTransition } from '../build-loop';
import {
  GenerationMalformedError,
  GenerationUnavailableError,
  SandboxResourceError,
  SandboxTimeoutError,
} from '../../errors';
import {
  ScriptedGenerator,
  ScriptedSandbox,
  candidateFor,
  failingResult,
  makeSpec,
  passingResult,
} from './loop-fakes';

const RUN = { maxAttempts: 5, sandboxTimeoutMs: 50 };

function abortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

// ---------------------------------------------------------------------------
// Transition table
// ---------------------------------------------------------------------------

describe('build loop transitions', () => {
  const states: LoopState[] = ['pending', 'generating', 'executing', 'retrying', 'passed', 'abandoned', 'fatal_error'];

  it('has no transitions out of a terminal state', () => {
    for (const from of TERMINAL_STATES) {
      for (const to of states) {
        expect(canTransition(from, to)).toBe(false);
      }
    }
  });

  it('only reaches fatal_error from generating', () => {
    expect(states.filter(from => canTransition(from, 'fatal_error'))).toEqual(['generating']);
  });

  it('describes illegal transitions', () => {
    const error = new IllegalTransitionError('passed', 'retrying');
    expect(error.message).toBe('Illegal build loop transition: passed -> retrying');
    expect(error.code).toBe('ILLEGAL_TRANSITION');
  });
});

// ---------------------------------------------------------------------------
// run
// ---------------------------------------------------------------------------

describe('BuildLoop.run', () => {
  it('passes on the first attempt without feedback', async () => {
    const generator = new ScriptedGenerator();
    const sandbox = new ScriptedSandbox([passingResult()]);
    const transitions: LoopTransition[] = [];
    const loop = new BuildLoop({ generator, sandbox });

    const outcome = await loop.run(makeSpec(), { ...RUN, onTransition: t => transitions.push(t) });

    expect(outcome.status).toBe('passed');
    expect(outcome.attempts).toHaveLength(1);
    expect(outcome.attempts[0]?.classification).toBe('passed');
    expect(generator.requests[0]?.feedback).toBeUndefined();
    expect(transitions.map(t => `${t.from}->${t.to}`)).toEqual([
      'pending->generating',
      'generating->executing',
      'executing->passed',
    ]);
  });

  it('passes on attempt 2 after two failures with K=3', async () => {
    const generator = new ScriptedGenerator();
    const sandbox = new ScriptedSandbox([failingResult('fail-0'), failingResult('fail-1'), passingResult('pass-2')]);
    const loop = new BuildLoop({ generator, sandbox });

    const outcome = await loop.run(makeSpec('json_flattener'), { ...RUN, maxAttempts: 3 });

    expect(outcome.status).toBe('passed');
    expect(outcome.attempts.map(a => a.index)).toEqual([0, 1, 2]);
    if (outcome.status === 'passed') {
      expect(outcome.winningAttempt.index).toBe(2);
      expect(outcome.winningAttempt.diagnostics).toBe('pass-2');
    }
    expect(generator.requests.map(r => r.feedback?.diagnostics)).toEqual([undefined, 'fail-0', 'fail-1']);
    expect(generator.requests[1]?.feedback?.previous).toEqual(candidateFor(0, 'json_flattener'));
    expect(sandbox.requests.map(r => r.toolName)).toEqual(['json_flattener', 'json_flattener', 'json_flattener']);
  });

  it('abandons after K=2 failed attempts', async () => {
    const generator = new ScriptedGenerator();
    const sandbox = new ScriptedSandbox([failingResult('fail-0'), failingResult('fail-1')]);
    const loop = new BuildLoop({ generator, sandbox });

    const outcome = await loop.run(makeSpec(), { ...RUN, maxAttempts: 2 });

    expect(outcome.status).toBe('abandoned');
    if (outcome.status === 'abandoned') {
      expect(outcome.reason).toBe('attempts_exhausted');
    }
    expect(outcome.attempts.map(a => a.classification)).toEqual(['tests_failed', 'tests_failed']);
    expect(generator.requests).toHaveLength(2);
  });

  it('returns fatal_error without touching the sandbox when generation is unavailable', async () => {
    const generator = new ScriptedGenerator([new GenerationUnavailableError('Generative service unavailable: bad key', 401)]);
    const sandbox = new ScriptedSandbox();
    const loop = new BuildLoop({ generator, sandbox });

    const outcome = await loop.run(makeSpec(), RUN);

    expect(outcome).toMatchObject({
      status: 'fatal_error',
      reason: 'generation_unavailable',
      error: { name: 'GenerationUnavailableError', message: 'Generative service unavailable: bad key' },
    });
    expect(outcome.attempts).toEqual([]);
    expect(sandbox.requests).toHaveLength(0);
  });

  it('stops at the first unavailable error regardless of remaining budget', async () => {
    const generator = new ScriptedGenerator([
      candidateFor(0),
      new GenerationUnavailableError('Generative service unavailable: quota exhausted', 429),
    ]);
    const sandbox = new ScriptedSandbox([failingResult('fail-0')]);
    const loop = new BuildLoop({ generator, sandbox });

    const outcome = await loop.run(makeSpec(), { ...RUN, maxAttempts: 5 });

    expect(outcome.status).toBe('fatal_error');
    expect(outcome.attempts).toHaveLength(1);
    expect(generator.requests).toHaveLength(2);
    expect(sandbox.requests).toHaveLength(1);
  });

  it('treats unknown generator errors as fatal', async () => {
    const generator = new ScriptedGenerator([new TypeError('undefined is not a function')]);
    const loop = new BuildLoop({ generator, sandbox: new ScriptedSandbox() });

    const outcome = await loop.run(makeSpec(), RUN);

    expect(outcome).toMatchObject({ status: 'fatal_error', reason: 'generation_error' });
  });

  it('records a malformed candidate as a failed attempt and feeds its message forward', async () => {
    const generator = new ScriptedGenerator([new GenerationMalformedError('Malformed generation response: no JSON')]);
    const sandbox = new ScriptedSandbox([passingResult()]);
    const loop = new BuildLoop({ generator, sandbox });

    const outcome = await loop.run(makeSpec(), { ...RUN, maxAttempts: 2 });

    expect(outcome.status).toBe('passed');
    expect(outcome.attempts[0]).toMatchObject({
      index: 0,
      classification: 'malformed_candidate',
      diagnostics: 'Malformed generation response: no JSON',
    });
    expect(outcome.attempts[0]?.candidate).toBeUndefined();
    expect(generator.requests[1]?.feedback).toEqual({ diagnostics: 'Malformed generation response: no JSON' });
    expect(sandbox.requests).toHaveLength(1);
  });

  it('abandons when the last attempt is malformed', async () => {
    const generator = new ScriptedGenerator([new GenerationMalformedError('Malformed generation response: cut off')]);
    const loop = new BuildLoop({ generator, sandbox: new ScriptedSandbox() });

    const outcome = await loop.run(makeSpec(), { ...RUN, maxAttempts: 1 });

    expect(outcome).toMatchObject({ status: 'abandoned', reason: 'attempts_exhausted' });
    expect(outcome.attempts).toHaveLength(1);
  });

  it('counts a sandbox timeout as a failed attempt', async () => {
    const generator = new ScriptedGenerator();
    const sandbox = new ScriptedSandbox([new SandboxTimeoutError(50, 'partial')]);
    const loop = new BuildLoop({ generator, sandbox });

    const outcome = await loop.run(makeSpec(), RUN);

    expect(outcome.status).toBe('passed');
    const first = outcome.attempts[0];
    expect(first?.classification).toBe('sandbox_timeout');
    expect(first?.sandbox?.status).toBe('timeout');
    expect(first?.sandbox?.elapsedMs).toBeGreaterThanOrEqual(50);
    expect(first?.diagnostics).toBe('partial\n[sandbox] Sandbox execution exceeded 50ms');
    expect(generator.requests[1]?.feedback?.diagnostics).toBe(first?.diagnostics);
    expect(sandbox.requests[0]?.timeoutMs).toBe(50);
  });

  it('counts a resource ceiling as a failed attempt', async () => {
    const sandbox = new ScriptedSandbox([new SandboxResourceError('Captured output exceeded 1024 bytes', '')]);
    const loop = new BuildLoop({ generator: new ScriptedGenerator(), sandbox });

    const outcome = await loop.run(makeSpec(), RUN);

    expect(outcome.attempts[0]).toMatchObject({
      classification: 'resource_exceeded',
      diagnostics: '[sandbox] Captured output exceeded 1024 bytes',
    });
  });

  it('counts an executor crash as a failed attempt', async () => {
    const sandbox = new ScriptedSandbox([new Error('spawn node ENOENT')]);
    const loop = new BuildLoop({ generator: new ScriptedGenerator(), sandbox });

    const outcome = await loop.run(makeSpec(), RUN);

    expect(outcome.status).toBe('passed');
    expect(outcome.attempts[0]).toMatchObject({
      classification: 'executor_error',
      diagnostics: '[sandbox] executor failure: spawn node ENOENT',
    });
  });

  it('treats a harness that produced no report as a failed attempt', async () => {
    const sandbox = new ScriptedSandbox([
      { status: 'completed', exitCode: 1, capturedOutput: 'SyntaxError: Unexpected token', elapsedMs: 3 },
    ]);
    const loop = new BuildLoop({ generator: new ScriptedGenerator(), sandbox });

    const outcome = await loop.run(makeSpec(), { ...RUN, maxAttempts: 1 });

    expect(outcome.status).toBe('abandoned');
    expect(outcome.attempts[0]?.classification).toBe('harness_failed');
  });

  it('applies the acceptance policy it was given', async () => {
    const sandbox = new ScriptedSandbox([passingResult()]);
    const loop = new BuildLoop({ generator: new ScriptedGenerator(), sandbox, acceptance: { minPassingTests: 5 } });

    const outcome = await loop.run(makeSpec(), { ...RUN, maxAttempts: 1 });

    expect(outcome.attempts[0]?.classification).toBe('criteria_unmet');
  });

  it('stamps attempts with the injected clock', async () => {
    const loop = new BuildLoop({
      generator: new ScriptedGenerator(),
      sandbox: new ScriptedSandbox(),
      now: () => new Date('2026-03-01T08:00:00.000Z'),
    });

    const outcome = await loop.run(makeSpec(), RUN);

    expect(outcome.attempts[0]).toMatchObject({
      startedAt: '2026-03-01T08:00:00.000Z',
      finishedAt: '2026-03-01T08:00:00.000Z',
    });
  });

  it('freezes recorded attempts', async () => {
    const loop = new BuildLoop({ generator: new ScriptedGenerator(), sandbox: new ScriptedSandbox() });

    const outcome = await loop.run(makeSpec(), RUN);

    expect(Object.isFrozen(outcome.attempts)).toBe(true);
    expect(Object.isFrozen(outcome.attempts[0])).toBe(true);
    expect(Object.isFrozen(outcome.attempts[0]?.sandbox)).toBe(true);
  });

  it('rejects a budget below one', async () => {
    const loop = new BuildLoop({ generator: new ScriptedGenerator(), sandbox: new ScriptedSandbox() });

    await expect(loop.run(makeSpec(), { ...RUN, maxAttempts: 0 })).rejects.toThrow(RangeError);
    await expect(loop.run(makeSpec(), { ...RUN, maxAttempts: 1.5 })).rejects.toThrow(RangeError);
  });
});

// ---------------------------------------------------------------------------
// Deadline
// ---------------------------------------------------------------------------

describe('BuildLoop.run deadline', () => {
  it('abandons before generating when the deadline already passed', async () => {
    const controller = new AbortController();
    controller.abort();
    const generator = new ScriptedGenerator();
    const loop = new BuildLoop({ generator, sandbox: new ScriptedSandbox() });

    const outcome = await loop.run(makeSpec(), { ...RUN, signal: controller.signal });

    expect(outcome).toMatchObject({ status: 'abandoned', reason: 'deadline' });
    expect(outcome.attempts).toEqual([]);
    expect(generator.requests).toHaveLength(0);
  });

  it('abandons after a failed execution once the deadline fires', async () => {
    const controller = new AbortController();
    const generator = new ScriptedGenerator();
    const sandbox = new ScriptedSandbox([
      async () => {
        controller.abort();
        return failingResult('fail-0');
      },
    ]);
    const loop = new BuildLoop({ generator, sandbox });

    const outcome = await loop.run(makeSpec(), { ...RUN, signal: controller.signal });

    expect(outcome).toMatchObject({ status: 'abandoned', reason: 'deadline' });
    expect(outcome.attempts).toHaveLength(1);
    expect(generator.requests).toHaveLength(1);
  });

  it('keeps a pass that lands after the deadline fired', async () => {
    const controller = new AbortController();
    const sandbox = new ScriptedSandbox([
      async () => {
        controller.abort();
        return passingResult();
      },
    ]);
    const loop = new BuildLoop({ generator: new ScriptedGenerator(), sandbox });

    const outcome = await loop.run(makeSpec(), { ...RUN, signal: controller.signal });

    expect(outcome.status).toBe('passed');
  });

  it('does not execute a candidate generated after the deadline', async () => {
    const controller = new AbortController();
    const generator = new ScriptedGenerator([
      async request => {
        controller.abort();
        return candidateFor(request.attemptIndex);
      },
    ]);
    const sandbox = new ScriptedSandbox();
    const loop = new BuildLoop({ generator, sandbox });

    const outcome = await loop.run(makeSpec(), { ...RUN, signal: controller.signal });

    expect(outcome).toMatchObject({ status: 'abandoned', reason: 'deadline' });
    expect(outcome.attempts).toEqual([]);
    expect(sandbox.requests).toHaveLength(0);
  });

  it('abandons when generation is cancelled by the deadline', async () => {
    const controller = new AbortController();
    const generator = new ScriptedGenerator([
      async request => {
        expect(request.signal).toBe(controller.signal);
        controller.abort();
        throw abortError();
      },
    ]);
    const loop = new BuildLoop({ generator, sandbox: new ScriptedSandbox() });

    const outcome = await loop.run(makeSpec(), { ...RUN, signal: controller.signal });

    expect(outcome).toMatchObject({ status: 'abandoned', reason: 'deadline' });
    expect(outcome.attempts).toEqual([]);
  });
});
