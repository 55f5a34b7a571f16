/**
 * BuildScheduler Tests
 *
 * Ordering, the concurrency ceiling, deadline cancellation, isolation of a
 * crashing loop and equivalence of concurrent and sequential runs.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import type { SandboxResult, ToolOutcome } from '@forgeloop/shared-types';
import { BuildLoop } from '../build-loop';
import { BuildScheduler } from '../build-scheduler';
import type { SandboxExecutor, SandboxRequest } from '../../validation/types';
import { ScriptedGenerator, failingResult, makeSpec, passingResult } from './loop-fakes';

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Decides pass or fail per tool name and per-tool call count, so results do
 * not depend on how loops interleave.
 */
class KeyedSandbox implements SandboxExecutor {
  active = 0;
  peak = 0;
  private readonly calls = new Map<string, number>();

  constructor(
    private readonly passesAt: ReadonlyMap<string, number>,
    private readonly delayMs: (toolName: string) => number = () => 0,
  ) {}

  async execute(request: SandboxRequest): Promise<SandboxResult> {
    const call = this.calls.get(request.toolName) ?? 0;
    this.calls.set(request.toolName, call + 1);
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    try {
      await sleep(this.delayMs(request.toolName));
      return this.passesAt.get(request.toolName) === call
        ? passingResult(`${request.toolName} pass ${call}`)
        : failingResult(`${request.toolName} fail ${call}`);
    } finally {
      this.active--;
    }
  }
}

function summarize(outcomes: ToolOutcome[]): string[] {
  return outcomes.map(o => `${o.spec.name}:${o.status}:${o.attempts.length}`);
}

describe('BuildScheduler.runAll', () => {
  it('returns outcomes in input order regardless of completion order', async () => {
    const specs = [makeSpec('slow_tool', 1), makeSpec('fast_tool', 2)];
    const sandbox = new KeyedSandbox(
      new Map([
        ['slow_tool', 0],
        ['fast_tool', 0],
      ]),
      name => (name === 'slow_tool' ? 20 : 0),
    );
    const scheduler = new BuildScheduler(new BuildLoop({ generator: new ScriptedGenerator(), sandbox }));

    const outcomes = await scheduler.runAll(specs, { maxConcurrency: 2, maxAttempts: 3, sandboxTimeoutMs: 50 });

    expect(summarize(outcomes)).toEqual(['slow_tool:passed:1', 'fast_tool:passed:1']);
  });

  it('never runs more than maxConcurrency loops at once', async () => {
    const specs = ['a', 'b', 'c', 'd', 'e'].map((name, i) => makeSpec(name, i + 1));
    const sandbox = new KeyedSandbox(new Map(specs.map(s => [s.name, 1])), () => 5);
    const scheduler = new BuildScheduler(new BuildLoop({ generator: new ScriptedGenerator(), sandbox }));

    const outcomes = await scheduler.runAll(specs, { maxConcurrency: 2, maxAttempts: 3, sandboxTimeoutMs: 50 });

    expect(outcomes.every(o => o.status === 'passed')).toBe(true);
    expect(sandbox.peak).toBeLessThanOrEqual(2);
  });

  it('abandons in-flight loops at the deadline and keeps finished passes', async () => {
    const specs = [makeSpec('quick_pass', 1), makeSpec('never_passes', 2)];
    const sandbox = new KeyedSandbox(new Map([['quick_pass', 0]]), name => (name === 'never_passes' ? 20 : 0));
    const scheduler = new BuildScheduler(new BuildLoop({ generator: new ScriptedGenerator(), sandbox }));

    const outcomes = await scheduler.runAll(specs, {
      maxConcurrency: 2,
      maxAttempts: 10,
      sandboxTimeoutMs: 50,
      runDeadlineMs: 30,
    });

    expect(outcomes[0]?.status).toBe('passed');
    expect(outcomes[1]).toMatchObject({ status: 'abandoned', reason: 'deadline' });
    expect(outcomes[1]?.attempts.length).toBeGreaterThanOrEqual(1);
    expect(outcomes[1]?.attempts.length).toBeLessThan(10);
  });

  it('abandons everything when the caller signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const generator = new ScriptedGenerator();
    const scheduler = new BuildScheduler(new BuildLoop({ generator, sandbox: new KeyedSandbox(new Map()) }));

    const outcomes = await scheduler.runAll([makeSpec('a', 1), makeSpec('b', 2)], {
      maxConcurrency: 2,
      maxAttempts: 3,
      sandboxTimeoutMs: 50,
      signal: controller.signal,
    });

    expect(outcomes.map(o => o.status)).toEqual(['abandoned', 'abandoned']);
    expect(generator.requests).toHaveLength(0);
  });

  it('reports a crashing loop as fatal_error without disturbing its siblings', async () => {
    const sandbox = new KeyedSandbox(
      new Map([
        ['healthy', 0],
        ['crashes', 0],
      ]),
    );
    const scheduler = new BuildScheduler(new BuildLoop({ generator: new ScriptedGenerator(), sandbox }));

    const outcomes = await scheduler.runAll([makeSpec('healthy', 1), makeSpec('crashes', 2)], {
      maxConcurrency: 2,
      maxAttempts: 3,
      sandboxTimeoutMs: 50,
      onTransition: transition => {
        if (transition.toolName === 'crashes' && transition.to === 'executing') {
          throw new Error('observer exploded');
        }
      },
    });

    expect(outcomes[0]?.status).toBe('passed');
    expect(outcomes[1]).toMatchObject({
      status: 'fatal_error',
      reason: 'loop_crashed',
      error: { name: 'Error', message: 'observer exploded' },
    });
  });

  it('returns an empty list for no specifications', async () => {
    const scheduler = new BuildScheduler(
      new BuildLoop({ generator: new ScriptedGenerator(), sandbox: new KeyedSandbox(new Map()) }),
    );

    await expect(scheduler.runAll([], { maxConcurrency: 1, maxAttempts: 1, sandboxTimeoutMs: 50 })).resolves.toEqual([]);
  });

  it('rejects a concurrency below one', async () => {
    const scheduler = new BuildScheduler(
      new BuildLoop({ generator: new ScriptedGenerator(), sandbox: new KeyedSandbox(new Map()) }),
    );

    await expect(
      scheduler.runAll([makeSpec()], { maxConcurrency: 0, maxAttempts: 1, sandboxTimeoutMs: 50 }),
    ).rejects.toThrow(RangeError);
  });
});

describe('concurrent and sequential runs agree', () => {
  it('produces the same outcomes for any concurrency', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.integer({ min: 0, max: 4 }), { minLength: 1, maxLength: 6 }),
        fc.integer({ min: 1, max: 6 }),
        fc.integer({ min: 1, max: 4 }),
        async (passIndexes, concurrency, maxAttempts) => {
          const specs = passIndexes.map((_, i) => makeSpec(`tool_${i}`, i + 1));
          const passesAt = new Map(specs.map((spec, i) => [spec.name, passIndexes[i] ?? 0]));
          const delay = (name: string): number => (name.length + Number(name.slice(5))) % 3;

          const run = (maxConcurrency: number): Promise<ToolOutcome[]> =>
            new BuildScheduler(
              new BuildLoop({ generator: new ScriptedGenerator(), sandbox: new KeyedSandbox(passesAt, delay) }),
            ).runAll(specs, { maxConcurrency, maxAttempts, sandboxTimeoutMs: 50 });

          const sequential = await run(1);
          const concurrent = await run(concurrency);

          expect(summarize(concurrent)).toEqual(summarize(sequential));
          expect(concurrent.map(o => o.attempts.map(a => a.diagnostics))).toEqual(
            sequential.map(o => o.attempts.map(a => a.diagnostics)),
          );
        },
      ),
      { numRuns: 20 },
    );
  });
});
