/**
 * Property: the build loop terminates within its budget
 *
 * For an arbitrary budget K and an arbitrary script of sandbox verdicts:
 * 1. attempt count never exceeds K and indices run 0..n-1
 * 2. the first passing attempt ends the loop as `passed` with i+1 attempts
 * 3. K failures end the loop as `abandoned` with exactly K attempts
 * 4. attempt i+1 is asked for with exactly attempt i's captured output
 * 5. an unavailable generator ends the loop at once as `fatal_error`
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { BuildLoop } from '../build-loop';
import { GenerationUnavailableError } from '../../errors';
import type { SandboxResult } from '@forgeloop/shared-types';
import {
  ScriptedGenerator,
  ScriptedSandbox,
  candidateFor,
  failingResult,
  makeSpec,
  passingResult,
} from './loop-fakes';

function resultsFrom(verdicts: boolean[]): SandboxResult[] {
  return verdicts.map((pass, i) => (pass ? passingResult(`pass-${i}`) : failingResult(`fail-${i}`)));
}

describe('build loop bounded termination', () => {
  it('respects the budget and stops at the first pass', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 6 }),
        fc.array(fc.boolean(), { minLength: 6, maxLength: 6 }),
        async (maxAttempts, verdicts) => {
          const generator = new ScriptedGenerator();
          const sandbox = new ScriptedSandbox(resultsFrom(verdicts));
          const loop = new BuildLoop({ generator, sandbox });

          const outcome = await loop.run(makeSpec(), { maxAttempts, sandboxTimeoutMs: 50 });

          expect(outcome.attempts.length).toBeLessThanOrEqual(maxAttempts);
          expect(outcome.attempts.map(a => a.index)).toEqual(outcome.attempts.map((_, i) => i));

          const firstPass = verdicts.slice(0, maxAttempts).indexOf(true);
          if (firstPass === -1) {
            expect(outcome.status).toBe('abandoned');
            expect(outcome.attempts).toHaveLength(maxAttempts);
          } else {
            expect(outcome.status).toBe('passed');
            expect(outcome.attempts).toHaveLength(firstPass + 1);
            expect(sandbox.requests).toHaveLength(firstPass + 1);
          }
        },
      ),
      { numRuns: 30 },
    );
  });

  it('feeds each attempt exactly the captured output of the one before', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 6 }),
        fc.array(fc.boolean(), { minLength: 6, maxLength: 6 }),
        async (maxAttempts, verdicts) => {
          const generator = new ScriptedGenerator();
          const loop = new BuildLoop({ generator, sandbox: new ScriptedSandbox(resultsFrom(verdicts)) });

          const outcome = await loop.run(makeSpec(), { maxAttempts, sandboxTimeoutMs: 50 });

          expect(generator.requests[0]?.feedback).toBeUndefined();
          for (let i = 1; i < generator.requests.length; i++) {
            expect(generator.requests[i]?.feedback?.diagnostics).toBe(outcome.attempts[i - 1]?.sandbox?.capturedOutput);
            expect(generator.requests[i]?.attemptIndex).toBe(i);
          }
        },
      ),
      { numRuns: 30 },
    );
  });

  it('ends with fatal_error at the first unavailable generation', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 6 }),
        fc.integer({ min: 0, max: 5 }),
        async (maxAttempts, failingAt) => {
          fc.pre(failingAt < maxAttempts);
          const script = Array.from({ length: failingAt + 1 }, (_, i) =>
            i === failingAt ? new GenerationUnavailableError('Generative service unavailable: offline') : candidateFor(i),
          );
          const generator = new ScriptedGenerator(script);
          const sandbox = new ScriptedSandbox(Array.from({ length: 6 }, (_, i) => failingResult(`fail-${i}`)));
          const loop = new BuildLoop({ generator, sandbox });

          const outcome = await loop.run(makeSpec(), { maxAttempts, sandboxTimeoutMs: 50 });

          expect(outcome.status).toBe('fatal_error');
          expect(outcome.attempts).toHaveLength(failingAt);
          expect(generator.requests).toHaveLength(failingAt + 1);
          expect(sandbox.requests).toHaveLength(failingAt);
        },
      ),
      { numRuns: 30 },
    );
  });
});
