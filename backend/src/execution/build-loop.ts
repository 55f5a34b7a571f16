/**
 * Build Loop - generate, validate and correct one tool specification
 *
 * An explicit finite-state machine:
 *
 *   pending → generating → executing → passed
 *                 │            │
 *                 │            └→ retrying → generating ...
 *                 ├→ retrying (malformed candidate)
 *                 └→ fatal_error (generative service unavailable)
 *
 * Any non-terminal state may move to `abandoned`, either because the
 * attempt budget is spent or because the run deadline fired.
 *
 * Every call to run() owns its own session. Nothing is shared between
 * concurrent loops except the injected generator and sandbox, which are
 * stateless per request.
 */

import type {
  AbandonReason,
  AbandonedOutcome,
  AttemptClassification,
  AttemptFeedback,
  BuildAttempt,
  FatalErrorOutcome,
  GeneratedCandidate,
  PassedOutcome,
  SandboxResult,
  ToolOutcome,
  ToolSpecification,
} from '@forgeloop/shared-types';
import { createLogger } from '../logging/log';
import {
  GenerationMalformedError,
  GenerationUnavailableError,
  SandboxResourceError,
  SandboxTimeoutError,
  describeError,
} from '../errors';
import { DEFAULT_ACCEPTANCE_POLICY, evaluateAcceptance } from '../validation/acceptance';
import type { AcceptancePolicy } from '../validation/acceptance';
import type { SandboxExecutor } from '../validation/types';
import type { CodeGenerator } from '../generation/types';

const log = createLogger('build-loop');

// ---------------------------------------------------------------------------
// States
// ---------------------------------------------------------------------------

export type LoopState =
  | 'pending'
  | 'generating'
  | 'executing'
  | 'retrying'
  | 'passed'
  | 'abandoned'
  | 'fatal_error';

export const TERMINAL_STATES: ReadonlySet<LoopState> = new Set<LoopState>([
  'passed',
  'abandoned',
  'fatal_error',
]);

const TRANSITIONS: Readonly<Record<LoopState, readonly LoopState[]>> = {
  pending: ['generating', 'abandoned'],
  generating: ['executing', 'retrying', 'abandoned', 'fatal_error'],
  executing: ['passed', 'retrying', 'abandoned'],
  retrying: ['generating', 'abandoned'],
  passed: [],
  abandoned: [],
  fatal_error: [],
};

export function canTransition(from: LoopState, to: LoopState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class IllegalTransitionError extends Error {
  readonly code = 'ILLEGAL_TRANSITION';

  constructor(readonly from: LoopState, readonly to: LoopState) {
    super(`Illegal build loop transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export interface LoopTransition {
  toolName: string;
  /** Index of the attempt in progress when the transition happened */
  attemptIndex: number;
  from: LoopState;
  to: LoopState;
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface BuildLoopDependencies {
  generator: CodeGenerator;
  sandbox: SandboxExecutor;
  acceptance?: AcceptancePolicy;
  now?: () => Date;
}

export interface BuildLoopRunOptions {
  /** Attempt budget K, at least 1 */
  maxAttempts: number;
  sandboxTimeoutMs: number;
  /** Run deadline. Checked before each generation and after each execution */
  signal?: AbortSignal;
  onTransition?: (transition: LoopTransition) => void;
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

class LoopSession {
  private state: LoopState = 'pending';
  private readonly attempts: BuildAttempt[] = [];
  private attemptIndex = 0;

  constructor(
    private readonly spec: ToolSpecification,
    private readonly onTransition?: (transition: LoopTransition) => void,
  ) {}

  moveTo(to: LoopState): void {
    const from = this.state;
    if (!canTransition(from, to)) {
      throw new IllegalTransitionError(from, to);
    }
    this.state = to;
    log.debug('transition', { tool: this.spec.name, attempt: this.attemptIndex, from, to });
    this.onTransition?.({ toolName: this.spec.name, attemptIndex: this.attemptIndex, from, to });
  }

  begin(index: number): void {
    this.attemptIndex = index;
    this.moveTo('generating');
  }

  record(attempt: BuildAttempt): BuildAttempt {
    if (attempt.index !== this.attempts.length) {
      throw new Error(`Attempt ${attempt.index} recorded out of order for ${this.spec.name}`);
    }
    const frozen = freezeAttempt(attempt);
    this.attempts.push(frozen);
    return frozen;
  }

  pass(winningAttempt: BuildAttempt): PassedOutcome {
    this.moveTo('passed');
    return { status: 'passed', spec: this.spec, winningAttempt, attempts: this.snapshot() };
  }

  abandon(reason: AbandonReason): AbandonedOutcome {
    this.moveTo('abandoned');
    return { status: 'abandoned', spec: this.spec, reason, attempts: this.snapshot() };
  }

  fail(reason: string, error: unknown): FatalErrorOutcome {
    this.moveTo('fatal_error');
    return { status: 'fatal_error', spec: this.spec, reason, error: describeError(error), attempts: this.snapshot() };
  }

  private snapshot(): readonly BuildAttempt[] {
    return Object.freeze([...this.attempts]);
  }
}

function freezeAttempt(attempt: BuildAttempt): BuildAttempt {
  if (attempt.candidate) Object.freeze(attempt.candidate);
  if (attempt.feedback) Object.freeze(attempt.feedback);
  if (attempt.sandbox) {
    if (attempt.sandbox.report) {
      Object.freeze(attempt.sandbox.report.failures);
      Object.freeze(attempt.sandbox.report);
    }
    Object.freeze(attempt.sandbox);
  }
  return Object.freeze(attempt);
}

function withNote(output: string, note: string): string {
  return output ? `${output}\n${note}` : note;
}

// ---------------------------------------------------------------------------
// Build Loop
// ---------------------------------------------------------------------------

export class BuildLoop {
  private readonly acceptance: AcceptancePolicy;
  private readonly now: () => Date;

  constructor(private readonly deps: BuildLoopDependencies) {
    this.acceptance = deps.acceptance ?? DEFAULT_ACCEPTANCE_POLICY;
    this.now = deps.now ?? (() => new Date());
  }

  async run(spec: ToolSpecification, options: BuildLoopRunOptions): Promise<ToolOutcome> {
    const { maxAttempts, signal } = options;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be an integer >= 1, got ${maxAttempts}`);
    }

    const session = new LoopSession(spec, options.onTransition);
    let feedback: AttemptFeedback | undefined;

    for (let index = 0; index < maxAttempts; index++) {
      if (signal?.aborted) {
        return this.finish(session.abandon('deadline'));
      }

      session.begin(index);
      const startedAt = this.now().toISOString();

      let candidate: GeneratedCandidate;
      try {
        candidate = await this.deps.generator.generate({ spec, attemptIndex: index, feedback, signal });
      } catch (error) {
        if (signal?.aborted) {
          return this.finish(session.abandon('deadline'));
        }
        if (error instanceof GenerationMalformedError) {
          const attempt = session.record({
            index,
            classification: 'malformed_candidate',
            diagnostics: error.message,
            feedback,
            startedAt,
            finishedAt: this.now().toISOString(),
          });
          feedback = { diagnostics: attempt.diagnostics };
          if (index === maxAttempts - 1) {
            return this.finish(session.abandon('attempts_exhausted'));
          }
          session.moveTo('retrying');
          continue;
        }
        const reason = error instanceof GenerationUnavailableError ? 'generation_unavailable' : 'generation_error';
        return this.finish(session.fail(reason, error));
      }

      // Cancellation point between generation and execution
      if (signal?.aborted) {
        return this.finish(session.abandon('deadline'));
      }

      session.moveTo('executing');
      const result = await this.execute(spec, candidate, options.sandboxTimeoutMs);
      const verdict = evaluateAcceptance(result, this.acceptance);
      const classification: AttemptClassification = verdict.satisfied ? 'passed' : verdict.classification;

      const attempt = session.record({
        index,
        candidate,
        sandbox: result,
        classification,
        diagnostics: result.capturedOutput,
        feedback,
        startedAt,
        finishedAt: this.now().toISOString(),
      });

      if (verdict.satisfied) {
        return this.finish(session.pass(attempt));
      }

      log.debug('attempt failed', { tool: spec.name, attempt: index, classification, reason: verdict.reason });
      feedback = { diagnostics: attempt.diagnostics, previous: candidate };

      if (index === maxAttempts - 1) {
        return this.finish(session.abandon('attempts_exhausted'));
      }
      if (signal?.aborted) {
        return this.finish(session.abandon('deadline'));
      }
      session.moveTo('retrying');
    }

    return this.finish(session.abandon('attempts_exhausted'));
  }

  /**
   * Run one candidate in the sandbox. Ceilings and executor crashes come
   * back as a result so they count as a failed attempt.
   */
  private async execute(
    spec: ToolSpecification,
    candidate: GeneratedCandidate,
    timeoutMs: number,
  ): Promise<SandboxResult> {
    const started = Date.now();
    try {
      return await this.deps.sandbox.execute({ toolName: spec.name, candidate, timeoutMs });
    } catch (error) {
      const elapsedMs = Date.now() - started;
      if (error instanceof SandboxTimeoutError) {
        return {
          status: 'timeout',
          exitCode: -1,
          capturedOutput: withNote(error.partialOutput, `[sandbox] ${error.message}`),
          elapsedMs: Math.max(elapsedMs, error.timeoutMs),
        };
      }
      if (error instanceof SandboxResourceError) {
        return {
          status: 'resource_exceeded',
          exitCode: -1,
          capturedOutput: withNote(error.partialOutput, `[sandbox] ${error.message}`),
          elapsedMs,
        };
      }
      const { message } = describeError(error);
      log.warn('sandbox executor failed', { tool: spec.name, error: message });
      return {
        status: 'executor_error',
        exitCode: -1,
        capturedOutput: `[sandbox] executor failure: ${message}`,
        elapsedMs,
      };
    }
  }

  private finish(outcome: ToolOutcome): ToolOutcome {
    const data = { tool: outcome.spec.name, attempts: outcome.attempts.length };
    switch (outcome.status) {
      case 'passed':
        log.info('tool passed', data);
        break;
      case 'abandoned':
        log.warn('tool abandoned', { ...data, reason: outcome.reason });
        break;
      case 'fatal_error':
        log.error('tool failed', { ...data, reason: outcome.reason, error: outcome.error.message });
        break;
    }
    return outcome;
  }
}
