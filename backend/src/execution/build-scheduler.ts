/**
 * Build Scheduler - fan out one build loop per specification
 *
 * Loops run concurrently up to `maxConcurrency`. Outcomes are collected
 * through the executor's promise set and returned in input order. A single
 * AbortController carries the run deadline to every loop.
 */

import type { ToolOutcome, ToolSpecification } from '@forgeloop/shared-types';
import { createLogger } from '../logging/log';
import { describeError } from '../errors';
import { ParallelExecutor } from '../performance/parallel';
import type { BuildLoop, LoopTransition } from './build-loop';

const log = createLogger('build-scheduler');

export interface BuildSchedulerOptions {
  /** P: loops allowed to run at once */
  maxConcurrency: number;
  /** K: attempts per specification */
  maxAttempts: number;
  sandboxTimeoutMs: number;
  /** Wall-clock budget for the whole batch, from the call to runAll */
  runDeadlineMs?: number;
  /** Caller-side cancellation, merged with the deadline */
  signal?: AbortSignal;
  onTransition?: (transition: LoopTransition) => void;
}

export class RunDeadlineExceededError extends Error {
  readonly code = 'RUN_DEADLINE_EXCEEDED';

  constructor(readonly deadlineMs: number) {
    super(`Run deadline of ${deadlineMs}ms exceeded`);
    this.name = 'RunDeadlineExceededError';
  }
}

export class BuildScheduler {
  constructor(
    private readonly loop: BuildLoop,
    private readonly executor: ParallelExecutor = new ParallelExecutor(),
  ) {}

  async runAll(specs: readonly ToolSpecification[], options: BuildSchedulerOptions): Promise<ToolOutcome[]> {
    if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be an integer >= 1, got ${options.maxConcurrency}`);
    }
    if (specs.length === 0) {
      return [];
    }

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      forwardAbort();
    } else {
      options.signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    let timer: NodeJS.Timeout | undefined;
    if (options.runDeadlineMs !== undefined) {
      const deadlineMs = options.runDeadlineMs;
      timer = setTimeout(() => {
        log.warn('run deadline exceeded, cancelling in-flight loops', { deadlineMs });
        controller.abort(new RunDeadlineExceededError(deadlineMs));
      }, deadlineMs);
      timer.unref();
    }

    log.info('scheduling build loops', { specs: specs.length, concurrency: options.maxConcurrency });

    try {
      return await this.executor.map(
        specs,
        spec => this.runOne(spec, options, controller.signal),
        { concurrency: options.maxConcurrency },
      );
    } finally {
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', forwardAbort);
    }
  }

  /**
   * A loop that throws is reported as that specification's fatal_error so
   * its siblings keep running.
   */
  private async runOne(
    spec: ToolSpecification,
    options: BuildSchedulerOptions,
    signal: AbortSignal,
  ): Promise<ToolOutcome> {
    try {
      return await this.loop.run(spec, {
        maxAttempts: options.maxAttempts,
        sandboxTimeoutMs: options.sandboxTimeoutMs,
        signal,
        onTransition: options.onTransition,
      });
    } catch (error) {
      log.error('build loop crashed', { tool: spec.name, error: describeError(error).message });
      return { status: 'fatal_error', spec, reason: 'loop_crashed', error: describeError(error), attempts: [] };
    }
  }
}
