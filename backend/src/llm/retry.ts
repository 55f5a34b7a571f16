/**
 * RetryEngine - backoff for provider calls
 *
 * Rate limits and 5xx answers are retried after `baseDelayMs * 2^attempt`
 * plus jitter, or after the provider's Retry-After when that is longer.
 * When every attempt fails the last error surfaces as an LLMError.
 */

import { isAbortError } from '../errors';
import { createLogger } from '../logging/log';
import { LLMError } from './types';

const log = createLogger('llm-retry');

export interface RetryConfig {
  /** Retries after the first call */
  maxRetries: number;
  baseDelayMs: number;
  /** Upper bound of the random jitter added to each backoff */
  maxJitterMs: number;
  /** Longest Retry-After the engine will honor */
  maxRetryAfterMs: number;
  retryableStatuses: number[];
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  baseDelayMs: 2000,
  maxJitterMs: 500,
  maxRetryAfterMs: 30_000,
  retryableStatuses: [429, 500, 502, 503, 504],
};

/**
 * Retry-After header value in milliseconds: delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value?.trim()) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const at = Date.parse(trimmed);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof LLMError) {
    return error.statusCode;
  }
  if (error !== null && typeof error === 'object') {
    if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
    if ('status' in error && typeof error.status === 'number') return error.status;
  }
  return undefined;
}

function asLLMError(error: unknown): LLMError {
  if (error instanceof LLMError) {
    return error;
  }
  return new LLMError(
    error instanceof Error ? error.message : 'LLM request failed after retries',
    'unknown',
    statusOf(error) ?? 0,
    false,
    error,
  );
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new DOMException('Aborted', 'AbortError');
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class RetryEngine {
  private readonly config: RetryConfig;

  constructor(config?: Partial<RetryConfig>) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
  }

  /**
   * Run `fn` once plus up to `maxRetries` retries. Aborts are rethrown as
   * they are; non-retryable errors end the loop at once.
   */
  async execute<T>(fn: (signal: AbortSignal) => Promise<T>, abortSignal?: AbortSignal): Promise<T> {
    if (abortSignal?.aborted) {
      throw abortReason(abortSignal);
    }

    const controller = new AbortController();
    const forwardAbort = () => {
      if (abortSignal) controller.abort(abortReason(abortSignal));
    };
    abortSignal?.addEventListener('abort', forwardAbort, { once: true });

    let lastError: unknown;
    try {
      for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
        if (abortSignal?.aborted) {
          throw abortReason(abortSignal);
        }
        try {
          return await fn(controller.signal);
        } catch (error: unknown) {
          if (isAbortError(error)) throw error;
          lastError = error;
          if (!this.isRetryable(error) || attempt === this.config.maxRetries) break;

          const delay = this.delayFor(error, attempt);
          log.warn(`Retrying provider call in ${Math.round(delay)}ms`, {
            attempt: attempt + 1,
            status: statusOf(error),
          });
          await sleep(delay, abortSignal);
        }
      }
    } finally {
      abortSignal?.removeEventListener('abort', forwardAbort);
    }

    throw asLLMError(lastError);
  }

  /** baseDelayMs * 2^attempt + random(0, maxJitterMs) */
  calculateDelay(attempt: number): number {
    return this.config.baseDelayMs * 2 ** attempt + Math.random() * this.config.maxJitterMs;
  }

  /** Backoff for `error`, stretched to its Retry-After (capped) when longer. */
  delayFor(error: unknown, attempt: number): number {
    const backoff = this.calculateDelay(attempt);
    const retryAfter = error instanceof LLMError ? error.retryAfterMs : undefined;
    if (retryAfter === undefined) return backoff;
    return Math.max(backoff, Math.min(retryAfter, this.config.maxRetryAfterMs));
  }

  isRetryable(error: unknown): boolean {
    const status = statusOf(error);
    return status !== undefined && this.config.retryableStatuses.includes(status);
  }
}
