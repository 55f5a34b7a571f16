/**
 * Error taxonomy
 *
 * Three families decide how far a failure travels:
 * - TransientExecutionFailure: a failed attempt, retried inside its loop
 * - NonRetryableServiceFailure: terminal for one specification only
 * - RunLevelFailure: aborts the whole run before anything is published
 */

import type { AttemptClassification } from '@forgeloop/shared-types';

export class TransientExecutionFailure extends Error {
  readonly code = 'TRANSIENT_EXECUTION_FAILURE';

  constructor(
    message: string,
    readonly classification: Exclude<AttemptClassification, 'passed'>,
  ) {
    super(message);
    this.name = 'TransientExecutionFailure';
  }
}

export class NonRetryableServiceFailure extends Error {
  readonly code: string = 'NON_RETRYABLE_SERVICE_FAILURE';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'NonRetryableServiceFailure';
  }
}

/**
 * Generative service unreachable, unauthenticated or out of quota.
 */
export class GenerationUnavailableError extends NonRetryableServiceFailure {
  readonly code = 'GENERATION_UNAVAILABLE';

  constructor(message: string, readonly statusCode?: number, cause?: unknown) {
    super(message, cause);
    this.name = 'GenerationUnavailableError';
  }
}

/**
 * Generative service answered, but the answer could not be parsed.
 */
export class GenerationMalformedError extends TransientExecutionFailure {
  constructor(message: string, readonly rawResponse?: string) {
    super(message, 'malformed_candidate');
    this.name = 'GenerationMalformedError';
  }
}

export class SandboxTimeoutError extends TransientExecutionFailure {
  constructor(readonly timeoutMs: number, readonly partialOutput: string) {
    super(`Sandbox execution exceeded ${timeoutMs}ms`, 'sandbox_timeout');
    this.name = 'SandboxTimeoutError';
  }
}

export class SandboxResourceError extends TransientExecutionFailure {
  constructor(message: string, readonly partialOutput: string) {
    super(message, 'resource_exceeded');
    this.name = 'SandboxResourceError';
  }
}

export type RunStage = 'corpus' | 'selection' | 'publish';

export class RunLevelFailure extends Error {
  readonly code = 'RUN_LEVEL_FAILURE';

  constructor(readonly stage: RunStage, message: string, cause?: unknown) {
    super(`[${stage}] ${message}`, { cause });
    this.name = 'RunLevelFailure';
  }
}

export class PublisherConflictError extends Error {
  readonly code = 'PUBLISHER_CONFLICT';

  constructor(readonly target: string) {
    super(`Publish target already has content for this day: ${target}`);
    this.name = 'PublisherConflictError';
  }
}

export class PublisherUnavailableError extends Error {
  readonly code = 'PUBLISHER_UNAVAILABLE';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PublisherUnavailableError';
  }
}

export class InvalidCorpusItemError extends Error {
  readonly code = 'INVALID_CORPUS_ITEM';

  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'InvalidCorpusItemError';
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function describeError(error: unknown): { name: string; message: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}

export function isAbortError(error: unknown): boolean {
  if (error instanceof DOMException && error.name === 'AbortError') {
    return true;
  }
  if (error instanceof Error) {
    return error.name === 'AbortError' || error.name === 'TimeoutError';
  }
  return false;
}
