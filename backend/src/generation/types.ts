/**
 * Generative Code Service contract
 */

import type { AttemptFeedback, GeneratedCandidate, ToolSpecification } from '@forgeloop/shared-types';

export interface GenerationRequest {
  spec: ToolSpecification;
  /** 0-based index of the attempt this candidate is for */
  attemptIndex: number;
  /** Present for every attempt after the first */
  feedback?: AttemptFeedback;
  signal?: AbortSignal;
}

/**
 * Stateless: the same request may be sent any number of times.
 *
 * Fails with GenerationUnavailableError (not retryable) or
 * GenerationMalformedError (counts as a failed attempt).
 */
export interface CodeGenerator {
  generate(request: GenerationRequest): Promise<GeneratedCandidate>;
}
