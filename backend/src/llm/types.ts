/**
 * Chat completion request/response shapes shared by the client and its
 * provider adapters.
 */

import type { ProviderName } from '../config';

export type ProviderID = ProviderName;

export interface LLMMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface LLMRequestParams {
  provider: ProviderID;
  model: string;
  systemPrompt: string;
  messages: LLMMessage[];
  temperature?: number;
  maxOutputTokens?: number;
  /** Request a JSON object answer where the provider supports it */
  jsonMode?: boolean;
  abortSignal?: AbortSignal;
}

export type FinishReason = 'stop' | 'max_tokens' | 'content_filter' | 'error';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface LLMResponse {
  provider: ProviderID;
  text: string;
  finishReason: FinishReason;
  usage: TokenUsage;
}

/**
 * Provider failure. `statusCode` is 0 when no HTTP response exists
 * (DNS, refused connection). `retryAfterMs` carries the provider's
 * Retry-After hint, when it sent one.
 */
export class LLMError extends Error {
  readonly code = 'LLM_ERROR';

  constructor(
    message: string,
    readonly provider: ProviderID | 'unknown',
    readonly statusCode: number,
    readonly retryable: boolean,
    readonly raw?: unknown,
    readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'LLMError';
  }
}
