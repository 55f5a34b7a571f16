/**
 * A provider adapter maps the shared chat types to one provider's HTTP
 * dialect and back.
 */

import type { LLMError, LLMRequestParams, LLMResponse, ProviderID } from '../types';

export interface AdapterRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

export interface ProviderAdapter {
  readonly id: ProviderID;

  buildRequest(params: LLMRequestParams): AdapterRequest;

  /** Throws an LLMError when the body is not a chat completion. */
  parseResponse(raw: unknown): LLMResponse;

  /** `retryAfterMs` is the parsed Retry-After header of the failed response. */
  convertError(status: number, body: unknown, retryAfterMs?: number): LLMError;
}
