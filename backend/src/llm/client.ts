/**
 * LLMClient - unified LLM client
 *
 * Provider differences live in ProviderAdapter implementations; this class
 * owns the HTTP call, the per-request timeout, retries (via RetryEngine) and
 * the ordered fallback across providers.
 */

import { LLMError } from './types';
import type { ProviderID, LLMRequestParams, LLMResponse } from './types';
import type { ProviderAdapter } from './adapters/types';
import { RetryEngine, parseRetryAfter } from './retry';
import { createLogger } from '../logging/log';

const log = createLogger('llm-client');

export interface LLMClientOptions {
  /** Per-HTTP-request timeout in milliseconds (0 disables) */
  requestTimeoutMs?: number;
}

/** A provider/model pair in a fallback chain */
export interface ProviderRoute {
  provider: ProviderID;
  model: string;
}

export type RoutedRequestParams = Omit<LLMRequestParams, 'provider' | 'model'>;

export class LLMClient {
  private readonly requestTimeoutMs: number;

  constructor(
    private adapters: Map<ProviderID, ProviderAdapter>,
    private retryEngine: RetryEngine,
    options: LLMClientOptions = {},
  ) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? 0;
  }

  /**
   * Non-streaming completion against one provider.
   *
   * 1. adapter.buildRequest(params) → { url, headers, body }
   * 2. retryEngine.execute() wraps the fetch with retry logic
   * 3. non-ok response → adapter.convertError(status, body, retry-after) → throw
   * 4. JSON body → adapter.parseResponse(json)
   */
  async complete(params: LLMRequestParams): Promise<LLMResponse> {
    const adapter = this.adapters.get(params.provider);
    if (!adapter) {
      throw new LLMError(`Provider not configured: ${params.provider}`, params.provider, 0, false);
    }

    const { url, headers, body } = adapter.buildRequest(params);

    return this.retryEngine.execute(async (signal: AbortSignal) => {
      const timeout = this.startTimeout(params.provider, signal);
      try {
        let response: Response;
        try {
          response = await fetch(url, {
            method: 'POST',
            headers,
            body: JSON.stringify(body),
            signal: timeout.signal,
          });
        } catch (error: unknown) {
          throw this.asTransportError(params.provider, error);
        }

        if (!response.ok) {
          const errorBody = await response.text().catch(() => '');
          let parsedBody: unknown;
          try {
            parsedBody = JSON.parse(errorBody);
          } catch {
            parsedBody = errorBody;
          }
          const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'));
          throw adapter.convertError(response.status, parsedBody, retryAfterMs);
        }

        const json: unknown = await response.json();
        return adapter.parseResponse(json);
      } finally {
        timeout.clear();
      }
    }, params.abortSignal);
  }

  /**
   * Try each route in order and return the first successful response.
   * Aborts propagate immediately; any other failure moves on to the next
   * route. Throws the last provider error when every route fails.
   */
  async completeWithFallback(
    routes: ProviderRoute[],
    params: RoutedRequestParams,
  ): Promise<LLMResponse> {
    const usable = routes.filter(route => this.adapters.has(route.provider));
    if (usable.length === 0) {
      throw new LLMError('No LLM provider configured', 'unknown', 401, false);
    }

    let lastError: unknown;
    for (const route of usable) {
      try {
        return await this.complete({ ...params, provider: route.provider, model: route.model });
      } catch (error: unknown) {
        if (params.abortSignal?.aborted || isAbort(error)) {
          throw error;
        }
        lastError = error;
        log.warn(`Provider ${route.provider} failed, trying next`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    throw lastError instanceof LLMError
      ? lastError
      : new LLMError('All LLM providers failed', 'unknown', 0, false, lastError);
  }

  // --------------------------------------------------------------------------
  // Private helpers
  // --------------------------------------------------------------------------

  private startTimeout(provider: ProviderID, parent: AbortSignal): { signal: AbortSignal; clear: () => void } {
    if (this.requestTimeoutMs <= 0) {
      return { signal: parent, clear: () => {} };
    }

    const controller = new AbortController();
    const onParentAbort = () => controller.abort(parent.reason);
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }

    const timer = setTimeout(() => {
      controller.abort(
        new LLMError(`${provider} request timed out after ${this.requestTimeoutMs}ms`, provider, 408, false),
      );
    }, this.requestTimeoutMs);

    return {
      signal: controller.signal,
      clear: () => {
        clearTimeout(timer);
        parent.removeEventListener('abort', onParentAbort);
      },
    };
  }

  private asTransportError(provider: ProviderID, error: unknown): unknown {
    if (error instanceof LLMError || isAbort(error)) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new LLMError(`${provider} transport error: ${message}`, provider, 0, false, error);
  }
}

function isAbort(error: unknown): boolean {
  if (error instanceof DOMException && error.name === 'AbortError') {
    return true;
  }
  return error instanceof Error && error.name === 'AbortError';
}
