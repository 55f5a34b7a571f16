/**
 * LLM Module Entry Point / Factory
 *
 * Builds an LLMClient with one OpenAI-compatible adapter per configured
 * provider, plus the fallback routes used by generation and ideation.
 */

import type { ProviderID } from './types';
import type { ProviderAdapter } from './adapters/types';
import { LLMClient } from './client';
import type { ProviderRoute } from './client';
import { RetryEngine } from './retry';
import type { RetryConfig } from './retry';
import { OpenAICompatibleAdapter } from './adapters/openai-compatible';
import { config, getConfiguredProviders } from '../config';
import type { ProviderConfig } from '../config';

export { LLMClient } from './client';
export type { ProviderRoute, RoutedRequestParams } from './client';
export { RetryEngine, DEFAULT_RETRY_CONFIG } from './retry';
export { LLMError } from './types';
export type { ProviderID, LLMRequestParams, LLMMessage, LLMResponse, TokenUsage, FinishReason } from './types';
export type { ProviderAdapter, AdapterRequest } from './adapters/types';
export { OpenAICompatibleAdapter } from './adapters/openai-compatible';

// ============================================================================
// Factory
// ============================================================================

export type ConfiguredProvider = ProviderConfig & { apiKey: string };

export interface CreateLLMClientOptions {
  /** Providers to register (defaults to every provider with an API key) */
  providers?: ConfiguredProvider[];
  /** Partial retry config overrides */
  retryConfig?: Partial<RetryConfig>;
  /** Per-request timeout (defaults to LLM_REQUEST_TIMEOUT_MS) */
  requestTimeoutMs?: number;
}

export function createLLMClient(options: CreateLLMClientOptions = {}): LLMClient {
  const adapters = new Map<ProviderID, ProviderAdapter>();

  for (const provider of options.providers ?? getConfiguredProviders()) {
    adapters.set(
      provider.id,
      new OpenAICompatibleAdapter({
        id: provider.id,
        baseUrl: provider.baseURL,
        apiKey: provider.apiKey,
      }),
    );
  }

  const retryEngine = new RetryEngine({ maxRetries: config.ai.maxRetries, ...options.retryConfig });
  return new LLMClient(adapters, retryEngine, {
    requestTimeoutMs: options.requestTimeoutMs ?? config.ai.requestTimeoutMs,
  });
}

/**
 * Fallback chain in provider order. `fast` selects each provider's cheaper model.
 */
export function providerRoutes(
  fast = false,
  providers: ConfiguredProvider[] = getConfiguredProviders(),
): ProviderRoute[] {
  return providers.map(provider => ({
    provider: provider.id,
    model: fast ? provider.fastModel : provider.model,
  }));
}
