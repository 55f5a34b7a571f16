/**
 * OpenAI-compatible Chat Completions adapter
 *
 * GitHub Models, Groq and Together all expose `POST {baseURL}/chat/completions`
 * with the OpenAI request and response shape; one adapter class serves all
 * of them, parameterized by provider id, base URL and key.
 */

import { z } from 'zod';
import { LLMError } from '../types';
import type { FinishReason, LLMRequestParams, LLMResponse, ProviderID } from '../types';
import type { AdapterRequest, ProviderAdapter } from './types';

const RETRYABLE_STATUSES = [429, 500, 502, 503, 504];

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

const errorBodySchema = z.object({
  error: z.union([
    z.string(),
    z.object({ message: z.string().optional(), type: z.string().optional() }),
  ]),
});

export interface OpenAICompatibleAdapterOptions {
  id: ProviderID;
  baseUrl: string;
  apiKey: string;
}

export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly id: ProviderID;
  private readonly baseUrl: string;
  private readonly apiKey: string;

  constructor(options: OpenAICompatibleAdapterOptions) {
    this.id = options.id;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
  }

  // ---- buildRequest -------------------------------------------------------

  buildRequest(params: LLMRequestParams): AdapterRequest {
    const messages: Array<{ role: string; content: string }> = [];
    if (params.systemPrompt) {
      messages.push({ role: 'system', content: params.systemPrompt });
    }
    for (const message of params.messages) {
      messages.push({ role: message.role, content: message.content });
    }

    const body: Record<string, unknown> = {
      model: params.model,
      messages,
    };
    if (params.maxOutputTokens !== undefined) body.max_tokens = params.maxOutputTokens;
    if (params.temperature !== undefined) body.temperature = params.temperature;
    if (params.jsonMode) body.response_format = { type: 'json_object' };

    return {
      url: `${this.baseUrl}/chat/completions`,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body,
    };
  }

  // ---- parseResponse ------------------------------------------------------

  parseResponse(raw: unknown): LLMResponse {
    const parsed = chatCompletionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LLMError(
        `${this.id} returned an unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        this.id,
        200,
        false,
        raw,
      );
    }

    const choice = parsed.data.choices[0];
    const usage = parsed.data.usage;

    return {
      provider: this.id,
      text: choice?.message?.content ?? '',
      finishReason: this.mapFinishReason(choice?.finish_reason ?? undefined),
      usage: {
        inputTokens: usage?.prompt_tokens ?? 0,
        outputTokens: usage?.completion_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0,
      },
    };
  }

  // ---- convertError -------------------------------------------------------

  convertError(status: number, body: unknown, retryAfterMs?: number): LLMError {
    const parsed = errorBodySchema.safeParse(body);
    let message = `${this.id} API error (HTTP ${status})`;
    if (parsed.success) {
      const detail = parsed.data.error;
      if (typeof detail === 'string') {
        message = detail;
      } else if (detail.message) {
        message = detail.message;
      }
    } else if (typeof body === 'string' && body.trim()) {
      message = `${message}: ${body.trim().slice(0, 300)}`;
    }

    return new LLMError(message, this.id, status, RETRYABLE_STATUSES.includes(status), body, retryAfterMs);
  }

  private mapFinishReason(reason: string | undefined): FinishReason {
    switch (reason) {
      case 'length':
        return 'max_tokens';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'stop';
    }
  }
}
