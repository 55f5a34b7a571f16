/**
 * LLM Code Generator - the Generative Code Service backed by chat models
 *
 * Every provider failure (transport, auth, quota, exhausted retries) becomes
 * GenerationUnavailableError; a response that cannot be read as
 * `{ code, tests, readme? }` becomes GenerationMalformedError.
 */

import { z } from 'zod';
import type { GeneratedCandidate } from '@forgeloop/shared-types';
import { BUILD_DEFAULTS } from '@forgeloop/shared-types';
import { GenerationMalformedError, GenerationUnavailableError, isAbortError } from '../errors';
import type { LLMClient, ProviderRoute } from '../llm/client';
import { LLMError } from '../llm/types';
import { parseStructured } from '../llm/json-output';
import { createLogger } from '../logging/log';
import { BUILD_SYSTEM_PROMPT, buildCorrectionPrompt, buildGenerationPrompt } from './prompts';
import type { CodeGenerator, GenerationRequest } from './types';

const log = createLogger('code-generator');

const candidateSchema = z.object({
  code: z.string().trim().min(1, 'code must not be empty'),
  tests: z.string().trim().min(1, 'tests must not be empty'),
  readme: z.string().optional(),
});

export interface LLMCodeGeneratorOptions {
  routes: ProviderRoute[];
  maxOutputTokens?: number;
  temperature?: number;
  /** Characters of harness output quoted in a correction prompt */
  feedbackPromptChars?: number;
}

/** Remove a single surrounding markdown fence the model put inside a JSON string. */
export function stripCodeFence(text: string): string {
  const match = text.trim().match(/^```[\w-]*\n([\s\S]*?)\n?```$/);
  return match ? (match[1] ?? '') : text;
}

export class LLMCodeGenerator implements CodeGenerator {
  private readonly routes: ProviderRoute[];
  private readonly maxOutputTokens: number;
  private readonly temperature: number;
  private readonly feedbackPromptChars: number;

  constructor(
    private readonly client: LLMClient,
    options: LLMCodeGeneratorOptions,
  ) {
    this.routes = options.routes;
    this.maxOutputTokens = options.maxOutputTokens ?? 4096;
    this.temperature = options.temperature ?? 0.5;
    this.feedbackPromptChars = options.feedbackPromptChars ?? BUILD_DEFAULTS.FEEDBACK_PROMPT_CHARS;
  }

  async generate(request: GenerationRequest): Promise<GeneratedCandidate> {
    const { spec, feedback, signal } = request;
    const prompt = feedback
      ? buildCorrectionPrompt(spec, feedback, this.feedbackPromptChars)
      : buildGenerationPrompt(spec);

    let text: string;
    try {
      const response = await this.client.completeWithFallback(this.routes, {
        systemPrompt: BUILD_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: prompt }],
        maxOutputTokens: this.maxOutputTokens,
        temperature: this.temperature,
        jsonMode: true,
        abortSignal: signal,
      });
      text = response.text;
      log.debug(`Attempt ${request.attemptIndex} for ${spec.name}: ${text.length} chars from ${response.provider}`);
    } catch (error: unknown) {
      if (signal?.aborted || isAbortError(error)) {
        throw error;
      }
      const statusCode = error instanceof LLMError ? error.statusCode : undefined;
      const message = error instanceof Error ? error.message : String(error);
      throw new GenerationUnavailableError(`Generative service unavailable: ${message}`, statusCode, error);
    }

    const parsed = parseStructured(text, candidateSchema);
    if (!parsed.ok) {
      throw new GenerationMalformedError(`Malformed generation response: ${parsed.error}`, text);
    }

    return {
      source: stripCodeFence(parsed.value.code),
      tests: stripCodeFence(parsed.value.tests),
      readme: parsed.value.readme?.trim() || undefined,
    };
  }
}
