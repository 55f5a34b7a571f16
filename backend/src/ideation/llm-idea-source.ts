/**
 * LLM Idea Source
 *
 * Asks a chat model for tool ideas as `{ "ideas": [...] }`. Entries that do
 * not have the expected shape are skipped one by one.
 */

import { z } from 'zod';
import type { Topic } from '@forgeloop/shared-types';
import type { LLMClient, ProviderRoute } from '../llm/client';
import { parseStructured } from '../llm/json-output';
import { createLogger } from '../logging/log';
import type { IdeaSource, RawIdea } from './types';

const log = createLogger('idea-source');

export const IDEA_SYSTEM_PROMPT =
  'You are a senior open-source JavaScript developer who designs small, practical, self-contained ' +
  'Node.js command-line tools and utility modules for developers. Every tool must be buildable in ' +
  '50-300 lines using only Node.js built-in modules, and testable with node:test without network access.';

const ideaSchema = z.object({
  tool_name: z.string(),
  display_name: z.string().optional(),
  description: z.string().optional(),
  acceptance_criteria: z.array(z.string()).optional(),
});

const responseSchema = z.union([
  z.object({ ideas: z.array(z.unknown()) }),
  z.object({ tools: z.array(z.unknown()) }),
  z.array(z.unknown()),
]);

export function buildIdeaPrompt(topic: Topic, count: number): string {
  return `Topic: ${topic.label}
Keywords: ${topic.keywords.join(', ') || '(none)'}

Propose exactly ${count} distinct, buildable tool ideas related to this topic.
Each tool must be a single ES module runnable from the command line or importable as a library.

Return ONLY a JSON object of this shape:
{
  "ideas": [
    {
      "tool_name": "snake_case_name",
      "display_name": "Human Readable Name",
      "description": "One paragraph: what the tool does and why it is useful",
      "acceptance_criteria": ["behaviour a unit test can check", "..."]
    }
  ]
}

Do not propose thin wrappers around well-known tools.`;
}

export interface LLMIdeaSourceOptions {
  routes: ProviderRoute[];
  temperature?: number;
  maxOutputTokens?: number;
}

export class LLMIdeaSource implements IdeaSource {
  constructor(
    private readonly client: LLMClient,
    private readonly options: LLMIdeaSourceOptions,
  ) {}

  async propose(topic: Topic, count: number, signal?: AbortSignal): Promise<RawIdea[]> {
    const response = await this.client.completeWithFallback(this.options.routes, {
      systemPrompt: IDEA_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: buildIdeaPrompt(topic, count) }],
      temperature: this.options.temperature ?? 0.8,
      maxOutputTokens: this.options.maxOutputTokens ?? 3000,
      jsonMode: true,
      abortSignal: signal,
    });

    const parsed = parseStructured(response.text, responseSchema);
    if (!parsed.ok) {
      throw new Error(`Idea response unreadable: ${parsed.error}`);
    }
    const entries = Array.isArray(parsed.value)
      ? parsed.value
      : 'ideas' in parsed.value
        ? parsed.value.ideas
        : parsed.value.tools;

    const ideas: RawIdea[] = [];
    for (const entry of entries) {
      const idea = ideaSchema.safeParse(entry);
      if (!idea.success) {
        log.debug('skipping malformed idea entry', { topic: topic.label });
        continue;
      }
      ideas.push({
        name: idea.data.tool_name,
        displayName: idea.data.display_name,
        description: idea.data.description ?? '',
        acceptanceCriteria: idea.data.acceptance_criteria ?? [],
      });
    }
    return ideas;
  }
}
