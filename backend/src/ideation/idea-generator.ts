/**
 * Idea Generator
 *
 * Turns a topic into tool specifications. One instance lives for one run
 * and remembers every name it has handed out, so two topics never yield
 * two tools with the same normalized name.
 */

import type { Topic, ToolSpecification } from '@forgeloop/shared-types';
import { IDEATION_DEFAULTS } from '@forgeloop/shared-types';
import { describeError, isAbortError } from '../errors';
import { createLogger } from '../logging/log';
import type { IdeaSource, RawIdea } from './types';

const log = createLogger('idea-generator');

const DISPLAY_NAME_MAX = 100;
const DESCRIPTION_MAX = 500;
const CRITERIA_MAX = 8;

export const DEFAULT_ACCEPTANCE_CRITERION = 'The exported functions behave as the description states';

/**
 * snake_case, `[a-z0-9_]` only, no leading, trailing or doubled underscores.
 * Returns '' when nothing usable is left.
 */
export function normalizeToolName(raw: string, maxLength: number = IDEATION_DEFAULTS.MAX_TOOL_NAME_LENGTH): string {
  return raw
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, maxLength)
    .replace(/_+$/, '');
}

export interface IdeaGeneratorOptions {
  /** Names already published on earlier days */
  existingNames?: Iterable<string>;
  maxNameLength?: number;
}

export class IdeaGenerator {
  private readonly claimed = new Set<string>();
  private readonly existing: ReadonlySet<string>;
  private readonly maxNameLength: number;

  constructor(
    private readonly source: IdeaSource,
    options: IdeaGeneratorOptions = {},
  ) {
    this.maxNameLength = options.maxNameLength ?? IDEATION_DEFAULTS.MAX_TOOL_NAME_LENGTH;
    this.existing = new Set([...(options.existingNames ?? [])].map(name => normalizeToolName(name, this.maxNameLength)));
  }

  /** Names handed out so far in this run. */
  get names(): readonly string[] {
    return [...this.claimed];
  }

  async generate(topic: Topic, limit: number, signal?: AbortSignal): Promise<ToolSpecification[]> {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
    }
    if (limit === 0) {
      return [];
    }

    let proposals: RawIdea[];
    try {
      proposals = await this.source.propose(topic, limit, signal);
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw error;
      }
      log.error('idea generation failed', { topic: topic.label, error: describeError(error).message });
      return [];
    }

    const specs: ToolSpecification[] = [];
    for (const idea of proposals) {
      if (specs.length === limit) break;

      const description = idea.description.trim();
      if (!description) {
        log.debug('idea rejected: empty description', { topic: topic.label, name: idea.name });
        continue;
      }
      const name = normalizeToolName(idea.name, this.maxNameLength);
      if (!name) {
        log.debug('idea rejected: unusable name', { topic: topic.label, name: idea.name });
        continue;
      }
      if (this.claimed.has(name) || this.existing.has(name)) {
        log.debug('idea rejected: duplicate name', { topic: topic.label, name });
        continue;
      }

      const criteria = idea.acceptanceCriteria.map(c => c.trim()).filter(Boolean).slice(0, CRITERIA_MAX);
      const displayName = idea.displayName?.trim().slice(0, DISPLAY_NAME_MAX);
      this.claimed.add(name);
      specs.push(
        Object.freeze({
          name,
          ...(displayName ? { displayName } : {}),
          description: description.slice(0, DESCRIPTION_MAX),
          acceptanceCriteria: criteria.length > 0 ? criteria : [DEFAULT_ACCEPTANCE_CRITERION],
          topicId: topic.id,
          topicRank: topic.rank,
        }),
      );
    }

    log.info(`Generated ${specs.length} ideas for topic: ${topic.label}`);
    return specs;
  }
}
