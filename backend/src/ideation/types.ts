/**
 * Idea source contract
 */

import type { Topic } from '@forgeloop/shared-types';

/** An idea as proposed, before names are normalized or duplicates removed. */
export interface RawIdea {
  name: string;
  displayName?: string;
  description: string;
  acceptanceCriteria: string[];
}

export interface IdeaSource {
  /** Propose up to `count` ideas for a topic. May return more or fewer. */
  propose(topic: Topic, count: number, signal?: AbortSignal): Promise<RawIdea[]>;
}
