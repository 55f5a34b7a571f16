/**
 * Similarity Index
 *
 * Answers "which stored items look like this one" with scores in [0, 1].
 * Embeddings are compared by cosine similarity when both sides carry one
 * of the same dimension; otherwise the word-token sets are compared by
 * Jaccard similarity.
 */

import type { CorpusItem, SimilarityMatch } from '@forgeloop/shared-types';
import { contentTokens, itemText } from './text';

export interface SimilarityQueryOptions {
  /** Drop matches scoring below this */
  minScore?: number;
  limit?: number;
}

export interface SimilarityIndex {
  readonly size: number;
  add(item: CorpusItem): void;
  /** Matches in descending score, ties by item id. The item itself is never returned. */
  query(item: CorpusItem, options?: SimilarityQueryOptions): SimilarityMatch[];
  score(a: CorpusItem, b: CorpusItem): number;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) {
    return 0;
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return clamp(dot / (Math.sqrt(normA) * Math.sqrt(normB)));
}

export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const token of a) {
    if (b.has(token)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value));
}

interface IndexedItem {
  item: CorpusItem;
  tokens: ReadonlySet<string>;
}

export class InMemorySimilarityIndex implements SimilarityIndex {
  private readonly entries = new Map<string, IndexedItem>();

  constructor(items: Iterable<CorpusItem> = []) {
    for (const item of items) {
      this.add(item);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  add(item: CorpusItem): void {
    this.entries.set(item.id, this.toEntry(item));
  }

  query(item: CorpusItem, options: SimilarityQueryOptions = {}): SimilarityMatch[] {
    const target = this.toEntry(item);
    const minScore = options.minScore ?? 0;
    const matches: SimilarityMatch[] = [];

    for (const entry of this.entries.values()) {
      if (entry.item.id === item.id) continue;
      const score = this.compare(target, entry);
      if (score >= minScore && score > 0) {
        matches.push({ item: entry.item, score });
      }
    }

    matches.sort((x, y) => y.score - x.score || x.item.id.localeCompare(y.item.id));
    return options.limit === undefined ? matches : matches.slice(0, options.limit);
  }

  score(a: CorpusItem, b: CorpusItem): number {
    return this.compare(this.toEntry(a), this.toEntry(b));
  }

  private compare(a: IndexedItem, b: IndexedItem): number {
    const left = a.item.embedding;
    const right = b.item.embedding;
    if (left && right && left.length > 0 && left.length === right.length) {
      return cosineSimilarity(left, right);
    }
    return jaccardSimilarity(a.tokens, b.tokens);
  }

  private toEntry(item: CorpusItem): IndexedItem {
    const cached = this.entries.get(item.id);
    if (cached && cached.item === item) {
      return cached;
    }
    return { item, tokens: new Set(contentTokens(itemText(item))) };
  }
}
