/**
 * Topic Selector
 *
 * Dedupe → cluster → rank. Items are processed in (timestamp, id) order so
 * the result depends only on the input set and the similarity scores.
 */

import { v5 as uuidv5 } from 'uuid';
import type { CorpusItem, Topic } from '@forgeloop/shared-types';
import { SELECTION_DEFAULTS } from '@forgeloop/shared-types';
import { createLogger } from '../logging/log';
import { InMemorySimilarityIndex } from './similarity-index';
import type { SimilarityIndex } from './similarity-index';
import { collapseWhitespace, contentTokens, itemText } from './text';

const log = createLogger('topic-selector');

const TOPIC_NAMESPACE = 'b7d0c6b2-4f3e-5a51-9a8e-3c2f1d0e9a47';
const LABEL_MAX_CHARS = 80;
const HOUR_MS = 3_600_000;

export interface TopicSelectorOptions {
  /** Items scoring strictly above this against a kept item are duplicates */
  similarityThreshold?: number;
  /** Items scoring at or above this against a cluster seed join that cluster */
  clusterThreshold?: number;
  halfLifeHours?: number;
  keywordsPerTopic?: number;
  /** Reference time for recency. Defaults to the newest item's timestamp */
  now?: Date;
  createIndex?: () => SimilarityIndex;
}

interface DatedItem {
  item: CorpusItem;
  time: number;
}

interface Cluster {
  seed: DatedItem;
  members: DatedItem[];
}

export class TopicSelector {
  private readonly similarityThreshold: number;
  private readonly clusterThreshold: number;
  private readonly halfLifeHours: number;
  private readonly keywordsPerTopic: number;
  private readonly createIndex: () => SimilarityIndex;

  constructor(private readonly options: TopicSelectorOptions = {}) {
    this.similarityThreshold = options.similarityThreshold ?? SELECTION_DEFAULTS.SIMILARITY_THRESHOLD;
    this.clusterThreshold = options.clusterThreshold ?? SELECTION_DEFAULTS.CLUSTER_THRESHOLD;
    this.halfLifeHours = options.halfLifeHours ?? SELECTION_DEFAULTS.RECENCY_HALF_LIFE_HOURS;
    this.keywordsPerTopic = options.keywordsPerTopic ?? SELECTION_DEFAULTS.KEYWORDS_PER_TOPIC;
    this.createIndex = options.createIndex ?? (() => new InMemorySimilarityIndex());

    if (this.halfLifeHours <= 0) {
      throw new RangeError(`halfLifeHours must be positive, got ${this.halfLifeHours}`);
    }
  }

  select(items: readonly CorpusItem[], limit: number): Topic[] {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
    }
    if (limit === 0 || items.length === 0) {
      return [];
    }

    const ordered = this.order(items);
    if (ordered.length === 0) {
      return [];
    }

    const index = this.createIndex();
    const kept = this.dedupe(ordered, index);
    const clusters = this.cluster(kept, index);
    const now = this.options.now?.getTime() ?? ordered[ordered.length - 1]?.time ?? 0;

    const ranked = clusters
      .map(cluster => ({
        cluster,
        label: this.labelFor(cluster.seed.item),
        score: this.recencyScore(cluster, now),
      }))
      .sort(
        (a, b) =>
          b.score - a.score ||
          a.cluster.seed.time - b.cluster.seed.time ||
          a.label.localeCompare(b.label),
      )
      .slice(0, limit);

    log.info('topics selected', {
      items: items.length,
      kept: kept.length,
      clusters: clusters.length,
      selected: ranked.length,
    });

    return ranked.map(({ cluster, label, score }, i) => ({
      id: uuidv5(cluster.seed.item.id, TOPIC_NAMESPACE),
      label,
      score,
      rank: i + 1,
      itemIds: cluster.members.map(m => m.item.id),
      keywords: this.keywordsFor(cluster),
      earliestTimestamp: new Date(cluster.seed.time).toISOString(),
    }));
  }

  private order(items: readonly CorpusItem[]): DatedItem[] {
    const dated: DatedItem[] = [];
    for (const item of items) {
      const time = Date.parse(item.timestamp);
      if (Number.isNaN(time)) {
        log.warn('skipping item with invalid timestamp', { id: item.id, timestamp: item.timestamp });
        continue;
      }
      dated.push({ item, time });
    }
    return dated.sort((a, b) => a.time - b.time || a.item.id.localeCompare(b.item.id));
  }

  private dedupe(ordered: DatedItem[], index: SimilarityIndex): DatedItem[] {
    const kept: DatedItem[] = [];
    for (const dated of ordered) {
      const [best] = index.query(dated.item, { limit: 1 });
      if (best && best.score > this.similarityThreshold) {
        log.debug('duplicate dropped', { id: dated.item.id, duplicateOf: best.item.id, score: best.score });
        continue;
      }
      index.add(dated.item);
      kept.push(dated);
    }
    return kept;
  }

  private cluster(kept: DatedItem[], index: SimilarityIndex): Cluster[] {
    const clusters: Cluster[] = [];
    for (const dated of kept) {
      const home = clusters.find(c => index.score(c.seed.item, dated.item) >= this.clusterThreshold);
      if (home) {
        home.members.push(dated);
      } else {
        clusters.push({ seed: dated, members: [dated] });
      }
    }
    return clusters;
  }

  private recencyScore(cluster: Cluster, now: number): number {
    let score = 0;
    for (const member of cluster.members) {
      const ageHours = Math.max(0, now - member.time) / HOUR_MS;
      score += Math.pow(2, -ageHours / this.halfLifeHours);
    }
    return score;
  }

  private labelFor(seed: CorpusItem): string {
    const title = seed.title ? collapseWhitespace(seed.title) : '';
    return title || collapseWhitespace(seed.content).slice(0, LABEL_MAX_CHARS).trim();
  }

  private keywordsFor(cluster: Cluster): string[] {
    const counts = new Map<string, number>();
    for (const member of cluster.members) {
      for (const token of contentTokens(itemText(member.item))) {
        if (token.length < 3) continue;
        counts.set(token, (counts.get(token) ?? 0) + 1);
      }
    }
    return [...counts.entries()]
      .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
      .slice(0, this.keywordsPerTopic)
      .map(([token]) => token);
  }
}
