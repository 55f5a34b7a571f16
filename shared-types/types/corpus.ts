/**
 * Corpus & Topic Types
 *
 * Records produced by ingestion and the per-run topics derived from them.
 */

/**
 * One ingested signal record. Immutable once stored.
 */
export interface CorpusItem {
  /** Stable identifier (source-specific, unique across the corpus) */
  id: string;
  /** Connector that produced the record, e.g. "hackernews" */
  source: string;
  /** Textual content used for similarity and clustering */
  content: string;
  title?: string;
  url?: string;
  /** Search keyword the connector matched, when it had one */
  keyword?: string;
  /** ISO-8601 timestamp of publication */
  timestamp: string;
  embedding?: number[];
}

/**
 * A ranked cluster of related corpus items selected for one run.
 */
export interface Topic {
  id: string;
  label: string;
  /** Recency-weighted frequency score */
  score: number;
  /** 1-based position in the run's ordered topic list */
  rank: number;
  itemIds: string[];
  keywords: string[];
  /** Earliest timestamp among supporting items (tie-breaker) */
  earliestTimestamp: string;
}

/**
 * A near-duplicate match returned by a similarity index.
 */
export interface SimilarityMatch {
  item: CorpusItem;
  /** Similarity in [0, 1] */
  score: number;
}
