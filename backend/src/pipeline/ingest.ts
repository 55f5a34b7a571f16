/**
 * Corpus ingestion
 *
 * Validates raw records, appends the valid ones and applies retention.
 */

import { z } from 'zod';
import type { CorpusItem } from '@forgeloop/shared-types';
import { CORPUS_DEFAULTS } from '@forgeloop/shared-types';
import { InvalidCorpusItemError, RunLevelFailure, describeError } from '../errors';
import { createLogger } from '../logging/log';
import type { CorpusStore } from '../storage/corpus-store';

const log = createLogger('ingest');

const corpusItemSchema = z.object({
  id: z.string().trim().min(1, 'id is required'),
  source: z.string().trim().min(1, 'source is required'),
  content: z.string().trim().min(1, 'content must not be empty'),
  title: z.string().trim().min(1).optional(),
  url: z.string().url().optional(),
  keyword: z.string().trim().min(1).optional(),
  timestamp: z
    .string()
    .refine(value => !Number.isNaN(Date.parse(value)), 'timestamp must be a parseable date'),
  embedding: z.array(z.number().finite()).min(1).optional(),
});

/** Validate one raw record and normalize its timestamp to ISO-8601 UTC. */
export function parseCorpusItem(raw: unknown): CorpusItem {
  const result = corpusItemSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new InvalidCorpusItemError(`Invalid corpus item: ${issues.join('; ')}`, issues);
  }
  const { timestamp, ...rest } = result.data;
  return { ...rest, timestamp: new Date(Date.parse(timestamp)).toISOString() };
}

export type IngestTarget = Pick<CorpusStore, 'appendAll' | 'purgeOlderThan'>;

export interface IngestOptions {
  retentionDays?: number;
  now?: Date;
}

export interface IngestResult {
  received: number;
  inserted: number;
  duplicates: number;
  purged: number;
  rejected: Array<{ position: number; issues: string[] }>;
}

export function ingest(store: IngestTarget, records: readonly unknown[], options: IngestOptions = {}): IngestResult {
  const now = options.now ?? new Date();
  const valid: CorpusItem[] = [];
  const rejected: IngestResult['rejected'] = [];

  records.forEach((record, position) => {
    try {
      valid.push(parseCorpusItem(record));
    } catch (error) {
      if (!(error instanceof InvalidCorpusItemError)) throw error;
      rejected.push({ position, issues: error.issues });
    }
  });

  if (rejected.length > 0) {
    log.warn(`Rejected ${rejected.length} of ${records.length} corpus records`, { rejected: rejected.slice(0, 5) });
  }

  let inserted: number;
  let purged: number;
  try {
    inserted = store.appendAll(valid, now);
    purged = store.purgeOlderThan(options.retentionDays ?? CORPUS_DEFAULTS.RETENTION_DAYS, now);
  } catch (error) {
    throw new RunLevelFailure('corpus', `Corpus store unavailable: ${describeError(error).message}`, error);
  }

  log.info(`Ingested ${inserted} new corpus items`, { received: records.length, purged });
  return { received: records.length, inserted, duplicates: valid.length - inserted, purged, rejected };
}
