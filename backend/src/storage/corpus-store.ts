/**
 * Corpus Store - ingested items and the run log, in SQLite
 *
 * Items are immutable once stored: appending an id that already exists is
 * a no-op. Timestamps are kept as epoch milliseconds so window queries use
 * the index.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import type { CorpusItem, RunLogEntry } from '@forgeloop/shared-types';
import { createLogger } from '../logging/log';

const log = createLogger('corpus-store');

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Query limits
 */
const DEFAULT_HISTORY_LIMIT = 30;
const MAX_HISTORY_LIMIT = 1000;

interface ItemRow {
  id: string;
  source: string;
  title: string | null;
  content: string;
  url: string | null;
  keyword: string | null;
  timestamp: number;
  embedding: string | null;
}

interface RunRow {
  runId: string;
  runDate: string;
  startedAt: string;
  finishedAt: string;
  itemsConsidered: number;
  topicsSelected: number;
  toolsAttempted: number;
  toolsPassed: number;
  toolsAbandoned: number;
  toolsFatal: number;
  committedRef: string | null;
  error: string | null;
}

type ItemParams = {
  id: string;
  source: string;
  title: string | null;
  content: string;
  url: string | null;
  keyword: string | null;
  timestamp: number;
  embedding: string | null;
  ingestedAt: number;
};

function parseEmbedding(raw: string | null): number[] | undefined {
  if (!raw) return undefined;
  const value: unknown = JSON.parse(raw);
  if (Array.isArray(value) && value.every((n): n is number => typeof n === 'number')) {
    return value;
  }
  return undefined;
}

function rowToItem(row: ItemRow): CorpusItem {
  const item: CorpusItem = {
    id: row.id,
    source: row.source,
    content: row.content,
    timestamp: new Date(row.timestamp).toISOString(),
  };
  if (row.title !== null) item.title = row.title;
  if (row.url !== null) item.url = row.url;
  if (row.keyword !== null) item.keyword = row.keyword;
  const embedding = parseEmbedding(row.embedding);
  if (embedding) item.embedding = embedding;
  return item;
}

function rowToRun(row: RunRow): RunLogEntry {
  const { committedRef, error, ...rest } = row;
  return {
    ...rest,
    ...(committedRef !== null ? { committedRef } : {}),
    ...(error !== null ? { error } : {}),
  };
}

export class CorpusStore {
  private readonly db: Database.Database;
  private readonly insertItem: Database.Statement<[ItemParams]>;
  private readonly selectRecent: Database.Statement<[number, number], ItemRow>;
  private readonly deleteBefore: Database.Statement<[number]>;
  private readonly countItems: Database.Statement<[], { total: number }>;
  private readonly insertRun: Database.Statement<[RunRow]>;
  private readonly selectRuns: Database.Statement<[number], RunRow>;
  private readonly appendMany: (items: readonly CorpusItem[], ingestedAt: number) => number;

  /**
   * Open (and create when missing) the database at `dbPath`.
   * ':memory:' gives a private in-memory database.
   */
  constructor(readonly dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);

    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('temp_store = MEMORY');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS corpus_items (
        id TEXT PRIMARY KEY,
        source TEXT NOT NULL,
        title TEXT,
        content TEXT NOT NULL,
        url TEXT,
        keyword TEXT,
        timestamp INTEGER NOT NULL,
        embedding TEXT,
        ingestedAt INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_corpus_items_timestamp ON corpus_items(timestamp);

      CREATE TABLE IF NOT EXISTS run_log (
        runId TEXT PRIMARY KEY,
        runDate TEXT NOT NULL,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NOT NULL,
        itemsConsidered INTEGER NOT NULL,
        topicsSelected INTEGER NOT NULL,
        toolsAttempted INTEGER NOT NULL,
        toolsPassed INTEGER NOT NULL,
        toolsAbandoned INTEGER NOT NULL,
        toolsFatal INTEGER NOT NULL,
        committedRef TEXT,
        error TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_run_log_started ON run_log(startedAt);
    `);

    this.insertItem = this.db.prepare<[ItemParams]>(`
      INSERT OR IGNORE INTO corpus_items (id, source, title, content, url, keyword, timestamp, embedding, ingestedAt)
      VALUES (@id, @source, @title, @content, @url, @keyword, @timestamp, @embedding, @ingestedAt)
    `);
    this.selectRecent = this.db.prepare<[number, number], ItemRow>(`
      SELECT id, source, title, content, url, keyword, timestamp, embedding
      FROM corpus_items
      WHERE timestamp >= ? AND timestamp <= ?
      ORDER BY timestamp ASC, id ASC
    `);
    this.deleteBefore = this.db.prepare<[number]>('DELETE FROM corpus_items WHERE timestamp < ?');
    this.countItems = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM corpus_items');
    this.insertRun = this.db.prepare<[RunRow]>(`
      INSERT OR REPLACE INTO run_log (
        runId, runDate, startedAt, finishedAt, itemsConsidered, topicsSelected,
        toolsAttempted, toolsPassed, toolsAbandoned, toolsFatal, committedRef, error
      ) VALUES (
        @runId, @runDate, @startedAt, @finishedAt, @itemsConsidered, @topicsSelected,
        @toolsAttempted, @toolsPassed, @toolsAbandoned, @toolsFatal, @committedRef, @error
      )
    `);
    this.selectRuns = this.db.prepare<[number], RunRow>(
      'SELECT * FROM run_log ORDER BY startedAt DESC, runId DESC LIMIT ?',
    );

    this.appendMany = this.db.transaction((items: readonly CorpusItem[], ingestedAt: number): number => {
      let inserted = 0;
      for (const item of items) {
        if (this.insertOne(item, ingestedAt)) inserted++;
      }
      return inserted;
    });

    log.info(`Opened corpus database: ${dbPath}`);
  }

  /** Returns false when an item with the same id is already stored. */
  append(item: CorpusItem, ingestedAt: Date = new Date()): boolean {
    return this.insertOne(item, ingestedAt.getTime());
  }

  /** Append in one transaction. Returns the number of new items. */
  appendAll(items: readonly CorpusItem[], ingestedAt: Date = new Date()): number {
    return this.appendMany(items, ingestedAt.getTime());
  }

  /** Items whose timestamp falls within the last `windowHours` before `now`, oldest first. */
  recentItems(windowHours: number, now: Date = new Date()): CorpusItem[] {
    if (!(windowHours > 0)) {
      throw new RangeError(`windowHours must be positive, got ${windowHours}`);
    }
    const end = now.getTime();
    return this.selectRecent.all(end - windowHours * HOUR_MS, end).map(rowToItem);
  }

  /** Delete items older than `days` before `now`. Returns the number removed. */
  purgeOlderThan(days: number, now: Date = new Date()): number {
    const removed = this.deleteBefore.run(now.getTime() - days * DAY_MS).changes;
    if (removed > 0) {
      log.info(`Purged ${removed} corpus items older than ${days} days`);
    }
    return removed;
  }

  count(): number {
    return this.countItems.get()?.total ?? 0;
  }

  logRun(entry: RunLogEntry): void {
    this.insertRun.run({
      ...entry,
      committedRef: entry.committedRef ?? null,
      error: entry.error ?? null,
    });
  }

  /** Most recent runs first. */
  runHistory(limit: number = DEFAULT_HISTORY_LIMIT): RunLogEntry[] {
    const bounded = Math.min(Math.max(1, Math.floor(limit)), MAX_HISTORY_LIMIT);
    return this.selectRuns.all(bounded).map(rowToRun);
  }

  close(): void {
    this.db.close();
  }

  private insertOne(item: CorpusItem, ingestedAt: number): boolean {
    const timestamp = Date.parse(item.timestamp);
    if (Number.isNaN(timestamp)) {
      throw new RangeError(`Corpus item ${item.id} has an invalid timestamp: ${item.timestamp}`);
    }
    const result = this.insertItem.run({
      id: item.id,
      source: item.source,
      title: item.title ?? null,
      content: item.content,
      url: item.url ?? null,
      keyword: item.keyword ?? null,
      timestamp,
      embedding: item.embedding ? JSON.stringify(item.embedding) : null,
      ingestedAt,
    });
    return result.changes > 0;
  }
}
