/**
 * Run Types
 */

import type { Topic } from './corpus';
import type { ToolOutcome, ToolOutcomeStatus } from './build';

/**
 * Aggregate of every outcome of one pipeline run.
 */
export interface RunSummary {
  runId: string;
  /** YYYY-MM-DD (UTC) used for publish paths */
  runDate: string;
  startedAt: string;
  finishedAt: string;
  topics: Topic[];
  outcomes: ToolOutcome[];
  counts: Record<ToolOutcomeStatus, number>;
}

/**
 * Row persisted in the run log.
 */
export interface RunLogEntry {
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
  committedRef?: string;
  /** Set when the run aborted before publishing */
  error?: string;
}
