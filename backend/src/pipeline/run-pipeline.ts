/**
 * Run Pipeline
 *
 * corpus → topics → ideas → build loops → summary → publish → run log → notify
 *
 * The run deadline is measured from the start of the run and shared by
 * ideation and every build loop. A RunLevelFailure stops the run before
 * anything is published; the run is still logged with its error.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  CorpusItem,
  RunLogEntry,
  RunSummary,
  ToolOutcome,
  ToolOutcomeStatus,
  ToolSpecification,
  Topic,
} from '@forgeloop/shared-types';
import { RunLevelFailure, describeError, isAbortError } from '../errors';
import type { RunStage } from '../errors';
import { createLogger } from '../logging/log';
import type { TopicSelector } from '../analysis/topic-selector';
import type { LoopTransition } from '../execution/build-loop';
import { RunDeadlineExceededError } from '../execution/build-scheduler';
import type { BuildScheduler } from '../execution/build-scheduler';
import { IdeaGenerator } from '../ideation/idea-generator';
import type { IdeaSource } from '../ideation/types';
import type { Notifier } from '../publishing/notifier';
import type { Publisher } from '../publishing/publisher';
import type { CorpusStore } from '../storage/corpus-store';

const log = createLogger('pipeline');

export interface PipelineDependencies {
  corpus: Pick<CorpusStore, 'recentItems' | 'logRun'>;
  selector: Pick<TopicSelector, 'select'>;
  ideaSource: IdeaSource;
  scheduler: Pick<BuildScheduler, 'runAll'>;
  publisher: Publisher;
  notifier?: Notifier;
  now?: () => Date;
}

export interface PipelineOptions {
  windowHours: number;
  topTopics: number;
  ideasPerTopic: number;
  maxToolsPerRun: number;
  maxAttemptsPerTool: number;
  maxConcurrentTools: number;
  sandboxTimeoutMs: number;
  runDeadlineMs: number;
  /** Build and summarize, but never publish */
  dryRun?: boolean;
  signal?: AbortSignal;
  onTransition?: (transition: LoopTransition) => void;
}

export interface PipelineResult {
  summary: RunSummary;
  committedRef?: string;
}

export function countOutcomes(outcomes: readonly ToolOutcome[]): Record<ToolOutcomeStatus, number> {
  const counts: Record<ToolOutcomeStatus, number> = { passed: 0, abandoned: 0, fatal_error: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status]++;
  }
  return counts;
}

async function atStage<T>(stage: RunStage, what: string, fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof RunLevelFailure) throw error;
    throw new RunLevelFailure(stage, `${what}: ${describeError(error).message}`, error);
  }
}

/**
 * Ask for ideas topic by topic, in rank order, until the run has
 * `maxToolsPerRun` specifications.
 */
async function ideate(
  generator: IdeaGenerator,
  topics: readonly Topic[],
  options: PipelineOptions,
  signal: AbortSignal,
): Promise<ToolSpecification[]> {
  const specs: ToolSpecification[] = [];
  for (const topic of topics) {
    const remaining = options.maxToolsPerRun - specs.length;
    if (remaining <= 0 || signal.aborted) break;
    try {
      specs.push(...(await generator.generate(topic, Math.min(options.ideasPerTopic, remaining), signal)));
    } catch (error) {
      if (signal.aborted || isAbortError(error)) {
        log.warn('ideation cut short by the run deadline', { specs: specs.length });
        break;
      }
      throw error;
    }
  }
  return specs;
}

export async function runPipeline(deps: PipelineDependencies, options: PipelineOptions): Promise<PipelineResult> {
  const now = deps.now ?? (() => new Date());
  const started = now();
  const runId = uuidv4();
  const runDate = started.toISOString().slice(0, 10);

  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    forwardAbort();
  } else {
    options.signal?.addEventListener('abort', forwardAbort, { once: true });
  }
  const deadline = setTimeout(() => {
    log.warn('run deadline reached', { runId, deadlineMs: options.runDeadlineMs });
    controller.abort(new RunDeadlineExceededError(options.runDeadlineMs));
  }, options.runDeadlineMs);
  deadline.unref();

  let items: CorpusItem[] = [];
  let topics: Topic[] = [];
  let outcomes: ToolOutcome[] = [];

  const logEntry = (extra: Partial<RunLogEntry>): RunLogEntry => {
    const counts = countOutcomes(outcomes);
    return {
      runId,
      runDate,
      startedAt: started.toISOString(),
      finishedAt: now().toISOString(),
      itemsConsidered: items.length,
      topicsSelected: topics.length,
      toolsAttempted: outcomes.length,
      toolsPassed: counts.passed,
      toolsAbandoned: counts.abandoned,
      toolsFatal: counts.fatal_error,
      ...extra,
    };
  };

  const writeLog = (entry: RunLogEntry): void => {
    try {
      deps.corpus.logRun(entry);
    } catch (error) {
      log.error('could not write the run log', { runId, error: describeError(error).message });
    }
  };

  const notify = async (summary: RunSummary, committedRef?: string): Promise<void> => {
    try {
      await deps.notifier?.notify(summary, committedRef);
    } catch (error) {
      log.warn('notifier failed', { runId, error: describeError(error).message });
    }
  };

  log.info(`Run ${runId} started`, { runDate, dryRun: options.dryRun ?? false });

  try {
    items = await atStage('corpus', 'Corpus store unavailable', () =>
      deps.corpus.recentItems(options.windowHours, started),
    );
    topics = await atStage('selection', 'Topic selection failed', () =>
      deps.selector.select(items, options.topTopics),
    );
    log.info(`Selected ${topics.length} topics from ${items.length} items`);

    const published = await atStage('publish', 'Publisher unavailable', () => deps.publisher.publishedToolNames());
    const generator = new IdeaGenerator(deps.ideaSource, { existingNames: published });
    const specs = await ideate(generator, topics, options, controller.signal);
    log.info(`Building ${specs.length} tool specifications`);

    outcomes = await deps.scheduler.runAll(specs, {
      maxConcurrency: options.maxConcurrentTools,
      maxAttempts: options.maxAttemptsPerTool,
      sandboxTimeoutMs: options.sandboxTimeoutMs,
      signal: controller.signal,
      onTransition: options.onTransition,
    });

    const summary: RunSummary = {
      runId,
      runDate,
      startedAt: started.toISOString(),
      finishedAt: now().toISOString(),
      topics,
      outcomes,
      counts: countOutcomes(outcomes),
    };

    let committedRef: string | undefined;
    if (summary.counts.passed === 0) {
      log.info('Nothing passed, skipping publish', { runId });
    } else if (options.dryRun) {
      log.info(`Dry run: ${summary.counts.passed} tools would be published`, { runId });
    } else {
      committedRef = await atStage('publish', 'Publish failed', () => deps.publisher.commit(summary));
    }

    writeLog(logEntry({ finishedAt: summary.finishedAt, ...(committedRef ? { committedRef } : {}) }));
    await notify(summary, committedRef);

    log.info(`Run ${runId} finished`, summary.counts);
    return committedRef ? { summary, committedRef } : { summary };
  } catch (error) {
    log.error(`Run ${runId} failed`, describeError(error));
    writeLog(logEntry({ error: describeError(error).message }));
    throw error;
  } finally {
    clearTimeout(deadline);
    options.signal?.removeEventListener('abort', forwardAbort);
  }
}
