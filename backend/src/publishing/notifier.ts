/**
 * Run notifications
 *
 * A notifier never fails the run: delivery problems are logged and dropped.
 */

import type { RunSummary } from '@forgeloop/shared-types';
import { describeError } from '../errors';
import { createLogger } from '../logging/log';
import { passedInPublishOrder } from './publisher';

const log = createLogger('notifier');

export interface Notifier {
  notify(summary: RunSummary, committedRef?: string): Promise<void>;
}

export interface RunNotification {
  runId: string;
  runDate: string;
  counts: RunSummary['counts'];
  committedRef: string | null;
  tools: Array<{ name: string; description: string; attempts: number }>;
}

export function buildNotification(summary: RunSummary, committedRef?: string): RunNotification {
  return {
    runId: summary.runId,
    runDate: summary.runDate,
    counts: summary.counts,
    committedRef: committedRef ?? null,
    tools: passedInPublishOrder(summary.outcomes).map(outcome => ({
      name: outcome.spec.name,
      description: outcome.spec.description,
      attempts: outcome.attempts.length,
    })),
  };
}

export class NoopNotifier implements Notifier {
  async notify(): Promise<void> {}
}

export class WebhookNotifier implements Notifier {
  constructor(
    private readonly url: string,
    private readonly timeoutMs = 10_000,
  ) {}

  async notify(summary: RunSummary, committedRef?: string): Promise<void> {
    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(buildNotification(summary, committedRef)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        log.warn(`Webhook responded with HTTP ${response.status}`, { runId: summary.runId });
        return;
      }
      log.info('Webhook notified', { runId: summary.runId });
    } catch (error) {
      log.warn('Webhook delivery failed', { runId: summary.runId, error: describeError(error).message });
    }
  }
}
