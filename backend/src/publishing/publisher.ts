/**
 * Publisher - commits a run's passed tools to a content directory
 *
 * Layout under the root:
 *   tools/<date>/<tool>/   module, test file, README.md, metadata.json
 *   runs/<date>.json       run summary with every outcome and attempt
 *   INDEX.md               newest day first
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { PassedOutcome, RunSummary, ToolOutcome, ToolSpecification, Topic } from '@forgeloop/shared-types';
import { PublisherConflictError, PublisherUnavailableError, describeError, isErrnoException } from '../errors';
import { createLogger } from '../logging/log';
import { isSafeToolName, sandboxFileNames } from '../validation/sandbox';

const log = createLogger('publisher');

const INDEX_FILE = 'INDEX.md';
const INDEX_DESCRIPTION_CHARS = 100;

export interface Publisher {
  /** Returns a reference to the committed content. */
  commit(summary: RunSummary): Promise<string>;
  /** Tool names already published on any day. */
  publishedToolNames(): Promise<string[]>;
}

export const INITIAL_INDEX = `# Tools Index

Small tools generated from trending topics. Each one passed its own test suite before it was published.
`;

export function passedInPublishOrder(outcomes: readonly ToolOutcome[]): PassedOutcome[] {
  return outcomes
    .filter((o): o is PassedOutcome => o.status === 'passed')
    .sort((a, b) => a.spec.topicRank - b.spec.topicRank || a.spec.name.localeCompare(b.spec.name));
}

export function defaultReadme(spec: ToolSpecification): string {
  const files = sandboxFileNames(spec.name);
  const criteria = spec.acceptanceCriteria.map(c => `- ${c}`).join('\n');
  return `# ${spec.displayName ?? spec.name}

${spec.description}

## Usage

\`\`\`sh
node ${files.source}
node --test ${files.tests}
\`\`\`

## Acceptance criteria

${criteria}
`;
}

/** Insert a day section before the first existing day, or at the end. */
export function prependIndexSection(existing: string, section: string): string {
  const firstDay = existing.indexOf('\n## ');
  if (firstDay === -1) {
    return `${existing.replace(/\n*$/, '\n')}\n${section}`;
  }
  return `${existing.slice(0, firstDay + 1)}${section}\n${existing.slice(firstDay + 1)}`;
}

export function indexSection(runDate: string, passed: readonly PassedOutcome[], topics: readonly Topic[]): string {
  const lines = [`## ${runDate}`, ''];
  for (const outcome of passed) {
    const { spec, winningAttempt } = outcome;
    const topic = topics.find(t => t.id === spec.topicId);
    const description =
      spec.description.length > INDEX_DESCRIPTION_CHARS
        ? `${spec.description.slice(0, INDEX_DESCRIPTION_CHARS)}...`
        : spec.description;
    lines.push(`- **[${spec.displayName ?? spec.name}](tools/${runDate}/${spec.name}/)**: ${description}`);
    lines.push(
      `  - Topic: \`${topic?.label ?? spec.topicId}\` | Tests passed: ${winningAttempt.sandbox?.report?.passed ?? 0} | Attempts: ${outcome.attempts.length}`,
    );
  }
  return `${lines.join('\n')}\n`;
}

function runRecord(summary: RunSummary): object {
  return {
    runId: summary.runId,
    runDate: summary.runDate,
    startedAt: summary.startedAt,
    finishedAt: summary.finishedAt,
    counts: summary.counts,
    topics: summary.topics,
    outcomes: summary.outcomes.map(outcome => ({
      name: outcome.spec.name,
      topicId: outcome.spec.topicId,
      status: outcome.status,
      ...(outcome.status === 'abandoned' ? { reason: outcome.reason } : {}),
      ...(outcome.status === 'fatal_error' ? { reason: outcome.reason, error: outcome.error } : {}),
      attempts: outcome.attempts.map(attempt => ({
        index: attempt.index,
        classification: attempt.classification,
        status: attempt.sandbox?.status,
        exitCode: attempt.sandbox?.exitCode,
        elapsedMs: attempt.sandbox?.elapsedMs,
        report: attempt.sandbox?.report,
        diagnostics: attempt.diagnostics,
      })),
    })),
  };
}

export class FileSystemPublisher implements Publisher {
  constructor(readonly rootDir: string) {}

  async commit(summary: RunSummary): Promise<string> {
    const toolsRoot = path.join(this.rootDir, 'tools');
    const dayDir = path.join(toolsRoot, summary.runDate);
    const passed = passedInPublishOrder(summary.outcomes);

    try {
      await fs.mkdir(toolsRoot, { recursive: true });
      await fs.mkdir(dayDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        throw new PublisherConflictError(dayDir);
      }
      throw new PublisherUnavailableError(`Cannot create ${dayDir}: ${describeError(error).message}`, error);
    }

    let wroteRunFile = false;
    try {
      for (const outcome of passed) {
        await this.writeTool(dayDir, outcome, summary);
      }

      await fs.mkdir(path.join(this.rootDir, 'runs'), { recursive: true });
      await fs.writeFile(
        this.runFile(summary.runDate),
        `${JSON.stringify(runRecord(summary), null, 2)}\n`,
        { flag: 'wx' },
      );
      wroteRunFile = true;

      await this.updateIndex(summary, passed);
    } catch (error) {
      await this.rollback(wroteRunFile ? [dayDir, this.runFile(summary.runDate)] : [dayDir]);
      throw new PublisherUnavailableError(
        `Failed to publish run ${summary.runDate}: ${describeError(error).message}`,
        error,
      );
    }

    log.info(`Published ${passed.length} tools to ${dayDir}`);
    return dayDir;
  }

  async publishedToolNames(): Promise<string[]> {
    const toolsRoot = path.join(this.rootDir, 'tools');
    let days: string[];
    try {
      days = await fs.readdir(toolsRoot);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw new PublisherUnavailableError(`Cannot read ${toolsRoot}: ${describeError(error).message}`, error);
    }

    const names = new Set<string>();
    for (const day of days.sort()) {
      const entries = await fs.readdir(path.join(toolsRoot, day), { withFileTypes: true }).catch((error: unknown) => {
        log.warn(`Skipping unreadable day directory ${day}`, { error: describeError(error).message });
        return [];
      });
      for (const entry of entries) {
        if (entry.isDirectory()) names.add(entry.name);
      }
    }
    return [...names].sort();
  }

  private async writeTool(dayDir: string, outcome: PassedOutcome, summary: RunSummary): Promise<void> {
    const { spec, winningAttempt } = outcome;
    const candidate = winningAttempt.candidate;
    if (!candidate) {
      throw new Error(`Passed outcome for ${spec.name} has no candidate`);
    }
    if (!isSafeToolName(spec.name)) {
      throw new Error(`Tool name is not a safe directory name: ${spec.name}`);
    }
    const files = sandboxFileNames(spec.name);
    const toolDir = path.join(dayDir, spec.name);
    const topic = summary.topics.find(t => t.id === spec.topicId);

    await fs.mkdir(toolDir);
    await fs.writeFile(path.join(toolDir, files.source), candidate.source);
    await fs.writeFile(path.join(toolDir, files.tests), candidate.tests);
    await fs.writeFile(path.join(toolDir, 'README.md'), candidate.readme ?? defaultReadme(spec));
    await fs.writeFile(
      path.join(toolDir, 'metadata.json'),
      `${JSON.stringify(
        {
          name: spec.name,
          displayName: spec.displayName ?? spec.name,
          description: spec.description,
          acceptanceCriteria: spec.acceptanceCriteria,
          topic: topic ? { id: topic.id, label: topic.label, rank: topic.rank } : { id: spec.topicId, rank: spec.topicRank },
          attemptsNeeded: outcome.attempts.length,
          testsPassed: winningAttempt.sandbox?.report?.passed ?? 0,
          runId: summary.runId,
          createdAt: summary.finishedAt,
        },
        null,
        2,
      )}\n`,
    );
  }

  private async updateIndex(summary: RunSummary, passed: readonly PassedOutcome[]): Promise<void> {
    const indexPath = path.join(this.rootDir, INDEX_FILE);
    let existing: string;
    try {
      existing = await fs.readFile(indexPath, 'utf-8');
    } catch (error) {
      if (!(isErrnoException(error) && error.code === 'ENOENT')) {
        throw error;
      }
      existing = INITIAL_INDEX;
    }
    await fs.writeFile(indexPath, prependIndexSection(existing, indexSection(summary.runDate, passed, summary.topics)));
  }

  private runFile(runDate: string): string {
    return path.join(this.rootDir, 'runs', `${runDate}.json`);
  }

  private async rollback(targets: string[]): Promise<void> {
    for (const target of targets) {
      try {
        await fs.rm(target, { recursive: true, force: true });
      } catch (error) {
        log.warn(`Rollback could not remove ${target}`, { error: describeError(error).message });
      }
    }
  }
}
