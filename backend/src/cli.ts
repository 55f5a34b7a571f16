#!/usr/bin/env tsx

/**
 * forgeloop CLI - run the pipeline, ingest corpus files, inspect history.
 */

import 'dotenv/config';
import { readFileSync } from 'fs';
import { program } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { RunSummary } from '@forgeloop/shared-types';
import { config, printConfig, validateConfig } from './config';
import { describeError } from './errors';
import { TopicSelector } from './analysis/topic-selector';
import { BuildLoop } from './execution/build-loop';
import { BuildScheduler } from './execution/build-scheduler';
import { LLMCodeGenerator } from './generation/code-generator';
import { LLMIdeaSource } from './ideation/llm-idea-source';
import { createLLMClient, providerRoutes } from './llm';
import { ingest } from './pipeline/ingest';
import { runPipeline } from './pipeline/run-pipeline';
import { NoopNotifier, WebhookNotifier } from './publishing/notifier';
import { FileSystemPublisher } from './publishing/publisher';
import { CorpusStore } from './storage/corpus-store';
import { LocalProcessSandbox } from './validation/sandbox';

const log = {
  info: (msg: string) => console.log(chalk.blue('[INFO]'), msg),
  success: (msg: string) => console.log(chalk.green('[OK]'), msg),
  warn: (msg: string) => console.log(chalk.yellow('[WARN]'), msg),
  error: (msg: string) => console.log(chalk.red('[ERROR]'), msg),
  header: (msg: string) => console.log(`\n${chalk.bold.cyan(msg)}\n`),
};

/** A JSON array of records, or one JSON record per line. */
function readRecords(file: string): unknown[] {
  const text = readFileSync(file, 'utf-8').trim();
  if (!text) return [];
  if (text.startsWith('[')) {
    const parsed: unknown = JSON.parse(text);
    if (!Array.isArray(parsed)) {
      throw new Error(`${file} does not contain an array of records`);
    }
    return parsed;
  }
  return text
    .split(/\r?\n/)
    .filter(line => line.trim())
    .map((line, index) => {
      try {
        const record: unknown = JSON.parse(line);
        return record;
      } catch (error) {
        throw new Error(`${file}:${index + 1}: ${describeError(error).message}`);
      }
    });
}

function printSummary(summary: RunSummary, committedRef?: string): void {
  log.header(`Run ${summary.runId} (${summary.runDate})`);
  for (const outcome of summary.outcomes) {
    const attempts = `${outcome.attempts.length} attempt${outcome.attempts.length === 1 ? '' : 's'}`;
    switch (outcome.status) {
      case 'passed':
        console.log(`  ${chalk.green('✔')} ${outcome.spec.name} ${chalk.gray(attempts)}`);
        break;
      case 'abandoned':
        console.log(`  ${chalk.yellow('○')} ${outcome.spec.name} ${chalk.gray(`${attempts}, ${outcome.reason}`)}`);
        break;
      case 'fatal_error':
        console.log(`  ${chalk.red('✖')} ${outcome.spec.name} ${chalk.gray(`${outcome.reason}: ${outcome.error.message}`)}`);
        break;
    }
  }
  console.log('');
  const { passed, abandoned, fatal_error } = summary.counts;
  log.info(`passed ${passed}, abandoned ${abandoned}, fatal ${fatal_error}`);
  if (committedRef) {
    log.success(`Published to ${committedRef}`);
  }
}

program
  .name('forgeloop')
  .description('Turn trending signals into small tested tools')
  .version('0.1.0');

program
  .command('run')
  .description('Select topics, build tools and publish the ones that pass')
  .option('--dry-run', 'build and summarize without publishing')
  .action(async (opts: { dryRun?: boolean }) => {
    const validation = validateConfig();
    if (!validation.valid) {
      validation.errors.forEach(err => log.error(err));
      process.exitCode = 1;
      return;
    }

    const client = createLLMClient();
    const store = new CorpusStore(config.corpus.databasePath);
    const spinner = ora({ text: 'Starting run', color: 'cyan' }).start();

    try {
      const loop = new BuildLoop({
        generator: new LLMCodeGenerator(client, {
          routes: providerRoutes(),
          maxOutputTokens: config.ai.maxTokens,
          temperature: config.ai.temperature,
          feedbackPromptChars: config.build.feedbackPromptChars,
        }),
        sandbox: new LocalProcessSandbox({
          nodeBinary: config.sandbox.nodeBinary,
          maxOutputBytes: config.sandbox.maxOutputBytes,
          maxMemoryMb: config.sandbox.maxMemoryMb,
        }),
        acceptance: { minPassingTests: config.build.minPassingTests },
      });

      const { summary, committedRef } = await runPipeline(
        {
          corpus: store,
          selector: new TopicSelector({
            similarityThreshold: config.selection.similarityThreshold,
            clusterThreshold: config.selection.clusterThreshold,
            halfLifeHours: config.selection.halfLifeHours,
          }),
          ideaSource: new LLMIdeaSource(client, { routes: providerRoutes(true) }),
          scheduler: new BuildScheduler(loop),
          publisher: new FileSystemPublisher(config.publish.rootDir),
          notifier: config.publish.webhookUrl ? new WebhookNotifier(config.publish.webhookUrl) : new NoopNotifier(),
        },
        {
          windowHours: config.corpus.windowHours,
          topTopics: config.selection.topTopicsCount,
          ideasPerTopic: config.ideation.ideasPerTopic,
          maxToolsPerRun: config.build.maxToolsPerRun,
          maxAttemptsPerTool: config.build.maxAttemptsPerTool,
          maxConcurrentTools: config.build.maxConcurrentTools,
          sandboxTimeoutMs: config.sandbox.timeoutMs,
          runDeadlineMs: config.build.runDeadlineMs,
          dryRun: opts.dryRun ?? false,
          onTransition: t => {
            spinner.text = `${t.toolName}: ${t.to} (attempt ${t.attemptIndex + 1})`;
          },
        },
      );

      spinner.succeed('Run finished');
      printSummary(summary, committedRef);
    } catch (error) {
      spinner.fail('Run failed');
      log.error(describeError(error).message);
      process.exitCode = 1;
    } finally {
      store.close();
    }
  });

program
  .command('ingest <file>')
  .description('Validate and store corpus records from a JSON or JSON-lines file')
  .action((file: string) => {
    const store = new CorpusStore(config.corpus.databasePath);
    try {
      const result = ingest(store, readRecords(file), { retentionDays: config.corpus.retentionDays });
      log.success(`Stored ${result.inserted} new items (${result.duplicates} already known, ${result.purged} purged)`);
      for (const rejected of result.rejected) {
        log.warn(`record ${rejected.position}: ${rejected.issues.join('; ')}`);
      }
    } catch (error) {
      log.error(describeError(error).message);
      process.exitCode = 1;
    } finally {
      store.close();
    }
  });

program
  .command('history')
  .description('Show recent runs')
  .option('-n, --limit <count>', 'number of runs', '10')
  .action((opts: { limit: string }) => {
    const store = new CorpusStore(config.corpus.databasePath);
    try {
      const runs = store.runHistory(Number.parseInt(opts.limit, 10) || 10);
      if (runs.length === 0) {
        log.info('No runs recorded yet');
        return;
      }
      for (const run of runs) {
        const status = run.error ? chalk.red('failed') : chalk.green('ok');
        console.log(
          `${run.runDate}  ${status}  passed ${run.toolsPassed}/${run.toolsAttempted}  ${chalk.gray(run.runId)}`,
        );
        if (run.error) console.log(`  ${chalk.gray(run.error)}`);
      }
    } finally {
      store.close();
    }
  });

program
  .command('config')
  .description('Print the effective configuration')
  .action(() => {
    log.header('Configuration');
    console.log(printConfig());
    const validation = validateConfig();
    if (validation.valid) {
      log.success('Configuration is valid');
    } else {
      validation.errors.forEach(err => log.warn(err));
    }
  });

await program.parseAsync(process.argv);
