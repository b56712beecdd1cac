#!/usr/bin/env node
import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import { loadDotEnv } from './env.js';
import { ConfigError, PersistenceCorruptionError } from './errors.js';
import { createConsoleLogger } from './logger.js';
import { CheckpointStore } from './scrapers/dlsite/checkpoint.js';
import { DlsiteClient } from './scrapers/dlsite/client.js';
import { USAGE, buildConfig } from './scrapers/dlsite/config.js';
import { WorkDatabase } from './scrapers/dlsite/db.js';
import { AssetArchiver } from './scrapers/dlsite/downloader.js';
import { RateLimitedFetcher } from './scrapers/dlsite/fetcher.js';
import { IdentifierSpace, renderCode } from './scrapers/dlsite/identifiers.js';
import { CrawlOrchestrator, type BatchReport, type RunSummary } from './scrapers/dlsite/orchestrator.js';
import { NAMESPACES } from './scrapers/dlsite/types.js';

function printSummary(summary: RunSummary, dbPath: string): void {
  const table = new Table({ head: [chalk.cyan('Metric'), chalk.cyan('Value')] });
  table.push(
    ['Batches', summary.batches],
    ['Probed', summary.probed],
    ['Found (new)', chalk.green(String(summary.found))],
    ['Not found', summary.notFound],
    ['Rejected category', summary.rejected],
    ['Inconclusive', summary.inconclusive > 0 ? chalk.yellow(String(summary.inconclusive)) : 0],
    ['Already known', summary.skippedKnown],
    ['Images downloaded', summary.imagesDownloaded],
    ['Images failed', summary.imagesFailed > 0 ? chalk.yellow(String(summary.imagesFailed)) : 0],
    ['Images still missing', summary.pendingImages > 0 ? chalk.yellow(String(summary.pendingImages)) : 0],
    ['Items in database', summary.totalItems],
    ['Duration', `${Math.round(summary.durationMs / 1000)}s`]
  );
  console.log(table.toString());
  console.log(`Database: ${dbPath}`);
}

async function run(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    return;
  }

  await loadDotEnv();
  const config = buildConfig(args, process.env);
  const logger = createConsoleLogger({ verbose: config.verbose });

  const space = new IdentifierSpace(config.ranges);
  const checkpoint = new CheckpointStore(config.checkpointPath, space);

  const spinner = ora('Loading database and checkpoint...').start();
  let db: WorkDatabase;
  try {
    db = await WorkDatabase.create(config.dbPath);
    await checkpoint.load();
  } catch (error) {
    spinner.fail('Could not load persisted state');
    throw error;
  }
  spinner.succeed(`Loaded ${db.size} items`);

  for (const namespace of NAMESPACES) {
    const cursor = checkpoint.resumeCursor(namespace);
    if (cursor !== null && checkpoint.lastProcessed(namespace) !== null) {
      logger.info(`Resuming ${namespace} at ${renderCode({ namespace, number: cursor })}`);
    }
  }

  const client = new DlsiteClient({
    baseUrl: config.baseUrl,
    locale: config.locale,
    userAgent: config.userAgent,
    timeoutMs: config.requestTimeoutMs
  });
  const fetcher = new RateLimitedFetcher(client, config, logger);
  const archiver = new AssetArchiver(config.archiveDir, fetcher, logger);

  const total = NAMESPACES.reduce((sum, namespace) => {
    const cursor = checkpoint.resumeCursor(namespace);
    return cursor === null ? sum : sum + space.size(namespace, cursor);
  }, 0);
  let processed = 0;
  let inconclusive = 0;
  const useProgressBar = process.stdout.isTTY && !config.verbose;

  const renderProgress = (report: BatchReport) => {
    const width = 30;
    const ratio = total === 0 ? 1 : Math.min(1, processed / total);
    const filled = Math.round(ratio * width);
    const bar = `${'█'.repeat(filled)}${'░'.repeat(width - filled)}`;
    const line = `${report.last} [${bar}] ${processed}/${total} items ${report.totalItems} inconclusive ${inconclusive}`;
    process.stdout.write(`\r${line}`);
  };

  const onBatch = (report: BatchReport) => {
    if (report.kind === 'sweep') {
      processed += report.size;
    }
    inconclusive += report.inconclusive;
    if (useProgressBar) {
      renderProgress(report);
    } else {
      console.log(
        `Batch ${report.first}-${report.last}: found ${report.found}, not found ${report.notFound}, ` +
          `rejected ${report.rejected}, inconclusive ${report.inconclusive} (${report.totalItems} items, ${report.remaining} left in ${report.namespace})`
      );
    }
  };

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      console.error(chalk.red(`\nReceived ${signal} again, exiting without waiting.`));
      process.exit(130);
    }
    if (useProgressBar) {
      process.stdout.write('\n');
    }
    logger.warn(`${signal} received; finishing the current batch before exiting`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const orchestrator = new CrawlOrchestrator({
    space,
    fetcher,
    checkpoint,
    db,
    archiver,
    logger,
    options: config,
    onBatch
  });

  try {
    const summary = await orchestrator.run(controller.signal);
    if (useProgressBar) {
      process.stdout.write('\n');
    }
    printSummary(summary, config.dbPath);
    if (summary.interrupted) {
      console.log(chalk.yellow('Interrupted. Progress saved; run again to resume.'));
    } else if (summary.completed) {
      console.log(chalk.green('All ranges processed.'));
    } else {
      console.log(chalk.yellow(`${summary.pendingInconclusive} identifier(s) remain inconclusive; run again to retry them.`));
    }
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

run().catch(error => {
  if (error instanceof ConfigError) {
    console.error(chalk.red(`Configuration error: ${error.message}`));
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }
  if (error instanceof PersistenceCorruptionError) {
    console.error(chalk.red(`Refusing to start: ${error.message}`));
    console.error('Fix or move the file aside; prior progress is kept untouched.');
    process.exitCode = 1;
    return;
  }
  console.error('DLsite crawler failed:', error);
  process.exitCode = 1;
});
