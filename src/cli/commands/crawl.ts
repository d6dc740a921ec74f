/**
 * crawl command - Run the crawler until the frontier drains or a signal arrives
 */

import chalk from "chalk";
import ora from "ora";
import { FileCheckpointStorage } from "../../core/checkpoint/file-checkpoint-storage.js";
import { CrawlPipeline, type CrawlSummary } from "../../core/pipeline/crawl-pipeline.js";
import { createCrawlContext } from "../../core/pipeline/crawl-context.js";
import { createPlatformClient } from "../../core/platform/index.js";
import { openStores } from "../../core/storage/index.js";
import { loadConfig, resolveCheckpointPath } from "../../utils/config.js";
import { createLogger } from "../../utils/logger.js";
import type { CrawlerConfigInput } from "../../utils/validation.js";

export interface CrawlOptions {
  config?: string;
  seed?: string[];
  fixtures?: string;
  memory?: boolean;
  rate?: number;
  concurrency?: number;
  checkpoint?: string;
  refresh?: boolean;
  debug?: boolean;
}

/**
 * Translates flags into config overrides. Unset flags stay undefined and
 * leave the file and environment values alone.
 */
export function overridesFromOptions(options: CrawlOptions): CrawlerConfigInput {
  return {
    seeds: options.seed && options.seed.length > 0 ? options.seed : undefined,
    storage: options.memory ? "memory" : undefined,
    platform: { fixturesPath: options.fixtures },
    rate: { requestsPerSecond: options.rate, maxConcurrentFetches: options.concurrency },
    checkpoint: { path: options.checkpoint },
    crawl: { refresh: options.refresh },
  };
}

export async function crawlCommand(options: CrawlOptions): Promise<void> {
  const logger = createLogger("crawl");
  const config = loadConfig({ configPath: options.config, overrides: overridesFromOptions(options) });
  const checkpointPath = resolveCheckpointPath(config);

  const platform = createPlatformClient(config.platform);
  const spinner = ora("Opening stores...").start();
  const stores = await openStores(config).catch(async (error: unknown) => {
    spinner.fail(chalk.red("Could not open stores"));
    await platform.close();
    throw error;
  });

  const ctx = createCrawlContext(config, {
    relational: stores.relational,
    graph: stores.graph,
    platform,
    checkpointStorage: new FileCheckpointStorage(checkpointPath),
  });
  const pipeline = new CrawlPipeline(ctx);

  const onSignal = (signal: NodeJS.Signals) => {
    spinner.text = `Received ${signal}, finishing in-flight work...`;
    pipeline.shutdown(signal);
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const progress = () => {
    const m = ctx.metrics.snapshot();
    const f = ctx.frontier.stats();
    spinner.text = `Crawling: ${m.committed} committed, ${f.queued} queued, ${f.inFlight} in flight, ${m.deadLettered} dead-lettered`;
  };
  const unsubscribe = [
    ctx.events.on("commit:completed", progress),
    ctx.events.on("task:dead-lettered", progress),
  ];

  spinner.text = "Crawling...";
  logger.info({ checkpointPath, storage: config.storage, seeds: config.seeds.length }, "Crawl starting");

  try {
    const summary = await pipeline.run();
    if (summary.outcome === "drained") {
      spinner.succeed(chalk.green("Frontier drained"));
    } else {
      spinner.warn(chalk.yellow("Crawl stopped before the frontier drained"));
    }
    printSummary(summary, checkpointPath);
  } catch (error) {
    spinner.fail(chalk.red("Crawl aborted"));
    logger.error({ err: error }, "Crawl aborted");
    throw error;
  } finally {
    for (const off of unsubscribe) off();
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await platform.close();
    await stores.close();
  }
}

function printSummary(summary: CrawlSummary, checkpointPath: string): void {
  const { metrics, frontier } = summary;
  console.log();
  console.log(chalk.white.bold("Crawl summary"));
  console.log(chalk.dim("─".repeat(40)));
  if (summary.resumedFromSequence !== null) {
    console.log(`  Resumed from:   checkpoint #${summary.resumedFromSequence}`);
  }
  console.log(`  Fetched:        ${metrics.fetched}`);
  console.log(`  Committed:      ${chalk.green(metrics.committed)}`);
  console.log(`  Skipped:        ${metrics.skipped}`);
  console.log(`  Discovered:     ${metrics.discovered}`);
  console.log(`  Requeued:       ${metrics.requeued}`);
  console.log(`  Dead letters:   ${summary.deadLetters > 0 ? chalk.red(summary.deadLetters) : 0}`);
  console.log(`  Rate limited:   ${metrics.rateLimited}`);
  console.log(`  Stubs created:  ${metrics.stubsCreated}`);
  console.log(`  Edges written:  ${metrics.edgesWritten}`);
  console.log(
    `  Stage retries:  ${Object.entries(metrics.retries)
      .map(([stage, count]) => `${stage}=${count}`)
      .join(" ")}`
  );
  console.log(`  Pending:        ${frontier.queued + frontier.inFlight}`);
  console.log(`  Elapsed:        ${(metrics.elapsedMs / 1000).toFixed(1)}s`);
  console.log(chalk.dim(`  Checkpoint #${summary.checkpointSequence} written to ${checkpointPath}`));
  console.log();
}
