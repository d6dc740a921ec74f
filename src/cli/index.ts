#!/usr/bin/env node

/**
 * graph-crawler CLI
 * Runs crawls and inspects their checkpoint from the command line
 */

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { createLogger } from "../utils/logger.js";
import type { CrawlOptions } from "./commands/crawl.js";
import type { DeadLettersOptions } from "./commands/dead-letters.js";
import type { ReconcileOptions } from "./commands/reconcile.js";
import type { StatusOptions } from "./commands/status.js";

const logger = createLogger("cli");

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function positiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive number.");
  }
  return parsed;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name("graph-crawler")
  .description("Crawl a messaging platform into a relational store and a graph store")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// The level has to be in the environment before command modules create their loggers
program.hook("preAction", (_program, actionCommand) => {
  if (actionCommand.opts().debug === true) {
    process.env.LOG_LEVEL = "debug";
  }
});

// =============================================================================
// Commands
// =============================================================================

program
  .command("crawl")
  .description("Crawl from the configured seeds until the frontier drains")
  .option("-c, --config <path>", "Config file (default .graph-crawler/config.json)")
  .option("-s, --seed <kind:id>", "Seed entity, repeatable", collect)
  .option("-f, --fixtures <path>", "Serve platform responses from a fixture file")
  .option("-m, --memory", "Use in-memory stores instead of PostgreSQL and Neo4j")
  .option("-r, --rate <rps>", "Platform requests per second", positiveNumber)
  .option("-n, --concurrency <n>", "Maximum concurrent fetches", positiveInt)
  .option("--checkpoint <path>", "Checkpoint file")
  .option("--refresh", "Fetch committed channel seeds again for new messages")
  .option("-d, --debug", "Enable debug logging")
  .action(async (options: CrawlOptions) => {
    const { crawlCommand } = await import("./commands/crawl.js");
    await crawlCommand(options);
  });

program
  .command("status")
  .description("Summarize the last checkpoint")
  .option("-c, --config <path>", "Config file")
  .option("--checkpoint <path>", "Checkpoint file")
  .option("-v, --verbose", "Show pending tasks per tier")
  .action(async (options: StatusOptions) => {
    const { statusCommand } = await import("./commands/status.js");
    await statusCommand(options);
  });

program
  .command("dead-letters")
  .description("List failed tasks, including those still being retried")
  .option("-c, --config <path>", "Config file")
  .option("--checkpoint <path>", "Checkpoint file")
  .option("--json", "Print as JSON")
  .action(async (options: DeadLettersOptions) => {
    const { deadLettersCommand } = await import("./commands/dead-letters.js");
    await deadLettersCommand(options);
  });

program
  .command("reconcile")
  .description("Replay unfinished commits from the relational store into the graph store")
  .option("-c, --config <path>", "Config file")
  .option("-l, --limit <n>", "Maximum rows to reconcile", positiveInt)
  .option("-d, --debug", "Enable debug logging")
  .action(async (options: ReconcileOptions) => {
    const { reconcileCommand } = await import("./commands/reconcile.js");
    await reconcileCommand(options);
  });

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

program.parseAsync(process.argv).catch(handleError);
