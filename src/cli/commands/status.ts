/**
 * status command - Summarize the last checkpoint
 */

import chalk from "chalk";
import { loadCheckpoint, type Checkpoint } from "../../core/checkpoint/checkpoint.js";
import { FileCheckpointStorage } from "../../core/checkpoint/file-checkpoint-storage.js";
import { PRIORITY_TIERS, type PriorityTier } from "../../core/models/task.js";
import { loadConfig, resolveCheckpointPath } from "../../utils/config.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("status");

export interface StatusOptions {
  config?: string;
  checkpoint?: string;
  verbose?: boolean;
}

export interface CheckpointStatus {
  sequence: number;
  createdAt: string;
  committed: number;
  visited: number;
  pending: number;
  pendingByTier: Record<PriorityTier, number>;
  deadLetters: number;
  channelsTracked: number;
}

export function summarizeCheckpoint(checkpoint: Checkpoint): CheckpointStatus {
  const pendingByTier: Record<PriorityTier, number> = { resumed: 0, seed: 0, discovered: 0, retry: 0 };
  for (const task of checkpoint.frontier.pending) {
    pendingByTier[task.tier]++;
  }
  return {
    sequence: checkpoint.sequence,
    createdAt: checkpoint.createdAt,
    committed: checkpoint.dedup.length,
    visited: checkpoint.frontier.visited.length,
    pending: checkpoint.frontier.pending.length,
    pendingByTier,
    deadLetters: checkpoint.deadLetters.length,
    channelsTracked: Object.keys(checkpoint.highWater).length,
  };
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  const location = options.checkpoint ?? resolveCheckpointPath(loadConfig({ configPath: options.config }));
  logger.info({ location }, "Checking status");

  const checkpoint = await loadCheckpoint(new FileCheckpointStorage(location));
  if (!checkpoint) {
    console.log(chalk.yellow(`No checkpoint at ${location}.`));
    console.log(chalk.dim("Run"), chalk.white("graph-crawler crawl"), chalk.dim("to start a crawl."));
    return;
  }

  const status = summarizeCheckpoint(checkpoint);
  console.log();
  console.log(chalk.cyan.bold("Crawl Status"));
  console.log(chalk.dim("─".repeat(40)));
  console.log(`  Checkpoint:     #${status.sequence} at ${status.createdAt}`);
  console.log(`  Location:       ${chalk.dim(location)}`);
  console.log(`  Committed:      ${chalk.green(status.committed)}`);
  console.log(`  Visited:        ${status.visited}`);
  console.log(`  Pending:        ${status.pending}`);
  if (options.verbose) {
    for (const tier of PRIORITY_TIERS) {
      console.log(`    ${tier.padEnd(12)}${status.pendingByTier[tier]}`);
    }
    console.log(`  Channels with a message high-water mark: ${status.channelsTracked}`);
  }
  console.log(`  Dead letters:   ${status.deadLetters > 0 ? chalk.red(status.deadLetters) : 0}`);
  console.log(chalk.dim("─".repeat(40)));
  console.log();
}
