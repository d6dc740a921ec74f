/**
 * dead-letters command - List failed tasks, including those still being retried
 */

import chalk from "chalk";
import { loadCheckpoint } from "../../core/checkpoint/checkpoint.js";
import { FileCheckpointStorage } from "../../core/checkpoint/file-checkpoint-storage.js";
import { loadConfig, resolveCheckpointPath } from "../../utils/config.js";

export interface DeadLettersOptions {
  config?: string;
  checkpoint?: string;
  json?: boolean;
}

export async function deadLettersCommand(options: DeadLettersOptions): Promise<void> {
  const location = options.checkpoint ?? resolveCheckpointPath(loadConfig({ configPath: options.config }));
  const checkpoint = await loadCheckpoint(new FileCheckpointStorage(location));
  const letters = checkpoint?.deadLetters ?? [];

  if (options.json) {
    console.log(JSON.stringify(letters, null, 2));
    return;
  }

  if (letters.length === 0) {
    console.log(chalk.green("No dead letters."));
    return;
  }

  console.log();
  console.log(chalk.white.bold(`Dead letters (${letters.length})`));
  console.log(chalk.dim("─".repeat(40)));
  for (const letter of letters) {
    const code = letter.requeued ? chalk.yellow(letter.code) : chalk.red(letter.code);
    const state = letter.requeued ? chalk.yellow(" (still retrying)") : "";
    console.log(`  ${code} ${chalk.white(letter.key)} ${chalk.dim(`after ${letter.retries} retries, ${letter.failedAt}`)}${state}`);
    console.log(chalk.dim(`        ${letter.cause}`));
  }
  console.log();
}
