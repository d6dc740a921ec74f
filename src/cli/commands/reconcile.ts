/**
 * reconcile command - Replay unfinished commits into the graph store
 */

import chalk from "chalk";
import ora from "ora";
import { DualWriteCoordinator } from "../../core/coordinator/dual-write-coordinator.js";
import { DedupIndex } from "../../core/dedup/dedup-index.js";
import { HighWaterMarks } from "../../core/dedup/high-water-marks.js";
import { ConfigurationError } from "../../core/errors.js";
import { Reconciler } from "../../core/reconciliation/reconciler.js";
import { openStores } from "../../core/storage/index.js";
import { loadConfig } from "../../utils/config.js";

export interface ReconcileOptions {
  config?: string;
  limit?: number;
}

const DEFAULT_LIMIT = 500;

export async function reconcileCommand(options: ReconcileOptions): Promise<void> {
  const config = loadConfig({ configPath: options.config });
  if (config.storage === "memory") {
    throw new ConfigurationError('reconcile needs the database stores, but storage is set to "memory"');
  }
  const spinner = ora("Opening stores...").start();
  const stores = await openStores(config).catch((error: unknown) => {
    spinner.fail(chalk.red("Could not open stores"));
    throw error;
  });

  try {
    const coordinator = new DualWriteCoordinator({
      relational: stores.relational,
      graph: stores.graph,
      dedup: new DedupIndex(),
      highWater: new HighWaterMarks(),
      retry: {
        maxAttempts: config.retry.maxAttempts,
        initialDelayMs: config.retry.initialDelayMs,
        maxDelayMs: config.retry.maxDelayMs,
        backoffFactor: config.retry.backoffFactor,
      },
    });
    spinner.text = "Reconciling...";
    const result = await new Reconciler({ relational: stores.relational, coordinator }).reconcile(
      options.limit ?? DEFAULT_LIMIT
    );

    if (result.examined === 0) {
      spinner.succeed(chalk.green("Nothing to reconcile"));
      return;
    }
    const message = `Converged ${result.converged.length}/${result.examined} rows, ${result.edgesWritten} edges written`;
    if (result.success) {
      spinner.succeed(chalk.green(message));
    } else {
      spinner.warn(chalk.yellow(message));
      for (const { key, error } of result.errors) {
        console.log(`  ${chalk.red(key)} ${chalk.dim(error)}`);
      }
    }
  } finally {
    await stores.close();
  }
}
