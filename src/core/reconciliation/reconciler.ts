/**
 * Reconciler
 *
 * Operator-triggered repair pass. Finds resolved relational rows whose commit
 * never reached the finalize stage and replays stages 2-4 from the stored
 * payload and edges, so the graph catches up without re-fetching anything.
 * Not part of the real-time crawl path.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import type { DualWriteCoordinator } from "../coordinator/dual-write-coordinator.js";
import { errorMessage } from "../errors.js";
import type { IRelationalStore } from "../interfaces/IRelationalStore.js";
import type { EntityKey } from "../models/entity.js";

const logger = createLogger("reconciler");

export interface ReconcilerOptions {
  relational: Pick<IRelationalStore, "listUnconverged">;
  coordinator: Pick<DualWriteCoordinator, "converge">;
}

export interface ReconciliationResult {
  success: boolean;
  examined: number;
  converged: EntityKey[];
  edgesWritten: number;
  errors: Array<{ key: EntityKey; error: string }>;
  durationMs: number;
}

export class Reconciler {
  constructor(private readonly options: ReconcilerOptions) {}

  /**
   * Converges up to `limit` rows, oldest update first. A row that fails stays
   * unconverged and is reported; the pass continues with the next one.
   */
  async reconcile(limit: number): Promise<ReconciliationResult> {
    const startTime = Date.now();
    const rows = await this.options.relational.listUnconverged(limit);
    const converged: EntityKey[] = [];
    const errors: Array<{ key: EntityKey; error: string }> = [];
    let edgesWritten = 0;

    logger.info({ rows: rows.length, limit }, "Starting reconciliation");

    for (const row of rows) {
      try {
        const result = await this.options.coordinator.converge(row);
        converged.push(row.key);
        edgesWritten += result.edgesWritten;
      } catch (error) {
        logger.warn({ key: row.key, err: error }, "Row did not converge");
        errors.push({ key: row.key, error: errorMessage(error) });
      }
    }

    const result: ReconciliationResult = {
      success: errors.length === 0,
      examined: rows.length,
      converged,
      edgesWritten,
      errors,
      durationMs: Date.now() - startTime,
    };
    logger.info(
      { examined: result.examined, converged: converged.length, failed: errors.length, edgesWritten },
      "Reconciliation finished"
    );
    return result;
  }
}
