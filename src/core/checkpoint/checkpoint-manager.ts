/**
 * Checkpoint Manager
 *
 * Persists dedup, frontier, dead-letter and high-water state so a crashed
 * crawl resumes where it was. States:
 *
 *   idle -> snapshotting -> idle
 *   stop() -> stopped (a final snapshot is still allowed)
 *
 * A snapshot pauses new dequeues while it captures and serializes, so the
 * blob reflects one logical instant. Fetches and commits already running are
 * not paused; their tasks are captured as pending and rerun on restore,
 * which the idempotent commit makes harmless.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import type { DeadLetterList } from "../dead-letter/dead-letter-list.js";
import type { DedupIndex } from "../dedup/dedup-index.js";
import type { HighWaterMarks } from "../dedup/high-water-marks.js";
import { CheckpointError, ErrorCode, errorMessage } from "../errors.js";
import type { FrontierQueue } from "../frontier/frontier-queue.js";
import type { ICheckpointStorage } from "../interfaces/ICheckpointStorage.js";
import { entityKey, parseEntityKey, type EntityKey } from "../models/entity.js";
import type { CrawlerEventBus } from "../telemetry/events.js";
import { CHECKPOINT_VERSION, loadCheckpoint, serializeCheckpoint, type Checkpoint } from "./checkpoint.js";

const logger = createLogger("checkpoint");

export type CheckpointState = "idle" | "snapshotting" | "stopped";

export interface CheckpointManagerOptions {
  storage: ICheckpointStorage;
  frontier: FrontierQueue;
  dedup: DedupIndex;
  deadLetters: DeadLetterList;
  highWater: HighWaterMarks;
  intervalMs: number;
  events?: CrawlerEventBus;
}

export interface RestoreSummary {
  sequence: number;
  createdAt: string;
  pending: number;
  visited: number;
  committed: number;
  deadLetters: number;
}

export class CheckpointManager {
  private _state: CheckpointState = "idle";
  private sequence = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inProgress: Promise<number> | null = null;
  private fatalHandler: ((error: CheckpointError) => void) | null = null;

  constructor(private readonly options: CheckpointManagerOptions) {}

  get state(): CheckpointState {
    return this._state;
  }

  get lastSequence(): number {
    return this.sequence;
  }

  /**
   * Loads the stored checkpoint into the in-memory state. Must run before
   * any seed is enqueued so resumed tasks keep their priority.
   *
   * @returns null when no checkpoint exists yet
   * @throws CheckpointError if the blob cannot be read or parsed
   */
  async restore(): Promise<RestoreSummary | null> {
    const { storage, frontier, dedup, deadLetters, highWater } = this.options;
    const checkpoint = await loadCheckpoint(storage);
    if (checkpoint === null) {
      logger.info({ location: storage.location }, "No checkpoint found, starting fresh");
      return null;
    }

    dedup.hydrate(checkpoint.dedup, "checkpoint");
    frontier.restore({
      pending: checkpoint.frontier.pending,
      visited: toKeys(checkpoint.frontier.visited),
    });
    deadLetters.restore(checkpoint.deadLetters);
    highWater.restore(checkpoint.highWater);
    this.sequence = checkpoint.sequence;

    const summary: RestoreSummary = {
      sequence: checkpoint.sequence,
      createdAt: checkpoint.createdAt,
      pending: checkpoint.frontier.pending.length,
      visited: checkpoint.frontier.visited.length,
      committed: checkpoint.dedup.length,
      deadLetters: checkpoint.deadLetters.length,
    };
    logger.info({ location: storage.location, ...summary }, "Checkpoint restored");
    return summary;
  }

  /**
   * Registers the handler for a failed periodic snapshot. Storage failure is
   * fatal to the crawl; the handler is expected to halt ingestion.
   */
  onFatal(handler: (error: CheckpointError) => void): void {
    this.fatalHandler = handler;
  }

  /** Starts periodic snapshots. */
  start(): void {
    if (this._state === "stopped") {
      throw new Error("Checkpoint manager was stopped");
    }
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
    this.timer.unref();
  }

  /** Stops periodic snapshots and waits for one that is running. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inProgress) await this.inProgress;
    this._state = "stopped";
  }

  /**
   * Writes a snapshot now. Concurrent calls share the snapshot in progress.
   *
   * @returns the sequence number written
   * @throws CheckpointError if storage fails
   */
  snapshot(): Promise<number> {
    if (this.inProgress) return this.inProgress;
    const run = this.runSnapshot().finally(() => {
      this.inProgress = null;
    });
    this.inProgress = run;
    return run;
  }

  private tick(): void {
    if (this.inProgress) return;
    this.snapshot().catch((error: unknown) => {
      const fatal =
        error instanceof CheckpointError
          ? error
          : new CheckpointError(`Checkpoint failed: ${errorMessage(error)}`, ErrorCode.CHECKPOINT_WRITE_FAILED);
      logger.fatal({ err: fatal }, "Periodic checkpoint failed");
      if (this.timer) {
        clearInterval(this.timer);
        this.timer = null;
      }
      this.fatalHandler?.(fatal);
    });
  }

  private async runSnapshot(): Promise<number> {
    const { storage, frontier, dedup, deadLetters, highWater, events } = this.options;
    const previous = this._state;
    this._state = "snapshotting";
    const startedAt = Date.now();

    let blob: string;
    const sequence = this.sequence + 1;
    frontier.pauseDequeues();
    try {
      const frontierSnapshot = frontier.snapshot();
      const checkpoint: Checkpoint = {
        version: CHECKPOINT_VERSION,
        sequence,
        createdAt: new Date().toISOString(),
        dedup: dedup.keys(),
        frontier: { pending: frontierSnapshot.pending, visited: frontierSnapshot.visited },
        deadLetters: deadLetters.list(),
        highWater: highWater.toJSON(),
      };
      blob = serializeCheckpoint(checkpoint);
    } finally {
      frontier.resumeDequeues();
    }

    try {
      await storage.write(blob);
    } catch (error) {
      this._state = previous;
      if (error instanceof CheckpointError) throw error;
      throw new CheckpointError(`Cannot write checkpoint to ${storage.location}: ${errorMessage(error)}`, ErrorCode.CHECKPOINT_WRITE_FAILED, {
        location: storage.location,
      });
    }

    this.sequence = sequence;
    this._state = previous;
    const durationMs = Date.now() - startedAt;
    logger.debug({ sequence, location: storage.location, bytes: blob.length, durationMs }, "Checkpoint written");
    events?.emit("checkpoint:written", { sequence, location: storage.location, durationMs });
    return sequence;
  }
}

function toKeys(raw: string[]): EntityKey[] {
  return raw.map((key) => {
    try {
      return entityKey(parseEntityKey(key));
    } catch (error) {
      throw new CheckpointError(`Checkpoint holds an invalid visited key "${key}"`, ErrorCode.CHECKPOINT_READ_FAILED, {
        cause: errorMessage(error),
      });
    }
  });
}
