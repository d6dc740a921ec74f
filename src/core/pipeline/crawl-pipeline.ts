/**
 * Crawl Pipeline
 *
 * Wires the context into two worker pools:
 *
 *   frontier -> fetch workers -> bounded channel -> commit workers -> stores
 *                                                          |
 *   frontier <---------- discovered endpoints -------------+
 *
 * Discoveries go back onto the frontier as tasks, never as recursive calls.
 * A task stays in flight until its commit worker records the outcome, and
 * discoveries are enqueued before that, so the frontier only reports
 * drained when no more work can appear.
 *
 * Every fetch and store error is settled at the task level. Retryable
 * failures are requeued for as long as it takes; a task past its retry
 * budget is also listed as a dead letter until it commits. Non-retryable
 * failures are dead-lettered for good. Only checkpoint storage failure
 * stops the crawl with an error.
 *
 * @module
 */

import {
  backoffDelay,
  CancellationTokenSource,
  Deferred,
  timeout,
  TimeoutError,
} from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import { CommitStageError } from "../coordinator/dual-write-coordinator.js";
import { toDeadLetter, type DeadLetter } from "../dead-letter/dead-letter-list.js";
import {
  CheckpointError,
  isCrawlerError,
  type CrawlerError,
  isTransientStoreError,
  MalformedPayloadError,
  RateLimitedError,
} from "../errors.js";
import type { FrontierStats } from "../frontier/frontier-queue.js";
import { parseEntityKey, type EntityKey, type EntityRef, type FetchedItem } from "../models/entity.js";
import { refreshTask, seedTask, taskKey, type FrontierTask } from "../models/task.js";
import type { CrawlMetricsSnapshot } from "../telemetry/metrics.js";
import { BoundedChannel } from "./bounded-channel.js";
import type { CrawlContext } from "./crawl-context.js";

const logger = createLogger("pipeline");

interface FetchedTask {
  task: FrontierTask;
  item: FetchedItem;
}

export type CrawlOutcome = "drained" | "stopped";

export interface CrawlSummary {
  outcome: CrawlOutcome;
  resumedFromSequence: number | null;
  checkpointSequence: number;
  metrics: CrawlMetricsSnapshot;
  frontier: FrontierStats;
  deadLetters: number;
}

export class CrawlPipeline {
  private readonly channel: BoundedChannel<FetchedTask>;
  private readonly fetchTokens = new CancellationTokenSource();
  private readonly commitTokens = new CancellationTokenSource();
  private readonly stopSignal = new Deferred<string>();
  private fatalError: CheckpointError | null = null;
  private stopping = false;
  private started = false;

  constructor(private readonly ctx: CrawlContext) {
    this.channel = new BoundedChannel(ctx.config.commits.queueDepth);
  }

  /**
   * Runs the crawl until the frontier drains or {@link shutdown} is called,
   * then writes a final checkpoint.
   *
   * @throws CheckpointError if checkpoint storage fails
   */
  async run(seeds: EntityRef[] = this.configuredSeeds()): Promise<CrawlSummary> {
    if (this.started) throw new Error("A pipeline runs only once");
    this.started = true;

    const { checkpoints, config } = this.ctx;
    checkpoints.onFatal((error) => this.fail(error));

    const restored = await checkpoints.restore();
    await this.hydrateFromStore();
    this.enqueueSeeds(seeds);

    checkpoints.start();
    const fetchWorkers = Promise.all(
      Array.from({ length: config.rate.maxConcurrentFetches }, (_, id) => this.fetchWorker(id))
    ).finally(() => this.channel.close());
    const commitWorkers = Promise.all(
      Array.from({ length: config.commits.maxConcurrent }, (_, id) => this.commitWorker(id))
    );
    const workers = Promise.all([fetchWorkers, commitWorkers]);

    let outcome: CrawlOutcome;
    try {
      outcome = await Promise.race([
        workers.then((): CrawlOutcome => "drained"),
        this.stopSignal.promise.then((): CrawlOutcome => "stopped"),
      ]);
      if (outcome === "stopped") await this.drainWithinGrace(workers);
    } finally {
      await checkpoints.stop();
    }

    if (this.fatalError) throw this.fatalError;
    const checkpointSequence = await checkpoints.snapshot();

    const summary: CrawlSummary = {
      outcome,
      resumedFromSequence: restored?.sequence ?? null,
      checkpointSequence,
      metrics: this.ctx.metrics.snapshot(),
      frontier: this.ctx.frontier.stats(),
      deadLetters: this.ctx.deadLetters.size,
    };
    logger.info(
      { outcome, committed: summary.metrics.committed, deadLetters: summary.deadLetters, checkpointSequence },
      "Crawl finished"
    );
    return summary;
  }

  /**
   * Stops new dequeues immediately. Work already fetched is committed within
   * the grace period; the rest is left pending for the final checkpoint.
   */
  shutdown(reason: string): void {
    if (this.stopping) return;
    this.stopping = true;
    logger.info({ reason }, "Shutting down crawl");
    this.ctx.events.emit("pipeline:shutdown", { reason });
    this.ctx.frontier.close();
    this.fetchTokens.cancel(reason);
    this.stopSignal.resolve(reason);
  }

  private fail(error: CheckpointError): void {
    if (!this.fatalError) this.fatalError = error;
    this.commitTokens.cancel(error.message);
    this.shutdown(`fatal: ${error.message}`);
  }

  private async drainWithinGrace(workers: Promise<unknown>): Promise<void> {
    const { graceMs } = this.ctx.config.shutdown;
    try {
      await timeout(workers, graceMs, `In-flight work did not finish within ${graceMs}ms`);
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;
      logger.warn({ graceMs, inFlight: this.ctx.frontier.stats().inFlight }, "Grace period elapsed, abandoning in-flight commits");
      this.commitTokens.cancel("grace period elapsed");
      this.channel.close();
    }
  }

  private configuredSeeds(): EntityRef[] {
    return this.ctx.config.seeds.map((seed) => parseEntityKey(seed));
  }

  private async hydrateFromStore(): Promise<void> {
    const keys = await this.ctx.relational.listCommittedKeys();
    this.ctx.dedup.hydrate(keys, "relational");
  }

  /**
   * Committed seeds are skipped, except channels on a refresh crawl, which
   * are fetched again for the messages after their high-water mark.
   */
  private enqueueSeeds(seeds: EntityRef[]): void {
    const { dedup, frontier, config } = this.ctx;
    let added = 0;
    let refreshed = 0;
    for (const seed of seeds) {
      if (dedup.has(seed.kind, seed.externalId)) {
        if (config.crawl.refresh && seed.kind === "channel" && frontier.revisit(refreshTask(seed))) refreshed++;
        continue;
      }
      if (frontier.enqueue(seedTask(seed))) added++;
    }
    logger.info({ seeds: seeds.length, added, refreshed }, "Seeds enqueued");
  }

  // ===========================================================================
  // Workers
  // ===========================================================================

  private async fetchWorker(id: number): Promise<void> {
    const log = logger.child({ worker: `fetch-${id}` });
    const token = this.fetchTokens.token;
    const { frontier, fetcher } = this.ctx;

    for (;;) {
      const task = await frontier.next(token);
      if (!task) break;
      const key = taskKey(task);

      try {
        const outcome = await fetcher.fetch(task, token);
        if (outcome.status === "skipped") {
          this.settleSuccess(key);
          continue;
        }
        // Cancelled or undelivered tasks stay in flight and are checkpointed as pending
        if (outcome.status === "cancelled") break;
        if (!(await this.channel.send({ task, item: outcome.item }, token))) break;
      } catch (error) {
        await this.settleFailure(task, error);
      }
    }
    log.debug("Fetch worker stopped");
  }

  private async commitWorker(id: number): Promise<void> {
    const log = logger.child({ worker: `commit-${id}` });
    const token = this.commitTokens.token;
    const { governor, coordinator, fetcher, frontier, events } = this.ctx;

    for (;;) {
      const next = await this.channel.receive(token);
      if (!next) break;
      const { task, item } = next;
      const key = taskKey(task);

      const release = await governor.acquireCommitPermit(token);
      if (!release) break;
      try {
        await coordinator.commit(item);
        for (const discovered of fetcher.discoverEndpoints(item, task)) {
          if (frontier.enqueue(discovered)) {
            events.emit("task:discovered", { key: taskKey(discovered), origin: key });
          }
        }
        this.settleSuccess(key);
      } catch (error) {
        await this.settleFailure(task, error);
      } finally {
        release();
      }
    }
    log.debug("Commit worker stopped");
  }

  // ===========================================================================
  // Task outcomes
  // ===========================================================================

  private settleSuccess(key: EntityKey): void {
    this.ctx.frontier.markVisited(key);
    if (this.ctx.deadLetters.remove(key)) {
      logger.info({ key }, "Task recovered, dead letter cleared");
    }
  }

  /**
   * Retryable failures go back to the lowest tier, whatever their retry
   * count. Everything else is dead-lettered and visited.
   */
  private async settleFailure(task: FrontierTask, error: unknown): Promise<void> {
    const { frontier, deadLetters, coordinator, events } = this.ctx;
    const key = taskKey(task);
    const storeFailure = error instanceof CommitStageError;
    const cause = storeFailure ? error.cause : error;

    if (storeFailure) {
      await coordinator.markFailed(task, cause);
    }

    if (isCrawlerError(cause) && cause.retryable) {
      this.requeue(task, cause);
      return;
    }

    const letter = toDeadLetter(task, cause);
    deadLetters.add(letter);
    frontier.markVisited(key);
    if (cause instanceof MalformedPayloadError) {
      logger.warn({ audit: true, key, issues: cause.issues }, "Dropped malformed payload");
    } else {
      logger.error({ key, code: letter.code, retries: task.retries, err: cause }, "Task dead-lettered");
    }
    events.emit("task:dead-lettered", { letter });
  }

  /**
   * Rate limits wait out the platform's Retry-After and leave the retry
   * count alone. Other failures back off exponentially; once the count
   * reaches `retry.maxTaskRetries` the task is listed as a dead letter too.
   */
  private requeue(task: FrontierTask, cause: CrawlerError): void {
    const { frontier, deadLetters, events, config } = this.ctx;
    const key = taskKey(task);
    const rateLimited = cause instanceof RateLimitedError;
    const delayMs = rateLimited
      ? cause.retryAfterMs
      : backoffDelay(task.retries + 1, {
          initialDelayMs: config.retry.taskBackoffMs,
          maxDelayMs: config.retry.maxDelayMs,
          backoffFactor: config.retry.backoffFactor,
        });

    const requeued = frontier.requeue(task, delayMs, { countRetry: !rateLimited });
    logger.warn(
      { key, retries: requeued.retries, delayMs, code: cause.code, transientStore: isTransientStoreError(cause) },
      "Task failed, requeued"
    );
    events.emit("task:requeued", { key, retries: requeued.retries, delayMs, code: cause.code });

    if (rateLimited || task.retries < config.retry.maxTaskRetries) return;

    const letter: DeadLetter = { ...toDeadLetter(task, cause), requeued: true };
    const first = !deadLetters.has(key);
    deadLetters.add(letter);
    if (first) {
      logger.error({ key, code: letter.code, retries: task.retries, err: cause }, "Task ran out of retries, kept at lowest priority");
      events.emit("task:exhausted", { letter });
    }
  }
}
