/**
 * Crawl Context
 *
 * The one object that owns a crawl's mutable state and collaborators. It is
 * created at startup, handed to every worker, and persisted through the
 * checkpoint manager at teardown. Nothing here is module-global.
 *
 * @module
 */

import type { CrawlerConfig } from "../../utils/validation.js";
import { CheckpointManager } from "../checkpoint/checkpoint-manager.js";
import { DualWriteCoordinator } from "../coordinator/dual-write-coordinator.js";
import { DeadLetterList } from "../dead-letter/dead-letter-list.js";
import { DedupIndex } from "../dedup/dedup-index.js";
import { HighWaterMarks } from "../dedup/high-water-marks.js";
import { Fetcher } from "../fetcher/fetcher.js";
import { FrontierQueue } from "../frontier/frontier-queue.js";
import { RateGovernor } from "../governor/rate-governor.js";
import type { ICheckpointStorage } from "../interfaces/ICheckpointStorage.js";
import type { IGraphStore } from "../interfaces/IGraphStore.js";
import type { IPlatformClient } from "../interfaces/IPlatformClient.js";
import type { IRelationalStore } from "../interfaces/IRelationalStore.js";
import { createCrawlerEventBus, type CrawlerEventBus } from "../telemetry/events.js";
import { CrawlMetrics } from "../telemetry/metrics.js";

export interface CrawlDependencies {
  relational: IRelationalStore;
  graph: IGraphStore;
  platform: IPlatformClient;
  checkpointStorage: ICheckpointStorage;
  events?: CrawlerEventBus;
}

export interface CrawlContext {
  readonly config: CrawlerConfig;
  readonly events: CrawlerEventBus;
  readonly metrics: CrawlMetrics;
  readonly frontier: FrontierQueue;
  readonly dedup: DedupIndex;
  readonly highWater: HighWaterMarks;
  readonly deadLetters: DeadLetterList;
  readonly governor: RateGovernor;
  readonly fetcher: Fetcher;
  readonly coordinator: DualWriteCoordinator;
  readonly checkpoints: CheckpointManager;
  readonly relational: IRelationalStore;
  readonly graph: IGraphStore;
  readonly platform: IPlatformClient;
}

export function createCrawlContext(config: CrawlerConfig, deps: CrawlDependencies): CrawlContext {
  const events = deps.events ?? createCrawlerEventBus();
  const metrics = new CrawlMetrics().attach(events);
  const frontier = new FrontierQueue();
  const dedup = new DedupIndex();
  const highWater = new HighWaterMarks();
  const deadLetters = new DeadLetterList();

  const governor = new RateGovernor({
    requestsPerSecond: config.rate.requestsPerSecond,
    burst: config.rate.burst,
    maxConcurrentFetches: config.rate.maxConcurrentFetches,
    minConcurrentFetches: config.rate.minConcurrentFetches,
    maxConcurrentCommits: config.commits.maxConcurrent,
    latencyThresholdMs: config.commits.latencyThresholdMs,
    latencyWindow: config.commits.latencyWindow,
    adjustEvery: config.commits.adjustEvery,
    events,
  });

  const fetcher = new Fetcher({
    platform: deps.platform,
    dedup: dedup.asReadonly(),
    highWater,
    governor,
    events,
    maxDepth: config.crawl.maxDepth,
    followKinds: config.crawl.followKinds,
  });

  const coordinator = new DualWriteCoordinator({
    relational: deps.relational,
    graph: deps.graph,
    dedup,
    highWater,
    governor,
    events,
    retry: {
      maxAttempts: config.retry.maxAttempts,
      initialDelayMs: config.retry.initialDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
      backoffFactor: config.retry.backoffFactor,
    },
  });

  const checkpoints = new CheckpointManager({
    storage: deps.checkpointStorage,
    frontier,
    dedup,
    deadLetters,
    highWater,
    intervalMs: config.checkpoint.intervalMs,
    events,
  });

  return {
    config,
    events,
    metrics,
    frontier,
    dedup,
    highWater,
    deadLetters,
    governor,
    fetcher,
    coordinator,
    checkpoints,
    relational: deps.relational,
    graph: deps.graph,
    platform: deps.platform,
  };
}
