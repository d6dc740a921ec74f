/**
 * Crawl Metrics
 *
 * Counters derived from {@link CrawlerEvents}. Retry attempts are kept per
 * commit stage so a flaky store shows up where it fails.
 *
 * @module
 */

import type { CommitStage, CrawlerEventBus } from "./events.js";

export interface CrawlMetricsSnapshot {
  fetched: number;
  skipped: number;
  discovered: number;
  committed: number;
  requeued: number;
  deadLettered: number;
  exhausted: number;
  rateLimited: number;
  stubsCreated: number;
  edgesWritten: number;
  checkpoints: number;
  retries: Record<CommitStage, number>;
  elapsedMs: number;
}

export class CrawlMetrics {
  private readonly counters = CrawlMetrics.emptyCounters();
  private readonly retries = CrawlMetrics.emptyRetries();
  private readonly startedAt = Date.now();
  private readonly unsubscribers: Array<() => void> = [];

  /**
   * Starts counting events from the bus.
   */
  attach(events: CrawlerEventBus): this {
    this.unsubscribers.push(
      events.on("task:fetched", () => this.counters.fetched++),
      events.on("task:skipped", () => this.counters.skipped++),
      events.on("task:discovered", () => this.counters.discovered++),
      events.on("task:requeued", () => this.counters.requeued++),
      events.on("task:dead-lettered", () => this.counters.deadLettered++),
      events.on("task:exhausted", () => this.counters.exhausted++),
      events.on("commit:retry", ({ stage }) => this.retries[stage]++),
      events.on("commit:completed", ({ stubsCreated, edgesWritten }) => {
        this.counters.committed++;
        this.counters.stubsCreated += stubsCreated;
        this.counters.edgesWritten += edgesWritten;
      }),
      events.on("checkpoint:written", () => this.counters.checkpoints++),
      events.on("governor:rate-limited", () => this.counters.rateLimited++)
    );
    return this;
  }

  detach(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
  }

  retryCount(stage: CommitStage): number {
    return this.retries[stage];
  }

  snapshot(): CrawlMetricsSnapshot {
    return {
      ...this.counters,
      retries: { ...this.retries },
      elapsedMs: Date.now() - this.startedAt,
    };
  }

  private static emptyCounters() {
    return {
      fetched: 0,
      skipped: 0,
      discovered: 0,
      committed: 0,
      requeued: 0,
      deadLettered: 0,
      exhausted: 0,
      rateLimited: 0,
      stubsCreated: 0,
      edgesWritten: 0,
      checkpoints: 0,
    };
  }

  private static emptyRetries(): Record<CommitStage, number> {
    return { relational: 0, stubs: 0, graph: 0, finalize: 0 };
  }
}
