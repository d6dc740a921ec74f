/**
 * Rate/Backpressure Governor
 *
 * Gates fetches with a token bucket and a fetch-permit semaphore, and commits
 * with a commit-permit semaphore. Store write latency feeds back into both
 * permit counts: a p99 above the threshold halves them, a p99 under half the
 * threshold widens them by one. Tasks wait; they are never dropped.
 *
 * @module
 */

import { Semaphore, type CancellationToken } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import type { CrawlerEventBus } from "../telemetry/events.js";
import { LatencyTracker } from "./latency-tracker.js";
import { TokenBucket } from "./token-bucket.js";

const logger = createLogger("governor");

export interface RateGovernorOptions {
  requestsPerSecond: number;
  burst: number;
  maxConcurrentFetches: number;
  minConcurrentFetches: number;
  maxConcurrentCommits: number;
  /** p99 store write latency above which permits are narrowed */
  latencyThresholdMs: number;
  latencyWindow: number;
  /** Samples collected between two adjustments */
  adjustEvery: number;
  events?: CrawlerEventBus;
  now?: () => number;
}

/** Releases a permit; calling it more than once is a no-op. */
export type ReleasePermit = () => void;

export interface GovernorState {
  fetchPermits: number;
  commitPermits: number;
  fetchesInFlight: number;
  commitsInFlight: number;
  p99Ms: number;
  availableTokens: number;
}

export class RateGovernor {
  private readonly fetchPermits: Semaphore;
  private readonly commitPermits: Semaphore;
  private readonly bucket: TokenBucket;
  private readonly latency: LatencyTracker;
  private readonly now: () => number;
  private samplesSinceAdjust = 0;

  constructor(private readonly options: RateGovernorOptions) {
    if (options.minConcurrentFetches > options.maxConcurrentFetches) {
      throw new RangeError("minConcurrentFetches cannot exceed maxConcurrentFetches");
    }
    this.now = options.now ?? Date.now;
    this.fetchPermits = new Semaphore(options.maxConcurrentFetches);
    this.commitPermits = new Semaphore(options.maxConcurrentCommits);
    this.bucket = new TokenBucket({ ratePerSecond: options.requestsPerSecond, burst: options.burst, now: this.now });
    this.latency = new LatencyTracker(options.latencyWindow);
  }

  /**
   * Waits for a fetch permit and then a request token. The permit is held
   * for the whole platform call.
   *
   * @returns a release function, or null if cancelled while waiting
   */
  async acquireFetchPermit(token?: CancellationToken): Promise<ReleasePermit | null> {
    if (!(await this.fetchPermits.acquire(token))) return null;
    const release = once(() => this.fetchPermits.release());
    if (!(await this.bucket.acquire(token))) {
      release();
      return null;
    }
    return release;
  }

  async acquireCommitPermit(token?: CancellationToken): Promise<ReleasePermit | null> {
    if (!(await this.commitPermits.acquire(token))) return null;
    return once(() => this.commitPermits.release());
  }

  recordStoreLatency(durationMs: number): void {
    this.latency.record(durationMs);
    this.samplesSinceAdjust++;
    if (this.samplesSinceAdjust >= this.options.adjustEvery) {
      this.adjust();
    }
  }

  /**
   * The platform asked us to back off; no token is issued before the
   * advertised time has passed.
   */
  onRateLimited(retryAfterMs: number): void {
    this.bucket.blockUntil(this.now() + Math.max(0, retryAfterMs));
    logger.warn({ retryAfterMs }, "Platform rate limit hit, pausing requests");
    this.options.events?.emit("governor:rate-limited", { retryAfterMs });
  }

  state(): GovernorState {
    return {
      fetchPermits: this.fetchPermits.limit,
      commitPermits: this.commitPermits.limit,
      fetchesInFlight: this.fetchPermits.inUse,
      commitsInFlight: this.commitPermits.inUse,
      p99Ms: this.latency.p99(),
      availableTokens: this.bucket.available,
    };
  }

  private adjust(): void {
    this.samplesSinceAdjust = 0;
    const p99Ms = this.latency.p99();
    const { latencyThresholdMs, minConcurrentFetches, maxConcurrentFetches, maxConcurrentCommits } = this.options;
    const fetchBefore = this.fetchPermits.limit;
    const commitBefore = this.commitPermits.limit;

    if (p99Ms > latencyThresholdMs) {
      this.fetchPermits.setLimit(Math.max(minConcurrentFetches, Math.floor(fetchBefore / 2)));
      this.commitPermits.setLimit(Math.max(1, Math.floor(commitBefore / 2)));
    } else if (p99Ms < latencyThresholdMs / 2) {
      this.fetchPermits.setLimit(Math.min(maxConcurrentFetches, fetchBefore + 1));
      this.commitPermits.setLimit(Math.min(maxConcurrentCommits, commitBefore + 1));
    }

    const fetchAfter = this.fetchPermits.limit;
    const commitAfter = this.commitPermits.limit;
    if (fetchAfter === fetchBefore && commitAfter === commitBefore) return;

    // Start the next decision from fresh samples
    this.latency.reset();
    logger.info(
      { p99Ms, fetchPermits: fetchAfter, commitPermits: commitAfter, thresholdMs: latencyThresholdMs },
      fetchAfter < fetchBefore ? "Store latency high, narrowing concurrency" : "Store latency recovered, widening concurrency"
    );
    this.options.events?.emit("governor:concurrency-changed", {
      fetchPermits: fetchAfter,
      commitPermits: commitAfter,
      p99Ms,
    });
  }
}

function once(fn: () => void): ReleasePermit {
  let done = false;
  return () => {
    if (done) return;
    done = true;
    fn();
  };
}
