/**
 * Crawler Events
 *
 * Typed event map published on the crawl's {@link EventBus}. The CLI renders
 * progress from these; {@link CrawlMetrics} aggregates them.
 *
 * @module
 */

import { EventBus } from "../../utils/events.js";
import type { ErrorCode } from "../errors.js";
import type { DeadLetter } from "../dead-letter/dead-letter-list.js";
import type { EntityKey } from "../models/entity.js";

/** Stages of the per-entity commit protocol, in order */
export const COMMIT_STAGES = ["relational", "stubs", "graph", "finalize"] as const;
export type CommitStage = (typeof COMMIT_STAGES)[number];

export interface CrawlerEvents {
  "task:fetched": { key: EntityKey; durationMs: number };
  "task:skipped": { key: EntityKey; reason: "already-committed" | "filtered" };
  "task:discovered": { key: EntityKey; origin: EntityKey };
  "task:requeued": { key: EntityKey; retries: number; delayMs: number; code: ErrorCode };
  "task:dead-lettered": { letter: DeadLetter };
  /** A retryable task spent its retry budget; it stays on the frontier */
  "task:exhausted": { letter: DeadLetter };
  "commit:retry": { key: EntityKey; stage: CommitStage; attempt: number; delayMs: number; code: ErrorCode };
  "commit:completed": { key: EntityKey; stubsCreated: number; edgesWritten: number; durationMs: number };
  "commit:failed": { key: EntityKey; stage: CommitStage; code: ErrorCode };
  "checkpoint:written": { sequence: number; location: string; durationMs: number };
  "governor:rate-limited": { retryAfterMs: number };
  "governor:concurrency-changed": { fetchPermits: number; commitPermits: number; p99Ms: number };
  "pipeline:shutdown": { reason: string };
}

export type CrawlerEventBus = EventBus<CrawlerEvents>;

export function createCrawlerEventBus(): CrawlerEventBus {
  return new EventBus<CrawlerEvents>();
}
