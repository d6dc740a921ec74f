/**
 * Fetcher
 *
 * Adapter between frontier tasks and the platform client: takes a governor
 * permit, calls the platform, resolves the response into a typed item and
 * works out which edge endpoints are worth crawling next.
 *
 * @module
 */

import type { CancellationToken } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import type { ReadonlyDedupIndex } from "../dedup/dedup-index.js";
import type { HighWaterMarks } from "../dedup/high-water-marks.js";
import { EntityConflictError, RateLimitedError } from "../errors.js";
import type { RateGovernor } from "../governor/rate-governor.js";
import type { IPlatformClient } from "../interfaces/IPlatformClient.js";
import { entityKey, parseFetchedItem, type EntityKind, type FetchedItem } from "../models/entity.js";
import { discoveredTask, taskKey, type FrontierTask } from "../models/task.js";
import type { CrawlerEventBus } from "../telemetry/events.js";

const logger = createLogger("fetcher");

export interface FetcherOptions {
  platform: IPlatformClient;
  dedup: ReadonlyDedupIndex;
  highWater: Pick<HighWaterMarks, "get">;
  governor: RateGovernor;
  events?: CrawlerEventBus;
  maxDepth: number;
  followKinds: readonly EntityKind[];
}

export type FetchOutcome =
  | { status: "fetched"; item: FetchedItem; durationMs: number }
  | { status: "skipped" }
  | { status: "cancelled" };

export class Fetcher {
  private readonly followKinds: ReadonlySet<EntityKind>;

  constructor(private readonly options: FetcherOptions) {
    this.followKinds = new Set(options.followKinds);
  }

  /**
   * Fetches the task's entity. Committed entities are skipped unless the
   * task is a refresh.
   *
   * @throws RateLimitedError, NotFoundError, TransientFetchError from the platform
   * @throws MalformedPayloadError if the response does not parse
   * @throws EntityConflictError if the platform answers with a different entity
   */
  async fetch(task: FrontierTask, token?: CancellationToken): Promise<FetchOutcome> {
    const key = taskKey(task);
    const { dedup, governor, platform, highWater, events } = this.options;

    if (!task.refresh && dedup.has(task.kind, task.externalId)) {
      events?.emit("task:skipped", { key, reason: "already-committed" });
      return { status: "skipped" };
    }

    const release = await governor.acquireFetchPermit(token);
    if (!release) return { status: "cancelled" };

    const startedAt = Date.now();
    let raw: unknown;
    try {
      raw = await platform.fetchEntity({
        kind: task.kind,
        externalId: task.externalId,
        sinceMessageId: task.kind === "channel" ? highWater.get(task.externalId) : undefined,
      });
    } catch (error) {
      if (error instanceof RateLimitedError) {
        governor.onRateLimited(error.retryAfterMs);
      }
      throw error;
    } finally {
      release();
    }

    const item = parseFetchedItem(raw);
    if (item.entity.kind !== task.kind || item.entity.externalId !== task.externalId) {
      throw new EntityConflictError(`Requested ${key} but the platform returned ${entityKey(item.entity)}`, {
        requested: key,
        received: entityKey(item.entity),
      });
    }

    const durationMs = Date.now() - startedAt;
    events?.emit("task:fetched", { key, durationMs });
    logger.debug({ key, edges: item.edges.length, durationMs }, "Entity fetched");
    return { status: "fetched", item, durationMs };
  }

  /**
   * New frontier tasks for the endpoints of the item's edges: not the entity
   * itself, not already committed, of a followed kind and within the depth
   * limit. Duplicates are removed; the frontier rejects anything it already
   * knows.
   */
  discoverEndpoints(item: FetchedItem, parent: FrontierTask): FrontierTask[] {
    if (parent.depth + 1 > this.options.maxDepth) return [];

    const self = entityKey(item.entity);
    const found = new Map<string, FrontierTask>();
    for (const edge of item.edges) {
      for (const ref of [edge.source, edge.target]) {
        const key = entityKey(ref);
        if (key === self || found.has(key)) continue;
        if (!this.followKinds.has(ref.kind)) continue;
        if (this.options.dedup.hasKey(key)) continue;
        found.set(key, discoveredTask(ref, parent));
      }
    }
    return [...found.values()];
  }
}
