/**
 * Dual-Write Coordinator
 *
 * Commits one fetched entity and its outgoing edges across the relational and
 * graph stores. There is no shared transaction, so the commit is a sequence of
 * idempotent stages, each retried on its own:
 *
 *   1. relational  upsert the entity row (payload + outgoing edges)
 *   2. stubs       insert-if-absent a stub row for every other edge endpoint
 *   3. graph       merge the entity node and every edge
 *   4. finalize    mark the row committed, record it in the dedup index
 *
 * The graph store only ever sees an edge whose endpoints already exist as
 * relational rows. If a later stage gives up, earlier stages stay applied
 * (commit-ahead); re-running the commit or {@link DualWriteCoordinator.converge}
 * brings the graph back in line.
 *
 * @module
 */

import { retry, type RetryOptions } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import type { DedupIndex } from "../dedup/dedup-index.js";
import type { HighWaterMarks } from "../dedup/high-water-marks.js";
import { ErrorCode, errorMessage, isCrawlerError, isTransientStoreError } from "../errors.js";
import type { RateGovernor } from "../governor/rate-governor.js";
import type { GraphNode, IGraphStore } from "../interfaces/IGraphStore.js";
import type { IRelationalStore, StoredEntity } from "../interfaces/IRelationalStore.js";
import {
  entityKey,
  entityLabel,
  parseEntityPayload,
  refOf,
  type Edge,
  type Entity,
  type EntityKey,
  type EntityRef,
  type FetchedItem,
} from "../models/entity.js";
import type { CommitStage, CrawlerEventBus } from "../telemetry/events.js";

const logger = createLogger("coordinator");

export type StageRetryPolicy = Pick<RetryOptions, "maxAttempts" | "initialDelayMs" | "maxDelayMs" | "backoffFactor">;

export interface DualWriteCoordinatorOptions {
  relational: IRelationalStore;
  graph: IGraphStore;
  dedup: DedupIndex;
  highWater: HighWaterMarks;
  retry: StageRetryPolicy;
  governor?: Pick<RateGovernor, "recordStoreLatency">;
  events?: CrawlerEventBus;
}

export interface CommitResult {
  key: EntityKey;
  stubsCreated: number;
  edgesWritten: number;
  durationMs: number;
}

/**
 * Raised when a stage fails for good, carrying the stage for telemetry.
 * The original error is the `cause`.
 */
export class CommitStageError extends Error {
  constructor(
    readonly key: EntityKey,
    readonly stage: CommitStage,
    override readonly cause: unknown
  ) {
    super(`Commit of ${key} failed at ${stage} stage: ${errorMessage(cause)}`);
    this.name = "CommitStageError";
  }
}

export class DualWriteCoordinator {
  constructor(private readonly options: DualWriteCoordinatorOptions) {}

  /**
   * Runs all four stages for a freshly fetched item.
   *
   * @throws CommitStageError wrapping the failure of the stage that gave up
   */
  async commit(item: FetchedItem): Promise<CommitResult> {
    const { entity, edges } = item;
    const key = entityKey(entity);
    const startedAt = Date.now();

    await this.stage("relational", key, () => this.options.relational.upsertEntity(entity, edges));
    const result = await this.replay(entity, edges, startedAt);
    logger.debug({ ...result }, "Entity committed");
    return result;
  }

  /**
   * Replays stages 2-4 from a stored row, re-deriving the graph from the
   * edges kept in the relational store. Used by reconciliation; nothing is
   * re-fetched.
   */
  async converge(stored: StoredEntity): Promise<CommitResult> {
    if (!stored.resolved || !stored.payload) {
      throw new Error(`Cannot converge ${stored.key}: row is an unresolved stub`);
    }
    const entity = parseEntityPayload(stored, stored.payload, stored.discoveredAt, stored.status);
    const result = await this.replay(entity, stored.outgoingEdges, Date.now());
    logger.info({ key: stored.key, edgesWritten: result.edgesWritten }, "Entity converged");
    return result;
  }

  /**
   * Records a terminal failure on the entity row, if there is one. A store
   * error here is logged; the task outcome is already decided.
   */
  async markFailed(ref: EntityRef, cause: unknown): Promise<void> {
    const key = entityKey(ref);
    try {
      await this.options.relational.markStatus(ref, "failed");
    } catch (error) {
      logger.warn({ key, err: error, cause: errorMessage(cause) }, "Could not mark entity as failed");
    }
  }

  private async replay(entity: Entity, edges: Edge[], startedAt: number): Promise<CommitResult> {
    const { relational, graph, dedup, highWater, events } = this.options;
    const key = entityKey(entity);
    const self = refOf(entity);

    const stubsCreated = await this.stage("stubs", key, async () => {
      let created = 0;
      for (const ref of endpointsOf(edges, key)) {
        if (await relational.ensureStub(ref)) created++;
      }
      return created;
    });

    const edgesWritten = await this.stage("graph", key, async () => {
      await graph.upsertNode(nodeOf(entity));
      return graph.upsertEdges(edges);
    });

    await this.stage("finalize", key, () => relational.markStatus(self, "committed"));
    dedup.recordCommitted(entity.kind, entity.externalId);
    if (entity.kind === "message") {
      highWater.advance(entity.payload.channelId, entity.payload.messageId);
    }

    const result: CommitResult = { key, stubsCreated, edgesWritten, durationMs: Date.now() - startedAt };
    events?.emit("commit:completed", result);
    return result;
  }

  private async stage<T>(stage: CommitStage, key: EntityKey, fn: () => Promise<T>): Promise<T> {
    const { governor, events } = this.options;
    try {
      return await retry(
        async () => {
          const started = Date.now();
          try {
            return await fn();
          } finally {
            governor?.recordStoreLatency(Date.now() - started);
          }
        },
        {
          ...this.options.retry,
          retryIf: isTransientStoreError,
          onRetry: (error, attempt, delayMs) => {
            logger.warn({ key, stage, attempt, delayMs, err: error }, "Transient store error, retrying stage");
            events?.emit("commit:retry", { key, stage, attempt, delayMs, code: codeOf(error) });
          },
        }
      );
    } catch (error) {
      events?.emit("commit:failed", { key, stage, code: codeOf(error) });
      throw new CommitStageError(key, stage, error);
    }
  }
}

function codeOf(error: unknown): ErrorCode {
  return isCrawlerError(error) ? error.code : ErrorCode.UNKNOWN_ERROR;
}

/** Distinct edge endpoints other than the committing entity itself */
function endpointsOf(edges: Edge[], self: EntityKey): EntityRef[] {
  const endpoints = new Map<EntityKey, EntityRef>();
  for (const edge of edges) {
    for (const ref of [edge.source, edge.target]) {
      const key = entityKey(ref);
      if (key !== self && !endpoints.has(key)) endpoints.set(key, ref);
    }
  }
  return [...endpoints.values()];
}

function nodeOf(entity: Entity): GraphNode {
  return {
    key: entityKey(entity),
    kind: entity.kind,
    externalId: entity.externalId,
    label: entityLabel(entity),
    resolved: true,
  };
}
