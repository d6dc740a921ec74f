/**
 * In-process relational store.
 *
 * Same contract as the PostgreSQL store, including the unique handle per
 * kind. Used for `--memory` runs and as the tests' stand-in.
 *
 * @module
 */

import { EntityConflictError } from "../errors.js";
import type { IRelationalStore, RelationalStoreStats, StoredEntity } from "../interfaces/IRelationalStore.js";
import {
  dedupeEdges,
  entityHandle,
  entityKey,
  type CommitStatus,
  type Edge,
  type Entity,
  type EntityKey,
  type EntityRef,
} from "../models/entity.js";

export class MemoryRelationalStore implements IRelationalStore {
  private readonly rows = new Map<EntityKey, StoredEntity>();
  private readonly handles = new Map<string, EntityKey>();

  async initialize(): Promise<void> {}

  async upsertEntity(entity: Entity, edges: Edge[]): Promise<void> {
    const key = entityKey(entity);
    const handle = entityHandle(entity);
    const handleKey = handle === null ? null : `${entity.kind}:${handle}`;

    if (handleKey) {
      const owner = this.handles.get(handleKey);
      if (owner && owner !== key) {
        throw new EntityConflictError(`Handle "${handle}" already belongs to ${owner}`, { key, owner, handle });
      }
    }

    const existing = this.rows.get(key);
    if (existing?.handle && existing.handle !== handle) {
      this.handles.delete(`${entity.kind}:${existing.handle}`);
    }
    if (handleKey) this.handles.set(handleKey, key);

    const discoveredAt =
      existing && existing.discoveredAt < entity.discoveredAt ? existing.discoveredAt : entity.discoveredAt;
    this.rows.set(key, {
      key,
      kind: entity.kind,
      externalId: entity.externalId,
      handle,
      payload: { ...entity.payload },
      outgoingEdges: dedupeEdges([...(existing?.outgoingEdges ?? []), ...edges]).map((edge) => ({ ...edge })),
      resolved: true,
      status: "pending",
      discoveredAt,
      updatedAt: new Date(),
    });
  }

  async ensureStub(ref: EntityRef): Promise<boolean> {
    const key = entityKey(ref);
    if (this.rows.has(key)) return false;
    const now = new Date();
    this.rows.set(key, {
      key,
      kind: ref.kind,
      externalId: ref.externalId,
      handle: null,
      payload: null,
      outgoingEdges: [],
      resolved: false,
      status: "pending",
      discoveredAt: now,
      updatedAt: now,
    });
    return true;
  }

  async markStatus(ref: EntityRef, status: CommitStatus): Promise<void> {
    const row = this.rows.get(entityKey(ref));
    if (!row) return;
    row.status = status;
    row.updatedAt = new Date();
  }

  async findEntity(ref: EntityRef): Promise<StoredEntity | null> {
    const row = this.rows.get(entityKey(ref));
    return row ? { ...row } : null;
  }

  async listCommittedKeys(): Promise<EntityKey[]> {
    return [...this.rows.values()].filter((row) => row.status === "committed").map((row) => row.key);
  }

  async listUnconverged(limit: number): Promise<StoredEntity[]> {
    return [...this.rows.values()]
      .filter((row) => row.resolved && row.status !== "committed")
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
      .slice(0, limit)
      .map((row) => ({ ...row }));
  }

  async stats(): Promise<RelationalStoreStats> {
    const rows = [...this.rows.values()];
    return {
      total: rows.length,
      resolved: rows.filter((row) => row.resolved).length,
      stubs: rows.filter((row) => !row.resolved).length,
      committed: rows.filter((row) => row.status === "committed").length,
      failed: rows.filter((row) => row.status === "failed").length,
    };
  }

  /** Every row, for inspection */
  all(): StoredEntity[] {
    return [...this.rows.values()].map((row) => ({ ...row }));
  }

  async close(): Promise<void> {}
}
