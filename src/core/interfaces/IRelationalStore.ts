/**
 * IRelationalStore - structured record store
 *
 * Holds one row per (kind, externalId). Rows are either resolved entities
 * (fetched, with payload and outgoing edges) or unresolved stubs created so
 * that an edge endpoint exists before the graph store sees the edge.
 *
 * @module
 */

import type { CommitStatus, Edge, Entity, EntityKey, EntityRef } from "../models/entity.js";

/**
 * A row as read back from the relational store.
 */
export interface StoredEntity extends EntityRef {
  key: EntityKey;
  /** Unique public handle (channel username/link, user username) */
  handle: string | null;
  /** Validated payload; null for stubs */
  payload: Record<string, unknown> | null;
  /** Edges recorded with the entity, used to re-derive the graph */
  outgoingEdges: Edge[];
  resolved: boolean;
  status: CommitStatus;
  discoveredAt: Date;
  updatedAt: Date;
}

export interface RelationalStoreStats {
  total: number;
  resolved: number;
  stubs: number;
  committed: number;
  failed: number;
}

/**
 * Relational store interface.
 *
 * Every write is keyed on (kind, externalId) and may be repeated safely.
 *
 * @example
 * ```typescript
 * const store = new PostgresRelationalStore({ connectionString });
 * await store.initialize();
 * await store.upsertEntity(entity, edges);
 * await store.ensureStub({ kind: "user", externalId: "user_7" });
 * ```
 */
export interface IRelationalStore {
  /** Creates tables and indexes if missing */
  initialize(): Promise<void>;

  /**
   * Inserts or overwrites the entity row, turning a stub into a resolved row.
   * Outgoing edges are added to those already stored, never replaced.
   * Status becomes "pending" until the commit finishes.
   *
   * @throws EntityConflictError when another row of the same kind already owns the handle
   * @throws TransientStoreError on connection-level failures
   */
  upsertEntity(entity: Entity, edges: Edge[]): Promise<void>;

  /**
   * Inserts an unresolved stub if no row exists for the reference.
   *
   * @returns true if a stub was created, false if a row already existed
   */
  ensureStub(ref: EntityRef): Promise<boolean>;

  markStatus(ref: EntityRef, status: CommitStatus): Promise<void>;

  findEntity(ref: EntityRef): Promise<StoredEntity | null>;

  /** Keys of all rows whose commit finished */
  listCommittedKeys(): Promise<EntityKey[]>;

  /** Resolved rows whose commit never finished (graph possibly behind) */
  listUnconverged(limit: number): Promise<StoredEntity[]>;

  stats(): Promise<RelationalStoreStats>;

  close(): Promise<void>;
}
