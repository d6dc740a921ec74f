/**
 * Dedup Index
 *
 * In-memory record of every entity whose commit finished. Membership checks
 * sit on the hot path (every edge endpoint is checked) and never leave the
 * process. The Coordinator is the only writer; everyone else gets the
 * read-only view.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { entityKey, parseEntityKey, type EntityKey, type EntityKind } from "../models/entity.js";

const logger = createLogger("dedup");

export interface ReadonlyDedupIndex {
  has(kind: EntityKind, externalId: string): boolean;
  hasKey(key: EntityKey): boolean;
  readonly size: number;
}

export class DedupIndex implements ReadonlyDedupIndex {
  private readonly committed = new Set<EntityKey>();

  has(kind: EntityKind, externalId: string): boolean {
    return this.committed.has(entityKey({ kind, externalId }));
  }

  hasKey(key: EntityKey): boolean {
    return this.committed.has(key);
  }

  get size(): number {
    return this.committed.size;
  }

  /**
   * @returns false if the entity was already recorded
   */
  recordCommitted(kind: EntityKind, externalId: string): boolean {
    const key = entityKey({ kind, externalId });
    if (this.committed.has(key)) return false;
    this.committed.add(key);
    return true;
  }

  /**
   * Adds keys loaded from a checkpoint or the relational store. Keys that do
   * not parse are skipped and logged.
   *
   * @returns number of keys that were new
   */
  hydrate(keys: Iterable<string>, source: string): number {
    let added = 0;
    let rejected = 0;
    for (const raw of keys) {
      let key: EntityKey;
      try {
        key = entityKey(parseEntityKey(raw));
      } catch (error) {
        rejected++;
        logger.warn({ key: raw, source, err: error }, "Skipping unparseable dedup key");
        continue;
      }
      if (!this.committed.has(key)) {
        this.committed.add(key);
        added++;
      }
    }
    logger.info({ source, added, rejected, size: this.committed.size }, "Dedup index hydrated");
    return added;
  }

  keys(): EntityKey[] {
    return [...this.committed];
  }

  /** Read-only view handed to the Fetcher */
  asReadonly(): ReadonlyDedupIndex {
    const committed = this.committed;
    return {
      has: (kind, externalId) => this.has(kind, externalId),
      hasKey: (key) => this.hasKey(key),
      get size() {
        return committed.size;
      },
    };
  }
}
