/**
 * Storage Module
 *
 * Store implementations and the factory that picks them from configuration.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import type { CrawlerConfig } from "../../utils/validation.js";
import type { IGraphStore } from "../interfaces/IGraphStore.js";
import type { IRelationalStore } from "../interfaces/IRelationalStore.js";
import { MemoryGraphStore } from "./memory-graph-store.js";
import { MemoryRelationalStore } from "./memory-relational-store.js";
import { Neo4jGraphStore } from "./neo4j-graph-store.js";
import { PostgresRelationalStore } from "./postgres-relational-store.js";

export * from "./memory-graph-store.js";
export * from "./memory-relational-store.js";
export * from "./neo4j-graph-store.js";
export * from "./postgres-relational-store.js";
export { toStoredEntity, serializeEdges } from "./entity-row.js";

const logger = createLogger("storage");

export interface CrawlStores {
  relational: IRelationalStore;
  graph: IGraphStore;
  close(): Promise<void>;
}

/**
 * Opens and initializes both stores. If the graph store cannot be
 * initialized the relational store is closed again before the error leaves.
 */
export async function openStores(config: Pick<CrawlerConfig, "storage" | "postgres" | "neo4j">): Promise<CrawlStores> {
  const relational: IRelationalStore =
    config.storage === "memory" ? new MemoryRelationalStore() : new PostgresRelationalStore(config.postgres);
  const graph: IGraphStore = config.storage === "memory" ? new MemoryGraphStore() : new Neo4jGraphStore(config.neo4j);

  try {
    await relational.initialize();
    await graph.initialize();
  } catch (error) {
    await Promise.allSettled([relational.close(), graph.close()]);
    throw error;
  }

  logger.info({ storage: config.storage }, "Stores opened");
  return {
    relational,
    graph,
    async close() {
      const results = await Promise.allSettled([relational.close(), graph.close()]);
      for (const result of results) {
        if (result.status === "rejected") {
          logger.warn({ err: result.reason }, "Store did not close cleanly");
        }
      }
    },
  };
}
