/**
 * Neo4j graph store.
 *
 * Every node carries the :Entity label plus a per-kind label and is merged on
 * its unique `key`. Edges are merged on (source, target, type). Labels and
 * relationship types cannot be query parameters, so they come only from the
 * closed registries below.
 *
 * @module
 */

import neo4j, { type Driver, type Session } from "neo4j-driver";
import { createLogger } from "../../utils/logger.js";
import type { Neo4jConfig } from "../../utils/validation.js";
import { StoreError, TransientStoreError, errorMessage, type CrawlerError } from "../errors.js";
import type { GraphNode, IGraphStore } from "../interfaces/IGraphStore.js";
import { entityKey, type Edge, type EdgeType, type EntityKind } from "../models/entity.js";

const logger = createLogger("neo4j");

export const ENTITY_LABEL = "Entity";

export const KIND_LABELS = {
  channel: "Channel",
  message: "Message",
  user: "User",
} as const satisfies Record<EntityKind, string>;

// Relationship types are interpolated into Cypher; only these are allowed
export const RELATIONSHIP_TYPES = {
  MEMBER_OF: "MEMBER_OF",
  FORWARDED_FROM: "FORWARDED_FROM",
  MENTIONS: "MENTIONS",
  POSTED_IN: "POSTED_IN",
  SIMILAR_TO: "SIMILAR_TO",
  REPOSTS_FROM: "REPOSTS_FROM",
} as const satisfies Record<EdgeType, EdgeType>;

const TRANSIENT_CODES = new Set(["ServiceUnavailable", "SessionExpired"]);

/**
 * Maps a neo4j-driver error onto the crawler's error taxonomy.
 */
export function classifyNeo4jError(error: unknown, context: Record<string, unknown> = {}): CrawlerError {
  if (!(error instanceof Error)) {
    return new StoreError(`Neo4j failure: ${errorMessage(error)}`, "graph", context);
  }
  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
  const retriable = "retriable" in error && error.retriable === true;
  const ctx = { ...context, neo4jCode: code };

  if (retriable || (code !== undefined && (TRANSIENT_CODES.has(code) || code.startsWith("Neo.TransientError.")))) {
    return new TransientStoreError(`Neo4j transient failure: ${error.message}`, "graph", ctx);
  }
  return new StoreError(`Neo4j query failed: ${error.message}`, "graph", ctx);
}

function groupByType(edges: Edge[]): Map<EdgeType, Edge[]> {
  const groups = new Map<EdgeType, Edge[]>();
  for (const edge of edges) {
    const group = groups.get(edge.type);
    if (group) group.push(edge);
    else groups.set(edge.type, [edge]);
  }
  return groups;
}

export type Neo4jGraphStoreOptions = Pick<Neo4jConfig, "uri" | "user" | "password" | "database">;

export class Neo4jGraphStore implements IGraphStore {
  private readonly driver: Driver;

  constructor(private readonly options: Neo4jGraphStoreOptions) {
    this.driver = neo4j.driver(options.uri, neo4j.auth.basic(options.user, options.password ?? ""), {
      disableLosslessIntegers: true,
      // Retries belong to the commit stage, which records them
      maxTransactionRetryTime: 0,
    });
  }

  async initialize(): Promise<void> {
    await this.withSession("initialize", async (session) => {
      await session.run(
        `CREATE CONSTRAINT entity_key IF NOT EXISTS FOR (n:${ENTITY_LABEL}) REQUIRE n.key IS UNIQUE`
      );
    });
    logger.info({ uri: this.options.uri }, "Graph schema ready");
  }

  async upsertNode(node: GraphNode): Promise<void> {
    const label = KIND_LABELS[node.kind];
    await this.withSession("upsertNode", async (session) => {
      await session.executeWrite((tx) =>
        tx.run(
          `MERGE (n:${ENTITY_LABEL} {key: $key})
           ON CREATE SET n.createdAt = timestamp()
           SET n:${label}, n.kind = $kind, n.externalId = $externalId, n.label = $label,
               n.resolved = $resolved, n.updatedAt = timestamp()`,
          { key: node.key, kind: node.kind, externalId: node.externalId, label: node.label, resolved: node.resolved }
        )
      );
    }, { key: node.key });
  }

  async upsertEdges(edges: Edge[]): Promise<number> {
    if (edges.length === 0) return 0;
    const groups = groupByType(edges);

    return this.withSession("upsertEdges", (session) =>
      session.executeWrite(async (tx) => {
        let created = 0;
        for (const [type, group] of groups) {
          const relationship = RELATIONSHIP_TYPES[type];
          const rows = group.map((edge) => ({
            sourceKey: entityKey(edge.source),
            sourceKind: edge.source.kind,
            sourceId: edge.source.externalId,
            targetKey: entityKey(edge.target),
            targetKind: edge.target.kind,
            targetId: edge.target.externalId,
          }));
          const result = await tx.run(
            `UNWIND $rows AS row
             MERGE (s:${ENTITY_LABEL} {key: row.sourceKey})
               ON CREATE SET s.kind = row.sourceKind, s.externalId = row.sourceId, s.resolved = false, s.createdAt = timestamp()
             MERGE (t:${ENTITY_LABEL} {key: row.targetKey})
               ON CREATE SET t.kind = row.targetKind, t.externalId = row.targetId, t.resolved = false, t.createdAt = timestamp()
             MERGE (s)-[r:${relationship}]->(t)
               ON CREATE SET r.createdAt = timestamp()`,
            { rows }
          );
          created += result.summary.counters.updates().relationshipsCreated;
        }
        return created;
      }),
      { edges: edges.length }
    );
  }

  async countEdges(): Promise<number> {
    return this.count("countEdges", `MATCH (:${ENTITY_LABEL})-[r]->(:${ENTITY_LABEL}) RETURN count(r) AS count`);
  }

  async countNodes(): Promise<number> {
    return this.count("countNodes", `MATCH (n:${ENTITY_LABEL}) RETURN count(n) AS count`);
  }

  async close(): Promise<void> {
    await this.driver.close();
  }

  private async count(operation: string, cypher: string): Promise<number> {
    return this.withSession(operation, async (session) => {
      const result = await session.executeRead((tx) => tx.run(cypher));
      const value: unknown = result.records[0]?.get("count");
      return typeof value === "number" ? value : 0;
    });
  }

  /**
   * Opens a session for one operation and always closes it. Driver errors
   * are translated before they leave the store.
   */
  private async withSession<T>(
    operation: string,
    fn: (session: Session) => Promise<T>,
    context: Record<string, unknown> = {}
  ): Promise<T> {
    const session = this.driver.session({ database: this.options.database });
    try {
      return await fn(session);
    } catch (error) {
      const classified = classifyNeo4jError(error, { operation, ...context });
      logger.debug({ operation, code: classified.code, err: error }, "Neo4j operation failed");
      throw classified;
    } finally {
      await session.close();
    }
  }
}
