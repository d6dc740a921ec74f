/**
 * PostgreSQL relational store.
 *
 * One table, keyed on (kind, external_id). Every write is an upsert or an
 * insert-if-absent, so repeating it is harmless. Each call checks a
 * connection out of the pool and returns it; nothing is held across calls.
 *
 * @module
 */

import { Pool, type QueryResult } from "pg";
import { createLogger } from "../../utils/logger.js";
import {
  EntityConflictError,
  StoreError,
  TransientStoreError,
  errorMessage,
  type CrawlerError,
} from "../errors.js";
import type { IRelationalStore, RelationalStoreStats, StoredEntity } from "../interfaces/IRelationalStore.js";
import {
  entityHandle,
  entityKey,
  parseEntityKey,
  type CommitStatus,
  type Edge,
  type Entity,
  type EntityKey,
  type EntityRef,
} from "../models/entity.js";
import type { PostgresConfig } from "../../utils/validation.js";
import { serializeEdges, toStoredEntity } from "./entity-row.js";

const logger = createLogger("postgres");

export const ENTITY_TABLE = "crawl_entities";
export const HANDLE_INDEX = "crawl_entities_handle_idx";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS ${ENTITY_TABLE} (
  kind            TEXT        NOT NULL,
  external_id     TEXT        NOT NULL,
  handle          TEXT,
  payload         JSONB,
  outgoing_edges  JSONB       NOT NULL DEFAULT '[]'::jsonb,
  resolved        BOOLEAN     NOT NULL DEFAULT FALSE,
  status          TEXT        NOT NULL DEFAULT 'pending',
  discovered_at   TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at      TIMESTAMPTZ NOT NULL DEFAULT now(),
  PRIMARY KEY (kind, external_id)
);
CREATE UNIQUE INDEX IF NOT EXISTS ${HANDLE_INDEX} ON ${ENTITY_TABLE} (kind, handle) WHERE handle IS NOT NULL;
CREATE INDEX IF NOT EXISTS crawl_entities_status_idx ON ${ENTITY_TABLE} (status) WHERE resolved;
`;

const SELECT_COLUMNS =
  "kind, external_id, handle, payload, outgoing_edges, resolved, status, discovered_at, updated_at";

/** SQLSTATE classes and codes worth retrying */
const TRANSIENT_SQLSTATES = new Set(["40001", "40P01", "53300", "57P01", "57P02", "57P03", "55P03"]);
const TRANSIENT_SOCKET_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "EPIPE", "ENOTFOUND", "EAI_AGAIN"]);

interface PgLikeError {
  code?: string;
  constraint?: string;
  message: string;
}

function asPgError(error: unknown): PgLikeError | null {
  if (!(error instanceof Error)) return null;
  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
  const constraint = "constraint" in error && typeof error.constraint === "string" ? error.constraint : undefined;
  return { code, constraint, message: error.message };
}

/**
 * Maps a pg driver error onto the crawler's error taxonomy.
 */
export function classifyPgError(error: unknown, context: Record<string, unknown> = {}): CrawlerError {
  const pgError = asPgError(error);
  if (!pgError) {
    return new StoreError(`PostgreSQL failure: ${errorMessage(error)}`, "relational", context);
  }
  const { code, constraint, message } = pgError;
  const ctx = { ...context, sqlstate: code };

  if (code === "23505" && constraint === HANDLE_INDEX) {
    return new EntityConflictError(`Handle already claimed by another entity: ${message}`, ctx);
  }
  if (code !== undefined && (code.startsWith("08") || TRANSIENT_SQLSTATES.has(code) || TRANSIENT_SOCKET_CODES.has(code))) {
    return new TransientStoreError(`PostgreSQL transient failure: ${message}`, "relational", ctx);
  }
  if (/connection terminated|timeout exceeded when trying to connect/i.test(message)) {
    return new TransientStoreError(`PostgreSQL connection lost: ${message}`, "relational", ctx);
  }
  return new StoreError(`PostgreSQL query failed: ${message}`, "relational", ctx);
}

export type PostgresRelationalStoreOptions = Pick<
  PostgresConfig,
  "connectionString" | "host" | "port" | "database" | "user" | "password" | "maxConnections"
>;

export class PostgresRelationalStore implements IRelationalStore {
  private readonly pool: Pool;

  constructor(options: PostgresRelationalStoreOptions) {
    this.pool = new Pool(
      options.connectionString
        ? { connectionString: options.connectionString, max: options.maxConnections }
        : {
            host: options.host,
            port: options.port,
            database: options.database,
            user: options.user,
            password: options.password,
            max: options.maxConnections,
          }
    );
    // Idle client errors surface here instead of crashing the process
    this.pool.on("error", (error) => {
      logger.warn({ err: error }, "Idle PostgreSQL client error");
    });
  }

  async initialize(): Promise<void> {
    await this.query("initialize", SCHEMA_SQL);
    logger.info({ table: ENTITY_TABLE }, "Relational schema ready");
  }

  async upsertEntity(entity: Entity, edges: Edge[]): Promise<void> {
    await this.query(
      "upsertEntity",
      `INSERT INTO ${ENTITY_TABLE} (kind, external_id, handle, payload, outgoing_edges, resolved, status, discovered_at, updated_at)
       VALUES ($1, $2, $3, $4::jsonb, $5::jsonb, TRUE, 'pending', $6, now())
       ON CONFLICT (kind, external_id) DO UPDATE SET
         handle = EXCLUDED.handle,
         payload = EXCLUDED.payload,
         outgoing_edges = (
           SELECT COALESCE(jsonb_agg(DISTINCT edge), '[]'::jsonb)
           FROM jsonb_array_elements(${ENTITY_TABLE}.outgoing_edges || EXCLUDED.outgoing_edges) AS edge
         ),
         resolved = TRUE,
         status = 'pending',
         discovered_at = LEAST(${ENTITY_TABLE}.discovered_at, EXCLUDED.discovered_at),
         updated_at = now()`,
      [
        entity.kind,
        entity.externalId,
        entityHandle(entity),
        JSON.stringify(entity.payload),
        serializeEdges(edges),
        entity.discoveredAt,
      ],
      { key: entityKey(entity) }
    );
  }

  async ensureStub(ref: EntityRef): Promise<boolean> {
    const result = await this.query(
      "ensureStub",
      `INSERT INTO ${ENTITY_TABLE} (kind, external_id, resolved, status)
       VALUES ($1, $2, FALSE, 'pending')
       ON CONFLICT (kind, external_id) DO NOTHING`,
      [ref.kind, ref.externalId],
      { key: entityKey(ref) }
    );
    return (result.rowCount ?? 0) > 0;
  }

  async markStatus(ref: EntityRef, status: CommitStatus): Promise<void> {
    await this.query(
      "markStatus",
      `UPDATE ${ENTITY_TABLE} SET status = $3, updated_at = now() WHERE kind = $1 AND external_id = $2`,
      [ref.kind, ref.externalId, status],
      { key: entityKey(ref), status }
    );
  }

  async findEntity(ref: EntityRef): Promise<StoredEntity | null> {
    const result = await this.query(
      "findEntity",
      `SELECT ${SELECT_COLUMNS} FROM ${ENTITY_TABLE} WHERE kind = $1 AND external_id = $2`,
      [ref.kind, ref.externalId],
      { key: entityKey(ref) }
    );
    const row = result.rows[0];
    return row === undefined ? null : toStoredEntity(row);
  }

  async listCommittedKeys(): Promise<EntityKey[]> {
    const result = await this.query(
      "listCommittedKeys",
      `SELECT kind || ':' || external_id AS key FROM ${ENTITY_TABLE} WHERE status = 'committed'`
    );
    const keys: EntityKey[] = [];
    for (const row of result.rows) {
      const key: unknown = row.key;
      if (typeof key === "string") keys.push(entityKey(parseEntityKey(key)));
    }
    return keys;
  }

  async listUnconverged(limit: number): Promise<StoredEntity[]> {
    const result = await this.query(
      "listUnconverged",
      `SELECT ${SELECT_COLUMNS} FROM ${ENTITY_TABLE}
       WHERE resolved AND status <> 'committed'
       ORDER BY updated_at
       LIMIT $1`,
      [limit]
    );
    return result.rows.map((row) => toStoredEntity(row));
  }

  async stats(): Promise<RelationalStoreStats> {
    const result = await this.query(
      "stats",
      `SELECT
         count(*)::int AS total,
         count(*) FILTER (WHERE resolved)::int AS resolved,
         count(*) FILTER (WHERE NOT resolved)::int AS stubs,
         count(*) FILTER (WHERE status = 'committed')::int AS committed,
         count(*) FILTER (WHERE status = 'failed')::int AS failed
       FROM ${ENTITY_TABLE}`
    );
    const row = result.rows[0];
    const count = (value: unknown): number => (typeof value === "number" ? value : 0);
    return {
      total: count(row?.total),
      resolved: count(row?.resolved),
      stubs: count(row?.stubs),
      committed: count(row?.committed),
      failed: count(row?.failed),
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async query(
    operation: string,
    sql: string,
    params: unknown[] = [],
    context: Record<string, unknown> = {}
  ): Promise<QueryResult<Record<string, unknown>>> {
    try {
      return await this.pool.query<Record<string, unknown>>(sql, params);
    } catch (error) {
      const classified = classifyPgError(error, { operation, ...context });
      logger.debug({ operation, code: classified.code, err: error }, "PostgreSQL operation failed");
      throw classified;
    }
  }
}
