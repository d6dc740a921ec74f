/**
 * Runtime Validation Schemas
 *
 * Zod schemas for the crawler configuration. Every section has defaults, so
 * an empty object parses into a complete config.
 *
 * @module
 */

import { z } from "zod";
import { ENTITY_KINDS, EntityKindSchema } from "../core/models/entity.js";

// =============================================================================
// Seeds
// =============================================================================

const SEED_PATTERN = new RegExp(`^(${ENTITY_KINDS.join("|")}):.+$`);

/**
 * A seed written as "<kind>:<id>", e.g. "channel:chan_1"
 */
export const SeedSchema = z.string().trim().regex(SEED_PATTERN, { message: `Seed must look like <${ENTITY_KINDS.join("|")}>:<id>` });

// =============================================================================
// Connection Schemas
// =============================================================================

export const PlatformConfigSchema = z.object({
  /** Base URL of the platform API */
  baseUrl: z.string().url().optional(),
  /** Bearer token sent with every request */
  token: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(15_000),
  /** Serve responses from a JSON fixture file instead of the API */
  fixturesPath: z.string().min(1).optional(),
});

export const PostgresConfigSchema = z.object({
  /** Takes precedence over the discrete fields when set */
  connectionString: z.string().min(1).optional(),
  host: z.string().min(1).default("localhost"),
  port: z.number().int().positive().default(5432),
  database: z.string().min(1).default("crawler"),
  user: z.string().min(1).default("crawler"),
  password: z.string().optional(),
  maxConnections: z.number().int().positive().default(10),
});

export const Neo4jConfigSchema = z.object({
  uri: z.string().min(1).default("bolt://localhost:7687"),
  user: z.string().min(1).default("neo4j"),
  password: z.string().optional(),
  database: z.string().min(1).optional(),
});

// =============================================================================
// Behaviour Schemas
// =============================================================================

export const RateConfigSchema = z
  .object({
    requestsPerSecond: z.number().positive().default(5),
    burst: z.number().int().positive().default(5),
    maxConcurrentFetches: z.number().int().positive().default(5),
    minConcurrentFetches: z.number().int().positive().default(1),
  })
  .refine((rate) => rate.minConcurrentFetches <= rate.maxConcurrentFetches, {
    message: "minConcurrentFetches must not exceed maxConcurrentFetches",
    path: ["minConcurrentFetches"],
  });

export const CommitConfigSchema = z.object({
  maxConcurrent: z.number().int().positive().default(4),
  /** Capacity of the channel between fetch and commit workers */
  queueDepth: z.number().int().positive().default(32),
  latencyThresholdMs: z.number().positive().default(500),
  latencyWindow: z.number().int().positive().default(200),
  adjustEvery: z.number().int().positive().default(20),
});

export const RetryConfigSchema = z.object({
  /** Attempts per commit stage, including the first */
  maxAttempts: z.number().int().positive().default(5),
  initialDelayMs: z.number().int().nonnegative().default(200),
  maxDelayMs: z.number().int().positive().default(10_000),
  backoffFactor: z.number().min(1).default(2),
  /** Requeues of a whole task before it is dead-lettered */
  maxTaskRetries: z.number().int().nonnegative().default(3),
  taskBackoffMs: z.number().int().nonnegative().default(1_000),
});

export const CheckpointConfigSchema = z.object({
  path: z.string().min(1).optional(),
  intervalMs: z.number().int().positive().default(30_000),
});

export const CrawlConfigSchema = z.object({
  /** Discovered entities deeper than this are not followed */
  maxDepth: z.number().int().nonnegative().default(3),
  followKinds: z.array(EntityKindSchema).default([...ENTITY_KINDS]),
  /** Fetch committed channel seeds again for messages after their high-water mark */
  refresh: z.boolean().default(false),
});

// =============================================================================
// Crawler Configuration
// =============================================================================

export const CrawlerConfigSchema = z.object({
  seeds: z.array(SeedSchema).default([]),
  /** "memory" keeps both stores in process, for dry runs and tests */
  storage: z.enum(["databases", "memory"]).default("databases"),
  platform: PlatformConfigSchema.default({}),
  postgres: PostgresConfigSchema.default({}),
  neo4j: Neo4jConfigSchema.default({}),
  rate: RateConfigSchema.default({}),
  commits: CommitConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  checkpoint: CheckpointConfigSchema.default({}),
  crawl: CrawlConfigSchema.default({}),
  shutdown: z.object({ graceMs: z.number().int().nonnegative().default(10_000) }).default({}),
});

export type CrawlerConfig = z.infer<typeof CrawlerConfigSchema>;
export type CrawlerConfigInput = z.input<typeof CrawlerConfigSchema>;
export type PostgresConfig = z.infer<typeof PostgresConfigSchema>;
export type Neo4jConfig = z.infer<typeof Neo4jConfigSchema>;
export type PlatformConfig = z.infer<typeof PlatformConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Validate data against a schema, returning a result object
 */
export function validate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): { success: true; data: z.infer<S> } | { success: false; errors: string[] } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
  };
}
