/**
 * Fixture platform client
 *
 * Serves raw responses from a JSON document keyed by entity key, for offline
 * crawls and tests. Failures can be scripted per key and are played back in
 * order before the fixture answers normally.
 *
 * Fixture file shape:
 *
 * ```json
 * {
 *   "entities": { "channel:chan_1": { "kind": "channel", "id": "chan_1", "payload": {}, "edges": [] } },
 *   "failures": { "user:user_7": [{ "type": "rate-limited", "retryAfterMs": 50 }] }
 * }
 * ```
 *
 * @module
 */

import { z } from "zod";
import { readJson } from "../../utils/index.js";
import { sleep } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import {
  ConfigurationError,
  NotFoundError,
  RateLimitedError,
  TransientFetchError,
} from "../errors.js";
import type { FetchRequest, IPlatformClient } from "../interfaces/IPlatformClient.js";
import { entityKey } from "../models/entity.js";

const logger = createLogger("fixtures");

export const FixtureFailureSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("rate-limited"), retryAfterMs: z.number().int().nonnegative() }),
  z.object({ type: z.literal("transient") }),
  z.object({ type: z.literal("not-found") }),
]);

export type FixtureFailure = z.infer<typeof FixtureFailureSchema>;

export const FixtureFileSchema = z.object({
  entities: z.record(z.unknown()),
  failures: z.record(z.array(FixtureFailureSchema)).default({}),
});

export interface FixturePlatformClientOptions {
  /** Artificial latency per request */
  latencyMs?: number;
}

export class FixturePlatformClient implements IPlatformClient {
  private readonly entities: Map<string, unknown>;
  private readonly failures = new Map<string, FixtureFailure[]>();
  private readonly requestLog: FetchRequest[] = [];
  private active = 0;
  private peak = 0;

  constructor(
    entities: Record<string, unknown>,
    private readonly options: FixturePlatformClientOptions = {}
  ) {
    this.entities = new Map(Object.entries(entities));
  }

  /**
   * Loads a fixture file.
   *
   * @throws ConfigurationError if the file is missing or has the wrong shape
   */
  static fromFile(filePath: string, options: FixturePlatformClientOptions = {}): FixturePlatformClient {
    let raw: unknown;
    try {
      raw = readJson(filePath);
    } catch (error) {
      throw new ConfigurationError(`Fixture file ${filePath} is not valid JSON`, { cause: String(error) });
    }
    if (raw === null) {
      throw new ConfigurationError(`Fixture file ${filePath} does not exist`);
    }
    const parsed = FixtureFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Fixture file ${filePath} has an invalid shape`, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }

    const client = new FixturePlatformClient(parsed.data.entities, options);
    for (const [key, failures] of Object.entries(parsed.data.failures)) {
      client.script(key, failures);
    }
    logger.info({ filePath, entities: client.entities.size }, "Fixtures loaded");
    return client;
  }

  /** Queues failures to answer for `key` before the fixture is served. */
  script(key: string, failures: FixtureFailure[]): void {
    const queued = this.failures.get(key) ?? [];
    this.failures.set(key, [...queued, ...failures]);
  }

  set(key: string, response: unknown): void {
    this.entities.set(key, response);
  }

  /** Highest number of requests that were ever served at once */
  get maxConcurrent(): number {
    return this.peak;
  }

  get requests(): readonly FetchRequest[] {
    return this.requestLog;
  }

  requestCount(key: string): number {
    return this.requestLog.filter((request) => entityKey(request) === key).length;
  }

  async fetchEntity(request: FetchRequest): Promise<unknown> {
    const key = entityKey(request);
    this.requestLog.push({ ...request });
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    try {
      if (this.options.latencyMs) await sleep(this.options.latencyMs);

      const failure = this.failures.get(key)?.shift();
      if (failure) throw toError(failure, key);

      if (!this.entities.has(key)) {
        throw new NotFoundError(`${key} is not in the fixtures`, { key });
      }
      return this.entities.get(key);
    } finally {
      this.active--;
    }
  }

  async close(): Promise<void> {
    this.entities.clear();
  }
}

function toError(failure: FixtureFailure, key: string): Error {
  switch (failure.type) {
    case "rate-limited":
      return new RateLimitedError(`Rate limited fetching ${key}`, failure.retryAfterMs, { key });
    case "transient":
      return new TransientFetchError(`Scripted transient failure for ${key}`, { key });
    case "not-found":
      return new NotFoundError(`${key} does not exist`, { key });
  }
}
