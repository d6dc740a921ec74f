/**
 * Configuration loading
 *
 * Sources, later ones winning: schema defaults, the JSON config file,
 * environment variables, then explicit overrides (CLI flags).
 *
 * @module
 */

import { ConfigurationError } from "../core/errors.js";
import { getCheckpointPath, getConfigPath, readJson } from "./index.js";
import { createLogger } from "./logger.js";
import { CrawlerConfigSchema, validate, type CrawlerConfig, type CrawlerConfigInput } from "./validation.js";

const logger = createLogger("config");

type Env = Record<string, string | undefined>;
type PlainObject = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Path of the JSON config file; missing files are fine unless explicit */
  configPath?: string;
  env?: Env;
  overrides?: CrawlerConfigInput;
}

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Recursively merges `override` into `base`. Arrays and scalars replace;
 * undefined values are ignored.
 */
export function mergeDeep(base: PlainObject, override: PlainObject): PlainObject {
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeDeep(current, value) : value;
  }
  return merged;
}

function numberFrom(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

function listFrom(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Maps environment variables onto the config shape. Numeric variables that
 * do not parse become NaN and fail validation with their path.
 */
export function configFromEnv(env: Env): PlainObject {
  return {
    seeds: listFrom(env.CRAWLER_SEEDS),
    platform: {
      baseUrl: env.PLATFORM_BASE_URL,
      token: env.PLATFORM_TOKEN,
    },
    postgres: {
      connectionString: env.POSTGRES_URL,
      host: env.POSTGRES_HOST,
      port: numberFrom(env.POSTGRES_PORT),
      database: env.POSTGRES_DB,
      user: env.POSTGRES_USER,
      password: env.POSTGRES_PASSWORD,
    },
    neo4j: {
      uri: env.NEO4J_URI,
      user: env.NEO4J_USER,
      password: env.NEO4J_PASSWORD,
      database: env.NEO4J_DATABASE,
    },
    rate: {
      requestsPerSecond: numberFrom(env.CRAWLER_RATE_LIMIT),
      maxConcurrentFetches: numberFrom(env.CRAWLER_MAX_CONCURRENCY),
    },
    checkpoint: {
      path: env.CHECKPOINT_PATH,
      intervalMs: numberFrom(env.CHECKPOINT_INTERVAL_MS),
    },
  };
}

/**
 * Builds the effective configuration.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function loadConfig(options: LoadConfigOptions = {}): CrawlerConfig {
  const configPath = options.configPath ?? getConfigPath();
  let fromFile: unknown;
  try {
    fromFile = readJson(configPath);
  } catch (error) {
    throw new ConfigurationError(`Config file ${configPath} is not valid JSON`, { configPath, cause: String(error) });
  }
  let raw: PlainObject = {};
  if (fromFile === null) {
    if (options.configPath !== undefined) {
      throw new ConfigurationError(`Config file ${configPath} does not exist`, { configPath });
    }
  } else if (isPlainObject(fromFile)) {
    raw = fromFile;
  } else {
    throw new ConfigurationError(`Config file ${configPath} must contain a JSON object`, { configPath });
  }

  raw = mergeDeep(raw, configFromEnv(options.env ?? process.env));
  if (options.overrides) raw = mergeDeep(raw, options.overrides);

  const result = validate(CrawlerConfigSchema, raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration:\n  ${result.errors.join("\n  ")}`, { issues: result.errors });
  }

  logger.debug({ configPath, seeds: result.data.seeds.length, storage: result.data.storage }, "Configuration loaded");
  return result.data;
}

export function resolveCheckpointPath(config: CrawlerConfig): string {
  return config.checkpoint.path ?? getCheckpointPath();
}
