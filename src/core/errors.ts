/**
 * Error Classes for graph-crawler
 * Structured error handling with error codes and a retry classification
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Fetch errors (1xxx)
  FETCH_TRANSIENT = "E1000",
  FETCH_RATE_LIMITED = "E1001",
  FETCH_NOT_FOUND = "E1002",
  FETCH_REJECTED = "E1003",

  // Payload errors (2xxx)
  PAYLOAD_MALFORMED = "E2000",
  PAYLOAD_UNKNOWN_KIND = "E2001",

  // Store errors (3xxx)
  STORE_TRANSIENT = "E3000",
  STORE_QUERY_FAILED = "E3001",
  STORE_ENTITY_CONFLICT = "E3002",

  // Checkpoint errors (4xxx)
  CHECKPOINT_WRITE_FAILED = "E4000",
  CHECKPOINT_READ_FAILED = "E4001",
  CHECKPOINT_UNSUPPORTED_VERSION = "E4002",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all crawler errors
 */
export class CrawlerError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  /** Whether the failed operation may succeed if attempted again */
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
    retryable = false
  ) {
    super(message);
    this.name = "CrawlerError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;
    this.retryable = retryable;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retryable: this.retryable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * A store rejected or dropped a write for a reason that may clear up
 * (connection loss, deadlock, serialization failure, leader switch).
 */
export class TransientStoreError extends CrawlerError {
  public readonly store: "relational" | "graph";

  constructor(message: string, store: "relational" | "graph", context?: Record<string, unknown>) {
    super(message, ErrorCode.STORE_TRANSIENT, { ...context, store }, true);
    this.name = "TransientStoreError";
    this.store = store;
  }
}

/**
 * A store failed in a way retrying will not fix (bad query, constraint
 * other than the idempotency key).
 */
export class StoreError extends CrawlerError {
  public readonly store: "relational" | "graph";

  constructor(message: string, store: "relational" | "graph", context?: Record<string, unknown>) {
    super(message, ErrorCode.STORE_QUERY_FAILED, { ...context, store });
    this.name = "StoreError";
    this.store = store;
  }
}

export class TransientFetchError extends CrawlerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.FETCH_TRANSIENT, context, true);
    this.name = "TransientFetchError";
  }
}

/**
 * The platform asked us to slow down. `retryAfterMs` is its advertised wait.
 */
export class RateLimitedError extends CrawlerError {
  public readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number, context?: Record<string, unknown>) {
    super(message, ErrorCode.FETCH_RATE_LIMITED, { ...context, retryAfterMs }, true);
    this.name = "RateLimitedError";
    this.retryAfterMs = retryAfterMs;
  }
}

export class NotFoundError extends CrawlerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.FETCH_NOT_FOUND, context);
    this.name = "NotFoundError";
  }
}

/**
 * The platform refused the request for a reason retrying will not change
 * (bad request, missing permission).
 */
export class FetchRejectedError extends CrawlerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.FETCH_REJECTED, context);
    this.name = "FetchRejectedError";
  }
}

/**
 * Same identifier, incompatible kind or a clashing unique handle.
 * Never retried; the task goes straight to the dead-letter list.
 */
export class EntityConflictError extends CrawlerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.STORE_ENTITY_CONFLICT, context);
    this.name = "EntityConflictError";
  }
}

export class MalformedPayloadError extends CrawlerError {
  public readonly issues: string[];

  constructor(
    message: string,
    issues: string[] = [],
    code: ErrorCode = ErrorCode.PAYLOAD_MALFORMED,
    context?: Record<string, unknown>
  ) {
    super(message, code, { ...context, issues });
    this.name = "MalformedPayloadError";
    this.issues = issues;
  }
}

/**
 * Checkpoint storage failed. Durability beats liveness: this halts ingestion.
 */
export class CheckpointError extends CrawlerError {
  constructor(message: string, code: ErrorCode = ErrorCode.CHECKPOINT_WRITE_FAILED, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "CheckpointError";
  }
}

export class ConfigurationError extends CrawlerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigurationError";
  }
}

export function isCrawlerError(error: unknown): error is CrawlerError {
  return error instanceof CrawlerError;
}

export function isTransientStoreError(error: unknown): error is TransientStoreError {
  return error instanceof TransientStoreError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null) return JSON.stringify(error);
  return String(error);
}
