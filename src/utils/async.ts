/**
 * Async Utility Functions
 *
 * Provides common async patterns: deferred promises, timeouts, retries,
 * counting semaphores and cancellation support.
 *
 * @module
 */

// =============================================================================
// Deferred Promise
// =============================================================================

/**
 * A Promise with externally accessible resolve/reject methods.
 */
export class Deferred<T> {
  readonly promise: Promise<T>;
  resolve!: (value: T | PromiseLike<T>) => void;
  reject!: (reason?: unknown) => void;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}

// =============================================================================
// Timeout
// =============================================================================

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

/**
 * Wraps a promise with a timeout.
 * Rejects with a TimeoutError if the promise doesn't settle in time.
 */
export async function timeout<T>(promise: Promise<T>, ms: number, message = "Operation timed out"): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new TimeoutError(message)), ms);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

// =============================================================================
// Sleep
// =============================================================================

/**
 * Resolves after `ms`. When a token is given, resolves early on cancellation.
 */
export function sleep(ms: number, token?: CancellationToken): Promise<void> {
  return new Promise((resolve) => {
    if (token?.cancelled) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      unsubscribe?.();
      resolve();
    }, ms);
    const unsubscribe = token?.onCancel(() => {
      clearTimeout(timer);
      resolve();
    });
  });
}

// =============================================================================
// Semaphore
// =============================================================================

/**
 * Counting semaphore whose permit limit can be changed while in use.
 * Narrowing the limit never revokes permits already handed out; it only
 * delays new acquisitions until enough holders release.
 */
export class Semaphore {
  private _limit: number;
  private _inUse = 0;
  private _waiters: Array<Deferred<void>> = [];

  constructor(limit: number) {
    if (limit < 1) {
      throw new RangeError(`Semaphore limit must be at least 1, got ${limit}`);
    }
    this._limit = limit;
  }

  get limit(): number {
    return this._limit;
  }

  get inUse(): number {
    return this._inUse;
  }

  get waiting(): number {
    return this._waiters.length;
  }

  /** Acquires a permit, waiting in FIFO order. Returns false if cancelled first. */
  async acquire(token?: CancellationToken): Promise<boolean> {
    if (token?.cancelled) return false;
    if (this._inUse < this._limit && this._waiters.length === 0) {
      this._inUse++;
      return true;
    }

    const waiter = new Deferred<void>();
    this._waiters.push(waiter);
    const unsubscribe = token?.onCancel(() => {
      const idx = this._waiters.indexOf(waiter);
      if (idx >= 0) this._waiters.splice(idx, 1);
      waiter.reject(new Error("cancelled"));
    });

    try {
      await waiter.promise;
      return true;
    } catch {
      return false;
    } finally {
      unsubscribe?.();
    }
  }

  release(): void {
    if (this._inUse === 0) {
      throw new Error("Semaphore released more times than acquired");
    }
    this._inUse--;
    this.drain();
  }

  setLimit(limit: number): void {
    this._limit = Math.max(1, limit);
    this.drain();
  }

  private drain(): void {
    while (this._inUse < this._limit) {
      const next = this._waiters.shift();
      if (!next) return;
      this._inUse++;
      next.resolve();
    }
  }
}

// =============================================================================
// Retry
// =============================================================================

export interface RetryOptions {
  /** Maximum number of attempts (including initial attempt) */
  maxAttempts: number;
  /** Initial delay between retries in milliseconds */
  initialDelayMs: number;
  /** Maximum delay between retries in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffFactor: number;
  /** Optional predicate to determine if error is retryable */
  retryIf?: (error: unknown) => boolean;
  /** Optional callback on each retry */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffFactor: 2,
};

/**
 * Delay before retry number `attempt` (1-based).
 */
export function backoffDelay(
  attempt: number,
  opts: Pick<RetryOptions, "initialDelayMs" | "maxDelayMs" | "backoffFactor">
): number {
  const raw = opts.initialDelayMs * Math.pow(opts.backoffFactor, Math.max(0, attempt - 1));
  return Math.min(raw, opts.maxDelayMs);
}

/**
 * Retries a function with exponential backoff.
 */
export async function retry<T>(fn: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }
      if (attempt === opts.maxAttempts) {
        throw error;
      }

      const delay = backoffDelay(attempt, opts);
      opts.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }

  throw lastError;
}

// =============================================================================
// Cancellation
// =============================================================================

/**
 * A token that can be used to cancel async operations.
 * Follows the cancellation token pattern for cooperative cancellation.
 */
export class CancellationToken {
  private _cancelled = false;
  private _reason?: string;
  private listeners: Array<() => void> = [];

  get cancelled(): boolean {
    return this._cancelled;
  }

  get reason(): string | undefined {
    return this._reason;
  }

  cancel(reason?: string): void {
    if (!this._cancelled) {
      this._cancelled = true;
      this._reason = reason;
      const listeners = this.listeners;
      this.listeners = [];
      listeners.forEach((fn) => fn());
    }
  }

  /**
   * Registers a callback to be called when the token is cancelled.
   * If already cancelled, the callback is invoked immediately.
   *
   * @returns Unsubscribe function
   */
  onCancel(fn: () => void): () => void {
    if (this._cancelled) {
      fn();
      return () => {};
    }
    this.listeners.push(fn);
    return () => {
      const idx = this.listeners.indexOf(fn);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}

/**
 * A CancellationToken source that owns and can cancel a token.
 */
export class CancellationTokenSource {
  readonly token: CancellationToken;

  constructor() {
    this.token = new CancellationToken();
  }

  cancel(reason?: string): void {
    this.token.cancel(reason);
  }
}
