/**
 * Token bucket limiter for platform requests.
 *
 * Waiters are served in arrival order. A rate-limit signal from the platform
 * blocks issuing until the advertised time, regardless of tokens on hand.
 *
 * @module
 */

import { sleep, type CancellationToken } from "../../utils/async.js";

export interface TokenBucketOptions {
  /** Refill rate in tokens per second */
  ratePerSecond: number;
  /** Bucket capacity; also the initial fill */
  burst: number;
  now?: () => number;
}

export class TokenBucket {
  private readonly ratePerSecond: number;
  private readonly burst: number;
  private readonly now: () => number;
  private tokens: number;
  private lastRefill: number;
  private blockedUntil = 0;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: TokenBucketOptions) {
    if (options.ratePerSecond <= 0) {
      throw new RangeError(`Token rate must be positive, got ${options.ratePerSecond}`);
    }
    this.ratePerSecond = options.ratePerSecond;
    this.burst = Math.max(1, options.burst);
    this.now = options.now ?? Date.now;
    this.tokens = this.burst;
    this.lastRefill = this.now();
  }

  /**
   * Waits for a token.
   *
   * @returns false if the token was cancelled before one became available
   */
  acquire(token?: CancellationToken): Promise<boolean> {
    const turn = this.tail.then(() => this.take(token));
    this.tail = turn;
    return turn;
  }

  /** Stops issuing tokens until `untilMs` (epoch ms). Extends, never shortens. */
  blockUntil(untilMs: number): void {
    this.blockedUntil = Math.max(this.blockedUntil, untilMs);
    this.lastRefill = Math.max(this.lastRefill, this.blockedUntil);
    this.tokens = 0;
  }

  get available(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  private async take(token?: CancellationToken): Promise<boolean> {
    for (;;) {
      if (token?.cancelled) return false;

      const now = this.now();
      if (now < this.blockedUntil) {
        await sleep(this.blockedUntil - now, token);
        continue;
      }

      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return true;
      }
      await sleep(Math.ceil(((1 - this.tokens) / this.ratePerSecond) * 1000), token);
    }
  }

  private refill(): void {
    const now = this.now();
    const elapsedMs = now - this.lastRefill;
    if (elapsedMs <= 0) return;
    this.tokens = Math.min(this.burst, this.tokens + (elapsedMs / 1000) * this.ratePerSecond);
    this.lastRefill = now;
  }
}
