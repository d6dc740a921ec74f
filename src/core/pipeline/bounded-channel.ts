/**
 * Bounded Channel
 *
 * FIFO hand-off between fetch and commit workers. A full channel makes
 * senders wait, which is what pushes back on fetching when commits lag.
 *
 * @module
 */

import { Deferred, type CancellationToken } from "../../utils/async.js";

export class BoundedChannel<T> {
  private readonly items: T[] = [];
  private readonly senders: Array<Deferred<void>> = [];
  private readonly receivers: Array<Deferred<void>> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (capacity < 1) {
      throw new RangeError(`Channel capacity must be at least 1, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Waits for room and appends the item.
   *
   * @returns false if the channel closed or the token was cancelled first
   */
  async send(item: T, token?: CancellationToken): Promise<boolean> {
    while (this.items.length >= this.capacity) {
      if (this.closed || token?.cancelled) return false;
      await this.park(this.senders, token);
    }
    if (this.closed) return false;
    this.items.push(item);
    this.wakeOne(this.receivers);
    return true;
  }

  /**
   * Waits for an item. Resolves undefined once the channel is closed and
   * empty, or when the token is cancelled.
   */
  async receive(token?: CancellationToken): Promise<T | undefined> {
    for (;;) {
      if (this.items.length > 0) {
        const item = this.items.shift();
        this.wakeOne(this.senders);
        return item;
      }
      if (this.closed || token?.cancelled) return undefined;
      await this.park(this.receivers, token);
    }
  }

  /** Rejects further sends; queued items can still be received. */
  close(): void {
    this.closed = true;
    for (const waiter of this.senders.splice(0)) waiter.resolve();
    for (const waiter of this.receivers.splice(0)) waiter.resolve();
  }

  private async park(queue: Array<Deferred<void>>, token?: CancellationToken): Promise<void> {
    const waiter = new Deferred<void>();
    queue.push(waiter);
    const unsubscribe = token?.onCancel(() => {
      const index = queue.indexOf(waiter);
      if (index >= 0) queue.splice(index, 1);
      waiter.resolve();
    });
    try {
      await waiter.promise;
    } finally {
      unsubscribe?.();
    }
  }

  private wakeOne(queue: Array<Deferred<void>>): void {
    queue.shift()?.resolve();
  }
}
