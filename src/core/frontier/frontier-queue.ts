/**
 * Frontier Queue
 *
 * Work queue of entities awaiting fetch. Owns the whole task lifecycle:
 *
 *   enqueue -> queued -> dequeue -> in flight -> markVisited (terminal)
 *                                     \-> requeue (retry tier, delayed)
 *
 * `revisit` reopens a visited key for a refresh pass.
 *
 * A key is accepted at most once while it is queued, in flight or visited,
 * which is what bounds cyclic discovery.
 *
 * @module
 */

import type { CancellationToken } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import type { EntityKey } from "../models/entity.js";
import { PRIORITY_TIERS, taskKey, type FrontierTask, type PriorityTier } from "../models/task.js";

const logger = createLogger("frontier");

export interface FrontierSnapshot {
  /** Queued and in-flight tasks, highest tier first */
  pending: FrontierTask[];
  visited: EntityKey[];
}

export interface FrontierStats {
  queued: number;
  inFlight: number;
  visited: number;
  byTier: Record<PriorityTier, number>;
  paused: boolean;
  closed: boolean;
}

export interface FrontierQueueOptions {
  /** Clock used for retry delays */
  now?: () => number;
}

export class FrontierQueue {
  private readonly tiers = new Map<PriorityTier, FrontierTask[]>(PRIORITY_TIERS.map((tier): [PriorityTier, FrontierTask[]] => [tier, []]));
  private readonly queued = new Map<EntityKey, FrontierTask>();
  private readonly inFlight = new Map<EntityKey, FrontierTask>();
  private readonly visited = new Set<EntityKey>();
  private readonly waiters = new Set<() => void>();
  private readonly now: () => number;
  private paused = false;
  private closed = false;

  constructor(options: FrontierQueueOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Adds a task unless its key is already queued, in flight or visited.
   *
   * @returns true if the task was added
   */
  enqueue(task: FrontierTask): boolean {
    const key = taskKey(task);
    if (this.visited.has(key) || this.queued.has(key) || this.inFlight.has(key)) {
      return false;
    }
    this.push(key, task);
    return true;
  }

  /**
   * Takes the next available task: highest tier first, FIFO inside a tier.
   * Returns undefined when paused, closed, empty, or when only retries that
   * are still waiting out their delay remain.
   */
  dequeue(): FrontierTask | undefined {
    if (this.paused || this.closed) return undefined;

    const now = this.now();
    for (const tier of PRIORITY_TIERS) {
      const list = this.tierList(tier);
      const index = list.findIndex((task) => task.availableAt <= now);
      if (index < 0) continue;

      const [task] = list.splice(index, 1);
      if (!task) continue;
      const key = taskKey(task);
      this.queued.delete(key);
      this.inFlight.set(key, task);
      return task;
    }
    return undefined;
  }

  /**
   * Waits for the next task. Resolves undefined once the frontier is drained
   * (nothing queued, nothing in flight), closed, or the token is cancelled.
   */
  async next(token?: CancellationToken): Promise<FrontierTask | undefined> {
    for (;;) {
      if (this.closed || token?.cancelled) return undefined;

      const task = this.dequeue();
      if (task) return task;
      if (this.isDrained()) return undefined;

      await this.waitForChange(token, this.paused ? undefined : this.nextRetryDelay());
    }
  }

  /**
   * Records the terminal outcome for a key. Later enqueues of the key are
   * no-ops.
   *
   * @returns false if the key was already visited
   */
  markVisited(key: EntityKey): boolean {
    if (this.visited.has(key)) return false;

    const queued = this.queued.get(key);
    if (queued) {
      this.queued.delete(key);
      const list = this.tierList(queued.tier);
      const index = list.indexOf(queued);
      if (index >= 0) list.splice(index, 1);
    }
    this.inFlight.delete(key);
    this.visited.add(key);
    this.notify();
    return true;
  }

  /**
   * Puts an in-flight task back at the lowest tier after `delayMs`. With
   * `countRetry: false` the task's retry count is left as it was.
   */
  requeue(task: FrontierTask, delayMs: number, options: { countRetry?: boolean } = {}): FrontierTask {
    const key = taskKey(task);
    this.inFlight.delete(key);

    const retried: FrontierTask = {
      ...task,
      tier: "retry",
      retries: options.countRetry === false ? task.retries : task.retries + 1,
      availableAt: this.now() + Math.max(0, delayMs),
    };
    this.push(key, retried);
    logger.debug({ key, retries: retried.retries, delayMs }, "Task requeued");
    return retried;
  }

  /**
   * Enqueues a task even if its key was visited before. Keys that are queued
   * or in flight are left alone.
   *
   * @returns true if the task was added
   */
  revisit(task: FrontierTask): boolean {
    const key = taskKey(task);
    if (this.queued.has(key) || this.inFlight.has(key)) return false;
    this.visited.delete(key);
    this.push(key, task);
    return true;
  }

  isVisited(key: EntityKey): boolean {
    return this.visited.has(key);
  }

  isDrained(): boolean {
    return this.queued.size === 0 && this.inFlight.size === 0;
  }

  /** Stops handing out tasks until {@link resumeDequeues}. In-flight work continues. */
  pauseDequeues(): void {
    this.paused = true;
  }

  resumeDequeues(): void {
    this.paused = false;
    this.notify();
  }

  /**
   * Stops all further dequeues and wakes every waiter. Enqueues are still
   * accepted so discoveries of commits finishing during shutdown reach the
   * final checkpoint.
   */
  close(): void {
    this.closed = true;
    this.notify();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  snapshot(): FrontierSnapshot {
    const pending: FrontierTask[] = [...this.inFlight.values()];
    for (const tier of PRIORITY_TIERS) {
      pending.push(...this.tierList(tier));
    }
    return {
      pending: pending.map((task) => ({ ...task })),
      visited: [...this.visited],
    };
  }

  /**
   * Loads a snapshot into an empty frontier. Pending tasks land in the
   * "resumed" tier, ahead of any seed enqueued afterwards.
   */
  restore(snapshot: FrontierSnapshot): void {
    if (this.queued.size > 0 || this.inFlight.size > 0 || this.visited.size > 0) {
      throw new Error("Frontier must be empty before restoring a snapshot");
    }
    for (const key of snapshot.visited) this.visited.add(key);
    for (const task of snapshot.pending) {
      this.enqueue({ ...task, tier: "resumed", availableAt: 0 });
    }
    logger.info({ pending: this.queued.size, visited: this.visited.size }, "Frontier restored");
  }

  stats(): FrontierStats {
    const byTier: Record<PriorityTier, number> = { resumed: 0, seed: 0, discovered: 0, retry: 0 };
    for (const tier of PRIORITY_TIERS) byTier[tier] = this.tierList(tier).length;
    return {
      queued: this.queued.size,
      inFlight: this.inFlight.size,
      visited: this.visited.size,
      byTier,
      paused: this.paused,
      closed: this.closed,
    };
  }

  private push(key: EntityKey, task: FrontierTask): void {
    this.queued.set(key, task);
    this.tierList(task.tier).push(task);
    this.notify();
  }

  private tierList(tier: PriorityTier): FrontierTask[] {
    let list = this.tiers.get(tier);
    if (!list) {
      list = [];
      this.tiers.set(tier, list);
    }
    return list;
  }

  private nextRetryDelay(): number | undefined {
    const retries = this.tierList("retry");
    if (retries.length === 0) return undefined;
    const earliest = Math.min(...retries.map((task) => task.availableAt));
    return Math.max(1, earliest - this.now());
  }

  private notify(): void {
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const wake of waiters) wake();
  }

  private waitForChange(token: CancellationToken | undefined, timeoutMs: number | undefined): Promise<void> {
    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      let unsubscribe: (() => void) | undefined;
      const done = (): void => {
        if (timer) clearTimeout(timer);
        unsubscribe?.();
        this.waiters.delete(done);
        resolve();
      };
      this.waiters.add(done);
      if (timeoutMs !== undefined) timer = setTimeout(done, timeoutMs);
      unsubscribe = token?.onCancel(done);
    });
  }
}
