/**
 * Frontier Queue Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CancellationTokenSource } from "../../../utils/async.js";
import { discoveredTask, refreshTask, seedTask, type FrontierTask } from "../../models/task.js";
import { FrontierQueue } from "../frontier-queue.js";

const chan = (id: string) => ({ kind: "channel" as const, externalId: id });
const user = (id: string) => ({ kind: "user" as const, externalId: id });

describe("FrontierQueue", () => {
  let clock: number;
  let frontier: FrontierQueue;

  beforeEach(() => {
    clock = 1_000;
    frontier = new FrontierQueue({ now: () => clock });
  });

  describe("enqueue", () => {
    it("accepts a key once while it is queued", () => {
      expect(frontier.enqueue(seedTask(chan("a")))).toBe(true);
      expect(frontier.enqueue(seedTask(chan("a")))).toBe(false);
      expect(frontier.stats().queued).toBe(1);
    });

    it("rejects a key that is in flight", () => {
      frontier.enqueue(seedTask(chan("a")));
      frontier.dequeue();
      expect(frontier.enqueue(seedTask(chan("a")))).toBe(false);
    });

    it("rejects a key that was visited", () => {
      frontier.enqueue(seedTask(chan("a")));
      frontier.dequeue();
      frontier.markVisited("channel:a");
      expect(frontier.enqueue(seedTask(chan("a")))).toBe(false);
    });

    it("treats the same id under different kinds as different keys", () => {
      expect(frontier.enqueue(seedTask(chan("42")))).toBe(true);
      expect(frontier.enqueue(seedTask(user("42")))).toBe(true);
    });
  });

  describe("dequeue", () => {
    it("serves resumed, then seed, then discovered, then retry", () => {
      const parent = seedTask(chan("root"));
      frontier.enqueue(discoveredTask(chan("d"), parent));
      frontier.enqueue(seedTask(chan("s")));
      frontier.enqueue({ ...seedTask(chan("r")), tier: "resumed" });

      frontier.enqueue(seedTask(chan("x")));
      const retried = frontier.dequeue();
      expect(retried?.externalId).toBe("r");
      if (!retried) throw new Error("expected a task");

      frontier.requeue(retried, 0);
      const order = [frontier.dequeue(), frontier.dequeue(), frontier.dequeue(), frontier.dequeue()].map(
        (task) => task?.externalId
      );
      expect(order).toEqual(["s", "x", "d", "r"]);
    });

    it("is FIFO inside a tier", () => {
      for (const id of ["1", "2", "3"]) frontier.enqueue(seedTask(chan(id)));
      expect([frontier.dequeue(), frontier.dequeue(), frontier.dequeue()].map((t) => t?.externalId)).toEqual([
        "1",
        "2",
        "3",
      ]);
    });

    it("holds back a retry until its delay has passed", () => {
      frontier.enqueue(seedTask(chan("a")));
      const task = frontier.dequeue();
      if (!task) throw new Error("expected a task");
      const retried = frontier.requeue(task, 500);

      expect(retried.retries).toBe(1);
      expect(retried.tier).toBe("retry");
      expect(retried.availableAt).toBe(1_500);
      expect(frontier.dequeue()).toBeUndefined();

      clock = 1_500;
      expect(frontier.dequeue()?.externalId).toBe("a");
    });

    it("keeps the retry count when asked not to count the retry", () => {
      frontier.enqueue(seedTask(chan("a")));
      const task = frontier.dequeue();
      if (!task) throw new Error("expected a task");

      const retried = frontier.requeue(task, 0, { countRetry: false });

      expect(retried).toMatchObject({ retries: 0, tier: "retry" });
      expect(frontier.dequeue()?.externalId).toBe("a");
    });

    it("returns nothing while paused", () => {
      frontier.enqueue(seedTask(chan("a")));
      frontier.pauseDequeues();
      expect(frontier.dequeue()).toBeUndefined();
      frontier.resumeDequeues();
      expect(frontier.dequeue()?.externalId).toBe("a");
    });
  });

  describe("markVisited", () => {
    it("is idempotent", () => {
      frontier.enqueue(seedTask(chan("a")));
      frontier.dequeue();
      expect(frontier.markVisited("channel:a")).toBe(true);
      expect(frontier.markVisited("channel:a")).toBe(false);
      expect(frontier.stats().visited).toBe(1);
    });

    it("removes a task that is still queued", () => {
      frontier.enqueue(seedTask(chan("a")));
      frontier.markVisited("channel:a");
      expect(frontier.dequeue()).toBeUndefined();
      expect(frontier.isDrained()).toBe(true);
    });
  });

  describe("revisit", () => {
    it("reopens a visited key", () => {
      frontier.enqueue(seedTask(chan("a")));
      frontier.dequeue();
      frontier.markVisited("channel:a");

      expect(frontier.revisit(refreshTask(chan("a")))).toBe(true);
      expect(frontier.isVisited("channel:a")).toBe(false);
      expect(frontier.dequeue()).toMatchObject({ externalId: "a", tier: "seed", refresh: true });
    });

    it("leaves a queued or in-flight key alone", () => {
      frontier.enqueue(seedTask(chan("a")));
      expect(frontier.revisit(refreshTask(chan("a")))).toBe(false);
      frontier.dequeue();
      expect(frontier.revisit(refreshTask(chan("a")))).toBe(false);
      expect(frontier.stats()).toMatchObject({ queued: 0, inFlight: 1 });
    });
  });

  describe("cycles", () => {
    it("visits each entity of A -> B -> A once", () => {
      const a = seedTask(chan("A"));
      frontier.enqueue(a);
      const first = frontier.dequeue();
      if (!first) throw new Error("expected a task");
      frontier.enqueue(discoveredTask(chan("B"), first));
      frontier.markVisited("channel:A");

      const second = frontier.dequeue();
      if (!second) throw new Error("expected a task");
      expect(frontier.enqueue(discoveredTask(chan("A"), second))).toBe(false);
      frontier.markVisited("channel:B");

      expect(frontier.dequeue()).toBeUndefined();
      expect(frontier.isDrained()).toBe(true);
      expect(frontier.stats().visited).toBe(2);
    });
  });

  describe("next", () => {
    it("resolves undefined when the frontier is drained", async () => {
      await expect(frontier.next()).resolves.toBeUndefined();
    });

    it("waits for a task that is still in flight to produce work", async () => {
      frontier.enqueue(seedTask(chan("a")));
      const task = frontier.dequeue();
      if (!task) throw new Error("expected a task");

      const pending = frontier.next();
      frontier.enqueue(discoveredTask(chan("b"), task));
      frontier.markVisited("channel:a");

      const next = await pending;
      expect(next?.externalId).toBe("b");
      expect(next?.depth).toBe(1);
      expect(next?.origin).toBe("channel:a");
    });

    it("resolves undefined once the last in-flight task is visited", async () => {
      frontier.enqueue(seedTask(chan("a")));
      frontier.dequeue();
      const pending = frontier.next();
      frontier.markVisited("channel:a");
      await expect(pending).resolves.toBeUndefined();
    });

    it("resolves undefined on close", async () => {
      frontier.enqueue(seedTask(chan("a")));
      frontier.dequeue();
      const pending = frontier.next();
      frontier.close();
      await expect(pending).resolves.toBeUndefined();
      expect(frontier.isClosed).toBe(true);
    });

    it("resolves undefined when the token is cancelled", async () => {
      frontier.enqueue(seedTask(chan("a")));
      frontier.dequeue();
      const source = new CancellationTokenSource();
      const pending = frontier.next(source.token);
      source.cancel("test");
      await expect(pending).resolves.toBeUndefined();
    });

    it("accepts enqueues after close", () => {
      frontier.close();
      expect(frontier.enqueue(seedTask(chan("late")))).toBe(true);
      expect(frontier.dequeue()).toBeUndefined();
    });
  });

  describe("snapshot and restore", () => {
    it("captures in-flight tasks as pending alongside the queue", () => {
      frontier.enqueue(seedTask(chan("a")));
      frontier.enqueue(seedTask(chan("b")));
      frontier.enqueue(seedTask(chan("c")));
      frontier.dequeue();
      frontier.markVisited("channel:a");
      frontier.dequeue();

      const snapshot = frontier.snapshot();
      expect(snapshot.pending.map((task) => task.externalId)).toEqual(["b", "c"]);
      expect(snapshot.visited).toEqual(["channel:a"]);
    });

    it("restores pending tasks into the resumed tier ahead of new seeds", () => {
      const pending: FrontierTask[] = [{ ...seedTask(chan("old")), tier: "retry", retries: 2, availableAt: 99_999 }];
      frontier.restore({ pending, visited: ["channel:done"] });
      frontier.enqueue(seedTask(chan("new")));

      const first = frontier.dequeue();
      expect(first?.externalId).toBe("old");
      expect(first?.tier).toBe("resumed");
      expect(first?.retries).toBe(2);
      expect(frontier.isVisited("channel:done")).toBe(true);
      expect(frontier.enqueue(seedTask(chan("done")))).toBe(false);
    });

    it("refuses to restore into a frontier that has work", () => {
      frontier.enqueue(seedTask(chan("a")));
      expect(() => frontier.restore({ pending: [], visited: [] })).toThrow("must be empty");
    });
  });
});
