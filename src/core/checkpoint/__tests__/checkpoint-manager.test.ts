/**
 * Checkpoint Manager Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { Deferred } from "../../../utils/async.js";
import { DeadLetterList, toDeadLetter } from "../../dead-letter/dead-letter-list.js";
import { DedupIndex } from "../../dedup/dedup-index.js";
import { HighWaterMarks } from "../../dedup/high-water-marks.js";
import { CheckpointError, ErrorCode, NotFoundError } from "../../errors.js";
import { FrontierQueue } from "../../frontier/frontier-queue.js";
import type { ICheckpointStorage } from "../../interfaces/ICheckpointStorage.js";
import { seedTask } from "../../models/task.js";
import { CHECKPOINT_VERSION } from "../checkpoint.js";
import { CheckpointManager } from "../checkpoint-manager.js";
import { FileCheckpointStorage, MemoryCheckpointStorage } from "../file-checkpoint-storage.js";

interface Parts {
  frontier: FrontierQueue;
  dedup: DedupIndex;
  deadLetters: DeadLetterList;
  highWater: HighWaterMarks;
}

function freshParts(): Parts {
  return {
    frontier: new FrontierQueue(),
    dedup: new DedupIndex(),
    deadLetters: new DeadLetterList(),
    highWater: new HighWaterMarks(),
  };
}

function managerFor(storage: ICheckpointStorage, parts: Parts, intervalMs = 60_000): CheckpointManager {
  return new CheckpointManager({ storage, intervalMs, ...parts });
}

describe("CheckpointManager", () => {
  let tempDir: string;
  let location: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "crawler-checkpoint-"));
    location = path.join(tempDir, "state", "checkpoint.json");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("returns null when no checkpoint exists", async () => {
    const manager = managerFor(new FileCheckpointStorage(location), freshParts());
    await expect(manager.restore()).resolves.toBeNull();
  });

  it("round-trips crawl state through a file", async () => {
    const before = freshParts();
    before.frontier.enqueue(seedTask({ kind: "channel", externalId: "a" }));
    before.frontier.enqueue(seedTask({ kind: "channel", externalId: "b" }));
    before.frontier.dequeue();
    before.frontier.markVisited("channel:a");
    before.frontier.enqueue(seedTask({ kind: "user", externalId: "in-flight" }));
    before.frontier.dequeue();
    before.dedup.recordCommitted("channel", "a");
    before.highWater.advance("a", 41);
    before.deadLetters.add(
      toDeadLetter(seedTask({ kind: "user", externalId: "gone" }), new NotFoundError("gone"), new Date("2024-03-01T00:00:00Z"))
    );

    const sequence = await managerFor(new FileCheckpointStorage(location), before).snapshot();
    expect(sequence).toBe(1);

    const after = freshParts();
    const summary = await managerFor(new FileCheckpointStorage(location), after).restore();

    expect(summary).toMatchObject({ sequence: 1, pending: 2, visited: 1, committed: 1, deadLetters: 1 });
    expect(after.dedup.keys()).toEqual(["channel:a"]);
    expect(after.highWater.get("a")).toBe(41);
    expect(after.deadLetters.list()).toEqual([
      {
        key: "user:gone",
        kind: "user",
        externalId: "gone",
        code: ErrorCode.FETCH_NOT_FOUND,
        cause: "gone",
        retries: 0,
        failedAt: "2024-03-01T00:00:00.000Z",
        requeued: false,
      },
    ]);
    expect(after.frontier.isVisited("channel:a")).toBe(true);
    const resumed = [after.frontier.dequeue(), after.frontier.dequeue()];
    expect(resumed.map((task) => [task?.externalId, task?.tier])).toEqual([
      ["in-flight", "resumed"],
      ["b", "resumed"],
    ]);
  });

  it("continues the sequence after a restore", async () => {
    const storage = new MemoryCheckpointStorage();
    await managerFor(storage, freshParts()).snapshot();
    await managerFor(storage, freshParts()).snapshot();

    const manager = managerFor(storage, freshParts());
    await manager.restore();
    expect(manager.lastSequence).toBe(1);
    await expect(manager.snapshot()).resolves.toBe(2);
  });

  it("rejects a file that is not JSON", async () => {
    await fs.mkdir(path.dirname(location), { recursive: true });
    await fs.writeFile(location, "{not json", "utf-8");

    const error = await managerFor(new FileCheckpointStorage(location), freshParts())
      .restore()
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CheckpointError);
    expect(error).toMatchObject({ code: ErrorCode.CHECKPOINT_READ_FAILED });
  });

  it("rejects a checkpoint written by a newer version", async () => {
    const storage = new MemoryCheckpointStorage();
    await storage.write(JSON.stringify({ version: CHECKPOINT_VERSION + 1, sequence: 3 }));

    await expect(managerFor(storage, freshParts()).restore()).rejects.toMatchObject({
      code: ErrorCode.CHECKPOINT_UNSUPPORTED_VERSION,
    });
  });

  it("rejects a checkpoint whose content does not match the schema", async () => {
    const storage = new MemoryCheckpointStorage();
    await storage.write(JSON.stringify({ version: CHECKPOINT_VERSION, sequence: 1, createdAt: "x", dedup: "nope" }));

    await expect(managerFor(storage, freshParts()).restore()).rejects.toThrow("is corrupt");
  });

  it("pauses dequeues only while capturing and writes after resuming", async () => {
    const parts = freshParts();
    const order: string[] = [];
    vi.spyOn(parts.frontier, "pauseDequeues").mockImplementation(() => order.push("pause"));
    vi.spyOn(parts.frontier, "resumeDequeues").mockImplementation(() => order.push("resume"));
    const storage: ICheckpointStorage = {
      location: "spy",
      read: async () => null,
      write: async () => {
        order.push("write");
      },
    };

    await managerFor(storage, parts).snapshot();

    expect(order).toEqual(["pause", "resume", "write"]);
  });

  it("shares a snapshot that is already running", async () => {
    const storage = new MemoryCheckpointStorage();
    const manager = managerFor(storage, freshParts());

    const [first, second] = await Promise.all([manager.snapshot(), manager.snapshot()]);

    expect(first).toBe(1);
    expect(second).toBe(1);
    expect(storage.writes).toBe(1);
  });

  it("treats a failed periodic write as fatal", async () => {
    const storage: ICheckpointStorage = {
      location: "broken",
      read: async () => null,
      write: async () => {
        throw new Error("disk full");
      },
    };
    const manager = managerFor(storage, freshParts(), 5);
    const fatal = new Deferred<CheckpointError>();
    manager.onFatal((error) => fatal.resolve(error));

    manager.start();
    const error = await fatal.promise;
    await manager.stop();

    expect(error.code).toBe(ErrorCode.CHECKPOINT_WRITE_FAILED);
    expect(error.message).toContain("disk full");
    expect(manager.state).toBe("stopped");
    expect(() => manager.start()).toThrow("stopped");
  });
});
