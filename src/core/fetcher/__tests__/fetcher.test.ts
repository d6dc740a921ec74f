/**
 * Fetcher Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CancellationTokenSource } from "../../../utils/async.js";
import { DedupIndex } from "../../dedup/dedup-index.js";
import { HighWaterMarks } from "../../dedup/high-water-marks.js";
import { EntityConflictError, MalformedPayloadError, NotFoundError, RateLimitedError } from "../../errors.js";
import { RateGovernor, type RateGovernorOptions } from "../../governor/rate-governor.js";
import type { EntityKind } from "../../models/entity.js";
import { discoveredTask, refreshTask, seedTask } from "../../models/task.js";
import { FixturePlatformClient } from "../../platform/fixture-platform-client.js";
import { createCrawlerEventBus } from "../../telemetry/events.js";
import { Fetcher } from "../fetcher.js";
import { channelResponse, fixtures, item, ref, userResponse } from "../../__tests__/test-helpers.js";

function governorWith(overrides: Partial<RateGovernorOptions> = {}): RateGovernor {
  return new RateGovernor({
    requestsPerSecond: 10_000,
    burst: 1_000,
    maxConcurrentFetches: 5,
    minConcurrentFetches: 1,
    maxConcurrentCommits: 4,
    latencyThresholdMs: 60_000,
    latencyWindow: 50,
    adjustEvery: 10,
    ...overrides,
  });
}

describe("Fetcher", () => {
  let dedup: DedupIndex;
  let highWater: HighWaterMarks;

  beforeEach(() => {
    dedup = new DedupIndex();
    highWater = new HighWaterMarks();
  });

  function fetcherFor(
    platform: FixturePlatformClient,
    options: { governor?: RateGovernor; maxDepth?: number; followKinds?: EntityKind[] } = {}
  ): Fetcher {
    return new Fetcher({
      platform,
      dedup: dedup.asReadonly(),
      highWater,
      governor: options.governor ?? governorWith(),
      maxDepth: options.maxDepth ?? 3,
      followKinds: options.followKinds ?? ["channel", "message", "user"],
    });
  }

  it("never runs more platform calls at once than the fetch permits allow", async () => {
    const users = Array.from({ length: 20 }, (_, i) => userResponse(`u${i}`));
    const platform = new FixturePlatformClient(fixtures(...users), { latencyMs: 10 });
    const fetcher = fetcherFor(platform);

    const outcomes = await Promise.all(
      users.map((user) => fetcher.fetch(seedTask({ kind: "user", externalId: user.id })))
    );

    expect(outcomes.every((outcome) => outcome.status === "fetched")).toBe(true);
    expect(platform.requests).toHaveLength(20);
    expect(platform.maxConcurrent).toBe(5);
  });

  it("skips entities that are already committed without calling the platform", async () => {
    const events = createCrawlerEventBus();
    const skipped: string[] = [];
    events.on("task:skipped", ({ key }) => skipped.push(key));
    dedup.recordCommitted("user", "u1");
    const platform = new FixturePlatformClient(fixtures(userResponse("u1")));
    const fetcher = new Fetcher({
      platform,
      dedup: dedup.asReadonly(),
      highWater,
      governor: governorWith(),
      events,
      maxDepth: 3,
      followKinds: ["user"],
    });

    await expect(fetcher.fetch(seedTask({ kind: "user", externalId: "u1" }))).resolves.toEqual({ status: "skipped" });
    expect(platform.requests).toHaveLength(0);
    expect(skipped).toEqual(["user:u1"]);
  });

  it("asks for channel messages after the high-water mark", async () => {
    highWater.advance("chan_1", 120);
    const platform = new FixturePlatformClient(fixtures(channelResponse("chan_1"), userResponse("u1")));
    const fetcher = fetcherFor(platform);

    await fetcher.fetch(seedTask({ kind: "channel", externalId: "chan_1" }));
    await fetcher.fetch(seedTask({ kind: "user", externalId: "u1" }));

    expect(platform.requests).toEqual([
      { kind: "channel", externalId: "chan_1", sinceMessageId: 120 },
      { kind: "user", externalId: "u1", sinceMessageId: undefined },
    ]);
  });

  it("fetches a committed channel again for a refresh task", async () => {
    dedup.recordCommitted("channel", "chan_1");
    highWater.advance("chan_1", 120);
    const platform = new FixturePlatformClient(fixtures(channelResponse("chan_1")));
    const fetcher = fetcherFor(platform);

    const outcome = await fetcher.fetch(refreshTask({ kind: "channel", externalId: "chan_1" }));

    expect(outcome.status).toBe("fetched");
    expect(platform.requests).toEqual([{ kind: "channel", externalId: "chan_1", sinceMessageId: 120 }]);
  });

  it("reports cancellation while waiting for a permit", async () => {
    const source = new CancellationTokenSource();
    source.cancel("shutdown");
    const platform = new FixturePlatformClient(fixtures(userResponse("u1")));

    const outcome = await fetcherFor(platform).fetch(seedTask({ kind: "user", externalId: "u1" }), source.token);

    expect(outcome).toEqual({ status: "cancelled" });
    expect(platform.requests).toHaveLength(0);
  });

  it("pauses the governor when the platform rate limits", async () => {
    const governor = governorWith();
    const platform = new FixturePlatformClient(fixtures(userResponse("u1")));
    platform.script("user:u1", [{ type: "rate-limited", retryAfterMs: 5_000 }]);

    await expect(fetcherFor(platform, { governor }).fetch(seedTask({ kind: "user", externalId: "u1" }))).rejects.toBeInstanceOf(
      RateLimitedError
    );
    expect(governor.state()).toMatchObject({ availableTokens: 0, fetchesInFlight: 0 });
  });

  it("passes platform failures through and releases the permit", async () => {
    const governor = governorWith({ maxConcurrentFetches: 1 });
    const platform = new FixturePlatformClient({});

    await expect(fetcherFor(platform, { governor }).fetch(seedTask({ kind: "user", externalId: "nobody" }))).rejects.toBeInstanceOf(
      NotFoundError
    );
    expect(governor.state().fetchesInFlight).toBe(0);
  });

  it("rejects payloads that do not parse", async () => {
    const platform = new FixturePlatformClient({ "user:u1": { kind: "user", id: "u1", payload: {} } });

    await expect(fetcherFor(platform).fetch(seedTask({ kind: "user", externalId: "u1" }))).rejects.toBeInstanceOf(
      MalformedPayloadError
    );
  });

  it("rejects a response for a different entity", async () => {
    const platform = new FixturePlatformClient({ "user:u1": userResponse("u2") });

    await expect(fetcherFor(platform).fetch(seedTask({ kind: "user", externalId: "u1" }))).rejects.toBeInstanceOf(
      EntityConflictError
    );
  });

  describe("discoverEndpoints", () => {
    const chan1 = () =>
      item(
        channelResponse("chan_1", [
          { type: "MEMBER_OF", source: ref("user", "user_7"), target: ref("channel", "chan_1") },
          { type: "MEMBER_OF", source: ref("user", "user_8"), target: ref("channel", "chan_1") },
          { type: "SIMILAR_TO", target: ref("channel", "chan_2") },
          { type: "MENTIONS", target: ref("user", "user_7") },
        ])
      );

    it("returns each new endpoint once, one level deeper, tagged with its origin", () => {
      const parent = seedTask({ kind: "channel", externalId: "chan_1" });
      const found = fetcherFor(new FixturePlatformClient({})).discoverEndpoints(chan1(), parent);

      expect(found.map((task) => [task.kind, task.externalId, task.tier, task.depth, task.origin])).toEqual([
        ["user", "user_7", "discovered", 1, "channel:chan_1"],
        ["user", "user_8", "discovered", 1, "channel:chan_1"],
        ["channel", "chan_2", "discovered", 1, "channel:chan_1"],
      ]);
    });

    it("leaves out committed endpoints and kinds that are not followed", () => {
      dedup.recordCommitted("user", "user_8");
      const parent = seedTask({ kind: "channel", externalId: "chan_1" });
      const found = fetcherFor(new FixturePlatformClient({}), { followKinds: ["user"] }).discoverEndpoints(chan1(), parent);

      expect(found.map((task) => task.externalId)).toEqual(["user_7"]);
    });

    it("stops at the depth limit", () => {
      const root = seedTask({ kind: "channel", externalId: "root" });
      const parent = discoveredTask({ kind: "channel", externalId: "chan_1" }, root);

      expect(fetcherFor(new FixturePlatformClient({}), { maxDepth: 1 }).discoverEndpoints(chan1(), parent)).toEqual([]);
    });
  });
});
