/**
 * Storage Tests
 *
 * The in-process stores are the contract reference for the database-backed
 * ones; the database stores are covered here through their error mapping and
 * row decoding, which run without a server.
 */

import { describe, it, expect } from "vitest";
import {
  EntityConflictError,
  ErrorCode,
  StoreError,
  TransientStoreError,
} from "../../errors.js";
import { edgeKey } from "../../models/entity.js";
import { openStores } from "../index.js";
import { serializeEdges, toStoredEntity } from "../entity-row.js";
import { MemoryGraphStore } from "../memory-graph-store.js";
import { MemoryRelationalStore } from "../memory-relational-store.js";
import { classifyNeo4jError } from "../neo4j-graph-store.js";
import { classifyPgError, HANDLE_INDEX } from "../postgres-relational-store.js";
import { channelResponse, item, ref } from "../../__tests__/test-helpers.js";

function driverError(message: string, fields: Record<string, unknown>): Error {
  return Object.assign(new Error(message), fields);
}

describe("classifyPgError", () => {
  it.each([
    ["40P01", "deadlock detected"],
    ["40001", "could not serialize access"],
    ["08006", "connection failure"],
    ["57P01", "terminating connection due to administrator command"],
    ["ECONNREFUSED", "connect ECONNREFUSED 127.0.0.1:5432"],
  ])("treats %s as transient", (code, message) => {
    const classified = classifyPgError(driverError(message, { code }));

    expect(classified).toBeInstanceOf(TransientStoreError);
    expect(classified.retryable).toBe(true);
  });

  it("treats a dropped connection without a code as transient", () => {
    expect(classifyPgError(new Error("Connection terminated unexpectedly"))).toBeInstanceOf(TransientStoreError);
  });

  it("maps a handle collision to an entity conflict", () => {
    const classified = classifyPgError(
      driverError("duplicate key value violates unique constraint", { code: "23505", constraint: HANDLE_INDEX })
    );

    expect(classified).toBeInstanceOf(EntityConflictError);
    expect(classified.retryable).toBe(false);
  });

  it("maps other failures to a permanent store error", () => {
    const classified = classifyPgError(driverError("syntax error at or near", { code: "42601" }), { operation: "upsert" });

    expect(classified).toBeInstanceOf(StoreError);
    expect(classified.code).toBe(ErrorCode.STORE_QUERY_FAILED);
    expect(classified.context).toMatchObject({ operation: "upsert", sqlstate: "42601", store: "relational" });
  });

  it("wraps values that are not errors", () => {
    expect(classifyPgError("boom").message).toBe("PostgreSQL failure: boom");
  });
});

describe("classifyNeo4jError", () => {
  it.each([
    [{ code: "ServiceUnavailable" }],
    [{ code: "SessionExpired" }],
    [{ code: "Neo.TransientError.Transaction.DeadlockDetected" }],
    [{ code: "Neo.ClientError.Cluster.NotALeader", retriable: true }],
  ])("treats %o as transient", (fields) => {
    const classified = classifyNeo4jError(driverError("graph failure", fields));

    expect(classified).toBeInstanceOf(TransientStoreError);
    expect(classified.context).toMatchObject({ store: "graph", neo4jCode: fields.code });
  });

  it("treats client errors as permanent", () => {
    const classified = classifyNeo4jError(
      driverError("Node already exists", { code: "Neo.ClientError.Schema.ConstraintValidationFailed" })
    );

    expect(classified).toBeInstanceOf(StoreError);
    expect(classified.retryable).toBe(false);
  });
});

describe("entity rows", () => {
  it("decodes a row read back from PostgreSQL", () => {
    const edges = [{ type: "MEMBER_OF", source: { kind: "channel", externalId: "chan_1" }, target: { kind: "user", externalId: "user_7" } }];
    const stored = toStoredEntity({
      kind: "channel",
      external_id: "chan_1",
      handle: "chan_one",
      payload: { title: "Channel chan_1" },
      outgoing_edges: edges,
      resolved: true,
      status: "committed",
      discovered_at: "2024-03-01T00:00:00Z",
      updated_at: new Date("2024-03-01T00:05:00Z"),
    });

    expect(stored).toEqual({
      kind: "channel",
      externalId: "chan_1",
      key: "channel:chan_1",
      handle: "chan_one",
      payload: { title: "Channel chan_1" },
      outgoingEdges: edges,
      resolved: true,
      status: "committed",
      discoveredAt: new Date("2024-03-01T00:00:00Z"),
      updatedAt: new Date("2024-03-01T00:05:00Z"),
    });
  });

  it("rejects a row with an unknown edge type", () => {
    expect(() =>
      toStoredEntity({
        kind: "user",
        external_id: "user_7",
        handle: null,
        payload: null,
        outgoing_edges: [{ type: "LIKES", source: { kind: "user", externalId: "a" }, target: { kind: "user", externalId: "b" } }],
        resolved: false,
        status: "pending",
        discovered_at: "2024-03-01T00:00:00Z",
        updated_at: "2024-03-01T00:00:00Z",
      })
    ).toThrow(StoreError);
  });

  it("serializes edges as plain references", () => {
    const { edges } = item(channelResponse("chan_1", [{ type: "MENTIONS", target: ref("user", "user_7") }]));

    expect(JSON.parse(serializeEdges(edges))).toEqual([
      { source: { kind: "channel", externalId: "chan_1" }, target: { kind: "user", externalId: "user_7" }, type: "MENTIONS" },
    ]);
  });
});

describe("MemoryRelationalStore", () => {
  it("turns a stub into a resolved row", async () => {
    const store = new MemoryRelationalStore();
    await expect(store.ensureStub({ kind: "channel", externalId: "chan_1" })).resolves.toBe(true);
    await expect(store.ensureStub({ kind: "channel", externalId: "chan_1" })).resolves.toBe(false);

    const { entity, edges } = item(channelResponse("chan_1"));
    await store.upsertEntity(entity, edges);

    await expect(store.findEntity(entity)).resolves.toMatchObject({ resolved: true, status: "pending" });
    await expect(store.stats()).resolves.toEqual({ total: 1, resolved: 1, stubs: 0, committed: 0, failed: 0 });
  });

  it("refuses a handle already owned by another entity of the same kind", async () => {
    const store = new MemoryRelationalStore();
    const first = item(channelResponse("chan_1", [], { username: "@News" }));
    const second = item(channelResponse("chan_2", [], { username: "news" }));
    await store.upsertEntity(first.entity, first.edges);

    await expect(store.upsertEntity(second.entity, second.edges)).rejects.toBeInstanceOf(EntityConflictError);
    await expect(store.upsertEntity(first.entity, first.edges)).resolves.toBeUndefined();
  });

  it("adds outgoing edges to those already stored", async () => {
    const store = new MemoryRelationalStore();
    const first = item(channelResponse("chan_1", [{ type: "MEMBER_OF", target: ref("user", "user_7") }]));
    const later = item(
      channelResponse("chan_1", [
        { type: "MEMBER_OF", target: ref("user", "user_8") },
        { type: "MEMBER_OF", target: ref("user", "user_7") },
      ])
    );
    await store.upsertEntity(first.entity, first.edges);
    await store.upsertEntity(later.entity, later.edges);

    const row = await store.findEntity(first.entity);

    expect(row?.outgoingEdges.map(edgeKey)).toEqual([
      "channel:chan_1-[MEMBER_OF]->user:user_7",
      "channel:chan_1-[MEMBER_OF]->user:user_8",
    ]);
  });

  it("lists resolved rows that are not committed, oldest first", async () => {
    const store = new MemoryRelationalStore();
    const a = item(channelResponse("chan_a"));
    const b = item(channelResponse("chan_b"));
    await store.upsertEntity(a.entity, a.edges);
    await store.upsertEntity(b.entity, b.edges);
    await store.ensureStub({ kind: "user", externalId: "user_7" });
    await store.markStatus(a.entity, "committed");

    const unconverged = await store.listUnconverged(10);

    expect(unconverged.map((row) => row.key)).toEqual(["channel:chan_b"]);
    await expect(store.listCommittedKeys()).resolves.toEqual(["channel:chan_a"]);
  });
});

describe("MemoryGraphStore", () => {
  it("merges edges on (source, target, type) and creates missing endpoints unresolved", async () => {
    const graph = new MemoryGraphStore();
    const { edges } = item(
      channelResponse("chan_1", [
        { type: "MEMBER_OF", target: ref("user", "user_7") },
        { type: "MENTIONS", target: ref("user", "user_7") },
      ])
    );

    await expect(graph.upsertEdges(edges)).resolves.toBe(2);
    await expect(graph.upsertEdges(edges)).resolves.toBe(0);

    expect(graph.allEdges().map(edgeKey)).toEqual([
      "channel:chan_1-[MEMBER_OF]->user:user_7",
      "channel:chan_1-[MENTIONS]->user:user_7",
    ]);
    expect(graph.getNode("user:user_7")).toEqual({
      key: "user:user_7",
      kind: "user",
      externalId: "user_7",
      label: "user_7",
      resolved: false,
    });
    await expect(graph.countNodes()).resolves.toBe(2);
  });
});

describe("openStores", () => {
  it("opens in-process stores for memory storage", async () => {
    const stores = await openStores({
      storage: "memory",
      postgres: {
        host: "localhost",
        port: 5432,
        database: "crawler",
        user: "crawler",
        maxConnections: 1,
      },
      neo4j: { uri: "bolt://localhost:7687", user: "neo4j" },
    });

    expect(stores.relational).toBeInstanceOf(MemoryRelationalStore);
    expect(stores.graph).toBeInstanceOf(MemoryGraphStore);
    await expect(stores.close()).resolves.toBeUndefined();
  });
});
