/**
 * Platform Client Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import {
  ConfigurationError,
  ErrorCode,
  FetchRejectedError,
  NotFoundError,
  RateLimitedError,
  TransientFetchError,
} from "../../errors.js";
import { createPlatformClient } from "../index.js";
import { FixturePlatformClient } from "../fixture-platform-client.js";
import { DEFAULT_RETRY_AFTER_MS, HttpPlatformClient, parseRetryAfter } from "../http-platform-client.js";
import { channelResponse, userResponse } from "../../__tests__/test-helpers.js";

interface RecordedRequest {
  url: string;
  headers: Headers;
}

function stubFetch(respond: () => Response | Promise<Response>): { fetch: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({ url: String(input), headers: new Headers(init?.headers) });
    return respond();
  };
  return { fetch: fetchImpl, requests };
}

const json = (body: unknown, init: ResponseInit = {}): Response =>
  new Response(JSON.stringify(body), { status: 200, headers: { "content-type": "application/json" }, ...init });

describe("parseRetryAfter", () => {
  const now = Date.parse("2024-03-01T00:00:00Z");

  it("reads delta-seconds", () => {
    expect(parseRetryAfter("3", now)).toBe(3_000);
    expect(parseRetryAfter("0.5", now)).toBe(500);
  });

  it("reads an HTTP date", () => {
    expect(parseRetryAfter("Fri, 01 Mar 2024 00:00:05 GMT", now)).toBe(5_000);
    expect(parseRetryAfter("Thu, 29 Feb 2024 23:59:00 GMT", now)).toBe(0);
  });

  it("falls back when the header is missing or unreadable", () => {
    expect(parseRetryAfter(null, now)).toBe(DEFAULT_RETRY_AFTER_MS);
    expect(parseRetryAfter("soon", now)).toBe(DEFAULT_RETRY_AFTER_MS);
  });
});

describe("HttpPlatformClient", () => {
  function client(respond: () => Response | Promise<Response>, timeoutMs = 1_000) {
    const stub = stubFetch(respond);
    const http = new HttpPlatformClient({
      baseUrl: "https://platform.test/api/",
      token: "test-secret",
      timeoutMs,
      fetch: stub.fetch,
      now: () => Date.parse("2024-03-01T00:00:00Z"),
    });
    return { http, requests: stub.requests };
  }

  it("requests the entity endpoint with credentials and the since parameter", async () => {
    const body = channelResponse("chan_1");
    const { http, requests } = client(() => json(body));

    await expect(http.fetchEntity({ kind: "channel", externalId: "chan_1", sinceMessageId: 120 })).resolves.toEqual(body);

    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe("https://platform.test/api/entities/channel/chan_1?since=120");
    expect(requests[0]?.headers.get("authorization")).toBe("Bearer test-secret");
    expect(requests[0]?.headers.get("accept")).toBe("application/json");
  });

  it("escapes identifiers in the path", () => {
    const { http } = client(() => json({}));

    expect(http.entityUrl({ kind: "user", externalId: "a/b c" })).toBe("https://platform.test/api/entities/user/a%2Fb%20c");
  });

  it("maps 429 to a rate limit carrying Retry-After", async () => {
    const { http } = client(() => new Response("slow down", { status: 429, headers: { "retry-after": "7" } }));

    const error = await http.fetchEntity({ kind: "user", externalId: "u1" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ retryAfterMs: 7_000, retryable: true });
  });

  it.each([
    [404, NotFoundError, false],
    [500, TransientFetchError, true],
    [503, TransientFetchError, true],
    [408, TransientFetchError, true],
    [403, FetchRejectedError, false],
  ])("maps status %i", async (status, errorClass, retryable) => {
    const { http } = client(() => new Response("", { status }));

    const error = await http.fetchEntity({ kind: "user", externalId: "u1" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(errorClass);
    expect(error).toMatchObject({ retryable });
  });

  it("treats network failures as transient", async () => {
    const { http } = client(() => Promise.reject(new TypeError("fetch failed")));

    await expect(http.fetchEntity({ kind: "user", externalId: "u1" })).rejects.toMatchObject({
      code: ErrorCode.FETCH_TRANSIENT,
      message: "Request to https://platform.test/api/entities/user/u1 failed: fetch failed",
    });
  });

  it("aborts requests that outlive the timeout", async () => {
    const stub: typeof fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    const http = new HttpPlatformClient({ baseUrl: "https://platform.test", timeoutMs: 10, fetch: stub });

    await expect(http.fetchEntity({ kind: "user", externalId: "u1" })).rejects.toThrow("timed out after 10ms");
  });

  it("times out a response whose body never finishes", async () => {
    const stalled = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('{"kind":'));
      },
    });
    const { http } = client(() => new Response(stalled, { status: 200 }), 50);

    await expect(http.fetchEntity({ kind: "user", externalId: "u1" })).rejects.toMatchObject({
      code: ErrorCode.FETCH_TRANSIENT,
      message: "Unreadable response body from https://platform.test/api/entities/user/u1: timed out after 50ms",
    });
  });

  it("treats an unreadable body as transient", async () => {
    const { http } = client(() => new Response("<html>", { status: 200 }));

    await expect(http.fetchEntity({ kind: "user", externalId: "u1" })).rejects.toBeInstanceOf(TransientFetchError);
  });
});

describe("FixturePlatformClient", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "crawler-fixtures-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeFixture(content: unknown): string {
    const file = path.join(tempDir, "fixtures.json");
    fs.writeFileSync(file, JSON.stringify(content), "utf-8");
    return file;
  }

  it("plays scripted failures before serving the fixture", async () => {
    const file = writeFixture({
      entities: { "user:u1": userResponse("u1") },
      failures: { "user:u1": [{ type: "transient" }, { type: "rate-limited", retryAfterMs: 50 }] },
    });
    const platform = FixturePlatformClient.fromFile(file);
    const request = { kind: "user" as const, externalId: "u1" };

    await expect(platform.fetchEntity(request)).rejects.toBeInstanceOf(TransientFetchError);
    await expect(platform.fetchEntity(request)).rejects.toMatchObject({ retryAfterMs: 50 });
    await expect(platform.fetchEntity(request)).resolves.toEqual(userResponse("u1"));
    expect(platform.requestCount("user:u1")).toBe(3);
  });

  it("answers not found for keys it does not hold", async () => {
    const platform = new FixturePlatformClient({});

    await expect(platform.fetchEntity({ kind: "channel", externalId: "nope" })).rejects.toBeInstanceOf(NotFoundError);
  });

  it("rejects missing and badly shaped files", () => {
    expect(() => FixturePlatformClient.fromFile(path.join(tempDir, "absent.json"))).toThrow("does not exist");
    const file = writeFixture({ entities: {}, failures: { "user:u1": [{ type: "meteor" }] } });
    expect(() => FixturePlatformClient.fromFile(file)).toThrow(ConfigurationError);
  });

  it("loads the sample fixture shipped with the project", async () => {
    const sample = fileURLToPath(new URL("../../../../fixtures/sample-crawl.json", import.meta.url));
    const platform = FixturePlatformClient.fromFile(sample);

    await expect(platform.fetchEntity({ kind: "user", externalId: "user_7" })).resolves.toMatchObject({ kind: "user" });
  });
});

describe("createPlatformClient", () => {
  it("prefers fixtures, then the API, and fails with neither", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "crawler-platform-"));
    const fixturesPath = path.join(dir, "fixtures.json");
    fs.writeFileSync(fixturesPath, JSON.stringify({ entities: {} }), "utf-8");
    try {
      expect(createPlatformClient({ fixturesPath, baseUrl: "https://platform.test", timeoutMs: 10 })).toBeInstanceOf(
        FixturePlatformClient
      );
      expect(createPlatformClient({ baseUrl: "https://platform.test", timeoutMs: 10 })).toBeInstanceOf(HttpPlatformClient);
      expect(() => createPlatformClient({ timeoutMs: 10 })).toThrow(ConfigurationError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
