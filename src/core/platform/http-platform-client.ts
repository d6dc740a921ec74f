/**
 * HTTP platform client
 *
 * Talks to the platform's entity endpoint and maps HTTP failures onto the
 * fetch error taxonomy. Uses the global fetch with an abort timeout.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { FetchRejectedError, NotFoundError, RateLimitedError, TransientFetchError, errorMessage } from "../errors.js";
import type { FetchRequest, IPlatformClient } from "../interfaces/IPlatformClient.js";

const logger = createLogger("platform");

/** Wait applied when a 429 carries no usable Retry-After */
export const DEFAULT_RETRY_AFTER_MS = 1_000;

export interface HttpPlatformClientOptions {
  baseUrl: string;
  token?: string;
  timeoutMs: number;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
  now?: () => number;
}

/**
 * Reads a Retry-After header, either delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number {
  if (!value) return DEFAULT_RETRY_AFTER_MS;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return DEFAULT_RETRY_AFTER_MS;
  return Math.max(0, date - now);
}

export class HttpPlatformClient implements IPlatformClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(private readonly options: HttpPlatformClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
  }

  entityUrl(request: FetchRequest): string {
    const url = new URL(`${this.baseUrl}/entities/${request.kind}/${encodeURIComponent(request.externalId)}`);
    if (request.sinceMessageId !== undefined) {
      url.searchParams.set("since", String(request.sinceMessageId));
    }
    return url.toString();
  }

  /**
   * Fetches one entity. The timeout covers the whole exchange, body
   * included.
   */
  async fetchEntity(request: FetchRequest): Promise<unknown> {
    const url = this.entityUrl(request);
    const context = { kind: request.kind, externalId: request.externalId };
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.send(url, controller.signal, context);
      this.checkStatus(response, request, context);
      return await this.readBody(response, url, controller.signal, context);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async send(url: string, signal: AbortSignal, context: Record<string, unknown>): Promise<Response> {
    try {
      return await this.fetchImpl(url, {
        signal,
        headers: {
          Accept: "application/json",
          ...(this.options.token ? { Authorization: `Bearer ${this.options.token}` } : {}),
        },
      });
    } catch (error) {
      const reason = signal.aborted ? this.timeoutReason() : errorMessage(error);
      throw new TransientFetchError(`Request to ${url} failed: ${reason}`, context);
    }
  }

  private checkStatus(response: Response, request: FetchRequest, context: Record<string, unknown>): void {
    if (response.status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"), this.now());
      logger.warn({ ...context, retryAfterMs }, "Rate limited by platform");
      throw new RateLimitedError(`Rate limited fetching ${request.kind}:${request.externalId}`, retryAfterMs, context);
    }
    if (response.status === 404) {
      throw new NotFoundError(`${request.kind}:${request.externalId} does not exist`, context);
    }
    if (!response.ok) {
      const detail = { ...context, status: response.status };
      if (response.status >= 500 || response.status === 408) {
        throw new TransientFetchError(`Platform answered ${response.status} ${response.statusText}`, detail);
      }
      throw new FetchRejectedError(`Platform refused ${request.kind}:${request.externalId} with ${response.status}`, detail);
    }
  }

  /**
   * Reads the JSON body, giving up when the request's signal aborts even if
   * the body stream itself never reacts to it.
   */
  private async readBody(
    response: Response,
    url: string,
    signal: AbortSignal,
    context: Record<string, unknown>
  ): Promise<unknown> {
    const aborted = new Promise<never>((_resolve, reject) => {
      const onAbort = () => reject(new Error(this.timeoutReason()));
      if (signal.aborted) onAbort();
      else signal.addEventListener("abort", onAbort, { once: true });
    });
    try {
      const body: unknown = await Promise.race([response.json(), aborted]);
      return body;
    } catch (error) {
      throw new TransientFetchError(`Unreadable response body from ${url}: ${errorMessage(error)}`, context);
    }
  }

  private timeoutReason(): string {
    return `timed out after ${this.options.timeoutMs}ms`;
  }

  async close(): Promise<void> {
    // Nothing pooled; fetch connections are owned by the runtime
  }
}
