/**
 * IPlatformClient - the external messaging platform
 *
 * @module
 */

import type { EntityKind } from "../models/entity.js";

export interface FetchRequest {
  kind: EntityKind;
  externalId: string;
  /** Only messages newer than this id are of interest (channels only) */
  sinceMessageId?: number;
}

/**
 * Platform API client.
 *
 * Returns the raw response body; parsing is the fetcher's job. Failures must
 * be distinguishable:
 * - RateLimitedError with the advertised wait
 * - NotFoundError when the entity does not exist
 * - TransientFetchError for network and server-side failures
 */
export interface IPlatformClient {
  fetchEntity(request: FetchRequest): Promise<unknown>;
  close(): Promise<void>;
}
