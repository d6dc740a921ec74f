/**
 * Core Interfaces Module
 *
 * Contracts between the crawler core and its collaborators: the two stores,
 * the platform API and checkpoint storage.
 *
 * @module
 */

export type { IRelationalStore, StoredEntity, RelationalStoreStats } from "./IRelationalStore.js";

export type { IGraphStore, GraphNode } from "./IGraphStore.js";

export type { IPlatformClient, FetchRequest } from "./IPlatformClient.js";

export type { ICheckpointStorage } from "./ICheckpointStorage.js";
