/**
 * IGraphStore - relationship store
 *
 * Nodes are identified by entity key; edges by (source, target, type).
 * Both upserts are MERGE-style and may be repeated without duplicating.
 *
 * @module
 */

import type { Edge, EntityKey, EntityKind } from "../models/entity.js";

export interface GraphNode {
  key: EntityKey;
  kind: EntityKind;
  externalId: string;
  label: string;
  resolved: boolean;
}

/**
 * Graph store interface.
 *
 * Callers must make sure both endpoints of an edge exist in the relational
 * store before calling {@link IGraphStore.upsertEdges}; the graph store does
 * not check that itself.
 */
export interface IGraphStore {
  initialize(): Promise<void>;

  upsertNode(node: GraphNode): Promise<void>;

  /**
   * Merges the edges, creating missing endpoint nodes by key.
   *
   * @returns number of edges that did not exist before
   */
  upsertEdges(edges: Edge[]): Promise<number>;

  countEdges(): Promise<number>;

  countNodes(): Promise<number>;

  close(): Promise<void>;
}
