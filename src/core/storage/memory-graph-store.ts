/**
 * In-process graph store with MERGE semantics.
 *
 * @module
 */

import type { GraphNode, IGraphStore } from "../interfaces/IGraphStore.js";
import { edgeKey, entityKey, type Edge, type EntityKey, type EntityRef } from "../models/entity.js";

export interface StoredEdge extends Edge {
  createdAt: Date;
}

export class MemoryGraphStore implements IGraphStore {
  private readonly nodes = new Map<EntityKey, GraphNode>();
  private readonly edges = new Map<string, StoredEdge>();

  async initialize(): Promise<void> {}

  async upsertNode(node: GraphNode): Promise<void> {
    this.nodes.set(node.key, { ...node });
  }

  async upsertEdges(edges: Edge[]): Promise<number> {
    let created = 0;
    for (const edge of edges) {
      this.mergeEndpoint(edge.source);
      this.mergeEndpoint(edge.target);
      const key = edgeKey(edge);
      if (this.edges.has(key)) continue;
      this.edges.set(key, { ...edge, createdAt: new Date() });
      created++;
    }
    return created;
  }

  async countEdges(): Promise<number> {
    return this.edges.size;
  }

  async countNodes(): Promise<number> {
    return this.nodes.size;
  }

  getNode(key: EntityKey): GraphNode | undefined {
    return this.nodes.get(key);
  }

  allEdges(): StoredEdge[] {
    return [...this.edges.values()];
  }

  async close(): Promise<void> {}

  private mergeEndpoint(ref: EntityRef): void {
    const key = entityKey(ref);
    if (this.nodes.has(key)) return;
    this.nodes.set(key, { key, kind: ref.kind, externalId: ref.externalId, label: ref.externalId, resolved: false });
  }
}
