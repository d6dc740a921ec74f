/**
 * Mapping between relational rows and {@link StoredEntity}.
 *
 * JSON columns come back untyped; they are validated here rather than
 * trusted.
 *
 * @module
 */

import { z } from "zod";
import { StoreError } from "../errors.js";
import type { StoredEntity } from "../interfaces/IRelationalStore.js";
import { EdgeTypeSchema, EntityKindSchema, entityKey, type Edge } from "../models/entity.js";

const RefSchema = z.object({ kind: EntityKindSchema, externalId: z.string().min(1) });

export const StoredEdgeSchema = z.object({
  source: RefSchema,
  target: RefSchema,
  type: EdgeTypeSchema,
});

const EntityRowSchema = z.object({
  kind: EntityKindSchema,
  external_id: z.string(),
  handle: z.string().nullable(),
  payload: z.record(z.unknown()).nullable(),
  outgoing_edges: z.array(StoredEdgeSchema),
  resolved: z.boolean(),
  status: z.enum(["pending", "committed", "failed"]),
  discovered_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

export type EntityRow = z.input<typeof EntityRowSchema>;

/**
 * @throws StoreError if the row does not have the expected shape
 */
export function toStoredEntity(row: unknown): StoredEntity {
  const parsed = EntityRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new StoreError("Unexpected row shape in crawl_entities", "relational", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  const data = parsed.data;
  const ref = { kind: data.kind, externalId: data.external_id };
  return {
    ...ref,
    key: entityKey(ref),
    handle: data.handle,
    payload: data.payload,
    outgoingEdges: data.outgoing_edges,
    resolved: data.resolved,
    status: data.status,
    discoveredAt: data.discovered_at,
    updatedAt: data.updated_at,
  };
}

export function serializeEdges(edges: Edge[]): string {
  return JSON.stringify(
    edges.map((edge) => ({
      source: { kind: edge.source.kind, externalId: edge.source.externalId },
      target: { kind: edge.target.kind, externalId: edge.target.externalId },
      type: edge.type,
    }))
  );
}
