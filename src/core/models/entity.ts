/**
 * Entity and Edge model
 *
 * The platform hands back loosely shaped JSON. It is resolved here, once, into
 * a closed set of entity-kind variants with validated payloads. Anything that
 * does not fit is a MalformedPayloadError, never stored as-is.
 *
 * @module
 */

import { z } from "zod";
import { ErrorCode, MalformedPayloadError } from "../errors.js";

// =============================================================================
// Kinds and references
// =============================================================================

export const ENTITY_KINDS = ["channel", "message", "user"] as const;
export const EntityKindSchema = z.enum(ENTITY_KINDS);
export type EntityKind = z.infer<typeof EntityKindSchema>;

export const EDGE_TYPES = [
  "MEMBER_OF",
  "FORWARDED_FROM",
  "MENTIONS",
  "POSTED_IN",
  "SIMILAR_TO",
  "REPOSTS_FROM",
] as const;
export const EdgeTypeSchema = z.enum(EDGE_TYPES);
export type EdgeType = z.infer<typeof EdgeTypeSchema>;

export type CommitStatus = "pending" | "committed" | "failed";

export interface EntityRef {
  kind: EntityKind;
  externalId: string;
}

/** Canonical "<kind>:<externalId>" key used by every index and store. */
export type EntityKey = `${EntityKind}:${string}`;

export function entityKey(ref: EntityRef): EntityKey {
  return `${ref.kind}:${ref.externalId}`;
}

export function isEntityKind(value: string): value is EntityKind {
  return EntityKindSchema.safeParse(value).success;
}

/**
 * Parses "kind:id". The id may itself contain colons.
 */
export function parseEntityKey(key: string): EntityRef {
  const sep = key.indexOf(":");
  if (sep <= 0 || sep === key.length - 1) {
    throw new MalformedPayloadError(`Invalid entity key "${key}"`, ["expected <kind>:<id>"], ErrorCode.INVALID_ARGUMENT);
  }
  const kind = key.slice(0, sep);
  if (!isEntityKind(kind)) {
    throw new MalformedPayloadError(`Unknown entity kind "${kind}" in key "${key}"`, [], ErrorCode.PAYLOAD_UNKNOWN_KIND);
  }
  return { kind, externalId: key.slice(sep + 1) };
}

const ExternalIdSchema = z
  .union([z.string().trim().min(1), z.number().int().nonnegative()])
  .transform((value) => String(value));

export const EntityRefSchema = z.object({
  kind: EntityKindSchema,
  id: ExternalIdSchema,
});

// =============================================================================
// Payload variants
// =============================================================================

export const ChannelPayloadSchema = z.object({
  title: z.string().min(1),
  username: z.string().min(1).nullish(),
  link: z.string().url().nullish(),
  subscribers: z.number().int().nonnegative().nullish(),
  verified: z.boolean().default(false),
  createdAt: z.string().nullish(),
  category: z.string().nullish(),
});
export type ChannelPayload = z.infer<typeof ChannelPayloadSchema>;

export const UserPayloadSchema = z.object({
  displayName: z.string().min(1),
  username: z.string().min(1).nullish(),
  isBot: z.boolean().default(false),
});
export type UserPayload = z.infer<typeof UserPayloadSchema>;

export const MessagePayloadSchema = z.object({
  channelId: ExternalIdSchema,
  messageId: z.number().int().nonnegative(),
  text: z.string().default(""),
  postedAt: z.string().min(1),
  forwardedFrom: ExternalIdSchema.nullish(),
});
export type MessagePayload = z.infer<typeof MessagePayloadSchema>;

interface EntityBase {
  externalId: string;
  discoveredAt: Date;
  status: CommitStatus;
}

export type ChannelEntity = EntityBase & { kind: "channel"; payload: ChannelPayload };
export type UserEntity = EntityBase & { kind: "user"; payload: UserPayload };
export type MessageEntity = EntityBase & { kind: "message"; payload: MessagePayload };
export type Entity = ChannelEntity | UserEntity | MessageEntity;

export interface Edge {
  source: EntityRef;
  target: EntityRef;
  type: EdgeType;
}

/** Idempotency key for an edge: (source, target, type). */
export function edgeKey(edge: Edge): string {
  return `${entityKey(edge.source)}-[${edge.type}]->${entityKey(edge.target)}`;
}

/** What the Fetcher hands to the Coordinator for one task. */
export interface FetchedItem {
  entity: Entity;
  edges: Edge[];
}

// =============================================================================
// Parsing
// =============================================================================

const RawEdgeSchema = z.object({
  type: z.string(),
  source: EntityRefSchema.optional(),
  target: EntityRefSchema,
});

const RawEnvelopeSchema = z.object({
  kind: z.string(),
  id: ExternalIdSchema,
  payload: z.record(z.unknown()),
  edges: z.array(RawEdgeSchema).default([]),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
}

function parsePayload(kind: EntityKind, externalId: string, raw: Record<string, unknown>, discoveredAt: Date): Entity {
  const base = { externalId, discoveredAt, status: "pending" as const };
  const fail = (error: z.ZodError): never => {
    throw new MalformedPayloadError(`Invalid ${kind} payload for ${kind}:${externalId}`, formatIssues(error), ErrorCode.PAYLOAD_MALFORMED, {
      kind,
      externalId,
    });
  };

  switch (kind) {
    case "channel": {
      const parsed = ChannelPayloadSchema.safeParse(raw);
      return parsed.success ? { ...base, kind, payload: parsed.data } : fail(parsed.error);
    }
    case "user": {
      const parsed = UserPayloadSchema.safeParse(raw);
      return parsed.success ? { ...base, kind, payload: parsed.data } : fail(parsed.error);
    }
    case "message": {
      const parsed = MessagePayloadSchema.safeParse(raw);
      return parsed.success ? { ...base, kind, payload: parsed.data } : fail(parsed.error);
    }
  }
}

/**
 * Rebuilds a typed entity from a payload read back from storage.
 *
 * @throws MalformedPayloadError if the stored payload no longer validates
 */
export function parseEntityPayload(
  ref: EntityRef,
  payload: Record<string, unknown>,
  discoveredAt: Date,
  status: CommitStatus = "pending"
): Entity {
  return { ...parsePayload(ref.kind, ref.externalId, payload, discoveredAt), status };
}

/**
 * Resolves a raw platform response into a typed entity and its edges.
 *
 * Edges without an explicit source originate at the fetched entity.
 *
 * @throws MalformedPayloadError on unknown kinds, unknown edge types or
 *   payloads missing required fields
 */
export function parseFetchedItem(raw: unknown, discoveredAt: Date = new Date()): FetchedItem {
  const envelope = RawEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new MalformedPayloadError("Platform response does not match the entity envelope", formatIssues(envelope.error));
  }

  const { kind, id, payload, edges: rawEdges } = envelope.data;
  if (!isEntityKind(kind)) {
    throw new MalformedPayloadError(`Unknown entity kind "${kind}"`, [], ErrorCode.PAYLOAD_UNKNOWN_KIND, { kind, externalId: id });
  }

  const entity = parsePayload(kind, id, payload, discoveredAt);
  const self: EntityRef = { kind, externalId: id };

  const edges: Edge[] = rawEdges.map((rawEdge, index) => {
    const type = EdgeTypeSchema.safeParse(rawEdge.type);
    if (!type.success) {
      throw new MalformedPayloadError(`Unknown edge type "${rawEdge.type}" on ${kind}:${id}`, [`edges.${index}.type`], ErrorCode.PAYLOAD_MALFORMED, {
        kind,
        externalId: id,
      });
    }
    return {
      type: type.data,
      source: rawEdge.source ? { kind: rawEdge.source.kind, externalId: rawEdge.source.id } : self,
      target: { kind: rawEdge.target.kind, externalId: rawEdge.target.id },
    };
  });

  return { entity, edges: dedupeEdges(edges) };
}

/** Drops repeated (source, target, type) triples, keeping first occurrence order. */
export function dedupeEdges(edges: Edge[]): Edge[] {
  const seen = new Set<string>();
  return edges.filter((edge) => {
    const key = edgeKey(edge);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * The unique public handle of an entity, if it has one: a channel's username
 * (or link) and a user's username. Compared case-insensitively.
 */
export function entityHandle(entity: Entity): string | null {
  switch (entity.kind) {
    case "channel": {
      const handle = entity.payload.username ?? entity.payload.link;
      return handle ? handle.replace(/^@/, "").toLowerCase() : null;
    }
    case "user":
      return entity.payload.username ? entity.payload.username.replace(/^@/, "").toLowerCase() : null;
    case "message":
      return null;
  }
}

/** Human readable label stored on graph nodes. */
export function entityLabel(entity: Entity): string {
  switch (entity.kind) {
    case "channel":
      return entity.payload.title;
    case "user":
      return entity.payload.displayName;
    case "message":
      return `${entity.payload.channelId}#${entity.payload.messageId}`;
  }
}

export function refOf(entity: Entity): EntityRef {
  return { kind: entity.kind, externalId: entity.externalId };
}
