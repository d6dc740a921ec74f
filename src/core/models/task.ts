/**
 * Frontier task model
 *
 * @module
 */

import { z } from "zod";
import { EntityKindSchema, entityKey, type EntityKey, type EntityKind, type EntityRef } from "./entity.js";

/**
 * Dequeue order, highest first. Tasks restored from a checkpoint run before
 * configured seeds; retries always come last.
 */
export const PRIORITY_TIERS = ["resumed", "seed", "discovered", "retry"] as const;
export const PriorityTierSchema = z.enum(PRIORITY_TIERS);
export type PriorityTier = z.infer<typeof PriorityTierSchema>;

export const FrontierTaskSchema = z.object({
  kind: EntityKindSchema,
  externalId: z.string().min(1),
  tier: PriorityTierSchema,
  depth: z.number().int().nonnegative(),
  retries: z.number().int().nonnegative(),
  /** Epoch ms before which a retry must not be dequeued */
  availableAt: z.number().nonnegative(),
  discoveredAt: z.string(),
  /** Key of the entity whose edge discovered this task */
  origin: z.string().nullable(),
  /** Fetch even though the entity is already committed */
  refresh: z.boolean().optional(),
});

export interface FrontierTask {
  kind: EntityKind;
  externalId: string;
  tier: PriorityTier;
  depth: number;
  retries: number;
  availableAt: number;
  discoveredAt: string;
  origin: string | null;
  refresh?: boolean;
}

export function taskKey(task: EntityRef): EntityKey {
  return entityKey(task);
}

export function seedTask(ref: EntityRef, now: Date = new Date()): FrontierTask {
  return {
    kind: ref.kind,
    externalId: ref.externalId,
    tier: "seed",
    depth: 0,
    retries: 0,
    availableAt: 0,
    discoveredAt: now.toISOString(),
    origin: null,
  };
}

/**
 * Seed task for an entity that is already committed, so that a channel is
 * fetched again for the messages after its high-water mark.
 */
export function refreshTask(ref: EntityRef, now: Date = new Date()): FrontierTask {
  return { ...seedTask(ref, now), refresh: true };
}

export function discoveredTask(ref: EntityRef, parent: FrontierTask, now: Date = new Date()): FrontierTask {
  return {
    kind: ref.kind,
    externalId: ref.externalId,
    tier: "discovered",
    depth: parent.depth + 1,
    retries: 0,
    availableAt: 0,
    discoveredAt: now.toISOString(),
    origin: taskKey(parent),
  };
}
