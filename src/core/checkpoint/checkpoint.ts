/**
 * Checkpoint format
 *
 * One JSON document per crawl. `version` is bumped whenever the shape
 * changes incompatibly; readers reject versions newer than they know and
 * ignore fields they do not.
 *
 * @module
 */

import { z } from "zod";
import { CheckpointError, ErrorCode } from "../errors.js";
import { DeadLetterSchema, type DeadLetter } from "../dead-letter/dead-letter-list.js";
import type { ICheckpointStorage } from "../interfaces/ICheckpointStorage.js";
import { FrontierTaskSchema, type FrontierTask } from "../models/task.js";

export const CHECKPOINT_VERSION = 1;

export const CheckpointSchema = z.object({
  version: z.number().int().positive(),
  sequence: z.number().int().nonnegative(),
  createdAt: z.string(),
  dedup: z.array(z.string()),
  frontier: z.object({
    pending: z.array(FrontierTaskSchema),
    visited: z.array(z.string()),
  }),
  deadLetters: z.array(DeadLetterSchema).default([]),
  highWater: z.record(z.number().int().nonnegative()).default({}),
});

export interface Checkpoint {
  version: number;
  sequence: number;
  createdAt: string;
  dedup: string[];
  frontier: { pending: FrontierTask[]; visited: string[] };
  deadLetters: DeadLetter[];
  highWater: Record<string, number>;
}

export function serializeCheckpoint(checkpoint: Checkpoint): string {
  return JSON.stringify(checkpoint);
}

/**
 * @throws CheckpointError if the blob is not JSON, comes from a newer
 *   version, or does not match the schema
 */
export function parseCheckpoint(blob: string, location: string): Checkpoint {
  let raw: unknown;
  try {
    raw = JSON.parse(blob);
  } catch (error) {
    throw new CheckpointError(`Checkpoint ${location} is not valid JSON`, ErrorCode.CHECKPOINT_READ_FAILED, {
      location,
      cause: String(error),
    });
  }

  const version = z.object({ version: z.number().int() }).safeParse(raw);
  if (!version.success) {
    throw new CheckpointError(`Checkpoint ${location} has no version`, ErrorCode.CHECKPOINT_READ_FAILED, { location });
  }
  if (version.data.version > CHECKPOINT_VERSION || version.data.version < 1) {
    throw new CheckpointError(
      `Checkpoint ${location} has version ${version.data.version}; this build reads up to ${CHECKPOINT_VERSION}`,
      ErrorCode.CHECKPOINT_UNSUPPORTED_VERSION,
      { location, version: version.data.version }
    );
  }

  const parsed = CheckpointSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CheckpointError(`Checkpoint ${location} is corrupt`, ErrorCode.CHECKPOINT_READ_FAILED, {
      location,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return parsed.data;
}

/**
 * Reads and parses the checkpoint held by `storage`.
 *
 * @returns null when none was written yet
 */
export async function loadCheckpoint(storage: ICheckpointStorage): Promise<Checkpoint | null> {
  const blob = await storage.read();
  return blob === null ? null : parseCheckpoint(blob, storage.location);
}
