/**
 * Dead-letter list
 *
 * Operator-facing record of tasks that ended in a non-retryable failure or
 * ran out of retries. A task that ran out of retries stays on the frontier
 * at the lowest tier (`requeued: true`) and its letter is removed once it
 * commits. Persisted with the checkpoint and listed by the `dead-letters`
 * command.
 *
 * @module
 */

import { z } from "zod";
import { ErrorCode, isCrawlerError, errorMessage } from "../errors.js";
import { EntityKindSchema, entityKey, type EntityKey } from "../models/entity.js";
import type { FrontierTask } from "../models/task.js";

export const DeadLetterSchema = z.object({
  key: z.string(),
  kind: EntityKindSchema,
  externalId: z.string(),
  code: z.nativeEnum(ErrorCode),
  cause: z.string(),
  retries: z.number().int().nonnegative(),
  failedAt: z.string(),
  /** Still on the frontier, retried at the lowest tier */
  requeued: z.boolean().default(false),
});

export type DeadLetter = z.infer<typeof DeadLetterSchema>;

export function toDeadLetter(task: FrontierTask, error: unknown, failedAt: Date = new Date()): DeadLetter {
  return {
    key: entityKey(task),
    kind: task.kind,
    externalId: task.externalId,
    code: isCrawlerError(error) ? error.code : ErrorCode.UNKNOWN_ERROR,
    cause: errorMessage(error),
    retries: task.retries,
    failedAt: failedAt.toISOString(),
    requeued: false,
  };
}

export class DeadLetterList {
  private readonly letters = new Map<string, DeadLetter>();

  /** Records a failure; a later failure of the same key replaces the earlier one. */
  add(letter: DeadLetter): void {
    this.letters.delete(letter.key);
    this.letters.set(letter.key, letter);
  }

  /** Drops the letter of a task that has since committed. */
  remove(key: EntityKey): boolean {
    return this.letters.delete(key);
  }

  has(key: EntityKey): boolean {
    return this.letters.has(key);
  }

  list(): DeadLetter[] {
    return [...this.letters.values()];
  }

  get size(): number {
    return this.letters.size;
  }

  restore(letters: DeadLetter[]): void {
    for (const letter of letters) this.add(letter);
  }
}
