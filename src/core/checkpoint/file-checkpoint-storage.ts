/**
 * File-backed checkpoint storage.
 *
 * @module
 */

import * as fsp from "node:fs/promises";
import { writeFileAtomic } from "../../utils/index.js";
import { CheckpointError, ErrorCode } from "../errors.js";
import type { ICheckpointStorage } from "../interfaces/ICheckpointStorage.js";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileCheckpointStorage implements ICheckpointStorage {
  constructor(readonly location: string) {}

  async read(): Promise<string | null> {
    try {
      return await fsp.readFile(this.location, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new CheckpointError(`Cannot read checkpoint ${this.location}`, ErrorCode.CHECKPOINT_READ_FAILED, {
        path: this.location,
        cause: String(error),
      });
    }
  }

  async write(blob: string): Promise<void> {
    try {
      await writeFileAtomic(this.location, blob);
    } catch (error) {
      throw new CheckpointError(`Cannot write checkpoint ${this.location}`, ErrorCode.CHECKPOINT_WRITE_FAILED, {
        path: this.location,
        cause: String(error),
      });
    }
  }
}

/**
 * Keeps the blob in memory. Used for `--memory` runs and tests.
 */
export class MemoryCheckpointStorage implements ICheckpointStorage {
  readonly location = "memory";
  private blob: string | null = null;
  writes = 0;

  async read(): Promise<string | null> {
    return this.blob;
  }

  async write(blob: string): Promise<void> {
    this.blob = blob;
    this.writes++;
  }
}
