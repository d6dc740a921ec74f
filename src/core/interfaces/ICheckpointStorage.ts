/**
 * ICheckpointStorage - durable home of the single checkpoint blob
 *
 * @module
 */

export interface ICheckpointStorage {
  /** Where the blob lives, for logs and CLI output */
  readonly location: string;

  /** Returns the stored blob, or null if none was ever written */
  read(): Promise<string | null>;

  /** Replaces the stored blob; a reader never sees a partial write */
  write(blob: string): Promise<void>;
}
