/**
 * Latest committed message id per channel.
 *
 * Passed to the platform as `sinceMessageId` so a re-fetched channel only
 * returns newer messages. Persisted with the checkpoint.
 *
 * @module
 */

export class HighWaterMarks {
  private readonly marks = new Map<string, number>();

  /**
   * @returns true if the mark moved forward
   */
  advance(channelId: string, messageId: number): boolean {
    const current = this.marks.get(channelId);
    if (current !== undefined && current >= messageId) return false;
    this.marks.set(channelId, messageId);
    return true;
  }

  get(channelId: string): number | undefined {
    return this.marks.get(channelId);
  }

  get size(): number {
    return this.marks.size;
  }

  toJSON(): Record<string, number> {
    return Object.fromEntries(this.marks);
  }

  restore(marks: Record<string, number>): void {
    for (const [channelId, messageId] of Object.entries(marks)) {
      this.advance(channelId, messageId);
    }
  }
}
