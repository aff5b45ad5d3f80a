/**
 * Sliding window of recently delivered message ids.
 * The stream is at-least-once across reconnects; this keeps a replayed message from
 * reaching the bot twice.
 */
export class RecentIds {
  private readonly seen = new Map<string, number>();
  private additions = 0;

  constructor(
    private readonly ttlMs: number = 10 * 60_000,
    private readonly now: () => number = Date.now,
  ) {}

  has(id: string): boolean {
    const at = this.seen.get(id);
    return at !== undefined && this.now() - at < this.ttlMs;
  }

  add(id: string): void {
    this.seen.set(id, this.now());
    this.additions++;

    // Lazy cleanup every 50 ids
    if (this.additions % 50 === 0) {
      const cutoff = this.now() - this.ttlMs;
      for (const [key, at] of this.seen) {
        if (at < cutoff) this.seen.delete(key);
      }
    }
  }

  get size(): number {
    return this.seen.size;
  }
}
