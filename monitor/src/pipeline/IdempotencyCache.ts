/**
 * Recently-seen idempotency keys, bounded by age and by count
 *
 * Keys are kept in insertion order (Map iteration order), so the oldest
 * entries are always at the front and eviction is a prefix scan.
 */
export class IdempotencyCache {
  private readonly seen = new Map<string, number>();

  constructor(
    private readonly windowMs: number,
    private readonly maxEntries: number,
    private readonly now: () => number = Date.now
  ) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
  }

  has(key: string): boolean {
    this.evictExpired();
    return this.seen.has(key);
  }

  add(key: string): void {
    this.seen.delete(key);
    this.seen.set(key, this.now());
    this.evictExpired();

    while (this.seen.size > this.maxEntries) {
      const oldest = this.seen.keys().next();
      if (oldest.done) break;
      this.seen.delete(oldest.value);
    }
  }

  get size(): number {
    return this.seen.size;
  }

  private evictExpired(): void {
    const cutoff = this.now() - this.windowMs;
    for (const [key, addedAt] of this.seen) {
      if (addedAt > cutoff) break;
      this.seen.delete(key);
    }
  }
}
