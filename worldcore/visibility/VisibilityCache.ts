// worldcore/visibility/VisibilityCache.ts
//
// TTL cache of ray results. Eviction is lazy: an expired entry is dropped
// when it is read. When the map grows past maxEntries we sweep expired
// entries once, then drop the oldest if that was not enough.

export interface CachedRayResult {
  clearCount: number;
  sampleCount: number;
  computedAt: number;
}

export class VisibilityCache {
  private readonly entries = new Map<string, CachedRayResult>();

  constructor(
    private readonly ttlMs: number,
    private readonly maxEntries: number,
  ) {}

  get(key: string, now: number): CachedRayResult | null {
    const hit = this.entries.get(key);
    if (!hit) return null;

    if (now - hit.computedAt >= this.ttlMs) {
      this.entries.delete(key);
      return null;
    }
    return hit;
  }

  set(key: string, value: CachedRayResult): void {
    // Re-insert so Map iteration order stays oldest-first.
    this.entries.delete(key);
    this.entries.set(key, value);

    if (this.entries.size > this.maxEntries) {
      this.sweep(value.computedAt);
    }
  }

  /** Drop every entry whose observer prefix matches (disconnect). */
  forgetObserver(observerId: string): void {
    const prefix = `${observerId}|`;
    for (const key of this.entries.keys()) {
      if (key.startsWith(prefix)) this.entries.delete(key);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (now - entry.computedAt >= this.ttlMs) this.entries.delete(key);
    }

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}
