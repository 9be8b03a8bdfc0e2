// worldcore/ratelimit/InMemoryRateLimitStore.ts

import type { RateLimitRule } from "../config/interactionConfig";
import type { RateLimitDecision, RateLimitStore } from "./RateLimitStore";

export class InMemoryRateLimitStore implements RateLimitStore {
  private readonly windows = new Map<string, number[]>();

  tryConsume(key: string, now: number, rule: RateLimitRule): RateLimitDecision {
    const events = this.prune(key, now, rule.windowMs);

    if (events.length >= rule.count) {
      const oldest = events[0] ?? now;
      return {
        allowed: false,
        retryAfterMs: Math.max(1, oldest + rule.windowMs - now),
        used: events.length,
      };
    }

    events.push(now);
    this.windows.set(key, events);
    return { allowed: true, retryAfterMs: 0, used: events.length };
  }

  /** Drop keys whose windows have emptied. Returns how many were removed. */
  sweep(now: number, windowMs: number): number {
    let removed = 0;
    for (const key of [...this.windows.keys()]) {
      if (this.prune(key, now, windowMs).length === 0) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.windows.size;
  }

  private prune(key: string, now: number, windowMs: number): number[] {
    const events = this.windows.get(key) ?? [];
    const cutoff = now - windowMs;
    let i = 0;
    while (i < events.length && events[i] <= cutoff) i++;
    return i > 0 ? events.slice(i) : events;
  }
}
