// worldcore/ratelimit/RateLimitStore.ts

import type { RateLimitRule } from "../config/interactionConfig";

export interface RateLimitDecision {
  allowed: boolean;
  /** 0 when allowed; otherwise ms until the oldest event leaves the window. */
  retryAfterMs: number;
  /** Events counted in the window after this call. */
  used: number;
}

/**
 * Sliding-window event log. tryConsume checks and records in one step, so two
 * requests racing for the last slot cannot both get it.
 */
export interface RateLimitStore {
  tryConsume(key: string, now: number, rule: RateLimitRule): RateLimitDecision;
}
