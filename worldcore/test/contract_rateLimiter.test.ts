// worldcore/test/contract_rateLimiter.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { InMemoryRateLimitStore } from "../ratelimit/InMemoryRateLimitStore";
import { RateLimiter } from "../ratelimit/RateLimiter";
import { ManualClock } from "../shared/Clock";
import { testConfig } from "./testUtils";

function limiter(clock: ManualClock, store = new InMemoryRateLimitStore()): RateLimiter {
  const rules = testConfig({ rateLimits: { clone: { count: 2, windowMs: 1_000 } } }).rateLimits;
  return new RateLimiter(store, rules, clock);
}

test("[contract] rate limit: N per window, then retryAfter until the oldest ages out", () => {
  const clock = new ManualClock(0);
  const rl = limiter(clock);

  assert.deepEqual(rl.consume("alice", "clone"), { allowed: true, retryAfterMs: 0, used: 1 });
  clock.set(100);
  assert.deepEqual(rl.consume("alice", "clone"), { allowed: true, retryAfterMs: 0, used: 2 });

  clock.set(200);
  assert.deepEqual(rl.consume("alice", "clone"), { allowed: false, retryAfterMs: 800, used: 2 });

  // The event at t=0 leaves the window at t=1000.
  clock.set(1_000);
  assert.deepEqual(rl.consume("alice", "clone"), { allowed: true, retryAfterMs: 0, used: 2 });
});

test("[contract] rate limit: a denied attempt does not count against the window", () => {
  const clock = new ManualClock(0);
  const rl = limiter(clock);

  rl.consume("alice", "clone");
  rl.consume("alice", "clone");
  rl.consume("alice", "clone");
  rl.consume("alice", "clone");

  clock.set(1_000);
  assert.equal(rl.consume("alice", "clone").allowed, true);
});

test("[contract] rate limit: keyed per requester and per action type", () => {
  const clock = new ManualClock(0);
  const rl = limiter(clock);

  rl.consume("alice", "clone");
  rl.consume("alice", "clone");

  assert.equal(rl.consume("alice", "clone").allowed, false);
  assert.equal(rl.consume("bob", "clone").allowed, true);
  // move keeps the default 10 / 10s rule.
  assert.equal(rl.consume("alice", "move").allowed, true);
});

test("[contract] rate limit: sweep forgets keys whose windows emptied", () => {
  const store = new InMemoryRateLimitStore();
  const rule = { count: 5, windowMs: 1_000 };

  store.tryConsume("alice:clone", 0, rule);
  store.tryConsume("bob:clone", 600, rule);
  assert.equal(store.size, 2);

  assert.equal(store.sweep(1_000, 1_000), 1);
  assert.equal(store.size, 1);
});
