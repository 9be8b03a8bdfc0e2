// worldcore/test/contract_concurrencyGuard.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { ConcurrencyGuard } from "../locks/ConcurrencyGuard";
import { InMemoryLockStore } from "../locks/InMemoryLockStore";
import { ManualClock } from "../shared/Clock";

test("[contract] locks: one holder per target key", async () => {
  const clock = new ManualClock(1_000);
  const guard = new ConcurrencyGuard(new InMemoryLockStore(), 5_000, clock);

  const first = await guard.acquire("placed:a", "tok-1");
  assert.deepEqual(first, {
    targetKey: "placed:a",
    holderRequestToken: "tok-1",
    acquiredAt: 1_000,
    expiresAt: 6_000,
  });

  assert.equal(await guard.acquire("placed:a", "tok-2"), null);
  // Other keys are independent.
  assert.notEqual(await guard.acquire("placed:b", "tok-2"), null);
});

test("[contract] locks: simultaneous acquires on one key admit exactly one", async () => {
  const guard = new ConcurrencyGuard(new InMemoryLockStore(), 5_000, new ManualClock());

  const results = await Promise.all([
    guard.acquire("placed:a", "tok-1"),
    guard.acquire("placed:a", "tok-2"),
    guard.acquire("placed:a", "tok-3"),
  ]);

  assert.equal(results.filter((r) => r !== null).length, 1);
  assert.equal(results[0]?.holderRequestToken, "tok-1");
});

test("[contract] locks: only the holder's token releases", async () => {
  const guard = new ConcurrencyGuard(new InMemoryLockStore(), 5_000, new ManualClock());

  await guard.acquire("placed:a", "tok-1");
  assert.equal(await guard.release("placed:a", "tok-2"), false);
  assert.equal(await guard.acquire("placed:a", "tok-2"), null);

  assert.equal(await guard.release("placed:a", "tok-1"), true);
  assert.notEqual(await guard.acquire("placed:a", "tok-2"), null);
});

test("[contract] locks: an expired lock can be taken over", async () => {
  const clock = new ManualClock(0);
  const store = new InMemoryLockStore();
  const guard = new ConcurrencyGuard(store, 5_000, clock);

  await guard.acquire("placed:a", "stalled");
  clock.advance(4_999);
  assert.equal(await guard.acquire("placed:a", "tok-2"), null);

  clock.advance(1);
  const taken = await guard.acquire("placed:a", "tok-2");
  assert.equal(taken?.holderRequestToken, "tok-2");

  // The stalled holder cannot release the new holder's lock.
  assert.equal(await guard.release("placed:a", "stalled"), false);
  assert.equal(store.peek("placed:a", clock.now())?.holderRequestToken, "tok-2");
});

test("[contract] locks: peek drops expired entries", () => {
  const store = new InMemoryLockStore();
  store.acquireNow("placed:a", "tok-1", 100, 0);

  assert.equal(store.size, 1);
  assert.equal(store.peek("placed:a", 100), null);
  assert.equal(store.size, 0);
});
