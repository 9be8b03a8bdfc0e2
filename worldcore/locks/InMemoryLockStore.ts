// worldcore/locks/InMemoryLockStore.ts
//
// Single-process lock table. The check and the set run in one synchronous
// stretch (no await between them), which is what makes tryAcquire atomic on
// the event loop.

import type { ObjectKey } from "../shared/InteractableObject";
import type { LockStore, ObjectLock } from "./LockStore";

export class InMemoryLockStore implements LockStore {
  private readonly locks = new Map<ObjectKey, ObjectLock>();

  async tryAcquire(
    key: ObjectKey,
    token: string,
    ttlMs: number,
    now: number,
  ): Promise<ObjectLock | null> {
    return this.acquireNow(key, token, ttlMs, now);
  }

  async release(key: ObjectKey, token: string): Promise<boolean> {
    return this.releaseNow(key, token);
  }

  acquireNow(key: ObjectKey, token: string, ttlMs: number, now: number): ObjectLock | null {
    const existing = this.locks.get(key);
    if (existing && existing.expiresAt > now) return null;

    const lock: ObjectLock = {
      targetKey: key,
      holderRequestToken: token,
      acquiredAt: now,
      expiresAt: now + ttlMs,
    };
    this.locks.set(key, lock);
    return { ...lock };
  }

  releaseNow(key: ObjectKey, token: string): boolean {
    const existing = this.locks.get(key);
    if (!existing || existing.holderRequestToken !== token) return false;
    this.locks.delete(key);
    return true;
  }

  /** Live lock for a key, if any. Expired entries are dropped on read. */
  peek(key: ObjectKey, now: number): ObjectLock | null {
    const existing = this.locks.get(key);
    if (!existing) return null;
    if (existing.expiresAt <= now) {
      this.locks.delete(key);
      return null;
    }
    return { ...existing };
  }

  get size(): number {
    return this.locks.size;
  }
}
