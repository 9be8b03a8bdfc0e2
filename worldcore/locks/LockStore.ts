// worldcore/locks/LockStore.ts

import type { ObjectKey } from "../shared/InteractableObject";

export interface ObjectLock {
  targetKey: ObjectKey;
  holderRequestToken: string;
  acquiredAt: number;
  expiresAt: number;
}

/**
 * Lease storage behind ConcurrencyGuard.
 *
 * tryAcquire must be an atomic test-and-set: two callers racing for the same
 * free key never both get a lock. An expired lock counts as free.
 * release removes the lock only when `token` still holds it.
 */
export interface LockStore {
  tryAcquire(key: ObjectKey, token: string, ttlMs: number, now: number): Promise<ObjectLock | null>;
  release(key: ObjectKey, token: string): Promise<boolean>;
}
