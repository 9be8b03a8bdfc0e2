// worldcore/locks/ConcurrencyGuard.ts
//
// Per-object mutual exclusion for ActionValidator. One live lock per target
// key; the holder is the request's correlation token. Locks carry a TTL so a
// crashed or stalled holder cannot wedge an object forever.

import type { Clock } from "../shared/Clock";
import { systemClock } from "../shared/Clock";
import type { ObjectKey } from "../shared/InteractableObject";
import { Logger } from "../utils/logger";
import type { LockStore, ObjectLock } from "./LockStore";

const log = Logger.scope("LOCKS");

export class ConcurrencyGuard {
  constructor(
    private readonly store: LockStore,
    private readonly ttlMs: number,
    private readonly clock: Clock = systemClock,
  ) {}

  async acquire(targetKey: ObjectKey, token: string): Promise<ObjectLock | null> {
    const lock = await this.store.tryAcquire(targetKey, token, this.ttlMs, this.clock.now());
    if (lock) log.debug("Lock acquired", { targetKey, token, expiresAt: lock.expiresAt });
    else log.debug("Lock busy", { targetKey, token });
    return lock;
  }

  async release(targetKey: ObjectKey, token: string): Promise<boolean> {
    const released = await this.store.release(targetKey, token);
    if (released) log.debug("Lock released", { targetKey, token });
    return released;
  }
}
