// worldcore/locks/RedisLockStore.ts
//
// Cross-process locks for shards sharing one Redis:
//   acquire: SET <key> <token> NX PX <ttl>
//   release: compare-and-delete script, so a holder whose lease expired
//            cannot delete the next holder's lock.
//
// Expiry is enforced by Redis (PX); acquiredAt/expiresAt on the returned lock
// are computed from the caller's clock.

import type { ObjectKey } from "../shared/InteractableObject";
import { Logger } from "../utils/logger";
import type { LockStore, ObjectLock } from "./LockStore";

const log = Logger.scope("LOCKS");

/** The slice of a node-redis client this store needs. */
export interface RedisCommandClient {
  sendCommand(args: string[]): Promise<unknown>;
}

export const RELEASE_SCRIPT = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
else
  return 0
end
`.trim();

export class RedisLockStore implements LockStore {
  constructor(
    private readonly client: RedisCommandClient,
    private readonly prefix = "bw:lock:",
  ) {}

  async tryAcquire(
    key: ObjectKey,
    token: string,
    ttlMs: number,
    now: number,
  ): Promise<ObjectLock | null> {
    const ttl = Math.max(1, Math.ceil(ttlMs));
    const reply = await this.client.sendCommand([
      "SET",
      this.redisKey(key),
      token,
      "NX",
      "PX",
      String(ttl),
    ]);

    if (reply !== "OK") return null;

    return {
      targetKey: key,
      holderRequestToken: token,
      acquiredAt: now,
      expiresAt: now + ttl,
    };
  }

  async release(key: ObjectKey, token: string): Promise<boolean> {
    const reply = await this.client.sendCommand([
      "EVAL",
      RELEASE_SCRIPT,
      "1",
      this.redisKey(key),
      token,
    ]);

    const released = reply === 1 || reply === "1";
    if (!released) log.debug("Release skipped; lock not held by token", { key, token });
    return released;
  }

  private redisKey(key: ObjectKey): string {
    return `${this.prefix}${key}`;
  }
}
