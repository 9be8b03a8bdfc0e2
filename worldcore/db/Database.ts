// worldcore/db/Database.ts
// Postgres & Redis connection layer.
//
// Exposes:
// - A configured pg Pool (db) ready for queries
// - testDbConnection() for a startup smoke test
// - A lazily-connected Redis client (redis) plus ensureRedisConnected()
//
// Keep import-time side effects minimal: nothing connects on import.
// DB-backed services import this module lazily (await import("../db/Database"))
// so tests can load them without opening sockets.

import { Pool } from "pg";
import { createClient } from "redis";
import dotenv from "dotenv";
import { Logger } from "../utils/logger";

dotenv.config();

const log = Logger.scope("DB");

// -----------------------------
// Postgres connection
// -----------------------------

/**
 * Shared Postgres connection pool.
 *
 * Env: BW_DB_HOST, BW_DB_PORT, BW_DB_USER, BW_DB_PASS, BW_DB_NAME, BW_DB_POOL_SIZE
 *
 * Missing/incorrect env still builds a Pool; the first query fails instead.
 */
export const db = new Pool({
  host: process.env.BW_DB_HOST,
  port: parseInt(process.env.BW_DB_PORT || "5432", 10),
  user: process.env.BW_DB_USER,
  password: process.env.BW_DB_PASS,
  database: process.env.BW_DB_NAME,
  max: parseInt(process.env.BW_DB_POOL_SIZE || "10", 10),
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5_000,
});

db.on("error", (err: unknown) => {
  log.error("Postgres pool error", { err });
});

/**
 * Connectivity smoke test for server startup. Logs either way and
 * reports the outcome; the caller decides whether to abort.
 */
export async function testDbConnection(): Promise<boolean> {
  try {
    const r = await db.query("SELECT 1 AS ok");
    log.success("Postgres connected", { ok: r.rows[0] });
    return true;
  } catch (err) {
    log.error("Postgres connection test failed", { err });
    return false;
  }
}

// -----------------------------
// Redis connection
// -----------------------------

const redisLog = Logger.scope("REDIS");

/**
 * Redis client (node-redis v4). Created but NOT connected at import time.
 * The URL can encode auth and DB index (redis://:pass@host:6379/0).
 */
export const redis = createClient({
  url: process.env.BW_REDIS_URL ?? "redis://localhost:6379",
});

redis.on("ready", () => redisLog.success("Redis connected"));
redis.on("error", (err: unknown) => redisLog.error("Redis error", { err }));

let redisConnecting: Promise<void> | null = null;

/**
 * Lazily connect the shared Redis client. Concurrent callers share one
 * connect attempt; a failed attempt clears it so the next call retries.
 */
export async function ensureRedisConnected(): Promise<void> {
  if (redis.isOpen) return;

  if (!redisConnecting) {
    redisConnecting = redis
      .connect()
      .then(() => undefined)
      .catch((err: unknown) => {
        redisLog.error("Redis connect failed", { err });
        redisConnecting = null;
        throw err;
      });
  }

  await redisConnecting;
}
