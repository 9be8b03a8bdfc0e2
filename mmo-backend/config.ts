// mmo-backend/config.ts

export type StorageMode = "memory" | "postgres";
export type LockStoreMode = "memory" | "redis";

export interface NetworkConfig {
  host: string;
  port: number;
  path: string;
  heartbeatIntervalMs: number;
  idleTimeoutMs: number;
  tickIntervalMs: number;
  authOptional: boolean;
  jwtSecret: string | null;
  storage: StorageMode;
  lockStore: LockStoreMode;
}

// Defaults (human readable)
const DEFAULT_HEARTBEAT_INTERVAL_MS = 5_000;      // 5 seconds
const DEFAULT_IDLE_TIMEOUT_MS       = 10 * 60_000; // 10 minutes
const DEFAULT_TICK_INTERVAL_MS      = 100;        // 10 TPS

function positive(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return raw !== undefined && raw !== "" && Number.isFinite(n) && n > 0 ? n : fallback;
}

export function loadNetConfig(env: Record<string, string | undefined> = process.env): NetworkConfig {
  return {
    host: env.BW_MMO_HOST || "0.0.0.0",
    port: positive(env.BW_MMO_PORT, 7777),
    path: "/ws",

    // How often the Heartbeat sweeps sessions for idleness
    heartbeatIntervalMs: positive(env.BW_HEARTBEAT_INTERVAL, DEFAULT_HEARTBEAT_INTERVAL_MS),

    // How long a session can be idle (no messages) before we drop it
    idleTimeoutMs: positive(env.BW_IDLE_TIMEOUT, DEFAULT_IDLE_TIMEOUT_MS),

    // Targeting tick
    tickIntervalMs: positive(env.BW_TICK_INTERVAL, DEFAULT_TICK_INTERVAL_MS),

    // default: guests allowed in dev; set BW_AUTH_OPTIONAL=false in prod
    authOptional: env.BW_AUTH_OPTIONAL !== "false",
    jwtSecret: env.BW_JWT_SECRET || null,

    storage: env.BW_STORAGE === "postgres" ? "postgres" : "memory",
    lockStore: env.BW_LOCK_STORE === "redis" ? "redis" : "memory",
  };
}
