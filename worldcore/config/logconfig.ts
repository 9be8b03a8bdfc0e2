//worldcore/config/logconfig.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

// Per-scope defaults (can be overridden by env per scope)
const PER_SCOPE_DEFAULTS: Record<string, LogLevel> = {
  SERVER: "debug",
  ROUTER: "debug",
  SESSIONS: "info",
  HEARTBEAT: "info",
  TICK: "info",

  TARGETING: "info",
  VISIBILITY: "info",
  INTERACTION: "info",
  VALIDATOR: "debug",
  LOCKS: "info",
  WORLD: "debug",
  EVENT: "info",

  LEDGER: "info",
  ACTION_AUDIT: "info",
  DB: "info",
  REDIS: "info",
};

// Allow env overrides like BW_LOG_SCOPE_VALIDATOR=warn, BW_LOG_SCOPE_WORLD=info, etc.
function getScopeLevel(scope: string): LogLevel {
  const key = scope.toUpperCase();

  // 1) Explicit per-scope env override
  const fromEnv = parseLevel(process.env[`BW_LOG_SCOPE_${key}`]);
  if (fromEnv) return fromEnv;

  // 2) Default table
  const fromTable = PER_SCOPE_DEFAULTS[key];
  if (fromTable) return fromTable;

  // 3) Global fallback. Read per call so tests can flip BW_LOG_LEVEL.
  return parseLevel(process.env.BW_LOG_LEVEL) ?? "info";
}

export function logEnabled(scope: string, level: LogLevel): boolean {
  // Tests keep the console quiet unless a scope is explicitly raised.
  if (process.env.WORLDCORE_TEST === "1" && !process.env[`BW_LOG_SCOPE_${scope.toUpperCase()}`]) {
    return level === "error" && process.env.BW_LOG_TEST_ERRORS === "1";
  }

  const wantedIdx = ORDER.indexOf(getScopeLevel(scope));
  const levelIdx = ORDER.indexOf(level);

  return levelIdx >= wantedIdx;
}
