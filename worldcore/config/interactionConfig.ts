// worldcore/config/interactionConfig.ts
//
// Every tunable of the targeting / visibility / validation pipeline.
// Nothing downstream hardcodes these numbers; services take a resolved
// InteractionConfig (or a Pick<> of it) in their constructor.
//
// Sources, lowest to highest precedence:
//   DEFAULT_INTERACTION_CONFIG  <  BW_* env vars  <  explicit overrides
//
// Env format:
//   BW_MAX_INTERACTION_DISTANCE=12
//   BW_NON_BLOCKING_SURFACES=avatar,preview_ghost,decorative
//   BW_ACTION_MULTIPLIERS=clone=1,move=0.6,rotate=0.05
//   BW_RATE_LIMITS=clone=5/10000,move=20/10000      (count/windowMs)
//   BW_ADMIN_IDS=user_1,user_2

import { ACTION_TYPES, isActionType, type ActionType } from "../actions/ActionTypes";
import { SURFACE_KINDS, type SurfaceKind } from "../visibility/RayCaster";
import { Logger } from "../utils/logger";

const log = Logger.scope("CONFIG");

export interface RateLimitRule {
  /** Max accepted actions inside one window. */
  count: number;
  windowMs: number;
}

export interface InteractionConfig {
  // --- targeting ---
  /** Radius for new acquisitions (world units). */
  targetingRadius: number;
  /** Current target is kept out to targetingRadius × retentionFactor. */
  retentionFactor: number;
  /** A challenger must be this fraction closer to steal the target. */
  hysteresisMargin: number;
  /** Horizontal field of view in degrees; 360 disables the facing filter. */
  fieldOfViewDeg: number;

  // --- visibility ---
  maxInteractionDistance: number;
  minClearFraction: number;
  raysPerObject: number;
  visibilityCacheTTL: number;
  visibilityCacheMaxEntries: number;
  /** Observer positions are rounded to this step for cache keys. */
  cacheQuantum: number;
  /** Eye offset above the observer's position. */
  eyeHeight: number;
  nonBlockingSurfaces: SurfaceKind[];
  transparentSurfacesBlock: boolean;

  // --- pricing ---
  actionMultipliers: Record<ActionType, number>;
  /** Digits after the decimal point of the smallest currency unit. */
  currencyDecimals: number;

  // --- validation ---
  rateLimits: Record<ActionType, RateLimitRule>;
  lockTTL: number;
  collaboratorTimeoutMs: number;
  /** How long an applied correlationToken is remembered for replay. */
  idempotencyTTL: number;
  maxPlacementsPerParticipant: number;
  adminActionsFree: boolean;
  adminIds: string[];
}

const DEFAULT_RATE: RateLimitRule = { count: 10, windowMs: 10_000 };

export const DEFAULT_INTERACTION_CONFIG: InteractionConfig = {
  targetingRadius: 10,
  retentionFactor: 1.2,
  hysteresisMargin: 0.1,
  fieldOfViewDeg: 360,

  maxInteractionDistance: 10,
  minClearFraction: 0.3,
  raysPerObject: 8,
  visibilityCacheTTL: 500,
  visibilityCacheMaxEntries: 5_000,
  cacheQuantum: 1,
  eyeHeight: 1.5,
  nonBlockingSurfaces: ["avatar", "preview_ghost", "decorative"],
  transparentSurfacesBlock: false,

  actionMultipliers: {
    clone: 1.0,
    destroy: 0.8,
    move: 0.6,
    recall: 0.2,
    rotate: 0.1,
    examine: 0,
  },
  currencyDecimals: 0,

  rateLimits: {
    clone: DEFAULT_RATE,
    move: DEFAULT_RATE,
    rotate: DEFAULT_RATE,
    recall: DEFAULT_RATE,
    destroy: DEFAULT_RATE,
    examine: { count: 30, windowMs: 10_000 },
  },
  lockTTL: 5_000,
  collaboratorTimeoutMs: 2_000,
  idempotencyTTL: 10 * 60_000,
  maxPlacementsPerParticipant: 1_000,
  adminActionsFree: false,
  adminIds: [],
};

export type InteractionConfigOverrides = Partial<
  Omit<InteractionConfig, "actionMultipliers" | "rateLimits">
> & {
  actionMultipliers?: Partial<Record<ActionType, number>>;
  rateLimits?: Partial<Record<ActionType, RateLimitRule>>;
};

type Env = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Parsers. A bad value logs and falls back; it never throws at boot.
// ---------------------------------------------------------------------------

function readNumber(env: Env, key: string, fallback: number, min = -Infinity): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < min) {
    log.warn("Ignoring invalid numeric config", { key, raw });
    return fallback;
  }
  return n;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === "1" || raw === "true" || raw === "yes") return true;
  if (raw === "0" || raw === "false" || raw === "no") return false;
  log.warn("Ignoring invalid boolean config", { key, raw });
  return fallback;
}

function readList(env: Env, key: string): string[] | null {
  const raw = env[key];
  if (raw === undefined) return null;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function readSurfaces(env: Env, key: string, fallback: SurfaceKind[]): SurfaceKind[] {
  const list = readList(env, key);
  if (!list) return fallback;
  const out: SurfaceKind[] = [];
  for (const item of list) {
    const match = SURFACE_KINDS.find((k) => k === item);
    if (match) out.push(match);
    else log.warn("Unknown surface kind in config", { key, item });
  }
  return out;
}

/** "clone=1,move=0.6" -> { clone: 1, move: 0.6 } */
export function parseMultipliers(raw: string | undefined): Partial<Record<ActionType, number>> {
  const out: Partial<Record<ActionType, number>> = {};
  if (!raw) return out;

  for (const part of raw.split(",")) {
    const [name, value] = part.split("=").map((s) => s.trim());
    const n = Number(value);
    if (!isActionType(name) || value === undefined || !Number.isFinite(n) || n < 0) {
      log.warn("Ignoring invalid action multiplier", { part });
      continue;
    }
    out[name] = n;
  }
  return out;
}

/** "clone=5/10000,move=20/10000" -> { clone: { count: 5, windowMs: 10000 }, ... } */
export function parseRateLimits(raw: string | undefined): Partial<Record<ActionType, RateLimitRule>> {
  const out: Partial<Record<ActionType, RateLimitRule>> = {};
  if (!raw) return out;

  for (const part of raw.split(",")) {
    const m = part.trim().match(/^([a-z_]+)=(\d+)\/(\d+)$/);
    const name = m?.[1];
    if (!m || !isActionType(name)) {
      log.warn("Ignoring invalid rate limit", { part });
      continue;
    }
    const count = parseInt(m[2], 10);
    const windowMs = parseInt(m[3], 10);
    if (count < 1 || windowMs < 1) {
      log.warn("Ignoring non-positive rate limit", { part });
      continue;
    }
    out[name] = { count, windowMs };
  }
  return out;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function sanitize(cfg: InteractionConfig): InteractionConfig {
  const out: InteractionConfig = { ...cfg };

  out.minClearFraction = Math.min(1, Math.max(0, out.minClearFraction));
  out.raysPerObject = Math.max(4, Math.floor(out.raysPerObject));
  out.retentionFactor = Math.max(1, out.retentionFactor);
  out.hysteresisMargin = Math.min(0.99, Math.max(0, out.hysteresisMargin));
  out.currencyDecimals = Math.max(0, Math.floor(out.currencyDecimals));
  out.cacheQuantum = out.cacheQuantum > 0 ? out.cacheQuantum : 1;

  // Locks must outlive a single collaborator await.
  if (out.collaboratorTimeoutMs >= out.lockTTL) {
    const clamped = Math.max(1, Math.floor(out.lockTTL / 2));
    log.warn("collaboratorTimeoutMs must be below lockTTL; clamping", {
      collaboratorTimeoutMs: out.collaboratorTimeoutMs,
      lockTTL: out.lockTTL,
      clamped,
    });
    out.collaboratorTimeoutMs = clamped;
  }

  return out;
}

export function resolveInteractionConfig(
  overrides: InteractionConfigOverrides = {},
  base: InteractionConfig = DEFAULT_INTERACTION_CONFIG,
): InteractionConfig {
  const { actionMultipliers, rateLimits, ...scalars } = overrides;

  const merged: InteractionConfig = {
    ...base,
    ...scalars,
    actionMultipliers: { ...base.actionMultipliers, ...actionMultipliers },
    rateLimits: { ...base.rateLimits, ...rateLimits },
  };

  return sanitize(merged);
}

export function loadInteractionConfig(env: Env = process.env): InteractionConfig {
  const d = DEFAULT_INTERACTION_CONFIG;

  const cfg = resolveInteractionConfig({
    targetingRadius: readNumber(env, "BW_TARGETING_RADIUS", d.targetingRadius, 0),
    retentionFactor: readNumber(env, "BW_RETENTION_FACTOR", d.retentionFactor, 1),
    hysteresisMargin: readNumber(env, "BW_HYSTERESIS_MARGIN", d.hysteresisMargin, 0),
    fieldOfViewDeg: readNumber(env, "BW_FIELD_OF_VIEW", d.fieldOfViewDeg, 1),

    maxInteractionDistance: readNumber(env, "BW_MAX_INTERACTION_DISTANCE", d.maxInteractionDistance, 0),
    minClearFraction: readNumber(env, "BW_MIN_CLEAR_FRACTION", d.minClearFraction, 0),
    raysPerObject: readNumber(env, "BW_RAYS_PER_OBJECT", d.raysPerObject, 4),
    visibilityCacheTTL: readNumber(env, "BW_VISIBILITY_CACHE_TTL", d.visibilityCacheTTL, 0),
    visibilityCacheMaxEntries: readNumber(env, "BW_VISIBILITY_CACHE_MAX", d.visibilityCacheMaxEntries, 1),
    eyeHeight: readNumber(env, "BW_EYE_HEIGHT", d.eyeHeight),
    nonBlockingSurfaces: readSurfaces(env, "BW_NON_BLOCKING_SURFACES", d.nonBlockingSurfaces),
    transparentSurfacesBlock: readBool(env, "BW_TRANSPARENT_SURFACES_BLOCK", d.transparentSurfacesBlock),

    actionMultipliers: parseMultipliers(env.BW_ACTION_MULTIPLIERS),
    currencyDecimals: readNumber(env, "BW_CURRENCY_DECIMALS", d.currencyDecimals, 0),

    rateLimits: parseRateLimits(env.BW_RATE_LIMITS),
    lockTTL: readNumber(env, "BW_LOCK_TTL", d.lockTTL, 1),
    collaboratorTimeoutMs: readNumber(env, "BW_COLLABORATOR_TIMEOUT", d.collaboratorTimeoutMs, 1),
    idempotencyTTL: readNumber(env, "BW_IDEMPOTENCY_TTL", d.idempotencyTTL, 0),
    maxPlacementsPerParticipant: readNumber(env, "BW_MAX_PLACEMENTS", d.maxPlacementsPerParticipant, 0),
    adminActionsFree: readBool(env, "BW_ADMIN_ACTIONS_FREE", d.adminActionsFree),
    adminIds: readList(env, "BW_ADMIN_IDS") ?? d.adminIds,
  });

  log.debug("Interaction config resolved", {
    actions: ACTION_TYPES.length,
    maxInteractionDistance: cfg.maxInteractionDistance,
    lockTTL: cfg.lockTTL,
  });

  return cfg;
}
