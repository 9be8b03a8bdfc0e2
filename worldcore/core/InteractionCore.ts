// worldcore/core/InteractionCore.ts
//
// Wires the interaction services from one resolved config. The shard host
// and the end-to-end tests build the same graph; only the stores differ.

import type { ActionAuditEvent } from "../actions/ActionAuditLog";
import { ConfigPermissionPolicy, type PermissionPolicy } from "../actions/ActionPermissions";
import { ActionValidator } from "../actions/ActionValidator";
import { InMemoryIdempotencyStore } from "../actions/IdempotencyStore";
import type { InteractionConfig } from "../config/interactionConfig";
import type { FundsLedger } from "../economy/FundsLedger";
import { ConcurrencyGuard } from "../locks/ConcurrencyGuard";
import { InMemoryLockStore } from "../locks/InMemoryLockStore";
import type { LockStore } from "../locks/LockStore";
import { PricingEngine } from "../pricing/PricingEngine";
import { InMemoryRateLimitStore } from "../ratelimit/InMemoryRateLimitStore";
import { RateLimiter } from "../ratelimit/RateLimiter";
import type { RateLimitStore } from "../ratelimit/RateLimitStore";
import type { Clock } from "../shared/Clock";
import { systemClock } from "../shared/Clock";
import { AabbRayCaster } from "../visibility/AabbRayCaster";
import type { RayCaster } from "../visibility/RayCaster";
import { VisibilityChecker } from "../visibility/VisibilityChecker";
import type { InMemoryWorldStore } from "../world/InMemoryWorldStore";
import { WorldEventBus } from "../world/WorldEventBus";
import type { WorldMutationStore } from "../world/WorldIndex";

export interface InteractionCoreOptions {
  config: InteractionConfig;
  /** Read index: candidates, occluders, avatars. */
  world: InMemoryWorldStore;
  /** Write path; defaults to `world` itself. */
  mutations?: WorldMutationStore;
  ledger: FundsLedger;
  lockStore?: LockStore;
  rateLimitStore?: RateLimitStore;
  rays?: RayCaster;
  permissions?: PermissionPolicy;
  events?: WorldEventBus;
  audit?: (ev: ActionAuditEvent) => Promise<void>;
  clock?: Clock;
}

export interface InteractionCore {
  config: InteractionConfig;
  world: InMemoryWorldStore;
  ledger: FundsLedger;
  events: WorldEventBus;
  clock: Clock;
  visibility: VisibilityChecker;
  guard: ConcurrencyGuard;
  validator: ActionValidator;
}

export function buildInteractionCore(opts: InteractionCoreOptions): InteractionCore {
  const { config, world, ledger } = opts;
  const clock = opts.clock ?? systemClock;
  const events = opts.events ?? new WorldEventBus();

  const visibility = new VisibilityChecker(opts.rays ?? new AabbRayCaster(world), config, clock);
  const guard = new ConcurrencyGuard(opts.lockStore ?? new InMemoryLockStore(), config.lockTTL, clock);

  const validator = new ActionValidator(
    {
      world: opts.mutations ?? world,
      ledger,
      guard,
      rateLimiter: new RateLimiter(opts.rateLimitStore ?? new InMemoryRateLimitStore(), config.rateLimits, clock),
      pricing: new PricingEngine(config),
      idempotency: new InMemoryIdempotencyStore(config.idempotencyTTL, clock),
      permissions: opts.permissions ?? new ConfigPermissionPolicy(config.adminIds),
      events,
      audit: opts.audit,
      clock,
    },
    config,
  );

  return { config, world, ledger, events, clock, visibility, guard, validator };
}
