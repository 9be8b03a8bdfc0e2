// worldcore/actions/ActionValidator.ts
//
// Server-authoritative gate for every world-changing action.
//
// Pipeline (first failure wins; nothing throws out of validate()):
//   0. shape          -> ValidationFailed
//   1. idempotency    -> recorded result replayed, or shared in-flight result
//   2. object lock    -> Concurrent
//   3. existence      -> NotFound
//   4. permission     -> Forbidden (incl. placement cap on clone)
//   5. rate limit     -> RateLimited
//   6. price          -> ValidationFailed on bad input
//   7. funds          -> InsufficientFunds
//   8. deduct, mutate, record; refund if the mutation fails after the deduct
//
// Placed targets are locked from step 2 until the verdict is recorded;
// catalog entries never change and are not locked. Every collaborator await
// is bounded by collaboratorTimeoutMs (< lockTTL). A deduct or mutation that
// overruns it is still waited on for the rest of lockTTL, since its effect
// may yet land. If it is still pending after that:
//   deduct    rejected; the charge is refunded if it lands later
//   mutation  rejected as outcome unknown, without a refund; the token is
//             held until the mutation settles, then its result is recorded
//             (applied) or the charge refunded (failed)

import type { InteractionConfig } from "../config/interactionConfig";
import type { FundsLedger } from "../economy/FundsLedger";
import type { ConcurrencyGuard } from "../locks/ConcurrencyGuard";
import type { PricingEngine } from "../pricing/PricingEngine";
import { roundHalfUp } from "../pricing/PricingEngine";
import type { RateLimiter } from "../ratelimit/RateLimiter";
import type { Clock } from "../shared/Clock";
import { systemClock } from "../shared/Clock";
import type { InteractableObject, ObjectKey } from "../shared/InteractableObject";
import { catalogKey, objectKey, placedKey } from "../shared/InteractableObject";
import { add, isFiniteVec3 } from "../shared/Vec3";
import { Logger } from "../utils/logger";
import { withTimeout } from "../utils/withTimeout";
import type { WorldEventBus } from "../world/WorldEventBus";
import type { MutationResult, WorldMutationStore } from "../world/WorldIndex";
import { auditEventFor, logActionEvent, type ActionAuditEvent } from "./ActionAuditLog";
import {
  CollaboratorTimeoutError,
  ErrorKind,
  reject,
  type ActionApplied,
  type ActionRejection,
  type ActionVerdict,
} from "./ActionErrors";
import { permissionDenial, type PermissionPolicy } from "./ActionPermissions";
import { ACTION_TYPES, isActionType, type ActionRequest, type AvailableAction } from "./ActionTypes";
import type { IdempotencyStore } from "./IdempotencyStore";

const log = Logger.scope("VALIDATOR");

export type ValidatorConfig = Pick<
  InteractionConfig,
  "lockTTL" | "collaboratorTimeoutMs" | "maxPlacementsPerParticipant" | "adminActionsFree" | "currencyDecimals"
>;

export interface ActionValidatorDeps {
  world: WorldMutationStore;
  ledger: FundsLedger;
  guard: ConcurrencyGuard;
  rateLimiter: RateLimiter;
  pricing: PricingEngine;
  idempotency: IdempotencyStore;
  permissions: PermissionPolicy;
  events?: WorldEventBus;
  audit?: (ev: ActionAuditEvent) => Promise<void>;
  clock?: Clock;
}

/** `exclusive` targets (placed instances) are locked while an action runs. */
type ShapeCheck =
  | { ok: true; targetKey: ObjectKey; exclusive: boolean }
  | { ok: false; reason: string };

type Outcome =
  | { ok: true; object: InteractableObject | null }
  | { ok: false; reason: string };

type Late<T> = { settled: true; value: T } | { settled: false };

function flightKeyOf(requesterId: string, token: string): string {
  return `${requesterId}|${token}`;
}

/** Structural checks on a request as received; no collaborator is consulted. */
export function checkRequestShape(request: ActionRequest): ShapeCheck {
  if (!isActionType(request.actionType)) return { ok: false, reason: "unknown_action" };
  if (typeof request.requesterId !== "string" || !request.requesterId) {
    return { ok: false, reason: "missing_requester" };
  }
  if (typeof request.correlationToken !== "string" || !request.correlationToken) {
    return { ok: false, reason: "missing_token" };
  }

  const hasInstance = typeof request.targetInstanceId === "string" && request.targetInstanceId !== "";
  const hasCatalog = typeof request.targetCatalogId === "string" && request.targetCatalogId !== "";
  if (hasInstance === hasCatalog) return { ok: false, reason: "ambiguous_target" };

  const params = request.params ?? {};
  if (params.position !== undefined && !isFiniteVec3(params.position)) {
    return { ok: false, reason: "bad_position" };
  }
  if (params.rotationY !== undefined && !Number.isFinite(params.rotationY)) {
    return { ok: false, reason: "bad_rotation" };
  }
  if (request.actionType === "move" && params.position === undefined) {
    return { ok: false, reason: "missing_position" };
  }
  if (request.actionType === "rotate" && params.rotationY === undefined) {
    return { ok: false, reason: "missing_rotation" };
  }

  const targetKey =
    hasInstance && request.targetInstanceId
      ? placedKey(request.targetInstanceId)
      : catalogKey(request.targetCatalogId ?? "");
  return { ok: true, targetKey, exclusive: hasInstance };
}

export class ActionValidator {
  private readonly clock: Clock;
  private readonly audit: (ev: ActionAuditEvent) => Promise<void>;
  private readonly inFlight = new Map<string, Promise<ActionVerdict>>();
  /** Tokens whose mutation timed out and has not settled yet. */
  private readonly unresolved = new Set<string>();

  constructor(
    private readonly deps: ActionValidatorDeps,
    private readonly cfg: ValidatorConfig,
  ) {
    this.clock = deps.clock ?? systemClock;
    this.audit = deps.audit ?? ((ev) => logActionEvent(ev));
  }

  async validate(request: ActionRequest): Promise<ActionVerdict> {
    const shape = checkRequestShape(request);
    if (!shape.ok) {
      return this.finish(
        request,
        reject(ErrorKind.ValidationFailed, shape.reason, String(request.correlationToken ?? "")),
      );
    }

    const { requesterId, correlationToken: token } = request;

    const recorded = this.deps.idempotency.lookup(requesterId, token);
    if (recorded) {
      log.debug("Replaying recorded result", { requesterId, token });
      return { ...recorded, replayed: true };
    }

    const flightKey = flightKeyOf(requesterId, token);
    if (this.unresolved.has(flightKey)) {
      return this.finish(
        request,
        reject(ErrorKind.Unavailable, "outcome_pending", token, {
          actionType: request.actionType,
          targetKey: shape.targetKey,
        }),
      );
    }

    const pending = this.inFlight.get(flightKey);
    if (pending) {
      log.debug("Duplicate token in flight; sharing result", { requesterId, token });
      const shared = await pending;
      return shared.status === "applied" ? { ...shared, replayed: true } : shared;
    }

    const run = this.execute(request, shape.targetKey, shape.exclusive);
    this.inFlight.set(flightKey, run);
    try {
      return this.finish(request, await run);
    } finally {
      this.inFlight.delete(flightKey);
    }
  }

  /**
   * What `requesterId` may do to `target` and what each would cost. Only
   * permission and price are consulted; the placement cap, rate limit and
   * funds are judged when the action is submitted.
   */
  availableActions(requesterId: string, target: InteractableObject): AvailableAction[] {
    const free = this.cfg.adminActionsFree && this.deps.permissions.isAdmin(requesterId);
    const out: AvailableAction[] = [];

    for (const actionType of ACTION_TYPES) {
      if (permissionDenial(actionType, target, requesterId, this.deps.permissions)) continue;
      try {
        out.push({ actionType, cost: free ? 0 : this.deps.pricing.priceAction(actionType, target.baseValue) });
      } catch (err) {
        if (!(err instanceof RangeError)) throw err;
        log.debug("Unpriceable action left out", { actionType, targetKey: objectKey(target) });
      }
    }
    return out;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get unresolvedCount(): number {
    return this.unresolved.size;
  }

  // ---------------------------------------------------------------------------

  private async execute(
    request: ActionRequest,
    targetKey: ObjectKey,
    exclusive: boolean,
  ): Promise<ActionVerdict> {
    const token = request.correlationToken;

    if (!exclusive) {
      try {
        return await this.decide(request, targetKey);
      } catch (err) {
        return this.unavailable(request, targetKey, err);
      }
    }

    let acquired: boolean;
    try {
      const lock = await this.bounded("lock.acquire", this.deps.guard.acquire(targetKey, token));
      acquired = lock !== null;
    } catch (err) {
      return this.unavailable(request, targetKey, err);
    }

    if (!acquired) {
      return reject(ErrorKind.Concurrent, "lock_held", token, {
        actionType: request.actionType,
        targetKey,
      });
    }

    try {
      return await this.decide(request, targetKey);
    } catch (err) {
      return this.unavailable(request, targetKey, err);
    } finally {
      // An unsettled mutation keeps the lock until it settles.
      if (!this.unresolved.has(flightKeyOf(request.requesterId, token))) {
        await this.releaseLock(targetKey, token);
      }
    }
  }

  private async decide(request: ActionRequest, targetKey: ObjectKey): Promise<ActionVerdict> {
    const { actionType, requesterId, correlationToken: token } = request;
    const ctx = { actionType, targetKey };

    // 3. existence
    const target = await this.bounded("world.getObject", this.deps.world.getObject(targetKey));
    if (!target) return reject(ErrorKind.NotFound, "not_found", token, ctx);

    // 4. permission
    const denial = permissionDenial(actionType, target, requesterId, this.deps.permissions);
    if (denial) return reject(ErrorKind.Forbidden, denial, token, ctx);

    if (actionType === "clone") {
      const owned = await this.bounded("world.countOwnedBy", this.deps.world.countOwnedBy(requesterId));
      if (owned >= this.cfg.maxPlacementsPerParticipant) {
        return reject(ErrorKind.Forbidden, "placement_limit", token, ctx);
      }
    }

    // 5. rate limit
    const rate = this.deps.rateLimiter.consume(requesterId, actionType);
    if (!rate.allowed) {
      return reject(ErrorKind.RateLimited, "rate_limited", token, {
        ...ctx,
        retryAfterMs: rate.retryAfterMs,
      });
    }

    // 6. price
    let cost: number;
    try {
      cost = this.deps.pricing.priceAction(actionType, target.baseValue);
    } catch (err) {
      if (err instanceof RangeError) {
        log.warn("Pricing rejected input", { targetKey, actionType, err: err.message });
        return reject(ErrorKind.ValidationFailed, "invalid_price_input", token, ctx);
      }
      throw err;
    }
    if (this.cfg.adminActionsFree && this.deps.permissions.isAdmin(requesterId)) cost = 0;

    // 7. funds + deduct
    let balanceAfter: number | null = null;
    if (cost > 0) {
      const balance = await this.bounded("ledger.getBalance", this.deps.ledger.getBalance(requesterId));
      if (balance < cost) {
        return reject(ErrorKind.InsufficientFunds, "insufficient_funds", token, {
          ...ctx,
          shortfall: roundHalfUp(cost - balance, this.cfg.currencyDecimals),
        });
      }

      const deduction = this.deps.ledger.deduct(requesterId, cost);
      const taken = await this.settleLate("ledger.deduct", deduction);
      if (!taken.settled) {
        this.refundIfTakenLater(requesterId, cost, token, deduction);
        return reject(ErrorKind.Unavailable, "ledger.deduct_timeout", token, ctx);
      }
      if (!taken.value) return reject(ErrorKind.InsufficientFunds, "deduct_refused", token, ctx);

      balanceAfter = roundHalfUp(balance - cost, this.cfg.currencyDecimals);
    }

    // 8. mutate
    const mutation = this.apply(request, target).catch(
      (err: unknown): Outcome => ({ ok: false, reason: err instanceof Error ? err.message : String(err) }),
    );
    const settled = await this.settleLate("world.apply", mutation);
    if (!settled.settled) {
      this.settleMutationLater(request, targetKey, cost, balanceAfter, mutation, target.kind === "placed");
      return reject(ErrorKind.Unavailable, "mutation_outcome_unknown", token, ctx);
    }

    const outcome = settled.value;
    if (!outcome.ok) {
      log.warn("Mutation failed", { token, targetKey, actionType, reason: outcome.reason });
      if (cost > 0) await this.refund(requesterId, cost, token);
      return reject(ErrorKind.Unavailable, "mutation_failed", token, ctx);
    }

    const verdict = this.appliedVerdict(request, targetKey, cost, balanceAfter, outcome.object);
    this.deps.idempotency.record(requesterId, token, verdict);
    return verdict;
  }

  private appliedVerdict(
    request: ActionRequest,
    targetKey: ObjectKey,
    cost: number,
    balanceAfter: number | null,
    object: InteractableObject | null,
  ): ActionApplied {
    return {
      status: "applied",
      correlationToken: request.correlationToken,
      actionType: request.actionType,
      targetKey,
      cost,
      balanceAfter,
      object,
      appliedAt: this.clock.now(),
      replayed: false,
    };
  }

  /**
   * Await `work` within collaboratorTimeoutMs, then for the rest of lockTTL.
   * `settled: false` when it is still pending after both.
   */
  private async settleLate<T>(operation: string, work: Promise<T>): Promise<Late<T>> {
    try {
      return { settled: true, value: await this.bounded(operation, work) };
    } catch (err) {
      if (!(err instanceof CollaboratorTimeoutError)) throw err;
    }

    const graceMs = Math.max(0, this.cfg.lockTTL - this.cfg.collaboratorTimeoutMs);
    log.warn("Collaborator overran its timeout; waiting for the outcome", { operation, graceMs });
    try {
      return { settled: true, value: await withTimeout(work, graceMs, operation) };
    } catch (err) {
      if (err instanceof CollaboratorTimeoutError) return { settled: false };
      throw err;
    }
  }

  private refundIfTakenLater(
    requesterId: string,
    cost: number,
    token: string,
    deduction: Promise<boolean>,
  ): void {
    log.warn("Deduct outcome unknown; refunding if it lands", { requesterId, cost, token });
    void deduction
      .then(async (taken) => {
        if (taken) await this.refund(requesterId, cost, token);
      })
      .catch((err: unknown) => {
        log.warn("Late deduct failed; nothing taken", { requesterId, token, err });
      });
  }

  private settleMutationLater(
    request: ActionRequest,
    targetKey: ObjectKey,
    cost: number,
    balanceAfter: number | null,
    mutation: Promise<Outcome>,
    locked: boolean,
  ): void {
    const { requesterId, correlationToken: token } = request;
    const flightKey = flightKeyOf(requesterId, token);
    this.unresolved.add(flightKey);
    log.warn("Mutation outcome unknown; holding token", { token, targetKey, actionType: request.actionType });

    void mutation
      .then(async (outcome) => {
        if (outcome.ok) {
          const verdict = this.appliedVerdict(request, targetKey, cost, balanceAfter, outcome.object);
          this.deps.idempotency.record(requesterId, token, verdict);
          this.finish(request, verdict);
          return;
        }
        log.warn("Late mutation failed", { token, targetKey, reason: outcome.reason });
        if (cost > 0) await this.refund(requesterId, cost, token);
      })
      .catch((err: unknown) => {
        log.error("Settling a late mutation failed", { token, targetKey, err });
      })
      .finally(() => {
        this.unresolved.delete(flightKey);
        return locked ? this.releaseLock(targetKey, token) : undefined;
      });
  }

  private async apply(request: ActionRequest, target: InteractableObject): Promise<Outcome> {
    const params = request.params ?? {};
    const actionType = request.actionType;

    if (actionType === "examine") return { ok: true, object: target };

    if (actionType === "clone") {
      const position = params.position ?? add(target.position, { x: target.size.x, y: 0, z: 0 });
      return toOutcome(await this.deps.world.applyClone(target, request.requesterId, position));
    }

    // Everything below mutates a placed instance; permissionDenial already
    // refused catalog targets.
    if (target.kind !== "placed") return { ok: false, reason: "catalog_immutable" };
    const id = target.instanceId;

    switch (actionType) {
      case "move":
        return params.position
          ? toOutcome(await this.deps.world.applyMove(id, params.position))
          : { ok: false, reason: "missing_position" };
      case "rotate":
        return params.rotationY !== undefined
          ? toOutcome(await this.deps.world.applyRotate(id, params.rotationY))
          : { ok: false, reason: "missing_rotation" };
      case "destroy":
        return toOutcome(await this.deps.world.applyDestroy(id));
      case "recall":
        return toOutcome(await this.deps.world.applyRecall(id));
      default: {
        const _never: never = actionType;
        return _never;
      }
    }
  }

  private async refund(requesterId: string, cost: number, token: string): Promise<void> {
    try {
      await this.bounded("ledger.refund", this.deps.ledger.refund(requesterId, cost));
      log.info("Refunded charge", { requesterId, cost, token });
    } catch (err) {
      log.error("Refund failed; participant is owed funds", { requesterId, cost, token, err });
    }
  }

  private async releaseLock(targetKey: ObjectKey, token: string): Promise<void> {
    try {
      await this.bounded("lock.release", this.deps.guard.release(targetKey, token));
    } catch (err) {
      log.warn("Lock release failed; waiting on TTL", { targetKey, token, err });
    }
  }

  private bounded<T>(operation: string, work: Promise<T>): Promise<T> {
    return withTimeout(work, this.cfg.collaboratorTimeoutMs, operation);
  }

  private unavailable(request: ActionRequest, targetKey: ObjectKey, err: unknown): ActionRejection {
    const reason =
      err instanceof CollaboratorTimeoutError ? `${err.operation}_timeout` : "collaborator_error";
    log.warn("Collaborator failure", {
      token: request.correlationToken,
      targetKey,
      reason,
      err: err instanceof Error ? err.message : String(err),
    });
    return reject(ErrorKind.Unavailable, reason, request.correlationToken, {
      actionType: request.actionType,
      targetKey,
    });
  }

  /** Publish and audit a fresh verdict. Replays go through neither. */
  private finish(request: ActionRequest, verdict: ActionVerdict): ActionVerdict {
    if (verdict.status === "applied") {
      this.deps.events?.emit("action.applied", { request, verdict });
      log.info("Action applied", {
        token: verdict.correlationToken,
        actionType: verdict.actionType,
        targetKey: verdict.targetKey,
        cost: verdict.cost,
      });
    } else {
      this.deps.events?.emit("action.rejected", { request, verdict });
      log.debug("Action rejected", {
        token: verdict.correlationToken,
        kind: verdict.kind,
        reason: verdict.reason,
      });
    }

    this.audit(auditEventFor(request, verdict, this.clock.now())).catch((err: unknown) => {
      log.warn("Audit sink failed", { err });
    });
    return verdict;
  }
}

function toOutcome(result: MutationResult): Outcome {
  return result.ok ? { ok: true, object: result.object } : { ok: false, reason: result.reason };
}
