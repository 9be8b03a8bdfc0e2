// worldcore/test/behavior_actionValidator_pipeline.test.ts
//
// Behavior: each validation step rejects with its own error kind, nothing is
// charged on a rejection, and applied actions charge exactly the price.

import test from "node:test";
import assert from "node:assert/strict";

import type { ActionAuditEvent } from "../actions/ActionAuditLog";
import type { ActionVerdict } from "../actions/ActionErrors";
import { ConfigPermissionPolicy } from "../actions/ActionPermissions";
import type { ActionRequest } from "../actions/ActionTypes";
import { ActionValidator, checkRequestShape } from "../actions/ActionValidator";
import { InMemoryIdempotencyStore } from "../actions/IdempotencyStore";
import type { InteractionConfigOverrides } from "../config/interactionConfig";
import { InMemoryFundsLedger } from "../economy/InMemoryFundsLedger";
import { ConcurrencyGuard } from "../locks/ConcurrencyGuard";
import { InMemoryLockStore } from "../locks/InMemoryLockStore";
import { PricingEngine } from "../pricing/PricingEngine";
import { InMemoryRateLimitStore } from "../ratelimit/InMemoryRateLimitStore";
import { RateLimiter } from "../ratelimit/RateLimiter";
import { ManualClock } from "../shared/Clock";
import type { PlacedObject } from "../shared/InteractableObject";
import { InMemoryWorldStore } from "../world/InMemoryWorldStore";
import { WorldEventBus } from "../world/WorldEventBus";
import { makeCatalog, makePlaced, testConfig, v } from "./testUtils";

interface Rig {
  validator: ActionValidator;
  world: InMemoryWorldStore;
  ledger: InMemoryFundsLedger;
  events: WorldEventBus;
  audits: ActionAuditEvent[];
}

function rig(
  opts: {
    config?: InteractionConfigOverrides;
    balances?: Record<string, number>;
    placed?: PlacedObject[];
  } = {},
): Rig {
  const cfg = testConfig(opts.config);
  const clock = new ManualClock(10_000);
  const events = new WorldEventBus();
  const world = new InMemoryWorldStore(
    {
      catalog: [makeCatalog({ id: "basic_cube", position: v(0, 0, 0), baseValue: 100 })],
      placed: opts.placed ?? [makePlaced({ instanceId: "a", ownerId: "alice", baseValue: 100 })],
    },
    events,
    () => "inst_fixed",
  );
  const ledger = new InMemoryFundsLedger({}, opts.balances ?? { alice: 100, bob: 100 });
  const audits: ActionAuditEvent[] = [];

  const validator = new ActionValidator(
    {
      world,
      ledger,
      guard: new ConcurrencyGuard(new InMemoryLockStore(), cfg.lockTTL, clock),
      rateLimiter: new RateLimiter(new InMemoryRateLimitStore(), cfg.rateLimits, clock),
      pricing: new PricingEngine(cfg),
      idempotency: new InMemoryIdempotencyStore(cfg.idempotencyTTL, clock),
      permissions: new ConfigPermissionPolicy(cfg.adminIds),
      events,
      audit: async (ev) => {
        audits.push(ev);
      },
      clock,
    },
    cfg,
  );

  return { validator, world, ledger, events, audits };
}

let tokenSeq = 0;

function req(partial: Partial<ActionRequest> & Pick<ActionRequest, "actionType">): ActionRequest {
  tokenSeq++;
  return {
    requesterId: "alice",
    submittedAt: 0,
    correlationToken: `tok-${tokenSeq}`,
    targetInstanceId: "a",
    ...partial,
  };
}

function rejection(verdict: ActionVerdict): { kind: string; reason: string } | null {
  return verdict.status === "rejected" ? { kind: verdict.kind, reason: verdict.reason } : null;
}

test("[contract] validator: request shape checks", () => {
  const base = req({ actionType: "rotate", params: { rotationY: 90 } });

  assert.deepEqual(checkRequestShape(base), { ok: true, targetKey: "placed:a", exclusive: true });
  assert.deepEqual(
    checkRequestShape({ ...base, targetInstanceId: undefined, targetCatalogId: "basic_cube" }),
    { ok: true, targetKey: "catalog:basic_cube", exclusive: false },
  );
  assert.deepEqual(checkRequestShape({ ...base, targetInstanceId: undefined }), {
    ok: false,
    reason: "ambiguous_target",
  });
  assert.deepEqual(checkRequestShape({ ...base, targetCatalogId: "basic_cube" }), {
    ok: false,
    reason: "ambiguous_target",
  });
  assert.deepEqual(checkRequestShape({ ...base, requesterId: "" }), {
    ok: false,
    reason: "missing_requester",
  });
  assert.deepEqual(checkRequestShape({ ...base, correlationToken: "" }), {
    ok: false,
    reason: "missing_token",
  });
  assert.deepEqual(checkRequestShape({ ...base, params: {} }), { ok: false, reason: "missing_rotation" });
  assert.deepEqual(checkRequestShape({ ...base, actionType: "move", params: {} }), {
    ok: false,
    reason: "missing_position",
  });
  assert.deepEqual(
    checkRequestShape({ ...base, actionType: "move", params: { position: v(Number.NaN, 0, 0) } }),
    { ok: false, reason: "bad_position" },
  );
  assert.deepEqual(checkRequestShape({ ...base, params: { rotationY: Number.POSITIVE_INFINITY } }), {
    ok: false,
    reason: "bad_rotation",
  });
});

test("[behavior] validator: malformed request is ValidationFailed and charges nothing", async () => {
  const { validator, ledger } = rig();

  const verdict = await validator.validate(req({ actionType: "move", params: {} }));
  assert.deepEqual(rejection(verdict), { kind: "ValidationFailed", reason: "missing_position" });
  assert.equal(await ledger.getBalance("alice"), 100);
});

test("[behavior] validator: unknown target is NotFound", async () => {
  const { validator } = rig();

  const verdict = await validator.validate(req({ actionType: "destroy", targetInstanceId: "missing" }));
  assert.deepEqual(rejection(verdict), { kind: "NotFound", reason: "not_found" });
});

test("[behavior] validator: non-owner is Forbidden and the object is untouched", async () => {
  const { validator, world, ledger } = rig();

  const verdict = await validator.validate(
    req({ actionType: "move", requesterId: "bob", params: { position: v(3, 0, 0) } }),
  );

  assert.deepEqual(rejection(verdict), { kind: "Forbidden", reason: "not_owner" });
  assert.deepEqual((await world.getObject("placed:a"))?.position, v(0, 0, 0));
  assert.equal(await ledger.getBalance("bob"), 100);
});

test("[behavior] validator: catalog objects only accept clone and examine", async () => {
  const { validator } = rig();

  const verdict = await validator.validate(
    req({ actionType: "destroy", targetInstanceId: undefined, targetCatalogId: "basic_cube" }),
  );
  assert.deepEqual(rejection(verdict), { kind: "Forbidden", reason: "catalog_immutable" });
});

test("[behavior] validator: admins may act on objects they do not own", async () => {
  const { validator, ledger } = rig({ config: { adminIds: ["root"] }, balances: { root: 100 } });

  const verdict = await validator.validate(
    req({ actionType: "rotate", requesterId: "root", params: { rotationY: 450 } }),
  );

  assert.equal(verdict.status, "applied");
  assert.equal(verdict.status === "applied" ? verdict.cost : null, 10);
  assert.equal(verdict.status === "applied" && verdict.object?.kind === "placed" ? verdict.object.rotationY : null, 90);
  assert.equal(await ledger.getBalance("root"), 90);
});

test("[behavior] validator: adminActionsFree makes admin actions cost nothing", async () => {
  const { validator, ledger } = rig({
    config: { adminIds: ["root"], adminActionsFree: true },
    balances: { root: 0 },
  });

  const verdict = await validator.validate(req({ actionType: "destroy", requesterId: "root" }));

  assert.equal(verdict.status, "applied");
  assert.equal(verdict.status === "applied" ? verdict.cost : null, 0);
  assert.equal(verdict.status === "applied" ? verdict.balanceAfter : undefined, null);
  assert.equal(await ledger.getBalance("root"), 0);
});

test("[behavior] validator: rate limit rejects with retryAfterMs", async () => {
  const { validator } = rig({ config: { rateLimits: { rotate: { count: 1, windowMs: 10_000 } } } });

  const first = await validator.validate(req({ actionType: "rotate", params: { rotationY: 10 } }));
  assert.equal(first.status, "applied");

  const second = await validator.validate(req({ actionType: "rotate", params: { rotationY: 20 } }));
  assert.deepEqual(rejection(second), { kind: "RateLimited", reason: "rate_limited" });
  assert.equal(second.status === "rejected" ? second.retryAfterMs : null, 10_000);
});

test("[behavior] validator: rejected-before-rate-limit attempts do not consume the window", async () => {
  const { validator } = rig({ config: { rateLimits: { rotate: { count: 1, windowMs: 10_000 } } } });

  await validator.validate(req({ actionType: "rotate", requesterId: "bob", params: { rotationY: 10 } }));
  await validator.validate(req({ actionType: "rotate", targetInstanceId: "missing", params: { rotationY: 10 } }));

  const verdict = await validator.validate(req({ actionType: "rotate", params: { rotationY: 10 } }));
  assert.equal(verdict.status, "applied");
});

test("[behavior] validator: an invalid base value is ValidationFailed", async () => {
  const { validator, ledger } = rig({ placed: [makePlaced({ instanceId: "a", ownerId: "alice", baseValue: -5 })] });

  const verdict = await validator.validate(req({ actionType: "recall" }));
  assert.deepEqual(rejection(verdict), { kind: "ValidationFailed", reason: "invalid_price_input" });
  assert.equal(await ledger.getBalance("alice"), 100);
});

test("[behavior] validator: insufficient funds reports the shortfall and mutates nothing", async () => {
  const { validator, world, ledger } = rig({ balances: { alice: 10 } });

  const verdict = await validator.validate(req({ actionType: "destroy" }));

  assert.deepEqual(rejection(verdict), { kind: "InsufficientFunds", reason: "insufficient_funds" });
  assert.equal(verdict.status === "rejected" ? verdict.shortfall : null, 70);
  assert.equal(await ledger.getBalance("alice"), 10);
  assert.notEqual(await world.getObject("placed:a"), null);
});

test("[behavior] validator: a refused deduct is InsufficientFunds without a shortfall", async () => {
  const { validator, ledger } = rig();
  ledger.deduct = async () => false;

  const verdict = await validator.validate(req({ actionType: "recall" }));
  assert.deepEqual(rejection(verdict), { kind: "InsufficientFunds", reason: "deduct_refused" });
  assert.equal(verdict.status === "rejected" ? verdict.shortfall : null, undefined);
});

test("[behavior] validator: recall charges baseValue x 0.2 and removes the object", async () => {
  const { validator, world, ledger, events } = rig();
  const recalled: string[] = [];
  events.on("object.recalled", ({ object, ownerId }) => {
    recalled.push(`${object.instanceId}:${ownerId}`);
  });

  const verdict = await validator.validate(req({ actionType: "recall" }));

  assert.equal(verdict.status, "applied");
  if (verdict.status !== "applied") return;
  assert.equal(verdict.cost, 20);
  assert.equal(verdict.balanceAfter, 80);
  assert.equal(verdict.targetKey, "placed:a");
  assert.equal(verdict.replayed, false);
  assert.equal(verdict.appliedAt, 10_000);
  assert.equal(await ledger.getBalance("alice"), 80);
  assert.equal(await world.getObject("placed:a"), null);
  assert.deepEqual(recalled, ["a:alice"]);
});

test("[behavior] validator: clone without a position lands beside the source", async () => {
  const { validator, world, ledger } = rig({ balances: { bob: 150 } });

  const verdict = await validator.validate(
    req({
      actionType: "clone",
      requesterId: "bob",
      targetInstanceId: undefined,
      targetCatalogId: "basic_cube",
    }),
  );

  assert.equal(verdict.status, "applied");
  if (verdict.status !== "applied") return;
  assert.equal(verdict.cost, 100);
  assert.equal(verdict.balanceAfter, 50);
  assert.deepEqual(verdict.object, {
    kind: "placed",
    id: "basic_cube",
    name: "Test Cube",
    instanceId: "inst_fixed",
    ownerId: "bob",
    position: v(1, 0, 0),
    rotationY: 0,
    size: v(1, 1, 1),
    baseValue: 100,
  });
  assert.equal(await world.countOwnedBy("bob"), 1);
  assert.equal(await ledger.getBalance("bob"), 50);
});

test("[behavior] validator: clone is refused at the placement cap", async () => {
  const { validator, ledger } = rig({ config: { maxPlacementsPerParticipant: 1 } });

  const verdict = await validator.validate(
    req({ actionType: "clone", targetInstanceId: undefined, targetCatalogId: "basic_cube" }),
  );
  assert.deepEqual(rejection(verdict), { kind: "Forbidden", reason: "placement_limit" });
  assert.equal(await ledger.getBalance("alice"), 100);
});

test("[behavior] validator: examine is free, skips the ledger and returns the object", async () => {
  const { validator } = rig({ balances: { bob: 0 } });

  const verdict = await validator.validate(req({ actionType: "examine", requesterId: "bob" }));

  assert.equal(verdict.status, "applied");
  if (verdict.status !== "applied") return;
  assert.equal(verdict.cost, 0);
  assert.equal(verdict.balanceAfter, null);
  assert.equal(verdict.object?.kind === "placed" ? verdict.object.instanceId : null, "a");
});

test("[behavior] validator: a rejected token may be retried once funds arrive", async () => {
  const { validator, ledger } = rig({ balances: { alice: 10 } });
  const request = req({ actionType: "recall" });

  assert.equal((await validator.validate(request)).status, "rejected");

  await ledger.credit("alice", 10);
  const retried = await validator.validate(request);
  assert.equal(retried.status, "applied");
  assert.equal(retried.status === "applied" ? retried.replayed : null, false);
  assert.equal(await ledger.getBalance("alice"), 0);
});

test("[behavior] validator: every fresh verdict is published and audited", async () => {
  const { validator, events, audits } = rig({ balances: { alice: 10 } });
  const seen: string[] = [];
  events.on("action.applied", ({ verdict }) => {
    seen.push(`applied:${verdict.actionType}`);
  });
  events.on("action.rejected", ({ verdict }) => {
    seen.push(`rejected:${verdict.reason}`);
  });

  await validator.validate(req({ actionType: "destroy" }));
  await validator.validate(req({ actionType: "examine" }));

  assert.deepEqual(seen, ["rejected:insufficient_funds", "applied:examine"]);
  assert.deepEqual(
    audits.map((a) => [a.result, a.reason ?? null]),
    [
      ["rejected", "insufficient_funds"],
      ["applied", null],
    ],
  );
  assert.equal(audits[0]?.targetKey, "placed:a");
  assert.deepEqual(audits[0]?.meta, { shortfall: 70, retryAfterMs: undefined });
});

test("[contract] validator: available actions follow permissions and current prices", async () => {
  const { validator, world } = rig({ config: { adminIds: ["root"], adminActionsFree: true } });
  const placed = await world.getObject("placed:a");
  const catalog = await world.getObject("catalog:basic_cube");
  assert.ok(placed && catalog);

  assert.deepEqual(validator.availableActions("alice", placed), [
    { actionType: "clone", cost: 100 },
    { actionType: "move", cost: 60 },
    { actionType: "rotate", cost: 10 },
    { actionType: "recall", cost: 20 },
    { actionType: "destroy", cost: 80 },
    { actionType: "examine", cost: 0 },
  ]);
  assert.deepEqual(validator.availableActions("bob", placed), [{ actionType: "examine", cost: 0 }]);
  assert.deepEqual(validator.availableActions("bob", catalog), [
    { actionType: "clone", cost: 100 },
    { actionType: "examine", cost: 0 },
  ]);
  assert.deepEqual(
    validator.availableActions("root", placed).map((a) => a.cost),
    [0, 0, 0, 0, 0, 0],
  );
});
