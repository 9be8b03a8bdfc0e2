// worldcore/test/contract_actionAuditLog.test.ts
//
// Contract: audit events are normalized, captured in test mode, and written
// to action_log through an injected Queryable.

import test from "node:test";
import assert from "node:assert/strict";

import {
  __getCapturedActionEvents,
  __resetCapturedActionEvents,
  auditEventFor,
  logActionEvent,
} from "../actions/ActionAuditLog";
import { ErrorKind, reject, type ActionApplied } from "../actions/ActionErrors";
import type { ActionRequest } from "../actions/ActionTypes";
import { FakeQueryable, makePlaced, withEnv } from "./testUtils";

const request: ActionRequest = {
  actionType: "clone",
  targetCatalogId: "basic_cube",
  requesterId: "alice",
  submittedAt: 0,
  correlationToken: "tok-1",
};

const applied: ActionApplied = {
  status: "applied",
  correlationToken: "tok-1",
  actionType: "clone",
  targetKey: "catalog:basic_cube",
  cost: 100,
  balanceAfter: 0,
  object: makePlaced({ instanceId: "inst_9" }),
  appliedAt: 0,
  replayed: false,
};

test("[contract] action audit: applied events carry cost and the new instance id", () => {
  assert.deepEqual(auditEventFor(request, applied, 0), {
    ts: "1970-01-01T00:00:00.000Z",
    correlationToken: "tok-1",
    requesterId: "alice",
    actionType: "clone",
    targetKey: "catalog:basic_cube",
    result: "applied",
    cost: 100,
    balanceAfter: 0,
    meta: { instanceId: "inst_9" },
  });
});

test("[contract] action audit: rejections carry kind, reason and retry hints", () => {
  const ev = auditEventFor(
    request,
    reject(ErrorKind.RateLimited, "rate_limited", "tok-1", { retryAfterMs: 800 }),
    0,
  );

  assert.equal(ev.result, "rejected");
  assert.equal(ev.errorKind, "RateLimited");
  assert.equal(ev.reason, "rate_limited");
  assert.equal(ev.targetKey, null);
  assert.deepEqual(ev.meta, { shortfall: undefined, retryAfterMs: 800 });
});

test("[contract] action audit: capture mode records normalized events without a DB", async () => {
  await withEnv({ BW_TEST_CAPTURE_ACTION_AUDIT: "1", WORLDCORE_TEST: "1" }, async () => {
    __resetCapturedActionEvents();

    await logActionEvent({ ...auditEventFor(request, applied, 0) });
    await logActionEvent({
      ...auditEventFor(request, reject(ErrorKind.Forbidden, "", "tok-2"), 0),
      reason: "  ",
    });

    const events = __getCapturedActionEvents();
    assert.equal(events.length, 2);
    assert.deepEqual(events[0]?.meta, { schemaVersion: 1, instanceId: "inst_9" });
    assert.equal(events[0]?.reason, null);
    assert.equal(events[1]?.reason, "unspecified");
    assert.deepEqual(events[1]?.meta, { schemaVersion: 1 });
  });
});

test("[contract] action audit: writes one action_log row through an injected queryable", async () => {
  const q = new FakeQueryable();

  await withEnv({ BW_ACTION_AUDIT_DB: undefined }, async () => {
    await logActionEvent(auditEventFor(request, applied, 0), q);
  });

  assert.equal(q.queries.length, 1);
  assert.match(q.queries[0]?.text ?? "", /INSERT INTO action_log/);
  assert.deepEqual(q.queries[0]?.values, [
    "1970-01-01T00:00:00.000Z",
    "tok-1",
    "alice",
    "clone",
    "catalog:basic_cube",
    "applied",
    null,
    null,
    100,
    0,
    JSON.stringify({ schemaVersion: 1, instanceId: "inst_9" }),
  ]);
});

test("[contract] action audit: the kill switch skips the insert", async () => {
  const q = new FakeQueryable();

  await withEnv({ BW_ACTION_AUDIT_DB: "0" }, async () => {
    await logActionEvent(auditEventFor(request, applied, 0), q);
  });

  assert.equal(q.queries.length, 0);
});

test("[contract] action audit: a failing insert never throws", async () => {
  const q = new FakeQueryable(() => {
    throw new Error("relation action_log does not exist");
  });

  await assert.doesNotReject(() => logActionEvent(auditEventFor(request, applied, 0), q));
});
