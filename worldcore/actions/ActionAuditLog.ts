// worldcore/actions/ActionAuditLog.ts
//
// Durable record of every validated action (applied or rejected).
//
// - Never blocks or fails an action if the DB write fails.
// - Unit tests must not touch Postgres (WORLDCORE_TEST=1); capture mode
//   (BW_TEST_CAPTURE_ACTION_AUDIT=1) collects events in memory instead.
// - Rejections always carry a non-empty reason code.

import { Logger } from "../utils/logger";
import { isRecord } from "../utils/guards";
import { resolveQueryable, type Queryable } from "../db/Queryable";
import type { ActionVerdict } from "./ActionErrors";
import type { ActionRequest } from "./ActionTypes";

const log = Logger.scope("ACTION_AUDIT");

export type ActionAuditResult = "applied" | "rejected";

export type ActionAuditEvent = {
  ts: string; // ISO
  correlationToken: string;
  requesterId: string;
  actionType: string;
  targetKey?: string | null;

  result: ActionAuditResult;
  errorKind?: string | null;
  reason?: string | null;

  cost?: number | null;
  balanceAfter?: number | null;

  /** Persisted as JSON. */
  meta?: Record<string, unknown> | null;
};

const CAPTURE_ENABLED = () => String(process.env.BW_TEST_CAPTURE_ACTION_AUDIT ?? "") === "1";
const UNIT_TEST_MODE = () => String(process.env.WORLDCORE_TEST ?? "") === "1";

let captured: ActionAuditEvent[] = [];

/** TEST ONLY: reset captured events. */
export function __resetCapturedActionEvents(): void {
  captured = [];
}

/** TEST ONLY: get captured events. */
export function __getCapturedActionEvents(): ActionAuditEvent[] {
  return [...captured];
}

export function auditEventFor(
  request: ActionRequest,
  verdict: ActionVerdict,
  at: number,
): ActionAuditEvent {
  const base = {
    ts: new Date(at).toISOString(),
    correlationToken: verdict.correlationToken,
    requesterId: request.requesterId,
    actionType: request.actionType,
  };

  if (verdict.status === "applied") {
    return {
      ...base,
      targetKey: verdict.targetKey,
      result: "applied",
      cost: verdict.cost,
      balanceAfter: verdict.balanceAfter,
      meta: verdict.object?.kind === "placed" ? { instanceId: verdict.object.instanceId } : null,
    };
  }

  return {
    ...base,
    targetKey: verdict.targetKey ?? null,
    result: "rejected",
    errorKind: verdict.kind,
    reason: verdict.reason,
    meta:
      verdict.shortfall !== undefined || verdict.retryAfterMs !== undefined
        ? { shortfall: verdict.shortfall, retryAfterMs: verdict.retryAfterMs }
        : null,
  };
}

function normalizeEvent(input: ActionAuditEvent): ActionAuditEvent {
  const metaIn = isRecord(input.meta) ? input.meta : {};
  const meta: Record<string, unknown> = { schemaVersion: 1, ...metaIn };

  let reason = String(input.reason ?? "").trim() || null;
  if (input.result !== "applied" && !reason) reason = "unspecified";

  return { ...input, reason, meta };
}

export async function logActionEvent(ev: ActionAuditEvent, queryable?: Queryable): Promise<void> {
  const normalized = normalizeEvent(ev);

  if (CAPTURE_ENABLED()) captured.push(normalized);

  if (UNIT_TEST_MODE() && !queryable) return;

  // Ops kill switch.
  if (String(process.env.BW_ACTION_AUDIT_DB ?? "") === "0") return;

  try {
    const q = await resolveQueryable(queryable);
    await q.query(
      `
      INSERT INTO action_log (
        ts,
        correlation_token,
        requester_id,
        action_type,
        target_key,
        result,
        error_kind,
        reason,
        cost,
        balance_after,
        meta
      ) VALUES (
        $1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11
      )
      `,
      [
        normalized.ts,
        normalized.correlationToken,
        normalized.requesterId,
        normalized.actionType,
        normalized.targetKey ?? null,
        normalized.result,
        normalized.errorKind ?? null,
        normalized.reason ?? null,
        normalized.cost ?? null,
        normalized.balanceAfter ?? null,
        normalized.meta ? JSON.stringify(normalized.meta) : null,
      ],
    );
  } catch (err) {
    log.warn("action audit insert failed", { err });
  }
}
