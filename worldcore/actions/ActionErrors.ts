// worldcore/actions/ActionErrors.ts
//
// Classified outcomes of ActionValidator.validate().
// Nothing in the validator throws to the caller; every failure is one of these kinds.

import type { ActionType } from "./ActionTypes";
import type { InteractableObject, ObjectKey } from "../shared/InteractableObject";

export const ErrorKind = {
  Concurrent: "Concurrent",
  NotFound: "NotFound",
  Forbidden: "Forbidden",
  RateLimited: "RateLimited",
  InsufficientFunds: "InsufficientFunds",
  ValidationFailed: "ValidationFailed",
  Unavailable: "Unavailable",
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export interface ActionRejection {
  status: "rejected";
  kind: ErrorKind;
  /** Stable reason code for logs/audit (e.g. "lock_held", "not_owner"). */
  reason: string;
  correlationToken: string;
  actionType?: ActionType;
  targetKey?: ObjectKey;
  /** InsufficientFunds only: cost - balance, when the balance was read. */
  shortfall?: number;
  /** RateLimited only. */
  retryAfterMs?: number;
}

export interface ActionApplied {
  status: "applied";
  correlationToken: string;
  actionType: ActionType;
  targetKey: ObjectKey;
  cost: number;
  /** Balance after deduction; null when the ledger was not consulted. */
  balanceAfter: number | null;
  /** Object state after the action (clone: the new copy; examine: the target). */
  object: InteractableObject | null;
  appliedAt: number;
  /** True when this is an idempotent replay of an earlier application. */
  replayed: boolean;
}

export type ActionVerdict = ActionApplied | ActionRejection;

export class CollaboratorTimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "CollaboratorTimeoutError";
  }
}

export function reject(
  kind: ErrorKind,
  reason: string,
  correlationToken: string,
  extra: Partial<Omit<ActionRejection, "status" | "kind" | "reason" | "correlationToken">> = {},
): ActionRejection {
  return { status: "rejected", kind, reason, correlationToken, ...extra };
}

/**
 * Participant-facing message for a rejection.
 *
 * Forbidden and NotFound share one message so ownership/existence does not leak.
 */
export function describeRejection(r: ActionRejection): string {
  switch (r.kind) {
    case ErrorKind.Forbidden:
    case ErrorKind.NotFound:
      return "You can't do that.";
    case ErrorKind.InsufficientFunds:
      return r.shortfall === undefined
        ? "You don't have enough coins."
        : `You need ${r.shortfall} more coins.`;
    case ErrorKind.RateLimited: {
      const secs = Math.max(1, Math.ceil((r.retryAfterMs ?? 0) / 1000));
      return `Slow down. Try again in ${secs}s.`;
    }
    case ErrorKind.Concurrent:
      return "Someone else is using this.";
    case ErrorKind.ValidationFailed:
      return "That request was malformed.";
    case ErrorKind.Unavailable:
      return "The world is busy, try again shortly.";
    default: {
      const _never: never = r.kind;
      return _never;
    }
  }
}
