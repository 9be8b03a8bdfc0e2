// worldcore/actions/ActionTypes.ts

/**
 * Action request definitions.
 *
 * Design goals:
 * - Server-authoritative "intent" messages; the client never decides cost or outcome.
 * - A single closed set of action types. Adding one means touching ACTION_TYPES,
 *   the multiplier/rate tables and every exhaustive switch; the compiler finds them.
 *
 * Target resolution:
 * - Placed objects are addressed by `targetInstanceId`.
 * - Catalog objects have no instance; they are addressed by `targetCatalogId`.
 * - Exactly one of the two must be present, otherwise the request is ValidationFailed.
 *
 * Idempotency:
 * - `correlationToken` is opaque and chosen by the client. A retry MUST reuse it.
 *   The server applies a token at most once and replays the recorded result.
 */

import type { Vec3 } from "../shared/Vec3";
import type { ParticipantId } from "../shared/InteractableObject";

export const ACTION_TYPES = [
  "clone",
  "move",
  "rotate",
  "recall",
  "destroy",
  "examine",
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export function isActionType(v: unknown): v is ActionType {
  return ACTION_TYPES.some((t) => t === v);
}

/** An action offered on a target, priced as it would be charged now. */
export interface AvailableAction {
  actionType: ActionType;
  cost: number;
}

export interface ActionParams {
  /**
   * Destination for Move; placement spot for Clone.
   * Clone without a position places the copy beside the source.
   */
  position?: Vec3;
  /** Absolute yaw in degrees for Rotate. */
  rotationY?: number;
}

export interface ActionRequest {
  actionType: ActionType;
  targetInstanceId?: string;
  targetCatalogId?: string;
  requesterId: ParticipantId;
  /** ms epoch, client clock; informational only. */
  submittedAt: number;
  correlationToken: string;
  params?: ActionParams;
}

/** Actions that remove the target from the world when applied. */
export function removesTarget(actionType: ActionType): boolean {
  switch (actionType) {
    case "destroy":
    case "recall":
      return true;
    case "clone":
    case "move":
    case "rotate":
    case "examine":
      return false;
    default: {
      const _never: never = actionType;
      return _never;
    }
  }
}
