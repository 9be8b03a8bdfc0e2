// worldcore/actions/ActionPermissions.ts

import type { InteractableObject, ParticipantId } from "../shared/InteractableObject";
import type { ActionType } from "./ActionTypes";

export interface PermissionPolicy {
  isAdmin(participantId: ParticipantId): boolean;
}

/** Admins come from config (BW_ADMIN_IDS). */
export class ConfigPermissionPolicy implements PermissionPolicy {
  private readonly admins: ReadonlySet<ParticipantId>;

  constructor(adminIds: readonly ParticipantId[]) {
    this.admins = new Set(adminIds);
  }

  isAdmin(participantId: ParticipantId): boolean {
    return this.admins.has(participantId);
  }
}

/**
 * Reason code when `requesterId` may not perform `actionType` on `target`,
 * or null when allowed.
 *
 *   examine          anyone
 *   clone            anyone for catalog objects; owner/admin for placed ones
 *   move/rotate/
 *   recall/destroy   owner/admin; never on catalog objects
 */
export function permissionDenial(
  actionType: ActionType,
  target: InteractableObject,
  requesterId: ParticipantId,
  policy: PermissionPolicy,
): string | null {
  if (actionType === "examine") return null;

  if (target.kind === "catalog") {
    return actionType === "clone" ? null : "catalog_immutable";
  }

  switch (actionType) {
    case "clone":
    case "move":
    case "rotate":
    case "recall":
    case "destroy":
      return target.ownerId === requesterId || policy.isAdmin(requesterId) ? null : "not_owner";
    default: {
      const _never: never = actionType;
      return _never;
    }
  }
}
