// worldcore/world/WorldIndex.ts
//
// Collaborator contracts the interaction core consumes.
// The core never owns world state; it reads through CandidateSource and
// writes through WorldMutationStore.

import type {
  InteractableObject,
  ObjectKey,
  ParticipantId,
  PlacedObject,
} from "../shared/InteractableObject";
import type { Vec3 } from "../shared/Vec3";

/** Read side. May be stale by up to one tick. */
export interface CandidateSource {
  enumerateNearby(position: Vec3, radius: number): Iterable<InteractableObject>;
  /** Optional: lets the tracker tell "destroyed" from "walked away". */
  contains?(key: ObjectKey): boolean;
}

export type MutationResult =
  | { ok: true; object: PlacedObject }
  | { ok: false; reason: string };

/**
 * Write side. Each call is atomic for its one object; there are no
 * multi-object transactions.
 */
export interface WorldMutationStore {
  getObject(key: ObjectKey): Promise<InteractableObject | null>;
  countOwnedBy(ownerId: ParticipantId): Promise<number>;

  applyClone(
    source: InteractableObject,
    ownerId: ParticipantId,
    position: Vec3,
  ): Promise<MutationResult>;
  applyMove(instanceId: string, position: Vec3): Promise<MutationResult>;
  applyRotate(instanceId: string, rotationY: number): Promise<MutationResult>;
  applyDestroy(instanceId: string): Promise<MutationResult>;
  applyRecall(instanceId: string): Promise<MutationResult>;
}
