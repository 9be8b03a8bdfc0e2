// worldcore/world/InMemoryWorldStore.ts
//
// Single-process world state:
//  - CandidateSource for TargetTracker
//  - WorldMutationStore for ActionValidator
//  - OccluderSource for AabbRayCaster (static geometry + every object + avatars)
//
// Used directly by tests and by the shard in BW_STORAGE=memory mode, and as
// the read index behind PostgresWorldStore.

import type {
  CatalogObject,
  InteractableObject,
  ObjectKey,
  ParticipantId,
  PlacedObject,
} from "../shared/InteractableObject";
import { normalizeRotation, objectKey } from "../shared/InteractableObject";
import type { Vec3 } from "../shared/Vec3";
import { distance } from "../shared/Vec3";
import type { Occluder, OccluderSource } from "../visibility/AabbRayCaster";
import { occluderFromBounds } from "../visibility/AabbRayCaster";
import type { CandidateSource, MutationResult, WorldMutationStore } from "./WorldIndex";
import { assignInstanceId } from "./InstanceIdAssigner";
import type { WorldEventBus } from "./WorldEventBus";

// Avatars are approximated by a person-sized box centered at chest height.
const AVATAR_SIZE: Vec3 = { x: 0.8, y: 1.8, z: 0.8 };

export interface InMemoryWorldSeed {
  catalog?: CatalogObject[];
  placed?: PlacedObject[];
  occluders?: Occluder[];
}

export class InMemoryWorldStore implements CandidateSource, WorldMutationStore, OccluderSource {
  private readonly catalog = new Map<string, CatalogObject>();
  private readonly placed = new Map<string, PlacedObject>();
  private readonly staticOccluders: Occluder[] = [];
  private readonly avatars = new Map<ParticipantId, Vec3>();

  constructor(
    seed: InMemoryWorldSeed = {},
    private readonly events?: WorldEventBus,
    private readonly generateId?: () => string,
  ) {
    for (const c of seed.catalog ?? []) this.catalog.set(c.id, { ...c });
    for (const p of seed.placed ?? []) this.placed.set(p.instanceId, { ...p });
    this.staticOccluders.push(...(seed.occluders ?? []));
  }

  // ---------------------------------------------------------------------------
  // CandidateSource
  // ---------------------------------------------------------------------------

  *enumerateNearby(position: Vec3, radius: number): Iterable<InteractableObject> {
    for (const c of this.catalog.values()) {
      if (distance(position, c.position) <= radius) yield c;
    }
    for (const p of this.placed.values()) {
      if (distance(position, p.position) <= radius) yield p;
    }
  }

  contains(key: ObjectKey): boolean {
    return this.lookup(key) !== null;
  }

  // ---------------------------------------------------------------------------
  // OccluderSource
  // ---------------------------------------------------------------------------

  *listOccluders(): Iterable<Occluder> {
    yield* this.staticOccluders;

    for (const c of this.catalog.values()) {
      yield occluderFromBounds(objectKey(c), c.position, c.size);
    }
    for (const p of this.placed.values()) {
      yield occluderFromBounds(objectKey(p), p.position, p.size);
    }
    for (const [participantId, pos] of this.avatars) {
      const center = { x: pos.x, y: pos.y + AVATAR_SIZE.y / 2, z: pos.z };
      yield occluderFromBounds(participantId, center, AVATAR_SIZE, "avatar");
    }
  }

  /** Avatar boxes follow participant positions (pose updates). */
  setAvatar(participantId: ParticipantId, position: Vec3 | null): void {
    if (position) this.avatars.set(participantId, { ...position });
    else this.avatars.delete(participantId);
  }

  // ---------------------------------------------------------------------------
  // WorldMutationStore
  // ---------------------------------------------------------------------------

  async getObject(key: ObjectKey): Promise<InteractableObject | null> {
    const obj = this.lookup(key);
    return obj ? { ...obj } : null;
  }

  async countOwnedBy(ownerId: ParticipantId): Promise<number> {
    let n = 0;
    for (const p of this.placed.values()) {
      if (p.ownerId === ownerId) n++;
    }
    return n;
  }

  async applyClone(
    source: InteractableObject,
    ownerId: ParticipantId,
    position: Vec3,
  ): Promise<MutationResult> {
    return this.cloneNow(source, ownerId, position);
  }

  async applyMove(instanceId: string, position: Vec3): Promise<MutationResult> {
    return this.moveNow(instanceId, position);
  }

  async applyRotate(instanceId: string, rotationY: number): Promise<MutationResult> {
    return this.rotateNow(instanceId, rotationY);
  }

  async applyDestroy(instanceId: string): Promise<MutationResult> {
    return this.removeNow(instanceId, "destroyed");
  }

  async applyRecall(instanceId: string): Promise<MutationResult> {
    return this.removeNow(instanceId, "recalled");
  }

  // ---------------------------------------------------------------------------
  // Synchronous primitives (PostgresWorldStore replays into these after a write)
  // ---------------------------------------------------------------------------

  cloneNow(
    source: InteractableObject,
    ownerId: ParticipantId,
    position: Vec3,
    instanceId?: string,
  ): MutationResult {
    const id = instanceId ?? assignInstanceId((candidate) => this.placed.has(candidate), this.generateId);
    if (!id) return { ok: false, reason: "instance_id_exhausted" };
    if (this.placed.has(id)) return { ok: false, reason: "instance_id_taken" };

    const copy: PlacedObject = {
      kind: "placed",
      id: source.id,
      name: source.name,
      instanceId: id,
      ownerId,
      position: { ...position },
      rotationY: source.kind === "placed" ? source.rotationY : 0,
      size: { ...source.size },
      baseValue: source.baseValue,
    };

    this.placed.set(id, copy);
    this.events?.emit("object.placed", { object: { ...copy }, sourceKey: objectKey(source) });
    return { ok: true, object: { ...copy } };
  }

  moveNow(instanceId: string, position: Vec3): MutationResult {
    const obj = this.placed.get(instanceId);
    if (!obj) return { ok: false, reason: "not_found" };

    obj.position = { ...position };
    this.events?.emit("object.moved", { object: { ...obj } });
    return { ok: true, object: { ...obj } };
  }

  rotateNow(instanceId: string, rotationY: number): MutationResult {
    const obj = this.placed.get(instanceId);
    if (!obj) return { ok: false, reason: "not_found" };

    obj.rotationY = normalizeRotation(rotationY);
    this.events?.emit("object.rotated", { object: { ...obj } });
    return { ok: true, object: { ...obj } };
  }

  removeNow(instanceId: string, how: "destroyed" | "recalled"): MutationResult {
    const obj = this.placed.get(instanceId);
    if (!obj) return { ok: false, reason: "not_found" };

    this.placed.delete(instanceId);
    if (how === "recalled") {
      this.events?.emit("object.recalled", { object: { ...obj }, ownerId: obj.ownerId });
    } else {
      this.events?.emit("object.destroyed", { object: { ...obj } });
    }
    return { ok: true, object: obj };
  }

  /** Bulk load (PostgresWorldStore.hydrate). Replaces placed objects. */
  replacePlaced(objects: PlacedObject[]): void {
    this.placed.clear();
    for (const p of objects) this.placed.set(p.instanceId, { ...p });
  }

  isInstanceTaken(instanceId: string): boolean {
    return this.placed.has(instanceId);
  }

  get placedCount(): number {
    return this.placed.size;
  }

  private lookup(key: ObjectKey): InteractableObject | null {
    if (key.startsWith("placed:")) {
      return this.placed.get(key.slice("placed:".length)) ?? null;
    }
    if (key.startsWith("catalog:")) {
      return this.catalog.get(key.slice("catalog:".length)) ?? null;
    }
    return null;
  }
}
