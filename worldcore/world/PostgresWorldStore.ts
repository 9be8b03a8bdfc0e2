// worldcore/world/PostgresWorldStore.ts
//
// Write-through world store: placed_objects is the record, an
// InMemoryWorldStore is the read index (targeting and ray casts never touch
// the DB). Each mutation is one statement; the memory copy is updated only
// after Postgres accepted it.

import { Logger } from "../utils/logger";
import type {
  InteractableObject,
  ObjectKey,
  ParticipantId,
  PlacedObject,
} from "../shared/InteractableObject";
import type { Vec3 } from "../shared/Vec3";
import { normalizeRotation } from "../shared/InteractableObject";
import { readNumeric, readString, resolveQueryable, type Queryable } from "../db/Queryable";
import { isRecord } from "../utils/guards";
import type { InMemoryWorldStore } from "./InMemoryWorldStore";
import type { MutationResult, WorldMutationStore } from "./WorldIndex";
import { assignInstanceId } from "./InstanceIdAssigner";

const log = Logger.scope("WORLD");

const PLACED_COLUMNS = `
  instance_id, item_id, name, owner_id,
  pos_x, pos_y, pos_z,
  size_x, size_y, size_z,
  rotation_y, base_value
`;

export function parsePlacedRow(row: unknown): PlacedObject | null {
  if (!isRecord(row)) return null;

  const instanceId = readString(row, "instance_id");
  const id = readString(row, "item_id");
  const ownerId = readString(row, "owner_id");
  const nums = [
    "pos_x",
    "pos_y",
    "pos_z",
    "size_x",
    "size_y",
    "size_z",
    "rotation_y",
    "base_value",
  ].map((c) => readNumeric(row, c));

  if (!instanceId || !id || !ownerId) return null;

  const [px, py, pz, sx, sy, sz, rot, value] = nums;
  if (
    px === null ||
    py === null ||
    pz === null ||
    sx === null ||
    sy === null ||
    sz === null ||
    rot === null ||
    value === null
  ) {
    return null;
  }

  return {
    kind: "placed",
    instanceId,
    id,
    name: readString(row, "name") ?? undefined,
    ownerId,
    position: { x: px, y: py, z: pz },
    size: { x: sx, y: sy, z: sz },
    rotationY: rot,
    baseValue: value,
  };
}

export class PostgresWorldStore implements WorldMutationStore {
  constructor(
    private readonly memory: InMemoryWorldStore,
    private readonly queryable?: Queryable,
  ) {}

  /** Load every placed object into the read index. Call once at boot. */
  async hydrate(): Promise<number> {
    const q = await resolveQueryable(this.queryable);
    const res = await q.query(`SELECT ${PLACED_COLUMNS} FROM placed_objects`);

    const objects: PlacedObject[] = [];
    for (const row of res.rows) {
      const parsed = parsePlacedRow(row);
      if (parsed) objects.push(parsed);
      else log.warn("Skipping malformed placed_objects row", { row });
    }

    this.memory.replacePlaced(objects);
    log.info("World hydrated from Postgres", { placed: objects.length });
    return objects.length;
  }

  async getObject(key: ObjectKey): Promise<InteractableObject | null> {
    return this.memory.getObject(key);
  }

  async countOwnedBy(ownerId: ParticipantId): Promise<number> {
    return this.memory.countOwnedBy(ownerId);
  }

  async applyClone(
    source: InteractableObject,
    ownerId: ParticipantId,
    position: Vec3,
  ): Promise<MutationResult> {
    const instanceId = assignInstanceId((id) => this.memory.isInstanceTaken(id));
    if (!instanceId) return { ok: false, reason: "instance_id_exhausted" };

    const q = await resolveQueryable(this.queryable);
    const rotationY = source.kind === "placed" ? source.rotationY : 0;

    await q.query(
      `
      INSERT INTO placed_objects (${PLACED_COLUMNS})
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
      `,
      [
        instanceId,
        source.id,
        source.name ?? null,
        ownerId,
        position.x,
        position.y,
        position.z,
        source.size.x,
        source.size.y,
        source.size.z,
        rotationY,
        source.baseValue,
      ],
    );

    return this.memory.cloneNow(source, ownerId, position, instanceId);
  }

  async applyMove(instanceId: string, position: Vec3): Promise<MutationResult> {
    const q = await resolveQueryable(this.queryable);
    const res = await q.query(
      `
      UPDATE placed_objects
      SET pos_x = $2, pos_y = $3, pos_z = $4, updated_at = NOW()
      WHERE instance_id = $1
      `,
      [instanceId, position.x, position.y, position.z],
    );
    if ((res.rowCount ?? 0) === 0) return { ok: false, reason: "not_found" };

    return this.memory.moveNow(instanceId, position);
  }

  async applyRotate(instanceId: string, rotationY: number): Promise<MutationResult> {
    const q = await resolveQueryable(this.queryable);
    const res = await q.query(
      `
      UPDATE placed_objects
      SET rotation_y = $2, updated_at = NOW()
      WHERE instance_id = $1
      `,
      [instanceId, normalizeRotation(rotationY)],
    );
    if ((res.rowCount ?? 0) === 0) return { ok: false, reason: "not_found" };

    return this.memory.rotateNow(instanceId, rotationY);
  }

  async applyDestroy(instanceId: string): Promise<MutationResult> {
    return this.remove(instanceId, "destroyed");
  }

  async applyRecall(instanceId: string): Promise<MutationResult> {
    return this.remove(instanceId, "recalled");
  }

  private async remove(
    instanceId: string,
    how: "destroyed" | "recalled",
  ): Promise<MutationResult> {
    const q = await resolveQueryable(this.queryable);
    const res = await q.query(`DELETE FROM placed_objects WHERE instance_id = $1`, [instanceId]);
    if ((res.rowCount ?? 0) === 0) return { ok: false, reason: "not_found" };

    return this.memory.removeNow(instanceId, how);
  }
}
