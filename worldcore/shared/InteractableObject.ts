// worldcore/shared/InteractableObject.ts
//
// World entities a participant can target and act on.
//
// Two kinds only:
//  - catalog: defined by configuration (data/catalog.json), immutable, no instanceId.
//  - placed:  created by Clone, mutated by Move/Rotate, removed by Destroy/Recall.
//
// Switch on `kind`; the never-guard in objectKey() keeps new kinds honest.

import type { Vec3 } from "./Vec3";

export type ParticipantId = string;

export interface ObjectBase {
  /** Stable item-type identifier ("basic_cube"). */
  id: string;
  name?: string;
  /** Center of the bounding box, world units. */
  position: Vec3;
  /** Full bounding-box extents (width/height/depth). */
  size: Vec3;
  /** Reference price in currency units; action costs derive from it. */
  baseValue: number;
}

export interface CatalogObject extends ObjectBase {
  kind: "catalog";
}

export interface PlacedObject extends ObjectBase {
  kind: "placed";
  instanceId: string;
  ownerId: ParticipantId;
  /** Yaw in degrees, normalized to [0, 360). */
  rotationY: number;
}

export type InteractableObject = CatalogObject | PlacedObject;

export type ObjectKey = string;

export function objectKey(obj: InteractableObject): ObjectKey {
  switch (obj.kind) {
    case "catalog":
      return catalogKey(obj.id);
    case "placed":
      return placedKey(obj.instanceId);
    default: {
      const _never: never = obj;
      return _never;
    }
  }
}

export function placedKey(instanceId: string): ObjectKey {
  return `placed:${instanceId}`;
}

export function catalogKey(id: string): ObjectKey {
  return `catalog:${id}`;
}

export function displayName(obj: InteractableObject): string {
  return obj.name ?? obj.id;
}

export function normalizeRotation(deg: number): number {
  const r = deg % 360;
  return r < 0 ? r + 360 : r;
}
