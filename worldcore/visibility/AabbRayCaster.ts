// worldcore/visibility/AabbRayCaster.ts
//
// In-process RayCaster over axis-aligned boxes (slab test).
// The shard has no physics engine; static level geometry and every object
// in the world are approximated by their bounding boxes.

import type { Vec3 } from "../shared/Vec3";
import { sub, length } from "../shared/Vec3";
import type { RayCaster, RayHit, SegmentQuery, SurfaceKind } from "./RayCaster";

export interface Occluder {
  id: string;
  min: Vec3;
  max: Vec3;
  surface: SurfaceKind;
}

export interface OccluderSource {
  listOccluders(): Iterable<Occluder>;
}

/** Box from a center + full extents, the way objects store their bounds. */
export function occluderFromBounds(
  id: string,
  center: Vec3,
  size: Vec3,
  surface: SurfaceKind = "solid",
): Occluder {
  const hx = size.x / 2;
  const hy = size.y / 2;
  const hz = size.z / 2;
  return {
    id,
    surface,
    min: { x: center.x - hx, y: center.y - hy, z: center.z - hz },
    max: { x: center.x + hx, y: center.y + hy, z: center.z + hz },
  };
}

// Hits this close to the segment end count as "reached the sample point".
const END_EPSILON = 1e-6;

/**
 * Entry parameter t ∈ [0, 1] of the segment origin + t·dir into the box, or
 * null if the segment misses it. An origin inside the box enters at t = 0.
 */
export function segmentEntry(origin: Vec3, dir: Vec3, box: Occluder): number | null {
  let tMin = 0;
  let tMax = 1;

  const axes: Array<"x" | "y" | "z"> = ["x", "y", "z"];
  for (const axis of axes) {
    const o = origin[axis];
    const d = dir[axis];
    const lo = box.min[axis];
    const hi = box.max[axis];

    if (Math.abs(d) < 1e-12) {
      if (o < lo || o > hi) return null;
      continue;
    }

    let t1 = (lo - o) / d;
    let t2 = (hi - o) / d;
    if (t1 > t2) {
      const tmp = t1;
      t1 = t2;
      t2 = tmp;
    }

    tMin = Math.max(tMin, t1);
    tMax = Math.min(tMax, t2);
    if (tMin > tMax) return null;
  }

  return tMin;
}

export class AabbRayCaster implements RayCaster {
  constructor(private readonly source: OccluderSource) {}

  castSegment(query: SegmentQuery): RayHit | null {
    const dir = sub(query.target, query.origin);
    const segLen = length(dir);
    if (segLen === 0) return null;

    let nearest: RayHit | null = null;

    for (const box of this.source.listOccluders()) {
      if (query.ignoreIds.has(box.id)) continue;
      if (!query.blocks(box.surface)) continue;

      const t = segmentEntry(query.origin, dir, box);
      if (t === null || t >= 1 - END_EPSILON) continue;

      const hitDistance = t * segLen;
      if (!nearest || hitDistance < nearest.distance) {
        nearest = { surfaceId: box.id, surface: box.surface, distance: hitDistance };
      }
    }

    return nearest;
  }
}
