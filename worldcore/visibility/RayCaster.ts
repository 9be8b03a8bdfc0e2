// worldcore/visibility/RayCaster.ts

import type { Vec3 } from "../shared/Vec3";

export const SURFACE_KINDS = [
  "solid",
  "transparent",
  "avatar",
  "preview_ghost",
  "decorative",
] as const;

export type SurfaceKind = (typeof SURFACE_KINDS)[number];

export interface RayHit {
  surfaceId: string;
  surface: SurfaceKind;
  /** Distance from the segment origin. */
  distance: number;
}

export interface SegmentQuery {
  origin: Vec3;
  target: Vec3;
  /** Surfaces never reported (the target itself, the observer's own avatar). */
  ignoreIds: ReadonlySet<string>;
  /** Classification: true if this surface kind stops the ray. */
  blocks: (surface: SurfaceKind) => boolean;
}

/**
 * Engine-facing ray query.
 *
 * castSegment returns the nearest blocking hit strictly before `target`,
 * or null when the segment is clear. Implementations may throw on engine
 * failure; VisibilityChecker fails closed on that.
 */
export interface RayCaster {
  castSegment(query: SegmentQuery): RayHit | null;
}

export interface BlockingRules {
  nonBlockingSurfaces: readonly SurfaceKind[];
  transparentSurfacesBlock: boolean;
}

export function makeBlockingFilter(rules: BlockingRules): (surface: SurfaceKind) => boolean {
  const passThrough = new Set<SurfaceKind>(rules.nonBlockingSurfaces);

  return (surface) => {
    if (surface === "transparent") return rules.transparentSurfacesBlock;
    return !passThrough.has(surface);
  };
}
