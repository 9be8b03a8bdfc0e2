// worldcore/visibility/SamplePoints.ts
//
// Points on a candidate's bounding box that occlusion rays aim at.
// Order matters: callers take a prefix, so the list starts with the center
// and then alternates opposite corners to keep any prefix spread out.

import type { Vec3 } from "../shared/Vec3";

export const MIN_SAMPLES = 4;

// Pull samples slightly inside the box so rays do not graze neighbouring faces.
const INSET = 0.9;

const CORNER_SIGNS: ReadonlyArray<readonly [number, number, number]> = [
  [-1, -1, -1],
  [1, 1, 1],
  [1, -1, -1],
  [-1, 1, 1],
  [-1, 1, -1],
  [1, -1, 1],
  [-1, -1, 1],
  [1, 1, -1],
];

const EDGE_SIGNS: ReadonlyArray<readonly [number, number, number]> = [
  [0, -1, -1],
  [0, 1, 1],
  [-1, 0, -1],
  [1, 0, 1],
  [-1, -1, 0],
  [1, 1, 0],
  [0, 1, -1],
  [0, -1, 1],
  [1, 0, -1],
  [-1, 0, 1],
  [1, -1, 0],
  [-1, 1, 0],
];

export const MAX_SAMPLES = 1 + CORNER_SIGNS.length + EDGE_SIGNS.length;

/**
 * How many rays an object of this size gets.
 *
 * Small props (largest extent < 1) get the minimum, mid-size (< 2) get 6,
 * everything else gets the configured count. Never below MIN_SAMPLES.
 */
export function sampleCountFor(size: Vec3, raysPerObject: number): number {
  const cap = Math.min(MAX_SAMPLES, Math.max(MIN_SAMPLES, Math.floor(raysPerObject)));
  const largest = Math.max(size.x, size.y, size.z);

  if (largest < 1) return MIN_SAMPLES;
  if (largest < 2) return Math.min(cap, 6);
  return cap;
}

export function generateSamplePoints(center: Vec3, size: Vec3, count: number): Vec3[] {
  const n = Math.min(MAX_SAMPLES, Math.max(MIN_SAMPLES, Math.floor(count)));

  const hx = (size.x / 2) * INSET;
  const hy = (size.y / 2) * INSET;
  const hz = (size.z / 2) * INSET;

  const offset = ([sx, sy, sz]: readonly [number, number, number]): Vec3 => ({
    x: center.x + sx * hx,
    y: center.y + sy * hy,
    z: center.z + sz * hz,
  });

  const points: Vec3[] = [{ ...center }];
  for (const signs of CORNER_SIGNS) points.push(offset(signs));
  for (const signs of EDGE_SIGNS) points.push(offset(signs));

  return points.slice(0, n);
}
