// worldcore/shared/Vec3.ts

import { isRecord } from "../utils/guards";

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export function vec3(x: number, y: number, z: number): Vec3 {
  return { x, y, z };
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale(a: Vec3, k: number): Vec3 {
  return { x: a.x * k, y: a.y * k, z: a.z * k };
}

export function length(a: Vec3): number {
  return Math.sqrt(a.x * a.x + a.y * a.y + a.z * a.z);
}

export function distance(a: Vec3, b: Vec3): number {
  return length(sub(a, b));
}

/** Round each axis to the nearest multiple of `step` (cache keys). */
export function quantize(a: Vec3, step = 1): Vec3 {
  const q = (v: number) => Math.round(v / step) * step;
  return { x: q(a.x), y: q(a.y), z: q(a.z) };
}

export function isFiniteVec3(v: unknown): v is Vec3 {
  if (!isRecord(v)) return false;
  return (
    typeof v.x === "number" &&
    Number.isFinite(v.x) &&
    typeof v.y === "number" &&
    Number.isFinite(v.y) &&
    typeof v.z === "number" &&
    Number.isFinite(v.z)
  );
}
