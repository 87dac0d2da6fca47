import type { Vec3 } from "./types.js";

export const ZERO: Vec3 = { x: 0, y: 0, z: 0 };

export function vec3(x: number, y: number, z: number): Vec3 {
  return { x, y, z };
}

export function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale(v: Vec3, s: number): Vec3 {
  return { x: v.x * s, y: v.y * s, z: v.z * s };
}

export function dot(a: Vec3, b: Vec3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

export function lengthSq(v: Vec3): number {
  return dot(v, v);
}

export function length(v: Vec3): number {
  return Math.sqrt(lengthSq(v));
}

export function distanceSq(a: Vec3, b: Vec3): number {
  return lengthSq(sub(b, a));
}

export function distance(a: Vec3, b: Vec3): number {
  return Math.sqrt(distanceSq(a, b));
}

/**
 * Unit vector in the direction of `v`; the zero vector stays zero.
 * Components are scaled by the largest magnitude first so very large or
 * very small vectors neither overflow nor underflow.
 */
export function normalize(v: Vec3): Vec3 {
  const m = Math.max(Math.abs(v.x), Math.abs(v.y), Math.abs(v.z));
  if (m === 0 || !Number.isFinite(m)) return ZERO;
  const scaled = { x: v.x / m, y: v.y / m, z: v.z / m };
  const len = length(scaled);
  return { x: scaled.x / len, y: scaled.y / len, z: scaled.z / len };
}

export function lerpVec(a: Vec3, b: Vec3, t: number): Vec3 {
  return { x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t, z: a.z + (b.z - a.z) * t };
}

export function isFiniteVec(v: Vec3): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
}

/**
 * Smallest t in [0, 1] where the segment `from → to` touches the sphere,
 * or null. A segment starting inside the sphere hits at t = 0.
 */
export function segmentSphereT(from: Vec3, to: Vec3, center: Vec3, radius: number): number | null {
  const d = sub(to, from);
  const f = sub(from, center);
  const a = dot(d, d);
  const c = dot(f, f) - radius * radius;
  if (c <= 0) return 0;
  if (a === 0) return null;

  const b = 2 * dot(f, d);
  const disc = b * b - 4 * a * c;
  if (disc < 0) return null;

  const t = (-b - Math.sqrt(disc)) / (2 * a);
  return t >= 0 && t <= 1 ? t : null;
}

/**
 * Slab test: smallest t in [0, 1] where the segment enters the box, or null.
 */
export function segmentBoxT(from: Vec3, to: Vec3, min: Vec3, max: Vec3): number | null {
  let tMin = 0;
  let tMax = 1;

  for (const axis of ["x", "y", "z"] as const) {
    const start = from[axis];
    const delta = to[axis] - start;
    if (delta === 0) {
      if (start < min[axis] || start > max[axis]) return null;
      continue;
    }
    let t1 = (min[axis] - start) / delta;
    let t2 = (max[axis] - start) / delta;
    if (t1 > t2) [t1, t2] = [t2, t1];
    tMin = Math.max(tMin, t1);
    tMax = Math.min(tMax, t2);
    if (tMin > tMax) return null;
  }

  return tMin;
}
