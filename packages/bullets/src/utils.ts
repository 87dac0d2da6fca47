/**
 * Small helpers shared by the dispatcher and its callers.
 */
import { isFiniteVec, lengthSq, normalize } from "./math.js";
import type { BulletSpec, Vec3 } from "./types.js";

/**
 * True when `v` has finite components and a direction that survives
 * normalisation.
 */
export function isUsableDirection(v: Vec3): boolean {
  return isFiniteVec(v) && lengthSq(normalize(v)) > 0;
}

/**
 * Assert that a fire request can be simulated. Throws on the first problem.
 */
export function assertValidBulletSpec(spec: BulletSpec): void {
  if (!Number.isInteger(spec.participant)) {
    throw new Error(`participant must be an integer, got ${spec.participant}`);
  }
  if (!Number.isFinite(spec.damage) || spec.damage < 0) {
    throw new Error(`damage must be a finite number >= 0, got ${spec.damage}`);
  }
  if (!Number.isFinite(spec.range) || spec.range <= 0) {
    throw new Error(`range must be > 0, got ${spec.range}`);
  }
  if (!isFiniteVec(spec.origin)) {
    throw new Error("origin must have finite coordinates");
  }
  if (!isUsableDirection(spec.direction)) {
    throw new Error("direction must be a finite, non-zero vector");
  }
}

/**
 * Copy a spec so later changes to the caller's objects cannot reach it.
 */
export function freezeBulletSpec(spec: BulletSpec): Readonly<BulletSpec> {
  return Object.freeze({
    participant: spec.participant,
    damage: spec.damage,
    range: spec.range,
    instant: spec.instant,
    origin: Object.freeze({ ...spec.origin }),
    direction: Object.freeze({ ...spec.direction }),
  });
}

/**
 * Sleep for a given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
