import { add, normalize, scale } from "../math.js";
import type { RayHit, Vec3, WorldQuery } from "../types.js";

export type ShotResult =
  | { outcome: "hit"; target: string; point: Vec3; proximity: boolean }
  | { outcome: "impact"; handle: string; point: Vec3 }
  | { outcome: "miss" };

export type HitDetectionOptions = {
  proximityRadius: number;
  proximityFallback: boolean;
  /** Hitscan samples never exceed this; long shots sample more sparsely. */
  maxSamples: number;
};

/**
 * One tick of straight-line motion. Pure: the same inputs always give the
 * same position, nothing outside the arguments is read.
 */
export function advance(
  position: Vec3,
  direction: Vec3,
  speed: number,
  dtSeconds: number,
): { position: Vec3; moved: number } {
  const moved = speed * dtSeconds;
  return { position: add(position, scale(normalize(direction), moved)), moved };
}

function fromRayHit(hit: RayHit): ShotResult {
  if (hit.kind === "entity" && hit.living) {
    return { outcome: "hit", target: hit.handle, point: hit.point, proximity: false };
  }
  return { outcome: "impact", handle: hit.handle, point: hit.point };
}

/**
 * Test the segment a projectile covered during one tick.
 *
 * The ray always runs from the previous tick position to the new one, never
 * from the muzzle, so thin targets between two tick positions are still
 * found. Returns null when the bullet should keep flying.
 */
export function traceSegment(
  from: Vec3,
  to: Vec3,
  participant: number,
  world: WorldQuery,
  options: HitDetectionOptions,
): ShotResult | null {
  const hit = world.rayIntersect(from, to, [participant]);
  if (hit) return fromRayHit(hit);

  if (!options.proximityFallback) return null;

  const near = world.proximitySearch(to, options.proximityRadius, participant);
  if (!near) return null;
  return { outcome: "hit", target: near.handle, point: near.position, proximity: true };
}

/**
 * Resolve a hitscan shot in one pass.
 *
 * A direct hit on a living target wins. Otherwise points are sampled every
 * half proximity radius along the whole segment and the first proximity
 * match is taken.
 */
export function resolveHitscan(
  origin: Vec3,
  direction: Vec3,
  range: number,
  participant: number,
  world: WorldQuery,
  options: HitDetectionOptions,
): ShotResult {
  const unit = normalize(direction);
  const end = add(origin, scale(unit, range));
  const hit = world.rayIntersect(origin, end, [participant]);
  const direct = hit ? fromRayHit(hit) : null;
  if (direct?.outcome === "hit") return direct;

  if (options.proximityFallback) {
    const sampleInterval = options.proximityRadius * 0.5;
    const samples = Math.min(Math.ceil(range / sampleInterval), options.maxSamples);

    for (let i = 0; i <= samples; i++) {
      const point = add(origin, scale(unit, (range * i) / samples));
      const near = world.proximitySearch(point, options.proximityRadius, participant);
      if (near) {
        return { outcome: "hit", target: near.handle, point: near.position, proximity: true };
      }
    }
  }

  return direct ?? { outcome: "miss" };
}
