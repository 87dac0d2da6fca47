/**
 * Types for the bullet simulator.
 */

export type Vec3 = { x: number; y: number; z: number };

/**
 * A fire request as the caller describes it. Never mutated after queueing.
 */
export interface BulletSpec {
  participant: number;
  damage: number;
  range: number;
  origin: Vec3;
  /** Unit vector; workers normalise it again before use. */
  direction: Vec3;
  instant: boolean;
}

/**
 * Why a worker stopped simulating a bullet.
 * - `hit`: a living target was struck (directly or by proximity)
 * - `impact`: static geometry or a non-living entity stopped it
 * - `miss`: hitscan found nothing along its whole range
 * - `range` / `lifetime`: a projectile ran out of range or time
 * - `orphaned`: the shooter left before the bullet resolved
 */
export type BulletOutcome = "hit" | "impact" | "miss" | "range" | "lifetime" | "orphaned";

/** Bullet as tracked by one worker for the whole of its flight. */
export type SimBullet = {
  id: string;
  participant: number;
  damage: number;
  range: number;
  origin: Vec3;
  direction: Vec3;
  position: Vec3;
  traveled: number;
  startedAt: number;
  instant: boolean;
};

/**
 * Result of a ray query against the world.
 * `living` is only meaningful for `kind: "entity"`.
 */
export type RayHit = {
  point: Vec3;
  distance: number;
  handle: string;
  kind: "static" | "entity";
  living: boolean;
  participant?: number;
};

export type ProximityHit = {
  handle: string;
  position: Vec3;
  distance: number;
  participant?: number;
};

export interface WorldQuery {
  /** Nearest intersection on the segment `from → to`, ignoring geometry owned by `exclude`. */
  rayIntersect(from: Vec3, to: Vec3, exclude: readonly number[]): RayHit | null;
  /** Nearest living, moving entity within `radius` of `center`, not owned by `excludeParticipant`. */
  proximitySearch(center: Vec3, radius: number, excludeParticipant: number): ProximityHit | null;
}

export interface ParticipantDirectory {
  /** Live position of the participant, or undefined once it has left. */
  resolve(participant: number): Vec3 | undefined;
}

// ═══════════════════════════════════════════════════════════════════
// Replicated world
// ═══════════════════════════════════════════════════════════════════

export type ParticipantSnapshot = {
  participant: number;
  position: Vec3;
};

export type EntitySnapshot = {
  handle: string;
  participant?: number;
  position: Vec3;
  velocity: Vec3;
  radius: number;
  living: boolean;
};

export type StaticBox = {
  handle: string;
  min: Vec3;
  max: Vec3;
};

export type WorldSnapshot = {
  participants: ParticipantSnapshot[];
  entities: EntitySnapshot[];
  statics: StaticBox[];
};

// ═══════════════════════════════════════════════════════════════════
// Dispatcher surface
// ═══════════════════════════════════════════════════════════════════

export type SimulatorStats = {
  queued: number;
  inFlight: number;
  totalWorkers: number;
  loadPerWorker: Record<string, number>;
  bulletsPerWorker: Record<string, string[]>;
};
