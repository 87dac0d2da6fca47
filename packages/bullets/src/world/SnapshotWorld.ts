import { distance, length, lerpVec, segmentBoxT, segmentSphereT } from "../math.js";
import { SpatialGrid } from "../spatial/grid.js";
import type {
  EntitySnapshot,
  ParticipantDirectory,
  ProximityHit,
  RayHit,
  StaticBox,
  Vec3,
  WorldQuery,
  WorldSnapshot,
} from "../types.js";

/** Entities slower than this (units/s) are treated as standing still. */
export const MOVING_SPEED_EPSILON = 0.05;

const DEFAULT_CELL_SIZE = 32;

export const EMPTY_SNAPSHOT: WorldSnapshot = { participants: [], entities: [], statics: [] };

/**
 * World view over a replicated, read-only snapshot.
 *
 * Worker threads share no memory with the host, so each worker keeps its own
 * copy and the dispatcher broadcasts fresh snapshots as the game moves.
 * Entities are spheres, static geometry is axis-aligned boxes.
 */
export class SnapshotWorld implements WorldQuery, ParticipantDirectory {
  private readonly grid: SpatialGrid<EntitySnapshot>;
  private participants = new Map<number, Vec3>();
  private entities: EntitySnapshot[] = [];
  private statics: StaticBox[] = [];

  constructor(snapshot: WorldSnapshot = EMPTY_SNAPSHOT, cellSize: number = DEFAULT_CELL_SIZE) {
    this.grid = new SpatialGrid(cellSize);
    this.apply(snapshot);
  }

  apply(snapshot: WorldSnapshot) {
    this.participants = new Map(snapshot.participants.map((p) => [p.participant, p.position]));
    this.entities = snapshot.entities;
    this.statics = snapshot.statics;

    this.grid.clear();
    for (const entity of this.entities) {
      this.grid.insert(entity, entity.position);
    }
  }

  resolve(participant: number): Vec3 | undefined {
    return this.participants.get(participant);
  }

  rayIntersect(from: Vec3, to: Vec3, exclude: readonly number[]): RayHit | null {
    const segmentLength = distance(from, to);
    let best: RayHit | null = null;
    let bestT = Infinity;

    for (const box of this.statics) {
      const t = segmentBoxT(from, to, box.min, box.max);
      if (t === null || t >= bestT) continue;
      bestT = t;
      best = {
        point: lerpVec(from, to, t),
        distance: t * segmentLength,
        handle: box.handle,
        kind: "static",
        living: false,
      };
    }

    for (const entity of this.entities) {
      if (entity.participant !== undefined && exclude.includes(entity.participant)) continue;
      const t = segmentSphereT(from, to, entity.position, entity.radius);
      if (t === null || t >= bestT) continue;
      bestT = t;
      best = {
        point: lerpVec(from, to, t),
        distance: t * segmentLength,
        handle: entity.handle,
        kind: "entity",
        living: entity.living,
        participant: entity.participant,
      };
    }

    return best;
  }

  proximitySearch(center: Vec3, radius: number, excludeParticipant: number): ProximityHit | null {
    let best: ProximityHit | null = null;

    for (const entity of this.grid.querySphere(center, radius)) {
      if (!entity.living) continue;
      if (entity.participant === excludeParticipant) continue;
      // Stationary targets are exempt: near-misses against idle players stay misses.
      if (length(entity.velocity) <= MOVING_SPEED_EPSILON) continue;

      const d = distance(entity.position, center);
      if (d > radius) continue;
      if (best && d >= best.distance) continue;
      best = { handle: entity.handle, position: entity.position, distance: d, participant: entity.participant };
    }

    return best;
  }
}
