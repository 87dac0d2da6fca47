import type { SimulatorConfig } from "../config.js";
import { normalize } from "../math.js";
import { decodeBulletSpec, type DispatcherMessage, type ProcessBulletMessage, type WorkerMessage } from "../protocol.js";
import type {
  BulletOutcome,
  ParticipantDirectory,
  SimBullet,
  WorldQuery,
  WorldSnapshot,
} from "../types.js";
import { advance, resolveHitscan, traceSegment, type HitDetectionOptions, type ShotResult } from "./hitDetection.js";

export type WorkerContext = {
  /** Name the dispatcher knows this worker by; echoed on every completion. */
  ref: string;
  config: SimulatorConfig;
  world: WorldQuery;
  participants: ParticipantDirectory;
  post: (message: WorkerMessage) => void;
  /** Receives replicated world snapshots; SyncWorld is ignored without it. */
  onSnapshot?: (snapshot: WorldSnapshot) => void;
};

/**
 * One isolated simulation unit.
 *
 * Owns its bullets outright: nothing else reads or writes a SimBullet, and
 * the only way in or out is a message. Driven by `step(now)` once per tick.
 */
export class BulletWorker {
  private readonly active = new Map<string, SimBullet>();
  private readonly detection: HitDetectionOptions;
  private readonly tickSeconds: number;
  private destroyed = false;

  constructor(private readonly ctx: WorkerContext) {
    this.detection = {
      proximityRadius: ctx.config.proximityRadius,
      proximityFallback: ctx.config.proximityFallback,
      maxSamples: ctx.config.maxHitscanSamples,
    };
    this.tickSeconds = ctx.config.tickMs / 1000;
  }

  get ref(): string {
    return this.ctx.ref;
  }

  get activeCount(): number {
    return this.active.size;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  has(bulletId: string): boolean {
    return this.active.has(bulletId);
  }

  handle(message: DispatcherMessage, now: number) {
    if (this.destroyed) return;

    switch (message.type) {
      case "ProcessBullet":
        this.process(message, now);
        break;
      case "CancelBullet":
        this.active.delete(message.id);
        break;
      case "SyncWorld":
        this.ctx.onSnapshot?.(message.snapshot);
        break;
      case "Destruct":
        this.active.clear();
        this.destroyed = true;
        console.log(`[BulletWorker ${this.ctx.ref}] Destructed`);
        break;
    }
  }

  /**
   * Advance every active projectile by one tick.
   */
  step(now: number) {
    if (this.destroyed) return;

    const bullets = [...this.active.values()].reverse();
    for (const bullet of bullets) {
      // Shooter left or disconnected
      if (!this.ctx.participants.resolve(bullet.participant)) {
        this.finish(bullet, "orphaned");
        continue;
      }

      const { position: next, moved } = advance(bullet.position, bullet.direction, this.ctx.config.bulletSpeed, this.tickSeconds);
      bullet.traveled += moved;

      if (bullet.traveled >= bullet.range) {
        this.finish(bullet, "range");
        continue;
      }

      if (now - bullet.startedAt >= this.ctx.config.maxLifetimeMs) {
        this.finish(bullet, "lifetime");
        continue;
      }

      const shot = traceSegment(bullet.position, next, bullet.participant, this.ctx.world, this.detection);
      if (shot) {
        this.finish(bullet, shot.outcome, shot);
        continue;
      }

      bullet.position = next;
    }
  }

  private process(message: ProcessBulletMessage, now: number) {
    const spec = decodeBulletSpec(message);
    const bullet: SimBullet = {
      id: message.id,
      participant: spec.participant,
      damage: spec.damage,
      range: spec.range,
      origin: spec.origin,
      direction: normalize(spec.direction),
      position: spec.origin,
      traveled: 0,
      startedAt: now,
      instant: spec.instant,
    };

    if (bullet.instant) {
      const shot = resolveHitscan(bullet.origin, bullet.direction, bullet.range, bullet.participant, this.ctx.world, this.detection);
      this.finish(bullet, shot.outcome, shot);
      return;
    }

    this.active.set(bullet.id, bullet);
  }

  private finish(bullet: SimBullet, outcome: BulletOutcome, shot?: ShotResult) {
    this.active.delete(bullet.id);

    if (shot?.outcome === "hit") {
      this.ctx.post({
        type: "BulletHit",
        id: bullet.id,
        participant: bullet.participant,
        damage: bullet.damage,
        target: shot.target,
        point: shot.point,
        proximity: shot.proximity,
      });
    }

    this.ctx.post({ type: "BulletComplete", id: bullet.id, worker: this.ctx.ref, outcome });
  }
}
