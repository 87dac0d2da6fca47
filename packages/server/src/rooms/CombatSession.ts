import {
  BulletDispatcher,
  type BulletHitEvent,
  type SimulatorConfig,
  type StaticBox,
  type WorkerFactory,
} from "@volley/bullets";
import { buildSnapshot, clampToBounds, combatantPosition, spawnPoint, type Arena } from "./arena.js";
import { COMBAT_CONFIG } from "./combatConfig.js";
import { fireMessageSchema, moveMessageSchema, type BulletFiredDto, type BulletHitDto } from "./protocol.js";
import { Combatant, CombatState } from "./schema/CombatState.js";
import { HealthSystem } from "./systems/HealthSystem.js";

export type CombatSessionOptions = {
  arena: Arena;
  respawnMs: number;
  simulator?: Partial<SimulatorConfig>;
  /** Defaults to worker threads. */
  workerFactory?: WorkerFactory;
  /** Receives every hit that landed on a living combatant. */
  onHit: (hit: BulletHitDto) => void;
  now?: () => number;
};

/**
 * Combat simulation behind a room
 *
 * Owns the synchronized state, the bullet dispatcher and the health
 * system. The room only forwards client messages and lifecycle calls.
 * Invalid client messages are logged and ignored; nothing thrown here
 * reaches the transport.
 */
export class CombatSession {
  readonly state = new CombatState();
  readonly dispatcher: BulletDispatcher;

  private readonly arena: Arena;
  private readonly statics: StaticBox[];
  private readonly health: HealthSystem;
  private readonly onHit: (hit: BulletHitDto) => void;
  private readonly now: () => number;
  private nextParticipant = 1;

  constructor(options: CombatSessionOptions) {
    this.arena = options.arena;
    this.statics = options.arena.boxes;
    this.health = new HealthSystem(options.respawnMs);
    this.onHit = options.onHit;
    this.now = options.now ?? Date.now;

    this.dispatcher = new BulletDispatcher({
      config: options.simulator,
      workerFactory: options.workerFactory,
      now: this.now,
    });
    this.dispatcher.on("hit", (event) => this.handleHit(event));

    this.state.tickRate = Math.round(1000 / this.dispatcher.config.tickMs);
  }

  get tickMs(): number {
    return this.dispatcher.config.tickMs;
  }

  join(sessionId: string): Combatant {
    const combatant = new Combatant();
    combatant.sessionId = sessionId;
    combatant.participant = this.nextParticipant++;
    combatant.spawnIndex = combatant.participant - 1;

    const spawn = spawnPoint(this.arena, combatant.spawnIndex);
    combatant.x = spawn.x;
    combatant.y = spawn.y;
    combatant.z = spawn.z;
    combatant.health = COMBAT_CONFIG.maxHealth;

    this.state.combatants.set(sessionId, combatant);
    return combatant;
  }

  /**
   * Bullets still in flight complete as orphaned once the next snapshot
   * reaches their worker.
   */
  leave(sessionId: string): boolean {
    return this.state.combatants.delete(sessionId);
  }

  move(sessionId: string, message: unknown): boolean {
    const parsed = moveMessageSchema.safeParse(message);
    if (!parsed.success) {
      console.warn(`[CombatSession] Ignored invalid move from ${sessionId}:`, parsed.error.issues);
      return false;
    }

    const combatant = this.state.combatants.get(sessionId);
    if (!combatant || !combatant.alive) return false;

    const position = clampToBounds(this.arena, parsed.data.position);
    combatant.x = position.x;
    combatant.y = position.y;
    combatant.z = position.z;
    combatant.vx = parsed.data.velocity.x;
    combatant.vy = parsed.data.velocity.y;
    combatant.vz = parsed.data.velocity.z;
    return true;
  }

  /**
   * Queue a bullet for the combatant. Returns null when the message is
   * invalid, the combatant cannot fire, or its weapon is cooling down.
   */
  fire(sessionId: string, message: unknown): BulletFiredDto | null {
    const parsed = fireMessageSchema.safeParse(message);
    if (!parsed.success) {
      console.warn(`[CombatSession] Ignored invalid fire from ${sessionId}:`, parsed.error.issues);
      return null;
    }

    const combatant = this.state.combatants.get(sessionId);
    if (!combatant || !combatant.alive) return null;

    const { direction, instant } = parsed.data;
    const weapon = instant ? COMBAT_CONFIG.hitscan : COMBAT_CONFIG.projectile;
    const now = this.now();
    if (now - combatant.lastFireAt < weapon.cooldownMs) return null;

    const origin = combatantPosition(combatant);
    let bulletId: string;
    try {
      bulletId = instant
        ? this.dispatcher.queueInstantBullet(combatant.participant, weapon.damage, weapon.range, origin, direction)
        : this.dispatcher.queueProjectileBullet(combatant.participant, weapon.damage, weapon.range, origin, direction);
    } catch (error) {
      console.warn(`[CombatSession] Rejected fire from ${sessionId}:`, error);
      return null;
    }

    combatant.lastFireAt = now;
    return { bulletId, instant };
  }

  /**
   * Simulation tick: respawns, world replication, dispatch, telemetry.
   */
  tick() {
    const now = this.now();

    this.health.update(this.state, now, (combatant) => spawnPoint(this.arena, combatant.spawnIndex));

    this.dispatcher.publishWorld(buildSnapshot(this.state, this.statics));
    this.dispatcher.update(now);

    const stats = this.dispatcher.getStats();
    this.state.workers = stats.totalWorkers;
    this.state.bulletsQueued = stats.queued;
    this.state.bulletsInFlight = stats.inFlight;
  }

  shutdown(): Promise<void> {
    return this.dispatcher.shutdown();
  }

  private handleHit(event: BulletHitEvent) {
    const result = this.health.applyDamage(this.state, event.target, event.participant, event.damage, this.now());
    if (!result) return;

    this.onHit({
      bulletId: event.bulletId,
      attacker: result.attacker?.sessionId ?? null,
      victim: result.victim.sessionId,
      damage: event.damage,
      point: event.point,
      proximity: event.proximity,
      health: result.victim.health,
      killed: result.killed,
    });
  }
}
