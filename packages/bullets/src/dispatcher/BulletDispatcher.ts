import { randomUUID } from "crypto";
import { EventEmitter } from "eventemitter3";
import { resolveSimulatorConfig, type SimulatorConfig } from "../config.js";
import type { DispatcherEvents } from "../events.js";
import { encodeBulletSpec, type WorkerMessage } from "../protocol.js";
import type { WorkerFactory } from "../transport/channel.js";
import { createThreadWorkerFactory } from "../transport/threadWorker.js";
import type { BulletSpec, SimulatorStats, Vec3, WorldSnapshot } from "../types.js";
import { assertValidBulletSpec, freezeBulletSpec, sleep } from "../utils.js";
import { WorkerSlot, type BulletTicket } from "./WorkerSlot.js";

export type DispatcherOptions = {
  config?: Partial<SimulatorConfig>;
  /** Defaults to one worker thread per slot. */
  workerFactory?: WorkerFactory;
  now?: () => number;
  createId?: () => string;
};

/**
 * Bullet dispatcher
 *
 * Handles:
 * - Queueing fire requests (never rejects for load)
 * - Assigning queued bullets to the least-loaded worker each tick
 * - Relaying cancellation to the owning worker
 * - Reclaiming bullets whose worker never reported back
 *
 * All registries are mutated from the host thread only: the public methods,
 * `update` and the worker message handler. Workers see nothing but messages.
 */
export class BulletDispatcher extends EventEmitter<DispatcherEvents> {
  readonly config: SimulatorConfig;

  private readonly slots: WorkerSlot[] = [];
  private readonly pending = new Map<string, BulletTicket>();
  private readonly inFlight = new Map<string, BulletTicket>();
  private readonly now: () => number;
  private readonly createId: () => string;
  private lastReclaimAt: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private closed = false;

  constructor(options: DispatcherOptions = {}) {
    super();
    this.config = resolveSimulatorConfig(options.config);
    this.now = options.now ?? Date.now;
    this.createId = options.createId ?? randomUUID;
    this.lastReclaimAt = this.now();

    const factory = options.workerFactory ?? createThreadWorkerFactory();
    for (let i = 0; i < this.config.poolSize; i++) {
      const ref = `worker-${i}`;
      const channel = factory(ref, this.config, (message) => this.handleWorkerMessage(message));
      this.slots.push(new WorkerSlot(i, ref, channel));
    }

    console.log(
      `[BulletDispatcher] Started ${this.config.poolSize} workers (capacity ${this.config.workerCapacity} each)`,
    );
  }

  get isShutdown(): boolean {
    return this.closed;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Public API
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Queue any bullet. Returns its id immediately; admission happens on the
   * next assignment pass.
   */
  queueGeneralBullet(spec: BulletSpec, timeoutMs?: number): string {
    if (this.closed) {
      throw new Error("Bullet dispatcher has been shut down");
    }
    assertValidBulletSpec(spec);
    if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
      throw new Error(`timeoutMs must be > 0, got ${timeoutMs}`);
    }

    const ticket: BulletTicket = {
      id: this.createId(),
      spec: freezeBulletSpec(spec),
      beingProcessed: false,
      worker: null,
      startedAt: 0,
      timeoutMs,
    };
    this.pending.set(ticket.id, ticket);
    return ticket.id;
  }

  queueInstantBullet(participant: number, damage: number, range: number, origin: Vec3, direction: Vec3): string {
    return this.queueGeneralBullet({ participant, damage, range, origin, direction, instant: true });
  }

  queueProjectileBullet(participant: number, damage: number, range: number, origin: Vec3, direction: Vec3): string {
    return this.queueGeneralBullet({ participant, damage, range, origin, direction, instant: false });
  }

  /**
   * Cancel a bullet. Pending bullets never reach a worker; assigned ones are
   * dropped from the registry right away and the worker is told to forget
   * them, without waiting for an answer.
   */
  cancelBullet(bulletId: string): boolean {
    if (this.pending.delete(bulletId)) return true;

    const ticket = this.inFlight.get(bulletId);
    if (!ticket) return false;

    ticket.worker?.channel.send({ type: "CancelBullet", id: bulletId });
    this.release(ticket);
    return true;
  }

  getStats(): SimulatorStats {
    const loadPerWorker: Record<string, number> = {};
    const bulletsPerWorker: Record<string, string[]> = {};

    for (const slot of this.slots) {
      loadPerWorker[slot.ref] = slot.load;
      bulletsPerWorker[slot.ref] = [...slot.assignments.keys()];
    }

    return {
      queued: this.pending.size,
      inFlight: this.inFlight.size,
      totalWorkers: this.slots.length,
      loadPerWorker,
      bulletsPerWorker,
    };
  }

  /**
   * Replicate the world to every worker.
   */
  publishWorld(snapshot: WorldSnapshot) {
    if (this.closed) return;
    for (const slot of this.slots) {
      slot.channel.send({ type: "SyncWorld", snapshot });
    }
  }

  start() {
    if (this.timer || this.closed) return;
    this.timer = setInterval(() => this.update(this.now()), this.config.tickMs);
    this.timer.unref();
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /**
   * One dispatcher tick: reclamation when due, then assignment.
   */
  update(now: number) {
    if (this.closed) return;

    if (now - this.lastReclaimAt >= this.config.reclaimIntervalMs) {
      this.runReclamationPass(now);
      this.lastReclaimAt = now;
    }

    this.runAssignmentPass(now);
  }

  /**
   * Destruct every worker, drop all state, and tear the workers down once
   * the grace period has passed.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.stop();

    const slots = this.slots.splice(0);
    for (const slot of slots) {
      slot.channel.send({ type: "Destruct" });
      slot.assignments.clear();
    }
    this.pending.clear();
    this.inFlight.clear();
    this.removeAllListeners();

    if (this.config.destructGraceMs > 0) {
      await sleep(this.config.destructGraceMs);
    }

    const results = await Promise.allSettled(slots.map((slot) => slot.channel.terminate()));
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        console.warn(`[BulletDispatcher] Failed to terminate ${slots[i].ref}:`, result.reason);
      }
    });

    console.log(`[BulletDispatcher] Shut down ${slots.length} workers`);
  }

  // ═══════════════════════════════════════════════════════════════════
  // Passes
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Hand every pending bullet to a worker. Newest first.
   * Returns how many bullets were assigned.
   */
  runAssignmentPass(now: number): number {
    let assigned = 0;
    let overflowed = 0;

    const tickets = [...this.pending.values()].reverse();
    for (const ticket of tickets) {
      if (ticket.beingProcessed) continue;

      const slot = this.selectSlot();
      if (slot.load >= this.config.workerCapacity) overflowed++;

      ticket.beingProcessed = true;
      ticket.worker = slot;
      ticket.startedAt = now;

      slot.assignments.set(ticket.id, ticket);
      this.inFlight.set(ticket.id, ticket);

      slot.channel.send(encodeBulletSpec(ticket.id, ticket.spec));
      this.pending.delete(ticket.id);
      assigned++;
    }

    if (overflowed > 0) {
      console.warn(`[BulletDispatcher] Pool saturated, overflowed ${overflowed} bullet(s) onto ${this.slots[0].ref}`);
    }

    return assigned;
  }

  /**
   * Force-cancel every in-flight bullet older than its timeout.
   * Returns how many bullets were reclaimed.
   */
  runReclamationPass(now: number): number {
    let reclaimed = 0;

    for (const ticket of [...this.inFlight.values()]) {
      const timeoutMs = ticket.timeoutMs ?? this.config.timeoutMs;
      const elapsedMs = now - ticket.startedAt;
      if (elapsedMs < timeoutMs) continue;

      const worker = ticket.worker;
      worker?.channel.send({ type: "CancelBullet", id: ticket.id });
      this.release(ticket);
      this.emit("reclaim", { bulletId: ticket.id, worker: worker?.ref ?? "", elapsedMs });
      reclaimed++;
    }

    if (reclaimed > 0) {
      console.warn(`[BulletDispatcher] Reclaimed ${reclaimed} timed-out bullet(s)`);
    }

    return reclaimed;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Worker messages
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Completion handler. Anything about a bullet that is no longer in flight
   * (completed, cancelled, reclaimed, or a duplicate) is ignored.
   */
  handleWorkerMessage(message: WorkerMessage) {
    const ticket = this.inFlight.get(message.id);
    if (!ticket) return;

    if (message.type === "BulletHit") {
      this.emit("hit", {
        bulletId: message.id,
        participant: message.participant,
        damage: message.damage,
        target: message.target,
        point: message.point,
        proximity: message.proximity,
      });
      return;
    }

    if (ticket.worker && ticket.worker.ref !== message.worker) {
      console.warn(
        `[BulletDispatcher] Bullet ${message.id} assigned to ${ticket.worker.ref} was completed by ${message.worker}`,
      );
    }

    this.release(ticket);
    this.emit("complete", { bulletId: message.id, worker: message.worker, outcome: message.outcome });
  }

  // ═══════════════════════════════════════════════════════════════════
  // Internals
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Strictly least-loaded slot below capacity, first in pool order on ties.
   *
   * When every slot is full the bullet goes to slot 0 anyway. Nothing is ever
   * dropped at admission, at the cost of a known hotspot on that slot.
   */
  private selectSlot(): WorkerSlot {
    let best: WorkerSlot | null = null;
    for (const slot of this.slots) {
      if (slot.load >= this.config.workerCapacity) continue;
      if (!best || slot.load < best.load) best = slot;
    }
    return best ?? this.slots[0];
  }

  private release(ticket: BulletTicket) {
    this.inFlight.delete(ticket.id);
    ticket.worker?.assignments.delete(ticket.id);
  }
}
