import {
  decodeDispatcherMessage,
  decodeWorkerMessage,
  encodeMessage,
  type DispatcherMessage,
  type WorkerMessage,
} from "../protocol.js";
import type { ParticipantDirectory, WorldQuery } from "../types.js";
import { BulletWorker } from "../worker/BulletWorker.js";
import { SnapshotWorld } from "../world/SnapshotWorld.js";
import type { WorkerChannel, WorkerFactory } from "./channel.js";

export type LocalWorkerOptions = {
  /**
   * World every worker queries. When omitted each worker keeps its own
   * SnapshotWorld fed by SyncWorld broadcasts, as thread workers do.
   */
  world?: WorldQuery & ParticipantDirectory;
  /** Run each worker's tick loop on a timer. Off by default: callers step. */
  autoTick?: boolean;
  now?: () => number;
};

/**
 * In-process workers for tests and single-thread deployments.
 *
 * Messages still cross as JSON strings and are delivered on a later
 * microtask, so ordering and isolation match the threaded transport.
 */
export class LocalWorkerHost {
  private readonly workers = new Map<string, BulletWorker>();
  private readonly now: () => number;

  constructor(private readonly options: LocalWorkerOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  get(ref: string): BulletWorker | undefined {
    return this.workers.get(ref);
  }

  all(): BulletWorker[] {
    return [...this.workers.values()];
  }

  /** Run one simulation tick on every live worker. */
  step(now: number = this.now()) {
    for (const worker of this.workers.values()) {
      worker.step(now);
    }
  }

  readonly factory: WorkerFactory = (ref, config, deliver) => {
    const ownWorld = this.options.world ? null : new SnapshotWorld();
    const world = this.options.world ?? ownWorld;
    if (!world) throw new Error(`No world available for local worker ${ref}`);

    let open = true;

    const post = (message: WorkerMessage) => {
      const wire = encodeMessage(message);
      queueMicrotask(() => {
        if (!open) return;
        let decoded: WorkerMessage;
        try {
          decoded = decodeWorkerMessage(wire);
        } catch (error) {
          console.warn(`[LocalWorker ${ref}] Dropped malformed message:`, error);
          return;
        }
        deliver(decoded);
      });
    };

    const worker = new BulletWorker({
      ref,
      config,
      world,
      participants: world,
      post,
      onSnapshot: ownWorld ? (snapshot) => ownWorld.apply(snapshot) : undefined,
    });
    this.workers.set(ref, worker);

    const timer = this.options.autoTick
      ? setInterval(() => worker.step(this.now()), config.tickMs)
      : null;
    timer?.unref();

    const channel: WorkerChannel = {
      send: (message) => {
        const wire = encodeMessage(message);
        queueMicrotask(() => {
          if (!open) return;
          let decoded: DispatcherMessage;
          try {
            decoded = decodeDispatcherMessage(wire);
          } catch (error) {
            console.warn(`[LocalWorker ${ref}] Dropped malformed message:`, error);
            return;
          }
          worker.handle(decoded, this.now());
        });
      },
      terminate: async () => {
        open = false;
        if (timer) clearInterval(timer);
        this.workers.delete(ref);
      },
    };

    return channel;
  };
}
