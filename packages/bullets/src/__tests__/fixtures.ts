import type { DispatcherMessage, WorkerMessage } from "../protocol.js";
import type { WorkerChannel, WorkerFactory } from "../transport/channel.js";
import type { EntitySnapshot, Vec3, WorldSnapshot } from "../types.js";

export const SHOOTER = 1;
export const VICTIM = 2;

/** Let every queued microtask (message delivery) run. */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function entity(handle: string, position: Vec3, extra: Partial<EntitySnapshot> = {}): EntitySnapshot {
  return {
    handle,
    position,
    velocity: { x: 0, y: 0, z: 0 },
    radius: 1,
    living: true,
    ...extra,
  };
}

/** Shooter standing at the origin plus whatever else the test needs. */
export function arena(extra: Partial<WorldSnapshot> = {}): WorldSnapshot {
  return {
    participants: [{ participant: SHOOTER, position: { x: 0, y: 0, z: 0 } }, ...(extra.participants ?? [])],
    entities: [entity("shooter", { x: 0, y: 0, z: 0 }, { participant: SHOOTER }), ...(extra.entities ?? [])],
    statics: extra.statics ?? [],
  };
}

export type RecordedChannel = {
  ref: string;
  sent: DispatcherMessage[];
  terminated: boolean;
  deliver: (message: WorkerMessage) => void;
};

/**
 * Workers that never answer on their own. Tests read what was sent and
 * play the worker's side through `deliver`.
 */
export class ManualWorkers {
  readonly channels = new Map<string, RecordedChannel>();

  readonly factory: WorkerFactory = (ref, _config, deliver) => {
    const record: RecordedChannel = { ref, sent: [], terminated: false, deliver };
    this.channels.set(ref, record);

    const channel: WorkerChannel = {
      send: (message) => {
        record.sent.push(message);
      },
      terminate: async () => {
        record.terminated = true;
      },
    };
    return channel;
  };

  channel(ref: string): RecordedChannel {
    const record = this.channels.get(ref);
    if (!record) throw new Error(`No channel ${ref}`);
    return record;
  }

  sentTypes(ref: string): string[] {
    return this.channel(ref).sent.map((m) => m.type);
  }
}
