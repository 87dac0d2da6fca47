import type { WorkerChannel } from "../transport/channel.js";
import type { BulletSpec } from "../types.js";

/**
 * Dispatcher-side record of one bullet from queueing until it completes,
 * is cancelled or is reclaimed.
 */
export type BulletTicket = {
  id: string;
  spec: Readonly<BulletSpec>;
  /** Set once the assignment pass has picked this ticket; never reassigned after. */
  beingProcessed: boolean;
  worker: WorkerSlot | null;
  /** Stamped on assignment, 0 while pending. */
  startedAt: number;
  timeoutMs?: number;
};

/**
 * One pool slot. Load is the size of the assignment map.
 */
export class WorkerSlot {
  readonly assignments = new Map<string, BulletTicket>();

  constructor(
    readonly index: number,
    readonly ref: string,
    readonly channel: WorkerChannel,
  ) {}

  get load(): number {
    return this.assignments.size;
  }
}
