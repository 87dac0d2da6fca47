import type { SimulatorConfig } from "../config.js";
import type { DispatcherMessage, WorkerMessage } from "../protocol.js";

/**
 * Dispatcher-side handle on one worker. Sending never blocks and never
 * reports delivery; a lost message is recovered by reclamation.
 */
export interface WorkerChannel {
  send(message: DispatcherMessage): void;
  terminate(): Promise<void>;
}

/**
 * Spawns the worker for pool slot `ref`; everything it reports back goes
 * through `deliver`.
 */
export type WorkerFactory = (
  ref: string,
  config: SimulatorConfig,
  deliver: (message: WorkerMessage) => void,
) => WorkerChannel;
