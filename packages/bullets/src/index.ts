export { BULLET_CONFIG, resolveSimulatorConfig, type SimulatorConfig } from "./config.js";
export { BulletDispatcher, type DispatcherOptions } from "./dispatcher/BulletDispatcher.js";
export { WorkerSlot, type BulletTicket } from "./dispatcher/WorkerSlot.js";
export type { BulletCompleteEvent, BulletHitEvent, BulletReclaimEvent, DispatcherEvents } from "./events.js";
export * from "./math.js";
export {
  decodeBulletSpec,
  decodeDispatcherMessage,
  decodeWorkerMessage,
  encodeBulletSpec,
  encodeMessage,
  type BulletCompleteMessage,
  type BulletHitMessage,
  type CancelBulletMessage,
  type DestructMessage,
  type DispatcherMessage,
  type ProcessBulletMessage,
  type SyncWorldMessage,
  type WorkerMessage,
} from "./protocol.js";
export type { WorkerChannel, WorkerFactory } from "./transport/channel.js";
export { LocalWorkerHost, type LocalWorkerOptions } from "./transport/localWorker.js";
export { createThreadWorkerFactory, resolveThreadEntry } from "./transport/threadWorker.js";
export type * from "./types.js";
export { assertValidBulletSpec, isUsableDirection } from "./utils.js";
export { BulletWorker, type WorkerContext } from "./worker/BulletWorker.js";
export { advance, resolveHitscan, traceSegment, type ShotResult } from "./worker/hitDetection.js";
export { MOVING_SPEED_EPSILON, SnapshotWorld } from "./world/SnapshotWorld.js";
