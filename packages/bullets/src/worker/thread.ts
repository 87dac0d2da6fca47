import { parentPort, workerData } from "node:worker_threads";
import { decodeDispatcherMessage, encodeMessage, type DispatcherMessage } from "../protocol.js";
import { threadWorkerDataSchema } from "../transport/threadWorker.js";
import { SnapshotWorld } from "../world/SnapshotWorld.js";
import { BulletWorker } from "./BulletWorker.js";

/**
 * Thread entry: one BulletWorker over its own replicated world, ticking on
 * its own timer until the dispatcher sends Destruct.
 */

const port = parentPort;
if (!port) {
  throw new Error("Bullet worker thread must be started through worker_threads");
}

const { ref, config } = threadWorkerDataSchema.parse(workerData);
const world = new SnapshotWorld();

const worker = new BulletWorker({
  ref,
  config,
  world,
  participants: world,
  post: (message) => port.postMessage(encodeMessage(message)),
  onSnapshot: (snapshot) => world.apply(snapshot),
});

const timer = setInterval(() => worker.step(Date.now()), config.tickMs);

port.on("message", (raw: unknown) => {
  if (typeof raw !== "string") {
    console.warn(`[BulletWorker ${ref}] Dropped non-string message`);
    return;
  }
  let message: DispatcherMessage;
  try {
    message = decodeDispatcherMessage(raw);
  } catch (error) {
    console.warn(`[BulletWorker ${ref}] Dropped malformed message:`, error);
    return;
  }

  worker.handle(message, Date.now());

  if (message.type === "Destruct") {
    clearInterval(timer);
    port.close();
  }
});
