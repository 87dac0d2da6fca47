import { Worker } from "node:worker_threads";
import { z } from "zod";
import { decodeWorkerMessage, encodeMessage, type WorkerMessage } from "../protocol.js";
import type { WorkerChannel, WorkerFactory } from "./channel.js";

export const threadWorkerDataSchema = z.object({
  ref: z.string(),
  config: z.object({
    poolSize: z.number(),
    workerCapacity: z.number(),
    tickMs: z.number(),
    bulletSpeed: z.number(),
    maxLifetimeMs: z.number(),
    timeoutMs: z.number(),
    reclaimIntervalMs: z.number(),
    proximityRadius: z.number(),
    proximityFallback: z.boolean(),
    maxHitscanSamples: z.number(),
    destructGraceMs: z.number(),
  }),
});

export type ThreadWorkerData = z.infer<typeof threadWorkerDataSchema>;

/**
 * The thread entry sits next to this module's compiled output; under a
 * TypeScript loader it is still the .ts source.
 */
export function resolveThreadEntry(): URL {
  const ext = import.meta.url.endsWith(".ts") ? "ts" : "js";
  return new URL(`../worker/thread.${ext}`, import.meta.url);
}

/**
 * One `worker_threads` thread per pool slot. Threads inherit the parent's
 * exec arguments, so a TypeScript loader set on the host applies to them.
 */
export function createThreadWorkerFactory(entry: URL = resolveThreadEntry()): WorkerFactory {
  return (ref, config, deliver) => {
    const workerData: ThreadWorkerData = { ref, config };
    const worker = new Worker(entry, { workerData });
    worker.unref();

    worker.on("message", (raw: unknown) => {
      if (typeof raw !== "string") {
        console.warn(`[ThreadWorker ${ref}] Dropped non-string message`);
        return;
      }
      let message: WorkerMessage;
      try {
        message = decodeWorkerMessage(raw);
      } catch (error) {
        console.warn(`[ThreadWorker ${ref}] Dropped malformed message:`, error);
        return;
      }
      deliver(message);
    });

    // A dead thread just stops reporting; its bullets are reclaimed on timeout.
    worker.on("error", (error) => {
      console.error(`[ThreadWorker ${ref}] Worker error:`, error);
    });
    worker.on("exit", (code) => {
      if (code !== 0) console.error(`[ThreadWorker ${ref}] Exited with code ${code}`);
    });

    const channel: WorkerChannel = {
      send: (message) => {
        worker.postMessage(encodeMessage(message));
      },
      terminate: async () => {
        await worker.terminate();
      },
    };

    return channel;
  };
}
