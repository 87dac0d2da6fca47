import { z } from "zod";
import type { BulletSpec } from "./types.js";

/**
 * Wire schema between the dispatcher and its workers.
 *
 * Every message is a flat record serialised to a JSON string, so nothing
 * crosses the boundary by reference. Decoders check shape only.
 */

const vec3Schema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
});

const worldSnapshotSchema = z.object({
  participants: z.array(z.object({ participant: z.number().int(), position: vec3Schema })),
  entities: z.array(
    z.object({
      handle: z.string(),
      participant: z.number().int().optional(),
      position: vec3Schema,
      velocity: vec3Schema,
      radius: z.number(),
      living: z.boolean(),
    }),
  ),
  statics: z.array(z.object({ handle: z.string(), min: vec3Schema, max: vec3Schema })),
});

// Dispatcher -> worker

export const processBulletSchema = z.object({
  type: z.literal("ProcessBullet"),
  id: z.string().min(1),
  participant: z.number().int(),
  damage: z.number(),
  range: z.number(),
  instant: z.boolean(),
  origin: vec3Schema,
  direction: vec3Schema,
});

export const cancelBulletSchema = z.object({
  type: z.literal("CancelBullet"),
  id: z.string().min(1),
});

export const syncWorldSchema = z.object({
  type: z.literal("SyncWorld"),
  snapshot: worldSnapshotSchema,
});

export const destructSchema = z.object({
  type: z.literal("Destruct"),
});

export const dispatcherMessageSchema = z.discriminatedUnion("type", [
  processBulletSchema,
  cancelBulletSchema,
  syncWorldSchema,
  destructSchema,
]);

// Worker -> dispatcher

export const bulletHitSchema = z.object({
  type: z.literal("BulletHit"),
  id: z.string().min(1),
  participant: z.number().int(),
  damage: z.number(),
  target: z.string(),
  point: vec3Schema,
  proximity: z.boolean(),
});

export const bulletCompleteSchema = z.object({
  type: z.literal("BulletComplete"),
  id: z.string().min(1),
  worker: z.string(),
  outcome: z.enum(["hit", "impact", "miss", "range", "lifetime", "orphaned"]),
});

export const workerMessageSchema = z.discriminatedUnion("type", [bulletHitSchema, bulletCompleteSchema]);

export type ProcessBulletMessage = z.infer<typeof processBulletSchema>;
export type CancelBulletMessage = z.infer<typeof cancelBulletSchema>;
export type SyncWorldMessage = z.infer<typeof syncWorldSchema>;
export type DestructMessage = z.infer<typeof destructSchema>;
export type DispatcherMessage = z.infer<typeof dispatcherMessageSchema>;

export type BulletHitMessage = z.infer<typeof bulletHitSchema>;
export type BulletCompleteMessage = z.infer<typeof bulletCompleteSchema>;
export type WorkerMessage = z.infer<typeof workerMessageSchema>;

export function encodeMessage(message: DispatcherMessage | WorkerMessage): string {
  return JSON.stringify(message);
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new Error(`Malformed message: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function decodeDispatcherMessage(raw: string): DispatcherMessage {
  return dispatcherMessageSchema.parse(parseJson(raw));
}

export function decodeWorkerMessage(raw: string): WorkerMessage {
  return workerMessageSchema.parse(parseJson(raw));
}

/**
 * Flatten a spec into the record a worker receives.
 */
export function encodeBulletSpec(id: string, spec: BulletSpec): ProcessBulletMessage {
  return {
    type: "ProcessBullet",
    id,
    participant: spec.participant,
    damage: spec.damage,
    range: spec.range,
    instant: spec.instant,
    origin: { x: spec.origin.x, y: spec.origin.y, z: spec.origin.z },
    direction: { x: spec.direction.x, y: spec.direction.y, z: spec.direction.z },
  };
}

export function decodeBulletSpec(message: ProcessBulletMessage): BulletSpec {
  return {
    participant: message.participant,
    damage: message.damage,
    range: message.range,
    instant: message.instant,
    origin: { ...message.origin },
    direction: { ...message.direction },
  };
}
