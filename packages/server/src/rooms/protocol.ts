import { z } from "zod";
import { isUsableDirection } from "@volley/bullets";

const vec3Schema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite(),
});

/** Client-reported movement: where the combatant is and how fast it moves. */
export const moveMessageSchema = z.object({
  position: vec3Schema,
  velocity: vec3Schema,
});

/** Fire request. The muzzle is the combatant's own position. */
export const fireMessageSchema = z.object({
  direction: vec3Schema.refine(isUsableDirection, "direction must be a finite, non-zero vector"),
  instant: z.boolean().default(false),
});

export type MoveMessage = z.infer<typeof moveMessageSchema>;
export type FireMessage = z.infer<typeof fireMessageSchema>;

/** Broadcast as `bullet:hit` to every client. */
export type BulletHitDto = {
  bulletId: string;
  attacker: string | null;
  victim: string;
  damage: number;
  point: { x: number; y: number; z: number };
  proximity: boolean;
  health: number;
  killed: boolean;
};

/** Sent as `bullet:fired` to the shooter. */
export type BulletFiredDto = {
  bulletId: string;
  instant: boolean;
};
