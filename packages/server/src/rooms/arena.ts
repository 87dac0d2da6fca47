import fs from "node:fs";
import { z } from "zod";
import type { StaticBox, Vec3, WorldSnapshot } from "@volley/bullets";
import { COMBAT_CONFIG } from "./combatConfig.js";
import type { CombatState, Combatant } from "./schema/CombatState.js";

const vec3Schema = z.object({ x: z.number(), y: z.number(), z: z.number() });

export const arenaSchema = z.object({
  bounds: z.object({ min: vec3Schema, max: vec3Schema }),
  spawns: z.array(vec3Schema).min(1),
  boxes: z.array(z.object({ handle: z.string().min(1), min: vec3Schema, max: vec3Schema })),
});

export type Arena = z.infer<typeof arenaSchema>;

const DEFAULT_ARENA_FILE = new URL("./arena.json", import.meta.url);

/**
 * Load static arena geometry and spawn points.
 */
export function loadArena(file: URL | string = DEFAULT_ARENA_FILE): Arena {
  const raw = fs.readFileSync(file, "utf-8");
  return arenaSchema.parse(JSON.parse(raw));
}

export function spawnPoint(arena: Arena, index: number): Vec3 {
  const spawn = arena.spawns[index % arena.spawns.length];
  return { x: spawn.x, y: spawn.y, z: spawn.z };
}

export function clampToBounds(arena: Arena, position: Vec3): Vec3 {
  const { min, max } = arena.bounds;
  return {
    x: Math.max(min.x, Math.min(max.x, position.x)),
    y: Math.max(min.y, Math.min(max.y, position.y)),
    z: Math.max(min.z, Math.min(max.z, position.z)),
  };
}

export function combatantPosition(combatant: Combatant): Vec3 {
  return { x: combatant.x, y: combatant.y, z: combatant.z };
}

/**
 * World snapshot the bullet workers simulate against.
 *
 * Every connected combatant stays a participant while dead, so its bullets
 * already in flight keep flying; only leaving the room orphans them.
 */
export function buildSnapshot(state: CombatState, statics: StaticBox[]): WorldSnapshot {
  const snapshot: WorldSnapshot = { participants: [], entities: [], statics };

  state.combatants.forEach((combatant) => {
    const position = combatantPosition(combatant);
    snapshot.participants.push({ participant: combatant.participant, position });
    snapshot.entities.push({
      handle: combatant.sessionId,
      participant: combatant.participant,
      position,
      velocity: { x: combatant.vx, y: combatant.vy, z: combatant.vz },
      radius: COMBAT_CONFIG.combatantRadius,
      living: combatant.alive,
    });
  });

  return snapshot;
}
