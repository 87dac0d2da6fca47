import { Schema, MapSchema, type } from "@colyseus/schema";

/**
 * Combatant state - synchronized to all clients
 */
export class Combatant extends Schema {
  @type("string") sessionId: string = "";
  @type("uint16") participant: number = 0;

  // Position
  @type("number") x: number = 0;
  @type("number") y: number = 0;
  @type("number") z: number = 0;

  // Velocity (drives proximity hits)
  @type("number") vx: number = 0;
  @type("number") vy: number = 0;
  @type("number") vz: number = 0;

  @type("number") health: number = 100;
  @type("boolean") alive: boolean = true;
  @type("uint16") kills: number = 0;
  @type("uint16") deaths: number = 0;

  // Server-side only
  spawnIndex: number = 0;
  respawnAt: number = 0;
  lastFireAt: number = Number.NEGATIVE_INFINITY;
}

/**
 * Main combat state - the root schema synchronized to all clients
 */
export class CombatState extends Schema {
  @type("number") tickRate: number = 30;

  // Combatants by sessionId
  @type({ map: Combatant }) combatants = new MapSchema<Combatant>();

  // Bullet simulator telemetry
  @type("uint16") workers: number = 0;
  @type("uint32") bulletsQueued: number = 0;
  @type("uint32") bulletsInFlight: number = 0;
}
