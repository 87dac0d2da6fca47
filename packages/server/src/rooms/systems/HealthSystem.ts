import { COMBAT_CONFIG } from "../combatConfig.js";
import type { Combatant, CombatState } from "../schema/CombatState.js";
import type { Vec3 } from "@volley/bullets";

export type DamageResult = {
  victim: Combatant;
  attacker: Combatant | null;
  killed: boolean;
};

/**
 * Health System
 *
 * Applies bullet damage to combatants.
 * - Hits on dead or departed combatants are ignored
 * - A lethal hit credits the attacker and schedules a respawn
 * - Respawns restore full health at the combatant's spawn point
 */
export class HealthSystem {
  private readonly respawnMs: number;
  private readonly maxHealth: number;

  constructor(respawnMs: number, maxHealth: number = COMBAT_CONFIG.maxHealth) {
    this.respawnMs = respawnMs;
    this.maxHealth = maxHealth;
  }

  /**
   * Apply `damage` from participant `attacker` to the combatant behind
   * entity `target` (its sessionId).
   */
  applyDamage(state: CombatState, target: string, attacker: number, damage: number, now: number): DamageResult | null {
    const victim = state.combatants.get(target);
    if (!victim || !victim.alive) return null;

    victim.health = Math.max(0, victim.health - damage);
    const shooter = this.findByParticipant(state, attacker);

    if (victim.health > 0) {
      return { victim, attacker: shooter, killed: false };
    }

    victim.alive = false;
    victim.deaths++;
    victim.vx = 0;
    victim.vy = 0;
    victim.vz = 0;
    victim.respawnAt = now + this.respawnMs;
    if (shooter && shooter !== victim) shooter.kills++;

    console.log(`[HealthSystem] ${victim.sessionId} killed by ${shooter?.sessionId ?? "unknown"}`);
    return { victim, attacker: shooter, killed: true };
  }

  /**
   * Revive every dead combatant whose respawn time has come.
   * Returns the revived combatants.
   */
  update(state: CombatState, now: number, spawnFor: (combatant: Combatant) => Vec3): Combatant[] {
    const revived: Combatant[] = [];

    state.combatants.forEach((combatant) => {
      if (combatant.alive || now < combatant.respawnAt) return;

      const spawn = spawnFor(combatant);
      combatant.x = spawn.x;
      combatant.y = spawn.y;
      combatant.z = spawn.z;
      combatant.health = this.maxHealth;
      combatant.alive = true;
      combatant.respawnAt = 0;
      revived.push(combatant);
    });

    return revived;
  }

  private findByParticipant(state: CombatState, participant: number): Combatant | null {
    for (const combatant of state.combatants.values()) {
      if (combatant.participant === participant) return combatant;
    }
    return null;
  }
}
