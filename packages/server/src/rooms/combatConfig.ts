/**
 * Combat constants (authoritative).
 *
 * Keep all gameplay numbers here so tuning is deliberate and auditable.
 * Distances are world units, durations milliseconds.
 */

export const COMBAT_CONFIG = {
  // Combatants
  maxHealth: 100,
  combatantRadius: 1.5,

  // Hitscan weapon
  hitscan: {
    damage: 20,
    range: 600,
    cooldownMs: 250,
  },

  // Projectile weapon
  projectile: {
    damage: 35,
    range: 2000,
    cooldownMs: 600,
  },

  // Room metadata refresh
  metadataIntervalMs: 1000,
} as const;
