/**
 * Bullet simulation constants (authoritative defaults).
 *
 * Keep all tuning numbers here so changes are deliberate and auditable.
 * Durations are milliseconds, speeds are world units per second.
 */

export const BULLET_CONFIG = {
  // Pool
  poolSize: 14,
  workerCapacity: 35,

  // Tick (~30Hz)
  tickMs: 33,

  // Projectile motion
  bulletSpeed: 1000,
  maxLifetimeMs: 12_000,

  // In-flight reclamation
  timeoutMs: 15_000,

  // Proximity fallback
  proximityRadius: 8.5,
  proximityFallback: true,
  // Upper bound on hitscan proximity samples per shot
  maxHitscanSamples: 4096,

  // Grace period between Destruct and forced teardown
  destructGraceMs: 1250,
} as const;

export type SimulatorConfig = {
  poolSize: number;
  workerCapacity: number;
  tickMs: number;
  bulletSpeed: number;
  maxLifetimeMs: number;
  timeoutMs: number;
  reclaimIntervalMs: number;
  proximityRadius: number;
  proximityFallback: boolean;
  maxHitscanSamples: number;
  destructGraceMs: number;
};

function requirePositive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid simulator config: ${name} must be a positive number, got ${value}`);
  }
  return value;
}

function requireCount(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`Invalid simulator config: ${name} must be an integer >= 1, got ${value}`);
  }
  return value;
}

/**
 * Fill in defaults and validate. The reclamation cadence follows the
 * timeout (half of it) unless set explicitly.
 */
export function resolveSimulatorConfig(overrides: Partial<SimulatorConfig> = {}): SimulatorConfig {
  const timeoutMs = requirePositive("timeoutMs", overrides.timeoutMs ?? BULLET_CONFIG.timeoutMs);
  const destructGraceMs = overrides.destructGraceMs ?? BULLET_CONFIG.destructGraceMs;
  if (!Number.isFinite(destructGraceMs) || destructGraceMs < 0) {
    throw new Error(`Invalid simulator config: destructGraceMs must be >= 0, got ${destructGraceMs}`);
  }

  return {
    poolSize: requireCount("poolSize", overrides.poolSize ?? BULLET_CONFIG.poolSize),
    workerCapacity: requireCount("workerCapacity", overrides.workerCapacity ?? BULLET_CONFIG.workerCapacity),
    tickMs: requirePositive("tickMs", overrides.tickMs ?? BULLET_CONFIG.tickMs),
    bulletSpeed: requirePositive("bulletSpeed", overrides.bulletSpeed ?? BULLET_CONFIG.bulletSpeed),
    maxLifetimeMs: requirePositive("maxLifetimeMs", overrides.maxLifetimeMs ?? BULLET_CONFIG.maxLifetimeMs),
    timeoutMs,
    reclaimIntervalMs: requirePositive("reclaimIntervalMs", overrides.reclaimIntervalMs ?? timeoutMs / 2),
    proximityRadius: requirePositive("proximityRadius", overrides.proximityRadius ?? BULLET_CONFIG.proximityRadius),
    proximityFallback: overrides.proximityFallback ?? BULLET_CONFIG.proximityFallback,
    maxHitscanSamples: requireCount("maxHitscanSamples", overrides.maxHitscanSamples ?? BULLET_CONFIG.maxHitscanSamples),
    destructGraceMs,
  };
}
