/**
 * Environment configuration with validation
 */
import type { SimulatorConfig } from "@volley/bullets";

export type WorkerMode = "thread" | "inline";

type Env = Record<string, string | undefined>;

function optionalEnv(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

/**
 * Parse a numeric variable, or undefined when unset so library defaults apply.
 */
export function numberEnv(env: Env, name: string, opts: { integer?: boolean; min?: number } = {}): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value) || (opts.integer && !Number.isInteger(value))) {
    throw new Error(`Invalid environment variable ${name}: expected a${opts.integer ? "n integer" : " number"}, got "${raw}"`);
  }
  if (opts.min !== undefined && value < opts.min) {
    throw new Error(`Invalid environment variable ${name}: must be >= ${opts.min}, got ${value}`);
  }
  return value;
}

function workerModeEnv(env: Env): WorkerMode {
  const mode = optionalEnv(env, "WORKER_MODE", "thread");
  if (mode !== "thread" && mode !== "inline") {
    throw new Error(`Invalid environment variable WORKER_MODE: expected "thread" or "inline", got "${mode}"`);
  }
  return mode;
}

export function loadConfig(env: Env = process.env) {
  const simulator: Partial<SimulatorConfig> = {};
  const poolSize = numberEnv(env, "WORKER_POOL_SIZE", { integer: true, min: 1 });
  const workerCapacity = numberEnv(env, "WORKER_CAPACITY", { integer: true, min: 1 });
  const tickMs = numberEnv(env, "BULLET_TICK_MS", { min: 1 });
  const bulletSpeed = numberEnv(env, "BULLET_SPEED", { min: 0 });
  const timeoutMs = numberEnv(env, "BULLET_TIMEOUT_MS", { min: 1 });
  const proximityRadius = numberEnv(env, "PROXIMITY_RADIUS", { min: 0 });
  if (poolSize !== undefined) simulator.poolSize = poolSize;
  if (workerCapacity !== undefined) simulator.workerCapacity = workerCapacity;
  if (tickMs !== undefined) simulator.tickMs = tickMs;
  if (bulletSpeed !== undefined) simulator.bulletSpeed = bulletSpeed;
  if (timeoutMs !== undefined) simulator.timeoutMs = timeoutMs;
  if (proximityRadius !== undefined) simulator.proximityRadius = proximityRadius;

  return {
    // Server
    port: numberEnv(env, "PORT", { integer: true, min: 1 }) ?? 2567,
    nodeEnv: optionalEnv(env, "NODE_ENV", "development"),

    // Redis (presence + driver only when set)
    redisUri: env.REDIS_URI || undefined,

    // Bullet simulation
    workerMode: workerModeEnv(env),
    simulator,

    // Room Configuration
    maxClients: numberEnv(env, "MAX_CLIENTS", { integer: true, min: 1 }) ?? 32,
    respawnMs: numberEnv(env, "RESPAWN_MS", { min: 0 }) ?? 3000,
  } as const;
}

export type Config = ReturnType<typeof loadConfig>;

export const config: Config = loadConfig();
