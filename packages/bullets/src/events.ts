import type { BulletOutcome, Vec3 } from "./types.js";

export type BulletHitEvent = {
  bulletId: string;
  participant: number;
  damage: number;
  target: string;
  point: Vec3;
  proximity: boolean;
};

export type BulletCompleteEvent = {
  bulletId: string;
  worker: string;
  outcome: BulletOutcome;
};

export type BulletReclaimEvent = {
  bulletId: string;
  worker: string;
  elapsedMs: number;
};

export type DispatcherEvents = {
  hit: (event: BulletHitEvent) => void;
  complete: (event: BulletCompleteEvent) => void;
  reclaim: (event: BulletReclaimEvent) => void;
};
