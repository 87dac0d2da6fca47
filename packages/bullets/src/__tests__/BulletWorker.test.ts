import test from "node:test";
import assert from "node:assert/strict";
import { resolveSimulatorConfig, type SimulatorConfig } from "../config.js";
import { encodeBulletSpec, type WorkerMessage } from "../protocol.js";
import type { WorldSnapshot } from "../types.js";
import { BulletWorker } from "../worker/BulletWorker.js";
import { SnapshotWorld } from "../world/SnapshotWorld.js";
import { arena, entity, SHOOTER, VICTIM } from "./fixtures.js";

function setup(snapshot: WorldSnapshot, overrides: Partial<SimulatorConfig> = {}) {
  const world = new SnapshotWorld(snapshot);
  const posted: WorkerMessage[] = [];
  const snapshots: WorldSnapshot[] = [];
  const worker = new BulletWorker({
    ref: "w",
    config: resolveSimulatorConfig(overrides),
    world,
    participants: world,
    post: (message) => posted.push(message),
    onSnapshot: (s) => snapshots.push(s),
  });
  return { world, worker, posted, snapshots };
}

function fire(id: string, instant: boolean, range = 1000) {
  return encodeBulletSpec(id, {
    participant: SHOOTER,
    damage: 10,
    range,
    origin: { x: 0, y: 0, z: 0 },
    direction: { x: 1, y: 0, z: 0 },
    instant,
  });
}

const victim = entity("victim", { x: 10, y: 0, z: 0 }, { participant: VICTIM });

test("instant bullets resolve on receipt, hit before completion", () => {
  const { worker, posted } = setup(arena({ entities: [victim] }));

  worker.handle(fire("b1", true), 0);

  assert.equal(worker.activeCount, 0);
  assert.deepEqual(
    posted.map((m) => m.type),
    ["BulletHit", "BulletComplete"],
  );
  const [hit, complete] = posted;
  assert.equal(hit.type === "BulletHit" && hit.target, "victim");
  assert.equal(hit.type === "BulletHit" && hit.damage, 10);
  assert.deepEqual(complete, { type: "BulletComplete", id: "b1", worker: "w", outcome: "hit" });
});

test("projectiles hit on the first tick that crosses the target", () => {
  const { worker, posted } = setup(arena({ entities: [victim] }));

  worker.handle(fire("b1", false), 0);
  assert.equal(worker.activeCount, 1);
  assert.equal(posted.length, 0);

  worker.step(33);
  assert.equal(worker.has("b1"), false);
  assert.deepEqual(posted.at(-1), { type: "BulletComplete", id: "b1", worker: "w", outcome: "hit" });
});

test("thin targets between tick positions are not tunneled through", () => {
  const thin = entity("thin", { x: 50, y: 0, z: 0 }, { participant: VICTIM, radius: 0.5 });
  const { worker, posted } = setup(arena({ entities: [thin] }));

  worker.handle(fire("b1", false), 0);
  worker.step(33);
  assert.equal(posted.length, 0);

  worker.step(66);
  assert.deepEqual(
    posted.map((m) => m.type),
    ["BulletHit", "BulletComplete"],
  );
});

test("projectiles expire once they travel their range", () => {
  const { worker, posted } = setup(arena(), { proximityFallback: false });

  worker.handle(fire("b1", false, 50), 0);
  worker.step(33);
  assert.equal(posted.length, 0);

  worker.step(66);
  assert.deepEqual(posted, [{ type: "BulletComplete", id: "b1", worker: "w", outcome: "range" }]);
});

test("projectiles expire after their lifetime", () => {
  const { worker, posted } = setup(arena(), { maxLifetimeMs: 100 });

  worker.handle(fire("b1", false), 0);
  worker.step(99);
  assert.equal(posted.length, 0);

  worker.step(100);
  assert.deepEqual(posted, [{ type: "BulletComplete", id: "b1", worker: "w", outcome: "lifetime" }]);
});

test("bullets whose shooter left are orphaned", () => {
  const { world, worker, posted } = setup(arena());

  worker.handle(fire("b1", false), 0);
  world.apply({ participants: [], entities: [], statics: [] });
  worker.step(33);

  assert.deepEqual(posted, [{ type: "BulletComplete", id: "b1", worker: "w", outcome: "orphaned" }]);
});

test("step visits bullets newest first", () => {
  const { worker, posted } = setup(arena(), { proximityFallback: false });

  worker.handle(fire("a", false, 10), 0);
  worker.handle(fire("b", false, 10), 0);
  worker.step(33);

  assert.deepEqual(
    posted.map((m) => m.id),
    ["b", "a"],
  );
});

test("cancelled bullets stop silently", () => {
  const { worker, posted } = setup(arena());

  worker.handle(fire("b1", false), 0);
  worker.handle({ type: "CancelBullet", id: "b1" }, 10);
  worker.step(33);

  assert.equal(worker.activeCount, 0);
  assert.deepEqual(posted, []);
});

test("SyncWorld hands the snapshot over", () => {
  const { worker, snapshots } = setup(arena());
  const next = arena({ entities: [victim] });

  worker.handle({ type: "SyncWorld", snapshot: next }, 0);
  assert.deepEqual(snapshots, [next]);
});

test("Destruct drops everything and ignores later messages", () => {
  const { worker, posted } = setup(arena());

  worker.handle(fire("b1", false), 0);
  worker.handle({ type: "Destruct" }, 0);
  worker.handle(fire("b2", true), 0);
  worker.step(33);

  assert.equal(worker.isDestroyed, true);
  assert.equal(worker.activeCount, 0);
  assert.deepEqual(posted, []);
});
