import test from "node:test";
import assert from "node:assert/strict";
import { SnapshotWorld } from "../world/SnapshotWorld.js";
import { arena, entity, SHOOTER, VICTIM } from "./fixtures.js";

const ORIGIN = { x: 0, y: 0, z: 0 };
const FAR = { x: 50, y: 0, z: 0 };

const victim = entity("victim", { x: 10, y: 0, z: 0 }, { participant: VICTIM });

test("rayIntersect skips geometry owned by excluded participants", () => {
  const world = new SnapshotWorld(arena({ entities: [victim] }));

  const hit = world.rayIntersect(ORIGIN, FAR, [SHOOTER]);
  assert.ok(hit);
  assert.equal(hit.handle, "victim");
  assert.equal(hit.kind, "entity");
  assert.equal(hit.living, true);
  assert.equal(hit.participant, VICTIM);
  assert.equal(hit.distance, 9);
  assert.deepEqual(hit.point, { x: 9, y: 0, z: 0 });

  // Without the exclusion the shooter's own body is struck at the muzzle.
  assert.equal(world.rayIntersect(ORIGIN, FAR, [])?.handle, "shooter");
});

test("rayIntersect returns the nearest of statics and entities", () => {
  const wall = { handle: "wall", min: { x: 5, y: -5, z: -5 }, max: { x: 6, y: 5, z: 5 } };
  const world = new SnapshotWorld(arena({ entities: [victim], statics: [wall] }));

  const hit = world.rayIntersect(ORIGIN, FAR, [SHOOTER]);
  assert.ok(hit);
  assert.equal(hit.handle, "wall");
  assert.equal(hit.kind, "static");
  assert.equal(hit.living, false);
});

test("rayIntersect prefers static geometry on an exact tie", () => {
  const wall = { handle: "wall", min: { x: 9, y: -5, z: -5 }, max: { x: 12, y: 5, z: 5 } };
  const world = new SnapshotWorld(arena({ entities: [victim], statics: [wall] }));

  assert.equal(world.rayIntersect(ORIGIN, FAR, [SHOOTER])?.handle, "wall");
});

test("rayIntersect reports dead entities as non-living", () => {
  const corpse = entity("corpse", { x: 10, y: 0, z: 0 }, { living: false });
  const world = new SnapshotWorld(arena({ entities: [corpse] }));

  const hit = world.rayIntersect(ORIGIN, FAR, [SHOOTER]);
  assert.ok(hit);
  assert.equal(hit.handle, "corpse");
  assert.equal(hit.living, false);
});

test("proximitySearch only matches moving, living, foreign entities", () => {
  const center = { x: 33, y: 0, z: 0 };
  const moving = { x: 0, y: 0, z: 10 };
  const at = { x: 30, y: 5, z: 0 };

  const runner = new SnapshotWorld(arena({ entities: [entity("runner", at, { participant: VICTIM, velocity: moving })] }));
  const found = runner.proximitySearch(center, 8.5, SHOOTER);
  assert.ok(found);
  assert.equal(found.handle, "runner");
  assert.deepEqual(found.position, at);
  assert.equal(found.distance, Math.sqrt(34));

  const idle = new SnapshotWorld(arena({ entities: [entity("idle", at, { participant: VICTIM })] }));
  assert.equal(idle.proximitySearch(center, 8.5, SHOOTER), null);

  const dead = new SnapshotWorld(arena({ entities: [entity("dead", at, { velocity: moving, living: false })] }));
  assert.equal(dead.proximitySearch(center, 8.5, SHOOTER), null);

  const own = new SnapshotWorld(arena({ entities: [entity("own", at, { participant: SHOOTER, velocity: moving })] }));
  assert.equal(own.proximitySearch(center, 8.5, SHOOTER), null);
});

test("proximitySearch ignores entities moving at or below the threshold", () => {
  const crawler = entity("crawler", { x: 1, y: 0, z: 0 }, { velocity: { x: 0.05, y: 0, z: 0 } });
  const world = new SnapshotWorld(arena({ entities: [crawler] }));

  assert.equal(world.proximitySearch({ x: 0, y: 0, z: 0 }, 8.5, SHOOTER), null);
});

test("proximitySearch picks the nearest candidate", () => {
  const velocity = { x: 1, y: 0, z: 0 };
  const world = new SnapshotWorld(
    arena({
      entities: [
        entity("far", { x: 36, y: 0, z: 0 }, { velocity }),
        entity("near", { x: 34, y: 0, z: 0 }, { velocity }),
      ],
    }),
  );

  assert.equal(world.proximitySearch({ x: 33, y: 0, z: 0 }, 8.5, SHOOTER)?.handle, "near");
});

test("resolve follows the latest snapshot", () => {
  const world = new SnapshotWorld(arena());
  assert.deepEqual(world.resolve(SHOOTER), { x: 0, y: 0, z: 0 });
  assert.equal(world.resolve(VICTIM), undefined);

  world.apply({ participants: [{ participant: VICTIM, position: { x: 4, y: 0, z: 0 } }], entities: [], statics: [] });
  assert.equal(world.resolve(SHOOTER), undefined);
  assert.deepEqual(world.resolve(VICTIM), { x: 4, y: 0, z: 0 });
});
