import test from "node:test";
import assert from "node:assert/strict";
import { NotFoundError } from "../../src/sim/errors";
import { EventBus } from "../../src/sim/eventBus";
import { makeSmithyWorld } from "../helpers";

test("scenario: a blacksmith at the forge works through the morning", () => {
  const world = makeSmithyWorld({}, { needs: { energy: 50, hunger: 10 } });
  const s = world.tick(60);

  const smith = world.getNpc("smith_1");
  assert.equal(world.clockSnapshot().hour, 9);
  assert.equal(smith.activity, "working");
  assert.equal(smith.needs.energy, 41);
  assert.equal(smith.needs.hunger, 13);
  assert.ok(s.events.some((e) => e.kind === "npc.activity.changed" && e.sourceId === "smith_1"));
  for (const e of s.events.filter((ev) => ev.kind === "item.crafted")) assert.equal(e.sourceId, "smith_1");
});

test("scenario: an exhausted worker sleeps until rested, then returns to work", () => {
  const world = makeSmithyWorld({}, { needs: { energy: 15, hunger: 10 } });

  world.tick(1);
  let smith = world.getNpc("smith_1");
  assert.equal(smith.activity, "sleeping");
  assert.equal(smith.needs.energy, 15.45);

  const energies: number[] = [];
  let ticks = 0;
  while (smith.activity === "sleeping" && ticks < 10) {
    world.tick(60);
    ticks++;
    smith = world.getNpc("smith_1");
    energies.push(smith.needs.energy);
    if (smith.needs.energy < 80) assert.equal(smith.activity, "sleeping");
  }
  assert.equal(ticks, 3);
  assert.deepEqual(energies, [42.45, 69.45, 96.45]);
  assert.equal(smith.activity, "idle");
  assert.equal(smith.memory.at(-1)?.kind, "rested");

  world.tick(60);
  assert.equal(world.getNpc("smith_1").activity, "working");
});

test("scenario: spawning at an unknown location changes nothing", () => {
  const world = makeSmithyWorld();
  const entities = world.listEntities({ includeInactive: true });
  const nextSeq = world.events.nextSeq;

  assert.throws(() => world.spawnNpc("unknown_loc", ["farmer"]), NotFoundError);
  assert.deepEqual(world.listEntities({ includeInactive: true }), entities);
  assert.equal(world.events.nextSeq, nextSeq);
});

test("scenario: a full history keeps only the newest events", () => {
  const bus = new EventBus({ capacity: 1000 });
  for (let i = 0; i < 1500; i++) bus.publish({ kind: "custom.tick", at: i, message: `event ${i}` });
  assert.equal(bus.size, 1000);
  assert.equal(bus.all()[0].seq, 501);
  assert.equal(bus.recent(1)[0].seq, 1500);
});
