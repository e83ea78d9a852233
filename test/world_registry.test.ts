import test from "node:test";
import assert from "node:assert/strict";
import { createConfig, createTestConfig } from "../src/sim/config";
import { CorruptDataError, InvalidArgumentError, NotFoundError } from "../src/sim/errors";
import { ProfessionCatalog } from "../src/sim/professions";
import { isLocation, isNpc, type WorkWindow } from "../src/sim/types";
import { World } from "../src/sim/world";
import { StubGenerator, makeSmithyWorld, recordingLogger, smithyContent, testCatalog } from "./helpers";

test("world: creation places NPCs, rolls weather and opens markets", () => {
  const world = makeSmithyWorld();
  assert.equal(world.now, 480);
  assert.equal(world.clockSnapshot().hour, 8);

  const created = world.recentEvents(1)[0];
  assert.equal(created.kind, "world.created");
  assert.equal(created.seq, 1);

  assert.equal(world.getNpc("smith_1").locationId, "forge_1");
  assert.deepEqual(world.getLocation("forge_1").npcIds, ["smith_1"]);
  assert.equal(world.getLocation("market_1").marketOpen, true);
  assert.equal(world.getLocation("forge_1").marketOpen, false);
  for (const loc of world.listEntities({ kind: "location" })) {
    assert.ok(isLocation(loc) && loc.weather !== null, `${loc.id} has weather`);
  }
  assert.deepEqual(world.integrityProblems(), []);
});

test("world: summary counts entities and activities", () => {
  const s = makeSmithyWorld().summary();
  assert.equal(s.name, "Smithy");
  assert.equal(s.seed, 11);
  assert.equal(s.time, "1 Thawmonth, Year 1 08:00 (spring, morning)");
  assert.deepEqual(s.npcs, { total: 1, active: 1 });
  assert.deepEqual(s.locations, { total: 4, active: 4 });
  assert.equal(s.activities.idle, 1);
  assert.equal(s.eventsRetained, 1);
  assert.equal(s.nextEventSeq, 2);
});

test("world: reads hand out copies", () => {
  const world = makeSmithyWorld();
  const smith = world.getNpc("smith_1");
  smith.needs.energy = 0;
  smith.professions.push("thief");
  assert.equal(world.getNpc("smith_1").needs.energy, 100);
  assert.deepEqual(world.getNpc("smith_1").professions, ["blacksmith"]);
  assert.throws(() => world.getNpc("forge_1"), NotFoundError);
  assert.throws(() => world.getLocation("smith_1"), NotFoundError);
  assert.deepEqual(
    world.npcsAt("forge_1").map((n) => n.id),
    ["smith_1"]
  );
});

test("world: spawned NPCs are registered, placed and announced", () => {
  const world = makeSmithyWorld();
  const npc = world.spawnNpc("market_1", ["tailor", "merchant"]);
  assert.equal(npc.id, "npc:2");

  const got = world.getEntity(npc.id);
  assert.ok(isNpc(got));
  assert.equal(got.locationId, "market_1");
  assert.equal(got.workSiteId, "market_1");
  assert.deepEqual(got.professions, ["tailor", "merchant"]);
  assert.deepEqual(world.getLocation("market_1").npcIds, ["npc:2"]);

  const ev = world.recentEvents(1)[0];
  assert.equal(ev.kind, "npc.spawned");
  assert.equal(ev.sourceId, "npc:2");
  assert.equal(ev.locationId, "market_1");

  assert.equal(world.spawnNpc("road_1", []).id, "npc:3");
  assert.deepEqual(world.captureState().counters, { npc: 3, spawn: 2 });
});

test("world: spawned ids skip ids already taken", () => {
  const content = smithyContent({ id: "npc:2" });
  const world = World.createNew({ seed: 3, counts: { locations: 4, npcs: 1 } }, { generator: new StubGenerator(content), professions: testCatalog });
  assert.equal(world.spawnNpc("forge_1", []).id, "npc:3");
});

test("world: failed spawns change nothing", () => {
  const world = makeSmithyWorld();
  const before = world.listEntities({ includeInactive: true }).length;
  const seq = world.events.nextSeq;

  assert.throws(() => world.spawnNpc("unknown_loc", ["farmer"]), NotFoundError);
  assert.throws(() => world.spawnNpc("market_1", [""]), InvalidArgumentError);
  assert.throws(() => world.spawnNpc("market_1", ["baker", "baker"]), InvalidArgumentError);

  assert.equal(world.listEntities({ includeInactive: true }).length, before);
  assert.equal(world.events.nextSeq, seq);
  assert.equal(world.spawnNpc("market_1", []).id, "npc:2");
});

test("world: removal is soft, announced once and frees the roster", () => {
  const world = makeSmithyWorld();
  assert.equal(world.removeEntity("smith_1"), true);
  assert.throws(() => world.getEntity("smith_1"), NotFoundError);
  assert.deepEqual(world.getLocation("forge_1").npcIds, []);

  const removed = world.events.byKind("entity.removed");
  assert.equal(removed.length, 1);
  assert.equal(removed[0].sourceId, "smith_1");

  const seq = world.events.nextSeq;
  assert.equal(world.removeEntity("smith_1"), false);
  assert.equal(world.events.nextSeq, seq);
  assert.throws(() => world.removeEntity("ghost"), NotFoundError);

  const all = world.listEntities({ includeInactive: true });
  assert.equal(all.find((e) => e.id === "smith_1")?.active, false);
  assert.equal(world.listEntities().length, 4);
  assert.deepEqual(world.integrityProblems(), []);
  world.tick(60);
});

test("world: spawning at a removed location fails", () => {
  const world = makeSmithyWorld();
  world.removeEntity("road_1");
  assert.throws(() => world.spawnNpc("road_1", []), NotFoundError);
  assert.equal(world.getLocation("market_1").marketOpen, true);
});

test("world: removing an occupied location blocks the next tick", () => {
  const world = makeSmithyWorld();
  world.removeEntity("forge_1");
  assert.ok(world.integrityProblems().length > 0);
  assert.throws(() => world.tick(60), CorruptDataError);
  assert.equal(world.now, 480);
  assert.deepEqual(world.getNpc("smith_1").needs, { energy: 100, hunger: 0, mood: 50 });
});

test("world: a location removed mid-tick halts the tick", () => {
  const world = makeSmithyWorld();
  const visitor = world.spawnNpc("market_1", []);
  world.events.subscribe("npc.activity.changed", (e) => {
    if (e.sourceId === "smith_1") world.removeEntity("market_1");
  });

  assert.throws(() => world.tick(60), CorruptDataError);
  assert.equal(world.events.byKind("sim.error").length, 0);
  assert.equal(world.getNpc(visitor.id).locationId, "market_1");
  assert.throws(() => world.tick(60), CorruptDataError);
});

test("world: travel requests plan the shortest route", () => {
  const world = makeSmithyWorld();
  assert.deepEqual(world.requestTravel("smith_1", "road_1"), ["market_1", "road_1"]);
  const started = world.recentEvents(1)[0];
  assert.equal(started.kind, "travel.started");
  assert.equal(started.targetId, "road_1");
  assert.deepEqual(started.data?.path, ["market_1", "road_1"]);
  assert.deepEqual(world.getNpc("smith_1").travel?.path, ["market_1", "road_1"]);

  assert.throws(() => world.requestTravel("smith_1", "forge_1"), InvalidArgumentError);
  assert.throws(() => world.requestTravel("smith_1", "island"), InvalidArgumentError);
  assert.throws(() => world.requestTravel("smith_1", "nowhere"), NotFoundError);
  assert.throws(() => world.requestTravel("ghost", "road_1"), NotFoundError);
});

test("world: a traveller hops between rosters on tick", () => {
  const world = makeSmithyWorld();
  const visitor = world.spawnNpc("market_1", []);
  world.requestTravel(visitor.id, "forge_1");

  const s = world.tick(60);
  assert.equal(world.getNpc(visitor.id).locationId, "forge_1");
  assert.equal(world.getNpc(visitor.id).travel, undefined);
  assert.deepEqual(world.getLocation("forge_1").npcIds, ["smith_1", visitor.id]);
  assert.deepEqual(world.getLocation("market_1").npcIds, []);
  assert.ok(s.changedEntityIds.includes("market_1"));
  assert.ok(s.changedEntityIds.includes("forge_1"));
  assert.ok(s.events.some((e) => e.kind === "travel.completed" && e.sourceId === visitor.id));
  assert.deepEqual(world.integrityProblems(), []);
});

test("world: tick validates its argument and leaves the clock alone on error", () => {
  const world = makeSmithyWorld();
  for (const bad of [0, -1, 1.5]) assert.throws(() => world.tick(bad), InvalidArgumentError);
  assert.equal(world.now, 480);
});

test("world: tick summary covers the events of the tick", () => {
  const world = makeSmithyWorld();
  const firstSeq = world.events.nextSeq;
  const s = world.tick(60);
  assert.equal(s.fromMinute, 480);
  assert.equal(s.toMinute, 540);
  assert.equal(s.deltaMinutes, 60);
  assert.equal(s.eventsEmitted, world.events.nextSeq - firstSeq);
  assert.equal(s.events.length, s.eventsEmitted);
  assert.equal(s.events[0]?.seq, firstSeq);
  assert.equal(s.errors, 0);
  assert.ok(s.changedEntityIds.includes("smith_1"));
});

test("world: markets follow the default working window", () => {
  const world = makeSmithyWorld();
  world.tick(600);
  assert.equal(world.clockSnapshot().hour, 18);
  assert.equal(world.getLocation("market_1").marketOpen, false);
  assert.equal(world.events.byKind("market.closed").length, 1);

  world.tick(840);
  assert.equal(world.clockSnapshot().hour, 8);
  assert.equal(world.getLocation("market_1").marketOpen, true);
  assert.equal(world.events.byKind("market.opened").length, 1);
});

test("world: crossing midnight announces the new day", () => {
  const world = makeSmithyWorld();
  world.tick(960);
  const day = world.events.byKind("clock.day.started");
  assert.equal(day.length, 1);
  assert.equal(day[0].data?.day, 1);
  assert.equal(day[0].at, 1440);
});

test("world: one failing NPC update is reported and the others still run", () => {
  class ExplodingCatalog extends ProfessionCatalog {
    workWindow(name: string): WorkWindow | undefined {
      if (name === "cursed") throw new Error("cursed profession");
      return super.workWindow(name);
    }
  }
  const world = makeSmithyWorld({ professions: new ExplodingCatalog([]) }, { professions: ["cursed"] });
  const visitor = world.spawnNpc("market_1", []);

  const s = world.tick(60);
  assert.equal(s.errors, 1);
  const err = world.events.byKind("sim.error")[0];
  assert.equal(err.sourceId, "smith_1");
  assert.match(err.message, /cursed profession/);

  assert.deepEqual(world.getNpc("smith_1").needs, { energy: 100, hunger: 0, mood: 50 });
  assert.deepEqual(world.getNpc(visitor.id).needs, { energy: 77, hunger: 13, mood: 50 });
  assert.equal(world.now, 540);
});

test("world: tick cannot be re-entered from a listener", () => {
  const world = makeSmithyWorld();
  const caught: unknown[] = [];
  world.events.onAny(() => {
    try {
      world.tick(1);
    } catch (err) {
      caught.push(err);
    }
  });
  world.tick(60);
  assert.ok(caught.length > 0);
  assert.ok(caught.every((e) => e instanceof InvalidArgumentError));
  assert.equal(world.now, 540);
});

test("world: NPCs who share a location strike up conversations", () => {
  const config = createConfig({ tuning: { socialBaseChance: 1, socialMaxChance: 1 } });
  const world = makeSmithyWorld({ config });
  const a = world.spawnNpc("market_1", []);
  const b = world.spawnNpc("market_1", []);

  const s = world.tick(60);
  for (const [who, partner] of [
    [a.id, b.id],
    [b.id, a.id]
  ]) {
    const npc = world.getNpc(who);
    assert.equal(npc.activity, "socializing");
    assert.equal(npc.memory.at(-1)?.kind, "socialized");
    const changed = s.events.find((e) => e.kind === "npc.activity.changed" && e.sourceId === who);
    assert.equal(changed?.targetId, partner);
  }
  assert.equal(world.getNpc("smith_1").activity, "working");
});

test("world: the hourly weather roll announces changes", () => {
  const world = makeSmithyWorld({ config: createTestConfig() });
  for (let i = 0; i < 24; i++) world.tick(60);

  const changes = world.events.byKind("weather.changed");
  assert.ok(changes.length > 0);
  for (const e of changes) {
    assert.equal(e.at % 60, 0);
    assert.equal(e.sourceId, e.locationId);
  }
  for (const loc of world.listEntities({ kind: "location" })) {
    if (!isLocation(loc)) continue;
    const last = changes.find((e) => e.sourceId === loc.id);
    if (!last) continue;
    assert.equal(last.data?.to, loc.weather?.condition);
    assert.equal(loc.weather?.since, last.at);
  }
});

test("world: crossing into a new season is announced", () => {
  const world = makeSmithyWorld({ config: createConfig({ clock: { startMinute: 90 * 1440 - 60 } }) });
  world.tick(60);
  const season = world.events.byKind("clock.season.changed");
  assert.equal(season.length, 1);
  assert.equal(season[0].at, 90 * 1440);
  assert.deepEqual(season[0].data, { season: "summer", crossed: 1 });
  assert.equal(world.events.byKind("clock.year.started").length, 0);
});

test("world: crossing into a new year announces the day, the season and the year", () => {
  const world = makeSmithyWorld({ config: createConfig({ clock: { startMinute: 360 * 1440 - 60 } }) });
  const s = world.tick(60);
  assert.deepEqual(
    s.events.filter((e) => e.kind.startsWith("clock.")).map((e) => e.kind),
    ["clock.day.started", "clock.season.changed", "clock.year.started"]
  );
  assert.deepEqual(world.events.byKind("clock.season.changed")[0].data, { season: "spring", crossed: 1 });
  assert.deepEqual(world.events.byKind("clock.year.started")[0].data, { year: 2, crossed: 1 });
  assert.equal(world.clockSnapshot().year, 2);
});

test("world: listener failures reach the logger only when asked to", () => {
  const quiet = recordingLogger();
  const world = makeSmithyWorld({ logger: quiet });
  world.events.subscribe("custom.ping", () => {
    throw new Error("listener down");
  });
  world.events.publish({ kind: "custom.ping", at: world.now, message: "ping" });
  assert.equal(quiet.lines.length, 0);

  const loud = recordingLogger();
  const debug = makeSmithyWorld({ logger: loud, config: createConfig({ debug: { logListenerFailures: true } }) });
  debug.events.subscribe("custom.ping", () => {
    throw new Error("listener down");
  });
  debug.events.publish({ kind: "custom.ping", at: debug.now, message: "ping" });
  assert.deepEqual(loud.lines, [{ level: "warn", msg: "[events] Listener for custom.ping failed: listener down" }]);
});
