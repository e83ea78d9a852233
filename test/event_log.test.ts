import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { openEventLog, readEventLog } from "../src/service/eventLog";
import { CorruptDataError } from "../src/sim/errors";
import { makeSmithyWorld, tmpDir } from "./helpers";

test("event log: attached logs stream every published event", async () => {
  const file = path.join(tmpDir("events"), "logs", "run.jsonl");
  const world = makeSmithyWorld();
  const log = openEventLog(file);
  log.attach(world.events);

  const s1 = world.tick(60);
  const s2 = world.tick(60);
  await log.close();

  const read = readEventLog(file);
  assert.deepEqual(
    read.map((e) => e.seq),
    [...s1.events, ...s2.events].map((e) => e.seq)
  );
  assert.deepEqual(read, [...s1.events, ...s2.events]);
});

test("event log: appended batches read back in order", async () => {
  const file = path.join(tmpDir("events"), "batch.jsonl");
  const world = makeSmithyWorld();
  world.tick(60);
  const log = openEventLog(file);
  log.appendEvents(world.events.all());
  await log.close();
  await log.close();
  log.appendEvents(world.events.all());

  assert.deepEqual(readEventLog(file), world.events.all());
});

test("event log: append mode keeps earlier lines", async () => {
  const file = path.join(tmpDir("events"), "append.jsonl");
  const world = makeSmithyWorld();
  const first = openEventLog(file);
  first.appendEvents(world.events.all());
  await first.close();

  world.tick(60);
  const second = openEventLog(file, { append: true });
  second.appendEvents(world.events.since(1));
  await second.close();

  assert.deepEqual(readEventLog(file), world.events.all());
});

test("event log: closing detaches from the bus", async () => {
  const file = path.join(tmpDir("events"), "detach.jsonl");
  const world = makeSmithyWorld();
  const log = openEventLog(file);
  log.attach(world.events);
  await log.close();
  world.events.publish({ kind: "custom.after", at: world.now, message: "too late" });
  assert.deepEqual(readEventLog(file), []);
});

test("event log: bad lines are reported with their line number", () => {
  const file = path.join(tmpDir("events"), "bad.jsonl");
  const good = JSON.stringify({ seq: 1, id: "evt:0:1", kind: "custom.ok", at: 0, message: "fine" });
  fs.writeFileSync(file, `${good}\n\n{not json\n`);
  assert.throws(() => readEventLog(file), (err: unknown) => err instanceof CorruptDataError && err.message.includes(":3:"));

  fs.writeFileSync(file, `${JSON.stringify({ seq: 1, id: "x", kind: "nonsense", at: 0, message: "?" })}\n`);
  assert.throws(() => readEventLog(file), CorruptDataError);
});

test("event log: a log that cannot be written rejects on close", async () => {
  const dir = tmpDir("events");
  const world = makeSmithyWorld();
  const log = openEventLog(dir);
  log.appendEvents(world.events.all());
  await assert.rejects(log.close(), /EISDIR/);
});

test("event log: targets survive the round trip", async () => {
  const file = path.join(tmpDir("events"), "target.jsonl");
  const world = makeSmithyWorld();
  const log = openEventLog(file);
  log.attach(world.events);
  world.requestTravel("smith_1", "road_1");
  await log.close();

  const [started] = readEventLog(file);
  assert.equal(started.kind, "travel.started");
  assert.equal(started.targetId, "road_1");
});
