import test from "node:test";
import assert from "node:assert/strict";
import { calendarAt, isDaytimeHour, minutesUntilTime, timeOfDayForHour, MINUTES_PER_DAY } from "../src/sim/calendar";
import { WorldClock } from "../src/sim/clock";
import { InvalidArgumentError } from "../src/sim/errors";
import { Rng } from "../src/sim/rng";

test("clock: a new clock starts at 08:00 on the first day of spring", () => {
  const c = new WorldClock();
  assert.deepEqual(c.snapshot(), {
    totalMinutes: 480,
    year: 1,
    month: 1,
    dayOfMonth: 1,
    dayOfYear: 1,
    day: 0,
    hour: 8,
    minute: 0,
    season: "spring",
    timeOfDay: "morning",
    isDaytime: true
  });
  assert.equal(c.formatTime(), "08:00");
  assert.equal(c.formatDate(), "1 Thawmonth, Year 1");
  assert.equal(c.formatDateTime(), "1 Thawmonth, Year 1 08:00 (spring, morning)");
});

test("clock: advance rejects non-positive and fractional minutes", () => {
  const c = new WorldClock();
  for (const bad of [0, -1, 1.5, Number.NaN]) {
    assert.throws(() => c.advance(bad), InvalidArgumentError);
  }
  assert.equal(c.now, 480);
});

test("clock: derived fields stay in range and agree with each other", () => {
  const c = new WorldClock(0);
  const rng = new Rng(7);
  let prev = c.now;
  for (let i = 0; i < 500; i++) {
    c.advance(rng.int(1, 5000));
    const s = c.snapshot();
    assert.ok(s.totalMinutes > prev);
    prev = s.totalMinutes;
    assert.ok(s.hour >= 0 && s.hour <= 23);
    assert.ok(s.minute >= 0 && s.minute <= 59);
    assert.ok(s.dayOfMonth >= 1 && s.dayOfMonth <= 30);
    assert.ok(s.month >= 1 && s.month <= 12);
    assert.ok(s.dayOfYear >= 1 && s.dayOfYear <= 360);
    assert.equal(s.dayOfYear, (s.month - 1) * 30 + s.dayOfMonth);
    assert.equal(s.season, ["spring", "summer", "autumn", "winter"][Math.floor((s.month - 1) / 3)]);
    assert.equal(s.totalMinutes, s.day * MINUTES_PER_DAY + s.hour * 60 + s.minute);
  }
});

test("calendar: time-of-day buckets and daytime", () => {
  const expected: Array<[number, string]> = [
    [0, "night"],
    [5, "night"],
    [6, "dawn"],
    [7, "dawn"],
    [8, "morning"],
    [11, "morning"],
    [12, "afternoon"],
    [16, "afternoon"],
    [17, "dusk"],
    [18, "dusk"],
    [19, "evening"],
    [23, "evening"]
  ];
  for (const [hour, bucket] of expected) assert.equal(timeOfDayForHour(hour), bucket, `hour ${hour}`);
  assert.equal(isDaytimeHour(5), false);
  assert.equal(isDaytimeHour(6), true);
  assert.equal(isDaytimeHour(18), true);
  assert.equal(isDaytimeHour(19), false);
});

test("calendar: seasons turn every 90 days and the year after 360", () => {
  assert.equal(calendarAt(89 * MINUTES_PER_DAY).season, "spring");
  assert.equal(calendarAt(90 * MINUTES_PER_DAY).season, "summer");
  assert.equal(calendarAt(180 * MINUTES_PER_DAY).season, "autumn");
  assert.equal(calendarAt(270 * MINUTES_PER_DAY).season, "winter");
  const nextYear = calendarAt(360 * MINUTES_PER_DAY);
  assert.equal(nextYear.year, 2);
  assert.equal(nextYear.season, "spring");
  assert.equal(nextYear.dayOfYear, 1);
});

test("clock: advance reports crossed day, season and year boundaries", () => {
  const a = new WorldClock().advance(960);
  assert.equal(a.to, 1440);
  assert.equal(a.crossedDays, 1);
  assert.equal(a.crossedSeasons, 0);

  const b = new WorldClock(89 * MINUTES_PER_DAY + 1380).advance(60);
  assert.deepEqual([b.crossedDays, b.crossedSeasons, b.crossedYears], [1, 1, 0]);

  const c = new WorldClock(359 * MINUTES_PER_DAY + 1380).advance(60);
  assert.deepEqual([c.crossedDays, c.crossedSeasons, c.crossedYears], [1, 1, 1]);
});

test("clock: scheduled callbacks fire in trigger order, ties first-in first-out", () => {
  const c = new WorldClock(0);
  const order: string[] = [];
  c.schedule(10, () => order.push("a"));
  c.schedule(5, () => order.push("b"));
  c.schedule(10, () => order.push("c"));
  const res = c.advance(10);
  assert.deepEqual(order, ["b", "a", "c"]);
  assert.equal(res.fired, 3);
  assert.equal(c.pending, 0);
});

test("clock: callbacks see the new time and recurring ones re-arm", () => {
  const c = new WorldClock(0);
  const seen: Array<[number, number]> = [];
  c.schedule(15, (at, clock) => seen.push([at, clock.now]), { every: 15 });
  c.advance(60);
  assert.deepEqual(seen, [
    [15, 60],
    [30, 60],
    [45, 60],
    [60, 60]
  ]);
  assert.equal(c.pending, 1);
});

test("clock: cancel stops a pending task and reports whether it was pending", () => {
  const c = new WorldClock(0);
  let fired = 0;
  const h = c.schedule(5, () => fired++);
  assert.equal(c.cancel(h), true);
  assert.equal(c.advance(10).fired, 0);
  assert.equal(fired, 0);
  assert.equal(c.cancel(h), false);
});

test("clock: a recurring task can cancel itself", () => {
  const c = new WorldClock(0);
  let n = 0;
  const h = c.schedule(
    10,
    () => {
      n++;
      if (n === 2) c.cancel(h);
    },
    { every: 10 }
  );
  c.advance(100);
  assert.equal(n, 2);
  assert.equal(c.pending, 0);
});

test("clock: a failing callback is reported and the rest still run", () => {
  const c = new WorldClock(0);
  let ok = 0;
  c.schedule(
    1,
    () => {
      throw new Error("boom");
    },
    { label: "bad" }
  );
  c.schedule(2, () => ok++);
  const res = c.advance(5);
  assert.equal(ok, 1);
  assert.equal(res.fired, 2);
  assert.equal(res.failures.length, 1);
  assert.equal(res.failures[0].label, "bad");
  assert.equal(res.failures[0].at, 1);
  assert.equal(c.now, 5);
});

test("clock: schedule rejects negative delays and bad intervals", () => {
  const c = new WorldClock(0);
  assert.throws(() => c.schedule(-1, () => undefined), InvalidArgumentError);
  assert.throws(() => c.schedule(1, () => undefined, { every: 0 }), InvalidArgumentError);
});

test("clock: working hours use per-profession windows that may wrap midnight", () => {
  const c = new WorldClock(480, {
    workWindowFor: (p) => (p === "guard" ? { startHour: 20, endHour: 6 } : undefined)
  });
  assert.equal(c.isWorkingHours(), true);
  assert.equal(c.isWorkingHours("baker"), true);
  assert.equal(c.isWorkingHours("guard"), false);

  const res = c.advanceTo(22, 0);
  assert.equal(res.to, 1320);
  assert.equal(c.hour, 22);
  assert.equal(c.isWorkingHours("guard"), true);
  assert.equal(c.isWorkingHours(), false);

  c.advanceTo(3, 0);
  assert.equal(c.isWorkingHours("guard"), true);
  assert.throws(() => c.advanceTo(24, 0), InvalidArgumentError);
});

test("clock: minutes until the next boundary are always positive", () => {
  const c = new WorldClock(480);
  assert.equal(c.minutesUntilNext("hour"), 60);
  assert.equal(c.minutesUntilNext("day"), 960);
  assert.equal(new WorldClock(1440).minutesUntilNext("day"), 1440);
  assert.equal(new WorldClock(0).minutesUntilNext("season"), 90 * MINUTES_PER_DAY);
  assert.equal(minutesUntilTime(480, 8, 0), MINUTES_PER_DAY);
  assert.equal(minutesUntilTime(480, 9, 30), 90);
});
