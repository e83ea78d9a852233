/**
 * Shape checks for decoded snapshots. Everything read from disk passes through here
 * before it is allowed near a World.
 */

import { calendarAt } from "./calendar";
import { CorruptDataError, VersionMismatchError } from "./errors";
import type {
  Entity,
  EventKind,
  InventoryItem,
  ItemQuality,
  LocationState,
  MemoryEntry,
  MemoryKind,
  NpcActivity,
  NpcState,
  SimEvent,
  TravelPlan,
  Weather,
  WeatherCondition
} from "./types";
import { isRecord } from "./util";
import type { WorldCounters } from "./world";

export const SNAPSHOT_VERSION = 1;
export const SUPPORTED_SNAPSHOT_VERSIONS: readonly number[] = [SNAPSHOT_VERSION];

export type Snapshot = {
  version: number;
  name: string;
  seed: number;
  clock: {
    totalMinutes: number;
    year: number;
    month: number;
    dayOfMonth: number;
    hour: number;
    minute: number;
    season: string;
  };
  rngState: number;
  counters: WorldCounters;
  entities: Entity[];
  eventTail: SimEvent[];
  nextEventSeq: number;
};

const ACTIVITIES: readonly NpcActivity[] = ["idle", "working", "eating", "sleeping", "socializing", "traveling"];
const MEMORY_KINDS: readonly MemoryKind[] = ["ate", "socialized", "crafted", "rested", "arrived", "went_hungry"];
const QUALITIES: readonly ItemQuality[] = ["Poor", "Standard", "Fine", "Excellent", "Masterwork"];
const CONDITIONS: readonly WeatherCondition[] = ["clear", "cloudy", "rain", "storm", "fog", "snow", "heatwave"];
const EVENT_KINDS: readonly string[] = [
  "world.created",
  "npc.spawned",
  "entity.removed",
  "npc.activity.changed",
  "item.crafted",
  "travel.started",
  "travel.completed",
  "travel.aborted",
  "location.exited",
  "location.entered",
  "market.opened",
  "market.closed",
  "weather.changed",
  "clock.day.started",
  "clock.season.changed",
  "clock.year.started",
  "sim.error"
];

/** Reads typed fields off an untrusted object, failing with CorruptData at the first bad one. */
class Fields {
  constructor(
    private readonly o: Record<string, unknown>,
    private readonly where: string
  ) {}

  static of(x: unknown, where: string): Fields {
    if (!isRecord(x)) throw corrupt(where, "expected an object");
    return new Fields(x, where);
  }

  raw(key: string): unknown {
    return this.o[key];
  }

  has(key: string): boolean {
    return this.o[key] !== undefined;
  }

  str(key: string): string {
    const v = this.o[key];
    if (typeof v !== "string") throw corrupt(this.where, `${key} must be a string`);
    return v;
  }

  strOrNull(key: string): string | null {
    const v = this.o[key];
    if (v === null) return null;
    if (typeof v !== "string") throw corrupt(this.where, `${key} must be a string or null`);
    return v;
  }

  num(key: string, min = -Infinity, max = Infinity): number {
    const v = this.o[key];
    if (typeof v !== "number" || !Number.isFinite(v) || v < min || v > max) {
      throw corrupt(this.where, `${key} must be a number in [${min}, ${max}]`);
    }
    return v;
  }

  int(key: string, min = -Infinity): number {
    const v = this.num(key, min);
    if (!Number.isInteger(v)) throw corrupt(this.where, `${key} must be an integer`);
    return v;
  }

  bool(key: string): boolean {
    const v = this.o[key];
    if (typeof v !== "boolean") throw corrupt(this.where, `${key} must be a boolean`);
    return v;
  }

  strList(key: string): string[] {
    return this.list(key).map((x, i) => {
      if (typeof x !== "string") throw corrupt(this.where, `${key}[${i}] must be a string`);
      return x;
    });
  }

  list(key: string): unknown[] {
    const v = this.o[key];
    if (!Array.isArray(v)) throw corrupt(this.where, `${key} must be an array`);
    return v;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[]): T {
    const v = this.o[key];
    const hit = allowed.find((a) => a === v);
    if (hit === undefined) throw corrupt(this.where, `${key} must be one of ${allowed.join(", ")}`);
    return hit;
  }

  sub(key: string): Fields {
    return Fields.of(this.o[key], `${this.where}.${key}`);
  }
}

function corrupt(where: string, what: string): CorruptDataError {
  return new CorruptDataError(`Corrupt snapshot at ${where}: ${what}`, { where });
}

/** Version is checked first, so a newer save reports VersionMismatch rather than a shape error. */
export function parseSnapshot(raw: unknown): Snapshot {
  const f = Fields.of(raw, "snapshot");
  const version = f.raw("version");
  if (typeof version !== "number" || !SUPPORTED_SNAPSHOT_VERSIONS.includes(version)) {
    throw new VersionMismatchError(version, SUPPORTED_SNAPSHOT_VERSIONS);
  }

  const c = f.sub("clock");
  const totalMinutes = c.int("totalMinutes", 0);
  const cal = calendarAt(totalMinutes);
  const clock = {
    totalMinutes,
    year: c.int("year", 1),
    month: c.int("month", 1),
    dayOfMonth: c.int("dayOfMonth", 1),
    hour: c.int("hour", 0),
    minute: c.int("minute", 0),
    season: c.str("season")
  };
  if (
    clock.year !== cal.year ||
    clock.month !== cal.month ||
    clock.dayOfMonth !== cal.dayOfMonth ||
    clock.hour !== cal.hour ||
    clock.minute !== cal.minute ||
    clock.season !== cal.season
  ) {
    throw corrupt("snapshot.clock", "calendar fields disagree with totalMinutes");
  }

  const counters = f.sub("counters");
  const entities = f.list("entities").map((e, i) => parseEntity(e, `entities[${i}]`));
  const eventTail = f.list("eventTail").map((e, i) => parseEvent(e, `eventTail[${i}]`));
  for (let i = 1; i < eventTail.length; i++) {
    if (eventTail[i].seq <= eventTail[i - 1].seq) throw corrupt(`eventTail[${i}]`, "seq must be strictly increasing");
  }
  const nextEventSeq = f.int("nextEventSeq", 1);
  const lastSeq = eventTail.length ? eventTail[eventTail.length - 1].seq : 0;
  if (nextEventSeq <= lastSeq) throw corrupt("snapshot", "nextEventSeq must follow the last event");

  return {
    version,
    name: f.str("name"),
    seed: f.int("seed"),
    clock,
    rngState: f.int("rngState", 0),
    counters: { npc: counters.int("npc", 0), spawn: counters.int("spawn", 0) },
    entities,
    eventTail,
    nextEventSeq
  };
}

export function parseEntity(raw: unknown, where: string): Entity {
  const f = Fields.of(raw, where);
  const kind = f.oneOf("kind", ["npc", "location"] as const);
  return kind === "npc" ? parseNpc(f, where) : parseLocation(f);
}

function parseNpc(f: Fields, where: string): NpcState {
  const needs = f.sub("needs");
  const npc: NpcState = {
    id: f.str("id"),
    kind: "npc",
    name: f.str("name"),
    active: f.bool("active"),
    createdAt: f.int("createdAt", 0),
    race: f.str("race"),
    title: f.str("title"),
    professions: f.strList("professions"),
    skill: f.num("skill", 1, 10),
    description: f.str("description"),
    needs: { energy: needs.num("energy", 0, 100), hunger: needs.num("hunger", 0, 100), mood: needs.num("mood", 0, 100) },
    temperament: f.num("temperament", 0, 100),
    activity: f.oneOf("activity", ACTIVITIES),
    locationId: f.strOrNull("locationId"),
    workSiteId: f.strOrNull("workSiteId"),
    memory: f.list("memory").map((m, i) => parseMemory(m, `${where}.memory[${i}]`)),
    inventory: f.list("inventory").map((m, i) => parseItem(m, `${where}.inventory[${i}]`)),
    gold: f.num("gold", 0)
  };
  if (f.has("travel")) npc.travel = parseTravel(f.sub("travel"));
  return npc;
}

function parseTravel(f: Fields): TravelPlan {
  return { destinationId: f.str("destinationId"), path: f.strList("path"), startedAt: f.int("startedAt", 0) };
}

function parseMemory(raw: unknown, where: string): MemoryEntry {
  const f = Fields.of(raw, where);
  return { at: f.int("at", 0), kind: f.oneOf("kind", MEMORY_KINDS), impact: f.num("impact"), note: f.str("note") };
}

function parseItem(raw: unknown, where: string): InventoryItem {
  const f = Fields.of(raw, where);
  return {
    name: f.str("name"),
    template: f.str("template"),
    quality: f.raw("quality") === null ? null : f.oneOf("quality", QUALITIES),
    value: f.num("value", 0)
  };
}

function parseLocation(f: Fields): LocationState {
  return {
    id: f.str("id"),
    kind: "location",
    name: f.str("name"),
    active: f.bool("active"),
    createdAt: f.int("createdAt", 0),
    locationType: f.str("locationType"),
    biome: f.str("biome"),
    description: f.str("description"),
    environmentTags: f.strList("environmentTags"),
    connections: f.strList("connections"),
    npcIds: f.strList("npcIds"),
    weather: f.raw("weather") === null ? null : parseWeather(f.sub("weather")),
    hasFood: f.bool("hasFood"),
    isMarket: f.bool("isMarket"),
    marketOpen: f.bool("marketOpen")
  };
}

function parseWeather(f: Fields): Weather {
  return { condition: f.oneOf("condition", CONDITIONS), temperatureC: f.num("temperatureC"), since: f.int("since", 0) };
}

function isEventKind(s: string): s is EventKind {
  return EVENT_KINDS.includes(s) || (s.startsWith("custom.") && s.length > "custom.".length);
}

export function parseEvent(raw: unknown, where: string): SimEvent {
  const f = Fields.of(raw, where);
  const kind = f.str("kind");
  if (!isEventKind(kind)) throw corrupt(where, `unknown event kind ${kind}`);
  const event: SimEvent = { seq: f.int("seq", 1), id: f.str("id"), kind, at: f.int("at", 0), message: f.str("message") };
  if (f.has("sourceId")) event.sourceId = f.str("sourceId");
  if (f.has("targetId")) event.targetId = f.str("targetId");
  if (f.has("locationId")) event.locationId = f.str("locationId");
  if (f.has("data")) {
    const data = f.raw("data");
    if (!isRecord(data)) throw corrupt(where, "data must be an object");
    event.data = data;
  }
  return event;
}
