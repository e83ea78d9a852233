/**
 * World: exclusive owner of the clock, the event history and every entity.
 *
 * All entity mutation goes through the methods here (spawn, remove, travel, tick).
 * Reads hand out detached copies, so callers can never edit state behind the registry's back.
 */

import { updateNpc } from "./behavior/engine";
import { findPath } from "./behavior/travel";
import { calendarAt } from "./calendar";
import { WorldClock, type AdvanceResult, type ScheduleHandle } from "./clock";
import { createConfig, type Logger, type SimConfig } from "./config";
import { CorruptDataError, InvalidArgumentError, NotFoundError, errorMessage } from "./errors";
import { EventBus } from "./eventBus";
import { locationFromRecord, npcFromRecord, validateProfessions } from "./generation/entityFactory";
import { loadContentTables } from "./generation/content";
import { TableGenerator } from "./generation/tableGenerator";
import type { ContentGenerator, GenerationCounts, GenerationTemplates } from "./generation/types";
import { makeEntityId } from "./ids";
import { ProfessionCatalog } from "./professions";
import { Rng, deriveSeed } from "./rng";
import { rollWeather } from "./weather";
import {
  isLocation,
  isNpc,
  type ClockSnapshot,
  type Entity,
  type EntityId,
  type EntityKind,
  type EventDraft,
  type LocationId,
  type LocationState,
  type NpcActivity,
  type NpcId,
  type NpcState,
  type SimEvent,
  type SimMinute,
  type TickSummary
} from "./types";

export type CreateWorldRequest = {
  name?: string;
  seed: number;
  counts: GenerationCounts;
  templates?: GenerationTemplates;
};

export type WorldDeps = {
  config?: SimConfig;
  // Receives listener failures when debug.logListenerFailures is set.
  logger?: Logger;
  generator?: ContentGenerator;
  professions?: ProfessionCatalog;
};

export type WorldCounters = {
  // Last number handed out for npc:<n> ids.
  npc: number;
  // Spawns so far; salts each spawn's generator seed.
  spawn: number;
};

/** Plain-data copy of a World. Everything a save needs except the format envelope. */
export type WorldState = {
  name: string;
  seed: number;
  clockMinutes: SimMinute;
  rngState: number;
  counters: WorldCounters;
  entities: Entity[];
  events: SimEvent[];
  nextEventSeq: number;
};

export type ListOptions = {
  kind?: EntityKind;
  includeInactive?: boolean;
};

export type WorldSummary = {
  name: string;
  seed: number;
  time: string;
  day: number;
  npcs: { total: number; active: number };
  locations: { total: number; active: number };
  activities: Record<NpcActivity, number>;
  eventsRetained: number;
  nextEventSeq: number;
};

type ResolvedDeps = {
  config: SimConfig;
  logger: Logger;
  generator: ContentGenerator;
  professions: ProfessionCatalog;
};

type WorldInit = {
  name: string;
  seed: number;
  startMinute: SimMinute;
  rngState: number;
  counters: WorldCounters;
};

const WEATHER_INTERVAL = 60;

function resolveDeps(deps: WorldDeps): ResolvedDeps {
  const config = deps.config ?? createConfig();
  const generator = deps.generator ?? new TableGenerator();
  const professions =
    deps.professions ??
    new ProfessionCatalog(generator instanceof TableGenerator ? generator.tables.professions : loadContentTables().professions);
  return { config, logger: deps.logger ?? console, generator, professions };
}

export class World {
  readonly name: string;
  readonly seed: number;
  readonly config: SimConfig;
  readonly clock: WorldClock;
  readonly events: EventBus;
  readonly professions: ProfessionCatalog;

  private readonly entities = new Map<EntityId, Entity>();
  private readonly generator: ContentGenerator;
  private rng: Rng;
  private counters: WorldCounters;
  private weatherTask: ScheduleHandle | null = null;
  private ticking = false;
  // Locations touched by clock callbacks during the current advance.
  private touched: Set<EntityId> | null = null;

  private constructor(init: WorldInit, deps: ResolvedDeps) {
    this.name = init.name;
    this.seed = init.seed;
    this.config = deps.config;
    this.generator = deps.generator;
    this.professions = deps.professions;
    this.rng = new Rng(init.rngState);
    this.counters = { ...init.counters };
    this.clock = new WorldClock(init.startMinute, {
      defaultWorkWindow: deps.config.clock.defaultWorkWindow,
      workWindowFor: (p) => deps.professions.workWindow(p)
    });
    this.events = new EventBus({
      capacity: deps.config.limits.eventHistoryCap,
      logger: deps.config.debug.logListenerFailures ? deps.logger : undefined
    });
  }

  // ---------------------------------------------------------------------------
  // Construction
  // ---------------------------------------------------------------------------

  static createNew(request: CreateWorldRequest, deps: WorldDeps = {}): World {
    if (!Number.isInteger(request.seed)) throw new InvalidArgumentError(`seed must be an integer (got ${request.seed})`);
    const resolved = resolveDeps(deps);
    const content = resolved.generator.generate({ seed: request.seed, counts: request.counts, templates: request.templates });

    const world = new World(
      {
        name: request.name ?? `World ${request.seed}`,
        seed: request.seed,
        startMinute: resolved.config.clock.startMinute,
        rngState: deriveSeed(request.seed, 0x5eed),
        counters: { npc: 0, spawn: 0 }
      },
      resolved
    );
    const at = world.clock.now;

    const locations = content.locations.map((r, i) =>
      locationFromRecord(r, { at, id: typeof r.id === "string" && r.id ? undefined : makeEntityId("loc", i + 1) })
    );
    for (const loc of locations) world.register(loc);
    for (const loc of locations) {
      // Roads to places that were never generated are dropped.
      world.entities.set(loc.id, { ...loc, connections: loc.connections.filter((c) => world.locationOrNull(c)) });
    }

    content.npcs.forEach((r, i) => {
      const npc = npcFromRecord(r, { at, id: typeof r.id === "string" && r.id ? undefined : makeEntityId("npc", i + 1) });
      const locationId = npc.locationId ?? locations[0]?.id ?? null;
      const home = locationId === null ? null : world.locationOrNull(locationId);
      if (!home) throw new InvalidArgumentError(`NPC ${npc.id} references unknown location ${String(locationId)}`);
      const workSiteId = npc.workSiteId !== null && world.locationOrNull(npc.workSiteId) ? npc.workSiteId : null;
      world.register({ ...npc, locationId: home.id, workSiteId });
      world.entities.set(home.id, { ...home, npcIds: [...home.npcIds, npc.id] });
    });
    world.counters.npc = content.npcs.length;

    for (const loc of locations) {
      const cur = world.locationOrNull(loc.id);
      if (!cur) continue;
      world.entities.set(loc.id, {
        ...cur,
        weather: rollWeather(world.rng, calendarAt(at).season, cur.biome, at),
        marketOpen: cur.isMarket && world.clock.isWorkingHours()
      });
    }

    world.armWeather();
    world.events.publish({
      kind: "world.created",
      at,
      message: `${world.name} created with ${locations.length} location(s) and ${content.npcs.length} NPC(s)`,
      data: { seed: request.seed, locations: locations.length, npcs: content.npcs.length }
    });
    return world;
  }

  /** Rebuild a World from captured state. Fails with CorruptData if references don't line up. */
  static restore(state: WorldState, deps: WorldDeps = {}): World {
    const resolved = resolveDeps(deps);
    const world = new World(
      {
        name: state.name,
        seed: state.seed,
        startMinute: state.clockMinutes,
        rngState: state.rngState,
        counters: state.counters
      },
      resolved
    );
    for (const e of state.entities) {
      if (world.entities.has(e.id)) throw new CorruptDataError(`duplicate entity id ${e.id}`, { id: e.id });
      world.entities.set(e.id, structuredClone(e));
    }
    const problems = world.integrityProblems();
    if (problems.length) throw new CorruptDataError(`Inconsistent world state: ${problems.join("; ")}`, { problems });
    world.events.restore(state.events, state.nextEventSeq);
    world.armWeather();
    return world;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  get now(): SimMinute {
    return this.clock.now;
  }

  clockSnapshot(): ClockSnapshot {
    return this.clock.snapshot();
  }

  recentEvents(n: number): SimEvent[] {
    return this.events.recent(n);
  }

  getEntity(id: EntityId): Entity {
    const e = this.entities.get(id);
    if (!e || !e.active) throw new NotFoundError(`No active entity ${id}`, { id });
    return structuredClone(e);
  }

  getNpc(id: NpcId): NpcState {
    const e = this.getEntity(id);
    if (!isNpc(e)) throw new NotFoundError(`${id} is not an NPC`, { id });
    return e;
  }

  getLocation(id: LocationId): LocationState {
    const e = this.getEntity(id);
    if (!isLocation(e)) throw new NotFoundError(`${id} is not a location`, { id });
    return e;
  }

  /** Insertion order. */
  listEntities(opts: ListOptions = {}): Entity[] {
    const out: Entity[] = [];
    for (const e of this.entities.values()) {
      if (opts.kind && e.kind !== opts.kind) continue;
      if (!opts.includeInactive && !e.active) continue;
      out.push(structuredClone(e));
    }
    return out;
  }

  npcsAt(locationId: LocationId): NpcState[] {
    const loc = this.getLocation(locationId);
    return loc.npcIds.flatMap((id) => {
      const e = this.entities.get(id);
      return e && isNpc(e) && e.active ? [structuredClone(e)] : [];
    });
  }

  summary(): WorldSummary {
    const activities: Record<NpcActivity, number> = {
      idle: 0,
      working: 0,
      eating: 0,
      sleeping: 0,
      socializing: 0,
      traveling: 0
    };
    const npcs = { total: 0, active: 0 };
    const locations = { total: 0, active: 0 };
    for (const e of this.entities.values()) {
      const bucket = e.kind === "npc" ? npcs : locations;
      bucket.total++;
      if (!e.active) continue;
      bucket.active++;
      if (isNpc(e)) activities[e.activity]++;
    }
    return {
      name: this.name,
      seed: this.seed,
      time: this.clock.formatDateTime(),
      day: this.clock.day,
      npcs,
      locations,
      activities,
      eventsRetained: this.events.size,
      nextEventSeq: this.events.nextSeq
    };
  }

  // ---------------------------------------------------------------------------
  // Commands
  // ---------------------------------------------------------------------------

  spawnNpc(locationId: LocationId, professions: string[]): NpcState {
    const home = this.locationOrNull(locationId);
    if (!home || !home.active) throw new NotFoundError(`No active location ${locationId}`, { locationId });
    validateProfessions(professions);

    const spawnNo = this.counters.spawn + 1;
    const record = this.generator.generateNpc({ seed: deriveSeed(this.seed, spawnNo), professions });
    let n = this.counters.npc;
    let id: string;
    do {
      id = makeEntityId("npc", ++n);
    } while (this.entities.has(id));

    const npc = npcFromRecord(record, { at: this.now, id, locationId, workSiteId: locationId, professions });
    this.counters = { npc: n, spawn: spawnNo };
    this.register(npc);
    this.entities.set(home.id, { ...home, npcIds: [...home.npcIds, id] });

    this.events.publish({
      kind: "npc.spawned",
      at: this.now,
      message: `${npc.name} appeared at ${home.name}`,
      sourceId: id,
      locationId,
      data: { professions: [...npc.professions], race: npc.race }
    });
    return structuredClone(npc);
  }

  /** Soft delete. Returns false (and publishes nothing) when the entity is already inactive. */
  removeEntity(id: EntityId): boolean {
    const e = this.entities.get(id);
    if (!e) throw new NotFoundError(`Unknown entity ${id}`, { id });
    if (!e.active) return false;

    if (isNpc(e)) {
      const { travel: _cancelled, ...rest } = e;
      this.entities.set(id, { ...rest, active: false, activity: "idle" });
      const loc = e.locationId === null ? null : this.locationOrNull(e.locationId);
      if (loc) this.entities.set(loc.id, { ...loc, npcIds: loc.npcIds.filter((x) => x !== id) });
    } else {
      // NPCs still pointing here are caught by the next integrity check.
      this.entities.set(id, { ...e, active: false, marketOpen: false });
    }

    this.events.publish({
      kind: "entity.removed",
      at: this.now,
      message: `${e.name} was removed`,
      sourceId: id,
      locationId: isNpc(e) ? e.locationId ?? undefined : id,
      data: { entityKind: e.kind }
    });
    return true;
  }

  /** Plans the shortest route and stores it on the NPC; the hops happen on later ticks. */
  requestTravel(npcId: NpcId, destinationId: LocationId): LocationId[] {
    const npc = this.entities.get(npcId);
    if (!npc || !isNpc(npc) || !npc.active) throw new NotFoundError(`No active NPC ${npcId}`, { npcId });
    const dest = this.locationOrNull(destinationId);
    if (!dest || !dest.active) throw new NotFoundError(`No active location ${destinationId}`, { destinationId });
    if (npc.locationId === null) throw new CorruptDataError(`NPC ${npcId} has no location`);
    if (npc.locationId === destinationId) {
      throw new InvalidArgumentError(`${npc.name} is already at ${dest.name}`, { npcId, destinationId });
    }

    const path = findPath(npc.locationId, destinationId, (id) => this.locationOrNull(id) ?? undefined);
    if (!path) throw new InvalidArgumentError(`No route from ${npc.locationId} to ${destinationId}`, { npcId, destinationId });

    this.entities.set(npcId, { ...npc, travel: { destinationId, path, startedAt: this.now } });
    this.events.publish({
      kind: "travel.started",
      at: this.now,
      message: `${npc.name} set out for ${dest.name}`,
      sourceId: npcId,
      targetId: destinationId,
      locationId: npc.locationId,
      data: { destinationId, path: [...path], hops: path.length }
    });
    return [...path];
  }

  /**
   * One simulation step. Integrity is checked before anything moves; per-entity
   * failures become sim.error events and the rest of the pass carries on. A reference
   * broken during the pass (a listener removing an occupied location) halts the tick.
   */
  tick(minutes: number): TickSummary {
    if (!Number.isInteger(minutes) || minutes <= 0) {
      throw new InvalidArgumentError(`tick minutes must be a positive integer (got ${String(minutes)})`, { minutes });
    }
    if (this.ticking) throw new InvalidArgumentError("tick called from inside a tick");

    const problems = this.integrityProblems();
    if (problems.length) throw new CorruptDataError(`Referential integrity violated: ${problems.join("; ")}`, { problems });

    this.ticking = true;
    const firstSeq = this.events.nextSeq;
    const changed = new Set<EntityId>();
    const from = this.now;
    try {
      this.touched = changed;
      const adv = this.clock.advance(minutes);
      this.touched = null;
      for (const f of adv.failures) {
        this.reportError(`Scheduled task ${f.label} failed: ${errorMessage(f.error)}`, { task: f.label, firedAt: f.at });
      }
      this.publishBoundaries(adv);

      for (const id of [...this.entities.keys()]) {
        const e = this.entities.get(id);
        if (!e || !e.active) continue;
        try {
          if (isNpc(e)) this.updateNpc(e, minutes, changed);
          else this.updateLocation(e, changed);
        } catch (err) {
          if (err instanceof CorruptDataError) throw err;
          this.reportError(`Update of ${id} failed: ${errorMessage(err)}`, { entityId: id }, id);
        }
      }
    } finally {
      this.touched = null;
      this.ticking = false;
    }

    const events = this.events.since(firstSeq - 1);
    return {
      fromMinute: from,
      toMinute: this.now,
      deltaMinutes: minutes,
      changedEntityIds: [...changed],
      eventsEmitted: this.events.nextSeq - firstSeq,
      events,
      errors: events.filter((e) => e.kind === "sim.error").length
    };
  }

  // ---------------------------------------------------------------------------
  // State capture
  // ---------------------------------------------------------------------------

  captureState(): WorldState {
    return {
      name: this.name,
      seed: this.seed,
      clockMinutes: this.now,
      rngState: this.rng.state,
      counters: { ...this.counters },
      entities: [...this.entities.values()].map((e) => structuredClone(e)),
      events: this.events.recent(this.config.limits.snapshotEventTail),
      nextEventSeq: this.events.nextSeq
    };
  }

  /** Every broken NPC <-> location reference, empty when consistent. */
  integrityProblems(): string[] {
    const problems: string[] = [];
    for (const e of this.entities.values()) {
      if (!e.active) continue;
      if (isNpc(e)) {
        const loc = e.locationId === null ? null : this.locationOrNull(e.locationId);
        if (!loc) problems.push(`${e.id} is at unknown location ${String(e.locationId)}`);
        else if (!loc.active) problems.push(`${e.id} is at removed location ${loc.id}`);
        else if (!loc.npcIds.includes(e.id)) problems.push(`${e.id} missing from roster of ${loc.id}`);
      } else {
        for (const id of e.npcIds) {
          const n = this.entities.get(id);
          if (!n || !isNpc(n) || !n.active) problems.push(`${e.id} lists inactive or unknown NPC ${id}`);
          else if (n.locationId !== e.id) problems.push(`${e.id} lists ${id}, who is at ${String(n.locationId)}`);
        }
      }
    }
    return problems;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private register(e: Entity): void {
    if (this.entities.has(e.id)) throw new InvalidArgumentError(`duplicate entity id ${e.id}`, { id: e.id });
    this.entities.set(e.id, e);
  }

  private locationOrNull(id: LocationId): LocationState | null {
    const e = this.entities.get(id);
    return e && isLocation(e) ? e : null;
  }

  private updateNpc(npc: NpcState, minutes: number, changed: Set<EntityId>): void {
    const loc = npc.locationId === null ? null : this.locationOrNull(npc.locationId);
    if (!loc || !loc.active) throw new CorruptDataError(`${npc.id} is at unresolvable location ${String(npc.locationId)}`);

    const companions = loc.npcIds.filter((id) => id !== npc.id && this.entities.get(id)?.active);
    const out = updateNpc(npc, {
      now: this.now,
      minutes,
      location: loc,
      companions,
      config: this.config,
      professions: this.professions,
      rng: this.rng,
      isWorkingHours: (p) => this.clock.isWorkingHours(p),
      getLocation: (id) => this.locationOrNull(id) ?? undefined
    });

    this.entities.set(npc.id, out.npc);
    changed.add(npc.id);
    if (out.hop) {
      const { from, to } = out.hop;
      const a = this.locationOrNull(from);
      const b = this.locationOrNull(to);
      if (a) this.entities.set(from, { ...a, npcIds: a.npcIds.filter((x) => x !== npc.id) });
      if (b) this.entities.set(to, { ...b, npcIds: [...b.npcIds, npc.id] });
      changed.add(from);
      changed.add(to);
    }
    for (const ev of out.events) this.events.publish(ev);
  }

  private updateLocation(loc: LocationState, changed: Set<EntityId>): void {
    if (!loc.isMarket) return;
    const open = this.clock.isWorkingHours();
    if (open === loc.marketOpen) return;
    this.entities.set(loc.id, { ...loc, marketOpen: open });
    changed.add(loc.id);
    this.events.publish({
      kind: open ? "market.opened" : "market.closed",
      at: this.now,
      message: `${loc.name} ${open ? "opens for trade" : "closes for the day"}`,
      sourceId: loc.id,
      locationId: loc.id
    });
  }

  private armWeather(): void {
    if (this.weatherTask !== null) this.clock.cancel(this.weatherTask);
    this.weatherTask = this.clock.schedule(this.clock.minutesUntilNext("hour"), (at) => this.rollAllWeather(at), {
      every: WEATHER_INTERVAL,
      label: "weather"
    });
  }

  private rollAllWeather(at: SimMinute): void {
    const season = calendarAt(at).season;
    for (const e of [...this.entities.values()]) {
      if (!isLocation(e) || !e.active) continue;
      const next = rollWeather(this.rng, season, e.biome, at);
      const prev = e.weather;
      if (prev && prev.condition === next.condition) {
        this.entities.set(e.id, { ...e, weather: { ...next, since: prev.since } });
        continue;
      }
      this.entities.set(e.id, { ...e, weather: next });
      this.touched?.add(e.id);
      this.events.publish({
        kind: "weather.changed",
        at,
        message: `Weather at ${e.name}: ${next.condition}, ${next.temperatureC}°C`,
        sourceId: e.id,
        locationId: e.id,
        data: { from: prev?.condition ?? null, to: next.condition, temperatureC: next.temperatureC }
      });
    }
  }

  private publishBoundaries(adv: AdvanceResult): void {
    const c = this.clock.snapshot();
    if (adv.crossedDays > 0) {
      this.events.publish({
        kind: "clock.day.started",
        at: this.now,
        message: `Day ${c.dayOfMonth} of month ${c.month}, year ${c.year}`,
        data: { day: c.day, dayOfMonth: c.dayOfMonth, month: c.month, crossed: adv.crossedDays }
      });
    }
    if (adv.crossedSeasons > 0) {
      this.events.publish({
        kind: "clock.season.changed",
        at: this.now,
        message: `The season turns to ${c.season}`,
        data: { season: c.season, crossed: adv.crossedSeasons }
      });
    }
    if (adv.crossedYears > 0) {
      this.events.publish({
        kind: "clock.year.started",
        at: this.now,
        message: `Year ${c.year} begins`,
        data: { year: c.year, crossed: adv.crossedYears }
      });
    }
  }

  private reportError(message: string, data: Record<string, unknown>, sourceId?: EntityId): void {
    const draft: EventDraft = { kind: "sim.error", at: this.now, message, data };
    if (sourceId !== undefined) draft.sourceId = sourceId;
    this.events.publish(draft);
  }
}
