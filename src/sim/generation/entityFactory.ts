/**
 * EntityFactory: descriptive record -> living entity.
 *
 * Pure and deterministic. Malformed records fail with InvalidArgument; optional fields
 * fall back to fixed defaults (never random), so the same record always yields the
 * same entity.
 */

import { InvalidArgumentError } from "../errors";
import type { EntityId, LocationId, LocationState, Needs, NpcState, SimMinute } from "../types";
import { clamp, clampNeed, isRecord } from "../util";
import type { DescriptiveRecord, JsonValue } from "./types";

export type FactoryContext = {
  at: SimMinute;
  // Overrides the record's own id.
  id?: EntityId;
  locationId?: LocationId | null;
  workSiteId?: LocationId | null;
  professions?: string[];
};

const DEFAULT_NEEDS: Needs = { energy: 80, hunger: 20, mood: 50 };

export function npcFromRecord(record: DescriptiveRecord, ctx: FactoryContext): NpcState {
  const id = ctx.id ?? optString(record, "id");
  if (!id) throw new InvalidArgumentError("NPC record has no id", { record: summarize(record) });
  const where = `npc ${id}`;

  const temperament = clampNeed(optNumber(record, "temperament", where) ?? DEFAULT_NEEDS.mood);
  const needsRaw = record.needs;
  const needs: Needs = {
    energy: clampNeed(needField(needsRaw, "energy", where) ?? DEFAULT_NEEDS.energy),
    hunger: clampNeed(needField(needsRaw, "hunger", where) ?? DEFAULT_NEEDS.hunger),
    mood: clampNeed(needField(needsRaw, "mood", where) ?? temperament)
  };

  const professions = ctx.professions ?? optStringList(record, "professions", where) ?? [];
  validateProfessions(professions);

  return {
    id,
    kind: "npc",
    name: requireString(record, "name", where),
    active: true,
    createdAt: ctx.at,
    race: optString(record, "race") ?? "human",
    title: optString(record, "title") ?? "Commoner",
    professions: [...professions],
    skill: clamp(Math.round(optNumber(record, "skill", where) ?? 5), 1, 10),
    description: optString(record, "description") ?? "",
    needs,
    temperament,
    activity: "idle",
    locationId: ctx.locationId !== undefined ? ctx.locationId : optString(record, "locationId") ?? null,
    workSiteId: ctx.workSiteId !== undefined ? ctx.workSiteId : optString(record, "workSiteId") ?? null,
    memory: [],
    inventory: [],
    gold: Math.max(0, Math.floor(optNumber(record, "gold", where) ?? 0))
  };
}

export function locationFromRecord(record: DescriptiveRecord, ctx: FactoryContext): LocationState {
  const id = ctx.id ?? optString(record, "id");
  if (!id) throw new InvalidArgumentError("Location record has no id", { record: summarize(record) });
  const where = `location ${id}`;
  const isMarket = optBoolean(record, "isMarket", where) ?? false;

  return {
    id,
    kind: "location",
    name: requireString(record, "name", where),
    active: true,
    createdAt: ctx.at,
    locationType: optString(record, "locationType") ?? "wilds",
    biome: optString(record, "biome") ?? "plains",
    description: optString(record, "description") ?? "",
    environmentTags: optStringList(record, "environmentTags", where) ?? [],
    connections: dedupe(optStringList(record, "connections", where) ?? []).filter((c) => c !== id),
    npcIds: [],
    weather: null,
    hasFood: optBoolean(record, "hasFood", where) ?? false,
    isMarket,
    marketOpen: false
  };
}

/** Professions must be non-empty strings without duplicates. */
export function validateProfessions(professions: unknown): asserts professions is string[] {
  if (!Array.isArray(professions)) throw new InvalidArgumentError("professions must be an array of names");
  const seen = new Set<string>();
  for (const p of professions) {
    if (typeof p !== "string" || !p.trim()) {
      throw new InvalidArgumentError(`invalid profession name ${JSON.stringify(p)}`, { professions });
    }
    if (seen.has(p)) throw new InvalidArgumentError(`duplicate profession ${p}`, { professions });
    seen.add(p);
  }
}

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

function requireString(r: DescriptiveRecord, key: string, where: string): string {
  const v = optString(r, key);
  if (!v) throw new InvalidArgumentError(`${where}: ${key} must be a non-empty string`);
  return v;
}

function optString(r: DescriptiveRecord, key: string): string | undefined {
  const v = r[key];
  return typeof v === "string" && v ? v : undefined;
}

function optNumber(r: DescriptiveRecord, key: string, where: string): number | undefined {
  const v = r[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number" || !Number.isFinite(v)) throw new InvalidArgumentError(`${where}: ${key} must be a number`);
  return v;
}

function optBoolean(r: DescriptiveRecord, key: string, where: string): boolean | undefined {
  const v = r[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "boolean") throw new InvalidArgumentError(`${where}: ${key} must be a boolean`);
  return v;
}

function optStringList(r: DescriptiveRecord, key: string, where: string): string[] | undefined {
  const v = r[key];
  if (v === undefined || v === null) return undefined;
  if (!Array.isArray(v)) throw new InvalidArgumentError(`${where}: ${key} must be an array`);
  return v.map((x, i) => {
    if (typeof x !== "string") throw new InvalidArgumentError(`${where}: ${key}[${i}] must be a string`);
    return x;
  });
}

function needField(raw: JsonValue | undefined, key: string, where: string): number | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (!isRecord(raw) || Array.isArray(raw)) throw new InvalidArgumentError(`${where}: needs must be an object`);
  const v = raw[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number" || !Number.isFinite(v)) throw new InvalidArgumentError(`${where}: needs.${key} must be a number`);
  return v;
}

function dedupe(list: string[]): string[] {
  return [...new Set(list)];
}

function summarize(r: DescriptiveRecord): string {
  return JSON.stringify(r).slice(0, 120);
}
