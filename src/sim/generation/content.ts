import fs from "node:fs";
import path from "node:path";
import { CorruptDataError, errorMessage } from "../errors";
import type { CraftTemplate, ProfessionDef } from "../professions";
import type { WorkWindow } from "../types";
import { isRecord } from "../util";

export type RaceDef = {
  name: string;
  temperament: [number, number];
  firstNames: string[];
  lastNames: string[];
  looks: string[];
};

export type LocationTypeDef = {
  type: string;
  names: string[];
  biomes: string[];
  tags: string[];
  hasFood: boolean;
  isMarket: boolean;
  descriptions: string[];
};

export type AttributeTables = {
  traits: string[];
  habits: string[];
};

export type ContentTables = {
  races: RaceDef[];
  professions: ProfessionDef[];
  locations: LocationTypeDef[];
  attributes: AttributeTables;
};

export function defaultContentDir(): string {
  // src/sim/generation -> <root>/data/content (same depth under dist/)
  return path.resolve(__dirname, "..", "..", "..", "data", "content");
}

export function loadContentTables(dir = defaultContentDir()): ContentTables {
  return {
    races: readTable(dir, "races.json", parseRace),
    professions: readTable(dir, "professions.json", parseProfession),
    locations: readTable(dir, "locations.json", parseLocationType),
    attributes: parseAttributes(readJson(path.join(dir, "attributes.json")), "attributes.json")
  };
}

function readJson(file: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (err) {
    throw new CorruptDataError(`Cannot read content table ${file}: ${errorMessage(err)}`, { file });
  }
}

function readTable<T>(dir: string, name: string, parse: (row: unknown, where: string) => T): T[] {
  const raw = readJson(path.join(dir, name));
  if (!Array.isArray(raw) || raw.length === 0) throw new CorruptDataError(`${name} must be a non-empty array`);
  return raw.map((row, i) => parse(row, `${name}[${i}]`));
}

// ---------------------------------------------------------------------------
// Row parsers
// ---------------------------------------------------------------------------

function fail(where: string, what: string): never {
  throw new CorruptDataError(`${where}: ${what}`, { where });
}

function obj(x: unknown, where: string): Record<string, unknown> {
  if (!isRecord(x)) fail(where, "expected an object");
  return x;
}

function str(o: Record<string, unknown>, key: string, where: string): string {
  const v = o[key];
  if (typeof v !== "string" || !v) fail(where, `${key} must be a non-empty string`);
  return v;
}

function num(o: Record<string, unknown>, key: string, where: string): number {
  const v = o[key];
  if (typeof v !== "number" || !Number.isFinite(v)) fail(where, `${key} must be a number`);
  return v;
}

function bool(o: Record<string, unknown>, key: string, where: string): boolean {
  const v = o[key];
  if (typeof v !== "boolean") fail(where, `${key} must be a boolean`);
  return v;
}

function strList(o: Record<string, unknown>, key: string, where: string, allowEmpty = false): string[] {
  const v = o[key];
  if (!Array.isArray(v) || (!allowEmpty && v.length === 0)) fail(where, `${key} must be a ${allowEmpty ? "" : "non-empty "}array`);
  return v.map((s, i) => {
    if (typeof s !== "string") fail(where, `${key}[${i}] must be a string`);
    return s;
  });
}

function parseRace(row: unknown, where: string): RaceDef {
  const o = obj(row, where);
  const t = o.temperament;
  const lo: unknown = Array.isArray(t) ? t[0] : undefined;
  const hi: unknown = Array.isArray(t) ? t[1] : undefined;
  if (!Array.isArray(t) || t.length !== 2 || typeof lo !== "number" || typeof hi !== "number" || lo > hi) {
    fail(where, "temperament must be [min, max]");
  }
  return {
    name: str(o, "name", where),
    temperament: [lo, hi],
    firstNames: strList(o, "firstNames", where),
    lastNames: strList(o, "lastNames", where),
    looks: strList(o, "looks", where)
  };
}

function parseWindow(x: unknown, where: string): WorkWindow {
  const o = obj(x, `${where}.workWindow`);
  return { startHour: num(o, "startHour", where), endHour: num(o, "endHour", where) };
}

function parseCraft(x: unknown, where: string): CraftTemplate {
  const o = obj(x, where);
  return { template: str(o, "template", where), name: str(o, "name", where), baseValue: num(o, "baseValue", where) };
}

function parseProfession(row: unknown, where: string): ProfessionDef {
  const o = obj(row, where);
  const crafts = o.crafts;
  if (!Array.isArray(crafts)) fail(where, "crafts must be an array");
  const def: ProfessionDef = {
    name: str(o, "name", where),
    titles: strList(o, "titles", where),
    workSiteTypes: strList(o, "workSiteTypes", where),
    crafts: crafts.map((c, i) => parseCraft(c, `${where}.crafts[${i}]`))
  };
  if (o.workWindow !== undefined) def.workWindow = parseWindow(o.workWindow, where);
  return def;
}

function parseLocationType(row: unknown, where: string): LocationTypeDef {
  const o = obj(row, where);
  return {
    type: str(o, "type", where),
    names: strList(o, "names", where),
    biomes: strList(o, "biomes", where),
    tags: strList(o, "tags", where, true),
    hasFood: bool(o, "hasFood", where),
    isMarket: bool(o, "isMarket", where),
    descriptions: strList(o, "descriptions", where)
  };
}

function parseAttributes(raw: unknown, where: string): AttributeTables {
  const o = obj(raw, where);
  return { traits: strList(o, "traits", where), habits: strList(o, "habits", where) };
}
