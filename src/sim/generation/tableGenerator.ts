import { InvalidArgumentError } from "../errors";
import type { ProfessionDef } from "../professions";
import { Rng } from "../rng";
import { loadContentTables, type ContentTables, type LocationTypeDef, type RaceDef } from "./content";
import type {
  ContentGenerator,
  DescriptiveRecord,
  GeneratedContent,
  GenerationRequest,
  NpcRequest
} from "./types";

const EXTRA_ROAD_CHANCE = 0.25;

/**
 * Reference generator over the JSON tables in data/content.
 * Every call seeds its own Rng, so identical requests give identical records.
 */
export class TableGenerator implements ContentGenerator {
  readonly tables: ContentTables;

  constructor(tables: ContentTables = loadContentTables()) {
    this.tables = tables;
  }

  generate(request: GenerationRequest): GeneratedContent {
    const { locations: nLoc, npcs: nNpc } = request.counts;
    for (const [k, v] of Object.entries(request.counts)) {
      if (!Number.isInteger(v) || v < 0) throw new InvalidArgumentError(`counts.${k} must be a non-negative integer`);
    }
    if (nNpc > 0 && nLoc === 0) throw new InvalidArgumentError("NPCs need at least one location");

    const rng = new Rng(request.seed);
    const types = filterByName(this.tables.locations, (t) => t.type, request.templates?.locationTypes);
    const races = filterByName(this.tables.races, (r) => r.name, request.templates?.races);
    const profs = filterByName(this.tables.professions, (p) => p.name, request.templates?.professions);

    const locations = this.makeLocations(rng, nLoc, types);
    const npcs: DescriptiveRecord[] = [];
    for (let i = 0; i < nNpc; i++) {
      const race = rng.pick(races);
      const prof = pickStaffedProfession(rng, profs, locations);
      const sites = locations.filter((l) => prof.workSiteTypes.includes(String(l.locationType)));
      const workSite = sites.length ? rng.pick(sites) : null;
      const here = workSite ?? rng.pick(locations);
      npcs.push({
        ...this.composeNpc(rng, race, [prof]),
        id: `npc:${i + 1}`,
        locationId: here.id,
        workSiteId: workSite ? workSite.id : null
      });
    }
    return { locations, npcs };
  }

  generateNpc(request: NpcRequest): DescriptiveRecord {
    const rng = new Rng(request.seed);
    const race = (request.race && this.tables.races.find((r) => r.name === request.race)) || rng.pick(this.tables.races);
    const profs = request.professions
      ? request.professions.flatMap((name) => this.tables.professions.filter((p) => p.name === name))
      : [rng.pick(this.tables.professions)];
    const record = this.composeNpc(rng, race, profs);
    // Names the tables don't know still count as professions.
    if (request.professions) record.professions = [...request.professions];
    return record;
  }

  private makeLocations(rng: Rng, count: number, types: LocationTypeDef[]): DescriptiveRecord[] {
    // Cover every type once (shuffled) before repeating any.
    const order = [...types];
    for (let i = order.length - 1; i > 0; i--) {
      const j = rng.int(0, i);
      [order[i], order[j]] = [order[j], order[i]];
    }

    const usedNames = new Set<string>();
    const roads = new Map<string, string[]>();
    const out: DescriptiveRecord[] = [];

    for (let i = 0; i < count; i++) {
      const type = i < order.length ? order[i] : rng.pick(types);
      const id = `loc:${i + 1}`;
      roads.set(id, []);
      out.push({
        id,
        name: uniqueName(rng, type.names, usedNames),
        locationType: type.type,
        biome: rng.pick(type.biomes),
        description: rng.pick(type.descriptions),
        environmentTags: rng.sample(type.tags, 2),
        hasFood: type.hasFood,
        isMarket: type.isMarket
      });
    }

    const link = (a: string, b: string) => {
      const ra = roads.get(a);
      const rb = roads.get(b);
      if (!ra || !rb || a === b || ra.includes(b)) return;
      ra.push(b);
      rb.push(a);
    };
    for (let i = 1; i < count; i++) link(`loc:${i}`, `loc:${i + 1}`);
    for (let i = 1; i <= count && count > 2; i++) {
      if (rng.chance(EXTRA_ROAD_CHANCE)) link(`loc:${i}`, `loc:${rng.int(1, count)}`);
    }

    return out.map((l) => ({ ...l, connections: roads.get(String(l.id)) ?? [] }));
  }

  private composeNpc(rng: Rng, race: RaceDef, profs: ProfessionDef[]): DescriptiveRecord {
    const name = `${rng.pick(race.firstNames)} ${rng.pick(race.lastNames)}`;
    const main = profs[0];
    const title = main ? rng.pick(main.titles) : "Commoner";
    const trait = rng.pick(this.tables.attributes.traits);
    const habit = rng.pick(this.tables.attributes.habits);
    const look = rng.pick(race.looks);
    return {
      name,
      race: race.name,
      title,
      professions: profs.map((p) => p.name),
      skill: rng.int(1, 10),
      description: `A ${trait} ${race.name} ${title.toLowerCase()} with ${look} who ${habit}.`,
      temperament: rng.int(race.temperament[0], race.temperament[1]),
      needs: { energy: rng.int(60, 100), hunger: rng.int(0, 40) },
      gold: rng.int(0, 50)
    };
  }
}

function filterByName<T>(rows: T[], nameOf: (row: T) => string, wanted?: string[]): T[] {
  if (!wanted || !wanted.length) return rows;
  const kept = rows.filter((r) => wanted.includes(nameOf(r)));
  return kept.length ? kept : rows;
}

// Prefer professions that have a work site among the generated locations.
function pickStaffedProfession(rng: Rng, profs: ProfessionDef[], locations: DescriptiveRecord[]): ProfessionDef {
  const types = new Set(locations.map((l) => String(l.locationType)));
  const staffed = profs.filter((p) => p.workSiteTypes.some((t) => types.has(t)));
  return rng.pick(staffed.length ? staffed : profs);
}

function uniqueName(rng: Rng, names: string[], used: Set<string>): string {
  const free = names.filter((n) => !used.has(n));
  let name = free.length ? rng.pick(free) : rng.pick(names);
  for (let n = 2; used.has(name); n++) name = `${name.replace(/ #\d+$/, "")} #${n}`;
  used.add(name);
  return name;
}
