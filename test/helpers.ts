import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Logger } from "../src/sim/config";
import type { ContentGenerator, DescriptiveRecord, GeneratedContent, NpcRequest } from "../src/sim/generation/types";
import { ProfessionCatalog } from "../src/sim/professions";
import { World, type WorldDeps } from "../src/sim/world";

/** Returns fixed records; spawned NPCs are named after their seed. */
export class StubGenerator implements ContentGenerator {
  constructor(private readonly content: GeneratedContent) {}

  generate(): GeneratedContent {
    return structuredClone(this.content);
  }

  generateNpc(req: NpcRequest): DescriptiveRecord {
    return {
      name: `Visitor ${req.seed % 97}`,
      race: "human",
      professions: req.professions ?? [],
      skill: 5,
      temperament: 50,
      needs: { energy: 80, hunger: 10 }
    };
  }
}

export const testCatalog = new ProfessionCatalog([
  { name: "blacksmith", titles: ["Smith"], workSiteTypes: ["forge"], crafts: [{ template: "nail", name: "Nail", baseValue: 10 }] },
  { name: "tailor", titles: ["Tailor"], workSiteTypes: ["market"], crafts: [{ template: "shirt", name: "Shirt", baseValue: 5 }] },
  { name: "merchant", titles: ["Merchant"], workSiteTypes: ["market"], crafts: [] },
  { name: "guard", titles: ["Guard"], workWindow: { startHour: 20, endHour: 6 }, workSiteTypes: ["gate"], crafts: [] }
]);

export function smithyContent(smith: DescriptiveRecord = {}): GeneratedContent {
  return {
    locations: [
      { id: "forge_1", name: "The Anvil", locationType: "forge", connections: ["market_1"], hasFood: false },
      { id: "market_1", name: "Market Square", locationType: "market", connections: ["forge_1", "road_1"], hasFood: true, isMarket: true },
      { id: "road_1", name: "North Road", locationType: "road", connections: ["market_1"] },
      { id: "island", name: "Lonely Isle", locationType: "island", connections: [] }
    ],
    npcs: [
      {
        id: "smith_1",
        name: "Borin Ironfoot",
        race: "dwarf",
        professions: ["blacksmith"],
        skill: 6,
        temperament: 50,
        needs: { energy: 100, hunger: 0 },
        locationId: "forge_1",
        workSiteId: "forge_1",
        ...smith
      }
    ]
  };
}

export function makeSmithyWorld(deps: WorldDeps = {}, smith: DescriptiveRecord = {}): World {
  return World.createNew(
    { name: "Smithy", seed: 11, counts: { locations: 4, npcs: 1 } },
    { generator: new StubGenerator(smithyContent(smith)), professions: testCatalog, ...deps }
  );
}

export type RecordingLogger = Logger & { lines: { level: string; msg: string }[] };

export function recordingLogger(): RecordingLogger {
  const lines: { level: string; msg: string }[] = [];
  return {
    lines,
    info: (msg: unknown) => void lines.push({ level: "info", msg: String(msg) }),
    warn: (msg: unknown) => void lines.push({ level: "warn", msg: String(msg) }),
    error: (msg: unknown) => void lines.push({ level: "error", msg: String(msg) })
  };
}

export function tmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}
