import type { ItemQuality, WorkWindow } from "./types";

export type CraftTemplate = {
  template: string;
  name: string;
  baseValue: number;
};

export type ProfessionDef = {
  name: string;
  titles: string[];
  // Falls back to the configured default window.
  workWindow?: WorkWindow;
  workSiteTypes: string[];
  crafts: CraftTemplate[];
};

const QUALITY_MULTIPLIER: Record<ItemQuality, number> = {
  Poor: 0.5,
  Standard: 1,
  Fine: 1.5,
  Excellent: 2.5,
  Masterwork: 4
};

export function qualityForSkill(skill: number): ItemQuality {
  if (skill >= 9) return "Masterwork";
  if (skill >= 7) return "Excellent";
  if (skill >= 5) return "Fine";
  if (skill >= 3) return "Standard";
  return "Poor";
}

export function itemValue(baseValue: number, quality: ItemQuality): number {
  return Math.max(1, Math.round(baseValue * QUALITY_MULTIPLIER[quality]));
}

/** Lookup over profession definitions. Unknown names are valid professions with no crafts. */
export class ProfessionCatalog {
  private readonly byName = new Map<string, ProfessionDef>();

  constructor(defs: readonly ProfessionDef[]) {
    for (const d of defs) this.byName.set(d.name, d);
  }

  workWindow(name: string): WorkWindow | undefined {
    return this.byName.get(name)?.workWindow;
  }

  crafts(name: string): CraftTemplate[] {
    return this.byName.get(name)?.crafts ?? [];
  }
}
