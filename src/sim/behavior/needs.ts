import type { TuningParams } from "../config";
import { clampNeed, round } from "../util";
import type { Needs, NpcState, SimMinute } from "../types";
import { weightedImpact } from "./memory";

/** Passive drift applied every tick whatever the NPC is doing. */
export function decayNeeds(needs: Needs, minutes: number, t: TuningParams): Needs {
  return {
    ...needs,
    energy: clampNeed(needs.energy - t.energyDecayPerMinute * minutes),
    hunger: clampNeed(needs.hunger + t.hungerGainPerMinute * minutes)
  };
}

export function computeMood(npc: NpcState, now: SimMinute, t: TuningParams): number {
  let mood = npc.temperament + weightedImpact(npc.memory, now, t.moodHalfLifeMinutes);
  if (npc.needs.energy < 30) mood -= t.lowEnergyMoodPenalty;
  if (npc.needs.hunger > 70) mood -= t.highHungerMoodPenalty;
  return clampNeed(mood);
}

export function roundNeeds(needs: Needs): Needs {
  return { energy: round(needs.energy), hunger: round(needs.hunger), mood: round(needs.mood) };
}
