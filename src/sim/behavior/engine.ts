/**
 * NPC behavior state machine.
 *
 * One call per active NPC per tick. Needs drift first, then the first matching rule
 * decides the activity:
 *   1. sleeping    (exhausted, or already asleep and not yet rested)
 *   2. eating      (hungry and food here)
 *   3. working     (in a profession's window and at the work site)
 *   4. traveling   (a travel plan is set; one hop per tick)
 *   5. socializing / idle
 *
 * The engine never touches the registry. It returns the updated NPC, the events to
 * publish (in order), and any hop the World has to apply to location rosters.
 */

import type { SimConfig } from "../config";
import { itemValue, qualityForSkill, type ProfessionCatalog } from "../professions";
import type { Rng } from "../rng";
import type { EventDraft, LocationId, LocationState, MemoryKind, NpcActivity, NpcId, NpcState, SimMinute } from "../types";
import { clamp, clampNeed, pushBounded } from "../util";
import { addMemory, lastMemoryOfKind } from "./memory";
import { computeMood, decayNeeds, roundNeeds } from "./needs";

export type BehaviorContext = {
  now: SimMinute;
  minutes: number;
  location: LocationState;
  // Other active NPCs at the same location, in roster order.
  companions: readonly NpcId[];
  config: SimConfig;
  professions: ProfessionCatalog;
  rng: Rng;
  isWorkingHours: (profession: string) => boolean;
  getLocation: (id: LocationId) => LocationState | undefined;
};

export type Hop = { npcId: string; from: LocationId; to: LocationId };

export type BehaviorOutcome = {
  npc: NpcState;
  events: EventDraft[];
  hop?: Hop;
};

const HUNGER_MEMORY_COOLDOWN = 6 * 60;

export function updateNpc(current: NpcState, ctx: BehaviorContext): BehaviorOutcome {
  const t = ctx.config.tuning;
  const prevActivity = current.activity;
  const events: EventDraft[] = [];
  let hop: Hop | undefined;
  let partner: NpcId | undefined;

  let npc: NpcState = { ...current, needs: decayNeeds(current.needs, ctx.minutes, t) };
  let activity: NpcActivity;

  const asleep = npc.activity === "sleeping" && npc.needs.energy < t.wakeThreshold;
  if (asleep || npc.needs.energy <= t.sleepThreshold) {
    // 1. sleep
    const energy = clampNeed(npc.needs.energy + t.sleepRecoveryPerMinute * ctx.minutes);
    npc = { ...npc, needs: { ...npc.needs, energy } };
    if (energy >= t.wakeThreshold) {
      activity = "idle";
      npc = remember(npc, ctx, "rested", t.restedMoodImpact, "Woke up rested");
    } else {
      activity = "sleeping";
    }
  } else if (npc.needs.hunger >= t.eatThreshold && ctx.location.hasFood) {
    // 2. eat
    npc = { ...npc, needs: { ...npc.needs, hunger: clampNeed(npc.needs.hunger - t.eatHungerReduction) } };
    npc = remember(npc, ctx, "ate", t.eatMoodImpact, `Ate at ${ctx.location.name}`);
    activity = "eating";
  } else {
    if (npc.needs.hunger >= t.eatThreshold) npc = noteHunger(npc, ctx);

    const profession = activeProfession(npc, ctx);
    if (profession !== undefined) {
      // 3. work
      npc = { ...npc, needs: { ...npc.needs, energy: clampNeed(npc.needs.energy - t.workEnergyCostPerMinute * ctx.minutes) } };
      activity = "working";
      const crafted = tryCraft(npc, profession, ctx);
      if (crafted) {
        npc = crafted.npc;
        events.push(crafted.event);
      }
    } else if (npc.travel) {
      // 4. travel
      activity = "traveling";
      const moved = stepTravel(npc, ctx);
      npc = moved.npc;
      events.push(...moved.events);
      hop = moved.hop;
      if (moved.aborted) activity = "idle";
    } else {
      // 5. socialize or idle
      const p = socialChance(npc.needs.mood, ctx.companions.length, ctx.config);
      activity = ctx.rng.chance(p) ? "socializing" : "idle";
      if (activity === "socializing") partner = ctx.companions[0];
      if (activity === "socializing" && prevActivity !== "socializing") {
        npc = remember(npc, ctx, "socialized", t.socialMoodImpact, `Chatted with ${partner ?? "someone"} at ${ctx.location.name}`);
      }
    }
  }

  npc = { ...npc, activity };
  npc = { ...npc, needs: roundNeeds({ ...npc.needs, mood: computeMood(npc, ctx.now, t) }) };

  if (activity !== prevActivity) {
    const changed: EventDraft = {
      kind: "npc.activity.changed",
      at: ctx.now,
      message: `${npc.name} is now ${activity}`,
      sourceId: npc.id,
      locationId: current.locationId ?? undefined,
      data: { from: prevActivity, to: activity }
    };
    if (partner !== undefined) changed.targetId = partner;
    events.unshift(changed);
  }

  return { npc, events, hop };
}

/** Never socializes alone. */
export function socialChance(mood: number, companions: number, cfg: SimConfig): number {
  if (companions <= 0) return 0;
  const t = cfg.tuning;
  const p = t.socialBaseChance + (mood / 100) * t.socialMoodWeight + Math.min(companions, 5) * t.socialCrowdBonus;
  return clamp(p, 0, t.socialMaxChance);
}

function activeProfession(npc: NpcState, ctx: BehaviorContext): string | undefined {
  if (npc.workSiteId === null || npc.locationId !== npc.workSiteId) return undefined;
  return npc.professions.find((p) => ctx.isWorkingHours(p));
}

function remember(
  npc: NpcState,
  ctx: BehaviorContext,
  kind: MemoryKind,
  impact: number,
  note: string
): NpcState {
  return addMemory(npc, { at: ctx.now, kind, impact, note }, ctx.config.limits.memoryEntriesPerNpc);
}

function noteHunger(npc: NpcState, ctx: BehaviorContext): NpcState {
  const last = lastMemoryOfKind(npc.memory, "went_hungry");
  if (last && ctx.now - last.at < HUNGER_MEMORY_COOLDOWN) return npc;
  return remember(npc, ctx, "went_hungry", ctx.config.tuning.hungryNoFoodMoodImpact, `Hungry with no food at ${ctx.location.name}`);
}

function tryCraft(npc: NpcState, profession: string, ctx: BehaviorContext): { npc: NpcState; event: EventDraft } | null {
  const crafts = ctx.professions.crafts(profession);
  if (!crafts.length) return null;

  const t = ctx.config.tuning;
  const p = clamp(t.craftChancePerMinute * ctx.minutes * (npc.skill / 5), 0, 1);
  if (!ctx.rng.chance(p)) return null;

  const tpl = ctx.rng.pick(crafts);
  const quality = qualityForSkill(npc.skill);
  const item = { name: tpl.name, template: tpl.template, quality, value: itemValue(tpl.baseValue, quality) };

  let next: NpcState = { ...npc, inventory: pushBounded(npc.inventory, item, ctx.config.limits.inventoryPerNpc) };
  next = remember(next, ctx, "crafted", t.craftMoodImpact, `Made a ${quality} ${tpl.name}`);

  return {
    npc: next,
    event: {
      kind: "item.crafted",
      at: ctx.now,
      message: `${npc.name} crafted a ${quality} ${tpl.name}`,
      sourceId: npc.id,
      locationId: npc.locationId ?? undefined,
      data: { profession, template: tpl.template, item: tpl.name, quality, value: item.value }
    }
  };
}

function stepTravel(
  npc: NpcState,
  ctx: BehaviorContext
): { npc: NpcState; events: EventDraft[]; hop?: Hop; aborted: boolean } {
  const plan = npc.travel;
  const from = npc.locationId;
  if (!plan || from === null) return { npc, events: [], aborted: false };

  const nextId = plan.path[0];
  const next = nextId === undefined ? undefined : ctx.getLocation(nextId);
  if (nextId === undefined || !next || !next.active) {
    const { travel: _dropped, ...rest } = npc;
    return {
      npc: rest,
      events: [
        {
          kind: "travel.aborted",
          at: ctx.now,
          message: `${npc.name} gave up travelling to ${plan.destinationId}`,
          sourceId: npc.id,
          targetId: plan.destinationId,
          locationId: from,
          data: { destinationId: plan.destinationId, blockedAt: nextId ?? null }
        }
      ],
      aborted: true
    };
  }

  const events: EventDraft[] = [
    { kind: "location.exited", at: ctx.now, message: `${npc.name} left ${ctx.location.name}`, sourceId: npc.id, locationId: from, data: { to: next.id } },
    { kind: "location.entered", at: ctx.now, message: `${npc.name} arrived at ${next.name}`, sourceId: npc.id, locationId: next.id, data: { from } }
  ];

  const remaining = plan.path.slice(1);
  let moved: NpcState = { ...npc, locationId: next.id, travel: { ...plan, path: remaining } };

  if (!remaining.length) {
    const { travel: _done, ...rest } = moved;
    moved = remember(rest, ctx, "arrived", ctx.config.tuning.arrivalMoodImpact, `Reached ${next.name}`);
    events.push({
      kind: "travel.completed",
      at: ctx.now,
      message: `${npc.name} completed a journey to ${next.name}`,
      sourceId: npc.id,
      targetId: next.id,
      locationId: next.id,
      data: { destinationId: next.id, minutes: ctx.now - plan.startedAt }
    });
  }

  return { npc: moved, events, hop: { npcId: npc.id, from, to: next.id }, aborted: false };
}
