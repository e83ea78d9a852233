/**
 * Personal memory log: what happened to an NPC and how it felt about it.
 */

import { pushBounded } from "../util";
import type { MemoryEntry, MemoryKind, NpcState, SimMinute } from "../types";

export function addMemory(
  npc: NpcState,
  entry: { at: SimMinute; kind: MemoryKind; impact: number; note: string },
  maxEntries: number
): NpcState {
  return { ...npc, memory: pushBounded(npc.memory, entry, maxEntries) };
}

/** 1 for a fresh memory, 0.5 after one half-life, and so on. */
export function recencyWeight(age: number, halfLifeMinutes: number): number {
  return Math.pow(0.5, Math.max(0, age) / halfLifeMinutes);
}

/** Sum of recency-weighted impacts at time `now`. */
export function weightedImpact(memory: readonly MemoryEntry[], now: SimMinute, halfLifeMinutes: number): number {
  let total = 0;
  for (const m of memory) total += m.impact * recencyWeight(now - m.at, halfLifeMinutes);
  return total;
}

export function lastMemoryOfKind(memory: readonly MemoryEntry[], kind: MemoryKind): MemoryEntry | undefined {
  for (let i = memory.length - 1; i >= 0; i--) {
    if (memory[i].kind === kind) return memory[i];
  }
  return undefined;
}
