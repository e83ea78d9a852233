import type { LocationId, LocationState } from "../types";

/**
 * Shortest hop path from `from` to `to` over active locations, BFS with neighbours in
 * declaration order. The result excludes `from` and ends with `to`; null when unreachable.
 */
export function findPath(
  from: LocationId,
  to: LocationId,
  getLocation: (id: LocationId) => LocationState | undefined
): LocationId[] | null {
  if (from === to) return [];
  const prev = new Map<LocationId, LocationId>();
  const seen = new Set<LocationId>([from]);
  const queue: LocationId[] = [from];

  while (queue.length) {
    const cur = queue.shift();
    if (cur === undefined) break;
    const loc = getLocation(cur);
    if (!loc) continue;
    for (const next of loc.connections) {
      if (seen.has(next)) continue;
      const n = getLocation(next);
      if (!n || !n.active) continue;
      seen.add(next);
      prev.set(next, cur);
      if (next === to) return unwind(prev, from, to);
      queue.push(next);
    }
  }
  return null;
}

function unwind(prev: Map<LocationId, LocationId>, from: LocationId, to: LocationId): LocationId[] {
  const path: LocationId[] = [];
  let cur: LocationId | undefined = to;
  while (cur !== undefined && cur !== from) {
    path.push(cur);
    cur = prev.get(cur);
  }
  return path.reverse();
}
