export function clamp(n: number, min: number, max: number): number {
  if (max < min) throw new Error("clamp max must be >= min");
  return Math.min(max, Math.max(min, n));
}

export function clampNeed(n: number): number {
  return clamp(n, 0, 100);
}

/** Round to a fixed number of decimals; keeps float noise out of saves and logs. */
export function round(n: number, decimals = 3): number {
  const f = 10 ** decimals;
  return Math.round(n * f) / f;
}

export function pushBounded<T>(list: readonly T[], item: T, max: number): T[] {
  const next = [...list, item];
  return next.length > max ? next.slice(next.length - max) : next;
}

export function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}
