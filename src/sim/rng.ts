/**
 * Deterministic PRNG for reproducible simulations.
 * Mulberry32: small, fast, stable. The whole state is one uint32, so it can be saved and restored.
 */
export class Rng {
  private s: number;

  constructor(seed: number) {
    // force to uint32
    this.s = seed >>> 0;
  }

  get state(): number {
    return this.s;
  }

  next(): number {
    // mulberry32
    let t = (this.s = (this.s + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  int(minInclusive: number, maxInclusive: number): number {
    if (!Number.isFinite(minInclusive) || !Number.isFinite(maxInclusive)) {
      throw new Error("Rng.int bounds must be finite numbers");
    }
    if (maxInclusive < minInclusive) {
      throw new Error("Rng.int maxInclusive must be >= minInclusive");
    }
    const span = maxInclusive - minInclusive + 1;
    return minInclusive + Math.floor(this.next() * span);
  }

  chance(p: number): boolean {
    if (!Number.isFinite(p)) throw new Error("Rng.chance p must be finite");
    if (p <= 0) return false;
    if (p >= 1) return true;
    return this.next() < p;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) throw new Error("Rng.pick needs a non-empty list");
    return items[this.int(0, items.length - 1)];
  }

  /** Choose up to `count` distinct items, keeping their original order. */
  sample<T>(items: readonly T[], count: number): T[] {
    const idx = items.map((_, i) => i);
    const n = Math.max(0, Math.min(count, idx.length));
    for (let i = 0; i < n; i++) {
      const j = this.int(i, idx.length - 1);
      const tmp = idx[i];
      idx[i] = idx[j];
      idx[j] = tmp;
    }
    return idx
      .slice(0, n)
      .sort((a, b) => a - b)
      .map((i) => items[i]);
  }

  weighted<T>(entries: ReadonlyArray<{ value: T; weight: number }>): T {
    const total = entries.reduce((a, e) => a + Math.max(0, e.weight), 0);
    if (!(total > 0)) throw new Error("Rng.weighted needs a positive total weight");
    let r = this.next() * total;
    for (const e of entries) {
      r -= Math.max(0, e.weight);
      if (r < 0) return e.value;
    }
    return entries[entries.length - 1].value;
  }
}

/** Mix a base seed with a counter so derived streams don't overlap. */
export function deriveSeed(base: number, salt: number): number {
  let h = (base ^ Math.imul(salt + 1, 0x9e3779b1)) >>> 0;
  h = Math.imul(h ^ (h >>> 16), 0x85ebca6b) >>> 0;
  h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35) >>> 0;
  return (h ^ (h >>> 16)) >>> 0;
}
