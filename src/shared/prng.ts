import { randomInt } from "node:crypto";

export type Prng = {
  readonly seed: number;
  nextFloat(): number; // [0,1)
  int(min: number, maxExclusive: number): number;
  pick<T>(arr: readonly T[]): T;
};

// FNV-1a, so string seeds ("match-1") work too.
function hashSeed(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

// Mulberry32
function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomSeed(): number {
  return randomInt(0, 0x1_0000_0000);
}

export function createPrng(seed: number | string = randomSeed()): Prng {
  const seed32 = typeof seed === "string" ? hashSeed(seed) : seed >>> 0;
  const next = mulberry32(seed32);

  const api: Prng = {
    seed: seed32,
    nextFloat: () => next(),
    int: (min: number, maxExclusive: number) => {
      const lo = Math.floor(min);
      const hi = Math.floor(maxExclusive);
      if (!Number.isFinite(lo) || !Number.isFinite(hi) || hi <= lo) return lo;
      return lo + Math.floor(next() * (hi - lo));
    },
    pick: <T,>(arr: readonly T[]): T => {
      if (arr.length === 0) throw new Error("pick() from empty array");
      return arr[api.int(0, arr.length)];
    },
  };

  return api;
}
