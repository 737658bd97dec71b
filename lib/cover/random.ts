import { randomUUID } from "crypto";

export type SeededRandom = {
  readonly seed: number;
  next: () => number;
  float: (min: number, max: number) => number;
  int: (min: number, max: number) => number;
  bool: (probability?: number) => boolean;
  pick: <T>(items: readonly T[]) => T;
};

export function hashToSeed(value: string): number {
  let hash = 2166136261;

  for (let index = 0; index < value.length; index += 1) {
    hash ^= value.charCodeAt(index);
    hash = Math.imul(hash, 16777619);
  }

  return hash >>> 0;
}

export function createRandomSeed(): number {
  return hashToSeed(randomUUID());
}

/**
 * mulberry32 generator. Every cover stage draws from the instance it is handed,
 * so two renders built from the same seed make the same choices in the same order.
 */
export function createSeededRandom(seed: number): SeededRandom {
  const normalizedSeed = seed >>> 0;
  let state = normalizedSeed;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let value = state;
    value = Math.imul(value ^ (value >>> 15), value | 1);
    value ^= value + Math.imul(value ^ (value >>> 7), value | 61);
    return ((value ^ (value >>> 14)) >>> 0) / 4294967296;
  };

  return {
    seed: normalizedSeed,
    next,
    float(min: number, max: number) {
      return min + (max - min) * next();
    },
    int(min: number, max: number) {
      if (max <= min) {
        return min;
      }

      return Math.floor(min + next() * (max - min + 1));
    },
    bool(probability = 0.5) {
      return next() < probability;
    },
    pick<T>(items: readonly T[]): T {
      if (items.length === 0) {
        throw new Error("Cannot pick from empty list.");
      }

      return items[Math.floor(next() * items.length)];
    }
  };
}
