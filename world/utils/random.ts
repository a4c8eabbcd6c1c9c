// ============================================================================
// RANDOMNESS - Injected so collapse runs can be replayed
// ============================================================================

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

export const MATH_RANDOM: RandomSource = {
  next: () => Math.random(),
};

/** Linear congruential generator, same constants as Numerical Recipes */
export class SeededRandom implements RandomSource {
  private seed: number;

  constructor(seed: number) {
    this.seed = seed >>> 0;
  }

  next(): number {
    this.seed = (this.seed * 1664525 + 1013904223) % 4294967296;
    return this.seed / 4294967296;
  }
}

/** Uniform float in [min, max) */
export function randomRange(random: RandomSource, min: number, max: number): number {
  return min + random.next() * (max - min);
}

/** Uniform integer in [0, length) */
export function randomIndex(random: RandomSource, length: number): number {
  return Math.min(length - 1, Math.floor(random.next() * length));
}

export function pickRandom<T>(random: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[randomIndex(random, items.length)];
}
