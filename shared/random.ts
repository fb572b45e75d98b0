// ============================================
// Random Sources
// Injectable so formation rolls and enemy fire are reproducible in tests
// ============================================

export interface RandomSource {
  /** Float in [0, 1) */
  next(): number;
}

/**
 * Float in [min, max)
 */
export function randomRange(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

/**
 * True with the given probability
 */
export function randomChance(rng: RandomSource, probability: number): boolean {
  return rng.next() < probability;
}

/**
 * Deterministic xorshift32 generator.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    // xorshift has a fixed point at 0
    this.state = seed >>> 0 || 1;
  }

  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    // Divide by 2^32 so the result stays below 1
    return this.state / 0x100000000;
  }

  getState(): number {
    return this.state;
  }
}

/**
 * Source backed by Math.random, for unseeded runs.
 */
export const mathRandom: RandomSource = {
  next: () => Math.random(),
};
