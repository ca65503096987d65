/**
 * Seeded Random Sequence
 *
 * Deterministic pseudo-random generator (mulberry32). Each instance carries
 * its own state, so worlds generated concurrently from different seeds never
 * share a random source. Same seed, same sequence.
 *
 * @module @worldgrade/core/random/seeded-random
 */

export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /**
   * Generate next random number between 0 and 1
   */
  next(): number {
    let t = (this.state = (this.state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Generate random integer in range [min, max]
   */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /**
   * Uniform float in [min, max)
   */
  uniform(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  /**
   * True with probability p
   */
  chance(p: number): boolean {
    return this.next() < p;
  }

  /**
   * Pick random element from a non-empty array
   */
  pick<T>(array: readonly T[]): T {
    if (array.length === 0) {
      throw new RangeError('Cannot pick from an empty array');
    }
    return array[this.int(0, array.length - 1)];
  }

  /**
   * `count` distinct elements in sampled order; the source is not modified
   */
  sample<T>(array: readonly T[], count: number): T[] {
    const copy = [...array];
    const n = Math.max(0, Math.min(count, copy.length));
    // Partial Fisher-Yates from the front
    for (let i = 0; i < n; i++) {
      const j = this.int(i, copy.length - 1);
      [copy[i], copy[j]] = [copy[j], copy[i]];
    }
    return copy.slice(0, n);
  }
}

/**
 * Seed for re-sampling attempt `attempt` (attempt 0 is the caller's seed)
 */
export function deriveAttemptSeed(seed: number, attempt: number): number {
  return (seed + 10007 * attempt) >>> 0;
}
