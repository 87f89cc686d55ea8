/**
 * Determinism Contract
 *
 * Core types for seeded, replayable simulations.
 * Every consumer of randomness takes an explicit DeterministicRNG:
 * - Seeded (same seed → same results)
 * - Replayable (same inputs + seed → identical outputs)
 */

/**
 * Deterministic random number generator interface
 *
 * Replaces Math.random() to ensure seeded, deterministic randomness.
 */
export interface DeterministicRNG {
  /**
   * Generate next random number in [0, 1)
   */
  next(): number;

  /**
   * Seed this stream was created from (for debugging/reproducibility)
   */
  getSeed(): number;

  /**
   * Clone RNG state (the clone continues the same stream independently)
   */
  clone(): DeterministicRNG;
}

/**
 * Avalanche a 32-bit seed so that nearby seeds start far apart
 */
function mixSeed(seed: number): number {
  let z = (seed + 0x9e3779b9) | 0;
  z = Math.imul(z ^ (z >>> 16), 0x85ebca6b);
  z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35);
  return (z ^ (z >>> 16)) >>> 0;
}

/**
 * Seeded random number generator using mulberry32
 *
 * 32-bit state, fast, passes the usual statistical batteries for
 * simulation use. Output is a multiple of 2^-32, strictly below 1.
 */
export class SeededRNG implements DeterministicRNG {
  private state: number;
  private readonly seed: number;

  constructor(seed: number) {
    if (!Number.isInteger(seed)) {
      throw new RangeError(`RNG seed must be an integer, got ${seed}`);
    }
    this.seed = seed;
    this.state = mixSeed(seed);
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  getSeed(): number {
    return this.seed;
  }

  clone(): DeterministicRNG {
    const cloned = new SeededRNG(this.seed);
    cloned.state = this.state;
    return cloned;
  }
}

/**
 * Create a deterministic RNG from a seed
 *
 * If seed is not provided, generates one from the current timestamp.
 * For reproducibility, always provide an explicit seed.
 */
export function createDeterministicRNG(seed?: number): DeterministicRNG {
  return new SeededRNG(seed ?? generateSeed());
}

/**
 * Fresh seed for runs that did not ask for one; callers record it
 * so the run can be replayed.
 */
export function generateSeed(): number {
  return Date.now() % 2147483647;
}

/**
 * Generate a deterministic seed from a string
 *
 * Useful for generating seeds from run IDs, trial indices, etc.
 */
export function seedFromString(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash = hash & hash; // Convert to 32-bit integer
  }
  return Math.abs(hash);
}
