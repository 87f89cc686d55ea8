/**
 * Seed Manager
 *
 * Derives deterministic seeds for independent random streams.
 * One stream per trial keeps trials replayable in isolation and
 * lets them run in any order or on any worker.
 */

import { SeededRNG, seedFromString } from './determinism.js';
import type { DeterministicRNG } from './determinism.js';

export class SeedManager {
  /**
   * Seed for one trial of a run
   *
   * Same base seed + same trial index → same seed
   */
  generateTrialSeed(baseSeed: number, trialIndex: number): number {
    return this.generateFromInputs(baseSeed, 'trial', trialIndex);
  }

  /**
   * Independent RNG stream for one trial of a run
   */
  createTrialRNG(baseSeed: number, trialIndex: number): DeterministicRNG {
    return new SeededRNG(this.generateTrialSeed(baseSeed, trialIndex));
  }

  /**
   * Generate a seed from multiple inputs
   *
   * Same inputs → same seed (deterministic)
   */
  generateFromInputs(...inputs: (string | number)[]): number {
    return seedFromString(inputs.map(String).join('-'));
  }
}

/**
 * Default seed manager instance
 */
export const defaultSeedManager = new SeedManager();
