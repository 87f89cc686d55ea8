/**
 * @sizinglab/core - deterministic randomness shared by every simulation package
 */

export {
  SeededRNG,
  createDeterministicRNG,
  generateSeed,
  seedFromString,
} from './determinism.js';
export type { DeterministicRNG } from './determinism.js';
export { SeedManager, defaultSeedManager } from './seed-manager.js';
