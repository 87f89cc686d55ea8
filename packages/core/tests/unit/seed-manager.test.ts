import { describe, it, expect } from 'vitest';
import { SeedManager, defaultSeedManager } from '../../src/seed-manager.js';
import { seedFromString } from '../../src/determinism.js';

describe('SeedManager', () => {
  const manager = new SeedManager();

  it('derives trial seeds from base seed and trial index', () => {
    expect(manager.generateTrialSeed(42, 3)).toBe(seedFromString('42-trial-3'));
    expect(manager.generateTrialSeed(42, 3)).toBe(defaultSeedManager.generateTrialSeed(42, 3));
  });

  it('gives every trial of a run its own seed', () => {
    const seeds = new Set(Array.from({ length: 500 }, (_, i) => manager.generateTrialSeed(42, i)));
    expect(seeds.size).toBe(500);
  });

  it('trial streams are replayable in isolation', () => {
    const first = manager.createTrialRNG(7, 11);
    const again = manager.createTrialRNG(7, 11);
    const other = manager.createTrialRNG(7, 12);

    const a = [first.next(), first.next(), first.next()];
    expect([again.next(), again.next(), again.next()]).toEqual(a);
    expect([other.next(), other.next(), other.next()]).not.toEqual(a);
  });

  it('generateFromInputs joins inputs before hashing', () => {
    expect(manager.generateFromInputs('a', 1, 'b')).toBe(seedFromString('a-1-b'));
  });
});
