import { describe, it, expect } from 'vitest';
import { SeededRNG } from '@sizinglab/core';
import type { DeterministicRNG } from '@sizinglab/core';
import { ValidationError } from '@sizinglab/utils';
import { generateTradeSequence } from '../../src/trades/trade-sequence.js';

/** RNG that replays fixed draws */
function scriptedRNG(values: number[]): DeterministicRNG {
  let index = 0;
  const rng: DeterministicRNG = {
    next: () => {
      const value = values[index % values.length] ?? 0;
      index += 1;
      return value;
    },
    getSeed: () => 0,
    clone: () => rng,
  };
  return rng;
}

describe('generateTradeSequence', () => {
  it('marks a draw below the win probability as a win', () => {
    const trades = generateTradeSequence(5, 0.57, scriptedRNG([0.1, 0.57, 0.9, 0.5699, 0.0]));

    expect(trades).toEqual([true, false, false, true, true]);
  });

  it('returns a frozen sequence of the requested length', () => {
    const trades = generateTradeSequence(250, 0.5, new SeededRNG(1));

    expect(trades).toHaveLength(250);
    expect(Object.isFrozen(trades)).toBe(true);
  });

  it('is reproducible from equal RNG state', () => {
    const rng = new SeededRNG(99);
    const cloned = rng.clone();

    expect(generateTradeSequence(100, 0.57, rng)).toEqual(generateTradeSequence(100, 0.57, cloned));
  });

  it('consumes exactly one draw per trade', () => {
    const rng = new SeededRNG(3);
    const reference = new SeededRNG(3);
    generateTradeSequence(40, 0.5, rng);
    for (let i = 0; i < 40; i++) reference.next();

    expect(rng.next()).toBe(reference.next());
  });

  it('win rate tracks the probability over many trades', () => {
    const trades = generateTradeSequence(20_000, 0.57, new SeededRNG(2024));
    const winRate = trades.filter(Boolean).length / trades.length;

    expect(winRate).toBeGreaterThan(0.55);
    expect(winRate).toBeLessThan(0.59);
  });

  it('accepts the degenerate probabilities 0 and 1', () => {
    expect(generateTradeSequence(10, 1, new SeededRNG(5)).every((t) => t)).toBe(true);
    expect(generateTradeSequence(10, 0, new SeededRNG(5)).some((t) => t)).toBe(false);
  });

  it('rejects invalid arguments', () => {
    expect(() => generateTradeSequence(0, 0.5, new SeededRNG(1))).toThrow(ValidationError);
    expect(() => generateTradeSequence(2.5, 0.5, new SeededRNG(1))).toThrow(ValidationError);
    expect(() => generateTradeSequence(10, 1.1, new SeededRNG(1))).toThrow(ValidationError);
    expect(() => generateTradeSequence(10, Number.NaN, new SeededRNG(1))).toThrow(ValidationError);
  });
});
