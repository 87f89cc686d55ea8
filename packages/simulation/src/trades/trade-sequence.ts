/**
 * Trade Sequence Generator
 * ========================
 * Draws the win/loss outcomes every position size of a trial replays.
 */

import type { DeterministicRNG } from '@sizinglab/core';
import { ValidationError } from '@sizinglab/utils';
import type { TradeSequence } from '../types/index.js';

/**
 * Generate `numTrades` independent outcomes, each a win with probability `winProbability`.
 *
 * Consumes exactly one draw per trade, so equal RNG state yields an equal sequence.
 * Probabilities of exactly 0 and 1 are accepted (all losses / all wins).
 */
export function generateTradeSequence(
  numTrades: number,
  winProbability: number,
  rng: DeterministicRNG
): TradeSequence {
  if (!Number.isInteger(numTrades) || numTrades < 1) {
    throw new ValidationError('numTrades must be a positive integer', { numTrades });
  }
  if (!(winProbability >= 0 && winProbability <= 1)) {
    throw new ValidationError('winProbability must be within [0, 1]', { winProbability });
  }

  const outcomes: boolean[] = new Array<boolean>(numTrades);
  for (let i = 0; i < numTrades; i++) {
    outcomes[i] = rng.next() < winProbability;
  }
  return Object.freeze(outcomes);
}
