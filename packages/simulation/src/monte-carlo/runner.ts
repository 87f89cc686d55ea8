/**
 * Monte Carlo Runner
 * ==================
 * Runs M trials. Each trial draws one trade sequence and replays it at every
 * candidate size, so all sizes of a trial see identical outcomes.
 *
 * Trial i draws from its own RNG stream derived from (seed, i). Trials can
 * therefore be evaluated in any order, in any batch split, or replayed alone,
 * and produce the same numbers.
 */

import { defaultSeedManager } from '@sizinglab/core';
import type { SeedManager } from '@sizinglab/core';
import { ValidationError } from '@sizinglab/utils';
import { toFraction } from '../config.js';
import { logger } from '../logger.js';
import { simulatePortfolio } from '../portfolio/portfolio-simulator.js';
import { generateTradeSequence } from '../trades/trade-sequence.js';
import type {
  MonteCarloProgress,
  PortfolioRun,
  SizeTrials,
  TradeSequence,
  TrialResult,
} from '../types/index.js';

export interface MonteCarloParams {
  positionSizesPct: readonly number[];
  numTrials: number;
  numTrades: number;
  winProbability: number;
  initialCapital: number;
  riskReward: number;
  /** Base seed every trial stream is derived from */
  seed: number;
}

export interface MonteCarloOptions {
  /** Keep every equity curve on the trial results (O(sizes × M × N) memory) */
  retainCurves?: boolean;
  /** Trials per batch; progress is reported after each batch */
  batchSize?: number;
  onProgress?: (progress: MonteCarloProgress) => void;
  seedManager?: SeedManager;
}

/**
 * Results of a contiguous range of trials, accumulated locally
 */
export interface TrialBatch {
  startTrial: number;
  endTrial: number;
  sizes: SizeTrials[];
}

export interface TrialReplay {
  trialIndex: number;
  trades: TradeSequence;
  runs: Array<{ positionSizePct: number; run: PortfolioRun }>;
}

const DEFAULT_BATCH_SIZE = 100;

function drawTrialSequence(
  params: MonteCarloParams,
  trialIndex: number,
  seedManager: SeedManager
): TradeSequence {
  const rng = seedManager.createTrialRNG(params.seed, trialIndex);
  return generateTradeSequence(params.numTrades, params.winProbability, rng);
}

/**
 * Evaluate trials [startTrial, endTrial) into batch-local accumulators
 */
export function runTrialBatch(
  params: MonteCarloParams,
  startTrial: number,
  endTrial: number,
  options: Pick<MonteCarloOptions, 'retainCurves' | 'seedManager'> = {}
): TrialBatch {
  if (!Number.isInteger(startTrial) || !Number.isInteger(endTrial) || startTrial < 0 || endTrial < startTrial) {
    throw new ValidationError('Invalid trial range', { startTrial, endTrial });
  }

  const seedManager = options.seedManager ?? defaultSeedManager;
  const retainCurves = options.retainCurves ?? false;
  const sizes: SizeTrials[] = params.positionSizesPct.map((positionSizePct) => ({
    positionSizePct,
    trials: [],
  }));

  for (let trialIndex = startTrial; trialIndex < endTrial; trialIndex++) {
    const trades = drawTrialSequence(params, trialIndex, seedManager);

    for (const accumulator of sizes) {
      const run = simulatePortfolio({
        positionSize: toFraction(accumulator.positionSizePct),
        trades,
        initialCapital: params.initialCapital,
        riskReward: params.riskReward,
      });
      const result: TrialResult = {
        trialIndex,
        finalCapital: run.finalCapital,
        maxDrawdown: run.maxDrawdown,
      };
      if (retainCurves) {
        result.equityCurve = run.equityCurve;
      }
      accumulator.trials.push(result);
    }
  }

  return { startTrial, endTrial, sizes };
}

/**
 * Merge batches into one trial list per size, in trial-index order.
 *
 * Batches may arrive in any order but must tile [0, M) exactly.
 */
export function mergeTrialBatches(
  positionSizesPct: readonly number[],
  batches: readonly TrialBatch[]
): SizeTrials[] {
  const ordered = [...batches].sort((a, b) => a.startTrial - b.startTrial);
  const merged: SizeTrials[] = positionSizesPct.map((positionSizePct) => ({
    positionSizePct,
    trials: [],
  }));

  let expectedStart = 0;
  for (const batch of ordered) {
    if (batch.startTrial !== expectedStart) {
      throw new ValidationError('Trial batches must cover a contiguous range from trial 0', {
        expectedStart,
        startTrial: batch.startTrial,
      });
    }
    if (batch.sizes.length !== merged.length) {
      throw new ValidationError('Trial batch does not match the candidate sizes', {
        expected: merged.length,
        actual: batch.sizes.length,
      });
    }

    batch.sizes.forEach((sizeTrials, index) => {
      const target = merged[index];
      if (!target || target.positionSizePct !== sizeTrials.positionSizePct) {
        throw new ValidationError('Trial batch size order differs from candidate order', {
          index,
          positionSizePct: sizeTrials.positionSizePct,
        });
      }
      target.trials.push(...sizeTrials.trials);
    });
    expectedStart = batch.endTrial;
  }

  return merged;
}

/**
 * Run all trials for all candidate sizes
 */
export function runMonteCarlo(params: MonteCarloParams, options: MonteCarloOptions = {}): SizeTrials[] {
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ValidationError('batchSize must be a positive integer', { batchSize });
  }

  const batches: TrialBatch[] = [];
  for (let start = 0; start < params.numTrials; start += batchSize) {
    const end = Math.min(start + batchSize, params.numTrials);
    batches.push(runTrialBatch(params, start, end, options));

    const progress: MonteCarloProgress = { completedTrials: end, totalTrials: params.numTrials };
    logger.debug('Monte Carlo progress', { ...progress, seed: params.seed });
    options.onProgress?.(progress);
  }

  return mergeTrialBatches(params.positionSizesPct, batches);
}

/**
 * Regenerate one trial and replay it at every candidate size, keeping curves
 */
export function replayTrial(
  params: MonteCarloParams,
  trialIndex: number,
  seedManager: SeedManager = defaultSeedManager
): TrialReplay {
  if (!Number.isInteger(trialIndex) || trialIndex < 0 || trialIndex >= params.numTrials) {
    throw new ValidationError('trialIndex is outside the run', {
      trialIndex,
      numTrials: params.numTrials,
    });
  }

  const trades = drawTrialSequence(params, trialIndex, seedManager);
  const runs = params.positionSizesPct.map((positionSizePct) => ({
    positionSizePct,
    run: simulatePortfolio({
      positionSize: toFraction(positionSizePct),
      trades,
      initialCapital: params.initialCapital,
      riskReward: params.riskReward,
    }),
  }));

  return { trialIndex, trades, runs };
}
