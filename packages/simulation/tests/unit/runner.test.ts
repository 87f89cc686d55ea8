import { describe, it, expect, vi } from 'vitest';
import { SeedManager } from '@sizinglab/core';
import type { DeterministicRNG } from '@sizinglab/core';
import { ValidationError } from '@sizinglab/utils';
import {
  mergeTrialBatches,
  replayTrial,
  runMonteCarlo,
  runTrialBatch,
} from '../../src/monte-carlo/runner.js';
import type { MonteCarloParams } from '../../src/monte-carlo/runner.js';

const params: MonteCarloParams = {
  positionSizesPct: [2, 10, 25],
  numTrials: 23,
  numTrades: 40,
  winProbability: 0.55,
  initialCapital: 1000,
  riskReward: 1.5,
  seed: 1234,
};

class RecordingSeedManager extends SeedManager {
  readonly trialIndices: number[] = [];

  override createTrialRNG(baseSeed: number, trialIndex: number): DeterministicRNG {
    this.trialIndices.push(trialIndex);
    return super.createTrialRNG(baseSeed, trialIndex);
  }
}

describe('runMonteCarlo', () => {
  it('returns one entry per size with M trials in index order', () => {
    const result = runMonteCarlo(params);

    expect(result.map((s) => s.positionSizePct)).toEqual([2, 10, 25]);
    for (const size of result) {
      expect(size.trials.map((t) => t.trialIndex)).toEqual(
        Array.from({ length: params.numTrials }, (_, i) => i)
      );
      expect(size.trials.every((t) => t.equityCurve === undefined)).toBe(true);
    }
  });

  it('gives identical results for any batch size', () => {
    const whole = runMonteCarlo(params, { batchSize: 100 });

    expect(runMonteCarlo(params, { batchSize: 1 })).toEqual(whole);
    expect(runMonteCarlo(params, { batchSize: 7 })).toEqual(whole);
  });

  it('is reproducible for a seed and differs for another', () => {
    const a = runMonteCarlo(params);
    const b = runMonteCarlo(params);
    const c = runMonteCarlo({ ...params, seed: 1235 });

    expect(b).toEqual(a);
    expect(c).not.toEqual(a);
  });

  it('draws one sequence per trial, shared by every size', () => {
    const seedManager = new RecordingSeedManager();
    runMonteCarlo(params, { seedManager, batchSize: 5 });

    expect(seedManager.trialIndices).toEqual(Array.from({ length: params.numTrials }, (_, i) => i));
  });

  it('feeds every size the same outcomes', () => {
    const [small, large] = runMonteCarlo({ ...params, positionSizesPct: [2, 10] }, { retainCurves: true });
    expect(small).toBeDefined();
    expect(large).toBeDefined();

    const direction = (curve: readonly number[] | undefined): boolean[] => {
      const values = curve ?? [];
      return values.slice(1).map((value, k) => value > (values[k] ?? 0));
    };

    small?.trials.forEach((trial, i) => {
      expect(trial.equityCurve).toHaveLength(params.numTrades + 1);
      expect(direction(trial.equityCurve)).toEqual(direction(large?.trials[i]?.equityCurve));
    });
  });

  it('reports progress after each batch', () => {
    const onProgress = vi.fn();
    runMonteCarlo(params, { batchSize: 10, onProgress });

    expect(onProgress.mock.calls.map(([progress]) => progress)).toEqual([
      { completedTrials: 10, totalTrials: 23 },
      { completedTrials: 20, totalTrials: 23 },
      { completedTrials: 23, totalTrials: 23 },
    ]);
  });

  it('rejects a non-positive batch size', () => {
    expect(() => runMonteCarlo(params, { batchSize: 0 })).toThrow(ValidationError);
  });
});

describe('mergeTrialBatches', () => {
  it('merges batches supplied out of order', () => {
    const first = runTrialBatch(params, 0, 9);
    const second = runTrialBatch(params, 9, 15);
    const third = runTrialBatch(params, 15, 23);

    expect(mergeTrialBatches(params.positionSizesPct, [third, first, second])).toEqual(
      runMonteCarlo(params)
    );
  });

  it('rejects gaps between batches', () => {
    const first = runTrialBatch(params, 0, 5);
    const third = runTrialBatch(params, 10, 15);

    expect(() => mergeTrialBatches(params.positionSizesPct, [first, third])).toThrow(ValidationError);
  });

  it('rejects batches computed for other sizes', () => {
    const batch = runTrialBatch({ ...params, positionSizesPct: [2, 10, 30] }, 0, 5);

    expect(() => mergeTrialBatches(params.positionSizesPct, [batch])).toThrow(ValidationError);
  });
});

describe('runTrialBatch', () => {
  it('rejects inverted ranges', () => {
    expect(() => runTrialBatch(params, 5, 2)).toThrow(ValidationError);
  });
});

describe('replayTrial', () => {
  it('reproduces the recorded trial for every size', () => {
    const recorded = runMonteCarlo(params, { retainCurves: true });
    const replay = replayTrial(params, 17);

    expect(replay.trades).toHaveLength(params.numTrades);
    replay.runs.forEach((entry, index) => {
      const trial = recorded[index]?.trials[17];
      expect(entry.positionSizePct).toBe(params.positionSizesPct[index]);
      expect(entry.run.finalCapital).toBe(trial?.finalCapital);
      expect(entry.run.maxDrawdown).toBe(trial?.maxDrawdown);
      expect(entry.run.equityCurve).toEqual(trial?.equityCurve);
    });
  });

  it('rejects indices outside the run', () => {
    expect(() => replayTrial(params, 23)).toThrow(ValidationError);
    expect(() => replayTrial(params, -1)).toThrow(ValidationError);
  });
});
