import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '@sizinglab/utils';
import { medianTrialIndex, runPositionSizingStudy } from '../../src/engine.js';

const config = {
  winProbability: 0.55,
  numTrades: 50,
  numTrials: 40,
  initialCapital: 1000,
  positionSizesPct: [2, 5, 10],
  seed: 7,
};

describe('runPositionSizingStudy', () => {
  it('validates the config before simulating', () => {
    const onProgress = vi.fn();

    expect(() => runPositionSizingStudy({ ...config, winProbability: 0 }, { onProgress })).toThrow(
      ConfigurationError
    );
    expect(onProgress).not.toHaveBeenCalled();
  });

  it('rejects a study whose capital could overflow before simulating', () => {
    const onProgress = vi.fn();
    const study = {
      winProbability: 0.99,
      numTrades: 5000,
      numTrials: 5,
      initialCapital: 10000,
      positionSizesPct: [10, 50],
      seed: 3,
    };

    expect(() => runPositionSizingStudy(study, { onProgress })).toThrow(
      'Invalid simulation config: numTrades'
    );
    expect(onProgress).not.toHaveBeenCalled();
  });

  it('records the seed it used', () => {
    expect(runPositionSizingStudy(config).config.seed).toBe(7);

    const { seed, ...unseeded } = config;
    const report = runPositionSizingStudy(unseeded);
    expect(seed).toBe(7);
    expect(Number.isInteger(report.config.seed)).toBe(true);
  });

  it('stamps start and completion times', () => {
    const report = runPositionSizingStudy(config);

    expect(Date.parse(report.completedAtISO)).toBeGreaterThanOrEqual(Date.parse(report.startedAtISO));
    expect(report.durationMs).toBeGreaterThanOrEqual(0);
    expect(report.startedAtISO).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    expect(report.completedAtISO).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('is reproducible for a fixed seed', () => {
    const a = runPositionSizingStudy(config);
    const b = runPositionSizingStudy(config, { batchSize: 3 });

    expect(b.metrics).toEqual(a.metrics);
    expect(b.selection).toEqual(a.selection);
  });

  it('reports metrics in candidate order with a consistent selection', () => {
    const report = runPositionSizingStudy({ ...config, positionSizesPct: [10, 2, 5] });

    expect(report.metrics.map((m) => m.positionSizePct)).toEqual([10, 2, 5]);
    expect(report.metrics.every((m) => m.trialCount === 40)).toBe(true);

    const bestGeo = Math.max(...report.metrics.map((m) => m.geoMeanReturnPct));
    const chosen = report.metrics.find((m) => m.positionSizePct === report.selection.bestGeometric);
    expect(chosen?.geoMeanReturnPct).toBe(bestGeo);
  });

  it('omits curves unless requested', () => {
    const report = runPositionSizingStudy(config);

    expect(report.representativeCurves).toBeUndefined();
    expect(report.trials).toBeUndefined();
  });

  it('attaches the median-outcome curve of every size', () => {
    const report = runPositionSizingStudy(config, { representativeCurves: true, retainCurves: true });
    const curves = report.representativeCurves ?? [];
    const trials = report.trials ?? [];

    expect(curves.map((c) => c.positionSizePct)).toEqual([2, 5, 10]);
    curves.forEach((curve, index) => {
      const sizeTrials = trials[index];
      expect(sizeTrials).toBeDefined();
      if (!sizeTrials) return;

      const trialIndex = medianTrialIndex(sizeTrials);
      expect(curve.trialIndex).toBe(trialIndex);
      expect(curve.equityCurve).toHaveLength(config.numTrades + 1);
      expect(curve.equityCurve[0]).toBe(1000);
      expect(curve.equityCurve).toEqual(sizeTrials.trials[trialIndex]?.equityCurve);
    });
  });
});

describe('medianTrialIndex', () => {
  it('takes position floor(M/2) with ties broken by trial index', () => {
    const trials = [30, 10, 20, 10].map((finalCapital, trialIndex) => ({
      trialIndex,
      finalCapital,
      maxDrawdown: 0,
    }));

    expect(medianTrialIndex({ positionSizePct: 5, trials })).toBe(2);
    expect(medianTrialIndex({ positionSizePct: 5, trials: trials.slice(0, 3) })).toBe(2);
  });

  it('rejects a size without trials', () => {
    expect(() => medianTrialIndex({ positionSizePct: 5, trials: [] })).toThrow(RangeError);
  });
});
