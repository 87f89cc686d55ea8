import type { SizeMetrics } from '../../src/types/index.js';

/**
 * Synthetic metrics row; unspecified fields are neutral
 */
export function createSizeMetrics(
  positionSizePct: number,
  overrides: Partial<SizeMetrics> = {}
): SizeMetrics {
  return {
    positionSizePct,
    trialCount: 100,
    meanFinal: 10000,
    medianFinal: 10000,
    stdFinal: 0,
    minFinal: 10000,
    maxFinal: 10000,
    geoMeanReturnPct: 0,
    meanReturnPct: 0,
    medianReturnPct: 0,
    avgMaxDrawdownPct: 10,
    worstDrawdownPct: 10,
    profitablePct: 0,
    bankruptPct: 0,
    riskAdjustedScore: 0,
    ...overrides,
  };
}
