/**
 * Metrics Calculator
 * ==================
 * Reduces the trial results of one position size into summary statistics.
 * Fractions are converted to the 0-100 scale here and nowhere else.
 */

import { ValidationError } from '@sizinglab/utils';
import type { SizeMetrics, SizeTrials, TrialResult } from '../types/index.js';
import {
  GEOMETRIC_RATIO_FLOOR,
  geometricMeanReturn,
  mean,
  median,
  populationStdDev,
} from './statistics.js';

export interface MetricsOptions {
  /** Final capital at or below this counts as bankrupt (default 0) */
  ruinThreshold?: number;
  /** Floor applied to final/initial ratios in the geometric mean */
  ratioFloor?: number;
}

function percentOf(count: number, total: number): number {
  return (count / total) * 100;
}

// Math.min(...values) exceeds the argument limit on large trial counts
function extent(values: readonly number[]): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { min, max };
}

export function calculateSizeMetrics(
  positionSizePct: number,
  trials: readonly TrialResult[],
  initialCapital: number,
  options: MetricsOptions = {}
): SizeMetrics {
  if (trials.length === 0) {
    throw new ValidationError('Cannot compute metrics without trial results', { positionSizePct });
  }
  if (!(initialCapital > 0)) {
    throw new ValidationError('initialCapital must be positive', { initialCapital });
  }

  const ruinThreshold = options.ruinThreshold ?? 0;
  const finals = trials.map((trial) => trial.finalCapital);
  const drawdowns = trials.map((trial) => trial.maxDrawdown);

  const meanFinal = mean(finals);
  const medianFinal = median(finals);
  const stdFinal = populationStdDev(finals);
  const finalRange = extent(finals);
  const geoMean = geometricMeanReturn(
    finals.map((finalCapital) => finalCapital / initialCapital),
    options.ratioFloor ?? GEOMETRIC_RATIO_FLOOR
  );

  return {
    positionSizePct,
    trialCount: trials.length,
    meanFinal,
    medianFinal,
    stdFinal,
    minFinal: finalRange.min,
    maxFinal: finalRange.max,
    geoMeanReturnPct: geoMean * 100,
    meanReturnPct: (meanFinal / initialCapital - 1) * 100,
    medianReturnPct: (medianFinal / initialCapital - 1) * 100,
    avgMaxDrawdownPct: mean(drawdowns) * 100,
    worstDrawdownPct: extent(drawdowns).max * 100,
    profitablePct: percentOf(finals.filter((v) => v > initialCapital).length, finals.length),
    bankruptPct: percentOf(finals.filter((v) => v <= ruinThreshold).length, finals.length),
    riskAdjustedScore: stdFinal > 0 ? (meanFinal - initialCapital) / stdFinal : 0,
  };
}

/**
 * Metrics for every size, in the order given
 */
export function calculateAllSizeMetrics(
  sizeTrials: readonly SizeTrials[],
  initialCapital: number,
  options: MetricsOptions = {}
): SizeMetrics[] {
  return sizeTrials.map(({ positionSizePct, trials }) =>
    calculateSizeMetrics(positionSizePct, trials, initialCapital, options)
  );
}
