/**
 * Optimal Selector
 * ================
 * Names the best position size under several criteria.
 *
 * Ties on a criterion go to the smallest position size, independent of the
 * order metrics are supplied in.
 */

import { ValidationError } from '@sizinglab/utils';
import type { OptimalitySelection, SizeMetrics } from '../types/index.js';

export interface SelectionThresholds {
  /** Sizes with avg max drawdown strictly below this qualify for safe growth */
  safeDrawdownPct: number;
  /** Stricter cap for the very-safe criterion */
  verySafeDrawdownPct: number;
}

export const DEFAULT_SELECTION_THRESHOLDS: SelectionThresholds = {
  safeDrawdownPct: 30,
  verySafeDrawdownPct: 20,
};

type MetricKey = {
  [K in keyof SizeMetrics]: SizeMetrics[K] extends number ? K : never;
}[keyof SizeMetrics];

/**
 * Size maximizing `key`, smallest size on ties; null for an empty list
 */
export function argmaxSize(metrics: readonly SizeMetrics[], key: MetricKey): number | null {
  let best: SizeMetrics | null = null;
  for (const candidate of metrics) {
    if (
      best === null ||
      candidate[key] > best[key] ||
      (candidate[key] === best[key] && candidate.positionSizePct < best.positionSizePct)
    ) {
      best = candidate;
    }
  }
  return best === null ? null : best.positionSizePct;
}

function requireSize(metrics: readonly SizeMetrics[], key: MetricKey): number {
  const size = argmaxSize(metrics, key);
  if (size === null) {
    throw new ValidationError('Cannot select a position size from empty metrics', { key });
  }
  return size;
}

export function selectOptimalSizes(
  metrics: readonly SizeMetrics[],
  thresholds: SelectionThresholds = DEFAULT_SELECTION_THRESHOLDS
): OptimalitySelection {
  const safe = metrics.filter((m) => m.avgMaxDrawdownPct < thresholds.safeDrawdownPct);
  const verySafe = metrics.filter((m) => m.avgMaxDrawdownPct < thresholds.verySafeDrawdownPct);

  return {
    bestGeometric: requireSize(metrics, 'geoMeanReturnPct'),
    bestMedian: requireSize(metrics, 'medianFinal'),
    bestMean: requireSize(metrics, 'meanFinal'),
    bestRiskAdjusted: requireSize(metrics, 'riskAdjustedScore'),
    bestSafeGrowth: argmaxSize(safe, 'geoMeanReturnPct'),
    bestVerySafe: argmaxSize(verySafe, 'geoMeanReturnPct'),
  };
}
