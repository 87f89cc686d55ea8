/**
 * Order-insensitive reductions used by the metrics calculator
 */

import { ValidationError } from '@sizinglab/utils';

/** Floor for final/initial ratios before taking a logarithm */
export const GEOMETRIC_RATIO_FLOOR = 1e-4;

function assertNonEmpty(values: readonly number[], name: string): void {
  if (values.length === 0) {
    throw new ValidationError(`Cannot compute ${name} of an empty list`);
  }
}

function maxAbs(values: readonly number[]): number {
  let largest = 0;
  for (const value of values) {
    largest = Math.max(largest, Math.abs(value));
  }
  return largest;
}

export function mean(values: readonly number[]): number {
  assertNonEmpty(values, 'mean');
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  if (Number.isFinite(sum)) {
    return sum / values.length;
  }

  // Finals near Number.MAX_VALUE overflow the plain sum
  const scale = maxAbs(values);
  let scaled = 0;
  for (const value of values) {
    scaled += value / scale;
  }
  return (scaled / values.length) * scale;
}

/**
 * Median; for an even count, the mean of the two middle values
 */
export function median(values: readonly number[]): number {
  assertNonEmpty(values, 'median');
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) {
    return upper;
  }
  const lower = sorted[mid - 1] ?? upper;
  const sum = lower + upper;
  return Number.isFinite(sum) ? sum / 2 : lower / 2 + upper / 2;
}

/**
 * Population standard deviation (divides by n)
 */
export function populationStdDev(values: readonly number[]): number {
  const mu = mean(values);
  const deviations = values.map((value) => value - mu);
  let sumSquares = 0;
  for (const deviation of deviations) {
    sumSquares += deviation ** 2;
  }
  if (Number.isFinite(sumSquares)) {
    return Math.sqrt(sumSquares / values.length);
  }

  const scale = maxAbs(deviations);
  let scaled = 0;
  for (const deviation of deviations) {
    scaled += (deviation / scale) ** 2;
  }
  return Math.sqrt(scaled / values.length) * scale;
}

/**
 * Geometric mean of return ratios, minus one.
 *
 * Ratios at or below `floor` are clamped to it so a ruined trial keeps the
 * logarithm finite. `[1.5, 0.5]` gives sqrt(0.75) - 1.
 */
export function geometricMeanReturn(
  ratios: readonly number[],
  floor: number = GEOMETRIC_RATIO_FLOOR
): number {
  assertNonEmpty(ratios, 'geometric mean');
  let logSum = 0;
  for (const ratio of ratios) {
    logSum += Math.log(Math.max(ratio, floor));
  }
  return Math.exp(logSum / ratios.length) - 1;
}
