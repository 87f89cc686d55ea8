import { ValidationError, NotFoundError } from '@sizinglab/utils';
import type { SimulationConfigInput } from './config.js';

/**
 * Candidate sizes from `start` to `end` inclusive (percent).
 *
 * Values are computed from integer step counts and rounded to 10 decimals so
 * 1.5 stays 1.5 rather than 1.4999999999999998.
 */
export function positionSizeRange(start: number, end: number, step: number): number[] {
  if (!(step > 0) || !Number.isFinite(step)) {
    throw new ValidationError('Range step must be a positive number', { step });
  }
  if (!(start > 0) || end < start) {
    throw new ValidationError('Range must satisfy 0 < start <= end', { start, end });
  }

  const count = Math.floor((end - start) / step + 1e-9) + 1;
  const sizes: number[] = [];
  for (let i = 0; i < count; i++) {
    sizes.push(Number((start + i * step).toFixed(10)));
  }
  return sizes;
}

const BASE_SCENARIO = {
  winProbability: 0.57,
  numTrades: 500,
  initialCapital: 10000,
  riskReward: 1,
  seed: 42,
} as const;

export const STUDY_PRESETS = {
  /** Fine grid for locating the growth-optimal size */
  'optimal-finder': {
    ...BASE_SCENARIO,
    numTrials: 500,
    positionSizesPct: positionSizeRange(1, 40, 0.5),
  },
  /** A handful of common sizes compared side by side */
  'pnl-comparison': {
    ...BASE_SCENARIO,
    numTrials: 100,
    positionSizesPct: [1, 3, 5, 10, 15, 20, 35],
  },
} satisfies Record<string, SimulationConfigInput>;

export type StudyPresetName = keyof typeof STUDY_PRESETS;

export function isStudyPresetName(name: string): name is StudyPresetName {
  return Object.prototype.hasOwnProperty.call(STUDY_PRESETS, name);
}

export function getStudyPreset(name: string): SimulationConfigInput {
  if (!isStudyPresetName(name)) {
    throw new NotFoundError('Study preset', name, { available: Object.keys(STUDY_PRESETS) });
  }
  const preset = STUDY_PRESETS[name];
  return { ...preset, positionSizesPct: [...preset.positionSizesPct] };
}
