/**
 * Position Sizing Study Engine
 * ============================
 * Single entry point: validate config → Monte Carlo → metrics → selection.
 * Returns plain data; formatting and rendering belong to callers.
 */

import { DateTime } from 'luxon';
import { generateSeed } from '@sizinglab/core';
import type { SeedManager } from '@sizinglab/core';
import { LogHelpers } from '@sizinglab/utils';
import { parseSimulationConfig } from './config.js';
import type { SimulationConfig } from './config.js';
import { logger } from './logger.js';
import { calculateAllSizeMetrics } from './metrics/size-metrics.js';
import { replayTrial, runMonteCarlo } from './monte-carlo/runner.js';
import type { MonteCarloParams, TrialReplay } from './monte-carlo/runner.js';
import { selectOptimalSizes } from './selection/optimal-selector.js';
import type {
  MonteCarloProgress,
  OptimalitySelection,
  RepresentativeCurve,
  SizeMetrics,
  SizeTrials,
} from './types/index.js';

export interface StudyOptions {
  /** Attach the median-outcome equity curve of every size */
  representativeCurves?: boolean;
  /** Keep all trial results with their curves on the report */
  retainCurves?: boolean;
  batchSize?: number;
  onProgress?: (progress: MonteCarloProgress) => void;
  seedManager?: SeedManager;
}

function toISOTimestamp(timestamp: DateTime): string {
  const iso = timestamp.toISO();
  if (iso === null) {
    throw new RangeError(`Invalid timestamp: ${timestamp.invalidReason ?? 'unknown reason'}`);
  }
  return iso;
}

export type ResolvedSimulationConfig = SimulationConfig & { seed: number };

export interface PositionSizingReport {
  /** Validated config; `seed` is the one actually used */
  config: ResolvedSimulationConfig;
  /** One entry per candidate size, in candidate order */
  metrics: SizeMetrics[];
  selection: OptimalitySelection;
  representativeCurves?: RepresentativeCurve[];
  trials?: SizeTrials[];
  startedAtISO: string;
  completedAtISO: string;
  durationMs: number;
}

/**
 * Index of the median-outcome trial: position ⌊M/2⌋ after sorting by final
 * capital, ties broken by trial index
 */
export function medianTrialIndex(sizeTrials: SizeTrials): number {
  const sorted = [...sizeTrials.trials].sort(
    (a, b) => a.finalCapital - b.finalCapital || a.trialIndex - b.trialIndex
  );
  const median = sorted[Math.floor(sorted.length / 2)];
  if (!median) {
    throw new RangeError(`No trials recorded for ${sizeTrials.positionSizePct}%`);
  }
  return median.trialIndex;
}

function buildRepresentativeCurves(
  params: MonteCarloParams,
  sizeTrials: readonly SizeTrials[],
  seedManager?: SeedManager
): RepresentativeCurve[] {
  const replays = new Map<number, TrialReplay>();

  return sizeTrials.map((entry, index) => {
    const trialIndex = medianTrialIndex(entry);
    let replay = replays.get(trialIndex);
    if (!replay) {
      replay = replayTrial(params, trialIndex, seedManager);
      replays.set(trialIndex, replay);
    }
    const sizeRun = replay.runs[index];
    if (!sizeRun) {
      throw new RangeError(`Replay of trial ${trialIndex} is missing ${entry.positionSizePct}%`);
    }
    return {
      positionSizePct: entry.positionSizePct,
      trialIndex,
      equityCurve: sizeRun.run.equityCurve,
    };
  });
}

/**
 * Run a complete position sizing study
 *
 * @throws ConfigurationError before any simulation when the config is invalid
 */
export function runPositionSizingStudy(
  input: unknown,
  options: StudyOptions = {}
): PositionSizingReport {
  const parsed = parseSimulationConfig(input);
  const config: ResolvedSimulationConfig = { ...parsed, seed: parsed.seed ?? generateSeed() };
  const startedAt = DateTime.utc();

  const studyLogger = logger.child({ seed: config.seed });
  studyLogger.info('Position sizing study started', {
    winProbability: config.winProbability,
    numTrades: config.numTrades,
    numTrials: config.numTrials,
    sizes: config.positionSizesPct.length,
  });

  const params: MonteCarloParams = {
    positionSizesPct: config.positionSizesPct,
    numTrials: config.numTrials,
    numTrades: config.numTrades,
    winProbability: config.winProbability,
    initialCapital: config.initialCapital,
    riskReward: config.riskReward,
    seed: config.seed,
  };

  const sizeTrials = runMonteCarlo(params, {
    retainCurves: options.retainCurves,
    batchSize: options.batchSize,
    onProgress: options.onProgress,
    seedManager: options.seedManager,
  });

  const metrics = calculateAllSizeMetrics(sizeTrials, config.initialCapital, {
    ruinThreshold: config.ruinThreshold,
  });
  const selection = selectOptimalSizes(metrics, {
    safeDrawdownPct: config.safeDrawdownPct,
    verySafeDrawdownPct: config.verySafeDrawdownPct,
  });

  const representativeCurves = options.representativeCurves
    ? buildRepresentativeCurves(params, sizeTrials, options.seedManager)
    : undefined;

  const completedAt = DateTime.utc();
  const report: PositionSizingReport = {
    config,
    metrics,
    selection,
    startedAtISO: toISOTimestamp(startedAt),
    completedAtISO: toISOTimestamp(completedAt),
    durationMs: completedAt.diff(startedAt).as('milliseconds'),
  };
  if (representativeCurves) {
    report.representativeCurves = representativeCurves;
  }
  if (options.retainCurves) {
    report.trials = sizeTrials;
  }

  LogHelpers.performance(studyLogger, 'Position sizing study', report.durationMs, {
    bestGeometric: selection.bestGeometric,
  });

  return report;
}
