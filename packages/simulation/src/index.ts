/**
 * @sizinglab/simulation - Position Sizing Simulation Engine
 * =========================================================
 *
 * Finds the fixed-fractional position size with the best compounded growth
 * for a biased coin-flip trading process, purely by Monte Carlo simulation.
 *
 * ## Architecture
 *
 * - **trades/**: trade sequence generation (one sequence per trial)
 * - **portfolio/**: capital evolution of one portfolio over one sequence
 * - **monte-carlo/**: trial orchestration with per-trial seed streams
 * - **metrics/**: per-size summary statistics
 * - **selection/**: multi-criteria choice of the optimal size
 *
 * ## Quick Start
 *
 * ```typescript
 * import { runPositionSizingStudy, getStudyPreset } from '@sizinglab/simulation';
 *
 * const report = runPositionSizingStudy(getStudyPreset('optimal-finder'));
 * console.log(report.selection.bestGeometric);
 * ```
 */

export * from './types/index.js';

export {
  SimulationConfigSchema,
  capitalStaysFinite,
  parseSimulationConfig,
  toFraction,
} from './config.js';
export type { SimulationConfig, SimulationConfigInput } from './config.js';

export {
  STUDY_PRESETS,
  getStudyPreset,
  isStudyPresetName,
  positionSizeRange,
} from './presets.js';
export type { StudyPresetName } from './presets.js';

export { generateTradeSequence } from './trades/trade-sequence.js';
export { simulatePortfolio } from './portfolio/portfolio-simulator.js';
export type { PortfolioSimulationParams } from './portfolio/portfolio-simulator.js';

export {
  runMonteCarlo,
  runTrialBatch,
  mergeTrialBatches,
  replayTrial,
} from './monte-carlo/runner.js';
export type {
  MonteCarloParams,
  MonteCarloOptions,
  TrialBatch,
  TrialReplay,
} from './monte-carlo/runner.js';

export {
  GEOMETRIC_RATIO_FLOOR,
  mean,
  median,
  populationStdDev,
  geometricMeanReturn,
} from './metrics/statistics.js';
export { calculateSizeMetrics, calculateAllSizeMetrics } from './metrics/size-metrics.js';
export type { MetricsOptions } from './metrics/size-metrics.js';

export {
  selectOptimalSizes,
  argmaxSize,
  DEFAULT_SELECTION_THRESHOLDS,
} from './selection/optimal-selector.js';
export type { SelectionThresholds } from './selection/optimal-selector.js';

export { runPositionSizingStudy, medianTrialIndex } from './engine.js';
export type {
  StudyOptions,
  PositionSizingReport,
  ResolvedSimulationConfig,
} from './engine.js';
