/**
 * Simulation Types
 * ================
 * Data model shared by the generator, simulator, runner, metrics and selector.
 */

/**
 * One trade: `true` for a win, `false` for a loss
 */
export type TradeOutcome = boolean;

/**
 * Ordered outcomes of one trial. Shared by every position size of the trial,
 * never mutated after generation.
 */
export type TradeSequence = readonly TradeOutcome[];

/**
 * Capital after each trade, starting with the initial capital (length N + 1)
 */
export type EquityCurve = readonly number[];

/**
 * Result of replaying one trade sequence at one position size
 */
export interface PortfolioRun {
  equityCurve: EquityCurve;
  finalCapital: number;
  /** Largest peak-to-trough decline, as a fraction in [0, 1] */
  maxDrawdown: number;
}

/**
 * Outcome of one (trial, size) pair
 */
export interface TrialResult {
  trialIndex: number;
  finalCapital: number;
  /** Fraction in [0, 1] */
  maxDrawdown: number;
  /** Present only when the caller asked for curves to be retained */
  equityCurve?: EquityCurve;
}

/**
 * All trial results of one candidate size, in trial-index order
 */
export interface SizeTrials {
  /** Percent of current capital risked per trade, e.g. 2.5 */
  positionSizePct: number;
  trials: TrialResult[];
}

/**
 * Aggregate statistics for one position size.
 * Every *Pct field is on a 0-100 scale.
 */
export interface SizeMetrics {
  positionSizePct: number;
  trialCount: number;
  meanFinal: number;
  medianFinal: number;
  stdFinal: number;
  minFinal: number;
  maxFinal: number;
  /** Compounded growth implied by the log-space mean of final/initial ratios */
  geoMeanReturnPct: number;
  meanReturnPct: number;
  medianReturnPct: number;
  avgMaxDrawdownPct: number;
  worstDrawdownPct: number;
  profitablePct: number;
  bankruptPct: number;
  /** (meanFinal - initialCapital) / stdFinal, 0 when stdFinal is 0 */
  riskAdjustedScore: number;
}

/**
 * Chosen position size (percent) per criterion. `null` means no size was eligible.
 */
export interface OptimalitySelection {
  bestGeometric: number;
  bestMedian: number;
  bestMean: number;
  bestRiskAdjusted: number;
  bestSafeGrowth: number | null;
  bestVerySafe: number | null;
}

export type SelectionCriterion = keyof OptimalitySelection;

/**
 * Equity curve of the median-outcome trial for one size
 */
export interface RepresentativeCurve {
  positionSizePct: number;
  trialIndex: number;
  equityCurve: EquityCurve;
}

/**
 * Progress of a Monte Carlo run, reported after every batch
 */
export interface MonteCarloProgress {
  completedTrials: number;
  totalTrials: number;
}
