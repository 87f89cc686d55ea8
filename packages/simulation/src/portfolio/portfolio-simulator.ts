/**
 * Portfolio Simulator
 * ===================
 * Fixed-fractional capital evolution over one trade sequence.
 *
 * Each trade risks `positionSize` of *current* capital. A win pays
 * `risk * riskReward`, a loss costs `risk`. Capital is floored at zero and a
 * ruined portfolio stays at zero for the rest of the sequence.
 */

import { ValidationError } from '@sizinglab/utils';
import type { PortfolioRun, TradeSequence } from '../types/index.js';

export interface PortfolioSimulationParams {
  /** Fraction of current capital risked per trade, in (0, 1] */
  positionSize: number;
  trades: TradeSequence;
  initialCapital: number;
  riskReward: number;
}

/**
 * Mutable state of one portfolio while a sequence is replayed
 */
interface PortfolioState {
  capital: number;
  peak: number;
  maxDrawdown: number;
}

function validateParams(params: PortfolioSimulationParams): void {
  const { positionSize, initialCapital, riskReward } = params;
  if (!(positionSize > 0 && positionSize <= 1)) {
    throw new ValidationError('positionSize must be a fraction in (0, 1]', { positionSize });
  }
  if (!(initialCapital > 0) || !Number.isFinite(initialCapital)) {
    throw new ValidationError('initialCapital must be positive', { initialCapital });
  }
  if (!(riskReward > 0) || !Number.isFinite(riskReward)) {
    throw new ValidationError('riskReward must be positive', { riskReward });
  }
}

function applyTrade(state: PortfolioState, isWin: boolean, positionSize: number, riskReward: number): void {
  const risk = state.capital * positionSize;
  const next = isWin ? state.capital + risk * riskReward : state.capital - risk;
  if (!Number.isFinite(next)) {
    throw new ValidationError('Capital exceeds the largest representable number', {
      capital: state.capital,
      positionSize,
      riskReward,
    });
  }
  state.capital = Math.max(0, next);

  if (state.capital > state.peak) {
    state.peak = state.capital;
  }
  const drawdown = state.peak > 0 ? (state.peak - state.capital) / state.peak : 0;
  if (drawdown > state.maxDrawdown) {
    state.maxDrawdown = drawdown;
  }
}

/**
 * Replay `trades` at one position size.
 *
 * Deterministic: no randomness beyond the sequence passed in.
 *
 * @throws ValidationError when capital would overflow to Infinity
 */
export function simulatePortfolio(params: PortfolioSimulationParams): PortfolioRun {
  validateParams(params);
  const { positionSize, trades, initialCapital, riskReward } = params;

  const state: PortfolioState = { capital: initialCapital, peak: initialCapital, maxDrawdown: 0 };
  const equityCurve: number[] = new Array<number>(trades.length + 1);
  equityCurve[0] = initialCapital;

  for (let i = 0; i < trades.length; i++) {
    if (state.capital <= 0) {
      // Ruin is absorbing
      equityCurve[i + 1] = 0;
      continue;
    }
    applyTrade(state, trades[i] === true, positionSize, riskReward);
    equityCurve[i + 1] = state.capital;
  }

  return {
    equityCurve,
    finalCapital: state.capital,
    maxDrawdown: state.maxDrawdown,
  };
}
