/**
 * Sizing Report Formatter
 *
 * Renders a PositionSizingReport for the terminal. Pure data in, text out.
 */

import type { PositionSizingReport, SizeMetrics } from '@sizinglab/simulation';
import type { OutputFormat } from '../types/index.js';
import { formatCSV, formatJSON, formatTable } from '../core/output-formatter.js';
import type { TableRow } from '../core/output-formatter.js';

/** Tables longer than this show whole-percent sizes plus the optimum only */
export const MAX_FULL_TABLE_ROWS = 20;

export const METRIC_COLUMNS = [
  'size_pct',
  'geo_return_pct',
  'median_return_pct',
  'mean_return_pct',
  'avg_max_dd_pct',
  'worst_dd_pct',
  'profitable_pct',
  'bankrupt_pct',
  'risk_adjusted',
  'mean_final',
  'median_final',
  'std_final',
  'min_final',
  'max_final',
] as const;

export const TABLE_COLUMNS = [
  'size_pct',
  'geo_return_pct',
  'median_return_pct',
  'mean_return_pct',
  'median_final',
  'mean_final',
  'avg_max_dd_pct',
  'worst_dd_pct',
  'profitable_pct',
  'bankrupt_pct',
  'risk_adjusted',
] as const;

/**
 * Full-precision row for machine-readable output
 */
export function toMetricsRow(m: SizeMetrics): TableRow {
  return {
    size_pct: m.positionSizePct,
    geo_return_pct: m.geoMeanReturnPct,
    median_return_pct: m.medianReturnPct,
    mean_return_pct: m.meanReturnPct,
    avg_max_dd_pct: m.avgMaxDrawdownPct,
    worst_dd_pct: m.worstDrawdownPct,
    profitable_pct: m.profitablePct,
    bankrupt_pct: m.bankruptPct,
    risk_adjusted: m.riskAdjustedScore,
    mean_final: m.meanFinal,
    median_final: m.medianFinal,
    std_final: m.stdFinal,
    min_final: m.minFinal,
    max_final: m.maxFinal,
  };
}

/**
 * Rounded row for the table view
 */
export function toDisplayRow(m: SizeMetrics): TableRow {
  return {
    size_pct: m.positionSizePct,
    geo_return_pct: m.geoMeanReturnPct.toFixed(1),
    median_return_pct: m.medianReturnPct.toFixed(1),
    mean_return_pct: m.meanReturnPct.toFixed(1),
    median_final: m.medianFinal.toFixed(2),
    mean_final: m.meanFinal.toFixed(2),
    avg_max_dd_pct: m.avgMaxDrawdownPct.toFixed(1),
    worst_dd_pct: m.worstDrawdownPct.toFixed(1),
    profitable_pct: m.profitablePct.toFixed(1),
    bankrupt_pct: m.bankruptPct.toFixed(1),
    risk_adjusted: m.riskAdjustedScore.toFixed(3),
  };
}

/**
 * Sizes shown in the table view
 */
export function selectTableMetrics(
  metrics: readonly SizeMetrics[],
  optimalSizePct: number
): SizeMetrics[] {
  if (metrics.length <= MAX_FULL_TABLE_ROWS) {
    return [...metrics];
  }
  return metrics.filter(
    (m) => Number.isInteger(m.positionSizePct) || m.positionSizePct === optimalSizePct
  );
}

function formatSize(sizePct: number | null): string {
  return sizePct === null ? 'none eligible' : `${sizePct}%`;
}

export function formatSelection(report: PositionSizingReport): string[] {
  const { selection, config } = report;
  return [
    `Optimal position size (best geometric growth): ${formatSize(selection.bestGeometric)}`,
    `  Best median final capital: ${formatSize(selection.bestMedian)}`,
    `  Best mean final capital: ${formatSize(selection.bestMean)}`,
    `  Best risk-adjusted: ${formatSize(selection.bestRiskAdjusted)}`,
    `  Best safe growth (<${config.safeDrawdownPct}% DD): ${formatSize(selection.bestSafeGrowth)}`,
    `  Best very safe (<${config.verySafeDrawdownPct}% DD): ${formatSize(selection.bestVerySafe)}`,
  ];
}

function formatHeader(report: PositionSizingReport): string[] {
  const { config } = report;
  return [
    `Position sizing study (seed ${config.seed})`,
    `  Win probability: ${(config.winProbability * 100).toFixed(1)}%` +
      ` | Risk/reward: 1:${config.riskReward}` +
      ` | Trades: ${config.numTrades}` +
      ` | Trials: ${config.numTrials}` +
      ` | Initial capital: ${config.initialCapital.toFixed(2)}`,
  ];
}

export function formatSizingReport(report: PositionSizingReport, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJSON(report);
    case 'csv':
      return formatCSV(report.metrics.map(toMetricsRow), METRIC_COLUMNS);
    case 'table': {
      const optimal = report.selection.bestGeometric;
      const rows = selectTableMetrics(report.metrics, optimal).map((m) => ({
        ...toDisplayRow(m),
        note: m.positionSizePct === optimal ? '<-- OPTIMAL' : '',
      }));
      return [
        ...formatHeader(report),
        '',
        ...formatSelection(report),
        '',
        formatTable(rows, [...TABLE_COLUMNS, 'note']),
      ].join('\n');
    }
  }
}
