/**
 * Sizing Commands
 *
 * `sizing run` merges a preset, an optional study file and flags (later wins),
 * runs the study and prints the report.
 */

import type { Command } from 'commander';
import { loadStudyFile, logger, ValidationError } from '@sizinglab/utils';
import type { StudyFileContents } from '@sizinglab/utils';
import {
  getStudyPreset,
  positionSizeRange,
  runPositionSizingStudy,
} from '@sizinglab/simulation';
import { runSizingSchema } from '../command-defs/sizing.js';
import type { RunSizingArgs } from '../command-defs/sizing.js';
import { coerceBoolean, coerceNumber, coerceNumberArray, coerceRange } from '../core/coerce.js';
import { die } from '../core/error-handler.js';
import { formatSizingReport } from '../formatters/sizing-report.js';

export type StudyFileLoader = (path: string) => StudyFileContents;

/**
 * Build the raw study config from preset, file and flags.
 *
 * A file may name its own `preset`; an explicit `--preset` flag overrides it.
 */
export function buildStudyInput(
  args: RunSizingArgs,
  loadFile: StudyFileLoader = loadStudyFile
): Record<string, unknown> {
  const fileContents: StudyFileContents = args.config ? loadFile(args.config) : {};
  const { preset: filePreset, ...fileValues } = fileContents;

  const presetName = args.preset ?? (typeof filePreset === 'string' ? filePreset : undefined);
  const presetValues = presetName ? getStudyPreset(presetName) : {};

  const flagValues: Record<string, unknown> = {
    winProbability: args.winProbability,
    numTrades: args.trades,
    numTrials: args.trials,
    initialCapital: args.initialCapital,
    riskReward: args.riskReward,
    positionSizesPct: args.range
      ? positionSizeRange(args.range.start, args.range.end, args.range.step)
      : args.sizes,
    seed: args.seed,
  };
  const definedFlags = Object.fromEntries(
    Object.entries(flagValues).filter(([, value]) => value !== undefined)
  );

  return { ...presetValues, ...fileValues, ...definedFlags };
}

/**
 * Run a study for validated CLI args and return the rendered output
 */
export function runSizingHandler(
  args: RunSizingArgs,
  loadFile: StudyFileLoader = loadStudyFile
): string {
  const input = buildStudyInput(args, loadFile);
  const report = runPositionSizingStudy(input, {
    representativeCurves: args.curves,
    onProgress: ({ completedTrials, totalTrials }) =>
      logger.debug(`Simulation ${completedTrials}/${totalTrials}`),
  });
  return formatSizingReport(report, args.format);
}

/**
 * Coerce raw commander options into the shape runSizingSchema validates
 */
export function coerceSizingOptions(raw: Record<string, unknown>): Record<string, unknown> {
  return {
    ...raw,
    winProbability: coerceNumber(raw.winProbability, 'win-probability'),
    trades: coerceNumber(raw.trades, 'trades'),
    trials: coerceNumber(raw.trials, 'trials'),
    initialCapital: coerceNumber(raw.initialCapital, 'initial-capital'),
    riskReward: coerceNumber(raw.riskReward, 'risk-reward'),
    sizes: coerceNumberArray(raw.sizes, 'sizes'),
    range: coerceRange(raw.range, 'range'),
    seed: coerceNumber(raw.seed, 'seed'),
    curves: coerceBoolean(raw.curves, 'curves'),
  };
}

/**
 * Coerce and validate raw commander options
 */
export function parseSizingArgs(raw: Record<string, unknown>): RunSizingArgs {
  const result = runSizingSchema.safeParse(coerceSizingOptions(raw));
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues.map((issue) => ({
    option: issue.path.join('.'),
    message: issue.message,
  }));
  const first = issues[0];
  throw new ValidationError(
    first ? `Invalid option ${first.option}: ${first.message}` : 'Invalid options',
    { issues }
  );
}

export function registerSizingCommands(program: Command): void {
  program
    .command('run')
    .description('Simulate candidate position sizes and select the optimal one')
    .option('--preset <name>', 'Start from a preset (optimal-finder, pnl-comparison)')
    .option('--config <file>', 'Study file (YAML or JSON)')
    .option('--win-probability <p>', 'Probability of a winning trade, 0 < p < 1')
    .option('--trades <n>', 'Trades per trial')
    .option('--trials <n>', 'Monte Carlo trials')
    .option('--initial-capital <amount>', 'Starting capital')
    .option('--risk-reward <ratio>', 'Reward per unit risked on a win')
    .option('--sizes <list>', 'Comma-separated position sizes in percent')
    .option('--range <start:end:step>', 'Position size grid in percent')
    .option('--seed <n>', 'Random seed for a reproducible run')
    .option('--curves', 'Include median-outcome equity curves (requires --format json)')
    .option('--format <format>', 'Output format (table, json, csv)', 'table')
    .action((rawOpts: Record<string, unknown>) => {
      try {
        const args = parseSizingArgs(rawOpts);
        process.stdout.write(`${runSizingHandler(args)}\n`);
      } catch (error) {
        die(error);
      }
    });
}
