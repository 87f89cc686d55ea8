import { z } from 'zod';
import { ConfigurationError } from '@sizinglab/utils';

/**
 * Study configuration
 *
 * Validated once before any simulation work. Position sizes are percentages
 * of current capital at this boundary and fractions inside the engine.
 */

const PositionSizePctSchema = z
  .number()
  .finite()
  .gt(0, 'position size must be greater than 0%')
  .max(100, 'position size cannot exceed 100%');

const DrawdownThresholdSchema = z.number().gt(0).max(100);

const LOG_MAX_VALUE = Math.log(Number.MAX_VALUE);

/**
 * Whether the luckiest trial (every trade a win at the largest size) keeps
 * capital, and its return in percent, below Number.MAX_VALUE
 */
export function capitalStaysFinite(config: {
  initialCapital: number;
  numTrades: number;
  riskReward: number;
  positionSizesPct: readonly number[];
}): boolean {
  const largestSize = Math.max(0, ...config.positionSizesPct) / 100;
  const growthLog = config.numTrades * Math.log1p(largestSize * config.riskReward);
  return (
    Math.log(config.initialCapital) + growthLog <= LOG_MAX_VALUE &&
    Math.log(100) + growthLog <= LOG_MAX_VALUE
  );
}

export const SimulationConfigSchema = z
  .object({
    winProbability: z
      .number()
      .gt(0, 'win probability must be greater than 0')
      .lt(1, 'win probability must be less than 1'),
    numTrades: z.number().int().min(1),
    numTrials: z.number().int().min(1),
    initialCapital: z.number().finite().positive(),
    riskReward: z.number().finite().positive().default(1),
    positionSizesPct: z
      .array(PositionSizePctSchema)
      .min(1, 'at least one position size is required')
      .refine((sizes) => new Set(sizes).size === sizes.length, {
        message: 'position sizes must be unique',
      }),
    seed: z.number().int().optional(),
    /** Final capital at or below this counts as bankrupt */
    ruinThreshold: z.number().min(0).default(0),
    safeDrawdownPct: DrawdownThresholdSchema.default(30),
    verySafeDrawdownPct: DrawdownThresholdSchema.default(20),
  })
  .strict()
  .refine((config) => config.ruinThreshold < config.initialCapital, {
    message: 'ruin threshold must be below initial capital',
    path: ['ruinThreshold'],
  })
  .refine(capitalStaysFinite, {
    message: 'too many trades: capital at the largest size could exceed the largest representable number',
    path: ['numTrades'],
  });

export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;
export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;

/**
 * Validate a raw configuration
 *
 * All issues are collected into a single ConfigurationError whose
 * configKey names the first offending parameter.
 */
export function parseSimulationConfig(input: unknown): SimulationConfig {
  const result = SimulationConfigSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => ({
    parameter:
      issue.code === 'unrecognized_keys'
        ? issue.keys.join(', ')
        : issue.path.join('.') || '(root)',
    message: issue.message,
  }));
  const first = issues[0];
  const configKey = first ? first.parameter : '(root)';

  throw new ConfigurationError(
    `Invalid simulation config: ${configKey}: ${first ? first.message : 'invalid input'}`,
    configKey,
    { issues }
  );
}

/**
 * Candidate fraction of capital for a percentage
 */
export function toFraction(positionSizePct: number): number {
  return positionSizePct / 100;
}
