import { z } from 'zod';

export const outputFormatSchema = z.enum(['json', 'table', 'csv']);

/**
 * Options of `sizing run` after coercion.
 *
 * Only shape is checked here; value ranges are enforced by the study config
 * schema once preset, file and flags are merged.
 */
export const runSizingSchema = z
  .object({
    preset: z.string().min(1).optional(),
    config: z.string().min(1).optional(),
    winProbability: z.number().optional(),
    trades: z.number().optional(),
    trials: z.number().optional(),
    initialCapital: z.number().optional(),
    riskReward: z.number().optional(),
    sizes: z.array(z.number()).min(1).optional(),
    range: z
      .object({
        start: z.number(),
        end: z.number(),
        step: z.number(),
      })
      .optional(),
    seed: z.number().int().optional(),
    curves: z.boolean().default(false),
    format: outputFormatSchema.default('table'),
  })
  .refine((args) => !(args.sizes && args.range), {
    message: 'Use either --sizes or --range, not both',
    path: ['sizes'],
  })
  .refine((args) => !args.curves || args.format === 'json', {
    message: '--curves requires --format json',
    path: ['curves'],
  });

export type RunSizingArgs = z.infer<typeof runSizingSchema>;
