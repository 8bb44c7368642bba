import { z } from 'zod';
import { TIMEFRAMES } from './types/candle.js';
import { SimulationConfigError } from './errors.js';

/**
 * Simulation configuration schemas.
 *
 * Financial parameters are always passed in explicitly; the engine reads no
 * ambient settings.
 */

export const TimeframeSchema = z.enum(TIMEFRAMES);

export const PriceResolutionConfigSchema = z.object({
  /** Timeframe looked up first for every symbol */
  primaryTimeframe: TimeframeSchema.default('1H'),
  /** Per-symbol primary timeframe, e.g. from strategy metadata targets */
  symbolTimeframes: z.record(TimeframeSchema).default({}),
  /**
   * Timeframes tried after the primary one, in order. Defaults to every
   * timeframe coarser than the primary.
   */
  fallbackTimeframes: z.array(TimeframeSchema).optional(),
  /** Fall back to the latest earlier bar when no bar matches exactly */
  allowPriorFallback: z.boolean().default(true),
  /** Oldest acceptable prior bar, in milliseconds before the signal */
  maxStalenessMs: z.number().int().positive().optional(),
});

export type PriceResolutionConfig = z.infer<typeof PriceResolutionConfigSchema>;
export type PriceResolutionConfigInput = z.input<typeof PriceResolutionConfigSchema>;

export const SimulationConfigSchema = PriceResolutionConfigSchema.extend({
  initialCash: z.number().finite().positive(),
  /** Fraction of gross trade value charged per trade, 0..1 */
  feeRate: z.number().finite().min(0).max(1),
  /** Throw on the first rejected signal instead of skipping it */
  failOnRejection: z.boolean().default(false),
});

export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;
export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate and default a simulation configuration
 */
export function parseSimulationConfig(input: unknown): SimulationConfig {
  const parsed = SimulationConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new SimulationConfigError(`Invalid simulation config: ${formatZodIssues(parsed.error)}`, {
      issues: parsed.error.issues.map((i) => i.path.join('.')),
    });
  }
  return parsed.data;
}
