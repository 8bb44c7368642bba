/**
 * Strategy Metadata
 * =================
 * Declares which symbols a strategy trades (targets) and which it only
 * reads (anchors), each on one timeframe.
 */

import { z } from 'zod';
import { ValidationError } from '@tradesim/utils';
import { TimeframeSchema, formatZodIssues } from '../config.js';
import type { Timeframe } from '../types/candle.js';
import type { Signal } from '../types/signal.js';

export const MAX_TARGETS = 3;
export const MAX_ANCHORS = 5;

export const CoinSpecSchema = z.object({
  symbol: z
    .string()
    .trim()
    .regex(/^[A-Z0-9]+$/, 'symbol must be upper-case letters and digits'),
  timeframe: TimeframeSchema,
});

export type CoinSpec = z.infer<typeof CoinSpecSchema>;

function hasUniqueSymbols(specs: readonly CoinSpec[]): boolean {
  return new Set(specs.map((s) => s.symbol)).size === specs.length;
}

export const StrategyMetadataSchema = z.object({
  targets: z
    .array(CoinSpecSchema)
    .min(1, 'at least one target is required')
    .max(MAX_TARGETS, `at most ${MAX_TARGETS} targets are allowed`)
    .refine(hasUniqueSymbols, 'target symbols must be unique'),
  anchors: z
    .array(CoinSpecSchema)
    .max(MAX_ANCHORS, `at most ${MAX_ANCHORS} anchors are allowed`)
    .refine(hasUniqueSymbols, 'anchor symbols must be unique')
    .default([]),
});

export type StrategyMetadata = z.infer<typeof StrategyMetadataSchema>;

export function validateStrategyMetadata(input: unknown): StrategyMetadata {
  const parsed = StrategyMetadataSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid strategy metadata: ${formatZodIssues(parsed.error)}`,
      { issues: parsed.error.issues.map((i) => i.path.join('.')) },
      'INVALID_STRATEGY_METADATA'
    );
  }
  return parsed.data;
}

/**
 * Per-symbol primary timeframes. A target's timeframe wins over an anchor
 * declaring the same symbol.
 */
export function symbolTimeframes(metadata: StrategyMetadata): Record<string, Timeframe> {
  const result: Record<string, Timeframe> = {};
  for (const { symbol, timeframe } of [...metadata.anchors, ...metadata.targets]) {
    result[symbol] = timeframe;
  }
  return result;
}

/**
 * Signals may only trade declared targets
 */
export function assertSignalsMatchTargets(signals: readonly Signal[], metadata: StrategyMetadata): void {
  const targets = new Set(metadata.targets.map((t) => t.symbol));
  const unknown = [...new Set(signals.map((s) => s.symbol))].filter((symbol) => !targets.has(symbol));
  if (unknown.length > 0) {
    throw new ValidationError(
      `Signals reference symbols that are not declared targets: ${unknown.join(', ')}`,
      { symbols: unknown },
      'SIGNAL_SYMBOL_NOT_TARGET'
    );
  }
}
