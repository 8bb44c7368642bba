import { z } from 'zod';
import { DEFAULT_MIN_BUY_SELL_PAIRS, TimeframeSchema } from '@tradesim/simulation';

export const outputFormatSchema = z.enum(['table', 'json']);

export const simulateSchema = z.object({
  signals: z.string().min(1),
  candles: z.string().min(1),
  // Fall back to TRADESIM_* environment defaults when omitted
  initialCash: z.number().finite().positive().optional(),
  feeRate: z.number().finite().min(0).max(1).optional(),
  primaryTimeframe: TimeframeSchema.optional(),
  metadata: z.string().min(1).optional(),
  minPairs: z.number().int().min(0).default(DEFAULT_MIN_BUY_SELL_PAIRS),
  maxStalenessHours: z.number().positive().optional(),
  tradeLog: z.string().min(1).optional(),
  failOnRejection: z.boolean().default(false),
  format: outputFormatSchema.default('table'),
  submissionId: z.string().min(1).optional(),
});

export type SimulateArgs = z.infer<typeof simulateSchema>;
export type OutputFormat = z.infer<typeof outputFormatSchema>;
