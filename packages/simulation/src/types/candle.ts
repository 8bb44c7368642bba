/**
 * Candle Types
 * ============
 */

/**
 * Supported candle timeframes, ordered from finest to coarsest
 */
export const TIMEFRAMES = ['1H', '2H', '4H', '12H', '1D'] as const;

export type Timeframe = (typeof TIMEFRAMES)[number];

export function isTimeframe(value: unknown): value is Timeframe {
  return TIMEFRAMES.some((timeframe) => timeframe === value);
}

/**
 * Timeframes strictly coarser than the given one, finest first
 */
export function coarserTimeframes(timeframe: Timeframe): Timeframe[] {
  return TIMEFRAMES.slice(TIMEFRAMES.indexOf(timeframe) + 1);
}

/**
 * Normalized candle: one close price of one symbol on one timeframe.
 *
 * `close` is NaN when the source row carried no usable number; the price
 * resolver rejects such bars instead of guessing a value.
 */
export interface PriceBar {
  /** Candle open time, epoch milliseconds */
  timestamp: number;
  symbol: string;
  timeframe: Timeframe;
  close: number;
}

/**
 * Source layout of a candle table
 * - long: one row per (timestamp, symbol[, timeframe]) with a `close` column
 * - wide: one row per timestamp with `close_{SYMBOL}_{TIMEFRAME}` columns
 */
export type CandleLayout = 'long' | 'wide';
