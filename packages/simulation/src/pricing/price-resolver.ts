/**
 * Price Resolver
 * ==============
 * Maps (symbol, timestamp) to a close price.
 *
 * Search order: an exact bar on the symbol's primary timeframe, then on each
 * fallback timeframe; then, if enabled, the latest earlier bar on the same
 * timeframes in the same order. A bar that is found but carries an invalid
 * close is an error, never skipped.
 */

import { PriceResolutionConfigSchema, formatZodIssues } from '../config.js';
import type { PriceResolutionConfig, PriceResolutionConfigInput } from '../config.js';
import { coarserTimeframes } from '../types/candle.js';
import type { PriceBar, Timeframe } from '../types/candle.js';
import {
  InvalidPriceError,
  NegativePriceError,
  PriceNotFoundError,
  SimulationConfigError,
  TradeRejectionError,
} from '../errors.js';
import { formatTimestamp } from '../time.js';

export interface ResolvedPrice {
  price: number;
  timeframe: Timeframe;
  /** Timestamp of the bar the price came from */
  barTimestamp: number;
  /** False when the price came from an earlier bar */
  exact: boolean;
}

export type ResolveResult = { ok: true; resolved: ResolvedPrice } | { ok: false; error: TradeRejectionError };

interface PriceSeries {
  closes: Map<number, number>;
  /** Ascending */
  timestamps: number[];
}

/**
 * Index of the last element strictly below target, or -1
 */
function lastIndexBelow(sorted: readonly number[], target: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((sorted[mid] ?? Infinity) < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo - 1;
}

export class PriceResolver {
  private readonly config: PriceResolutionConfig;
  private readonly series = new Map<string, Map<Timeframe, PriceSeries>>();

  constructor(bars: readonly PriceBar[], config: PriceResolutionConfigInput = {}) {
    const parsed = PriceResolutionConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new SimulationConfigError(`Invalid price resolution config: ${formatZodIssues(parsed.error)}`);
    }
    this.config = parsed.data;

    for (const bar of bars) {
      this.index(bar);
    }
    for (const bySymbol of this.series.values()) {
      for (const s of bySymbol.values()) {
        s.timestamps.sort((a, b) => a - b);
      }
    }
  }

  private index(bar: PriceBar): void {
    let bySymbol = this.series.get(bar.symbol);
    if (!bySymbol) {
      bySymbol = new Map();
      this.series.set(bar.symbol, bySymbol);
    }
    let s = bySymbol.get(bar.timeframe);
    if (!s) {
      s = { closes: new Map(), timestamps: [] };
      bySymbol.set(bar.timeframe, s);
    }
    // First bar wins on duplicates; validated datasets carry none
    if (!s.closes.has(bar.timestamp)) {
      s.closes.set(bar.timestamp, bar.close);
      s.timestamps.push(bar.timestamp);
    }
  }

  /**
   * Timeframes tried for a symbol, primary first
   */
  searchOrder(symbol: string): Timeframe[] {
    const primary = this.config.symbolTimeframes[symbol] ?? this.config.primaryTimeframe;
    const fallbacks = this.config.fallbackTimeframes ?? coarserTimeframes(primary);
    return [primary, ...fallbacks.filter((tf, i) => tf !== primary && fallbacks.indexOf(tf) === i)];
  }

  /**
   * Resolve with provenance. Throws PriceNotFoundError, InvalidPriceError or
   * NegativePriceError.
   */
  resolveDetailed(symbol: string, timestamp: number): ResolvedPrice {
    const order = this.searchOrder(symbol);
    const found = this.findExact(symbol, timestamp, order) ?? this.findPrior(symbol, timestamp, order);

    if (!found) {
      throw new PriceNotFoundError(symbol, timestamp, `no price found in timeframes ${order.join(', ')}`);
    }

    const source = `${found.timeframe} bar at ${formatTimestamp(found.barTimestamp)}`;
    if (!Number.isFinite(found.price)) {
      throw new InvalidPriceError(symbol, timestamp, `price ${found.price} from ${source} is not a finite number`);
    }
    if (found.price < 0) {
      throw new NegativePriceError(symbol, timestamp, `price ${found.price} from ${source} is negative`);
    }
    return found;
  }

  resolve(symbol: string, timestamp: number): number {
    return this.resolveDetailed(symbol, timestamp).price;
  }

  tryResolve(symbol: string, timestamp: number): ResolveResult {
    try {
      return { ok: true, resolved: this.resolveDetailed(symbol, timestamp) };
    } catch (error) {
      if (error instanceof TradeRejectionError) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  private findExact(symbol: string, timestamp: number, order: readonly Timeframe[]): ResolvedPrice | null {
    const bySymbol = this.series.get(symbol);
    for (const timeframe of order) {
      const price = bySymbol?.get(timeframe)?.closes.get(timestamp);
      if (price !== undefined) {
        return { price, timeframe, barTimestamp: timestamp, exact: true };
      }
    }
    return null;
  }

  private findPrior(symbol: string, timestamp: number, order: readonly Timeframe[]): ResolvedPrice | null {
    if (!this.config.allowPriorFallback) {
      return null;
    }
    const bySymbol = this.series.get(symbol);
    const maxStaleness = this.config.maxStalenessMs;

    for (const timeframe of order) {
      const s = bySymbol?.get(timeframe);
      if (!s) {
        continue;
      }
      const barTimestamp = s.timestamps[lastIndexBelow(s.timestamps, timestamp)];
      if (barTimestamp === undefined) {
        continue;
      }
      if (maxStaleness !== undefined && timestamp - barTimestamp > maxStaleness) {
        continue;
      }
      const price = s.closes.get(barTimestamp);
      if (price !== undefined) {
        return { price, timeframe, barTimestamp, exact: false };
      }
    }
    return null;
  }
}
