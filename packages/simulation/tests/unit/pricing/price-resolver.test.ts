import { describe, it, expect } from 'vitest';
import { PriceResolver } from '../../../src/pricing/price-resolver.js';
import {
  InvalidPriceError,
  NegativePriceError,
  PriceNotFoundError,
  SimulationConfigError,
} from '../../../src/errors.js';
import type { PriceBar } from '../../../src/types/candle.js';

const HOUR = 60 * 60 * 1000;
const T0 = Date.UTC(2024, 0, 1, 0);

const bars: PriceBar[] = [
  { timestamp: T0 + 2 * HOUR, symbol: 'LDO', timeframe: '1H', close: 102 },
  { timestamp: T0, symbol: 'LDO', timeframe: '1H', close: 100 },
  { timestamp: T0, symbol: 'LDO', timeframe: '4H', close: 99 },
  { timestamp: T0 + 4 * HOUR, symbol: 'LDO', timeframe: '4H', close: 105 },
  { timestamp: T0, symbol: 'BTC', timeframe: '1H', close: Number.NaN },
  { timestamp: T0, symbol: 'ETH', timeframe: '1H', close: -1 },
];

describe('PriceResolver', () => {
  it('returns the exact bar on the primary timeframe', () => {
    const resolver = new PriceResolver(bars);

    expect(resolver.resolve('LDO', T0)).toBe(100);
    expect(resolver.resolveDetailed('LDO', T0)).toEqual({
      price: 100,
      timeframe: '1H',
      barTimestamp: T0,
      exact: true,
    });
  });

  it('prefers an exact bar on a coarser timeframe over an earlier primary bar', () => {
    const resolver = new PriceResolver(bars);

    expect(resolver.resolveDetailed('LDO', T0 + 4 * HOUR)).toEqual({
      price: 105,
      timeframe: '4H',
      barTimestamp: T0 + 4 * HOUR,
      exact: true,
    });
  });

  it('falls back to the latest earlier bar when nothing matches exactly', () => {
    const resolver = new PriceResolver(bars);

    expect(resolver.resolveDetailed('LDO', T0 + 3 * HOUR)).toEqual({
      price: 102,
      timeframe: '1H',
      barTimestamp: T0 + 2 * HOUR,
      exact: false,
    });
  });

  it('ignores earlier bars older than maxStalenessMs', () => {
    const resolver = new PriceResolver(bars, { maxStalenessMs: 30 * 60 * 1000 });

    expect(() => resolver.resolve('LDO', T0 + HOUR)).toThrow(
      'LDO at 2024-01-01T01:00:00.000Z rejected: no price found in timeframes 1H, 2H, 4H, 12H, 1D'
    );
  });

  it('does not look back when prior fallback is disabled', () => {
    const resolver = new PriceResolver(bars, { allowPriorFallback: false });

    expect(() => resolver.resolve('LDO', T0 + HOUR)).toThrow(PriceNotFoundError);
  });

  it('fails for unknown symbols and timestamps before the first bar', () => {
    const resolver = new PriceResolver(bars);

    expect(() => resolver.resolve('DOGE', T0)).toThrow(PriceNotFoundError);
    expect(() => resolver.resolve('LDO', T0 - HOUR)).toThrow(PriceNotFoundError);
  });

  it('rejects a found bar with a non-finite close', () => {
    const resolver = new PriceResolver(bars);

    expect(() => resolver.resolve('BTC', T0)).toThrow(InvalidPriceError);
    expect(() => resolver.resolve('BTC', T0)).toThrow(
      'BTC at 2024-01-01T00:00:00.000Z rejected: price NaN from 1H bar at 2024-01-01T00:00:00.000Z is not a finite number'
    );
  });

  it('rejects a found bar with a negative close', () => {
    const resolver = new PriceResolver(bars);

    expect(() => resolver.resolve('ETH', T0)).toThrow(NegativePriceError);
  });

  it('returns failures as values from tryResolve', () => {
    const resolver = new PriceResolver(bars);
    const result = resolver.tryResolve('DOGE', T0);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(PriceNotFoundError);
    expect(result.error.rejectionCode).toBe('PRICE_NOT_FOUND');
    expect(result.error.toRejection('BUY')).toEqual({
      code: 'PRICE_NOT_FOUND',
      action: 'BUY',
      symbol: 'DOGE',
      timestamp: T0,
      reason: 'no price found in timeframes 1H, 2H, 4H, 12H, 1D',
      message: 'BUY DOGE at 2024-01-01T00:00:00.000Z rejected: no price found in timeframes 1H, 2H, 4H, 12H, 1D',
    });
  });

  describe('searchOrder', () => {
    it('starts from the per-symbol timeframe and continues with coarser ones', () => {
      const resolver = new PriceResolver([], { symbolTimeframes: { BTC: '4H' } });

      expect(resolver.searchOrder('BTC')).toEqual(['4H', '12H', '1D']);
      expect(resolver.searchOrder('LDO')).toEqual(['1H', '2H', '4H', '12H', '1D']);
    });

    it('uses explicit fallbacks without repeating the primary timeframe', () => {
      const resolver = new PriceResolver([], { fallbackTimeframes: ['1D', '1H', '1D'] });

      expect(resolver.searchOrder('LDO')).toEqual(['1H', '1D']);
    });
  });

  it('rejects an invalid configuration', () => {
    expect(() => new PriceResolver(bars, { maxStalenessMs: -5 })).toThrow(SimulationConfigError);
  });
});
