import { describe, it, expect } from 'vitest';
import { Ledger } from '../../../src/position/ledger.js';

const T0 = Date.UTC(2024, 0, 1, 0);
const T1 = Date.UTC(2024, 0, 1, 1);

describe('Ledger', () => {
  it('opens a position on the first buy and debits cash', () => {
    const ledger = new Ledger(2000);
    ledger.applyBuy({ symbol: 'LDO', timestamp: T0, shares: 5, price: 100, totalCost: 500.5 });

    expect(ledger.cash).toBe(1499.5);
    expect(ledger.getPosition('LDO')).toEqual({
      symbol: 'LDO',
      shares: 5,
      averageCostBasis: 100,
      openedAt: T0,
    });
    expect(ledger.hasOpenPosition('LDO')).toBe(true);
  });

  it('updates cost basis as the share-weighted mean', () => {
    const ledger = new Ledger(2000);
    ledger.applyBuy({ symbol: 'LDO', timestamp: T0, shares: 5, price: 100, totalCost: 500.5 });
    ledger.applyBuy({ symbol: 'LDO', timestamp: T1, shares: 5, price: 120, totalCost: 600 });

    expect(ledger.cash).toBe(899.5);
    expect(ledger.getPosition('LDO')).toEqual({
      symbol: 'LDO',
      shares: 10,
      averageCostBasis: 110,
      openedAt: T0,
    });
  });

  it('values positions at the mark price, falling back to cost basis', () => {
    const ledger = new Ledger(2000);
    ledger.applyBuy({ symbol: 'LDO', timestamp: T0, shares: 10, price: 110, totalCost: 1100 });

    expect(ledger.positionValue('LDO')).toBe(1100);

    ledger.markPrice('LDO', 130);
    expect(ledger.positionValue('LDO')).toBe(1300);
    expect(ledger.portfolioValue()).toBe(2200);
    expect(ledger.positionValue('BTC')).toBe(0);
  });

  it('reduces shares on sell and keeps the cost basis', () => {
    const ledger = new Ledger(1000);
    ledger.applyBuy({ symbol: 'LDO', timestamp: T0, shares: 10, price: 100, totalCost: 1000 });

    const remaining = ledger.applySell({ symbol: 'LDO', shares: 4, netProceeds: 500 });

    expect(remaining).toEqual({ symbol: 'LDO', shares: 6, averageCostBasis: 100, openedAt: T0 });
    expect(ledger.cash).toBe(500);
  });

  it('removes the position when all shares are sold', () => {
    const ledger = new Ledger(1000);
    ledger.applyBuy({ symbol: 'LDO', timestamp: T0, shares: 10, price: 100, totalCost: 1000 });

    expect(ledger.applySell({ symbol: 'LDO', shares: 10, netProceeds: 1200 })).toBeNull();
    expect(ledger.getPosition('LDO')).toBeUndefined();
    expect(ledger.hasOpenPosition('LDO')).toBe(false);
    expect(ledger.cash).toBe(1200);
  });

  it('opens a fresh lot after a full close', () => {
    const ledger = new Ledger(1000);
    ledger.applyBuy({ symbol: 'LDO', timestamp: T0, shares: 10, price: 100, totalCost: 1000 });
    ledger.applySell({ symbol: 'LDO', shares: 10, netProceeds: 1000 });
    ledger.applyBuy({ symbol: 'LDO', timestamp: T1, shares: 2, price: 50, totalCost: 100 });

    expect(ledger.getPosition('LDO')).toEqual({
      symbol: 'LDO',
      shares: 2,
      averageCostBasis: 50,
      openedAt: T1,
    });
  });

  it('leaves cash untouched when selling an unknown symbol', () => {
    const ledger = new Ledger(1000);

    expect(ledger.applySell({ symbol: 'LDO', shares: 1, netProceeds: 10 })).toBeNull();
    expect(ledger.cash).toBe(1000);
  });

  it('snapshots open positions sorted by symbol', () => {
    const ledger = new Ledger(1000);
    ledger.applyBuy({ symbol: 'LDO', timestamp: T0, shares: 2, price: 10, totalCost: 20 });
    ledger.applyBuy({ symbol: 'BTC', timestamp: T0, shares: 1, price: 100, totalCost: 100 });
    ledger.markPrice('LDO', 12);

    expect(ledger.snapshot()).toEqual([
      { symbol: 'BTC', shares: 1, averageCostBasis: 100, markPrice: null, marketValue: 100 },
      { symbol: 'LDO', shares: 2, averageCostBasis: 10, markPrice: 12, marketValue: 24 },
    ]);
  });
});
