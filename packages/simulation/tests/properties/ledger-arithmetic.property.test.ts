/**
 * Property Tests for Trade Arithmetic
 * ===================================
 *
 * Critical Invariants:
 * 1. BUY: cash_after = cash_before − (shares × price + fees) and cash_after ≥ 0
 * 2. SELL: cash_after = cash_before + net proceeds, shares are conserved
 * 3. Cost basis after a second BUY is the share-weighted mean of both lots
 * 4. A rejected signal leaves the ledger untouched
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { TradeExecutor } from '../../src/execution/trade-executor.js';
import { Ledger } from '../../src/position/ledger.js';
import type { TradeSignal } from '../../src/types/signal.js';

const cashArb = fc.double({ min: 1, max: 1_000_000, noNaN: true });
const sizeArb = fc.double({ min: 0.001, max: 1, noNaN: true });
const feeArb = fc.double({ min: 0, max: 0.4, noNaN: true });
const priceArb = fc.double({ min: 0.01, max: 100_000, noNaN: true });
/** Leaves cash for a second BUY */
const partialSizeArb = fc.double({ min: 0.001, max: 0.9, noNaN: true });

function signal(action: TradeSignal['signal'], positionSize: number, timestamp = 0): TradeSignal {
  return { timestamp, symbol: 'X', signal: action, positionSize };
}

function closeTo(actual: number, expected: number, relative = 1e-9): boolean {
  return Math.abs(actual - expected) <= relative * Math.max(1, Math.abs(expected));
}

describe('Trade arithmetic - Property Tests', () => {
  it('BUY debits exactly shares × price + fees and never overdraws', () => {
    fc.assert(
      fc.property(cashArb, sizeArb, feeArb, priceArb, (cash, size, feeRate, price) => {
        const ledger = new Ledger(cash);
        const result = new TradeExecutor({ feeRate }).execute(signal('BUY', size), ledger, price);
        if (!result.ok) return false;

        const { shares, fees, cashAfter } = result.entry;
        return cashAfter >= 0 && closeTo(cashAfter, cash - (shares * price + fees)) && fees >= -1e-9 * cash;
      }),
      { numRuns: 300 }
    );
  });

  it('SELL credits net proceeds and conserves shares', () => {
    fc.assert(
      fc.property(
        cashArb,
        sizeArb,
        sizeArb,
        feeArb,
        priceArb,
        priceArb,
        (cash, buySize, sellSize, feeRate, buyPrice, sellPrice) => {
          const ledger = new Ledger(cash);
          const executor = new TradeExecutor({ feeRate });
          const bought = executor.execute(signal('BUY', buySize, 0), ledger, buyPrice);
          if (!bought.ok) return false;

          const cashBefore = ledger.cash;
          const sharesBefore = bought.entry.shares;
          const sold = executor.execute(signal('SELL', sellSize, 1), ledger, sellPrice);
          if (!sold.ok) return false;

          const { shares, fees, cashAfter } = sold.entry;
          const netProceeds = shares * sellPrice - fees;
          const remaining = ledger.getPosition('X')?.shares ?? 0;

          return (
            closeTo(cashAfter, cashBefore + netProceeds) &&
            remaining >= 0 &&
            closeTo(remaining + shares, sharesBefore)
          );
        }
      ),
      { numRuns: 300 }
    );
  });

  it('cost basis is the share-weighted mean of both lots', () => {
    fc.assert(
      fc.property(cashArb, partialSizeArb, sizeArb, feeArb, priceArb, priceArb, (cash, s1, s2, feeRate, p1, p2) => {
        const ledger = new Ledger(cash);
        const executor = new TradeExecutor({ feeRate });
        const first = executor.execute(signal('BUY', s1, 0), ledger, p1);
        const second = executor.execute(signal('BUY', s2, 1), ledger, p2);
        if (!first.ok || !second.ok) return false;

        const n1 = first.entry.shares;
        const n2 = second.entry.shares;
        const expected = (n1 * p1 + n2 * p2) / (n1 + n2);
        return closeTo(second.entry.averageCostBasis, expected, 1e-9);
      }),
      { numRuns: 300 }
    );
  });

  it('a rejected signal leaves cash and positions unchanged', () => {
    fc.assert(
      fc.property(cashArb, sizeArb, priceArb, (cash, size, price) => {
        const ledger = new Ledger(cash);
        const buyAll = new TradeExecutor({ feeRate: 1 }).execute(signal('BUY', size), ledger, price);
        const sellNothing = new TradeExecutor({ feeRate: 0 }).execute(signal('SELL', size), ledger, price);

        expect(buyAll.ok).toBe(false);
        expect(sellNothing.ok).toBe(false);
        return ledger.cash === cash && ledger.getPosition('X') === undefined;
      }),
      { numRuns: 100 }
    );
  });
});
