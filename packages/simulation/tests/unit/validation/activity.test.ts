import { describe, it, expect } from 'vitest';
import { ValidationError } from '@tradesim/utils';
import { assertMinimumActivity, countBuySellPairs } from '../../../src/validation/activity.js';
import type { Signal } from '../../../src/types/signal.js';

function signals(...actions: Signal['signal'][]): Signal[] {
  return actions.map((signal, i) => ({ timestamp: i, symbol: 'LDO', signal, positionSize: 0.5 }));
}

describe('trading activity', () => {
  it('counts pairs as the smaller of BUY and SELL counts', () => {
    expect(countBuySellPairs(signals('BUY', 'BUY', 'HOLD', 'SELL', 'BUY'))).toBe(1);
    expect(countBuySellPairs(signals('BUY', 'SELL', 'BUY', 'SELL'))).toBe(2);
    expect(countBuySellPairs([])).toBe(0);
  });

  it('passes at the minimum', () => {
    expect(() => assertMinimumActivity(signals('BUY', 'SELL', 'BUY', 'SELL'))).not.toThrow();
  });

  it('rejects strategies below the minimum', () => {
    let caught: unknown;
    try {
      assertMinimumActivity(signals('BUY', 'SELL', 'HOLD'));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.code).toBe('INSUFFICIENT_ACTIVITY');
    expect(caught.message).toBe('Insufficient trading activity: 1 buy/sell pairs, at least 2 required');
  });

  it('honours a custom minimum', () => {
    expect(() => assertMinimumActivity(signals('BUY'), 0)).not.toThrow();
    expect(() => assertMinimumActivity(signals('BUY', 'SELL'), 3)).toThrow('at least 3 required');
  });
});
