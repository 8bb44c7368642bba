/**
 * Trading activity check: a strategy that barely trades cannot be scored.
 */

import { ValidationError } from '@tradesim/utils';
import type { Signal } from '../types/signal.js';

export const DEFAULT_MIN_BUY_SELL_PAIRS = 2;

export function countBuySellPairs(signals: readonly Signal[]): number {
  let buys = 0;
  let sells = 0;
  for (const { signal } of signals) {
    if (signal === 'BUY') buys++;
    else if (signal === 'SELL') sells++;
  }
  return Math.min(buys, sells);
}

export function assertMinimumActivity(
  signals: readonly Signal[],
  minPairs: number = DEFAULT_MIN_BUY_SELL_PAIRS
): void {
  const pairs = countBuySellPairs(signals);
  if (pairs < minPairs) {
    throw new ValidationError(
      `Insufficient trading activity: ${pairs} buy/sell pairs, at least ${minPairs} required`,
      { pairs, minPairs },
      'INSUFFICIENT_ACTIVITY'
    );
  }
}
