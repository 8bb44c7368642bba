/**
 * Position Management
 * ===================
 * Per-symbol holdings and weighted-average cost basis. Positions are
 * immutable values; the ledger swaps them on every fill.
 */

export interface Position {
  symbol: string;
  shares: number;
  /** Weighted-average price paid per held share, fees excluded */
  averageCostBasis: number;
  /** Timestamp of the BUY that opened the current lot */
  openedAt: number;
}

export interface BuyFill {
  symbol: string;
  timestamp: number;
  shares: number;
  price: number;
}

/**
 * Open a fresh lot. Used for the first BUY of a symbol and for a BUY after
 * the previous lot was fully sold.
 */
export function openPosition(fill: BuyFill): Position {
  return {
    symbol: fill.symbol,
    shares: fill.shares,
    averageCostBasis: fill.price,
    openedAt: fill.timestamp,
  };
}

/**
 * Share-weighted mean of the held lot and a new fill
 */
export function weightedAverageCost(
  oldShares: number,
  oldCost: number,
  newShares: number,
  newPrice: number
): number {
  return (oldShares * oldCost + newShares * newPrice) / (oldShares + newShares);
}

export function addToPosition(position: Position, shares: number, price: number): Position {
  return {
    ...position,
    shares: position.shares + shares,
    averageCostBasis: weightedAverageCost(position.shares, position.averageCostBasis, shares, price),
  };
}

/**
 * Remove sold shares. Cost basis is unchanged; returns null once the lot is
 * fully sold.
 */
export function reducePosition(position: Position, sharesSold: number): Position | null {
  const remaining = position.shares - sharesSold;
  if (remaining <= 0) {
    return null;
  }
  return { ...position, shares: remaining };
}

export function isPositionOpen(position: Position | undefined): position is Position {
  return position !== undefined && position.shares > 0;
}
