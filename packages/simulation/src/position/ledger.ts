/**
 * Position Ledger
 * ===============
 * Cash, open positions and last known mark prices of one simulation run.
 *
 * The ledger performs no validation of its own: the trade executor checks
 * every numeric precondition and is its only mutator.
 */

import type { PositionSnapshot } from '../types/results.js';
import { addToPosition, isPositionOpen, openPosition, reducePosition } from './position.js';
import type { Position } from './position.js';

export interface LedgerBuy {
  symbol: string;
  timestamp: number;
  shares: number;
  price: number;
  totalCost: number;
}

export interface LedgerSell {
  symbol: string;
  shares: number;
  netProceeds: number;
}

export class Ledger {
  private cashBalance: number;
  private readonly positions = new Map<string, Position>();
  private readonly marks = new Map<string, number>();

  constructor(initialCash: number) {
    this.cashBalance = initialCash;
  }

  get cash(): number {
    return this.cashBalance;
  }

  getPosition(symbol: string): Position | undefined {
    return this.positions.get(symbol);
  }

  hasOpenPosition(symbol: string): boolean {
    return isPositionOpen(this.positions.get(symbol));
  }

  /**
   * Debit cash and add shares. Opens a fresh lot when nothing is held.
   */
  applyBuy(buy: LedgerBuy): Position {
    const existing = this.positions.get(buy.symbol);
    const position = isPositionOpen(existing)
      ? addToPosition(existing, buy.shares, buy.price)
      : openPosition(buy);

    this.cashBalance -= buy.totalCost;
    this.positions.set(buy.symbol, position);
    return position;
  }

  /**
   * Credit cash and remove shares; the position entry is dropped at zero.
   * Returns the remaining position, or null once fully sold.
   */
  applySell(sell: LedgerSell): Position | null {
    const existing = this.positions.get(sell.symbol);
    if (!existing) {
      return null;
    }

    const remaining = reducePosition(existing, sell.shares);
    this.cashBalance += sell.netProceeds;
    if (remaining) {
      this.positions.set(sell.symbol, remaining);
    } else {
      this.positions.delete(sell.symbol);
    }
    return remaining;
  }

  markPrice(symbol: string, price: number): void {
    this.marks.set(symbol, price);
  }

  getMarkPrice(symbol: string): number | undefined {
    return this.marks.get(symbol);
  }

  /**
   * shares × last known price; falls back to cost basis for a symbol that
   * was never marked
   */
  positionValue(symbol: string): number {
    const position = this.positions.get(symbol);
    if (!position) {
      return 0;
    }
    const mark = this.marks.get(symbol) ?? position.averageCostBasis;
    return position.shares * mark;
  }

  portfolioValue(): number {
    let value = this.cashBalance;
    for (const symbol of this.positions.keys()) {
      value += this.positionValue(symbol);
    }
    return value;
  }

  /**
   * Open positions sorted by symbol
   */
  snapshot(): PositionSnapshot[] {
    return [...this.positions.values()]
      .sort((a, b) => (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0))
      .map((position) => ({
        symbol: position.symbol,
        shares: position.shares,
        averageCostBasis: position.averageCostBasis,
        markPrice: this.marks.get(position.symbol) ?? null,
        marketValue: this.positionValue(position.symbol),
      }));
  }
}
