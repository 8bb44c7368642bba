/**
 * Trade Types
 * ===========
 * Trade log entries, rejections and equity points produced by a run.
 */

import type { TradeAction } from './signal.js';

export const REJECTION_CODES = [
  'ZERO_POSITION_SIZE',
  'NO_CASH_AVAILABLE',
  'INVALID_ALLOCATION',
  'FEES_EXCEED_ALLOCATION',
  'INVALID_PRICE',
  'NEGATIVE_PRICE',
  'INVALID_SHARE_COUNT',
  'INSUFFICIENT_FUNDS',
  'ZERO_TOTAL_SHARES',
  'NO_POSITION',
  'INVALID_GROSS_PROCEEDS',
  'FEES_EXCEED_PROCEEDS',
  'ZERO_COST_BASIS',
  'PRICE_NOT_FOUND',
] as const;

export type RejectionCode = (typeof REJECTION_CODES)[number];

/**
 * A signal the engine refused to execute. The ledger is untouched.
 */
export interface TradeRejection {
  code: RejectionCode;
  action: TradeAction;
  symbol: string;
  timestamp: number;
  /** Why the engine refused, without symbol/timestamp */
  reason: string;
  /** Human-readable, names action, symbol and timestamp */
  message: string;
}

/**
 * One executed trade. Append-only.
 */
export interface TradeLogEntry {
  timestamp: number;
  action: TradeAction;
  symbol: string;
  shares: number;
  price: number;
  fees: number;
  cashAfter: number;
  portfolioValueAfter: number;
  /** BUY: cost basis after the buy. SELL: cost basis the shares were sold against. */
  averageCostBasis: number;
  /** SELL only: net proceeds minus cost of the shares sold */
  realizedPnl: number | null;
}

export type ExecutionResult =
  | { ok: true; entry: TradeLogEntry }
  | { ok: false; rejection: TradeRejection };

export interface EquityPoint {
  timestamp: number;
  cash: number;
  portfolioValue: number;
}
