/**
 * Simulation Result Types
 * =======================
 */

import type { EquityPoint, RejectionCode, TradeLogEntry, TradeRejection } from './trade.js';

export interface PositionSnapshot {
  symbol: string;
  shares: number;
  averageCostBasis: number;
  /** Last valid resolved price, null if the symbol was never priced */
  markPrice: number | null;
  marketValue: number;
}

export interface SimulationSummary {
  processedSignals: number;
  executedBuys: number;
  executedSells: number;
  holds: number;
  rejected: number;
  rejectionsByCode: Partial<Record<RejectionCode, number>>;
}

export interface SimulationResult {
  tradeLog: TradeLogEntry[];
  equityCurve: EquityPoint[];
  rejections: TradeRejection[];
  initialCash: number;
  finalCash: number;
  finalPortfolioValue: number;
  openPositions: PositionSnapshot[];
  summary: SimulationSummary;
}
