/**
 * Performance Metrics
 * ===================
 * Summary statistics of a finished run, computed from its trade log and
 * equity curve.
 */

import type { SimulationResult } from '../types/results.js';
import type { TradeLogEntry } from '../types/trade.js';

/** Periods per year used to annualize the Sharpe ratio */
export const ANNUALIZATION_PERIODS = 252;

export interface PerformanceMetrics {
  /** (final / initial − 1) × 100 */
  totalReturnPct: number;
  sharpeRatio: number;
  /** Largest peak-to-trough equity drop, positive percentage */
  maxDrawdownPct: number;
  /** Share of SELLs with positive realized PnL, 0..1 */
  winRate: number;
  /** Number of SELLs */
  numTrades: number;
  /** Per-SELL return on the cost of the shares sold */
  roundTripReturns: number[];
}

export type MetricsInput = Pick<SimulationResult, 'tradeLog' | 'equityCurve' | 'finalPortfolioValue' | 'initialCash'>;

/**
 * Return of each SELL relative to the cost basis of the shares it sold
 */
export function roundTripReturns(tradeLog: readonly TradeLogEntry[]): number[] {
  const returns: number[] = [];
  for (const entry of tradeLog) {
    if (entry.action !== 'SELL' || entry.realizedPnl === null) {
      continue;
    }
    const cost = entry.shares * entry.averageCostBasis;
    if (cost > 0) {
      returns.push(entry.realizedPnl / cost);
    }
  }
  return returns;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Annualized mean/std ratio with population std, risk-free rate 0.
 * Zero when there are no returns or they do not vary.
 */
export function sharpeRatio(returns: readonly number[], periods: number = ANNUALIZATION_PERIODS): number {
  if (returns.length === 0) {
    return 0;
  }
  const avg = mean(returns);
  const variance = returns.reduce((sum, r) => sum + (r - avg) ** 2, 0) / returns.length;
  const std = Math.sqrt(variance);
  if (!(std > 0)) {
    return 0;
  }
  return (avg / std) * Math.sqrt(periods);
}

export function maxDrawdownPct(values: readonly number[]): number {
  let peak = -Infinity;
  let worst = 0;
  for (const value of values) {
    if (value > peak) {
      peak = value;
    }
    if (peak > 0) {
      worst = Math.max(worst, (peak - value) / peak);
    }
  }
  return worst * 100;
}

export function calculatePerformanceMetrics(
  result: MetricsInput,
  initialCash: number = result.initialCash
): PerformanceMetrics {
  const returns = roundTripReturns(result.tradeLog);
  const sells = result.tradeLog.filter((entry) => entry.action === 'SELL');
  const wins = sells.filter((entry) => (entry.realizedPnl ?? 0) > 0).length;

  return {
    totalReturnPct: (result.finalPortfolioValue / initialCash - 1) * 100,
    sharpeRatio: sharpeRatio(returns),
    maxDrawdownPct: maxDrawdownPct([initialCash, ...result.equityCurve.map((p) => p.portfolioValue)]),
    winRate: sells.length > 0 ? wins / sells.length : 0,
    numTrades: sells.length,
    roundTripReturns: returns,
  };
}
