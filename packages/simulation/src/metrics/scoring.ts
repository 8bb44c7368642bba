/**
 * Qualification Scoring
 * =====================
 * Profitability (45), Sharpe (35) and drawdown (20) points, plus the
 * per-component cut-offs a strategy must clear.
 */

import type { PerformanceMetrics } from './performance-metrics.js';

export const SCORE_WEIGHTS = {
  /** Points per percent of total return */
  profitabilityPerPct: 2.25,
  profitabilityMax: 45,
  /** Points per unit of Sharpe ratio */
  sharpePerUnit: 17.5,
  sharpeMax: 35,
  drawdownMax: 20,
} as const;

export const QUALIFICATION_THRESHOLDS = {
  profitability: 9,
  sharpe: 10,
  drawdown: 5,
  total: 50,
} as const;

export const SCORE_COMPONENTS = ['profitability', 'sharpe', 'drawdown', 'total'] as const;

export type ScoreComponent = (typeof SCORE_COMPONENTS)[number];

export interface PerformanceScore {
  profitability: number;
  sharpe: number;
  drawdown: number;
  total: number;
  qualifies: boolean;
  failedCriteria: ScoreComponent[];
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function scorePerformance(
  metrics: Pick<PerformanceMetrics, 'totalReturnPct' | 'sharpeRatio' | 'maxDrawdownPct'>
): PerformanceScore {
  const profitability = clamp(
    metrics.totalReturnPct * SCORE_WEIGHTS.profitabilityPerPct,
    0,
    SCORE_WEIGHTS.profitabilityMax
  );
  const sharpe = clamp(metrics.sharpeRatio * SCORE_WEIGHTS.sharpePerUnit, 0, SCORE_WEIGHTS.sharpeMax);
  const drawdown = Math.max(0, SCORE_WEIGHTS.drawdownMax - metrics.maxDrawdownPct);
  const total = profitability + sharpe + drawdown;

  const components: Record<ScoreComponent, number> = { profitability, sharpe, drawdown, total };
  const failedCriteria = SCORE_COMPONENTS.filter(
    (key) => components[key] < QUALIFICATION_THRESHOLDS[key]
  );

  return { profitability, sharpe, drawdown, total, qualifies: failedCriteria.length === 0, failedCriteria };
}
