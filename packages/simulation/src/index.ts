/**
 * @tradesim/simulation - Trade Simulation Engine
 * ==============================================
 *
 * Replays strategy signals against historical candles with fee-aware,
 * long-only spot arithmetic.
 *
 * - **types/**: signals, price bars, trade log entries, results
 * - **validation/**: signal and candle tables in, trade log integrity out
 * - **pricing/**: price resolution across timeframes
 * - **position/**: positions and the per-run ledger
 * - **execution/**: BUY/SELL arithmetic and rejections
 * - **engine/**: the simulation driver
 * - **metrics/**: performance metrics and qualification scoring
 * - **strategy/**: strategy metadata
 *
 * ## Quick Start
 *
 * ```typescript
 * import { simulate, calculatePerformanceMetrics, scorePerformance } from '@tradesim/simulation';
 *
 * const result = simulate(signalRows, candleRows, 1000, 0.001);
 * const metrics = calculatePerformanceMetrics(result);
 * const score = scorePerformance(metrics);
 * ```
 */

export * from './types/index.js';
export * from './config.js';
export * from './errors.js';
export * from './time.js';
export * from './validation/index.js';

export { PriceResolver } from './pricing/price-resolver.js';
export type { ResolvedPrice, ResolveResult } from './pricing/price-resolver.js';

export * from './position/position.js';
export { Ledger } from './position/ledger.js';
export type { LedgerBuy, LedgerSell } from './position/ledger.js';

export { TradeExecutor } from './execution/trade-executor.js';
export type { TradeExecutorConfig } from './execution/trade-executor.js';

export { SimulationDriver, simulate } from './engine/simulation-driver.js';
export type { SimulateOptions, SimulationDriverDeps } from './engine/simulation-driver.js';

export * from './metrics/index.js';
export * from './strategy/metadata.js';
