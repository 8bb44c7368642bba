/**
 * Simulation Driver
 * =================
 * Replays signals in timestamp order against one ledger.
 *
 * Row-level rejections are logged and collected, never thrown (unless
 * `failOnRejection` is set). Structural problems (invalid datasets, a broken
 * trade log) abort the run.
 */

import { LogHelpers } from '@tradesim/utils';
import type { Logger } from '@tradesim/utils';
import { parseSimulationConfig } from '../config.js';
import type { SimulationConfig, SimulationConfigInput } from '../config.js';
import { rejectionToError } from '../errors.js';
import { TradeExecutor } from '../execution/trade-executor.js';
import { logger as packageLogger } from '../logger.js';
import { Ledger } from '../position/ledger.js';
import { PriceResolver } from '../pricing/price-resolver.js';
import type { PriceBar } from '../types/candle.js';
import type { SimulationResult, SimulationSummary } from '../types/results.js';
import type { Signal } from '../types/signal.js';
import type { EquityPoint, TradeLogEntry, TradeRejection } from '../types/trade.js';
import { validateCandles } from '../validation/candleValidation.js';
import { validateSignals } from '../validation/signalValidation.js';
import { assertTradeLogIntegrity, toTradeLogTable } from '../validation/tradeLogIntegrity.js';
import type { DatasetRow, TabularDataset } from '../validation/dataset.js';

export interface SimulationDriverDeps {
  executor?: TradeExecutor;
  logger?: Logger;
}

function emptySummary(): SimulationSummary {
  return { processedSignals: 0, executedBuys: 0, executedSells: 0, holds: 0, rejected: 0, rejectionsByCode: {} };
}

export class SimulationDriver {
  readonly config: SimulationConfig;
  private readonly executor: TradeExecutor;
  private readonly logger: Logger;

  constructor(config: SimulationConfigInput, deps: SimulationDriverDeps = {}) {
    this.config = parseSimulationConfig(config);
    this.executor = deps.executor ?? new TradeExecutor({ feeRate: this.config.feeRate });
    this.logger = deps.logger ?? packageLogger;
  }

  /**
   * Run validated signals against normalized price bars. Each call uses a
   * fresh ledger.
   */
  simulate(signals: readonly Signal[], bars: readonly PriceBar[]): SimulationResult {
    const startedAt = Date.now();
    const resolver = new PriceResolver(bars, this.config);
    const ledger = new Ledger(this.config.initialCash);

    const tradeLog: TradeLogEntry[] = [];
    const equityCurve: EquityPoint[] = [];
    const rejections: TradeRejection[] = [];
    const summary = emptySummary();

    const record = (rejection: TradeRejection): void => {
      rejections.push(rejection);
      summary.rejected++;
      summary.rejectionsByCode[rejection.code] = (summary.rejectionsByCode[rejection.code] ?? 0) + 1;
      this.logger.warn('Signal rejected', {
        code: rejection.code,
        symbol: rejection.symbol,
        timestamp: rejection.timestamp,
        reason: rejection.reason,
      });
      if (this.config.failOnRejection) {
        throw rejectionToError(rejection);
      }
    };

    // Array.prototype.sort is stable: same-timestamp rows keep input order
    const ordered = [...signals].sort((a, b) => a.timestamp - b.timestamp);

    for (const signal of ordered) {
      summary.processedSignals++;
      const resolution = resolver.tryResolve(signal.symbol, signal.timestamp);
      if (resolution.ok) {
        ledger.markPrice(signal.symbol, resolution.resolved.price);
      }

      if (signal.signal === 'HOLD') {
        summary.holds++;
        if (!resolution.ok) {
          this.logger.debug('No price for HOLD row', {
            symbol: signal.symbol,
            timestamp: signal.timestamp,
            reason: resolution.error.reason,
          });
        }
      } else if (!resolution.ok) {
        record(resolution.error.toRejection(signal.signal));
      } else {
        const result = this.executor.execute(signal, ledger, resolution.resolved.price);
        if (result.ok) {
          tradeLog.push(result.entry);
          if (result.entry.action === 'BUY') {
            summary.executedBuys++;
          } else {
            summary.executedSells++;
          }
        } else {
          record(result.rejection);
        }
      }

      equityCurve.push({
        timestamp: signal.timestamp,
        cash: ledger.cash,
        portfolioValue: ledger.portfolioValue(),
      });
    }

    assertTradeLogIntegrity(toTradeLogTable(tradeLog));

    const result: SimulationResult = {
      tradeLog,
      equityCurve,
      rejections,
      initialCash: this.config.initialCash,
      finalCash: ledger.cash,
      finalPortfolioValue: ledger.portfolioValue(),
      openPositions: ledger.snapshot(),
      summary,
    };

    LogHelpers.performance(this.logger, 'simulation.run', Date.now() - startedAt, {
      signals: summary.processedSignals,
    });
    this.logger.info('Simulation completed', {
      processedSignals: summary.processedSignals,
      executedBuys: summary.executedBuys,
      executedSells: summary.executedSells,
      rejected: summary.rejected,
      finalPortfolioValue: result.finalPortfolioValue,
    });

    return result;
  }
}

export type SimulateOptions = Omit<SimulationConfigInput, 'initialCash' | 'feeRate'> & SimulationDriverDeps;

/**
 * Validate raw signal and candle tables, then run one simulation
 */
export function simulate(
  signals: TabularDataset | readonly DatasetRow[],
  candles: TabularDataset | readonly DatasetRow[],
  initialCash: number,
  feeRate: number,
  options: SimulateOptions = {}
): SimulationResult {
  const { executor, logger, ...config } = options;
  const driver = new SimulationDriver({ ...config, initialCash, feeRate }, { executor, logger });

  const validSignals = validateSignals(signals);
  const { bars } = validateCandles(candles, {
    primaryTimeframe: driver.config.primaryTimeframe,
    symbolTimeframes: driver.config.symbolTimeframes,
  });

  return driver.simulate(validSignals, bars);
}
