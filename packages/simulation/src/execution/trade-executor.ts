/**
 * Trade Executor
 * ==============
 * Turns one BUY/SELL signal plus a resolved price into a trade log entry, or
 * a tagged rejection. Every numeric precondition is checked before the
 * ledger is touched; on rejection the ledger is exactly as it was.
 */

import type { Ledger } from '../position/ledger.js';
import type { TradeSignal } from '../types/signal.js';
import type { ExecutionResult, RejectionCode } from '../types/trade.js';
import { formatRejectionMessage } from '../errors.js';
import { logger } from '../logger.js';

export interface TradeExecutorConfig {
  /** Fraction of gross trade value charged per trade, 0..1 */
  feeRate: number;
}

function reject(signal: TradeSignal, code: RejectionCode, reason: string): ExecutionResult {
  return {
    ok: false,
    rejection: {
      code,
      action: signal.signal,
      symbol: signal.symbol,
      timestamp: signal.timestamp,
      reason,
      message: formatRejectionMessage(signal.signal, signal.symbol, signal.timestamp, reason),
    },
  };
}

export function insufficientFundsReason(required: number, available: number): string {
  return `insufficient funds: required ${required.toFixed(5)}, available ${available.toFixed(5)}`;
}

/**
 * Finite and non-negative; zero passes here and fails later on share count
 * or proceeds
 */
function checkPrice(signal: TradeSignal, price: number): ExecutionResult | null {
  if (!Number.isFinite(price)) {
    return reject(signal, 'INVALID_PRICE', `price ${price} is not a finite number`);
  }
  if (price < 0) {
    return reject(signal, 'NEGATIVE_PRICE', `price ${price} is negative`);
  }
  return null;
}

export class TradeExecutor {
  private readonly feeRate: number;

  constructor(config: TradeExecutorConfig) {
    this.feeRate = config.feeRate;
  }

  execute(signal: TradeSignal, ledger: Ledger, price: number): ExecutionResult {
    return signal.signal === 'BUY' ? this.buy(signal, ledger, price) : this.sell(signal, ledger, price);
  }

  private buy(signal: TradeSignal, ledger: Ledger, price: number): ExecutionResult {
    const { symbol, timestamp, positionSize } = signal;
    const cash = ledger.cash;

    if (positionSize === 0) {
      return reject(signal, 'ZERO_POSITION_SIZE', 'position size is zero');
    }
    if (!(cash > 0)) {
      return reject(signal, 'NO_CASH_AVAILABLE', 'no cash available');
    }

    const allocatedCash = cash * positionSize;
    if (!(allocatedCash > 0)) {
      return reject(signal, 'INVALID_ALLOCATION', `allocated cash ${allocatedCash} is zero or negative`);
    }

    const targetAmount = allocatedCash * (1 - this.feeRate);
    if (!(targetAmount > 0)) {
      return reject(signal, 'FEES_EXCEED_ALLOCATION', 'target amount after fees is zero or negative');
    }

    const priceRejection = checkPrice(signal, price);
    if (priceRejection) {
      return priceRejection;
    }

    const shares = targetAmount / price;
    if (!(shares > 0) || !Number.isFinite(shares)) {
      return reject(signal, 'INVALID_SHARE_COUNT', `share count ${shares} is not a positive finite number`);
    }

    const grossCost = shares * price;
    // Fee plus rounding residue, so that grossCost + fees == allocatedCash
    const fees = allocatedCash - grossCost;
    const totalCost = grossCost + fees;
    // Unreachable while totalCost == allocatedCash <= cash and both share counts are positive
    if (totalCost > cash) {
      return reject(signal, 'INSUFFICIENT_FUNDS', insufficientFundsReason(totalCost, cash));
    }

    const existing = ledger.getPosition(symbol);
    if (existing && existing.shares > 0 && !(existing.shares + shares > 0)) {
      return reject(signal, 'ZERO_TOTAL_SHARES', 'combined share count is zero');
    }

    const position = ledger.applyBuy({ symbol, timestamp, shares, price, totalCost });
    ledger.markPrice(symbol, price);

    logger.debug('BUY executed', { symbol, timestamp, shares, price, fees, cashAfter: ledger.cash });

    return {
      ok: true,
      entry: {
        timestamp,
        action: 'BUY',
        symbol,
        shares,
        price,
        fees,
        cashAfter: ledger.cash,
        portfolioValueAfter: ledger.portfolioValue(),
        averageCostBasis: position.averageCostBasis,
        realizedPnl: null,
      },
    };
  }

  private sell(signal: TradeSignal, ledger: Ledger, price: number): ExecutionResult {
    const { symbol, timestamp, positionSize } = signal;

    const position = ledger.getPosition(symbol);
    if (!position || !(position.shares > 0)) {
      return reject(signal, 'NO_POSITION', 'no position found');
    }

    const priceRejection = checkPrice(signal, price);
    if (priceRejection) {
      return priceRejection;
    }

    const sharesToSell = position.shares * positionSize;
    if (!(sharesToSell > 0)) {
      return reject(signal, 'INVALID_SHARE_COUNT', `shares to sell ${sharesToSell} is zero or negative`);
    }

    const grossProceeds = sharesToSell * price;
    if (!(grossProceeds > 0)) {
      return reject(signal, 'INVALID_GROSS_PROCEEDS', `gross proceeds ${grossProceeds} are zero or negative`);
    }

    const netProceeds = grossProceeds * (1 - this.feeRate);
    if (!(netProceeds > 0)) {
      return reject(signal, 'FEES_EXCEED_PROCEEDS', 'net proceeds after fees are zero or negative');
    }
    const fees = grossProceeds - netProceeds;

    const costBasis = position.averageCostBasis;
    if (costBasis === 0) {
      return reject(signal, 'ZERO_COST_BASIS', 'average cost basis is zero');
    }

    const realizedPnl = netProceeds - sharesToSell * costBasis;
    ledger.applySell({ symbol, shares: sharesToSell, netProceeds });
    ledger.markPrice(symbol, price);

    logger.debug('SELL executed', { symbol, timestamp, shares: sharesToSell, price, fees, realizedPnl });

    return {
      ok: true,
      entry: {
        timestamp,
        action: 'SELL',
        symbol,
        shares: sharesToSell,
        price,
        fees,
        cashAfter: ledger.cash,
        portfolioValueAfter: ledger.portfolioValue(),
        averageCostBasis: costBasis,
        realizedPnl,
      },
    };
  }
}
