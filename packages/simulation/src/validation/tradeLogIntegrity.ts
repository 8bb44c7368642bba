/**
 * Trade Log Integrity
 *
 * Post-run structural check of the tabular trade log. A log that fails here
 * means the engine produced something it should not have; the run is
 * aborted rather than scored.
 */

import type { TradeLogEntry } from '../types/trade.js';
import { TradeLogIntegrityError, describeInvalidValues } from '../errors.js';
import type { InvalidValue } from '../errors.js';
import { formatTimestamp } from '../time.js';
import { findMissingColumns, readNumericCell, toDataset } from './dataset.js';
import type { DatasetRow, TabularDataset } from './dataset.js';

export const TRADE_LOG_COLUMNS = [
  'timestamp',
  'action',
  'symbol',
  'shares',
  'price',
  'fees',
  'cash',
  'portfolio_value',
  'average_cost_basis',
  'realized_pnl',
] as const;

export const REQUIRED_TRADE_LOG_COLUMNS = ['timestamp', 'action', 'symbol', 'cash', 'portfolio_value'] as const;

const FINITE_COLUMNS = ['cash', 'portfolio_value'] as const;

export interface TradeLogRow extends DatasetRow {
  timestamp: string;
  action: string;
  symbol: string;
  shares: number;
  price: number;
  fees: number;
  cash: number;
  portfolio_value: number;
  average_cost_basis: number;
  realized_pnl: number | null;
}

export interface TradeLogIntegrityReport {
  valid: boolean;
  missingColumns: string[];
  invalidValues: InvalidValue[];
}

export function toTradeLogRow(entry: TradeLogEntry): TradeLogRow {
  return {
    timestamp: formatTimestamp(entry.timestamp),
    action: entry.action,
    symbol: entry.symbol,
    shares: entry.shares,
    price: entry.price,
    fees: entry.fees,
    cash: entry.cashAfter,
    portfolio_value: entry.portfolioValueAfter,
    average_cost_basis: entry.averageCostBasis,
    realized_pnl: entry.realizedPnl,
  };
}

/**
 * Tabular form of a trade log; keeps the header when the log is empty
 */
export function toTradeLogTable(entries: readonly TradeLogEntry[]): TabularDataset {
  return { columns: TRADE_LOG_COLUMNS, rows: entries.map(toTradeLogRow) };
}

export function validateTradeLogTable(input: TabularDataset | readonly DatasetRow[]): TradeLogIntegrityReport {
  const dataset = toDataset(input);

  // Column-less empty input carries no header to check
  if (dataset.rows.length === 0 && dataset.columns.length === 0) {
    return { valid: true, missingColumns: [], invalidValues: [] };
  }

  const missingColumns = findMissingColumns(dataset, REQUIRED_TRADE_LOG_COLUMNS);
  if (missingColumns.length > 0) {
    return { valid: false, missingColumns, invalidValues: [] };
  }

  const invalidValues: InvalidValue[] = [];
  dataset.rows.forEach((row, index) => {
    for (const column of FINITE_COLUMNS) {
      const value = readNumericCell(row[column]);
      if (value === null || !Number.isFinite(value)) {
        invalidValues.push({ row: index, column, value: row[column], reason: `${column} must be finite` });
      }
    }
    if (row.action !== 'BUY' && row.action !== 'SELL') {
      invalidValues.push({ row: index, column: 'action', value: row.action, reason: 'action must be BUY or SELL' });
    }
  });

  return { valid: invalidValues.length === 0, missingColumns: [], invalidValues };
}

/**
 * Throw TradeLogIntegrityError when the trade log is structurally broken
 */
export function assertTradeLogIntegrity(input: TabularDataset | readonly DatasetRow[]): void {
  const report = validateTradeLogTable(input);
  if (report.missingColumns.length > 0) {
    throw new TradeLogIntegrityError(
      `Trade log is missing required columns: ${report.missingColumns.join(', ')}`,
      { missingColumns: report.missingColumns }
    );
  }
  if (report.invalidValues.length > 0) {
    throw new TradeLogIntegrityError(
      `Trade log contains invalid values: ${describeInvalidValues(report.invalidValues)}`,
      { invalidValues: report.invalidValues }
    );
  }
}
