/**
 * Simulation Errors
 * =================
 * Structural errors abort a run; trade rejection errors describe a single
 * signal the engine refused and never unwind the driver on their own.
 */

import { AppError, ValidationError } from '@tradesim/utils';
import type { RejectionCode, TradeRejection } from './types/trade.js';
import type { TradeAction } from './types/signal.js';
import { formatTimestamp } from './time.js';

export type DatasetName = 'signals' | 'candles' | 'trade_log';

export interface InvalidValue {
  /** Zero-based row index in the source table */
  row: number;
  column: string;
  value: unknown;
  reason: string;
}

const MAX_LISTED_VALUES = 5;

function describeValue(value: unknown): string {
  if (typeof value === 'string') {
    return `'${value}'`;
  }
  if (value === undefined) {
    return 'missing';
  }
  return String(value);
}

export function describeInvalidValues(values: readonly InvalidValue[]): string {
  const listed = values
    .slice(0, MAX_LISTED_VALUES)
    .map((v) => `row ${v.row} ${v.column}=${describeValue(v.value)} (${v.reason})`)
    .join('; ');
  const remaining = values.length - MAX_LISTED_VALUES;
  return remaining > 0 ? `${listed}; and ${remaining} more` : listed;
}

/**
 * Input table failed schema or value-domain checks. Raised before any
 * simulation starts.
 */
export class DatasetValidationError extends ValidationError {
  public readonly dataset: DatasetName;
  public readonly missingColumns: string[];
  public readonly invalidValues: InvalidValue[];

  constructor(
    dataset: DatasetName,
    message: string,
    details: { missingColumns?: string[]; invalidValues?: InvalidValue[] } = {}
  ) {
    const missingColumns = details.missingColumns ?? [];
    const invalidValues = details.invalidValues ?? [];
    super(
      message,
      { dataset, missingColumns, invalidValueCount: invalidValues.length },
      'DATASET_VALIDATION_ERROR'
    );
    this.dataset = dataset;
    this.missingColumns = missingColumns;
    this.invalidValues = invalidValues;
  }

  static missingColumns(dataset: DatasetName, label: string, columns: string[]): DatasetValidationError {
    return new DatasetValidationError(
      dataset,
      `${label} dataset is missing required columns: ${columns.join(', ')}`,
      { missingColumns: columns }
    );
  }

  static invalidValues(dataset: DatasetName, label: string, values: InvalidValue[]): DatasetValidationError {
    return new DatasetValidationError(
      dataset,
      `${label} dataset contains invalid values: ${describeInvalidValues(values)}`,
      { invalidValues: values }
    );
  }
}

/**
 * Produced trade log is structurally broken (missing columns, NaN cash or
 * portfolio value). Raised after the run, before results are returned.
 */
export class TradeLogIntegrityError extends AppError {
  public readonly missingColumns: string[];
  public readonly invalidValues: InvalidValue[];

  constructor(message: string, details: { missingColumns?: string[]; invalidValues?: InvalidValue[] } = {}) {
    const missingColumns = details.missingColumns ?? [];
    const invalidValues = details.invalidValues ?? [];
    super(
      message,
      'TRADE_LOG_INTEGRITY_ERROR',
      { missingColumns, invalidValueCount: invalidValues.length },
      false
    );
    this.missingColumns = missingColumns;
    this.invalidValues = invalidValues;
  }
}

/**
 * Simulation configuration failed validation
 */
export class SimulationConfigError extends ValidationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context, 'SIMULATION_CONFIG_ERROR');
  }
}

export interface RejectionDetails {
  code: RejectionCode;
  symbol: string;
  timestamp: number;
  /** Reason without the symbol/timestamp prefix */
  reason: string;
  action?: TradeAction;
}

export function formatRejectionMessage(
  action: TradeAction | undefined,
  symbol: string,
  timestamp: number,
  reason: string
): string {
  const subject = action ? `${action} ${symbol}` : symbol;
  return `${subject} at ${formatTimestamp(timestamp)} rejected: ${reason}`;
}

/**
 * A single signal could not be executed. Carries the rejection code and
 * the symbol/timestamp it applies to.
 */
export class TradeRejectionError extends AppError {
  public readonly rejectionCode: RejectionCode;
  public readonly symbol: string;
  public readonly timestamp: number;
  public readonly reason: string;
  public readonly action?: TradeAction;

  constructor(details: RejectionDetails) {
    super(
      formatRejectionMessage(details.action, details.symbol, details.timestamp, details.reason),
      details.code,
      { symbol: details.symbol, timestamp: details.timestamp, action: details.action }
    );
    this.rejectionCode = details.code;
    this.symbol = details.symbol;
    this.timestamp = details.timestamp;
    this.reason = details.reason;
    this.action = details.action;
  }

  /**
   * Convert to the rejection record the driver accumulates
   */
  toRejection(action: TradeAction): TradeRejection {
    return {
      code: this.rejectionCode,
      action,
      symbol: this.symbol,
      timestamp: this.timestamp,
      reason: this.reason,
      message: formatRejectionMessage(action, this.symbol, this.timestamp, this.reason),
    };
  }
}

export class PriceNotFoundError extends TradeRejectionError {
  constructor(symbol: string, timestamp: number, reason: string) {
    super({ code: 'PRICE_NOT_FOUND', symbol, timestamp, reason });
  }
}

export class InvalidPriceError extends TradeRejectionError {
  constructor(symbol: string, timestamp: number, reason: string) {
    super({ code: 'INVALID_PRICE', symbol, timestamp, reason });
  }
}

export class NegativePriceError extends TradeRejectionError {
  constructor(symbol: string, timestamp: number, reason: string) {
    super({ code: 'NEGATIVE_PRICE', symbol, timestamp, reason });
  }
}

/**
 * Wrap a rejection record as a throwable error with the same message
 */
export function rejectionToError(rejection: TradeRejection): TradeRejectionError {
  return new TradeRejectionError({
    code: rejection.code,
    symbol: rejection.symbol,
    timestamp: rejection.timestamp,
    action: rejection.action,
    reason: rejection.reason,
  });
}
