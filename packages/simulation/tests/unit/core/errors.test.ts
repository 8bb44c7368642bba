import { describe, it, expect } from 'vitest';
import { AppError, ValidationError, withContextLabel } from '@tradesim/utils';
import {
  DatasetValidationError,
  NegativePriceError,
  TradeLogIntegrityError,
  TradeRejectionError,
  describeInvalidValues,
  formatRejectionMessage,
  rejectionToError,
} from '../../../src/errors.js';
import { insufficientFundsReason } from '../../../src/execution/trade-executor.js';

const T0 = Date.UTC(2024, 0, 1);

describe('simulation errors', () => {
  it('lists at most five invalid values', () => {
    const values = Array.from({ length: 7 }, (_, row) => ({
      row,
      column: 'signal',
      value: 'X',
      reason: 'bad',
    }));

    expect(describeInvalidValues(values)).toBe(
      "row 0 signal='X' (bad); row 1 signal='X' (bad); row 2 signal='X' (bad); " +
        "row 3 signal='X' (bad); row 4 signal='X' (bad); and 2 more"
    );
  });

  it('shows missing cells as missing', () => {
    expect(describeInvalidValues([{ row: 3, column: 'symbol', value: undefined, reason: 'symbol is required' }])).toBe(
      'row 3 symbol=missing (symbol is required)'
    );
  });

  it('derives dataset errors from ValidationError', () => {
    const error = DatasetValidationError.missingColumns('candles', 'Candles', ['timestamp']);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.context).toEqual({ dataset: 'candles', missingColumns: ['timestamp'], invalidValueCount: 0 });
  });

  it('names action, symbol and timestamp in rejection messages', () => {
    expect(formatRejectionMessage('BUY', 'LDO', T0, 'no cash available')).toBe(
      'BUY LDO at 2024-01-01T00:00:00.000Z rejected: no cash available'
    );
    expect(formatRejectionMessage(undefined, 'LDO', T0, 'no cash available')).toBe(
      'LDO at 2024-01-01T00:00:00.000Z rejected: no cash available'
    );
  });

  it('shows insufficient-funds amounts with five decimals', () => {
    expect(formatRejectionMessage('BUY', 'LDO', T0, insufficientFundsReason(1000.25, 999.5))).toBe(
      'BUY LDO at 2024-01-01T00:00:00.000Z rejected: insufficient funds: required 1000.25000, available 999.50000'
    );
    expect(insufficientFundsReason(1 / 3, 0)).toBe('insufficient funds: required 0.33333, available 0.00000');
  });

  it('round-trips a rejection record through an error', () => {
    const error = rejectionToError({
      code: 'INSUFFICIENT_FUNDS',
      action: 'BUY',
      symbol: 'LDO',
      timestamp: T0,
      reason: 'insufficient funds: required 10.00000, available 5.00000',
      message: 'ignored',
    });

    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe('INSUFFICIENT_FUNDS');
    expect(error.message).toBe(
      'BUY LDO at 2024-01-01T00:00:00.000Z rejected: insufficient funds: required 10.00000, available 5.00000'
    );
  });

  it('tags price errors with their rejection code', () => {
    const error = new NegativePriceError('LDO', T0, 'price -1 is negative');

    expect(error).toBeInstanceOf(TradeRejectionError);
    expect(error.rejectionCode).toBe('NEGATIVE_PRICE');
    expect(error.toRejection('SELL').message).toBe(
      'SELL LDO at 2024-01-01T00:00:00.000Z rejected: price -1 is negative'
    );
  });

  describe('labelled with a submission id', () => {
    it('stays a DatasetValidationError with its columns', () => {
      const labelled = withContextLabel(
        DatasetValidationError.missingColumns('signals', 'Signals', ['position_size']),
        'submission: s1'
      );

      expect(labelled).toBeInstanceOf(DatasetValidationError);
      expect(labelled.message).toBe('Signals dataset is missing required columns: position_size [submission: s1]');
      expect(labelled).toMatchObject({ dataset: 'signals', missingColumns: ['position_size'] });
    });

    it('stays a non-operational TradeLogIntegrityError', () => {
      const original = new TradeLogIntegrityError('Trade log contains invalid values: row 0', {
        invalidValues: [{ row: 0, column: 'cash', value: Number.NaN, reason: 'cash must be finite' }],
      });
      const labelled = withContextLabel(original, 'submission: s1');

      expect(labelled).toBeInstanceOf(TradeLogIntegrityError);
      expect(labelled.name).toBe('TradeLogIntegrityError');
      expect(labelled).toMatchObject({ isOperational: false, code: 'TRADE_LOG_INTEGRITY_ERROR' });
      expect(labelled.cause).toBe(original);
    });
  });
});
