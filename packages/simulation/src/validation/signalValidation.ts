/**
 * Signal Dataset Validation
 *
 * Checks the strategy's signal table once at the boundary and converts it to
 * typed signals. Any missing column or out-of-domain value aborts the run
 * before simulation starts.
 */

import { z } from 'zod';
import { SIGNAL_ACTIONS } from '../types/signal.js';
import type { Signal } from '../types/signal.js';
import { DatasetValidationError } from '../errors.js';
import type { InvalidValue } from '../errors.js';
import { parseTimestamp } from '../time.js';
import { findMissingColumns, readNumericCell, toDataset } from './dataset.js';
import type { DatasetRow, TabularDataset } from './dataset.js';

export const REQUIRED_SIGNAL_COLUMNS = ['timestamp', 'symbol', 'signal', 'position_size'] as const;

export const TimestampCellSchema = z.unknown().transform((value, ctx) => {
  const timestamp = parseTimestamp(value);
  if (timestamp === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'timestamp is not a valid date' });
    return z.NEVER;
  }
  return timestamp;
});

export const SymbolCellSchema = z
  .string({
    required_error: 'symbol is required',
    invalid_type_error: 'symbol must be a string',
  })
  .trim()
  .min(1, 'symbol must not be empty');

const PositionSizeCellSchema = z.preprocess(
  readNumericCell,
  z
    .number({
      required_error: 'position_size is required',
      invalid_type_error: 'position_size must be a number',
    })
    .min(0, 'position_size must be between 0.0 and 1.0')
    .max(1, 'position_size must be between 0.0 and 1.0')
);

export const SignalRowSchema = z.object({
  timestamp: TimestampCellSchema,
  symbol: SymbolCellSchema,
  signal: z.enum(SIGNAL_ACTIONS, {
    errorMap: () => ({ message: `signal must be one of ${SIGNAL_ACTIONS.join(', ')}` }),
  }),
  position_size: PositionSizeCellSchema,
});

/**
 * Collect zod issues of one row as invalid values
 */
export function collectRowIssues(row: DatasetRow, rowIndex: number, error: z.ZodError): InvalidValue[] {
  return error.issues.map((issue) => {
    const column = String(issue.path[0] ?? '');
    return { row: rowIndex, column, value: row[column], reason: issue.message };
  });
}

/**
 * Validate a signals table and return typed signals in input order
 */
export function validateSignals(input: TabularDataset | readonly DatasetRow[]): Signal[] {
  const dataset = toDataset(input);

  const missing = findMissingColumns(dataset, REQUIRED_SIGNAL_COLUMNS);
  if (missing.length > 0) {
    throw DatasetValidationError.missingColumns('signals', 'Signals', missing);
  }

  const signals: Signal[] = [];
  const invalid: InvalidValue[] = [];

  dataset.rows.forEach((row, index) => {
    const parsed = SignalRowSchema.safeParse(row);
    if (!parsed.success) {
      invalid.push(...collectRowIssues(row, index, parsed.error));
      return;
    }

    const { timestamp, symbol, signal, position_size: positionSize } = parsed.data;
    signals.push({ timestamp, symbol, signal, positionSize });
  });

  if (invalid.length > 0) {
    throw DatasetValidationError.invalidValues('signals', 'Signals', invalid);
  }

  return signals;
}
