/**
 * Candle Dataset Validation
 *
 * Normalizes a candle table into price bars. Two layouts are accepted:
 * long rows (`timestamp, symbol, timeframe?, close`) and wide rows with one
 * `close_{SYMBOL}_{TIMEFRAME}` column per series.
 *
 * Unparseable timestamps, unknown timeframes and duplicate bars are fatal.
 * A close that is present but not a number is kept as NaN and reported as a
 * quality issue, so the trade that needs it is rejected rather than the run.
 */

import { z } from 'zod';
import { TIMEFRAMES, isTimeframe } from '../types/candle.js';
import type { CandleLayout, PriceBar, Timeframe } from '../types/candle.js';
import { DatasetValidationError } from '../errors.js';
import type { InvalidValue } from '../errors.js';
import { findMissingColumns, isBlankCell, readNumericCell, toDataset } from './dataset.js';
import type { DatasetRow, TabularDataset } from './dataset.js';
import { SymbolCellSchema, TimestampCellSchema, collectRowIssues } from './signalValidation.js';

const WIDE_CLOSE_COLUMN = new RegExp(`^close_(.+)_(${TIMEFRAMES.join('|')})$`);

export interface CandleValidationOptions {
  /** Timeframe for long rows without a timeframe cell */
  primaryTimeframe?: Timeframe;
  /** Per-symbol override of the above */
  symbolTimeframes?: Readonly<Record<string, Timeframe>>;
}

export interface CandleQualityIssue {
  row: number;
  symbol: string;
  timeframe: Timeframe;
  timestamp: number;
  value: unknown;
}

export interface NormalizedCandles {
  layout: CandleLayout;
  bars: PriceBar[];
  /** Symbols in first-seen order */
  symbols: string[];
  qualityIssues: CandleQualityIssue[];
}

interface WideColumn {
  column: string;
  symbol: string;
  timeframe: Timeframe;
}

const LongCandleRowSchema = z.object({
  timestamp: TimestampCellSchema,
  symbol: SymbolCellSchema,
  timeframe: z
    .unknown()
    .transform((value, ctx): Timeframe | undefined => {
      if (isBlankCell(value)) {
        return undefined;
      }
      const trimmed = typeof value === 'string' ? value.trim() : value;
      if (!isTimeframe(trimmed)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `timeframe must be one of ${TIMEFRAMES.join(', ')}`,
        });
        return z.NEVER;
      }
      return trimmed;
    }),
  close: z.unknown(),
});

/**
 * Find `close_{SYMBOL}_{TIMEFRAME}` columns. Symbols may contain underscores;
 * the timeframe suffix is matched greedily from the right.
 */
export function parseWideColumns(columns: readonly string[]): WideColumn[] {
  const result: WideColumn[] = [];
  for (const column of columns) {
    const match = WIDE_CLOSE_COLUMN.exec(column);
    const symbol = match?.[1];
    const timeframe = match?.[2];
    if (symbol && isTimeframe(timeframe)) {
      result.push({ column, symbol, timeframe });
    }
  }
  return result;
}

export function detectCandleLayout(dataset: TabularDataset): CandleLayout | null {
  if (findMissingColumns(dataset, ['symbol', 'close']).length === 0) {
    return 'long';
  }
  return parseWideColumns(dataset.columns).length > 0 ? 'wide' : null;
}

class BarCollector {
  readonly bars: PriceBar[] = [];
  readonly symbols: string[] = [];
  readonly qualityIssues: CandleQualityIssue[] = [];
  readonly invalid: InvalidValue[] = [];
  private readonly seen = new Set<string>();
  private readonly knownSymbols = new Set<string>();

  add(row: number, column: string, symbol: string, timeframe: Timeframe, timestamp: number, raw: unknown): void {
    const key = `${symbol}|${timeframe}|${timestamp}`;
    if (this.seen.has(key)) {
      this.invalid.push({
        row,
        column,
        value: raw,
        reason: `duplicate candle for ${symbol} ${timeframe}`,
      });
      return;
    }
    this.seen.add(key);

    if (!this.knownSymbols.has(symbol)) {
      this.knownSymbols.add(symbol);
      this.symbols.push(symbol);
    }

    const close = readNumericCell(raw);
    if (close === null || !Number.isFinite(close)) {
      this.qualityIssues.push({ row, symbol, timeframe, timestamp, value: raw });
    }
    this.bars.push({ timestamp, symbol, timeframe, close: close ?? Number.NaN });
  }
}

function collectLong(dataset: TabularDataset, options: CandleValidationOptions, collector: BarCollector): void {
  const primary = options.primaryTimeframe ?? '1H';
  dataset.rows.forEach((row, index) => {
    const parsed = LongCandleRowSchema.safeParse(row);
    if (!parsed.success) {
      collector.invalid.push(...collectRowIssues(row, index, parsed.error));
      return;
    }
    const { timestamp, symbol, timeframe } = parsed.data;
    const resolvedTimeframe = timeframe ?? options.symbolTimeframes?.[symbol] ?? primary;
    collector.add(index, 'close', symbol, resolvedTimeframe, timestamp, parsed.data.close);
  });
}

function collectWide(dataset: TabularDataset, collector: BarCollector): void {
  const wideColumns = parseWideColumns(dataset.columns);
  dataset.rows.forEach((row, index) => {
    const parsed = TimestampCellSchema.safeParse(row.timestamp);
    if (!parsed.success) {
      collector.invalid.push({
        row: index,
        column: 'timestamp',
        value: row.timestamp,
        reason: 'timestamp is not a valid date',
      });
      return;
    }
    for (const { column, symbol, timeframe } of wideColumns) {
      const raw = row[column];
      // Blank cell: that series has no candle at this timestamp
      if (isBlankCell(raw)) {
        continue;
      }
      collector.add(index, column, symbol, timeframe, parsed.data, raw);
    }
  });
}

/**
 * Validate a candle table and normalize it into price bars
 */
export function validateCandles(
  input: TabularDataset | readonly DatasetRow[],
  options: CandleValidationOptions = {}
): NormalizedCandles {
  const dataset = toDataset(input);

  const missing = findMissingColumns(dataset, ['timestamp']);
  if (missing.length > 0) {
    throw DatasetValidationError.missingColumns('candles', 'Candles', missing);
  }

  const layout = detectCandleLayout(dataset);
  if (layout === null) {
    throw new DatasetValidationError(
      'candles',
      "Candles dataset has no price columns: expected 'symbol' and 'close' (long layout) or close_{SYMBOL}_{TIMEFRAME} columns (wide layout)",
      { missingColumns: ['close'] }
    );
  }

  const collector = new BarCollector();
  if (layout === 'long') {
    collectLong(dataset, options, collector);
  } else {
    collectWide(dataset, collector);
  }

  if (collector.invalid.length > 0) {
    throw DatasetValidationError.invalidValues('candles', 'Candles', collector.invalid);
  }

  return {
    layout,
    bars: collector.bars,
    symbols: collector.symbols,
    qualityIssues: collector.qualityIssues,
  };
}
