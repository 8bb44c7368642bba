/**
 * Timestamp parsing and formatting
 *
 * All engine timestamps are UTC epoch milliseconds. Input tables may carry
 * epoch milliseconds, ISO 8601 strings or SQL-style datetimes
 * ('2024-01-01 04:00:00'), which is what most dataframe exports produce.
 */

import { DateTime } from 'luxon';

const EPOCH_DIGITS = /^-?\d+$/;

/**
 * Parse a cell into epoch milliseconds, or null when it is not a date
 */
export function parseTimestamp(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (value instanceof Date) {
    const ms = value.getTime();
    return Number.isNaN(ms) ? null : ms;
  }

  if (DateTime.isDateTime(value)) {
    return value.isValid ? value.toMillis() : null;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed === '') {
    return null;
  }

  if (EPOCH_DIGITS.test(trimmed)) {
    return Number(trimmed);
  }

  const iso = DateTime.fromISO(trimmed, { zone: 'utc' });
  if (iso.isValid) {
    return iso.toMillis();
  }

  const sql = DateTime.fromSQL(trimmed, { zone: 'utc' });
  if (sql.isValid) {
    return sql.toMillis();
  }

  return null;
}

/**
 * Format epoch milliseconds as an ISO 8601 UTC string
 */
export function formatTimestamp(timestamp: number): string {
  return DateTime.fromMillis(timestamp, { zone: 'utc' }).toISO() ?? String(timestamp);
}
