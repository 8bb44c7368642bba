/**
 * Output Formatter - JSON and table formats
 */

import type { OutputFormat } from '../command-defs/simulation.js';

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'number') {
    // Keep long float tails out of the table
    return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(6)));
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Format output as a simple table
 */
export function formatTable(data: readonly unknown[], columns?: readonly string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const first = data[0];
  const detectedColumns = columns ?? (isRecord(first) ? Object.keys(first) : []);
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const cells = data.map((row) =>
    detectedColumns.map((col) => (isRecord(row) ? valueToString(row[col]) : ''))
  );
  const widths = detectedColumns.map((col, i) =>
    Math.max(col.length, ...cells.map((rowCells) => (rowCells[i] ?? '').length))
  );

  const lines: string[] = [];
  lines.push(detectedColumns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-|-'));
  for (const rowCells of cells) {
    lines.push(rowCells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(' | '));
  }

  return lines.map((line) => line.trimEnd()).join('\n');
}

/**
 * Format output based on format type. Tables take an array of rows; a single
 * object is shown as one row.
 */
export function formatOutput(data: unknown, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJSON(data);
    case 'table':
      if (Array.isArray(data)) {
        return formatTable(data);
      }
      return isRecord(data) ? formatTable([data]) : formatJSON(data);
    default:
      return formatJSON(data);
  }
}
