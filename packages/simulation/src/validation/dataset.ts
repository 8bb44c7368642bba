/**
 * Tabular Datasets
 *
 * Raw tables as they arrive at the engine boundary (parsed CSV, dataframe
 * exports). Columns are explicit so that an empty table still carries its
 * header.
 */

export type DatasetRow = Readonly<Record<string, unknown>>;

export interface TabularDataset {
  columns: readonly string[];
  rows: readonly DatasetRow[];
}

/**
 * Build a dataset from records; columns are the union of keys in first-seen order
 */
export function fromRecords(rows: readonly DatasetRow[]): TabularDataset {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return { columns, rows };
}

export function toDataset(input: TabularDataset | readonly DatasetRow[]): TabularDataset {
  return isTabularDataset(input) ? input : fromRecords(input);
}

function isTabularDataset(input: TabularDataset | readonly DatasetRow[]): input is TabularDataset {
  return !Array.isArray(input);
}

export function findMissingColumns(dataset: TabularDataset, required: readonly string[]): string[] {
  const present = new Set(dataset.columns);
  return required.filter((column) => !present.has(column));
}

/**
 * Read a numeric cell. Numeric strings are accepted since CSV cells arrive
 * as text; blank cells are null.
 */
export function readNumericCell(value: unknown): number | null {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : Number(trimmed);
  }
  return null;
}

export function isBlankCell(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}
