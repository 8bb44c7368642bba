/**
 * Dataset Loader
 *
 * Reads CSV tables and JSON documents from disk and writes the trade log.
 * Handlers depend on the DatasetStore interface so tests can hand them
 * in-memory tables.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '@tradesim/utils';
import type { DatasetRow, TabularDataset } from '@tradesim/simulation';

export interface DatasetStore {
  readTable(filePath: string): Promise<TabularDataset>;
  readJson(filePath: string): Promise<unknown>;
  writeTable(filePath: string, table: TabularDataset): Promise<void>;
}

const CsvRecordsSchema = z.array(z.array(z.string()));

/**
 * Parse CSV text into a dataset. The header row is kept even when the file
 * has no data rows; blank cells stay as empty strings.
 */
export function parseCsvTable(content: string, source = 'CSV input'): TabularDataset {
  let records: unknown;
  try {
    records = parse(content, { bom: true, skip_empty_lines: true, trim: true });
  } catch (error) {
    throw new ValidationError(
      `Could not parse ${source}: ${error instanceof Error ? error.message : String(error)}`,
      { source }
    );
  }

  const parsed = CsvRecordsSchema.safeParse(records);
  if (!parsed.success) {
    throw new ValidationError(`Could not parse ${source}: unexpected record shape`, { source });
  }

  const [header = [], ...body] = parsed.data;
  const rows: DatasetRow[] = body.map((cells) =>
    Object.fromEntries(header.map((column, i) => [column, cells[i] ?? '']))
  );
  return { columns: header, rows };
}

export function stringifyCsvTable(table: TabularDataset): string {
  return stringify([...table.rows], { header: true, columns: [...table.columns] });
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileDatasetStore implements DatasetStore {
  constructor(private readonly baseDir: string = process.cwd()) {}

  private resolve(filePath: string): string {
    return path.isAbsolute(filePath) ? filePath : path.join(this.baseDir, filePath);
  }

  private async readText(filePath: string): Promise<string> {
    try {
      return await fs.readFile(this.resolve(filePath), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError('File', filePath);
      }
      throw error;
    }
  }

  async readTable(filePath: string): Promise<TabularDataset> {
    return parseCsvTable(await this.readText(filePath), filePath);
  }

  async readJson(filePath: string): Promise<unknown> {
    const text = await this.readText(filePath);
    try {
      const value: unknown = JSON.parse(text);
      return value;
    } catch (error) {
      throw new ValidationError(
        `Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        { filePath }
      );
    }
  }

  async writeTable(filePath: string, table: TabularDataset): Promise<void> {
    const target = this.resolve(filePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, stringifyCsvTable(table), 'utf-8');
  }
}
