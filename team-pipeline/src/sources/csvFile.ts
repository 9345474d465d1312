/**
 * Roster rows from a CSV export of the sheet ("File → Download → CSV").
 *
 * Handles quoted commas, multiline answers and a leading BOM, which form
 * exports produce routinely.
 */

import { existsSync, readFileSync } from 'fs';
import { parse } from 'csv-parse/sync';
import { ConfigurationError } from '../utils/errors.js';
import { toRowBatch, type RowSource } from './rowSource.js';
import type { RowBatch } from '../types/Member.js';

export function parseRosterCsv(content: string): RowBatch {
  const values: string[][] = parse(content, {
    bom: true,
    relax_column_count: true,
  });
  return toRowBatch(values);
}

export class CsvFileSource implements RowSource {
  readonly description: string;

  constructor(private readonly filePath: string) {
    this.description = `CSV export ${filePath}`;
  }

  async readRows(): Promise<RowBatch> {
    if (!existsSync(this.filePath)) {
      throw new ConfigurationError(`CSV file not found: ${this.filePath}`);
    }
    return parseRosterCsv(readFileSync(this.filePath, 'utf-8'));
  }
}
