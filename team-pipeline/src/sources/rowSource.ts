import type { RawRow, RowBatch } from '../types/Member.js';

export interface RowSource {
  /** Human-readable origin for log lines. */
  readonly description: string;
  readRows(): Promise<RowBatch>;
}

function cellText(cell: unknown): string {
  if (cell === null || cell === undefined) return '';
  return String(cell);
}

/**
 * Turn a header-first value grid into raw rows. Blank rows are dropped;
 * row numbers match the sheet (header = 1).
 */
export function toRowBatch(values: unknown[][]): RowBatch {
  const [headerRow, ...body] = values;
  if (!headerRow) return { headers: [], rows: [] };

  const headers = headerRow.map(cellText);
  const rows: RawRow[] = [];

  body.forEach((line, idx) => {
    const texts = line.map(cellText);
    if (texts.every((t) => t.trim() === '')) return;

    const cells: Record<string, string> = {};
    headers.forEach((header, col) => {
      cells[header] = texts[col] ?? '';
    });
    rows.push({ rowNumber: idx + 2, cells });
  });

  return { headers, rows };
}
