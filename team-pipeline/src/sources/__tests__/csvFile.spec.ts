import { writeFileSync } from 'fs';
import { join } from 'path';
import { describe, it, expect } from 'vitest';
import { CsvFileSource, parseRosterCsv } from '../csvFile.js';
import { toRowBatch } from '../rowSource.js';
import { ConfigurationError } from '../../utils/errors.js';
import { tempDir } from '../../__tests__/helpers.js';

const EXPORT = '\uFEFFFull Name,Committee,Short bio\n"Lee, A",Board,"Line one\nLine two"\n\nB Kim,Program\n';

describe('parseRosterCsv', () => {
  it('reads form exports with quoting, multiline answers and a BOM', () => {
    const batch = parseRosterCsv(EXPORT);

    expect(batch.headers).toEqual(['Full Name', 'Committee', 'Short bio']);
    expect(batch.rows).toEqual([
      { rowNumber: 2, cells: { 'Full Name': 'Lee, A', Committee: 'Board', 'Short bio': 'Line one\nLine two' } },
      { rowNumber: 4, cells: { 'Full Name': 'B Kim', Committee: 'Program', 'Short bio': '' } },
    ]);
  });
});

describe('toRowBatch', () => {
  it('stringifies cells and skips blank rows', () => {
    const batch = toRowBatch([
      ['Full Name', 'Year'],
      ['', '  '],
      ['A Lee', 2024],
    ]);
    expect(batch.rows).toEqual([{ rowNumber: 3, cells: { 'Full Name': 'A Lee', Year: '2024' } }]);
  });

  it('returns nothing for an empty sheet', () => {
    expect(toRowBatch([])).toEqual({ headers: [], rows: [] });
  });
});

describe('CsvFileSource', () => {
  it('reads a file from disk', async () => {
    const path = join(tempDir(), 'roster.csv');
    writeFileSync(path, EXPORT);
    const batch = await new CsvFileSource(path).readRows();
    expect(batch.rows.map((r) => r.cells['Full Name'])).toEqual(['Lee, A', 'B Kim']);
  });

  it('fails with a configuration error when the file is missing', async () => {
    const path = join(tempDir(), 'missing.csv');
    await expect(new CsvFileSource(path).readRows()).rejects.toThrow(
      new ConfigurationError(`CSV file not found: ${path}`),
    );
  });
});
