import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { AuditRecord } from '../../lib/normalize';
import { createTempDir, removeTempDir } from '../../test-helpers';
import { loadAuditSheet } from './sheet-loader';
import { buildWorkbook, collectColumns, exportToExcel } from './table-exporter';

describe('collectColumns', () => {
  it('returns the union of keys in first-seen order', () => {
    expect(collectColumns([{ b: 1, a: 2 }, { c: 3, a: 4 }, {}])).toEqual(['b', 'a', 'c']);
  });

  it('is empty for no records', () => {
    expect(collectColumns([])).toEqual([]);
  });
});

describe('buildWorkbook', () => {
  it('writes a header row followed by one row per record', () => {
    const workbook = buildWorkbook([{ 'Question ID': 'Q1', Score: Number.NaN }, { Note: 'x' }], 'Findings');
    const sheet = workbook.getWorksheet('Findings');

    expect(sheet?.getRow(1).values).toEqual([undefined, 'Question ID', 'Score', 'Note']);
    expect(sheet?.getRow(2).getCell(1).value).toBe('Q1');
    expect(sheet?.getRow(2).getCell(2).value).toBeNull();
    expect(sheet?.getRow(3).getCell(3).value).toBe('x');
    expect(sheet?.rowCount).toBe(3);
  });
});

describe('exportToExcel', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('writes the file and reports the row count', async () => {
    const outputPath = join(dir, 'out.xlsx');
    const result = await exportToExcel([{ 'Question ID': 'Q1' }, { 'Question ID': 'Q2' }], outputPath);

    expect(result).toEqual({ status: 'success', output_path: outputPath, rows_exported: 2 });
    expect((await stat(outputPath)).size).toBeGreaterThan(0);
  });

  it('round-trips through the loader', async () => {
    const records: AuditRecord[] = [
      {
        'Question ID': 'Q1',
        Observation: 'MFA enabled',
        'Baseline Evidence': 'MFA enabled for all users',
        'Conformity Level': 'Full Conformity',
        Score: 3,
        Reviewed: true,
      },
      { 'Question ID': 'Q2', Observation: null, Score: Number.NaN, Notes: 'follow up' },
    ];
    const outputPath = join(dir, 'roundtrip.xlsx');

    await exportToExcel(records, outputPath);
    const loaded = await loadAuditSheet(outputPath, 'Sheet1');

    expect(loaded).toEqual({
      status: 'success',
      records: [
        {
          'Question ID': 'Q1',
          Observation: 'MFA enabled',
          'Baseline Evidence': 'MFA enabled for all users',
          'Conformity Level': 'Full Conformity',
          Score: 3,
          Reviewed: true,
          Notes: null,
        },
        {
          'Question ID': 'Q2',
          Observation: null,
          'Baseline Evidence': null,
          'Conformity Level': null,
          Score: null,
          Reviewed: null,
          Notes: 'follow up',
        },
      ],
      row_count: 2,
    });
  });

  it('uses the requested sheet name', async () => {
    const outputPath = join(dir, 'named.xlsx');
    await exportToExcel([{ a: 1 }], outputPath, 'Findings');

    const loaded = await loadAuditSheet(outputPath, 'Findings');
    expect(loaded.records).toEqual([{ a: 1 }]);
  });

  it('overwrites an existing file', async () => {
    const outputPath = join(dir, 'out.xlsx');
    await exportToExcel([{ a: 1 }, { a: 2 }], outputPath);
    await exportToExcel([{ b: 'x' }], outputPath);

    const loaded = await loadAuditSheet(outputPath, 'Sheet1');
    expect(loaded.records).toEqual([{ b: 'x' }]);
  });

  it('does not mutate its input', async () => {
    const records: AuditRecord[] = [{ Score: Number.NaN }];
    await exportToExcel(records, join(dir, 'out.xlsx'));
    expect(records[0].Score).toBeNaN();
  });

  it('fails with WRITE_ERROR when the directory does not exist', async () => {
    const outputPath = join(dir, 'missing', 'out.xlsx');
    const result = await exportToExcel([{ a: 1 }], outputPath);

    expect(result.status).toBe('error');
    if (result.status === 'error') {
      expect(result.code).toBe('WRITE_ERROR');
      expect(result.output_path).toBe(outputPath);
      expect(result.message.startsWith(`Unable to write ${outputPath}: `)).toBe(true);
    }
  });
});
