import { Workbook } from 'exceljs';
import { writeError } from '../../lib/errors';
import { normalizeRecords, type AuditRecord } from '../../lib/normalize';
import { emit, type StageOptions } from '../pipeline/events';
import { stageFailure, type ToolResult } from '../pipeline/result';

export const DEFAULT_SHEET_NAME = 'Sheet1';

export type ExportResult = ToolResult<
  { output_path: string; rows_exported: number },
  { output_path: string }
>;

/** Union of record keys in first-seen order. */
export function collectColumns(records: readonly AuditRecord[]): string[] {
  const columns = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) columns.add(key);
  }
  return [...columns];
}

export function buildWorkbook(records: readonly AuditRecord[], sheetName = DEFAULT_SHEET_NAME): Workbook {
  const workbook = new Workbook();
  const worksheet = workbook.addWorksheet(sheetName);
  const columns = collectColumns(records);
  if (columns.length === 0) return workbook;

  worksheet.addRow(columns);
  for (const record of normalizeRecords(records)) {
    worksheet.addRow(columns.map((column) => record[column] ?? null));
  }
  return workbook;
}

/**
 * Write records to `outputPath` as a single worksheet: header row, then one
 * row per record. An existing file is overwritten.
 */
export async function exportToExcel(
  records: readonly AuditRecord[],
  outputPath: string,
  sheetName = DEFAULT_SHEET_NAME,
  options: StageOptions = {},
): Promise<ExportResult> {
  try {
    const workbook = buildWorkbook(records, sheetName);
    try {
      await workbook.xlsx.writeFile(outputPath);
    } catch (err) {
      throw writeError(outputPath, err);
    }

    emit(options, 'export', 'audit.export.completed', {
      output_path: outputPath,
      sheet_name: sheetName,
      rows_exported: records.length,
    });
    return { status: 'success', output_path: outputPath, rows_exported: records.length };
  } catch (err) {
    return { ...stageFailure(options, 'export', err), output_path: outputPath };
  }
}
