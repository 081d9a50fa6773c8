import { stat } from 'node:fs/promises';
import { Workbook } from 'exceljs';
import {
  describeError,
  formatError,
  isErrnoException,
  notFound,
  sheetNotFound,
} from '../../lib/errors';
import { normalizeRecords, type AuditRecord } from '../../lib/normalize';
import { emit, type StageOptions } from '../pipeline/events';
import { stageFailure, type ToolResult } from '../pipeline/result';
import { worksheetToRecords } from './cells';

export type LoadResult = ToolResult<
  { records: AuditRecord[]; row_count: number },
  { records: AuditRecord[] }
>;

async function readWorkbook(path: string): Promise<Workbook> {
  try {
    await stat(path);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw notFound('Workbook', path);
    }
    throw formatError(`Unable to read workbook ${path}: ${describeError(err)}`);
  }

  const workbook = new Workbook();
  try {
    await workbook.xlsx.readFile(path);
  } catch (err) {
    throw formatError(`Unable to read workbook ${path}: ${describeError(err)}`);
  }
  return workbook;
}

/**
 * Read one worksheet of an `.xlsx` workbook into records keyed by the
 * header row. The file is opened read-only.
 */
export async function loadAuditSheet(
  path: string,
  sheetName: string,
  options: StageOptions = {},
): Promise<LoadResult> {
  try {
    const workbook = await readWorkbook(path);
    const worksheet = workbook.getWorksheet(sheetName);
    if (!worksheet) {
      throw sheetNotFound(sheetName, workbook.worksheets.map((ws) => ws.name));
    }

    const records = normalizeRecords(worksheetToRecords(worksheet));
    emit(options, 'load', 'audit.load.completed', {
      path,
      sheet_name: sheetName,
      row_count: records.length,
    });
    return { status: 'success', records, row_count: records.length };
  } catch (err) {
    return { ...stageFailure(options, 'load', err), records: [] };
  }
}
