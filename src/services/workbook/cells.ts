import type { CellValue as ExcelCellValue, Row, Worksheet } from 'exceljs';
import type { AuditRecord, CellValue } from '../../lib/normalize';

/**
 * Flatten an exceljs cell value into a record scalar.
 *
 * Formulas yield their cached result, rich text and hyperlinks their text,
 * dates an ISO-8601 string. Empty and error cells (`#N/A`, `#DIV/0!`) are null.
 */
export function cellToScalar(value: ExcelCellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value === '' ? null : value;
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if ('error' in value) return null;
  if ('richText' in value) {
    const text = value.richText.map((run) => run.text).join('');
    return text === '' ? null : text;
  }
  if ('hyperlink' in value) return cellToScalar(value.text);
  return value.result === undefined ? null : cellToScalar(value.result);
}

/**
 * Header names as a spreadsheet reader would key them: blank headers become
 * `Unnamed: <index>`, repeats of `X` become `X.1`, `X.2`, ...
 */
export function buildHeaders(headerRow: Row, columnCount: number): string[] {
  const headers: string[] = [];
  const seen = new Set<string>();

  for (let col = 1; col <= columnCount; col++) {
    const raw = cellToScalar(headerRow.getCell(col).value);
    const base = raw === null ? `Unnamed: ${col - 1}` : String(raw);

    let name = base;
    for (let n = 1; seen.has(name); n++) {
      name = `${base}.${n}`;
    }
    seen.add(name);
    headers.push(name);
  }

  return headers;
}

/** Convert every data row below the header into a record. */
export function worksheetToRecords(worksheet: Worksheet): AuditRecord[] {
  if (worksheet.rowCount === 0) return [];

  const headers = buildHeaders(worksheet.getRow(1), worksheet.columnCount);
  const records: AuditRecord[] = [];
  let lastFilled = 0;

  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber++) {
    const row = worksheet.getRow(rowNumber);
    const record: AuditRecord = {};
    let filled = false;

    headers.forEach((header, index) => {
      const value = cellToScalar(row.getCell(index + 1).value);
      if (value !== null) filled = true;
      record[header] = value;
    });

    records.push(record);
    if (filled) lastFilled = records.length;
  }

  // Blank rows inside the table are kept; trailing ones are formatting residue.
  return records.slice(0, lastFilled);
}
