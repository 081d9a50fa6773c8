/**
 * JSON-safety normalisation for records crossing the pipeline.
 *
 * Spreadsheet cells and caller-supplied values may carry `NaN`, `Infinity`,
 * `bigint` or unparseable dates. None of these survive `JSON.stringify`
 * faithfully, so every stage passes its output through here.
 */

export type CellValue = string | number | boolean | null;

/** One audit row: column name → cell value, in column order. */
export type AuditRecord = Record<string, CellValue>;

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Recursively convert a value into its JSON-safe equivalent.
 *
 * Non-finite numbers, `undefined` and invalid dates become `null`; `bigint`
 * becomes a native number. Anything else is returned untouched. Idempotent.
 */
export function normalize(value: unknown): unknown {
  if (value === undefined || value === null) return null;
  if (Array.isArray(value)) return value.map(normalize);
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = normalize(item);
    }
    return out;
  }
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Date && Number.isNaN(value.getTime())) return null;
  return value;
}

export function normalizeCell(value: CellValue | undefined): CellValue {
  if (value === undefined) return null;
  if (typeof value === 'number' && !Number.isFinite(value)) return null;
  return value;
}

/** Shallow-copy each record with every cell normalised. */
export function normalizeRecords(records: readonly AuditRecord[]): AuditRecord[] {
  return records.map((record) => {
    const out: AuditRecord = {};
    for (const [key, value] of Object.entries(record)) {
      out[key] = normalizeCell(value);
    }
    return out;
  });
}
