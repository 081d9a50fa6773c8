/**
 * Shared test helpers: temporary directories, workbook fixtures and a
 * ready-made environment for route tests.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Workbook, type CellValue as ExcelCellValue } from 'exceljs';
import { z } from 'zod';
import type { Env } from './config';
import { createApp } from './index';
import { AuditRecordSchema } from './tools/schemas';

// ─── Temp directories ───────────────────────────────────────────────────────

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'audit-conformity-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

// ─── Workbook fixtures ──────────────────────────────────────────────────────

export interface SheetFixture {
  name: string;
  rows: ExcelCellValue[][];
}

/** Write an .xlsx file with one worksheet per fixture; the first row is the header. */
export async function writeWorkbook(path: string, sheets: SheetFixture[]): Promise<string> {
  const workbook = new Workbook();
  for (const sheet of sheets) {
    const worksheet = workbook.addWorksheet(sheet.name);
    for (const row of sheet.rows) {
      worksheet.addRow(row);
    }
  }
  await workbook.xlsx.writeFile(path);
  return path;
}

export const AUDIT_HEADER = ['Question ID', 'Observation', 'Baseline Evidence'];

// ─── Env / app ──────────────────────────────────────────────────────────────

export function createTestEnv(overrides: Partial<Env> = {}): Env {
  return {
    PORT: 5000,
    HOST: '127.0.0.1',
    ENVIRONMENT: 'test',
    API_VERSION: '1.0.0-test',
    CORS_ORIGIN: '*',
    REPORTS_DIR: join(tmpdir(), 'audit-conformity-missing-reports'),
    AUDIT_DEBUG: false,
    ...overrides,
  };
}

export function createTestApp() {
  return createApp({ logRequests: false });
}

/** POST a JSON body to /api/run. */
export function runTool(
  app: ReturnType<typeof createTestApp>,
  env: Env,
  tool: string,
  params: Record<string, unknown>,
) {
  return app.request(
    '/api/run',
    {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ tool, params }),
    },
    env,
  );
}

// ─── Response bodies ────────────────────────────────────────────────────────

/** Shape returned by every request-level error response. */
export const ErrorBodySchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.record(z.unknown()).optional(),
  }),
});

/** Any tool result that carries records. */
export const RecordsBodySchema = z
  .object({ status: z.string(), records: z.array(AuditRecordSchema) })
  .passthrough();

export async function readBody<S extends z.ZodTypeAny>(res: Response, schema: S): Promise<z.infer<S>> {
  return schema.parse(await res.json());
}
