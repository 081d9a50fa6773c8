import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Hono } from 'hono';
import type { Env } from '../config';
import { describeError, formatError, isErrnoException, notFound } from '../lib/errors';
import type { JsonValue } from '../lib/normalize';
import { requireFileName } from '../lib/validate';

export const reports = new Hono<{ Bindings: Env }>();

/** Report files are JSON documents whose name contains `REPORT`. */
export function isReportFile(fileName: string): boolean {
  return fileName.endsWith('.json') && fileName.includes('REPORT');
}

async function readJsonFile(path: string, fileName: string): Promise<JsonValue> {
  const text = await readFile(path, 'utf8');
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw formatError(`Report ${fileName} is not valid JSON: ${describeError(err)}`);
  }
}

async function listReportFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && isReportFile(entry.name))
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return [];
    throw err;
  }
}

/** Every report document in `dir`, ordered by file name. */
export async function listReports(dir: string): Promise<JsonValue[]> {
  const files = await listReportFiles(dir);
  return Promise.all(files.map((name) => readJsonFile(join(dir, name), name)));
}

/** One JSON data file from `dir`; the name may not leave the directory. */
export async function readReport(dir: string, rawName: string): Promise<JsonValue> {
  const fileName = requireFileName(rawName, 'filename');
  try {
    return await readJsonFile(join(dir, fileName), fileName);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw notFound('Report', fileName);
    }
    throw err;
  }
}

// ─── List reports ───────────────────────────────────────────────────────────

// `/get_reports` and `/attack_data/:filename` are the paths existing clients call.
reports.get('/reports', async (c) => c.json(await listReports(c.env.REPORTS_DIR)));
reports.get('/get_reports', async (c) => c.json(await listReports(c.env.REPORTS_DIR)));

// ─── Fetch one data file ────────────────────────────────────────────────────

reports.get('/reports/:filename', async (c) => {
  return c.json(await readReport(c.env.REPORTS_DIR, c.req.param('filename')));
});
reports.get('/attack_data/:filename', async (c) => {
  return c.json(await readReport(c.env.REPORTS_DIR, c.req.param('filename')));
});
