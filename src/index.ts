import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { Env } from './config';
import { errorHandler } from './middleware/error-handler';
import { reports } from './routes/reports';
import { run } from './routes/run';

export type { Env } from './config';

export interface AppOptions {
  /** Log one line per request via Hono's logger (default: true). */
  logRequests?: boolean;
}

function parseOrigins(value: string): string | string[] {
  if (value === '*') return value;
  return value.split(',').map((origin) => origin.trim()).filter(Boolean);
}

export function createApp(options: AppOptions = {}) {
  const { logRequests = true } = options;
  const app = new Hono<{ Bindings: Env }>();

  // Middleware
  if (logRequests) app.use('*', logger());
  app.use('*', async (c, next) => {
    const handler = cors({
      origin: parseOrigins(c.env.CORS_ORIGIN),
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
    });
    return handler(c, next);
  });

  app.get('/', (c) => {
    return c.json({
      name: 'Audit Conformity API',
      version: c.env.API_VERSION,
      status: 'healthy',
      environment: c.env.ENVIRONMENT,
    });
  });

  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/api/status', (c) => c.json({ message: 'OK' }));

  // Tool dispatch: /api/tools, /api/run, /api/create_session
  app.route('/api', run);
  // Report files: /api/reports, /api/get_reports, /api/attack_data/:filename
  app.route('/api', reports);

  // 404 handler
  app.notFound((c) => {
    return c.json({
      error: { code: 'NOT_FOUND', message: `Route not found: ${c.req.method} ${c.req.path}` },
    }, 404);
  });

  app.onError(errorHandler);

  return app;
}

export type AuditApp = ReturnType<typeof createApp>;

// Pipeline stages, for use as a library
export { normalize, normalizeRecords, type AuditRecord, type CellValue } from './lib/normalize';
export { loadAuditSheet } from './services/workbook/sheet-loader';
export { exportToExcel } from './services/workbook/table-exporter';
export { validateEntries, type EvidenceIssue } from './services/conformity/validator';
export { assignConformity, classifyObservation } from './services/conformity/classifier';
export { summarizeFindings, type LevelSummary } from './services/conformity/summarizer';
export type { PipelineEvent, StageOptions } from './services/pipeline/events';
