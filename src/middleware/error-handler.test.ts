import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { badRequest, notFound, sheetNotFound } from '../lib/errors';
import { ErrorBodySchema, readBody } from '../test-helpers';
import { errorHandler } from './error-handler';

/** Minimal app whose routes each throw a different kind of error. */
function createErrorApp() {
  const app = new Hono();
  app.onError(errorHandler);

  app.get('/not-found', () => {
    throw notFound('Widget', '42');
  });

  app.get('/bad-request', () => {
    throw badRequest('Invalid input', { field: 'path' });
  });

  app.get('/missing-sheet', () => {
    throw sheetNotFound('Audit', ['Sheet1']);
  });

  app.get('/bad-json', () => {
    throw new SyntaxError('Unexpected end of JSON input');
  });

  app.get('/http-exception', () => {
    throw new HTTPException(413, { message: 'Payload too large' });
  });

  app.get('/unexpected', () => {
    throw new Error('disk on fire');
  });

  return app;
}

describe('errorHandler', () => {
  const app = createErrorApp();
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns structured JSON for ApiError', async () => {
    const res = await app.request('/not-found');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Widget not found: 42' } });
  });

  it('includes details when the error carries them', async () => {
    const res = await app.request('/bad-request');
    expect(res.status).toBe(400);

    const body = await readBody(res, ErrorBodySchema);
    expect(body.error).toEqual({ code: 'VALIDATION_ERROR', message: 'Invalid input', details: { field: 'path' } });
  });

  it('logs the code, status and route', async () => {
    await app.request('/missing-sheet');
    expect(console.error).toHaveBeenCalledWith(
      "[SHEET_NOT_FOUND] 404 GET /missing-sheet: Worksheet 'Audit' not found. Available sheets: Sheet1",
    );
  });

  it('maps a JSON SyntaxError to INVALID_INPUT', async () => {
    const res = await app.request('/bad-json');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: 'INVALID_INPUT', message: 'Malformed JSON in request body' },
    });
  });

  it('passes HTTPException responses through', async () => {
    const res = await app.request('/http-exception');
    expect(res.status).toBe(413);
    expect(await res.text()).toBe('Payload too large');
  });

  it('masks unexpected errors as INTERNAL_ERROR', async () => {
    const res = await app.request('/unexpected');
    expect(res.status).toBe(500);

    const body = await readBody(res, ErrorBodySchema);
    expect(body.error).toEqual({ code: 'INTERNAL_ERROR', message: 'An internal error occurred' });
    expect(body.error.message).not.toContain('disk on fire');
  });
});
