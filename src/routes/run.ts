import { Hono } from 'hono';
import type { Env } from '../config';
import { missingField } from '../lib/errors';
import { parseWithSchema } from '../lib/validate';
import { consoleEventLogger, type StageOptions } from '../services/pipeline/events';
import { TOOLS, getTool } from '../tools';
import { RunRequestSchema } from '../tools/schemas';

export const run = new Hono<{ Bindings: Env }>();

const RUN_REQUEST_FIELDS = ['tool', 'params'] as const;

/** Absent fields get MISSING_FIELD; present but mistyped ones fall to the schema. */
function requireRunFields(body: unknown): void {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return;
  for (const field of RUN_REQUEST_FIELDS) {
    if (!(field in body)) throw missingField(field);
  }
}

// ─── Tool catalogue ─────────────────────────────────────────────────────────

run.get('/tools', (c) => {
  return c.json(
    TOOLS.map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    })),
  );
});

// ─── Invoke one tool ────────────────────────────────────────────────────────

// The stage's own result, success or error, is the response body.
run.post('/run', async (c) => {
  const body: unknown = await c.req.json();
  requireRunFields(body);
  const { tool: toolName, params } = parseWithSchema(RunRequestSchema, body, 'run request');

  const tool = getTool(toolName);
  const options: StageOptions = c.env.AUDIT_DEBUG ? { onEvent: consoleEventLogger } : {};
  const result = await tool.invoke(params, options);

  return c.json(result);
});

// ─── Sessions ───────────────────────────────────────────────────────────────

// Stages keep no state between calls, so every caller shares one session.
run.post('/create_session', (c) => {
  return c.json({ session_id: 'default' });
});
