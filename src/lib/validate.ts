/**
 * Input validation helpers.
 *
 * Each function throws an `ApiError` on invalid input so route handlers can
 * stay concise; the global error handler formats the response.
 */
import type { z } from 'zod';
import { badRequest } from './errors';

/** Parse `value` with a zod schema, throwing VALIDATION_ERROR with the issue list. */
export function parseWithSchema<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  name: string,
): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const first = issues[0];
    const summary = first ? `${first.path || '(root)'}: ${first.message}` : 'invalid input';
    throw badRequest(`Parameter validation failed for ${name}: ${summary}`, { issues });
  }
  return result.data;
}

/** Require a bare file name: no directory separators, no parent references. */
export function requireFileName(value: string, name: string): string {
  if (!value || value.includes('/') || value.includes('\\') || value.includes('..')) {
    throw badRequest(`Invalid ${name}: '${value}'`, { field: name });
  }
  return value;
}
