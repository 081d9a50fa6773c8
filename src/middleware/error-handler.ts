/**
 * Global error handler for the dispatch layer.
 *
 * Tool failures never reach this point: stages return `status: 'error'`
 * results. What lands here is request-level: a malformed body, a bad tool
 * name, parameters failing their schema, or a fault in the route itself.
 */
import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ApiError, ErrorCode, internalError } from '../lib/errors';

export const errorHandler: ErrorHandler = (err, c) => {
  const route = `${c.req.method} ${c.req.path}`;

  if (err instanceof ApiError) {
    console.error(`[${err.code}] ${err.status} ${route}: ${err.message}`);
    return c.json(err.toJSON(), err.status);
  }

  // c.req.json() rethrows the platform's SyntaxError
  if (err instanceof SyntaxError && err.message.includes('JSON')) {
    console.error(`[INVALID_INPUT] 400 ${route}: malformed JSON body`);
    const apiErr = new ApiError(400, ErrorCode.INVALID_INPUT, 'Malformed JSON in request body');
    return c.json(apiErr.toJSON(), 400);
  }

  // Raised by Hono middleware (body limits, CORS preflight, ...)
  if (err instanceof HTTPException) {
    console.error(`[HTTP_EXCEPTION] ${err.status} ${route}: ${err.message}`);
    return err.getResponse();
  }

  console.error(`[INTERNAL_ERROR] 500 ${route}:`, err);
  return c.json(internalError().toJSON(), 500);
};
