/**
 * Structured error types for the audit conformity API.
 *
 * Each error carries an HTTP status, machine-readable code, and human-readable
 * message. Pipeline stages convert them into `status: 'error'` tool results;
 * the HTTP layer throws them and the global handler formats the response.
 */

// ─── Error codes (machine-readable, stable across versions) ──────────────────
export const ErrorCode = {
  // 400 – Bad Request family
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_INPUT: 'INVALID_INPUT',
  MISSING_FIELD: 'MISSING_FIELD',
  TOOL_NOT_FOUND: 'TOOL_NOT_FOUND',

  // 404
  NOT_FOUND: 'NOT_FOUND',
  SHEET_NOT_FOUND: 'SHEET_NOT_FOUND',
  REPORT_NOT_FOUND: 'REPORT_NOT_FOUND',

  // 422 – readable file, unusable content
  FORMAT_ERROR: 'FORMAT_ERROR',

  // 500 – Internal
  WRITE_ERROR: 'WRITE_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorStatus = 400 | 404 | 422 | 500;

// ─── Base API error ──────────────────────────────────────────────────────────
export class ApiError extends Error {
  public readonly status: ErrorStatus;
  public readonly code: ErrorCodeType;
  public readonly details?: Record<string, unknown>;

  constructor(
    status: ErrorStatus,
    code: ErrorCodeType,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
    this.details = details;
  }

  /** Serialise to the shape every HTTP error response uses. */
  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
      },
    };
  }
}

// ─── Convenience factories ───────────────────────────────────────────────────

/** 400 – generic bad request */
export function badRequest(message: string, details?: Record<string, unknown>) {
  return new ApiError(400, ErrorCode.VALIDATION_ERROR, message, details);
}

/** 400 – missing required field */
export function missingField(field: string) {
  return new ApiError(400, ErrorCode.MISSING_FIELD, `Missing required field: ${field}`, { field });
}

/** 400 – tool name is not registered */
export function toolNotFound(tool: string, available: readonly string[]) {
  return new ApiError(
    400,
    ErrorCode.TOOL_NOT_FOUND,
    `Tool '${tool}' not found. Available tools: ${available.join(', ')}`,
    { tool, available },
  );
}

/** 404 – resource not found */
export function notFound(resource: string, id?: string) {
  const codeMap: Record<string, ErrorCodeType> = {
    sheet: ErrorCode.SHEET_NOT_FOUND,
    report: ErrorCode.REPORT_NOT_FOUND,
  };

  const code = codeMap[resource.toLowerCase()] || ErrorCode.NOT_FOUND;
  const msg = id ? `${resource} not found: ${id}` : `${resource} not found`;
  return new ApiError(404, code, msg);
}

/** 404 – worksheet missing from an otherwise readable workbook */
export function sheetNotFound(sheetName: string, available: readonly string[]) {
  return new ApiError(
    404,
    ErrorCode.SHEET_NOT_FOUND,
    `Worksheet '${sheetName}' not found. Available sheets: ${available.join(', ') || '(none)'}`,
    { sheet_name: sheetName, available },
  );
}

/** 422 – content could not be parsed */
export function formatError(message: string) {
  return new ApiError(422, ErrorCode.FORMAT_ERROR, message);
}

/** 500 – destination could not be written */
export function writeError(path: string, err: unknown) {
  return new ApiError(500, ErrorCode.WRITE_ERROR, `Unable to write ${path}: ${describeError(err)}`, { path });
}

/** 500 – internal error */
export function internalError(message = 'An internal error occurred') {
  return new ApiError(500, ErrorCode.INTERNAL_ERROR, message);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node's errno-style failures (`ENOENT`, `EACCES`, ...). */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}
