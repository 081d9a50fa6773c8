import { ApiError, ErrorCode, describeError, type ErrorCodeType } from '../../lib/errors';
import { emit, type PipelineStage, type StageOptions } from './events';

export type ToolSuccess<T extends object> = { status: 'success' } & T;

export interface ToolError {
  status: 'error';
  code: ErrorCodeType;
  message: string;
}

/**
 * Tagged outcome returned by every stage. `F` is the empty payload an error
 * result still carries so callers can read e.g. `records` unconditionally.
 */
export type ToolResult<S extends object, F extends object> = ToolSuccess<S> | (ToolError & F);

export function toToolError(err: unknown): ToolError {
  if (err instanceof ApiError) {
    return { status: 'error', code: err.code, message: err.message };
  }
  return { status: 'error', code: ErrorCode.INTERNAL_ERROR, message: describeError(err) };
}

/** Convert a fault caught at a stage boundary, reporting it to the hook. */
export function stageFailure(options: StageOptions, stage: PipelineStage, err: unknown): ToolError {
  const failure = toToolError(err);
  // A throwing hook must not mask the original fault.
  try {
    emit(options, stage, 'audit.stage.failed', { code: failure.code, message: failure.message });
  } catch (hookErr) {
    console.error(`[audit.stage.failed] event hook threw: ${describeError(hookErr)}`);
  }
  return failure;
}
