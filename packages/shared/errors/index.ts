/**
 * pipetrack Error Taxonomy
 *
 * "Not found" is deliberately absent here: lookups return null or an
 * `{ ok: false }` result, and the caller decides whether absence is fatal.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'STAGE_EXECUTION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'CONFIG_ERROR';

export class PipetrackError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipetrackError';
    this.code = code;
  }
}

/** Malformed status value, missing required field, bad request body. */
export class ValidationError extends PipetrackError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** A stage body failed. Wraps the underlying cause. */
export class StageExecutionError extends PipetrackError {
  readonly stageName: string;
  readonly pipelineId: number;

  constructor(stageName: string, pipelineId: number, cause: unknown) {
    super('STAGE_EXECUTION_ERROR', errorMessage(cause), { cause });
    this.name = 'StageExecutionError';
    this.stageName = stageName;
    this.pipelineId = pipelineId;
  }
}

/** Delivering a status update to the store failed (network, 5xx). */
export class TransportError extends PipetrackError {
  readonly status: number | null;

  constructor(message: string, opts?: { status?: number; cause?: unknown }) {
    super('TRANSPORT_ERROR', message, { cause: opts?.cause });
    this.name = 'TransportError';
    this.status = opts?.status ?? null;
  }
}

export class ConfigError extends PipetrackError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIG_ERROR', message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}
