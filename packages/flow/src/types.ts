/**
 * Flow Types — stage steps, run results, status reporting seams.
 */

import type { Logger, PipelineStatus, StatusUpdate } from '@pipetrack/shared';

// ─── Status Reporting ────────────────────────────────────────────

export type NotFoundReason = 'pipeline_not_found' | 'stage_not_found';

export type ReportResult =
  | { ok: true }
  | { ok: false; reason: NotFoundReason; message: string };

/**
 * Delivers a status update to wherever the store lives: the same process,
 * an HTTP endpoint, a queue. The runner only sees this interface.
 */
export interface StatusReporter {
  report(update: StatusUpdate): Promise<ReportResult>;
}

export interface PipelineFields {
  inputFile?: string;
  outputFile?: string;
  externalRunId?: string;
}

/**
 * Direct field writes that are not status transitions (run id, file names).
 */
export interface PipelineFieldRecorder {
  recordFields(pipelineId: number, fields: PipelineFields): void | Promise<void>;
}

// ─── Stage Steps ─────────────────────────────────────────────────

export interface StageContext {
  pipelineId: number;
  runId: string;
  stageName: string;
  attempt: number;          // 0-based
  signal: AbortSignal;      // aborted when the stage times out
  logger: Logger;
}

export interface StageOutcome<O = unknown> {
  output: O;
  recordsProcessed?: number;
  pipelineFields?: PipelineFields;
  /** Whole-pipeline status update reported after this stage completes. */
  pipelineUpdate?: { status: PipelineStatus; recordsProcessed?: number; errorMessage?: string };
}

export interface StageStep {
  name: string;
  run(input: unknown, ctx: StageContext): Promise<StageOutcome>;
  retries?: number;         // extra attempts after the first
  retryDelayMs?: number;
  timeoutMs?: number;
}

// ─── Run Results ─────────────────────────────────────────────────

export interface FlowRunParams {
  runId?: string;
  /** Input handed to the first stage. */
  input?: Record<string, unknown>;
}

export interface StageRunResult {
  stageName: string;
  status: 'completed' | 'failed';
  durationMs: number;
  attempts: number;
  recordsProcessed?: number;
  error?: string;
}

export interface FlowRunResult {
  pipelineId: number;
  runId: string;
  status: 'completed';
  stages: StageRunResult[];
  totalDurationMs: number;
  output: unknown;
}
