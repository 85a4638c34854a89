/**
 * pipetrack Shared Types
 *
 * The pipeline/stage record is the shared primitive. The store writes it,
 * the status protocol mutates it, the runner and the API read it.
 */

// ─── Status ───────────────────────────────────────────────────────

export const PIPELINE_STATUSES = ['pending', 'running', 'completed', 'failed'] as const;

export type PipelineStatus = (typeof PIPELINE_STATUSES)[number];

export const TERMINAL_STATUSES: readonly PipelineStatus[] = ['completed', 'failed'];

export function isPipelineStatus(value: unknown): value is PipelineStatus {
  return PIPELINE_STATUSES.some(status => status === value);
}

export function isTerminalStatus(status: PipelineStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

// ─── Pipelines ────────────────────────────────────────────────────

export interface Pipeline {
  id: number;
  name: string;
  description: string | null;
  status: PipelineStatus;
  createdAt: string; // ISO 8601
  updatedAt: string;
  inputFile: string | null;
  outputFile: string | null;
  externalRunId: string | null; // correlates to the run that executed it
  recordsProcessed: number;
  errorMessage: string | null;
}

export interface Stage {
  id: number;
  pipelineId: number;
  name: string;
  description: string | null;
  status: PipelineStatus;
  startedAt: string | null;
  completedAt: string | null;
  executionTimeSeconds: number | null;
  errorMessage: string | null;
}

export interface PipelineWithStages extends Pipeline {
  stages: Stage[];
}

export interface StageDefinition {
  name: string;
  description: string;
}

export interface CreatePipelineAttrs {
  name: string;
  description?: string | null;
  inputFile?: string | null;
  outputFile?: string | null;
}

export type PipelinePatch = Partial<Pick<
  Pipeline,
  'name' | 'description' | 'status' | 'inputFile' | 'outputFile' | 'externalRunId' | 'recordsProcessed' | 'errorMessage'
>>;

export type StagePatch = Partial<Pick<
  Stage,
  'description' | 'status' | 'startedAt' | 'completedAt' | 'executionTimeSeconds' | 'errorMessage'
>>;

// ─── Status Updates ───────────────────────────────────────────────

export interface StatusUpdate {
  pipelineId: number;
  stageName?: string;
  status: PipelineStatus;
  errorMessage?: string;
  recordsProcessed?: number;
}

export type StatusUpdateResult =
  | { ok: true; pipeline: Pipeline; stage: Stage | null }
  | { ok: false; reason: 'pipeline_not_found' | 'stage_not_found'; message: string };

// ─── Data Records ─────────────────────────────────────────────────

export interface DataRecord {
  id: number;
  name: string;
  category: string;
  value: number;
  quantity: number;
  is_active: boolean;
  created_at: string;
}

export interface ProcessedRecord extends DataRecord {
  total_value: number;
  processed_by: string;
  processed_at: string;
}

export type RecordTier = 'premium' | 'standard' | 'basic';

export interface TransformedRecord extends ProcessedRecord {
  is_high_value: boolean;
  tier: RecordTier;
  category_avg_value: number;
  transformed_by: string;
  transformed_at: string;
}

// ─── Event Bus ────────────────────────────────────────────────────

export type EventChannel =
  | 'pipeline.created'
  | 'pipeline.deleted'
  | 'pipeline.triggered'
  | 'pipeline.stage_updated'
  | 'pipeline.status_changed'
  | 'pipeline.completed'
  | 'pipeline.failed';

export interface BusEvent<T = unknown> {
  channel: EventChannel;
  timestamp: string;
  source: 'store' | 'protocol' | 'flow' | 'dispatcher' | 'api' | 'system';
  pipelineId: number | null;
  payload: T;
}

export type EventHandler<T = unknown> = (event: BusEvent<T>) => void | Promise<void>;
