/**
 * Request bodies and snake_case response shapes for the HTTP API.
 */

import { z } from 'zod';
import { PIPELINE_STATUSES, type BusEvent, type Pipeline, type PipelineWithStages, type Stage } from '@pipetrack/shared';

// ─── Requests ─────────────────────────────────────────────────────

export const CreatePipelineBody = z.object({
  name: z.string().trim().min(1, 'name is required'),
  description: z.string().nullish(),
});

export const StatusUpdateBody = z.object({
  pipeline_id: z.number().int().positive(),
  stage_name: z.string().trim().min(1).nullish(),
  status: z.enum(PIPELINE_STATUSES),
  error_message: z.string().nullish(),
  records_processed: z.number().int().nonnegative().nullish(),
});

export const TriggerBody = z.object({
  pipeline_id: z.number().int().positive(),
  record_count: z.number().int().positive().optional(),
});

export const CreateRunBody = z.object({
  name: z.string().trim().min(1).optional(),
  description: z.string().nullish(),
  record_count: z.number().int().positive().optional(),
});

export const ListQuery = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const IdParam = z.coerce.number().int().positive();

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// ─── Responses ────────────────────────────────────────────────────

export interface StageResponse {
  id: number;
  pipeline_id: number;
  name: string;
  description: string | null;
  status: string;
  started_at: string | null;
  completed_at: string | null;
  execution_time_seconds: number | null;
  error_message: string | null;
}

export interface PipelineResponse {
  id: number;
  name: string;
  description: string | null;
  status: string;
  created_at: string;
  updated_at: string;
  input_file: string | null;
  output_file: string | null;
  external_run_id: string | null;
  records_processed: number;
  error_message: string | null;
  stages?: StageResponse[];
}

export function serializeStage(stage: Stage): StageResponse {
  return {
    id: stage.id,
    pipeline_id: stage.pipelineId,
    name: stage.name,
    description: stage.description,
    status: stage.status,
    started_at: stage.startedAt,
    completed_at: stage.completedAt,
    execution_time_seconds: stage.executionTimeSeconds,
    error_message: stage.errorMessage,
  };
}

export function serializePipeline(pipeline: Pipeline | PipelineWithStages): PipelineResponse {
  return {
    id: pipeline.id,
    name: pipeline.name,
    description: pipeline.description,
    status: pipeline.status,
    created_at: pipeline.createdAt,
    updated_at: pipeline.updatedAt,
    input_file: pipeline.inputFile,
    output_file: pipeline.outputFile,
    external_run_id: pipeline.externalRunId,
    records_processed: pipeline.recordsProcessed,
    error_message: pipeline.errorMessage,
    ...('stages' in pipeline ? { stages: pipeline.stages.map(serializeStage) } : {}),
  };
}

export function serializeEvent(event: BusEvent): Record<string, unknown> {
  return {
    channel: event.channel,
    timestamp: event.timestamp,
    source: event.source,
    pipeline_id: event.pipelineId,
    payload: event.payload,
  };
}
