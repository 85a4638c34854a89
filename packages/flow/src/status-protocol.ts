/**
 * Status Update Protocol — the single mutation path for stage and
 * pipeline status.
 *
 * Rules:
 * - started_at is written once, on the first `running`
 * - completed_at / execution_time_seconds are written once, on the first `completed`
 * - a pipeline completes only when every one of its stages has completed
 * - the first stage failure fails the pipeline at once and carries its message
 * - a pipeline in a terminal status keeps that status; only records_processed
 *   and a not-yet-set error message may still change
 *
 * Each update runs in one IMMEDIATE transaction, so duplicate or concurrent
 * deliveries of the same update cannot both win the "first" write.
 */

import {
  createEvent,
  isPipelineStatus,
  isTerminalStatus,
  ValidationError,
  type EventBus,
  type Logger,
  type Pipeline,
  type PipelinePatch,
  type PipelineStatus,
  type PipelineStore,
  type Stage,
  type StagePatch,
  type StatusUpdate,
  type StatusUpdateResult,
} from '@pipetrack/shared';

export interface StatusProtocolOptions {
  now?: () => Date;
  bus?: EventBus;
  logger?: Logger;
}

interface AppliedUpdate {
  result: StatusUpdateResult;
  previousStageStatus: PipelineStatus | null;
  previousPipelineStatus: PipelineStatus | null;
}

export interface StagedUpdate {
  result: StatusUpdateResult;
  publish(): Promise<StatusUpdateResult>;
}

export class StatusUpdateProtocol {
  private store: PipelineStore;
  private now: () => Date;
  private bus: EventBus | null;
  private logger: Logger | null;

  constructor(store: PipelineStore, opts?: StatusProtocolOptions) {
    this.store = store;
    this.now = opts?.now ?? (() => new Date());
    this.bus = opts?.bus ?? null;
    this.logger = opts?.logger?.child({ component: 'protocol' }) ?? null;
  }

  /**
   * Apply one status transition to a stage (when `stageName` is given) or to
   * the whole pipeline, then re-derive the pipeline's status.
   *
   * Unknown pipeline or stage is a `{ ok: false }` result, not an exception.
   * A malformed update throws ValidationError.
   */
  async applyStatusUpdate(update: StatusUpdate): Promise<StatusUpdateResult> {
    const staged = this.store.transaction(() => this.stageUpdate(update));
    return staged.publish();
  }

  /**
   * Apply `update` inside a transaction the caller already holds, for callers
   * that must check and write in one step. Nothing is logged or emitted until
   * `publish()`, which belongs after the commit.
   */
  stageUpdate(update: StatusUpdate): StagedUpdate {
    validateStatusUpdate(update);
    const applied = this.applyInTransaction(update);
    return {
      result: applied.result,
      publish: () => this.finish(update, applied),
    };
  }

  private async finish(update: StatusUpdate, applied: AppliedUpdate): Promise<StatusUpdateResult> {
    if (!applied.result.ok) {
      this.logger?.warn('status update rejected', {
        pipelineId: update.pipelineId,
        stageName: update.stageName,
        status: update.status,
        reason: applied.result.reason,
      });
      return applied.result;
    }

    await this.publish(update, applied);
    return applied.result;
  }

  private applyInTransaction(update: StatusUpdate): AppliedUpdate {
    const pipeline = this.store.getPipeline(update.pipelineId);
    if (!pipeline) {
      return {
        result: {
          ok: false,
          reason: 'pipeline_not_found',
          message: `Pipeline ${update.pipelineId} not found`,
        },
        previousStageStatus: null,
        previousPipelineStatus: null,
      };
    }

    if (update.stageName === undefined) {
      const updated = this.transitionPipeline(pipeline, update.status, update.errorMessage, update.recordsProcessed);
      return {
        result: { ok: true, pipeline: updated, stage: null },
        previousStageStatus: null,
        previousPipelineStatus: pipeline.status,
      };
    }

    const stage = this.store.findStageByName(pipeline.id, update.stageName);
    if (!stage) {
      return {
        result: {
          ok: false,
          reason: 'stage_not_found',
          message: `Stage '${update.stageName}' not found`,
        },
        previousStageStatus: null,
        previousPipelineStatus: pipeline.status,
      };
    }

    const updatedStage = this.transitionStage(stage, update.status, update.errorMessage);

    let updatedPipeline: Pipeline = pipeline;
    if (update.status === 'completed') {
      const stages = this.store.getStages(pipeline.id);
      if (stages.every(s => s.status === 'completed')) {
        updatedPipeline = this.transitionPipeline(pipeline, 'completed');
      }
    } else if (update.status === 'failed') {
      updatedPipeline = this.transitionPipeline(pipeline, 'failed', update.errorMessage);
    }

    return {
      result: { ok: true, pipeline: updatedPipeline, stage: updatedStage },
      previousStageStatus: stage.status,
      previousPipelineStatus: pipeline.status,
    };
  }

  private transitionStage(stage: Stage, status: PipelineStatus, errorMessage?: string): Stage {
    const now = this.now();
    const patch: StagePatch = { status };

    if (status === 'running' && !stage.startedAt) {
      patch.startedAt = now.toISOString();
    }

    if (status === 'completed' && !stage.completedAt) {
      patch.completedAt = now.toISOString();
      if (stage.startedAt) {
        patch.executionTimeSeconds = (now.getTime() - Date.parse(stage.startedAt)) / 1000;
      }
    }

    if (errorMessage) {
      patch.errorMessage = errorMessage;
    }

    return this.store.updateStage(stage.id, patch) ?? stage;
  }

  private transitionPipeline(
    pipeline: Pipeline,
    status: PipelineStatus,
    errorMessage?: string,
    recordsProcessed?: number
  ): Pipeline {
    const patch: PipelinePatch = {};
    const terminal = isTerminalStatus(pipeline.status);

    if (!terminal) {
      patch.status = status;
    } else if (status !== pipeline.status) {
      this.logger?.debug('terminal pipeline keeps its status', {
        pipelineId: pipeline.id,
        status: pipeline.status,
        requested: status,
      });
    }

    // a failed pipeline keeps the message of the failure that failed it
    const canWriteError = !terminal || (pipeline.status === 'failed' && pipeline.errorMessage === null);
    if (errorMessage && canWriteError) {
      patch.errorMessage = errorMessage;
    }

    if (recordsProcessed !== undefined) {
      patch.recordsProcessed = recordsProcessed;
    }

    if (Object.keys(patch).length === 0) return pipeline;
    return this.store.updatePipeline(pipeline.id, patch) ?? pipeline;
  }

  private async publish(update: StatusUpdate, applied: AppliedUpdate): Promise<void> {
    if (!applied.result.ok) return;
    const { pipeline, stage } = applied.result;

    if (stage) {
      this.logger?.debug('stage status applied', {
        pipelineId: pipeline.id,
        stageName: stage.name,
        from: applied.previousStageStatus,
        to: stage.status,
      });
    }

    const pipelineChanged = applied.previousPipelineStatus !== pipeline.status;
    if (pipelineChanged) {
      this.logger?.info('pipeline status changed', {
        pipelineId: pipeline.id,
        from: applied.previousPipelineStatus,
        to: pipeline.status,
        ...(pipeline.errorMessage ? { errorMessage: pipeline.errorMessage } : {}),
      });
    }

    if (!this.bus) return;

    if (stage) {
      await this.bus.emit(createEvent('pipeline.stage_updated', 'protocol', {
        stageName: stage.name,
        from: applied.previousStageStatus,
        to: stage.status,
        errorMessage: stage.errorMessage,
        recordsProcessed: update.recordsProcessed ?? null,
      }, pipeline.id));
    }

    if (pipelineChanged) {
      await this.bus.emit(createEvent('pipeline.status_changed', 'protocol', {
        from: applied.previousPipelineStatus,
        to: pipeline.status,
      }, pipeline.id));

      if (pipeline.status === 'completed') {
        await this.bus.emit(createEvent('pipeline.completed', 'protocol', {
          recordsProcessed: pipeline.recordsProcessed,
        }, pipeline.id));
      } else if (pipeline.status === 'failed') {
        await this.bus.emit(createEvent('pipeline.failed', 'protocol', {
          errorMessage: pipeline.errorMessage,
          stageName: stage?.name ?? null,
        }, pipeline.id));
      }
    }
  }
}

// ─── Validation ──────────────────────────────────────────────────

export function validateStatusUpdate(update: StatusUpdate): void {
  const issues: string[] = [];

  if (!Number.isInteger(update.pipelineId) || update.pipelineId <= 0) {
    issues.push(`pipelineId: must be a positive integer (got ${String(update.pipelineId)})`);
  }
  if (!isPipelineStatus(update.status)) {
    issues.push(`status: must be one of pending, running, completed, failed (got "${String(update.status)}")`);
  }
  if (update.stageName !== undefined && update.stageName.trim() === '') {
    issues.push('stageName: must not be empty');
  }
  if (update.recordsProcessed !== undefined &&
      (!Number.isInteger(update.recordsProcessed) || update.recordsProcessed < 0)) {
    issues.push(`recordsProcessed: must be a non-negative integer (got ${update.recordsProcessed})`);
  }

  if (issues.length > 0) {
    throw new ValidationError(`Invalid status update: ${issues.join('; ')}`, issues);
  }
}
