/**
 * Pipeline Dispatcher — starts runs in the background and keeps track of
 * them. The trigger endpoint answers as soon as the run is scheduled.
 */

import { randomUUID } from 'crypto';
import {
  createEvent,
  errorMessage,
  type CreatePipelineAttrs,
  type EventBus,
  type Logger,
  type PipelineStore,
  type PipelineWithStages,
} from '@pipetrack/shared';
import type { FlowRunner } from './flow-runner.js';
import type { StagedUpdate, StatusUpdateProtocol } from './status-protocol.js';
import type { FlowRunParams, FlowRunResult } from './types.js';

export type TriggerResult =
  | { ok: true; pipelineId: number; runId: string }
  | { ok: false; reason: 'pipeline_not_found' | 'not_pending'; message: string };

type Claim = { ok: true; staged: StagedUpdate } | Extract<TriggerResult, { ok: false }>;

export interface DispatcherOptions {
  logger?: Logger;
  bus?: EventBus;
}

export class PipelineDispatcher {
  private store: PipelineStore;
  private protocol: StatusUpdateProtocol;
  private runner: FlowRunner;
  private logger: Logger | null;
  private bus: EventBus | null;
  private inFlight: Map<string, Promise<FlowRunResult | null>> = new Map();

  constructor(store: PipelineStore, protocol: StatusUpdateProtocol, runner: FlowRunner, opts?: DispatcherOptions) {
    this.store = store;
    this.protocol = protocol;
    this.runner = runner;
    this.logger = opts?.logger?.child({ component: 'dispatcher' }) ?? null;
    this.bus = opts?.bus ?? null;
  }

  /**
   * Move a pending pipeline to running and start its flow. Only a pending
   * pipeline can be triggered; a second trigger gets `not_pending`.
   */
  async trigger(pipelineId: number, params?: FlowRunParams): Promise<TriggerResult> {
    // check and write under one write lock, so two triggers (in this process
    // or another one sharing the database) cannot both see `pending`
    const claim = this.store.transaction((): Claim => {
      const pipeline = this.store.getPipeline(pipelineId);
      if (!pipeline) {
        return { ok: false, reason: 'pipeline_not_found', message: `Pipeline ${pipelineId} not found` };
      }
      if (pipeline.status !== 'pending') {
        return {
          ok: false,
          reason: 'not_pending',
          message: `Pipeline ${pipelineId} is ${pipeline.status}; only pending pipelines can be triggered`,
        };
      }
      return { ok: true, staged: this.protocol.stageUpdate({ pipelineId, status: 'running' }) };
    });
    if (!claim.ok) return claim;

    const runId = params?.runId ?? randomUUID();
    const run = this.runInBackground(pipelineId, { ...params, runId });
    this.inFlight.set(runId, run);

    await claim.staged.publish();
    this.logger?.info('pipeline triggered', { pipelineId, runId });
    await this.bus?.emit(createEvent('pipeline.triggered', 'dispatcher', { runId }, pipelineId));

    return { ok: true, pipelineId, runId };
  }

  async createAndTrigger(
    attrs: CreatePipelineAttrs,
    params?: FlowRunParams
  ): Promise<{ pipeline: PipelineWithStages; trigger: TriggerResult }> {
    const pipeline = this.store.createPipeline(attrs);
    await this.bus?.emit(createEvent('pipeline.created', 'dispatcher', { name: pipeline.name }, pipeline.id));
    const trigger = await this.trigger(pipeline.id, params);
    return { pipeline, trigger };
  }

  activeRuns(): string[] {
    return [...this.inFlight.keys()];
  }

  /**
   * Resolves when every run started so far has settled.
   */
  async waitForIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight.values());
    }
  }

  /** Settles with the run result, or null when the run failed. Never rejects. */
  private async runInBackground(pipelineId: number, params: FlowRunParams & { runId: string }): Promise<FlowRunResult | null> {
    await Promise.resolve();
    try {
      const result = await this.runner.run(pipelineId, params);
      this.logger?.info('run finished', {
        pipelineId,
        runId: params.runId,
        status: result.status,
        totalDurationMs: result.totalDurationMs,
      });
      return result;
    } catch (err) {
      this.logger?.error('run failed', { pipelineId, runId: params.runId, error: errorMessage(err) });
      return null;
    } finally {
      this.inFlight.delete(params.runId);
    }
  }
}
