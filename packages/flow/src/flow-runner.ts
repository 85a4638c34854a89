/**
 * Flow Runner — executes the registry's stages in order for one pipeline.
 *
 * Each stage: report running → run the body (bounded retry, timeout) with
 * the previous stage's output → report completed, or report failed and stop.
 * The runner never touches the store directly; every status transition goes
 * through a StatusReporter, so the same runner works in process or remote.
 */

import { randomUUID } from 'crypto';
import {
  defaultStages,
  errorMessage,
  normalizeStageName,
  StageExecutionError,
  TransportError,
  ValidationError,
  type Logger,
  type StageDefinition,
  type StatusUpdate,
} from '@pipetrack/shared';
import { withRetry, withTimeout, type RetryConfig } from './retry.js';
import type {
  FlowRunParams,
  FlowRunResult,
  PipelineFieldRecorder,
  PipelineFields,
  StageOutcome,
  StageRunResult,
  StageStep,
  StatusReporter,
} from './types.js';

const DEFAULT_STAGE_TIMEOUT_MS = 60_000;

export interface FlowRunnerOptions {
  steps: StageStep[];
  reporter: StatusReporter;
  recorder?: PipelineFieldRecorder;
  logger?: Logger;
  /** Retry policy for delivering status reports (TransportError only). */
  reportRetry?: Partial<RetryConfig>;
  defaultTimeoutMs?: number;
  stageDefinitions?: () => StageDefinition[];
}

export class FlowRunner {
  private steps: StageStep[];
  private reporter: StatusReporter;
  private recorder: PipelineFieldRecorder | null;
  private logger: Logger | null;
  private reportRetry: Partial<RetryConfig>;
  private defaultTimeoutMs: number;

  constructor(opts: FlowRunnerOptions) {
    this.steps = orderSteps(opts.steps, (opts.stageDefinitions ?? defaultStages)());
    this.reporter = opts.reporter;
    this.recorder = opts.recorder ?? null;
    this.logger = opts.logger?.child({ component: 'flow' }) ?? null;
    this.reportRetry = opts.reportRetry ?? {};
    this.defaultTimeoutMs = opts.defaultTimeoutMs ?? DEFAULT_STAGE_TIMEOUT_MS;
  }

  get stageNames(): string[] {
    return this.steps.map(s => s.name);
  }

  /**
   * Run every stage for `pipelineId`. Resolves once the last stage completes;
   * rejects with StageExecutionError at the first failing stage.
   */
  async run(pipelineId: number, params?: FlowRunParams): Promise<FlowRunResult> {
    const runId = params?.runId ?? randomUUID();
    const startTime = Date.now();
    const log = this.logger?.child({ pipelineId, runId }) ?? null;
    const stageResults: StageRunResult[] = [];

    log?.info('flow started', { stages: this.steps.length });

    let input: unknown = params?.input ?? {};
    let currentStage: string | null = null;

    try {
      await this.recordFields(pipelineId, { externalRunId: runId });

      for (const step of this.steps) {
        currentStage = step.name;
        const stageStart = Date.now();
        let attempts = 0;

        await this.report({ pipelineId, stageName: step.name, status: 'running' });

        let outcome: StageOutcome;
        try {
          outcome = await withRetry(async (attempt) => {
            attempts = attempt + 1;
            return this.runBody(step, input, pipelineId, runId, attempt, log);
          }, {
            maxRetries: step.retries ?? 0,
            baseDelayMs: step.retryDelayMs ?? 0,
            jitterMs: 0,
            onRetry: (err, attempt) => {
              log?.warn('stage attempt failed, retrying', {
                stageName: step.name,
                attempt: attempt + 1,
                error: errorMessage(err),
              });
            },
          });

          // a stage whose fields cannot be recorded fails like its body did
          if (outcome.pipelineFields) {
            await this.recordFields(pipelineId, outcome.pipelineFields);
          }
        } catch (err) {
          const message = errorMessage(err);
          stageResults.push({
            stageName: step.name,
            status: 'failed',
            durationMs: Date.now() - stageStart,
            attempts,
            error: message,
          });
          log?.error('stage failed', { stageName: step.name, attempts, error: message });
          await this.report({ pipelineId, stageName: step.name, status: 'failed', errorMessage: message });
          throw new StageExecutionError(step.name, pipelineId, err);
        }

        await this.report({
          pipelineId,
          stageName: step.name,
          status: 'completed',
          ...(outcome.recordsProcessed !== undefined ? { recordsProcessed: outcome.recordsProcessed } : {}),
        });

        if (outcome.pipelineUpdate) {
          await this.report({ pipelineId, ...outcome.pipelineUpdate });
        }

        stageResults.push({
          stageName: step.name,
          status: 'completed',
          durationMs: Date.now() - stageStart,
          attempts,
          ...(outcome.recordsProcessed !== undefined ? { recordsProcessed: outcome.recordsProcessed } : {}),
        });
        log?.info('stage completed', {
          stageName: step.name,
          durationMs: Date.now() - stageStart,
          recordsProcessed: outcome.recordsProcessed,
        });

        input = outcome.output;
      }
    } catch (err) {
      if (err instanceof StageExecutionError) throw err;

      // failure outside a stage body: fail the whole pipeline
      const message = errorMessage(err);
      log?.error('flow aborted', { stageName: currentStage, error: message });
      await this.report({ pipelineId, status: 'failed', errorMessage: message });
      throw err;
    }

    const totalDurationMs = Date.now() - startTime;
    log?.info('flow completed', { totalDurationMs });

    return {
      pipelineId,
      runId,
      status: 'completed',
      stages: stageResults,
      totalDurationMs,
      output: input,
    };
  }

  private async runBody(
    step: StageStep,
    input: unknown,
    pipelineId: number,
    runId: string,
    attempt: number,
    log: Logger | null
  ): Promise<StageOutcome> {
    const timeoutMs = step.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const stageLogger = log?.child({ stageName: step.name, attempt }) ?? silentLogger;

    return withTimeout(
      step.run(input, {
        pipelineId,
        runId,
        stageName: step.name,
        attempt,
        signal: controller.signal,
        logger: stageLogger,
      }),
      timeoutMs,
      `Stage "${step.name}" timed out after ${timeoutMs}ms`,
      () => controller.abort()
    );
  }

  /**
   * Deliver a status report. Transport failures are retried, then logged;
   * they never abort the run.
   */
  private async report(update: StatusUpdate): Promise<void> {
    try {
      const result = await withRetry(() => this.reporter.report(update), {
        ...this.reportRetry,
        shouldRetry: (err) => err instanceof TransportError,
        onRetry: (err, attempt, delayMs) => {
          this.logger?.warn('status report failed, retrying', {
            pipelineId: update.pipelineId,
            stageName: update.stageName,
            status: update.status,
            attempt: attempt + 1,
            delayMs: Math.round(delayMs),
            error: errorMessage(err),
          });
        },
      });

      if (!result.ok) {
        this.logger?.warn('status report target not found', {
          pipelineId: update.pipelineId,
          stageName: update.stageName,
          status: update.status,
          reason: result.reason,
        });
      }
    } catch (err) {
      if (!(err instanceof TransportError)) throw err;
      this.logger?.error('status report dropped', {
        pipelineId: update.pipelineId,
        stageName: update.stageName,
        status: update.status,
        error: err.message,
      });
    }
  }

  private async recordFields(pipelineId: number, fields: PipelineFields): Promise<void> {
    if (!this.recorder) return;
    await this.recorder.recordFields(pipelineId, fields);
  }
}

// ─── Step ordering ───────────────────────────────────────────────

function orderSteps(steps: StageStep[], definitions: StageDefinition[]): StageStep[] {
  const byName = new Map<string, StageStep>();
  for (const step of steps) {
    const key = normalizeStageName(step.name);
    if (byName.has(key)) {
      throw new ValidationError(`Duplicate step for stage "${step.name}"`, [`steps: duplicate "${step.name}"`]);
    }
    byName.set(key, step);
  }

  const issues: string[] = [];
  const ordered: StageStep[] = [];
  for (const def of definitions) {
    const step = byName.get(normalizeStageName(def.name));
    if (!step) {
      issues.push(`steps: no step for stage "${def.name}"`);
      continue;
    }
    ordered.push(step);
    byName.delete(normalizeStageName(def.name));
  }
  for (const extra of byName.values()) {
    issues.push(`steps: "${extra.name}" is not a registered stage`);
  }

  if (issues.length > 0) {
    throw new ValidationError(`Invalid flow definition: ${issues.join('; ')}`, issues);
  }
  return ordered;
}

const silentLogger: Logger = {
  trace: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined,
  child: () => silentLogger,
};
