/**
 * Tests for the Flow Runner: stage ordering, reporting, failure halting,
 * per-stage retry and timeout, report delivery retry.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PipelineStore } from '../../packages/shared/pipeline-store/index.js';
import { BufferLogger } from '../../packages/shared/logger/index.js';
import { StageExecutionError, TransportError, ValidationError } from '../../packages/shared/errors/index.js';
import type { StatusUpdate } from '../../packages/shared/types/index.js';
import { StatusUpdateProtocol } from '../../packages/flow/src/status-protocol.js';
import { FlowRunner } from '../../packages/flow/src/flow-runner.js';
import { LocalStatusReporter, storeFieldRecorder } from '../../packages/flow/src/status-reporter.js';
import type { ReportResult, StageOutcome, StageStep, StatusReporter } from '../../packages/flow/src/types.js';

const STAGES = ['Data Generation', 'Data Ingestion', 'Spark Processing', 'DBT Transformation', 'Data Export'];

function describeUpdate(update: StatusUpdate): string {
  return `${update.stageName ?? '*'}:${update.status}`;
}

class RecordingReporter implements StatusReporter {
  readonly updates: StatusUpdate[] = [];

  constructor(private readonly inner: StatusReporter) {}

  async report(update: StatusUpdate): Promise<ReportResult> {
    this.updates.push(update);
    return this.inner.report(update);
  }

  get trail(): string[] {
    return this.updates.map(describeUpdate);
  }
}

function fakeStep(name: string, run?: StageStep['run'], extra?: Partial<StageStep>): StageStep {
  return {
    name,
    run: run ?? (async (input): Promise<StageOutcome> => ({ output: { after: name, input }, recordsProcessed: 1000 })),
    ...extra,
  };
}

function fakeSteps(overrides: Record<string, Partial<StageStep>> = {}): StageStep[] {
  return STAGES.map(name => {
    const step = fakeStep(name);
    if (name === 'Data Export') {
      step.run = async () => ({
        output: { done: true },
        recordsProcessed: 1000,
        pipelineFields: { outputFile: 'pipeline_1_results.json' },
        pipelineUpdate: { status: 'completed', recordsProcessed: 1000 },
      });
    }
    return { ...step, ...overrides[name] };
  });
}

describe('FlowRunner', () => {
  let store: PipelineStore;
  let protocol: StatusUpdateProtocol;
  let reporter: RecordingReporter;
  let logger: BufferLogger;
  let pipelineId: number;

  beforeEach(() => {
    store = new PipelineStore(':memory:');
    protocol = new StatusUpdateProtocol(store);
    reporter = new RecordingReporter(new LocalStatusReporter(protocol));
    logger = new BufferLogger();
    pipelineId = store.createPipeline({ name: 'runner test' }).id;
  });

  afterEach(() => {
    store.close();
  });

  function runner(steps: StageStep[], opts?: { reporter?: StatusReporter }): FlowRunner {
    return new FlowRunner({
      steps,
      reporter: opts?.reporter ?? reporter,
      recorder: storeFieldRecorder(store),
      logger,
      reportRetry: { maxRetries: 2, baseDelayMs: 0, jitterMs: 0 },
    });
  }

  describe('construction', () => {
    it('orders steps by the stage registry', () => {
      const shuffled = [...fakeSteps()].reverse();
      expect(runner(shuffled).stageNames).toEqual(STAGES);
    });

    it('accepts snake_case step names', () => {
      const steps = fakeSteps();
      const renamed = steps.map(s => (s.name === 'Spark Processing' ? { ...s, name: 'spark_processing' } : s));
      expect(runner(renamed).stageNames[2]).toBe('spark_processing');
    });

    it('rejects a missing or unregistered step', () => {
      const missing = fakeSteps().filter(s => s.name !== 'Data Export');
      expect(() => runner(missing)).toThrow(ValidationError);
      expect(() => runner(missing)).toThrow('no step for stage "Data Export"');

      const extra = [...fakeSteps(), fakeStep('Model Training')];
      expect(() => runner(extra)).toThrow('"Model Training" is not a registered stage');
    });
  });

  describe('run', () => {
    it('runs every stage and completes the pipeline with 1000 records', async () => {
      const result = await runner(fakeSteps()).run(pipelineId, { runId: 'run-1' });

      expect(reporter.trail).toEqual([
        'Data Generation:running', 'Data Generation:completed',
        'Data Ingestion:running', 'Data Ingestion:completed',
        'Spark Processing:running', 'Spark Processing:completed',
        'DBT Transformation:running', 'DBT Transformation:completed',
        'Data Export:running', 'Data Export:completed',
        '*:completed',
      ]);

      expect(result.runId).toBe('run-1');
      expect(result.status).toBe('completed');
      expect(result.stages.map(s => s.status)).toEqual(Array(5).fill('completed'));
      expect(result.output).toEqual({ done: true });

      const pipeline = store.getPipeline(pipelineId);
      expect(pipeline?.status).toBe('completed');
      expect(pipeline?.recordsProcessed).toBe(1000);
      expect(pipeline?.externalRunId).toBe('run-1');
      expect(pipeline?.outputFile).toBe('pipeline_1_results.json');
      expect(pipeline?.stages.every(s => s.status === 'completed')).toBe(true);
    });

    it('passes each stage the previous output', async () => {
      const seen: unknown[] = [];
      const steps = fakeSteps({
        'Data Ingestion': {
          run: async (input) => {
            seen.push(input);
            return { output: 'ingested' };
          },
        },
        'Spark Processing': {
          run: async (input) => {
            seen.push(input);
            return { output: 'processed' };
          },
        },
      });

      await runner(steps).run(pipelineId, { input: { recordCount: 5 } });

      expect(seen).toEqual([{ after: 'Data Generation', input: { recordCount: 5 } }, 'ingested']);
    });

    it('assigns a run id when none is given', async () => {
      const result = await runner(fakeSteps()).run(pipelineId);
      expect(result.runId).toMatch(/^[0-9a-f-]{36}$/);
      expect(store.getPipeline(pipelineId)?.externalRunId).toBe(result.runId);
    });

    it('stops at a failing stage and fails the pipeline with its message', async () => {
      const steps = fakeSteps({
        'Data Ingestion': { run: async () => { throw new Error('file not found'); } },
      });

      const error = await runner(steps).run(pipelineId).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StageExecutionError);
      if (!(error instanceof StageExecutionError)) return;
      expect(error.message).toBe('file not found');
      expect(error.stageName).toBe('Data Ingestion');
      expect(error.pipelineId).toBe(pipelineId);

      expect(reporter.trail).toEqual([
        'Data Generation:running', 'Data Generation:completed',
        'Data Ingestion:running', 'Data Ingestion:failed',
      ]);
      expect(reporter.updates[3]?.errorMessage).toBe('file not found');

      const pipeline = store.getPipeline(pipelineId);
      expect(pipeline?.status).toBe('failed');
      expect(pipeline?.errorMessage).toBe('file not found');
      expect(pipeline?.stages.map(s => s.status)).toEqual(['completed', 'failed', 'pending', 'pending', 'pending']);
    });

    it('fails the whole pipeline on an error outside a stage body', async () => {
      const flow = new FlowRunner({
        steps: fakeSteps(),
        reporter,
        recorder: { recordFields: () => { throw new Error('database is locked'); } },
        logger,
      });

      await expect(flow.run(pipelineId)).rejects.toThrow('database is locked');
      expect(reporter.trail).toEqual(['*:failed']);
      expect(store.getPipeline(pipelineId)?.errorMessage).toBe('database is locked');
    });
  });

  describe('field recording', () => {
    it('fails the stage whose fields cannot be recorded', async () => {
      const steps = fakeSteps({
        'Data Ingestion': {
          run: async () => ({ output: {}, recordsProcessed: 1000, pipelineFields: { inputFile: 'sample.json' } }),
        },
      });
      const flow = new FlowRunner({
        steps,
        reporter,
        recorder: {
          recordFields: (_id, fields) => {
            if (fields.inputFile !== undefined) throw new Error('disk I/O error');
          },
        },
        logger,
      });

      const error = await flow.run(pipelineId).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StageExecutionError);
      expect(reporter.trail).toEqual([
        'Data Generation:running', 'Data Generation:completed',
        'Data Ingestion:running', 'Data Ingestion:failed',
      ]);

      const pipeline = store.getPipeline(pipelineId);
      expect(pipeline?.status).toBe('failed');
      expect(pipeline?.errorMessage).toBe('disk I/O error');
      expect(pipeline?.stages[1]?.status).toBe('failed');
      expect(pipeline?.stages[1]?.errorMessage).toBe('disk I/O error');
    });
  });

  describe('per-stage retry and timeout', () => {
    it('retries a stage body up to its retry budget', async () => {
      let calls = 0;
      const steps = fakeSteps({
        'Data Generation': {
          retries: 2,
          retryDelayMs: 0,
          run: async (_input, ctx) => {
            calls++;
            if (ctx.attempt < 2) throw new Error(`attempt ${ctx.attempt} failed`);
            return { output: {}, recordsProcessed: 3 };
          },
        },
      });

      const result = await runner(steps).run(pipelineId);

      expect(calls).toBe(3);
      expect(result.stages[0]?.attempts).toBe(3);
      expect(result.stages[0]?.recordsProcessed).toBe(3);
      // running is reported once, not per attempt
      expect(reporter.trail.filter(t => t === 'Data Generation:running')).toHaveLength(1);
      expect(logger.getByLevel('warn').filter(e => e.msg === 'stage attempt failed, retrying')).toHaveLength(2);
    });

    it('fails after the last attempt with the last error', async () => {
      const steps = fakeSteps({
        'Data Generation': {
          retries: 1,
          retryDelayMs: 0,
          run: async (_input, ctx) => { throw new Error(`attempt ${ctx.attempt} failed`); },
        },
      });

      await expect(runner(steps).run(pipelineId)).rejects.toThrow('attempt 1 failed');
      expect(store.getPipeline(pipelineId)?.errorMessage).toBe('attempt 1 failed');
    });

    it('times out a stage body and aborts its signal', async () => {
      let aborted = false;
      const steps = fakeSteps({
        'Data Generation': {
          timeoutMs: 20,
          run: (_input, ctx) => new Promise<StageOutcome>((resolve) => {
            ctx.signal.addEventListener('abort', () => {
              aborted = true;
              resolve({ output: 'too late' });
            });
          }),
        },
      });

      await expect(runner(steps).run(pipelineId)).rejects.toThrow('Stage "Data Generation" timed out after 20ms');
      expect(aborted).toBe(true);
      expect(store.getPipeline(pipelineId)?.status).toBe('failed');
    });
  });

  describe('status report delivery', () => {
    it('retries transport failures and carries on', async () => {
      let failuresLeft = 2;
      const flaky: StatusReporter = {
        report: async (update) => {
          if (failuresLeft > 0) {
            failuresLeft--;
            throw new TransportError('connection refused');
          }
          return reporter.report(update);
        },
      };

      await runner(fakeSteps(), { reporter: flaky }).run(pipelineId);

      expect(store.getPipeline(pipelineId)?.status).toBe('completed');
      expect(logger.getByLevel('warn').filter(e => e.msg === 'status report failed, retrying')).toHaveLength(2);
    });

    it('drops a report after the retry budget and keeps running', async () => {
      const down: StatusReporter = {
        report: async () => { throw new TransportError('service unavailable', { status: 503 }); },
      };

      const result = await runner(fakeSteps(), { reporter: down }).run(pipelineId);

      expect(result.status).toBe('completed');
      expect(result.stages).toHaveLength(5);
      expect(logger.getByLevel('error').filter(e => e.msg === 'status report dropped')).toHaveLength(11);
    });

    it('logs a not-found result as a warning', async () => {
      await runner(fakeSteps()).run(pipelineId + 100);

      const warnings = logger.getByLevel('warn').filter(e => e.msg === 'status report target not found');
      expect(warnings).toHaveLength(11);
      expect(warnings[0]?.data?.reason).toBe('pipeline_not_found');
    });

    it('does not retry a validation failure from the reporter', async () => {
      let calls = 0;
      const strict: StatusReporter = {
        report: async () => {
          calls++;
          throw new ValidationError('bad update');
        },
      };

      await expect(runner(fakeSteps(), { reporter: strict }).run(pipelineId)).rejects.toThrow('bad update');
      expect(calls).toBe(2);
    });
  });
});
