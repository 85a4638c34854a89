/**
 * Tests for the built-in stage bodies, alone and chained through the runner.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { PipelineStore } from '../../packages/shared/pipeline-store/index.js';
import { BufferLogger } from '../../packages/shared/logger/index.js';
import { ValidationError } from '../../packages/shared/errors/index.js';
import type { ProcessedRecord } from '../../packages/shared/types/index.js';
import {
  createDefaultSteps,
  createIngestStep,
  fileStamp,
  generateRecords,
  processRecord,
  tierFor,
  transformRecords,
} from '../../packages/flow/src/stages/index.js';
import { FlowRunner } from '../../packages/flow/src/flow-runner.js';
import { StatusUpdateProtocol } from '../../packages/flow/src/status-protocol.js';
import { LocalStatusReporter, storeFieldRecorder } from '../../packages/flow/src/status-reporter.js';
import type { StageContext, StageStep } from '../../packages/flow/src/types.js';
import { seededRandom, sequenceRandom } from '../helpers.js';

const FIXED_NOW = new Date('2026-03-10T12:00:00.000Z');

function context(stageName: string): StageContext {
  return {
    pipelineId: 1,
    runId: 'run-test',
    stageName,
    attempt: 0,
    signal: new AbortController().signal,
    logger: new BufferLogger(),
  };
}

function processed(id: number, category: string, totalValue: number): ProcessedRecord {
  return {
    id,
    name: `Item ${id}`,
    category,
    value: totalValue,
    quantity: 1,
    is_active: true,
    created_at: '2026-03-01T00:00:00.000Z',
    total_value: totalValue,
    processed_by: 'spark',
    processed_at: '2026-03-10T12:00:00.000Z',
  };
}

describe('record helpers', () => {
  it('formats file stamps from UTC time', () => {
    expect(fileStamp(new Date('2026-03-14T09:26:53.589Z'))).toBe('20260314_092653');
  });

  it('generates records from the random source', () => {
    const records = generateRecords(1, sequenceRandom([0.5, 0.25, 0.5, 0.5, 0.25]), FIXED_NOW);

    expect(records).toEqual([{
      id: 1,
      name: 'Item 1',
      category: 'B',
      value: 505,
      quantity: 51,
      is_active: true,
      created_at: '2026-02-23T12:00:00.000Z',
    }]);
  });

  it('keeps generated fields in range', () => {
    const records = generateRecords(200, seededRandom(42), FIXED_NOW);

    expect(records).toHaveLength(200);
    expect(records.map(r => r.id)).toEqual(Array.from({ length: 200 }, (_, i) => i + 1));
    for (const record of records) {
      expect(['A', 'B', 'C', 'D']).toContain(record.category);
      expect(record.value).toBeGreaterThanOrEqual(10);
      expect(record.value).toBeLessThanOrEqual(1000);
      expect(record.quantity).toBeGreaterThanOrEqual(1);
      expect(record.quantity).toBeLessThanOrEqual(100);
    }
  });

  it('derives total_value during processing', () => {
    const base = generateRecords(1, sequenceRandom([0]), FIXED_NOW)[0];
    expect(base).toBeDefined();
    if (!base) return;

    const result = processRecord({ ...base, value: 12.5, quantity: 4 }, '2026-03-10T12:00:00.000Z');
    expect(result.total_value).toBe(50);
    expect(result.processed_by).toBe('spark');
    expect(result.processed_at).toBe('2026-03-10T12:00:00.000Z');
  });

  it('tiers on strict thresholds', () => {
    expect(tierFor(5000.01)).toBe('premium');
    expect(tierFor(5000)).toBe('standard');
    expect(tierFor(1000.01)).toBe('standard');
    expect(tierFor(1000)).toBe('basic');
  });

  it('attaches category averages during transformation', () => {
    const result = transformRecords(
      [processed(1, 'A', 6000), processed(2, 'A', 2000), processed(3, 'B', 500)],
      '2026-03-10T12:00:05.000Z'
    );

    expect(result.map(r => [r.tier, r.is_high_value, r.category_avg_value])).toEqual([
      ['premium', true, 4000],
      ['standard', false, 4000],
      ['basic', false, 500],
    ]);
    expect(result.every(r => r.transformed_by === 'dbt' && r.transformed_at === '2026-03-10T12:00:05.000Z')).toBe(true);
  });
});

describe('stage bodies', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pipetrack-stages-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('Data Ingestion', () => {
    it('reads a valid dataset and records the file name', async () => {
      const path = join(dir, 'input.json');
      writeFileSync(path, JSON.stringify(generateRecords(3, seededRandom(1), FIXED_NOW)));

      const outcome = await createIngestStep().run({ inputFile: path }, context('Data Ingestion'));

      expect(outcome.recordsProcessed).toBe(3);
      expect(outcome.pipelineFields).toEqual({ inputFile: 'input.json' });
    });

    it('reports a missing file', async () => {
      const path = join(dir, 'absent.json');
      await expect(createIngestStep().run({ inputFile: path }, context('Data Ingestion')))
        .rejects.toThrow(`file not found: ${path}`);
    });

    it('rejects records that do not match the schema', async () => {
      const path = join(dir, 'broken.json');
      writeFileSync(path, JSON.stringify([{ id: 1, name: 'Item 1' }]));

      await expect(createIngestStep().run({ inputFile: path }, context('Data Ingestion')))
        .rejects.toThrow(ValidationError);
    });

    it('requires an input file', async () => {
      await expect(createIngestStep().run({}, context('Data Ingestion')))
        .rejects.toThrow('Data Ingestion needs an inputFile');
    });
  });

  describe('full chain', () => {
    let store: PipelineStore;

    beforeEach(() => {
      store = new PipelineStore(':memory:');
    });

    afterEach(() => {
      store.close();
    });

    function runnerWith(steps: StageStep[]): FlowRunner {
      return new FlowRunner({
        steps,
        reporter: new LocalStatusReporter(new StatusUpdateProtocol(store)),
        recorder: storeFieldRecorder(store),
      });
    }

    const settings = () => ({
      inputDir: join(dir, 'input'),
      outputDir: join(dir, 'output'),
      recordCount: 20,
      batchSize: 6,
      batchConcurrency: 2,
    });

    it('generates, ingests, processes, transforms and exports a dataset', async () => {
      const pipeline = store.createPipeline({ name: 'chain' });
      const steps = createDefaultSteps(settings(), { random: seededRandom(7), now: () => FIXED_NOW });

      await runnerWith(steps).run(pipeline.id);

      const finished = store.getPipeline(pipeline.id);
      expect(finished?.status).toBe('completed');
      expect(finished?.recordsProcessed).toBe(20);
      expect(finished?.inputFile).toBe('sample_data_1_20260310_120000.json');
      expect(finished?.outputFile).toBe('pipeline_1_results_20260310_120000.json');

      const exported = JSON.parse(readFileSync(join(dir, 'output', 'pipeline_1_results_20260310_120000.json'), 'utf-8'));
      expect(exported.pipeline_id).toBe(1);
      expect(exported.generated_at).toBe('2026-03-10T12:00:00.000Z');
      expect(exported.record_count).toBe(20);
      expect(exported.data).toHaveLength(20);
      expect(exported.data[0].processed_by).toBe('spark');
      expect(exported.data[0].transformed_by).toBe('dbt');
      expect(exported.data[0].total_value).toBe(
        Math.round(exported.data[0].value * exported.data[0].quantity * 100) / 100
      );
    });

    it('honours a record count passed with the run', async () => {
      const pipeline = store.createPipeline({ name: 'small' });
      const steps = createDefaultSteps(settings(), { random: seededRandom(3), now: () => FIXED_NOW });

      await runnerWith(steps).run(pipeline.id, { input: { recordCount: 7 } });

      expect(store.getPipeline(pipeline.id)?.recordsProcessed).toBe(7);
    });

    it('halts at ingestion when the generated file is gone', async () => {
      const pipeline = store.createPipeline({ name: 'missing input' });
      const missing = join(dir, 'input', 'gone.json');
      const steps = createDefaultSteps(settings(), { now: () => FIXED_NOW, ingestRetryDelayMs: 0 })
        .map(step => step.name === 'Data Generation'
          ? { ...step, run: async () => ({ output: { inputFile: missing }, recordsProcessed: 20 }) }
          : step);

      await expect(runnerWith(steps).run(pipeline.id)).rejects.toThrow(`file not found: ${missing}`);

      const failed = store.getPipeline(pipeline.id);
      expect(failed?.status).toBe('failed');
      expect(failed?.errorMessage).toBe(`file not found: ${missing}`);
      expect(failed?.stages.map(s => s.status)).toEqual(['completed', 'failed', 'pending', 'pending', 'pending']);
      expect(existsSync(join(dir, 'output'))).toBe(false);
    });
  });
});
