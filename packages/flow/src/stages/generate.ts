/**
 * Data Generation — writes a synthetic dataset to the input directory.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { STAGE_NAMES, type DataRecord } from '@pipetrack/shared';
import type { StageOutcome, StageStep } from '../types.js';
import { fileStamp, RECORD_CATEGORIES, round2 } from './records.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface GenerateOptions {
  inputDir: string;
  recordCount: number;
  random?: () => number;
  now?: () => Date;
}

export interface GenerateOutput {
  inputFile: string;
}

/** `input.recordCount` on the run overrides the configured count. */
export function generateRecords(count: number, random: () => number, now: Date): DataRecord[] {
  const records: DataRecord[] = [];
  for (let i = 1; i <= count; i++) {
    const daysAgo = Math.floor(random() * 31);
    records.push({
      id: i,
      name: `Item ${i}`,
      category: RECORD_CATEGORIES[Math.floor(random() * RECORD_CATEGORIES.length)] ?? 'A',
      value: round2(10 + random() * 990),
      quantity: 1 + Math.floor(random() * 100),
      is_active: random() < 0.5,
      created_at: new Date(now.getTime() - daysAgo * DAY_MS).toISOString(),
    });
  }
  return records;
}

export function createGenerateStep(opts: GenerateOptions): StageStep {
  const random = opts.random ?? Math.random;
  const clock = opts.now ?? (() => new Date());

  return {
    name: STAGE_NAMES.GENERATION,
    retries: 2,
    async run(input, ctx): Promise<StageOutcome<GenerateOutput>> {
      const count = requestedCount(input) ?? opts.recordCount;
      const now = clock();
      const records = generateRecords(count, random, now);

      await mkdir(opts.inputDir, { recursive: true });
      const inputFile = join(opts.inputDir, `sample_data_${ctx.pipelineId}_${fileStamp(now)}.json`);
      await writeFile(inputFile, JSON.stringify(records, null, 2), 'utf-8');

      ctx.logger.info('generated dataset', { inputFile, records: records.length });
      return { output: { inputFile }, recordsProcessed: records.length };
    },
  };
}

function requestedCount(input: unknown): number | undefined {
  if (typeof input !== 'object' || input === null || !('recordCount' in input)) return undefined;
  const value = input.recordCount;
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : undefined;
}
