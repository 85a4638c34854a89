/**
 * Data Ingestion — reads and validates the generated dataset.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import { STAGE_NAMES, ValidationError, type DataRecord } from '@pipetrack/shared';
import { z } from 'zod';
import type { StageOutcome, StageStep } from '../types.js';
import { DataRecordListSchema } from './records.js';

const IngestInputSchema = z.object({ inputFile: z.string().min(1) });

export function createIngestStep(opts?: { retryDelayMs?: number }): StageStep {
  return {
    name: STAGE_NAMES.INGESTION,
    retries: 3,
    retryDelayMs: opts?.retryDelayMs ?? 500,
    async run(input, ctx): Promise<StageOutcome<DataRecord[]>> {
      const parsedInput = IngestInputSchema.safeParse(input);
      if (!parsedInput.success) {
        throw new ValidationError('Data Ingestion needs an inputFile', ['inputFile: required']);
      }
      const { inputFile } = parsedInput.data;

      let text: string;
      try {
        text = await readFile(inputFile, 'utf-8');
      } catch (err) {
        if (isMissingFile(err)) {
          throw new Error(`file not found: ${inputFile}`, { cause: err });
        }
        throw err;
      }

      const records = DataRecordListSchema.safeParse(JSON.parse(text));
      if (!records.success) {
        const issues = records.error.issues.slice(0, 5).map(i => `${i.path.join('.')}: ${i.message}`);
        throw new ValidationError(`Invalid dataset ${basename(inputFile)}: ${issues.join('; ')}`, issues);
      }

      ctx.logger.info('ingested dataset', { inputFile, records: records.data.length });
      return {
        output: records.data,
        recordsProcessed: records.data.length,
        pipelineFields: { inputFile: basename(inputFile) },
      };
    },
  };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
