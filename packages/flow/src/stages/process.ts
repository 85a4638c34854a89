/**
 * Spark Processing — derives total_value per record, fanned out in batches.
 */

import { STAGE_NAMES, type DataRecord, type ProcessedRecord } from '@pipetrack/shared';
import { runBatches } from '../batch.js';
import type { StageOutcome, StageStep } from '../types.js';
import { DataRecordListSchema, round2 } from './records.js';

export interface ProcessOptions {
  batchSize: number;
  batchConcurrency: number;
  now?: () => Date;
}

export function processRecord(record: DataRecord, processedAt: string): ProcessedRecord {
  return {
    ...record,
    total_value: round2(record.value * record.quantity),
    processed_by: 'spark',
    processed_at: processedAt,
  };
}

export function createProcessStep(opts: ProcessOptions): StageStep {
  const clock = opts.now ?? (() => new Date());

  return {
    name: STAGE_NAMES.PROCESSING,
    async run(input, ctx): Promise<StageOutcome<ProcessedRecord[]>> {
      const records = DataRecordListSchema.parse(input);

      const { results, batches } = await runBatches(
        records,
        { batchSize: opts.batchSize, concurrency: opts.batchConcurrency, signal: ctx.signal },
        async (batch) => {
          const processedAt = clock().toISOString();
          return batch.map(record => processRecord(record, processedAt));
        }
      );

      const average = results.length > 0
        ? results.reduce((sum, r) => sum + r.total_value, 0) / results.length
        : 0;
      ctx.logger.info('processed records', {
        records: results.length,
        batches,
        averageTotalValue: round2(average),
      });

      return { output: results, recordsProcessed: results.length };
    },
  };
}
