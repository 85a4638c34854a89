/**
 * DBT Transformation — tiers each record and attaches its category average.
 */

import { STAGE_NAMES, type ProcessedRecord, type RecordTier, type TransformedRecord } from '@pipetrack/shared';
import { z } from 'zod';
import type { StageOutcome, StageStep } from '../types.js';
import { ProcessedRecordSchema, round2 } from './records.js';

const HIGH_VALUE_THRESHOLD = 5000;
const STANDARD_THRESHOLD = 1000;

export function tierFor(totalValue: number): RecordTier {
  if (totalValue > HIGH_VALUE_THRESHOLD) return 'premium';
  if (totalValue > STANDARD_THRESHOLD) return 'standard';
  return 'basic';
}

export function transformRecords(records: ProcessedRecord[], transformedAt: string): TransformedRecord[] {
  const totals = new Map<string, { sum: number; count: number }>();
  for (const record of records) {
    const entry = totals.get(record.category) ?? { sum: 0, count: 0 };
    entry.sum += record.total_value;
    entry.count += 1;
    totals.set(record.category, entry);
  }

  return records.map(record => {
    const category = totals.get(record.category);
    return {
      ...record,
      is_high_value: record.total_value > HIGH_VALUE_THRESHOLD,
      tier: tierFor(record.total_value),
      category_avg_value: category ? round2(category.sum / category.count) : 0,
      transformed_by: 'dbt',
      transformed_at: transformedAt,
    };
  });
}

export function createTransformStep(opts?: { now?: () => Date }): StageStep {
  const clock = opts?.now ?? (() => new Date());

  return {
    name: STAGE_NAMES.TRANSFORMATION,
    async run(input, ctx): Promise<StageOutcome<TransformedRecord[]>> {
      const records = z.array(ProcessedRecordSchema).parse(input);
      const transformed = transformRecords(records, clock().toISOString());

      ctx.logger.info('transformed records', {
        records: transformed.length,
        categories: new Set(transformed.map(r => r.category)).size,
      });
      return { output: transformed, recordsProcessed: transformed.length };
    },
  };
}
