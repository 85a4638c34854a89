/**
 * Record schemas for the files the stages hand to each other.
 */

import { z } from 'zod';
import type { DataRecord, ProcessedRecord, TransformedRecord } from '@pipetrack/shared';

export const RECORD_CATEGORIES = ['A', 'B', 'C', 'D'] as const;

export const DataRecordSchema = z.object({
  id: z.number().int().nonnegative(),
  name: z.string().min(1),
  category: z.string().min(1),
  value: z.number().nonnegative(),
  quantity: z.number().int().nonnegative(),
  is_active: z.boolean(),
  created_at: z.string(),
}) satisfies z.ZodType<DataRecord>;

export const DataRecordListSchema = z.array(DataRecordSchema);

export const ProcessedRecordSchema = DataRecordSchema.extend({
  total_value: z.number(),
  processed_by: z.string(),
  processed_at: z.string(),
}) satisfies z.ZodType<ProcessedRecord>;

export const TransformedRecordSchema = ProcessedRecordSchema.extend({
  is_high_value: z.boolean(),
  tier: z.enum(['premium', 'standard', 'basic']),
  category_avg_value: z.number(),
  transformed_by: z.string(),
  transformed_at: z.string(),
}) satisfies z.ZodType<TransformedRecord>;

/** `2026-03-14T09:26:53.589Z` → `20260314_092653` */
export function fileStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
