/**
 * Data Export — writes the transformed dataset and completes the pipeline.
 */

import { mkdir, writeFile } from 'fs/promises';
import { basename, join } from 'path';
import { STAGE_NAMES, type TransformedRecord } from '@pipetrack/shared';
import { z } from 'zod';
import type { StageOutcome, StageStep } from '../types.js';
import { fileStamp, TransformedRecordSchema } from './records.js';

export interface ExportOptions {
  outputDir: string;
  now?: () => Date;
}

export interface ExportFile {
  pipeline_id: number;
  generated_at: string;
  record_count: number;
  data: TransformedRecord[];
}

export function createExportStep(opts: ExportOptions): StageStep {
  const clock = opts.now ?? (() => new Date());

  return {
    name: STAGE_NAMES.EXPORT,
    async run(input, ctx): Promise<StageOutcome<{ outputFile: string }>> {
      const records = z.array(TransformedRecordSchema).parse(input);
      const now = clock();

      const file: ExportFile = {
        pipeline_id: ctx.pipelineId,
        generated_at: now.toISOString(),
        record_count: records.length,
        data: records,
      };

      await mkdir(opts.outputDir, { recursive: true });
      const outputFile = join(opts.outputDir, `pipeline_${ctx.pipelineId}_results_${fileStamp(now)}.json`);
      await writeFile(outputFile, JSON.stringify(file, null, 2), 'utf-8');

      ctx.logger.info('exported dataset', { outputFile, records: records.length });
      return {
        output: { outputFile },
        recordsProcessed: records.length,
        pipelineFields: { outputFile: basename(outputFile) },
        pipelineUpdate: { status: 'completed', recordsProcessed: records.length },
      };
    },
  };
}
