/**
 * Built-in stage bodies, one per registry stage.
 */

import type { AppConfig } from '@pipetrack/shared';
import type { StageStep } from '../types.js';
import { createExportStep } from './export.js';
import { createGenerateStep } from './generate.js';
import { createIngestStep } from './ingest.js';
import { createProcessStep } from './process.js';
import { createTransformStep } from './transform.js';

export type StageSettings = Pick<
  AppConfig,
  'inputDir' | 'outputDir' | 'recordCount' | 'batchSize' | 'batchConcurrency'
>;

export interface StageDeps {
  random?: () => number;
  now?: () => Date;
  /** Delay between ingestion attempts. */
  ingestRetryDelayMs?: number;
}

export function createDefaultSteps(settings: StageSettings, deps?: StageDeps): StageStep[] {
  const now = deps?.now;
  return [
    createGenerateStep({ inputDir: settings.inputDir, recordCount: settings.recordCount, random: deps?.random, now }),
    createIngestStep({ retryDelayMs: deps?.ingestRetryDelayMs }),
    createProcessStep({ batchSize: settings.batchSize, batchConcurrency: settings.batchConcurrency, now }),
    createTransformStep({ now }),
    createExportStep({ outputDir: settings.outputDir, now }),
  ];
}

export { createGenerateStep, generateRecords } from './generate.js';
export type { GenerateOptions, GenerateOutput } from './generate.js';
export { createIngestStep } from './ingest.js';
export { createProcessStep, processRecord } from './process.js';
export type { ProcessOptions } from './process.js';
export { createTransformStep, transformRecords, tierFor } from './transform.js';
export { createExportStep } from './export.js';
export type { ExportFile, ExportOptions } from './export.js';
export { fileStamp, round2 } from './records.js';
