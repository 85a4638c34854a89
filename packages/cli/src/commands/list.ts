/**
 * pipetrack list — newest pipelines first.
 */

import type { PipelineStore, PipelineWithStages } from '@pipetrack/shared';
import { formatPipelineRow } from './report.js';

export interface ListResult {
  pipelines: PipelineWithStages[];
  total: number;
  report: string;
}

export function list(store: PipelineStore, opts?: { limit?: number; skip?: number }): ListResult {
  const pipelines = store.listPipelines(opts?.skip ?? 0, opts?.limit ?? 20);
  const total = store.countPipelines();

  if (pipelines.length === 0) {
    return { pipelines, total, report: 'No pipelines yet. Run `pipetrack run` to start one.' };
  }

  const report = [
    '',
    `    ID  ${'STATUS'.padEnd(10)} ${'RECORDS'.padStart(7)}  NAME`,
    ...pipelines.map(formatPipelineRow),
    '',
    `  Showing ${pipelines.length} of ${total}`,
    '',
  ].join('\n');

  return { pipelines, total, report };
}
