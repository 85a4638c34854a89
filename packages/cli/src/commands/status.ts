/**
 * pipetrack status — show one pipeline and its stages.
 */

import type { PipelineStore, PipelineWithStages } from '@pipetrack/shared';
import { formatPipeline } from './report.js';

export interface StatusResult {
  found: boolean;
  pipeline: PipelineWithStages | null;
  report: string;
}

export function status(store: PipelineStore, pipelineId: number): StatusResult {
  const pipeline = store.getPipeline(pipelineId);
  if (!pipeline) {
    return { found: false, pipeline: null, report: `Pipeline ${pipelineId} not found.` };
  }
  return { found: true, pipeline, report: formatPipeline(pipeline) };
}
