/**
 * pipetrack delete — remove a pipeline and its stages.
 */

import type { PipelineStore } from '@pipetrack/shared';

export interface DeleteResult {
  deleted: boolean;
  report: string;
}

export function remove(store: PipelineStore, pipelineId: number): DeleteResult {
  const deleted = store.deletePipeline(pipelineId);
  return {
    deleted,
    report: deleted ? `Deleted pipeline ${pipelineId}.` : `Pipeline ${pipelineId} not found.`,
  };
}
