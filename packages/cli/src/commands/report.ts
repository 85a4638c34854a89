/**
 * Plain-text rendering shared by the commands.
 */

import type { Pipeline, PipelineWithStages, Stage } from '@pipetrack/shared';

const STATUS_ICON: Record<string, string> = {
  pending: '·',
  running: '>',
  completed: '✓',
  failed: '✗',
};

function icon(status: string): string {
  return STATUS_ICON[status] ?? '?';
}

function formatSeconds(stage: Stage): string {
  return stage.executionTimeSeconds !== null ? `${stage.executionTimeSeconds.toFixed(2)}s` : '-';
}

export function formatPipeline(pipeline: PipelineWithStages): string {
  const lines = [
    '',
    `=== Pipeline ${pipeline.id}: ${pipeline.name} ===`,
    '',
    `  Status:      ${pipeline.status}`,
    `  Records:     ${pipeline.recordsProcessed}`,
    `  Created:     ${pipeline.createdAt}`,
    `  Input file:  ${pipeline.inputFile ?? '-'}`,
    `  Output file: ${pipeline.outputFile ?? '-'}`,
    `  Run id:      ${pipeline.externalRunId ?? '-'}`,
  ];
  if (pipeline.errorMessage) {
    lines.push(`  Error:       ${pipeline.errorMessage}`);
  }
  lines.push('', '  Stages:');
  for (const stage of pipeline.stages) {
    const error = stage.errorMessage ? `  (${stage.errorMessage})` : '';
    lines.push(`    ${icon(stage.status)} ${stage.name.padEnd(20)} ${stage.status.padEnd(10)} ${formatSeconds(stage)}${error}`);
  }
  lines.push('');
  return lines.join('\n');
}

export function formatPipelineRow(pipeline: Pipeline): string {
  return `  ${String(pipeline.id).padStart(4)}  ${pipeline.status.padEnd(10)} ${String(pipeline.recordsProcessed).padStart(7)}  ${pipeline.name}`;
}
