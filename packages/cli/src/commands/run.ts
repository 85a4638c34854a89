/**
 * pipetrack run — create a pipeline and run every stage in this process.
 */

import {
  EventBus,
  type AppConfig,
  type Logger,
  type PipelineStore,
  type PipelineWithStages,
} from '@pipetrack/shared';
import {
  createDefaultSteps,
  FlowRunner,
  LocalStatusReporter,
  PipelineDispatcher,
  StatusUpdateProtocol,
  storeFieldRecorder,
  type StageDeps,
} from '@pipetrack/flow';
import { formatPipeline } from './report.js';

export interface RunOptions {
  store: PipelineStore;
  config: AppConfig;
  name?: string;
  records?: number;
  logger?: Logger;
  /** Injected clock and randomness for the built-in stages. */
  stageDeps?: StageDeps;
}

export interface RunCommandResult {
  pipeline: PipelineWithStages;
  succeeded: boolean;
  report: string;
}

export async function run(opts: RunOptions): Promise<RunCommandResult> {
  const { store, config, logger } = opts;
  const bus = new EventBus({ logger });
  const protocol = new StatusUpdateProtocol(store, { bus, logger });
  const runner = new FlowRunner({
    steps: createDefaultSteps(config, opts.stageDeps),
    reporter: new LocalStatusReporter(protocol),
    recorder: storeFieldRecorder(store),
    logger,
    reportRetry: config.statusRetry,
    defaultTimeoutMs: config.stageTimeoutMs,
  });
  const dispatcher = new PipelineDispatcher(store, protocol, runner, { logger, bus });

  const { pipeline } = await dispatcher.createAndTrigger(
    { name: opts.name ?? 'CLI pipeline run', description: 'Started from the command line' },
    opts.records !== undefined ? { input: { recordCount: opts.records } } : undefined
  );
  await dispatcher.waitForIdle();

  const finished = store.getPipeline(pipeline.id) ?? pipeline;
  return {
    pipeline: finished,
    succeeded: finished.status === 'completed',
    report: formatPipeline(finished),
  };
}
