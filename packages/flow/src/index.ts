/**
 * @pipetrack/flow — pipeline orchestration
 *
 * Status Update Protocol, Flow Runner, status reporters, batch fan-out,
 * built-in stage bodies and the background dispatcher.
 */

export { StatusUpdateProtocol, validateStatusUpdate } from './status-protocol.js';
export type { StagedUpdate, StatusProtocolOptions } from './status-protocol.js';
export { FlowRunner } from './flow-runner.js';
export type { FlowRunnerOptions } from './flow-runner.js';
export { LocalStatusReporter, HttpStatusReporter, toWireStatusUpdate, storeFieldRecorder } from './status-reporter.js';
export type { HttpStatusReporterOptions, WireStatusUpdate } from './status-reporter.js';
export { PipelineDispatcher } from './dispatcher.js';
export type { TriggerResult, DispatcherOptions } from './dispatcher.js';
export { splitIntoBatches, runBatches } from './batch.js';
export type { BatchOptions, BatchRunResult, BatchWorker } from './batch.js';
export { withRetry, withTimeout, getRetryDelay, DEFAULT_RETRY_CONFIG } from './retry.js';
export type { RetryConfig, RetryOptions } from './retry.js';
export * from './stages/index.js';
export type * from './types.js';

export const VERSION = '0.1.0';
