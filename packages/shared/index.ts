/**
 * @pipetrack/shared — Shared infrastructure for all pipetrack packages
 *
 * - Pipeline Store: pipelines + stages in SQLite
 * - Stage Registry: the fixed, ordered stage set
 * - Event Bus: in-process, best-effort status notifications
 * - Logger, errors, configuration
 */

export { PipelineStore } from './pipeline-store/index.js';
export type { PipelineStoreOptions } from './pipeline-store/index.js';
export { EventBus, createEvent } from './event-bus/index.js';
export { defaultStages, normalizeStageName, STAGE_NAMES } from './stage-registry/index.js';
export type { StageName } from './stage-registry/index.js';
export { createLogger, BufferLogger, LOG_LEVELS, LOG_FORMATS, DEFAULT_LOGGER_CONFIG } from './logger/index.js';
export type { Logger, LoggerConfig, LogLevel, LogFormat, LogEntry, LogData } from './logger/index.js';
export {
  PipetrackError,
  ValidationError,
  StageExecutionError,
  TransportError,
  ConfigError,
  errorMessage,
} from './errors/index.js';
export type { ErrorCode } from './errors/index.js';
export { loadConfig, AppConfigSchema } from './config/index.js';
export type { AppConfig, LoadConfigOptions } from './config/index.js';
export { PIPELINE_STATUSES, TERMINAL_STATUSES, isPipelineStatus, isTerminalStatus } from './types/index.js';
export type * from './types/index.js';
