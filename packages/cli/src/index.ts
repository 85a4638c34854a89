/**
 * @pipetrack/cli — command implementations
 */

export { run } from './commands/run.js';
export type { RunOptions, RunCommandResult } from './commands/run.js';
export { status } from './commands/status.js';
export type { StatusResult } from './commands/status.js';
export { list } from './commands/list.js';
export type { ListResult } from './commands/list.js';
export { remove } from './commands/delete.js';
export type { DeleteResult } from './commands/delete.js';
export { formatPipeline, formatPipelineRow } from './commands/report.js';
export { parseCliArgs, USAGE } from './args.js';
export type { CliArgs } from './args.js';
