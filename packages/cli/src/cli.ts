#!/usr/bin/env node

/**
 * pipetrack CLI
 *
 * Usage:
 *   pipetrack run       Create and run a pipeline in process
 *   pipetrack status    Show one pipeline
 *   pipetrack list      List pipelines
 *   pipetrack delete    Delete a pipeline
 */

import { createLogger, errorMessage, loadConfig, PipelineStore } from '@pipetrack/shared';
import { parseCliArgs, USAGE } from './args.js';
import { run } from './commands/run.js';
import { status } from './commands/status.js';
import { list } from './commands/list.js';
import { remove } from './commands/delete.js';

function requireId(id: number | undefined, command: string): number {
  if (id === undefined) {
    throw new Error(`Usage: pipetrack ${command} <id>`);
  }
  return id;
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.command === undefined || args.command === 'help' || args.command === '--help') {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  const logger = createLogger({ level: config.log.level, format: 'pretty' });
  const store = new PipelineStore(config.dbPath);

  try {
    switch (args.command) {
      case 'run': {
        console.log('pipetrack: running pipeline...\n');
        const result = await run({ store, config, logger, name: args.name, records: args.records });
        console.log(result.report);
        if (!result.succeeded) process.exitCode = 1;
        break;
      }

      case 'status': {
        const result = status(store, requireId(args.id, 'status'));
        console.log(result.report);
        if (!result.found) process.exitCode = 1;
        break;
      }

      case 'list': {
        console.log(list(store, { limit: args.limit }).report);
        break;
      }

      case 'delete': {
        const result = remove(store, requireId(args.id, 'delete'));
        console.log(result.report);
        if (!result.deleted) process.exitCode = 1;
        break;
      }

      default:
        console.error(`Unknown command: ${args.command}`);
        console.log(USAGE);
        process.exitCode = 1;
    }
  } finally {
    store.close();
  }
}

main().catch((err: unknown) => {
  console.error('pipetrack error:', errorMessage(err));
  process.exit(1);
});
