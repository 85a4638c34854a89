/**
 * Argument parsing for the pipetrack command line.
 */

import { parseArgs } from 'util';
import { ValidationError } from '@pipetrack/shared';

export const USAGE = `
pipetrack — data pipeline tracking

Usage:
  pipetrack run [--name N] [--records N]   Create a pipeline and run it here
  pipetrack status <id>                    Show a pipeline and its stages
  pipetrack list [--limit N]               List pipelines, newest first
  pipetrack delete <id>                    Delete a pipeline
  pipetrack help                           Show this help message

Configuration comes from PIPETRACK_* environment variables or the YAML file
named by PIPETRACK_CONFIG.
`;

export interface CliArgs {
  command: string | undefined;
  id?: number;
  name?: string;
  records?: number;
  limit?: number;
}

function positiveInt(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${flag} must be a positive integer (got "${raw}")`, [`${flag}: invalid`]);
  }
  return value;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      name: { type: 'string' },
      records: { type: 'string' },
      limit: { type: 'string' },
    },
  });

  const [command, rawId] = positionals;
  const args: CliArgs = { command };

  const id = positiveInt('id', rawId);
  if (id !== undefined) args.id = id;
  if (values.name !== undefined) args.name = values.name;
  const records = positiveInt('--records', values.records);
  if (records !== undefined) args.records = records;
  const limit = positiveInt('--limit', values.limit);
  if (limit !== undefined) args.limit = limit;

  return args;
}
