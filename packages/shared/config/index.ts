/**
 * pipetrack Configuration
 *
 * One explicit struct, built once at startup and handed to constructors.
 * Sources, lowest to highest precedence: defaults, YAML file, environment.
 */

import { existsSync, readFileSync } from 'fs';
import { load } from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors/index.js';
import { LOG_FORMATS, LOG_LEVELS } from '../logger/index.js';

// ─── Schema ───────────────────────────────────────────────────────

const positiveInt = z.coerce.number().int().positive();

export const AppConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(8000),
  host: z.string().min(1).default('0.0.0.0'),
  dbPath: z.string().min(1).default('./data/pipetrack.db'),
  inputDir: z.string().min(1).default('./data/input'),
  outputDir: z.string().min(1).default('./data/output'),
  recordCount: positiveInt.default(1000),
  batchSize: positiveInt.default(200),
  batchConcurrency: positiveInt.default(4),
  stageTimeoutMs: positiveInt.default(60_000),
  /** When set, runs report status over HTTP to this base URL instead of in process. */
  statusUrl: z.string().url().optional(),
  statusRetry: z.object({
    maxRetries: z.coerce.number().int().min(0).default(3),
    baseDelayMs: z.coerce.number().int().min(0).default(200),
  }).default({}),
  log: z.object({
    level: z.enum(LOG_LEVELS).default('info'),
    format: z.enum(LOG_FORMATS).default('json'),
  }).default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// ─── Environment mapping ──────────────────────────────────────────

type Env = Record<string, string | undefined>;

type RawConfig = Record<string, unknown>;

const ENV_KEYS: ReadonlyArray<readonly [string, string]> = [
  ['PORT', 'port'],
  ['HOST', 'host'],
  ['PIPETRACK_DB_PATH', 'dbPath'],
  ['PIPETRACK_INPUT_DIR', 'inputDir'],
  ['PIPETRACK_OUTPUT_DIR', 'outputDir'],
  ['PIPETRACK_RECORD_COUNT', 'recordCount'],
  ['PIPETRACK_BATCH_SIZE', 'batchSize'],
  ['PIPETRACK_BATCH_CONCURRENCY', 'batchConcurrency'],
  ['PIPETRACK_STAGE_TIMEOUT_MS', 'stageTimeoutMs'],
  ['PIPETRACK_STATUS_URL', 'statusUrl'],
];

function present(env: Env, key: string): string | undefined {
  const value = env[key];
  return value !== undefined && value !== '' ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nested(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function applyEnv(raw: RawConfig, env: Env): RawConfig {
  const merged: RawConfig = { ...raw };

  for (const [envKey, field] of ENV_KEYS) {
    const value = present(env, envKey);
    if (value !== undefined) merged[field] = value;
  }

  const retries = present(env, 'PIPETRACK_STATUS_RETRIES');
  if (retries !== undefined) {
    merged.statusRetry = { ...nested(raw.statusRetry), maxRetries: retries };
  }

  const level = present(env, 'LOG_LEVEL');
  const format = present(env, 'LOG_FORMAT');
  if (level !== undefined || format !== undefined) {
    merged.log = {
      ...nested(raw.log),
      ...(level !== undefined ? { level: level.toLowerCase() } : {}),
      ...(format !== undefined ? { format: format.toLowerCase() } : {}),
    };
  }

  return merged;
}

// ─── File loading ─────────────────────────────────────────────────

function readConfigFile(path: string): RawConfig {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  let parsed: unknown;
  try {
    parsed = load(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Config file is not valid YAML: ${path}: ${errorMessage(err)}`);
  }

  if (parsed === undefined || parsed === null) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain a mapping: ${path}`);
  }

  return parsed;
}

// ─── Public API ───────────────────────────────────────────────────

export interface LoadConfigOptions {
  env?: Env;
  /** YAML file path; falls back to PIPETRACK_CONFIG. */
  configPath?: string;
}

export function loadConfig(opts?: LoadConfigOptions): AppConfig {
  const env = opts?.env ?? process.env;
  const configPath = opts?.configPath ?? present(env, 'PIPETRACK_CONFIG');

  const fromFile = configPath ? readConfigFile(configPath) : {};
  const result = AppConfigSchema.safeParse(applyEnv(fromFile, env));

  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid configuration:\n  - ${issues.join('\n  - ')}`, issues);
  }

  return result.data;
}
