/**
 * Pipeline Store — durable record of pipelines and their stages.
 *
 * SQLite via better-sqlite3 (synchronous, WAL, zero-ops). Every other
 * package reads and writes pipeline state through this class.
 *
 * Getters return null for unknown ids; they never throw for absence.
 */

import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import type {
  CreatePipelineAttrs,
  Pipeline,
  PipelinePatch,
  PipelineStatus,
  PipelineWithStages,
  Stage,
  StageDefinition,
  StagePatch,
} from '../types/index.js';
import { isPipelineStatus } from '../types/index.js';
import { ValidationError } from '../errors/index.js';
import { defaultStages, normalizeStageName } from '../stage-registry/index.js';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS pipelines (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  description TEXT,
  status TEXT NOT NULL DEFAULT 'pending'
    CHECK (status IN ('pending', 'running', 'completed', 'failed')),
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  input_file TEXT,
  output_file TEXT,
  external_run_id TEXT,
  records_processed INTEGER NOT NULL DEFAULT 0 CHECK (records_processed >= 0),
  error_message TEXT
);

CREATE TABLE IF NOT EXISTS pipeline_stages (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  pipeline_id INTEGER NOT NULL REFERENCES pipelines(id) ON DELETE CASCADE,
  name TEXT NOT NULL COLLATE NOCASE,
  description TEXT,
  status TEXT NOT NULL DEFAULT 'pending'
    CHECK (status IN ('pending', 'running', 'completed', 'failed')),
  started_at TEXT,
  completed_at TEXT,
  execution_time_seconds REAL,
  error_message TEXT,
  UNIQUE (pipeline_id, name)
);

CREATE INDEX IF NOT EXISTS idx_pipelines_created ON pipelines(created_at);
CREATE INDEX IF NOT EXISTS idx_stages_pipeline ON pipeline_stages(pipeline_id);

CREATE TRIGGER IF NOT EXISTS trg_stage_pipeline_immutable
BEFORE UPDATE OF pipeline_id ON pipeline_stages
BEGIN
  SELECT RAISE(ABORT, 'pipeline_id is immutable');
END;
`;

// ─── Row shapes ───────────────────────────────────────────────────

interface PipelineRow {
  id: number;
  name: string;
  description: string | null;
  status: PipelineStatus; // CHECK constraint keeps this in the enum
  created_at: string;
  updated_at: string;
  input_file: string | null;
  output_file: string | null;
  external_run_id: string | null;
  records_processed: number;
  error_message: string | null;
}

interface StageRow {
  id: number;
  pipeline_id: number;
  name: string;
  description: string | null;
  status: PipelineStatus;
  started_at: string | null;
  completed_at: string | null;
  execution_time_seconds: number | null;
  error_message: string | null;
}

type SqlValue = string | number | null;

const PIPELINE_COLUMNS = [
  ['name', 'name'],
  ['description', 'description'],
  ['status', 'status'],
  ['inputFile', 'input_file'],
  ['outputFile', 'output_file'],
  ['externalRunId', 'external_run_id'],
  ['recordsProcessed', 'records_processed'],
  ['errorMessage', 'error_message'],
] as const satisfies readonly (readonly [keyof PipelinePatch, string])[];

const STAGE_COLUMNS = [
  ['description', 'description'],
  ['status', 'status'],
  ['startedAt', 'started_at'],
  ['completedAt', 'completed_at'],
  ['executionTimeSeconds', 'execution_time_seconds'],
  ['errorMessage', 'error_message'],
] as const satisfies readonly (readonly [keyof StagePatch, string])[];

export interface PipelineStoreOptions {
  /** Clock used for created_at / updated_at. */
  now?: () => Date;
  /** Stage set inserted by createPipeline. Defaults to the stage registry. */
  stages?: () => StageDefinition[];
}

export class PipelineStore {
  private db: Database.Database;
  private now: () => Date;
  private stageSource: () => StageDefinition[];

  constructor(dbPath = ':memory:', opts?: PipelineStoreOptions) {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(SCHEMA);
    this.now = opts?.now ?? (() => new Date());
    this.stageSource = opts?.stages ?? defaultStages;
  }

  // ─── Transactions ─────────────────────────────────────────────

  /**
   * Run `fn` inside BEGIN IMMEDIATE. The write lock is taken up front, so a
   * read-modify-write inside `fn` cannot interleave with another writer.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  // ─── Pipelines ────────────────────────────────────────────────

  /**
   * Insert a pending pipeline plus one pending stage per registry entry.
   * Both inserts commit together or not at all.
   */
  createPipeline(attrs: CreatePipelineAttrs): PipelineWithStages {
    if (!attrs.name || attrs.name.trim() === '') {
      throw new ValidationError('Pipeline name is required', ['name: required']);
    }

    const pipelineId = this.transaction(() => {
      const timestamp = this.now().toISOString();
      const info = this.db.prepare<SqlValue[]>(`
        INSERT INTO pipelines (name, description, status, created_at, updated_at, input_file, output_file, records_processed)
        VALUES (?, ?, 'pending', ?, ?, ?, ?, 0)
      `).run(
        attrs.name,
        attrs.description ?? null,
        timestamp,
        timestamp,
        attrs.inputFile ?? null,
        attrs.outputFile ?? null
      );
      const id = Number(info.lastInsertRowid);

      const insertStage = this.db.prepare<SqlValue[]>(`
        INSERT INTO pipeline_stages (pipeline_id, name, description, status)
        VALUES (?, ?, ?, 'pending')
      `);
      for (const stage of this.stageSource()) {
        insertStage.run(id, stage.name, stage.description);
      }
      return id;
    });

    const created = this.getPipeline(pipelineId);
    if (!created) {
      throw new Error(`Pipeline ${pipelineId} vanished after insert`);
    }
    return created;
  }

  getPipeline(id: number): PipelineWithStages | null {
    const row = this.db.prepare<[number], PipelineRow>(
      'SELECT * FROM pipelines WHERE id = ?'
    ).get(id);
    if (!row) return null;
    return { ...mapPipelineRow(row), stages: this.getStages(id) };
  }

  /**
   * Newest first. Ties on created_at fall back to insertion order.
   */
  listPipelines(skip = 0, limit = 100): PipelineWithStages[] {
    const rows = this.db.prepare<[number, number], PipelineRow>(
      'SELECT * FROM pipelines ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?'
    ).all(Math.max(0, limit), Math.max(0, skip));
    return rows.map(row => ({ ...mapPipelineRow(row), stages: this.getStages(row.id) }));
  }

  countPipelines(): number {
    const row = this.db.prepare<[], { total: number }>(
      'SELECT COUNT(*) AS total FROM pipelines'
    ).get();
    return row?.total ?? 0;
  }

  /**
   * Apply field-level updates. updated_at is always refreshed, even for an
   * empty patch.
   */
  updatePipeline(id: number, patch: PipelinePatch): Pipeline | null {
    validatePipelinePatch(patch);

    const sets: string[] = ['updated_at = ?'];
    const values: SqlValue[] = [this.now().toISOString()];
    for (const [key, column] of PIPELINE_COLUMNS) {
      const value = patch[key];
      if (value === undefined) continue;
      sets.push(`${column} = ?`);
      values.push(value);
    }
    values.push(id);

    const info = this.db.prepare<SqlValue[]>(
      `UPDATE pipelines SET ${sets.join(', ')} WHERE id = ?`
    ).run(...values);
    if (info.changes === 0) return null;

    const row = this.db.prepare<[number], PipelineRow>(
      'SELECT * FROM pipelines WHERE id = ?'
    ).get(id);
    return row ? mapPipelineRow(row) : null;
  }

  deletePipeline(id: number): boolean {
    const info = this.db.prepare<[number]>('DELETE FROM pipelines WHERE id = ?').run(id);
    return info.changes > 0;
  }

  // ─── Stages ───────────────────────────────────────────────────

  getStages(pipelineId: number): Stage[] {
    const rows = this.db.prepare<[number], StageRow>(
      'SELECT * FROM pipeline_stages WHERE pipeline_id = ? ORDER BY id ASC'
    ).all(pipelineId);
    return rows.map(mapStageRow);
  }

  getStage(id: number): Stage | null {
    const row = this.db.prepare<[number], StageRow>(
      'SELECT * FROM pipeline_stages WHERE id = ?'
    ).get(id);
    return row ? mapStageRow(row) : null;
  }

  /**
   * Case-insensitive lookup that also accepts the normalized form, so
   * `data_generation` and `Data Generation` resolve to the same row.
   * Stored names are never rewritten.
   */
  findStageByName(pipelineId: number, name: string): Stage | null {
    const row = this.db.prepare<[number, string, string], StageRow>(`
      SELECT * FROM pipeline_stages
      WHERE pipeline_id = ? AND (name = ? OR name = ?)
      ORDER BY id ASC
      LIMIT 1
    `).get(pipelineId, name.trim(), normalizeStageName(name));
    return row ? mapStageRow(row) : null;
  }

  updateStage(id: number, patch: StagePatch): Stage | null {
    if (patch.status !== undefined && !isPipelineStatus(patch.status)) {
      throw new ValidationError(`Invalid stage status: ${String(patch.status)}`, ['status: invalid']);
    }

    const sets: string[] = [];
    const values: SqlValue[] = [];
    for (const [key, column] of STAGE_COLUMNS) {
      const value = patch[key];
      if (value === undefined) continue;
      sets.push(`${column} = ?`);
      values.push(value);
    }

    if (sets.length > 0) {
      values.push(id);
      this.db.prepare<SqlValue[]>(
        `UPDATE pipeline_stages SET ${sets.join(', ')} WHERE id = ?`
      ).run(...values);
    }
    return this.getStage(id);
  }

  // ─── Lifecycle ────────────────────────────────────────────────

  close(): void {
    this.db.close();
  }

  getDb(): Database.Database {
    return this.db;
  }
}

// ─── Mapping & validation ─────────────────────────────────────────

function validatePipelinePatch(patch: PipelinePatch): void {
  const issues: string[] = [];
  if (patch.status !== undefined && !isPipelineStatus(patch.status)) {
    issues.push(`status: must be one of pending, running, completed, failed (got "${String(patch.status)}")`);
  }
  if (patch.recordsProcessed !== undefined) {
    const n = patch.recordsProcessed;
    if (!Number.isInteger(n) || n < 0) {
      issues.push(`recordsProcessed: must be a non-negative integer (got ${n})`);
    }
  }
  if (patch.name !== undefined && patch.name.trim() === '') {
    issues.push('name: must not be empty');
  }
  if (issues.length > 0) {
    throw new ValidationError(`Invalid pipeline update: ${issues.join('; ')}`, issues);
  }
}

function mapPipelineRow(row: PipelineRow): Pipeline {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    inputFile: row.input_file,
    outputFile: row.output_file,
    externalRunId: row.external_run_id,
    recordsProcessed: row.records_processed,
    errorMessage: row.error_message,
  };
}

function mapStageRow(row: StageRow): Stage {
  return {
    id: row.id,
    pipelineId: row.pipeline_id,
    name: row.name,
    description: row.description,
    status: row.status,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    executionTimeSeconds: row.execution_time_seconds,
    errorMessage: row.error_message,
  };
}
