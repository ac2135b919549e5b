// audit_trail.ts — durable record of job runs and their steps
//
// GUARANTEES:
// - One row per run, one row per step; nothing is ever deleted
// - Status moves one way only: running -> success | failed | skipped
// - Every mutation is its own BEGIN IMMEDIATE transaction, so several job
//   processes can share one database file
// - A run cannot reach a terminal status with a step still running
// - Steps replay in insertion order
//
// CONTRACT: Synchronous API (better-sqlite3 blocks by design); withStep is
// async only because step bodies are.

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

import { ERRORS, KernelError, messageOf } from './errors';
import { Logger, silentLogger } from './logger';
import { stableStringify } from './publish/stable_stringify';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type RunStatus = 'running' | 'success' | 'failed' | 'skipped';
export type TerminalStatus = Exclude<RunStatus, 'running'>;

export interface RunSignatures {
  currentUpstream: string | null;
  previousUpstream: string | null;
  previousJob: string | null;
  jobResult: string | null;
}

export interface RunRecord {
  runId: string;
  name: string;
  startedAt: Date;
  finishedAt: Date | null;
  status: RunStatus;
  meta: Record<string, unknown>;
  inputSignatureHash: string | null;
  outputSignatureHash: string | null;
  outputPath: string | null;
  parentRunId: string | null;
  signatures: RunSignatures;
}

export interface StepRecord {
  stepId: number;
  runId: string;
  name: string;
  startedAt: Date;
  finishedAt: Date | null;
  status: RunStatus;
  message: string | null;
}

export interface StepHandle {
  readonly stepId: number;
  readonly runId: string;
  readonly name: string;
}

/** What a step body hands back; status defaults to success. */
export interface StepResult<T> {
  status?: TerminalStatus;
  message?: string;
  data: T;
}

export interface StartRunOptions {
  parentRunId?: string;
  inputSignatureHash?: string;
}

export interface FinishRunOptions {
  outputSignatureHash?: string;
  outputPath?: string;
}

export const SIGNATURE_COLUMNS = {
  input: 'input_sig_hash',
  currentUpstream: 'current_upstream_signature',
  previousUpstream: 'previous_upstream_signature',
  previousJob: 'previous_job_signature',
  jobResult: 'job_result_signature',
} as const;

export type SignatureKind = keyof typeof SIGNATURE_COLUMNS;

export interface AuditTrailOptions {
  logger?: Logger;
  now?: () => Date;
  busyTimeoutMs?: number;
}

interface RunRow {
  run_id: string;
  name: string;
  started_at: string;
  finished_at: string | null;
  status: RunStatus;
  meta_json: string;
  input_sig_hash: string | null;
  output_sig_hash: string | null;
  output_path: string | null;
  parent_run_id: string | null;
  current_upstream_signature: string | null;
  previous_upstream_signature: string | null;
  previous_job_signature: string | null;
  job_result_signature: string | null;
}

interface StepRow {
  id: number;
  run_id: string;
  name: string;
  started_at: string;
  finished_at: string | null;
  status: RunStatus;
  message: string | null;
}

/* -------------------------------------------------------------------------- */
/* Constants / helpers                                                        */
/* -------------------------------------------------------------------------- */

/** Version stamped by the last migration below. */
export const SCHEMA_VERSION = 2;

const ABANDONED_STEP_MESSAGE = 'run finished while step was still running';

export function succeeded<T>(data: T, message?: string): StepResult<T> {
  return { status: 'success', message, data };
}

export function skipped<T>(data: T, message: string): StepResult<T> {
  return { status: 'skipped', message, data };
}

function parseMeta(text: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return parsed as Record<string, unknown>;
    }
  } catch {
    // fall through: keep the raw text visible rather than dropping it
  }
  return { raw: text };
}

function toRun(row: RunRow): RunRecord {
  return {
    runId: row.run_id,
    name: row.name,
    startedAt: new Date(row.started_at),
    finishedAt: row.finished_at ? new Date(row.finished_at) : null,
    status: row.status,
    meta: parseMeta(row.meta_json),
    inputSignatureHash: row.input_sig_hash,
    outputSignatureHash: row.output_sig_hash,
    outputPath: row.output_path,
    parentRunId: row.parent_run_id,
    signatures: {
      currentUpstream: row.current_upstream_signature,
      previousUpstream: row.previous_upstream_signature,
      previousJob: row.previous_job_signature,
      jobResult: row.job_result_signature,
    },
  };
}

function toStep(row: StepRow): StepRecord {
  return {
    stepId: row.id,
    runId: row.run_id,
    name: row.name,
    startedAt: new Date(row.started_at),
    finishedAt: row.finished_at ? new Date(row.finished_at) : null,
    status: row.status,
    message: row.message,
  };
}

/* -------------------------------------------------------------------------- */
/* Audit Trail                                                                */
/* -------------------------------------------------------------------------- */

export class AuditTrail {
  private readonly db: Database.Database;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(dbPath: string, opts: AuditTrailOptions = {}) {
    this.log = opts.logger ?? silentLogger();
    this.now = opts.now ?? (() => new Date());

    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.configureDatabase(opts.busyTimeoutMs ?? 5000);
    this.runMigrations();
    this.integrityCheck();
  }

  /* ------------------------------------------------------------------------ */
  /* SQLite Configuration                                                     */
  /* ------------------------------------------------------------------------ */

  private configureDatabase(busyTimeoutMs: number): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma(`busy_timeout = ${Math.max(0, Math.floor(busyTimeoutMs))}`);
  }

  /** Single-writer transaction: takes the write lock up front. */
  private write<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  /* ------------------------------------------------------------------------ */
  /* Migrations                                                               */
  /* ------------------------------------------------------------------------ */

  private runMigrations(): void {
    this.write(() => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT DEFAULT CURRENT_TIMESTAMP
        ) STRICT
      `);

      const row = this.db
        .prepare(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
        .get() as { version: number } | undefined;

      const current = row?.version ?? 0;

      if (current < 1) {
        this.db.exec(`
          CREATE TABLE IF NOT EXISTS runs (
            run_id          TEXT PRIMARY KEY,
            name            TEXT NOT NULL,
            started_at      TEXT NOT NULL,
            finished_at     TEXT,
            status          TEXT NOT NULL,
            meta_json       TEXT NOT NULL DEFAULT '{}',
            input_sig_hash  TEXT,
            output_sig_hash TEXT,
            parent_run_id   TEXT,
            FOREIGN KEY (parent_run_id) REFERENCES runs(run_id),
            CHECK(status IN ('running','success','failed','skipped'))
          ) STRICT;

          CREATE TABLE IF NOT EXISTS steps (
            id          INTEGER PRIMARY KEY AUTOINCREMENT,
            run_id      TEXT NOT NULL,
            name        TEXT NOT NULL,
            started_at  TEXT NOT NULL,
            finished_at TEXT,
            status      TEXT NOT NULL,
            message     TEXT,
            FOREIGN KEY (run_id) REFERENCES runs(run_id),
            CHECK(status IN ('running','success','failed','skipped'))
          ) STRICT;

          CREATE INDEX IF NOT EXISTS idx_steps_run ON steps(run_id);
          CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);
          CREATE INDEX IF NOT EXISTS idx_runs_name ON runs(name, started_at);
          CREATE INDEX IF NOT EXISTS idx_runs_parent ON runs(parent_run_id);
        `);

        this.db.prepare(`INSERT INTO schema_version (version) VALUES (1)`).run();
      }

      // v2: output path and the upstream/job signature columns
      if (current < SCHEMA_VERSION) {
        const cols = this.db.prepare(`PRAGMA table_info(runs)`).all() as Array<{ name: string }>;
        const have = new Set(cols.map((c) => c.name));
        const added = [
          'output_path',
          SIGNATURE_COLUMNS.currentUpstream,
          SIGNATURE_COLUMNS.previousUpstream,
          SIGNATURE_COLUMNS.previousJob,
          SIGNATURE_COLUMNS.jobResult,
        ];
        for (const col of added) {
          if (!have.has(col)) this.db.exec(`ALTER TABLE runs ADD COLUMN ${col} TEXT`);
        }

        this.db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(SCHEMA_VERSION);
      }

      // Future migrations: add only, never remove; the newest one stamps SCHEMA_VERSION.
    });
  }

  private integrityCheck(): void {
    const result = this.db.prepare('PRAGMA quick_check').get() as { quick_check: string } | undefined;
    if (result?.quick_check !== 'ok') {
      throw new KernelError(`Audit database integrity check failed: ${result?.quick_check}`, ERRORS.IO_ERROR);
    }
  }

  schemaVersion(): number {
    const row = this.db.prepare(`SELECT MAX(version) AS v FROM schema_version`).get() as { v: number | null };
    return row.v ?? 0;
  }

  /* ------------------------------------------------------------------------ */
  /* Runs                                                                     */
  /* ------------------------------------------------------------------------ */

  startRun(runId: string, name: string, meta: Record<string, unknown> = {}, opts: StartRunOptions = {}): void {
    const startedAt = this.now().toISOString();

    this.write(() => {
      const existing = this.db.prepare(`SELECT status FROM runs WHERE run_id = ?`).get(runId);
      if (existing) {
        throw new KernelError(`Run already started: ${runId}`, ERRORS.ALREADY_STARTED, { runId });
      }

      if (opts.parentRunId !== undefined) {
        const parent = this.db.prepare(`SELECT 1 FROM runs WHERE run_id = ?`).get(opts.parentRunId);
        if (!parent) {
          throw new KernelError(`Parent run not found: ${opts.parentRunId}`, ERRORS.RUN_NOT_FOUND, {
            runId,
            parentRunId: opts.parentRunId,
          });
        }
      }

      this.db
        .prepare(
          `INSERT INTO runs (run_id, name, started_at, status, meta_json, input_sig_hash, parent_run_id)
           VALUES (?, ?, ?, 'running', ?, ?, ?)`
        )
        .run(runId, name, startedAt, stableStringify(meta), opts.inputSignatureHash ?? null, opts.parentRunId ?? null);
    });

    this.log.debug('run started', { runId, name, parentRunId: opts.parentRunId });
  }

  /**
   * Moves a running run to its terminal status. Steps still running at this
   * point are closed as failed in the same transaction.
   */
  finishRun(runId: string, status: TerminalStatus, opts: FinishRunOptions = {}): void {
    const finishedAt = this.now().toISOString();

    const abandoned = this.write(() => {
      const row = this.db.prepare(`SELECT status FROM runs WHERE run_id = ?`).get(runId) as
        | { status: RunStatus }
        | undefined;

      if (!row) throw new KernelError(`Run not found: ${runId}`, ERRORS.RUN_NOT_FOUND, { runId });
      if (row.status !== 'running') {
        throw new KernelError(
          `Invalid run transition ${row.status} → ${status} for ${runId}`,
          ERRORS.INVALID_STATE_TRANSITION,
          { runId, from: row.status, to: status }
        );
      }

      const closed = this.db
        .prepare(
          `UPDATE steps SET status = 'failed', finished_at = ?, message = ?
           WHERE run_id = ? AND status = 'running'`
        )
        .run(finishedAt, ABANDONED_STEP_MESSAGE, runId).changes;

      this.db
        .prepare(
          `UPDATE runs
           SET finished_at = ?, status = ?,
               output_sig_hash = COALESCE(?, output_sig_hash),
               output_path = COALESCE(?, output_path)
           WHERE run_id = ?`
        )
        .run(finishedAt, status, opts.outputSignatureHash ?? null, opts.outputPath ?? null, runId);

      return closed;
    });

    if (abandoned > 0) {
      this.log.warn('closed steps left running', { runId, count: abandoned });
    }
    this.log.debug('run finished', { runId, status });
  }

  recordSignature(runId: string, kind: SignatureKind, value: string | null): void {
    const column = SIGNATURE_COLUMNS[kind];

    this.write(() => {
      const row = this.db.prepare(`SELECT status FROM runs WHERE run_id = ?`).get(runId) as
        | { status: RunStatus }
        | undefined;

      if (!row) throw new KernelError(`Run not found: ${runId}`, ERRORS.RUN_NOT_FOUND, { runId });
      if (row.status !== 'running') {
        throw new KernelError(`Run ${runId} is ${row.status}; signatures are frozen`, ERRORS.INVALID_STATE_TRANSITION, {
          runId,
          column,
        });
      }

      this.db.prepare(`UPDATE runs SET ${column} = ? WHERE run_id = ?`).run(value, runId);
    });
  }

  /* ------------------------------------------------------------------------ */
  /* Steps                                                                    */
  /* ------------------------------------------------------------------------ */

  startStep(runId: string, name: string): StepHandle {
    const startedAt = this.now().toISOString();

    const stepId = this.write(() => {
      const run = this.db.prepare(`SELECT status FROM runs WHERE run_id = ?`).get(runId) as
        | { status: RunStatus }
        | undefined;

      if (!run) throw new KernelError(`Run not found: ${runId}`, ERRORS.RUN_NOT_FOUND, { runId });
      if (run.status !== 'running') {
        throw new KernelError(`Cannot add step to ${run.status} run ${runId}`, ERRORS.INVALID_STATE_TRANSITION, {
          runId,
          step: name,
        });
      }

      const info = this.db
        .prepare(`INSERT INTO steps (run_id, name, started_at, status) VALUES (?, ?, ?, 'running')`)
        .run(runId, name, startedAt);
      return Number(info.lastInsertRowid);
    });

    return Object.freeze({ stepId, runId, name });
  }

  finishStep(step: StepHandle, status: TerminalStatus, message?: string): void {
    const finishedAt = this.now().toISOString();

    this.write(() => {
      const row = this.db.prepare(`SELECT status FROM steps WHERE id = ?`).get(step.stepId) as
        | { status: RunStatus }
        | undefined;

      if (!row) throw new KernelError(`Step not found: ${step.stepId}`, ERRORS.STEP_NOT_FOUND, { ...step });
      if (row.status !== 'running') {
        throw new KernelError(
          `Invalid step transition ${row.status} → ${status} for ${step.name}`,
          ERRORS.INVALID_STATE_TRANSITION,
          { ...step, from: row.status, to: status }
        );
      }

      this.db
        .prepare(`UPDATE steps SET finished_at = ?, status = ?, message = ? WHERE id = ?`)
        .run(finishedAt, status, message ?? null, step.stepId);
    });
  }

  /**
   * Runs `body` as one step. The step is finished on every exit path: with
   * the status the body returns (default success), or as failed with the
   * error text when the body throws. The error is re-thrown afterwards.
   */
  async withStep<T>(
    runId: string,
    name: string,
    body: (step: StepHandle) => Promise<StepResult<T>> | StepResult<T>
  ): Promise<StepResult<T>> {
    const step = this.startStep(runId, name);

    let result: StepResult<T>;
    try {
      result = await body(step);
    } catch (e) {
      try {
        this.finishStep(step, 'failed', messageOf(e));
      } catch (recordErr) {
        this.log.error('could not record failed step', { runId, step: name, error: messageOf(recordErr) });
      }
      throw e;
    }

    this.finishStep(step, result.status ?? 'success', result.message);
    return result;
  }

  /* ------------------------------------------------------------------------ */
  /* Queries                                                                  */
  /* ------------------------------------------------------------------------ */

  getRun(runId: string): RunRecord | null {
    const row = this.db.prepare(`SELECT * FROM runs WHERE run_id = ?`).get(runId) as RunRow | undefined;
    return row ? toRun(row) : null;
  }

  /** Most recent first. */
  lastRuns(limit = 10): RunRecord[] {
    const rows = this.db
      .prepare(`SELECT * FROM runs ORDER BY started_at DESC, rowid DESC LIMIT ?`)
      .all(Math.max(0, Math.floor(limit))) as RunRow[];
    return rows.map(toRun);
  }

  /** Most recent run of a job, optionally restricted to one status. */
  lastRun(name: string, status?: RunStatus): RunRecord | null {
    const row = (
      status === undefined
        ? this.db.prepare(`SELECT * FROM runs WHERE name = ? ORDER BY started_at DESC, rowid DESC LIMIT 1`).get(name)
        : this.db
            .prepare(`SELECT * FROM runs WHERE name = ? AND status = ? ORDER BY started_at DESC, rowid DESC LIMIT 1`)
            .get(name, status)
    ) as RunRow | undefined;
    return row ? toRun(row) : null;
  }

  childRuns(parentRunId: string): RunRecord[] {
    const rows = this.db
      .prepare(`SELECT * FROM runs WHERE parent_run_id = ? ORDER BY started_at ASC, rowid ASC`)
      .all(parentRunId) as RunRow[];
    return rows.map(toRun);
  }

  /** Insertion order. */
  stepsFor(runId: string): StepRecord[] {
    const rows = this.db.prepare(`SELECT * FROM steps WHERE run_id = ? ORDER BY id ASC`).all(runId) as StepRow[];
    return rows.map(toStep);
  }

  /* ------------------------------------------------------------------------ */
  /* Close                                                                    */
  /* ------------------------------------------------------------------------ */

  close(): void {
    this.db.close();
  }
}
