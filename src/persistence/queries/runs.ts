/**
 * Run history query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { LogEntry, RepositorySnapshot } from '../../core/types.js'
import {
  RunLogRowSchema,
  RunRowSchema,
  type RunLogRecord,
  type RunMode,
  type RunRecord,
  type RunStatusValue,
} from '../schemas/runs.js'

// ---------------------------------------------------------------------------
// Input types
// ---------------------------------------------------------------------------

export interface CreateRunInput {
  id: string
  source_branch: string
  target_branch: string
  mode: RunMode
}

export interface FinishRunInput {
  status: Exclude<RunStatusValue, 'running'>
  error: string | null
  attempts: number
  rolled_back: boolean
}

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

/**
 * Insert a run row in `running` status. A second insert with the same id is
 * ignored.
 */
export function createRun(db: BetterSqlite3Database, input: CreateRunInput): void {
  db.prepare(
    `INSERT OR IGNORE INTO rebase_runs (id, source_branch, target_branch, mode)
     VALUES (@id, @source_branch, @target_branch, @mode)`,
  ).run(input)
}

/**
 * Record the validated branches, the attempt ceiling and the rollback snapshot.
 */
export function recordRunStart(
  db: BetterSqlite3Database,
  id: string,
  start: { source_branch: string; target_branch: string; max_attempts: number; snapshot: RepositorySnapshot },
): void {
  db.prepare(
    `UPDATE rebase_runs
     SET source_branch = @source_branch,
         target_branch = @target_branch,
         max_attempts = @max_attempts,
         snapshot_revision = @snapshot_revision,
         snapshot_branch = @snapshot_branch,
         updated_at = datetime('now')
     WHERE id = @id`,
  ).run({
    id,
    source_branch: start.source_branch,
    target_branch: start.target_branch,
    max_attempts: start.max_attempts,
    snapshot_revision: start.snapshot.revision,
    snapshot_branch: start.snapshot.branch,
  })
}

export function finishRun(db: BetterSqlite3Database, id: string, input: FinishRunInput): void {
  db.prepare(
    `UPDATE rebase_runs
     SET status = @status,
         error = @error,
         attempts = @attempts,
         rolled_back = @rolled_back,
         updated_at = datetime('now')
     WHERE id = @id`,
  ).run({ id, ...input, rolled_back: input.rolled_back ? 1 : 0 })
}

/**
 * Append a log entry; `seq` numbers a run's entries from 1.
 */
export function appendRunLog(db: BetterSqlite3Database, runId: string, entry: LogEntry): void {
  db.prepare(
    `INSERT INTO rebase_run_log (run_id, seq, timestamp, stage, details, progress_percent, files, errors)
     VALUES (
       @run_id,
       (SELECT COALESCE(MAX(seq), 0) + 1 FROM rebase_run_log WHERE run_id = @run_id),
       @timestamp, @stage, @details, @progress_percent, @files, @errors
     )`,
  ).run({
    run_id: runId,
    timestamp: entry.timestamp,
    stage: entry.stage,
    details: entry.details,
    progress_percent: entry.progressPercent,
    files: JSON.stringify(entry.files),
    errors: JSON.stringify(entry.errors),
  })
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

export function getRun(db: BetterSqlite3Database, id: string): RunRecord | undefined {
  const row: unknown = db.prepare('SELECT * FROM rebase_runs WHERE id = ?').get(id)
  return row === undefined ? undefined : RunRowSchema.parse(row)
}

/**
 * Most recent runs first.
 */
export function listRuns(db: BetterSqlite3Database, limit = 20): RunRecord[] {
  return db
    .prepare('SELECT * FROM rebase_runs ORDER BY created_at DESC, rowid DESC LIMIT ?')
    .all(limit)
    .map((row) => RunRowSchema.parse(row))
}

export function getRunLog(db: BetterSqlite3Database, runId: string): RunLogRecord[] {
  return db
    .prepare('SELECT * FROM rebase_run_log WHERE run_id = ? ORDER BY seq ASC')
    .all(runId)
    .map((row) => RunLogRowSchema.parse(row))
}

/**
 * Latest run that captured a snapshot and was not rolled back, still running
 * or failed. Optional branch filters narrow the search.
 */
export function findResumableRun(
  db: BetterSqlite3Database,
  filter: { source_branch?: string; target_branch?: string } = {},
): RunRecord | undefined {
  const row: unknown = db
    .prepare(
      `SELECT * FROM rebase_runs
       WHERE status IN ('running', 'failed')
         AND rolled_back = 0
         AND snapshot_revision IS NOT NULL
         AND (@source_branch IS NULL OR source_branch = @source_branch)
         AND (@target_branch IS NULL OR target_branch = @target_branch)
       ORDER BY created_at DESC, rowid DESC
       LIMIT 1`,
    )
    .get({ source_branch: filter.source_branch ?? null, target_branch: filter.target_branch ?? null })
  return row === undefined ? undefined : RunRowSchema.parse(row)
}
