/**
 * Migration 001: run history schema.
 *
 *  - rebase_runs: one row per orchestrator run
 *  - rebase_run_log: the run's progress log, in append order
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const runHistorySchemaMigration: Migration = {
  version: 1,
  name: '001-run-history-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS rebase_runs (
        id                TEXT PRIMARY KEY,
        source_branch     TEXT NOT NULL,
        target_branch     TEXT NOT NULL,
        mode              TEXT NOT NULL DEFAULT 'start',
        snapshot_revision TEXT,
        snapshot_branch   TEXT,
        max_attempts      INTEGER,
        status            TEXT NOT NULL DEFAULT 'running',
        error             TEXT,
        attempts          INTEGER NOT NULL DEFAULT 0,
        rolled_back       INTEGER NOT NULL DEFAULT 0,
        created_at        TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at        TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS rebase_run_log (
        id               INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id           TEXT NOT NULL REFERENCES rebase_runs(id) ON DELETE CASCADE,
        seq              INTEGER NOT NULL,
        timestamp        TEXT NOT NULL,
        stage            TEXT NOT NULL,
        details          TEXT NOT NULL,
        progress_percent INTEGER NOT NULL,
        files            TEXT NOT NULL DEFAULT '[]',
        errors           TEXT NOT NULL DEFAULT '[]',
        UNIQUE (run_id, seq)
      );

      CREATE INDEX IF NOT EXISTS idx_rebase_runs_status ON rebase_runs(status);
      CREATE INDEX IF NOT EXISTS idx_rebase_run_log_run ON rebase_run_log(run_id, seq);
    `)
  },
}
