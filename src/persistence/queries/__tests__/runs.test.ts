/**
 * Unit tests for run history query functions.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { DatabaseWrapper } from '../../database.js'
import { runMigrations } from '../../migrations/index.js'
import {
  appendRunLog,
  createRun,
  findResumableRun,
  finishRun,
  getRun,
  getRunLog,
  listRuns,
  recordRunStart,
} from '../runs.js'
import type { LogEntry } from '../../../core/types.js'

function entry(details: string, overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: '2026-03-01T10:00:00.000Z',
    stage: 'resolving_conflicts',
    details,
    progressPercent: 25,
    files: [],
    errors: [],
    ...overrides,
  }
}

describe('run history queries', () => {
  let wrapper: DatabaseWrapper
  let db: BetterSqlite3Database

  beforeEach(() => {
    wrapper = new DatabaseWrapper(':memory:')
    wrapper.open()
    runMigrations(wrapper.db)
    db = wrapper.db
  })

  afterEach(() => {
    wrapper.close()
  })

  // -------------------------------------------------------------------------
  // createRun / recordRunStart / finishRun
  // -------------------------------------------------------------------------

  it('creates a running run and fills it in as it progresses', () => {
    createRun(db, { id: 'run-1', source_branch: 'feature', target_branch: 'main', mode: 'start' })
    expect(getRun(db, 'run-1')).toMatchObject({
      id: 'run-1',
      status: 'running',
      snapshot_revision: null,
      max_attempts: null,
      attempts: 0,
      rolled_back: false,
    })

    recordRunStart(db, 'run-1', {
      source_branch: 'feature',
      target_branch: 'main',
      max_attempts: 4,
      snapshot: { revision: 'abc1234', branch: 'feature' },
    })
    finishRun(db, 'run-1', { status: 'failed', error: 'boom', attempts: 2, rolled_back: true })

    expect(getRun(db, 'run-1')).toMatchObject({
      status: 'failed',
      error: 'boom',
      attempts: 2,
      rolled_back: true,
      max_attempts: 4,
      snapshot_revision: 'abc1234',
      snapshot_branch: 'feature',
    })
  })

  it('ignores a duplicate create', () => {
    createRun(db, { id: 'run-1', source_branch: 'feature', target_branch: 'main', mode: 'start' })
    createRun(db, { id: 'run-1', source_branch: 'other', target_branch: 'main', mode: 'resume' })
    expect(getRun(db, 'run-1')?.source_branch).toBe('feature')
  })

  it('returns undefined for an unknown run', () => {
    expect(getRun(db, 'missing')).toBeUndefined()
  })

  // -------------------------------------------------------------------------
  // Log
  // -------------------------------------------------------------------------

  it('numbers log entries per run and round-trips their arrays', () => {
    createRun(db, { id: 'run-1', source_branch: 'feature', target_branch: 'main', mode: 'start' })
    createRun(db, { id: 'run-2', source_branch: 'feature', target_branch: 'main', mode: 'start' })

    appendRunLog(db, 'run-1', entry('first', { files: ['a.ts', 'b.ts'] }))
    appendRunLog(db, 'run-2', entry('other run'))
    appendRunLog(db, 'run-1', entry('second', { stage: 'failed', errors: ['x'], progressPercent: 100 }))

    expect(getRunLog(db, 'run-1')).toEqual([
      {
        run_id: 'run-1',
        seq: 1,
        timestamp: '2026-03-01T10:00:00.000Z',
        stage: 'resolving_conflicts',
        details: 'first',
        progress_percent: 25,
        files: ['a.ts', 'b.ts'],
        errors: [],
      },
      {
        run_id: 'run-1',
        seq: 2,
        timestamp: '2026-03-01T10:00:00.000Z',
        stage: 'failed',
        details: 'second',
        progress_percent: 100,
        files: [],
        errors: ['x'],
      },
    ])
    expect(getRunLog(db, 'run-2').map((r) => r.seq)).toEqual([1])
  })

  it('rejects log entries for unknown runs', () => {
    expect(() => appendRunLog(db, 'missing', entry('orphan'))).toThrow()
  })

  // -------------------------------------------------------------------------
  // listRuns / findResumableRun
  // -------------------------------------------------------------------------

  it('lists the newest runs first up to the limit', () => {
    for (const id of ['run-1', 'run-2', 'run-3']) {
      createRun(db, { id, source_branch: 'feature', target_branch: 'main', mode: 'start' })
    }
    expect(listRuns(db, 2).map((r) => r.id)).toEqual(['run-3', 'run-2'])
  })

  it('finds the latest run with a snapshot that was not rolled back', () => {
    const snapshot = { revision: 'abc1234', branch: 'feature' }
    const start = { source_branch: 'feature', target_branch: 'main', max_attempts: 3, snapshot }

    createRun(db, { id: 'run-1', source_branch: 'feature', target_branch: 'main', mode: 'start' })
    recordRunStart(db, 'run-1', start)
    createRun(db, { id: 'run-2', source_branch: 'feature', target_branch: 'main', mode: 'start' })
    recordRunStart(db, 'run-2', start)
    finishRun(db, 'run-2', { status: 'failed', error: 'x', attempts: 1, rolled_back: true })
    createRun(db, { id: 'run-3', source_branch: 'feature', target_branch: 'main', mode: 'start' })

    expect(findResumableRun(db)?.id).toBe('run-1')
    expect(findResumableRun(db, { target_branch: 'develop' })).toBeUndefined()
  })
})
