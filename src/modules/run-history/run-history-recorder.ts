/**
 * RunHistoryRecorder: persists runs and their progress logs from bus events.
 *
 * Writes are synchronous (better-sqlite3) and run inside the event handlers;
 * a failed write is logged and never reaches the orchestrator.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { RebaseEvents } from '../../core/event-bus.types.js'
import { createLogger } from '../../utils/logger.js'
import { appendRunLog, createRun, finishRun, recordRunStart } from '../../persistence/queries/runs.js'

const logger = createLogger('run-history')

type Handler<K extends keyof RebaseEvents> = (payload: RebaseEvents[K]) => void

export class RunHistoryRecorder {
  private readonly _eventBus: TypedEventBus
  private readonly _db: BetterSqlite3Database
  private _attached = false

  // Bound handlers stored for clean unsubscription
  private readonly _onRequested: Handler<'rebase:requested'>
  private readonly _onStarted: Handler<'rebase:started'>
  private readonly _onLog: Handler<'rebase:log'>
  private readonly _onCompleted: Handler<'rebase:completed'>
  private readonly _onFailed: Handler<'rebase:failed'>

  constructor(eventBus: TypedEventBus, db: BetterSqlite3Database) {
    this._eventBus = eventBus
    this._db = db

    this._onRequested = ({ runId, sourceBranch, targetBranch, mode }) => {
      this._write(runId, 'create run', () =>
        createRun(this._db, { id: runId, source_branch: sourceBranch, target_branch: targetBranch, mode }),
      )
    }

    this._onStarted = ({ runId, sourceBranch, targetBranch, maxAttempts, snapshot }) => {
      this._write(runId, 'record start', () =>
        recordRunStart(this._db, runId, {
          source_branch: sourceBranch,
          target_branch: targetBranch,
          max_attempts: maxAttempts,
          snapshot,
        }),
      )
    }

    this._onLog = ({ runId, entry }) => {
      this._write(runId, 'append log entry', () => appendRunLog(this._db, runId, entry))
    }

    this._onCompleted = ({ runId, attempts }) => {
      this._write(runId, 'finish run', () =>
        finishRun(this._db, runId, { status: 'completed', error: null, attempts, rolled_back: false }),
      )
    }

    this._onFailed = ({ runId, error, attempts, rolledBack }) => {
      this._write(runId, 'finish run', () =>
        finishRun(this._db, runId, { status: 'failed', error, attempts, rolled_back: rolledBack }),
      )
    }
  }

  get isAttached(): boolean {
    return this._attached
  }

  /** Subscribe to run events. Idempotent. */
  attach(): void {
    if (this._attached) return
    this._eventBus.on('rebase:requested', this._onRequested)
    this._eventBus.on('rebase:started', this._onStarted)
    this._eventBus.on('rebase:log', this._onLog)
    this._eventBus.on('rebase:completed', this._onCompleted)
    this._eventBus.on('rebase:failed', this._onFailed)
    this._attached = true
    logger.debug('Run history recorder attached')
  }

  detach(): void {
    if (!this._attached) return
    this._eventBus.off('rebase:requested', this._onRequested)
    this._eventBus.off('rebase:started', this._onStarted)
    this._eventBus.off('rebase:log', this._onLog)
    this._eventBus.off('rebase:completed', this._onCompleted)
    this._eventBus.off('rebase:failed', this._onFailed)
    this._attached = false
    logger.debug('Run history recorder detached')
  }

  private _write(runId: string, action: string, fn: () => void): void {
    try {
      fn()
    } catch (err) {
      logger.warn({ runId, action, error: err instanceof Error ? err.message : String(err) }, 'Run history write failed')
    }
  }
}

export function createRunHistoryRecorder(eventBus: TypedEventBus, db: BetterSqlite3Database): RunHistoryRecorder {
  return new RunHistoryRecorder(eventBus, db)
}
