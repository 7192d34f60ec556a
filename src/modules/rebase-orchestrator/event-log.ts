/**
 * Progress/event log: append-only record of a run's stage transitions.
 *
 * Entries are frozen when appended, forwarded to the caller's onLog callback
 * and published as `rebase:log` on the event bus.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { LogEntry, LogStage, RunId } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('rebase-orchestrator:event-log')

export interface LogEntryInput {
  stage: LogStage
  details: string
  progressPercent: number
  files?: readonly string[]
  errors?: readonly string[]
}

export interface EventLog {
  append(input: LogEntryInput): LogEntry
  entries(): readonly LogEntry[]
  /** Progress of the most recent entry, 0 when empty */
  lastProgress(): number
}

export interface EventLogOptions {
  runId: RunId
  eventBus: TypedEventBus
  onLog?: (entry: LogEntry) => void
  now?: () => Date
}

function clampProgress(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)))
}

export function createEventLog(options: EventLogOptions): EventLog {
  const { runId, eventBus, onLog } = options
  const now = options.now ?? (() => new Date())
  const log: LogEntry[] = []

  return {
    append(input: LogEntryInput): LogEntry {
      const entry: LogEntry = Object.freeze({
        timestamp: now().toISOString(),
        stage: input.stage,
        details: input.details,
        progressPercent: clampProgress(input.progressPercent),
        files: Object.freeze([...(input.files ?? [])]),
        errors: Object.freeze([...(input.errors ?? [])]),
      })
      log.push(entry)

      logger.debug({ runId, stage: entry.stage, progress: entry.progressPercent }, entry.details)

      if (onLog !== undefined) {
        try {
          onLog(entry)
        } catch (err) {
          logger.warn({ runId, error: err instanceof Error ? err.message : String(err) }, 'onLog callback threw')
        }
      }

      eventBus.emit('rebase:log', { runId, entry })
      return entry
    },

    entries(): readonly LogEntry[] {
      return [...log]
    },

    lastProgress(): number {
      return log[log.length - 1]?.progressPercent ?? 0
    },
  }
}
