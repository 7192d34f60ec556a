/**
 * Async operation tracker: counts pending operations and fires the run's
 * terminal callback exactly once.
 *
 * The controller tracks one operation for the run itself and completes it
 * last, so per-dispatch completions never bring the count to zero mid-run.
 */

import { createLogger } from '../../utils/logger.js'

const logger = createLogger('rebase-orchestrator:tracker')

export interface OperationTracker {
  /** Register an operation before it is issued */
  track(): void
  /**
   * Mark one operation finished. When the count reaches zero the terminal
   * callback fires with this outcome, once per tracker.
   */
  complete(success: boolean, error?: string): void
  readonly pendingOps: number
  /** Whether the terminal callback has fired */
  readonly completed: boolean
}

export interface OperationTrackerOptions {
  onTerminal: (success: boolean, error?: string) => void
  /** complete() was called with nothing pending */
  onMismatch?: () => void
}

export function createOperationTracker(options: OperationTrackerOptions): OperationTracker {
  let pendingOps = 0
  let completed = false

  return {
    track(): void {
      pendingOps += 1
    },

    complete(success: boolean, error?: string): void {
      if (pendingOps === 0) {
        logger.warn({ success, error }, 'Attempted to complete operation when no operations were pending')
        options.onMismatch?.()
      } else {
        pendingOps -= 1
      }

      if (pendingOps > 0 || completed) return
      completed = true

      try {
        options.onTerminal(success, error)
      } catch (err) {
        logger.error(
          { error: err instanceof Error ? err.message : String(err) },
          'Terminal callback threw',
        )
      }
    },

    get pendingOps(): number {
      return pendingOps
    },

    get completed(): boolean {
      return completed
    },
  }
}
