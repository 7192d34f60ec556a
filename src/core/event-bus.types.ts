/**
 * RebaseEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "rebase:started", "agent:spawned")
 */

import type { LogEntry, RepositorySnapshot, RunId, RunStage } from './types.js'

// ---------------------------------------------------------------------------
// RebaseEvents
// ---------------------------------------------------------------------------

/**
 * Complete typed map of all events emitted on the event bus.
 * Use `keyof RebaseEvents` to constrain event keys.
 */
export interface RebaseEvents {
  // -------------------------------------------------------------------------
  // Run lifecycle events
  // -------------------------------------------------------------------------

  /** A run was launched; emitted before any stage work */
  'rebase:requested': {
    runId: RunId
    sourceBranch: string
    targetBranch: string
    mode: 'start' | 'resume'
  }

  /** A run passed its preconditions (or was resumed) and captured its snapshot */
  'rebase:started': {
    runId: RunId
    sourceBranch: string
    targetBranch: string
    maxAttempts: number
    snapshot: RepositorySnapshot
    resumed: boolean
  }

  /** The workflow moved from one stage to another */
  'rebase:stage-changed': {
    runId: RunId
    from: RunStage
    to: RunStage
  }

  /** A progress log entry was appended */
  'rebase:log': {
    runId: RunId
    entry: LogEntry
  }

  /** The run finished successfully */
  'rebase:completed': {
    runId: RunId
    attempts: number
  }

  /** The run finished with a failure */
  'rebase:failed': {
    runId: RunId
    error: string
    attempts: number
    rolledBack: boolean
  }

  /** The repository was reset to the run's snapshot */
  'rebase:rolled-back': {
    runId: RunId
    ok: boolean
    output: string
  }

  /** An operation completed while none were pending */
  'tracker:mismatch': {
    runId: RunId
  }

  // -------------------------------------------------------------------------
  // Agent dispatch events
  // -------------------------------------------------------------------------

  /** An agent subprocess was spawned */
  'agent:spawned': {
    dispatchId: string
    agent: string
    taskType: string
  }

  /** An agent wrote to stdout */
  'agent:output': {
    dispatchId: string
    data: string
  }

  /** An agent exited successfully */
  'agent:completed': {
    dispatchId: string
    exitCode: number
    output: string
  }

  /** An agent exited with a non-zero code */
  'agent:failed': {
    dispatchId: string
    error: string
    exitCode: number
  }

  /** An agent exceeded its timeout and was terminated */
  'agent:timeout': {
    dispatchId: string
    timeoutMs: number
  }

  /** An agent was terminated because its caller cancelled the dispatch */
  'agent:cancelled': {
    dispatchId: string
  }
}
