/**
 * Core type definitions shared across rebase-pilot modules.
 */

/** Identifier of a supported CLI coding agent */
export type AgentId = 'claude-code' | 'codex'

/** Unique identifier of one rebase run */
export type RunId = string

/**
 * Opaque reference to the repository state captured before a run mutates anything.
 * Only the version-control collaborator reads its fields.
 */
export interface RepositorySnapshot {
  /** Commit the working tree pointed at */
  readonly revision: string
  /** Branch that was checked out, or null for a detached HEAD */
  readonly branch: string | null
}

/** Workflow state-machine labels */
export type RunStage =
  | 'initializing'
  | 'continuing'
  | 'detecting_conflicts'
  | 'resolving_conflicts'
  | 'rolling_back'
  | 'completed'
  | 'failed'

/** Stages a log entry can be recorded under */
export type LogStage = RunStage | 'verifying_resolution'

/** One immutable entry of a run's progress log */
export interface LogEntry {
  readonly timestamp: string
  readonly stage: LogStage
  readonly details: string
  readonly progressPercent: number
  readonly files: readonly string[]
  readonly errors: readonly string[]
}
