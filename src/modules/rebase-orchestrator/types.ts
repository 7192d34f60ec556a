/**
 * Types for the rebase orchestrator: run input, run context, outcome and the
 * handle returned to callers.
 */

import type { LogEntry, RepositorySnapshot, RunId, RunStage } from '../../core/types.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { VersionControl, WorkingTreeFiles } from '../git/version-control.js'
import type { ResolutionAgent, VerificationAgent } from '../conflict-agents/types.js'
import type { EventLog } from './event-log.js'
import type { OperationTracker } from './operation-tracker.js'

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

export type CompletionCallback = (success: boolean, error?: string) => void
export type LogCallback = (entry: LogEntry) => void

export interface RunInput {
  sourceBranch: string
  targetBranch: string
  /** Shared ceiling for global rounds and per-file verification rejections (1..10, default 3) */
  maxAttempts?: number
  onComplete?: CompletionCallback
  onLog?: LogCallback
}

export interface ResumeInput extends RunInput {
  /** State to roll back to; defaults to the rebase's recorded original head */
  initialSnapshot?: RepositorySnapshot
}

/** Input after name sanitisation and range checks */
export interface NormalizedRunInput {
  sourceRef: string
  targetRef: string
  maxAttempts: number
}

export interface ValidatedRun extends NormalizedRunInput {
  initialSnapshot: RepositorySnapshot
}

// ---------------------------------------------------------------------------
// Run context
// ---------------------------------------------------------------------------

export interface FileError {
  file: string
  error: string
}

/**
 * Mutable state of one run, owned by the controller and threaded through the
 * engine, gate and rollback manager.
 */
export interface RunContext {
  readonly runId: RunId
  sourceRef: string
  targetRef: string
  attemptGlobal: number
  maxAttemptsGlobal: number
  /** Verification rejections per file; shared ceiling with attemptGlobal */
  readonly fileAttempts: Map<string, number>
  conflictFiles: string[]
  /** Null until initialisation succeeds; rollback needs it */
  initialSnapshot: RepositorySnapshot | null
  stage: RunStage
  readonly tracker: OperationTracker
  readonly eventLog: EventLog
  resolutionErrors: FileError[]
  /** Last verification issues per file, handed to the resolution agent on retry */
  readonly lastIssues: Map<string, string[]>
  readonly signal: AbortSignal
  cancelReason: string | null
  rolledBack: boolean
}

// ---------------------------------------------------------------------------
// Outcome and handle
// ---------------------------------------------------------------------------

export interface RunOutcome {
  runId: RunId
  success: boolean
  error?: string
  /** Code of the typed error that caused the failure, when there was one */
  errorCode?: string
  /** Global resolution rounds used */
  attempts: number
  stage: RunStage
  rolledBack: boolean
  fileAttempts: Record<string, number>
  eventLog: readonly LogEntry[]
}

export interface RunStatus {
  runId: RunId
  /** Sanitised branch names once validation has run */
  sourceBranch: string
  targetBranch: string
  stage: RunStage
  attemptGlobal: number
  maxAttempts: number
  conflictFiles: string[]
  fileAttempts: Record<string, number>
  pendingOps: number
  completed: boolean
}

export interface RebaseRunHandle {
  readonly runId: RunId
  /** Resolves exactly once with the run's outcome; never rejects */
  readonly result: Promise<RunOutcome>
  /** Stop the run at the next step boundary and roll back */
  cancel(reason?: string): void
  getStatus(): RunStatus
}

export interface RebaseOrchestrator {
  start(input: RunInput): RebaseRunHandle
  /** Continue a rebase stopped on conflicts, skipping precondition checks */
  resume(input: ResumeInput): RebaseRunHandle
}

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface OrchestratorDeps {
  vcs: VersionControl
  files: WorkingTreeFiles
  resolutionAgent: ResolutionAgent
  verificationAgent: VerificationAgent
  eventBus: TypedEventBus
  /** Repository path, used in error messages */
  repositoryPath?: string
  generateRunId?: () => RunId
}

/** Result of one resolution round or of the gate's staging step */
export interface RoundResult {
  success: boolean
  error?: string
  errorCode?: string
}
