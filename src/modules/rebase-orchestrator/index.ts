/**
 * Rebase orchestrator module: public exports.
 */

export { createRebaseOrchestrator, STAGE_TRANSITIONS, canTransition } from './orchestrator-impl.js'
export type {
  RebaseOrchestrator,
  RebaseRunHandle,
  RunInput,
  ResumeInput,
  RunOutcome,
  RunStatus,
  RunContext,
  OrchestratorDeps,
  CompletionCallback,
  LogCallback,
} from './types.js'
export { initializeRun, normalizeRunInput, sanitizeBranchName, DEFAULT_MAX_ATTEMPTS } from './validator.js'
export { createOperationTracker } from './operation-tracker.js'
export type { OperationTracker } from './operation-tracker.js'
export { createEventLog } from './event-log.js'
export type { EventLog, LogEntryInput } from './event-log.js'
export { detectConflictFiles } from './conflict-detector.js'
export { runResolutionRound, summarizeErrors } from './resolution-engine.js'
export { verifyResolution, classifyIssues, formatRejection } from './verification-gate.js'
export { rollbackRun } from './rollback.js'
