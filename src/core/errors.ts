/**
 * Error definitions for rebase-pilot
 * Provides a structured error hierarchy for validation, git, agent and config failures
 */

/** Base error class for all rebase-pilot errors */
export class RebasePilotError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'RebasePilotError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, RebasePilotError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

// ---------------------------------------------------------------------------
// Run preconditions
// ---------------------------------------------------------------------------

/** Raised before any repository mutation when a run's preconditions do not hold */
export class ValidationError extends RebasePilotError {
  constructor(message: string, code = 'VALIDATION_ERROR', context: Record<string, unknown> = {}) {
    super(message, code, context)
    this.name = 'ValidationError'
  }
}

export class InvalidBranchNameError extends ValidationError {
  constructor(role: 'source' | 'target', branch: string) {
    super(`Invalid ${role} branch name: "${branch}"`, 'INVALID_BRANCH_NAME', { role, branch })
    this.name = 'InvalidBranchNameError'
  }
}

export class InvalidMaxAttemptsError extends ValidationError {
  constructor(value: unknown) {
    super(
      `Max attempts must be an integer between 1 and 10, got ${String(value)}`,
      'INVALID_MAX_ATTEMPTS',
      { value }
    )
    this.name = 'InvalidMaxAttemptsError'
  }
}

export class BranchNotFoundError extends ValidationError {
  constructor(branch: string) {
    super(`Branch not found: ${branch}`, 'BRANCH_NOT_FOUND', { branch })
    this.name = 'BranchNotFoundError'
  }
}

export class DirtyWorkingTreeError extends ValidationError {
  constructor(files: string[]) {
    super(
      `Working tree has uncommitted changes: ${files.join(', ')}. Commit or stash them before rebasing.`,
      'DIRTY_WORKING_TREE',
      { files }
    )
    this.name = 'DirtyWorkingTreeError'
  }
}

export class NotARepositoryError extends ValidationError {
  constructor(cwd: string) {
    super(`Not a git repository: ${cwd}`, 'NOT_A_REPOSITORY', { cwd })
    this.name = 'NotARepositoryError'
  }
}

export class NoRebaseInProgressError extends ValidationError {
  constructor() {
    super('No rebase in progress to resume', 'NO_REBASE_IN_PROGRESS')
    this.name = 'NoRebaseInProgressError'
  }
}

// ---------------------------------------------------------------------------
// Collaborator failures
// ---------------------------------------------------------------------------

/** Error thrown when a git operation cannot be carried out */
export class GitError extends RebasePilotError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'GIT_ERROR', context)
    this.name = 'GitError'
  }
}

/** Error thrown when a resolution or verification agent cannot be dispatched */
export class AgentError extends RebasePilotError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'AGENT_ERROR', context)
    this.name = 'AgentError'
  }
}

/** Error thrown when a run is cancelled by its caller */
export class RunCancelledError extends RebasePilotError {
  constructor(reason = 'Run cancelled') {
    super(reason, 'RUN_CANCELLED')
    this.name = 'RunCancelledError'
  }
}

/** Error raised when the workflow state machine is asked for a transition it does not allow */
export class IllegalTransitionError extends RebasePilotError {
  constructor(from: string, to: string) {
    super(`Illegal stage transition: ${from} -> ${to}`, 'ILLEGAL_TRANSITION', { from, to })
    this.name = 'IllegalTransitionError'
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Error thrown when configuration is invalid */
export class ConfigError extends RebasePilotError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a config file declares a format version this build cannot read */
export class ConfigIncompatibleFormatError extends RebasePilotError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_INCOMPATIBLE_FORMAT', context)
    this.name = 'ConfigIncompatibleFormatError'
  }
}
