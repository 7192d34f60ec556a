/**
 * Contracts between the rebase orchestrator and the agents that resolve and
 * review conflicted files. The orchestrator depends only on these interfaces.
 */

export interface ResolveRequest {
  /** Repository-relative path of the conflicted file */
  path: string
  /** Conflicted content as it was when the round first reached the file */
  content: string
  /** 1-based attempt number for this file */
  attempt: number
  /** Shared per-file attempt ceiling */
  maxAttempts: number
  /** Issues the verification agent reported on the previous attempt */
  previousIssues: readonly string[]
  signal?: AbortSignal
}

export interface ResolveOutcome {
  /** true when the agent reports the resolved file is written to disk */
  ok: boolean
  error?: string
}

export interface VerifyRequest {
  path: string
  /** Resolved content read back from disk */
  content: string
  attempt: number
  maxAttempts: number
  signal?: AbortSignal
}

export interface VerifyOutcome {
  passed: boolean
  issues: string[]
  /** Set when the agent itself failed rather than rejecting the file */
  error?: string
}

export interface ResolutionAgent {
  resolve(request: ResolveRequest): Promise<ResolveOutcome>
}

export interface VerificationAgent {
  verify(request: VerifyRequest): Promise<VerifyOutcome>
}
