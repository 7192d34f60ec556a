/**
 * Types and interfaces for the agent dispatcher.
 *
 * Defines the contracts for dispatching coding-agent CLIs with a rendered
 * prompt and collecting their structured YAML output.
 */

import type { ZodType, ZodTypeDef } from 'zod'
import type { AgentId } from '../../core/types.js'

// ---------------------------------------------------------------------------
// DispatchRequest
// ---------------------------------------------------------------------------

/**
 * Request payload for dispatching an agent.
 */
export interface DispatchRequest<T> {
  /** Rendered prompt, delivered on stdin */
  prompt: string
  /** Agent to run */
  agent: AgentId
  /** Task type; selects the default timeout */
  taskType: string
  /** Zod schema the YAML result block must satisfy */
  outputSchema: ZodType<T, ZodTypeDef, unknown>
  /** Optional timeout override in milliseconds */
  timeout?: number
  /** Working directory for the spawned process (defaults to process.cwd()) */
  workingDirectory?: string
  /** Optional model identifier override */
  model?: string
  /** Optional agentic turn limit */
  maxTurns?: number
  /** Aborting the signal removes a queued dispatch or terminates a running one */
  signal?: AbortSignal
}

// ---------------------------------------------------------------------------
// DispatchHandle
// ---------------------------------------------------------------------------

export type DispatchStatus = 'queued' | 'running' | 'completed' | 'failed' | 'timeout' | 'cancelled'

/**
 * Handle returned immediately when a dispatch is requested.
 */
export interface DispatchHandle {
  /** Unique identifier for this dispatch */
  id: string
  /** Current lifecycle status */
  status: DispatchStatus
  /** Cancel this dispatch (SIGTERM if running, removed from the queue if queued) */
  cancel(): void
}

// ---------------------------------------------------------------------------
// DispatchResult
// ---------------------------------------------------------------------------

/**
 * Final result of a dispatch.
 */
export interface DispatchResult<T> {
  /** Unique identifier matching the DispatchHandle */
  id: string
  /** Final status of the dispatch */
  status: 'completed' | 'failed' | 'timeout' | 'cancelled'
  /** Exit code from the subprocess (-1 when it never exited on its own) */
  exitCode: number
  /** stdout for successful dispatches; stdout plus stderr for failed ones */
  output: string
  /** Parsed and validated YAML result (null if parsing failed) */
  parsed: T | null
  /** Why `parsed` is null, or why the dispatch did not complete */
  parseError: string | null
  /** Total duration from spawn to exit in milliseconds */
  durationMs: number
}

// ---------------------------------------------------------------------------
// DispatchConfig
// ---------------------------------------------------------------------------

export interface DispatchConfig {
  /** Maximum number of concurrently running dispatches */
  maxConcurrency: number
  /** Default timeouts per task type in milliseconds */
  defaultTimeouts: Record<string, number>
  /** Delay between SIGTERM and SIGKILL during shutdown() */
  shutdownGraceMs: number
}

/**
 * Default timeout values per task type (milliseconds).
 */
export const DEFAULT_TIMEOUTS: Record<string, number> = {
  'resolve-conflict': 600_000,
  'verify-resolution': 300_000,
}

/** Timeout for task types missing from the table */
export const FALLBACK_TIMEOUT_MS = 300_000

// ---------------------------------------------------------------------------
// Dispatcher interface
// ---------------------------------------------------------------------------

export interface Dispatcher {
  /**
   * Dispatch an agent with the given request.
   *
   * Returns synchronously; the `result` Promise resolves with the final
   * DispatchResult. Requests beyond the concurrency limit wait in a FIFO queue.
   */
  dispatch<T>(request: DispatchRequest<T>): DispatchHandle & { result: Promise<DispatchResult<T>> }

  /** Number of queued (waiting) dispatches */
  getPending(): number

  /** Number of currently running dispatches */
  getRunning(): number

  /**
   * Stop accepting work, fail queued dispatches, SIGTERM running agents and
   * SIGKILL whatever is left after the grace period.
   */
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// Error types
// ---------------------------------------------------------------------------

/**
 * Error thrown when dispatch is attempted on a shutting-down dispatcher.
 */
export class DispatcherShuttingDownError extends Error {
  constructor() {
    super('Dispatcher is shutting down and cannot accept new requests')
    this.name = 'DispatcherShuttingDownError'
  }
}
