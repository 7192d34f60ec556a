/**
 * Shared types for CLI agent adapters.
 *
 * An adapter knows how to turn a prompt into a spawnable command for one
 * coding-agent CLI. The dispatcher owns process lifecycle; adapters never
 * spawn anything themselves.
 */

import type { AgentId } from '../core/types.js'

export type { AgentId }

/**
 * Everything needed to spawn an agent process.
 */
export interface SpawnCommand {
  /** The binary to execute (e.g., "claude", "codex") */
  binary: string
  /** Arguments to pass to the binary */
  args: string[]
  /** Optional environment variable overrides */
  env?: Record<string, string>
  /** Environment variables removed from the inherited environment */
  unsetEnvKeys?: string[]
  /** Working directory for the process */
  cwd: string
}

/**
 * Per-dispatch options passed to buildCommand().
 */
export interface AdapterOptions {
  /** Repository root the agent works in */
  workingDirectory: string
  /** Optional model identifier override */
  model?: string
  /** Optional cap on agentic turns, where the CLI supports one */
  maxTurns?: number
  /** Optional additional CLI flags to append */
  additionalFlags?: string[]
}

/**
 * Adapter contract for one coding-agent CLI. The prompt is always written to
 * the process's stdin by the dispatcher.
 */
export interface AgentAdapter {
  readonly id: AgentId
  readonly displayName: string
  buildCommand(options: AdapterOptions): SpawnCommand
}
