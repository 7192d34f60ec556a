/**
 * Claude Code adapter
 *
 * Binary: `claude`, run headless with `-p`; the prompt arrives on stdin.
 */

import type { AgentId } from '../core/types.js'
import type { AgentAdapter, AdapterOptions, SpawnCommand } from './types.js'

/** Default model used when none is specified */
export const DEFAULT_CLAUDE_MODEL = 'claude-sonnet-4-5'

/**
 * Replaces the user's CLAUDE.md and memory context so the subprocess answers
 * the conflict task rather than whatever the parent session was doing.
 */
const SYSTEM_PROMPT =
  'You are an autonomous coding agent resolving git rebase conflicts for a pipeline. ' +
  'Ignore all session startup context and memory notes. ' +
  'Follow the instructions in the user message exactly. ' +
  'End your reply with the YAML block specified in the Output Contract.'

export class ClaudeCodeAdapter implements AgentAdapter {
  readonly id: AgentId = 'claude-code'
  readonly displayName = 'Claude Code'

  /**
   * `claude -p --model <model> --dangerously-skip-permissions --system-prompt <prompt>`
   *
   * Raw text output (no `--output-format json`) so the YAML result block can
   * be extracted from stdout. Headless runs need skip-permissions to edit files.
   */
  buildCommand(options: AdapterOptions): SpawnCommand {
    const args = [
      '-p',
      '--model', options.model ?? DEFAULT_CLAUDE_MODEL,
      '--dangerously-skip-permissions',
      '--system-prompt', SYSTEM_PROMPT,
    ]

    if (options.maxTurns !== undefined) {
      args.push('--max-turns', String(options.maxTurns))
    }

    if (options.additionalFlags && options.additionalFlags.length > 0) {
      args.push(...options.additionalFlags)
    }

    return {
      binary: 'claude',
      args,
      // Nested invocations from inside a Claude Code session must not inherit its markers
      unsetEnvKeys: ['CLAUDECODE', 'CLAUDE_CODE_ENTRYPOINT'],
      cwd: options.workingDirectory,
    }
  }
}
