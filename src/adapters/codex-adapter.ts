/**
 * Codex CLI adapter
 *
 * Binary: `codex`, run with `exec` reading the prompt from stdin (`-`).
 */

import type { AgentId } from '../core/types.js'
import type { AgentAdapter, AdapterOptions, SpawnCommand } from './types.js'

export class CodexCLIAdapter implements AgentAdapter {
  readonly id: AgentId = 'codex'
  readonly displayName = 'Codex CLI'

  buildCommand(options: AdapterOptions): SpawnCommand {
    const args = ['exec', '--full-auto']

    if (options.model !== undefined) {
      args.push('--model', options.model)
    }

    if (options.additionalFlags && options.additionalFlags.length > 0) {
      args.push(...options.additionalFlags)
    }

    // Trailing `-` tells codex to read the prompt from stdin
    args.push('-')

    return {
      binary: 'codex',
      args,
      cwd: options.workingDirectory,
    }
  }
}
