/**
 * Tests for the CLI agent adapters and their registry
 */

import { describe, it, expect } from 'vitest'
import { ClaudeCodeAdapter, DEFAULT_CLAUDE_MODEL } from '../../src/adapters/claude-adapter.js'
import { CodexCLIAdapter } from '../../src/adapters/codex-adapter.js'
import { AdapterRegistry, createDefaultAdapterRegistry } from '../../src/adapters/adapter-registry.js'

describe('ClaudeCodeAdapter', () => {
  const adapter = new ClaudeCodeAdapter()

  it('runs claude headless with the default model', () => {
    const cmd = adapter.buildCommand({ workingDirectory: '/repo' })

    expect(cmd.binary).toBe('claude')
    expect(cmd.cwd).toBe('/repo')
    expect(cmd.args.slice(0, 4)).toEqual(['-p', '--model', DEFAULT_CLAUDE_MODEL, '--dangerously-skip-permissions'])
    expect(cmd.args[4]).toBe('--system-prompt')
    expect(cmd.unsetEnvKeys).toEqual(['CLAUDECODE', 'CLAUDE_CODE_ENTRYPOINT'])
  })

  it('applies model, turn limit and extra flags', () => {
    const cmd = adapter.buildCommand({
      workingDirectory: '/repo',
      model: 'claude-opus-4-1',
      maxTurns: 12,
      additionalFlags: ['--verbose'],
    })

    expect(cmd.args[2]).toBe('claude-opus-4-1')
    expect(cmd.args.slice(-3)).toEqual(['--max-turns', '12', '--verbose'])
  })
})

describe('CodexCLIAdapter', () => {
  const adapter = new CodexCLIAdapter()

  it('reads the prompt from stdin', () => {
    const cmd = adapter.buildCommand({ workingDirectory: '/repo' })

    expect(cmd).toEqual({ binary: 'codex', args: ['exec', '--full-auto', '-'], cwd: '/repo' })
  })

  it('passes the model before the stdin marker', () => {
    const cmd = adapter.buildCommand({ workingDirectory: '/repo', model: 'gpt-5-codex' })

    expect(cmd.args).toEqual(['exec', '--full-auto', '--model', 'gpt-5-codex', '-'])
  })
})

describe('AdapterRegistry', () => {
  it('returns undefined for unregistered adapters', () => {
    expect(new AdapterRegistry().get('codex')).toBeUndefined()
  })

  it('registers every built-in adapter by default', () => {
    const registry = createDefaultAdapterRegistry()

    expect(registry.getAll().map((a) => a.id)).toEqual(['claude-code', 'codex'])
    expect(registry.get('claude-code')?.displayName).toBe('Claude Code')
  })
})
