/**
 * AdapterRegistry: lookup table of AgentAdapter instances by agent id.
 */

import type { AgentId } from '../core/types.js'
import type { AgentAdapter } from './types.js'
import { ClaudeCodeAdapter } from './claude-adapter.js'
import { CodexCLIAdapter } from './codex-adapter.js'

export class AdapterRegistry {
  private readonly _adapters = new Map<AgentId, AgentAdapter>()

  /**
   * Register an adapter by its id.
   * Overwrites any existing adapter with the same id.
   */
  register(adapter: AgentAdapter): void {
    this._adapters.set(adapter.id, adapter)
  }

  /**
   * Retrieve a registered adapter by id.
   * @returns The adapter, or undefined if not registered
   */
  get(id: AgentId): AgentAdapter | undefined {
    return this._adapters.get(id)
  }

  /** Return all registered adapters */
  getAll(): AgentAdapter[] {
    return Array.from(this._adapters.values())
  }
}

/**
 * Create a registry holding every built-in adapter.
 */
export function createDefaultAdapterRegistry(): AdapterRegistry {
  const registry = new AdapterRegistry()
  registry.register(new ClaudeCodeAdapter())
  registry.register(new CodexCLIAdapter())
  return registry
}
