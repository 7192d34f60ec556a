/**
 * rebase-pilot - library exports
 *
 * The CLI in ./cli is one consumer; everything it wires together is
 * available here for embedding the orchestrator elsewhere.
 */

// Core types and errors
export * from './core/types.js'
export * from './core/errors.js'

// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'

// Event bus
export type { TypedEventBus } from './core/event-bus.js'
export type { RebaseEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Orchestrator
export * from './modules/rebase-orchestrator/index.js'

// Collaborators
export * from './modules/git/index.js'
export * from './modules/conflict-agents/index.js'
export * from './modules/agent-dispatch/index.js'
export { AdapterRegistry, createDefaultAdapterRegistry } from './adapters/adapter-registry.js'
export type { AgentAdapter, AdapterOptions, SpawnCommand } from './adapters/types.js'
export { ClaudeCodeAdapter } from './adapters/claude-adapter.js'
export { CodexCLIAdapter } from './adapters/codex-adapter.js'

// Configuration
export * from './modules/config/index.js'

// Run history
export { createDatabaseService, DatabaseWrapper } from './persistence/database.js'
export type { DatabaseService } from './persistence/database.js'
export { runMigrations } from './persistence/migrations/index.js'
export * from './persistence/queries/runs.js'
export type { RunRecord, RunLogRecord } from './persistence/schemas/runs.js'
export * from './modules/run-history/index.js'
