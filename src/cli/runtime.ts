/**
 * Composition root for CLI commands: loads configuration and wires the
 * dispatcher, agents, repository, run history and orchestrator together.
 */

import { join, resolve } from 'node:path'
import { createEventBus } from '../core/event-bus.js'
import type { TypedEventBus } from '../core/event-bus.js'
import { createDefaultAdapterRegistry } from '../adapters/adapter-registry.js'
import { createDispatcher } from '../modules/agent-dispatch/index.js'
import type { Dispatcher } from '../modules/agent-dispatch/index.js'
import { createResolutionAgent, createVerificationAgent } from '../modules/conflict-agents/index.js'
import { CONFIG_DIR_NAME, createConfigSystem } from '../modules/config/index.js'
import type { ConfigSystemOptions, PartialRebasePilotConfig, RebasePilotConfig } from '../modules/config/index.js'
import { createGitVersionControl, createWorkingTreeFiles, verifyGitVersion } from '../modules/git/index.js'
import type { VersionControl } from '../modules/git/index.js'
import { createRebaseOrchestrator } from '../modules/rebase-orchestrator/index.js'
import type { RebaseOrchestrator } from '../modules/rebase-orchestrator/index.js'
import { createRunHistoryRecorder } from '../modules/run-history/index.js'
import { createDatabaseService } from '../persistence/database.js'
import type { DatabaseService } from '../persistence/database.js'
import { createLogger, setLogLevel } from '../utils/logger.js'

const logger = createLogger('cli:runtime')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RuntimeOptions {
  projectRoot: string
  cliOverrides?: PartialRebasePilotConfig
  /** Overrides for where configuration is read from */
  configOptions?: Omit<ConfigSystemOptions, 'cliOverrides'>
}

export interface Runtime {
  readonly config: RebasePilotConfig
  readonly eventBus: TypedEventBus
  readonly vcs: VersionControl
  readonly database: DatabaseService
  readonly orchestrator: RebaseOrchestrator
  /** Stop agents, detach the recorder and close the database */
  close(): Promise<void>
}

export type RuntimeFactory = (options: RuntimeOptions) => Promise<Runtime>

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Load and validate configuration for a project, applying its log level.
 *
 * @throws {ConfigError} or ConfigIncompatibleFormatError
 */
export async function loadProjectConfig(options: RuntimeOptions): Promise<RebasePilotConfig> {
  const system = createConfigSystem({
    projectConfigDir: join(options.projectRoot, CONFIG_DIR_NAME),
    ...options.configOptions,
    ...(options.cliOverrides !== undefined ? { cliOverrides: options.cliOverrides } : {}),
  })
  await system.load()
  const config = system.getConfig()
  setLogLevel(config.log_level)
  return config
}

export function historyDbPath(projectRoot: string, config: RebasePilotConfig): string {
  return resolve(projectRoot, config.rebase.history_db)
}

// ---------------------------------------------------------------------------
// createRuntime
// ---------------------------------------------------------------------------

export async function createRuntime(options: RuntimeOptions): Promise<Runtime> {
  const projectRoot = resolve(options.projectRoot)
  const config = await loadProjectConfig({ ...options, projectRoot })
  await verifyGitVersion()

  const eventBus = createEventBus()
  const dispatcher: Dispatcher = createDispatcher({
    eventBus,
    adapterRegistry: createDefaultAdapterRegistry(),
    config: { maxConcurrency: config.agents.max_concurrency },
  })

  const { resolution, verification } = config.agents
  const resolutionAgent = createResolutionAgent({
    dispatcher,
    agent: resolution.agent,
    workingDirectory: projectRoot,
    timeoutMs: resolution.timeout_ms,
    charLimit: config.prompts.resolution_char_limit,
    ...(resolution.model !== undefined ? { model: resolution.model } : {}),
  })
  const verificationAgent = createVerificationAgent({
    dispatcher,
    agent: verification.agent,
    workingDirectory: projectRoot,
    timeoutMs: verification.timeout_ms,
    charLimit: config.prompts.verification_char_limit,
    ...(verification.model !== undefined ? { model: verification.model } : {}),
  })

  const database = createDatabaseService(historyDbPath(projectRoot, config))
  await database.initialize()
  const recorder = createRunHistoryRecorder(eventBus, database.db)
  recorder.attach()

  const vcs = createGitVersionControl({ cwd: projectRoot })
  const orchestrator = createRebaseOrchestrator({
    vcs,
    files: createWorkingTreeFiles(projectRoot),
    resolutionAgent,
    verificationAgent,
    eventBus,
    repositoryPath: projectRoot,
  })

  logger.debug({ projectRoot, agents: config.agents }, 'Runtime ready')

  return {
    config,
    eventBus,
    vcs,
    database,
    orchestrator,
    async close(): Promise<void> {
      recorder.detach()
      try {
        await dispatcher.shutdown()
      } finally {
        await database.shutdown()
      }
    },
  }
}
