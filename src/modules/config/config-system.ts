/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { RebasePilotConfig, PartialRebasePilotConfig } from './config-schema.js'

export interface ConfigSystemOptions {
  /** Project-level config directory (default: <cwd>/.rebase-pilot) */
  projectConfigDir?: string
  /** User-level config directory (default: ~/.rebase-pilot) */
  globalConfigDir?: string
  /** Values that override every other layer; typically from CLI flags */
  cliOverrides?: PartialRebasePilotConfig
  /** Environment to read REBASE_PILOT_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

/**
 * Provides access to the fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if `load()` has not been called
   */
  getConfig(): RebasePilotConfig

  /**
   * Return a single value by dot-notation key (e.g. "rebase.max_attempts"),
   * or undefined when the key does not exist.
   */
  get(key: string): unknown

  readonly isLoaded: boolean
}
