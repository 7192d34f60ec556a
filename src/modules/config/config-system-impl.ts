/**
 * ConfigSystem implementation: loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.rebase-pilot/config.yaml)
 *     → project config      (./.rebase-pilot/config.yaml)
 *     → environment vars    (REBASE_PILOT_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { homedir } from 'node:os'
import yaml from 'js-yaml'
import type { ZodIssue } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { ConfigError, ConfigIncompatibleFormatError } from '../../core/errors.js'
import {
  RebasePilotConfigSchema,
  PartialRebasePilotConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type RebasePilotConfig,
  type PartialRebasePilotConfig,
} from './config-schema.js'
import { isVersionSupported, formatUnsupportedVersionError } from './version-utils.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

export const CONFIG_DIR_NAME = '.rebase-pilot'
export const CONFIG_FILE_NAME = 'config.yaml'

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Merge `override` into a copy of `base`. Nested objects merge key by key;
 * anything else in `override` replaces the base value. Undefined is skipped.
 */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * REBASE_PILOT_ environment variables and the config paths they set.
 * Scalars only.
 */
export const ENV_VAR_MAP: Readonly<Record<string, string>> = {
  REBASE_PILOT_LOG_LEVEL: 'log_level',
  REBASE_PILOT_MAX_ATTEMPTS: 'rebase.max_attempts',
  REBASE_PILOT_HISTORY_DB: 'rebase.history_db',
  REBASE_PILOT_MAX_CONCURRENCY: 'agents.max_concurrency',
  REBASE_PILOT_RESOLUTION_AGENT: 'agents.resolution.agent',
  REBASE_PILOT_RESOLUTION_MODEL: 'agents.resolution.model',
  REBASE_PILOT_RESOLUTION_TIMEOUT_MS: 'agents.resolution.timeout_ms',
  REBASE_PILOT_VERIFICATION_AGENT: 'agents.verification.agent',
  REBASE_PILOT_VERIFICATION_MODEL: 'agents.verification.model',
  REBASE_PILOT_VERIFICATION_TIMEOUT_MS: 'agents.verification.timeout_ms',
}

function coerceEnvValue(raw: string): unknown {
  if (raw === 'true') return true
  if (raw === 'false') return false
  if (/^\d+$/.test(raw)) return parseInt(raw, 10)
  return raw
}

/**
 * Return a value with `path` set, creating intermediate objects as needed.
 */
export function setByPath(obj: Record<string, unknown>, path: string, value: unknown): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined) return obj
  if (rest.length === 0) return { ...obj, [head]: value }
  const child = obj[head]
  return { ...obj, [head]: setByPath(isPlainObject(child) ? child : {}, rest.join('.'), value) }
}

export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Read the REBASE_PILOT_ variables into a partial config overlay. An invalid
 * overlay is logged and ignored as a whole.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PartialRebasePilotConfig {
  let overrides: Record<string, unknown> = {}
  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const raw = env[envKey]
    if (raw === undefined || raw === '') continue
    overrides = setByPath(overrides, configPath, coerceEnvValue(raw))
  }

  const parsed = PartialRebasePilotConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: RebasePilotConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialRebasePilotConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir =
      options.projectConfigDir !== undefined
        ? resolve(options.projectConfigDir)
        : resolve(process.cwd(), CONFIG_DIR_NAME)
    this._globalConfigDir =
      options.globalConfigDir !== undefined
        ? resolve(options.globalConfigDir)
        : resolve(homedir(), CONFIG_DIR_NAME)
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    const layers: PartialRebasePilotConfig[] = []

    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, CONFIG_FILE_NAME))
    if (globalConfig !== null) layers.push(globalConfig)

    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, CONFIG_FILE_NAME))
    if (projectConfig !== null) layers.push(projectConfig)

    layers.push(readEnvOverrides(this._env))
    layers.push(this._cliOverrides)

    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)
    for (const layer of layers) {
      merged = deepMerge(merged, layer)
    }

    const result = RebasePilotConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug({ layers: layers.length }, 'Configuration loaded successfully')
  }

  getConfig(): RebasePilotConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialRebasePilotConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    try {
      const raw = await readFile(filePath, 'utf-8')
      const parsed: unknown = yaml.load(raw)
      if (parsed === null || parsed === undefined) return {}

      let document = parsed
      if (isPlainObject(parsed)) {
        const version = parsed['config_format_version']
        if (typeof version === 'string' || typeof version === 'number') {
          const versionStr = String(version)
          if (!isVersionSupported(versionStr, SUPPORTED_CONFIG_FORMAT_VERSIONS)) {
            throw new ConfigIncompatibleFormatError(
              formatUnsupportedVersionError(versionStr, SUPPORTED_CONFIG_FORMAT_VERSIONS),
              { filePath, version: versionStr },
            )
          }
          document = { ...parsed, config_format_version: versionStr }
        }
      }

      const result = PartialRebasePilotConfigSchema.safeParse(document)
      if (!result.success) {
        throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
          filePath,
          issues: result.error.issues,
        })
      }

      logger.debug({ filePath }, 'Config file loaded')
      return result.data
    } catch (err) {
      if (err instanceof ConfigError) throw err
      if (err instanceof ConfigIncompatibleFormatError) throw err
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * @example
 * const config = createConfigSystem({ cliOverrides: { rebase: { max_attempts: 5 } } })
 * await config.load()
 * const { agents } = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
