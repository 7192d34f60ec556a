/**
 * `rebase-pilot config` command group
 *
 * Subcommands:
 *   - `rebase-pilot config show`   display the merged configuration
 *   - `rebase-pilot config paths`  list the files configuration is read from
 */

import { join } from 'node:path'
import { existsSync } from 'node:fs'
import { homedir } from 'node:os'
import type { Command } from 'commander'
import yaml from 'js-yaml'
import { ConfigError, ConfigIncompatibleFormatError } from '../../core/errors.js'
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME, createConfigSystem } from '../../modules/config/index.js'
import { createLogger } from '../../utils/logger.js'
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE_ERROR } from '../exit-codes.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions {
  projectRoot: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions): Promise<number> {
  const system = createConfigSystem({
    projectConfigDir: join(opts.projectRoot, CONFIG_DIR_NAME),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })

  try {
    await system.load()
  } catch (err) {
    if (err instanceof ConfigError || err instanceof ConfigIncompatibleFormatError) {
      process.stderr.write(`Configuration error: ${err.message}\n`)
      return EXIT_USAGE_ERROR
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`Error loading configuration: ${message}\n`)
    return EXIT_FAILURE
  }

  const config = system.getConfig()
  if (opts.format === 'json') {
    process.stdout.write(JSON.stringify(config, null, 2) + '\n')
  } else {
    process.stdout.write('# rebase-pilot configuration (merged)\n\n')
    process.stdout.write(yaml.dump(config))
  }
  return EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config paths` action
// ---------------------------------------------------------------------------

export interface ConfigPathsOptions {
  projectRoot: string
  globalConfigDir?: string
}

export function runConfigPaths(opts: ConfigPathsOptions): number {
  const globalFile = join(opts.globalConfigDir ?? join(homedir(), CONFIG_DIR_NAME), CONFIG_FILE_NAME)
  const projectFile = join(opts.projectRoot, CONFIG_DIR_NAME, CONFIG_FILE_NAME)
  for (const [label, path] of [
    ['global ', globalFile],
    ['project', projectFile],
  ] as const) {
    process.stdout.write(`${label}  ${path}${existsSync(path) ? '' : ' (missing)'}\n`)
  }
  return EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('Inspect rebase-pilot configuration')

  configCmd
    .command('show')
    .description('Show the merged configuration (defaults, files, environment)')
    .option('--format <format>', 'Output format: yaml or json', 'yaml')
    .option('--project-root <path>', 'Repository whose configuration to read', process.cwd())
    .action(async (opts: { format: string; projectRoot: string }) => {
      if (opts.format !== 'yaml' && opts.format !== 'json') {
        process.stderr.write(`Error: Unknown format "${opts.format}"; use yaml or json\n`)
        process.exitCode = EXIT_USAGE_ERROR
        return
      }
      process.exitCode = await runConfigShow({ projectRoot: opts.projectRoot, format: opts.format })
    })

  configCmd
    .command('paths')
    .description('List the configuration files rebase-pilot reads')
    .option('--project-root <path>', 'Repository whose configuration to read', process.cwd())
    .action((opts: { projectRoot: string }) => {
      process.exitCode = runConfigPaths({ projectRoot: opts.projectRoot })
    })
}
