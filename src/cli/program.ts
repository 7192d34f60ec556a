/**
 * Builds the `rebase-pilot` command-line program.
 */

import { readFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command } from 'commander'
import { z } from 'zod'
import { createLogger } from '../utils/logger.js'
import { registerConfigCommand } from './commands/config.js'
import { registerRebaseCommand } from './commands/rebase.js'
import { registerResumeCommand } from './commands/resume.js'
import { registerRunsCommand } from './commands/runs.js'

const logger = createLogger('cli')

const PackageJsonSchema = z.object({ version: z.string() })

/** Read the version from package.json; works from both src/ and dist/ */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    try {
      const parsed = PackageJsonSchema.safeParse(JSON.parse(await readFile(pkgPath, 'utf-8')))
      if (parsed.success) {
        return parsed.data.version
      }
    } catch (err) {
      logger.debug({ pkgPath, err }, 'package.json not readable here')
    }
  }
  return '0.0.0'
}

export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()
  program
    .name('rebase-pilot')
    .description('Rebase branches with coding agents resolving and verifying the conflicts')
    .version(version, '-v, --version', 'Output the current version')

  registerRebaseCommand(program)
  registerResumeCommand(program)
  registerRunsCommand(program)
  registerConfigCommand(program)

  return program
}
