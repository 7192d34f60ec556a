/**
 * `rebase-pilot runs` command
 *
 * Lists recorded runs from the history database, or prints one run's full
 * progress log with --id.
 */

import { existsSync } from 'node:fs'
import type { Command } from 'commander'
import { DatabaseWrapper } from '../../persistence/database.js'
import { runMigrations } from '../../persistence/migrations/index.js'
import { getRun, getRunLog, listRuns } from '../../persistence/queries/runs.js'
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE_ERROR } from '../exit-codes.js'
import { formatRunDetails, formatRunsTable } from '../formatters/progress-formatter.js'
import { historyDbPath, loadProjectConfig } from '../runtime.js'
import type { RuntimeOptions } from '../runtime.js'
import { reportStartupError } from '../utils/run-session.js'
import { parseIntegerOption } from '../utils/options.js'
import type { RebasePilotConfig } from '../../modules/config/index.js'

export interface RunsActionOptions {
  id?: string
  limit: number
  json: boolean
  projectRoot: string
  configOptions?: RuntimeOptions['configOptions']
}

export async function runRunsAction(options: RunsActionOptions): Promise<number> {
  let config: RebasePilotConfig
  try {
    config = await loadProjectConfig({
      projectRoot: options.projectRoot,
      ...(options.configOptions !== undefined ? { configOptions: options.configOptions } : {}),
    })
  } catch (err) {
    return reportStartupError(err)
  }

  if (!Number.isInteger(options.limit) || options.limit < 1) {
    process.stderr.write(`Error: --limit must be a positive integer, got ${String(options.limit)}\n`)
    return EXIT_USAGE_ERROR
  }

  const dbPath = historyDbPath(options.projectRoot, config)
  if (!existsSync(dbPath)) {
    if (options.id !== undefined) {
      process.stderr.write(`Error: Run not found: ${options.id}\n`)
      return EXIT_USAGE_ERROR
    }
    process.stdout.write(options.json ? '[]\n' : 'No runs recorded yet.\n')
    return EXIT_SUCCESS
  }

  const wrapper = new DatabaseWrapper(dbPath)
  try {
    wrapper.open()
    runMigrations(wrapper.db)

    if (options.id !== undefined) {
      const run = getRun(wrapper.db, options.id)
      if (run === undefined) {
        process.stderr.write(`Error: Run not found: ${options.id}\n`)
        return EXIT_USAGE_ERROR
      }
      const log = getRunLog(wrapper.db, run.id)
      process.stdout.write(
        options.json ? JSON.stringify({ ...run, log }, null, 2) + '\n' : formatRunDetails(run, log) + '\n',
      )
      return EXIT_SUCCESS
    }

    const runs = listRuns(wrapper.db, options.limit)
    if (options.json) {
      process.stdout.write(JSON.stringify(runs, null, 2) + '\n')
    } else if (runs.length === 0) {
      process.stdout.write('No runs recorded yet.\n')
    } else {
      process.stdout.write(formatRunsTable(runs) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`)
    return EXIT_FAILURE
  } finally {
    wrapper.close()
  }
}

export function registerRunsCommand(program: Command): void {
  program
    .command('runs')
    .description('Show the history of rebase runs')
    .option('--id <runId>', 'Show one run with its progress log')
    .option('--limit <n>', 'Number of runs to list', parseIntegerOption, 20)
    .option('--json', 'Print JSON instead of text', false)
    .option('--project-root <path>', 'Repository whose history to read', process.cwd())
    .action(async (opts: { id?: string; limit: number; json: boolean; projectRoot: string }) => {
      process.exitCode = await runRunsAction({
        limit: opts.limit,
        json: opts.json,
        projectRoot: opts.projectRoot,
        ...(opts.id !== undefined ? { id: opts.id } : {}),
      })
    })
}
