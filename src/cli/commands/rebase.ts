/**
 * `rebase-pilot rebase <source> <target>` command
 *
 * Rebases <source> onto <target>, letting agents resolve the conflicts. The
 * repository is restored to its prior state when the run fails.
 *
 * Usage:
 *   rebase-pilot rebase feature main
 *   rebase-pilot rebase feature main --max-attempts 5 --events
 */

import type { Command } from 'commander'
import { EXIT_FAILURE } from '../exit-codes.js'
import { createRuntime } from '../runtime.js'
import type { Runtime, RuntimeFactory, RuntimeOptions } from '../runtime.js'
import { driveRun, reportStartupError } from '../utils/run-session.js'
import { parseIntegerOption } from '../utils/options.js'

export interface RebaseActionOptions {
  source: string
  target: string
  maxAttempts?: number
  events: boolean
  projectRoot: string
  configOptions?: RuntimeOptions['configOptions']
  openRuntime?: RuntimeFactory
}

export async function runRebaseAction(options: RebaseActionOptions): Promise<number> {
  const openRuntime = options.openRuntime ?? createRuntime

  let runtime: Runtime
  try {
    runtime = await openRuntime({
      projectRoot: options.projectRoot,
      ...(options.configOptions !== undefined ? { configOptions: options.configOptions } : {}),
    })
  } catch (err) {
    return reportStartupError(err)
  }

  try {
    const maxAttempts = options.maxAttempts ?? runtime.config.rebase.max_attempts
    return await driveRun(
      runtime,
      () =>
        runtime.orchestrator.start({
          sourceBranch: options.source,
          targetBranch: options.target,
          maxAttempts,
        }),
      { events: options.events },
    )
  } catch (err) {
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`)
    return EXIT_FAILURE
  } finally {
    await runtime.close()
  }
}

export function registerRebaseCommand(program: Command): void {
  program
    .command('rebase <source> <target>')
    .description('Rebase <source> onto <target> and resolve conflicts with coding agents')
    .option('--max-attempts <n>', 'Resolution rounds and per-file verification attempts (1-10)', parseIntegerOption)
    .option('--events', 'Stream run events as NDJSON on stdout', false)
    .option('--project-root <path>', 'Repository to operate on', process.cwd())
    .action(async (source: string, target: string, opts: { maxAttempts?: number; events: boolean; projectRoot: string }) => {
      const exitCode = await runRebaseAction({
        source,
        target,
        events: opts.events,
        projectRoot: opts.projectRoot,
        ...(opts.maxAttempts !== undefined ? { maxAttempts: opts.maxAttempts } : {}),
      })
      process.exitCode = exitCode
    })
}
