/**
 * `rebase-pilot resume` command
 *
 * Continues a rebase that stopped part-way (a crashed run, or conflicts the
 * user resolved by hand). The rollback snapshot comes from the latest
 * resumable run in the history when it matches the rebase's recorded
 * original head, otherwise from that original head.
 *
 * Usage:
 *   rebase-pilot resume
 *   rebase-pilot resume --source feature --target main --events
 */

import type { Command } from 'commander'
import type { RepositorySnapshot } from '../../core/types.js'
import { findResumableRun } from '../../persistence/queries/runs.js'
import { createLogger } from '../../utils/logger.js'
import { EXIT_FAILURE, EXIT_USAGE_ERROR } from '../exit-codes.js'
import { createRuntime } from '../runtime.js'
import type { Runtime, RuntimeFactory, RuntimeOptions } from '../runtime.js'
import { driveRun, reportStartupError } from '../utils/run-session.js'
import { parseIntegerOption } from '../utils/options.js'

const logger = createLogger('cli:resume')

export interface ResumeActionOptions {
  source?: string
  target?: string
  maxAttempts?: number
  events: boolean
  projectRoot: string
  configOptions?: RuntimeOptions['configOptions']
  openRuntime?: RuntimeFactory
}

function isSameSnapshot(a: RepositorySnapshot, b: RepositorySnapshot): boolean {
  return a.revision === b.revision && a.branch === b.branch
}

export async function runResumeAction(options: ResumeActionOptions): Promise<number> {
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
    if (!(await runtime.vcs.isRebaseInProgress())) {
      process.stderr.write('Error: No rebase in progress to resume.\n')
      return EXIT_USAGE_ERROR
    }

    const record = findResumableRun(runtime.database.db, {
      ...(options.source !== undefined ? { source_branch: options.source } : {}),
      ...(options.target !== undefined ? { target_branch: options.target } : {}),
    })

    const sourceBranch = options.source ?? record?.source_branch
    const targetBranch = options.target ?? record?.target_branch
    if (sourceBranch === undefined || targetBranch === undefined) {
      process.stderr.write('Error: No resumable run found in history; pass --source and --target.\n')
      return EXIT_USAGE_ERROR
    }

    // A stored snapshot only applies to the rebase it was taken for
    const origHead = await runtime.vcs.readRebaseOrigHead()
    let initialSnapshot: RepositorySnapshot | undefined
    if (record !== undefined && record.snapshot_revision !== null) {
      const stored: RepositorySnapshot = { revision: record.snapshot_revision, branch: record.snapshot_branch }
      if (origHead !== null && isSameSnapshot(stored, origHead)) {
        initialSnapshot = stored
      } else {
        logger.warn(
          { previousRunId: record.id, stored, origHead },
          'Stored snapshot does not match the rebase in progress; using its original head',
        )
      }
    }
    const maxAttempts = options.maxAttempts ?? record?.max_attempts ?? runtime.config.rebase.max_attempts

    logger.info({ previousRunId: record?.id, sourceBranch, targetBranch }, 'Resuming rebase')
    if (!options.events && record !== undefined) {
      process.stdout.write(`Resuming run ${record.id}: ${sourceBranch} onto ${targetBranch}\n`)
    }

    return await driveRun(
      runtime,
      () =>
        runtime.orchestrator.resume({
          sourceBranch,
          targetBranch,
          maxAttempts,
          ...(initialSnapshot !== undefined ? { initialSnapshot } : {}),
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

export function registerResumeCommand(program: Command): void {
  program
    .command('resume')
    .description('Continue a rebase that is already in progress')
    .option('--source <branch>', 'Branch being rebased (defaults to the latest resumable run)')
    .option('--target <branch>', 'Branch being rebased onto (defaults to the latest resumable run)')
    .option('--max-attempts <n>', 'Resolution rounds and per-file verification attempts (1-10)', parseIntegerOption)
    .option('--events', 'Stream run events as NDJSON on stdout', false)
    .option('--project-root <path>', 'Repository to operate on', process.cwd())
    .action(
      async (opts: { source?: string; target?: string; maxAttempts?: number; events: boolean; projectRoot: string }) => {
        process.exitCode = await runResumeAction({
          events: opts.events,
          projectRoot: opts.projectRoot,
          ...(opts.source !== undefined ? { source: opts.source } : {}),
          ...(opts.target !== undefined ? { target: opts.target } : {}),
          ...(opts.maxAttempts !== undefined ? { maxAttempts: opts.maxAttempts } : {}),
        })
      },
    )
}
