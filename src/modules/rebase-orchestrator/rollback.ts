/**
 * Rollback / compensation manager: restores the snapshot captured before the
 * run touched the repository. Runs at most once per run and never throws.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { VersionControl } from '../git/version-control.js'
import { createLogger } from '../../utils/logger.js'
import type { RunContext } from './types.js'

const logger = createLogger('rebase-orchestrator:rollback')

export interface RollbackDeps {
  vcs: VersionControl
  eventBus: TypedEventBus
}

/**
 * @returns whether the repository was reset; false when there was nothing to
 *   roll back to, the rollback already ran, or the reset failed
 */
export async function rollbackRun(ctx: RunContext, deps: RollbackDeps): Promise<boolean> {
  const snapshot = ctx.initialSnapshot
  if (snapshot === null || ctx.rolledBack) return false
  ctx.rolledBack = true

  ctx.eventLog.append({
    stage: 'rolling_back',
    details: `Rolling back to initial state (${snapshot.branch ?? 'detached HEAD'} at ${snapshot.revision})`,
    progressPercent: 95,
  })

  let ok = false
  let output = ''
  try {
    const result = await deps.vcs.hardReset(snapshot)
    ok = result.ok
    output = result.output
  } catch (err) {
    output = err instanceof Error ? err.message : String(err)
  }

  if (ok) {
    ctx.eventLog.append({ stage: 'rolling_back', details: 'Rollback completed', progressPercent: 100 })
    logger.info({ runId: ctx.runId, revision: snapshot.revision }, 'Repository restored to initial snapshot')
  } else {
    ctx.eventLog.append({
      stage: 'rolling_back',
      details: 'Rollback failed; the repository may need manual cleanup',
      progressPercent: 100,
      errors: [output],
    })
    logger.error({ runId: ctx.runId, output }, 'Rollback failed')
  }

  deps.eventBus.emit('rebase:rolled-back', { runId: ctx.runId, ok, output })
  return ok
}
