/**
 * Conflict resolution engine: one round over the detected conflict files.
 *
 * Files are processed strictly in detection order. A rejected file goes back
 * to the front of the work queue as a retry item, so the next file is only
 * started once the current one is accepted or given up on.
 */

import type { VersionControl, WorkingTreeFiles } from '../git/version-control.js'
import type { ResolutionAgent, ResolveOutcome } from '../conflict-agents/types.js'
import { createLogger } from '../../utils/logger.js'
import type { FileError, RoundResult, RunContext } from './types.js'
import { verifyResolution } from './verification-gate.js'
import type { GateDeps } from './verification-gate.js'

const logger = createLogger('rebase-orchestrator:engine')

const CONFLICT_MARKER = /^<<<<<<< /m

export interface EngineDeps extends GateDeps {
  vcs: VersionControl
  files: WorkingTreeFiles
  resolutionAgent: ResolutionAgent
}

interface WorkItem {
  kind: 'visit' | 'retry'
  path: string
  /** 1-based attempt number for this file */
  attempt: number
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function cancelledResult(ctx: RunContext): RoundResult {
  const error = ctx.cancelReason ?? 'Run cancelled'
  ctx.eventLog.append({
    stage: 'resolving_conflicts',
    details: 'Run cancelled',
    progressPercent: ctx.eventLog.lastProgress(),
    errors: [error],
  })
  return { success: false, error, errorCode: 'RUN_CANCELLED' }
}

async function readFile(deps: EngineDeps, path: string): Promise<string | null> {
  try {
    return await deps.files.read(path)
  } catch (err) {
    logger.debug({ path, error: err instanceof Error ? err.message : String(err) }, 'Could not read file')
    return null
  }
}

async function askResolver(ctx: RunContext, deps: EngineDeps, item: WorkItem, content: string): Promise<ResolveOutcome> {
  try {
    return await deps.resolutionAgent.resolve({
      path: item.path,
      content,
      attempt: item.attempt,
      maxAttempts: ctx.maxAttemptsGlobal,
      previousIssues: ctx.lastIssues.get(item.path) ?? [],
      signal: ctx.signal,
    })
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) }
  }
}

/**
 * `<failed>/<total> files could not be resolved automatically`, followed by one
 * `File <path>: <errors>` line per failed file.
 */
export function summarizeErrors(errors: readonly FileError[], totalFiles: number): { summary: string; details: string[] } {
  const byFile = new Map<string, string[]>()
  for (const { file, error } of errors) {
    const list = byFile.get(file) ?? []
    list.push(error)
    byFile.set(file, list)
  }
  const details = Array.from(byFile, ([file, list]) => `File ${file}: ${list.join('; ')}`)
  return {
    summary: `${String(byFile.size)}/${String(totalFiles)} files could not be resolved automatically`,
    details,
  }
}

// ---------------------------------------------------------------------------
// runResolutionRound
// ---------------------------------------------------------------------------

export async function runResolutionRound(ctx: RunContext, deps: EngineDeps): Promise<RoundResult> {
  const { eventLog, tracker } = ctx
  const max = ctx.maxAttemptsGlobal

  ctx.resolutionErrors = []
  const recordError = (file: string, error: string): void => {
    ctx.resolutionErrors.push({ file, error })
  }

  const queue: WorkItem[] = ctx.conflictFiles.map((path) => ({
    kind: 'visit',
    path,
    attempt: (ctx.fileAttempts.get(path) ?? 0) + 1,
  }))

  while (queue.length > 0) {
    const item = queue.shift()
    if (item === undefined) break
    const { path } = item

    if (ctx.signal.aborted) return cancelledResult(ctx)

    const rejections = ctx.fileAttempts.get(path) ?? 0
    if (rejections >= max) {
      const error = `Maximum verification attempts (${String(max)}) already reached for this file`
      eventLog.append({
        stage: 'resolving_conflicts',
        details: `Skipping exhausted file: ${path}`,
        progressPercent: 50,
        files: [path],
        errors: [error],
      })
      recordError(path, error)
      continue
    }

    eventLog.append({
      stage: 'resolving_conflicts',
      details:
        item.kind === 'retry'
          ? `Retrying conflict resolution for file: ${path} (attempt ${String(item.attempt)}/${String(max)})`
          : `Analyzing conflict in file: ${path}`,
      progressPercent: 50,
      files: [path],
    })

    const content = await readFile(deps, path)
    if (content === null) {
      recordError(path, 'File is not readable')
      continue
    }

    if (item.kind === 'visit' && !CONFLICT_MARKER.test(content)) {
      const staged = await deps.vcs.stage(path)
      if (staged.ok) {
        eventLog.append({
          stage: 'resolving_conflicts',
          details: `No conflict markers found, staged file as-is: ${path}`,
          progressPercent: 85,
          files: [path],
        })
      } else {
        recordError(path, `Failed to stage file without conflict markers: ${staged.output}`)
      }
      continue
    }

    tracker.track()
    const resolved = await askResolver(ctx, deps, item, content)
    tracker.complete(resolved.ok, resolved.error)

    if (ctx.signal.aborted) return cancelledResult(ctx)

    if (!resolved.ok) {
      const error = resolved.error ?? 'Resolution agent failed'
      eventLog.append({
        stage: 'resolving_conflicts',
        details: `Agent resolution failed for file: ${path}`,
        progressPercent: 75,
        files: [path],
        errors: [error],
      })
      recordError(path, error)
      continue
    }

    eventLog.append({
      stage: 'resolving_conflicts',
      details: `Resolution completed for file: ${path}, verifying quality`,
      progressPercent: 75,
      files: [path],
    })

    const resolvedContent = await readFile(deps, path)
    if (resolvedContent === null) {
      const error = `Cannot verify file: ${path} does not exist or is not readable`
      eventLog.append({
        stage: 'resolving_conflicts',
        details: 'Verification failed - file not readable',
        progressPercent: 80,
        files: [path],
        errors: [error],
      })
      recordError(path, error)
      continue
    }

    const decision = await verifyResolution(ctx, deps, path, resolvedContent, item.attempt)

    if (ctx.signal.aborted) return cancelledResult(ctx)

    if (decision.kind === 'retry') {
      queue.unshift({ kind: 'retry', path, attempt: decision.attempt })
    } else if (decision.kind === 'failed') {
      recordError(path, decision.error)
    }
  }

  if (ctx.resolutionErrors.length > 0) {
    const { summary, details } = summarizeErrors(ctx.resolutionErrors, ctx.conflictFiles.length)
    eventLog.append({
      stage: 'resolving_conflicts',
      details: `Partial resolution failure (${summary})`,
      progressPercent: 90,
      errors: details,
    })
    return { success: false, error: [summary, ...details].join('\n') }
  }

  const continued = await deps.vcs.continueRebase()
  if (!continued.ok) {
    const error = `Failed to continue rebase: ${continued.output}`
    eventLog.append({
      stage: 'resolving_conflicts',
      details: 'Failed to continue rebase after resolving conflicts',
      progressPercent: 90,
      errors: [error],
    })
    return { success: false, error }
  }

  eventLog.append({
    stage: 'resolving_conflicts',
    details: `Successfully resolved all conflicts in ${String(ctx.conflictFiles.length)} files (Global attempt ${String(ctx.attemptGlobal)}/${String(max)})`,
    progressPercent: 100,
    files: ctx.conflictFiles,
  })
  return { success: true }
}
