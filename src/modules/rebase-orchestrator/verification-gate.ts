/**
 * Verification gate: sends a resolved file to the verification agent and
 * decides whether to stage it, retry it, or give up on it.
 */

import type { VersionControl } from '../git/version-control.js'
import type { VerificationAgent, VerifyOutcome } from '../conflict-agents/types.js'
import { createLogger } from '../../utils/logger.js'
import type { RunContext } from './types.js'

const logger = createLogger('rebase-orchestrator:gate')

export type GateDecision =
  | { kind: 'accepted' }
  | { kind: 'retry'; attempt: number }
  | { kind: 'failed'; error: string }

export interface GateDeps {
  vcs: VersionControl
  verificationAgent: VerificationAgent
}

export interface IssueClassification {
  conflictMarkers: string[]
  duplicateCode: string[]
  other: string[]
}

// ---------------------------------------------------------------------------
// Issue classification
// ---------------------------------------------------------------------------

/**
 * Sort verifier issues into buckets. Used for the error message only; the
 * retry decision never depends on the buckets.
 */
const MARKER_ISSUE = /conflict marker|<{7}|={7}|>{7}/i
const DUPLICATE_ISSUE = /duplicat|repeated|redundant/i

export function classifyIssues(issues: readonly string[]): IssueClassification {
  const result: IssueClassification = { conflictMarkers: [], duplicateCode: [], other: [] }
  for (const issue of issues) {
    if (MARKER_ISSUE.test(issue)) {
      result.conflictMarkers.push(issue)
    } else if (DUPLICATE_ISSUE.test(issue)) {
      result.duplicateCode.push(issue)
    } else {
      result.other.push(issue)
    }
  }
  return result
}

export function formatRejection(issues: readonly string[]): string {
  const { conflictMarkers, duplicateCode, other } = classifyIssues(issues)
  const parts: string[] = []
  if (conflictMarkers.length > 0) parts.push('Conflict markers still present in file')
  if (duplicateCode.length > 0) parts.push('Duplicate code found in resolution')
  if (other.length > 0) parts.push(`Other issues: ${other.join('; ')}`)
  if (parts.length === 0) parts.push('Unknown verification issues')
  return `Resolution verification failed: ${parts.join('; ')}`
}

// ---------------------------------------------------------------------------
// Gate
// ---------------------------------------------------------------------------

async function askVerifier(
  ctx: RunContext,
  deps: GateDeps,
  path: string,
  content: string,
  attempt: number,
): Promise<VerifyOutcome> {
  try {
    return await deps.verificationAgent.verify({
      path,
      content,
      attempt,
      maxAttempts: ctx.maxAttemptsGlobal,
      signal: ctx.signal,
    })
  } catch (err) {
    return { passed: false, issues: [], error: err instanceof Error ? err.message : String(err) }
  }
}

/**
 * Verify one resolved file.
 *
 * A rejection increments the file's attempt counter; below the ceiling the
 * caller retries the file, otherwise the returned error is terminal for it.
 * Acceptance stages the file and confirms the index no longer lists it as
 * unmerged.
 */
export async function verifyResolution(
  ctx: RunContext,
  deps: GateDeps,
  path: string,
  content: string,
  attempt: number,
): Promise<GateDecision> {
  const { eventLog, tracker } = ctx
  const max = ctx.maxAttemptsGlobal

  tracker.track()
  eventLog.append({
    stage: 'verifying_resolution',
    details:
      attempt > 1
        ? `Verifying conflict resolution quality for file: ${path} (verification attempt ${String(attempt)}/${String(max)})`
        : `Verifying conflict resolution quality for file: ${path}`,
    progressPercent: 60,
    files: [path],
  })

  const outcome = await askVerifier(ctx, deps, path, content, attempt)
  const passed = outcome.passed && outcome.error === undefined
  let issues = outcome.issues

  if (outcome.error !== undefined) {
    issues = [`Verification agent failed: ${outcome.error}`]
    eventLog.append({
      stage: 'verifying_resolution',
      details: `Verification agent failed for file: ${path}`,
      progressPercent: 65,
      files: [path],
      errors: [outcome.error],
    })
  }

  tracker.complete(passed, passed ? undefined : 'Verification failed')

  if (passed) {
    eventLog.append({
      stage: 'verifying_resolution',
      details: `Verification passed for file: ${path}`,
      progressPercent: 70,
      files: [path],
    })
    return stageAccepted(ctx, deps.vcs, path)
  }

  if (outcome.error === undefined) {
    eventLog.append({
      stage: 'verifying_resolution',
      details: `Verification failed for file: ${path}`,
      progressPercent: 70,
      files: [path],
      errors: issues,
    })
  }

  const rejections = (ctx.fileAttempts.get(path) ?? 0) + 1
  ctx.fileAttempts.set(path, rejections)
  ctx.lastIssues.set(path, [...issues])

  if (rejections < max) {
    eventLog.append({
      stage: 'resolving_conflicts',
      details: `Verification failed, retrying resolution for file: ${path} (attempt ${String(rejections + 1)}/${String(max)})`,
      progressPercent: 80,
      files: [path],
      errors: issues,
    })
    logger.debug({ path, rejections, max }, 'Retrying rejected resolution')
    return { kind: 'retry', attempt: rejections + 1 }
  }

  const error = formatRejection(issues)
  eventLog.append({
    stage: 'resolving_conflicts',
    details: `Maximum verification attempts reached for file: ${path}`,
    progressPercent: 80,
    files: [path],
    errors: [error],
  })
  logger.info({ path, rejections }, 'File exhausted its verification attempts')
  return { kind: 'failed', error }
}

async function stageAccepted(ctx: RunContext, vcs: VersionControl, path: string): Promise<GateDecision> {
  const staged = await vcs.stage(path)
  if (!staged.ok) {
    const error = `Failed to stage resolved file: ${staged.output}`
    ctx.eventLog.append({
      stage: 'resolving_conflicts',
      details: `Failed to stage file: ${path}`,
      progressPercent: 80,
      files: [path],
      errors: [error],
    })
    return { kind: 'failed', error }
  }

  if (await vcs.isUnmerged(path)) {
    const error = 'File was not properly staged despite successful git add'
    ctx.eventLog.append({
      stage: 'resolving_conflicts',
      details: `File still unmerged after staging: ${path}`,
      progressPercent: 80,
      files: [path],
      errors: [error],
    })
    return { kind: 'failed', error }
  }

  ctx.lastIssues.delete(path)
  ctx.eventLog.append({
    stage: 'resolving_conflicts',
    details: `Successfully resolved and staged file: ${path}`,
    progressPercent: 85,
    files: [path],
  })
  return { kind: 'accepted' }
}
