/**
 * Human-readable rendering of run progress and run history.
 */

import type { LogEntry, LogStage } from '../../core/types.js'
import type { RunLogRecord, RunRecord } from '../../persistence/schemas/runs.js'
import type { RunOutcome } from '../../modules/rebase-orchestrator/index.js'

const STAGE_LABELS: Readonly<Record<LogStage, string>> = {
  initializing: 'init',
  continuing: 'resume',
  detecting_conflicts: 'detect',
  resolving_conflicts: 'resolve',
  verifying_resolution: 'verify',
  rolling_back: 'rollback',
  completed: 'done',
  failed: 'failed',
}

const LABEL_WIDTH = 8
const ERROR_INDENT = ' '.repeat(7 + LABEL_WIDTH)

type EntryLike = Pick<LogEntry, 'stage' | 'details' | 'progressPercent' | 'errors'>

/**
 * One line per entry, then one indented line per error line:
 *
 *   [ 25%] resolve  Attempting to resolve conflicts (Global attempt 1/3)
 *                   ✗ File src/a.ts: Agent timed out after 600000ms
 */
export function formatLogEntry(entry: EntryLike): string {
  const pct = String(entry.progressPercent).padStart(3, ' ')
  const lines = [`[${pct}%] ${STAGE_LABELS[entry.stage].padEnd(LABEL_WIDTH)} ${entry.details}`]
  for (const error of entry.errors) {
    for (const line of error.split('\n')) {
      lines.push(`${ERROR_INDENT}✗ ${line}`)
    }
  }
  return lines.join('\n')
}

export function formatRunLogRecord(record: RunLogRecord): string {
  return formatLogEntry({
    stage: record.stage,
    details: record.details,
    progressPercent: record.progress_percent,
    errors: record.errors,
  })
}

export function formatOutcome(outcome: RunOutcome, sourceBranch: string, targetBranch: string): string {
  if (outcome.success) {
    const rounds = outcome.attempts === 1 ? '1 resolution round' : `${String(outcome.attempts)} resolution rounds`
    return `✓ Rebased ${sourceBranch} onto ${targetBranch} (${rounds})`
  }
  const lines = [`✗ Rebase failed: ${outcome.error ?? 'Unknown error'}`]
  lines.push(
    outcome.rolledBack
      ? '  Repository restored to its state before the run.'
      : '  Repository was not rolled back; inspect it before retrying.',
  )
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// Run history
// ---------------------------------------------------------------------------

export function formatRunsTable(runs: readonly RunRecord[]): string {
  const header = ['RUN', 'STATUS', 'SOURCE', 'TARGET', 'ROUNDS', 'CREATED']
  const rows = runs.map((run) => [
    run.id,
    run.rolled_back ? `${run.status} (rolled back)` : run.status,
    run.source_branch,
    run.target_branch,
    String(run.attempts),
    run.created_at,
  ])
  const widths = header.map((title, col) => Math.max(title.length, ...rows.map((row) => (row[col] ?? '').length)))
  return [header, ...rows]
    .map((row) =>
      row
        .map((cell, col) => cell.padEnd(widths[col] ?? 0))
        .join('  ')
        .trimEnd(),
    )
    .join('\n')
}

export function formatRunDetails(run: RunRecord, log: readonly RunLogRecord[]): string {
  const lines = [
    `Run:       ${run.id}`,
    `Mode:      ${run.mode}`,
    `Branches:  ${run.source_branch} onto ${run.target_branch}`,
    `Status:    ${run.status}${run.rolled_back ? ' (rolled back)' : ''}`,
    `Rounds:    ${String(run.attempts)}${run.max_attempts !== null ? `/${String(run.max_attempts)}` : ''}`,
  ]
  if (run.snapshot_revision !== null) {
    lines.push(`Snapshot:  ${run.snapshot_revision}${run.snapshot_branch !== null ? ` (${run.snapshot_branch})` : ''}`)
  }
  if (run.error !== null) {
    lines.push(`Error:     ${run.error.split('\n').join('\n           ')}`)
  }
  lines.push(`Created:   ${run.created_at}`, '')
  lines.push(...log.map(formatRunLogRecord))
  return lines.join('\n')
}
