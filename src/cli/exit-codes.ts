/**
 * Process exit codes shared by CLI commands.
 *
 *   0   - Success
 *   1   - Rebase failed (or an unexpected error)
 *   2   - Usage or configuration error
 *   130 - Run cancelled by SIGINT/SIGTERM
 */

import type { RunOutcome } from '../modules/rebase-orchestrator/index.js'

export const EXIT_SUCCESS = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE_ERROR = 2
export const EXIT_INTERRUPTED = 130

/** Error codes caused by how the command was invoked rather than by the rebase itself */
const USAGE_ERROR_CODES: ReadonlySet<string> = new Set([
  'INVALID_BRANCH_NAME',
  'INVALID_MAX_ATTEMPTS',
  'NO_REBASE_IN_PROGRESS',
])

export function exitCodeForOutcome(outcome: RunOutcome, interrupted: boolean): number {
  if (outcome.success) return EXIT_SUCCESS
  if (interrupted && outcome.errorCode === 'RUN_CANCELLED') return EXIT_INTERRUPTED
  if (outcome.errorCode !== undefined && USAGE_ERROR_CODES.has(outcome.errorCode)) return EXIT_USAGE_ERROR
  return EXIT_FAILURE
}
