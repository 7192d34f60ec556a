/**
 * Snapshot & branch validator: checks a run's preconditions and captures the
 * repository state it will roll back to.
 */

import type { VersionControl } from '../git/version-control.js'
import {
  BranchNotFoundError,
  DirtyWorkingTreeError,
  InvalidBranchNameError,
  InvalidMaxAttemptsError,
  NotARepositoryError,
} from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { NormalizedRunInput, RunInput, ValidatedRun } from './types.js'

const logger = createLogger('rebase-orchestrator:validator')

export const DEFAULT_MAX_ATTEMPTS = 3
export const MIN_MAX_ATTEMPTS = 1
export const MAX_MAX_ATTEMPTS = 10

/**
 * Strip every character outside `[A-Za-z0-9_/-]`.
 */
export function sanitizeBranchName(name: string): string {
  return name.replace(/[^A-Za-z0-9_/-]/g, '')
}

function normalizeBranch(role: 'source' | 'target', name: string): string {
  if (name.trim() === '') {
    throw new InvalidBranchNameError(role, name)
  }
  const sanitized = sanitizeBranchName(name)
  if (sanitized === '') {
    throw new InvalidBranchNameError(role, name)
  }
  if (sanitized !== name) {
    logger.debug({ role, name, sanitized }, 'Branch name sanitized')
  }
  return sanitized
}

/**
 * Sanitise branch names and check the attempt ceiling. Shared by start and resume.
 *
 * @throws InvalidBranchNameError, InvalidMaxAttemptsError
 */
export function normalizeRunInput(input: Pick<RunInput, 'sourceBranch' | 'targetBranch' | 'maxAttempts'>): NormalizedRunInput {
  const sourceRef = normalizeBranch('source', input.sourceBranch)
  const targetRef = normalizeBranch('target', input.targetBranch)

  const maxAttempts = input.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
  if (!Number.isInteger(maxAttempts) || maxAttempts < MIN_MAX_ATTEMPTS || maxAttempts > MAX_MAX_ATTEMPTS) {
    throw new InvalidMaxAttemptsError(input.maxAttempts)
  }

  return { sourceRef, targetRef, maxAttempts }
}

/**
 * Validate a fresh run and capture its initial snapshot. Nothing in the
 * repository is mutated.
 *
 * @throws a ValidationError subclass naming the failed precondition
 */
export async function initializeRun(
  vcs: VersionControl,
  input: Pick<RunInput, 'sourceBranch' | 'targetBranch' | 'maxAttempts'>,
  repositoryPath: string,
): Promise<ValidatedRun> {
  const normalized = normalizeRunInput(input)

  if (!(await vcs.isValidRepository())) {
    throw new NotARepositoryError(repositoryPath)
  }

  for (const branch of [normalized.sourceRef, normalized.targetRef]) {
    if (!(await vcs.branchExists(branch))) {
      throw new BranchNotFoundError(branch)
    }
  }

  if (!(await vcs.isCleanWorkingTree())) {
    throw new DirtyWorkingTreeError(await vcs.listDirtyFiles())
  }

  const initialSnapshot = await vcs.captureSnapshot()
  logger.debug({ ...normalized, initialSnapshot }, 'Run preconditions satisfied')

  return { ...normalized, initialSnapshot }
}
