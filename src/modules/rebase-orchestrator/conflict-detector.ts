/**
 * Conflict detection: lists unmerged paths and drops the ones agents should
 * never be asked to edit.
 */

import type { VersionControl } from '../git/version-control.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('rebase-orchestrator:detector')

const SAFE_PATH = /^[\w./-]+$/

export type SkipReason = 'unsafe_path' | 'lock_file' | 'binary'

export interface DetectionResult {
  /** Paths to resolve, in the order the repository reported them */
  files: string[]
  skipped: Array<{ path: string; reason: SkipReason }>
}

export async function detectConflictFiles(vcs: VersionControl): Promise<DetectionResult> {
  const unmerged = await vcs.listUnmergedFiles()
  const files: string[] = []
  const skipped: DetectionResult['skipped'] = []

  for (const path of unmerged) {
    if (!SAFE_PATH.test(path)) {
      skipped.push({ path, reason: 'unsafe_path' })
    } else if (path.endsWith('.lock')) {
      skipped.push({ path, reason: 'lock_file' })
    } else if (await vcs.isBinary(path)) {
      skipped.push({ path, reason: 'binary' })
    } else {
      files.push(path)
    }
  }

  if (skipped.length > 0) {
    logger.info({ skipped }, 'Skipping conflicted files that cannot be resolved by an agent')
  }

  return { files, skipped }
}
