/**
 * Git-backed implementation of VersionControl.
 *
 * Every command runs through spawnGit() in the configured repository root.
 * Rebase steps run with GIT_EDITOR=true so `rebase --continue` never waits
 * on an interactive editor for the commit message.
 */

import { open, readFile, access } from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'
import { isAbsolute, join } from 'node:path'
import type { RepositorySnapshot } from '../../core/types.js'
import { GitError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { spawnGit, combineOutput } from './git-utils.js'
import type { GitSpawnResult } from './git-utils.js'
import type { OperationResult, VersionControl, WorkingTreeFiles } from './version-control.js'

const logger = createLogger('git')

/** Bytes inspected when sniffing a file for binary content */
const BINARY_SNIFF_BYTES = 8000

// ---------------------------------------------------------------------------
// Porcelain status parsing
// ---------------------------------------------------------------------------

const STATUS_LINE = /^\s*([MTADRCU?!]{1,2})\s+(.+)$/

/**
 * Extract paths with tracked modifications from `git status --porcelain`.
 *
 * Untracked (`??`) and ignored (`!!`) entries are skipped, as are directory
 * entries (paths ending in `/`).
 */
export function parseDirtyPaths(porcelain: string): string[] {
  const paths: string[] = []
  for (const line of porcelain.split('\n')) {
    const match = STATUS_LINE.exec(line)
    if (match === null) continue
    const status = match[1] ?? ''
    const path = match[2] ?? ''
    if (status === '??' || status === '!!') continue
    if (path.endsWith('/')) continue
    paths.push(path)
  }
  return paths
}

function splitLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '')
}

function toOperationResult(result: GitSpawnResult): OperationResult {
  return { ok: result.code === 0, output: combineOutput(result) }
}

// ---------------------------------------------------------------------------
// createGitVersionControl
// ---------------------------------------------------------------------------

export interface GitVersionControlOptions {
  /** Repository working directory */
  cwd: string
}

export function createGitVersionControl(options: GitVersionControlOptions): VersionControl {
  const { cwd } = options
  const rebaseEnv: NodeJS.ProcessEnv = { ...process.env, GIT_EDITOR: 'true' }

  const git = (args: string[], env?: NodeJS.ProcessEnv): Promise<GitSpawnResult> =>
    spawnGit(args, { cwd, ...(env !== undefined ? { env } : {}) })

  async function gitPath(name: string): Promise<string | null> {
    const result = await git(['rev-parse', '--git-path', name])
    if (result.code !== 0 || result.stdout === '') return null
    return isAbsolute(result.stdout) ? result.stdout : join(cwd, result.stdout)
  }

  async function pathExists(path: string): Promise<boolean> {
    try {
      await access(path)
      return true
    } catch {
      return false
    }
  }

  async function rebaseStateDir(): Promise<string | null> {
    for (const name of ['rebase-merge', 'rebase-apply']) {
      const dir = await gitPath(name)
      if (dir !== null && (await pathExists(dir))) return dir
    }
    return null
  }

  async function listUnmergedFiles(): Promise<string[]> {
    const result = await git(['diff', '--name-only', '--diff-filter=U'])
    if (result.code !== 0) {
      logger.warn({ stderr: result.stderr }, 'Failed to list unmerged files')
      return []
    }
    return splitLines(result.stdout)
  }

  async function listDirtyFiles(): Promise<string[]> {
    const result = await git(['status', '--porcelain'])
    if (result.code !== 0) {
      logger.warn({ stderr: result.stderr }, 'git status failed')
      return []
    }
    return parseDirtyPaths(result.stdout)
  }

  async function currentRevision(): Promise<string> {
    const result = await git(['rev-parse', 'HEAD'])
    if (result.code !== 0) {
      throw new GitError(`Failed to read HEAD: ${combineOutput(result)}`)
    }
    return result.stdout
  }

  async function continueRebase(): Promise<OperationResult> {
    const result = await git(['rebase', '--continue'], rebaseEnv)
    if (result.code === 0) return toOperationResult(result)

    // The step was committed and the replay stopped on the next commit's conflicts
    const unmerged = await listUnmergedFiles()
    if (unmerged.length > 0) {
      logger.debug({ unmerged: unmerged.length }, 'rebase --continue stopped on new conflicts')
      return { ok: true, output: combineOutput(result) }
    }
    return toOperationResult(result)
  }

  return {
    async branchExists(name) {
      const result = await git(['rev-parse', '--verify', '--quiet', `${name}^{commit}`])
      return result.code === 0
    },

    async isCleanWorkingTree() {
      const dirty = await listDirtyFiles()
      return dirty.length === 0
    },

    listDirtyFiles,

    async isValidRepository() {
      const result = await git(['rev-parse', '--is-inside-work-tree'])
      return result.code === 0 && result.stdout === 'true'
    },

    currentRevision,

    async captureSnapshot() {
      const revision = await currentRevision()
      const branch = await git(['symbolic-ref', '--short', '-q', 'HEAD'])
      return { revision, branch: branch.code === 0 && branch.stdout !== '' ? branch.stdout : null }
    },

    async isRebaseInProgress() {
      return (await rebaseStateDir()) !== null
    },

    async readRebaseOrigHead() {
      const dir = await rebaseStateDir()
      if (dir === null) return null
      try {
        const revision = (await readFile(join(dir, 'orig-head'), 'utf-8')).trim()
        let branch: string | null = null
        if (await pathExists(join(dir, 'head-name'))) {
          const headName = (await readFile(join(dir, 'head-name'), 'utf-8')).trim()
          branch = headName.startsWith('refs/heads/') ? headName.slice('refs/heads/'.length) : null
        }
        return revision === '' ? null : { revision, branch }
      } catch (err) {
        logger.warn({ dir, err }, 'Failed to read rebase state')
        return null
      }
    },

    async startOrContinueRebase(target, source) {
      if (await rebaseStateDir()) {
        logger.info('Rebase already in progress, continuing')
        return continueRebase()
      }
      const result = await git(['rebase', target, source], rebaseEnv)
      return toOperationResult(result)
    },

    listUnmergedFiles,

    async isBinary(path) {
      let handle: FileHandle
      try {
        handle = await open(join(cwd, path), 'r')
      } catch {
        // Deleted on one side of the conflict: nothing to sniff
        return false
      }
      try {
        const buffer = Buffer.alloc(BINARY_SNIFF_BYTES)
        const { bytesRead } = await handle.read(buffer, 0, BINARY_SNIFF_BYTES, 0)
        return buffer.subarray(0, bytesRead).includes(0)
      } finally {
        await handle.close()
      }
    },

    continueRebase,

    async stage(path) {
      return toOperationResult(await git(['add', '--', path]))
    },

    async isUnmerged(path) {
      const result = await git(['diff', '--name-only', '--diff-filter=U', '--', path])
      return result.code === 0 && splitLines(result.stdout).length > 0
    },

    async hardReset(snapshot: RepositorySnapshot) {
      const outputs: string[] = []

      if (await rebaseStateDir()) {
        const abort = await git(['rebase', '--abort'])
        outputs.push(combineOutput(abort))
        if (abort.code !== 0) {
          logger.warn({ output: combineOutput(abort) }, 'rebase --abort failed, resetting anyway')
        }
      }

      // A detached snapshot must not move the branch the abort left checked out
      const checkout =
        snapshot.branch !== null
          ? await git(['checkout', '--force', snapshot.branch])
          : await git(['checkout', '--force', '--detach', snapshot.revision])
      outputs.push(combineOutput(checkout))
      if (checkout.code !== 0) {
        return { ok: false, output: outputs.filter((o) => o !== '').join('\n') }
      }

      const reset = await git(['reset', '--hard', snapshot.revision])
      outputs.push(combineOutput(reset))
      return { ok: reset.code === 0, output: outputs.filter((o) => o !== '').join('\n') }
    },
  }
}

// ---------------------------------------------------------------------------
// createWorkingTreeFiles
// ---------------------------------------------------------------------------

export function createWorkingTreeFiles(cwd: string): WorkingTreeFiles {
  return {
    read(path) {
      return readFile(join(cwd, path), 'utf-8')
    },
  }
}
