/**
 * In-process stand-in for a git repository, for orchestrator tests.
 *
 * A rebase is modelled as a queue of steps; each step either applies cleanly
 * (empty record) or stops with the given conflicted files written to the
 * working tree and listed as unmerged.
 */

import type { RepositorySnapshot } from '../../src/core/types.js'
import type { OperationResult, VersionControl, WorkingTreeFiles } from '../../src/modules/git/version-control.js'

export type RebaseStep = Record<string, string>

export function conflictContent(ours: string, theirs: string): string {
  return `<<<<<<< HEAD\n${ours}\n=======\n${theirs}\n>>>>>>> feature\n`
}

export class FakeVersionControl implements VersionControl {
  branches = new Set<string>(['main', 'feature'])
  validRepository = true
  dirtyFiles: string[] = []
  head: RepositorySnapshot = { revision: 'abc1234', branch: 'feature' }
  origHead: RepositorySnapshot | null = null

  /** Working-tree content by path */
  readonly files = new Map<string, string>()
  readonly binaryFiles = new Set<string>()
  readonly unreadableFiles = new Set<string>()
  unmerged: string[] = []
  rebaseInProgress = false
  steps: RebaseStep[] = []

  /** Failure output for `stage(path)`, by path */
  readonly stageFailures = new Map<string, string>()
  /** Paths that stay unmerged even after a successful stage */
  readonly stickyUnmerged = new Set<string>()
  continueFailure: string | null = null
  resetResult: OperationResult = { ok: true, output: 'HEAD is now at abc1234' }

  readonly calls: string[] = []
  readonly resets: RepositorySnapshot[] = []

  constructor(steps: RebaseStep[] = []) {
    this.steps = steps
  }

  async branchExists(name: string): Promise<boolean> {
    this.calls.push(`branchExists:${name}`)
    return this.branches.has(name)
  }

  async isCleanWorkingTree(): Promise<boolean> {
    this.calls.push('isCleanWorkingTree')
    return this.dirtyFiles.length === 0
  }

  async listDirtyFiles(): Promise<string[]> {
    return [...this.dirtyFiles]
  }

  async isValidRepository(): Promise<boolean> {
    this.calls.push('isValidRepository')
    return this.validRepository
  }

  async currentRevision(): Promise<string> {
    return this.head.revision
  }

  async captureSnapshot(): Promise<RepositorySnapshot> {
    this.calls.push('captureSnapshot')
    return { ...this.head }
  }

  async isRebaseInProgress(): Promise<boolean> {
    return this.rebaseInProgress
  }

  async readRebaseOrigHead(): Promise<RepositorySnapshot | null> {
    return this.rebaseInProgress ? this.origHead : null
  }

  async startOrContinueRebase(target: string, source: string): Promise<OperationResult> {
    this.calls.push(`startOrContinueRebase:${target}:${source}`)
    if (this.rebaseInProgress) {
      if (this.unmerged.length > 0) {
        return { ok: false, output: 'error: you need to resolve your current index first' }
      }
      return this.applyNextStep()
    }
    this.rebaseInProgress = true
    this.origHead = { ...this.head }
    return this.applyNextStep()
  }

  async listUnmergedFiles(): Promise<string[]> {
    return [...this.unmerged]
  }

  async isBinary(path: string): Promise<boolean> {
    return this.binaryFiles.has(path)
  }

  async continueRebase(): Promise<OperationResult> {
    this.calls.push('continueRebase')
    if (this.continueFailure !== null) {
      return { ok: false, output: this.continueFailure }
    }
    if (this.unmerged.length > 0) {
      return { ok: false, output: 'error: Committing is not possible because you have unmerged files.' }
    }
    const applied = this.applyNextStep()
    // Stopping on the next step's conflicts still counts as progress
    return { ok: true, output: applied.output }
  }

  async stage(path: string): Promise<OperationResult> {
    this.calls.push(`stage:${path}`)
    const failure = this.stageFailures.get(path)
    if (failure !== undefined) {
      return { ok: false, output: failure }
    }
    if (!this.stickyUnmerged.has(path)) {
      this.unmerged = this.unmerged.filter((p) => p !== path)
    }
    return { ok: true, output: '' }
  }

  async isUnmerged(path: string): Promise<boolean> {
    return this.unmerged.includes(path)
  }

  async hardReset(snapshot: RepositorySnapshot): Promise<OperationResult> {
    this.calls.push('hardReset')
    this.resets.push(snapshot)
    if (this.resetResult.ok) {
      this.rebaseInProgress = false
      this.unmerged = []
      this.steps = []
      this.head = { ...snapshot }
    }
    return this.resetResult
  }

  /** Working-tree reader backed by this repository */
  workingTree(): WorkingTreeFiles {
    return {
      read: async (path: string): Promise<string> => {
        const content = this.files.get(path)
        if (content === undefined || this.unreadableFiles.has(path)) {
          throw new Error(`ENOENT: no such file or directory, open '${path}'`)
        }
        return content
      },
    }
  }

  private applyNextStep(): OperationResult {
    const step = this.steps.shift()
    if (step === undefined) {
      this.rebaseInProgress = false
      this.head = { revision: 'def5678', branch: this.head.branch }
      return { ok: true, output: 'Successfully rebased and updated refs/heads/feature.' }
    }
    const paths = Object.keys(step)
    for (const path of paths) {
      this.files.set(path, step[path] ?? '')
      this.unmerged.push(path)
    }
    if (paths.length === 0) {
      return this.applyNextStep()
    }
    return { ok: false, output: paths.map((p) => `CONFLICT (content): Merge conflict in ${p}`).join('\n') }
  }
}
