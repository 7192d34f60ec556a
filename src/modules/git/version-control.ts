/**
 * VersionControl: the repository operations a rebase run depends on.
 *
 * The rebase orchestrator only talks to this interface; the git-backed
 * implementation lives in git-version-control.ts and tests substitute an
 * in-process fake.
 */

import type { RepositorySnapshot } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/** Outcome of a mutating repository operation */
export interface OperationResult {
  ok: boolean
  /** Combined tool output, used for diagnostics */
  output: string
}

// ---------------------------------------------------------------------------
// VersionControl
// ---------------------------------------------------------------------------

export interface VersionControl {
  /** Whether `name` resolves to a valid revision */
  branchExists(name: string): Promise<boolean>

  /**
   * Whether the working tree has no tracked modifications.
   * Untracked files and empty-directory placeholders are tolerated.
   */
  isCleanWorkingTree(): Promise<boolean>

  /** Paths with tracked modifications, for diagnostics when the tree is dirty */
  listDirtyFiles(): Promise<string[]>

  /** Whether the working directory is inside a repository work tree */
  isValidRepository(): Promise<boolean>

  /** Revision id of HEAD */
  currentRevision(): Promise<string>

  /** HEAD revision plus the checked-out branch */
  captureSnapshot(): Promise<RepositorySnapshot>

  /** Whether a rebase is stopped waiting for conflict resolution */
  isRebaseInProgress(): Promise<boolean>

  /**
   * Snapshot of the branch being rebased, as recorded by the in-progress
   * rebase itself. Null when no rebase is in progress.
   */
  readRebaseOrigHead(): Promise<RepositorySnapshot | null>

  /**
   * Continue the in-progress rebase, or start rebasing `source` onto `target`.
   * `ok` is false when the replay stopped, typically on conflicts.
   */
  startOrContinueRebase(target: string, source: string): Promise<OperationResult>

  /** Paths currently marked unmerged in the index, in the tool's order */
  listUnmergedFiles(): Promise<string[]>

  /** Whether the working-tree file holds binary content */
  isBinary(path: string): Promise<boolean>

  /**
   * Continue the rebase after all conflicts of the current step are staged.
   * `ok` stays true when the replay applied the step and stopped on the next
   * step's conflicts.
   */
  continueRebase(): Promise<OperationResult>

  /** Mark the file's on-disk content as resolved */
  stage(path: string): Promise<OperationResult>

  /** Whether the index still lists the file as unmerged */
  isUnmerged(path: string): Promise<boolean>

  /** Abort any rebase in progress and force the repository back to `snapshot` */
  hardReset(snapshot: RepositorySnapshot): Promise<OperationResult>
}

// ---------------------------------------------------------------------------
// WorkingTreeFiles
// ---------------------------------------------------------------------------

/** Read access to files in the working tree, by repository-relative path */
export interface WorkingTreeFiles {
  read(path: string): Promise<string>
}
