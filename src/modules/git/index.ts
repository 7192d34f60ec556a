/**
 * git module: public API exports.
 */

export type { VersionControl, OperationResult, WorkingTreeFiles } from './version-control.js'
export { createGitVersionControl, createWorkingTreeFiles, parseDirtyPaths } from './git-version-control.js'
export type { GitVersionControlOptions } from './git-version-control.js'
export { spawnGit, verifyGitVersion, isGitVersionSupported } from './git-utils.js'
export type { GitSpawnResult } from './git-utils.js'
