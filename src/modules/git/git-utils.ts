/**
 * Process-level git helpers: running the binary and checking its version.
 */

import { spawn } from 'node:child_process'
import { GitError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('git')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SpawnOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
}

export interface GitSpawnResult {
  stdout: string
  stderr: string
  code: number
}

export interface GitVersion {
  major: number
  minor: number
  patch: number
}

// `git rebase` defaults to the merge backend from 2.26 on
const MIN_GIT_MAJOR = 2
const MIN_GIT_MINOR = 26

// ---------------------------------------------------------------------------
// spawnGit
// ---------------------------------------------------------------------------

/**
 * Spawn a git subprocess with the given args.
 *
 * Never rejects: a spawn failure resolves with code 1 and the error message
 * as stderr.
 *
 * @param args    - Arguments to pass to git (e.g., ['rebase', 'main', 'feature'])
 * @param options - Optional spawn options (cwd, env)
 */
export function spawnGit(args: string[], options?: SpawnOptions): Promise<GitSpawnResult> {
  return new Promise((resolve) => {
    logger.debug({ args, cwd: options?.cwd }, 'spawnGit')

    const proc = spawn('git', args, {
      cwd: options?.cwd,
      env: options?.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''

    proc.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString()
    })

    proc.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString()
    })

    proc.on('close', (code) => {
      resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code: code ?? 1 })
    })

    proc.on('error', (err) => {
      resolve({ stdout: '', stderr: err.message, code: 1 })
    })
  })
}

/**
 * Combine stdout and stderr of a git invocation into one diagnostic string.
 */
export function combineOutput(result: GitSpawnResult): string {
  return [result.stdout, result.stderr].filter((part) => part !== '').join('\n')
}

// ---------------------------------------------------------------------------
// Version checks
// ---------------------------------------------------------------------------

/**
 * Get the installed git version string.
 *
 * @throws GitError if git is not installed or version cannot be parsed
 */
export async function getGitVersion(): Promise<string> {
  const result = await spawnGit(['--version'])

  if (result.code !== 0) {
    throw new GitError(`git --version failed: ${result.stderr}`)
  }

  // Output is like: "git version 2.42.0"
  const match = /git version\s+(\d+\.\d+(?:\.\d+)?)/.exec(result.stdout)
  if (match === null || match[1] === undefined) {
    throw new GitError(`Unable to parse git version from output: "${result.stdout}"`)
  }

  return match[1]
}

/**
 * Parse a git version string into major/minor/patch components.
 */
export function parseGitVersion(versionString: string): GitVersion {
  const parts = versionString.split('.').map(Number)
  return {
    major: parts[0] ?? 0,
    minor: parts[1] ?? 0,
    patch: parts[2] ?? 0,
  }
}

export function isGitVersionSupported(version: string): boolean {
  const { major, minor } = parseGitVersion(version)
  if (major > MIN_GIT_MAJOR) return true
  return major === MIN_GIT_MAJOR && minor >= MIN_GIT_MINOR
}

/**
 * Verify that git is installed and recent enough.
 *
 * @throws GitError with an upgrade hint if git is missing or too old
 */
export async function verifyGitVersion(): Promise<void> {
  let version: string
  try {
    version = await getGitVersion()
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new GitError(
      `git is not installed or could not be executed. Please install git ${MIN_GIT_MAJOR}.${MIN_GIT_MINOR} or newer. Details: ${message}`
    )
  }

  if (!isGitVersionSupported(version)) {
    throw new GitError(
      `Git version ${version} is too old. rebase-pilot requires git ${MIN_GIT_MAJOR}.${MIN_GIT_MINOR} or newer.`,
      { version }
    )
  }

  logger.debug({ version }, 'git version verified')
}
