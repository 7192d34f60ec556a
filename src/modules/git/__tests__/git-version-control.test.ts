/**
 * Tests for the git-backed VersionControl.
 *
 * spawnGit is mocked with a scripted responder keyed on the git arguments;
 * rebase state directories and working-tree files live in a temp directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { spawnGit } from '../git-utils.js'
import type { GitSpawnResult } from '../git-utils.js'
import { createGitVersionControl, createWorkingTreeFiles, parseDirtyPaths } from '../git-version-control.js'

vi.mock('../git-utils.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../git-utils.js')>()
  return { ...actual, spawnGit: vi.fn() }
})

const spawnGitMock = vi.mocked(spawnGit)

function ok(stdout = ''): GitSpawnResult {
  return { stdout, stderr: '', code: 0 }
}

function fail(stderr: string, code = 1): GitSpawnResult {
  return { stdout: '', stderr, code }
}

/** Route each git invocation through `responder`, recording the argument lists */
function scriptGit(responder: (args: string[]) => GitSpawnResult): string[][] {
  const calls: string[][] = []
  spawnGitMock.mockImplementation((args: string[]) => {
    calls.push(args)
    return Promise.resolve(responder(args))
  })
  return calls
}

function isRevParseGitPath(args: string[]): boolean {
  return args[0] === 'rev-parse' && args[1] === '--git-path'
}

describe('parseDirtyPaths', () => {
  it('keeps tracked modifications and skips untracked and directory entries', () => {
    const porcelain = [
      'M src/a.ts',
      '?? new.txt',
      'A  b.ts',
      ' D c.ts',
      '?? dir/',
      'R  old.ts -> new.ts',
      ' M empty/',
    ].join('\n')

    expect(parseDirtyPaths(porcelain)).toEqual(['src/a.ts', 'b.ts', 'c.ts', 'old.ts -> new.ts'])
  })

  it('keeps type changes', () => {
    expect(parseDirtyPaths(' T config/link\nT  bin/tool')).toEqual(['config/link', 'bin/tool'])
  })

  it('returns nothing for empty output', () => {
    expect(parseDirtyPaths('')).toEqual([])
  })
})

describe('createGitVersionControl', () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'rebase-pilot-git-'))
    spawnGitMock.mockReset()
  })

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true })
  })

  it('treats a tree with only untracked files as clean', async () => {
    scriptGit(() => ok('?? notes.md\n?? scratch/'))
    const vcs = createGitVersionControl({ cwd })

    await expect(vcs.isCleanWorkingTree()).resolves.toBe(true)
  })

  it('reports a modified tracked file as dirty', async () => {
    scriptGit(() => ok('M src/index.ts'))
    const vcs = createGitVersionControl({ cwd })

    await expect(vcs.isCleanWorkingTree()).resolves.toBe(false)
    await expect(vcs.listDirtyFiles()).resolves.toEqual(['src/index.ts'])
  })

  it('verifies branches as commits', async () => {
    const calls = scriptGit((args) => (args[3] === 'feature^{commit}' ? ok('abc') : fail('')))
    const vcs = createGitVersionControl({ cwd })

    await expect(vcs.branchExists('feature')).resolves.toBe(true)
    await expect(vcs.branchExists('missing')).resolves.toBe(false)
    expect(calls[0]).toEqual(['rev-parse', '--verify', '--quiet', 'feature^{commit}'])
  })

  it('recognises a work tree', async () => {
    scriptGit(() => ok('true'))
    await expect(createGitVersionControl({ cwd }).isValidRepository()).resolves.toBe(true)

    scriptGit(() => fail('fatal: not a git repository', 128))
    await expect(createGitVersionControl({ cwd }).isValidRepository()).resolves.toBe(false)
  })

  it('captures HEAD and the checked-out branch', async () => {
    scriptGit((args) => {
      if (args[0] === 'rev-parse') return ok('1111111')
      return ok('main')
    })

    await expect(createGitVersionControl({ cwd }).captureSnapshot()).resolves.toEqual({
      revision: '1111111',
      branch: 'main',
    })
  })

  it('captures a detached HEAD with a null branch', async () => {
    scriptGit((args) => (args[0] === 'rev-parse' ? ok('2222222') : fail('', 1)))

    await expect(createGitVersionControl({ cwd }).captureSnapshot()).resolves.toEqual({
      revision: '2222222',
      branch: null,
    })
  })

  it('starts a new rebase of source onto target when none is in progress', async () => {
    const calls = scriptGit((args) => {
      if (isRevParseGitPath(args)) return ok(join('.git', args[2] ?? ''))
      return fail('CONFLICT (content): Merge conflict in src/a.ts')
    })
    const vcs = createGitVersionControl({ cwd })

    const result = await vcs.startOrContinueRebase('main', 'feature')

    expect(result).toEqual({ ok: false, output: 'CONFLICT (content): Merge conflict in src/a.ts' })
    expect(calls[calls.length - 1]).toEqual(['rebase', 'main', 'feature'])
    const options = spawnGitMock.mock.calls[spawnGitMock.mock.calls.length - 1]?.[1]
    expect(options?.env?.GIT_EDITOR).toBe('true')
  })

  it('continues the rebase when one is already in progress', async () => {
    await mkdir(join(cwd, '.git', 'rebase-merge'), { recursive: true })
    const calls = scriptGit((args) => {
      if (isRevParseGitPath(args)) return ok(join('.git', args[2] ?? ''))
      return ok('Successfully rebased and updated refs/heads/feature.')
    })

    const result = await createGitVersionControl({ cwd }).startOrContinueRebase('main', 'feature')

    expect(result.ok).toBe(true)
    expect(calls).toContainEqual(['rebase', '--continue'])
    expect(calls).not.toContainEqual(['rebase', 'main', 'feature'])
  })

  it('reports continueRebase as ok when git stopped on the next conflicts', async () => {
    scriptGit((args) => {
      if (args[0] === 'rebase') return fail('CONFLICT (content): Merge conflict in src/b.ts')
      return ok('src/b.ts')
    })

    const result = await createGitVersionControl({ cwd }).continueRebase()

    expect(result).toEqual({ ok: true, output: 'CONFLICT (content): Merge conflict in src/b.ts' })
  })

  it('reports continueRebase as failed when nothing is left to resolve', async () => {
    scriptGit((args) => (args[0] === 'rebase' ? fail('error: could not apply') : ok('')))

    const result = await createGitVersionControl({ cwd }).continueRebase()

    expect(result).toEqual({ ok: false, output: 'error: could not apply' })
  })

  it('lists unmerged files in git order', async () => {
    scriptGit(() => ok('src/b.ts\nsrc/a.ts\n'))

    await expect(createGitVersionControl({ cwd }).listUnmergedFiles()).resolves.toEqual([
      'src/b.ts',
      'src/a.ts',
    ])
  })

  it('stages with git add', async () => {
    const calls = scriptGit(() => ok())

    await expect(createGitVersionControl({ cwd }).stage('src/a.ts')).resolves.toEqual({ ok: true, output: '' })
    expect(calls[0]).toEqual(['add', '--', 'src/a.ts'])
  })

  it('aborts, checks out and resets on hardReset', async () => {
    await mkdir(join(cwd, '.git', 'rebase-merge'), { recursive: true })
    const calls = scriptGit((args) => {
      if (isRevParseGitPath(args)) return ok(join('.git', args[2] ?? ''))
      if (args[0] === 'reset') return ok('HEAD is now at 1111111 base')
      return ok()
    })

    const result = await createGitVersionControl({ cwd }).hardReset({ revision: '1111111', branch: 'main' })

    expect(result).toEqual({ ok: true, output: 'HEAD is now at 1111111 base' })
    const mutating = calls.filter((args) => !isRevParseGitPath(args))
    expect(mutating).toEqual([
      ['rebase', '--abort'],
      ['checkout', '--force', 'main'],
      ['reset', '--hard', '1111111'],
    ])
  })

  it('detaches at the revision for a detached snapshot', async () => {
    const calls = scriptGit((args) => (isRevParseGitPath(args) ? ok(join('.git', args[2] ?? '')) : ok()))

    await createGitVersionControl({ cwd }).hardReset({ revision: '1111111', branch: null })

    expect(calls.filter((args) => !isRevParseGitPath(args))).toEqual([
      ['checkout', '--force', '--detach', '1111111'],
      ['reset', '--hard', '1111111'],
    ])
  })

  it('stops before resetting when the checkout fails', async () => {
    const calls = scriptGit((args) => {
      if (isRevParseGitPath(args)) return ok(join('.git', args[2] ?? ''))
      if (args[0] === 'checkout') return fail("error: pathspec 'gone' did not match")
      return ok()
    })

    const result = await createGitVersionControl({ cwd }).hardReset({ revision: '1111111', branch: 'gone' })

    expect(result).toEqual({ ok: false, output: "error: pathspec 'gone' did not match" })
    expect(calls.some((args) => args[0] === 'reset')).toBe(false)
  })

  it('reads the rebase state of an interrupted rebase', async () => {
    const dir = join(cwd, '.git', 'rebase-merge')
    await mkdir(dir, { recursive: true })
    await writeFile(join(dir, 'orig-head'), '3333333\n')
    await writeFile(join(dir, 'head-name'), 'refs/heads/feature\n')
    scriptGit((args) => ok(join('.git', args[2] ?? '')))

    await expect(createGitVersionControl({ cwd }).readRebaseOrigHead()).resolves.toEqual({
      revision: '3333333',
      branch: 'feature',
    })
  })

  it('returns null rebase state when no rebase is in progress', async () => {
    scriptGit((args) => ok(join('.git', args[2] ?? '')))

    await expect(createGitVersionControl({ cwd }).readRebaseOrigHead()).resolves.toBeNull()
  })

  it('detects binary files by NUL bytes', async () => {
    await writeFile(join(cwd, 'image.png'), Buffer.from([0x89, 0x50, 0x00, 0x47]))
    await writeFile(join(cwd, 'notes.txt'), 'plain text\n')
    const vcs = createGitVersionControl({ cwd })

    await expect(vcs.isBinary('image.png')).resolves.toBe(true)
    await expect(vcs.isBinary('notes.txt')).resolves.toBe(false)
    await expect(vcs.isBinary('deleted.txt')).resolves.toBe(false)
  })
})

describe('createWorkingTreeFiles', () => {
  it('reads files relative to the repository root', async () => {
    const cwd = await mkdtemp(join(tmpdir(), 'rebase-pilot-files-'))
    await mkdir(join(cwd, 'src'))
    await writeFile(join(cwd, 'src', 'a.ts'), 'export const a = 1\n')

    await expect(createWorkingTreeFiles(cwd).read('src/a.ts')).resolves.toBe('export const a = 1\n')
    await rm(cwd, { recursive: true, force: true })
  })
})
