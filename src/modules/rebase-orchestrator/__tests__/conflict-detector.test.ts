/**
 * Tests for conflict file filtering.
 */

import { describe, it, expect } from 'vitest'
import { detectConflictFiles } from '../conflict-detector.js'
import { canTransition } from '../orchestrator-impl.js'
import { FakeVersionControl } from '../../../../test/fixtures/fake-version-control.js'

describe('detectConflictFiles', () => {
  it('keeps resolvable text files in order and reports the rest', async () => {
    const repo = new FakeVersionControl()
    repo.unmerged = ['src/z.ts', 'assets/logo.png', 'Cargo.lock', 'docs/my notes.md', 'src/a.ts']
    repo.binaryFiles.add('assets/logo.png')

    expect(await detectConflictFiles(repo)).toEqual({
      files: ['src/z.ts', 'src/a.ts'],
      skipped: [
        { path: 'assets/logo.png', reason: 'binary' },
        { path: 'Cargo.lock', reason: 'lock_file' },
        { path: 'docs/my notes.md', reason: 'unsafe_path' },
      ],
    })
  })
})

describe('stage transitions', () => {
  it('allows the documented moves only', () => {
    expect(canTransition('initializing', 'detecting_conflicts')).toBe(true)
    expect(canTransition('resolving_conflicts', 'detecting_conflicts')).toBe(true)
    expect(canTransition('failed', 'rolling_back')).toBe(true)
    expect(canTransition('completed', 'failed')).toBe(false)
    expect(canTransition('initializing', 'resolving_conflicts')).toBe(false)
    expect(canTransition('rolling_back', 'completed')).toBe(false)
  })
})
