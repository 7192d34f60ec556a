/**
 * Tests for the async operation tracker.
 */

import { describe, it, expect, vi } from 'vitest'
import { createOperationTracker } from '../operation-tracker.js'

function shuffle<T>(items: T[], random: () => number): T[] {
  const copy = [...items]
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1))
    const a = copy[i]
    const b = copy[j]
    if (a !== undefined && b !== undefined) {
      copy[i] = b
      copy[j] = a
    }
  }
  return copy
}

function lcg(seed: number): () => number {
  let state = seed
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648
    return state / 2147483648
  }
}

describe('createOperationTracker', () => {
  it('fires the terminal callback when the last operation completes', () => {
    const onTerminal = vi.fn()
    const tracker = createOperationTracker({ onTerminal })

    tracker.track()
    tracker.track()
    tracker.complete(true)
    expect(onTerminal).not.toHaveBeenCalled()
    expect(tracker.pendingOps).toBe(1)

    tracker.complete(false, 'round failed')
    expect(onTerminal).toHaveBeenCalledTimes(1)
    expect(onTerminal).toHaveBeenCalledWith(false, 'round failed')
    expect(tracker.completed).toBe(true)
  })

  it('clamps an extra completion at zero and reports the mismatch', () => {
    const onTerminal = vi.fn()
    const onMismatch = vi.fn()
    const tracker = createOperationTracker({ onTerminal, onMismatch })

    tracker.track()
    tracker.complete(true)
    tracker.complete(false, 'late')

    expect(tracker.pendingOps).toBe(0)
    expect(onMismatch).toHaveBeenCalledTimes(1)
    expect(onTerminal).toHaveBeenCalledTimes(1)
    expect(onTerminal).toHaveBeenCalledWith(true, undefined)
  })

  it('swallows exceptions thrown by the terminal callback', () => {
    const tracker = createOperationTracker({
      onTerminal: () => {
        throw new Error('consumer bug')
      },
    })
    tracker.track()

    expect(() => tracker.complete(true)).not.toThrow()
    expect(tracker.completed).toBe(true)
  })

  it('fires exactly once for any completion order', () => {
    for (let seed = 1; seed <= 50; seed++) {
      const random = lcg(seed)
      const onTerminal = vi.fn()
      const tracker = createOperationTracker({ onTerminal })
      const count = 1 + Math.floor(random() * 8)

      // Run operation plus `count` dispatches, completed in a random order,
      // followed by a few stray completions
      const completions = Array.from({ length: count + 1 }, (_, i) => i)
      for (let i = 0; i <= count; i++) tracker.track()
      shuffle(completions, random).forEach(() => tracker.complete(random() < 0.5))
      tracker.complete(true)
      tracker.complete(false)

      expect(onTerminal).toHaveBeenCalledTimes(1)
      expect(tracker.pendingOps).toBe(0)
    }
  })
})
