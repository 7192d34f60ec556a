/**
 * Tests for DispatcherImpl
 *
 * Uses vi.mock to simulate child_process.spawn with fake processes
 * (EventEmitter + PassThrough streams) so no real subprocesses are spawned.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { EventEmitter } from 'node:events'
import { PassThrough } from 'node:stream'
import { spawn } from 'node:child_process'
import type { ChildProcess } from 'node:child_process'
import { z } from 'zod'
import { createEventBus } from '../../../core/event-bus.js'
import type { TypedEventBus } from '../../../core/event-bus.js'
import type { RebaseEvents } from '../../../core/event-bus.types.js'
import { AdapterRegistry } from '../../../adapters/adapter-registry.js'
import type { AgentAdapter, AdapterOptions, SpawnCommand } from '../../../adapters/types.js'
import { createDispatcher } from '../dispatcher-impl.js'
import { DispatcherShuttingDownError } from '../types.js'
import type { Dispatcher, DispatchRequest } from '../types.js'

// ---------------------------------------------------------------------------
// Fake process factory
// ---------------------------------------------------------------------------

interface FakeProcess {
  proc: ChildProcess
  stdinText: () => string
  emitClose: (code: number) => void
  emitError: (err: Error) => void
  writeStdout: (data: string) => void
  writeStderr: (data: string) => void
  killMock: ReturnType<typeof vi.fn>
}

function createFakeProcess(): FakeProcess {
  const emitter = new EventEmitter()
  const stdin = new PassThrough()
  const stdout = new PassThrough()
  const stderr = new PassThrough()

  const stdinChunks: Buffer[] = []
  stdin.on('data', (chunk: Buffer) => stdinChunks.push(chunk))

  const killMock = vi.fn((_signal?: string) => {
    // A killed process still reports close
    emitter.emit('close', null)
    return true
  })

  const proc = Object.assign(emitter, {
    stdin,
    stdout,
    stderr,
    kill: killMock,
    pid: 4242,
  }) as unknown as ChildProcess

  return {
    proc,
    stdinText: () => Buffer.concat(stdinChunks).toString('utf-8'),
    emitClose: (code) => emitter.emit('close', code),
    emitError: (err) => emitter.emit('error', err),
    writeStdout: (data) => stdout.push(data),
    writeStderr: (data) => stderr.push(data),
    killMock,
  }
}

// ---------------------------------------------------------------------------
// Mock child_process.spawn
// ---------------------------------------------------------------------------

let fakeProcesses: FakeProcess[] = []

vi.mock('node:child_process', () => ({
  spawn: vi.fn(() => {
    const fp = createFakeProcess()
    fakeProcesses.push(fp)
    return fp.proc
  }),
}))

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Let stream 'data' events propagate */
function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

function fakeAt(index: number): FakeProcess {
  const fp = fakeProcesses[index]
  if (fp === undefined) throw new Error(`No fake process at index ${String(index)}`)
  return fp
}

function createMockAdapter(overrides: Partial<SpawnCommand> = {}): AgentAdapter {
  return {
    id: 'claude-code',
    displayName: 'Claude Code',
    buildCommand: vi.fn(
      (options: AdapterOptions): SpawnCommand => ({
        binary: 'claude',
        args: ['-p'],
        cwd: options.workingDirectory,
        ...overrides,
      })
    ),
  }
}

function createRecordingBus(): { bus: TypedEventBus; events: Array<keyof RebaseEvents> } {
  const bus = createEventBus()
  const events: Array<keyof RebaseEvents> = []
  const names: Array<keyof RebaseEvents> = [
    'agent:spawned',
    'agent:output',
    'agent:completed',
    'agent:failed',
    'agent:timeout',
    'agent:cancelled',
  ]
  for (const name of names) {
    bus.on(name, () => events.push(name))
  }
  return { bus, events }
}

const ResultSchema = z.object({ result: z.enum(['resolved', 'failed']) })

function request(overrides: Partial<DispatchRequest<z.infer<typeof ResultSchema>>> = {}) {
  return {
    prompt: 'Resolve src/app.ts',
    agent: 'claude-code' as const,
    taskType: 'resolve-conflict',
    outputSchema: ResultSchema,
    workingDirectory: '/repo',
    ...overrides,
  }
}

function createTestDispatcher(
  options: { maxConcurrency?: number; adapter?: AgentAdapter | null; bus?: TypedEventBus } = {}
): Dispatcher {
  const adapterRegistry = new AdapterRegistry()
  if (options.adapter !== null) {
    adapterRegistry.register(options.adapter ?? createMockAdapter())
  }
  return createDispatcher({
    eventBus: options.bus ?? createEventBus(),
    adapterRegistry,
    config: { maxConcurrency: options.maxConcurrency ?? 2, shutdownGraceMs: 0 },
  })
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('DispatcherImpl', () => {
  beforeEach(() => {
    fakeProcesses = []
    vi.mocked(spawn).mockClear()
  })

  afterEach(() => {
    delete process.env['CLAUDECODE']
  })

  describe('successful dispatch', () => {
    it('writes the prompt to stdin and parses the YAML result', async () => {
      const { bus, events } = createRecordingBus()
      const dispatcher = createTestDispatcher({ bus })

      const handle = dispatcher.dispatch(request())
      expect(handle.status).toBe('running')

      const fp = fakeAt(0)
      fp.writeStdout('Merged both hunks.\n```yaml\nresult: resolved\n```\n')
      await tick()
      fp.emitClose(0)

      const result = await handle.result
      expect(result.status).toBe('completed')
      expect(result.exitCode).toBe(0)
      expect(result.parsed).toEqual({ result: 'resolved' })
      expect(result.parseError).toBeNull()
      expect(fp.stdinText()).toBe('Resolve src/app.ts')
      expect(handle.status).toBe('completed')
      expect(events).toEqual(['agent:spawned', 'agent:output', 'agent:completed'])
    })

    it('reports no_yaml_block when the agent prints no result block', async () => {
      const dispatcher = createTestDispatcher()
      const handle = dispatcher.dispatch(request())

      fakeAt(0).writeStdout('I could not find the file.\n')
      await tick()
      fakeAt(0).emitClose(0)

      const result = await handle.result
      expect(result.status).toBe('completed')
      expect(result.parsed).toBeNull()
      expect(result.parseError).toBe('no_yaml_block')
    })

    it('merges adapter env and removes unset keys from the inherited environment', async () => {
      process.env['CLAUDECODE'] = '1'
      const dispatcher = createTestDispatcher({
        adapter: createMockAdapter({ env: { AGENT_MODE: 'headless' }, unsetEnvKeys: ['CLAUDECODE'] }),
      })

      const handle = dispatcher.dispatch(request())
      fakeAt(0).emitClose(0)
      await handle.result

      const call = vi.mocked(spawn).mock.calls[0]
      const spawnOptions = call?.[2]
      expect(call?.[0]).toBe('claude')
      expect(spawnOptions?.cwd).toBe('/repo')
      expect(spawnOptions?.env?.['AGENT_MODE']).toBe('headless')
      expect(spawnOptions?.env?.['CLAUDECODE']).toBeUndefined()
    })
  })

  describe('failed dispatch', () => {
    it('returns failed with masked stderr on a non-zero exit', async () => {
      const { bus } = createRecordingBus()
      const failures: string[] = []
      bus.on('agent:failed', ({ error }) => failures.push(error))
      const dispatcher = createTestDispatcher({ bus })

      const handle = dispatcher.dispatch(request())
      const fp = fakeAt(0)
      fp.writeStdout('partial')
      fp.writeStderr('auth failed for sk-ant-REDACTED')
      await tick()
      fp.emitClose(2)

      const result = await handle.result
      expect(result.status).toBe('failed')
      expect(result.exitCode).toBe(2)
      expect(result.output).toBe('partial\n--- stderr ---\nauth failed for ***')
      expect(result.parseError).toBe('Agent exited with code 2')
      expect(failures).toEqual(['auth failed for ***'])
    })

    it('fails when the binary cannot be started', async () => {
      const dispatcher = createTestDispatcher()
      const handle = dispatcher.dispatch(request())

      fakeAt(0).emitError(new Error('spawn claude ENOENT'))

      const result = await handle.result
      expect(result.status).toBe('failed')
      expect(result.parseError).toBe('Failed to start claude: spawn claude ENOENT')
      expect(dispatcher.getRunning()).toBe(0)
    })

    it('fails without spawning when no adapter is registered', async () => {
      const dispatcher = createTestDispatcher({ adapter: null })
      const result = await dispatcher.dispatch(request({ agent: 'codex' })).result

      expect(result.status).toBe('failed')
      expect(result.parseError).toBe('No adapter registered for agent "codex"')
      expect(spawn).not.toHaveBeenCalled()
    })

    it('times out and terminates the agent', async () => {
      const { bus, events } = createRecordingBus()
      const dispatcher = createTestDispatcher({ bus })

      const result = await dispatcher.dispatch(request({ timeout: 20 })).result

      expect(result.status).toBe('timeout')
      expect(result.parseError).toBe('Agent timed out after 20ms')
      expect(fakeAt(0).killMock).toHaveBeenCalledWith('SIGTERM')
      expect(events).toContain('agent:timeout')
      expect(dispatcher.getRunning()).toBe(0)
    })
  })

  describe('concurrency', () => {
    it('queues beyond the limit and starts the next dispatch when a slot frees', async () => {
      const dispatcher = createTestDispatcher({ maxConcurrency: 1 })

      const first = dispatcher.dispatch(request())
      const second = dispatcher.dispatch(request({ prompt: 'Resolve src/b.ts' }))

      expect(dispatcher.getRunning()).toBe(1)
      expect(dispatcher.getPending()).toBe(1)
      expect(second.status).toBe('queued')
      expect(spawn).toHaveBeenCalledTimes(1)

      fakeAt(0).emitClose(0)
      await first.result

      expect(spawn).toHaveBeenCalledTimes(2)
      expect(second.status).toBe('running')
      expect(dispatcher.getPending()).toBe(0)

      fakeAt(1).emitClose(0)
      await second.result
      expect(fakeAt(1).stdinText()).toBe('Resolve src/b.ts')
    })
  })

  describe('cancellation', () => {
    it('removes a queued dispatch from the queue', async () => {
      const dispatcher = createTestDispatcher({ maxConcurrency: 1 })

      dispatcher.dispatch(request())
      const queued = dispatcher.dispatch(request())
      queued.cancel()

      const result = await queued.result
      expect(result.status).toBe('cancelled')
      expect(result.parseError).toBe('Dropped from queue: cancelled')
      expect(dispatcher.getPending()).toBe(0)
      expect(spawn).toHaveBeenCalledTimes(1)
    })

    it('terminates a running dispatch when its signal aborts', async () => {
      const { bus, events } = createRecordingBus()
      const dispatcher = createTestDispatcher({ bus })
      const controller = new AbortController()

      const handle = dispatcher.dispatch(request({ signal: controller.signal }))
      controller.abort()

      const result = await handle.result
      expect(result.status).toBe('cancelled')
      expect(fakeAt(0).killMock).toHaveBeenCalledWith('SIGTERM')
      expect(events).toContain('agent:cancelled')
      expect(dispatcher.getRunning()).toBe(0)
    })

    it('never spawns when the signal is already aborted', async () => {
      const dispatcher = createTestDispatcher()
      const controller = new AbortController()
      controller.abort()

      const result = await dispatcher.dispatch(request({ signal: controller.signal })).result
      expect(result.status).toBe('cancelled')
      expect(spawn).not.toHaveBeenCalled()
    })
  })

  describe('shutdown', () => {
    it('terminates running agents, fails queued ones and rejects new work', async () => {
      const dispatcher = createTestDispatcher({ maxConcurrency: 1 })

      const running = dispatcher.dispatch(request())
      const queued = dispatcher.dispatch(request())

      await dispatcher.shutdown()

      const runningResult = await running.result
      const queuedResult = await queued.result
      expect(runningResult.status).toBe('failed')
      expect(runningResult.parseError).toBe('Agent terminated during dispatcher shutdown')
      expect(queuedResult.status).toBe('failed')
      expect(queuedResult.parseError).toBe('Dropped from queue: shutdown')
      expect(fakeAt(0).killMock).toHaveBeenCalledWith('SIGTERM')

      await expect(dispatcher.dispatch(request()).result).rejects.toBeInstanceOf(DispatcherShuttingDownError)
    })
  })
})
