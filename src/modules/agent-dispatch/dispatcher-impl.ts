/**
 * DispatcherImpl: concrete implementation of the Dispatcher interface.
 *
 * Spawns coding-agent CLIs as subprocesses, tracks their lifecycle, enforces
 * a concurrency limit, parses their YAML output, and emits events through the
 * event bus.
 *
 * - Uses child_process.spawn, never exec
 * - Prompt delivered via stdin
 * - YAML output parsed from stdout
 * - Concurrency limited with a FIFO queue
 * - An AbortSignal on the request cancels it wherever it is
 */

import { spawn } from 'node:child_process'
import { randomUUID } from 'node:crypto'
import type { ChildProcess } from 'node:child_process'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { AdapterRegistry } from '../../adapters/adapter-registry.js'
import { createLogger } from '../../utils/logger.js'
import { maskSecrets } from '../../utils/masking.js'
import type {
  Dispatcher,
  DispatchRequest,
  DispatchHandle,
  DispatchResult,
  DispatchConfig,
  DispatchStatus,
} from './types.js'
import { DispatcherShuttingDownError, DEFAULT_TIMEOUTS, FALLBACK_TIMEOUT_MS } from './types.js'
import { extractYamlBlock, parseYamlResult } from './yaml-parser.js'

const logger = createLogger('agent-dispatch')

// Maximum time (ms) to wait for processes to exit after SIGKILL during shutdown()
const SHUTDOWN_MAX_WAIT_MS = 30_000

// ---------------------------------------------------------------------------
// Internal bookkeeping
// ---------------------------------------------------------------------------

interface ActiveDispatch {
  id: string
  proc: ChildProcess
  timeoutHandle: ReturnType<typeof setTimeout> | null
  /** Set by shutdown(); the close handler then reports the termination */
  terminated: boolean
  /** Kill the process and settle the result as cancelled */
  abort: () => void
}

interface QueuedDispatch {
  id: string
  start: () => void
  drop: (reason: string) => void
}

class MutableDispatchHandle implements DispatchHandle {
  id: string
  status: DispatchStatus

  private readonly _cancelFn: () => void

  constructor(id: string, cancelFn: () => void) {
    this.id = id
    this.status = 'queued'
    this._cancelFn = cancelFn
  }

  cancel(): void {
    this._cancelFn()
  }
}

function emptyResult<T>(
  id: string,
  status: DispatchResult<T>['status'],
  parseError: string,
  output = '',
  durationMs = 0
): DispatchResult<T> {
  return { id, status, exitCode: -1, output, parsed: null, parseError, durationMs }
}

function killQuietly(proc: ChildProcess, signal: NodeJS.Signals): void {
  try {
    proc.kill(signal)
  } catch (err) {
    logger.debug({ pid: proc.pid, signal, err }, 'kill failed, process already exited')
  }
}

// ---------------------------------------------------------------------------
// DispatcherImpl
// ---------------------------------------------------------------------------

export class DispatcherImpl implements Dispatcher {
  private readonly _eventBus: TypedEventBus
  private readonly _adapterRegistry: AdapterRegistry
  private readonly _config: DispatchConfig

  private readonly _running: Map<string, ActiveDispatch> = new Map()
  private readonly _queue: QueuedDispatch[] = []

  private _shuttingDown: boolean = false

  constructor(eventBus: TypedEventBus, adapterRegistry: AdapterRegistry, config: DispatchConfig) {
    this._eventBus = eventBus
    this._adapterRegistry = adapterRegistry
    this._config = config
  }

  // -------------------------------------------------------------------------
  // Dispatcher interface
  // -------------------------------------------------------------------------

  dispatch<T>(request: DispatchRequest<T>): DispatchHandle & { result: Promise<DispatchResult<T>> } {
    const id = randomUUID()
    const handle = new MutableDispatchHandle(id, () => {
      this._cancel(id)
    })

    if (this._shuttingDown) {
      handle.status = 'failed'
      return Object.assign(handle, {
        result: Promise.reject<DispatchResult<T>>(new DispatcherShuttingDownError()),
      })
    }

    const result = new Promise<DispatchResult<T>>((resolve) => {
      let settled = false
      const onAbort = (): void => {
        this._cancel(id)
      }
      const settle = (dispatchResult: DispatchResult<T>): void => {
        if (settled) return
        settled = true
        request.signal?.removeEventListener('abort', onAbort)
        handle.status = dispatchResult.status
        resolve(dispatchResult)
      }

      if (request.signal?.aborted === true) {
        settle(emptyResult(id, 'cancelled', 'Cancelled before dispatch'))
        return
      }
      request.signal?.addEventListener('abort', onAbort, { once: true })

      const start = (): void => {
        handle.status = 'running'
        this._startDispatch(id, request, settle)
      }

      if (this._running.size < this._config.maxConcurrency) {
        start()
      } else {
        this._queue.push({
          id,
          start,
          drop: (reason) => settle(emptyResult(id, reason === 'shutdown' ? 'failed' : 'cancelled', `Dropped from queue: ${reason}`)),
        })
        logger.debug({ id, queueLength: this._queue.length }, 'Dispatch queued')
      }
    })

    return Object.assign(handle, { result })
  }

  getPending(): number {
    return this._queue.length
  }

  getRunning(): number {
    return this._running.size
  }

  async shutdown(): Promise<void> {
    this._shuttingDown = true

    logger.info({ running: this._running.size, queued: this._queue.length }, 'Dispatcher shutting down')

    for (const entry of this._queue.splice(0, this._queue.length)) {
      entry.drop('shutdown')
    }

    if (this._running.size === 0) {
      return
    }

    const runningEntries = Array.from(this._running.values())

    for (const entry of runningEntries) {
      entry.terminated = true
      if (entry.timeoutHandle !== null) {
        clearTimeout(entry.timeoutHandle)
        entry.timeoutHandle = null
      }
      killQuietly(entry.proc, 'SIGTERM')
    }

    await new Promise<void>((resolve) => setTimeout(resolve, this._config.shutdownGraceMs))

    for (const entry of runningEntries) {
      if (this._running.has(entry.id)) {
        killQuietly(entry.proc, 'SIGKILL')
      }
    }

    if (this._running.size > 0) {
      await new Promise<void>((resolve) => {
        const startWait = Date.now()
        const checkInterval = setInterval(() => {
          if (this._running.size === 0 || Date.now() - startWait >= SHUTDOWN_MAX_WAIT_MS) {
            clearInterval(checkInterval)
            resolve()
          }
        }, 50)
      })
    }

    logger.info('Dispatcher shutdown complete')
  }

  // -------------------------------------------------------------------------
  // Internal dispatch lifecycle
  // -------------------------------------------------------------------------

  private _startDispatch<T>(
    id: string,
    request: DispatchRequest<T>,
    settle: (result: DispatchResult<T>) => void
  ): void {
    const { prompt, agent, taskType, timeout, outputSchema, workingDirectory, model, maxTurns } = request

    const adapter = this._adapterRegistry.get(agent)
    if (adapter === undefined) {
      logger.warn({ id, agent }, 'No adapter found for agent')
      settle(emptyResult(id, 'failed', `No adapter registered for agent "${agent}"`))
      this._drainQueue()
      return
    }

    const cmd = adapter.buildCommand({
      workingDirectory: workingDirectory ?? process.cwd(),
      ...(model !== undefined ? { model } : {}),
      ...(maxTurns !== undefined ? { maxTurns } : {}),
    })

    const timeoutMs =
      timeout ?? this._config.defaultTimeouts[taskType] ?? DEFAULT_TIMEOUTS[taskType] ?? FALLBACK_TIMEOUT_MS

    const env: NodeJS.ProcessEnv = { ...process.env, ...(cmd.env ?? {}) }
    for (const key of cmd.unsetEnvKeys ?? []) {
      delete env[key]
    }

    const proc = spawn(cmd.binary, cmd.args, {
      cwd: cmd.cwd,
      env,
      stdio: ['pipe', 'pipe', 'pipe'],
    })

    const startedAt = Date.now()
    const stdoutChunks: Buffer[] = []
    const stderrChunks: Buffer[] = []
    const collectStdout = (): string => Buffer.concat(stdoutChunks).toString('utf-8')

    const active: ActiveDispatch = {
      id,
      proc,
      timeoutHandle: null,
      terminated: false,
      abort: () => {
        release()
        killQuietly(proc, 'SIGTERM')
        this._eventBus.emit('agent:cancelled', { dispatchId: id })
        logger.info({ id, agent, taskType }, 'Agent dispatch cancelled')
        settle(emptyResult(id, 'cancelled', 'Dispatch cancelled', collectStdout(), Date.now() - startedAt))
      },
    }
    this._running.set(id, active)

    /** Free the slot exactly once and let the next queued dispatch start */
    const release = (): boolean => {
      if (this._running.get(id) !== active) return false
      if (active.timeoutHandle !== null) {
        clearTimeout(active.timeoutHandle)
        active.timeoutHandle = null
      }
      this._running.delete(id)
      this._drainQueue()
      return true
    }

    if (proc.stdin !== null) {
      proc.stdin.on('error', (err: NodeJS.ErrnoException) => {
        // EPIPE: the process exited before reading all of stdin
        if (err.code !== 'EPIPE') {
          logger.warn({ id, error: err.message }, 'stdin write error')
        }
      })
      proc.stdin.end(prompt)
    }

    proc.stdout?.on('data', (chunk: Buffer) => {
      stdoutChunks.push(chunk)
      this._eventBus.emit('agent:output', { dispatchId: id, data: chunk.toString('utf-8') })
    })

    proc.stderr?.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk)
    })

    this._eventBus.emit('agent:spawned', { dispatchId: id, agent, taskType })
    logger.debug({ id, agent, taskType, timeoutMs }, 'Agent dispatched')

    active.timeoutHandle = setTimeout(() => {
      active.timeoutHandle = null
      if (!release()) return
      killQuietly(proc, 'SIGTERM')

      this._eventBus.emit('agent:timeout', { dispatchId: id, timeoutMs })
      logger.warn({ id, agent, taskType, timeoutMs }, 'Agent timed out')

      settle(
        emptyResult(id, 'timeout', `Agent timed out after ${String(timeoutMs)}ms`, collectStdout(), Date.now() - startedAt)
      )
    }, timeoutMs)

    proc.on('error', (err) => {
      if (!release()) return
      const message = `Failed to start ${cmd.binary}: ${err.message}`
      this._eventBus.emit('agent:failed', { dispatchId: id, error: message, exitCode: -1 })
      logger.warn({ id, agent, error: err.message }, 'Agent process error')
      settle(emptyResult(id, 'failed', message, '', Date.now() - startedAt))
    })

    proc.on('close', (exitCode) => {
      const terminated = active.terminated
      if (!release()) return

      const durationMs = Date.now() - startedAt
      const stdout = collectStdout()

      if (terminated) {
        settle(emptyResult(id, 'failed', 'Agent terminated during dispatcher shutdown', stdout, durationMs))
        return
      }

      const code = exitCode ?? 1

      if (code === 0) {
        const yamlBlock = extractYamlBlock(stdout)
        let parsed: T | null = null
        let parseError: string | null = null

        if (yamlBlock !== null) {
          const parseResult = parseYamlResult(yamlBlock, outputSchema)
          parsed = parseResult.parsed
          parseError = parseResult.error
        } else {
          parseError = 'no_yaml_block'
        }

        this._eventBus.emit('agent:completed', { dispatchId: id, exitCode: code, output: stdout })
        logger.debug({ id, agent, taskType, durationMs }, 'Agent completed')

        settle({ id, status: 'completed', exitCode: code, output: stdout, parsed, parseError, durationMs })
        return
      }

      const stderr = maskSecrets(Buffer.concat(stderrChunks).toString('utf-8'))
      this._eventBus.emit('agent:failed', {
        dispatchId: id,
        error: stderr || `Process exited with code ${String(code)}`,
        exitCode: code,
      })
      logger.debug({ id, agent, taskType, exitCode: code, durationMs }, 'Agent failed')

      const combinedOutput = stderr ? `${stdout}\n--- stderr ---\n${stderr}` : stdout
      settle({
        id,
        status: 'failed',
        exitCode: code,
        output: combinedOutput,
        parsed: null,
        parseError: `Agent exited with code ${String(code)}`,
        durationMs,
      })
    })
  }

  // -------------------------------------------------------------------------
  // Cancellation and queue management
  // -------------------------------------------------------------------------

  private _cancel(id: string): void {
    const queueIdx = this._queue.findIndex((q) => q.id === id)
    if (queueIdx !== -1) {
      const [queued] = this._queue.splice(queueIdx, 1)
      queued?.drop('cancelled')
      return
    }
    this._running.get(id)?.abort()
  }

  private _drainQueue(): void {
    if (this._shuttingDown) return
    while (this._queue.length > 0 && this._running.size < this._config.maxConcurrency) {
      const next = this._queue.shift()
      if (next === undefined) return
      logger.debug({ id: next.id, queueLength: this._queue.length }, 'Dequeued dispatch')
      next.start()
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export interface CreateDispatcherOptions {
  eventBus: TypedEventBus
  adapterRegistry: AdapterRegistry
  config?: Partial<DispatchConfig>
}

/**
 * Create a new Dispatcher instance.
 *
 * @param options - Required eventBus and adapterRegistry; optional config overrides
 */
export function createDispatcher(options: CreateDispatcherOptions): Dispatcher {
  const config: DispatchConfig = {
    maxConcurrency: options.config?.maxConcurrency ?? 1,
    defaultTimeouts: {
      ...DEFAULT_TIMEOUTS,
      ...(options.config?.defaultTimeouts ?? {}),
    },
    shutdownGraceMs: options.config?.shutdownGraceMs ?? 10_000,
  }

  return new DispatcherImpl(options.eventBus, options.adapterRegistry, config)
}
