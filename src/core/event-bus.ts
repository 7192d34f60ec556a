/**
 * TypedEventBus: typed internal pub/sub for decoupled module communication.
 *
 * Built on top of Node.js EventEmitter.
 *
 *  - Event dispatch is SYNCHRONOUS: handlers run immediately when emit() is called.
 *  - The `keyof` constraint enforces handler payload types at compile time.
 *  - The bus depends on no module other than its own event map.
 */

import { EventEmitter } from 'node:events'
import type { RebaseEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `RebaseEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous: all registered handlers run before emit() returns.
   */
  emit<K extends keyof RebaseEvents>(event: K, payload: RebaseEvents[K]): void

  /**
   * Subscribe to an event. The handler is called synchronously on each emit.
   */
  on<K extends keyof RebaseEvents>(event: K, handler: (payload: RebaseEvents[K]) => void): void

  /**
   * Unsubscribe a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  off<K extends keyof RebaseEvents>(event: K, handler: (payload: RebaseEvents[K]) => void): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('rebase:completed', ({ runId, attempts }) => {
 *   console.log(`Run ${runId} finished after ${attempts} rounds`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    // Recorder, CLI renderer and NDJSON stream can all subscribe to the same events
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof RebaseEvents>(event: K, payload: RebaseEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof RebaseEvents>(event: K, handler: (payload: RebaseEvents[K]) => void): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof RebaseEvents>(event: K, handler: (payload: RebaseEvents[K]) => void): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new TypedEventBus instance.
 */
export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
