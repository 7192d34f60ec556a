/**
 * StreamingFormatter: NDJSON event emitter for `--events` mode.
 *
 * Each run event becomes one line on stdout:
 *   {"event":"<name>","timestamp":"<ISO8601>","data":{...}}
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { RebaseEvents } from '../../core/event-bus.types.js'

/** Run events forwarded to the stream, in no particular order */
export const STREAMED_EVENTS = [
  'rebase:requested',
  'rebase:started',
  'rebase:stage-changed',
  'rebase:log',
  'rebase:rolled-back',
  'rebase:completed',
  'rebase:failed',
] as const satisfies ReadonlyArray<keyof RebaseEvents>

/**
 * Write a single NDJSON event to stdout.
 */
export function emitEvent(event: string, data: object): void {
  const line = JSON.stringify({
    event,
    timestamp: new Date().toISOString(),
    data,
  })
  process.stdout.write(line + '\n')
}

/**
 * Forward every streamed event from the bus to stdout. Returns a function
 * that unsubscribes.
 */
export function attachEventStream(eventBus: TypedEventBus): () => void {
  const detachers = STREAMED_EVENTS.map((event) => subscribe(eventBus, event))
  return () => {
    for (const detach of detachers) detach()
  }
}

function subscribe<K extends keyof RebaseEvents>(eventBus: TypedEventBus, event: K): () => void {
  const handler = (payload: RebaseEvents[K]): void => emitEvent(event, payload)
  eventBus.on(event, handler)
  return () => eventBus.off(event, handler)
}
