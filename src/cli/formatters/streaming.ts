/**
 * StreamingFormatter: NDJSON event emitter for `--output-format json`.
 *
 * Each line follows: {"event":"<name>","timestamp":"<ISO8601>","data":{...}}
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { WorkflowEvents } from '../../core/event-bus.types.js'

/** Events forwarded to stdout while a workflow runs */
export const STREAMED_EVENTS = [
  'workflow:started',
  'workflow:finished',
  'phase:started',
  'phase:retrying',
  'phase:completed',
  'phase:failed',
  'phase:skipped',
  'batch:started',
  'batch:committed',
  'checkpoint:created',
  'checkpoint:restored',
] as const satisfies readonly (keyof WorkflowEvents)[]

// ---------------------------------------------------------------------------
// emitEvent
// ---------------------------------------------------------------------------

/**
 * Write a single NDJSON event to stdout.
 *
 * @param event - Event name (e.g. "phase:started")
 */
export function emitEvent(event: string, data: object): void {
  const line = JSON.stringify({
    event,
    timestamp: new Date().toISOString(),
    data,
  })
  process.stdout.write(line + '\n')
}

// ---------------------------------------------------------------------------
// streamWorkflowEvents
// ---------------------------------------------------------------------------

/**
 * Forward workflow events from the bus to stdout as NDJSON.
 *
 * @returns a function that unsubscribes every forwarder
 */
export function streamWorkflowEvents(eventBus: TypedEventBus): () => void {
  const unsubscribers = STREAMED_EVENTS.map((name) => subscribe(eventBus, name))
  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe()
  }
}

function subscribe<K extends keyof WorkflowEvents>(eventBus: TypedEventBus, name: K): () => void {
  const handler = (payload: WorkflowEvents[K]): void => emitEvent(name, payload)
  eventBus.on(name, handler)
  return () => eventBus.off(name, handler)
}
