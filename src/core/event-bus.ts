/**
 * TypedEventBus: typed internal pub/sub for decoupled module communication.
 *
 * Built on top of Node.js EventEmitter. Dispatch is synchronous: handlers run
 * before emit() returns, so subscribers (CLI progress output, log sinks) see
 * phase transitions in the order the orchestrator makes them.
 */

import { EventEmitter } from 'node:events'
import type { WorkflowEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `WorkflowEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous: all registered handlers run before emit() returns.
   */
  emit<K extends keyof WorkflowEvents>(event: K, payload: WorkflowEvents[K]): void

  /**
   * Subscribe to an event. The handler is called synchronously on each emit.
   */
  on<K extends keyof WorkflowEvents>(
    event: K,
    handler: (payload: WorkflowEvents[K]) => void
  ): void

  /**
   * Unsubscribe a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  off<K extends keyof WorkflowEvents>(
    event: K,
    handler: (payload: WorkflowEvents[K]) => void
  ): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('phase:completed', ({ phase, attempts }) => {
 *   console.log(`${phase} finished after ${attempts} attempt(s)`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    this._emitter.setMaxListeners(50)
  }

  emit<K extends keyof WorkflowEvents>(event: K, payload: WorkflowEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof WorkflowEvents>(
    event: K,
    handler: (payload: WorkflowEvents[K]) => void
  ): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof WorkflowEvents>(
    event: K,
    handler: (payload: WorkflowEvents[K]) => void
  ): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new TypedEventBus instance.
 *
 * @example
 * const bus = createEventBus()
 */
export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
