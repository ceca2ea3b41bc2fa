/**
 * HandlerRegistry: in-process phase handlers addressed by name from
 * `{ type: 'function', name }` handler references.
 */

import type { Phase, PhaseOutput, Task } from '../../core/types.js'
import type { FunctionHandlerLookup } from '../workflow-spec/spec-validator.js'

/** What every handler receives; processes get the same fields as JSON on stdin */
export interface PhaseContext {
  workflowId: string
  attempt: number
  stateDir: string
  /** Short summaries of completed phases, by phase name */
  summaries: Record<string, string>
  /** Items found by discovery, when it has run */
  discoveredItems: string[]
}

export interface FunctionHandlerInput {
  task: Task
  phase: Phase
  options: Readonly<Record<string, unknown>>
  context: PhaseContext
  /** Aborted on timeout or workflow shutdown */
  signal: AbortSignal
}

export type FunctionHandler = (input: FunctionHandlerInput) => Promise<PhaseOutput>

export class HandlerRegistry implements FunctionHandlerLookup {
  private readonly _handlers = new Map<string, FunctionHandler>()

  /**
   * @throws {Error} when the name is already registered
   */
  register(name: string, handler: FunctionHandler): this {
    if (this._handlers.has(name)) {
      throw new Error(`Function handler "${name}" is already registered`)
    }
    this._handlers.set(name, handler)
    return this
  }

  has(name: string): boolean {
    return this._handlers.has(name)
  }

  get(name: string): FunctionHandler | undefined {
    return this._handlers.get(name)
  }

  names(): string[] {
    return [...this._handlers.keys()].sort()
  }
}

export function createHandlerRegistry(handlers: Record<string, FunctionHandler> = {}): HandlerRegistry {
  const registry = new HandlerRegistry()
  for (const [name, handler] of Object.entries(handlers)) registry.register(name, handler)
  return registry
}
