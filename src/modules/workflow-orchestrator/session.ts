/**
 * Session: context carried forward from completed phases into later phase
 * invocations: a short summary per phase and the discovered items.
 */

import type { PhaseName, PhaseOutput, SessionSnapshot } from '../../core/types.js'

/** Summaries longer than this are cut before being handed on */
export const MAX_SUMMARY_LENGTH = 500

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

export class Session {
  private readonly _summaries: Record<PhaseName, string>
  private _discoveredItems: string[]

  constructor(snapshot?: SessionSnapshot) {
    this._summaries = { ...(snapshot?.summaries ?? {}) }
    this._discoveredItems = [...(snapshot?.discoveredItems ?? [])]
  }

  /** Fold a completed phase's output into the session */
  record(phase: PhaseName, output: PhaseOutput, fromDiscovery: boolean): void {
    if (output.summary !== undefined && output.summary !== '') {
      this._summaries[phase] =
        output.summary.length > MAX_SUMMARY_LENGTH
          ? `${output.summary.slice(0, MAX_SUMMARY_LENGTH - 3)}...`
          : output.summary
    }
    const items = output.data?.['items']
    if (fromDiscovery && isStringArray(items)) {
      this._discoveredItems = [...items]
    }
  }

  forget(phase: PhaseName): void {
    delete this._summaries[phase]
  }

  snapshot(): SessionSnapshot {
    return { summaries: { ...this._summaries }, discoveredItems: [...this._discoveredItems] }
  }
}
