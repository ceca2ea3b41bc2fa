/**
 * General utility helpers for phaseflow
 */

import { randomUUID } from 'crypto'

/**
 * Sleep for a given number of milliseconds
 * @param ms - Milliseconds to sleep
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Format a duration in milliseconds to a human-readable string
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  if (ms < 3600000) {
    const minutes = Math.floor(ms / 60000)
    const seconds = Math.floor((ms % 60000) / 1000)
    return `${String(minutes)}m ${String(seconds)}s`
  }
  const hours = Math.floor(ms / 3600000)
  const minutes = Math.floor((ms % 3600000) / 60000)
  return `${String(hours)}h ${String(minutes)}m`
}

/**
 * Generate a unique identifier using crypto.randomUUID()
 * @param prefix - Optional prefix for the ID
 */
export function generateId(prefix = ''): string {
  const uuid = randomUUID()
  return prefix ? `${prefix}-${uuid}` : uuid
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Recursively merge `override` into `base`. Plain objects are merged key by
 * key; arrays and scalars in `override` replace the base value. `undefined`
 * values in `override` are ignored.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}
