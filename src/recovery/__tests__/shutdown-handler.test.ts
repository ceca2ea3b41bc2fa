/**
 * Unit tests for setupGracefulShutdown
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { setupGracefulShutdown } from '../shutdown-handler.js'

describe('setupGracefulShutdown', () => {
  let cleanup: (() => void) | undefined

  afterEach(() => {
    cleanup?.()
    cleanup = undefined
  })

  it('aborts the controller on the first signal', () => {
    const controller = new AbortController()
    const exit = vi.fn()
    cleanup = setupGracefulShutdown({ controller, exit })

    process.emit('SIGINT')

    expect(controller.signal.aborted).toBe(true)
    expect(exit).not.toHaveBeenCalled()
  })

  it('exits with 128 + signal number on the second signal', () => {
    const controller = new AbortController()
    const exit = vi.fn()
    cleanup = setupGracefulShutdown({ controller, exit })

    process.emit('SIGTERM')
    process.emit('SIGTERM')

    expect(exit).toHaveBeenCalledWith(143)
  })

  it('removes its listeners on cleanup', () => {
    const before = process.listenerCount('SIGINT')
    const remove = setupGracefulShutdown({ controller: new AbortController(), exit: vi.fn() })
    expect(process.listenerCount('SIGINT')).toBe(before + 1)
    remove()
    expect(process.listenerCount('SIGINT')).toBe(before)
  })
})
