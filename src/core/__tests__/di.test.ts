/**
 * Unit tests for the ServiceRegistry used by the engine to open and close
 * its state store and recovery engine.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { ServiceRegistry } from '../di.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeService() {
  return {
    initialize: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
    shutdown: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
  }
}

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (err) {
    return err
  }
  throw new Error('expected promise to reject')
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

describe('ServiceRegistry', () => {
  let registry: ServiceRegistry

  beforeEach(() => {
    registry = new ServiceRegistry()
  })

  it('registers and retrieves a service by name', () => {
    const store = makeService()
    registry.register('stateStore', store)
    expect(registry.get('stateStore')).toBe(store)
    expect(registry.has('stateStore')).toBe(true)
    expect(registry.has('recovery')).toBe(false)
  })

  it('get() throws when the service is not registered', () => {
    expect(() => registry.get('missing')).toThrow('Service "missing" is not registered')
  })

  it('register() throws on a duplicate name', () => {
    registry.register('stateStore', makeService())
    expect(() => registry.register('stateStore', makeService())).toThrow(
      'Service "stateStore" is already registered'
    )
  })

  it('serviceNames returns names in registration order', () => {
    registry.register('stateStore', makeService())
    registry.register('recovery', makeService())
    expect(registry.serviceNames).toEqual(['stateStore', 'recovery'])
  })

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  it('initializes in registration order and shuts down in reverse', async () => {
    const calls: string[] = []
    for (const name of ['a', 'b', 'c']) {
      const svc = makeService()
      svc.initialize.mockImplementation(async () => {
        calls.push(`init:${name}`)
      })
      svc.shutdown.mockImplementation(async () => {
        calls.push(`shutdown:${name}`)
      })
      registry.register(name, svc)
    }

    await registry.initializeAll()
    await registry.shutdownAll()

    expect(calls).toEqual(['init:a', 'init:b', 'init:c', 'shutdown:c', 'shutdown:b', 'shutdown:a'])
  })

  it('stops initializing at the first failure', async () => {
    const first = makeService()
    first.initialize.mockRejectedValue(new Error('cannot open'))
    const second = makeService()
    registry.register('stateStore', first)
    registry.register('recovery', second)

    await expect(registry.initializeAll()).rejects.toThrow('cannot open')
    expect(second.initialize).not.toHaveBeenCalled()
  })

  it('shuts every service down and aggregates the failures', async () => {
    const errA = new Error('error in A')
    const svcA = makeService()
    svcA.shutdown.mockRejectedValue(errA)
    const svcB = makeService()
    const svcC = makeService()
    svcC.shutdown.mockRejectedValue('string error')

    registry.register('a', svcA)
    registry.register('b', svcB)
    registry.register('c', svcC)

    const thrown = await captureRejection(registry.shutdownAll())

    expect(svcA.shutdown).toHaveBeenCalledOnce()
    expect(svcB.shutdown).toHaveBeenCalledOnce()
    expect(thrown).toBeInstanceOf(AggregateError)
    if (!(thrown instanceof AggregateError)) return
    expect(thrown.message).toBe('Shutdown errors in 2 service(s)')
    expect(thrown.errors).toHaveLength(2)
    // reverse order: c first, its string rejection wrapped in an Error
    expect(thrown.errors[0]).toEqual(new Error('string error'))
    expect(thrown.errors[1]).toBe(errA)
  })

  it('shutdownAll resolves for an empty registry', async () => {
    await expect(registry.shutdownAll()).resolves.toBeUndefined()
  })
})
