/**
 * Tests for ServiceRegistry
 */

import { describe, it, expect } from 'vitest'
import { ServiceRegistry } from '../di.js'
import type { BaseService } from '../di.js'

function recordingService(name: string, log: string[], failOnShutdown = false): BaseService {
  return {
    async initialize() {
      log.push(`init:${name}`)
    },
    async shutdown() {
      log.push(`shutdown:${name}`)
      if (failOnShutdown) throw new Error(`${name} failed`)
    },
  }
}

describe('ServiceRegistry', () => {
  it('initializes in registration order and shuts down in reverse', async () => {
    const log: string[] = []
    const registry = new ServiceRegistry()
    registry.register('database', recordingService('database', log))
    registry.register('store', recordingService('store', log))

    await registry.initializeAll()
    await registry.shutdownAll()

    expect(log).toEqual(['init:database', 'init:store', 'shutdown:store', 'shutdown:database'])
    expect(registry.serviceNames).toEqual(['database', 'store'])
  })

  it('rejects duplicate names and unknown lookups', () => {
    const registry = new ServiceRegistry()
    registry.register('database', recordingService('database', []))
    expect(() => registry.register('database', recordingService('database', []))).toThrow(
      'Service "database" is already registered'
    )
    expect(() => registry.get('missing')).toThrow('Service "missing" is not registered')
    expect(registry.has('database')).toBe(true)
  })

  it('visits every service on shutdown and aggregates failures', async () => {
    const log: string[] = []
    const registry = new ServiceRegistry()
    registry.register('a', recordingService('a', log, true))
    registry.register('b', recordingService('b', log))

    await expect(registry.shutdownAll()).rejects.toThrow('Shutdown errors in 1 service(s)')
    expect(log).toEqual(['shutdown:b', 'shutdown:a'])
  })
})
