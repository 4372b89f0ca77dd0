/**
 * Tests for TypedEventBus
 */

import { describe, it, expect, vi } from 'vitest'
import { createEventBus } from '../event-bus.js'

describe('TypedEventBus', () => {
  it('delivers payloads synchronously to every subscriber', () => {
    const bus = createEventBus()
    const first = vi.fn()
    const second = vi.fn()
    bus.on('stage:started', first)
    bus.on('stage:started', second)

    bus.emit('stage:started', { sessionId: 's1', stage: 'market' })

    expect(first).toHaveBeenCalledWith({ sessionId: 's1', stage: 'market' })
    expect(second).toHaveBeenCalledTimes(1)
  })

  it('stops delivering after off()', () => {
    const bus = createEventBus()
    const handler = vi.fn()
    bus.on('report:written', handler)
    bus.off('report:written', handler)

    bus.emit('report:written', { sessionId: 's1', artifact: 'idea-s1' })

    expect(handler).not.toHaveBeenCalled()
  })

  it('keeps events separate', () => {
    const bus = createEventBus()
    const handler = vi.fn()
    bus.on('session:finished', handler)

    bus.emit('notify:failed', { sessionId: 's1', error: 'offline' })

    expect(handler).not.toHaveBeenCalled()
  })
})
