/**
 * TypedEventBus: typed internal pub/sub for progress reporting.
 *
 * Built on top of Node.js EventEmitter. Dispatch is synchronous: all handlers
 * run before emit() returns.
 */

import { EventEmitter } from 'node:events'
import type { GauntletEvents } from './event-bus.types.js'

/**
 * A typed publish-subscribe bus keyed by the `GauntletEvents` map.
 */
export interface TypedEventBus {
  emit<K extends keyof GauntletEvents>(event: K, payload: GauntletEvents[K]): void

  on<K extends keyof GauntletEvents>(
    event: K,
    handler: (payload: GauntletEvents[K]) => void
  ): void

  /** Unsubscribe a handler. Unknown handlers are ignored. */
  off<K extends keyof GauntletEvents>(
    event: K,
    handler: (payload: GauntletEvents[K]) => void
  ): void
}

/**
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('stage:complete', ({ stage, durationMs }) => {
 *   console.log(`${stage} finished in ${durationMs}ms`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof GauntletEvents>(event: K, payload: GauntletEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof GauntletEvents>(
    event: K,
    handler: (payload: GauntletEvents[K]) => void
  ): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof GauntletEvents>(
    event: K,
    handler: (payload: GauntletEvents[K]) => void
  ): void {
    this._emitter.off(event, handler)
  }
}

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
