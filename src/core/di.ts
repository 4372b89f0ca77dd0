/**
 * Service lifecycle and registry.
 *
 * The CLI composition root registers stateful services (database, context
 * store) here so they are opened in order and closed in reverse order.
 */

/**
 * Lifecycle interface for services that hold resources.
 */
export interface BaseService {
  /** Open connections, run migrations, etc. */
  initialize(): Promise<void>

  /** Release resources. Called in reverse registration order. */
  shutdown(): Promise<void>
}

/**
 * Named service registry.
 *
 * @example
 * const registry = new ServiceRegistry()
 * registry.register('database', databaseService)
 * await registry.initializeAll()
 * // ...
 * await registry.shutdownAll()
 */
export class ServiceRegistry {
  private readonly _services = new Map<string, BaseService>()
  private readonly _order: string[] = []

  /**
   * @throws {Error} if a service with the same name is already registered.
   */
  register(name: string, service: BaseService): void {
    if (this._services.has(name)) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._services.set(name, service)
    this._order.push(name)
  }

  /**
   * @throws {Error} if no service with the given name is registered.
   */
  get(name: string): BaseService {
    const service = this._services.get(name)
    if (service === undefined) {
      throw new Error(`Service "${name}" is not registered`)
    }
    return service
  }

  has(name: string): boolean {
    return this._services.has(name)
  }

  /**
   * Initialize all services in registration order, stopping at the first failure.
   */
  async initializeAll(): Promise<void> {
    for (const name of this._order) {
      const service = this._services.get(name)
      if (service !== undefined) {
        await service.initialize()
      }
    }
  }

  /**
   * Shut down all services in reverse order. Errors are collected and
   * re-thrown as one AggregateError once every service has been visited.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []
    for (const name of [...this._order].reverse()) {
      const service = this._services.get(name)
      if (service === undefined) continue
      try {
        await service.shutdown()
      } catch (err) {
        errors.push(err instanceof Error ? err : new Error(String(err)))
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${String(errors.length)} service(s)`)
    }
  }

  get serviceNames(): string[] {
    return [...this._order]
  }
}
