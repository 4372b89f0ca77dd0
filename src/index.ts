/**
 * idea-gauntlet - main module exports
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export type { Logger } from './utils/logger.js'

// Event bus
export type { TypedEventBus } from './core/event-bus.js'
export type { GauntletEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Dependency injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Persistence
export { createDatabaseService, IN_MEMORY_DATABASE } from './persistence/database.js'

// Modules
export * from './modules/session/index.js'
export * from './modules/scoring/index.js'
export * from './modules/context-store/index.js'
export * from './modules/pipeline-pack/index.js'
export * from './modules/reasoning/index.js'
export * from './modules/stage-runner/index.js'
export * from './modules/similarity/index.js'
export * from './modules/history/index.js'
export * from './modules/report/index.js'
export * from './modules/notify/index.js'
export * from './modules/orchestrator/index.js'
export * from './modules/config/index.js'

// Composition root
export { createRuntime } from './cli/runtime.js'
export type { Runtime, RuntimeOverrides } from './cli/runtime.js'
