export * from './session-types.js'
export { SessionHandle } from './session-handle.js'
export type { NewSessionParams, Clock } from './session-handle.js'
export { SessionRegistry } from './session-registry.js'
export { assertTransition, canTransition, canAdvanceStatus, isTerminalState, statusForState } from './state-machine.js'
export { SessionDocumentSchema, parseSessionDocument } from './session-schema.js'
