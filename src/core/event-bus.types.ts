/**
 * GauntletEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "stage:complete", "session:scored")
 */

import type { PipelineState, SessionStatus, Verdict, FailureKind } from '../modules/session/session-types.js'

export interface GauntletEvents {
  /** A session was created for a statement */
  'session:started': {
    sessionId: string
    statement: string
    pack: string
  }

  /** The pipeline state machine moved between states */
  'session:transition': {
    sessionId: string
    from: PipelineState
    to: PipelineState
  }

  /** Similar past sessions were found (advisory) */
  'session:similar': {
    sessionId: string
    matches: Array<{ sessionId: string; statement: string; similarity: number; status: string }>
  }

  /** A score bucket was computed */
  'session:scored': {
    sessionId: string
    bucket: 'problem' | 'solution' | 'combined'
    score: number
  }

  /** A session reached a terminal status */
  'session:finished': {
    sessionId: string
    status: SessionStatus
    verdict: Verdict | null
    failureKind: FailureKind | null
  }

  /** A stage was dispatched to the reasoning capability */
  'stage:started': {
    sessionId: string
    stage: string
  }

  /** A stage produced valid output */
  'stage:complete': {
    sessionId: string
    stage: string
    durationMs: number
  }

  /** A stage failed */
  'stage:failed': {
    sessionId: string
    stage: string
    kind: FailureKind
    error: string
  }

  /** A report artifact was written */
  'report:written': {
    sessionId: string
    artifact: string
  }

  /** Best-effort notification delivery failed */
  'notify:failed': {
    sessionId: string
    error: string
  }
}
