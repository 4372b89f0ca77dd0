/**
 * PipelineOrchestrator interface.
 *
 * Drives one session per statement through the pipeline state machine:
 *
 *   STARTED → PHASE1_RUNNING → PHASE1_SCORED → {ELIMINATED | PHASE2_RUNNING}
 *     → PHASE2_SCORED → REPORTING → COMPLETE
 *
 * with FAILED and CANCELLED reachable from any non-terminal state.
 * Callers depend on this interface; build one with `createPipelineOrchestrator()`.
 */

import type { PipelinePack } from '../pipeline-pack/pipeline-pack.js'
import type { EliminationPolicy, SessionDocument } from '../session/session-types.js'

export interface EvaluateOptions {
  /** Pass bar for the combined score; defaults to the configured or pack threshold */
  threshold?: number
  /** Skip the solution phase unconditionally */
  problemOnly?: boolean
  policy?: EliminationPolicy
}

export interface StartedSession {
  sessionId: string
  /** Resolves with the final session document; never rejects for stage or store failures */
  done: Promise<SessionDocument>
}

export interface PipelineOrchestrator {
  readonly pack: PipelinePack

  /**
   * Run a statement to a terminal state.
   * @throws {InvalidInputError} for an empty statement or a threshold outside [1, 10]
   */
  evaluate(statement: string, options?: EvaluateOptions): Promise<SessionDocument>

  /**
   * Create a session and start it in the background.
   * @throws {InvalidInputError} for an empty statement or a threshold outside [1, 10]
   */
  start(statement: string, options?: EvaluateOptions): StartedSession

  /**
   * Mark a session cancelled and stop scheduling its stages. Stage calls in
   * flight are left to finish; `done` resolves once they have.
   * @throws {SessionNotFoundError} for unknown ids
   */
  cancel(sessionId: string): SessionDocument

  getSession(sessionId: string): SessionDocument | undefined
}
