/**
 * SessionHandle: the single mutable view of one session.
 *
 * The orchestrator and stage runners receive the handle explicitly; every
 * mutation goes through a method that enforces the state machine, the
 * forward-only status order and the PhaseRecord lifecycle.
 */

import { InvalidTransitionError } from '../../core/errors.js'
import type { StageOutput } from '../reasoning/types.js'
import type { ScoreBucket } from '../scoring/criteria.js'
import { assertTransition, canAdvanceStatus, isTerminalState, statusForState } from './state-machine.js'
import type {
  EliminationPolicy,
  FailureKind,
  PhaseRecord,
  PipelineState,
  SessionDocument,
  SessionFailure,
  SessionStatus,
  SimilarSession,
  Verdict,
} from './session-types.js'

export interface NewSessionParams {
  sessionId: string
  statement: string
  threshold: number
  pack: string
  policy: EliminationPolicy
  problemOnly: boolean
}

export type Clock = () => Date

export class SessionHandle {
  private readonly _doc: SessionDocument
  private readonly _now: Clock

  private constructor(doc: SessionDocument, now: Clock) {
    this._doc = doc
    this._now = now
  }

  static create(params: NewSessionParams, now: Clock = () => new Date()): SessionHandle {
    const createdAt = now().toISOString()
    return new SessionHandle(
      {
        session_id: params.sessionId,
        input_statement: params.statement,
        threshold: params.threshold,
        status: 'started',
        pipeline_state: 'STARTED',
        pack: params.pack,
        policy: params.policy,
        problem_only: params.problemOnly,
        phases: {},
        scores: { problem: null, solution: null, combined: null },
        verdict: null,
        eliminated: false,
        elimination_phase: null,
        solution_after_elimination: false,
        degraded_stages: [],
        similar_sessions: [],
        failure: null,
        report_artifact: null,
        created_at: createdAt,
        updated_at: createdAt,
      },
      now
    )
  }

  get id(): string {
    return this._doc.session_id
  }

  get statement(): string {
    return this._doc.input_statement
  }

  get threshold(): number {
    return this._doc.threshold
  }

  get state(): PipelineState {
    return this._doc.pipeline_state
  }

  get status(): SessionStatus {
    return this._doc.status
  }

  get policy(): EliminationPolicy {
    return this._doc.policy
  }

  get problemOnly(): boolean {
    return this._doc.problem_only
  }

  get eliminated(): boolean {
    return this._doc.eliminated
  }

  get scores(): Readonly<SessionDocument['scores']> {
    return this._doc.scores
  }

  get verdict(): Verdict | null {
    return this._doc.verdict
  }

  get similarSessions(): readonly SimilarSession[] {
    return this._doc.similar_sessions
  }

  get isTerminal(): boolean {
    return isTerminalState(this._doc.pipeline_state)
  }

  /** Deep copy of the persisted document */
  snapshot(): SessionDocument {
    return structuredClone(this._doc)
  }

  /**
   * Move the state machine and derive the status.
   * @throws {InvalidTransitionError} for edges outside the machine
   */
  transition(to: PipelineState): { from: PipelineState; to: PipelineState } {
    const from = this._doc.pipeline_state
    assertTransition(from, to)
    this._doc.pipeline_state = to
    this._setStatus(statusForState(to, this._doc.status))
    this._touch()
    return { from, to }
  }

  /** Record that the session cleared every decision point */
  markPassed(): void {
    this._setStatus('passed')
    this._touch()
  }

  markEliminated(phase: string): void {
    this._doc.eliminated = true
    this._doc.elimination_phase = phase
    this._touch()
  }

  markSolutionAfterElimination(): void {
    this._doc.solution_after_elimination = true
    this._touch()
  }

  setScore(bucket: ScoreBucket | 'combined', value: number): void {
    this._doc.scores[bucket] = value
    this._touch()
  }

  setVerdict(verdict: Verdict): void {
    this._doc.verdict = verdict
    this._touch()
  }

  setSimilarSessions(matches: SimilarSession[]): void {
    this._doc.similar_sessions = matches
    this._touch()
  }

  addDegradedStage(stage: string): void {
    if (!this._doc.degraded_stages.includes(stage)) {
      this._doc.degraded_stages.push(stage)
      this._touch()
    }
  }

  setFailure(failure: SessionFailure): void {
    if (this._doc.failure === null) {
      this._doc.failure = failure
      this._touch()
    }
  }

  setReportArtifact(artifact: string): void {
    this._doc.report_artifact = artifact
    this._touch()
  }

  // -------------------------------------------------------------------------
  // PhaseRecord lifecycle: pending -> running -> complete | failed
  // -------------------------------------------------------------------------

  phase(name: string): PhaseRecord | undefined {
    return this._doc.phases[name]
  }

  /** Stage names in scheduling order */
  get phaseNames(): string[] {
    return Object.keys(this._doc.phases)
  }

  schedulePhase(name: string): void {
    const existing = this._doc.phases[name]
    if (existing !== undefined) {
      throw new InvalidTransitionError(`${name}:${existing.status}`, `${name}:pending`)
    }
    this._doc.phases[name] = {
      name,
      status: 'pending',
      output: null,
      started_at: null,
      completed_at: null,
      error: null,
    }
    this._touch()
  }

  startPhase(name: string): void {
    const record = this._requirePhase(name, ['pending'], 'running')
    record.status = 'running'
    record.started_at = this._now().toISOString()
    this._touch()
  }

  completePhase(name: string, output: StageOutput): void {
    const record = this._requirePhase(name, ['running'], 'complete')
    record.status = 'complete'
    record.output = output
    record.completed_at = this._now().toISOString()
    this._touch()
  }

  failPhase(name: string, error: string, kind: FailureKind): void {
    const record = this._requirePhase(name, ['pending', 'running'], 'failed')
    record.status = 'failed'
    record.error = error
    record.error_kind = kind
    record.completed_at = this._now().toISOString()
    this._touch()
  }

  private _requirePhase(name: string, from: PhaseRecord['status'][], to: PhaseRecord['status']): PhaseRecord {
    const record = this._doc.phases[name]
    if (record === undefined || !from.includes(record.status)) {
      throw new InvalidTransitionError(`${name}:${record?.status ?? 'unscheduled'}`, `${name}:${to}`)
    }
    return record
  }

  private _setStatus(next: SessionStatus): void {
    if (!canAdvanceStatus(this._doc.status, next)) {
      throw new InvalidTransitionError(this._doc.status, next)
    }
    this._doc.status = next
  }

  private _touch(): void {
    this._doc.updated_at = this._now().toISOString()
  }
}
