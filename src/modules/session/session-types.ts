/**
 * Session data model.
 *
 * `SessionDocument` is the persisted snake_case shape other tooling reads
 * (session_state records, `status` command, report JSON). Field names are
 * part of that contract.
 */

import type { StageOutput } from '../reasoning/types.js'
import type { Verdict } from '../scoring/scoring-engine.js'

export type { Verdict }

/** Externally visible lifecycle status of a session */
export type SessionStatus =
  | 'started'
  | 'in_progress'
  | 'eliminated'
  | 'passed'
  | 'complete'
  | 'failed'
  | 'cancelled'

/** Internal orchestrator state machine states */
export type PipelineState =
  | 'STARTED'
  | 'PHASE1_RUNNING'
  | 'PHASE1_SCORED'
  | 'ELIMINATED'
  | 'PHASE2_RUNNING'
  | 'PHASE2_SCORED'
  | 'REPORTING'
  | 'COMPLETE'
  | 'FAILED'
  | 'CANCELLED'

export type PhaseStatus = 'pending' | 'running' | 'complete' | 'failed'

/** How the session ended up failing, carried on the session document */
export type FailureKind =
  | 'capability'
  | 'timeout'
  | 'output'
  | 'validation'
  | 'store'
  | 'decision'
  | 'report'
  | 'cancelled'

/** What happens after a problem score falls below the elimination bar */
export type EliminationPolicy = 'early' | 'full'

export interface PhaseRecord {
  name: string
  status: PhaseStatus
  output: StageOutput | null
  started_at: string | null
  completed_at: string | null
  error: string | null
  error_kind?: FailureKind
}

export interface SessionScores {
  problem: number | null
  solution: number | null
  combined: number | null
}

export interface SessionFailure {
  stage: string | null
  kind: FailureKind
  message: string
}

export interface SimilarSession {
  session_id: string
  statement: string
  similarity: number
  status: string
}

export interface SessionDocument {
  session_id: string
  input_statement: string
  threshold: number
  status: SessionStatus
  pipeline_state: PipelineState
  pack: string
  policy: EliminationPolicy
  problem_only: boolean
  phases: Record<string, PhaseRecord>
  scores: SessionScores
  verdict: Verdict | null
  eliminated: boolean
  elimination_phase: string | null
  solution_after_elimination: boolean
  degraded_stages: string[]
  similar_sessions: SimilarSession[]
  failure: SessionFailure | null
  report_artifact: string | null
  created_at: string
  updated_at: string
}
