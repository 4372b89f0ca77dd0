/**
 * Pipeline state machine: allowed transitions between orchestrator states and
 * the forward-only ordering of session statuses.
 */

import { InvalidTransitionError } from '../../core/errors.js'
import type { PipelineState, SessionStatus } from './session-types.js'

const TERMINAL_STATES: ReadonlySet<PipelineState> = new Set(['COMPLETE', 'FAILED', 'CANCELLED'])

/**
 * Forward edges. FAILED and CANCELLED are reachable from every non-terminal
 * state and are added by `canTransition`.
 */
const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  STARTED: ['PHASE1_RUNNING'],
  PHASE1_RUNNING: ['PHASE1_SCORED'],
  // REPORTING directly covers problem-only sessions
  PHASE1_SCORED: ['ELIMINATED', 'PHASE2_RUNNING', 'REPORTING'],
  // PHASE2_RUNNING after elimination only under the full policy
  ELIMINATED: ['REPORTING', 'PHASE2_RUNNING'],
  PHASE2_RUNNING: ['PHASE2_SCORED'],
  PHASE2_SCORED: ['REPORTING'],
  REPORTING: ['COMPLETE'],
  COMPLETE: [],
  FAILED: [],
  CANCELLED: [],
}

export function isTerminalState(state: PipelineState): boolean {
  return TERMINAL_STATES.has(state)
}

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  if (isTerminalState(from)) return false
  if (to === 'FAILED' || to === 'CANCELLED') return true
  return TRANSITIONS[from].includes(to)
}

/**
 * @throws {InvalidTransitionError} when the edge is not in the machine
 */
export function assertTransition(from: PipelineState, to: PipelineState): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to)
  }
}

const STATUS_RANK: Readonly<Record<SessionStatus, number>> = {
  started: 0,
  in_progress: 1,
  eliminated: 2,
  passed: 2,
  complete: 3,
  failed: 3,
  cancelled: 3,
}

/**
 * Whether a session may move from `from` to `to` without going backwards.
 * `eliminated` and `passed` are exclusive branches.
 */
export function canAdvanceStatus(from: SessionStatus, to: SessionStatus): boolean {
  if (from === to) return true
  if (STATUS_RANK[from] === 3) return false
  if (STATUS_RANK[to] < STATUS_RANK[from]) return false
  return !(STATUS_RANK[to] === 2 && STATUS_RANK[from] === 2)
}

/**
 * Status a session carries after entering `state`, given its current status.
 * Returns the current status where the state does not change it.
 */
export function statusForState(state: PipelineState, current: SessionStatus): SessionStatus {
  switch (state) {
    case 'STARTED':
      return 'started'
    case 'PHASE1_RUNNING':
      return 'in_progress'
    case 'ELIMINATED':
      return 'eliminated'
    case 'COMPLETE':
      return 'complete'
    case 'FAILED':
      return 'failed'
    case 'CANCELLED':
      return 'cancelled'
    default:
      return current
  }
}
