/**
 * Runs one stage group of a session.
 *
 * Every active stage is scheduled `pending` up front. A stage is dispatched
 * once each of its dependencies is terminal or was never scheduled (skipped
 * by `run_when`, or outside this session's pipeline). Stages without
 * dependencies between them run concurrently.
 *
 * A failed required stage, or cancellation, stops further dispatch; stages
 * already in flight are awaited, never interrupted. Stages never dispatched
 * stay `pending`.
 */

import { PipelineDefinitionError, errorMessage } from '../../core/errors.js'
import type { WriteReceipt } from '../context-store/context-store.js'
import type { StageDefinition } from '../pipeline-pack/schemas.js'
import type { SessionHandle } from '../session/session-handle.js'
import { classifyStageError } from '../stage-runner/stage-runner.js'
import type { StageFailure, StageRunResult } from '../stage-runner/stage-runner.js'

export interface GroupRunResult {
  /** Receipts of the stage_output records written, in completion order */
  receipts: WriteReceipt[]
  /** First required stage failure, if any */
  failure: StageFailure | null
  /** Optional stages that failed */
  degraded: string[]
  /** Stages left pending because dispatch stopped */
  skipped: string[]
}

export interface GroupSchedulerOptions {
  runStage: (stage: StageDefinition) => Promise<StageRunResult>
  isCancelled: () => boolean
}

function dependenciesSettled(stage: StageDefinition, session: SessionHandle): boolean {
  return stage.depends_on.every((dep) => {
    const record = session.phase(dep)
    return record === undefined || record.status === 'complete' || record.status === 'failed'
  })
}

export async function runStageGroup(
  stages: readonly StageDefinition[],
  session: SessionHandle,
  options: GroupSchedulerOptions
): Promise<GroupRunResult> {
  const result: GroupRunResult = { receipts: [], failure: null, degraded: [], skipped: [] }
  const waiting = new Map<string, StageDefinition>()
  const running = new Map<string, Promise<void>>()
  let stopped = false

  for (const stage of stages) {
    session.schedulePhase(stage.name)
    waiting.set(stage.name, stage)
  }

  const settle = (stage: StageDefinition, outcome: StageRunResult): void => {
    if (outcome.ok) {
      result.receipts.push(outcome.receipt)
    } else if (stage.criticality === 'required') {
      result.failure ??= outcome.failure
      stopped = true
    } else {
      result.degraded.push(stage.name)
    }
  }

  const dispatch = (stage: StageDefinition): void => {
    waiting.delete(stage.name)
    const task = options
      .runStage(stage)
      .then(
        (outcome) => settle(stage, outcome),
        (err: unknown) => {
          // Runner bugs end the group whatever the stage's criticality
          result.failure ??= { stage: stage.name, kind: classifyStageError(err), message: errorMessage(err) }
          stopped = true
        }
      )
      .finally(() => {
        running.delete(stage.name)
      })
    running.set(stage.name, task)
  }

  for (;;) {
    if (options.isCancelled()) stopped = true

    if (!stopped) {
      for (const stage of [...waiting.values()]) {
        if (dependenciesSettled(stage, session)) dispatch(stage)
      }
    }

    if (running.size === 0) break
    await Promise.race(running.values())
  }

  if (!stopped && waiting.size > 0) {
    throw new PipelineDefinitionError(`Stages with unsatisfiable dependencies: ${[...waiting.keys()].join(', ')}`, {
      stages: [...waiting.keys()],
    })
  }

  result.skipped = [...waiting.keys()]
  return result
}
