/**
 * Structural checks for a pipeline's stage graph.
 *
 * - Cycle detection using DFS with visited/inStack sets
 * - Dangling and backward (later group) dependency references
 * - Criterion ownership: every criterion rated by exactly one stage of its bucket
 */

import { StageGraphCycleError } from '../../core/errors.js'
import { BUCKET_CRITERIA, bucketOf } from '../scoring/criteria.js'
import { STAGE_GROUPS } from './schemas.js'
import type { StageDefinition, StageGroup } from './schemas.js'

function groupIndex(group: StageGroup): number {
  return STAGE_GROUPS.indexOf(group)
}

/**
 * Detect a cycle in the stage dependency graph.
 *
 * @returns The cycle path (e.g. ['a', 'b', 'a']), or null if there is none
 */
export function detectCycle(stages: readonly StageDefinition[]): string[] | null {
  const deps = new Map(stages.map((s) => [s.name, s.depends_on]))
  const visited = new Set<string>()
  const inStack = new Set<string>()

  function dfs(node: string, path: string[]): string[] | null {
    visited.add(node)
    inStack.add(node)

    for (const dep of deps.get(node) ?? []) {
      if (inStack.has(dep)) {
        return [...path.slice(path.indexOf(dep)), dep]
      }
      if (!visited.has(dep)) {
        const cycle = dfs(dep, [...path, dep])
        if (cycle) return cycle
      }
    }

    inStack.delete(node)
    return null
  }

  for (const stage of stages) {
    if (!visited.has(stage.name)) {
      const cycle = dfs(stage.name, [stage.name])
      if (cycle) return cycle
    }
  }
  return null
}

/**
 * Validate a stage graph.
 *
 * @returns Error messages (empty when the graph is valid)
 * @throws {StageGraphCycleError} when dependencies form a cycle
 */
export function validateStageGraph(stages: readonly StageDefinition[]): string[] {
  const errors: string[] = []
  const byName = new Map<string, StageDefinition>()

  for (const stage of stages) {
    if (byName.has(stage.name)) {
      errors.push(`Duplicate stage name "${stage.name}"`)
    }
    byName.set(stage.name, stage)
  }

  for (const stage of stages) {
    for (const dep of stage.depends_on) {
      const target = byName.get(dep)
      if (target === undefined) {
        errors.push(`Stage "${stage.name}" references unknown dependency "${dep}"`)
      } else if (groupIndex(target.group) > groupIndex(stage.group)) {
        errors.push(`Stage "${stage.name}" (${stage.group}) cannot depend on later-group stage "${dep}" (${target.group})`)
      }
    }
  }

  const cycle = detectCycle(stages)
  if (cycle !== null) {
    throw new StageGraphCycleError(cycle)
  }

  for (const group of ['problem', 'solution'] as const) {
    if (!stages.some((s) => s.group === group)) {
      errors.push(`Pipeline has no stages in the ${group} group`)
    }
  }

  const owners = new Map<string, string[]>()
  for (const stage of stages) {
    if (stage.run_when !== 'always' && stage.group !== 'report') {
      errors.push(`Stage "${stage.name}": run_when "${stage.run_when}" is only allowed in the report group`)
    }
    if (stage.criteria.length > 0 && stage.criticality === 'optional') {
      errors.push(`Stage "${stage.name}" rates criteria and must be required`)
    }
    for (const criterion of stage.criteria) {
      if (stage.group === 'report' || bucketOf(criterion) !== stage.group) {
        errors.push(`Stage "${stage.name}" (${stage.group}) cannot rate ${bucketOf(criterion)} criterion "${criterion}"`)
      }
      owners.set(criterion, [...(owners.get(criterion) ?? []), stage.name])
    }
  }

  for (const bucket of ['problem', 'solution'] as const) {
    for (const criterion of BUCKET_CRITERIA[bucket]) {
      const stageNames = owners.get(criterion) ?? []
      if (stageNames.length === 0) {
        errors.push(`No stage rates ${bucket} criterion "${criterion}"`)
      } else if (stageNames.length > 1) {
        errors.push(`Criterion "${criterion}" is rated by more than one stage: ${stageNames.join(', ')}`)
      }
    }
  }

  return errors
}
