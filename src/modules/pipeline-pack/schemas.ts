/**
 * Zod schemas for pipeline pack manifests (pipeline.yaml).
 */

import { z } from 'zod'
import { PROBLEM_CRITERIA, SOLUTION_CRITERIA } from '../scoring/criteria.js'

/** Groups run in this order; each is a decision-point boundary */
export const STAGE_GROUPS = ['problem', 'solution', 'report'] as const
export const StageGroupEnum = z.enum(STAGE_GROUPS)
export type StageGroup = z.infer<typeof StageGroupEnum>

export const CriterionEnum = z.enum([...PROBLEM_CRITERIA, ...SOLUTION_CRITERIA])

export const StageDefinitionSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9-]*$/, 'stage names are lowercase kebab-case'),
  group: StageGroupEnum,
  description: z.string().min(1),
  /** Prompt template path, relative to the pack directory */
  prompt: z.string().min(1),
  /** Criteria this stage must rate */
  criteria: z.array(CriterionEnum).default([]),
  /** Stages that must reach a terminal state first */
  depends_on: z.array(z.string()).default([]),
  /** A failed required stage fails its group; an optional one degrades it */
  criticality: z.enum(['required', 'optional']).default('required'),
  /** `not_passed` stages only run for eliminated or failing sessions */
  run_when: z.enum(['always', 'not_passed']).default('always'),
  timeout_ms: z.number().int().positive().optional(),
  /** Tools the capability may use for this stage */
  tools: z.array(z.string()).default([]),
  max_turns: z.number().int().positive().optional(),
})
export type StageDefinition = z.infer<typeof StageDefinitionSchema>

export const PipelineManifestSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  description: z.string().min(1),
  /** Default pass bar for the combined score */
  threshold: z.number().min(0).max(10),
  /** Fixed bar for early elimination; the session threshold when absent */
  elimination_bar: z.number().min(0).max(10).optional(),
  elimination_policy: z.enum(['early', 'full']).default('early'),
  stage_timeout_ms: z.number().int().positive().default(600_000),
  stages: z.array(StageDefinitionSchema).min(1),
})
export type PipelineManifest = z.infer<typeof PipelineManifestSchema>
