/**
 * Zod schema for session documents read back from `session_state` records.
 */

import { z } from 'zod'
import { StageOutputSchema } from '../reasoning/output-schema.js'
import type { SessionDocument } from './session-types.js'

const FailureKindSchema = z.enum(['capability', 'timeout', 'output', 'validation', 'store', 'decision', 'report', 'cancelled'])

const PhaseRecordSchema = z.object({
  name: z.string(),
  status: z.enum(['pending', 'running', 'complete', 'failed']),
  output: StageOutputSchema.nullable(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
  error: z.string().nullable(),
  error_kind: FailureKindSchema.optional(),
})

export const SessionDocumentSchema: z.ZodType<SessionDocument, z.ZodTypeDef, unknown> = z.object({
  session_id: z.string().min(1),
  input_statement: z.string(),
  threshold: z.number(),
  status: z.enum(['started', 'in_progress', 'eliminated', 'passed', 'complete', 'failed', 'cancelled']),
  pipeline_state: z.enum([
    'STARTED',
    'PHASE1_RUNNING',
    'PHASE1_SCORED',
    'ELIMINATED',
    'PHASE2_RUNNING',
    'PHASE2_SCORED',
    'REPORTING',
    'COMPLETE',
    'FAILED',
    'CANCELLED',
  ]),
  pack: z.string(),
  policy: z.enum(['early', 'full']),
  problem_only: z.boolean(),
  phases: z.record(z.string(), PhaseRecordSchema),
  scores: z.object({
    problem: z.number().nullable(),
    solution: z.number().nullable(),
    combined: z.number().nullable(),
  }),
  verdict: z.enum(['PASS', 'FAIL']).nullable(),
  eliminated: z.boolean(),
  elimination_phase: z.string().nullable(),
  solution_after_elimination: z.boolean(),
  degraded_stages: z.array(z.string()),
  similar_sessions: z.array(
    z.object({ session_id: z.string(), statement: z.string(), similarity: z.number(), status: z.string() })
  ),
  failure: z.object({ stage: z.string().nullable(), kind: FailureKindSchema, message: z.string() }).nullable(),
  report_artifact: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
})

/** Parse JSON content of a session_state record; null when it is not a session document */
export function parseSessionDocument(content: string): SessionDocument | null {
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch {
    return null
  }
  const parsed = SessionDocumentSchema.safeParse(raw)
  return parsed.success ? parsed.data : null
}
