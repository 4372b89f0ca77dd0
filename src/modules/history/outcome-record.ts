/**
 * Shape of `session_outcome` and `pending_idea` records.
 *
 * The content of an outcome record is the statement; the metadata carries
 * the status, verdict and scores so history reads never need the full
 * session document.
 */

import { z } from 'zod'
import type { MemoryRecord, MemoryRecordMetadata } from '../context-store/context-store.js'
import type { SessionDocument } from '../session/session-types.js'

const ScoresSchema = z.object({
  problem: z.number().nullable(),
  solution: z.number().nullable(),
  combined: z.number().nullable(),
})

export const OutcomeMetadataSchema = z.object({
  type: z.literal('session_outcome'),
  session_id: z.string().min(1),
  status: z.string(),
  verdict: z.enum(['PASS', 'FAIL']).nullable(),
  eliminated: z.boolean(),
  scores: ScoresSchema,
  pack: z.string(),
  failure_kind: z.string().nullable(),
  report_artifact: z.string().nullable(),
})
export type OutcomeMetadata = z.infer<typeof OutcomeMetadataSchema>

export interface SessionOutcome extends Omit<OutcomeMetadata, 'type'> {
  statement: string
  recorded_at: string
}

export function outcomeMetadata(doc: SessionDocument): OutcomeMetadata & MemoryRecordMetadata {
  return {
    type: 'session_outcome',
    session_id: doc.session_id,
    status: doc.status,
    verdict: doc.verdict,
    eliminated: doc.eliminated,
    scores: { ...doc.scores },
    pack: doc.pack,
    failure_kind: doc.failure?.kind ?? null,
    report_artifact: doc.report_artifact,
  }
}

/** null for records written by something other than the orchestrator */
export function toOutcome(record: MemoryRecord): SessionOutcome | null {
  const parsed = OutcomeMetadataSchema.safeParse(record.metadata)
  if (!parsed.success) return null
  const { type: _type, ...rest } = parsed.data
  return { ...rest, statement: record.content, recorded_at: record.created_at }
}

export interface PendingIdea {
  id: string
  statement: string
  note: string | null
  added_at: string
}

export const PendingMetadataSchema = z.object({
  type: z.literal('pending_idea'),
  note: z.string().nullable().default(null),
})

export function toPendingIdea(record: MemoryRecord): PendingIdea | null {
  const parsed = PendingMetadataSchema.safeParse(record.metadata)
  if (!parsed.success) return null
  return { id: record.id, statement: record.content, note: parsed.data.note, added_at: record.created_at }
}
