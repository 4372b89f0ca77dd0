/**
 * Zod schemas for context store records.
 */

import { z } from 'zod'

export const MemoryRecordTypeEnum = z.enum([
  'session_state',
  'stage_output',
  'scoring_decision',
  'session_outcome',
  'pending_idea',
  'report',
])
export type MemoryRecordType = z.infer<typeof MemoryRecordTypeEnum>

/**
 * Metadata always carries `type` and `session_id`; anything else is kept as-is.
 */
export const MemoryRecordMetadataSchema = z
  .object({
    type: MemoryRecordTypeEnum,
    session_id: z.string().min(1).nullable(),
    stage: z.string().min(1).optional(),
  })
  .passthrough()
export type MemoryRecordMetadata = z.infer<typeof MemoryRecordMetadataSchema>

export const MemoryRecordSchema = z.object({
  id: z.string().uuid(),
  owner_scope: z.string().min(1),
  content: z.string(),
  metadata: MemoryRecordMetadataSchema,
  created_at: z.string(),
})
export type MemoryRecord = z.infer<typeof MemoryRecordSchema>

export const CreateMemoryRecordInputSchema = z.object({
  owner_scope: z.string().min(1),
  content: z.string(),
  metadata: MemoryRecordMetadataSchema,
})
export type CreateMemoryRecordInput = z.infer<typeof CreateMemoryRecordInputSchema>

/** Raw row shape of the memory_records table */
export const MemoryRecordRowSchema = z.object({
  seq: z.number().int(),
  id: z.string(),
  owner_scope: z.string(),
  type: z.string(),
  session_id: z.string().nullable(),
  content: z.string(),
  metadata_json: z.string(),
  created_at: z.string(),
})
export type MemoryRecordRow = z.infer<typeof MemoryRecordRowSchema>

export const MemoryRecordFilterSchema = z.object({
  session_id: z.string().min(1).optional(),
  type: z.union([MemoryRecordTypeEnum, z.array(MemoryRecordTypeEnum).min(1)]).optional(),
  owner_scope: z.string().min(1).optional(),
  limit: z.number().int().positive().optional(),
  /** Insertion order (default asc) */
  order: z.enum(['asc', 'desc']).optional(),
})
export type MemoryRecordFilter = z.infer<typeof MemoryRecordFilterSchema>
