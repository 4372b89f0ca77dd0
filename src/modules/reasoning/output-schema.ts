/**
 * Zod schema for the YAML block every stage emits at the end of its output.
 *
 * ```yaml
 * result: success
 * summary: |
 *   Two paragraphs of analysis...
 * scores:
 *   severity: 8
 * findings:
 *   - Buyers already pay for workarounds
 * ```
 */

import { z } from 'zod'

export const StageOutputSchema = z.object({
  result: z.enum(['success', 'failed']).default('success'),
  summary: z.string().min(1, 'summary must not be empty'),
  scores: z.record(z.string(), z.number()).default({}),
  findings: z.array(z.string()).default([]),
  /** Free-form narrative, used by report stages */
  report: z.string().optional(),
  /** Alternative directions, used by the pivot stage */
  suggestions: z.array(z.string()).optional(),
})

export type StageOutput = z.infer<typeof StageOutputSchema>
