/**
 * Zod validation schemas for the gauntlet configuration system.
 *
 * Sections:
 *  - pipeline: pack selection and decision policy
 *  - store: context store location, retry and visibility polling
 *  - capability: reasoning capability adapter
 *  - similarity: duplicate-session lookup
 *  - notify: notification channel
 *  - report: report artifact directory
 */

import { z } from 'zod'

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
export type LogLevel = z.infer<typeof LogLevelSchema>

const ScoreSchema = z.number().min(1).max(10)

export const PipelineConfigSchema = z
  .object({
    /** Built-in pack name or path to a pack directory */
    pack: z.string().min(1),
    /** Overrides the pack threshold */
    threshold: ScoreSchema.optional(),
    elimination_policy: z.enum(['early', 'full']).optional(),
    elimination_bar: ScoreSchema.optional(),
    out_of_range: z.enum(['reject', 'clamp']),
    /** Overrides the pack's default stage timeout */
    stage_timeout_ms: z.number().int().positive().optional(),
  })
  .strict()

export const StoreConfigSchema = z
  .object({
    database_path: z.string().min(1),
    retry: z
      .object({
        attempts: z.number().int().min(1).max(10),
        base_delay_ms: z.number().int().nonnegative(),
        max_delay_ms: z.number().int().nonnegative(),
      })
      .strict(),
    visibility: z
      .object({
        timeout_ms: z.number().int().positive(),
        poll_interval_ms: z.number().int().positive(),
        max_poll_interval_ms: z.number().int().positive(),
      })
      .strict(),
  })
  .strict()

export const CapabilityConfigSchema = z
  .object({
    kind: z.literal('claude-cli'),
    binary: z.string().min(1),
    model: z.string().min(1).optional(),
    max_turns: z.number().int().positive().optional(),
  })
  .strict()

export const SimilarityConfigSchema = z
  .object({
    threshold: z.number().min(0).max(1),
    limit: z.number().int().positive(),
  })
  .strict()

export const NotifyConfigSchema = z
  .object({
    kind: z.enum(['none', 'console', 'slack']),
    channel: z.string().min(1).optional(),
    /** Name of the environment variable holding the Slack bot token */
    token_env: z.string().min(1),
  })
  .strict()

export const ReportConfigSchema = z
  .object({
    output_dir: z.string().min(1),
  })
  .strict()

export const GauntletConfigSchema = z
  .object({
    log_level: LogLevelSchema,
    pipeline: PipelineConfigSchema,
    store: StoreConfigSchema,
    capability: CapabilityConfigSchema,
    similarity: SimilarityConfigSchema,
    notify: NotifyConfigSchema,
    report: ReportConfigSchema,
  })
  .strict()

export type GauntletConfig = z.infer<typeof GauntletConfigSchema>

/** Shape accepted from config files, env vars and CLI flags */
export const PartialGauntletConfigSchema = GauntletConfigSchema.deepPartial()
export type PartialGauntletConfig = z.infer<typeof PartialGauntletConfigSchema>
