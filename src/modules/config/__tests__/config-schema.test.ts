/**
 * Tests for the configuration zod schemas
 */

import { describe, it, expect } from 'vitest'
import { GauntletConfigSchema, PartialGauntletConfigSchema, PipelineConfigSchema } from '../config-schema.js'
import { DEFAULT_CONFIG } from '../defaults.js'

describe('GauntletConfigSchema', () => {
  it('accepts the defaults', () => {
    expect(GauntletConfigSchema.parse(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG)
  })

  it('rejects unknown keys', () => {
    expect(GauntletConfigSchema.safeParse({ ...DEFAULT_CONFIG, extra: true }).success).toBe(false)
  })

  it('rejects an unknown notifier and capability', () => {
    expect(GauntletConfigSchema.safeParse({ ...DEFAULT_CONFIG, notify: { kind: 'email', token_env: 'X' } }).success).toBe(
      false
    )
    expect(
      GauntletConfigSchema.safeParse({ ...DEFAULT_CONFIG, capability: { kind: 'other', binary: 'x' } }).success
    ).toBe(false)
  })
})

describe('PipelineConfigSchema', () => {
  it('keeps thresholds and bars in [1, 10]', () => {
    const base = { pack: 'two-phase', out_of_range: 'reject' }
    expect(PipelineConfigSchema.safeParse({ ...base, threshold: 1 }).success).toBe(true)
    expect(PipelineConfigSchema.safeParse({ ...base, threshold: 10 }).success).toBe(true)
    expect(PipelineConfigSchema.safeParse({ ...base, threshold: 0.5 }).success).toBe(false)
    expect(PipelineConfigSchema.safeParse({ ...base, elimination_bar: 11 }).success).toBe(false)
  })

  it('accepts only the known policies', () => {
    const base = { pack: 'two-phase', out_of_range: 'clamp' }
    expect(PipelineConfigSchema.safeParse({ ...base, elimination_policy: 'full' }).success).toBe(true)
    expect(PipelineConfigSchema.safeParse({ ...base, elimination_policy: 'late' }).success).toBe(false)
    expect(PipelineConfigSchema.safeParse({ pack: 'two-phase', out_of_range: 'ignore' }).success).toBe(false)
  })
})

describe('PartialGauntletConfigSchema', () => {
  it('accepts any subset of sections', () => {
    expect(PartialGauntletConfigSchema.parse({ pipeline: { pack: 'sequential' } })).toEqual({
      pipeline: { pack: 'sequential' },
    })
    expect(PartialGauntletConfigSchema.parse({})).toEqual({})
  })

  it('still validates the values it is given', () => {
    expect(PartialGauntletConfigSchema.safeParse({ similarity: { threshold: 1.5 } }).success).toBe(false)
  })
})
