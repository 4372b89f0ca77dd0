/**
 * Tests for the error hierarchy
 */

import { describe, it, expect } from 'vitest'
import {
  CapabilityError,
  ConfigError,
  ContextStoreError,
  GauntletError,
  InvalidInputError,
  InvalidQueryFilterError,
  InvalidTransitionError,
  MissingScoreError,
  PipelineDefinitionError,
  ScoreValidationError,
  SessionNotFoundError,
  StageGraphCycleError,
  StageOutputError,
  StageTimeoutError,
  errorMessage,
} from '../errors.js'

describe('GauntletError', () => {
  it('carries code and context', () => {
    const error = new GauntletError('boom', 'SOME_CODE', { key: 'value' })
    expect(error.message).toBe('boom')
    expect(error.code).toBe('SOME_CODE')
    expect(error.context).toEqual({ key: 'value' })
    expect(error.name).toBe('GauntletError')
    expect(error).toBeInstanceOf(Error)
  })

  it('serializes to JSON with name, code and context', () => {
    const json = new ConfigError('bad config', { path: 'x.yaml' }).toJSON()
    expect(json['name']).toBe('ConfigError')
    expect(json['code']).toBe('CONFIG_ERROR')
    expect(json['message']).toBe('bad config')
    expect(json['context']).toEqual({ path: 'x.yaml' })
  })
})

describe('error subclasses', () => {
  it('StageGraphCycleError is a PipelineDefinitionError and names the cycle', () => {
    const error = new StageGraphCycleError(['a', 'b', 'a'])
    expect(error).toBeInstanceOf(PipelineDefinitionError)
    expect(error.message).toBe('Circular dependency detected in stage graph: a -> b -> a')
    expect(error.context['cycle']).toEqual(['a', 'b', 'a'])
    expect(error.code).toBe('PIPELINE_DEFINITION_ERROR')
  })

  it('ScoreValidationError describes the criterion and value', () => {
    const error = new ScoreValidationError('severity', 11)
    expect(error.message).toBe('Score for criterion "severity" must be a number in [1, 10], got 11')
    expect(error.code).toBe('SCORE_VALIDATION_ERROR')
  })

  it('MissingScoreError lists the missing criteria', () => {
    const error = new MissingScoreError('problem', ['wtp', 'market_size'])
    expect(error.message).toBe('Cannot compute problem score: missing criteria wtp, market_size')
    expect(error.context).toEqual({ bucket: 'problem', missing: ['wtp', 'market_size'] })
  })

  it('InvalidQueryFilterError is a ContextStoreError', () => {
    const error = new InvalidQueryFilterError()
    expect(error).toBeInstanceOf(ContextStoreError)
    expect(error.name).toBe('InvalidQueryFilterError')
    expect(error.code).toBe('CONTEXT_STORE_ERROR')
  })

  it('StageTimeoutError and StageOutputError carry the stage', () => {
    expect(new StageTimeoutError('market', 500).message).toBe('Stage "market" timed out after 500ms')
    const output = new StageOutputError('market', 'no YAML block', { raw: 'x' })
    expect(output.message).toBe('Stage "market" produced invalid output: no YAML block')
    expect(output.context).toEqual({ stage: 'market', raw: 'x' })
  })

  it('remaining classes set their codes', () => {
    expect(new CapabilityError('exit 1').code).toBe('CAPABILITY_ERROR')
    expect(new InvalidTransitionError('STARTED', 'COMPLETE').message).toBe('Invalid pipeline transition: STARTED -> COMPLETE')
    expect(new SessionNotFoundError('abc12345').code).toBe('SESSION_NOT_FOUND')
    expect(new InvalidInputError('empty').code).toBe('INVALID_INPUT')
  })
})

describe('errorMessage', () => {
  it('uses the message of Error values and stringifies the rest', () => {
    expect(errorMessage(new Error('x'))).toBe('x')
    expect(errorMessage('plain')).toBe('plain')
    expect(errorMessage(42)).toBe('42')
  })
})
