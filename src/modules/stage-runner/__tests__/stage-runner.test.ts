/**
 * Tests for StageRunner: one stage of one session against a scripted capability
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import {
  CapabilityError,
  ContextStoreError,
  PipelineDefinitionError,
  ScoreValidationError,
  StageOutputError,
  StageTimeoutError,
} from '../../../core/errors.js'
import { createEventBus } from '../../../core/event-bus.js'
import type { TypedEventBus } from '../../../core/event-bus.js'
import type { GauntletEvents } from '../../../core/event-bus.types.js'
import type { ContextStore } from '../../context-store/context-store.js'
import { ResilientContextStore } from '../../context-store/resilient-context-store.js'
import { SessionHandle } from '../../session/session-handle.js'
import type { OutOfRangePolicy } from '../../scoring/scoring-engine.js'
import { ALTERNATIVE_DIRECTIONS_INSTRUCTION } from '../prompt-assembler.js'
import { StageRunner, classifyStageError, formatStageRecord } from '../stage-runner.js'
import { ScriptedCapability, stageOutput } from '../../../../test/helpers/capability.js'
import type { StageScript } from '../../../../test/helpers/capability.js'
import { createTestPack } from '../../../../test/helpers/packs.js'
import type { TestPack } from '../../../../test/helpers/packs.js'
import { FlakyContextStore, createMemoryStore } from '../../../../test/helpers/stores.js'
import type { MemoryStore } from '../../../../test/helpers/stores.js'

let testPack: TestPack
let memory: MemoryStore
let bus: TypedEventBus
let events: string[]

beforeEach(async () => {
  testPack = await createTestPack()
  memory = createMemoryStore()
  bus = createEventBus()
  events = []
  const record =
    (name: keyof GauntletEvents) =>
    (payload: { stage?: string }): void => {
      events.push(`${name} ${payload.stage ?? ''}`)
    }
  bus.on('stage:started', record('stage:started'))
  bus.on('stage:complete', record('stage:complete'))
  bus.on('stage:failed', record('stage:failed'))
})

afterEach(async () => {
  memory.close()
  await testPack.cleanup()
})

function newSession(stages: string[]): SessionHandle {
  const session = SessionHandle.create({
    sessionId: 'sess0001',
    statement: 'Invoices for plumbers',
    threshold: 6,
    pack: 'test-pack',
    policy: 'early',
    problemOnly: false,
  })
  for (const stage of stages) session.schedulePhase(stage)
  return session
}

function runner(
  script: Record<string, StageScript>,
  opts: { store?: ContextStore; policy?: OutOfRangePolicy } = {}
): { runner: StageRunner; capability: ScriptedCapability } {
  const capability = new ScriptedCapability(script)
  return {
    capability,
    runner: new StageRunner({
      capability,
      store: opts.store ?? memory.store,
      pack: testPack.pack,
      eventBus: bus,
      ...(opts.policy !== undefined && { outOfRangePolicy: opts.policy }),
    }),
  }
}

describe('StageRunner.run', () => {
  it('completes the stage and appends its record', async () => {
    const { runner: r } = runner({ 'problem-a': stageOutput({ severity: 8, market_size: 6, wtp: 3 }) })
    const session = newSession(['problem-a'])

    const result = await r.run(testPack.pack.getStage('problem-a'), session)

    expect(result.ok).toBe(true)
    expect(result.record.status).toBe('complete')
    expect(result.record.output?.scores).toEqual({ severity: 8, market_size: 6 })
    expect(events).toEqual(['stage:started problem-a', 'stage:complete problem-a'])

    const records = await memory.store.query({ session_id: 'sess0001', type: 'stage_output' })
    expect(records).toHaveLength(1)
    expect(records[0]?.owner_scope).toBe('problem-a')
    expect(records[0]?.metadata).toMatchObject({ stage: 'problem-a', group: 'problem', scores: { severity: 8, market_size: 6 } })
    expect(records[0]?.content).toBe('Summary of the analysis.\n\nScores: severity=8, market_size=6\n\nFindings:\n- A finding')
    if (result.ok) {
      expect(result.receipt.id).toBe(records[0]?.id)
    }
  })

  it('renders the prompt with earlier stage context and the output contract', async () => {
    const { runner: r, capability } = runner({
      'problem-a': stageOutput({ severity: 8, market_size: 6 }),
      'problem-b': stageOutput({ wtp: 5, solution_fit: 7 }),
    })
    const session = newSession(['problem-a', 'problem-b'])

    await r.run(testPack.pack.getStage('problem-a'), session)
    await r.run(testPack.pack.getStage('problem-b'), session)

    const [first, second] = capability.requests
    expect(first?.prompt).toContain('Stage problem-a: Pain and market\nStatement: Invoices for plumbers')
    expect(first?.prompt).not.toContain('## Context from earlier stages')
    expect(first?.prompt).toContain('scores:\n  severity: <1-10>\n  market_size: <1-10>\n')
    expect(second?.prompt).toContain('## Context from earlier stages\n\n### problem-a\n\nSummary of the analysis.')
    expect(second?.prompt.endsWith('must be a number from 1 to 10.\n')).toBe(true)
  })

  it('passes instructions through to report stages', async () => {
    const { runner: r, capability } = runner({
      pivot: stageOutput({}, { suggestions: ['Target electricians'] }),
    })
    const session = newSession(['pivot'])

    const result = await r.run(testPack.pack.getStage('pivot'), session, { instructions: ALTERNATIVE_DIRECTIONS_INSTRUCTION })

    expect(result.ok).toBe(true)
    expect(capability.requests[0]?.prompt).toContain(ALTERNATIVE_DIRECTIONS_INSTRUCTION)
    expect(capability.requests[0]?.prompt).toContain('suggestions:\n  - <alternative direction>')
    const records = await memory.store.query({ session_id: 'sess0001', type: 'stage_output' })
    expect(records[0]?.content).toContain('Suggestions:\n- Target electricians')
  })

  it('times out and aborts the capability call', async () => {
    await testPack.cleanup()
    testPack = await createTestPack({ stage_timeout_ms: 20 })
    let aborted = false
    const { runner: r } = runner({
      'problem-a': (request) =>
        new Promise<string>((_, reject) => {
          request.signal?.addEventListener('abort', () => {
            aborted = true
            reject(new Error('aborted'))
          })
        }),
    })
    const session = newSession(['problem-a'])

    const result = await r.run(testPack.pack.getStage('problem-a'), session)

    expect(result).toMatchObject({
      ok: false,
      failure: { stage: 'problem-a', kind: 'timeout', message: 'Stage "problem-a" timed out after 20ms' },
    })
    expect(aborted).toBe(true)
    expect(session.phase('problem-a')).toMatchObject({ status: 'failed', error_kind: 'timeout' })
  })

  it('fails with kind output when no YAML block is present', async () => {
    const { runner: r } = runner({ 'problem-a': 'I could not decide.' })
    const result = await r.run(testPack.pack.getStage('problem-a'), newSession(['problem-a']))

    expect(result).toMatchObject({
      ok: false,
      failure: { kind: 'output', message: 'Stage "problem-a" produced invalid output: no YAML output block found' },
    })
    expect(events).toEqual(['stage:started problem-a', 'stage:failed problem-a'])
    expect(await memory.store.query({ session_id: 'sess0001' })).toEqual([])
  })

  it('fails when an owned criterion is missing', async () => {
    const { runner: r } = runner({ 'problem-a': stageOutput({ severity: 8 }) })
    const result = await r.run(testPack.pack.getStage('problem-a'), newSession(['problem-a']))

    expect(result).toMatchObject({
      ok: false,
      failure: {
        kind: 'output',
        message: 'Stage "problem-a" produced invalid output: missing score for criterion "market_size"',
      },
    })
  })

  it('fails when the stage reports failure itself', async () => {
    const { runner: r } = runner({ 'problem-a': '```yaml\nresult: failed\nsummary: no sources found\n```' })
    const result = await r.run(testPack.pack.getStage('problem-a'), newSession(['problem-a']))

    expect(result).toMatchObject({
      ok: false,
      failure: { kind: 'output', message: 'Stage "problem-a" produced invalid output: stage reported failure: no sources found' },
    })
  })

  it('rejects out-of-range ratings by default', async () => {
    const { runner: r } = runner({ 'problem-a': stageOutput({ severity: 11, market_size: 6 }) })
    const result = await r.run(testPack.pack.getStage('problem-a'), newSession(['problem-a']))

    expect(result).toMatchObject({
      ok: false,
      failure: { kind: 'validation', message: 'Score for criterion "severity" must be a number in [1, 10], got 11' },
    })
  })

  it('clamps out-of-range ratings under the clamp policy', async () => {
    const { runner: r } = runner({ 'problem-a': stageOutput({ severity: 11, market_size: 0 }) }, { policy: 'clamp' })
    const result = await r.run(testPack.pack.getStage('problem-a'), newSession(['problem-a']))

    expect(result.ok).toBe(true)
    expect(result.record.output?.scores).toEqual({ severity: 10, market_size: 1 })
  })

  it('wraps capability errors', async () => {
    const { runner: r } = runner({})
    const result = await r.run(testPack.pack.getStage('problem-a'), newSession(['problem-a']))

    expect(result).toMatchObject({
      ok: false,
      failure: { kind: 'capability', message: 'no script for stage "problem-a"' },
    })
  })

  it('reports store failures with kind store', async () => {
    const store = new ResilientContextStore(new FlakyContextStore(memory.store, { write: 5 }), {
      attempts: 2,
      baseDelayMs: 1,
      maxDelayMs: 1,
    })
    const { runner: r } = runner({ 'problem-a': stageOutput({ severity: 8, market_size: 6 }) }, { store })
    const result = await r.run(testPack.pack.getStage('problem-a'), newSession(['problem-a']))

    expect(result).toMatchObject({
      ok: false,
      failure: { kind: 'store', message: 'Context store write failed after 2 attempts: database is locked' },
    })
  })
})

describe('classifyStageError', () => {
  it('maps errors to failure kinds', () => {
    expect(classifyStageError(new StageTimeoutError('s', 1))).toBe('timeout')
    expect(classifyStageError(new StageOutputError('s', 'bad'))).toBe('output')
    expect(classifyStageError(new ScoreValidationError('severity', 0))).toBe('validation')
    expect(classifyStageError(new PipelineDefinitionError('bad'))).toBe('validation')
    expect(classifyStageError(new ContextStoreError('locked'))).toBe('store')
    expect(classifyStageError(new CapabilityError('down'))).toBe('capability')
    expect(classifyStageError(new Error('other'))).toBe('capability')
  })
})

describe('formatStageRecord', () => {
  it('omits empty sections', () => {
    expect(formatStageRecord({ result: 'success', summary: ' Only a summary. ', scores: {}, findings: [] })).toBe(
      'Only a summary.'
    )
  })
})
