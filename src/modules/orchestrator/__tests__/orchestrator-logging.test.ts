/**
 * Error-level logging of PipelineOrchestratorImpl around cancellation
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'

const { errorLog } = vi.hoisted(() => ({ errorLog: vi.fn() }))

vi.mock('../../../utils/logger.js', () => {
  const stub = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: errorLog }
  return { createLogger: () => stub, childLogger: () => stub, logger: stub }
})

import { createEventBus } from '../../../core/event-bus.js'
import { PipelineOrchestratorImpl } from '../orchestrator-impl.js'
import { ScriptedCapability, stageOutput } from '../../../../test/helpers/capability.js'
import { MemoryReportSink, RecordingNotifier } from '../../../../test/helpers/fakes.js'
import { createTestPack } from '../../../../test/helpers/packs.js'
import type { TestPack } from '../../../../test/helpers/packs.js'
import { createMemoryStore } from '../../../../test/helpers/stores.js'
import type { MemoryStore } from '../../../../test/helpers/stores.js'

let testPack: TestPack
let memory: MemoryStore

beforeEach(async () => {
  errorLog.mockClear()
  testPack = await createTestPack()
  memory = createMemoryStore()
})

afterEach(async () => {
  memory.close()
  await testPack.cleanup()
})

describe('PipelineOrchestrator cancellation logging', () => {
  it('halts a problem-only session cancelled after Phase 1 scoring without logging an error', async () => {
    const bus = createEventBus()
    const capability = new ScriptedCapability({
      'problem-a': stageOutput({ severity: 8, market_size: 7 }),
      'problem-b': stageOutput({ wtp: 8, solution_fit: 7 }),
      report: stageOutput({}, { report: 'Full narrative' }),
    })
    const sink = new MemoryReportSink()
    const orchestrator = new PipelineOrchestratorImpl({
      pack: testPack.pack,
      capability,
      store: memory.store,
      eventBus: bus,
      reportSink: sink,
      notifier: new RecordingNotifier(),
      settings: { visibility: { timeoutMs: 50, pollIntervalMs: 1, maxPollIntervalMs: 5 } },
      generateSessionId: () => 'sess0001',
    })
    bus.on('session:transition', ({ sessionId, to }) => {
      if (to === 'PHASE1_SCORED') orchestrator.cancel(sessionId)
    })

    const doc = await orchestrator.evaluate('Invoices for plumbers', { problemOnly: true })

    expect(doc).toMatchObject({
      status: 'cancelled',
      pipeline_state: 'CANCELLED',
      verdict: null,
      failure: { stage: null, kind: 'cancelled', message: 'Cancelled by caller' },
    })
    expect(capability.stagesCalled().sort()).toEqual(['problem-a', 'problem-b'])
    expect(sink.documents).toEqual([])
    expect(errorLog).not.toHaveBeenCalled()
  })
})
