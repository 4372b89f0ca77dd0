import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { SessionHandle } from '../../session/session-handle.js'
import { StoreSimilaritySearch } from '../../similarity/similarity-search.js'
import { createHistoryService } from '../history-service.js'
import type { HistoryService } from '../history-service.js'
import { outcomeMetadata, toOutcome } from '../outcome-record.js'
import { createMemoryStore } from '../../../../test/helpers/stores.js'
import type { MemoryStore } from '../../../../test/helpers/stores.js'

let memory: MemoryStore
let history: HistoryService

async function recordOutcome(sessionId: string, statement: string, finish: (h: SessionHandle) => void): Promise<void> {
  const handle = SessionHandle.create({
    sessionId,
    statement,
    threshold: 6,
    pack: 'two-phase',
    policy: 'early',
    problemOnly: false,
  })
  finish(handle)
  const doc = handle.snapshot()
  await memory.store.write('orchestrator', doc.input_statement, outcomeMetadata(doc))
}

beforeEach(async () => {
  memory = createMemoryStore()
  history = createHistoryService(memory.store, new StoreSimilaritySearch(memory.store))

  await recordOutcome('sess0001', 'Invoices for plumbers', (h) => {
    h.setScore('problem', 7.5)
    h.setVerdict('PASS')
    h.transition('PHASE1_RUNNING')
  })
  await recordOutcome('sess0002', 'Dog walking marketplace', (h) => {
    h.setFailure({ stage: 'researcher', kind: 'timeout', message: 'slow' })
    h.transition('FAILED')
  })
  await memory.store.write('researcher', 'Plumbers hate paperwork.', {
    type: 'stage_output',
    session_id: 'sess0001',
    stage: 'researcher',
  })
})

afterEach(() => {
  memory.close()
})

describe('HistoryService', () => {
  it('lists outcomes most recent first, with filters', async () => {
    const all = await history.listOutcomes()
    expect(all.map((o) => o.session_id)).toEqual(['sess0002', 'sess0001'])
    expect(all[0]).toMatchObject({ status: 'failed', failure_kind: 'timeout', statement: 'Dog walking marketplace' })

    expect((await history.listOutcomes({ status: 'in_progress' })).map((o) => o.session_id)).toEqual(['sess0001'])
    expect(await history.listOutcomes({ limit: 1 })).toHaveLength(1)
  })

  it('searches outcomes by text and leaves unrelated ones out', async () => {
    const results = await history.searchOutcomes('plumbers invoicing')
    expect(results.map((r) => [r.session_id, r.similarity])).toEqual([['sess0001', 0.333]])
  })

  it('returns stage outputs of matching sessions as insights', async () => {
    const insights = await history.getInsights('invoices plumbers')
    expect(insights).toHaveLength(1)
    expect(insights[0]?.outcome.session_id).toBe('sess0001')
    expect(insights[0]?.stages).toEqual([{ stage: 'researcher', content: 'Plumbers hate paperwork.' }])
  })

  it('queues pending statements', async () => {
    await history.addPending('  Solar panel cleaning  ', 'ask Dana')
    await history.addPending('Pet insurance comparison')

    const pending = await history.listPending()
    expect(pending.map((p) => [p.statement, p.note])).toEqual([
      ['Solar panel cleaning', 'ask Dana'],
      ['Pet insurance comparison', null],
    ])
  })

  it('delegates similarity lookups', async () => {
    expect((await history.findSimilar('invoices for plumbers')).map((m) => m.sessionId)).toEqual(['sess0001'])
  })
})

describe('toOutcome', () => {
  it('ignores records without outcome metadata', () => {
    expect(
      toOutcome({
        id: '00000000-0000-4000-8000-000000000001',
        owner_scope: 'researcher',
        content: 'x',
        metadata: { type: 'stage_output', session_id: 'sess0001' },
        created_at: '2026-01-01T00:00:00.000Z',
      })
    ).toBeNull()
  })
})
