/**
 * Tests for the human-readable session, history and pack formatters
 */

import { describe, it, expect } from 'vitest'
import type { SessionOutcome } from '../../../modules/history/outcome-record.js'
import { SessionHandle } from '../../../modules/session/session-handle.js'
import {
  renderInsights,
  renderOutcomes,
  renderPacks,
  renderPending,
  renderSessionHuman,
  renderSimilar,
  renderTable,
} from '../session-formatter.js'

function outcome(overrides: Partial<SessionOutcome> = {}): SessionOutcome {
  return {
    session_id: 'sess0001',
    status: 'complete',
    verdict: 'PASS',
    eliminated: false,
    scores: { problem: 7.5, solution: 7, combined: 7.3 },
    pack: 'two-phase',
    failure_kind: null,
    report_artifact: null,
    statement: 'Invoices',
    recorded_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  }
}

describe('renderTable', () => {
  it('pads columns to the widest cell and trims trailing space', () => {
    expect(renderTable(['A', 'BB'], [['xyz', '1']])).toBe('A    BB\n---  --\nxyz  1')
  })
})

describe('renderSessionHuman', () => {
  it('summarizes an eliminated session with stages, similar sessions and a report', () => {
    const handle = SessionHandle.create({
      sessionId: 'sess0001',
      statement: 'Invoices for plumbers',
      threshold: 6,
      pack: 'two-phase',
      policy: 'early',
      problemOnly: false,
    })
    handle.schedulePhase('researcher')
    handle.startPhase('researcher')
    handle.completePhase('researcher', { result: 'success', summary: 'Weak.', scores: { severity: 3 }, findings: [] })
    handle.schedulePhase('market')
    handle.failPhase('market', 'timed out', 'timeout')
    handle.addDegradedStage('market')
    handle.setSimilarSessions([
      { session_id: 'old00001', statement: 'Invoicing for plumbers', similarity: 0.75, status: 'complete' },
    ])
    handle.setScore('problem', 3)
    handle.setScore('combined', 1.8)
    handle.markEliminated('problem')
    handle.setVerdict('FAIL')
    handle.setReportArtifact('reports/invoices-for-plumbers-sess0001.md')

    expect(renderSessionHuman(handle.snapshot()).split('\n')).toEqual([
      'Session sess0001  Status: started  State: STARTED',
      'Statement: Invoices for plumbers',
      'Outcome:   ELIMINATED at problem phase',
      'Scores:    problem 3.00  solution -  combined 1.80  (threshold 6.0)',
      '',
      'Stages:',
      `  ${'researcher'.padEnd(24)} complete`,
      `  ${'market'.padEnd(24)} failed  timeout: timed out`,
      '',
      'Degraded: market',
      '',
      'Similar past sessions:',
      '  old00001  0.75  complete  Invoicing for plumbers',
      '',
      'Report: reports/invoices-for-plumbers-sess0001.md',
    ])
  })
})

describe('history renderers', () => {
  it('renders outcomes as a table', () => {
    const lines = renderOutcomes([outcome()]).split('\n')
    expect(lines[0]).toBe('SESSION   STATUS    VERDICT  PROBLEM  COMBINED  STATEMENT')
    expect(lines[2]).toBe('sess0001  complete  PASS     7.50     7.30      Invoices')
  })

  it('shows dashes for missing verdicts and scores', () => {
    const lines = renderOutcomes([
      outcome({ status: 'failed', verdict: null, scores: { problem: null, solution: null, combined: null } }),
    ]).split('\n')
    expect(lines[2]).toBe('sess0001  failed  -        -        -         Invoices')
  })

  it('has a message for every empty list', () => {
    expect(renderOutcomes([])).toBe('No evaluations recorded.')
    expect(renderSimilar([])).toBe('No similar evaluations.')
    expect(renderInsights([])).toBe('No related evaluations.')
    expect(renderPending([])).toBe('No pending statements.')
    expect(renderPacks([])).toBe('No pipeline packs found.')
  })

  it('renders insights as sections per stage', () => {
    const text = renderInsights([
      { outcome: { ...outcome(), similarity: 0.5 }, stages: [{ stage: 'researcher', content: 'Pain is real.\n' }] },
    ])
    expect(text).toBe('## sess0001 (0.500): Invoices\n\n### researcher\nPain is real.')
  })

  it('numbers pending statements and shows notes', () => {
    expect(
      renderPending([
        { id: 'p1', statement: 'First idea', note: null, added_at: '2026-01-01T00:00:00.000Z' },
        { id: 'p2', statement: 'Second idea', note: 'ask Sam', added_at: '2026-01-02T00:00:00.000Z' },
      ])
    ).toBe('1. First idea\n2. Second idea\n   note: ask Sam')
  })

  it('truncates long statements', () => {
    const lines = renderSimilar([{ sessionId: 's1', statement: 'x'.repeat(80), similarity: 0.5, status: 'complete' }]).split('\n')
    expect(lines[2]).toBe(`s1       0.50   complete  ${'x'.repeat(57)}...`)
  })
})

describe('renderPacks', () => {
  it('lists name, stage count, threshold and description', () => {
    const lines = renderPacks([
      { name: 'two-phase', description: 'Two phases', stageCount: 8, threshold: 6, path: '/packs/two-phase' },
    ]).split('\n')
    expect(lines[0]).toBe('NAME       STAGES  THRESHOLD  DESCRIPTION')
    expect(lines[2]).toBe('two-phase  8       6.0        Two phases')
  })
})
