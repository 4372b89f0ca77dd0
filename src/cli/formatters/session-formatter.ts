/**
 * Human-readable formatters for sessions, history and packs.
 */

import type { OutcomeSearchResult, SessionInsights } from '../../modules/history/history-service.js'
import type { PendingIdea, SessionOutcome } from '../../modules/history/outcome-record.js'
import type { PackInfo } from '../../modules/pipeline-pack/pack-loader.js'
import { describeOutcome } from '../../modules/report/report-compiler.js'
import type { SessionDocument } from '../../modules/session/session-types.js'
import type { SimilarityMatch } from '../../modules/similarity/similarity-search.js'

function score(value: number | null): string {
  return value === null ? '-' : value.toFixed(2)
}

/**
 * Render rows as an aligned plain-text table.
 */
export function renderTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)))
  const format = (cells: string[]): string =>
    cells
      .map((c, i) => c.padEnd(widths[i] ?? 0))
      .join('  ')
      .trimEnd()
  return [format(headers), widths.map((w) => '-'.repeat(w)).join('  '), ...rows.map(format)].join('\n')
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text
}

/**
 * Session summary:
 *  - Header: Session <id>  Status: <status>  State: <pipeline_state>
 *  - Statement, outcome, scores
 *  - One line per stage, with failures and degraded stages
 */
export function renderSessionHuman(doc: SessionDocument): string {
  const lines: string[] = [
    `Session ${doc.session_id}  Status: ${doc.status}  State: ${doc.pipeline_state}`,
    `Statement: ${doc.input_statement}`,
    `Outcome:   ${describeOutcome(doc)}`,
    `Scores:    problem ${score(doc.scores.problem)}  solution ${score(doc.scores.solution)}  combined ${score(doc.scores.combined)}  (threshold ${doc.threshold.toFixed(1)})`,
  ]

  const phases = Object.values(doc.phases)
  if (phases.length > 0) {
    lines.push('', 'Stages:')
    for (const phase of phases) {
      const error = phase.error !== null ? `  ${phase.error_kind ?? 'error'}: ${phase.error}` : ''
      lines.push(`  ${phase.name.padEnd(24)} ${phase.status}${error}`)
    }
  }

  if (doc.degraded_stages.length > 0) {
    lines.push('', `Degraded: ${doc.degraded_stages.join(', ')}`)
  }
  if (doc.similar_sessions.length > 0) {
    lines.push('', 'Similar past sessions:')
    for (const s of doc.similar_sessions) {
      lines.push(`  ${s.session_id}  ${s.similarity.toFixed(2)}  ${s.status}  ${truncate(s.statement, 60)}`)
    }
  }
  if (doc.report_artifact !== null) {
    lines.push('', `Report: ${doc.report_artifact}`)
  }
  return lines.join('\n')
}

export function renderOutcomes(outcomes: SessionOutcome[]): string {
  if (outcomes.length === 0) return 'No evaluations recorded.'
  return renderTable(
    ['SESSION', 'STATUS', 'VERDICT', 'PROBLEM', 'COMBINED', 'STATEMENT'],
    outcomes.map((o) => [
      o.session_id,
      o.status,
      o.verdict ?? '-',
      score(o.scores.problem),
      score(o.scores.combined),
      truncate(o.statement, 60),
    ])
  )
}

export function renderSearchResults(results: OutcomeSearchResult[]): string {
  if (results.length === 0) return 'No matching evaluations.'
  return renderTable(
    ['SESSION', 'MATCH', 'VERDICT', 'COMBINED', 'STATEMENT'],
    results.map((r) => [r.session_id, r.similarity.toFixed(3), r.verdict ?? '-', score(r.scores.combined), truncate(r.statement, 60)])
  )
}

export function renderSimilar(matches: SimilarityMatch[]): string {
  if (matches.length === 0) return 'No similar evaluations.'
  return renderTable(
    ['SESSION', 'MATCH', 'STATUS', 'STATEMENT'],
    matches.map((m) => [m.sessionId, m.similarity.toFixed(2), m.status, truncate(m.statement, 60)])
  )
}

export function renderInsights(insights: SessionInsights[]): string {
  if (insights.length === 0) return 'No related evaluations.'
  const blocks = insights.map(({ outcome, stages }) => {
    const lines = [`## ${outcome.session_id} (${outcome.similarity.toFixed(3)}): ${outcome.statement}`]
    for (const stage of stages) {
      lines.push('', `### ${stage.stage}`, stage.content.trim())
    }
    return lines.join('\n')
  })
  return blocks.join('\n\n')
}

export function renderPending(ideas: PendingIdea[]): string {
  if (ideas.length === 0) return 'No pending statements.'
  return ideas
    .map((idea, i) => `${i + 1}. ${idea.statement}${idea.note !== null ? `\n   note: ${idea.note}` : ''}`)
    .join('\n')
}

export function renderPacks(packs: PackInfo[]): string {
  if (packs.length === 0) return 'No pipeline packs found.'
  return renderTable(
    ['NAME', 'STAGES', 'THRESHOLD', 'DESCRIPTION'],
    packs.map((p) => [p.name, String(p.stageCount), p.threshold.toFixed(1), p.description])
  )
}
