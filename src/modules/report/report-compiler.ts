/**
 * Markdown report for a finished session.
 */

import { slugify } from '../../utils/helpers.js'
import type { SessionDocument } from '../session/session-types.js'

/** `{sanitized-identifier}-{session_id}` */
export function artifactName(session: Pick<SessionDocument, 'input_statement' | 'session_id'>): string {
  return `${slugify(session.input_statement)}-${session.session_id}`
}

/** One-line outcome used in reports and notifications */
export function describeOutcome(session: SessionDocument): string {
  if (session.status === 'cancelled') return 'CANCELLED'
  if (session.failure !== null) {
    const where = session.failure.stage !== null ? ` at stage "${session.failure.stage}"` : ''
    return `FAILED${where} (${session.failure.kind}): ${session.failure.message}`
  }
  if (session.eliminated) {
    return `ELIMINATED at ${session.elimination_phase ?? 'problem'} phase`
  }
  if (session.verdict !== null) return session.verdict === 'PASS' ? 'PASSED' : 'FAILED THRESHOLD'
  return session.status.toUpperCase()
}

function score(value: number | null): string {
  return value === null ? 'n/a' : `${value.toFixed(2)}/10`
}

export function compileReport(session: SessionDocument): string {
  const lines: string[] = [
    `# Evaluation: ${session.input_statement}`,
    '',
    `**Outcome:** ${describeOutcome(session)}`,
    '',
    `- Session: \`${session.session_id}\``,
    `- Pipeline: ${session.pack} (${session.policy} elimination${session.problem_only ? ', problem only' : ''})`,
    `- Threshold: ${session.threshold.toFixed(1)}`,
    `- Verdict: ${session.verdict ?? 'n/a'}`,
    '',
    '## Scores',
    '',
    '| Bucket | Score |',
    '| --- | --- |',
    `| Problem (60%) | ${score(session.scores.problem)} |`,
    `| Solution (40%) | ${score(session.scores.solution)} |`,
    `| Combined | ${score(session.scores.combined)} |`,
  ]

  if (session.solution_after_elimination) {
    lines.push('', '_The solution phase ran after elimination; its score does not change the verdict._')
  }

  const criteria = Object.values(session.phases).flatMap((phase) =>
    Object.entries(phase.output?.scores ?? {}).map(([criterion, value]) => ({ criterion, value, stage: phase.name }))
  )
  if (criteria.length > 0) {
    lines.push('', '## Criteria', '', '| Criterion | Rating | Stage |', '| --- | --- | --- |')
    for (const c of criteria) {
      lines.push(`| ${c.criterion} | ${String(c.value)} | ${c.stage} |`)
    }
  }

  lines.push('', '## Stages')
  for (const phase of Object.values(session.phases)) {
    lines.push('', `### ${phase.name} (${phase.status})`)
    if (phase.output !== null) {
      lines.push('', phase.output.summary.trim())
      if (phase.output.findings.length > 0) {
        lines.push('', ...phase.output.findings.map((f) => `- ${f}`))
      }
    } else if (phase.error !== null) {
      lines.push('', `Error (${phase.error_kind ?? 'unknown'}): ${phase.error}`)
    }
  }

  const suggestions = Object.values(session.phases).flatMap((p) => p.output?.suggestions ?? [])
  if (suggestions.length > 0) {
    lines.push('', '## Alternative directions', '', ...suggestions.map((s) => `- ${s}`))
  }

  const narrative = Object.values(session.phases)
    .map((p) => p.output?.report)
    .filter((r): r is string => r !== undefined && r.trim() !== '')
  for (const text of narrative) {
    lines.push('', '## Report', '', text.trim())
  }

  if (session.degraded_stages.length > 0) {
    lines.push('', `_Optional stages that failed: ${session.degraded_stages.join(', ')}_`)
  }

  if (session.similar_sessions.length > 0) {
    lines.push('', '## Similar past sessions', '')
    for (const s of session.similar_sessions) {
      lines.push(`- ${s.statement} (${s.status}, similarity ${s.similarity.toFixed(2)})`)
    }
  }

  return `${lines.join('\n')}\n`
}
