/**
 * Prompt assembly for a stage: template interpolation, prior-stage context,
 * advisory duplicate warning and the output contract.
 */

import type { MemoryRecord } from '../context-store/context-store.js'
import type { StageDefinition } from '../pipeline-pack/schemas.js'
import type { SessionScores, SimilarSession } from '../session/session-types.js'

/** Instruction given to report stages when an idea did not pass */
export const ALTERNATIVE_DIRECTIONS_INSTRUCTION =
  'The idea did not pass evaluation. Generate three to five alternative directions ' +
  '(pivots) that keep what is promising and address the weakest criteria.'

/**
 * Replace {{name}} tokens with values from the map. Unknown tokens are left as-is.
 */
export function renderTemplate(template: string, vars: Readonly<Record<string, string>>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => vars[key] ?? match)
}

/**
 * Prior stage outputs of this session as Markdown sections, in write order.
 */
export function formatStageContext(records: readonly MemoryRecord[]): string {
  if (records.length === 0) return ''
  const sections = records.map((r) => `### ${r.metadata.stage ?? r.owner_scope}\n\n${r.content.trim()}`)
  return `## Context from earlier stages\n\n${sections.join('\n\n')}`
}

export function formatSimilarWarning(similar: readonly SimilarSession[]): string {
  if (similar.length === 0) return ''
  const lines = similar.map(
    (s) => `> - "${s.statement}" (${s.status}, similarity ${s.similarity.toFixed(2)}, session ${s.session_id})`
  )
  return ['> **Note:** similar ideas were evaluated before. Focus on what is different this time.', ...lines].join(
    '\n'
  )
}

export function formatScores(scores: SessionScores, threshold: number): string {
  const fmt = (value: number | null): string => (value === null ? 'n/a' : `${value.toFixed(2)}/10`)
  return [
    `- Problem: ${fmt(scores.problem)}`,
    `- Solution: ${fmt(scores.solution)}`,
    `- Combined: ${fmt(scores.combined)}`,
    `- Threshold: ${threshold.toFixed(1)}`,
  ].join('\n')
}

/**
 * The YAML block every stage must end with, listing the criteria it rates.
 */
export function formatOutputContract(stage: StageDefinition): string {
  const lines = ['result: success', 'summary: |', '  <two to four paragraphs>']
  if (stage.criteria.length > 0) {
    lines.push('scores:', ...stage.criteria.map((c) => `  ${c}: <1-10>`))
  } else {
    lines.push('scores: {}')
  }
  lines.push('findings:', '  - <key finding>')
  if (stage.group === 'report') {
    if (stage.run_when === 'not_passed') {
      lines.push('suggestions:', '  - <alternative direction>')
    } else {
      lines.push('report: |', '  <full Markdown report>')
    }
  }

  const rule =
    stage.criteria.length > 0
      ? 'Every criterion under `scores` is required and must be a number from 1 to 10.'
      : 'This stage rates no criteria; leave `scores` empty.'

  return [
    '## Output Contract',
    '',
    'End your response with a fenced YAML block in exactly this shape:',
    '',
    '```yaml',
    ...lines,
    '```',
    '',
    rule,
  ].join('\n')
}
