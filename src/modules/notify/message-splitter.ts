/**
 * Markdown to Slack mrkdwn conversion and chunking for length-limited posts.
 */

export const SLACK_CHUNK_LIMIT = 3500

const HORIZONTAL_RULE = '━'.repeat(40)

interface SplitLevel {
  split: (text: string) => string[]
  joiner: string
}

// Coarsest first: bold section headers, paragraphs, lines
const LEVELS: SplitLevel[] = [
  { split: (text) => text.split(/\n(?=\*[^*\n]+\*\n)/), joiner: '\n' },
  { split: (text) => text.split('\n\n'), joiner: '\n\n' },
  { split: (text) => text.split('\n'), joiner: '\n' },
]

function hardSplit(text: string, maxLength: number): string[] {
  const parts: string[] = []
  for (let i = 0; i < text.length; i += maxLength) {
    parts.push(text.slice(i, i + maxLength))
  }
  return parts
}

function splitAt(text: string, maxLength: number, level: number): string[] {
  if (text.length <= maxLength) return [text]
  const current = LEVELS[level]
  if (current === undefined) return hardSplit(text, maxLength)

  const chunks: string[] = []
  let buffer = ''
  for (const part of current.split(text)) {
    const candidate = buffer === '' ? part : `${buffer}${current.joiner}${part}`
    if (candidate.length <= maxLength) {
      buffer = candidate
      continue
    }
    if (buffer !== '') chunks.push(buffer)
    if (part.length > maxLength) {
      chunks.push(...splitAt(part, maxLength, level + 1))
      buffer = ''
    } else {
      buffer = part
    }
  }
  if (buffer !== '') chunks.push(buffer)
  return chunks
}

/**
 * Split text into chunks of at most `maxLength` characters, preferring
 * section, then paragraph, then line boundaries.
 */
export function splitMessage(text: string, maxLength = SLACK_CHUNK_LIMIT): string[] {
  if (maxLength < 1) {
    throw new RangeError(`maxLength must be positive, got ${String(maxLength)}`)
  }
  return splitAt(text.trim(), maxLength, 0)
    .map((chunk) => chunk.trim())
    .filter((chunk) => chunk !== '')
}

function convertTableRow(line: string): string | null {
  const trimmed = line.trim()
  if (!trimmed.startsWith('|') || !trimmed.endsWith('|')) return line
  const cells = trimmed
    .slice(1, -1)
    .split('|')
    .map((c) => c.trim())
  if (cells.every((c) => /^:?-+:?$/.test(c))) return null
  return cells.join('  ·  ')
}

/** GitHub-flavoured Markdown to Slack mrkdwn */
export function markdownToSlack(markdown: string): string {
  const converted = markdown
    .replace(/\*\*(.+?)\*\*/g, '*$1*')
    .replace(/^#{1,6}\s+(.+)$/gm, (_match, title: string) => `*${title.replace(/\*/g, '')}*`)
    .replace(/\[([^\]]+)\]\(([^)]+)\)/g, '<$2|$1>')
    .replace(/^---+$/gm, HORIZONTAL_RULE)

  return converted
    .split('\n')
    .map(convertTableRow)
    .filter((line): line is string => line !== null)
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
}
