/**
 * Keyword and word-bigram Jaccard similarity for short statements.
 */

const STOP_WORDS = new Set([
  'the', 'a', 'an', 'is', 'are', 'was', 'were', 'be', 'been', 'have', 'has',
  'do', 'does', 'will', 'would', 'could', 'should', 'can', 'to', 'of', 'in',
  'for', 'on', 'with', 'at', 'by', 'from', 'as', 'into', 'and', 'but', 'or',
  'not', 'that', 'this', 'these', 'those', 'it', 'its', 'their', 'who', 'app',
])

export function keywords(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^a-z0-9]+/)
      .filter((w) => w.length > 2 && !STOP_WORDS.has(w))
  )
}

function bigrams(text: string): Set<string> {
  const words = [...keywords(text)]
  const grams = new Set<string>()
  for (let i = 0; i + 1 < words.length; i++) {
    grams.add(`${words[i] ?? ''} ${words[i + 1] ?? ''}`)
  }
  return grams
}

function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 || b.size === 0) return 0
  let inter = 0
  for (const item of a) if (b.has(item)) inter++
  return inter / (a.size + b.size - inter)
}

/** Similarity in [0, 1]; the higher of keyword and bigram overlap */
export function statementSimilarity(a: string, b: string): number {
  return Math.max(jaccard(keywords(a), keywords(b)), jaccard(bigrams(a), bigrams(b)))
}
