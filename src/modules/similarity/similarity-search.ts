/**
 * Similarity search over past session outcomes.
 *
 * Matches are advisory: they annotate a new session and are mentioned to the
 * stages, but never block evaluation.
 */

import type { ContextStore } from '../context-store/context-store.js'
import { statementSimilarity } from './text-similarity.js'

export interface SimilarityMatch {
  sessionId: string
  statement: string
  similarity: number
  status: string
}

export interface SimilarityOptions {
  /** Minimum similarity in [0, 1] */
  threshold?: number
  limit?: number
  excludeSessionId?: string
}

export interface SimilaritySearch {
  findSimilar(statement: string, options?: SimilarityOptions): Promise<SimilarityMatch[]>
}

export const DEFAULT_SIMILARITY_THRESHOLD = 0.5
export const DEFAULT_SIMILARITY_LIMIT = 3

export class StoreSimilaritySearch implements SimilaritySearch {
  constructor(private readonly _store: ContextStore) {}

  async findSimilar(statement: string, options: SimilarityOptions = {}): Promise<SimilarityMatch[]> {
    const threshold = options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD
    const limit = options.limit ?? DEFAULT_SIMILARITY_LIMIT

    const outcomes = await this._store.query({ type: 'session_outcome' })
    const matches: SimilarityMatch[] = []
    for (const record of outcomes) {
      const sessionId = record.metadata.session_id
      if (sessionId === null || sessionId === options.excludeSessionId) continue
      const similarity = statementSimilarity(statement, record.content)
      if (similarity >= threshold) {
        const status = record.metadata['status']
        matches.push({
          sessionId,
          statement: record.content,
          similarity: Math.round(similarity * 1000) / 1000,
          status: typeof status === 'string' ? status : 'unknown',
        })
      }
    }

    return matches.sort((a, b) => b.similarity - a.similarity).slice(0, limit)
  }
}
