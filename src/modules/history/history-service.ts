/**
 * HistoryService: read side of past evaluations.
 *
 * Everything is read from the context store: `session_outcome` records for
 * finished sessions, `stage_output` records for insights and `pending_idea`
 * records for queued statements.
 */

import type { ContextStore, WriteReceipt } from '../context-store/context-store.js'
import { statementSimilarity } from '../similarity/text-similarity.js'
import type { SimilarityMatch, SimilarityOptions, SimilaritySearch } from '../similarity/similarity-search.js'
import { toOutcome, toPendingIdea } from './outcome-record.js'
import type { PendingIdea, SessionOutcome } from './outcome-record.js'

export const PENDING_OWNER = 'pending'

export interface ListOutcomesOptions {
  status?: string
  limit?: number
}

export interface OutcomeSearchResult extends SessionOutcome {
  similarity: number
}

export interface StageInsight {
  stage: string
  content: string
}

export interface SessionInsights {
  outcome: OutcomeSearchResult
  stages: StageInsight[]
}

export interface HistoryService {
  /** Most recent first */
  listOutcomes(options?: ListOutcomesOptions): Promise<SessionOutcome[]>
  /** Outcomes ranked by text similarity to the query; zero-overlap outcomes are left out */
  searchOutcomes(query: string, limit?: number): Promise<OutcomeSearchResult[]>
  findSimilar(statement: string, options?: SimilarityOptions): Promise<SimilarityMatch[]>
  addPending(statement: string, note?: string): Promise<WriteReceipt>
  listPending(): Promise<PendingIdea[]>
  /** Stage outputs of the past sessions that best match the query */
  getInsights(query: string, limit?: number): Promise<SessionInsights[]>
}

export class StoreHistoryService implements HistoryService {
  constructor(
    private readonly _store: ContextStore,
    private readonly _similarity: SimilaritySearch
  ) {}

  async listOutcomes(options: ListOutcomesOptions = {}): Promise<SessionOutcome[]> {
    const records = await this._store.query({ type: 'session_outcome', order: 'desc' })
    const outcomes = records
      .map(toOutcome)
      .filter((o): o is SessionOutcome => o !== null)
      .filter((o) => options.status === undefined || o.status === options.status)
    return options.limit !== undefined ? outcomes.slice(0, options.limit) : outcomes
  }

  async searchOutcomes(query: string, limit = 10): Promise<OutcomeSearchResult[]> {
    const outcomes = await this.listOutcomes()
    return outcomes
      .map((o) => ({ ...o, similarity: Math.round(statementSimilarity(query, o.statement) * 1000) / 1000 }))
      .filter((o) => o.similarity > 0)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, limit)
  }

  findSimilar(statement: string, options?: SimilarityOptions): Promise<SimilarityMatch[]> {
    return this._similarity.findSimilar(statement, options)
  }

  addPending(statement: string, note?: string): Promise<WriteReceipt> {
    return this._store.write(PENDING_OWNER, statement.trim(), {
      type: 'pending_idea',
      session_id: null,
      note: note ?? null,
    })
  }

  async listPending(): Promise<PendingIdea[]> {
    const records = await this._store.query({ type: 'pending_idea' })
    return records.map(toPendingIdea).filter((p): p is PendingIdea => p !== null)
  }

  async getInsights(query: string, limit = 3): Promise<SessionInsights[]> {
    const matches = await this.searchOutcomes(query, limit)
    const insights: SessionInsights[] = []
    for (const outcome of matches) {
      const records = await this._store.query({ session_id: outcome.session_id, type: 'stage_output' })
      insights.push({
        outcome,
        stages: records.map((r) => ({ stage: r.metadata.stage ?? r.owner_scope, content: r.content })),
      })
    }
    return insights
  }
}

export function createHistoryService(store: ContextStore, similarity: SimilaritySearch): HistoryService {
  return new StoreHistoryService(store, similarity)
}
