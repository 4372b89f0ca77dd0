export { StoreHistoryService, createHistoryService, PENDING_OWNER } from './history-service.js'
export type {
  HistoryService,
  ListOutcomesOptions,
  OutcomeSearchResult,
  SessionInsights,
  StageInsight,
} from './history-service.js'
export { OutcomeMetadataSchema, outcomeMetadata, toOutcome, toPendingIdea } from './outcome-record.js'
export type { OutcomeMetadata, PendingIdea, SessionOutcome } from './outcome-record.js'
