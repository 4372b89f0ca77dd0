export { StoreSimilaritySearch, DEFAULT_SIMILARITY_LIMIT, DEFAULT_SIMILARITY_THRESHOLD } from './similarity-search.js'
export type { SimilaritySearch, SimilarityMatch, SimilarityOptions } from './similarity-search.js'
export { statementSimilarity, keywords } from './text-similarity.js'
