export * from './criteria.js'
export {
  validateCriterion,
  scoreProblem,
  scoreSolution,
  combineScores,
  decideVerdict,
  shouldEliminate,
  collectCriteria,
  SCORE_EPSILON,
} from './scoring-engine.js'
export type { OutOfRangePolicy } from './scoring-engine.js'
