/**
 * Score criteria. Every criterion is rated 1-10 and weighs 25% of its bucket.
 */

export const PROBLEM_CRITERIA = ['severity', 'market_size', 'wtp', 'solution_fit'] as const
export const SOLUTION_CRITERIA = [
  'technical_viability',
  'competitive_advantage',
  'resource_requirements',
  'time_to_market',
] as const

export type ProblemCriterion = (typeof PROBLEM_CRITERIA)[number]
export type SolutionCriterion = (typeof SOLUTION_CRITERIA)[number]
export type Criterion = ProblemCriterion | SolutionCriterion

export type ProblemCriteria = Record<ProblemCriterion, number>
export type SolutionCriteria = Record<SolutionCriterion, number>

export type ScoreBucket = 'problem' | 'solution'

export const BUCKET_CRITERIA: Readonly<Record<ScoreBucket, readonly Criterion[]>> = {
  problem: PROBLEM_CRITERIA,
  solution: SOLUTION_CRITERIA,
}

export const PROBLEM_WEIGHT = 0.6
export const SOLUTION_WEIGHT = 0.4

export const MIN_SCORE = 1
export const MAX_SCORE = 10

export const ALL_CRITERIA: readonly Criterion[] = [...PROBLEM_CRITERIA, ...SOLUTION_CRITERIA]

export function isCriterion(name: string): name is Criterion {
  return ALL_CRITERIA.some((c) => c === name)
}

export function bucketOf(criterion: Criterion): ScoreBucket {
  return PROBLEM_CRITERIA.some((c) => c === criterion) ? 'problem' : 'solution'
}
