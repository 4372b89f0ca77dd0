/**
 * ScoringEngine: pure functions from criterion ratings to bucket scores,
 * combined score and verdict. No state, no I/O beyond a warning log when
 * clamping.
 *
 * Scores are kept exact; formatters round them for display. Comparisons
 * against a threshold or bar allow SCORE_EPSILON of floating-point noise, so
 * 6.0 * 0.6 + 6.0 * 0.4 still meets a 6.0 threshold.
 */

import { MissingScoreError, ScoreValidationError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import {
  MAX_SCORE,
  MIN_SCORE,
  PROBLEM_CRITERIA,
  PROBLEM_WEIGHT,
  SOLUTION_CRITERIA,
  SOLUTION_WEIGHT,
} from './criteria.js'
import type { Criterion, ProblemCriteria, ScoreBucket, SolutionCriteria } from './criteria.js'

const logger = createLogger('scoring')

/** `reject` raises on out-of-range ratings; `clamp` pulls them into [1, 10] with a warning */
export type OutOfRangePolicy = 'reject' | 'clamp'

export type Verdict = 'PASS' | 'FAIL'

export const SCORE_EPSILON = 1e-9

/**
 * Validate one rating.
 * @throws {ScoreValidationError} for non-numbers, and for out-of-range values under `reject`
 */
export function validateCriterion(criterion: string, value: unknown, policy: OutOfRangePolicy = 'reject'): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ScoreValidationError(criterion, value)
  }
  if (value >= MIN_SCORE && value <= MAX_SCORE) {
    return value
  }
  if (policy === 'reject') {
    throw new ScoreValidationError(criterion, value)
  }
  const clamped = Math.min(MAX_SCORE, Math.max(MIN_SCORE, value))
  logger.warn({ criterion, value, clamped }, 'Criterion score out of range, clamped')
  return clamped
}

function mean(criteria: readonly Criterion[], ratings: Readonly<Record<string, number>>, policy: OutOfRangePolicy): number {
  let total = 0
  for (const criterion of criteria) {
    total += validateCriterion(criterion, ratings[criterion], policy)
  }
  return total / criteria.length
}

/** Arithmetic mean of the four problem criteria */
export function scoreProblem(criteria: ProblemCriteria, policy: OutOfRangePolicy = 'reject'): number {
  return mean(PROBLEM_CRITERIA, criteria, policy)
}

/** Arithmetic mean of the four solution criteria */
export function scoreSolution(criteria: SolutionCriteria, policy: OutOfRangePolicy = 'reject'): number {
  return mean(SOLUTION_CRITERIA, criteria, policy)
}

/**
 * `problem * 0.6 + solution * 0.4`, or `problem * 0.6` when the solution
 * phase did not run.
 */
export function combineScores(problem: number, solution: number | null): number {
  return problem * PROBLEM_WEIGHT + (solution !== null ? solution * SOLUTION_WEIGHT : 0)
}

/** PASS iff combined >= threshold */
export function decideVerdict(combined: number, threshold: number): Verdict {
  return combined >= threshold - SCORE_EPSILON ? 'PASS' : 'FAIL'
}

/** Early-elimination decision point after the problem phase */
export function shouldEliminate(problemScore: number, eliminationBar: number): boolean {
  return problemScore < eliminationBar - SCORE_EPSILON
}

/**
 * Assemble a full bucket from per-stage score maps. Later stages never
 * override a rating already reported by an earlier one.
 *
 * @throws {MissingScoreError} when any criterion of the bucket is absent
 */
export function collectCriteria(bucket: 'problem', sources: Array<Readonly<Record<string, number>>>): ProblemCriteria
export function collectCriteria(bucket: 'solution', sources: Array<Readonly<Record<string, number>>>): SolutionCriteria
export function collectCriteria(
  bucket: ScoreBucket,
  sources: Array<Readonly<Record<string, number>>>
): ProblemCriteria | SolutionCriteria {
  const found = new Map<string, number>()
  for (const scores of sources) {
    for (const [name, value] of Object.entries(scores)) {
      if (!found.has(name)) found.set(name, value)
    }
  }

  const pick = (name: string): number | undefined => found.get(name)

  if (bucket === 'problem') {
    const [severity, marketSize, wtp, solutionFit] = PROBLEM_CRITERIA.map(pick)
    const missing = PROBLEM_CRITERIA.filter((c) => !found.has(c))
    if (severity === undefined || marketSize === undefined || wtp === undefined || solutionFit === undefined) {
      throw new MissingScoreError(bucket, missing)
    }
    return { severity, market_size: marketSize, wtp, solution_fit: solutionFit }
  }

  const [technical, competitive, resources, timeToMarket] = SOLUTION_CRITERIA.map(pick)
  const missing = SOLUTION_CRITERIA.filter((c) => !found.has(c))
  if (technical === undefined || competitive === undefined || resources === undefined || timeToMarket === undefined) {
    throw new MissingScoreError(bucket, missing)
  }
  return {
    technical_viability: technical,
    competitive_advantage: competitive,
    resource_requirements: resources,
    time_to_market: timeToMarket,
  }
}
