import { DEFAULT_WEIGHTS } from '../config.js'
import {
  CRITERIA,
  MAX_SCORE,
  type CriterionScores,
  type Evaluation,
  type ScoreWeights,
  type ScoredEvaluation,
  type SummaryRow,
} from '../types.js'

/**
 * Weighted sum of the four criterion scores
 */
export function weightedTotal(scores: CriterionScores, weights: ScoreWeights = DEFAULT_WEIGHTS): number {
  return CRITERIA.reduce((total, { key }) => total + scores[key] * weights[key], 0)
}

/**
 * Highest total a team can reach, used as the chart's upper bound
 */
export function maxTotalScore(weights: ScoreWeights = DEFAULT_WEIGHTS): number {
  return CRITERIA.reduce((total, { key }) => total + MAX_SCORE * weights[key], 0)
}

export function scoreEvaluations(
  evaluations: Evaluation[],
  weights: ScoreWeights = DEFAULT_WEIGHTS
): ScoredEvaluation[] {
  return evaluations.map(evaluation => ({
    ...evaluation,
    totalScore: weightedTotal(evaluation, weights),
  }))
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Per-team mean of every criterion plus the weighted total of those means.
 * Teams without evaluations are absent; rows are ordered by team name.
 */
export function summarizeScores(
  evaluations: Evaluation[],
  weights: ScoreWeights = DEFAULT_WEIGHTS
): SummaryRow[] {
  const groups = new Map<string, { sums: CriterionScores; count: number }>()

  for (const evaluation of evaluations) {
    let group = groups.get(evaluation.teamName)
    if (!group) {
      group = { sums: { novelty: 0, scalability: 0, socialImpact: 0, feasibility: 0 }, count: 0 }
      groups.set(evaluation.teamName, group)
    }
    for (const { key } of CRITERIA) {
      group.sums[key] += evaluation[key]
    }
    group.count += 1
  }

  return [...groups.entries()]
    .sort(([a], [b]) => compareNames(a, b))
    .map(([teamName, { sums, count }]) => {
      const means: CriterionScores = {
        novelty: sums.novelty / count,
        scalability: sums.scalability / count,
        socialImpact: sums.socialImpact / count,
        feasibility: sums.feasibility / count,
      }
      return { teamName, ...means, totalScore: weightedTotal(means, weights) }
    })
}

export function formatScore(value: number): string {
  return value.toFixed(2)
}
