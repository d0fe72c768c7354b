import { z } from 'zod'

// Scoring criteria, in spreadsheet column order
export const CRITERIA = [
  { key: 'novelty', column: 'Novelty', label: 'Creativity & Innovation' },
  { key: 'scalability', column: 'Scalability', label: 'Technical Complexity' },
  { key: 'socialImpact', column: 'Social Impact', label: 'Use Cases' },
  { key: 'feasibility', column: 'Feasibility', label: 'Impact on Society/Industry/Research' },
] as const
export type Criterion = (typeof CRITERIA)[number]
export type CriterionKey = Criterion['key']

export const MIN_SCORE = 1
export const MAX_SCORE = 5
export const MIN_TEAM_SIZE = 1
export const MAX_TEAM_SIZE = 20

export type CriterionScores = Record<CriterionKey, number>
export type ScoreWeights = Record<CriterionKey, number>

export interface Team {
  teamName: string
  teamSize: number
  description: string
}

export interface Evaluation extends CriterionScores {
  teamName: string
}

export interface SummaryRow extends CriterionScores {
  teamName: string
  totalScore: number
}

export interface ScoredEvaluation extends Evaluation {
  totalScore: number
}

export const TOTAL_SCORE_COLUMN = 'Total Score'

// Cells come back from the sheet unformatted; blank cells are ''
const blankToUndefined = (value: unknown) => (value === '' || value === null ? undefined : value)

const sheetText = z.union([z.string(), z.number()]).transform(String)
const sheetNumber = z.preprocess(blankToUndefined, z.coerce.number())

export const TeamRowSchema = z
  .object({
    'Team Name': z.preprocess(blankToUndefined, sheetText.pipe(z.string().trim().min(1))),
    'Team Size': sheetNumber,
    'Description': sheetText.default(''),
  })
  .transform((row): Team => ({
    teamName: row['Team Name'],
    teamSize: row['Team Size'],
    description: row['Description'],
  }))

export const EvaluationRowSchema = z
  .object({
    'Team Name': z.preprocess(blankToUndefined, sheetText),
    'Novelty': sheetNumber,
    'Scalability': sheetNumber,
    'Social Impact': sheetNumber,
    'Feasibility': sheetNumber,
  })
  .transform((row): Evaluation => ({
    teamName: row['Team Name'],
    novelty: row['Novelty'],
    scalability: row['Scalability'],
    socialImpact: row['Social Impact'],
    feasibility: row['Feasibility'],
  }))

const SCORE_RANGE = `Scores must be whole numbers from ${MIN_SCORE} to ${MAX_SCORE}.`
const TEAM_SIZE_RANGE = `Team size must be a whole number from ${MIN_TEAM_SIZE} to ${MAX_TEAM_SIZE}.`

const ScoreSchema = z
  .number({ required_error: 'Every criterion needs a score.', invalid_type_error: SCORE_RANGE })
  .int(SCORE_RANGE)
  .min(MIN_SCORE, SCORE_RANGE)
  .max(MAX_SCORE, SCORE_RANGE)

export const TeamInputSchema = z.object({
  teamName: z.string({ required_error: 'Team name is required.' }),
  teamSize: z
    .number({ invalid_type_error: TEAM_SIZE_RANGE })
    .int(TEAM_SIZE_RANGE)
    .min(MIN_TEAM_SIZE, TEAM_SIZE_RANGE)
    .max(MAX_TEAM_SIZE, TEAM_SIZE_RANGE)
    .default(MIN_TEAM_SIZE),
  description: z.string().default(''),
})

export const EvaluationInputSchema = z.object({
  teamName: z.string({ required_error: 'Select a team.' }).min(1, 'Select a team.'),
  novelty: ScoreSchema,
  scalability: ScoreSchema,
  socialImpact: ScoreSchema,
  feasibility: ScoreSchema,
})
