import { z } from 'zod'
import { CRITERIA, type ScoreWeights } from './types.js'

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  // Google service account + target spreadsheet
  GOOGLE_SERVICE_ACCOUNT_EMAIL: z.string().min(1).optional(),
  GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY: z.string().min(1).optional(),
  GOOGLE_SHEETS_SPREADSHEET_ID: z.string().min(1).optional(),
  TEAMS_WORKSHEET: z.string().min(1).default('participants'),
  EVALUATIONS_WORKSHEET: z.string().min(1).default('evaluations'),

  // JSON object, e.g. {"novelty":2}; missing criteria weigh 1.0
  SCORE_WEIGHTS: z.string().optional(),
})

const weightsSchema = z
  .object({
    novelty: z.number(),
    scalability: z.number(),
    socialImpact: z.number(),
    feasibility: z.number(),
  })
  .partial()
  .strict()

export const DEFAULT_WEIGHTS: ScoreWeights = {
  novelty: 1.0,
  scalability: 1.0,
  socialImpact: 1.0,
  feasibility: 1.0,
}

export interface Config {
  port: number
  corsOrigin: string
  google: {
    serviceAccountEmail: string | null
    privateKey: string | null
    spreadsheetId: string | null
  }
  teamsWorksheet: string
  evaluationsWorksheet: string
  weights: ScoreWeights
}

function parseWeights(raw: string | undefined): ScoreWeights {
  if (!raw) return { ...DEFAULT_WEIGHTS }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    throw new Error('SCORE_WEIGHTS must be a JSON object')
  }

  const parsed = weightsSchema.safeParse(json)
  if (!parsed.success) {
    const allowed = CRITERIA.map(c => c.key).join(', ')
    throw new Error(`SCORE_WEIGHTS must map criteria (${allowed}) to numbers`)
  }
  const weights = { ...DEFAULT_WEIGHTS }
  for (const { key } of CRITERIA) {
    const weight = parsed.data[key]
    if (weight !== undefined) weights[key] = weight
  }
  return weights
}

/**
 * Read configuration from the environment.
 * Parsed on every call so tests can change process.env between cases.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    console.error('[CONFIG] Invalid environment variables:', parsed.error.flatten().fieldErrors)
    throw new Error('Invalid environment variables')
  }
  const vars = parsed.data

  return {
    port: vars.PORT,
    corsOrigin: vars.CORS_ORIGIN,
    google: {
      serviceAccountEmail: vars.GOOGLE_SERVICE_ACCOUNT_EMAIL ?? null,
      // Keys pasted into .env files usually carry literal "\n"
      privateKey: vars.GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY?.replace(/\\n/g, '\n') ?? null,
      spreadsheetId: vars.GOOGLE_SHEETS_SPREADSHEET_ID ?? null,
    },
    teamsWorksheet: vars.TEAMS_WORKSHEET,
    evaluationsWorksheet: vars.EVALUATIONS_WORKSHEET,
    weights: parseWeights(vars.SCORE_WEIGHTS),
  }
}
