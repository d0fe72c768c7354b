import type { z } from 'zod'
import { getConfig } from '../config.js'
import {
  EvaluationRowSchema,
  TeamRowSchema,
  type Evaluation,
  type Team,
} from '../types.js'
import { appendRow, getAllRecords } from './sheets.js'

/**
 * In-memory copy of the two worksheets.
 * Loaded once at startup; every submission is appended to the sheet and then here.
 */

export class RecordError extends Error {
  constructor(message: string, readonly status: 400 | 409) {
    super(message)
    this.name = 'RecordError'
  }
}

const teams: Team[] = []
const evaluations: Evaluation[] = []
// Names whose worksheet append is still in flight
const pendingNames = new Set<string>()

async function loadWorksheet<T>(
  worksheet: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T[]> {
  try {
    const records = await getAllRecords(worksheet)
    const rows: T[] = []

    records.forEach((record, index) => {
      const parsed = schema.safeParse(record)
      if (parsed.success) {
        rows.push(parsed.data)
      } else {
        // +2: header row, 1-based sheet rows
        console.warn(`[RECORDS] Skipping row ${index + 2} of "${worksheet}":`, parsed.error.issues[0]?.message)
      }
    })

    return rows
  } catch (error) {
    console.warn(
      `[RECORDS] Could not load "${worksheet}", starting empty:`,
      error instanceof Error ? error.message : error
    )
    return []
  }
}

export async function loadRecords(): Promise<void> {
  const config = getConfig()

  const [loadedTeams, loadedEvaluations] = await Promise.all([
    loadWorksheet(config.teamsWorksheet, TeamRowSchema),
    loadWorksheet(config.evaluationsWorksheet, EvaluationRowSchema),
  ])

  teams.splice(0, teams.length, ...loadedTeams)
  evaluations.splice(0, evaluations.length, ...loadedEvaluations)

  console.log(`[RECORDS] Loaded ${teams.length} teams and ${evaluations.length} evaluations`)
}

export function resetRecords(): void {
  teams.length = 0
  evaluations.length = 0
  pendingNames.clear()
}

export function listTeams(): Team[] {
  return [...teams]
}

export function listEvaluations(): Evaluation[] {
  return [...evaluations]
}

export async function addTeam(input: Team): Promise<Team> {
  const teamName = input.teamName.trim()
  if (!teamName) {
    throw new RecordError('Team name is required.', 400)
  }
  if (pendingNames.has(teamName) || teams.some(team => team.teamName === teamName)) {
    throw new RecordError(`Team "${teamName}" is already registered.`, 409)
  }

  const team: Team = { teamName, teamSize: input.teamSize, description: input.description }
  pendingNames.add(teamName)
  try {
    await appendRow(getConfig().teamsWorksheet, [team.teamName, team.teamSize, team.description])
    teams.push(team)
  } finally {
    pendingNames.delete(teamName)
  }

  console.log(`[RECORDS] Team added: ${team.teamName}`)
  return team
}

export async function addEvaluation(input: Evaluation): Promise<Evaluation> {
  if (teams.length === 0) {
    throw new RecordError('Please add teams first.', 409)
  }

  const evaluation: Evaluation = {
    teamName: input.teamName,
    novelty: input.novelty,
    scalability: input.scalability,
    socialImpact: input.socialImpact,
    feasibility: input.feasibility,
  }
  await appendRow(getConfig().evaluationsWorksheet, [
    evaluation.teamName,
    evaluation.novelty,
    evaluation.scalability,
    evaluation.socialImpact,
    evaluation.feasibility,
  ])
  evaluations.push(evaluation)

  console.log(`[RECORDS] Evaluation added for ${evaluation.teamName}`)
  return evaluation
}
