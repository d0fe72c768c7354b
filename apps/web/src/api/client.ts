const API_BASE = import.meta.env.VITE_API_URL ?? ''

/**
 * Scoring criteria (mirrors the API's CRITERIA)
 */
export const CRITERIA = [
  { key: 'novelty', column: 'Novelty', label: 'Creativity & Innovation' },
  { key: 'scalability', column: 'Scalability', label: 'Technical Complexity' },
  { key: 'socialImpact', column: 'Social Impact', label: 'Use Cases' },
  { key: 'feasibility', column: 'Feasibility', label: 'Impact on Society/Industry/Research' },
] as const
export type Criterion = (typeof CRITERIA)[number]
export type CriterionKey = Criterion['key']
export type CriterionScores = Record<CriterionKey, number>

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

export interface Results {
  criteria: Array<{ key: CriterionKey; column: string; label: string }>
  weights: CriterionScores
  maxTotalScore: number
  summary: SummaryRow[]
}

export type ExportFormat = 'xlsx' | 'pdf'

export class ApiError extends Error {
  constructor(message: string, readonly status: number) {
    super(message)
    this.name = 'ApiError'
  }
}

async function request<T>(path: string, init?: RequestInit): Promise<T> {
  const res = await fetch(`${API_BASE}${path}`, {
    ...init,
    headers: { 'Content-Type': 'application/json' },
  })

  if (!res.ok) {
    const body: unknown = await res.json().catch(() => null)
    const message =
      body && typeof body === 'object' && 'error' in body && typeof body.error === 'string'
        ? body.error
        : `Request failed (${res.status})`
    throw new ApiError(message, res.status)
  }

  return res.json()
}

export function getTeams(): Promise<Team[]> {
  return request<Team[]>('/api/teams')
}

export function createTeam(data: { teamName: string; teamSize: number; description: string }): Promise<Team> {
  return request<Team>('/api/teams', { method: 'POST', body: JSON.stringify(data) })
}

export function submitEvaluation(data: Evaluation): Promise<Evaluation> {
  return request<Evaluation>('/api/evaluations', { method: 'POST', body: JSON.stringify(data) })
}

export function getResults(): Promise<Results> {
  return request<Results>('/api/results')
}

export function exportUrl(format: ExportFormat): string {
  return `${API_BASE}/api/results/export.${format}`
}
