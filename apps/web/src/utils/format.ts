/**
 * Scores are stored unrounded; two decimals at display time only.
 */
export function formatScore(value: number): string {
  return value.toFixed(2)
}

export const SCORE_OPTIONS = [1, 2, 3, 4, 5] as const

export const TEAM_SIZE = { min: 1, max: 20 } as const

export function clampTeamSize(value: number): number {
  if (Number.isNaN(value)) return TEAM_SIZE.min
  return Math.min(TEAM_SIZE.max, Math.max(TEAM_SIZE.min, Math.round(value)))
}
