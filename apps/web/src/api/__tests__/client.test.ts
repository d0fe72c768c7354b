import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { ApiError, createTeam, exportUrl, getResults, submitEvaluation } from '../client'

const mockFetch = vi.fn()

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

describe('api client', () => {
  beforeEach(() => {
    mockFetch.mockReset()
    vi.stubGlobal('fetch', mockFetch)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('posts a new team as JSON', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ teamName: 'Atlas', teamSize: 4, description: '' }, 201))

    const team = await createTeam({ teamName: 'Atlas', teamSize: 4, description: '' })

    expect(team.teamName).toBe('Atlas')
    expect(mockFetch).toHaveBeenCalledWith('/api/teams', {
      method: 'POST',
      body: JSON.stringify({ teamName: 'Atlas', teamSize: 4, description: '' }),
      headers: { 'Content-Type': 'application/json' },
    })
  })

  it('surfaces the API error message', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'Team name is required.' }, 400))

    const error = await createTeam({ teamName: '', teamSize: 1, description: '' }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ApiError)
    expect(error).toMatchObject({ message: 'Team name is required.', status: 400 })
  })

  it('falls back to the status when the error body is not JSON', async () => {
    mockFetch.mockResolvedValueOnce(new Response('Bad Gateway', { status: 502 }))

    await expect(
      submitEvaluation({ teamName: 'Atlas', novelty: 1, scalability: 1, socialImpact: 1, feasibility: 1 })
    ).rejects.toThrow('Request failed (502)')
  })

  it('loads results', async () => {
    const results = { criteria: [], weights: {}, maxTotalScore: 20, summary: [] }
    mockFetch.mockResolvedValueOnce(jsonResponse(results))

    await expect(getResults()).resolves.toEqual(results)
    expect(mockFetch).toHaveBeenCalledWith('/api/results', { headers: { 'Content-Type': 'application/json' } })
  })

  it('builds export download URLs', () => {
    expect(exportUrl('xlsx')).toBe('/api/results/export.xlsx')
    expect(exportUrl('pdf')).toBe('/api/results/export.pdf')
  })
})
