import { describe, it, expect, vi, beforeEach } from 'vitest'

vi.mock('../../lib/sheets.js', () => ({
  getAllRecords: vi.fn(async () => []),
  appendRow: vi.fn(async () => {}),
}))

import { appendRow } from '../../lib/sheets.js'
import { addTeam, listEvaluations, resetRecords } from '../../lib/records.js'
import { createApp } from '../../app.js'
import { createMockTeam } from '../../test/factories.js'

const app = createApp('http://localhost:5173')

const scores = { novelty: 5, scalability: 4, socialImpact: 3, feasibility: 2 }

function postEvaluation(body: unknown): Response | Promise<Response> {
  return app.request('/api/evaluations', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  })
}

describe('Evaluation Routes', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    resetRecords()
  })

  describe('POST /api/evaluations', () => {
    it('asks for teams first when none are registered', async () => {
      const res = await postEvaluation({ teamName: 'Atlas', ...scores })

      expect(res.status).toBe(409)
      expect(await res.json()).toEqual({ error: 'Please add teams first.' })
      expect(appendRow).not.toHaveBeenCalled()
    })

    it('records an evaluation', async () => {
      await addTeam(createMockTeam({ teamName: 'Atlas' }))

      const res = await postEvaluation({ teamName: 'Atlas', ...scores })

      expect(res.status).toBe(201)
      expect(await res.json()).toEqual({ teamName: 'Atlas', ...scores })
      expect(appendRow).toHaveBeenLastCalledWith('evaluations', ['Atlas', 5, 4, 3, 2])
      expect(listEvaluations()).toHaveLength(1)
    })

    it('rejects scores outside 1-5', async () => {
      await addTeam(createMockTeam({ teamName: 'Atlas' }))

      const res = await postEvaluation({ teamName: 'Atlas', ...scores, feasibility: 6 })

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'Scores must be whole numbers from 1 to 5.' })
      expect(listEvaluations()).toEqual([])
    })

    it('rejects fractional scores', async () => {
      await addTeam(createMockTeam({ teamName: 'Atlas' }))

      const res = await postEvaluation({ teamName: 'Atlas', ...scores, novelty: 2.5 })

      expect(res.status).toBe(400)
    })

    it('answers 502 when the worksheet write fails', async () => {
      await addTeam(createMockTeam({ teamName: 'Atlas' }))
      vi.mocked(appendRow).mockRejectedValueOnce(new Error('Quota exceeded'))

      const res = await postEvaluation({ teamName: 'Atlas', ...scores })

      expect(res.status).toBe(502)
      expect(await res.json()).toEqual({ error: 'Could not save the evaluation to the spreadsheet.' })
      expect(listEvaluations()).toEqual([])
    })

    it('rejects a missing criterion', async () => {
      const res = await postEvaluation({ teamName: 'Atlas', novelty: 3, scalability: 3, socialImpact: 3 })

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'Every criterion needs a score.' })
    })
  })

  describe('GET /api/evaluations', () => {
    it('returns evaluations in submission order', async () => {
      await addTeam(createMockTeam({ teamName: 'Atlas' }))
      await postEvaluation({ teamName: 'Atlas', ...scores, novelty: 1 })
      await postEvaluation({ teamName: 'Atlas', ...scores, novelty: 2 })

      const res = await app.request('/api/evaluations')
      const data = await res.json() as Array<{ novelty: number }>

      expect(data.map(e => e.novelty)).toEqual([1, 2])
    })
  })
})
