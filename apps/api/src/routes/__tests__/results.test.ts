import { describe, it, expect, vi, beforeEach } from 'vitest'
import * as XLSX from 'xlsx'

vi.mock('../../lib/sheets.js', () => ({
  getAllRecords: vi.fn(async () => []),
  appendRow: vi.fn(async () => {}),
}))

import { addEvaluation, addTeam, resetRecords } from '../../lib/records.js'
import { createApp } from '../../app.js'
import { createMockEvaluation, createMockTeam } from '../../test/factories.js'

const app = createApp('http://localhost:5173')

async function seed() {
  await addTeam(createMockTeam({ teamName: 'Atlas' }))
  await addTeam(createMockTeam({ teamName: 'Borealis' }))
  await addTeam(createMockTeam({ teamName: 'Cobalt' }))
  await addEvaluation(createMockEvaluation({ teamName: 'Borealis', novelty: 2, scalability: 2, socialImpact: 2, feasibility: 2 }))
  await addEvaluation(createMockEvaluation({ teamName: 'Atlas', novelty: 5, scalability: 5, socialImpact: 5, feasibility: 5 }))
  await addEvaluation(createMockEvaluation({ teamName: 'Atlas', novelty: 3, scalability: 3, socialImpact: 3, feasibility: 3 }))
}

describe('Result Routes', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    vi.spyOn(console, 'log').mockImplementation(() => {})
    resetRecords()
    delete process.env.SCORE_WEIGHTS
  })

  describe('GET /api/results', () => {
    it('returns an empty summary before any evaluation', async () => {
      const res = await app.request('/api/results')
      const data = await res.json() as { summary: unknown[]; maxTotalScore: number }

      expect(res.status).toBe(200)
      expect(data.summary).toEqual([])
      expect(data.maxTotalScore).toBe(20)
    })

    it('summarizes evaluated teams only', async () => {
      await seed()

      const res = await app.request('/api/results')
      const data = await res.json() as { summary: unknown[] }

      expect(data.summary).toEqual([
        { teamName: 'Atlas', novelty: 4, scalability: 4, socialImpact: 4, feasibility: 4, totalScore: 16 },
        { teamName: 'Borealis', novelty: 2, scalability: 2, socialImpact: 2, feasibility: 2, totalScore: 8 },
      ])
    })

    it('applies configured weights', async () => {
      process.env.SCORE_WEIGHTS = '{"novelty":2}'
      await seed()

      const res = await app.request('/api/results')
      const data = await res.json() as {
        weights: Record<string, number>
        maxTotalScore: number
        summary: Array<{ teamName: string; totalScore: number }>
      }

      expect(data.weights).toEqual({ novelty: 2, scalability: 1, socialImpact: 1, feasibility: 1 })
      expect(data.maxTotalScore).toBe(25)
      expect(data.summary[0]).toMatchObject({ teamName: 'Atlas', totalScore: 20 })
    })

    it('lists the criteria with their labels', async () => {
      const res = await app.request('/api/results')
      const data = await res.json() as { criteria: Array<{ key: string; label: string }> }

      expect(data.criteria.map(c => c.label)).toEqual([
        'Creativity & Innovation',
        'Technical Complexity',
        'Use Cases',
        'Impact on Society/Industry/Research',
      ])
    })
  })

  describe('GET /api/results/export.xlsx', () => {
    it('returns 404 before any evaluation', async () => {
      const res = await app.request('/api/results/export.xlsx')

      expect(res.status).toBe(404)
      expect(await res.json()).toEqual({ error: 'No evaluations available yet.' })
    })

    it('downloads the workbook', async () => {
      await seed()

      const res = await app.request('/api/results/export.xlsx')

      expect(res.status).toBe(200)
      expect(res.headers.get('Content-Type')).toBe(
        'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
      )
      expect(res.headers.get('Content-Disposition')).toBe('attachment; filename="competition_results.xlsx"')

      const workbook = XLSX.read(new Uint8Array(await res.arrayBuffer()), { type: 'array' })
      const finalScores = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets['Final Scores'])
      expect(finalScores.map(row => row['Team Name'])).toEqual(['Atlas', 'Borealis'])
      expect(XLSX.utils.sheet_to_json(workbook.Sheets['Raw Evaluations'])).toHaveLength(3)
    })
  })

  describe('GET /api/results/export.pdf', () => {
    it('returns 404 before any evaluation', async () => {
      const res = await app.request('/api/results/export.pdf')

      expect(res.status).toBe(404)
    })

    it('downloads the PDF', async () => {
      await seed()

      const res = await app.request('/api/results/export.pdf')
      const bytes = new Uint8Array(await res.arrayBuffer())

      expect(res.status).toBe(200)
      expect(res.headers.get('Content-Type')).toBe('application/pdf')
      expect(res.headers.get('Content-Disposition')).toBe('attachment; filename="competition_results.pdf"')
      expect(new TextDecoder().decode(bytes.subarray(0, 5))).toBe('%PDF-')
    })
  })
})
