import { Hono } from 'hono'
import { getConfig } from '../config.js'
import { listEvaluations } from '../lib/records.js'
import { maxTotalScore, scoreEvaluations, summarizeScores } from '../lib/scoring.js'
import { buildResultsWorkbook, workbookToArrayBuffer, WORKBOOK_FILE_NAME } from '../lib/export/xlsx.js'
import { PDF_FILE_NAME, renderResultsPdf } from '../lib/export/pdf.js'
import { CRITERIA } from '../types.js'

const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
const NO_EVALUATIONS = 'No evaluations available yet.'

const app = new Hono()

// GET /api/results - Per-team averages
app.get('/', (c) => {
  const { weights } = getConfig()
  return c.json({
    criteria: CRITERIA,
    weights,
    maxTotalScore: maxTotalScore(weights),
    summary: summarizeScores(listEvaluations(), weights),
  })
})

// GET /api/results/export.xlsx - Raw evaluations + final scores workbook
app.get('/export.xlsx', (c) => {
  const evaluations = listEvaluations()
  if (evaluations.length === 0) {
    return c.json({ error: NO_EVALUATIONS }, 404)
  }

  const { weights } = getConfig()
  const workbook = buildResultsWorkbook(
    scoreEvaluations(evaluations, weights),
    summarizeScores(evaluations, weights)
  )
  const data = workbookToArrayBuffer(workbook)
  console.log(`[API] Workbook exported (${data.byteLength} bytes)`)

  return c.body(data, 200, {
    'Content-Type': XLSX_MIME,
    'Content-Disposition': `attachment; filename="${WORKBOOK_FILE_NAME}"`,
  })
})

// GET /api/results/export.pdf - One "team — score" line per team
app.get('/export.pdf', (c) => {
  const evaluations = listEvaluations()
  if (evaluations.length === 0) {
    return c.json({ error: NO_EVALUATIONS }, 404)
  }

  const data = renderResultsPdf(summarizeScores(evaluations, getConfig().weights))
  console.log(`[API] PDF exported (${data.byteLength} bytes)`)

  return c.body(data, 200, {
    'Content-Type': 'application/pdf',
    'Content-Disposition': `attachment; filename="${PDF_FILE_NAME}"`,
  })
})

export default app
