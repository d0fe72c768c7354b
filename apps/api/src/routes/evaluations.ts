import { Hono } from 'hono'
import { zValidator } from '@hono/zod-validator'
import { addEvaluation, listEvaluations, RecordError } from '../lib/records.js'
import { EvaluationInputSchema } from '../types.js'
import { firstIssue } from './validation.js'

const app = new Hono()

// GET /api/evaluations - Submitted evaluations in submission order
app.get('/', (c) => {
  return c.json(listEvaluations())
})

// POST /api/evaluations - Submit one judge's scores for a team
app.post('/', zValidator('json', EvaluationInputSchema, firstIssue), async (c) => {
  const body = c.req.valid('json')

  try {
    const evaluation = await addEvaluation(body)
    return c.json(evaluation, 201)
  } catch (error) {
    if (error instanceof RecordError) {
      return c.json({ error: error.message }, error.status)
    }
    console.error('[API] Error saving evaluation:', error)
    return c.json({ error: 'Could not save the evaluation to the spreadsheet.' }, 502)
  }
})

export default app
