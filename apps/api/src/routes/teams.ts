import { Hono } from 'hono'
import { zValidator } from '@hono/zod-validator'
import { addTeam, listTeams, RecordError } from '../lib/records.js'
import { TeamInputSchema } from '../types.js'
import { firstIssue } from './validation.js'

const app = new Hono()

// GET /api/teams - Registered teams in registration order
app.get('/', (c) => {
  return c.json(listTeams())
})

// POST /api/teams - Register a team
app.post('/', zValidator('json', TeamInputSchema, firstIssue), async (c) => {
  const body = c.req.valid('json')

  try {
    const team = await addTeam(body)
    return c.json(team, 201)
  } catch (error) {
    if (error instanceof RecordError) {
      return c.json({ error: error.message }, error.status)
    }
    console.error('[API] Error saving team:', error)
    return c.json({ error: 'Could not save the team to the spreadsheet.' }, 502)
  }
})

export default app
