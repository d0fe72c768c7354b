import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { logger } from 'hono/logger'
import teamRoutes from './routes/teams.js'
import evaluationRoutes from './routes/evaluations.js'
import resultRoutes from './routes/results.js'

export function createApp(corsOrigin: string) {
  const app = new Hono()

  app.use('*', logger())
  app.use('/api/*', cors({ origin: corsOrigin }))

  app.get('/health', (c) => c.json({ status: 'ok' }))

  app.route('/api/teams', teamRoutes)
  app.route('/api/evaluations', evaluationRoutes)
  app.route('/api/results', resultRoutes)

  app.notFound((c) => c.json({ error: 'Not found' }, 404))

  app.onError((error, c) => {
    console.error(`[API] Unhandled error on ${c.req.method} ${c.req.path}:`, error)
    return c.json({ error: 'Internal server error' }, 500)
  })

  return app
}
