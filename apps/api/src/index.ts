import { serve } from '@hono/node-server'
import { getConfig } from './config.js'
import { createApp } from './app.js'
import { loadRecords } from './lib/records.js'

const config = getConfig()

await loadRecords()

serve({ fetch: createApp(config.corsOrigin).fetch, port: config.port }, (info) => {
  console.log(`[API] Listening on http://localhost:${info.port}`)
})
