import { serve } from '@hono/node-server'
import app from './index'

const port = Number(process.env.PORT) || 3000

serve({ fetch: app.fetch, port }, (info) => {
  console.log(`osu! Rankings API listening on http://localhost:${info.port}`)
})
