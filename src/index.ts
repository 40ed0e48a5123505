import { OpenAPIHono } from '@hono/zod-openapi'
import { swaggerUI } from '@hono/swagger-ui'
import { rootRoute, rootHandler } from './routes/root'
import { createV1App } from './v1'

const app = new OpenAPIHono()

app.openapi(rootRoute, rootHandler)

const v1App = createV1App()
app.route('/v1', v1App)

app.doc('/doc', {
  openapi: '3.0.0',
  info: {
    version: '1.0.0',
    title: 'osu! Rankings API',
    description: 'API for browsing osu! rankings and news through the osu! API v2'
  },
  tags: [
    {
      name: 'meta',
      description: 'Service information'
    }
  ]
})

app.get('/swagger', swaggerUI({ url: '/doc' }))
app.get(
  '/v1/swagger',
  swaggerUI({
    url: '/v1/doc',
    layout: 'BaseLayout',
    plugins: ['SwaggerUIBundle.plugins.TagGroupedLayout']
  })
)

export default app
