import { createRoute, z } from '@hono/zod-openapi'
import type { RouteHandler } from '@hono/zod-openapi'

export const rootRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['meta'],
  responses: {
    200: {
      content: {
        'application/json': {
          schema: z.object({
            message: z.string(),
            query_parameters: z.object({
              page: z.string(),
              pages: z.string(),
              spotlight: z.string(),
              cursor: z.string()
            }),
            endpoints: z.record(z.string(), z.string())
          })
        }
      },
      description: 'API information and available endpoints'
    }
  }
})

export const rootHandler: RouteHandler<typeof rootRoute> = (c) => {
  return c.json(
    {
      message: 'osu! Rankings API',
      query_parameters: {
        page: 'Ranking page to start from - default: first page',
        pages: 'Number of consecutive ranking pages to fetch (1-5) - default: 1',
        spotlight: 'Spotlight id for chart rankings - default: latest',
        cursor: 'News continuation token taken from meta.nextCursor'
      },
      endpoints: {
        'GET /v1/status': 'Service health and osu! token cache state',
        'GET /v1/rankings/:mode/:type': 'Performance, score or country rankings for a game mode',
        'GET /v1/rankings/:mode/charts': 'Spotlight chart rankings for a game mode',
        'GET /v1/news': 'osu! news posts',
        'GET /v1/swagger': 'Interactive API documentation'
      }
    },
    200
  )
}
