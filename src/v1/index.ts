import { OpenAPIHono } from '@hono/zod-openapi'
import { createOsuClient } from './services/osu-client'
import { createRankingsService } from './services/rankings-service'
import { createNewsService } from './services/news-service'
import { createNextPageDispatcher } from './services/next-page-dispatcher'
import { registerStatusRoutes } from './routes/status'
import { registerRankingsRoutes } from './routes/rankings'
import { registerNewsRoutes } from './routes/news'

export function createV1App() {
  const app = new OpenAPIHono()

  const osuClient = createOsuClient()
  const rankingsService = createRankingsService(osuClient)
  const newsService = createNewsService(osuClient)
  const dispatcher = createNextPageDispatcher({ rankingsService, newsService })

  app.doc('/doc', {
    openapi: '3.1.0',
    info: {
      title: 'osu! Rankings API v1',
      version: '1.0.0',
      description:
        'Wraps the osu! API v2 ranking and news endpoints and follows their cursors for you.'
    },
    tags: [
      { name: 'meta', description: 'Service metadata and status endpoints' },
      {
        name: 'rankings',
        description: 'Performance, score, country and spotlight chart rankings'
      },
      { name: 'news', description: 'News listing with continuation cursors' }
    ],
    'x-tagGroups': [
      {
        name: 'Meta',
        tags: ['meta']
      },
      {
        name: 'Rankings',
        tags: ['rankings', 'news']
      }
    ]
  })

  registerStatusRoutes(app, { osuClient })
  registerRankingsRoutes(app, { rankingsService, dispatcher })
  registerNewsRoutes(app, { newsService })

  return app
}
