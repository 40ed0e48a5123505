import { createRoute, z } from '@hono/zod-openapi'
import type { OpenAPIHono } from '@hono/zod-openapi'
import { ok, handleError } from '../utils/http'
import type { OsuClient } from '../services/osu-client'

const StatusResponseSchema = z.object({
  data: z.object({
    status: z.literal('ok'),
    timestamp: z.string(),
    uptimeSeconds: z.number(),
    dependencies: z.object({
      osu: z.object({
        tokenCached: z.boolean(),
        expiresAt: z.string().nullable()
      })
    })
  })
})

const statusRoute = createRoute({
  method: 'get',
  path: '/status',
  tags: ['meta'],
  responses: {
    200: {
      description: 'Service health',
      content: {
        'application/json': {
          schema: StatusResponseSchema
        }
      }
    },
    500: {
      description: 'Server error'
    }
  }
})

export interface StatusRouteDeps {
  osuClient: Pick<OsuClient, 'getTokenCacheMeta'>
}

export function registerStatusRoutes(app: OpenAPIHono, deps: StatusRouteDeps) {
  app.openapi(statusRoute, (c) => {
    try {
      const tokenMeta = deps.osuClient.getTokenCacheMeta()
      const expiresAt = tokenMeta?.expiresAt ? new Date(tokenMeta.expiresAt).toISOString() : null

      return ok(c, {
        data: {
          status: 'ok',
          timestamp: new Date().toISOString(),
          uptimeSeconds: process.uptime(),
          dependencies: {
            osu: {
              tokenCached: tokenMeta !== null,
              expiresAt
            }
          }
        }
      })
    } catch (error) {
      return handleError(c, error)
    }
  })
}
