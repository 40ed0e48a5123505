import { createRoute, z } from '@hono/zod-openapi'
import type { OpenAPIHono } from '@hono/zod-openapi'
import type { NewsService } from '../services/news-service'
import { encodeNewsPost } from '../models/news'
import { hasMore } from '../models/result-page'
import { OpaqueCursor } from '../utils/rankings-cursor'
import { ok, handleError } from '../utils/http'

const NewsPostSchema = z.object({
  id: z.number(),
  author: z.string(),
  edit_url: z.string(),
  first_image: z.string(),
  published_at: z.string(),
  updated_at: z.string().optional(),
  slug: z.string(),
  title: z.string(),
  preview: z.string().optional()
})

const NewsResponseSchema = z.object({
  data: z.object({
    posts: z.array(NewsPostSchema)
  }),
  meta: z.object({
    returned: z.number(),
    limit: z.number(),
    hasMore: z.boolean(),
    nextCursor: z.string().nullable(),
    sidebar: z.object({
      currentYear: z.number(),
      years: z.array(z.number())
    })
  })
})

const NewsRoute = createRoute({
  method: 'get',
  path: '/news',
  tags: ['news'],
  summary: 'News listing',
  description:
    'Returns osu! news posts, newest first. Pass `meta.nextCursor` back as `cursor` to continue the listing.',
  request: {
    query: z.object({
      limit: z
        .string()
        .optional()
        .transform((value) => (value == null ? undefined : Number(value)))
        .refine(
          (value) => value === undefined || (Number.isInteger(value) && value > 0 && value <= 50),
          'limit must be between 1 and 50'
        ),
      year: z
        .string()
        .optional()
        .transform((value) => (value == null ? undefined : Number(value)))
        .refine(
          (value) => value === undefined || (Number.isInteger(value) && value >= 2007),
          'year must be 2007 or later'
        ),
      cursor: z.string().optional().openapi({
        description: 'Opaque continuation token from a previous response'
      })
    })
  },
  responses: {
    200: {
      description: 'News posts',
      content: {
        'application/json': {
          schema: NewsResponseSchema
        }
      }
    },
    400: {
      description: 'Invalid parameters or cursor'
    },
    500: {
      description: 'Server error'
    },
    502: {
      description: 'osu! API failure or unreadable response'
    }
  }
})

export interface NewsRouteDeps {
  newsService: NewsService
}

export function registerNewsRoutes(app: OpenAPIHono, deps: NewsRouteDeps) {
  app.openapi(NewsRoute, async (c) => {
    try {
      const { limit, year, cursor } = c.req.valid('query')

      const news = await deps.newsService.getNews({
        limit,
        year,
        cursor: cursor ? OpaqueCursor.fromTransportString(cursor) : undefined,
        signal: c.req.raw.signal
      })

      return ok(c, {
        data: {
          posts: news.items.map(encodeNewsPost)
        },
        meta: {
          returned: news.items.length,
          limit: news.search.limit,
          hasMore: hasMore(news),
          nextCursor: news.cursor ? news.cursor.toTransportString() : null,
          sidebar: {
            currentYear: news.sidebar.currentYear,
            years: news.sidebar.years
          }
        }
      })
    } catch (error) {
      return handleError(c, error)
    }
  })
}
