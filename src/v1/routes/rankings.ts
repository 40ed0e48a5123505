import { createRoute, z } from '@hono/zod-openapi'
import type { OpenAPIHono } from '@hono/zod-openapi'
import { GAME_MODES } from '../types'
import type { RankingsService } from '../services/rankings-service'
import type { NextPageDispatcher } from '../services/next-page-dispatcher'
import {
  encodeChartRankings,
  encodeCountryRanking,
  type CountryRankings,
  type UserRankings
} from '../models/rankings'
import { encodeUserStatsList } from '../utils/user-stats-codec'
import { nextPageNumber } from '../utils/rankings-cursor'
import { ok, handleError } from '../utils/http'

const MAX_PAGES_PER_REQUEST = 5

const PAGED_RANKING_TYPES = ['performance', 'score', 'country'] as const

const WireEntrySchema = z.record(z.string(), z.unknown())

const RankingsResponseSchema = z.object({
  data: z.object({
    ranking: z.array(WireEntrySchema)
  }),
  meta: z.object({
    mode: z.enum(GAME_MODES),
    type: z.enum(PAGED_RANKING_TYPES),
    firstPage: z.number().nullable(),
    pagesFetched: z.number(),
    returned: z.number(),
    total: z.number(),
    nextPage: z.number().nullable()
  })
})

const ChartRankingsResponseSchema = z.object({
  data: z.object({
    beatmapsets: z.array(WireEntrySchema),
    ranking: z.array(WireEntrySchema),
    spotlight: WireEntrySchema
  }),
  meta: z.object({
    mode: z.enum(GAME_MODES),
    returned: z.number()
  })
})

const positiveIntParam = (name: string) =>
  z
    .string()
    .optional()
    .transform((value) => (value == null ? undefined : Number(value)))
    .refine(
      (value) => value === undefined || (Number.isInteger(value) && value > 0),
      `${name} must be a positive integer`
    )

const pagesParam = z
  .string()
  .optional()
  .transform((value) => (value == null ? 1 : Number(value)))
  .refine(
    (value) => Number.isInteger(value) && value >= 1 && value <= MAX_PAGES_PER_REQUEST,
    `pages must be between 1 and ${MAX_PAGES_PER_REQUEST}`
  )

const ChartRankingsRoute = createRoute({
  method: 'get',
  path: '/rankings/{mode}/charts',
  tags: ['rankings'],
  summary: 'Spotlight chart rankings',
  description:
    'Returns the ranking of a spotlight chart together with its beatmapsets. Without `spotlight` the latest one is used.',
  request: {
    params: z.object({
      mode: z.enum(GAME_MODES)
    }),
    query: z.object({
      spotlight: positiveIntParam('spotlight')
    })
  },
  responses: {
    200: {
      description: 'Chart rankings',
      content: {
        'application/json': {
          schema: ChartRankingsResponseSchema
        }
      }
    },
    400: {
      description: 'Invalid parameters'
    },
    404: {
      description: 'Spotlight not found'
    },
    500: {
      description: 'Server error'
    },
    502: {
      description: 'osu! API failure or unreadable response'
    }
  }
})

const RankingsRoute = createRoute({
  method: 'get',
  path: '/rankings/{mode}/{type}',
  tags: ['rankings'],
  summary: 'Performance, score and country rankings',
  description:
    'Returns ranking entries in the osu! API wire shape. `pages` follows the cursor for up to five consecutive pages.',
  request: {
    params: z.object({
      mode: z.enum(GAME_MODES),
      type: z.enum(PAGED_RANKING_TYPES).openapi({
        description: 'Ranking type. Chart rankings live under /rankings/{mode}/charts.'
      })
    }),
    query: z.object({
      page: positiveIntParam('page'),
      pages: pagesParam
    })
  },
  responses: {
    200: {
      description: 'Rankings page(s)',
      content: {
        'application/json': {
          schema: RankingsResponseSchema,
          examples: {
            default: {
              summary: 'Example performance ranking response',
              value: {
                data: { ranking: [] },
                meta: {
                  mode: 'osu',
                  type: 'performance',
                  firstPage: null,
                  pagesFetched: 1,
                  returned: 0,
                  total: 10000,
                  nextPage: 2
                }
              }
            }
          }
        }
      }
    },
    400: {
      description: 'Invalid parameters'
    },
    404: {
      description: 'Rankings not found'
    },
    500: {
      description: 'Server error'
    },
    502: {
      description: 'osu! API failure or unreadable response'
    }
  }
})

export interface RankingsRouteDeps {
  rankingsService: RankingsService
  dispatcher: NextPageDispatcher
}

/** Fetches up to `limit` pages, stopping early once `next` reports the end. */
export async function collectPages<TPage>(
  first: TPage,
  limit: number,
  next: (page: TPage) => Promise<TPage | null>
): Promise<TPage[]> {
  const collected = [first]
  let current = first

  while (collected.length < limit) {
    const following = await next(current)
    if (!following) {
      break
    }
    collected.push(following)
    current = following
  }

  return collected
}

export function registerRankingsRoutes(app: OpenAPIHono, deps: RankingsRouteDeps) {
  app.openapi(ChartRankingsRoute, async (c) => {
    try {
      const { mode } = c.req.valid('param')
      const { spotlight } = c.req.valid('query')

      const charts = await deps.rankingsService.getChartRankings(mode, {
        spotlight,
        signal: c.req.raw.signal
      })
      const encoded = encodeChartRankings(charts)

      return ok(c, {
        data: encoded,
        meta: {
          mode,
          returned: charts.ranking.length
        }
      })
    } catch (error) {
      return handleError(c, error)
    }
  })

  app.openapi(RankingsRoute, async (c) => {
    try {
      const { mode, type } = c.req.valid('param')
      const { page, pages } = c.req.valid('query')
      const signal = c.req.raw.signal

      if (type === 'country') {
        const first = await deps.rankingsService.getCountryRankings(mode, { page, signal })
        const collected = await collectPages<CountryRankings>(first, pages, (current) =>
          deps.dispatcher.nextCountryRankings(current, { signal })
        )
        const ranking = collected.flatMap((entry) => entry.items.map(encodeCountryRanking))
        const last = collected[collected.length - 1] ?? first

        return ok(c, {
          data: { ranking },
          meta: {
            mode,
            type,
            firstPage: page ?? null,
            pagesFetched: collected.length,
            returned: ranking.length,
            total: last.total,
            nextPage: nextPageNumber(last.cursor)
          }
        })
      }

      const first = await deps.rankingsService.getUserRankings(mode, type, { page, signal })
      const collected = await collectPages<UserRankings>(first, pages, (current) =>
        deps.dispatcher.nextUserRankings(current, { signal })
      )
      const ranking = collected.flatMap((entry) => encodeUserStatsList(entry.items))
      const last = collected[collected.length - 1] ?? first

      return ok(c, {
        data: { ranking },
        meta: {
          mode,
          type,
          firstPage: page ?? null,
          pagesFetched: collected.length,
          returned: ranking.length,
          total: last.total,
          nextPage: nextPageNumber(last.cursor)
        }
      })
    } catch (error) {
      return handleError(c, error)
    }
  })
}
