import type { RankingsService } from './rankings-service'
import type { NewsService } from './news-service'
import type { CountryRankings, UserRankings } from '../models/rankings'
import type { News } from '../models/news'
import { nextPageNumber } from '../utils/rankings-cursor'
import { unreachable } from '../utils/errors'
import { metrics } from '../../metrics'

export interface NextPageOptions {
  signal?: AbortSignal
}

/**
 * Follows the cursor of a fetched page. Every method resolves with `null`
 * once the page is the last one, without touching the transport.
 */
export interface NextPageDispatcher {
  nextUserRankings(page: UserRankings, options?: NextPageOptions): Promise<UserRankings | null>
  nextCountryRankings(
    page: CountryRankings,
    options?: NextPageOptions
  ): Promise<CountryRankings | null>
  nextNews(page: News, options?: NextPageOptions): Promise<News | null>
}

export interface NextPageDispatcherDeps {
  rankingsService: RankingsService
  newsService: NewsService
}

type PageResource = 'user_rankings' | 'country_rankings' | 'news'

export function createNextPageDispatcher(deps: NextPageDispatcherDeps): NextPageDispatcher {
  const { rankingsService, newsService } = deps

  async function follow<T>(resource: PageResource, fetchPage: () => Promise<T>): Promise<T> {
    try {
      const next = await fetchPage()
      metrics.increment('pagination_next_total', 1, { resource, outcome: 'fetched' })
      return next
    } catch (error) {
      metrics.increment('pagination_next_total', 1, { resource, outcome: 'failed' })
      throw error
    }
  }

  function exhausted(resource: PageResource) {
    metrics.increment('pagination_next_total', 1, { resource, outcome: 'exhausted' })
    return null
  }

  return {
    async nextUserRankings(page, options = {}) {
      const nextPage = nextPageNumber(page.cursor)
      if (nextPage === null) {
        return exhausted('user_rankings')
      }

      const { mode, rankingType } = page.context
      const request = { page: nextPage, signal: options.signal }

      switch (rankingType) {
        case 'performance':
          return follow('user_rankings', () =>
            rankingsService.getPerformanceRankings(mode, request)
          )
        case 'score':
          return follow('user_rankings', () => rankingsService.getScoreRankings(mode, request))
        default:
          return unreachable('ranking type', rankingType)
      }
    },

    async nextCountryRankings(page, options = {}) {
      const nextPage = nextPageNumber(page.cursor)
      if (nextPage === null) {
        return exhausted('country_rankings')
      }

      return follow('country_rankings', () =>
        rankingsService.getCountryRankings(page.context.mode, {
          page: nextPage,
          signal: options.signal
        })
      )
    },

    async nextNews(page, options = {}) {
      if (page.cursor === null) {
        return exhausted('news')
      }

      const cursor = page.cursor
      return follow('news', () => newsService.getNews({ cursor, signal: options.signal }))
    }
  }
}
