import type { OsuTransport } from './osu-client'
import type { DispatchableRankingType, GameMode } from '../types'
import {
  decodeChartRankings,
  decodeCountryRankings,
  decodeUserRankings,
  type ChartRankings,
  type CountryRankings,
  type UserRankings
} from '../models/rankings'

export interface RankingPageOptions {
  page?: number
  signal?: AbortSignal
}

export interface ChartRankingOptions {
  spotlight?: number
  signal?: AbortSignal
}

export interface RankingsService {
  getUserRankings(
    mode: GameMode,
    rankingType: DispatchableRankingType,
    options?: RankingPageOptions
  ): Promise<UserRankings>
  getPerformanceRankings(mode: GameMode, options?: RankingPageOptions): Promise<UserRankings>
  getScoreRankings(mode: GameMode, options?: RankingPageOptions): Promise<UserRankings>
  getCountryRankings(mode: GameMode, options?: RankingPageOptions): Promise<CountryRankings>
  getChartRankings(mode: GameMode, options?: ChartRankingOptions): Promise<ChartRankings>
}

export function createRankingsService(transport: OsuTransport): RankingsService {
  async function getUserRankings(
    mode: GameMode,
    rankingType: DispatchableRankingType,
    options: RankingPageOptions = {}
  ) {
    const body = await transport.submit(
      { route: 'rankings', mode, rankingType, page: options.page },
      { signal: options.signal }
    )
    return decodeUserRankings(body, { mode, rankingType })
  }

  return {
    getUserRankings,
    getPerformanceRankings(mode, options) {
      return getUserRankings(mode, 'performance', options)
    },
    getScoreRankings(mode, options) {
      return getUserRankings(mode, 'score', options)
    },
    async getCountryRankings(mode, options = {}) {
      const body = await transport.submit(
        { route: 'rankings', mode, rankingType: 'country', page: options.page },
        { signal: options.signal }
      )
      return decodeCountryRankings(body, { mode })
    },
    async getChartRankings(mode, options = {}) {
      const body = await transport.submit(
        { route: 'chart-rankings', mode, spotlight: options.spotlight },
        { signal: options.signal }
      )
      return decodeChartRankings(body)
    }
  }
}
