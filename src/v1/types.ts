import type { OpaqueCursor } from './utils/rankings-cursor'

export const GAME_MODES = ['osu', 'taiko', 'fruits', 'mania'] as const
export type GameMode = (typeof GAME_MODES)[number]

export const RANKING_TYPES = ['performance', 'score', 'country', 'charts'] as const
export type RankingType = (typeof RANKING_TYPES)[number]

/** Ranking types whose pages can be followed through the generic next-page dispatch. */
export const DISPATCHABLE_RANKING_TYPES = ['performance', 'score'] as const
export type DispatchableRankingType = (typeof DISPATCHABLE_RANKING_TYPES)[number]

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

export type OsuRequest =
  | {
      route: 'rankings'
      mode: GameMode
      rankingType: Exclude<RankingType, 'charts'>
      page?: number
    }
  | {
      route: 'chart-rankings'
      mode: GameMode
      spotlight?: number
    }
  | {
      route: 'news'
      limit?: number
      year?: number
      cursor?: OpaqueCursor
    }
