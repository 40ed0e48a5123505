import { z } from 'zod'
import type { DispatchableRankingType, GameMode } from '../types'
import {
  decodeKey,
  decodeList,
  decodeRequiredKey,
  parseWireValue,
  readRequired,
  requireRecord,
  u32Schema,
  u64Schema
} from '../utils/decode'
import {
  decodeRankingsCursor,
  encodeRankingsCursor,
  type PageCursor
} from '../utils/rankings-cursor'
import { decodeUserStatsList, encodeUserStatsList } from '../utils/user-stats-codec'
import { freezePage, type ResultPage } from './result-page'
import { CountryNameSchema, type UserCompact } from './user'

export interface UserRankingsContext {
  readonly mode: GameMode
  readonly rankingType: DispatchableRankingType
}

export interface CountryRankingsContext {
  readonly mode: GameMode
}

/** Performance or score ranking page. */
export interface UserRankings extends ResultPage<UserCompact, PageCursor, UserRankingsContext> {
  readonly total: number
}

export interface CountryRanking {
  activeUsers: number
  country: string
  countryCode: string
  playcount: number
  pp: number
  rankedScore: number
}

export interface CountryRankings
  extends ResultPage<CountryRanking, PageCursor, CountryRankingsContext> {
  readonly total: number
}

const CountryRankingWireSchema = z.object({
  active_users: u32Schema,
  country: CountryNameSchema,
  code: z.string(),
  play_count: u64Schema,
  performance: z.number(),
  ranked_score: u64Schema
})

export const BeatmapsetSchema = z
  .object({
    id: u32Schema,
    artist: z.string(),
    title: z.string(),
    creator: z.string(),
    status: z.string()
  })
  .passthrough()
export type Beatmapset = z.infer<typeof BeatmapsetSchema>

const SpotlightWireSchema = z.object({
  end_date: z.string(),
  mode_specific: z.boolean(),
  name: z.string(),
  participant_count: u32Schema.nullish(),
  id: u32Schema,
  type: z.string(),
  start_date: z.string()
})

export interface Spotlight {
  endDate: string
  modeSpecific: boolean
  name: string
  participantCount?: number
  spotlightId: number
  spotlightType: string
  startDate: string
}

/** Spotlight charts come in one piece; there is no cursor to follow. */
export interface ChartRankings {
  readonly mapsets: ReadonlyArray<Beatmapset>
  readonly ranking: ReadonlyArray<UserCompact>
  readonly spotlight: Spotlight
}

/**
 * Decodes a performance or score ranking body. The context comes from the
 * request that produced it; `mode` or `ranking_type` keys on the wire are not read.
 */
export function decodeUserRankings(body: unknown, context: UserRankingsContext): UserRankings {
  const record = requireRecord(body, 'a rankings map')

  return freezePage({
    items: decodeRequiredKey(record, 'ranking', decodeUserStatsList),
    cursor: decodeKey(record, 'cursor', decodeRankingsCursor),
    context: { mode: context.mode, rankingType: context.rankingType },
    total: readRequired(record, 'total', u32Schema)
  })
}

export function decodeCountryRanking(value: unknown): CountryRanking {
  const wire = parseWireValue(CountryRankingWireSchema, value, [])
  return {
    activeUsers: wire.active_users,
    country: wire.country,
    countryCode: wire.code,
    playcount: wire.play_count,
    pp: wire.performance,
    rankedScore: wire.ranked_score
  }
}

export function decodeCountryRankings(
  body: unknown,
  context: CountryRankingsContext
): CountryRankings {
  const record = requireRecord(body, 'a country rankings map')

  return freezePage({
    items: decodeRequiredKey(record, 'ranking', decodeCountryRankingList),
    cursor: decodeKey(record, 'cursor', decodeRankingsCursor),
    context: { mode: context.mode },
    total: readRequired(record, 'total', u32Schema)
  })
}

function decodeCountryRankingList(value: unknown): CountryRanking[] {
  return decodeList(value, decodeCountryRanking, 'a list of country rankings')
}

export function decodeSpotlight(value: unknown): Spotlight {
  const wire = parseWireValue(SpotlightWireSchema, value, [])
  return {
    endDate: wire.end_date,
    modeSpecific: wire.mode_specific,
    name: wire.name,
    participantCount: wire.participant_count ?? undefined,
    spotlightId: wire.id,
    spotlightType: wire.type,
    startDate: wire.start_date
  }
}

export function decodeChartRankings(body: unknown): ChartRankings {
  const record = requireRecord(body, 'a chart rankings map')

  return Object.freeze({
    mapsets: readRequired(record, 'beatmapsets', z.array(BeatmapsetSchema)),
    ranking: decodeRequiredKey(record, 'ranking', decodeUserStatsList),
    spotlight: decodeRequiredKey(record, 'spotlight', decodeSpotlight)
  })
}

export function encodeUserRankings(page: UserRankings): Record<string, unknown> {
  const cursor = encodeRankingsCursor(page.cursor)
  return {
    ...(cursor !== undefined ? { cursor } : {}),
    ranking: encodeUserStatsList(page.items),
    total: page.total
  }
}

export function encodeCountryRanking(entry: CountryRanking): Record<string, unknown> {
  return {
    active_users: entry.activeUsers,
    country: entry.country,
    code: entry.countryCode,
    play_count: entry.playcount,
    performance: entry.pp,
    ranked_score: entry.rankedScore
  }
}

export function encodeCountryRankings(page: CountryRankings): Record<string, unknown> {
  const cursor = encodeRankingsCursor(page.cursor)
  return {
    ...(cursor !== undefined ? { cursor } : {}),
    ranking: page.items.map(encodeCountryRanking),
    total: page.total
  }
}

export function encodeSpotlight(spotlight: Spotlight): Record<string, unknown> {
  return {
    end_date: spotlight.endDate,
    mode_specific: spotlight.modeSpecific,
    name: spotlight.name,
    ...(spotlight.participantCount !== undefined
      ? { participant_count: spotlight.participantCount }
      : {}),
    id: spotlight.spotlightId,
    type: spotlight.spotlightType,
    start_date: spotlight.startDate
  }
}

export function encodeChartRankings(charts: ChartRankings): Record<string, unknown> {
  return {
    beatmapsets: [...charts.mapsets],
    ranking: encodeUserStatsList(charts.ranking),
    spotlight: encodeSpotlight(charts.spotlight)
  }
}
