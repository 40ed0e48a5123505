import { z } from 'zod'
import { GAME_MODES } from '../types'
import { u32Schema } from '../utils/decode'

// Nested profile records keep their wire field names; they are decoded and
// encoded one-to-one without any custom logic.

export const AccountHistorySchema = z.object({
  id: u32Schema.optional(),
  description: z.string().nullish(),
  type: z.string(),
  timestamp: z.string(),
  length: u32Schema,
  permanent: z.boolean()
})
export type AccountHistory = z.infer<typeof AccountHistorySchema>

export const BadgeSchema = z.object({
  awarded_at: z.string(),
  description: z.string(),
  image_url: z.string(),
  url: z.string()
})
export type Badge = z.infer<typeof BadgeSchema>

export const GroupSchema = z.object({
  colour: z.string().nullable(),
  description: z.string().nullish(),
  has_listing: z.boolean(),
  has_playmodes: z.boolean(),
  id: u32Schema,
  identifier: z.string(),
  is_probationary: z.boolean(),
  name: z.string(),
  playmodes: z.array(z.enum(GAME_MODES)).nullish(),
  short_name: z.string()
})
export type Group = z.infer<typeof GroupSchema>

export const MedalCompactSchema = z.object({
  achieved_at: z.string(),
  achievement_id: u32Schema
})
export type MedalCompact = z.infer<typeof MedalCompactSchema>

export const MonthlyCountSchema = z.object({
  start_date: z.string(),
  count: z.number().int()
})
export type MonthlyCount = z.infer<typeof MonthlyCountSchema>

export const UserCoverSchema = z.object({
  custom_url: z.string().nullable(),
  url: z.string(),
  id: z.string().nullable()
})
export type UserCover = z.infer<typeof UserCoverSchema>

export const UserPageSchema = z.object({
  html: z.string(),
  raw: z.string()
})
export type UserPage = z.infer<typeof UserPageSchema>

/** Accepts either a plain country name or a `{ code, name }` object. */
export const CountryNameSchema = z
  .union([z.string(), z.object({ name: z.string() }).passthrough()])
  .transform((value) => (typeof value === 'string' ? value : value.name))

export const GradeCountsSchema = z.object({
  ss: z.number().int(),
  ssh: z.number().int(),
  s: z.number().int(),
  sh: z.number().int(),
  a: z.number().int()
})
export type GradeCounts = z.infer<typeof GradeCountsSchema>

export const UserLevelSchema = z.object({
  current: u32Schema,
  progress: u32Schema
})
export type UserLevel = z.infer<typeof UserLevelSchema>

export interface UserStatistics {
  accuracy: number
  countryRank?: number
  globalRank?: number
  gradeCounts: GradeCounts
  isRanked: boolean
  level: UserLevel
  maxCombo: number
  playcount: number
  playtime: number
  pp: number
  rankedScore: number
  replaysWatched: number
  totalHits: number
  totalScore: number
}

export interface UserCompact {
  avatarUrl: string
  countryCode: string
  defaultGroup: string
  isActive: boolean
  isBot: boolean
  isDeleted: boolean
  isOnline: boolean
  isSupporter: boolean
  lastVisit?: string
  pmFriendsOnly: boolean
  profileColor?: string
  userId: number
  username: string

  accountHistory?: AccountHistory[]
  badges?: Badge[]
  beatmapPlaycountsCount?: number
  country?: string
  cover?: UserCover
  favouriteMapsetCount?: number
  followerCount?: number
  graveyardMapsetCount?: number
  groups?: Group[]
  isAdmin?: boolean
  isBng?: boolean
  isFullBn?: boolean
  isGmt?: boolean
  isLimitedBn?: boolean
  isModerator?: boolean
  isNat?: boolean
  isSilenced?: boolean
  lovedMapsetCount?: number
  medals?: MedalCompact[]
  monthlyPlaycounts?: MonthlyCount[]
  page?: UserPage
  previousUsernames?: string[]
  rankHistory?: number[]
  rankedMapsetCount?: number
  replaysWatchedCounts?: MonthlyCount[]
  scoresBestCount?: number
  scoresFirstCount?: number
  scoresRecentCount?: number
  statistics?: UserStatistics
  supportLevel?: number
  pendingMapsetCount?: number
}

export const UserCompactWireSchema = z.object({
  avatar_url: z.string(),
  country_code: z.string(),
  default_group: z.string(),
  is_active: z.boolean(),
  is_bot: z.boolean(),
  is_deleted: z.boolean(),
  is_online: z.boolean(),
  is_supporter: z.boolean(),
  last_visit: z.string().nullish(),
  pm_friends_only: z.boolean(),
  profile_colour: z.string().nullish(),
  id: u32Schema,
  username: z.string(),

  account_history: z.array(AccountHistorySchema).nullish(),
  badges: z.array(BadgeSchema).nullish(),
  beatmap_playcounts_count: u32Schema.nullish(),
  country: CountryNameSchema.nullish(),
  cover: UserCoverSchema.nullish(),
  favourite_beatmapset_count: u32Schema.nullish(),
  follower_count: u32Schema.nullish(),
  graveyard_beatmapset_count: u32Schema.nullish(),
  groups: z.array(GroupSchema).nullish(),
  is_admin: z.boolean().nullish(),
  is_bng: z.boolean().nullish(),
  is_full_bn: z.boolean().nullish(),
  is_gmt: z.boolean().nullish(),
  is_limited_bn: z.boolean().nullish(),
  is_moderator: z.boolean().nullish(),
  is_nat: z.boolean().nullish(),
  is_silenced: z.boolean().nullish(),
  loved_beatmapset_count: u32Schema.nullish(),
  user_achievements: z.array(MedalCompactSchema).nullish(),
  monthly_playcounts: z.array(MonthlyCountSchema).nullish(),
  page: UserPageSchema.nullish(),
  previous_usernames: z.array(z.string()).nullish(),
  rank_history: z.array(u32Schema).nullish(),
  ranked_beatmapset_count: u32Schema.nullish(),
  replays_watched_counts: z.array(MonthlyCountSchema).nullish(),
  scores_best_count: u32Schema.nullish(),
  scores_first_count: u32Schema.nullish(),
  scores_recent_count: u32Schema.nullish(),
  support_level: z.number().int().min(0).max(255).nullish(),
  pending_beatmapset_count: u32Schema.nullish()
})
export type UserCompactWire = z.infer<typeof UserCompactWireSchema>

/** Maps the nested `user` object to the in-memory record. Statistics are attached by the merged codec. */
export function toUserCompact(wire: UserCompactWire): UserCompact {
  return {
    avatarUrl: wire.avatar_url,
    countryCode: wire.country_code,
    defaultGroup: wire.default_group,
    isActive: wire.is_active,
    isBot: wire.is_bot,
    isDeleted: wire.is_deleted,
    isOnline: wire.is_online,
    isSupporter: wire.is_supporter,
    lastVisit: wire.last_visit ?? undefined,
    pmFriendsOnly: wire.pm_friends_only,
    profileColor: wire.profile_colour ?? undefined,
    userId: wire.id,
    username: wire.username,

    accountHistory: wire.account_history ?? undefined,
    badges: wire.badges ?? undefined,
    beatmapPlaycountsCount: wire.beatmap_playcounts_count ?? undefined,
    country: wire.country ?? undefined,
    cover: wire.cover ?? undefined,
    favouriteMapsetCount: wire.favourite_beatmapset_count ?? undefined,
    followerCount: wire.follower_count ?? undefined,
    graveyardMapsetCount: wire.graveyard_beatmapset_count ?? undefined,
    groups: wire.groups ?? undefined,
    isAdmin: wire.is_admin ?? undefined,
    isBng: wire.is_bng ?? undefined,
    isFullBn: wire.is_full_bn ?? undefined,
    isGmt: wire.is_gmt ?? undefined,
    isLimitedBn: wire.is_limited_bn ?? undefined,
    isModerator: wire.is_moderator ?? undefined,
    isNat: wire.is_nat ?? undefined,
    isSilenced: wire.is_silenced ?? undefined,
    lovedMapsetCount: wire.loved_beatmapset_count ?? undefined,
    medals: wire.user_achievements ?? undefined,
    monthlyPlaycounts: wire.monthly_playcounts ?? undefined,
    page: wire.page ?? undefined,
    previousUsernames: wire.previous_usernames ?? undefined,
    rankHistory: wire.rank_history ?? undefined,
    rankedMapsetCount: wire.ranked_beatmapset_count ?? undefined,
    replaysWatchedCounts: wire.replays_watched_counts ?? undefined,
    scoresBestCount: wire.scores_best_count ?? undefined,
    scoresFirstCount: wire.scores_first_count ?? undefined,
    scoresRecentCount: wire.scores_recent_count ?? undefined,
    supportLevel: wire.support_level ?? undefined,
    pendingMapsetCount: wire.pending_beatmapset_count ?? undefined
  }
}
