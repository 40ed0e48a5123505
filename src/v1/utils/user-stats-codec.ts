import { z } from 'zod'
import {
  GradeCountsSchema,
  UserCompactWireSchema,
  UserLevelSchema,
  toUserCompact,
  type GradeCounts,
  type UserCompact,
  type UserLevel,
  type UserStatistics
} from '../models/user'
import { ApiError, DecodeError } from './errors'
import { decodeList, parseWireValue, requireRecord, u32Schema, u64Schema } from './decode'

// Ranking entries arrive as one flat map: the statistics keys sit next to a
// nested `user` object. Decoding merges both into a UserCompact with its
// statistics attached, encoding splits them apart again.

const accuracySchema = z.number()
const nullableU32Schema = u32Schema.nullable()
const nullablePpSchema = z.number().nullable()

/** Collects the keys of one ranking entry before the required ones are checked. */
export class UserStatsBuilder {
  private accuracy?: number
  private countryRank?: number
  private globalRank?: number
  private gradeCounts?: GradeCounts
  private isRanked?: boolean
  private level?: UserLevel
  private maxCombo?: number
  private playcount?: number
  private playtime?: number
  private pp?: number
  private rankedScore?: number
  private replaysWatched?: number
  private totalHits?: number
  private totalScore?: number
  private user?: UserCompact

  accept(key: string, value: unknown): this {
    switch (key) {
      case 'hit_accuracy':
        this.accuracy = parseWireValue(accuracySchema, value, key)
        break
      case 'country_rank':
        this.countryRank = parseWireValue(nullableU32Schema, value, key) ?? undefined
        break
      case 'global_rank':
        this.globalRank = parseWireValue(nullableU32Schema, value, key) ?? undefined
        break
      case 'grade_counts':
        this.gradeCounts = parseWireValue(GradeCountsSchema, value, key)
        break
      case 'is_ranked':
        this.isRanked = parseWireValue(z.boolean(), value, key)
        break
      case 'level':
        this.level = parseWireValue(UserLevelSchema, value, key)
        break
      case 'maximum_combo':
        this.maxCombo = parseWireValue(u32Schema, value, key)
        break
      case 'play_count':
        this.playcount = parseWireValue(u32Schema, value, key)
        break
      // play_time and pp are sent as null for some users; a present null counts as zero
      case 'play_time':
        this.playtime = parseWireValue(nullableU32Schema, value, key) ?? 0
        break
      case 'pp':
        this.pp = parseWireValue(nullablePpSchema, value, key) ?? 0
        break
      case 'ranked_score':
        this.rankedScore = parseWireValue(u64Schema, value, key)
        break
      case 'replays_watched_by_others':
        this.replaysWatched = parseWireValue(u32Schema, value, key)
        break
      case 'total_hits':
        this.totalHits = parseWireValue(u64Schema, value, key)
        break
      case 'total_score':
        this.totalScore = parseWireValue(u64Schema, value, key)
        break
      case 'user':
        this.user = value == null ? undefined : decodeNestedUser(value)
        break
      default:
        break
    }

    return this
  }

  build(): UserCompact {
    const statistics: UserStatistics = {
      accuracy: required(this.accuracy, 'hit_accuracy'),
      countryRank: this.countryRank,
      globalRank: this.globalRank,
      gradeCounts: required(this.gradeCounts, 'grade_counts'),
      isRanked: required(this.isRanked, 'is_ranked'),
      level: required(this.level, 'level'),
      maxCombo: required(this.maxCombo, 'maximum_combo'),
      playcount: required(this.playcount, 'play_count'),
      playtime: required(this.playtime, 'play_time'),
      pp: required(this.pp, 'pp'),
      rankedScore: required(this.rankedScore, 'ranked_score'),
      replaysWatched: required(this.replaysWatched, 'replays_watched_by_others'),
      totalHits: required(this.totalHits, 'total_hits'),
      totalScore: required(this.totalScore, 'total_score')
    }
    const user = required(this.user, 'user')

    return { ...user, statistics }
  }
}

function required<T>(value: T | undefined, key: string): T {
  if (value === undefined) {
    throw DecodeError.missingField(key)
  }
  return value
}

function decodeNestedUser(value: unknown): UserCompact {
  return toUserCompact(parseWireValue(UserCompactWireSchema, value, 'user'))
}

export function decodeUserStats(value: unknown): UserCompact {
  const entry = requireRecord(value, 'a UserStatistics map')
  const builder = new UserStatsBuilder()

  for (const [key, fieldValue] of Object.entries(entry)) {
    builder.accept(key, fieldValue)
  }

  return builder.build()
}

export function decodeUserStatsList(value: unknown): UserCompact[] {
  return decodeList(value, decodeUserStats, 'a list of UserStatistics maps')
}

type UserFieldKey = Exclude<keyof UserCompact, 'statistics'>

/** `always` fields are written even when empty, `present` ones are dropped when undefined. */
export type EmitPolicy = 'always' | 'present'

export interface UserFieldSpec {
  key: UserFieldKey
  wire: string
  emit: EmitPolicy
}

/** Wire layout of the nested `user` object, in emission order. */
export const USER_FIELDS: readonly UserFieldSpec[] = [
  { key: 'avatarUrl', wire: 'avatar_url', emit: 'always' },
  { key: 'countryCode', wire: 'country_code', emit: 'always' },
  { key: 'defaultGroup', wire: 'default_group', emit: 'always' },
  { key: 'isActive', wire: 'is_active', emit: 'always' },
  { key: 'isBot', wire: 'is_bot', emit: 'always' },
  { key: 'isDeleted', wire: 'is_deleted', emit: 'always' },
  { key: 'isOnline', wire: 'is_online', emit: 'always' },
  { key: 'isSupporter', wire: 'is_supporter', emit: 'always' },
  { key: 'lastVisit', wire: 'last_visit', emit: 'present' },
  { key: 'pmFriendsOnly', wire: 'pm_friends_only', emit: 'always' },
  { key: 'profileColor', wire: 'profile_colour', emit: 'present' },
  { key: 'userId', wire: 'id', emit: 'always' },
  { key: 'username', wire: 'username', emit: 'always' },
  { key: 'accountHistory', wire: 'account_history', emit: 'present' },
  { key: 'badges', wire: 'badges', emit: 'present' },
  { key: 'beatmapPlaycountsCount', wire: 'beatmap_playcounts_count', emit: 'present' },
  { key: 'country', wire: 'country', emit: 'present' },
  { key: 'cover', wire: 'cover', emit: 'present' },
  { key: 'favouriteMapsetCount', wire: 'favourite_beatmapset_count', emit: 'present' },
  { key: 'followerCount', wire: 'follower_count', emit: 'present' },
  { key: 'graveyardMapsetCount', wire: 'graveyard_beatmapset_count', emit: 'present' },
  { key: 'groups', wire: 'groups', emit: 'present' },
  { key: 'isAdmin', wire: 'is_admin', emit: 'present' },
  { key: 'isBng', wire: 'is_bng', emit: 'present' },
  { key: 'isFullBn', wire: 'is_full_bn', emit: 'present' },
  { key: 'isGmt', wire: 'is_gmt', emit: 'present' },
  { key: 'isLimitedBn', wire: 'is_limited_bn', emit: 'present' },
  { key: 'isModerator', wire: 'is_moderator', emit: 'present' },
  { key: 'isNat', wire: 'is_nat', emit: 'present' },
  { key: 'isSilenced', wire: 'is_silenced', emit: 'present' },
  { key: 'lovedMapsetCount', wire: 'loved_beatmapset_count', emit: 'present' },
  { key: 'medals', wire: 'user_achievements', emit: 'present' },
  { key: 'monthlyPlaycounts', wire: 'monthly_playcounts', emit: 'present' },
  { key: 'page', wire: 'page', emit: 'present' },
  { key: 'previousUsernames', wire: 'previous_usernames', emit: 'present' },
  { key: 'rankHistory', wire: 'rank_history', emit: 'present' },
  { key: 'rankedMapsetCount', wire: 'ranked_beatmapset_count', emit: 'present' },
  { key: 'replaysWatchedCounts', wire: 'replays_watched_counts', emit: 'present' },
  { key: 'scoresBestCount', wire: 'scores_best_count', emit: 'present' },
  { key: 'scoresFirstCount', wire: 'scores_first_count', emit: 'present' },
  { key: 'scoresRecentCount', wire: 'scores_recent_count', emit: 'present' },
  { key: 'supportLevel', wire: 'support_level', emit: 'present' },
  { key: 'pendingMapsetCount', wire: 'pending_beatmapset_count', emit: 'present' }
]

export function encodeUser(user: UserCompact): Record<string, unknown> {
  const encoded: Record<string, unknown> = {}

  for (const field of USER_FIELDS) {
    const value = user[field.key]
    if (field.emit === 'present' && value === undefined) {
      continue
    }
    encoded[field.wire] = value ?? null
  }

  return encoded
}

export function encodeUserStats(user: UserCompact): Record<string, unknown> {
  const stats = user.statistics
  if (!stats) {
    throw new ApiError({
      status: 500,
      code: 'rankings:statistics_missing',
      message: `User ${user.userId} has no statistics to encode`
    })
  }

  const encoded: Record<string, unknown> = {
    hit_accuracy: stats.accuracy
  }

  if (stats.countryRank !== undefined) {
    encoded.country_rank = stats.countryRank
  }

  if (stats.globalRank !== undefined) {
    encoded.global_rank = stats.globalRank
  }

  encoded.grade_counts = stats.gradeCounts
  encoded.is_ranked = stats.isRanked
  encoded.level = stats.level
  encoded.maximum_combo = stats.maxCombo
  encoded.play_count = stats.playcount
  encoded.play_time = stats.playtime
  encoded.pp = stats.pp
  encoded.ranked_score = stats.rankedScore
  encoded.replays_watched_by_others = stats.replaysWatched
  encoded.total_hits = stats.totalHits
  encoded.total_score = stats.totalScore
  encoded.user = encodeUser(user)

  return encoded
}

export function encodeUserStatsList(users: ReadonlyArray<UserCompact>): Record<string, unknown>[] {
  return users.map(encodeUserStats)
}
