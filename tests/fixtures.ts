export function userWire(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    avatar_url: 'https://a.example.test/100?1',
    country_code: 'NO',
    default_group: 'default',
    id: 100,
    is_active: true,
    is_bot: false,
    is_deleted: false,
    is_online: false,
    is_supporter: true,
    last_visit: '2026-01-02T03:04:05+00:00',
    pm_friends_only: false,
    profile_colour: null,
    username: 'player_one',
    country: { code: 'NO', name: 'Norway' },
    cover: {
      custom_url: null,
      url: 'https://assets.example.test/covers/1.jpg',
      id: '1'
    },
    ...overrides
  }
}

export function statsEntryWire(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    count_100: 1200,
    count_300: 45000,
    count_50: 90,
    count_miss: 400,
    level: { current: 101, progress: 42 },
    global_rank: 1,
    global_rank_exp: null,
    pp: 12345.6,
    pp_exp: 0,
    ranked_score: 98765432100,
    hit_accuracy: 98.76,
    play_count: 54321,
    play_time: 3600000,
    total_score: 123456789012,
    total_hits: 46690,
    maximum_combo: 4321,
    replays_watched_by_others: 777,
    is_ranked: true,
    grade_counts: { ss: 10, ssh: 20, s: 300, sh: 400, a: 500 },
    country_rank: 3,
    user: userWire(),
    ...overrides
  }
}

export function userRankingsBody(
  options: { cursor?: unknown; ids?: number[]; total?: number } = {}
): Record<string, unknown> {
  const ids = options.ids ?? [100, 101]
  return {
    cursor: options.cursor === undefined ? { page: 2 } : options.cursor,
    ranking: ids.map((id) =>
      statsEntryWire({ user: userWire({ id, username: `player_${id}` }) })
    ),
    total: options.total ?? 10000
  }
}

export function countryEntryWire(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    code: 'NO',
    active_users: 4321,
    play_count: 123456789,
    ranked_score: 987654321012,
    performance: 2345678,
    country: { code: 'NO', name: 'Norway' },
    ...overrides
  }
}

export function newsPostWire(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 1500,
    author: 'news_writer',
    edit_url: 'https://github.example.test/news/2026-10-01-first-post.md',
    first_image: '/images/first.jpg',
    published_at: '2026-10-01T12:00:00+00:00',
    updated_at: '2026-10-02T08:00:00+00:00',
    slug: '2026-10-01-first-post',
    title: 'First post',
    preview: 'Something happened.',
    ...overrides
  }
}

export function newsBody(options: { cursor?: unknown } = {}): Record<string, unknown> {
  const cursor =
    options.cursor === undefined
      ? { published_at: '2026-10-01T12:00:00+00:00', id: 1500 }
      : options.cursor
  return {
    news_posts: [newsPostWire()],
    news_sidebar: {
      current_year: 2026,
      news_posts: [newsPostWire({ preview: undefined })],
      years: [2026, 2025, 2024]
    },
    search: { limit: 12, sort: 'published_desc', cursor },
    cursor
  }
}
