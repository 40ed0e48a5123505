import { describe, expectTypeOf, it } from 'vitest'
import type {
  CountryRankingsContext,
  UserRankings,
  UserRankingsContext
} from '../src/v1/models/rankings'
import type { OpaqueCursor, PageCursor } from '../src/v1/utils/rankings-cursor'

describe('user rankings page types', () => {
  it('only represents performance and score contexts', () => {
    expectTypeOf<UserRankingsContext['rankingType']>().toEqualTypeOf<'performance' | 'score'>()
    expectTypeOf<'charts'>().not.toMatchTypeOf<UserRankingsContext['rankingType']>()
    expectTypeOf<'country'>().not.toMatchTypeOf<UserRankingsContext['rankingType']>()
  })

  it('refuses a chart context at construction', () => {
    const context: UserRankingsContext = {
      mode: 'osu',
      // @ts-expect-error chart pages have no user rankings context
      rankingType: 'charts'
    }
    expectTypeOf(context).toEqualTypeOf<UserRankingsContext>()
  })

  it('pages user and country rankings by page number only', () => {
    expectTypeOf<UserRankings['cursor']>().toEqualTypeOf<PageCursor>()
    expectTypeOf<UserRankings['cursor']>().not.toMatchTypeOf<OpaqueCursor>()
    expectTypeOf<CountryRankingsContext>().toEqualTypeOf<{
      readonly mode: UserRankingsContext['mode']
    }>()
  })
})
