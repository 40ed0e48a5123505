import { afterEach, describe, expect, it } from 'vitest'
import { MetricsRegistry } from '../src/metrics'

let registry: MetricsRegistry | null = null

afterEach(() => {
  registry?.close()
  registry = null
})

describe('MetricsRegistry', () => {
  it('accumulates counters per label set', () => {
    registry = new MetricsRegistry()

    registry.increment('osu_requests_total', 1, { status: 'success', operation: 'rankings' })
    registry.increment('osu_requests_total', 2, { status: 'success', operation: 'rankings' })
    registry.increment('osu_requests_total', 1, { status: '404', operation: 'rankings' })

    const samples = registry
      .list()
      .filter((sample) => sample.metric === 'osu_requests_total')
      .map(({ labels, value }) => ({ labels, value }))

    expect(samples).toHaveLength(2)
    expect(samples).toEqual(
      expect.arrayContaining([
        { labels: { status: 'success', operation: 'rankings' }, value: 3 },
        { labels: { status: '404', operation: 'rankings' }, value: 1 }
      ])
    )
  })

  it('fills labels that were not given and drops unknown ones', () => {
    registry = new MetricsRegistry()

    registry.increment('pagination_next_total', 1, { resource: 'news', region: 'eu' })

    expect(registry.list()).toEqual([
      expect.objectContaining({
        metric: 'pagination_next_total',
        labels: { resource: 'news', outcome: 'unknown' },
        value: 1
      })
    ])
  })

  it('keeps each registry in its own database', () => {
    registry = new MetricsRegistry()
    const other = new MetricsRegistry()

    registry.increment('osu_retry_total', 1, { operation: 'news' })

    expect(registry.list()).toEqual([
      {
        metric: 'osu_retry_total',
        labels: { operation: 'news' },
        value: 1,
        updatedAt: expect.any(Number)
      }
    ])
    expect(other.list()).toEqual([])
    other.close()
  })

  it('refuses undefined metrics', () => {
    registry = new MetricsRegistry()

    expect(() => registry?.increment('bogus_total')).toThrow('Metric bogus_total is not defined')
  })
})
