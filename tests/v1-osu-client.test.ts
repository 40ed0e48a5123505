import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ApiError } from '../src/v1/utils/errors'
import {
  buildUrl,
  createOsuClient,
  OsuResponseError,
  parseRetryAfter
} from '../src/v1/services/osu-client'
import { OpaqueCursor } from '../src/v1/utils/rankings-cursor'
import { metrics } from '../src/metrics'

const originalEnv = {
  id: process.env.OSU_CLIENT_ID,
  secret: process.env.OSU_CLIENT_SECRET,
  origin: process.env.OSU_API_ORIGIN
}

const fetchMock = vi.fn(
  async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    throw new Error('Unexpected fetch call')
  }
)

function jsonResponse(data: unknown, status = 200) {
  return new Response(JSON.stringify(data), {
    status,
    headers: {
      'content-type': 'application/json'
    }
  })
}

function restoreEnv(key: string, value: string | undefined) {
  if (value === undefined) {
    delete process.env[key]
  } else {
    process.env[key] = value
  }
}

function requestCount(operation: string, status: string) {
  const sample = metrics
    .list()
    .find(
      (entry) =>
        entry.metric === 'osu_requests_total' &&
        entry.labels.operation === operation &&
        entry.labels.status === status
    )
  return sample?.value ?? 0
}

beforeEach(() => {
  process.env.OSU_CLIENT_ID = 'test-client'
  process.env.OSU_CLIENT_SECRET = 'test-secret'
  delete process.env.OSU_API_ORIGIN

  fetchMock.mockReset()
  fetchMock.mockImplementation(async () => {
    throw new Error('Unexpected fetch call')
  })
  vi.stubGlobal('fetch', fetchMock)
})

afterEach(() => {
  vi.unstubAllGlobals()
  restoreEnv('OSU_CLIENT_ID', originalEnv.id)
  restoreEnv('OSU_CLIENT_SECRET', originalEnv.secret)
  restoreEnv('OSU_API_ORIGIN', originalEnv.origin)
})

describe('createOsuClient', () => {
  it('throws when osu! credentials are missing', () => {
    delete process.env.OSU_CLIENT_ID
    delete process.env.OSU_CLIENT_SECRET

    expect(() => createOsuClient()).toThrow(ApiError)
  })

  it('deduplicates concurrent access token requests and caches the result', async () => {
    let tokenRequests = 0
    let tokenBody = ''

    fetchMock.mockImplementation(async (input, init) => {
      const url = String(input)
      if (url === 'https://osu.ppy.sh/oauth/token') {
        tokenRequests += 1
        tokenBody = String(init?.body)
        return jsonResponse({ access_token: 'token-123', expires_in: 86400, token_type: 'Bearer' })
      }
      throw new Error(`Unexpected fetch for ${url}`)
    })

    const client = createOsuClient()
    expect(client.getTokenCacheMeta()).toBeNull()

    const [resultA, resultB] = await Promise.all([
      client.getAccessToken(),
      client.getAccessToken()
    ])
    const resultC = await client.getAccessToken()

    expect(resultA.token).toBe('token-123')
    expect(resultB).toEqual(resultA)
    expect(resultC).toEqual(resultA)
    expect(tokenRequests).toBe(1)

    const params = new URLSearchParams(tokenBody)
    expect(params.get('client_id')).toBe('test-client')
    expect(params.get('client_secret')).toBe('test-secret')
    expect(params.get('grant_type')).toBe('client_credentials')
    expect(params.get('scope')).toBe('public')

    expect(client.getTokenCacheMeta()?.expiresAt).toBe(resultA.expiresAt)
  })

  it('submits routed requests with the bearer token and API version', async () => {
    let resourceUrl = ''
    let resourceHeaders = new Headers()

    fetchMock.mockImplementation(async (input, init) => {
      const url = String(input)
      if (url.endsWith('/oauth/token')) {
        return jsonResponse({ access_token: 'cached-token', expires_in: 3600 })
      }
      resourceUrl = url
      resourceHeaders = new Headers(init?.headers)
      return jsonResponse({ value: 42 })
    })

    const client = createOsuClient()
    const before = requestCount('rankings', 'success')
    const data = await client.submit({
      route: 'rankings',
      mode: 'taiko',
      rankingType: 'score',
      page: 3
    })

    expect(data).toEqual({ value: 42 })
    const parsed = new URL(resourceUrl)
    expect(parsed.origin).toBe('https://osu.ppy.sh')
    expect(parsed.pathname).toBe('/api/v2/rankings/taiko/score')
    expect(parsed.searchParams.get('cursor[page]')).toBe('3')
    expect(resourceHeaders.get('authorization')).toBe('Bearer cached-token')
    expect(resourceHeaders.get('x-api-version')).toBe('20220705')
    expect(fetchMock).toHaveBeenCalledTimes(2)
    expect(requestCount('rankings', 'success')).toBe(before + 1)
  })

  it('uses the configured API origin', async () => {
    process.env.OSU_API_ORIGIN = 'https://osu.example.test'
    const urls: string[] = []

    fetchMock.mockImplementation(async (input) => {
      const url = String(input)
      urls.push(url)
      if (url.endsWith('/oauth/token')) {
        return jsonResponse({ access_token: 'token-origin', expires_in: 3600 })
      }
      return jsonResponse({ ok: true })
    })

    const client = createOsuClient()
    await client.submit({
      route: 'news',
      limit: 5,
      cursor: new OpaqueCursor({ published_at: '2026-09-01', id: 9 })
    })

    expect(urls[0]).toBe('https://osu.example.test/oauth/token')
    const parsed = new URL(urls[1] ?? '')
    expect(parsed.origin).toBe('https://osu.example.test')
    expect(parsed.pathname).toBe('/api/v2/news')
    expect([...parsed.searchParams.entries()]).toEqual([
      ['limit', '5'],
      ['cursor[published_at]', '2026-09-01'],
      ['cursor[id]', '9']
    ])
  })

  it('raises an ApiError when token acquisition fails', async () => {
    fetchMock.mockImplementation(async (input) => {
      const url = String(input)
      if (url.endsWith('/oauth/token')) {
        return new Response('unauthorized', { status: 401 })
      }
      throw new Error(`Unexpected fetch ${url}`)
    })

    const client = createOsuClient()
    await expect(client.getAccessToken()).rejects.toMatchObject({
      code: 'osu:token_failed',
      status: 502,
      upstreamStatus: 401
    })
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })

  it('wraps non-404 request failures into ApiError responses without retrying client errors', async () => {
    let resourceAttempts = 0

    fetchMock.mockImplementation(async (input) => {
      const url = String(input)
      if (url.endsWith('/oauth/token')) {
        return jsonResponse({ access_token: 'token-err', expires_in: 3600 })
      }
      resourceAttempts += 1
      return new Response('bad request', { status: 400 })
    })

    const client = createOsuClient()
    await expect(
      client.submit({ route: 'chart-rankings', mode: 'osu', spotlight: 12 })
    ).rejects.toMatchObject({
      code: 'osu:request_failed',
      status: 502,
      upstreamStatus: 400
    })
    expect(resourceAttempts).toBe(1)
  })

  it('maps 404 responses to not_found ApiError code', async () => {
    fetchMock.mockImplementation(async (input) => {
      const url = String(input)
      if (url.endsWith('/oauth/token')) {
        return jsonResponse({ access_token: 'token-404', expires_in: 3600 })
      }
      return new Response('missing', { status: 404 })
    })

    const client = createOsuClient()
    await expect(
      client.submit({ route: 'chart-rankings', mode: 'mania', spotlight: 999999 })
    ).rejects.toMatchObject({
      code: 'osu:not_found',
      status: 404,
      upstreamStatus: 404
    })
  })

  it('retries transient osu! API errors before succeeding', async () => {
    let resourceAttempts = 0

    fetchMock.mockImplementation(async (input) => {
      const url = String(input)
      if (url.endsWith('/oauth/token')) {
        return jsonResponse({ access_token: 'token-retry', expires_in: 3600 })
      }
      resourceAttempts += 1
      if (resourceAttempts === 1) {
        return new Response('service unavailable', { status: 503 })
      }
      return jsonResponse({ ok: true })
    })

    const client = createOsuClient()
    const data = await client.submit({ route: 'rankings', mode: 'osu', rankingType: 'performance' })

    expect(data).toEqual({ ok: true })
    expect(resourceAttempts).toBe(2)
  })

  it('retries network errors before surfacing failure', async () => {
    let attempts = 0

    fetchMock.mockImplementation(async (input) => {
      const url = String(input)
      if (url.endsWith('/oauth/token')) {
        return jsonResponse({ access_token: 'token-network', expires_in: 3600 })
      }
      attempts += 1
      if (attempts === 1) {
        throw new Error('Temporary network issue')
      }
      return jsonResponse({ ok: true })
    })

    const client = createOsuClient()
    const data = await client.submit({ route: 'news' })

    expect(data).toEqual({ ok: true })
    expect(attempts).toBe(2)
  })

  it('retries token acquisition when transient errors occur', async () => {
    let tokenAttempts = 0

    fetchMock.mockImplementation(async (input) => {
      const url = String(input)
      if (url.endsWith('/oauth/token')) {
        tokenAttempts += 1
        if (tokenAttempts === 1) {
          return new Response('upstream error', { status: 502 })
        }
        return jsonResponse({ access_token: 'token-after-retry', expires_in: 3600 })
      }
      return jsonResponse({ ok: true })
    })

    const client = createOsuClient()
    const token = await client.getAccessToken()

    expect(token.token).toBe('token-after-retry')
    expect(tokenAttempts).toBe(2)
  })

  it('reports a body that is not JSON as a bad gateway without retrying', async () => {
    let resourceAttempts = 0

    fetchMock.mockImplementation(async (input) => {
      const url = String(input)
      if (url.endsWith('/oauth/token')) {
        return jsonResponse({ access_token: 'token-html', expires_in: 3600 })
      }
      resourceAttempts += 1
      return new Response('<html>maintenance</html>', { status: 200 })
    })

    const client = createOsuClient()
    await expect(client.submit({ route: 'news' })).rejects.toMatchObject({
      code: 'osu:request_failed',
      status: 502,
      upstreamStatus: 200,
      message: 'osu! API returned a body that is not JSON',
      details: { path: '/api/v2/news', status: 200 }
    })
    expect(resourceAttempts).toBe(1)
  })

  it('waits out a rate limit that names a short Retry-After', async () => {
    let resourceAttempts = 0

    fetchMock.mockImplementation(async (input) => {
      const url = String(input)
      if (url.endsWith('/oauth/token')) {
        return jsonResponse({ access_token: 'token-429', expires_in: 3600 })
      }
      resourceAttempts += 1
      if (resourceAttempts === 1) {
        return new Response('slow down', { status: 429, headers: { 'retry-after': '0' } })
      }
      return jsonResponse({ ok: true })
    })

    const client = createOsuClient()
    const data = await client.submit({ route: 'rankings', mode: 'taiko', rankingType: 'score' })

    expect(data).toEqual({ ok: true })
    expect(resourceAttempts).toBe(2)
  })

  it('gives up at once when Retry-After asks for a long wait', async () => {
    let resourceAttempts = 0

    fetchMock.mockImplementation(async (input) => {
      const url = String(input)
      if (url.endsWith('/oauth/token')) {
        return jsonResponse({ access_token: 'token-429-long', expires_in: 3600 })
      }
      resourceAttempts += 1
      return new Response('slow down', { status: 429, headers: { 'retry-after': '120' } })
    })

    const client = createOsuClient()
    const error = await client.submit({ route: 'news' }).catch((reason: unknown) => reason)

    expect(error).toBeInstanceOf(OsuResponseError)
    expect(error).toMatchObject({
      code: 'osu:request_failed',
      status: 502,
      upstreamStatus: 429,
      retryAfterMs: 120000
    })
    expect(resourceAttempts).toBe(1)
  })

  it('does not retry an aborted request', async () => {
    fetchMock.mockImplementation(async (input) => {
      const url = String(input)
      if (url.endsWith('/oauth/token')) {
        return jsonResponse({ access_token: 'token-abort', expires_in: 3600 })
      }
      return jsonResponse({ ok: true })
    })

    const client = createOsuClient()
    await client.getAccessToken()
    const controller = new AbortController()
    controller.abort()

    const error = await client
      .submit({ route: 'news' }, { signal: controller.signal })
      .catch((reason: unknown) => reason)

    expect(error instanceof DOMException ? error.name : null).toBe('AbortError')
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })
})

describe('buildUrl', () => {
  it('appends repeated query pairs in order', () => {
    expect(
      buildUrl('https://osu.example.test', 'api/v2/news', [
        ['cursor[]', 'a'],
        ['cursor[]', 'b']
      ])
    ).toBe('https://osu.example.test/api/v2/news?cursor%5B%5D=a&cursor%5B%5D=b')
  })
})

describe('parseRetryAfter', () => {
  it('reads delay-seconds', () => {
    expect(parseRetryAfter('3')).toBe(3000)
    expect(parseRetryAfter(' 0 ')).toBe(0)
  })

  it('reads an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT')

    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:05 GMT', now)).toBe(5000)
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:27:00 GMT', now)).toBe(0)
  })

  it('ignores a missing or unreadable header', () => {
    expect(parseRetryAfter(null)).toBeNull()
    expect(parseRetryAfter('soon')).toBeNull()
  })
})
