import { setTimeout as wait } from 'node:timers/promises'
import { z } from 'zod'
import { ApiError, type ApiErrorOptions } from '../utils/errors'
import { routeRequest } from '../utils/routing'
import type { OsuRequest } from '../types'
import { metrics } from '../../metrics'

const MAX_FETCH_RETRIES = 2
const BASE_RETRY_DELAY_MS = 250
const MAX_BACKOFF_MS = 2000
// Longer waits are left to the caller instead of holding the request open
const MAX_RETRY_AFTER_MS = 5000
const RETRYABLE_STATUS_CODES = new Set([408, 425, 429, 500, 502, 503, 504])
const DEFAULT_API_ORIGIN = 'https://osu.ppy.sh'
const DEFAULT_API_VERSION = '20220705'

const TokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number()
})

/** A non-success answer from the osu! API, with the wait it asked for through `Retry-After`. */
export class OsuResponseError extends ApiError {
  readonly retryAfterMs: number | null

  constructor(options: ApiErrorOptions, retryAfterMs: number | null) {
    super(options)
    this.name = 'OsuResponseError'
    this.retryAfterMs = retryAfterMs
  }
}

export interface SubmitOptions {
  signal?: AbortSignal
}

/** Sends one logical request to the osu! API and resolves with the raw JSON body. */
export interface OsuTransport {
  submit(request: OsuRequest, options?: SubmitOptions): Promise<unknown>
}

export interface AccessToken {
  token: string
  expiresAt: number | null
}

export interface OsuClient extends OsuTransport {
  getAccessToken(): Promise<AccessToken>
  getTokenCacheMeta(): { expiresAt: number | null } | null
}

export function createOsuClient(): OsuClient {
  const clientId = process.env.OSU_CLIENT_ID
  const clientSecret = process.env.OSU_CLIENT_SECRET

  if (!clientId || !clientSecret) {
    throw new ApiError({
      status: 500,
      code: 'osu:credentials_missing',
      message: 'OSU_CLIENT_ID and OSU_CLIENT_SECRET must be configured'
    })
  }

  const apiOrigin = process.env.OSU_API_ORIGIN || DEFAULT_API_ORIGIN
  const apiVersion = process.env.OSU_API_VERSION || DEFAULT_API_VERSION

  let cachedToken: AccessToken | null = null
  let pendingTokenRequest: Promise<AccessToken> | null = null

  async function requestAccessToken(): Promise<AccessToken> {
    const body = new URLSearchParams({
      client_id: clientId ?? '',
      client_secret: clientSecret ?? '',
      grant_type: 'client_credentials',
      scope: 'public'
    })

    const response = await withOsuRetries(
      async () => {
        const res = await fetch(`${apiOrigin}/oauth/token`, {
          method: 'POST',
          headers: {
            Accept: 'application/json',
            'Content-Type': 'application/x-www-form-urlencoded'
          },
          body: body.toString()
        })

        if (!res.ok) {
          const text = await res.text()
          throw new OsuResponseError(
            {
              status: 502,
              code: 'osu:token_failed',
              message: `Failed to obtain osu! API token (${res.status})`,
              details: { body: text },
              upstreamStatus: res.status
            },
            parseRetryAfter(res.headers.get('retry-after'))
          )
        }

        return res
      },
      { label: 'token' }
    )

    const payload: unknown = await response.json().catch((error: unknown) => {
      throw new ApiError({
        status: 502,
        code: 'osu:token_failed',
        message: 'osu! API returned a token response that is not JSON',
        upstreamStatus: response.status,
        cause: error
      })
    })
    const parsed = TokenResponseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new ApiError({
        status: 502,
        code: 'osu:token_failed',
        message: 'osu! API returned a malformed token response',
        cause: parsed.error
      })
    }

    const expiresAt = Date.now() + Math.max(parsed.data.expires_in - 60, 1) * 1000
    const entry: AccessToken = { token: parsed.data.access_token, expiresAt }
    cachedToken = entry
    return entry
  }

  async function ensureAccessToken(): Promise<AccessToken> {
    if (cachedToken && (!cachedToken.expiresAt || cachedToken.expiresAt > Date.now())) {
      return cachedToken
    }

    if (pendingTokenRequest) {
      return pendingTokenRequest
    }

    const request = requestAccessToken().finally(() => {
      pendingTokenRequest = null
    })
    pendingTokenRequest = request
    return request
  }

  async function submit(request: OsuRequest, options: SubmitOptions = {}): Promise<unknown> {
    const { signal } = options
    const { token } = await ensureAccessToken()
    const { path, query } = routeRequest(request)
    const resourceUrl = buildUrl(apiOrigin, path, query)

    return withOsuRetries(
      async () => {
        const response = await fetch(resourceUrl, {
          headers: {
            Accept: 'application/json',
            Authorization: `Bearer ${token}`,
            'x-api-version': apiVersion
          },
          signal
        })

        if (!response.ok) {
          const body = await response.text()
          const notFound = response.status === 404
          throw new OsuResponseError(
            {
              status: notFound ? 404 : 502,
              code: notFound ? 'osu:not_found' : 'osu:request_failed',
              message: notFound
                ? 'Resource not found in osu! API'
                : `osu! API request failed (${response.status})`,
              details: {
                path,
                status: response.status,
                body
              },
              upstreamStatus: response.status
            },
            parseRetryAfter(response.headers.get('retry-after'))
          )
        }

        try {
          const body: unknown = await response.json()
          return body
        } catch (error) {
          throw new ApiError({
            status: 502,
            code: 'osu:request_failed',
            message: 'osu! API returned a body that is not JSON',
            details: { path, status: response.status },
            upstreamStatus: response.status,
            cause: error
          })
        }
      },
      { signal, label: request.route }
    )
  }

  function getTokenCacheMeta() {
    return cachedToken ? { expiresAt: cachedToken.expiresAt } : null
  }

  return {
    getAccessToken: ensureAccessToken,
    submit,
    getTokenCacheMeta
  }
}

export function buildUrl(origin: string, path: string, query: ReadonlyArray<[string, string]>) {
  const url = new URL(path.startsWith('/') ? path : `/${path}`, origin)

  for (const [name, value] of query) {
    url.searchParams.append(name, value)
  }

  return url.toString()
}

/**
 * Reads `Retry-After` as delay-seconds or an HTTP date.
 * Returns the wait in milliseconds, or null when the header is absent or unreadable.
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number | null {
  if (value === null) {
    return null
  }
  const trimmed = value.trim()
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000
  }
  const date = Date.parse(trimmed)
  return Number.isNaN(date) ? null : Math.max(date - now, 0)
}

interface RetryContext {
  label: string
  signal?: AbortSignal
}

async function withOsuRetries<T>(
  send: () => Promise<T>,
  { label, signal }: RetryContext
): Promise<T> {
  for (let attempt = 0; ; attempt += 1) {
    signal?.throwIfAborted()

    try {
      const result = await send()
      metrics.increment('osu_requests_total', 1, { status: 'success', operation: label })
      return result
    } catch (error) {
      if (signal?.aborted) {
        throw error
      }
      const delay = attempt < MAX_FETCH_RETRIES ? nextAttemptDelay(error, attempt) : null
      if (delay === null) {
        metrics.increment('osu_requests_total', 1, { status: statusLabel(error), operation: label })
        throw error
      }
      metrics.increment('osu_retry_total', 1, { operation: label })
      await wait(delay, undefined, { signal })
    }
  }
}

/** Milliseconds to wait before sending again, or null when the failure is final. */
function nextAttemptDelay(error: unknown, attempt: number): number | null {
  if (error instanceof OsuResponseError) {
    const status = error.upstreamStatus ?? 0
    if (!RETRYABLE_STATUS_CODES.has(status) && status < 500) {
      return null
    }
    if (error.retryAfterMs !== null) {
      return error.retryAfterMs <= MAX_RETRY_AFTER_MS ? error.retryAfterMs : null
    }
    return backoff(attempt)
  }
  // Other API errors come from reading a response that did arrive
  if (error instanceof ApiError) {
    return null
  }
  // Connection failures carry no response
  return error instanceof Error ? backoff(attempt) : null
}

function backoff(attempt: number) {
  return Math.min(BASE_RETRY_DELAY_MS * 2 ** attempt, MAX_BACKOFF_MS) + Math.random() * 100
}

function statusLabel(error: unknown) {
  if (error instanceof ApiError) {
    return String(error.upstreamStatus ?? error.status)
  }
  return 'error'
}
