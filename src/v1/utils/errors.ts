import type { ContentfulStatusCode } from 'hono/utils/http-status'

export interface ApiErrorOptions {
  status: ContentfulStatusCode
  code: string
  message: string
  details?: Record<string, unknown>
  upstreamStatus?: number
  cause?: unknown
}

export class ApiError extends Error {
  status: ContentfulStatusCode
  code: string
  details?: Record<string, unknown>
  /** HTTP status returned by the osu! API, when the error came from there. */
  upstreamStatus?: number

  constructor(options: ApiErrorOptions) {
    super(options.message)
    this.name = 'ApiError'
    this.status = options.status
    this.code = options.code
    this.details = options.details
    this.upstreamStatus = options.upstreamStatus

    if (options.cause) {
      this.cause = options.cause
    }
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError
}

export type DecodeErrorKind = 'missing_field' | 'type_mismatch'

export type DecodePath = ReadonlyArray<string | number>

/**
 * A response body from the osu! API that could not be turned into a model.
 * `field` is the wire key at fault, `path` locates it from the root of the body.
 */
export class DecodeError extends ApiError {
  kind: DecodeErrorKind
  field: string
  path: DecodePath

  constructor(kind: DecodeErrorKind, path: DecodePath, message: string, cause?: unknown) {
    const field = path.length ? String(path[path.length - 1]) : ''
    super({
      status: 502,
      code: `osu:${kind}`,
      message,
      details: { path: formatPath(path) },
      cause
    })
    this.name = 'DecodeError'
    this.kind = kind
    this.field = field
    this.path = path
  }

  static missingField(path: DecodePath | string) {
    const segments = typeof path === 'string' ? [path] : path
    return new DecodeError(
      'missing_field',
      segments,
      `missing field \`${segments.length ? String(segments[segments.length - 1]) : ''}\``
    )
  }

  static typeMismatch(path: DecodePath | string, expected: string, cause?: unknown) {
    const segments = typeof path === 'string' ? [path] : path
    return new DecodeError('type_mismatch', segments, `invalid type, expected ${expected}`, cause)
  }

  /** Re-roots the error below `prefix`, keeping its kind and cause. */
  within(...prefix: Array<string | number>): DecodeError {
    return new DecodeError(this.kind, [...prefix, ...this.path], this.message, this.cause)
  }
}

export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError
}

/** Signals a state the types rule out; reaching it is a defect, not a caller error. */
export function unreachable(what: string, value: unknown): never {
  throw new ApiError({
    status: 500,
    code: 'rankings:unreachable_state',
    message: `Unreachable ${what}: ${String(value)}`
  })
}

function formatPath(path: DecodePath) {
  return path
    .map((segment, index) =>
      typeof segment === 'number' ? `[${segment}]` : index === 0 ? segment : `.${segment}`
    )
    .join('')
}
