import { ApiError, DecodeError } from './errors'
import { isRecord, jsonValueSchema, parseWireValue, u32Schema } from './decode'
import type { JsonValue } from '../types'

/**
 * Position in a page-numbered ranking. Which wire shape produced it is not kept.
 */
export type PageCursor = { readonly kind: 'none' } | { readonly kind: 'page'; readonly page: number }

export const NO_MORE_PAGES: PageCursor = Object.freeze({ kind: 'none' })

export function pageCursor(page: number): PageCursor {
  return Object.freeze({ kind: 'page', page })
}

export function nextPageNumber(cursor: PageCursor): number | null {
  return cursor.kind === 'page' ? cursor.page : null
}

/**
 * Ranking endpoints send the cursor as `null`, as a bare page number or as
 * `{ "page": n, ... }`.
 */
export function decodeRankingsCursor(value: unknown): PageCursor {
  if (value == null) {
    return NO_MORE_PAGES
  }

  if (typeof value === 'number') {
    return pageCursor(parseWireValue(u32Schema, value, []))
  }

  if (isRecord(value)) {
    if (value.page === undefined) {
      throw DecodeError.missingField('page')
    }
    return pageCursor(parseWireValue(u32Schema, value.page, 'page'))
  }

  throw DecodeError.typeMismatch([], 'a u32, a map containing a `page` field, or null')
}

export function encodeRankingsCursor(cursor: PageCursor): number | undefined {
  return cursor.kind === 'page' ? cursor.page : undefined
}

/**
 * Forward-only token of list and search endpoints. It is stored and sent back
 * exactly as received.
 */
export class OpaqueCursor {
  constructor(readonly token: JsonValue) {}

  toJSON(): JsonValue {
    return this.token
  }

  /** Encodes the token for callers of this service, who get it back as a query parameter. */
  toTransportString(): string {
    return Buffer.from(JSON.stringify(this.token), 'utf8').toString('base64url')
  }

  static fromTransportString(value: string): OpaqueCursor {
    const result = jsonValueSchema.safeParse(parseTransportJson(value))
    if (!result.success) {
      throw invalidTransportCursor(result.error)
    }
    return new OpaqueCursor(result.data)
  }
}

function parseTransportJson(value: string): unknown {
  try {
    return JSON.parse(Buffer.from(value, 'base64url').toString('utf8'))
  } catch (error) {
    throw invalidTransportCursor(error)
  }
}

function invalidTransportCursor(cause: unknown) {
  return new ApiError({
    status: 400,
    code: 'news:invalid_cursor',
    message: 'Cursor is invalid or malformed',
    cause
  })
}

export function decodeOpaqueCursor(value: unknown): OpaqueCursor | null {
  if (value == null) {
    return null
  }
  return new OpaqueCursor(parseWireValue(jsonValueSchema, value, []))
}
