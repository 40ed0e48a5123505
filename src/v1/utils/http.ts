import type { Context } from 'hono'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import { z } from 'zod'
import { isApiError } from './errors'

export const StandardResponseSchema = z.object({
  data: z.unknown(),
  meta: z
    .record(z.string(), z.unknown())
    .optional()
})

export type StandardResponse<T> = {
  data: T
  meta?: Record<string, unknown>
}

export function ok<T>(c: Context, body: StandardResponse<T>, status: ContentfulStatusCode = 200) {
  return c.json(body, status)
}

export function handleError(c: Context, error: unknown): Response {
  if (isApiError(error)) {
    const payload = {
      error: {
        code: error.code,
        message: error.message,
        ...(error.details ? { details: error.details } : {})
      }
    }
    return c.json(payload, error.status)
  }

  console.error('Unhandled error', error)
  const payload = {
    error: {
      code: 'server:unexpected',
      message: 'An unexpected error occurred'
    }
  }
  return c.json(payload, 500)
}

