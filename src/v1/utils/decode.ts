import { z } from 'zod'
import { DecodeError, isDecodeError, type DecodePath } from './errors'
import type { JsonValue } from '../types'

export const u32Schema = z.number().int().min(0).max(0xffffffff)
export const u64Schema = z.number().int().min(0)

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema)
  ])
)

export type WireSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Runs `schema` over a wire value, turning zod failures into a `DecodeError` rooted at `path`. */
export function parseWireValue<T>(
  schema: WireSchema<T>,
  value: unknown,
  path: DecodePath | string
): T {
  const result = schema.safeParse(value)
  if (result.success) {
    return result.data
  }
  throw fromZodError(result.error, typeof path === 'string' ? [path] : path)
}

/** Reads a key that must be present; `undefined` is reported as a missing field. */
export function readRequired<T>(
  record: Record<string, unknown>,
  key: string,
  schema: WireSchema<T>
): T {
  const value = record[key]
  if (value === undefined) {
    throw DecodeError.missingField(key)
  }
  return parseWireValue(schema, value, key)
}

/** Hands `record[key]` (possibly undefined) to `decode`, re-rooting its errors below `key`. */
export function decodeKey<T>(
  record: Record<string, unknown>,
  key: string,
  decode: (value: unknown) => T
): T {
  try {
    return decode(record[key])
  } catch (error) {
    throw isDecodeError(error) ? error.within(key) : error
  }
}

export function decodeRequiredKey<T>(
  record: Record<string, unknown>,
  key: string,
  decode: (value: unknown) => T
): T {
  if (record[key] === undefined) {
    throw DecodeError.missingField(key)
  }
  return decodeKey(record, key, decode)
}

/** Decodes every element of a wire array, reporting failures with the element index. */
export function decodeList<T>(
  value: unknown,
  decodeItem: (item: unknown) => T,
  expected: string
): T[] {
  if (!Array.isArray(value)) {
    throw DecodeError.typeMismatch([], expected)
  }

  return value.map((item, index) => {
    try {
      return decodeItem(item)
    } catch (error) {
      throw isDecodeError(error) ? error.within(index) : error
    }
  })
}

export function requireRecord(
  value: unknown,
  expected: string,
  path: DecodePath = []
): Record<string, unknown> {
  if (!isRecord(value)) {
    throw DecodeError.typeMismatch(path, expected)
  }
  return value
}

export function fromZodError(error: z.ZodError, path: DecodePath): DecodeError {
  const issue = error.issues[0]
  if (!issue) {
    return DecodeError.typeMismatch(path, 'a valid value', error)
  }

  const issuePath = [...path, ...issue.path]
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined) {
    const missing = DecodeError.missingField(issuePath)
    missing.cause = error
    return missing
  }

  const expected =
    issue.code === z.ZodIssueCode.invalid_type ? `${issue.expected}` : issue.message.toLowerCase()
  return DecodeError.typeMismatch(issuePath, expected, error)
}
