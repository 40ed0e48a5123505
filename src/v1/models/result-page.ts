import { OpaqueCursor, type PageCursor } from '../utils/rankings-cursor'

export type ResultCursor = PageCursor | OpaqueCursor | null

/**
 * One fetched page: its items, where the next page starts and whatever the
 * next request needs beyond the cursor. Pages are frozen once built.
 */
export interface ResultPage<TItem, TCursor extends ResultCursor, TContext> {
  readonly items: ReadonlyArray<TItem>
  readonly cursor: TCursor
  readonly context: TContext
}

export function hasMore(page: ResultPage<unknown, ResultCursor, unknown>): boolean {
  const { cursor } = page
  if (cursor === null) {
    return false
  }
  if (cursor instanceof OpaqueCursor) {
    return true
  }
  return cursor.kind === 'page'
}

export function freezePage<T extends ResultPage<unknown, ResultCursor, unknown>>(page: T): Readonly<T> {
  Object.freeze(page.items)
  return Object.freeze(page)
}
