import { z } from 'zod'
import {
  decodeKey,
  decodeList,
  decodeRequiredKey,
  parseWireValue,
  readRequired,
  requireRecord,
  u32Schema
} from '../utils/decode'
import { decodeOpaqueCursor, type OpaqueCursor } from '../utils/rankings-cursor'
import { freezePage, type ResultPage } from './result-page'

export interface NewsPost {
  postId: number
  author: string
  /** Link to the file view on GitHub. */
  editUrl: string
  firstImage: string
  publishedAt: string
  updatedAt?: string
  /** Filename without the extension, used in URLs. */
  slug: string
  title: string
  /** First paragraph of the content with HTML markup stripped. */
  preview?: string
}

export interface NewsSearch {
  cursor: OpaqueCursor | null
  limit: number
}

export interface NewsSidebar {
  currentYear: number
  posts: NewsPost[]
  years: number[]
}

/**
 * A page of the news listing. The next page is requested by handing the
 * cursor back verbatim, so no further context is kept.
 */
export interface News extends ResultPage<NewsPost, OpaqueCursor | null, null> {
  readonly search: NewsSearch
  readonly sidebar: NewsSidebar
}

const NewsPostWireSchema = z.object({
  id: u32Schema,
  author: z.string(),
  edit_url: z.string(),
  first_image: z.string(),
  published_at: z.string(),
  updated_at: z.string().nullish(),
  slug: z.string(),
  title: z.string(),
  preview: z.string().nullish()
})

export function decodeNewsPost(value: unknown): NewsPost {
  const wire = parseWireValue(NewsPostWireSchema, value, [])
  return {
    postId: wire.id,
    author: wire.author,
    editUrl: wire.edit_url,
    firstImage: wire.first_image,
    publishedAt: wire.published_at,
    updatedAt: wire.updated_at ?? undefined,
    slug: wire.slug,
    title: wire.title,
    preview: wire.preview ?? undefined
  }
}

function decodeNewsPostList(value: unknown): NewsPost[] {
  return decodeList(value, decodeNewsPost, 'a list of news posts')
}

function decodeNewsSearch(value: unknown): NewsSearch {
  const record = requireRecord(value, 'a news search map')
  return {
    cursor: decodeKey(record, 'cursor', decodeOpaqueCursor),
    limit: readRequired(record, 'limit', u32Schema)
  }
}

function decodeNewsSidebar(value: unknown): NewsSidebar {
  const record = requireRecord(value, 'a news sidebar map')
  return {
    currentYear: readRequired(record, 'current_year', u32Schema),
    posts: decodeRequiredKey(record, 'news_posts', decodeNewsPostList),
    years: readRequired(record, 'years', z.array(u32Schema))
  }
}

export function decodeNews(body: unknown): News {
  const record = requireRecord(body, 'a news listing map')

  return freezePage({
    items: decodeRequiredKey(record, 'news_posts', decodeNewsPostList),
    cursor: decodeKey(record, 'cursor', decodeOpaqueCursor),
    context: null,
    search: decodeRequiredKey(record, 'search', decodeNewsSearch),
    sidebar: decodeRequiredKey(record, 'news_sidebar', decodeNewsSidebar)
  })
}

export function encodeNewsPost(post: NewsPost): Record<string, unknown> {
  return {
    id: post.postId,
    author: post.author,
    edit_url: post.editUrl,
    first_image: post.firstImage,
    published_at: post.publishedAt,
    ...(post.updatedAt !== undefined ? { updated_at: post.updatedAt } : {}),
    slug: post.slug,
    title: post.title,
    ...(post.preview !== undefined ? { preview: post.preview } : {})
  }
}
