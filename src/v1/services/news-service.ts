import type { OsuTransport } from './osu-client'
import { decodeNews, type News } from '../models/news'
import type { OpaqueCursor } from '../utils/rankings-cursor'

export interface NewsOptions {
  limit?: number
  year?: number
  cursor?: OpaqueCursor
  signal?: AbortSignal
}

export interface NewsService {
  getNews(options?: NewsOptions): Promise<News>
}

export function createNewsService(transport: OsuTransport): NewsService {
  return {
    async getNews(options = {}) {
      const { limit, year, cursor, signal } = options
      const body = await transport.submit({ route: 'news', limit, year, cursor }, { signal })
      return decodeNews(body)
    }
  }
}
