import type { JsonValue, OsuRequest } from '../types'

export const API_PATH_PREFIX = '/api/v2'

export interface RoutedRequest {
  path: string
  query: Array<[string, string]>
}

export function routeRequest(request: OsuRequest): RoutedRequest {
  switch (request.route) {
    case 'rankings': {
      const query: Array<[string, string]> = []
      if (request.page != null) {
        query.push(['cursor[page]', String(request.page)])
      }
      return {
        path: `${API_PATH_PREFIX}/rankings/${request.mode}/${request.rankingType}`,
        query
      }
    }
    case 'chart-rankings': {
      const query: Array<[string, string]> = []
      if (request.spotlight != null) {
        query.push(['spotlight', String(request.spotlight)])
      }
      return { path: `${API_PATH_PREFIX}/rankings/${request.mode}/charts`, query }
    }
    case 'news': {
      const query: Array<[string, string]> = []
      if (request.limit != null) {
        query.push(['limit', String(request.limit)])
      }
      if (request.year != null) {
        query.push(['year', String(request.year)])
      }
      if (request.cursor) {
        query.push(...flattenCursor('cursor', request.cursor.token))
      }
      return { path: `${API_PATH_PREFIX}/news`, query }
    }
  }
}

/** Spreads an object token over `cursor[key]` parameters, the form the API reads it back in. */
function flattenCursor(name: string, token: JsonValue): Array<[string, string]> {
  if (token === null) {
    return []
  }
  if (Array.isArray(token)) {
    return token.flatMap((entry) => flattenCursor(`${name}[]`, entry))
  }
  if (typeof token === 'object') {
    return Object.entries(token).flatMap(([key, value]) => flattenCursor(`${name}[${key}]`, value))
  }
  return [[name, String(token)]]
}
