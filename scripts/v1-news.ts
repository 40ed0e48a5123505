export {}

const args = process.argv.slice(2)
const maxPages = Number(args[0] ?? '1')

if (!Number.isInteger(maxPages) || maxPages < 1) {
  console.error('Usage: tsx scripts/v1-news.ts [pages] [year]')
  process.exit(1)
}

const baseUrl = process.env.API_BASE_URL || 'http://localhost:3000/v1'
const yearArg = args[1]

interface NewsPayload {
  data: { posts: Array<{ published_at: string; title: string }> }
  meta: { nextCursor: string | null }
}

async function fetchPage(cursor: string | null): Promise<NewsPayload> {
  const url = new URL(`${baseUrl}/news`)
  if (yearArg) {
    url.searchParams.set('year', yearArg)
  }
  if (cursor) {
    url.searchParams.set('cursor', cursor)
  }

  const response = await fetch(url.toString())
  if (!response.ok) {
    const body = await response.text()
    throw new Error(`Request failed (${response.status}): ${body}`)
  }
  return response.json()
}

async function main() {
  let cursor: string | null = null

  for (let page = 1; page <= maxPages; page += 1) {
    const payload = await fetchPage(cursor)
    console.log(`=== /v1 news page ${page} ===`)
    for (const post of payload.data.posts) {
      console.log(`${post.published_at}  ${post.title}`)
    }

    cursor = payload.meta.nextCursor
    if (!cursor) {
      break
    }
  }
}

main().catch((error) => {
  console.error('Failed to walk /v1 news pages', error)
  process.exit(1)
})
