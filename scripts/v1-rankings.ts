export {}

const args = process.argv.slice(2)
const [modeArg, typeArg] = args

if (!modeArg || !typeArg) {
  console.error(
    'Usage: tsx scripts/v1-rankings.ts <osu|taiko|fruits|mania> <performance|score|country> [page] [pages]'
  )
  process.exit(1)
}

const baseUrl = process.env.API_BASE_URL || 'http://localhost:3000/v1'
const pageArg = args[2]
const pagesArg = args[3]

async function main() {
  const url = new URL(`${baseUrl}/rankings/${modeArg}/${typeArg}`)
  if (pageArg) {
    url.searchParams.set('page', pageArg)
  }
  if (pagesArg) {
    url.searchParams.set('pages', pagesArg)
  }

  const response = await fetch(url.toString())
  if (!response.ok) {
    const body = await response.text()
    throw new Error(`Request failed (${response.status}): ${body}`)
  }

  const payload: unknown = await response.json()
  console.log(JSON.stringify(payload, null, 2))
}

main().catch((error) => {
  console.error('Failed to call /v1 rankings endpoint', error)
  process.exit(1)
})
