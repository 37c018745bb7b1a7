import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest'
import { createWebSearchTool, formatResults } from '../web-search.js'
import { createMockContext } from '../../../__fixtures__/tool-helpers.js'

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } })
}

function hangingFetch(): Mock<typeof fetch> {
  return vi.fn<typeof fetch>(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')))
      })
  )
}

describe('google_search tool', () => {
  const originalFetch = globalThis.fetch
  let fetchMock: Mock<typeof fetch>

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>()
    globalThis.fetch = fetchMock
  })

  afterEach(() => {
    globalThis.fetch = originalFetch
  })

  it('is available only with both credentials', () => {
    expect(createWebSearchTool().isAvailable()).toBe(false)
    expect(createWebSearchTool({ apiKey: 'test-key' }).isAvailable()).toBe(false)
    expect(createWebSearchTool({ apiKey: 'test-key', engineId: 'test-engine' }).isAvailable()).toBe(true)
  })

  it('refuses to run unconfigured', async () => {
    await expect(createWebSearchTool().invoke({ query: 'weather' })).rejects.toThrow(
      'Tool execution failed: Google Search is not configured. Set an API key and a search engine ID.'
    )
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('queries the Custom Search API and formats the results', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        items: [
          { title: 'Node.js', link: 'https://www.nodejs.org/en', snippet: 'JavaScript runtime' },
          { title: 'Docs', link: 'https://docs.example.com/page' },
        ],
      })
    )
    const search = createWebSearchTool({ apiKey: 'test-key', engineId: 'test-engine', resultCount: 3 })

    const result = await search.invoke({ query: '  node runtime ' })

    const url = fetchMock.mock.calls[0]?.[0]
    expect(url).toBeInstanceOf(URL)
    expect(String(url)).toBe(
      'https://www.googleapis.com/customsearch/v1?key=test-key&cx=test-engine&q=node+runtime&num=3'
    )
    expect(result).toBe(
      '**Search Results:**\n\n' +
        '1. **Node.js** - JavaScript runtime\n   Source: [nodejs.org](https://www.nodejs.org/en)\n\n' +
        '2. **Docs** - No description available\n   Source: [docs.example.com](https://docs.example.com/page)'
    )
  })

  it('reports an empty result set', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ kind: 'customsearch#search' }))
    const search = createWebSearchTool({ apiKey: 'test-key', engineId: 'test-engine' })

    expect(await search.invoke({ query: 'nothing' })).toBe('No search results found.')
  })

  it('rejects a blank query', async () => {
    const search = createWebSearchTool({ apiKey: 'test-key', engineId: 'test-engine' })

    await expect(search.invoke({ query: '   ' })).rejects.toThrow("Invalid arguments for tool 'google_search': query: ")
  })

  it.each([
    [403, 'Google Search API access denied. Check your API key and search engine ID.'],
    [429, 'Google Search API quota exceeded.'],
    [500, 'Google Search API returned status 500'],
  ])('describes HTTP %i', async (status, message) => {
    fetchMock.mockResolvedValue(jsonResponse({ error: {} }, status))
    const search = createWebSearchTool({ apiKey: 'test-key', engineId: 'test-engine' })

    await expect(search.invoke({ query: 'q' })).rejects.toThrow(`Tool execution failed: ${message}`)
  })

  it('rejects an unexpected response body', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ items: [{ title: 42 }] }))
    const search = createWebSearchTool({ apiKey: 'test-key', engineId: 'test-engine' })

    await expect(search.invoke({ query: 'q' })).rejects.toThrow(
      'Tool execution failed: Google Search API returned an unexpected response.'
    )
  })

  it('times out slow requests', async () => {
    globalThis.fetch = hangingFetch()
    const search = createWebSearchTool({ apiKey: 'test-key', engineId: 'test-engine', timeout: 0.01 })

    await expect(search.invoke({ query: 'q' })).rejects.toThrow(
      'Tool execution failed: Search request timed out after 0.01 seconds'
    )
  })

  it('aborts the request when the run is cancelled', async () => {
    const hanging = hangingFetch()
    globalThis.fetch = hanging
    const controller = new AbortController()
    const context = createMockContext(
      { name: 'google_search', toolUseId: 'call_1', input: { query: 'q' } },
      controller.signal
    )
    const search = createWebSearchTool({ apiKey: 'test-key', engineId: 'test-engine' })

    const pending = search.invoke({ query: 'q' }, context)
    controller.abort()

    await expect(pending).rejects.toThrow('Tool execution failed: aborted')
    expect(hanging.mock.calls[0]?.[1]?.signal?.aborted).toBe(true)
  })
})

describe('formatResults', () => {
  it('omits an empty snippet and keeps unparseable links as the source label', () => {
    expect(formatResults([{ title: 'Local', link: 'not a url', snippet: '' }])).toBe(
      '**Search Results:**\n\n1. **Local**\n   Source: [not a url](not a url)'
    )
  })
})
