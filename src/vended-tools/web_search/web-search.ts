import { z } from 'zod'
import { tool } from '../../tools/zod-tool.js'
import type { Tool } from '../../tools/tool.js'
import type { SearchResult, WebSearchToolOptions } from './types.js'

const DEFAULT_ENDPOINT = 'https://www.googleapis.com/customsearch/v1'
const DEFAULT_RESULT_COUNT = 5
const DEFAULT_TIMEOUT_SECONDS = 10

const webSearchInputSchema = z.object({
  query: z.string().trim().min(1).describe('A clear, specific search query. English queries work best.'),
})

/**
 * Fields of the Custom Search JSON API response the tool reads.
 */
const searchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string(),
        link: z.string(),
        snippet: z.string().optional(),
      })
    )
    .optional(),
})

/**
 * Creates the `google_search` tool backed by the Google Custom Search JSON API.
 *
 * The tool is only available when both an API key and an engine ID are
 * configured. Requests time out after `timeout` seconds and are aborted when
 * the run that issued them is cancelled.
 *
 * @example
 * ```typescript
 * const search = createWebSearchTool({ apiKey: 'test-key', engineId: 'test-engine' })
 * await search.invoke({ query: 'typescript release notes' })
 * ```
 */
export function createWebSearchTool(options: WebSearchToolOptions = {}): Tool {
  const {
    apiKey,
    engineId,
    endpoint = DEFAULT_ENDPOINT,
    resultCount = DEFAULT_RESULT_COUNT,
    timeout = DEFAULT_TIMEOUT_SECONDS,
  } = options

  return tool({
    name: 'google_search',
    description:
      'Search Google for information when you cannot answer from your own knowledge or need up-to-date information.',
    inputSchema: webSearchInputSchema,
    isAvailable: () => Boolean(apiKey) && Boolean(engineId),
    callback: async ({ query }, context) => {
      if (!apiKey || !engineId) {
        throw new Error('Google Search is not configured. Set an API key and a search engine ID.')
      }

      const url = new URL(endpoint)
      url.searchParams.set('key', apiKey)
      url.searchParams.set('cx', engineId)
      url.searchParams.set('q', query)
      url.searchParams.set('num', String(resultCount))

      // Create AbortController for timeout and cancellation
      const controller = new AbortController()
      const timeoutId = globalThis.setTimeout(() => controller.abort(), timeout * 1000)
      const onCancel = (): void => controller.abort()
      context?.signal.addEventListener('abort', onCancel, { once: true })

      try {
        const response = await globalThis.fetch(url, { signal: controller.signal })

        if (!response.ok) {
          throw new Error(describeStatus(response.status))
        }

        const parsed = searchResponseSchema.safeParse(await response.json())
        if (!parsed.success) {
          throw new Error('Google Search API returned an unexpected response.')
        }

        const items = parsed.data.items ?? []
        return items.length === 0 ? 'No search results found.' : formatResults(items)
      } catch (error) {
        if (error instanceof Error && error.name === 'AbortError' && context?.signal.aborted !== true) {
          throw new Error(`Search request timed out after ${timeout} seconds`)
        }
        throw error
      } finally {
        globalThis.clearTimeout(timeoutId)
        context?.signal.removeEventListener('abort', onCancel)
      }
    },
  })
}

function describeStatus(status: number): string {
  switch (status) {
    case 403:
      return 'Google Search API access denied. Check your API key and search engine ID.'
    case 429:
      return 'Google Search API quota exceeded.'
    default:
      return `Google Search API returned status ${status}`
  }
}

/**
 * Renders results as a numbered Markdown list with the source domain of each hit.
 */
export function formatResults(items: readonly SearchResult[]): string {
  const entries = items.map((item, index) => {
    const snippet = item.snippet ?? 'No description available'
    const summary = snippet === '' ? '' : ` - ${snippet}`
    return `${index + 1}. **${item.title}**${summary}\n   Source: [${domainOf(item.link)}](${item.link})`
  })
  return `**Search Results:**\n\n${entries.join('\n\n')}`
}

function domainOf(link: string): string {
  if (!URL.canParse(link)) {
    return link
  }
  const host = new URL(link).hostname
  if (host === '') {
    return link
  }
  return host.startsWith('www.') ? host.slice('www.'.length) : host
}
