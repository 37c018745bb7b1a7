/**
 * Configuration options for the Google search tool.
 */
export interface WebSearchToolOptions {
  /**
   * Custom Search JSON API key. The tool is unavailable without it.
   */
  apiKey?: string

  /**
   * Programmable Search Engine identifier (`cx`). The tool is unavailable
   * without it.
   */
  engineId?: string

  /**
   * API endpoint (default: https://www.googleapis.com/customsearch/v1).
   */
  endpoint?: string

  /**
   * Number of results to request (default: 5).
   */
  resultCount?: number

  /**
   * Request timeout in seconds (default: 10).
   */
  timeout?: number
}

/**
 * A single search hit.
 */
export interface SearchResult {
  title: string
  link: string
  snippet?: string | undefined
}
