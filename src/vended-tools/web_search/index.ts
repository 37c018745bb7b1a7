/**
 * Google Custom Search tool.
 */

export { createWebSearchTool } from './web-search.js'
export type { WebSearchToolOptions, SearchResult } from './types.js'
