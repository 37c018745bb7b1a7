import { describe, it, expect } from 'vitest'
import { createDefaultToolRegistry } from '../default-tools.js'

describe('createDefaultToolRegistry', () => {
  it('registers the file system tools and web search', () => {
    const registry = createDefaultToolRegistry({ search: {}, disabled: [] })

    expect(registry.values().map((tool) => tool.name)).toEqual([
      'list_directory',
      'read_file',
      'create_file',
      'write_file',
      'search_files',
      'google_search',
    ])
  })

  it('offers only the tools whose configuration is present', () => {
    const registry = createDefaultToolRegistry({ workingDirectory: '/srv/project', search: {}, disabled: [] })

    expect(registry.listAvailable().map((tool) => tool.name)).toEqual([
      'list_directory',
      'read_file',
      'create_file',
      'write_file',
      'search_files',
    ])
  })

  it('disables the configured tools', () => {
    const registry = createDefaultToolRegistry({
      search: { apiKey: 'test-key', engineId: 'test-engine' },
      disabled: ['google_search', 'not_a_tool'],
    })

    expect(registry.lookup('google_search')?.enabled).toBe(false)
    expect(registry.listAvailable()).toEqual([])
  })
})
