import { describe, it, expect } from 'vitest'
import { ToolRegistry } from '../tool-registry.js'
import { createMockTool } from '../../__fixtures__/tool-helpers.js'
import type { Tool } from '../../tools/tool.js'

describe('ToolRegistry', () => {
  it('registers tools from the constructor in order', () => {
    const registry = new ToolRegistry([createMockTool('alpha'), createMockTool('beta')])

    expect(registry.values().map((tool) => tool.name)).toEqual(['alpha', 'beta'])
  })

  it('ignores a second tool with the same name', () => {
    const first = createMockTool('echo')
    const registry = new ToolRegistry([first])

    expect(registry.register(createMockTool('echo'))).toBe(false)
    expect(registry.lookup('echo')).toBe(first)
    expect(registry.values()).toHaveLength(1)
  })

  it('returns undefined for unknown names', () => {
    expect(new ToolRegistry().lookup('missing')).toBeUndefined()
  })

  it('rejects malformed names', () => {
    const registry = new ToolRegistry()

    expect(() => registry.register(createMockTool('has space'))).toThrow(
      "Invalid tool name 'has space': use 1-64 letters, digits, underscores or hyphens"
    )
    expect(() => registry.register(createMockTool('x'.repeat(65)))).toThrow('Invalid tool name')
  })

  it('rejects tools whose spec name differs', () => {
    const tool: Tool = { ...createMockTool('echo'), toolSpec: { name: 'other', description: 'd', inputSchema: { type: 'object' } } }

    expect(() => new ToolRegistry().register(tool)).toThrow("Tool 'echo' has a spec named 'other'")
  })

  it('rejects non-object input schemas', () => {
    const tool: Tool = { ...createMockTool('echo'), toolSpec: { name: 'echo', description: 'd', inputSchema: { type: 'string' } } }

    expect(() => new ToolRegistry().register(tool)).toThrow("Tool 'echo' must declare an object input schema")
  })

  it('lists only enabled tools whose precondition holds', () => {
    const registry = new ToolRegistry([
      createMockTool('on'),
      createMockTool('off', undefined, { enabled: false }),
      createMockTool('unavailable', undefined, { available: false }),
    ])

    expect(registry.listAvailable().map((tool) => tool.name)).toEqual(['on'])
  })

  it('toggles tools', () => {
    const registry = new ToolRegistry([createMockTool('echo')])

    expect(registry.setEnabled('echo', false)).toBe(true)
    expect(registry.listAvailable()).toEqual([])
    expect(registry.setEnabled('echo', true)).toBe(true)
    expect(registry.listAvailable().map((tool) => tool.name)).toEqual(['echo'])
    expect(registry.setEnabled('missing', true)).toBe(false)
  })
})
