/**
 * Test fixtures and helpers for Tool testing.
 * This module provides utilities for testing Tool implementations.
 */

import type { Tool, ToolContext } from '../tools/tool.js'

export interface MockToolOptions {
  enabled?: boolean
  requiresApproval?: boolean
  available?: boolean
}

export type MockToolCallback = (input: Record<string, unknown>, context?: ToolContext) => string | Promise<string>

/**
 * Helper to create a mock tool for testing.
 *
 * @param name - The name of the mock tool
 * @param callback - Produces the tool's result; defaults to `<name> result`
 * @param options - Flags copied onto the tool
 * @returns Mock Tool object
 */
export function createMockTool(name: string, callback?: MockToolCallback, options: MockToolOptions = {}): Tool {
  const run: MockToolCallback = callback ?? ((): string => `${name} result`)
  return {
    name,
    description: `Mock tool ${name}`,
    toolSpec: {
      name,
      description: `Mock tool ${name}`,
      inputSchema: { type: 'object', properties: {} },
    },
    enabled: options.enabled ?? true,
    requiresApproval: options.requiresApproval ?? false,
    isAvailable: () => options.available ?? true,
    async invoke(input, context) {
      return run(input, context)
    },
  }
}

/**
 * Helper to create a mock ToolContext for testing.
 */
export function createMockContext(
  toolUse: { name: string; toolUseId: string; input: Record<string, unknown> },
  signal: AbortSignal = new AbortController().signal
): ToolContext {
  return { toolUse, signal }
}
