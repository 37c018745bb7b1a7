import type { Tool } from '../tools/tool.js'
import { isRecord } from '../types/json.js'

/**
 * Tool names accepted by both supported providers.
 */
const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/

/**
 * Catalog of the tools an agent may offer to the model.
 *
 * One registry instance is shared by the agent and its executor, so enabling
 * or disabling a tool takes effect for the next model turn and the next
 * execution alike.
 */
export class ToolRegistry {
  private readonly _tools = new Map<string, Tool>()

  constructor(tools: Tool[] = []) {
    for (const tool of tools) {
      this.register(tool)
    }
  }

  /**
   * Registers a tool. Registering a name that is already taken is ignored.
   *
   * @param tool - Tool to add
   * @returns True when the tool was added, false when the name was taken
   * @throws Error when the tool's name or input schema is malformed
   */
  register(tool: Tool): boolean {
    validateTool(tool)
    if (this._tools.has(tool.name)) {
      return false
    }
    this._tools.set(tool.name, tool)
    return true
  }

  /**
   * Finds a tool by name.
   */
  lookup(name: string): Tool | undefined {
    return this._tools.get(name)
  }

  /**
   * Returns the tools that are enabled and whose precondition holds, in
   * registration order.
   */
  listAvailable(): Tool[] {
    return this.values().filter((tool) => tool.enabled && tool.isAvailable())
  }

  /**
   * Returns every registered tool in registration order.
   */
  values(): Tool[] {
    return [...this._tools.values()]
  }

  /**
   * Enables or disables a tool.
   *
   * @returns False when no tool has that name
   */
  setEnabled(name: string, enabled: boolean): boolean {
    const tool = this._tools.get(name)
    if (!tool) {
      return false
    }
    tool.enabled = enabled
    return true
  }
}

function validateTool(tool: Tool): void {
  if (!TOOL_NAME_PATTERN.test(tool.name)) {
    throw new Error(
      `Invalid tool name '${tool.name}': use 1-64 letters, digits, underscores or hyphens`
    )
  }
  if (tool.toolSpec.name !== tool.name) {
    throw new Error(`Tool '${tool.name}' has a spec named '${tool.toolSpec.name}'`)
  }
  const schema = tool.toolSpec.inputSchema
  if (!isRecord(schema) || schema['type'] !== 'object') {
    throw new Error(`Tool '${tool.name}' must declare an object input schema`)
  }
}
