import type { ToolRegistry } from '../registry/tool-registry.js'
import type { ToolCallProposal } from '../agent/proposal.js'
import type { ToolContext } from './tool.js'
import { isRecord } from '../types/json.js'
import {
  ExecutionFailedError,
  InvalidArgumentsError,
  ToolDisabledError,
  ToolError,
  ToolNotFoundError,
  normalizeError,
} from '../errors.js'
import { createLogger, type Logger } from '../logging/logger.js'

export interface ExecuteOptions {
  /**
   * Aborted when the requesting run is cancelled.
   */
  signal?: AbortSignal
}

/**
 * Runs approved tool calls.
 */
export interface ToolExecutor {
  /**
   * Executes the tool a proposal names.
   *
   * @returns The tool's textual result
   * @throws ToolError describing why the call failed
   */
  executeToolCall(proposal: ToolCallProposal, options?: ExecuteOptions): Promise<string>
}

/**
 * Executor that resolves tools from a {@link ToolRegistry}.
 */
export class RegistryToolExecutor implements ToolExecutor {
  private readonly _registry: ToolRegistry
  private readonly _logger: Logger

  constructor(registry: ToolRegistry, logger?: Logger) {
    this._registry = registry
    this._logger = logger ?? createLogger('tool-executor')
  }

  async executeToolCall(proposal: ToolCallProposal, options?: ExecuteOptions): Promise<string> {
    const tool = this._registry.lookup(proposal.toolName)
    if (!tool) {
      throw new ToolNotFoundError(proposal.toolName)
    }
    // A tool whose precondition fails counts as switched off
    if (!tool.enabled || !tool.isAvailable()) {
      throw new ToolDisabledError(proposal.toolName)
    }

    const input = parseToolArguments(proposal.toolName, proposal.arguments)
    const context: ToolContext = {
      toolUse: { name: tool.name, toolUseId: proposal.id, input },
      signal: options?.signal ?? new AbortController().signal,
    }

    this._logger.info({ tool: tool.name, toolCallId: proposal.id }, 'executing tool')
    try {
      return await tool.invoke(input, context)
    } catch (error) {
      if (error instanceof ToolError) throw error
      throw new ExecutionFailedError(normalizeError(error).message, { cause: error })
    }
  }
}

/**
 * Parses a raw argument payload into an object. Blank text means no
 * arguments.
 *
 * @throws InvalidArgumentsError when the text is not a JSON object
 */
export function parseToolArguments(toolName: string, raw: string): Record<string, unknown> {
  const text = raw.trim() === '' ? '{}' : raw

  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (error) {
    throw new InvalidArgumentsError(toolName, `arguments are not valid JSON (${normalizeError(error).message})`)
  }

  if (!isRecord(value)) {
    throw new InvalidArgumentsError(toolName, 'arguments must be a JSON object')
  }
  return value
}
