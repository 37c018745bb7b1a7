import type { JSONSchema } from '../types/json.js'

/**
 * Specification for a tool that can be used by the model.
 * Sent to the model gateway so the model knows what it may call.
 */
export interface ToolSpec {
  /**
   * The unique name of the tool.
   */
  name: string

  /**
   * A description of what the tool does, shown to the model.
   */
  description: string

  /**
   * JSON Schema describing the tool's input parameters.
   */
  inputSchema: JSONSchema
}

/**
 * A tool invocation resolved from a proposal.
 */
export interface ToolUse {
  /**
   * Name of the tool being invoked.
   */
  name: string

  /**
   * Identifier of the tool call this invocation answers.
   */
  toolUseId: string

  /**
   * Parsed argument object.
   */
  input: Record<string, unknown>
}

/**
 * Context handed to a tool while it runs.
 */
export interface ToolContext {
  /**
   * The invocation being executed.
   */
  toolUse: ToolUse

  /**
   * Aborted when the run that requested the tool is cancelled.
   */
  signal: AbortSignal
}

/**
 * A tool the agent can expose to the model and execute on its behalf.
 */
export interface Tool {
  /**
   * The unique name of the tool.
   */
  readonly name: string

  /**
   * Human-readable description of what the tool does.
   */
  readonly description: string

  /**
   * Specification sent to the model.
   */
  readonly toolSpec: ToolSpec

  /**
   * Whether the tool may currently be executed. Managed by the registry.
   */
  enabled: boolean

  /**
   * Hint that the tool has side effects the user should confirm. Copied onto
   * proposals for callers to show; the approval modes do not read it.
   */
  readonly requiresApproval: boolean

  /**
   * Precondition for offering the tool to the model, such as configured
   * credentials or a working directory.
   */
  isAvailable(): boolean

  /**
   * Runs the tool.
   *
   * @param input - Argument object parsed from the model's JSON payload
   * @param context - Invocation context; omitted when a tool is called directly
   * @returns The tool's textual result
   * @throws ToolError on invalid input or failure
   */
  invoke(input: Record<string, unknown>, context?: ToolContext): Promise<string>
}
