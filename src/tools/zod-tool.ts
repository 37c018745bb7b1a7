import { z } from 'zod'
import type { Tool, ToolContext, ToolSpec } from './tool.js'
import type { JSONValue } from '../types/json.js'
import {
  ExecutionFailedError,
  InvalidArgumentsError,
  MissingRequiredParameterError,
  ToolError,
  normalizeError,
} from '../errors.js'

/**
 * Value a tool callback may produce. Anything other than a string is
 * JSON-encoded before it reaches the conversation.
 */
export type ToolOutput = string | JSONValue

/**
 * Zod schema accepted as a tool's input schema. Tool arguments are always
 * JSON objects, so the schema must produce one.
 */
export type ToolInputSchema = z.ZodType<Record<string, unknown>>

/**
 * Configuration for creating a Zod-based tool.
 */
export interface ToolConfig<TSchema extends ToolInputSchema> {
  /**
   * The name of the tool.
   */
  name: string

  /**
   * A description of what the tool does (helps the model understand when to use it).
   */
  description: string

  /**
   * Zod schema for input validation and JSON schema generation.
   */
  inputSchema: TSchema

  /**
   * Function that implements the tool logic. Receives validated input.
   */
  callback: (input: z.infer<TSchema>, context?: ToolContext) => ToolOutput | Promise<ToolOutput>

  /**
   * Initial enabled flag. Defaults to true.
   */
  enabled?: boolean

  /**
   * Marks the tool as having side effects. Defaults to false.
   */
  requiresApproval?: boolean

  /**
   * Precondition for offering the tool. Defaults to always available.
   */
  isAvailable?: () => boolean
}

/**
 * Tool whose input is validated by a Zod schema.
 */
class ZodTool<TSchema extends ToolInputSchema> implements Tool {
  readonly name: string
  readonly description: string
  readonly toolSpec: ToolSpec
  readonly requiresApproval: boolean
  enabled: boolean

  private readonly _inputSchema: TSchema
  private readonly _callback: ToolConfig<TSchema>['callback']
  private readonly _isAvailable: () => boolean

  constructor(config: ToolConfig<TSchema>) {
    this.name = config.name
    this.description = config.description
    this.enabled = config.enabled ?? true
    this.requiresApproval = config.requiresApproval ?? false
    this._inputSchema = config.inputSchema
    this._callback = config.callback
    this._isAvailable = config.isAvailable ?? ((): boolean => true)
    this.toolSpec = {
      name: config.name,
      description: config.description,
      // Defaulted fields are optional for the caller, so describe the input side
      inputSchema: { ...z.toJSONSchema(config.inputSchema, { io: 'input' }) },
    }
  }

  isAvailable(): boolean {
    return this._isAvailable()
  }

  async invoke(input: Record<string, unknown>, context?: ToolContext): Promise<string> {
    const parsed = this._inputSchema.safeParse(input)
    if (!parsed.success) {
      throw toArgumentError(this.name, parsed.error, input)
    }

    let output: ToolOutput
    try {
      output = await this._callback(parsed.data, context)
    } catch (error) {
      if (error instanceof ToolError) throw error
      throw new ExecutionFailedError(normalizeError(error).message, { cause: error })
    }

    return typeof output === 'string' ? output : JSON.stringify(output)
  }
}

/**
 * Maps a validation failure to the tool error taxonomy. A top-level key that
 * is absent from the input is reported as a missing parameter; every other
 * issue makes the arguments invalid.
 */
function toArgumentError(toolName: string, error: z.ZodError, input: Record<string, unknown>): ToolError {
  for (const issue of error.issues) {
    const [key] = issue.path
    if (issue.path.length === 1 && typeof key === 'string' && input[key] === undefined) {
      return new MissingRequiredParameterError(key)
    }
  }

  const details = error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join('; ')
  return new InvalidArgumentsError(toolName, details)
}

/**
 * Creates a tool with Zod schema validation.
 *
 * The schema is converted to JSON Schema for the model, and every invocation
 * is validated against it before the callback runs. Errors thrown by the
 * callback surface as {@link ExecutionFailedError} unless they already are a
 * {@link ToolError}.
 *
 * @example
 * ```typescript
 * const calculator = tool({
 *   name: 'calculator',
 *   description: 'Performs basic arithmetic',
 *   inputSchema: z.object({
 *     operation: z.enum(['add', 'subtract']),
 *     a: z.number(),
 *     b: z.number(),
 *   }),
 *   callback: ({ operation, a, b }) => String(operation === 'add' ? a + b : a - b),
 * })
 *
 * await calculator.invoke({ operation: 'add', a: 5, b: 3 }) // '8'
 * ```
 */
export function tool<TSchema extends ToolInputSchema>(config: ToolConfig<TSchema>): Tool {
  return new ZodTool(config)
}
