/**
 * Error types for the agent loop.
 *
 * Tool errors are non-fatal: the agent turns them into tool-result messages
 * and keeps going. Every other error here ends the active run in a `failed`
 * state whose reason is the error message.
 */

/**
 * Discriminator for the tool error taxonomy.
 */
export type ToolErrorCode =
  | 'toolNotFound'
  | 'toolDisabled'
  | 'invalidArguments'
  | 'missingRequiredParameter'
  | 'executionFailed'

/**
 * Base class for failures raised while resolving or running a tool.
 */
export abstract class ToolError extends Error {
  abstract readonly code: ToolErrorCode

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ToolError'
  }
}

/**
 * No tool with the requested name is registered.
 */
export class ToolNotFoundError extends ToolError {
  override readonly code = 'toolNotFound' as const

  constructor(public readonly toolName: string) {
    super(`Tool not found: '${toolName}'`)
    this.name = 'ToolNotFoundError'
  }
}

/**
 * The tool is registered but switched off.
 */
export class ToolDisabledError extends ToolError {
  override readonly code = 'toolDisabled' as const

  constructor(public readonly toolName: string) {
    super(`Tool '${toolName}' is currently disabled.`)
    this.name = 'ToolDisabledError'
  }
}

/**
 * The argument payload could not be parsed or failed schema validation.
 */
export class InvalidArgumentsError extends ToolError {
  override readonly code = 'invalidArguments' as const

  constructor(
    public readonly toolName: string,
    public readonly details: string
  ) {
    super(`Invalid arguments for tool '${toolName}': ${details}`)
    this.name = 'InvalidArgumentsError'
  }
}

/**
 * A required top-level parameter was absent from the arguments.
 */
export class MissingRequiredParameterError extends ToolError {
  override readonly code = 'missingRequiredParameter' as const

  constructor(public readonly parameter: string) {
    super(`Missing required parameter: '${parameter}'`)
    this.name = 'MissingRequiredParameterError'
  }
}

/**
 * The tool ran and failed.
 */
export class ExecutionFailedError extends ToolError {
  override readonly code = 'executionFailed' as const

  constructor(
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`Tool execution failed: ${reason}`, options)
    this.name = 'ExecutionFailedError'
  }
}

/**
 * The model gateway failed to deliver a turn.
 */
export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'TransportError'
  }
}

/**
 * A run proposed more tool calls than its configured ceiling.
 */
export class MaxToolCallsExceededError extends Error {
  constructor(public readonly limit: number) {
    super('max tool calls exceeded')
    this.name = 'MaxToolCallsExceededError'
  }
}

/**
 * Too many tool calls failed back to back.
 */
export class ToolFailureLimitError extends Error {
  constructor(public readonly limit: number) {
    super('max consecutive tool failures exceeded')
    this.name = 'ToolFailureLimitError'
  }
}

/**
 * The caller cancelled the active run.
 */
export class CancelledError extends Error {
  constructor() {
    super('cancelled')
    this.name = 'CancelledError'
  }
}

/**
 * Raised by `start()` while another run is still active on the same agent.
 */
export class AlreadyRunningError extends Error {
  constructor() {
    super('Agent is already running. Wait for the current run to finish or cancel it before starting another.')
    this.name = 'AlreadyRunningError'
  }
}

/**
 * Raised by `approve()` / `reject()` when the id does not match the proposal
 * currently awaiting approval.
 */
export class StaleProposalError extends Error {
  constructor(public readonly proposalId: string) {
    super(`Proposal '${proposalId}' is not awaiting approval`)
    this.name = 'StaleProposalError'
  }
}

/**
 * Settings failed validation.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ConfigurationError'
  }
}

/**
 * Normalizes an unknown error value to an Error instance.
 *
 * @param error - The error value to normalize
 * @returns An Error instance
 */
export function normalizeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
