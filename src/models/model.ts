import type { Message } from '../types/messages.js'
import type { ToolSpec } from '../tools/tool.js'
import type { ModelStreamEvent } from './streaming.js'

/**
 * Options for a single model turn.
 */
export interface StreamOptions {
  /**
   * Tools the model may call in this turn.
   */
  toolSpecs: ToolSpec[]

  /**
   * System prompt to guide model behavior.
   */
  systemPrompt?: string

  /**
   * Aborts the request and the stream when the run is cancelled.
   */
  signal?: AbortSignal
}

/**
 * Source of model turns.
 *
 * `stream` returns a lazy sequence of events for one turn. The sequence must
 * contain a {@link ModelMessageStopEvent} before it ends; a sequence that ends
 * without one is treated as a transport failure. Errors are raised from the
 * iterator.
 *
 * @example
 * ```typescript
 * for await (const event of model.stream(history, { toolSpecs })) {
 *   if (event.type === 'modelContentBlockDeltaEvent' && event.delta.type === 'textDelta') {
 *     process.stdout.write(event.delta.text)
 *   }
 * }
 * ```
 */
export interface ModelGateway {
  stream(messages: readonly Message[], options: StreamOptions): AsyncIterable<ModelStreamEvent>
}

/**
 * Converts a snake_case string to camelCase.
 * Used for mapping unknown provider stop reasons.
 */
export function snakeToCamel(str: string): string {
  return str.replace(/_([a-z])/g, (_: string, letter: string) => letter.toUpperCase())
}
