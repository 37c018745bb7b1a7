import type { Role, StopReason } from '../types/messages.js'
import type { JSONValue } from '../types/json.js'

/**
 * ModelStreamEvent types for model gateway interactions.
 *
 * Every gateway translates its provider's wire format into this discriminated
 * union, so the agent handles one event vocabulary regardless of provider.
 */

/**
 * Union type representing all possible streaming events from a model gateway.
 * This is a discriminated union where each event has a unique type field.
 */
export type ModelStreamEvent =
  | ModelMessageStartEvent
  | ModelContentBlockStartEvent
  | ModelContentBlockDeltaEvent
  | ModelContentBlockStopEvent
  | ModelMessageStopEvent
  | ModelMetadataEvent

/**
 * Emitted when a new message starts in the stream.
 */
export interface ModelMessageStartEvent {
  /**
   * Discriminator for message start events.
   */
  type: 'modelMessageStartEvent'

  /**
   * The role of the message being started.
   */
  role: Role
}

/**
 * Emitted when a new content block starts in the stream.
 */
export interface ModelContentBlockStartEvent {
  /**
   * Discriminator for content block start events.
   */
  type: 'modelContentBlockStartEvent'

  /**
   * Position of the block within the message. Tool-call fragments are grouped
   * by this index.
   */
  contentBlockIndex?: number

  /**
   * Information about the content block being started.
   * Only present for tool use blocks.
   */
  start?: ContentBlockStart
}

/**
 * Emitted when there is new content in a content block.
 */
export interface ModelContentBlockDeltaEvent {
  /**
   * Discriminator for content block delta events.
   */
  type: 'modelContentBlockDeltaEvent'

  /**
   * Index of the content block being updated.
   */
  contentBlockIndex?: number

  /**
   * The incremental content update.
   */
  delta: ContentBlockDelta
}

/**
 * Emitted when a content block completes.
 */
export interface ModelContentBlockStopEvent {
  /**
   * Discriminator for content block stop events.
   */
  type: 'modelContentBlockStopEvent'

  /**
   * Index of the content block that completed.
   */
  contentBlockIndex?: number
}

/**
 * Emitted when the message completes. This is the end-of-turn signal: tool
 * calls are only assembled once it has been seen.
 */
export interface ModelMessageStopEvent {
  /**
   * Discriminator for message stop events.
   */
  type: 'modelMessageStopEvent'

  /**
   * Reason why generation stopped.
   */
  stopReason: StopReason

  /**
   * Additional provider-specific response fields.
   */
  additionalModelResponseFields?: JSONValue
}

/**
 * Metadata about the stream, such as token usage.
 */
export interface ModelMetadataEvent {
  /**
   * Discriminator for metadata events.
   */
  type: 'modelMetadataEvent'

  /**
   * Token usage information.
   */
  usage?: Usage

  /**
   * Performance metrics.
   */
  metrics?: Metrics
}

/**
 * Information about a content block that is starting.
 * Currently only represents tool use starts.
 */
export type ContentBlockStart = ToolUseStart

/**
 * Information about a tool use that is starting.
 *
 * Providers that stream tool calls piecemeal may send several starts for the
 * same block index, each carrying the fields known so far.
 */
export interface ToolUseStart {
  /**
   * Discriminator for tool use start.
   */
  type: 'toolUseStart'

  /**
   * The name of the tool being used.
   */
  name?: string

  /**
   * Unique identifier for this tool use.
   */
  toolUseId?: string

  /**
   * Call type reported by the provider, such as `function`.
   */
  toolType?: string
}

/**
 * A delta (incremental chunk) of content within a content block.
 */
export type ContentBlockDelta = TextDelta | ToolUseInputDelta

/**
 * Incremental text content from the model.
 */
export interface TextDelta {
  /**
   * Discriminator for text delta.
   */
  type: 'textDelta'

  /**
   * Incremental text content.
   */
  text: string
}

/**
 * Incremental tool input being generated.
 */
export interface ToolUseInputDelta {
  /**
   * Discriminator for tool use input delta.
   */
  type: 'toolUseInputDelta'

  /**
   * Partial JSON string representing the tool input.
   */
  input: string
}

/**
 * Token usage statistics for a model invocation.
 */
export interface Usage {
  /**
   * Number of tokens in the input (prompt).
   */
  inputTokens: number

  /**
   * Number of tokens in the output (completion).
   */
  outputTokens: number

  /**
   * Total number of tokens (input + output).
   */
  totalTokens: number
}

/**
 * Performance metrics for a model invocation.
 */
export interface Metrics {
  /**
   * Latency in milliseconds.
   */
  latencyMs: number
}
