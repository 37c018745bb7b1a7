/**
 * AWS Bedrock model gateway.
 *
 * This module provides integration with AWS Bedrock's ConverseStream API,
 * supporting streaming responses and tool use.
 *
 * @see https://docs.aws.amazon.com/bedrock/latest/APIReference/API_runtime_ConverseStream.html
 */

import {
  BedrockRuntimeClient,
  ConverseStreamCommand,
  type BedrockRuntimeClientConfig,
  type ConverseStreamCommandInput,
  type ConverseStreamOutput,
  type Message as BedrockMessage,
  type ContentBlock as BedrockContentBlock,
  type ConversationRole,
  type InferenceConfiguration,
  type Tool as BedrockTool,
} from '@aws-sdk/client-bedrock-runtime'
import type { ModelGateway, StreamOptions } from './model.js'
import { snakeToCamel } from './model.js'
import type { Message } from '../types/messages.js'
import type { ModelStreamEvent, ModelContentBlockStartEvent, ModelMetadataEvent } from './streaming.js'
import { isRecord } from '../types/json.js'
import { ensureDefined } from '../types/validation.js'
import { createLogger, type Logger } from '../logging/logger.js'

/**
 * Default Bedrock model ID.
 */
const DEFAULT_BEDROCK_MODEL_ID = 'anthropic.claude-3-5-haiku-20241022-v1:0'

/**
 * Models that accept the status field in tool results.
 * According to AWS Bedrock API documentation, the status field is only supported by Anthropic Claude models.
 * @see https://docs.aws.amazon.com/bedrock/latest/APIReference/API_runtime_ToolResultBlock.html
 */
const MODELS_INCLUDE_STATUS = ['anthropic.claude']

const logger = createLogger('bedrock')

/**
 * Mapping of Bedrock stop reasons to gateway stop reasons.
 */
const STOP_REASON_MAP: Readonly<Record<string, string>> = {
  end_turn: 'endTurn',
  tool_use: 'toolUse',
  max_tokens: 'maxTokens',
  stop_sequence: 'stopSequence',
  content_filtered: 'contentFiltered',
  guardrail_intervened: 'guardrailIntervened',
}

/**
 * JSON document as the Bedrock runtime accepts it for schemas and tool input.
 */
type BedrockDocument = null | boolean | number | string | BedrockDocument[] | { [key: string]: BedrockDocument }

/**
 * Sends a ConverseStream request and returns the event stream.
 * Replaceable so the gateway can run against a scripted stream.
 */
export type BedrockTransport = (
  request: ConverseStreamCommandInput,
  signal?: AbortSignal
) => Promise<AsyncIterable<ConverseStreamOutput> | undefined>

/**
 * Configuration interface for the AWS Bedrock model gateway.
 *
 * @example
 * ```typescript
 * const config: BedrockModelConfig = {
 *   modelId: 'anthropic.claude-3-5-haiku-20241022-v1:0',
 *   maxTokens: 1024,
 *   temperature: 0.7,
 * }
 * ```
 */
export interface BedrockModelConfig {
  /**
   * Bedrock model or inference profile identifier.
   */
  modelId?: string

  /**
   * Maximum number of tokens to generate in the response.
   */
  maxTokens?: number

  /**
   * Controls randomness in generation (0 to 1).
   */
  temperature?: number

  /**
   * Controls diversity via nucleus sampling (0 to 1).
   */
  topP?: number

  /**
   * Array of sequences that will stop generation when encountered.
   */
  stopSequences?: string[]

  /**
   * Flag to include status field in tool results.
   * - `true`: Always include status field
   * - `false`: Never include status field
   * - `'auto'`: Automatically determine based on model ID (default)
   */
  includeToolResultStatus?: 'auto' | boolean
}

/**
 * Options for creating a BedrockModel instance.
 */
export interface BedrockModelOptions extends BedrockModelConfig {
  /**
   * AWS region to use for the Bedrock service.
   */
  region?: string

  /**
   * Configuration for the Bedrock Runtime client.
   */
  clientConfig?: BedrockRuntimeClientConfig

  /**
   * Replaces the Bedrock Runtime client.
   */
  transport?: BedrockTransport

  /**
   * Logger for provider warnings.
   */
  logger?: Logger
}

/**
 * AWS Bedrock model gateway.
 *
 * @example
 * ```typescript
 * const model = new BedrockModel({ region: 'us-west-2', maxTokens: 2048 })
 *
 * for await (const event of model.stream(history, { toolSpecs: [] })) {
 *   if (event.type === 'modelContentBlockDeltaEvent' && event.delta.type === 'textDelta') {
 *     process.stdout.write(event.delta.text)
 *   }
 * }
 * ```
 */
export class BedrockModel implements ModelGateway {
  private _config: BedrockModelConfig
  private readonly _transport: BedrockTransport
  private readonly _logger: Logger

  /**
   * Creates a new BedrockModel instance.
   *
   * @param options - Optional configuration for model and client
   */
  constructor(options?: BedrockModelOptions) {
    const { region, clientConfig, transport, logger: injectedLogger, ...modelConfig } = options ?? {}

    this._config = {
      modelId: DEFAULT_BEDROCK_MODEL_ID,
      ...modelConfig,
    }
    this._logger = injectedLogger ?? logger

    if (transport !== undefined) {
      this._transport = transport
    } else {
      const client = new BedrockRuntimeClient({
        ...(clientConfig ?? {}),
        // region takes precedence over clientConfig
        ...(region ? { region } : {}),
      })
      this._transport = async (request, signal) => {
        const response = await client.send(new ConverseStreamCommand(request), signal ? { abortSignal: signal } : {})
        return response.stream
      }
    }
  }

  /**
   * Merges the provided configuration with existing settings.
   */
  updateConfig(modelConfig: BedrockModelConfig): void {
    this._config = { ...this._config, ...modelConfig }
  }

  /**
   * Retrieves the current model configuration.
   */
  getConfig(): BedrockModelConfig {
    return this._config
  }

  async *stream(messages: readonly Message[], options: StreamOptions): AsyncIterable<ModelStreamEvent> {
    const request = this._formatRequest(messages, options)
    const stream = await this._transport(request, options.signal)
    if (stream === undefined) {
      throw new Error('Bedrock returned a response without an event stream')
    }

    for await (const chunk of stream) {
      yield* this._mapStreamedBedrockEvent(chunk)
    }
  }

  /**
   * Formats a request for the Bedrock ConverseStream API.
   */
  private _formatRequest(messages: readonly Message[], options: StreamOptions): ConverseStreamCommandInput {
    const request: ConverseStreamCommandInput = {
      modelId: this._config.modelId,
      messages: this._formatMessages(messages),
    }

    if (options.systemPrompt !== undefined && options.systemPrompt !== '') {
      request.system = [{ text: options.systemPrompt }]
    }

    if (options.toolSpecs.length > 0) {
      const tools: BedrockTool[] = options.toolSpecs.map((spec) => ({
        toolSpec: {
          name: spec.name,
          description: spec.description,
          inputSchema: { json: toDocument(spec.inputSchema) },
        },
      }))
      request.toolConfig = { tools }
    }

    const inferenceConfig: InferenceConfiguration = {}
    if (this._config.maxTokens !== undefined) inferenceConfig.maxTokens = this._config.maxTokens
    if (this._config.temperature !== undefined) inferenceConfig.temperature = this._config.temperature
    if (this._config.topP !== undefined) inferenceConfig.topP = this._config.topP
    if (this._config.stopSequences !== undefined) inferenceConfig.stopSequences = this._config.stopSequences

    if (Object.keys(inferenceConfig).length > 0) {
      request.inferenceConfig = inferenceConfig
    }

    return request
  }

  /**
   * Formats messages for the Bedrock API. Tool results travel in user turns,
   * and consecutive messages of the same role are merged because Bedrock
   * requires alternating roles.
   */
  private _formatMessages(messages: readonly Message[]): BedrockMessage[] {
    const includeStatus = this._shouldIncludeToolResultStatus()
    const formatted: BedrockMessage[] = []

    for (const message of messages) {
      const content = this._formatContent(message, includeStatus)
      if (content.length === 0) continue

      const role: ConversationRole = message.role === 'assistant' ? 'assistant' : 'user'
      const previous = formatted.at(-1)
      if (previous !== undefined && previous.role === role && previous.content !== undefined) {
        previous.content.push(...content)
      } else {
        formatted.push({ role, content })
      }
    }

    return formatted
  }

  private _formatContent(message: Message, includeStatus: boolean): BedrockContentBlock[] {
    switch (message.role) {
      case 'user':
        return message.text.trim() === '' ? [] : [{ text: message.text }]

      case 'assistant': {
        const blocks: BedrockContentBlock[] = []
        if (message.text.trim() !== '') {
          blocks.push({ text: message.text })
        }
        for (const call of message.toolCalls ?? []) {
          blocks.push({
            toolUse: {
              toolUseId: call.id,
              name: call.name,
              input: toDocument(parseInput(call.arguments)),
            },
          })
        }
        return blocks
      }

      case 'tool':
        return [
          {
            toolResult: {
              toolUseId: ensureDefined(message.toolCallId, 'toolResult.toolCallId'),
              content: [{ text: message.text }],
              ...(includeStatus ? { status: message.isError ? ('error' as const) : ('success' as const) } : {}),
            },
          },
        ]
    }
  }

  /**
   * Determines whether to include the status field in tool results.
   */
  private _shouldIncludeToolResultStatus(): boolean {
    const includeStatus = this._config.includeToolResultStatus ?? 'auto'

    if (includeStatus === true) return true
    if (includeStatus === false) return false

    return MODELS_INCLUDE_STATUS.some((pattern) => this._config.modelId?.includes(pattern))
  }

  /**
   * Maps a Bedrock event to gateway streaming events.
   */
  private *_mapStreamedBedrockEvent(chunk: ConverseStreamOutput): Generator<ModelStreamEvent> {
    if (chunk.messageStart !== undefined) {
      const role = ensureDefined(chunk.messageStart.role, 'messageStart.role')
      yield { type: 'modelMessageStartEvent', role: role === 'assistant' ? 'assistant' : 'user' }
      return
    }

    if (chunk.contentBlockStart !== undefined) {
      const event: ModelContentBlockStartEvent = {
        type: 'modelContentBlockStartEvent',
        contentBlockIndex: ensureDefined(chunk.contentBlockStart.contentBlockIndex, 'contentBlockStart.contentBlockIndex'),
      }
      const toolUse = chunk.contentBlockStart.start?.toolUse
      if (toolUse !== undefined) {
        event.start = {
          type: 'toolUseStart',
          name: ensureDefined(toolUse.name, 'toolUse.name'),
          toolUseId: ensureDefined(toolUse.toolUseId, 'toolUse.toolUseId'),
          toolType: 'function',
        }
      }
      yield event
      return
    }

    if (chunk.contentBlockDelta !== undefined) {
      const contentBlockIndex = chunk.contentBlockDelta.contentBlockIndex
      const delta = ensureDefined(chunk.contentBlockDelta.delta, 'contentBlockDelta.delta')
      if (delta.text !== undefined) {
        yield { type: 'modelContentBlockDeltaEvent', contentBlockIndex, delta: { type: 'textDelta', text: delta.text } }
      } else if (delta.toolUse !== undefined) {
        if (delta.toolUse.input) {
          yield {
            type: 'modelContentBlockDeltaEvent',
            contentBlockIndex,
            delta: { type: 'toolUseInputDelta', input: delta.toolUse.input },
          }
        }
      } else {
        this._logger.debug({ keys: Object.keys(delta) }, 'skipping unsupported delta')
      }
      return
    }

    if (chunk.contentBlockStop !== undefined) {
      yield { type: 'modelContentBlockStopEvent', contentBlockIndex: chunk.contentBlockStop.contentBlockIndex }
      return
    }

    if (chunk.messageStop !== undefined) {
      const stopReasonRaw = ensureDefined(chunk.messageStop.stopReason, 'messageStop.stopReason')
      yield { type: 'modelMessageStopEvent', stopReason: this._transformStopReason(stopReasonRaw) }
      return
    }

    if (chunk.metadata !== undefined) {
      const event: ModelMetadataEvent = { type: 'modelMetadataEvent' }
      const usage = chunk.metadata.usage
      if (usage !== undefined) {
        event.usage = {
          inputTokens: ensureDefined(usage.inputTokens, 'usage.inputTokens'),
          outputTokens: ensureDefined(usage.outputTokens, 'usage.outputTokens'),
          totalTokens: ensureDefined(usage.totalTokens, 'usage.totalTokens'),
        }
      }
      const metrics = chunk.metadata.metrics
      if (metrics !== undefined) {
        event.metrics = { latencyMs: ensureDefined(metrics.latencyMs, 'metrics.latencyMs') }
      }
      yield event
      return
    }

    const exception =
      chunk.internalServerException ??
      chunk.modelStreamErrorException ??
      chunk.serviceUnavailableException ??
      chunk.validationException ??
      chunk.throttlingException
    if (exception !== undefined) {
      throw exception
    }

    this._logger.warn({ keys: Object.keys(chunk) }, 'unsupported Bedrock event type')
  }

  /**
   * Transforms a Bedrock stop reason into the gateway's format.
   */
  private _transformStopReason(stopReasonRaw: string): string {
    const mapped = STOP_REASON_MAP[stopReasonRaw]
    if (mapped !== undefined) {
      return mapped
    }
    this._logger.warn({ stopReason: stopReasonRaw }, 'unknown stop reason')
    return snakeToCamel(stopReasonRaw)
  }
}

/**
 * Parses recorded tool-call argument text. Bedrock only accepts object input,
 * so text that is not a JSON object is sent as `{}`; the model already saw the
 * matching InvalidArguments tool result.
 */
function parseInput(raw: string): Record<string, unknown> {
  if (raw.trim() === '') return {}
  let value: unknown
  try {
    value = JSON.parse(raw)
  } catch (error) {
    logger.debug({ err: error }, 'sending unparsable tool input as an empty object')
    return {}
  }
  return isRecord(value) ? value : {}
}

/**
 * Converts an arbitrary value into a Bedrock document, dropping values JSON
 * cannot represent.
 */
function toDocument(value: unknown): BedrockDocument {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toDocument(item))
  }
  if (isRecord(value)) {
    const document: { [key: string]: BedrockDocument } = {}
    for (const [key, item] of Object.entries(value)) {
      if (item !== undefined && typeof item !== 'function') {
        document[key] = toDocument(item)
      }
    }
    return document
  }
  return null
}
