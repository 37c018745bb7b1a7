/**
 * OpenRouter model gateway.
 *
 * Talks to the OpenAI-compatible chat completions endpoint with streaming
 * enabled and translates the server-sent events into gateway events.
 *
 * @see https://openrouter.ai/docs/api-reference/streaming
 */

import { z } from 'zod'
import type { ModelGateway, StreamOptions } from './model.js'
import { snakeToCamel } from './model.js'
import type { Message, StopReason } from '../types/messages.js'
import type { ModelStreamEvent } from './streaming.js'
import type { JSONSchema } from '../types/json.js'
import { normalizeError } from '../errors.js'
import { createLogger, type Logger } from '../logging/logger.js'

const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1'
const DEFAULT_MODEL_ID = 'openai/gpt-4o-mini'
const DEFAULT_TEMPERATURE = 0.8

/**
 * Mapping of OpenAI finish reasons to gateway stop reasons.
 */
const STOP_REASON_MAP: Readonly<Record<string, string>> = {
  stop: 'endTurn',
  tool_calls: 'toolUse',
  length: 'maxTokens',
  content_filter: 'contentFiltered',
}

/**
 * Shape of one streamed chat completion chunk. Only the fields the gateway
 * reads are declared; everything else passes through untouched.
 */
const ChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  index: z.number().int().nonnegative(),
                  id: z.string().nullish(),
                  type: z.string().nullish(),
                  function: z
                    .object({
                      name: z.string().nullish(),
                      arguments: z.string().nullish(),
                    })
                    .nullish(),
                })
              )
              .nullish(),
          })
          .nullish(),
        finish_reason: z.string().nullish(),
      })
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .nullish(),
  error: z.object({ message: z.string() }).nullish(),
})

type Chunk = z.infer<typeof ChunkSchema>

interface ChatToolCall {
  id: string
  type: string
  function: { name: string; arguments: string }
}

type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; tool_calls?: ChatToolCall[] }
  | { role: 'tool'; content: string; tool_call_id: string }

interface ChatTool {
  type: 'function'
  function: { name: string; description: string; parameters: JSONSchema }
}

interface ChatCompletionRequest {
  model: string
  messages: ChatMessage[]
  stream: true
  temperature: number
  tools?: ChatTool[]
  max_tokens?: number
}

/**
 * Options for creating an OpenRouterModel instance.
 */
export interface OpenRouterModelOptions {
  /**
   * OpenRouter API key.
   */
  apiKey: string

  /**
   * Model identifier, such as `openai/gpt-4o-mini`.
   */
  modelId?: string

  /**
   * Sampling temperature (0 to 2).
   */
  temperature?: number

  /**
   * Maximum number of tokens to generate in the response.
   */
  maxTokens?: number

  /**
   * API base URL. Defaults to the public OpenRouter endpoint.
   */
  baseUrl?: string

  /**
   * Value of the `X-Title` attribution header.
   */
  appName?: string

  /**
   * Value of the `HTTP-Referer` attribution header.
   */
  referer?: string

  /**
   * Logger for provider warnings.
   */
  logger?: Logger
}

/**
 * Model gateway for OpenRouter's chat completions API.
 *
 * @example
 * ```typescript
 * const model = new OpenRouterModel({ apiKey: process.env['OPENROUTER_API_KEY'] ?? '' })
 * const agent = new Agent({ model })
 * ```
 */
export class OpenRouterModel implements ModelGateway {
  private readonly _options: OpenRouterModelOptions
  private readonly _logger: Logger

  constructor(options: OpenRouterModelOptions) {
    this._options = options
    this._logger = options.logger ?? createLogger('openrouter')
  }

  get modelId(): string {
    return this._options.modelId ?? DEFAULT_MODEL_ID
  }

  async *stream(messages: readonly Message[], options: StreamOptions): AsyncIterable<ModelStreamEvent> {
    const baseUrl = this._options.baseUrl ?? DEFAULT_BASE_URL
    const init: RequestInit = {
      method: 'POST',
      headers: this._headers(),
      body: JSON.stringify(this._formatRequest(messages, options)),
    }
    if (options.signal !== undefined) {
      init.signal = options.signal
    }

    const response = await globalThis.fetch(`${baseUrl}/chat/completions`, init)
    if (!response.ok) {
      const body = await response.text()
      throw new Error(`OpenRouter request failed with HTTP ${response.status}: ${body}`)
    }
    if (response.body === null) {
      throw new Error('OpenRouter response has no body')
    }

    yield { type: 'modelMessageStartEvent', role: 'assistant' }

    let stopReason: StopReason | undefined
    let sawToolCall = false
    let sawDone = false

    for await (const data of readServerSentEvents(response.body)) {
      if (data === '[DONE]') {
        sawDone = true
        break
      }

      const chunk = this._parseChunk(data)
      if (chunk === undefined) continue
      if (chunk.error) {
        throw new Error(`OpenRouter stream error: ${chunk.error.message}`)
      }

      const choice = chunk.choices[0]
      if (choice !== undefined && stopReason === undefined) {
        const content = choice.delta?.content
        if (content) {
          yield { type: 'modelContentBlockDeltaEvent', delta: { type: 'textDelta', text: content } }
        }

        for (const call of choice.delta?.tool_calls ?? []) {
          sawToolCall = true
          yield {
            type: 'modelContentBlockStartEvent',
            contentBlockIndex: call.index,
            start: {
              type: 'toolUseStart',
              ...(call.id ? { toolUseId: call.id } : {}),
              ...(call.type ? { toolType: call.type } : {}),
              ...(call.function?.name ? { name: call.function.name } : {}),
            },
          }
          const fragment = call.function?.arguments
          if (fragment) {
            yield {
              type: 'modelContentBlockDeltaEvent',
              contentBlockIndex: call.index,
              delta: { type: 'toolUseInputDelta', input: fragment },
            }
          }
        }

        if (choice.finish_reason) {
          stopReason = this._transformStopReason(choice.finish_reason)
          yield { type: 'modelMessageStopEvent', stopReason }
        }
      }

      if (chunk.usage) {
        yield {
          type: 'modelMetadataEvent',
          usage: {
            inputTokens: chunk.usage.prompt_tokens,
            outputTokens: chunk.usage.completion_tokens,
            totalTokens: chunk.usage.total_tokens,
          },
        }
      }
    }

    // Some providers close with [DONE] and never send a finish reason
    if (stopReason === undefined && sawDone) {
      yield { type: 'modelMessageStopEvent', stopReason: sawToolCall ? 'toolUse' : 'endTurn' }
    }
  }

  private _headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this._options.apiKey}`,
      'Content-Type': 'application/json',
    }
    if (this._options.appName !== undefined) headers['X-Title'] = this._options.appName
    if (this._options.referer !== undefined) headers['HTTP-Referer'] = this._options.referer
    return headers
  }

  private _formatRequest(messages: readonly Message[], options: StreamOptions): ChatCompletionRequest {
    const chatMessages: ChatMessage[] = []
    if (options.systemPrompt !== undefined && options.systemPrompt !== '') {
      chatMessages.push({ role: 'system', content: options.systemPrompt })
    }
    for (const message of messages) {
      chatMessages.push(formatMessage(message))
    }

    const request: ChatCompletionRequest = {
      model: this.modelId,
      messages: chatMessages,
      stream: true,
      temperature: this._options.temperature ?? DEFAULT_TEMPERATURE,
    }
    if (options.toolSpecs.length > 0) {
      request.tools = options.toolSpecs.map((spec) => ({
        type: 'function',
        function: { name: spec.name, description: spec.description, parameters: spec.inputSchema },
      }))
    }
    if (this._options.maxTokens !== undefined) {
      request.max_tokens = this._options.maxTokens
    }
    return request
  }

  private _parseChunk(data: string): Chunk | undefined {
    let json: unknown
    try {
      json = JSON.parse(data)
    } catch (error) {
      this._logger.warn({ err: normalizeError(error), data }, 'skipping malformed stream chunk')
      return undefined
    }

    const parsed = ChunkSchema.safeParse(json)
    if (!parsed.success) {
      this._logger.warn({ issues: parsed.error.issues, data }, 'skipping unexpected stream chunk')
      return undefined
    }
    return parsed.data
  }

  private _transformStopReason(finishReason: string): string {
    const mapped = STOP_REASON_MAP[finishReason]
    if (mapped !== undefined) {
      return mapped
    }
    this._logger.warn({ finishReason }, 'unknown finish reason')
    return snakeToCamel(finishReason)
  }
}

function formatMessage(message: Message): ChatMessage {
  switch (message.role) {
    case 'user':
      return { role: 'user', content: message.text }
    case 'assistant': {
      const calls = message.toolCalls ?? []
      if (calls.length === 0) {
        return { role: 'assistant', content: message.text }
      }
      return {
        role: 'assistant',
        content: message.text,
        tool_calls: calls.map((call) => ({
          id: call.id,
          type: call.type,
          function: { name: call.name, arguments: call.arguments },
        })),
      }
    }
    case 'tool':
      return { role: 'tool', content: message.text, tool_call_id: message.toolCallId ?? '' }
  }
}

/**
 * Yields the payload of every `data:` line of a server-sent event stream.
 * Comment lines (starting with `:`) and other fields are ignored. When the
 * consumer stops before the end, the body is cancelled so the connection is
 * released.
 */
export async function* readServerSentEvents(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader()
  const decoder = new TextDecoder()
  let buffer = ''
  let settled = false

  try {
    for (;;) {
      const { done, value } = await reader.read()
      buffer += done ? decoder.decode() : decoder.decode(value, { stream: true })

      let newline = buffer.indexOf('\n')
      while (newline !== -1) {
        const line = buffer.slice(0, newline).replace(/\r$/, '')
        buffer = buffer.slice(newline + 1)
        if (line.startsWith('data:')) {
          yield line.slice('data:'.length).trim()
        }
        newline = buffer.indexOf('\n')
      }

      if (done) break
    }

    settled = true
    const last = buffer.replace(/\r$/, '')
    if (last.startsWith('data:')) {
      yield last.slice('data:'.length).trim()
    }
  } catch (error) {
    settled = true
    throw error
  } finally {
    if (!settled) {
      await reader.cancel()
    }
    reader.releaseLock()
  }
}
