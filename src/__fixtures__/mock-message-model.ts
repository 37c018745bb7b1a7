/**
 * Scripted model gateway for Agent testing.
 * Each call to `stream` plays back the next queued turn.
 */

import type { ModelGateway, StreamOptions } from '../models/model.js'
import type { ModelStreamEvent } from '../models/streaming.js'
import type { Message, MessageData, StopReason } from '../types/messages.js'

/**
 * A tool call for {@link MockMessageModel.addToolCallTurn}. Object arguments
 * are JSON-encoded; strings are sent as they are.
 */
export interface MockToolCall {
  id?: string
  name: string
  arguments?: string | Record<string, unknown>
}

/**
 * What the model received for one turn.
 */
export interface RecordedModelCall {
  messages: Readonly<MessageData>[]
  options: StreamOptions
}

type Turn =
  | { kind: 'events'; events: ModelStreamEvent[] }
  | { kind: 'error'; events: ModelStreamEvent[]; error: Error }
  | { kind: 'hang'; events: ModelStreamEvent[] }

export class MockMessageModel implements ModelGateway {
  readonly calls: RecordedModelCall[] = []
  private readonly _turns: Turn[] = []

  /**
   * Queues a turn that plays back `events` as given.
   */
  addTurn(events: ModelStreamEvent[]): this {
    this._turns.push({ kind: 'events', events })
    return this
  }

  /**
   * Queues a turn answering with plain text.
   */
  addTextTurn(text: string, stopReason: StopReason = 'endTurn'): this {
    return this.addTurn([
      { type: 'modelMessageStartEvent', role: 'assistant' },
      { type: 'modelContentBlockDeltaEvent', delta: { type: 'textDelta', text } },
      { type: 'modelMessageStopEvent', stopReason },
    ])
  }

  /**
   * Queues a turn that calls tools, optionally preceded by some text. Calls
   * get the block indices 0, 1, 2... in the order given.
   */
  addToolCallTurn(calls: MockToolCall[], text?: string): this {
    const events: ModelStreamEvent[] = [{ type: 'modelMessageStartEvent', role: 'assistant' }]
    if (text !== undefined) {
      events.push({ type: 'modelContentBlockDeltaEvent', delta: { type: 'textDelta', text } })
    }
    calls.forEach((call, index) => {
      const args = call.arguments ?? {}
      events.push(
        {
          type: 'modelContentBlockStartEvent',
          contentBlockIndex: index,
          start: { type: 'toolUseStart', name: call.name, toolUseId: call.id ?? `call_${index}`, toolType: 'function' },
        },
        {
          type: 'modelContentBlockDeltaEvent',
          contentBlockIndex: index,
          delta: { type: 'toolUseInputDelta', input: typeof args === 'string' ? args : JSON.stringify(args) },
        },
        { type: 'modelContentBlockStopEvent', contentBlockIndex: index }
      )
    })
    events.push({ type: 'modelMessageStopEvent', stopReason: 'toolUse' })
    return this.addTurn(events)
  }

  /**
   * Queues a turn that plays back `events` and then fails with `error`.
   */
  addErrorTurn(error: Error, events: ModelStreamEvent[] = []): this {
    this._turns.push({ kind: 'error', events, error })
    return this
  }

  /**
   * Queues a turn that plays back `events` and then waits until the request
   * is aborted.
   */
  addHangingTurn(events: ModelStreamEvent[] = []): this {
    this._turns.push({ kind: 'hang', events })
    return this
  }

  /**
   * Number of queued turns not yet played.
   */
  get remainingTurns(): number {
    return this._turns.length
  }

  stream(messages: readonly Message[], options: StreamOptions): AsyncIterable<ModelStreamEvent> {
    this.calls.push({ messages: messages.map((message) => message.toMessageData()), options })
    const turn = this._turns.shift()
    return play(turn, options.signal)
  }
}

async function* play(turn: Turn | undefined, signal: AbortSignal | undefined): AsyncGenerator<ModelStreamEvent> {
  if (turn === undefined) {
    throw new Error('MockMessageModel has no more turns')
  }

  for (const event of turn.events) {
    yield event
  }

  if (turn.kind === 'error') {
    throw turn.error
  }
  if (turn.kind === 'hang') {
    await new Promise<void>((resolve) => {
      if (signal === undefined) return
      if (signal.aborted) resolve()
      signal.addEventListener('abort', () => resolve(), { once: true })
    })
  }
}
