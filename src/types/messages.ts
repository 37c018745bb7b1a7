import { randomUUID } from 'node:crypto'

/**
 * Author of a message in the conversation.
 *
 * - `user` - Input from the caller
 * - `assistant` - Output from the model
 * - `tool` - Result (or failure) of a tool invocation
 */
export type Role = 'user' | 'assistant' | 'tool'

/**
 * Reason the model stopped generating.
 * Known provider values are normalized to these names; unknown ones are passed
 * through in camelCase.
 */
export type StopReason =
  | 'endTurn'
  | 'toolUse'
  | 'maxTokens'
  | 'stopSequence'
  | 'contentFiltered'
  | 'guardrailIntervened'
  | (string & {})

/**
 * A tool call produced by the assistant, as recorded in history.
 */
export interface ToolCallReference {
  /**
   * Identifier the matching tool-result message points back to.
   */
  id: string

  /**
   * Call type reported by the provider, usually `function`.
   */
  type: string

  /**
   * Name of the tool.
   */
  name: string

  /**
   * Raw JSON argument text.
   */
  arguments: string
}

/**
 * Plain-data form of a {@link Message}.
 */
export interface MessageData {
  id?: string
  role: Role
  text: string
  isStreaming?: boolean
  toolCalls?: ToolCallReference[]
  toolCallId?: string
  isError?: boolean
}

/**
 * A single entry of the conversation history.
 *
 * Messages are append-only. The one exception is the assistant message the
 * active run is streaming into: it grows through {@link Message.appendText}
 * and is closed exactly once by {@link Message.finalize}.
 */
export class Message {
  readonly id: string
  readonly role: Role
  readonly toolCallId: string | undefined
  readonly isError: boolean

  private _text: string
  private _isStreaming: boolean
  private _toolCalls: readonly ToolCallReference[] | undefined

  constructor(data: MessageData) {
    this.id = data.id ?? randomUUID()
    this.role = data.role
    this.toolCallId = data.toolCallId
    this.isError = data.isError ?? false
    this._text = data.text
    this._isStreaming = data.isStreaming ?? false
    this._toolCalls = data.toolCalls ? [...data.toolCalls] : undefined
  }

  /**
   * Creates a user message.
   */
  static user(text: string): Message {
    return new Message({ role: 'user', text })
  }

  /**
   * Creates an empty assistant message that will receive streamed text.
   */
  static streamingAssistant(): Message {
    return new Message({ role: 'assistant', text: '', isStreaming: true })
  }

  /**
   * Creates a tool-result message answering the call `toolCallId`.
   */
  static toolResult(toolCallId: string, text: string, isError = false): Message {
    return new Message({ role: 'tool', text, toolCallId, isError })
  }

  /**
   * Creates a Message instance from MessageData.
   */
  static fromMessageData(data: MessageData): Message {
    return new Message(data)
  }

  get text(): string {
    return this._text
  }

  get isStreaming(): boolean {
    return this._isStreaming
  }

  get toolCalls(): readonly ToolCallReference[] | undefined {
    return this._toolCalls
  }

  /**
   * Appends a streamed text fragment.
   *
   * @throws Error when the message has already been finalized
   */
  appendText(chunk: string): void {
    if (!this._isStreaming) {
      throw new Error(`Cannot append text to finalized message '${this.id}'`)
    }
    this._text += chunk
  }

  /**
   * Closes the message. Any text received so far is kept.
   *
   * @param toolCalls - Tool calls the assistant produced in this turn
   * @throws Error when the message has already been finalized
   */
  finalize(toolCalls?: ToolCallReference[]): void {
    if (!this._isStreaming) {
      throw new Error(`Message '${this.id}' is already finalized`)
    }
    this._isStreaming = false
    if (toolCalls !== undefined && toolCalls.length > 0) {
      this._toolCalls = [...toolCalls]
    }
  }

  /**
   * Returns an immutable snapshot of the message.
   */
  toMessageData(): Readonly<MessageData> {
    const data: MessageData = {
      id: this.id,
      role: this.role,
      text: this._text,
      isStreaming: this._isStreaming,
    }
    if (this._toolCalls !== undefined) {
      data.toolCalls = this._toolCalls.map((call) => ({ ...call }))
    }
    if (this.toolCallId !== undefined) {
      data.toolCallId = this.toolCallId
    }
    if (this.isError) {
      data.isError = true
    }
    return Object.freeze(data)
  }
}
