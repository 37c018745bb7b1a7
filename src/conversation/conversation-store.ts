import { Message, type MessageData } from '../types/messages.js'

/**
 * Ordered message history of one agent.
 *
 * The agent is the only writer while a run is active. Implementations may
 * persist asynchronously; the agent awaits every call before moving on.
 */
export interface ConversationStore {
  /**
   * Adds a message to the end of the history.
   */
  append(message: Message): void | Promise<void>

  /**
   * Called exactly once for a streamed assistant message, after it has been
   * finalized, so its final content can be stored.
   */
  update(message: Message): void | Promise<void>

  /**
   * Current history, oldest first.
   */
  history(): readonly Message[]
}

/**
 * Conversation store that keeps messages in memory.
 */
export class InMemoryConversationStore implements ConversationStore {
  private readonly _messages: Message[]

  constructor(messages: Message[] | MessageData[] = []) {
    this._messages = messages.map((msg) => (msg instanceof Message ? msg : Message.fromMessageData(msg)))
  }

  append(message: Message): void {
    this._messages.push(message)
  }

  update(message: Message): void {
    const index = this._messages.findIndex((candidate) => candidate.id === message.id)
    if (index === -1) {
      throw new Error(`Message '${message.id}' is not part of this conversation`)
    }
    this._messages[index] = message
  }

  history(): readonly Message[] {
    return [...this._messages]
  }
}
