import type { AgentState, TerminalState } from '../agent/state.js'
import type { MessageData } from './messages.js'

/**
 * A change to the conversation history.
 */
export type MessageDelta =
  | { type: 'messageAdded'; message: Readonly<MessageData> }
  | { type: 'textAppended'; messageId: string; text: string }
  | { type: 'messageFinalized'; message: Readonly<MessageData> }

/**
 * Observation delivered to subscribers. A notification without a delta is a
 * state transition; one with a delta reports a history change made while in
 * `state`.
 */
export interface AgentNotification {
  state: AgentState
  delta?: MessageDelta
}

export type AgentListener = (notification: AgentNotification) => void

/**
 * Result returned when a run ends.
 */
export interface AgentResult {
  /**
   * The terminal state the run reached.
   */
  state: TerminalState

  /**
   * The last message in the history when the run ended.
   */
  lastMessage: Readonly<MessageData> | undefined

  /**
   * Tool executions attempted during the run.
   */
  toolCallCount: number
}
