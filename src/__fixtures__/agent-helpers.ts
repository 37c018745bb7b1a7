/**
 * Test fixtures and helpers for Agent testing.
 * This module provides utilities for observing a running Agent.
 */

import type { Agent } from '../agent/agent.js'
import type { AgentState, AgentStateType } from '../agent/state.js'
import type { AgentNotification, MessageDelta } from '../types/agent.js'

/**
 * Records every notification an agent emits.
 */
export class NotificationRecorder {
  readonly notifications: AgentNotification[] = []
  private readonly _unsubscribe: () => void

  constructor(agent: Agent) {
    this._unsubscribe = agent.subscribe((notification) => {
      this.notifications.push(notification)
    })
  }

  /**
   * States entered, in order, taken from transition notifications.
   */
  get states(): AgentStateType[] {
    return this.notifications.filter((n) => n.delta === undefined).map((n) => n.state.type)
  }

  /**
   * History changes, in order.
   */
  get deltas(): MessageDelta[] {
    return this.notifications.flatMap((n) => (n.delta === undefined ? [] : [n.delta]))
  }

  /**
   * Text fragments appended to streaming messages, in order.
   */
  get textFragments(): string[] {
    return this.deltas.flatMap((delta) => (delta.type === 'textAppended' ? [delta.text] : []))
  }

  stop(): void {
    this._unsubscribe()
  }
}

/**
 * Resolves with the agent's state once it enters `type`.
 */
export function waitForState<T extends AgentStateType>(
  agent: Agent,
  type: T
): Promise<Extract<AgentState, { type: T }>> {
  return new Promise((resolve) => {
    const unsubscribe = agent.subscribe(({ state, delta }) => {
      if (delta === undefined && isStateOfType(state, type)) {
        unsubscribe()
        resolve(state)
      }
    })
  })
}

/**
 * Answers every approval request with `decision`.
 *
 * @returns Function that stops answering
 */
export function answerApprovals(agent: Agent, decision: 'approve' | 'reject'): () => void {
  return agent.subscribe(({ state, delta }) => {
    if (delta === undefined && state.type === 'awaitingApproval') {
      if (decision === 'approve') {
        agent.approve(state.proposal.id)
      } else {
        agent.reject(state.proposal.id)
      }
    }
  })
}

function isStateOfType<T extends AgentStateType>(
  state: AgentState,
  type: T
): state is Extract<AgentState, { type: T }> {
  return state.type === type
}
