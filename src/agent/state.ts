import type { ToolCallProposal } from './proposal.js'

export interface IdleState {
  type: 'idle'
}

export interface AwaitingModelState {
  type: 'awaitingModel'
}

export interface ToolProposedState {
  type: 'toolProposed'
  proposal: ToolCallProposal
}

export interface AwaitingApprovalState {
  type: 'awaitingApproval'
  proposal: ToolCallProposal
}

export interface ExecutingToolState {
  type: 'executingTool'
  proposal: ToolCallProposal
}

export interface CompletedState {
  type: 'completed'
}

export interface FailedState {
  type: 'failed'
  reason: string
}

/**
 * Lifecycle state of an agent. Exactly one is active at a time.
 */
export type AgentState =
  | IdleState
  | AwaitingModelState
  | ToolProposedState
  | AwaitingApprovalState
  | ExecutingToolState
  | CompletedState
  | FailedState

export type AgentStateType = AgentState['type']

export type TerminalState = CompletedState | FailedState

/**
 * Edges of the state graph. Terminal states have none; a new `start()` resets
 * the agent to `idle` outside of this graph.
 */
const TRANSITIONS: Readonly<Record<AgentStateType, readonly AgentStateType[]>> = {
  idle: ['awaitingModel', 'failed'],
  awaitingModel: ['toolProposed', 'completed', 'failed'],
  toolProposed: ['executingTool', 'awaitingApproval', 'failed'],
  awaitingApproval: ['executingTool', 'awaitingModel', 'failed'],
  executingTool: ['awaitingModel', 'failed'],
  completed: [],
  failed: [],
}

export function isTerminal(state: AgentState): state is TerminalState {
  return state.type === 'completed' || state.type === 'failed'
}

export function canTransition(from: AgentStateType, to: AgentStateType): boolean {
  return TRANSITIONS[from].includes(to)
}

/**
 * Exhaustiveness check for switches over {@link AgentState}.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled agent state: ${JSON.stringify(value)}`)
}
