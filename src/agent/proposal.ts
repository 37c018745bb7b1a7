import type { ToolCallReference } from '../types/messages.js'

/**
 * Reason attached when the model gives none.
 */
export const DEFAULT_PROPOSAL_REASON = 'Tool execution requested by AI'

/**
 * Follow-up attached when the model gives none.
 */
export const DEFAULT_NEXT_STEP = 'Continue with tool result'

/**
 * A tool call assembled from a model turn, waiting to be approved, executed
 * or rejected. Proposals are frozen and each one is consumed exactly once.
 */
export interface ToolCallProposal {
  readonly id: string
  readonly toolName: string
  readonly type: string
  /**
   * Raw JSON argument text as streamed by the model.
   */
  readonly arguments: string
  /**
   * Copied from the tool's descriptor; unknown tools default to true.
   */
  readonly requiresApproval: boolean
  readonly reason: string
  readonly nextStepAfterTool: string
}

export interface ToolCallProposalInit {
  id: string
  toolName: string
  type: string
  arguments: string
  requiresApproval: boolean
  reason?: string
  nextStepAfterTool?: string
}

/**
 * Creates a frozen proposal, filling in the descriptive defaults.
 */
export function createToolCallProposal(init: ToolCallProposalInit): ToolCallProposal {
  return Object.freeze({
    id: init.id,
    toolName: init.toolName,
    type: init.type,
    arguments: init.arguments,
    requiresApproval: init.requiresApproval,
    reason: init.reason ?? DEFAULT_PROPOSAL_REASON,
    nextStepAfterTool: init.nextStepAfterTool ?? DEFAULT_NEXT_STEP,
  })
}

/**
 * The history entry an assistant message records for a proposal.
 */
export function toToolCallReference(proposal: ToolCallProposal): ToolCallReference {
  return {
    id: proposal.id,
    type: proposal.type,
    name: proposal.toolName,
    arguments: proposal.arguments,
  }
}
