import type { AgentConfig } from '../config/schema.js'
import type { ToolCallProposal } from '../agent/proposal.js'

/**
 * Outcome of gating a proposal.
 */
export type ApprovalDecision = 'approved' | 'needsApproval'

/**
 * Decides whether a proposal may run without asking the user.
 * Implementations must be pure: the same inputs always give the same decision.
 */
export interface ApprovalGate {
  decide(
    proposal: ToolCallProposal,
    config: Pick<AgentConfig, 'approvalMode'>,
    approvedTools: ReadonlySet<string>
  ): ApprovalDecision
}

/**
 * Applies the configured approval mode.
 *
 * - `autoApprove` approves everything, including tools that ask for approval.
 * - `alwaysAsk` asks for every proposal.
 * - `perThread` asks for a tool until the user has approved it once in the
 *   current run.
 */
export function decideApproval(
  proposal: ToolCallProposal,
  config: Pick<AgentConfig, 'approvalMode'>,
  approvedTools: ReadonlySet<string>
): ApprovalDecision {
  switch (config.approvalMode) {
    case 'autoApprove':
      return 'approved'
    case 'alwaysAsk':
      return 'needsApproval'
    case 'perThread':
      return approvedTools.has(proposal.toolName) ? 'approved' : 'needsApproval'
  }
}

/**
 * Default {@link ApprovalGate} backed by {@link decideApproval}.
 */
export class PolicyApprovalGate implements ApprovalGate {
  decide(
    proposal: ToolCallProposal,
    config: Pick<AgentConfig, 'approvalMode'>,
    approvedTools: ReadonlySet<string>
  ): ApprovalDecision {
    return decideApproval(proposal, config, approvedTools)
  }
}
