import { describe, it, expect } from 'vitest'
import { PolicyApprovalGate, decideApproval } from '../approval-gate.js'
import { createToolCallProposal } from '../../agent/proposal.js'

const proposal = (requiresApproval: boolean): ReturnType<typeof createToolCallProposal> =>
  createToolCallProposal({ id: 'call_1', toolName: 'echo', type: 'function', arguments: '{}', requiresApproval })

describe('decideApproval', () => {
  describe.each([
    { approvalMode: 'autoApprove' as const, requiresApproval: false, approved: [], expected: 'approved' },
    { approvalMode: 'autoApprove' as const, requiresApproval: true, approved: [], expected: 'approved' },
    { approvalMode: 'alwaysAsk' as const, requiresApproval: false, approved: ['echo'], expected: 'needsApproval' },
    { approvalMode: 'alwaysAsk' as const, requiresApproval: true, approved: [], expected: 'needsApproval' },
    { approvalMode: 'perThread' as const, requiresApproval: false, approved: [], expected: 'needsApproval' },
    { approvalMode: 'perThread' as const, requiresApproval: false, approved: ['echo'], expected: 'approved' },
    { approvalMode: 'perThread' as const, requiresApproval: false, approved: ['other'], expected: 'needsApproval' },
    { approvalMode: 'perThread' as const, requiresApproval: true, approved: ['echo'], expected: 'approved' },
    { approvalMode: 'perThread' as const, requiresApproval: true, approved: [], expected: 'needsApproval' },
  ])('$approvalMode, requiresApproval=$requiresApproval, approved=$approved', (row) => {
    it(`returns ${row.expected}`, () => {
      const approvedTools = new Set<string>(row.approved)
      const decision = decideApproval(proposal(row.requiresApproval), { approvalMode: row.approvalMode }, approvedTools)

      expect(decision).toBe(row.expected)
    })
  })
})

describe('PolicyApprovalGate', () => {
  it('delegates to decideApproval', () => {
    const gate = new PolicyApprovalGate()

    expect(gate.decide(proposal(false), { approvalMode: 'perThread' }, new Set(['echo']))).toBe('approved')
    expect(gate.decide(proposal(false), { approvalMode: 'alwaysAsk' }, new Set(['echo']))).toBe('needsApproval')
  })
})
