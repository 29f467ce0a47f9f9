// @vitest-environment node
import { describe, expect, it } from 'vitest'
import { arbitrate, type ArbitrationInput } from '../src/agent/arbiter'
import type { PlannerProposal } from '../src/agent/types'

function input(proposal: PlannerProposal, overrides: Partial<Omit<ArbitrationInput, 'proposal'>> = {}): ArbitrationInput {
  return {
    proposal,
    allowTools: true,
    minConfidenceToFinalize: 0.45,
    hasToolResult: false,
    ...overrides
  }
}

describe('arbitrate', () => {
  it('normalizes an unknown action to reflect with zero confidence', () => {
    const decision = arbitrate(input({ action: 'dance', thought: 'whatever', confidence: 0.9 }))
    expect(decision).toEqual({
      action: 'reflect',
      thought: 'Invalid planner action normalized to reflect.',
      confidence: 0,
      reason: 'invalid_action'
    })
  })

  it('treats a missing action as reflect and keeps the planner thought', () => {
    const decision = arbitrate(input({ thought: 'thinking', confidence: 0.3 }))
    expect(decision).toEqual({ action: 'reflect', thought: 'thinking', confidence: 0.3 })
  })

  it('accepts actions regardless of case and padding', () => {
    const decision = arbitrate(input({ action: ' RETRY ', confidence: 0.5 }))
    expect(decision.action).toBe('retry')
  })

  it('downgrades tool requests when tools are disabled', () => {
    const decision = arbitrate(
      input({ action: 'tool', confidence: 0.5, function_call: { name: 'now' } }, { allowTools: false })
    )
    expect(decision.action).toBe('reflect')
    expect(decision.thought).toBe('Tools are disabled by request.')
    expect(decision.confidence).toBeCloseTo(0.3)
    expect(decision.action === 'reflect' && decision.reason).toBe('tools_disabled')
  })

  it('floors the penalty at zero', () => {
    const decision = arbitrate(input({ action: 'tool', confidence: 0.1 }, { allowTools: false }))
    expect(decision.confidence).toBe(0)
  })

  it.each([
    ['missing call', undefined],
    ['non-object call', 'now'],
    ['blank name', { name: '   ' }],
    ['array call', [{ name: 'now' }]]
  ])('rejects an invalid function_call (%s)', (_label, call) => {
    const decision = arbitrate(input({ action: 'tool', confidence: 0.6, function_call: call }))
    expect(decision.action).toBe('reflect')
    expect(decision.thought).toBe('Invalid function_call payload.')
    expect(decision.confidence).toBeCloseTo(0.4)
  })

  it('passes a well-formed tool call with a trimmed name', () => {
    const decision = arbitrate(
      input({ action: 'tool', thought: 'check', confidence: 0.7, function_call: { name: ' echo ', arguments: { text: 'hi' } } })
    )
    expect(decision).toEqual({
      action: 'tool',
      thought: 'check',
      confidence: 0.7,
      functionCall: { name: 'echo', arguments: { text: 'hi' } }
    })
  })

  it('replaces non-object arguments with an empty object', () => {
    const decision = arbitrate(input({ action: 'tool', function_call: { name: 'now', arguments: ['UTC'] } }))
    expect(decision.action === 'tool' && decision.functionCall.arguments).toEqual({})
  })

  it('blocks finalization with empty text', () => {
    const decision = arbitrate(input({ action: 'final', final_text: '  ', confidence: 0.9 }))
    expect(decision.action).toBe('reflect')
    expect(decision.thought).toBe('Finalization blocked: empty final_text.')
    expect(decision.confidence).toBeCloseTo(0.7)
  })

  it('blocks low-confidence finalization without evidence and keeps confidence', () => {
    const decision = arbitrate(input({ action: 'final', final_text: 'done', confidence: 0.3 }))
    expect(decision).toEqual({
      action: 'reflect',
      thought: 'Finalization blocked: low confidence without evidence.',
      confidence: 0.3,
      reason: 'low_confidence_finalize'
    })
  })

  it('allows low-confidence finalization once a tool succeeded', () => {
    const decision = arbitrate(input({ action: 'final', final_text: 'It is 10:00' }, { hasToolResult: true }))
    expect(decision).toEqual({ action: 'final', thought: '', confidence: 0, finalText: 'It is 10:00' })
  })

  it('allows finalization at exactly the threshold', () => {
    const decision = arbitrate(input({ action: 'final', final_text: 'ok', confidence: 0.45 }))
    expect(decision.action).toBe('final')
  })

  it('zeroes non-finite confidence', () => {
    expect(arbitrate(input({ action: 'reflect', confidence: Number.NaN })).confidence).toBe(0)
    expect(arbitrate(input({ action: 'retry', confidence: Number.POSITIVE_INFINITY })).confidence).toBe(0)
  })
})
