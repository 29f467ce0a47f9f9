import { AgentActionEnum } from '@agent-loop/shared'
import type { FunctionCall, PlannerProposal } from './types'

export type ArbitrationReason =
  | 'invalid_action'
  | 'tools_disabled'
  | 'invalid_function_call'
  | 'empty_final_text'
  | 'low_confidence_finalize'

type DecisionBase = {
  readonly thought: string
  readonly confidence: number
}

export type ArbitrationDecision =
  | (DecisionBase & { readonly action: 'tool'; readonly functionCall: FunctionCall })
  | (DecisionBase & { readonly action: 'final'; readonly finalText: string })
  | (DecisionBase & { readonly action: 'retry' })
  | (DecisionBase & { readonly action: 'reflect'; readonly reason?: ArbitrationReason })

export type ArbitrationInput = {
  proposal: PlannerProposal
  allowTools: boolean
  minConfidenceToFinalize: number
  hasToolResult: boolean
}

const MALFORMED_PENALTY = 0.2

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toText(value: unknown): string {
  if (value === undefined || value === null) return ''
  return typeof value === 'string' ? value : String(value)
}

function toConfidence(value: unknown): number {
  const n = typeof value === 'string' ? Number(value) : value
  return typeof n === 'number' && Number.isFinite(n) ? n : 0
}

function penalize(confidence: number): number {
  return Math.max(confidence - MALFORMED_PENALTY, 0)
}

function readFunctionCall(value: unknown): FunctionCall | null {
  if (!isRecord(value)) return null
  const name = toText(value.name).trim()
  if (!name) return null
  return { name, arguments: isRecord(value.arguments) ? value.arguments : {} }
}

function downgrade(reason: ArbitrationReason, thought: string, confidence: number): ArbitrationDecision {
  return { action: 'reflect', thought, confidence, reason }
}

/**
 * Deterministic gate over raw planner output. Malformed or disallowed
 * requests are downgraded to `reflect` with a confidence penalty; a
 * well-formed finalization that lacks evidence is downgraded without one.
 */
export function arbitrate(input: ArbitrationInput): ArbitrationDecision {
  const { proposal, allowTools, minConfidenceToFinalize, hasToolResult } = input
  const parsedAction = AgentActionEnum.safeParse(toText(proposal.action ?? 'reflect').trim().toLowerCase())
  if (!parsedAction.success) {
    return downgrade('invalid_action', 'Invalid planner action normalized to reflect.', 0)
  }

  const thought = toText(proposal.thought)
  const confidence = toConfidence(proposal.confidence)

  switch (parsedAction.data) {
    case 'tool': {
      if (!allowTools) {
        return downgrade('tools_disabled', 'Tools are disabled by request.', penalize(confidence))
      }
      const functionCall = readFunctionCall(proposal.function_call)
      if (!functionCall) {
        return downgrade('invalid_function_call', 'Invalid function_call payload.', penalize(confidence))
      }
      return { action: 'tool', thought, confidence, functionCall }
    }
    case 'final': {
      const finalText = toText(proposal.final_text)
      if (!finalText.trim()) {
        return downgrade('empty_final_text', 'Finalization blocked: empty final_text.', penalize(confidence))
      }
      if (confidence < minConfidenceToFinalize && !hasToolResult) {
        return downgrade(
          'low_confidence_finalize',
          'Finalization blocked: low confidence without evidence.',
          confidence
        )
      }
      return { action: 'final', thought, confidence, finalText }
    }
    case 'retry':
      return { action: 'retry', thought, confidence }
    case 'reflect':
      return { action: 'reflect', thought, confidence }
  }
}
