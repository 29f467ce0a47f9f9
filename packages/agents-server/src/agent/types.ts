import type { AgentAction, DecisionTraceWire } from '@agent-loop/shared'
import type { AgentPolicy } from './policy'

export type { AgentAction }

export type FunctionCall = {
  name: string
  arguments: Record<string, unknown>
}

/**
 * What a planner hands back for one iteration. Planner output is untrusted:
 * a remote model may put anything in these fields, and the arbiter
 * normalizes whatever arrives.
 */
export type PlannerProposal = {
  action?: string
  thought?: string
  confidence?: number
  function_call?: unknown
  final_text?: string | null
}

export type ToolResultMemory = {
  type: 'tool_result'
  step: number
  tool: string
  ok: boolean
  output: Record<string, unknown>
  error: string | null
}

export type WorkingMemoryEntry = ToolResultMemory

export type PlannerPayload = {
  traceId: string
  step: number
  prompt: string
  workingMemory: readonly WorkingMemoryEntry[]
  allowTools: boolean
  toolWhitelist: readonly string[] | null
}

/** Any backend (remote model or local heuristics) that proposes the next step. */
export interface Planner {
  nextStep(payload: PlannerPayload): Promise<PlannerProposal | null | undefined>
}

export type AgentStepResult = {
  stepIndex: number
  thought: string
  action: AgentAction
  functionCall?: FunctionCall
  finalText?: string
  confidence: number
  notes: Record<string, unknown>
}

export type ToolTrace = {
  step: number
  tool: string
  ok: boolean
  latencyMs: number
  output: Record<string, unknown>
  error: string | null
}

export type AgentRunRequest = {
  prompt: string
  /** Defaults to the policy's maxIterationsDefault. */
  maxIterations?: number
  allowTools: boolean
  toolWhitelist?: readonly string[] | null
  timeoutMs: number
}

export type DecisionTrace = DecisionTraceWire

export type AgentRunResponse = {
  ok: boolean
  answer: string
  steps: AgentStepResult[]
  toolTraces: ToolTrace[]
  decisionTrace: DecisionTrace
  error?: string
}

export function policySnapshot(policy: AgentPolicy): DecisionTrace['policy'] {
  return {
    min_confidence_to_finalize: policy.minConfidenceToFinalize,
    max_total_retries: policy.retry.maxTotalRetries,
    max_retries_per_tool: policy.retry.maxRetriesPerTool
  }
}
