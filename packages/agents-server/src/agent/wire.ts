import type {
  AgentRunRequestWire,
  AgentRunResponseWire,
  AgentStepWire,
  ToolTraceWire
} from '@agent-loop/shared'
import type { AgentRunRequest, AgentRunResponse, AgentStepResult, ToolTrace } from './types'

export function fromRunRequestWire(body: AgentRunRequestWire): AgentRunRequest {
  return {
    prompt: body.prompt,
    maxIterations: body.max_iterations,
    allowTools: body.allow_tools,
    toolWhitelist: body.tool_whitelist ?? null,
    timeoutMs: body.timeout_ms
  }
}

export function toStepWire(step: AgentStepResult): AgentStepWire {
  return {
    step_index: step.stepIndex,
    thought: step.thought,
    action: step.action,
    function_call: step.functionCall ?? null,
    final_text: step.finalText ?? null,
    confidence: step.confidence,
    notes: step.notes
  }
}

export function toToolTraceWire(trace: ToolTrace): ToolTraceWire {
  return {
    step: trace.step,
    tool: trace.tool,
    ok: trace.ok,
    latency_ms: trace.latencyMs,
    output: trace.output,
    error: trace.error
  }
}

export function toRunResponseWire(response: AgentRunResponse): AgentRunResponseWire {
  return {
    ok: response.ok,
    answer: response.answer,
    steps: response.steps.map(toStepWire),
    tool_traces: response.toolTraces.map(toToolTraceWire),
    decision_trace: response.decisionTrace,
    error: response.error ?? null
  }
}
