import type OpenAI from 'openai'
import { AgentActionEnum } from '@agent-loop/shared'
import { getLogger } from '../../services/logger'
import { buildToolDescriptors, parseFunctionCallArguments, type ToolDescriptor } from '../../tools/function-calling'
import type { ToolRegistry } from '../../tools/registry'
import type { Planner, PlannerPayload, PlannerProposal, WorkingMemoryEntry } from '../types'
import { formatToolResult } from './fallback-planner'

export const PLANNER_SYSTEM_PROMPT = [
  'You are the planning core of a task-execution agent.',
  'Return strictly one JSON object per turn with fields:',
  '- action: one of ["tool","reflect","retry","final"]',
  '- thought: short internal rationale',
  '- confidence: float 0..1',
  '- function_call: optional object {name:string, arguments:object}',
  '- final_text: required when action="final"',
  '',
  'Rules:',
  '1) Prefer tool usage when a concrete external/actionable check is needed.',
  '2) If the previous tool failed, either retry with corrected arguments or reflect.',
  '3) Stop with action="final" when enough evidence exists.',
  '4) Never output markdown, code fences, or prose outside JSON.'
].join('\n')

const WORKING_MEMORY_WINDOW = 8

type PlannerMessage = { role: 'system'; content: string } | { role: 'user'; content: string }

export type PlannerCompletionRequest = {
  model: string
  messages: PlannerMessage[]
  temperature: number
  tools?: ToolDescriptor[]
  tool_choice?: 'auto'
  response_format: { type: 'json_object' }
}

export type PlannerCompletion = {
  choices: Array<{
    message: {
      content: string | null
      tool_calls?: Array<{ type: string; function: { name: string; arguments: string } }>
    }
  }>
}

/** The slice of a chat-completions client the planner needs. */
export interface PlannerChatClient {
  complete(request: PlannerCompletionRequest): Promise<PlannerCompletion>
}

export function openAiChatClient(openai: OpenAI): PlannerChatClient {
  return {
    complete: (request) => openai.chat.completions.create(request)
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toConfidence(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback
}

export function buildPlannerMessages(payload: Pick<PlannerPayload, 'prompt' | 'step' | 'workingMemory'>): PlannerMessage[] {
  const recent = JSON.stringify(payload.workingMemory.slice(-WORKING_MEMORY_WINDOW))
  return [
    { role: 'system', content: PLANNER_SYSTEM_PROMPT },
    {
      role: 'user',
      content: [
        `Step: ${payload.step}`,
        `User objective: ${payload.prompt}`,
        `Recent working memory (JSON): ${recent}`,
        'Return next-step JSON only.'
      ].join('\n')
    }
  ]
}

/** Local answer used whenever the model call or its output is unusable. */
export function localFallback(prompt: string, memory: readonly WorkingMemoryEntry[]): PlannerProposal {
  const last = memory[memory.length - 1]
  if (last && last.type === 'tool_result' && last.ok) {
    return {
      action: 'final',
      thought: 'Tool result available; finalize.',
      final_text: formatToolResult(last),
      confidence: 0.65
    }
  }
  return {
    action: 'final',
    thought: 'Planner model unavailable; deterministic fallback.',
    final_text: `Received: ${prompt}`,
    confidence: 0.4
  }
}

/**
 * Normalizes a JSON step emitted by the model. Unknown actions become
 * `reflect`; a tool action without a usable call becomes `reflect` too.
 */
export function normalizeModelStep(raw: Record<string, unknown>, allowTools: boolean): PlannerProposal {
  const parsedAction = AgentActionEnum.safeParse(String(raw.action ?? 'reflect').trim().toLowerCase())
  const action = parsedAction.success ? parsedAction.data : 'reflect'
  const thought = typeof raw.thought === 'string' ? raw.thought : ''

  if (action === 'tool') {
    const call = raw.function_call
    if (!allowTools || !isRecord(call)) {
      return {
        action: 'reflect',
        thought: 'Tool requested but unavailable/invalid.',
        confidence: toConfidence(raw.confidence, 0.3)
      }
    }
    return {
      action,
      thought,
      confidence: toConfidence(raw.confidence, 0),
      function_call: {
        name: typeof call.name === 'string' ? call.name : '',
        arguments: parseFunctionCallArguments(call.arguments)
      }
    }
  }

  return {
    action,
    thought,
    confidence: toConfidence(raw.confidence, 0),
    final_text: typeof raw.final_text === 'string' ? raw.final_text : null
  }
}

export type LlmPlannerOptions = {
  client: PlannerChatClient
  registry: ToolRegistry
  model: string
  temperature?: number
}

/**
 * Planner backed by a chat-completions model. Never throws: transport errors
 * and unparseable output fall back to a deterministic local step.
 */
export class LlmPlanner implements Planner {
  constructor(private readonly options: LlmPlannerOptions) {}

  async nextStep(payload: PlannerPayload): Promise<PlannerProposal> {
    const { client, registry, model } = this.options
    const log = getLogger()
    const tools = payload.allowTools ? buildToolDescriptors(registry, payload.toolWhitelist) : []

    let completion: PlannerCompletion
    try {
      completion = await client.complete({
        model,
        messages: buildPlannerMessages(payload),
        temperature: this.options.temperature ?? 0.1,
        ...(tools.length ? { tools, tool_choice: 'auto' as const } : {}),
        response_format: { type: 'json_object' }
      })
    } catch (err) {
      log.warn('planner_fallback', {
        traceId: payload.traceId,
        step: payload.step,
        reason: 'request_failed',
        error: err instanceof Error ? err.message : String(err)
      })
      return localFallback(payload.prompt, payload.workingMemory)
    }

    const message = completion.choices[0]?.message
    const toolCall = message?.tool_calls?.find((c) => c.type === 'function')
    if (toolCall && payload.allowTools) {
      return {
        action: 'tool',
        thought: 'Model selected function call.',
        function_call: {
          name: toolCall.function.name,
          arguments: parseFunctionCallArguments(toolCall.function.arguments)
        },
        confidence: 0.6
      }
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(message?.content ?? '')
    } catch {
      log.warn('planner_fallback', { traceId: payload.traceId, step: payload.step, reason: 'invalid_json' })
      return localFallback(payload.prompt, payload.workingMemory)
    }
    if (!isRecord(parsed)) {
      log.warn('planner_fallback', { traceId: payload.traceId, step: payload.step, reason: 'not_an_object' })
      return localFallback(payload.prompt, payload.workingMemory)
    }
    return normalizeModelStep(parsed, payload.allowTools)
  }
}
