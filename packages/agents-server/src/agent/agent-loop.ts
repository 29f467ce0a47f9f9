import { randomUUID } from 'node:crypto'
import { performance } from 'node:perf_hooks'
import { getRunLogger } from '../services/logger'
import type { ToolExecutor } from '../tools/executor'
import { arbitrate, type ArbitrationDecision } from './arbiter'
import { clampIterations, retryBackoffMs, RetryState, type AgentPolicy } from './policy'
import {
  policySnapshot,
  type AgentRunRequest,
  type AgentRunResponse,
  type AgentStepResult,
  type Planner,
  type PlannerProposal,
  type ToolTrace,
  type WorkingMemoryEntry
} from './types'

export const NO_FINAL_ANSWER = 'No final answer produced within iteration budget.'

const RETRY_PENALTY = 0.1
const EXHAUSTED_PENALTY = 0.2

export type AgentLoopDeps = {
  planner: Planner
  executor: ToolExecutor
  policy: AgentPolicy
  now?: () => number
  genTraceId?: () => string
}

export type AgentRunInput = {
  userId: string
  request: AgentRunRequest
  /** Called with each step as soon as it is recorded. */
  onStep?: (step: AgentStepResult) => void
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function reduce(confidence: number, by: number): number {
  return Math.max(confidence - by, 0)
}

function normalizeWhitelist(list: readonly string[] | null | undefined): string[] | null {
  // An empty list means "no restriction", same as an absent one
  if (!list || list.length === 0) return null
  return Array.from(new Set(list)).sort()
}

/**
 * Plan → arbitrate → act, one iteration at a time, until the planner
 * finalizes, the iteration budget runs out, or the run times out. Tool
 * failures never abort a run; they become retry or reflect steps. Timeout is
 * the only fatal outcome.
 */
export class AgentLoop {
  private readonly now: () => number
  private readonly genTraceId: () => string

  constructor(private readonly deps: AgentLoopDeps) {
    this.now = deps.now ?? (() => performance.now())
    this.genTraceId = deps.genTraceId ?? (() => randomUUID())
  }

  async run(input: AgentRunInput): Promise<AgentRunResponse> {
    const { userId, request, onStep } = input
    const { planner, executor, policy } = this.deps
    const traceId = this.genTraceId()
    const started = this.now()
    const elapsed = () => Math.max(0, Math.floor(this.now() - started))
    const log = getRunLogger(traceId, userId)

    const maxIterations = clampIterations(request.maxIterations ?? policy.maxIterationsDefault, policy)
    const whitelist = normalizeWhitelist(request.toolWhitelist)
    const whitelistSet = whitelist ? new Set(whitelist) : null

    const steps: AgentStepResult[] = []
    const toolTraces: ToolTrace[] = []
    const workingMemory: WorkingMemoryEntry[] = []
    const retryState = new RetryState()
    let lastToolName: string | null = null
    let finalAnswer: string | null = null
    let error: string | null = null

    const record = (step: AgentStepResult) => {
      steps.push(step)
      log.debug('agent_step', {
        step: step.stepIndex,
        action: step.action,
        confidence: step.confidence,
        notes: step.notes
      })
      onStep?.(step)
    }

    const retryOrReflect = (
      stepIndex: number,
      toolName: string | null,
      confidence: number,
      granted: (attempt: number) => AgentStepResult,
      denied: () => AgentStepResult
    ) => {
      if (retryState.canRetry(toolName, policy)) {
        retryState.markRetry(toolName)
        const attempt = toolName ? retryState.toolRetries(toolName) : retryState.totalRetries
        record(granted(attempt))
      } else {
        log.info('agent_retry_exhausted', { step: stepIndex, tool: toolName, confidence })
        record(denied())
      }
    }

    log.info('agent_run_start', {
      maxIterations,
      allowTools: request.allowTools,
      whitelist,
      timeoutMs: request.timeoutMs
    })

    for (let i = 0; i < maxIterations; i++) {
      const elapsedMs = elapsed()
      if (elapsedMs > request.timeoutMs) {
        error = `Agent timeout after ${elapsedMs}ms`
        log.warn('agent_run_timeout', { step: i, elapsedMs, timeoutMs: request.timeoutMs })
        break
      }

      const raw = await planner.nextStep({
        traceId,
        step: i,
        prompt: request.prompt,
        workingMemory: [...workingMemory],
        allowTools: request.allowTools,
        toolWhitelist: whitelist
      })
      const proposal: PlannerProposal = isRecord(raw) ? raw : {}
      const hasToolResult = workingMemory.some((entry) => entry.type === 'tool_result' && entry.ok)

      const decision: ArbitrationDecision = arbitrate({
        proposal,
        allowTools: request.allowTools,
        minConfidenceToFinalize: policy.minConfidenceToFinalize,
        hasToolResult
      })

      if (decision.action === 'final') {
        finalAnswer = decision.finalText
        record({
          stepIndex: i,
          thought: decision.thought,
          action: 'final',
          finalText: decision.finalText,
          confidence: decision.confidence,
          notes: {}
        })
        break
      }

      switch (decision.action) {
        case 'tool': {
          const { name, arguments: args } = decision.functionCall
          lastToolName = name

          const rec = await executor.execute({
            userId,
            toolName: name,
            args,
            traceId,
            metadata: { step: i },
            whitelist: whitelistSet
          })
          const toolError = rec.error ?? null

          toolTraces.push({
            step: i,
            tool: rec.toolName,
            ok: rec.ok,
            latencyMs: rec.latencyMs,
            output: rec.output,
            error: toolError
          })
          workingMemory.push({
            type: 'tool_result',
            step: i,
            tool: rec.toolName,
            ok: rec.ok,
            output: rec.output,
            error: toolError
          })
          record({
            stepIndex: i,
            thought: decision.thought,
            action: 'tool',
            functionCall: { name, arguments: args },
            confidence: decision.confidence,
            notes: { tool_ok: rec.ok, tool_error: toolError }
          })

          if (!rec.ok) {
            retryOrReflect(
              i,
              name,
              decision.confidence,
              (attempt) => ({
                stepIndex: i,
                thought: 'Tool failed; retry authorized by policy.',
                action: 'retry',
                confidence: reduce(decision.confidence, RETRY_PENALTY),
                notes: {
                  failed_tool: name,
                  total_retries: retryState.totalRetries,
                  tool_retries: retryState.toolRetries(name),
                  backoff_ms: retryBackoffMs(attempt, policy)
                }
              }),
              () => ({
                stepIndex: i,
                thought: 'Retry budget exhausted; switching to reflection.',
                action: 'reflect',
                confidence: reduce(decision.confidence, EXHAUSTED_PENALTY),
                notes: { failed_tool: name, retry_exhausted: true }
              })
            )
          }
          break
        }
        case 'retry': {
          const target = lastToolName
          retryOrReflect(
            i,
            target,
            decision.confidence,
            (attempt) => ({
              stepIndex: i,
              thought: decision.thought || 'Retry selected.',
              action: 'retry',
              confidence: decision.confidence,
              notes: {
                retry_target_tool: target,
                total_retries: retryState.totalRetries,
                tool_retries: retryState.toolRetries(target),
                backoff_ms: retryBackoffMs(attempt, policy)
              }
            }),
            () => ({
              stepIndex: i,
              thought: 'Retry denied by policy budget.',
              action: 'reflect',
              confidence: reduce(decision.confidence, EXHAUSTED_PENALTY),
              notes: { retry_exhausted: true }
            })
          )
          break
        }
        case 'reflect':
          record({
            stepIndex: i,
            thought: decision.thought,
            action: 'reflect',
            confidence: decision.confidence,
            notes: decision.reason ? { arbiter_reason: decision.reason } : {}
          })
          break
        default: {
          const unreachable: never = decision
          throw new Error(`Unhandled arbitration decision: ${JSON.stringify(unreachable)}`)
        }
      }
    }

    if (finalAnswer === null && error === null) {
      finalAnswer = NO_FINAL_ANSWER
    }

    const response: AgentRunResponse = {
      ok: error === null,
      answer: finalAnswer ?? '',
      steps,
      toolTraces,
      decisionTrace: {
        trace_id: traceId,
        iterations: steps.length,
        max_iterations: maxIterations,
        timeout_ms: request.timeoutMs,
        elapsed_ms: elapsed(),
        retry_total: retryState.totalRetries,
        retry_per_tool: retryState.perToolSnapshot(),
        policy: policySnapshot(policy),
        whitelist_active: whitelist !== null,
        whitelist
      },
      ...(error !== null ? { error } : {})
    }

    log.info('agent_run_complete', {
      ok: response.ok,
      steps: steps.length,
      toolCalls: toolTraces.length,
      retries: retryState.totalRetries,
      elapsedMs: response.decisionTrace.elapsed_ms
    })
    return response
  }
}
