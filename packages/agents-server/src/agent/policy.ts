import { AGENT_RUN_LIMITS } from '@agent-loop/shared'
import { z } from 'zod'

export const RetryPolicySchema = z.object({
  maxTotalRetries: z.number().int().nonnegative().default(3),
  maxRetriesPerTool: z.number().int().nonnegative().default(2),
  backoffBaseMs: z.number().int().nonnegative().default(150)
})
export type RetryPolicy = Readonly<z.infer<typeof RetryPolicySchema>>

// maxIterationsDefault is clamped against maxIterationsCap at run time.
export const AgentPolicySchema = z.object({
  maxIterationsDefault: z.number().int().positive().default(AGENT_RUN_LIMITS.maxIterations.default),
  maxIterationsCap: z.number().int().positive().default(AGENT_RUN_LIMITS.maxIterations.max),
  minConfidenceToFinalize: z.number().min(0).max(1).default(0.45),
  retry: RetryPolicySchema.default({})
})

export type AgentPolicy = Readonly<{
  maxIterationsDefault: number
  maxIterationsCap: number
  minConfidenceToFinalize: number
  retry: RetryPolicy
}>

export type AgentPolicyOverrides = Partial<Omit<AgentPolicy, 'retry'>> & {
  retry?: Partial<RetryPolicy>
}

/**
 * Builds an immutable policy value. Every loop gets the policy it is
 * constructed with; there is no shared default instance.
 */
export function createAgentPolicy(overrides: AgentPolicyOverrides = {}): AgentPolicy {
  const parsed = AgentPolicySchema.parse(overrides)
  return Object.freeze({
    maxIterationsDefault: parsed.maxIterationsDefault,
    maxIterationsCap: parsed.maxIterationsCap,
    minConfidenceToFinalize: parsed.minConfidenceToFinalize,
    retry: Object.freeze({ ...parsed.retry })
  })
}

export function clampIterations(requested: number, policy: AgentPolicy): number {
  if (requested < 1) return 1
  if (requested > policy.maxIterationsCap) return policy.maxIterationsCap
  return requested
}

/** Suggested wait before the given retry attempt (1-based), doubling per attempt. */
export function retryBackoffMs(attempt: number, policy: AgentPolicy): number {
  const n = Math.max(1, Math.floor(attempt))
  return policy.retry.backoffBaseMs * 2 ** (n - 1)
}

/**
 * Retry budget bookkeeping for a single run. Owned by one loop invocation and
 * never shared, so no locking.
 */
export class RetryState {
  private total = 0
  private readonly perTool = new Map<string, number>()

  get totalRetries(): number {
    return this.total
  }

  toolRetries(toolName: string | null | undefined): number {
    if (!toolName) return 0
    return this.perTool.get(toolName) ?? 0
  }

  canRetry(toolName: string | null | undefined, policy: AgentPolicy): boolean {
    if (this.total >= policy.retry.maxTotalRetries) return false
    // Unattributed retries only draw on the global budget
    if (!toolName) return true
    return this.toolRetries(toolName) < policy.retry.maxRetriesPerTool
  }

  markRetry(toolName: string | null | undefined): void {
    this.total += 1
    if (toolName) {
      this.perTool.set(toolName, this.toolRetries(toolName) + 1)
    }
  }

  perToolSnapshot(): Record<string, number> {
    return Object.fromEntries(this.perTool)
  }
}
