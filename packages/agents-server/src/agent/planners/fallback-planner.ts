import type { Planner, PlannerPayload, PlannerProposal, WorkingMemoryEntry } from '../types'

function lastSuccessfulResult(memory: readonly WorkingMemoryEntry[]): WorkingMemoryEntry | null {
  const last = memory[memory.length - 1]
  return last && last.type === 'tool_result' && last.ok ? last : null
}

export function formatToolResult(entry: WorkingMemoryEntry): string {
  return `Result: ${JSON.stringify(entry.output)}`
}

/**
 * Deterministic planner used when no model is configured: asks for the
 * clock when the objective mentions time, finalizes on the first successful
 * tool result, and otherwise reflects. It does not look at `allowTools` or
 * the whitelist; the arbiter and the executor enforce both.
 */
export class FallbackPlanner implements Planner {
  async nextStep(payload: PlannerPayload): Promise<PlannerProposal> {
    if (payload.step === 0 && payload.prompt.toLowerCase().includes('time')) {
      return {
        action: 'tool',
        thought: 'Need current time.',
        function_call: { name: 'now', arguments: { tz: 'UTC' } },
        confidence: 0.62
      }
    }

    const last = lastSuccessfulResult(payload.workingMemory)
    if (last) {
      return {
        action: 'final',
        thought: 'Tool result available.',
        final_text: formatToolResult(last),
        confidence: 0.71
      }
    }

    return {
      action: 'reflect',
      thought: `Need more evidence for: ${payload.prompt}`,
      confidence: 0.35
    }
  }
}
