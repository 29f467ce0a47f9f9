import type { RunTranscriptWire } from '@agent-loop/shared'
import { toToolTraceWire } from '../agent/wire'
import type { AgentRunRequest, AgentRunResponse } from '../agent/types'
import { genCorrelationId } from './logger'

export type RunTranscript = RunTranscriptWire

export type RunTranscriptStore = {
  record(userId: string, request: AgentRunRequest, response: AgentRunResponse): RunTranscript
  listByUser(userId: string, limit?: number): RunTranscript[]
  get(id: string): RunTranscript | undefined
  clear(): void
}

type TranscriptStoreOptions = {
  maxEntries?: number
  now?: () => Date
  genId?: () => string
}

export const DEFAULT_MAX_TRANSCRIPTS = 500

/**
 * Bounded, in-process sink for finished runs. The loop never reads from it;
 * it exists for audit and the runs listing endpoint.
 */
export function createInMemoryRunTranscriptStore(options: TranscriptStoreOptions = {}): RunTranscriptStore {
  const maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_TRANSCRIPTS)
  const now = options.now ?? (() => new Date())
  const genId = options.genId ?? genCorrelationId
  // Insertion order doubles as age order
  const entries = new Map<string, RunTranscript>()

  const evict = () => {
    while (entries.size > maxEntries) {
      const oldest = entries.keys().next()
      if (oldest.done) return
      entries.delete(oldest.value)
    }
  }

  return {
    record(userId, request, response) {
      const transcript: RunTranscript = {
        id: genId(),
        user_id: userId,
        prompt: request.prompt,
        max_iterations: response.decisionTrace.max_iterations,
        allow_tools: request.allowTools,
        tool_whitelist: response.decisionTrace.whitelist,
        timeout_ms: request.timeoutMs,
        ok: response.ok,
        answer: response.answer,
        error: response.error ?? null,
        steps_count: response.steps.length,
        decision_trace: response.decisionTrace,
        tool_traces: response.toolTraces.map(toToolTraceWire),
        created_at: now().toISOString()
      }
      entries.set(transcript.id, transcript)
      evict()
      return transcript
    },
    listByUser(userId, limit = 20) {
      return Array.from(entries.values())
        .filter((t) => t.user_id === userId)
        .reverse()
        .slice(0, Math.max(0, limit))
    },
    get(id) {
      return entries.get(id)
    },
    clear() {
      entries.clear()
    }
  }
}
