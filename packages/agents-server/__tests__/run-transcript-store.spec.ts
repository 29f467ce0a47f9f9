// @vitest-environment node
import { describe, expect, it } from 'vitest'
import type { AgentRunRequest, AgentRunResponse } from '../src/agent/types'
import { createInMemoryRunTranscriptStore } from '../src/services/run-transcript-store'

const request: AgentRunRequest = { prompt: 'get time', allowTools: true, toolWhitelist: null, timeoutMs: 20_000 }

function response(answer: string): AgentRunResponse {
  return {
    ok: true,
    answer,
    steps: [{ stepIndex: 0, thought: '', action: 'final', finalText: answer, confidence: 0.9, notes: {} }],
    toolTraces: [{ step: 0, tool: 'now', ok: true, latencyMs: 3, output: { tz: 'UTC' }, error: null }],
    decisionTrace: {
      trace_id: 'trace-1',
      iterations: 1,
      max_iterations: 6,
      timeout_ms: 20_000,
      elapsed_ms: 4,
      retry_total: 0,
      retry_per_tool: {},
      policy: { min_confidence_to_finalize: 0.45, max_total_retries: 3, max_retries_per_tool: 2 },
      whitelist_active: false,
      whitelist: null
    }
  }
}

function sequentialIds() {
  let n = 0
  return () => `run-${++n}`
}

describe('in-memory run transcript store', () => {
  it('records a wire-shaped transcript', () => {
    const store = createInMemoryRunTranscriptStore({
      genId: sequentialIds(),
      now: () => new Date('2026-02-02T00:00:00.000Z')
    })
    const transcript = store.record('u1', request, response('done'))
    expect(transcript).toEqual({
      id: 'run-1',
      user_id: 'u1',
      prompt: 'get time',
      max_iterations: 6,
      allow_tools: true,
      tool_whitelist: null,
      timeout_ms: 20_000,
      ok: true,
      answer: 'done',
      error: null,
      steps_count: 1,
      decision_trace: response('done').decisionTrace,
      tool_traces: [{ step: 0, tool: 'now', ok: true, latency_ms: 3, output: { tz: 'UTC' }, error: null }],
      created_at: '2026-02-02T00:00:00.000Z'
    })
    expect(store.get('run-1')).toEqual(transcript)
  })

  it('lists per user, newest first, with a limit', () => {
    const store = createInMemoryRunTranscriptStore({ genId: sequentialIds() })
    store.record('u1', request, response('a'))
    store.record('u2', request, response('b'))
    store.record('u1', request, response('c'))
    expect(store.listByUser('u1').map((t) => t.answer)).toEqual(['c', 'a'])
    expect(store.listByUser('u1', 1).map((t) => t.id)).toEqual(['run-3'])
  })

  it('evicts the oldest entries past the bound', () => {
    const store = createInMemoryRunTranscriptStore({ genId: sequentialIds(), maxEntries: 2 })
    store.record('u1', request, response('a'))
    store.record('u1', request, response('b'))
    store.record('u1', request, response('c'))
    expect(store.get('run-1')).toBeUndefined()
    expect(store.listByUser('u1').map((t) => t.answer)).toEqual(['c', 'b'])
    store.clear()
    expect(store.listByUser('u1')).toEqual([])
  })
})
